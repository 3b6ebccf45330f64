import { describe, expect, it } from "vitest";

import { loadServerConfig } from "../src/config.js";
import { GameCommandInputError } from "../src/core.js";

describe("loadServerConfig", () => {
  it("falls back to defaults when nothing is set", () => {
    const config = loadServerConfig({});

    expect(config.port).toBe(8787);
    expect(config.sweepIntervalMs).toBe(60_000);
    expect(config.game).toMatchObject({
      boardSize: 4,
      minPlayers: 2,
      maxPlayers: 4,
      sessionDurationMs: 900_000,
      maxTurns: 50,
    });
  });

  it("reads overrides from the environment", () => {
    const config = loadServerConfig({
      PORT: "9000",
      SWEEP_INTERVAL_MS: "5000",
      SESSION_DURATION_SECONDS: "300",
      BOARD_SIZE: " 5 ",
      MIN_PLAYERS: "3",
      MAX_PLAYERS: "6",
      MAX_TURNS: "0",
    });

    expect(config.port).toBe(9000);
    expect(config.sweepIntervalMs).toBe(5_000);
    expect(config.game).toMatchObject({
      boardSize: 5,
      minPlayers: 3,
      maxPlayers: 6,
      sessionDurationMs: 300_000,
      maxTurns: 0,
    });
  });

  it("collects every invalid value into one error", () => {
    expect(() => loadServerConfig({ PORT: "eighty", BOARD_SIZE: "12" })).toThrow(
      GameCommandInputError,
    );
    expect(() => loadServerConfig({ PORT: "eighty", BOARD_SIZE: "12" })).toThrow(
      'Invalid server configuration: PORT must be a non-negative integer, got "eighty"; boardSize must be an integer between 2 and 6',
    );
  });

  it("refuses a zero sweep interval", () => {
    expect(() => loadServerConfig({ SWEEP_INTERVAL_MS: "0" })).toThrow(
      "SWEEP_INTERVAL_MS must be greater than 0",
    );
  });
});
