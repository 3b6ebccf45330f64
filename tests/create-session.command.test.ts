import { describe, expect, it } from "vitest";

import { createSchedulerMock } from "./support/mocks.js";
import { InMemoryLobbyGateway } from "../src/adapters/in-memory/InMemoryLobbyGateway.js";
import { InMemorySessionGateway } from "../src/adapters/in-memory/InMemorySessionGateway.js";
import type { CommandContext } from "../src/domain/commands/Command.js";
import { CreateSession, type LobbySnapshot } from "../src/domain/commands/CreateSession.js";
import { GameCommandInputError } from "../src/domain/errors/index.js";
import { createGameConfig } from "../src/domain/GameConfig.js";

const snapshot: LobbySnapshot = {
  players: [
    { playerId: "alice", name: "Alice" },
    { playerId: "bob", name: " " },
  ],
  boardSize: 3,
  sessionDurationSeconds: 300,
  minPlayers: 2,
};

function createContext() {
  return {
    sessionGateway: new InMemorySessionGateway(),
    lobbyGateway: new InMemoryLobbyGateway(),
    scheduler: createSchedulerMock(),
    config: createGameConfig({ surplusClues: 1 }),
  } satisfies CommandContext;
}

describe("CreateSession command", () => {
  it("generates the puzzle and stores a waiting session", async () => {
    const context = createContext();

    const { reply, events } = await new CreateSession(snapshot, 100, 7).execute(context);

    expect(reply).toBe("session-1");
    const state = await context.sessionGateway.loadSession(reply);
    expect(state).toMatchObject({
      phase: "waiting",
      host: "alice",
      createdAt: 100,
      config: { boardSize: 3, sessionDurationMs: 300_000, minPlayers: 2, maxPlayers: 4 },
    });
    expect(state.board.size).toBe(3);
    expect(state.clues.filter((clue) => clue.surplus)).toHaveLength(1);
    expect(state.players.map((player) => player.name)).toEqual(["Alice", "bob"]);
    expect(context.scheduler.scheduleTick).not.toHaveBeenCalled();

    expect(events[0]).toEqual({
      channel: "session:session-1",
      event: {
        type: "SessionCreated",
        sessionId: "session-1",
        host: "alice",
        boardSize: 3,
        players: ["alice", "bob"],
        at: 100,
      },
    });
  });

  it("grows the seat limit to fit the whole roster", async () => {
    const context = createContext();

    const { reply } = await new CreateSession({ ...snapshot, maxPlayers: 1 }, 100, 7).execute(
      context,
    );

    const state = await context.sessionGateway.loadSession(reply);
    expect(state.config.maxPlayers).toBe(2);
  });

  const invalid: ReadonlyArray<[Partial<LobbySnapshot>, string]> = [
    [{ players: [] }, "players must contain at least one player"],
    [
      { players: [{ playerId: "alice", name: "A" }, { playerId: "alice", name: "B" }] },
      "player identifiers must be unique",
    ],
    [{ hostId: "zed" }, "hostId must name one of the players"],
    [{ boardSize: 7 }, "boardSize must be an integer between 2 and 6"],
    [{ sessionDurationSeconds: 2_200_000 }, "sessionDurationMs must be between 1 and 86400000"],
  ];

  it.each(invalid)("rejects %j", async (overrides, issue) => {
    const context = createContext();

    const command = new CreateSession({ ...snapshot, ...overrides }, 100, 7);

    await expect(command.execute(context)).rejects.toThrow(GameCommandInputError);
    await expect(command.execute(context)).rejects.toMatchObject({ issues: [issue] });
    expect(await context.sessionGateway.listSessions()).toEqual([]);
  });
});
