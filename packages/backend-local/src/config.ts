import {
  GameCommandInputError,
  createGameConfig,
  validateGameConfig,
  type GameConfig,
} from "./core.js";

export interface ServerConfig {
  readonly port: number;
  readonly sweepIntervalMs: number;
  readonly game: GameConfig;
}

type Env = Readonly<Record<string, string | undefined>>;

/** Reads the server settings from `env`; unset variables keep their defaults. */
export function loadServerConfig(env: Env = process.env): ServerConfig {
  const issues: string[] = [];

  const readInteger = (name: string): number | undefined => {
    const raw = env[name]?.trim();
    if (raw === undefined || raw === "") return undefined;
    const value = Number(raw);
    if (!Number.isInteger(value) || value < 0) {
      issues.push(`${name} must be a non-negative integer, got "${raw}"`);
      return undefined;
    }
    return value;
  };

  const port = readInteger("PORT") ?? 8787;
  const sweepIntervalMs = readInteger("SWEEP_INTERVAL_MS") ?? 60_000;
  const sessionDurationSeconds = readInteger("SESSION_DURATION_SECONDS");
  const boardSize = readInteger("BOARD_SIZE");
  const minPlayers = readInteger("MIN_PLAYERS");
  const maxPlayers = readInteger("MAX_PLAYERS");
  const maxTurns = readInteger("MAX_TURNS");

  if (port > 65_535) issues.push("PORT must not exceed 65535");
  if (sweepIntervalMs === 0) issues.push("SWEEP_INTERVAL_MS must be greater than 0");

  const game = createGameConfig({
    ...(boardSize !== undefined ? { boardSize } : {}),
    ...(minPlayers !== undefined ? { minPlayers } : {}),
    ...(maxPlayers !== undefined ? { maxPlayers } : {}),
    ...(maxTurns !== undefined ? { maxTurns } : {}),
    ...(sessionDurationSeconds !== undefined
      ? { sessionDurationMs: sessionDurationSeconds * 1000 }
      : {}),
  });
  issues.push(...validateGameConfig(game));

  if (issues.length > 0) {
    throw GameCommandInputError.because(issues, "server configuration");
  }

  return { port, sweepIntervalMs, game };
}
