import { generatePuzzle } from "../entities/ClueGenerator.js";
import { randomSeed } from "../entities/Random.js";
import { GameCommandInputError } from "../errors/GameCommandInputError.js";
import { createGameConfig, validateGameConfig } from "../GameConfig.js";
import type { SessionState } from "../ports/SessionGateway.js";
import type { LobbyId, PlayerId, SessionId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext, type CommandOutcome } from "./Command.js";
import { sessionUpdates } from "./SessionEvents.js";
import { isValidPlayerId, normalizeName } from "./validation.js";

export interface LobbySnapshotPlayer {
  readonly playerId: PlayerId;
  readonly name: string;
}

/** The finalized roster a lobby hands over; the session never writes back to it. */
export interface LobbySnapshot {
  readonly players: readonly LobbySnapshotPlayer[];
  readonly boardSize: number;
  readonly sessionDurationSeconds: number;
  readonly minPlayers: number;
  readonly maxPlayers?: number;
  /** Defaults to the first player */
  readonly hostId?: PlayerId;
  readonly lobbyId?: LobbyId;
}

function validateSnapshot(snapshot: LobbySnapshot): readonly string[] {
  const issues: string[] = [];

  if (!Array.isArray(snapshot.players) || snapshot.players.length === 0) {
    issues.push("players must contain at least one player");
    return issues;
  }

  const ids = snapshot.players.map((player) => player.playerId);
  if (!ids.every(isValidPlayerId)) {
    issues.push("player identifiers must be non-empty strings without whitespace");
  }
  if (new Set(ids).size !== ids.length) {
    issues.push("player identifiers must be unique");
  }
  if (snapshot.hostId !== undefined && !ids.includes(snapshot.hostId)) {
    issues.push("hostId must name one of the players");
  }

  return issues;
}

/**
 * Generates the puzzle and stores a `waiting` session for the snapshot's
 * roster. Generation runs before anything is stored, so an unsolvable
 * configuration fails here with nothing left behind.
 */
export async function createSessionFromSnapshot(
  { sessionGateway, config: defaults, logger }: CommandContext,
  snapshot: LobbySnapshot,
  at: TimePoint,
  seed: number = randomSeed(),
): Promise<SessionState> {
  const snapshotIssues = validateSnapshot(snapshot);
  if (snapshotIssues.length > 0) {
    throw GameCommandInputError.because(snapshotIssues, "lobby snapshot");
  }

  const config = createGameConfig({
    ...defaults,
    boardSize: snapshot.boardSize,
    sessionDurationMs: snapshot.sessionDurationSeconds * 1000,
    minPlayers: snapshot.minPlayers,
    maxPlayers: Math.max(snapshot.maxPlayers ?? defaults.maxPlayers, snapshot.players.length),
  });
  const configIssues = validateGameConfig(config);
  if (configIssues.length > 0) {
    throw GameCommandInputError.because(configIssues, "session settings");
  }

  const puzzle = generatePuzzle({
    size: config.boardSize,
    seed,
    maxClues: config.maxCluesPerCell * config.boardSize * config.boardSize,
    surplusClues: config.surplusClues,
    maxAttempts: config.generationAttempts,
  });

  const [firstPlayer] = snapshot.players;
  const state = await sessionGateway.createSession({
    ...(snapshot.lobbyId !== undefined ? { lobbyId: snapshot.lobbyId } : {}),
    host: snapshot.hostId ?? firstPlayer.playerId,
    config,
    seed: puzzle.seed,
    board: puzzle.board,
    clues: puzzle.clues,
    players: snapshot.players.map((player) => ({
      id: player.playerId,
      name: normalizeName(player.name, player.playerId),
    })),
    createdAt: at,
  });

  logger?.info("Session created", {
    sessionId: state.id,
    lobbyId: snapshot.lobbyId,
    boardSize: config.boardSize,
    clues: puzzle.clues.length,
    attempts: puzzle.attempts,
    at,
  });

  return state;
}

export class CreateSession extends Command<SessionId> {
  readonly type = "CreateSession" as const;
  readonly lockKey = "session:new";

  constructor(
    public readonly snapshot: LobbySnapshot,
    public readonly at: TimePoint,
    public readonly seed?: number,
  ) {
    super();
  }

  async execute(ctx: CommandContext): Promise<CommandOutcome<SessionId>> {
    const state = await createSessionFromSnapshot(ctx, this.snapshot, this.at, this.seed);

    return {
      reply: state.id,
      events: sessionUpdates(state, this.at, [
        {
          type: "SessionCreated",
          sessionId: state.id,
          host: state.host,
          boardSize: state.board.size,
          players: state.players.map((player) => player.id),
          at: this.at,
        },
      ]),
    };
  }
}
