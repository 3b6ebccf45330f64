import { vi, type Mock } from "vitest";

import type { CommandContext } from "../../src/domain/commands/Command.js";
import type { Board } from "../../src/domain/entities/Board.js";
import { describeClue, type Clue } from "../../src/domain/entities/Clue.js";
import type { GeneratedClue } from "../../src/domain/entities/ClueGenerator.js";
import {
  createGameConfig,
  type GameConfig,
  type GameConfigOverrides,
} from "../../src/domain/GameConfig.js";
import type { LobbyGateway } from "../../src/domain/ports/LobbyGateway.js";
import type { Logger } from "../../src/domain/ports/Logger.js";
import type { MessageBus } from "../../src/domain/ports/MessageBus.js";
import type { Scheduler } from "../../src/domain/ports/Scheduler.js";
import type {
  PlayerState,
  SessionGateway,
  SessionState,
} from "../../src/domain/ports/SessionGateway.js";
import type { PlayerId, SessionPhase } from "../../src/domain/typedefs.js";

// eslint-disable-next-line @typescript-eslint/no-explicit-any
type Fn<T extends (...args: any[]) => unknown> = Mock<T>;

// eslint-disable-next-line @typescript-eslint/no-explicit-any
function createMock<T extends (...args: any[]) => unknown>(): Fn<T> {
  return vi.fn<T>();
}

export interface SessionGatewayMock extends SessionGateway {
  readonly loadSession: Fn<SessionGateway["loadSession"]>;
  readonly saveSession: Fn<SessionGateway["saveSession"]>;
  readonly createSession: Fn<SessionGateway["createSession"]>;
  readonly deleteSession: Fn<SessionGateway["deleteSession"]>;
  readonly listSessions: Fn<SessionGateway["listSessions"]>;
}

export interface LobbyGatewayMock extends LobbyGateway {
  readonly loadLobby: Fn<LobbyGateway["loadLobby"]>;
  readonly saveLobby: Fn<LobbyGateway["saveLobby"]>;
  readonly createLobby: Fn<LobbyGateway["createLobby"]>;
  readonly deleteLobby: Fn<LobbyGateway["deleteLobby"]>;
  readonly listLobbies: Fn<LobbyGateway["listLobbies"]>;
}

export interface MessageBusMock extends MessageBus {
  readonly publish: Fn<MessageBus["publish"]>;
}

export interface SchedulerMock extends Scheduler {
  readonly scheduleTick: Fn<Scheduler["scheduleTick"]>;
}

export function createSessionGatewayMock(): SessionGatewayMock {
  return {
    loadSession: createMock<SessionGateway["loadSession"]>(),
    saveSession: createMock<SessionGateway["saveSession"]>(),
    createSession: createMock<SessionGateway["createSession"]>(),
    deleteSession: createMock<SessionGateway["deleteSession"]>(),
    listSessions: createMock<SessionGateway["listSessions"]>(),
  };
}

export function createLobbyGatewayMock(): LobbyGatewayMock {
  return {
    loadLobby: createMock<LobbyGateway["loadLobby"]>(),
    saveLobby: createMock<LobbyGateway["saveLobby"]>(),
    createLobby: createMock<LobbyGateway["createLobby"]>(),
    deleteLobby: createMock<LobbyGateway["deleteLobby"]>(),
    listLobbies: createMock<LobbyGateway["listLobbies"]>(),
  };
}

export function createMessageBusMock(): MessageBusMock {
  return {
    publish: createMock<MessageBus["publish"]>(),
  };
}

export function createSchedulerMock(): SchedulerMock {
  return {
    scheduleTick: createMock<Scheduler["scheduleTick"]>(),
  };
}

export function createLoggerMock(): Logger {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  } satisfies Logger;
}

export interface CommandContextOverrides {
  readonly sessionGateway?: SessionGatewayMock;
  readonly lobbyGateway?: LobbyGatewayMock;
  readonly scheduler?: SchedulerMock;
  readonly config?: GameConfig;
  readonly logger?: CommandContext["logger"];
}

export interface CommandContextMock extends CommandContext {
  readonly sessionGateway: SessionGatewayMock;
  readonly lobbyGateway: LobbyGatewayMock;
  readonly scheduler: SchedulerMock;
  readonly config: GameConfig;
}

export function createCommandContext(
  overrides: CommandContextOverrides = {},
): CommandContextMock {
  const config = overrides.config ?? createGameConfig();

  const context = {
    sessionGateway: overrides.sessionGateway ?? createSessionGatewayMock(),
    lobbyGateway: overrides.lobbyGateway ?? createLobbyGatewayMock(),
    scheduler: overrides.scheduler ?? createSchedulerMock(),
    config,
    ...(overrides.logger !== undefined ? { logger: overrides.logger } : {}),
  } satisfies CommandContextMock;

  return context;
}

export function cloneState<T>(value: T): T {
  return structuredClone(value);
}

/**
 * ```
 *        col 0       col 1
 * row 0  circle 1    square 2
 * row 1  star 2      heart 1
 * ```
 */
export const FIXTURE_BOARD: Board = {
  size: 2,
  cells: [
    [
      { shape: "circle", number: 1 },
      { shape: "square", number: 2 },
    ],
    [
      { shape: "star", number: 2 },
      { shape: "heart", number: 1 },
    ],
  ],
};

const FIXTURE_CLUES: readonly Clue[] = [
  { kind: "explicit", position: { row: 0, col: 0 }, attribute: "shape", value: "circle" },
  { kind: "general", scope: "row", index: 1, attribute: "number", value: 2, count: 1 },
  {
    kind: "conditional",
    condition: { position: { row: 0, col: 1 }, attribute: "shape", value: "square" },
    consequence: { position: { row: 1, col: 1 }, attribute: "shape", value: "heart" },
  },
  { kind: "general", scope: "column", index: 0, attribute: "shape", value: "heart", count: 0 },
];

export function fixtureClues(): GeneratedClue[] {
  return FIXTURE_CLUES.map((clue, index) => ({
    id: `clue-${index + 1}`,
    clue,
    text: describeClue(clue),
    determines: [],
    surplus: false,
  }));
}

export function createPlayer(id: PlayerId, overrides: Partial<PlayerState> = {}): PlayerState {
  return {
    id,
    name: id,
    connected: true,
    score: 0,
    correctGuesses: 0,
    incorrectGuesses: 0,
    turnsTaken: 0,
    heldClues: [],
    ...overrides,
  };
}

export interface SessionFixtureOptions {
  readonly players?: readonly (PlayerId | PlayerState)[];
  readonly phase?: SessionPhase;
  readonly config?: GameConfigOverrides;
  readonly currentTurnIndex?: number;
}

/**
 * A session on {@link FIXTURE_BOARD}. In the `playing` phase the four clues
 * are dealt round-robin unless the roster already holds some.
 */
export function createSessionState({
  players = ["alice", "bob"],
  phase = "waiting",
  config = {},
  currentTurnIndex = 0,
}: SessionFixtureOptions = {}): SessionState {
  const roster = players.map((player) =>
    typeof player === "string"
      ? createPlayer(player)
      : { ...player, heldClues: [...player.heldClues] },
  );
  const clues = fixtureClues();

  if (phase === "playing" && roster.every((player) => player.heldClues.length === 0)) {
    clues.forEach((clue, index) => {
      roster[index % roster.length]?.heldClues.push(clue.id);
    });
  }

  const [host] = roster;
  return {
    id: "session-1",
    host: host?.id ?? "nobody",
    config: createGameConfig({ boardSize: 2, maxTurns: 0, ...config }),
    seed: 1,
    board: FIXTURE_BOARD,
    clues,
    phase,
    players: roster,
    currentTurnIndex,
    turnCount: 0,
    solvedCells: {},
    createdAt: 0,
    ...(phase === "playing" ? { startedAt: 0, endsAt: 900_000 } : {}),
    ...(phase === "finished"
      ? { startedAt: 0, finishedAt: 1_000, finishReason: "terminated" as const }
      : {}),
  };
}
