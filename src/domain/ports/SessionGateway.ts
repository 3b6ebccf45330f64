import type { Board } from "../entities/Board.js";
import type { GeneratedClue } from "../entities/ClueGenerator.js";
import type { GameConfig } from "../GameConfig.js";
import type {
  CellKey,
  ClueId,
  FinishReason,
  LobbyId,
  PlayerId,
  SessionId,
  SessionPhase,
  Shape,
  TimePoint,
} from "../typedefs.js";

export interface PlayerState {
  readonly id: PlayerId;
  name: string;
  connected: boolean;
  /** Set while `connected` is false */
  disconnectedAt?: TimePoint;
  score: number;
  /** Attributes guessed right */
  correctGuesses: number;
  /** Attributes guessed wrong */
  incorrectGuesses: number;
  /** Submissions made, right or wrong */
  turnsTaken: number;
  /** Turn number of the player's latest scoring guess, used to break score ties */
  lastScoredTurn?: number;
  /** Clues the player may read, in generation order */
  heldClues: ClueId[];
}

/** What all players know about one cell. Never un-set once revealed. */
export interface SolvedCellState {
  revealed: { shape: boolean; number: boolean };
  solution: { shape?: Shape; number?: number };
  /** Player whose guess revealed the latest attribute */
  solvedBy: PlayerId;
}

/**
 * The authoritative snapshot of one puzzle instance. Board and clues are fixed
 * at creation; everything else changes only through session commands.
 */
export interface SessionState {
  readonly id: SessionId;
  readonly lobbyId?: LobbyId;
  host: PlayerId;
  readonly config: GameConfig;
  /** Seed the board was generated from */
  readonly seed: number;
  readonly board: Board;
  readonly clues: readonly GeneratedClue[];
  phase: SessionPhase;
  /** Turn rotation order */
  players: PlayerState[];
  currentTurnIndex: number;
  turnCount: number;
  solvedCells: Partial<Record<CellKey, SolvedCellState>>;
  readonly createdAt: TimePoint;
  startedAt?: TimePoint;
  endsAt?: TimePoint;
  finishedAt?: TimePoint;
  finishReason?: FinishReason;
  winner?: PlayerId;
}

export interface NewSessionPlayer {
  readonly id: PlayerId;
  readonly name: string;
}

export interface NewSession {
  readonly lobbyId?: LobbyId;
  readonly host: PlayerId;
  readonly config: GameConfig;
  readonly seed: number;
  readonly board: Board;
  readonly clues: readonly GeneratedClue[];
  readonly players: readonly NewSessionPlayer[];
  readonly createdAt: TimePoint;
}

/**
 * Storage for session aggregates. Callers hold the session lock around every
 * load/save pair; implementations only need to keep individual calls atomic.
 */
export interface SessionGateway {
  loadSession(sessionId: SessionId): Promise<SessionState>;
  saveSession(state: SessionState): Promise<void>;
  /** Stores a new `waiting` session under a fresh id. */
  createSession(session: NewSession): Promise<SessionState>;
  /** Returns false when no such session existed. */
  deleteSession(sessionId: SessionId): Promise<boolean>;
  listSessions(): Promise<SessionState[]>;
}
