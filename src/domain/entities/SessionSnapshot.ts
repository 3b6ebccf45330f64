import type { SessionState, SolvedCellState } from "../ports/SessionGateway.js";
import type {
  CellKey,
  ClueId,
  FinishReason,
  PlayerId,
  SessionId,
  SessionPhase,
  TimePoint,
} from "../typedefs.js";
import type { Clue } from "./Clue.js";
import { currentPlayer, findPlayer, solvedCellCount, totalCells } from "./TurnRules.js";
import { timeRemainingMs } from "./SessionRules.js";

export interface PlayerView {
  readonly id: PlayerId;
  readonly name: string;
  readonly connected: boolean;
  readonly score: number;
  readonly correctGuesses: number;
  readonly incorrectGuesses: number;
  readonly turnsTaken: number;
  readonly isHost: boolean;
}

export interface ClueView {
  readonly id: ClueId;
  readonly text: string;
  readonly clue: Clue;
}

/** Recipient-relative view of a session; safe to send to `recipient` only. */
export interface SessionSnapshot {
  readonly sessionId: SessionId;
  readonly gameState: SessionPhase;
  readonly boardSize: number;
  readonly solvedCells: Partial<Record<CellKey, SolvedCellState>>;
  readonly players: readonly PlayerView[];
  readonly currentTurn: PlayerId | null;
  readonly isMyTurn: boolean;
  /** Whole seconds, rounded up */
  readonly timeRemaining: number;
  readonly turnCount: number;
  /** Null when the session has no turn limit */
  readonly turnsRemaining: number | null;
  readonly maxTurns: number | null;
  readonly cellsSolved: number;
  readonly totalCells: number;
  readonly clues: readonly ClueView[];
  readonly finishReason: FinishReason | null;
  readonly winner: PlayerId | null;
}

export function buildSnapshot(
  state: SessionState,
  recipient: PlayerId | undefined,
  at: TimePoint,
): SessionSnapshot {
  const turnHolder = currentPlayer(state)?.id ?? null;
  const held = new Set(recipient ? findPlayer(state, recipient)?.heldClues : []);
  const { maxTurns } = state.config;

  return {
    sessionId: state.id,
    gameState: state.phase,
    boardSize: state.board.size,
    solvedCells: structuredClone(state.solvedCells),
    players: state.players.map((player) => ({
      id: player.id,
      name: player.name,
      connected: player.connected,
      score: player.score,
      correctGuesses: player.correctGuesses,
      incorrectGuesses: player.incorrectGuesses,
      turnsTaken: player.turnsTaken,
      isHost: player.id === state.host,
    })),
    currentTurn: turnHolder,
    isMyTurn: recipient !== undefined && turnHolder === recipient,
    timeRemaining: Math.ceil(timeRemainingMs(state, at) / 1000),
    turnCount: state.turnCount,
    turnsRemaining: maxTurns > 0 ? Math.max(0, maxTurns - state.turnCount) : null,
    maxTurns: maxTurns > 0 ? maxTurns : null,
    cellsSolved: solvedCellCount(state),
    totalCells: totalCells(state),
    clues: state.clues
      .filter((clue) => held.has(clue.id))
      .map(({ id, text, clue }) => ({ id, text, clue })),
    finishReason: state.finishReason ?? null,
    winner: state.winner ?? null,
  };
}
