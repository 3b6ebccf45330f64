import { GameRuleError } from "../errors/GameRuleError.js";
import type { SessionState, SolvedCellState } from "../ports/SessionGateway.js";
import { cellKey, isShape, type PlayerId, type Position, type Shape, type TimePoint } from "../typedefs.js";
import { cellAt, isInBounds } from "./Board.js";
import {
  consumeTurn,
  currentPlayer,
  finishIfTurnsExhausted,
  finishSession,
  findPlayer,
  isBoardSolved,
} from "./TurnRules.js";

/** A partial or full guess at one cell */
export interface Guess {
  readonly shape?: Shape;
  readonly number?: number;
}

export interface SolutionOutcome {
  /** False when any guessed attribute was wrong */
  readonly accepted: boolean;
  readonly pointsAwarded: number;
  /** Nominal penalty; the score itself never drops below zero unless configured to */
  readonly penaltyApplied: number;
  readonly cellFullySolved: boolean;
  readonly shapeCorrect?: boolean;
  readonly numberCorrect?: boolean;
}

function validateGuess(state: SessionState, guess: Guess): void {
  const { shape, number } = guess;
  if (shape === undefined && number === undefined) {
    throw new GameRuleError("InvalidGuess", "A guess must name a shape, a number, or both");
  }
  if (shape !== undefined && !isShape(shape)) {
    throw new GameRuleError("InvalidGuess", `Unknown shape: ${String(shape)}`);
  }
  if (
    number !== undefined &&
    (!Number.isInteger(number) || number < 1 || number > state.board.size)
  ) {
    throw new GameRuleError(
      "InvalidGuess",
      `Number must be an integer between 1 and ${state.board.size}`,
    );
  }
}

/**
 * Resolves one guess against the board. Every rule is checked before anything
 * changes; past that point the submitter's turn is consumed whatever the outcome.
 */
export function submitSolution(
  state: SessionState,
  playerId: PlayerId,
  position: Position,
  guess: Guess,
  at: TimePoint,
): SolutionOutcome {
  if (state.phase === "finished") {
    throw new GameRuleError("StaleSession", "The session has already finished");
  }
  if (state.phase !== "playing") {
    throw new GameRuleError("GameNotPlaying", "The session has not started yet");
  }

  const player = findPlayer(state, playerId);
  if (!player) {
    throw new GameRuleError("StalePlayer", `Player ${playerId} is not part of this session`);
  }
  if (currentPlayer(state)?.id !== playerId) {
    throw new GameRuleError("NotYourTurn", "It is not your turn");
  }
  if (!isInBounds(state.board, position)) {
    throw new GameRuleError(
      "InvalidPosition",
      `Position (${position.row}, ${position.col}) is outside the ${state.board.size}x${state.board.size} board`,
    );
  }

  validateGuess(state, guess);

  const key = cellKey(position);
  const previous = state.solvedCells[key];
  if (
    (guess.shape !== undefined && previous?.revealed.shape) ||
    (guess.number !== undefined && previous?.revealed.number)
  ) {
    throw new GameRuleError(
      "AttributeAlreadyRevealed",
      `That attribute of cell (${position.row}, ${position.col}) is already revealed`,
    );
  }

  const cell = cellAt(state.board, position);
  const shapeCorrect = guess.shape === undefined ? undefined : guess.shape === cell.shape;
  const numberCorrect = guess.number === undefined ? undefined : guess.number === cell.number;
  const revealedCount = Number(shapeCorrect === true) + Number(numberCorrect === true);
  const wrongCount = Number(shapeCorrect === false) + Number(numberCorrect === false);

  let cellFullySolved = false;
  if (revealedCount > 0) {
    const next: SolvedCellState = {
      revealed: {
        shape: (previous?.revealed.shape ?? false) || shapeCorrect === true,
        number: (previous?.revealed.number ?? false) || numberCorrect === true,
      },
      solution: {
        ...previous?.solution,
        ...(shapeCorrect ? { shape: cell.shape } : {}),
        ...(numberCorrect ? { number: cell.number } : {}),
      },
      solvedBy: playerId,
    };
    state.solvedCells[key] = next;
    cellFullySolved = next.revealed.shape && next.revealed.number;
  }

  const { revealReward, fullCellBonus, incorrectPenalty, allowNegativeScores } =
    state.config.scoring;
  const pointsAwarded =
    revealedCount * revealReward + (cellFullySolved && !previous ? fullCellBonus : 0);
  const penaltyApplied = wrongCount * incorrectPenalty;

  player.score += pointsAwarded - penaltyApplied;
  if (!allowNegativeScores && player.score < 0) {
    player.score = 0;
  }
  player.correctGuesses += revealedCount;
  player.incorrectGuesses += wrongCount;
  player.turnsTaken += 1;
  if (pointsAwarded > 0) {
    player.lastScoredTurn = state.turnCount;
  }

  consumeTurn(state);

  if (isBoardSolved(state)) {
    finishSession(state, "all_solved", at);
  } else {
    finishIfTurnsExhausted(state, at);
  }

  return {
    accepted: wrongCount === 0,
    pointsAwarded,
    penaltyApplied,
    cellFullySolved,
    ...(shapeCorrect === undefined ? {} : { shapeCorrect }),
    ...(numberCorrect === undefined ? {} : { numberCorrect }),
  };
}
