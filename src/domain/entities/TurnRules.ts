import type { PlayerState, SessionState } from "../ports/SessionGateway.js";
import type { FinishReason, PlayerId, TimePoint } from "../typedefs.js";

export function findPlayer(state: SessionState, playerId: PlayerId): PlayerState | undefined {
  return state.players.find((player) => player.id === playerId);
}

export function connectedCount(state: SessionState): number {
  return state.players.filter((player) => player.connected).length;
}

export function currentPlayer(state: SessionState): PlayerState | undefined {
  if (state.phase !== "playing") return undefined;
  return state.players[state.currentTurnIndex];
}

/**
 * Hands the turn to the first connected player after roster index `from`,
 * wrapping around. Leaves the pointer alone when nobody is connected.
 */
export function passTurn(state: SessionState, from = state.currentTurnIndex): void {
  const count = state.players.length;
  for (let step = 1; step <= count; step += 1) {
    const index = (((from + step) % count) + count) % count;
    if (state.players[index].connected) {
      state.currentTurnIndex = index;
      return;
    }
  }
}

/** The current turn is used up, whether by a guess or by a skip. */
export function consumeTurn(state: SessionState): void {
  state.turnCount += 1;
  passTurn(state);
}

export function turnsExhausted(state: SessionState): boolean {
  return state.config.maxTurns > 0 && state.turnCount >= state.config.maxTurns;
}

export function totalCells(state: SessionState): number {
  return state.board.size * state.board.size;
}

export function solvedCellCount(state: SessionState): number {
  return Object.values(state.solvedCells).filter(
    (cell) => cell !== undefined && cell.revealed.shape && cell.revealed.number,
  ).length;
}

export function isBoardSolved(state: SessionState): boolean {
  return solvedCellCount(state) === totalCells(state);
}

/**
 * Highest score wins; ties go to fewer incorrect guesses, then to whoever
 * stopped scoring earliest, then to roster order.
 */
export function computeWinner(players: readonly PlayerState[]): PlayerId | undefined {
  const ranked = players
    .map((player, order) => ({ player, order }))
    .sort(
      (a, b) =>
        b.player.score - a.player.score ||
        a.player.incorrectGuesses - b.player.incorrectGuesses ||
        (a.player.lastScoredTurn ?? Number.MAX_SAFE_INTEGER) -
          (b.player.lastScoredTurn ?? Number.MAX_SAFE_INTEGER) ||
        a.order - b.order,
    );
  return ranked[0]?.player.id;
}

export function finishSession(state: SessionState, reason: FinishReason, at: TimePoint): void {
  state.phase = "finished";
  state.finishReason = reason;
  state.finishedAt = at;
  state.winner = computeWinner(state.players);
}

/** Ends a running session whose turn pool ran dry. Returns whether it did. */
export function finishIfTurnsExhausted(state: SessionState, at: TimePoint): boolean {
  if (state.phase !== "playing" || !turnsExhausted(state)) return false;
  finishSession(state, "turns_exhausted", at);
  return true;
}
