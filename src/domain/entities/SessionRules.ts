import { GameRuleError } from "../errors/GameRuleError.js";
import { InvalidSessionStateError } from "../errors/InvalidSessionStateError.js";
import type { PlayerState, SessionState } from "../ports/SessionGateway.js";
import type { ClueId, PlayerId, TimePoint } from "../typedefs.js";
import { partitionClues, redistributeOrphans, type ClueHoldings } from "./CluePartition.js";
import {
  connectedCount,
  consumeTurn,
  currentPlayer,
  findPlayer,
  finishIfTurnsExhausted,
  finishSession,
  passTurn,
} from "./TurnRules.js";

export type JoinOutcome = "joined" | "rejoined";

function assertNotFinished(state: SessionState): void {
  if (state.phase === "finished") {
    throw new GameRuleError("StaleSession", "The session has already finished");
  }
}

function requirePlayer(state: SessionState, playerId: PlayerId): PlayerState {
  const player = findPlayer(state, playerId);
  if (!player) {
    throw new GameRuleError("StalePlayer", `Player ${playerId} is not part of this session`);
  }
  return player;
}

function finishIfUnderstaffed(state: SessionState, at: TimePoint): boolean {
  if (state.phase !== "playing" || connectedCount(state) >= state.config.minPlayers) {
    return false;
  }
  finishSession(state, "insufficient_players", at);
  return true;
}

function holdingsOf(players: readonly PlayerState[]): ClueHoldings {
  return Object.fromEntries(players.map((player) => [player.id, [...player.heldClues]]));
}

/** Host-triggered `waiting -> playing`. Deals the clues and hands the first turn out. */
export function startSession(state: SessionState, playerId: PlayerId, at: TimePoint): void {
  assertNotFinished(state);
  if (state.phase === "playing") {
    throw new GameRuleError("GameAlreadyStarted", "The session is already running");
  }

  requirePlayer(state, playerId);
  if (state.host !== playerId) {
    throw new GameRuleError("NotHost", "Only the host can start the session");
  }

  const connected = connectedCount(state);
  if (connected < state.config.minPlayers) {
    throw new GameRuleError(
      "NotEnoughPlayers",
      `At least ${state.config.minPlayers} connected players are required, found ${connected}`,
    );
  }

  const holdings = partitionClues(
    state.clues,
    state.players.map((player) => player.id),
    state.config.partitionPolicy,
  );
  for (const player of state.players) {
    player.heldClues = holdings[player.id] ?? [];
  }

  state.phase = "playing";
  state.startedAt = at;
  state.endsAt = at + state.config.sessionDurationMs;
  state.turnCount = 0;
  state.currentTurnIndex = state.players.length - 1;
  passTurn(state);
}

/**
 * Adds a player while waiting. A known player coming back, in any phase but
 * `finished`, keeps everything they had.
 */
export function joinSession(
  state: SessionState,
  playerId: PlayerId,
  name: string,
): JoinOutcome {
  assertNotFinished(state);

  const existing = findPlayer(state, playerId);
  if (existing) {
    existing.connected = true;
    delete existing.disconnectedAt;
    return "rejoined";
  }

  if (state.phase !== "waiting") {
    throw new GameRuleError("GameAlreadyStarted", "New players cannot join a running session");
  }
  if (state.players.length >= state.config.maxPlayers) {
    throw new GameRuleError(
      "SessionFull",
      `The session already has ${state.config.maxPlayers} players`,
    );
  }

  state.players.push({
    id: playerId,
    name,
    connected: true,
    score: 0,
    correctGuesses: 0,
    incorrectGuesses: 0,
    turnsTaken: 0,
    heldClues: [],
  });
  return "joined";
}

/**
 * Removes a player for good. Unknown players and finished sessions are left
 * untouched, which makes a repeated leave a no-op. Returns whether anything changed.
 */
export function leaveSession(state: SessionState, playerId: PlayerId, at: TimePoint): boolean {
  const index = state.players.findIndex((player) => player.id === playerId);
  if (index === -1 || state.phase === "finished") return false;

  const heldTurn = state.phase === "playing" && index === state.currentTurnIndex;
  state.players.splice(index, 1);

  if (state.host === playerId && state.players.length > 0) {
    state.host = state.players[0].id;
  }

  if (state.phase !== "playing") return true;

  if (index < state.currentTurnIndex) {
    state.currentTurnIndex -= 1;
  }

  const holdings = holdingsOf(state.players);
  redistributeOrphans(
    state.clues,
    holdings,
    state.players.map((player) => player.id),
  );
  for (const player of state.players) {
    player.heldClues = holdings[player.id] ?? player.heldClues;
  }

  if (finishIfUnderstaffed(state, at)) return true;

  if (heldTurn) {
    state.turnCount += 1;
    passTurn(state, index - 1);
    finishIfTurnsExhausted(state, at);
  }
  return true;
}

/**
 * Marks a transport drop. A player holding the turn loses it; the session ends
 * when too few players remain connected. Returns whether anything changed.
 */
export function disconnectPlayer(
  state: SessionState,
  playerId: PlayerId,
  at: TimePoint,
): boolean {
  const player = findPlayer(state, playerId);
  if (!player || !player.connected) return false;

  const heldTurn = currentPlayer(state)?.id === playerId;
  player.connected = false;
  player.disconnectedAt = at;

  if (finishIfUnderstaffed(state, at)) return true;

  if (heldTurn) {
    consumeTurn(state);
    finishIfTurnsExhausted(state, at);
  }
  return true;
}

/** Skipped turns stay skipped; the player is simply eligible again. */
export function reconnectPlayer(state: SessionState, playerId: PlayerId): boolean {
  const player = requirePlayer(state, playerId);
  if (player.connected) return false;

  player.connected = true;
  delete player.disconnectedAt;

  const holder = currentPlayer(state);
  if (holder && !holder.connected) {
    passTurn(state);
  }
  return true;
}

/** Copies a clue from `fromId`'s hand into `toId`'s. Never consumes a turn. */
export function shareClue(
  state: SessionState,
  fromId: PlayerId,
  toId: PlayerId,
  clueId: ClueId,
): void {
  assertNotFinished(state);
  if (state.phase !== "playing") {
    throw new GameRuleError("GameNotPlaying", "Clues can only be shared during play");
  }

  const from = requirePlayer(state, fromId);
  const to = findPlayer(state, toId);
  if (!to || !to.connected || to.id === from.id) {
    throw new GameRuleError("InvalidShare", "The receiver must be another connected player");
  }
  if (!from.heldClues.includes(clueId)) {
    throw new GameRuleError("InvalidShare", `Clue ${clueId} is not in your hand`);
  }
  if (to.heldClues.includes(clueId)) {
    throw new GameRuleError("InvalidShare", `${to.name} already holds clue ${clueId}`);
  }

  const order = new Map(state.clues.map((clue, index) => [clue.id, index]));
  to.heldClues = [...to.heldClues, clueId].sort(
    (a, b) => (order.get(a) ?? 0) - (order.get(b) ?? 0),
  );
}

/** Returns true when this tick ended the session. */
export function tickSession(state: SessionState, at: TimePoint): boolean {
  if (state.phase !== "playing" || state.endsAt === undefined || at < state.endsAt) {
    return false;
  }
  finishSession(state, "time_expired", at);
  return true;
}

export function endSession(state: SessionState, playerId: PlayerId, at: TimePoint): void {
  assertNotFinished(state);
  requirePlayer(state, playerId);
  if (state.host !== playerId) {
    throw new GameRuleError("NotHost", "Only the host can end the session");
  }
  finishSession(state, "terminated", at);
}

export function timeRemainingMs(state: SessionState, at: TimePoint): number {
  switch (state.phase) {
    case "waiting":
      return state.config.sessionDurationMs;
    case "playing":
      return Math.max(0, (state.endsAt ?? at) - at);
    case "finished":
      return 0;
  }
}

// -----------------------------------------------------------------------------
//  Assertion function: runtime check of stored session invariants
// -----------------------------------------------------------------------------
export function assertValidSessionState(state: SessionState): void {
  const fail = (reason: string): never => {
    throw new InvalidSessionStateError(reason, state);
  };

  const ids = state.players.map((player) => player.id);
  if (new Set(ids).size !== ids.length) fail("duplicate player IDs");
  if (ids.length > 0 && !ids.includes(state.host)) fail("host is not a player");
  if (!Number.isInteger(state.turnCount) || state.turnCount < 0) fail("invalid turn count");

  const clueIds = new Set(state.clues.map((clue) => clue.id));
  for (const player of state.players) {
    for (const clueId of player.heldClues) {
      if (!clueIds.has(clueId)) fail(`player ${player.id} holds unknown clue ${clueId}`);
    }
  }

  switch (state.phase) {
    case "waiting":
      if (state.startedAt !== undefined) fail("waiting session has a start time");
      break;

    case "playing": {
      if (state.startedAt === undefined || state.endsAt === undefined)
        fail("running session without start or end time");
      if (state.currentTurnIndex < 0 || state.currentTurnIndex >= state.players.length)
        fail("turn pointer outside the roster");
      const held = new Set(state.players.flatMap((player) => player.heldClues));
      if (state.players.length > 0 && held.size !== clueIds.size)
        fail("some clues are held by nobody");
      break;
    }

    case "finished":
      if (state.finishReason === undefined || state.finishedAt === undefined)
        fail("finished session without reason or time");
      break;

    default:
      fail(`invalid phase: ${String(state.phase)}`);
  }
}
