import { buildSnapshot } from "../entities/SessionSnapshot.js";
import type { SessionState } from "../ports/SessionGateway.js";
import type { LobbyId, PlayerId, SessionId, TimePoint } from "../typedefs.js";
import type { ChannelEvent } from "./Command.js";

export function sessionChannel(sessionId: SessionId): string {
  return `session:${sessionId}`;
}

/** Private channel; the only place a player's clues are ever sent. */
export function playerChannel(sessionId: SessionId, playerId: PlayerId): string {
  return `session:${sessionId}:player:${playerId}`;
}

export function lobbyChannel(lobbyId: LobbyId): string {
  return `lobby:${lobbyId}`;
}

/**
 * Public `events` on the session channel, followed by a fresh snapshot for
 * every player on their own channel.
 */
export function sessionUpdates(
  state: SessionState,
  at: TimePoint,
  events: readonly object[] = [],
): ChannelEvent[] {
  return [
    ...events.map((event) => ({ channel: sessionChannel(state.id), event })),
    ...state.players.map((player) => ({
      channel: playerChannel(state.id, player.id),
      event: { type: "SessionUpdated", snapshot: buildSnapshot(state, player.id, at) },
    })),
  ];
}

/** The public `SessionFinished` event, when the session ended during this command. */
export function finishEvents(state: SessionState, wasFinished: boolean): object[] {
  if (wasFinished || state.phase !== "finished") return [];
  return [
    {
      type: "SessionFinished",
      sessionId: state.id,
      reason: state.finishReason,
      winner: state.winner ?? null,
      scores: Object.fromEntries(state.players.map((player) => [player.id, player.score])),
      at: state.finishedAt,
    },
  ];
}
