import { reconnectPlayer } from "../entities/SessionRules.js";
import { buildSnapshot, type SessionSnapshot } from "../entities/SessionSnapshot.js";
import type { PlayerId, SessionId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext, type CommandOutcome } from "./Command.js";
import { sessionUpdates } from "./SessionEvents.js";
import { assertIdentifiers } from "./validation.js";

export class ReconnectPlayer extends Command<SessionSnapshot> {
  readonly type = "ReconnectPlayer" as const;

  constructor(
    public readonly sessionId: SessionId,
    public readonly playerId: PlayerId,
    public readonly at: TimePoint,
  ) {
    super();
    assertIdentifiers({ sessionId, playerId });
  }

  get lockKey(): string {
    return `session:${this.sessionId}`;
  }

  async execute({
    sessionGateway,
    logger,
  }: CommandContext): Promise<CommandOutcome<SessionSnapshot>> {
    const state = await sessionGateway.loadSession(this.sessionId);

    const changed = reconnectPlayer(state, this.playerId);
    const reply = buildSnapshot(state, this.playerId, this.at);
    if (!changed) {
      return { reply, events: [] };
    }

    await sessionGateway.saveSession(state);

    logger?.info("Player reconnected", {
      type: this.type,
      sessionId: state.id,
      playerId: this.playerId,
      at: this.at,
    });

    return {
      reply,
      events: sessionUpdates(state, this.at, [
        { type: "PlayerReconnected", sessionId: state.id, playerId: this.playerId, at: this.at },
      ]),
    };
  }
}
