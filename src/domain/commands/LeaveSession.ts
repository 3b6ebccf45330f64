import { leaveSession } from "../entities/SessionRules.js";
import type { PlayerId, SessionId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext, type CommandOutcome } from "./Command.js";
import { finishEvents, sessionUpdates } from "./SessionEvents.js";
import { assertIdentifiers } from "./validation.js";

export interface LeaveReply {
  /** False when the player had already left */
  readonly left: boolean;
}

export class LeaveSession extends Command<LeaveReply> {
  readonly type = "LeaveSession" as const;

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
  }: CommandContext): Promise<CommandOutcome<LeaveReply>> {
    const state = await sessionGateway.loadSession(this.sessionId);
    const wasFinished = state.phase === "finished";

    if (!leaveSession(state, this.playerId, this.at)) {
      logger?.debug("Leave ignored; player not in session", {
        type: this.type,
        sessionId: state.id,
        playerId: this.playerId,
      });
      return { reply: { left: false }, events: [] };
    }

    await sessionGateway.saveSession(state);

    logger?.info("Player left session", {
      type: this.type,
      sessionId: state.id,
      playerId: this.playerId,
      phase: state.phase,
      at: this.at,
    });

    return {
      reply: { left: true },
      events: sessionUpdates(state, this.at, [
        { type: "PlayerLeft", sessionId: state.id, playerId: this.playerId, at: this.at },
        ...finishEvents(state, wasFinished),
      ]),
    };
  }
}
