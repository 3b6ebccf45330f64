import { endSession } from "../entities/SessionRules.js";
import { buildSnapshot, type SessionSnapshot } from "../entities/SessionSnapshot.js";
import type { PlayerId, SessionId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext, type CommandOutcome } from "./Command.js";
import { finishEvents, sessionUpdates } from "./SessionEvents.js";
import { assertIdentifiers } from "./validation.js";

/** Host-initiated termination. */
export class EndSession extends Command<SessionSnapshot> {
  readonly type = "EndSession" as const;

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

    endSession(state, this.playerId, this.at);
    await sessionGateway.saveSession(state);

    logger?.info("Session terminated by host", {
      type: this.type,
      sessionId: state.id,
      playerId: this.playerId,
      at: this.at,
    });

    return {
      reply: buildSnapshot(state, this.playerId, this.at),
      events: sessionUpdates(state, this.at, finishEvents(state, false)),
    };
  }
}
