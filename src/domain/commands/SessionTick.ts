import { tickSession, timeRemainingMs } from "../entities/SessionRules.js";
import type { SessionId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext, type CommandOutcome } from "./Command.js";
import { finishEvents, sessionUpdates } from "./SessionEvents.js";

export interface TickReply {
  /** True when this tick expired the session */
  readonly expired: boolean;
  readonly timeRemainingMs: number;
}

export class SessionTick extends Command<TickReply> {
  readonly type = "SessionTick" as const;

  constructor(
    public readonly sessionId: SessionId,
    public readonly at: TimePoint,
  ) {
    super();
  }

  get lockKey(): string {
    return `session:${this.sessionId}`;
  }

  async execute({
    sessionGateway,
    scheduler,
    logger,
  }: CommandContext): Promise<CommandOutcome<TickReply>> {
    const state = await sessionGateway.loadSession(this.sessionId);

    if (!tickSession(state, this.at)) {
      // Timers may fire a little early; the session must not be left without one.
      if (state.phase === "playing" && state.endsAt !== undefined) {
        await scheduler.scheduleTick(state.id, state.endsAt - this.at);
      }
      return {
        reply: { expired: false, timeRemainingMs: timeRemainingMs(state, this.at) },
        events: [],
      };
    }

    await sessionGateway.saveSession(state);

    logger?.info("Session time expired", {
      type: this.type,
      sessionId: state.id,
      winner: state.winner,
      at: this.at,
    });

    return {
      reply: { expired: true, timeRemainingMs: 0 },
      events: sessionUpdates(state, this.at, finishEvents(state, false)),
    };
  }
}
