import { startSession } from "../entities/SessionRules.js";
import { buildSnapshot, type SessionSnapshot } from "../entities/SessionSnapshot.js";
import type { PlayerId, SessionId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext, type CommandOutcome } from "./Command.js";
import { sessionUpdates } from "./SessionEvents.js";
import { assertIdentifiers } from "./validation.js";

export class StartSession extends Command<SessionSnapshot> {
  readonly type = "StartSession" as const;

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
    scheduler,
    logger,
  }: CommandContext): Promise<CommandOutcome<SessionSnapshot>> {
    const state = await sessionGateway.loadSession(this.sessionId);

    startSession(state, this.playerId, this.at);
    await sessionGateway.saveSession(state);
    await scheduler.scheduleTick(state.id, state.config.sessionDurationMs);

    logger?.info("Session started", {
      type: this.type,
      sessionId: state.id,
      players: state.players.length,
      firstTurn: state.players[state.currentTurnIndex]?.id,
      at: this.at,
    });

    return {
      reply: buildSnapshot(state, this.playerId, this.at),
      events: sessionUpdates(state, this.at, [
        {
          type: "SessionStarted",
          sessionId: state.id,
          startedAt: state.startedAt,
          endsAt: state.endsAt,
          currentTurn: state.players[state.currentTurnIndex]?.id ?? null,
        },
      ]),
    };
  }
}
