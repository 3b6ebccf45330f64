import { disconnectPlayer } from "../entities/SessionRules.js";
import type { PlayerId, SessionId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext, type CommandOutcome } from "./Command.js";
import { finishEvents, sessionUpdates } from "./SessionEvents.js";
import { assertIdentifiers } from "./validation.js";

export interface DisconnectReply {
  readonly changed: boolean;
}

/** Raised by the transport when a player's socket drops. */
export class DisconnectPlayer extends Command<DisconnectReply> {
  readonly type = "DisconnectPlayer" as const;

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
  }: CommandContext): Promise<CommandOutcome<DisconnectReply>> {
    const state = await sessionGateway.loadSession(this.sessionId);
    const wasFinished = state.phase === "finished";
    const turnBefore = state.turnCount;

    if (!disconnectPlayer(state, this.playerId, this.at)) {
      return { reply: { changed: false }, events: [] };
    }

    await sessionGateway.saveSession(state);

    const skipped = state.turnCount > turnBefore;
    logger?.info(skipped ? "Player disconnected; turn skipped" : "Player disconnected", {
      type: this.type,
      sessionId: state.id,
      playerId: this.playerId,
      at: this.at,
    });

    return {
      reply: { changed: true },
      events: sessionUpdates(state, this.at, [
        {
          type: "PlayerDisconnected",
          sessionId: state.id,
          playerId: this.playerId,
          turnSkipped: skipped,
          at: this.at,
        },
        ...finishEvents(state, wasFinished),
      ]),
    };
  }
}
