import { shareClue } from "../entities/SessionRules.js";
import { buildSnapshot, type SessionSnapshot } from "../entities/SessionSnapshot.js";
import type { ClueId, PlayerId, SessionId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext, type CommandOutcome } from "./Command.js";
import { sessionUpdates } from "./SessionEvents.js";
import { assertIdentifiers } from "./validation.js";

/** Copies one of the sender's clues to another player; the sender keeps it. */
export class ShareClue extends Command<SessionSnapshot> {
  readonly type = "ShareClue" as const;

  constructor(
    public readonly sessionId: SessionId,
    public readonly fromPlayerId: PlayerId,
    public readonly toPlayerId: PlayerId,
    public readonly clueId: ClueId,
    public readonly at: TimePoint,
  ) {
    super();
    assertIdentifiers({ sessionId, fromPlayerId, toPlayerId, clueId });
  }

  get lockKey(): string {
    return `session:${this.sessionId}`;
  }

  async execute({
    sessionGateway,
    logger,
  }: CommandContext): Promise<CommandOutcome<SessionSnapshot>> {
    const state = await sessionGateway.loadSession(this.sessionId);

    shareClue(state, this.fromPlayerId, this.toPlayerId, this.clueId);
    await sessionGateway.saveSession(state);

    logger?.info("Clue shared", {
      type: this.type,
      sessionId: state.id,
      from: this.fromPlayerId,
      to: this.toPlayerId,
      clueId: this.clueId,
      at: this.at,
    });

    return {
      reply: buildSnapshot(state, this.fromPlayerId, this.at),
      events: sessionUpdates(state, this.at, [
        {
          type: "ClueShared",
          sessionId: state.id,
          from: this.fromPlayerId,
          to: this.toPlayerId,
          clueId: this.clueId,
          at: this.at,
        },
      ]),
    };
  }
}
