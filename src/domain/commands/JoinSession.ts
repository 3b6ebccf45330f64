import { joinSession } from "../entities/SessionRules.js";
import { buildSnapshot, type SessionSnapshot } from "../entities/SessionSnapshot.js";
import type { PlayerId, SessionId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext, type CommandOutcome } from "./Command.js";
import { sessionUpdates } from "./SessionEvents.js";
import { assertIdentifiers, normalizeName } from "./validation.js";

export class JoinSession extends Command<SessionSnapshot> {
  readonly type = "JoinSession" as const;
  readonly name: string;

  constructor(
    public readonly sessionId: SessionId,
    public readonly playerId: PlayerId,
    name: string | undefined,
    public readonly at: TimePoint,
  ) {
    super();
    assertIdentifiers({ sessionId, playerId });
    this.name = normalizeName(name, playerId);
  }

  get lockKey(): string {
    return `session:${this.sessionId}`;
  }

  async execute({
    sessionGateway,
    logger,
  }: CommandContext): Promise<CommandOutcome<SessionSnapshot>> {
    const state = await sessionGateway.loadSession(this.sessionId);

    const outcome = joinSession(state, this.playerId, this.name);
    await sessionGateway.saveSession(state);

    logger?.info(outcome === "joined" ? "Player joined session" : "Player rejoined session", {
      type: this.type,
      sessionId: state.id,
      playerId: this.playerId,
      at: this.at,
    });

    return {
      reply: buildSnapshot(state, this.playerId, this.at),
      events: sessionUpdates(state, this.at, [
        {
          type: outcome === "joined" ? "PlayerJoined" : "PlayerReconnected",
          sessionId: state.id,
          playerId: this.playerId,
          name: this.name,
          at: this.at,
        },
      ]),
    };
  }
}
