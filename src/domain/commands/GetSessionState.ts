import { GameRuleError } from "../errors/GameRuleError.js";
import { buildSnapshot, type SessionSnapshot } from "../entities/SessionSnapshot.js";
import { findPlayer } from "../entities/TurnRules.js";
import type { PlayerId, SessionId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext, type CommandOutcome } from "./Command.js";
import { assertIdentifiers } from "./validation.js";

/**
 * Authoritative read of a session from one player's point of view. Safe to
 * call at any time; clients use it to resynchronize after missed events.
 */
export class GetSessionState extends Command<SessionSnapshot> {
  readonly type = "GetSessionState" as const;

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

  async execute({ sessionGateway }: CommandContext): Promise<CommandOutcome<SessionSnapshot>> {
    const state = await sessionGateway.loadSession(this.sessionId);

    if (!findPlayer(state, this.playerId)) {
      throw new GameRuleError(
        "StalePlayer",
        `Player ${this.playerId} is not part of this session`,
      );
    }

    return { reply: buildSnapshot(state, this.playerId, this.at), events: [] };
  }
}
