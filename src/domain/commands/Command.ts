import type { GameConfig } from "../GameConfig.js";
import type { LobbyGateway } from "../ports/LobbyGateway.js";
import type { Logger } from "../ports/Logger.js";
import type { Scheduler } from "../ports/Scheduler.js";
import type { SessionGateway } from "../ports/SessionGateway.js";
import type { TimePoint } from "../typedefs.js";

export interface CommandContext {
  readonly sessionGateway: SessionGateway;
  readonly lobbyGateway: LobbyGateway;
  readonly scheduler: Scheduler;
  /** Defaults for sessions created from a lobby */
  readonly config: GameConfig;
  readonly logger?: Logger;
}

export interface ChannelEvent {
  readonly channel: string;
  readonly event: object;
}

/**
 * What a command produced: the reply for its caller and the events to fan out.
 * Events are delivered after the aggregate lock is released.
 */
export interface CommandOutcome<TReply> {
  readonly reply: TReply;
  readonly events: readonly ChannelEvent[];
}

export abstract class Command<TReply = unknown> {
  abstract readonly type: string;
  abstract readonly at: TimePoint;
  /** Commands sharing a lock key never run concurrently */
  abstract readonly lockKey: string;
  abstract execute(ctx: CommandContext): Promise<CommandOutcome<TReply>>;
}
