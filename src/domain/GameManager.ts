import type { Command, CommandContext, CommandOutcome } from "./commands/Command.js";
import { CreateSession, type LobbySnapshot } from "./commands/CreateSession.js";
import { dispatchCommand } from "./commands/dispatchCommand.js";
import { GetSessionState } from "./commands/GetSessionState.js";
import { LeaveLobby } from "./commands/LeaveLobby.js";
import { LeaveSession } from "./commands/LeaveSession.js";
import { SessionTick } from "./commands/SessionTick.js";
import type { SessionSnapshot } from "./entities/SessionSnapshot.js";
import { SessionNotFoundError, toGameError, type GameError } from "./errors/index.js";
import type { GameConfig } from "./GameConfig.js";
import { KeyedMutex } from "./KeyedMutex.js";
import type { LobbyGateway } from "./ports/LobbyGateway.js";
import type { Logger } from "./ports/Logger.js";
import type { MessageBus } from "./ports/MessageBus.js";
import type { Scheduler } from "./ports/Scheduler.js";
import type { SessionGateway, SessionState } from "./ports/SessionGateway.js";
import type { PlayerId, SessionId, SessionPhase, TimePoint } from "./typedefs.js";

export type CommandResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: GameError };

export interface SweepPolicy {
  /** How long a finished session stays queryable */
  readonly finishedSessionGraceMs: number;
  /** How long a disconnected player keeps a seat in a waiting session or lobby */
  readonly disconnectedPlayerGraceMs: number;
  /** Lobbies untouched for this long are closed */
  readonly idleLobbyMs: number;
}

export function createSweepPolicy(overrides: Partial<SweepPolicy> = {}): SweepPolicy {
  return {
    finishedSessionGraceMs: overrides.finishedSessionGraceMs ?? 30 * 60_000,
    disconnectedPlayerGraceMs: overrides.disconnectedPlayerGraceMs ?? 2 * 60_000,
    idleLobbyMs: overrides.idleLobbyMs ?? 60 * 60_000,
  };
}

export interface SweepReport {
  readonly sessionsRemoved: number;
  readonly sessionsExpired: number;
  readonly playersRemoved: number;
  readonly lobbiesRemoved: number;
}

export interface GameStats {
  readonly lobbies: number;
  readonly sessions: Readonly<Record<SessionPhase, number>> & { readonly total: number };
  readonly players: { readonly total: number; readonly connected: number };
}

export interface GameManagerOptions {
  readonly sessionGateway: SessionGateway;
  readonly lobbyGateway: LobbyGateway;
  readonly scheduler: Scheduler;
  readonly bus: MessageBus;
  readonly config: GameConfig;
  readonly logger?: Logger;
  readonly sweepPolicy?: SweepPolicy;
  readonly dispatch?: typeof dispatchCommand;
  readonly now?: () => TimePoint;
}

/**
 * Process-wide registry of sessions and lobbies, and the single entry point
 * for commands. Each command runs under its aggregate's lock; events are
 * published only after the lock is released, and every failure comes back
 * as a typed result instead of an exception.
 */
export class GameManager {
  readonly #sessionGateway: SessionGateway;
  readonly #lobbyGateway: LobbyGateway;
  readonly #bus: MessageBus;
  readonly #context: CommandContext;
  readonly #logger: Logger | undefined;
  readonly #sweepPolicy: SweepPolicy;
  readonly #dispatch: typeof dispatchCommand;
  readonly #now: () => TimePoint;
  readonly #locks = new KeyedMutex();

  constructor(options: GameManagerOptions) {
    this.#sessionGateway = options.sessionGateway;
    this.#lobbyGateway = options.lobbyGateway;
    this.#bus = options.bus;
    this.#logger = options.logger;
    this.#sweepPolicy = options.sweepPolicy ?? createSweepPolicy();
    this.#dispatch = options.dispatch ?? dispatchCommand;
    this.#now = options.now ?? Date.now;
    this.#context = {
      sessionGateway: options.sessionGateway,
      lobbyGateway: options.lobbyGateway,
      scheduler: options.scheduler,
      config: options.config,
      ...(options.logger !== undefined ? { logger: options.logger } : {}),
    };
  }

  async execute<T>(command: Command<T>): Promise<CommandResult<T>> {
    let outcome: CommandOutcome<T>;
    try {
      outcome = await this.#locks.run(command.lockKey, () =>
        this.#dispatch(command, this.#context),
      );
    } catch (error) {
      return { ok: false, error: toGameError(error) };
    }

    for (const { channel, event } of outcome.events) {
      try {
        await this.#bus.publish(channel, event);
      } catch (error) {
        this.#logger?.error("Failed to publish event", { type: command.type, channel, error });
      }
    }

    return { ok: true, value: outcome.reply };
  }

  createSession(
    snapshot: LobbySnapshot,
    seed?: number,
  ): Promise<CommandResult<SessionId>> {
    return this.execute(new CreateSession(snapshot, this.#now(), seed));
  }

  /** Stored state of a session, or undefined once it is gone. */
  async getSession(sessionId: SessionId): Promise<SessionState | undefined> {
    try {
      return await this.#sessionGateway.loadSession(sessionId);
    } catch (error) {
      if (error instanceof SessionNotFoundError) return undefined;
      throw error;
    }
  }

  removeSession(sessionId: SessionId): Promise<boolean> {
    return this.#locks.run(`session:${sessionId}`, async () => {
      const removed = await this.#sessionGateway.deleteSession(sessionId);
      if (removed) {
        this.#logger?.info("Session removed", { sessionId });
      }
      return removed;
    });
  }

  /** The authoritative recipient-relative view; malformed ids come back as a failed result. */
  async getState(
    sessionId: SessionId,
    playerId: PlayerId,
  ): Promise<CommandResult<SessionSnapshot>> {
    let command: GetSessionState;
    try {
      command = new GetSessionState(sessionId, playerId, this.#now());
    } catch (error) {
      return { ok: false, error: toGameError(error) };
    }
    return this.execute(command);
  }

  /**
   * Reclaims what is no longer needed: finished sessions past their grace
   * period, players disconnected too long from waiting sessions and lobbies,
   * and idle lobbies. Running sessions whose clock already ran out are
   * expired here too, in case their scheduled tick was lost.
   */
  async sweep(at: TimePoint = this.#now()): Promise<SweepReport> {
    const policy = this.#sweepPolicy;
    let sessionsRemoved = 0;
    let sessionsExpired = 0;
    let playersRemoved = 0;
    let lobbiesRemoved = 0;

    for (const session of await this.#sessionGateway.listSessions()) {
      if (
        session.phase === "finished" &&
        (session.finishedAt ?? session.createdAt) + policy.finishedSessionGraceMs <= at
      ) {
        if (await this.removeSession(session.id)) sessionsRemoved += 1;
        continue;
      }

      if (session.phase === "waiting" && session.players.length === 0) {
        if (await this.removeSession(session.id)) sessionsRemoved += 1;
        continue;
      }

      if (session.phase === "playing" && session.endsAt !== undefined && session.endsAt <= at) {
        const result = await this.execute(new SessionTick(session.id, at));
        if (result.ok && result.value.expired) sessionsExpired += 1;
        continue;
      }

      if (session.phase === "waiting") {
        for (const player of session.players) {
          if (!isPastGrace(player, policy.disconnectedPlayerGraceMs, at)) continue;
          const result = await this.execute(new LeaveSession(session.id, player.id, at));
          if (result.ok && result.value.left) playersRemoved += 1;
        }
      }
    }

    for (const lobby of await this.#lobbyGateway.listLobbies()) {
      if (lobby.updatedAt + policy.idleLobbyMs <= at) {
        const removed = await this.#locks.run(`lobby:${lobby.id}`, () =>
          this.#lobbyGateway.deleteLobby(lobby.id),
        );
        if (removed) lobbiesRemoved += 1;
        continue;
      }

      for (const member of lobby.members) {
        if (!isPastGrace(member, policy.disconnectedPlayerGraceMs, at)) continue;
        const result = await this.execute(new LeaveLobby(lobby.id, member.id, at));
        if (result.ok && result.value.left) playersRemoved += 1;
        if (result.ok && result.value.closed) lobbiesRemoved += 1;
      }
    }

    const report: SweepReport = { sessionsRemoved, sessionsExpired, playersRemoved, lobbiesRemoved };
    this.#logger?.debug("Sweep finished", { ...report, at });
    return report;
  }

  /** Read-only counts; takes no locks. */
  async getStats(): Promise<GameStats> {
    const sessions = await this.#sessionGateway.listSessions();
    const lobbies = await this.#lobbyGateway.listLobbies();

    const byPhase: Record<SessionPhase, number> = { waiting: 0, playing: 0, finished: 0 };
    for (const session of sessions) {
      byPhase[session.phase] += 1;
    }

    const everyone = [
      ...sessions.flatMap((session) => session.players),
      ...lobbies.flatMap((lobby) => lobby.members),
    ];

    return {
      lobbies: lobbies.length,
      sessions: { ...byPhase, total: sessions.length },
      players: {
        total: everyone.length,
        connected: everyone.filter((player) => player.connected).length,
      },
    };
  }
}

function isPastGrace(
  player: { readonly connected: boolean; readonly disconnectedAt?: TimePoint },
  graceMs: number,
  at: TimePoint,
): boolean {
  return (
    !player.connected &&
    player.disconnectedAt !== undefined &&
    player.disconnectedAt + graceMs <= at
  );
}
