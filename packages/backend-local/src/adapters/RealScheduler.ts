/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import type { Logger, Scheduler, SessionId, TimePoint } from "../core.js";
import { SessionTick } from "../core.js";

interface RealSchedulerOptions {
  /** Usually `GameManager.execute`, so the tick runs under the session lock */
  readonly dispatch: (command: SessionTick) => Promise<unknown>;
  readonly logger?: Logger;
  readonly now?: () => TimePoint;
}

export class RealScheduler implements Scheduler {
  #timers: Map<SessionId, ReturnType<typeof setTimeout>> = new Map();
  readonly #dispatch: RealSchedulerOptions["dispatch"];
  readonly #logger: Logger | undefined;
  readonly #now: () => TimePoint;

  constructor(options: RealSchedulerOptions) {
    this.#dispatch = options.dispatch;
    this.#logger = options.logger;
    this.#now = options.now ?? Date.now;
  }

  get pendingCount(): number {
    return this.#timers.size;
  }

  async scheduleTick(sessionId: SessionId, delayMs: number): Promise<void> {
    if (delayMs < 0) {
      throw new Error("Tick delay must be non-negative");
    }

    const existing = this.#timers.get(sessionId);
    if (existing) {
      clearTimeout(existing);
      this.#timers.delete(sessionId);
      this.#logger?.warn("Rescheduling session tick", { sessionId, delayMs });
    }

    const timer = setTimeout(async () => {
      this.#timers.delete(sessionId);
      try {
        await this.#dispatch(new SessionTick(sessionId, this.#now()));
      } catch (error) {
        this.#logger?.error("Failed to dispatch scheduled tick", { sessionId, error });
      }
    }, delayMs);

    this.#timers.set(sessionId, timer);
    this.#logger?.info("Session tick scheduled", { sessionId, delayMs });
  }

  /** Drops every pending timer; used on shutdown. */
  cancelAll(): void {
    for (const timer of this.#timers.values()) {
      clearTimeout(timer);
    }
    this.#timers.clear();
  }
}
