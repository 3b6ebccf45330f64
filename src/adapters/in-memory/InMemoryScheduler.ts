/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import { SessionTick } from "../../domain/commands/SessionTick.js";
import type { Scheduler } from "../../domain/ports/Scheduler.js";
import type { SessionId, TimePoint } from "../../domain/typedefs.js";

interface SchedulerState {
  readonly now: TimePoint;
  readonly queue: readonly SessionTick[];
}

/**
 * Virtual-clock scheduler for tests. Keeps at most one pending tick per
 * session and fires them in time order as {@link InMemoryScheduler.runFor}
 * advances the clock.
 */
export class InMemoryScheduler implements Scheduler {
  readonly #dispatch: (command: SessionTick) => Promise<unknown> | void;
  #state: SchedulerState;

  constructor(dispatch: (command: SessionTick) => Promise<unknown> | void, startAt: TimePoint = 0) {
    this.#dispatch = dispatch;
    this.#state = { now: startAt, queue: [] };
  }

  get now(): TimePoint {
    return this.#state.now;
  }

  get pending(): readonly SessionTick[] {
    return this.#state.queue;
  }

  async scheduleTick(sessionId: SessionId, delayMs: number): Promise<void> {
    if (delayMs < 0) {
      throw new Error("Tick delay must be non-negative");
    }

    const command = new SessionTick(sessionId, this.#state.now + delayMs);
    const others = this.#state.queue.filter((existing) => existing.sessionId !== sessionId);
    const insertAt = others.findIndex((existing) => existing.at > command.at);
    const queue =
      insertAt === -1
        ? [...others, command]
        : [...others.slice(0, insertAt), command, ...others.slice(insertAt)];

    this.#state = { ...this.#state, queue };
  }

  async runFor(milliseconds: number): Promise<void> {
    if (milliseconds < 0) {
      throw new Error("Cannot run scheduler backwards in time");
    }

    const targetTime = this.#state.now + milliseconds;
    let state = this.#state;

    while (state.queue.length > 0) {
      const [next, ...remaining] = state.queue;
      if (!next) {
        break;
      }
      if (next.at > targetTime) {
        break;
      }

      state = { now: next.at, queue: remaining };
      this.#state = state;
      await this.#dispatch(next);
      state = this.#state;
    }

    this.#state = { now: targetTime, queue: state.queue };
  }
}
