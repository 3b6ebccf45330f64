import type { SessionId } from "../typedefs.js";

/**
 * Infrastructure abstraction responsible for delivering time-based commands to the domain.
 *
 * Implementations may rely on in-memory timers, job queues, or external schedulers. A tick
 * for a session that already finished is harmless, so delivering one late or twice is fine;
 * scheduling a new tick for a session replaces the pending one.
 */
export interface Scheduler {
  scheduleTick(sessionId: SessionId, delayMs: number): Promise<void>;
}
