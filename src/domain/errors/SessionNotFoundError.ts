import type { SessionId } from "../typedefs.js";

export class SessionNotFoundError extends Error {
  constructor(public readonly sessionId: SessionId) {
    super(`Session not found: ${sessionId}`);
    this.name = "SessionNotFoundError";
  }
}
