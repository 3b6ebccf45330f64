/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import { assertValidSessionState } from "../../domain/entities/SessionRules.js";
import { SessionNotFoundError } from "../../domain/errors/index.js";
import type {
  NewSession,
  SessionGateway,
  SessionState,
} from "../../domain/ports/SessionGateway.js";
import type { SessionId } from "../../domain/typedefs.js";

export class InMemorySessionGateway implements SessionGateway {
  #sessions = new Map<SessionId, SessionState>();
  #nextId = 1;

  async loadSession(sessionId: SessionId): Promise<SessionState> {
    const state = this.#sessions.get(sessionId);
    if (!state) throw new SessionNotFoundError(sessionId);
    return this.#clone(state);
  }

  async saveSession(state: SessionState): Promise<void> {
    if (!this.#sessions.has(state.id)) throw new SessionNotFoundError(state.id);
    assertValidSessionState(state);
    this.#sessions.set(state.id, this.#clone(state));
  }

  async createSession(session: NewSession): Promise<SessionState> {
    const state: SessionState = {
      id: `session-${this.#nextId++}`,
      ...(session.lobbyId !== undefined ? { lobbyId: session.lobbyId } : {}),
      host: session.host,
      config: session.config,
      seed: session.seed,
      board: session.board,
      clues: session.clues,
      phase: "waiting",
      players: session.players.map((player) => ({
        id: player.id,
        name: player.name,
        connected: true,
        score: 0,
        correctGuesses: 0,
        incorrectGuesses: 0,
        turnsTaken: 0,
        heldClues: [],
      })),
      currentTurnIndex: 0,
      turnCount: 0,
      solvedCells: {},
      createdAt: session.createdAt,
    };

    assertValidSessionState(state);
    this.#sessions.set(state.id, this.#clone(state));
    return this.#clone(state);
  }

  async deleteSession(sessionId: SessionId): Promise<boolean> {
    return this.#sessions.delete(sessionId);
  }

  async listSessions(): Promise<SessionState[]> {
    return [...this.#sessions.values()].map((state) => this.#clone(state));
  }

  #clone(state: SessionState): SessionState {
    return structuredClone(state);
  }
}
