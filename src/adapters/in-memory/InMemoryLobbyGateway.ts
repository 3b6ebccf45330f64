/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import { LobbyNotFoundError } from "../../domain/errors/index.js";
import type { LobbyGateway, LobbyState, NewLobby } from "../../domain/ports/LobbyGateway.js";
import type { LobbyId } from "../../domain/typedefs.js";

export class InMemoryLobbyGateway implements LobbyGateway {
  #lobbies = new Map<LobbyId, LobbyState>();
  #nextId = 1;

  async loadLobby(lobbyId: LobbyId): Promise<LobbyState> {
    const state = this.#lobbies.get(lobbyId);
    if (!state) throw new LobbyNotFoundError(lobbyId);
    return this.#clone(state);
  }

  async saveLobby(state: LobbyState): Promise<void> {
    if (!this.#lobbies.has(state.id)) throw new LobbyNotFoundError(state.id);
    this.#lobbies.set(state.id, this.#clone(state));
  }

  async createLobby(lobby: NewLobby): Promise<LobbyState> {
    const state: LobbyState = {
      id: `lobby-${this.#nextId++}`,
      name: lobby.name,
      host: lobby.host.id,
      members: [{ ...lobby.host }],
      settings: { ...lobby.settings },
      createdAt: lobby.createdAt,
      updatedAt: lobby.createdAt,
    };
    this.#lobbies.set(state.id, this.#clone(state));
    return this.#clone(state);
  }

  async deleteLobby(lobbyId: LobbyId): Promise<boolean> {
    return this.#lobbies.delete(lobbyId);
  }

  async listLobbies(): Promise<LobbyState[]> {
    return [...this.#lobbies.values()].map((state) => this.#clone(state));
  }

  #clone(state: LobbyState): LobbyState {
    return structuredClone(state);
  }
}
