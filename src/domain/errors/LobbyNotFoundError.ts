import type { LobbyId } from "../typedefs.js";

export class LobbyNotFoundError extends Error {
  constructor(public readonly lobbyId: LobbyId) {
    super(`Lobby not found: ${lobbyId}`);
    this.name = "LobbyNotFoundError";
  }
}
