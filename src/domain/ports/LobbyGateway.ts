import type { LobbyId, PlayerId, TimePoint } from "../typedefs.js";

export interface LobbyMember {
  readonly id: PlayerId;
  name: string;
  connected: boolean;
  disconnectedAt?: TimePoint;
}

export interface LobbySettings {
  readonly boardSize: number;
  readonly sessionDurationSeconds: number;
  readonly minPlayers: number;
  readonly maxPlayers: number;
}

export interface LobbyState {
  readonly id: LobbyId;
  readonly name: string;
  host: PlayerId;
  members: LobbyMember[];
  readonly settings: LobbySettings;
  readonly createdAt: TimePoint;
  /** Last join, leave or reconnect */
  updatedAt: TimePoint;
}

export interface NewLobby {
  readonly name: string;
  readonly host: LobbyMember;
  readonly settings: LobbySettings;
  readonly createdAt: TimePoint;
}

export interface LobbyGateway {
  loadLobby(lobbyId: LobbyId): Promise<LobbyState>;
  saveLobby(state: LobbyState): Promise<void>;
  createLobby(lobby: NewLobby): Promise<LobbyState>;
  deleteLobby(lobbyId: LobbyId): Promise<boolean>;
  listLobbies(): Promise<LobbyState[]>;
}
