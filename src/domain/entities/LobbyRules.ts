import { GameRuleError } from "../errors/GameRuleError.js";
import { createGameConfig, validateGameConfig, type GameConfig } from "../GameConfig.js";
import type { LobbyMember, LobbySettings, LobbyState } from "../ports/LobbyGateway.js";
import type { LobbyId, PlayerId, TimePoint } from "../typedefs.js";

export interface LobbyView {
  readonly lobbyId: LobbyId;
  readonly name: string;
  readonly host: PlayerId;
  readonly members: readonly {
    readonly id: PlayerId;
    readonly name: string;
    readonly connected: boolean;
    readonly isHost: boolean;
  }[];
  readonly settings: LobbySettings;
}

export function lobbySettingsFrom(
  defaults: GameConfig,
  overrides: Partial<LobbySettings> = {},
): LobbySettings {
  return {
    boardSize: overrides.boardSize ?? defaults.boardSize,
    sessionDurationSeconds:
      overrides.sessionDurationSeconds ?? Math.round(defaults.sessionDurationMs / 1000),
    minPlayers: overrides.minPlayers ?? defaults.minPlayers,
    maxPlayers: overrides.maxPlayers ?? defaults.maxPlayers,
  };
}

/** Lobby settings are checked by the same bounds as the session they will become. */
export function validateLobbySettings(
  defaults: GameConfig,
  settings: LobbySettings,
): readonly string[] {
  return validateGameConfig(
    createGameConfig({
      ...defaults,
      boardSize: settings.boardSize,
      sessionDurationMs: settings.sessionDurationSeconds * 1000,
      minPlayers: settings.minPlayers,
      maxPlayers: settings.maxPlayers,
    }),
  );
}

export function findMember(lobby: LobbyState, playerId: PlayerId): LobbyMember | undefined {
  return lobby.members.find((member) => member.id === playerId);
}

export function joinLobby(
  lobby: LobbyState,
  playerId: PlayerId,
  name: string,
  at: TimePoint,
): "joined" | "rejoined" {
  const existing = findMember(lobby, playerId);
  lobby.updatedAt = at;

  if (existing) {
    existing.connected = true;
    existing.name = name;
    delete existing.disconnectedAt;
    return "rejoined";
  }

  if (lobby.members.length >= lobby.settings.maxPlayers) {
    throw new GameRuleError("LobbyFull", `The lobby already has ${lobby.settings.maxPlayers} players`);
  }

  lobby.members.push({ id: playerId, name, connected: true });
  return "joined";
}

/** Idempotent; the host role passes to the longest-standing remaining member. */
export function leaveLobby(lobby: LobbyState, playerId: PlayerId, at: TimePoint): boolean {
  const index = lobby.members.findIndex((member) => member.id === playerId);
  if (index === -1) return false;

  lobby.members.splice(index, 1);
  lobby.updatedAt = at;
  if (lobby.host === playerId && lobby.members.length > 0) {
    lobby.host = lobby.members[0].id;
  }
  return true;
}

export function disconnectFromLobby(
  lobby: LobbyState,
  playerId: PlayerId,
  at: TimePoint,
): boolean {
  const member = findMember(lobby, playerId);
  if (!member || !member.connected) return false;

  member.connected = false;
  member.disconnectedAt = at;
  lobby.updatedAt = at;
  return true;
}

export function lobbyView(lobby: LobbyState): LobbyView {
  return {
    lobbyId: lobby.id,
    name: lobby.name,
    host: lobby.host,
    members: lobby.members.map((member) => ({
      id: member.id,
      name: member.name,
      connected: member.connected,
      isHost: member.id === lobby.host,
    })),
    settings: { ...lobby.settings },
  };
}
