import { leaveLobby, lobbyView } from "../entities/LobbyRules.js";
import type { LobbyId, PlayerId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext, type CommandOutcome } from "./Command.js";
import { lobbyChannel } from "./SessionEvents.js";
import { assertIdentifiers } from "./validation.js";

export interface LeaveLobbyReply {
  readonly left: boolean;
  /** True when the last member left and the lobby was removed */
  readonly closed: boolean;
}

export class LeaveLobby extends Command<LeaveLobbyReply> {
  readonly type = "LeaveLobby" as const;

  constructor(
    public readonly lobbyId: LobbyId,
    public readonly playerId: PlayerId,
    public readonly at: TimePoint,
  ) {
    super();
    assertIdentifiers({ lobbyId, playerId });
  }

  get lockKey(): string {
    return `lobby:${this.lobbyId}`;
  }

  async execute({
    lobbyGateway,
    logger,
  }: CommandContext): Promise<CommandOutcome<LeaveLobbyReply>> {
    const lobby = await lobbyGateway.loadLobby(this.lobbyId);

    if (!leaveLobby(lobby, this.playerId, this.at)) {
      return { reply: { left: false, closed: false }, events: [] };
    }

    const channel = lobbyChannel(lobby.id);
    if (lobby.members.length === 0) {
      await lobbyGateway.deleteLobby(lobby.id);
      logger?.info("Lobby closed", { type: this.type, lobbyId: lobby.id, at: this.at });
      return {
        reply: { left: true, closed: true },
        events: [{ channel, event: { type: "LobbyClosed", lobbyId: lobby.id, at: this.at } }],
      };
    }

    await lobbyGateway.saveLobby(lobby);
    logger?.info("Player left lobby", {
      type: this.type,
      lobbyId: lobby.id,
      playerId: this.playerId,
      at: this.at,
    });

    return {
      reply: { left: true, closed: false },
      events: [{ channel, event: { type: "LobbyUpdated", lobby: lobbyView(lobby) } }],
    };
  }
}
