import { disconnectFromLobby, lobbyView } from "../entities/LobbyRules.js";
import type { LobbyId, PlayerId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext, type CommandOutcome } from "./Command.js";
import { lobbyChannel } from "./SessionEvents.js";
import { assertIdentifiers } from "./validation.js";

export class DisconnectFromLobby extends Command<{ readonly changed: boolean }> {
  readonly type = "DisconnectFromLobby" as const;

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
  }: CommandContext): Promise<CommandOutcome<{ readonly changed: boolean }>> {
    const lobby = await lobbyGateway.loadLobby(this.lobbyId);

    if (!disconnectFromLobby(lobby, this.playerId, this.at)) {
      return { reply: { changed: false }, events: [] };
    }

    await lobbyGateway.saveLobby(lobby);
    return {
      reply: { changed: true },
      events: [
        { channel: lobbyChannel(lobby.id), event: { type: "LobbyUpdated", lobby: lobbyView(lobby) } },
      ],
    };
  }
}
