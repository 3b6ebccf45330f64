import { lobbySettingsFrom, lobbyView, validateLobbySettings, type LobbyView } from "../entities/LobbyRules.js";
import { GameCommandInputError } from "../errors/GameCommandInputError.js";
import type { LobbySettings } from "../ports/LobbyGateway.js";
import type { PlayerId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext, type CommandOutcome } from "./Command.js";
import { lobbyChannel } from "./SessionEvents.js";
import { assertIdentifiers, normalizeName } from "./validation.js";

export class CreateLobby extends Command<LobbyView> {
  readonly type = "CreateLobby" as const;
  readonly lockKey = "lobby:new";
  readonly hostName: string;

  constructor(
    public readonly hostId: PlayerId,
    hostName: string | undefined,
    public readonly name: string,
    public readonly settings: Partial<LobbySettings>,
    public readonly at: TimePoint,
  ) {
    super();
    assertIdentifiers({ hostId });
    this.hostName = normalizeName(hostName, hostId);
  }

  async execute({
    lobbyGateway,
    config,
    logger,
  }: CommandContext): Promise<CommandOutcome<LobbyView>> {
    const settings = lobbySettingsFrom(config, this.settings);
    const issues = validateLobbySettings(config, settings);
    if (issues.length > 0) {
      throw GameCommandInputError.because(issues, "lobby settings");
    }

    const lobby = await lobbyGateway.createLobby({
      name: this.name.trim() || `${this.hostName}'s lobby`,
      host: { id: this.hostId, name: this.hostName, connected: true },
      settings,
      createdAt: this.at,
    });

    logger?.info("Lobby created", {
      type: this.type,
      lobbyId: lobby.id,
      host: this.hostId,
      at: this.at,
    });

    const view = lobbyView(lobby);
    return {
      reply: view,
      events: [{ channel: lobbyChannel(lobby.id), event: { type: "LobbyUpdated", lobby: view } }],
    };
  }
}
