import { lobbyView, type LobbyView } from "../entities/LobbyRules.js";
import type { LobbyId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext, type CommandOutcome } from "./Command.js";
import { assertIdentifiers } from "./validation.js";

/** Read of a lobby's roster and settings; lobbies hold nothing private. */
export class GetLobbyState extends Command<LobbyView> {
  readonly type = "GetLobbyState" as const;

  constructor(
    public readonly lobbyId: LobbyId,
    public readonly at: TimePoint,
  ) {
    super();
    assertIdentifiers({ lobbyId });
  }

  get lockKey(): string {
    return `lobby:${this.lobbyId}`;
  }

  async execute({ lobbyGateway }: CommandContext): Promise<CommandOutcome<LobbyView>> {
    const lobby = await lobbyGateway.loadLobby(this.lobbyId);
    return { reply: lobbyView(lobby), events: [] };
  }
}
