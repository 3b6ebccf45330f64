import { findMember, joinLobby, lobbyView, type LobbyView } from "../entities/LobbyRules.js";
import type { LobbyId, PlayerId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext, type CommandOutcome } from "./Command.js";
import { lobbyChannel } from "./SessionEvents.js";
import { assertIdentifiers, normalizeName } from "./validation.js";

export class JoinLobby extends Command<LobbyView> {
  readonly type = "JoinLobby" as const;
  /** Undefined keeps a returning member's name */
  readonly name: string | undefined;

  constructor(
    public readonly lobbyId: LobbyId,
    public readonly playerId: PlayerId,
    name: string | undefined,
    public readonly at: TimePoint,
  ) {
    super();
    assertIdentifiers({ lobbyId, playerId });
    this.name = name === undefined ? undefined : normalizeName(name, playerId);
  }

  get lockKey(): string {
    return `lobby:${this.lobbyId}`;
  }

  async execute({
    lobbyGateway,
    logger,
  }: CommandContext): Promise<CommandOutcome<LobbyView>> {
    const lobby = await lobbyGateway.loadLobby(this.lobbyId);

    const name = this.name ?? findMember(lobby, this.playerId)?.name ?? this.playerId;
    const outcome = joinLobby(lobby, this.playerId, name, this.at);
    await lobbyGateway.saveLobby(lobby);

    logger?.info(outcome === "joined" ? "Player joined lobby" : "Player rejoined lobby", {
      type: this.type,
      lobbyId: lobby.id,
      playerId: this.playerId,
      at: this.at,
    });

    const view = lobbyView(lobby);
    return {
      reply: view,
      events: [{ channel: lobbyChannel(lobby.id), event: { type: "LobbyUpdated", lobby: view } }],
    };
  }
}
