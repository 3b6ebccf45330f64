import { findMember } from "../entities/LobbyRules.js";
import { startSession } from "../entities/SessionRules.js";
import { buildSnapshot, type SessionSnapshot } from "../entities/SessionSnapshot.js";
import { GameRuleError } from "../errors/GameRuleError.js";
import type { LobbyId, PlayerId, SessionId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext, type CommandOutcome } from "./Command.js";
import { createSessionFromSnapshot, type LobbySnapshot } from "./CreateSession.js";
import { lobbyChannel, sessionUpdates } from "./SessionEvents.js";
import { assertIdentifiers } from "./validation.js";

export interface GameStarted {
  readonly sessionId: SessionId;
  readonly snapshot: SessionSnapshot;
}

/**
 * Turns a lobby into a running session: the host's connected roster becomes
 * the turn order, the session starts at once and the lobby is closed.
 */
export class StartGame extends Command<GameStarted> {
  readonly type = "StartGame" as const;

  constructor(
    public readonly lobbyId: LobbyId,
    public readonly playerId: PlayerId,
    public readonly at: TimePoint,
    public readonly seed?: number,
  ) {
    super();
    assertIdentifiers({ lobbyId, playerId });
  }

  get lockKey(): string {
    return `lobby:${this.lobbyId}`;
  }

  async execute(ctx: CommandContext): Promise<CommandOutcome<GameStarted>> {
    const { lobbyGateway, sessionGateway, scheduler, logger } = ctx;
    const lobby = await lobbyGateway.loadLobby(this.lobbyId);

    if (!findMember(lobby, this.playerId)) {
      throw new GameRuleError("StalePlayer", `Player ${this.playerId} is not in this lobby`);
    }
    if (lobby.host !== this.playerId) {
      throw new GameRuleError("NotHost", "Only the host can start the game");
    }

    const roster = lobby.members.filter(
      (member) => member.connected || member.id === this.playerId,
    );
    if (roster.length < lobby.settings.minPlayers) {
      throw new GameRuleError(
        "NotEnoughPlayers",
        `At least ${lobby.settings.minPlayers} connected players are required, found ${roster.length}`,
      );
    }

    const snapshot: LobbySnapshot = {
      lobbyId: lobby.id,
      hostId: lobby.host,
      players: roster.map((member) => ({ playerId: member.id, name: member.name })),
      boardSize: lobby.settings.boardSize,
      sessionDurationSeconds: lobby.settings.sessionDurationSeconds,
      minPlayers: lobby.settings.minPlayers,
      maxPlayers: lobby.settings.maxPlayers,
    };

    const state = await createSessionFromSnapshot(ctx, snapshot, this.at, this.seed);
    startSession(state, this.playerId, this.at);
    await sessionGateway.saveSession(state);
    await scheduler.scheduleTick(state.id, state.config.sessionDurationMs);
    await lobbyGateway.deleteLobby(lobby.id);

    logger?.info("Game started from lobby", {
      type: this.type,
      lobbyId: lobby.id,
      sessionId: state.id,
      players: state.players.length,
      at: this.at,
    });

    return {
      reply: { sessionId: state.id, snapshot: buildSnapshot(state, this.playerId, this.at) },
      events: [
        {
          channel: lobbyChannel(lobby.id),
          event: { type: "GameStarted", lobbyId: lobby.id, sessionId: state.id, at: this.at },
        },
        ...sessionUpdates(state, this.at, [
          {
            type: "SessionStarted",
            sessionId: state.id,
            startedAt: state.startedAt,
            endsAt: state.endsAt,
            currentTurn: state.players[state.currentTurnIndex]?.id ?? null,
          },
        ]),
      ],
    };
  }
}
