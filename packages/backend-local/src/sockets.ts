import {
  DisconnectFromLobby,
  DisconnectPlayer,
  JoinLobby,
  ReconnectPlayer,
  lobbyChannel,
  playerChannel,
  sessionChannel,
  type Command,
  type GameManager,
  type LobbyId,
  type Logger,
  type PlayerId,
  type SessionId,
  type TimePoint,
} from "./core.js";

export interface SocketAttacher<TSocket> {
  attach(channels: readonly string[], socket: TSocket): void;
}

/** What happens when one client socket opens and closes. */
export interface SocketLifecycle<TSocket> {
  /** Subscribes the socket, then announces its player; `reject` closes it with a reason. */
  open(socket: TSocket, reject: (message: string) => void): Promise<void>;
  close(): Promise<void>;
}

export interface SocketHandlersOptions<TSocket> {
  readonly manager: GameManager;
  readonly bus: SocketAttacher<TSocket>;
  readonly logger: Logger;
  readonly now?: () => TimePoint;
}

export interface SocketHandlers<TSocket> {
  session(sessionId: SessionId, playerId: PlayerId): SocketLifecycle<TSocket>;
  lobby(lobbyId: LobbyId, playerId: PlayerId, name?: string): SocketLifecycle<TSocket>;
}

export function createSocketHandlers<TSocket>({
  manager,
  bus,
  logger,
  now = Date.now,
}: SocketHandlersOptions<TSocket>): SocketHandlers<TSocket> {
  /** Transport hooks never let a rejected command escape into the socket library. */
  async function dispatch(
    build: () => Command,
    reject?: (message: string) => void,
  ): Promise<void> {
    try {
      const result = await manager.execute(build());
      if (!result.ok) {
        logger.warn("Socket lifecycle command rejected", { error: result.error });
        reject?.(result.error.message);
      }
    } catch (error) {
      logger.warn("Socket lifecycle command failed", { error });
      reject?.("Invalid request");
    }
  }

  return {
    session(sessionId, playerId) {
      const channels = [sessionChannel(sessionId), playerChannel(sessionId, playerId)];
      return {
        async open(socket, reject) {
          bus.attach(channels, socket);
          await dispatch(() => new ReconnectPlayer(sessionId, playerId, now()), reject);
        },
        close: () => dispatch(() => new DisconnectPlayer(sessionId, playerId, now())),
      };
    },

    lobby(lobbyId, playerId, name) {
      return {
        async open(socket, reject) {
          bus.attach([lobbyChannel(lobbyId)], socket);
          await dispatch(() => new JoinLobby(lobbyId, playerId, name, now()), reject);
        },
        close: () => dispatch(() => new DisconnectFromLobby(lobbyId, playerId, now())),
      };
    },
  };
}
