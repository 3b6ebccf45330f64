import { serve } from "@hono/node-server";
import { createNodeWebSocket } from "@hono/node-ws";
import type { Context } from "hono";
import type { WSContext } from "hono/ws";
import type { AddressInfo } from "node:net";
import type { WebSocket } from "ws";

import { RealScheduler } from "./adapters/RealScheduler.js";
import { WebSocketBus } from "./adapters/WebSocketBus.js";
import { createBackendApp } from "./app.js";
import { loadServerConfig } from "./config.js";
import { GameManager, InMemoryLobbyGateway, InMemorySessionGateway } from "./core.js";
import { createConsoleLogger } from "./logger.js";
import { createSocketHandlers, type SocketLifecycle } from "./sockets.js";

export async function startServer(): Promise<void> {
  const logger = createConsoleLogger("backend-local");
  const config = loadServerConfig(process.env);
  const bus = new WebSocketBus(logger);

  let manager: GameManager | undefined;
  const scheduler = new RealScheduler({
    dispatch: async (command) => {
      if (!manager) {
        throw new Error("Game manager is not ready");
      }
      return manager.execute(command);
    },
    logger,
  });

  const gameManager = new GameManager({
    sessionGateway: new InMemorySessionGateway(),
    lobbyGateway: new InMemoryLobbyGateway(),
    scheduler,
    bus,
    config: config.game,
    logger,
  });
  manager = gameManager;

  const app = createBackendApp({ port: config.port, manager: gameManager, logger });
  const { upgradeWebSocket, injectWebSocket } = createNodeWebSocket({ app });

  const sockets = createSocketHandlers<WebSocket>({ manager: gameManager, bus, logger });

  const bindSocket = (lifecycle: SocketLifecycle<WebSocket>, labels: Record<string, string>) => ({
    onOpen(_event: Event, ws: WSContext<WebSocket>): void {
      const rawSocket = ws.raw;
      if (!rawSocket) {
        logger.warn("WebSocket connection missing raw handle", labels);
        return;
      }
      void lifecycle.open(rawSocket, (message) => ws.close(1008, message));
    },
    onClose(): void {
      void lifecycle.close();
    },
  });

  app.get(
    "/ws/sessions/:sessionId/:playerId",
    upgradeWebSocket((c: Context) => {
      const sessionId = c.req.param("sessionId") ?? "";
      const playerId = c.req.param("playerId") ?? "";
      return bindSocket(sockets.session(sessionId, playerId), { sessionId, playerId });
    }),
  );

  app.get(
    "/ws/lobbies/:lobbyId/:playerId",
    upgradeWebSocket((c: Context) => {
      const lobbyId = c.req.param("lobbyId") ?? "";
      const playerId = c.req.param("playerId") ?? "";
      const name = c.req.query("name");
      return bindSocket(sockets.lobby(lobbyId, playerId, name), { lobbyId, playerId });
    }),
  );

  const sweepTimer = setInterval(() => {
    gameManager.sweep().catch((error: unknown) => {
      logger.error("Sweep failed", { error });
    });
  }, config.sweepIntervalMs);
  sweepTimer.unref();

  const server = serve({ fetch: app.fetch, port: config.port }, (info: AddressInfo) => {
    logger.info("Server listening", info);
  });

  injectWebSocket(server);

  const shutdown = (): void => {
    clearInterval(sweepTimer);
    scheduler.cancelAll();
    server.close();
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

void startServer().catch((error) => {
  createConsoleLogger("backend-local").error("Failed to start backend", { error });
  process.exit(1);
});
