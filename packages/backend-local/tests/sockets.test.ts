import { describe, expect, it, vi } from "vitest";

import { createTestContext, type BackendTestContext } from "./support/testContext.js";
import { CreateLobby, GetLobbyState, StartGame } from "../src/core.js";
import { createSocketHandlers, type SocketHandlers } from "../src/sockets.js";

interface Attachment {
  readonly channels: readonly string[];
  readonly socket: string;
}

function createSockets(context: BackendTestContext): {
  sockets: SocketHandlers<string>;
  attached: Attachment[];
} {
  const attached: Attachment[] = [];
  const sockets = createSocketHandlers<string>({
    manager: context.manager,
    bus: {
      attach(channels, socket) {
        attached.push({ channels, socket });
      },
    },
    logger: context.logger,
    now: () => context.scheduler.now,
  });
  return { sockets, attached };
}

async function lobbyMember(context: BackendTestContext, playerId: string) {
  const result = await context.manager.execute(new GetLobbyState("lobby-1", 0));
  if (!result.ok) throw new Error(result.error.message);
  return result.value.members.find((member) => member.id === playerId);
}

async function openLobby(context: BackendTestContext): Promise<void> {
  const result = await context.manager.execute(new CreateLobby("alice", "Alice", "", {}, 0));
  if (!result.ok) throw new Error(result.error.message);
}

describe("lobby sockets", () => {
  it("subscribes to the lobby channel and tracks the member's connection", async () => {
    const context = createTestContext();
    const { sockets, attached } = createSockets(context);
    await openLobby(context);
    const reject = vi.fn();

    const bob = sockets.lobby("lobby-1", "bob", "Bob");
    await bob.open("socket-bob", reject);

    expect(attached).toEqual([{ channels: ["lobby:lobby-1"], socket: "socket-bob" }]);
    expect(reject).not.toHaveBeenCalled();
    expect(await lobbyMember(context, "bob")).toEqual({
      id: "bob",
      name: "Bob",
      connected: true,
      isHost: false,
    });

    await bob.close();

    expect(await lobbyMember(context, "bob")).toMatchObject({ connected: false });
    expect(context.bus.typesOn("lobby:lobby-1")).toEqual([
      "LobbyUpdated",
      "LobbyUpdated",
      "LobbyUpdated",
    ]);
  });

  it("keeps a returning member's name when the socket gives none", async () => {
    const context = createTestContext();
    const { sockets } = createSockets(context);
    await openLobby(context);
    const first = sockets.lobby("lobby-1", "bob", "Bob");
    await first.open("socket-1", vi.fn());
    await first.close();

    await sockets.lobby("lobby-1", "bob").open("socket-2", vi.fn());

    expect(await lobbyMember(context, "bob")).toMatchObject({ name: "Bob", connected: true });
  });

  it("tells every lobby subscriber which session the game started in", async () => {
    const context = createTestContext();
    const { sockets } = createSockets(context);
    await openLobby(context);
    await sockets.lobby("lobby-1", "bob", "Bob").open("socket-bob", vi.fn());

    await context.manager.execute(new StartGame("lobby-1", "alice", context.scheduler.now));

    expect(context.bus.events).toContainEqual({
      channel: "lobby:lobby-1",
      event: { type: "GameStarted", lobbyId: "lobby-1", sessionId: "session-1", at: 1_000 },
    });
  });

  it("closes the socket when the lobby is gone", async () => {
    const context = createTestContext();
    const { sockets } = createSockets(context);
    const reject = vi.fn();

    await sockets.lobby("lobby-9", "bob").open("socket-bob", reject);

    expect(reject).toHaveBeenCalledWith("Lobby not found: lobby-9");
    expect(context.logger.warn).toHaveBeenCalledWith("Socket lifecycle command rejected", {
      error: { kind: "LobbyNotFound", message: "Lobby not found: lobby-9" },
    });
  });

  it("closes the socket on malformed identifiers", async () => {
    const context = createTestContext();
    const { sockets } = createSockets(context);
    const reject = vi.fn();

    await sockets.lobby("lobby-1", "has space").open("socket", reject);

    expect(reject).toHaveBeenCalledWith("Invalid request");
  });
});

describe("session sockets", () => {
  it("subscribes to the public and private channels and follows the connection", async () => {
    const context = createTestContext();
    const { sockets, attached } = createSockets(context);
    await openLobby(context);
    await sockets.lobby("lobby-1", "bob", "Bob").open("lobby-bob", vi.fn());
    await sockets.lobby("lobby-1", "carol", "Carol").open("lobby-carol", vi.fn());
    await context.manager.execute(new StartGame("lobby-1", "alice", context.scheduler.now));

    const carol = sockets.session("session-1", "carol");
    await carol.close();
    expect((await context.manager.getSession("session-1"))?.players[2]).toMatchObject({
      id: "carol",
      connected: false,
    });

    const reject = vi.fn();
    await carol.open("session-carol", reject);

    expect(reject).not.toHaveBeenCalled();
    expect(attached.at(-1)).toEqual({
      channels: ["session:session-1", "session:session-1:player:carol"],
      socket: "session-carol",
    });
    expect((await context.manager.getSession("session-1"))?.players[2]).toMatchObject({
      id: "carol",
      connected: true,
    });
  });
});
