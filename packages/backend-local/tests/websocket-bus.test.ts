import { describe, expect, it, vi } from "vitest";
import { WebSocket } from "ws";

import { WebSocketBus } from "../src/adapters/WebSocketBus.js";

interface FakeSocket {
  readonly socket: WebSocket;
  readonly send: ReturnType<typeof vi.fn>;
  emit(event: string, ...args: unknown[]): void;
}

function createFakeSocket(readyState: number = WebSocket.OPEN): FakeSocket {
  const handlers = new Map<string, Array<(...args: unknown[]) => void>>();
  const send = vi.fn();
  const socket = {
    readyState,
    send,
    on: vi.fn((event: string, handler: (...args: unknown[]) => void) => {
      const list = handlers.get(event) ?? [];
      list.push(handler);
      handlers.set(event, list);
      return socket;
    }),
  };

  return {
    socket: socket as unknown as WebSocket,
    send,
    emit(event: string, ...args: unknown[]): void {
      const list = handlers.get(event);
      if (!list) {
        return;
      }
      for (const handler of list) {
        handler(...args);
      }
    },
  } satisfies FakeSocket;
}

describe("WebSocketBus", () => {
  it("delivers published events to every socket on the channel", async () => {
    const bus = new WebSocketBus();
    const clientA = createFakeSocket();
    const clientB = createFakeSocket();

    bus.attach(["session:session-1"], clientA.socket);
    bus.attach(["session:session-1"], clientB.socket);

    await bus.publish("session:session-1", { type: "SessionStarted", currentTurn: "alice" });

    const message = JSON.stringify({
      channel: "session:session-1",
      type: "SessionStarted",
      currentTurn: "alice",
    });
    expect(clientA.send).toHaveBeenCalledWith(message);
    expect(clientB.send).toHaveBeenCalledWith(message);
  });

  it("keeps private channels private", async () => {
    const bus = new WebSocketBus();
    const alice = createFakeSocket();
    const bob = createFakeSocket();

    bus.attach(["session:s1", "session:s1:player:alice"], alice.socket);
    bus.attach(["session:s1", "session:s1:player:bob"], bob.socket);

    await bus.publish("session:s1:player:alice", { type: "SessionUpdated" });

    expect(alice.send).toHaveBeenCalledTimes(1);
    expect(bob.send).not.toHaveBeenCalled();
  });

  it("skips sockets that are not open", async () => {
    const bus = new WebSocketBus();
    const closing = createFakeSocket(WebSocket.CLOSING);

    bus.attach(["session:s1"], closing.socket);
    await bus.publish("session:s1", { type: "PlayerLeft" });

    expect(closing.send).not.toHaveBeenCalled();
  });

  it("supports waiting for matching events", async () => {
    const bus = new WebSocketBus();

    const waitPromise = bus.waitFor(({ event }) => "type" in event && event.type === "TargetEvent", 1000);

    await bus.publish("session:s1", { type: "OtherEvent" });
    await bus.publish("session:s1", { type: "TargetEvent", payload: 42 });

    await expect(waitPromise).resolves.toMatchObject({
      channel: "session:s1",
      event: { type: "TargetEvent", payload: 42 },
    });
  });

  it("removes closed sockets from all of their channels", async () => {
    const bus = new WebSocketBus();
    const client = createFakeSocket();

    bus.attach(["session:s1", "session:s1:player:alice"], client.socket);
    expect(bus.subscriberCount("session:s1:player:alice")).toBe(1);
    client.emit("close");

    await bus.publish("session:s1", { type: "AfterClose" });

    expect(client.send).not.toHaveBeenCalled();
    expect(bus.subscriberCount("session:s1")).toBe(0);
    expect(bus.subscriberCount("session:s1:player:alice")).toBe(0);
  });
});
