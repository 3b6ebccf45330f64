/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import { WebSocket } from "ws";

import type { Logger, MessageBus } from "../core.js";

export interface PublishedEvent<TEvent extends object = object> {
  readonly channel: string;
  readonly event: TEvent;
}

type Listener = {
  readonly predicate: (payload: PublishedEvent) => boolean;
  readonly resolve: (payload: PublishedEvent) => void;
  readonly reject: (error: Error) => void;
  timeout?: ReturnType<typeof setTimeout>;
};

/**
 * Channel fan-out over `ws` sockets. A socket may listen on several channels
 * at once (a session's public channel and its owner's private one); it is
 * dropped from all of them when it closes.
 */
export class WebSocketBus implements MessageBus {
  #clients: Map<string, Set<WebSocket>> = new Map();
  #listeners: Set<Listener> = new Set();
  readonly #logger: Logger | undefined;

  constructor(logger?: Logger) {
    this.#logger = logger;
  }

  async publish(channel: string, event: object): Promise<void> {
    const payload: PublishedEvent = { channel, event };
    const connections = this.#clients.get(channel);

    if (connections) {
      const message = JSON.stringify({ channel, ...event });
      for (const socket of connections) {
        if (socket.readyState !== WebSocket.OPEN) {
          continue;
        }
        try {
          socket.send(message);
        } catch (error) {
          this.#logger?.warn("Failed to deliver event", { channel, error });
        }
      }
    }

    for (const listener of [...this.#listeners]) {
      if (!listener.predicate(payload)) {
        continue;
      }
      if (listener.timeout) {
        clearTimeout(listener.timeout);
      }
      this.#listeners.delete(listener);
      listener.resolve(payload);
    }

    this.#logger?.debug("Event published", { channel, event });
  }

  attach(channels: readonly string[], socket: WebSocket): void {
    for (const channel of channels) {
      let connections = this.#clients.get(channel);
      if (!connections) {
        connections = new Set<WebSocket>();
        this.#clients.set(channel, connections);
      }
      connections.add(socket);
    }

    this.#logger?.info("WebSocket client attached", { channels });

    socket.on("close", () => {
      this.detach(channels, socket);
      this.#logger?.info("WebSocket client disconnected", { channels });
    });

    socket.on("error", (error: Error) => {
      this.#logger?.warn("WebSocket client error", { channels, error });
    });
  }

  detach(channels: readonly string[], socket: WebSocket): void {
    for (const channel of channels) {
      const connections = this.#clients.get(channel);
      if (!connections) {
        continue;
      }
      connections.delete(socket);
      if (connections.size === 0) {
        this.#clients.delete(channel);
      }
    }
  }

  subscriberCount(channel: string): number {
    return this.#clients.get(channel)?.size ?? 0;
  }

  waitFor(predicate: Listener["predicate"], timeoutMs = 5000): Promise<PublishedEvent> {
    return new Promise<PublishedEvent>((resolve, reject) => {
      const listener: Listener = { predicate, resolve, reject };

      if (timeoutMs > 0) {
        listener.timeout = setTimeout(() => {
          this.#listeners.delete(listener);
          reject(new Error("Timed out waiting for event"));
        }, timeoutMs);
      }

      this.#listeners.add(listener);
    });
  }
}
