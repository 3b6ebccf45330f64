import { vi } from "vitest";

import { InMemoryScheduler } from "@mystic-grid/core/adapters/in-memory/InMemoryScheduler.js";

import type { PublishedEvent } from "../../src/adapters/WebSocketBus.js";
import { createBackendApp } from "../../src/app.js";
import {
  GameManager,
  InMemoryLobbyGateway,
  InMemorySessionGateway,
  createGameConfig,
  type GameConfig,
  type Logger,
  type MessageBus,
} from "../../src/core.js";

type Waiter = {
  readonly predicate: (payload: PublishedEvent) => boolean;
  readonly resolve: (payload: PublishedEvent) => void;
  readonly reject: (error: Error) => void;
  timeout?: ReturnType<typeof setTimeout>;
};

export class FakeBus implements MessageBus {
  readonly events: PublishedEvent[] = [];
  readonly #waiters = new Set<Waiter>();

  async publish(channel: string, event: object): Promise<void> {
    const payload: PublishedEvent = { channel, event };
    this.events.push(payload);

    for (const waiter of [...this.#waiters]) {
      if (waiter.predicate(payload)) {
        this.#waiters.delete(waiter);
        if (waiter.timeout) {
          clearTimeout(waiter.timeout);
        }
        waiter.resolve(payload);
      }
    }
  }

  waitFor(predicate: Waiter["predicate"], timeoutMs = 5000): Promise<PublishedEvent> {
    return new Promise<PublishedEvent>((resolve, reject) => {
      const waiter: Waiter = { predicate, resolve, reject };

      if (timeoutMs > 0) {
        waiter.timeout = setTimeout(() => {
          this.#waiters.delete(waiter);
          reject(new Error("Timed out waiting for event"));
        }, timeoutMs);
      }

      this.#waiters.add(waiter);
    });
  }

  /** Event types published on `channel`, in order */
  typesOn(channel: string): string[] {
    return this.events
      .filter((entry) => entry.channel === channel)
      .map(({ event }) => ("type" in event && typeof event.type === "string" ? event.type : "?"));
  }
}

export function createLoggerMock(): Logger {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  } satisfies Logger;
}

export interface BackendTestContext {
  readonly app: ReturnType<typeof createBackendApp>;
  readonly manager: GameManager;
  readonly bus: FakeBus;
  readonly scheduler: InMemoryScheduler;
  readonly sessionGateway: InMemorySessionGateway;
  readonly lobbyGateway: InMemoryLobbyGateway;
  readonly config: GameConfig;
  readonly logger: Logger;
}

export interface TestContextOverrides {
  readonly config?: GameConfig;
  readonly startAt?: number;
}

export const TEST_PORT = 4321;

/** A backend app over in-memory storage whose clock is the scheduler's. */
export function createTestContext(overrides: TestContextOverrides = {}): BackendTestContext {
  const bus = new FakeBus();
  const logger = createLoggerMock();
  const sessionGateway = new InMemorySessionGateway();
  const lobbyGateway = new InMemoryLobbyGateway();
  const config = overrides.config ?? createGameConfig({ boardSize: 3 });
  const scheduler = new InMemoryScheduler(
    (command) => manager.execute(command),
    overrides.startAt ?? 1_000,
  );
  const manager: GameManager = new GameManager({
    sessionGateway,
    lobbyGateway,
    scheduler,
    bus,
    config,
    logger,
    now: () => scheduler.now,
  });
  const app = createBackendApp({
    port: TEST_PORT,
    manager,
    logger,
    now: () => scheduler.now,
  });

  return { app, manager, bus, scheduler, sessionGateway, lobbyGateway, config, logger };
}

export function postJson(
  context: BackendTestContext,
  path: string,
  body: unknown,
): Promise<Response> {
  return Promise.resolve(
    context.app.request(path, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(body),
    }),
  );
}
