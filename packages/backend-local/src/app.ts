import { Hono } from "hono";
import type { Context, Next } from "hono";
import { z } from "zod";

import {
  CreateLobby,
  GameCommandInputError,
  GetLobbyState,
  GetSessionState,
  JoinLobby,
  LeaveLobby,
  StartGame,
  type Command,
  type CommandResult,
  type GameErrorKind,
  type GameManager,
  type Logger,
  type TimePoint,
} from "./core.js";
import { parseRequest, toCommand } from "./protocol.js";

export interface CreateBackendAppOptions {
  readonly port: number;
  readonly manager: GameManager;
  readonly logger: Logger;
  readonly now?: () => TimePoint;
}

const identifier = z.string().min(1).regex(/^\S+$/, "must not contain whitespace");

const lobbySettingsSchema = z
  .object({
    boardSize: z.number().int(),
    sessionDurationSeconds: z.number().int(),
    minPlayers: z.number().int(),
    maxPlayers: z.number().int(),
  })
  .partial();

const createLobbySchema = z.object({
  playerId: identifier,
  name: z.string().optional(),
  lobbyName: z.string().max(64).optional(),
  settings: lobbySettingsSchema.optional(),
});

const lobbyMemberSchema = z.object({
  playerId: identifier,
  name: z.string().optional(),
});

const createSessionSchema = z.object({
  players: z.array(z.object({ playerId: identifier, name: z.string() })).min(1),
  boardSize: z.number().int(),
  sessionDurationSeconds: z.number().int(),
  minPlayers: z.number().int(),
  maxPlayers: z.number().int().optional(),
  hostId: identifier.optional(),
  seed: z.number().int().nonnegative().optional(),
});

type ErrorStatus = 400 | 404 | 500;

export function statusForErrorKind(kind: GameErrorKind): ErrorStatus {
  switch (kind) {
    case "SessionNotFound":
    case "LobbyNotFound":
      return 404;
    case "GenerationFailed":
    case "Internal":
      return 500;
    default:
      return 400;
  }
}

export function createBackendApp({
  port,
  manager,
  logger,
  now = Date.now,
}: CreateBackendAppOptions): Hono {
  const app = new Hono();

  const respond = <T>(c: Context, result: CommandResult<T>): Response => {
    if (result.ok) {
      return c.json({ ok: true, result: result.value });
    }
    const status = statusForErrorKind(result.error.kind);
    if (status === 500) {
      logger.error("Request failed", { path: c.req.path, error: result.error });
    }
    return c.json({ ok: false, error: result.error }, status);
  };

  /** Command constructors reject malformed ids; that is the caller's fault, not ours. */
  const run = async <T>(c: Context, build: () => Command<T>): Promise<Response> => {
    let command: Command<T>;
    try {
      command = build();
    } catch (error) {
      if (error instanceof GameCommandInputError) {
        return invalid(c, error.issues);
      }
      throw error;
    }
    return respond(c, await manager.execute(command));
  };

  const invalid = (c: Context, issues: readonly string[]): Response =>
    c.json(
      {
        ok: false,
        error: { kind: "InvalidInput", message: "Invalid request body", issues },
      },
      400,
    );

  app.use("/api/*", async (c: Context, next: Next): Promise<Response> => {
    c.header("Access-Control-Allow-Origin", "*");
    c.header("Access-Control-Allow-Headers", "Content-Type");
    c.header("Access-Control-Allow-Methods", "GET,POST,OPTIONS");
    if (c.req.method === "OPTIONS") {
      return c.json({ ok: true });
    }
    await next();
    return c.res;
  });

  app.get("/api/health", (c: Context) =>
    c.json({ ok: true, timestamp: now(), config: { port } }),
  );

  app.get("/api/stats", async (c: Context) => c.json(await manager.getStats()));

  app.post("/api/lobbies", async (c: Context) => {
    const parsed = createLobbySchema.safeParse(await readBody(c));
    if (!parsed.success) {
      return invalid(c, issuesOf(parsed.error));
    }
    const { playerId, name, lobbyName, settings } = parsed.data;
    return run(c, () => new CreateLobby(playerId, name, lobbyName ?? "", settings ?? {}, now()));
  });

  app.get("/api/lobbies/:lobbyId", (c: Context) => {
    const lobbyId = c.req.param("lobbyId") ?? "";
    return run(c, () => new GetLobbyState(lobbyId, now()));
  });

  app.post("/api/lobbies/:lobbyId/join", async (c: Context) => {
    const parsed = lobbyMemberSchema.safeParse(await readBody(c));
    if (!parsed.success) {
      return invalid(c, issuesOf(parsed.error));
    }
    const { playerId, name } = parsed.data;
    const lobbyId = c.req.param("lobbyId") ?? "";
    return run(c, () => new JoinLobby(lobbyId, playerId, name, now()));
  });

  app.post("/api/lobbies/:lobbyId/leave", async (c: Context) => {
    const parsed = lobbyMemberSchema.safeParse(await readBody(c));
    if (!parsed.success) {
      return invalid(c, issuesOf(parsed.error));
    }
    const lobbyId = c.req.param("lobbyId") ?? "";
    return run(c, () => new LeaveLobby(lobbyId, parsed.data.playerId, now()));
  });

  app.post("/api/lobbies/:lobbyId/start", async (c: Context) => {
    const parsed = lobbyMemberSchema.safeParse(await readBody(c));
    if (!parsed.success) {
      return invalid(c, issuesOf(parsed.error));
    }
    const lobbyId = c.req.param("lobbyId") ?? "";
    return run(c, () => new StartGame(lobbyId, parsed.data.playerId, now()));
  });

  app.post("/api/sessions", async (c: Context) => {
    const parsed = createSessionSchema.safeParse(await readBody(c));
    if (!parsed.success) {
      return invalid(c, issuesOf(parsed.error));
    }
    const { seed, ...snapshot } = parsed.data;
    return respond(c, await manager.createSession(snapshot, seed));
  });

  app.get("/api/sessions/:sessionId/state", async (c: Context) => {
    const sessionId = c.req.param("sessionId") ?? "";
    const playerId = c.req.query("playerId");
    if (playerId === undefined || playerId.length === 0) {
      return invalid(c, ["playerId query parameter is required"]);
    }
    return run(c, () => new GetSessionState(sessionId, playerId, now()));
  });

  app.post("/api/sessions/:sessionId/commands", async (c: Context) => {
    const body = await readBody(c);
    const sessionId = c.req.param("sessionId") ?? "";
    const parsed = parseRequest(isRecord(body) ? { ...body, sessionId } : body);
    if (!parsed.ok) {
      return invalid(c, parsed.issues);
    }

    logger.debug("Session request", { op: parsed.request.op, sessionId });
    const { request } = parsed;
    return run(c, () => toCommand(request, now()));
  });

  return app;
}

async function readBody(c: Context): Promise<unknown> {
  return c.req.json<unknown>().catch(() => null);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function issuesOf(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
  );
}
