import { z } from "zod";

import {
  EndSession,
  GetSessionState,
  JoinSession,
  LeaveSession,
  SHAPES,
  ShareClue,
  StartSession,
  SubmitSolution,
  type Command,
  type TimePoint,
} from "./core.js";

const identifier = z.string().min(1).regex(/^\S+$/, "must not contain whitespace");

/** An op that carries nothing beyond its addressing */
function bareRequest<TOp extends string>(op: TOp) {
  return z.object({
    op: z.literal(op),
    sessionId: identifier,
    playerId: identifier,
    payload: z.object({}).optional(),
  });
}

const positionFields = {
  row: z.number().int().min(0),
  col: z.number().int().min(0),
};

const requestSchema = z.discriminatedUnion("op", [
  z.object({
    op: z.literal("submit_solution"),
    sessionId: identifier,
    playerId: identifier,
    payload: z.object({
      ...positionFields,
      shape: z.enum(SHAPES).optional(),
      number: z.number().int().min(1).optional(),
    }),
  }),
  z.object({
    op: z.literal("share_clue"),
    sessionId: identifier,
    playerId: identifier,
    payload: z.object({
      toPlayerId: identifier,
      clueId: identifier,
    }),
  }),
  z.object({
    op: z.literal("join"),
    sessionId: identifier,
    playerId: identifier,
    payload: z.object({ name: z.string().max(64).optional() }).optional(),
  }),
  bareRequest("get_state"),
  bareRequest("leave"),
  bareRequest("start"),
  bareRequest("end"),
]);

export type SessionRequest = z.infer<typeof requestSchema>;
export type SessionOp = SessionRequest["op"];

export type ParsedRequest =
  | { readonly ok: true; readonly request: SessionRequest }
  | { readonly ok: false; readonly issues: readonly string[] };

export function parseRequest(input: unknown): ParsedRequest {
  const parsed = requestSchema.safeParse(input);
  if (!parsed.success) {
    return {
      ok: false,
      issues: parsed.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
      ),
    };
  }
  return { ok: true, request: parsed.data };
}

/** Maps a validated request envelope onto the engine command it asks for. */
export function toCommand(request: SessionRequest, at: TimePoint): Command {
  const { sessionId, playerId } = request;

  switch (request.op) {
    case "submit_solution": {
      const { row, col, shape, number } = request.payload;
      return new SubmitSolution(
        sessionId,
        playerId,
        { row, col },
        {
          ...(shape !== undefined ? { shape } : {}),
          ...(number !== undefined ? { number } : {}),
        },
        at,
      );
    }
    case "share_clue":
      return new ShareClue(
        sessionId,
        playerId,
        request.payload.toPlayerId,
        request.payload.clueId,
        at,
      );
    case "join":
      return new JoinSession(sessionId, playerId, request.payload?.name, at);
    case "get_state":
      return new GetSessionState(sessionId, playerId, at);
    case "leave":
      return new LeaveSession(sessionId, playerId, at);
    case "start":
      return new StartSession(sessionId, playerId, at);
    case "end":
      return new EndSession(sessionId, playerId, at);
  }
}
