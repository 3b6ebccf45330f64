import { submitSolution, type Guess, type SolutionOutcome } from "../entities/GuessRules.js";
import { assertValidSessionState } from "../entities/SessionRules.js";
import { buildSnapshot, type SessionSnapshot } from "../entities/SessionSnapshot.js";
import type { PlayerId, Position, SessionId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext, type CommandOutcome } from "./Command.js";
import { finishEvents, sessionUpdates } from "./SessionEvents.js";
import { assertIdentifiers } from "./validation.js";

export interface SubmitSolutionReply extends SolutionOutcome {
  readonly snapshot: SessionSnapshot;
}

export class SubmitSolution extends Command<SubmitSolutionReply> {
  readonly type = "SubmitSolution" as const;

  constructor(
    public readonly sessionId: SessionId,
    public readonly playerId: PlayerId,
    public readonly position: Position,
    public readonly guess: Guess,
    public readonly at: TimePoint,
  ) {
    super();
    assertIdentifiers({ sessionId, playerId });
  }

  get lockKey(): string {
    return `session:${this.sessionId}`;
  }

  async execute({
    sessionGateway,
    logger,
  }: CommandContext): Promise<CommandOutcome<SubmitSolutionReply>> {
    const state = await sessionGateway.loadSession(this.sessionId);

    const outcome = submitSolution(state, this.playerId, this.position, this.guess, this.at);
    assertValidSessionState(state);
    await sessionGateway.saveSession(state);

    logger?.info("Solution submitted", {
      type: this.type,
      sessionId: state.id,
      playerId: this.playerId,
      position: this.position,
      accepted: outcome.accepted,
      points: outcome.pointsAwarded,
      turnCount: state.turnCount,
      at: this.at,
    });

    if (state.phase === "finished") {
      logger?.info("Session finished", {
        type: this.type,
        sessionId: state.id,
        reason: state.finishReason,
        winner: state.winner,
        at: this.at,
      });
    }

    return {
      reply: { ...outcome, snapshot: buildSnapshot(state, this.playerId, this.at) },
      events: sessionUpdates(state, this.at, [
        {
          type: "SolutionSubmitted",
          sessionId: state.id,
          playerId: this.playerId,
          position: this.position,
          accepted: outcome.accepted,
          pointsAwarded: outcome.pointsAwarded,
          cellFullySolved: outcome.cellFullySolved,
          turnCount: state.turnCount,
          at: this.at,
        },
        ...finishEvents(state, false),
      ]),
    };
  }
}
