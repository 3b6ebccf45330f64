import { describe, expect, it } from "vitest";

import { createCommandContext, createSessionState } from "./support/mocks.js";
import { SessionTick } from "../src/domain/commands/SessionTick.js";

describe("SessionTick command", () => {
  it("reports the remaining time before the deadline", async () => {
    const context = createCommandContext();
    context.sessionGateway.loadSession.mockResolvedValue(createSessionState({ phase: "playing" }));

    const outcome = await new SessionTick("session-1", 1_000).execute(context);

    expect(outcome).toEqual({ reply: { expired: false, timeRemainingMs: 899_000 }, events: [] });
    expect(context.sessionGateway.saveSession).not.toHaveBeenCalled();
  });

  it("schedules another tick when it arrives before the deadline", async () => {
    const context = createCommandContext();
    context.sessionGateway.loadSession.mockResolvedValue(createSessionState({ phase: "playing" }));

    await new SessionTick("session-1", 899_990).execute(context);

    expect(context.scheduler.scheduleTick).toHaveBeenCalledWith("session-1", 10);
  });

  it("does not reschedule outside play", async () => {
    const context = createCommandContext();
    context.sessionGateway.loadSession.mockResolvedValue(createSessionState({ phase: "waiting" }));

    await new SessionTick("session-1", 1_000).execute(context);

    expect(context.scheduler.scheduleTick).not.toHaveBeenCalled();
  });

  it("expires the session once the deadline passes", async () => {
    const context = createCommandContext();
    const state = createSessionState({ phase: "playing" });
    context.sessionGateway.loadSession.mockResolvedValue(state);

    const { reply, events } = await new SessionTick("session-1", 900_000).execute(context);

    expect(reply).toEqual({ expired: true, timeRemainingMs: 0 });
    expect(state).toMatchObject({
      phase: "finished",
      finishReason: "time_expired",
      finishedAt: 900_000,
      winner: "alice",
    });
    expect(context.sessionGateway.saveSession).toHaveBeenCalledWith(state);
    expect(context.scheduler.scheduleTick).not.toHaveBeenCalled();
    expect(events[0]).toEqual({
      channel: "session:session-1",
      event: {
        type: "SessionFinished",
        sessionId: "session-1",
        reason: "time_expired",
        winner: "alice",
        scores: { alice: 0, bob: 0 },
        at: 900_000,
      },
    });
    expect(events).toHaveLength(3);
  });

  it("ignores ticks for finished sessions", async () => {
    const context = createCommandContext();
    const state = createSessionState({ phase: "finished" });
    context.sessionGateway.loadSession.mockResolvedValue(state);

    const outcome = await new SessionTick("session-1", 2_000_000).execute(context);

    expect(outcome).toEqual({ reply: { expired: false, timeRemainingMs: 0 }, events: [] });
    expect(state.finishReason).toBe("terminated");
  });
});
