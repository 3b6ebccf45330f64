import { describe, expect, it } from "vitest";

import { createCommandContext, createPlayer, createSessionState } from "./support/mocks.js";
import { StartSession } from "../src/domain/commands/StartSession.js";

describe("StartSession command", () => {
  it("deals the clues, starts the clock and schedules the expiry tick", async () => {
    const context = createCommandContext();
    const { sessionGateway, scheduler } = context;
    const state = createSessionState();
    sessionGateway.loadSession.mockResolvedValue(state);

    const { reply, events } = await new StartSession("session-1", "alice", 5_000).execute(context);

    expect(state).toMatchObject({
      phase: "playing",
      startedAt: 5_000,
      endsAt: 905_000,
      currentTurnIndex: 0,
      turnCount: 0,
    });
    expect(state.players.map((player) => player.heldClues)).toEqual([
      ["clue-1", "clue-3"],
      ["clue-2", "clue-4"],
    ]);
    expect(scheduler.scheduleTick).toHaveBeenCalledWith("session-1", 900_000);
    expect(reply).toMatchObject({ gameState: "playing", isMyTurn: true, timeRemaining: 900 });

    expect(events[0]).toEqual({
      channel: "session:session-1",
      event: {
        type: "SessionStarted",
        sessionId: "session-1",
        startedAt: 5_000,
        endsAt: 905_000,
        currentTurn: "alice",
      },
    });
  });

  it("only lets the host start", async () => {
    const context = createCommandContext();
    context.sessionGateway.loadSession.mockResolvedValue(createSessionState());

    await expect(
      new StartSession("session-1", "bob", 5_000).execute(context),
    ).rejects.toMatchObject({ kind: "NotHost" });
    expect(context.scheduler.scheduleTick).not.toHaveBeenCalled();
  });

  it("needs enough connected players", async () => {
    const context = createCommandContext();
    context.sessionGateway.loadSession.mockResolvedValue(
      createSessionState({ players: ["alice", createPlayer("bob", { connected: false })] }),
    );

    await expect(
      new StartSession("session-1", "alice", 5_000).execute(context),
    ).rejects.toMatchObject({ kind: "NotEnoughPlayers" });
  });

  it("cannot start twice", async () => {
    const context = createCommandContext();
    context.sessionGateway.loadSession.mockResolvedValue(createSessionState({ phase: "playing" }));

    await expect(
      new StartSession("session-1", "alice", 5_000).execute(context),
    ).rejects.toMatchObject({ kind: "GameAlreadyStarted" });
  });
});
