import { describe, expect, it } from "vitest";

import { InMemoryLobbyGateway } from "../src/adapters/in-memory/InMemoryLobbyGateway.js";
import { LobbyNotFoundError } from "../src/domain/errors/index.js";
import type { NewLobby } from "../src/domain/ports/LobbyGateway.js";

const newLobby: NewLobby = {
  name: "Evening grid",
  host: { id: "alice", name: "Alice", connected: true },
  settings: { boardSize: 4, sessionDurationSeconds: 900, minPlayers: 2, maxPlayers: 4 },
  createdAt: 500,
};

describe("InMemoryLobbyGateway", () => {
  it("creates a lobby with the host as its only member", async () => {
    const gateway = new InMemoryLobbyGateway();

    const lobby = await gateway.createLobby(newLobby);

    expect(lobby).toEqual({
      id: "lobby-1",
      name: "Evening grid",
      host: "alice",
      members: [{ id: "alice", name: "Alice", connected: true }],
      settings: { boardSize: 4, sessionDurationSeconds: 900, minPlayers: 2, maxPlayers: 4 },
      createdAt: 500,
      updatedAt: 500,
    });
    expect(await gateway.loadLobby("lobby-1")).toEqual(lobby);
  });

  it("persists saved membership changes", async () => {
    const gateway = new InMemoryLobbyGateway();
    const lobby = await gateway.createLobby(newLobby);

    lobby.members.push({ id: "bob", name: "Bob", connected: true });
    lobby.updatedAt = 900;
    await gateway.saveLobby(lobby);

    const loaded = await gateway.loadLobby(lobby.id);
    expect(loaded.members.map((member) => member.id)).toEqual(["alice", "bob"]);
    expect(loaded.updatedAt).toBe(900);
  });

  it("deletes and lists lobbies", async () => {
    const gateway = new InMemoryLobbyGateway();
    await gateway.createLobby(newLobby);
    await gateway.createLobby(newLobby);

    expect(await gateway.deleteLobby("lobby-1")).toBe(true);
    expect(await gateway.deleteLobby("lobby-1")).toBe(false);
    expect((await gateway.listLobbies()).map((lobby) => lobby.id)).toEqual(["lobby-2"]);
  });

  it("throws when accessing unknown lobbies", async () => {
    const gateway = new InMemoryLobbyGateway();
    const lobby = await gateway.createLobby(newLobby);

    await expect(gateway.loadLobby("missing")).rejects.toThrow(LobbyNotFoundError);
    await expect(gateway.saveLobby({ ...lobby, id: "missing" })).rejects.toThrow(
      LobbyNotFoundError,
    );
  });
});
