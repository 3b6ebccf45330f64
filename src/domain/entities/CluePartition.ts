import type { PartitionPolicy } from "../GameConfig.js";
import type { ClueId, PlayerId } from "../typedefs.js";
import type { GeneratedClue } from "./ClueGenerator.js";

export type ClueHoldings = Record<PlayerId, ClueId[]>;

function usefulness(clue: GeneratedClue): number {
  return Math.max(1, clue.determines.length);
}

/**
 * Splits the clue set across `players`. Every clue lands with exactly one
 * player, so the union of all holdings is the full set.
 */
export function partitionClues(
  clues: readonly GeneratedClue[],
  players: readonly PlayerId[],
  policy: PartitionPolicy,
): ClueHoldings {
  const holdings: ClueHoldings = Object.fromEntries(
    players.map((playerId): [PlayerId, ClueId[]] => [playerId, []]),
  );
  if (players.length === 0) return holdings;

  if (policy === "round-robin") {
    clues.forEach((clue, index) => {
      holdings[players[index % players.length]].push(clue.id);
    });
    return holdings;
  }

  const load = new Map<PlayerId, number>(players.map((playerId) => [playerId, 0]));
  const byUsefulness = [...clues].sort((a, b) => usefulness(b) - usefulness(a));

  for (const clue of byUsefulness) {
    let target = players[0];
    for (const playerId of players) {
      if ((load.get(playerId) ?? 0) < (load.get(target) ?? 0)) {
        target = playerId;
      }
    }
    holdings[target].push(clue.id);
    load.set(target, (load.get(target) ?? 0) + usefulness(clue));
  }

  const order = new Map(clues.map((clue, index) => [clue.id, index]));
  for (const playerId of players) {
    holdings[playerId].sort((a, b) => (order.get(a) ?? 0) - (order.get(b) ?? 0));
  }

  return holdings;
}

/**
 * Hands clues nobody in `players` holds any more (after someone left) to the
 * remaining players, round-robin in clue order. Hands stay in generation order.
 */
export function redistributeOrphans(
  clues: readonly GeneratedClue[],
  holdings: ClueHoldings,
  players: readonly PlayerId[],
): ClueId[] {
  if (players.length === 0) return [];

  const held = new Set(players.flatMap((playerId) => holdings[playerId] ?? []));
  const orphans = clues.map((clue) => clue.id).filter((id) => !held.has(id));

  const order = new Map(clues.map((clue, index) => [clue.id, index]));
  orphans.forEach((id, index) => {
    const playerId = players[index % players.length];
    holdings[playerId] = [...(holdings[playerId] ?? []), id].sort(
      (a, b) => (order.get(a) ?? 0) - (order.get(b) ?? 0),
    );
  });

  return orphans;
}
