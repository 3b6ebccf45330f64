import { describe, expect, it } from "vitest";

import type { GeneratedClue } from "../../src/domain/entities/ClueGenerator.js";
import {
  partitionClues,
  redistributeOrphans,
  type ClueHoldings,
} from "../../src/domain/entities/CluePartition.js";

function generated(id: string, determined: number): GeneratedClue {
  return {
    id,
    clue: { kind: "explicit", position: { row: 0, col: 0 }, attribute: "number", value: 1 },
    text: "Cell (0, 0) has number 1",
    determines: Array.from({ length: determined }, (_, col) => ({ row: 0, col })),
    surplus: false,
  };
}

const FIVE = [1, 2, 3, 4, 5].map((n) => generated(`clue-${n}`, 1));

describe("partitionClues", () => {
  it("deals round-robin in clue order", () => {
    expect(partitionClues(FIVE, ["alice", "bob"], "round-robin")).toEqual({
      alice: ["clue-1", "clue-3", "clue-5"],
      bob: ["clue-2", "clue-4"],
    });
  });

  it("balances usefulness under the weighted policy", () => {
    const clues = [
      generated("clue-1", 3),
      generated("clue-2", 1),
      generated("clue-3", 0),
      generated("clue-4", 2),
    ];

    expect(partitionClues(clues, ["alice", "bob"], "weighted")).toEqual({
      alice: ["clue-1", "clue-3"],
      bob: ["clue-2", "clue-4"],
    });
  });

  it("covers every clue exactly once", () => {
    for (const policy of ["round-robin", "weighted"] as const) {
      const holdings = partitionClues(FIVE, ["a", "b", "c"], policy);
      const dealt = Object.values(holdings).flat().sort();

      expect(dealt).toEqual(FIVE.map((clue) => clue.id).sort());
    }
  });

  it("gives empty hands when there are more players than clues", () => {
    expect(partitionClues(FIVE.slice(0, 1), ["a", "b"], "round-robin")).toEqual({
      a: ["clue-1"],
      b: [],
    });
  });

  it("returns nothing for an empty roster", () => {
    expect(partitionClues(FIVE, [], "round-robin")).toEqual({});
  });
});

describe("redistributeOrphans", () => {
  it("hands clues nobody holds to the remaining players", () => {
    const holdings: ClueHoldings = { alice: ["clue-1", "clue-3"], bob: ["clue-2"] };

    const orphans = redistributeOrphans(FIVE, holdings, ["alice", "bob"]);

    expect(orphans).toEqual(["clue-4", "clue-5"]);
    expect(holdings).toEqual({
      alice: ["clue-1", "clue-3", "clue-4"],
      bob: ["clue-2", "clue-5"],
    });
  });

  it("does nothing without players", () => {
    const holdings: ClueHoldings = {};

    expect(redistributeOrphans(FIVE, holdings, [])).toEqual([]);
    expect(holdings).toEqual({});
  });
});
