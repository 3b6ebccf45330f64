import { PuzzleGenerationError } from "../errors/PuzzleGenerationError.js";
import { SHAPES, cellKey, type ClueId, type Position } from "../typedefs.js";
import { cellAt, generateBoard, positionsOf, type Board } from "./Board.js";
import {
  clueKey,
  describeClue,
  type AttributeValue,
  type Clue,
  type Fact,
  type Scope,
} from "./Clue.js";
import { ClueSolver, DEFAULT_NODE_BUDGET, isFixed, positionOfVariable } from "./ClueSolver.js";
import { mulberry32, pickOne, type Rng } from "./Random.js";

export interface GeneratedClue {
  readonly id: ClueId;
  readonly clue: Clue;
  readonly text: string;
  /** Cells whose attributes became known once this clue joined the pool */
  readonly determines: readonly Position[];
  /** Redundant extra handed out for richer play */
  readonly surplus: boolean;
}

export interface GeneratedPuzzle {
  readonly board: Board;
  readonly clues: readonly GeneratedClue[];
  /** Seed of the attempt that produced the board */
  readonly seed: number;
  readonly attempts: number;
}

export interface GeneratePuzzleOptions {
  readonly size: number;
  readonly seed: number;
  /** Cap on clues needed to determine the board; surplus clues come on top */
  readonly maxClues?: number;
  readonly surplusClues?: number;
  readonly maxAttempts?: number;
  readonly nodeBudget?: number;
}

/** Unfixed variables left after propagation before a uniqueness search is tried. */
const SEARCH_THRESHOLD = 8;

const TRUE_CONDITION_RATIO = 0.85;

const RANK_PENALTY: Record<Clue["kind"], number> = {
  general: 0,
  conditional: 0.15,
  explicit: 0.5,
};

export function generatePuzzle({
  size,
  seed,
  maxClues = 3 * size * size,
  surplusClues = 0,
  maxAttempts = 8,
  nodeBudget = DEFAULT_NODE_BUDGET,
}: GeneratePuzzleOptions): GeneratedPuzzle {
  for (let attempt = 0; attempt < maxAttempts; attempt += 1) {
    const attemptSeed = (seed + Math.imul(attempt, 0x9e3779b1)) >>> 0;
    const board = generateBoard(size, attemptSeed);
    const rng = mulberry32(attemptSeed ^ 0x5bd1e995);

    const clues = buildCluePool(board, rng, { maxClues, surplusClues, nodeBudget });
    if (clues) {
      return { board, clues, seed: attemptSeed, attempts: attempt + 1 };
    }
  }

  throw new PuzzleGenerationError(size, maxAttempts);
}

interface PoolLimits {
  readonly maxClues: number;
  readonly surplusClues: number;
  readonly nodeBudget: number;
}

function buildCluePool(
  board: Board,
  rng: Rng,
  { maxClues, surplusClues, nodeBudget }: PoolLimits,
): GeneratedClue[] | null {
  const candidates = rankCandidates(candidateClues(board, rng), rng);
  const determined = (solver: ClueSolver): boolean => isDetermined(solver, board, nodeBudget);

  let solver = new ClueSolver(board.size);
  let domains = solver.initialDomains();
  let complete = false;
  const accepted: Clue[] = [];
  const spare: Clue[] = [];

  for (const clue of candidates) {
    if (complete) {
      spare.push(clue);
      continue;
    }

    const next = solver.withClue(clue);
    const nextDomains = next.propagate();
    if (!nextDomains || !narrows(domains, nextDomains)) {
      spare.push(clue);
      continue;
    }

    solver = next;
    domains = nextDomains;
    accepted.push(clue);
    complete = determined(solver);
  }

  if (!complete) return null;

  const essential = prune(accepted, board.size, determined);
  if (essential.length > maxClues) return null;

  return [
    ...tagDeterminations(essential, board.size),
    ...spare.slice(0, surplusClues).map((clue) => ({
      clue,
      text: describeClue(clue),
      determines: [],
      surplus: true,
    })),
  ].map((entry, index) => ({ id: `clue-${index + 1}`, ...entry }));
}

function isDetermined(solver: ClueSolver, board: Board, nodeBudget: number): boolean {
  const domains = solver.propagate();
  if (!domains) return false;

  const unfixed = domains.filter((domain) => !isFixed(domain)).length;
  if (unfixed === 0) return true;
  return unfixed <= SEARCH_THRESHOLD && solver.isUnique(board, nodeBudget);
}

function narrows(before: readonly number[], after: readonly number[]): boolean {
  return after.some((domain, variable) => domain !== before[variable]);
}

/** Drops clues the rest of the pool already implies, latest first. */
function prune(
  clues: readonly Clue[],
  size: number,
  determined: (solver: ClueSolver) => boolean,
): Clue[] {
  let kept = [...clues];
  for (let index = kept.length - 1; index >= 0; index -= 1) {
    const without = [...kept.slice(0, index), ...kept.slice(index + 1)];
    if (determined(new ClueSolver(size, without))) {
      kept = without;
    }
  }
  return kept;
}

function tagDeterminations(
  clues: readonly Clue[],
  size: number,
): Omit<GeneratedClue, "id">[] {
  const credited = new Set<string>();
  let solver = new ClueSolver(size);

  const tagged = clues.map((clue) => {
    solver = solver.withClue(clue);
    const domains = solver.propagate() ?? [];
    const determines: Position[] = [];

    domains.forEach((domain, variable) => {
      if (!isFixed(domain)) return;
      const position = positionOfVariable(size, variable);
      const key = cellKey(position);
      if (credited.has(key)) return;
      credited.add(key);
      determines.push(position);
    });

    return { clue, text: describeClue(clue), determines, surplus: false };
  });

  const last = tagged.at(-1);
  if (last) {
    const remaining = positionsOf(size).filter((position) => !credited.has(cellKey(position)));
    last.determines.push(...remaining);
  }

  return tagged;
}

function factAt(board: Board, position: Position, attribute: AttributeValue["attribute"]): Fact {
  const cell = cellAt(board, position);
  return attribute === "shape"
    ? { position, attribute, value: cell.shape }
    : { position, attribute, value: cell.number };
}

function falseFact(board: Board, position: Position, rng: Rng): Fact {
  const cell = cellAt(board, position);
  if (rng() < 0.5 || board.size < 2) {
    const others = SHAPES.filter((shape) => shape !== cell.shape);
    return { position, attribute: "shape", value: pickOne(rng, others) };
  }
  const others = Array.from({ length: board.size }, (_, index) => index + 1).filter(
    (value) => value !== cell.number,
  );
  return { position, attribute: "number", value: pickOne(rng, others) };
}

function attributeValues(size: number): AttributeValue[] {
  return [
    ...SHAPES.map((value): AttributeValue => ({ attribute: "shape", value })),
    ...Array.from({ length: size }, (_, index): AttributeValue => ({
      attribute: "number",
      value: index + 1,
    })),
  ];
}

/** Every candidate is true of `board`. */
function candidateClues(board: Board, rng: Rng): Clue[] {
  const { size } = board;
  const positions = positionsOf(size);
  const clues: Clue[] = [];

  for (const position of positions) {
    clues.push({ kind: "explicit", ...factAt(board, position, "shape") });
    clues.push({ kind: "explicit", ...factAt(board, position, "number") });
  }

  const scopes: Scope[] = ["row", "column"];
  for (const scope of scopes) {
    for (let index = 0; index < size; index += 1) {
      for (const value of attributeValues(size)) {
        const count = positions.filter((position) => {
          const inScope = scope === "row" ? position.row === index : position.col === index;
          return inScope && factAt(board, position, value.attribute).value === value.value;
        }).length;
        clues.push({ kind: "general", scope, index, count, ...value });
      }
    }
  }

  for (let made = 0; made < 2 * size * size; made += 1) {
    const from = pickOne(rng, positions);
    const to = pickOne(rng, positions);
    const consequence = factAt(board, to, rng() < 0.5 ? "shape" : "number");

    if (rng() < TRUE_CONDITION_RATIO) {
      const condition = factAt(board, from, rng() < 0.5 ? "shape" : "number");
      if (cellKey(from) === cellKey(to) && condition.attribute === consequence.attribute) {
        continue;
      }
      clues.push({ kind: "conditional", condition, consequence });
    } else {
      clues.push({ kind: "conditional", condition: falseFact(board, from, rng), consequence });
    }
  }

  return clues;
}

function rankCandidates(clues: readonly Clue[], rng: Rng): Clue[] {
  const seen = new Set<string>();
  const ranked: { readonly clue: Clue; readonly rank: number }[] = [];

  for (const clue of clues) {
    const key = clueKey(clue);
    if (seen.has(key)) continue;
    seen.add(key);
    ranked.push({ clue, rank: rng() + RANK_PENALTY[clue.kind] });
  }

  return ranked.sort((a, b) => a.rank - b.rank).map(({ clue }) => clue);
}
