import { SHAPES, type Attribute, type Position } from "../typedefs.js";
import { attributeOf, cellAt, type Board } from "./Board.js";
import { scopePositions, type AttributeValue, type Clue, type Fact } from "./Clue.js";

/**
 * Finite-domain view of a clue pool.
 *
 * Every cell contributes two variables (shape, number). A domain is a bitmask
 * over the variable's possible values: shapes map to bits by their index in
 * {@link SHAPES}, numbers `n` map to bit `n - 1`. Each clue compiles to one
 * constraint over these variables.
 */
export type Domains = number[];

type Constraint =
  | { readonly kind: "fix"; readonly variable: number; readonly mask: number }
  | {
      readonly kind: "implies";
      readonly when: number;
      readonly whenMask: number;
      readonly then: number;
      readonly thenMask: number;
    }
  | {
      readonly kind: "count";
      readonly variables: readonly number[];
      readonly mask: number;
      readonly count: number;
    };

type SearchOutcome = "found" | "none" | "budget";

interface Budget {
  remaining: number;
}

export const DEFAULT_NODE_BUDGET = 4_000;

export function variableOf(size: number, position: Position, attribute: Attribute): number {
  return (position.row * size + position.col) * 2 + (attribute === "shape" ? 0 : 1);
}

export function positionOfVariable(size: number, variable: number): Position {
  const cell = Math.floor(variable / 2);
  return { row: Math.floor(cell / size), col: cell % size };
}

export function valueMask(value: AttributeValue): number {
  return value.attribute === "shape"
    ? 1 << SHAPES.indexOf(value.value)
    : Number.isInteger(value.value) && value.value >= 1
      ? 1 << (value.value - 1)
      : 0;
}

export function isFixed(domain: number): boolean {
  return domain !== 0 && (domain & (domain - 1)) === 0;
}

function bitsOf(domain: number): number[] {
  const bits: number[] = [];
  for (let rest = domain; rest !== 0; rest &= rest - 1) {
    bits.push(rest & -rest);
  }
  return bits;
}

function compile(size: number, clue: Clue): Constraint {
  const variable = (fact: Fact): number => variableOf(size, fact.position, fact.attribute);

  switch (clue.kind) {
    case "explicit":
      return { kind: "fix", variable: variable(clue), mask: valueMask(clue) };
    case "general":
      return {
        kind: "count",
        variables: scopePositions(size, clue.scope, clue.index).map((position) =>
          variableOf(size, position, clue.attribute),
        ),
        mask: valueMask(clue),
        count: clue.count,
      };
    case "conditional":
      return {
        kind: "implies",
        when: variable(clue.condition),
        whenMask: valueMask(clue.condition),
        then: variable(clue.consequence),
        thenMask: valueMask(clue.consequence),
      };
  }
}

/** Narrows `domains` in place until a fixpoint; false on contradiction. */
function propagate(domains: Domains, constraints: readonly Constraint[]): boolean {
  const narrow = (variable: number, next: number): boolean | undefined => {
    if (next === 0) return undefined;
    if (next === domains[variable]) return false;
    domains[variable] = next;
    return true;
  };

  let changed = true;
  while (changed) {
    changed = false;

    for (const constraint of constraints) {
      switch (constraint.kind) {
        case "fix": {
          const result = narrow(constraint.variable, domains[constraint.variable] & constraint.mask);
          if (result === undefined) return false;
          changed ||= result;
          break;
        }

        case "implies": {
          const { when, whenMask, then, thenMask } = constraint;
          if (domains[when] === whenMask) {
            const result = narrow(then, domains[then] & thenMask);
            if (result === undefined) return false;
            changed ||= result;
          } else if ((domains[then] & thenMask) === 0 && (domains[when] & whenMask) !== 0) {
            const result = narrow(when, domains[when] & ~whenMask);
            if (result === undefined) return false;
            changed ||= result;
          }
          break;
        }

        case "count": {
          const { variables, mask, count } = constraint;
          let sure = 0;
          let possible = 0;
          for (const variable of variables) {
            const domain = domains[variable];
            if ((domain & mask) !== 0) {
              possible += 1;
              if (domain === mask) sure += 1;
            }
          }

          if (sure > count || possible < count) return false;

          if (sure === count && possible > sure) {
            for (const variable of variables) {
              const domain = domains[variable];
              if ((domain & mask) !== 0 && domain !== mask) {
                domains[variable] = domain & ~mask;
                changed = true;
              }
            }
          } else if (possible === count && sure < possible) {
            for (const variable of variables) {
              const domain = domains[variable];
              if ((domain & mask) !== 0 && domain !== mask) {
                domains[variable] = mask;
                changed = true;
              }
            }
          }
          break;
        }
      }
    }
  }

  return true;
}

function branchVariable(domains: Domains): number {
  let best = -1;
  let bestWidth = Number.POSITIVE_INFINITY;
  for (let variable = 0; variable < domains.length; variable += 1) {
    const domain = domains[variable];
    if (isFixed(domain)) continue;
    const width = bitsOf(domain).length;
    if (width < bestWidth) {
      best = variable;
      bestWidth = width;
    }
  }
  return best;
}

function findSolution(
  domains: Domains,
  constraints: readonly Constraint[],
  budget: Budget,
): SearchOutcome {
  if (budget.remaining <= 0) return "budget";
  budget.remaining -= 1;

  const working = [...domains];
  if (!propagate(working, constraints)) return "none";

  const variable = branchVariable(working);
  if (variable === -1) return "found";

  for (const bit of bitsOf(working[variable])) {
    const next = [...working];
    next[variable] = bit;
    const outcome = findSolution(next, constraints, budget);
    if (outcome !== "none") return outcome;
  }
  return "none";
}

function countSolutionsFrom(
  domains: Domains,
  constraints: readonly Constraint[],
  limit: number,
): number {
  const working = [...domains];
  if (!propagate(working, constraints)) return 0;

  const variable = branchVariable(working);
  if (variable === -1) return 1;

  let total = 0;
  for (const bit of bitsOf(working[variable])) {
    const next = [...working];
    next[variable] = bit;
    total += countSolutionsFrom(next, constraints, limit - total);
    if (total >= limit) break;
  }
  return total;
}

export class ClueSolver {
  readonly #size: number;
  readonly #clues: readonly Clue[];
  readonly #constraints: readonly Constraint[];

  constructor(size: number, clues: readonly Clue[] = []) {
    this.#size = size;
    this.#clues = [...clues];
    this.#constraints = clues.map((clue) => compile(size, clue));
  }

  get size(): number {
    return this.#size;
  }

  get clues(): readonly Clue[] {
    return this.#clues;
  }

  withClue(clue: Clue): ClueSolver {
    return new ClueSolver(this.#size, [...this.#clues, clue]);
  }

  initialDomains(): Domains {
    const shapeMask = (1 << SHAPES.length) - 1;
    const numberMask = (1 << this.#size) - 1;
    return Array.from({ length: this.#size * this.#size * 2 }, (_, variable) =>
      variable % 2 === 0 ? shapeMask : numberMask,
    );
  }

  /** Domains after propagating every clue, or null when the pool contradicts itself. */
  propagate(): Domains | null {
    const domains = this.initialDomains();
    return propagate(domains, this.#constraints) ? domains : null;
  }

  /** Number of boards satisfying the pool, counted up to `limit`. */
  countSolutions(limit = 2): number {
    return countSolutionsFrom(this.initialDomains(), this.#constraints, limit);
  }

  /**
   * Whether `truth` is the only board consistent with the pool. Returns false
   * when the search budget runs out before uniqueness is proven.
   */
  isUnique(truth: Board, nodeBudget = DEFAULT_NODE_BUDGET): boolean {
    const domains = this.propagate();
    if (!domains) return false;

    const budget: Budget = { remaining: nodeBudget };
    for (let variable = 0; variable < domains.length; variable += 1) {
      if (isFixed(domains[variable])) continue;

      const truthMask = this.#truthMask(truth, variable);
      for (const bit of bitsOf(domains[variable])) {
        if (bit === truthMask) continue;
        const probe = [...domains];
        probe[variable] = bit;
        if (findSolution(probe, this.#constraints, budget) !== "none") {
          return false;
        }
        domains[variable] &= ~bit;
      }

      if (!propagate(domains, this.#constraints)) return false;
    }

    return true;
  }

  #truthMask(truth: Board, variable: number): number {
    const attribute: Attribute = variable % 2 === 0 ? "shape" : "number";
    const cell = cellAt(truth, positionOfVariable(this.#size, variable));
    const value = attributeOf(cell, attribute);
    return typeof value === "string"
      ? valueMask({ attribute: "shape", value })
      : valueMask({ attribute: "number", value });
  }
}
