import type { Position, Shape } from "../typedefs.js";
import { attributeOf, cellAt, type Board } from "./Board.js";

export type AttributeValue =
  | { readonly attribute: "shape"; readonly value: Shape }
  | { readonly attribute: "number"; readonly value: number };

/** One attribute of one cell holding one value */
export type Fact = AttributeValue & { readonly position: Position };

export type Scope = "row" | "column";

export type ExplicitClue = { readonly kind: "explicit" } & Fact;

export type GeneralClue = {
  readonly kind: "general";
  readonly scope: Scope;
  readonly index: number;
  /** Exactly this many cells of the row/column hold the value; 0 states absence */
  readonly count: number;
} & AttributeValue;

export interface ConditionalClue {
  readonly kind: "conditional";
  readonly condition: Fact;
  readonly consequence: Fact;
}

export type Clue = ExplicitClue | GeneralClue | ConditionalClue;

export function factHolds(board: Board, fact: Fact): boolean {
  return attributeOf(cellAt(board, fact.position), fact.attribute) === fact.value;
}

export function scopePositions(size: number, scope: Scope, index: number): Position[] {
  return Array.from({ length: size }, (_, offset) =>
    scope === "row" ? { row: index, col: offset } : { row: offset, col: index },
  );
}

/** Whether the clue is true of the given board. */
export function evaluateClue(clue: Clue, board: Board): boolean {
  switch (clue.kind) {
    case "explicit":
      return factHolds(board, clue);
    case "general": {
      const matches = scopePositions(board.size, clue.scope, clue.index).filter(
        (position) => factHolds(board, { ...clue, position }),
      );
      return matches.length === clue.count;
    }
    case "conditional":
      return !factHolds(board, clue.condition) || factHolds(board, clue.consequence);
  }
}

/** Cells a clue talks about, in the order they appear in its text. */
export function referencedPositions(clue: Clue, size: number): Position[] {
  switch (clue.kind) {
    case "explicit":
      return [clue.position];
    case "general":
      return scopePositions(size, clue.scope, clue.index);
    case "conditional":
      return [clue.condition.position, clue.consequence.position];
  }
}

const SHAPE_PLURALS: Record<Shape, string> = {
  circle: "circles",
  square: "squares",
  star: "stars",
  heart: "hearts",
};

function describeFact(fact: Fact): string {
  return `cell (${fact.position.row}, ${fact.position.col}) has ${fact.attribute} ${fact.value}`;
}

function describeCount(clue: GeneralClue): string {
  if (clue.attribute === "shape") {
    return `${clue.count} ${clue.count === 1 ? clue.value : SHAPE_PLURALS[clue.value]}`;
  }
  return `${clue.count} ${clue.count === 1 ? "cell" : "cells"} with number ${clue.value}`;
}

export function describeClue(clue: Clue): string {
  switch (clue.kind) {
    case "explicit": {
      const text = describeFact(clue);
      return text.charAt(0).toUpperCase() + text.slice(1);
    }
    case "general":
      return `${clue.scope === "row" ? "Row" : "Column"} ${clue.index} has ${describeCount(clue)}`;
    case "conditional":
      return `If ${describeFact(clue.condition)}, then ${describeFact(clue.consequence)}`;
  }
}

/** Stable identity of a clue's content, used to drop duplicates. */
export function clueKey(clue: Clue): string {
  const fact = (f: Fact): string => `${f.position.row}:${f.position.col}:${f.attribute}=${f.value}`;
  switch (clue.kind) {
    case "explicit":
      return `E|${fact(clue)}`;
    case "general":
      return `G|${clue.scope}:${clue.index}:${clue.attribute}=${clue.value}#${clue.count}`;
    case "conditional":
      return `C|${fact(clue.condition)}>${fact(clue.consequence)}`;
  }
}
