import { SHAPES, type Attribute, type Position, type Shape } from "../typedefs.js";
import { mulberry32, pickOne, randomInt } from "./Random.js";

export interface Cell {
  readonly shape: Shape;
  readonly number: number;
}

/**
 * Hidden ground truth of a session: an N×N grid of (shape, number) pairs with
 * numbers drawn from 1..N. Immutable once generated.
 */
export interface Board {
  readonly size: number;
  readonly cells: readonly (readonly Cell[])[];
}

/** Deterministic for a given seed; cells may repeat. */
export function generateBoard(size: number, seed: number): Board {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Board size must be a positive integer, got ${size}`);
  }

  const rng = mulberry32(seed);
  const cells = Array.from({ length: size }, () =>
    Array.from({ length: size }, (): Cell => ({
      shape: pickOne(rng, SHAPES),
      number: randomInt(rng, size) + 1,
    })),
  );

  return { size, cells };
}

export function isInBounds(board: Pick<Board, "size">, { row, col }: Position): boolean {
  return (
    Number.isInteger(row) &&
    Number.isInteger(col) &&
    row >= 0 &&
    col >= 0 &&
    row < board.size &&
    col < board.size
  );
}

export function cellAt(board: Board, position: Position): Cell {
  const cell = board.cells[position.row]?.[position.col];
  if (!cell) {
    throw new RangeError(`Position (${position.row}, ${position.col}) is outside the board`);
  }
  return cell;
}

export function attributeOf(cell: Cell, attribute: Attribute): Shape | number {
  return attribute === "shape" ? cell.shape : cell.number;
}

export function positionsOf(size: number): Position[] {
  return Array.from({ length: size * size }, (_, index) => ({
    row: Math.floor(index / size),
    col: index % size,
  }));
}
