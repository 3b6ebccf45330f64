/**
 * Identifiers, coordinates and phase tags shared by the board, the clues
 * and the session state machine.
 */

/** Unique identifier of a game session */
export type SessionId = string;

/** Unique identifier of a lobby */
export type LobbyId = string;

/** Opaque per-browser-session player handle */
export type PlayerId = string;

/** Identifier of a generated clue, unique within its session */
export type ClueId = string;

/** Absolute time point in milliseconds since Unix epoch */
export type TimePoint = number;

/** The fixed shape alphabet a cell can hold */
export const SHAPES = ["circle", "square", "star", "heart"] as const;

export type Shape = (typeof SHAPES)[number];

/** One of the two hidden facets of a cell */
export type Attribute = "shape" | "number";

export const ATTRIBUTES: readonly Attribute[] = ["shape", "number"];

/** Zero-based grid coordinate */
export interface Position {
  readonly row: number;
  readonly col: number;
}

/** `"row,col"` key used for per-cell records */
export type CellKey = `${number},${number}`;

/** Session lifecycle phase */
export type SessionPhase = "waiting" | "playing" | "finished";

/** Why a session reached the `finished` phase */
export type FinishReason =
  | "all_solved"
  | "time_expired"
  | "turns_exhausted"
  | "insufficient_players"
  | "terminated";

export function isShape(value: unknown): value is Shape {
  return SHAPES.some((shape) => shape === value);
}

export function cellKey({ row, col }: Position): CellKey {
  return `${row},${col}`;
}
