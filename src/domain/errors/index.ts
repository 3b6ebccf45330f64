import { GameCommandInputError } from "./GameCommandInputError.js";
import { GameRuleError, type GameRuleErrorKind } from "./GameRuleError.js";
import { LobbyNotFoundError } from "./LobbyNotFoundError.js";
import { PuzzleGenerationError } from "./PuzzleGenerationError.js";
import { SessionNotFoundError } from "./SessionNotFoundError.js";

export { GameCommandInputError } from "./GameCommandInputError.js";
export { GameRuleError } from "./GameRuleError.js";
export type { GameRuleErrorKind } from "./GameRuleError.js";
export { InvalidSessionStateError } from "./InvalidSessionStateError.js";
export { LobbyNotFoundError } from "./LobbyNotFoundError.js";
export { PuzzleGenerationError } from "./PuzzleGenerationError.js";
export { SessionNotFoundError } from "./SessionNotFoundError.js";

export type GameErrorKind =
  | GameRuleErrorKind
  | "InvalidInput"
  | "SessionNotFound"
  | "LobbyNotFound"
  | "GenerationFailed"
  | "Internal";

/** Serializable error reported to the requesting client only */
export interface GameError {
  readonly kind: GameErrorKind;
  readonly message: string;
  readonly issues?: readonly string[];
}

export function toGameError(error: unknown): GameError {
  if (error instanceof GameRuleError) {
    return { kind: error.kind, message: error.message };
  }
  if (error instanceof GameCommandInputError) {
    return { kind: "InvalidInput", message: error.message, issues: [...error.issues] };
  }
  if (error instanceof SessionNotFoundError) {
    return { kind: "SessionNotFound", message: error.message };
  }
  if (error instanceof LobbyNotFoundError) {
    return { kind: "LobbyNotFound", message: error.message };
  }
  if (error instanceof PuzzleGenerationError) {
    return { kind: "GenerationFailed", message: error.message };
  }
  return { kind: "Internal", message: "Unexpected server error" };
}

/** Errors a caller caused, as opposed to faults inside the engine */
export function isExpectedError(error: unknown): boolean {
  return (
    error instanceof GameRuleError ||
    error instanceof GameCommandInputError ||
    error instanceof SessionNotFoundError ||
    error instanceof LobbyNotFoundError
  );
}
