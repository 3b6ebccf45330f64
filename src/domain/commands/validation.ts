import { GameCommandInputError } from "../errors/GameCommandInputError.js";
import type { PlayerId } from "../typedefs.js";

const WHITESPACE_PATTERN = /\s/;
const MAX_NAME_LENGTH = 32;

export function isValidPlayerId(id: unknown): id is PlayerId {
  return typeof id === "string" && id.length > 0 && !WHITESPACE_PATTERN.test(id);
}

export function isValidAggregateId(id: unknown): id is string {
  return isValidPlayerId(id);
}

/** Throws unless every named identifier is a non-empty string without whitespace. */
export function assertIdentifiers(ids: Record<string, unknown>): void {
  const issues = Object.entries(ids)
    .filter(([, value]) => !isValidAggregateId(value))
    .map(([label]) => `${label} must be a non-empty string without whitespace`);

  if (issues.length > 0) {
    throw GameCommandInputError.because(issues);
  }
}

/** Trims a display name, falling back to the player id when blank. */
export function normalizeName(name: string | undefined, fallback: PlayerId): string {
  const trimmed = (name ?? "").trim().slice(0, MAX_NAME_LENGTH);
  return trimmed.length > 0 ? trimmed : fallback;
}
