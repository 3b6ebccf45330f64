export type PartitionPolicy = "round-robin" | "weighted";

export interface ScoringRules {
  /** Points for every attribute a guess newly reveals */
  readonly revealReward: number;
  /** Extra points when an untouched cell is fully resolved by a single guess */
  readonly fullCellBonus: number;
  /** Points deducted for every incorrectly guessed attribute */
  readonly incorrectPenalty: number;
  /** When false, scores never drop below zero */
  readonly allowNegativeScores: boolean;
}

export interface GameConfig {
  readonly boardSize: number;
  readonly minPlayers: number;
  readonly maxPlayers: number;
  readonly sessionDurationMs: number;
  /** Shared turn pool across all players; 0 disables the limit */
  readonly maxTurns: number;
  readonly surplusClues: number;
  /** Upper bound on pooled clues is `maxCluesPerCell * boardSize²` */
  readonly maxCluesPerCell: number;
  readonly generationAttempts: number;
  readonly partitionPolicy: PartitionPolicy;
  readonly scoring: ScoringRules;
}

export type GameConfigOverrides = Partial<Omit<GameConfig, "scoring">> & {
  readonly scoring?: Partial<ScoringRules>;
};

export const MIN_BOARD_SIZE = 2;
export const MAX_BOARD_SIZE = 6;
/** Keeps the expiry timer delay inside what `setTimeout` accepts */
export const MAX_SESSION_DURATION_MS = 24 * 60 * 60_000;

export function createGameConfig(overrides: GameConfigOverrides = {}): GameConfig {
  return {
    boardSize: overrides.boardSize ?? 4,
    minPlayers: overrides.minPlayers ?? 2,
    maxPlayers: overrides.maxPlayers ?? 4,
    sessionDurationMs: overrides.sessionDurationMs ?? 900_000,
    maxTurns: overrides.maxTurns ?? 50,
    surplusClues: overrides.surplusClues ?? 3,
    maxCluesPerCell: overrides.maxCluesPerCell ?? 3,
    generationAttempts: overrides.generationAttempts ?? 8,
    partitionPolicy: overrides.partitionPolicy ?? "round-robin",
    scoring: {
      revealReward: overrides.scoring?.revealReward ?? 10,
      fullCellBonus: overrides.scoring?.fullCellBonus ?? 5,
      incorrectPenalty: overrides.scoring?.incorrectPenalty ?? 5,
      allowNegativeScores: overrides.scoring?.allowNegativeScores ?? false,
    },
  };
}

export function validateGameConfig(config: GameConfig): readonly string[] {
  const issues: string[] = [];

  if (
    !Number.isInteger(config.boardSize) ||
    config.boardSize < MIN_BOARD_SIZE ||
    config.boardSize > MAX_BOARD_SIZE
  ) {
    issues.push(`boardSize must be an integer between ${MIN_BOARD_SIZE} and ${MAX_BOARD_SIZE}`);
  }

  if (!Number.isInteger(config.minPlayers) || config.minPlayers < 1) {
    issues.push("minPlayers must be an integer greater than or equal to 1");
  }

  if (!Number.isInteger(config.maxPlayers) || config.maxPlayers < config.minPlayers) {
    issues.push("maxPlayers must be an integer greater than or equal to minPlayers");
  }

  if (
    !Number.isFinite(config.sessionDurationMs) ||
    config.sessionDurationMs <= 0 ||
    config.sessionDurationMs > MAX_SESSION_DURATION_MS
  ) {
    issues.push(`sessionDurationMs must be between 1 and ${MAX_SESSION_DURATION_MS}`);
  }

  if (!isNonNegativeInteger(config.maxTurns)) {
    issues.push("maxTurns must be a non-negative integer");
  }

  if (!isNonNegativeInteger(config.surplusClues)) {
    issues.push("surplusClues must be a non-negative integer");
  }

  if (!Number.isInteger(config.maxCluesPerCell) || config.maxCluesPerCell < 2) {
    issues.push("maxCluesPerCell must be an integer greater than or equal to 2");
  }

  if (!Number.isInteger(config.generationAttempts) || config.generationAttempts < 1) {
    issues.push("generationAttempts must be an integer greater than or equal to 1");
  }

  if (config.partitionPolicy !== "round-robin" && config.partitionPolicy !== "weighted") {
    issues.push("partitionPolicy must be either round-robin or weighted");
  }

  const { revealReward, fullCellBonus, incorrectPenalty } = config.scoring;
  if (![revealReward, fullCellBonus, incorrectPenalty].every(isNonNegativeInteger)) {
    issues.push("scoring rewards and penalties must be non-negative integers");
  }

  return issues;
}

function isNonNegativeInteger(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}
