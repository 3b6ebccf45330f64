/**
 * Raised when no board within the attempt budget could be fully determined
 * by a clue pool under the configured size limit. This is a configuration
 * problem for whoever creates the session, never an in-game condition.
 */
export class PuzzleGenerationError extends Error {
  constructor(
    public readonly boardSize: number,
    public readonly attempts: number,
  ) {
    super(
      `Could not generate a solvable ${boardSize}x${boardSize} puzzle in ${attempts} attempts`,
    );
    this.name = "PuzzleGenerationError";
  }
}
