/** Malformed command input: bad identifiers, out-of-range settings, unreadable payloads. */
export class GameCommandInputError extends Error {
  constructor(
    message: string,
    public readonly issues: ReadonlyArray<string>,
  ) {
    super(message);
    this.name = "GameCommandInputError";
  }

  static because(issues: readonly string[], subject = "command input"): GameCommandInputError {
    const [onlyIssue] = issues;
    if (issues.length === 1 && onlyIssue !== undefined) {
      return new GameCommandInputError(onlyIssue, issues);
    }
    const message =
      issues.length === 0 ? `Invalid ${subject}` : `Invalid ${subject}: ${issues.join("; ")}`;
    return new GameCommandInputError(message, issues);
  }
}
