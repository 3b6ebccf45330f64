export type GameRuleErrorKind =
  | "NotYourTurn"
  | "GameNotPlaying"
  | "GameAlreadyStarted"
  | "InvalidPosition"
  | "AttributeAlreadyRevealed"
  | "InvalidGuess"
  | "InvalidShare"
  | "SessionFull"
  | "LobbyFull"
  | "NotHost"
  | "NotEnoughPlayers"
  | "StaleSession"
  | "StalePlayer";

/**
 * A request that breaks a game rule. Always recoverable and reported only to
 * the requesting player; commands raise it before touching any state.
 */
export class GameRuleError extends Error {
  constructor(
    public readonly kind: GameRuleErrorKind,
    message: string,
  ) {
    super(message);
    this.name = "GameRuleError";
  }
}
