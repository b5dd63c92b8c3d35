// Rule violations reject a command and leave the state untouched.
export type GameErrorCode =
  | 'INVALID_PHASE'
  | 'NOT_SEATED'
  | 'NOT_YOUR_TURN'
  | 'INSUFFICIENT_CHIPS'
  | 'NOTHING_TO_CALL'
  | 'CANNOT_CHECK'
  | 'ILLEGAL_OPEN_BET'
  | 'INVALID_AMOUNT'
  | 'UNKNOWN_ACTION'
  | 'ALREADY_SEATED'
  | 'TABLE_FULL'
  | 'NOT_ENOUGH_PLAYERS';

export class GameRuleError extends Error {
  constructor(
    public readonly code: GameErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'GameRuleError';
  }
}

// Internal consistency failures. These are bugs or broken configuration, never player input.
export type EngineFailureCode = 'NO_VALID_WINNER' | 'TIE_UNRESOLVED' | 'EMPTY_DECK' | 'MISSING_CARD';

export class GameEngineError extends Error {
  constructor(
    public readonly code: EngineFailureCode,
    message: string
  ) {
    super(message);
    this.name = 'GameEngineError';
  }
}
