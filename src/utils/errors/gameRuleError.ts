// utils/errors/gameRuleError.ts
export type GameRuleErrorCode =
  | 'INVALID_STATE'
  | 'INVALID_GUESS'
  | 'EMPTY_DECK'
  | 'EMPTY_HAND'
  | 'INVALID_INPUT'
  | 'INVALID_CONFIG';

export class GameRuleError extends Error {
  constructor(
    public readonly code: GameRuleErrorCode,
    message: string,
    public readonly context?: Record<string, string | number | boolean | null>,
  ) {
    super(message);
    this.name = 'GameRuleError';
  }
}

/** Operation not valid for the current phase, round, player turn or status. */
export class InvalidStateError extends GameRuleError {
  constructor(message: string, context?: Record<string, string | number | boolean | null>) {
    super('INVALID_STATE', message, context);
    this.name = 'InvalidStateError';
  }
}

/** Deck exhausted. Fatal for the game: the deck is provisioned for the maximum table. */
export class EmptyDeckError extends GameRuleError {
  constructor(message = 'Cannot draw from an empty deck') {
    super('EMPTY_DECK', message);
    this.name = 'EmptyDeckError';
  }
}

export class EmptyHandError extends GameRuleError {
  constructor(message: string, context?: Record<string, string | number | boolean | null>) {
    super('EMPTY_HAND', message, context);
    this.name = 'EmptyHandError';
  }
}
