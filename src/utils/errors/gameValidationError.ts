// utils/errors/gameValidationError.ts
import { GameRuleError, type GameRuleErrorCode } from './gameRuleError.js';

export interface ValidationIssue {
  code: string;
  message: string;
  path: string[];
}

export class GameValidationError extends GameRuleError {
  constructor(
    message: string,
    public readonly details?: {
      issues?: ValidationIssue[];
      input?: unknown;
    },
    code: Extract<GameRuleErrorCode, 'INVALID_INPUT' | 'INVALID_GUESS' | 'INVALID_CONFIG'> = 'INVALID_INPUT',
  ) {
    super(code, message);
    this.name = 'GameValidationError';
  }
}

/** Guess outside the legal set of the round being played. */
export class InvalidGuessError extends GameValidationError {
  constructor(message: string, details?: GameValidationError['details']) {
    super(message, details, 'INVALID_GUESS');
    this.name = 'InvalidGuessError';
  }
}

export class ConfigError extends GameValidationError {
  constructor(message: string, details?: GameValidationError['details']) {
    super(message, details, 'INVALID_CONFIG');
    this.name = 'ConfigError';
  }
}
