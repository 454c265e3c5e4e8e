import type { ZodType } from 'zod';
import { GameValidationError, InvalidGuessError, type ValidationIssue } from './errors/gameValidationError.js';

type ErrorFactory = (message: string, details: GameValidationError['details']) => GameValidationError;

const toValidationError: ErrorFactory = (message, details) => new GameValidationError(message, details);

export function validateInput<T>(
  schema: ZodType<T>,
  input: unknown,
  label: string,
  makeError: ErrorFactory = toValidationError,
): T {
  const parsed = schema.safeParse(input);

  if (!parsed.success) {
    const issues: ValidationIssue[] = parsed.error.issues.map((issue) => ({
      code: issue.code,
      message: issue.message,
      path: issue.path.map((segment) => String(segment)),
    }));
    throw makeError(`Invalid ${label}`, { issues, input });
  }

  return parsed.data;
}

export function parseGuess<T>(schema: ZodType<T>, input: unknown, round: string): T {
  return validateInput(schema, input, `guess for ${round}`, (message, details) => new InvalidGuessError(message, details));
}
