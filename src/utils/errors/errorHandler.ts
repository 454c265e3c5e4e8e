// utils/errors/errorHandler.ts
import logger from '../logger.js';
import { GameRuleError } from './gameRuleError.js';
import { GameValidationError } from './gameValidationError.js';

export interface OperationContext {
  operation: string;
  phase?: string;
  playerId?: string;
}

const SLOW_OPERATION_MS = 50;

export class ErrorHandler {
  static handleError(error: unknown, context: OperationContext): never {
    const { operation, phase, playerId } = context;

    if (error instanceof GameValidationError) {
      logger.warn(`[VALIDATION_ERROR] ${operation}`, {
        phase,
        playerId,
        code: error.code,
        message: error.message,
        issues: error.details?.issues?.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
      throw error;
    }

    if (error instanceof GameRuleError) {
      logger.warn(`[RULE_ERROR] ${operation}`, {
        phase,
        playerId,
        code: error.code,
        message: error.message,
        context: error.context,
      });
      throw error;
    }

    if (error instanceof Error) {
      logger.error(`[ENGINE_ERROR] ${operation}`, {
        phase,
        playerId,
        error: error.message,
        stack: error.stack,
      });
      throw error;
    }

    logger.error(`[UNKNOWN_ERROR] ${operation}`, { phase, playerId, error });
    throw new Error(`Unknown failure in ${operation}`);
  }

  /** Runs a synchronous engine operation, timing it and routing failures through handleError. */
  static monitor<T>(context: OperationContext, fn: () => T): T {
    const start = process.hrtime.bigint();

    try {
      return fn();
    } catch (error) {
      return ErrorHandler.handleError(error, context);
    } finally {
      const duration = Number(process.hrtime.bigint() - start) / 1_000_000; // ms
      logger.debug('[PERF]', { operation: context.operation, duration });

      if (duration > SLOW_OPERATION_MS) {
        logger.warn('[PERF_SLOW]', { operation: context.operation, duration, threshold: SLOW_OPERATION_MS });
      }
    }
  }
}
