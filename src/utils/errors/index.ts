export * from './gameRuleError.js';
export * from './gameValidationError.js';
export { ErrorHandler } from './errorHandler.js';
