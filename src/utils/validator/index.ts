export * from './guess.validator.js';
export * from './setup.validator.js';
export * from './config.validator.js';
