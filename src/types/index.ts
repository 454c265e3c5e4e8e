export * from './card.js';
export type * from './social.js';
export type * from './casino.js';
