export { DealManager } from './DealManager.js';
export { PyramidManager, PYRAMID_ROWS, PYRAMID_SIZE } from './PyramidManager.js';
export { BusManager } from './BusManager.js';
export { CasinoRoundManager } from './CasinoRoundManager.js';
export { applyTransition, type Transition } from './transition.js';
