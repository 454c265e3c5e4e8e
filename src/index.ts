// Ride the Bus rule engine: state-in/state-out transitions for the social and casino variants.
export * from './types/index.js';
export * from './utils/errors/index.js';
export { GuessSchema, RoundGuessSchemas, GameConfigSchema } from './utils/validator/index.js';
export type { Guess, CasinoGuess, ColorGuess, DirectionGuess, RangeGuess, SuitGuess, GameConfig } from './utils/validator/index.js';

export { defaultGameConfig, parseGameConfig, loadGameConfig, loadGameConfigFile } from './config/gameConfig.js';

export {
  newShuffledDeck,
  draw,
  createStandardDeck,
  rankOf,
  colorOf,
  compareRank,
  sameCard,
  cardLabel,
} from './engine/logic/deck.js';
export { selectRider } from './engine/logic/rider.js';
export type { Transition } from './engine/state/transition.js';

export {
  createSocialGame,
  currentTurn,
  playDealRound,
  startPyramid,
  flipPyramidCard,
  commitMatch,
  startBus,
  flipBusCard,
  toggleMode,
  unitLabels,
  rematch,
  maxPlayers,
  toPublicSocialState,
} from './engine/socialEngine.js';

export { startCasinoGame, playCasinoRound, cashOut, potentialPayout, toPublicCasinoState } from './engine/casinoEngine.js';
export { adviseCasino } from './engine/strategyAdvisor.js';
