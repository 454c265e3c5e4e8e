import type {
  CashOutOutcome,
  CasinoGameState,
  CasinoRoundOutcome,
  PublicCasinoState,
} from '../types/casino.js';
import type { CasinoGuess } from '../utils/validator/guess.validator.js';
import type { GameConfig } from '../utils/validator/config.validator.js';
import { defaultGameConfig, parseGameConfig } from '../config/gameConfig.js';
import { newShuffledDeck } from './logic/deck.js';
import { CasinoRoundManager, applyTransition, type Transition } from './state/index.js';
import { ErrorHandler } from '../utils/errors/errorHandler.js';
import { BetSchema, SeedSchema } from '../utils/validator/setup.validator.js';
import { validateInput } from '../utils/validate.js';
import logger from '../utils/logger.js';

export function startCasinoGame(
  bet: number,
  seed: string | number,
  config: GameConfig = defaultGameConfig(),
): CasinoGameState {
  return ErrorHandler.monitor({ operation: 'startCasinoGame' }, (): CasinoGameState => {
    const validBet = validateInput(BetSchema, bet, 'bet');
    const validSeed = validateInput(SeedSchema, seed, 'seed');
    const validConfig = parseGameConfig(config);
    logger.info(`[CASINO] New game, bet ${validBet}`, { seed: validSeed });

    return {
      seed: validSeed,
      config: validConfig,
      bet: validBet,
      round: 1,
      multiplier: 1,
      drawn: [],
      suitsSeen: [],
      status: 'in_progress',
      payout: null,
      deck: newShuffledDeck(validSeed),
    };
  });
}

export function playCasinoRound(
  state: CasinoGameState,
  guess: CasinoGuess,
): Transition<CasinoGameState, CasinoRoundOutcome> {
  return applyTransition(state, { operation: 'playCasinoRound', phase: `round ${state.round}` }, (draft) =>
    new CasinoRoundManager(draft).play(guess),
  );
}

export function cashOut(state: CasinoGameState): Transition<CasinoGameState, CashOutOutcome> {
  return applyTransition(state, { operation: 'cashOut', phase: `round ${state.round}` }, (draft) =>
    new CasinoRoundManager(draft).cashOut(),
  );
}

/** What the next correct guess would pay out; null once the game is over. */
export function potentialPayout(state: CasinoGameState): number | null {
  if (state.status !== 'in_progress') return null;
  return state.bet * state.multiplier * state.config.casino.round_multipliers[state.round - 1];
}

export function toPublicCasinoState(state: CasinoGameState): PublicCasinoState {
  const { seed, deck, config, ...visible } = state;
  return { ...structuredClone(visible), deckSize: deck.cards.length };
}
