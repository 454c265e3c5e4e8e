import type { Card, Deck, Suit } from './card.js';
import type { GameConfig } from '../utils/validator/config.validator.js';
import type { CasinoGuess } from '../utils/validator/guess.validator.js';

export type CasinoRound = 1 | 2 | 3 | 4;
export type CasinoStatus = 'in_progress' | 'cashed_out' | 'busted' | 'completed';

export interface CasinoGameState {
  seed: string;
  config: GameConfig;
  bet: number;
  round: CasinoRound;
  multiplier: number;
  drawn: Card[];
  suitsSeen: Suit[];
  status: CasinoStatus;
  payout: number | null;
  deck: Deck;
}

export interface CasinoRoundOutcome {
  type: 'casino_round';
  round: CasinoRound;
  guess: CasinoGuess;
  card: Card;
  correct: boolean;
  tie: boolean;
  multiplier: number;
  status: CasinoStatus;
  payout: number | null;
}

export interface CashOutOutcome {
  type: 'cash_out';
  round: CasinoRound;
  multiplier: number;
  payout: number;
}

export type CasinoOutcome = CasinoRoundOutcome | CashOutOutcome;

export type PublicCasinoState = Omit<CasinoGameState, 'seed' | 'deck' | 'config'> & { deckSize: number };

export type AdvisorAction = { type: 'guess'; guess: CasinoGuess } | { type: 'cash_out' };

export interface GuessOption {
  guess: CasinoGuess;
  probability: number;
}

export interface StrategyAdvice {
  round: CasinoRound;
  action: AdvisorAction;
  winProbability: number;
  options: GuessOption[];
  continueValue: number;
  cashOutValue: number | null;
  reasoning: string;
}
