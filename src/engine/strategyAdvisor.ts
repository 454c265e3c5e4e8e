import type { AdvisorAction, CasinoGameState, GuessOption, StrategyAdvice } from '../types/casino.js';
import type { Card } from '../types/card.js';
import { cardLabel } from './logic/deck.js';
import { cardPool, directionOdds, rangeOdds, suitOdds, unseenSuits } from './logic/odds.js';
import { InvalidStateError } from '../utils/errors/gameRuleError.js';

const percent = (p: number): string => `${(p * 100).toFixed(1)}%`;

function drawnCard(state: CasinoGameState, index: number): Card {
  const card = state.drawn.at(index);
  if (!card) throw new InvalidStateError(`Round ${state.round} needs card ${index + 1} on the board`);
  return card;
}

/** Options in tie-break order: the first of two equal probabilities wins. */
function guessOptions(state: CasinoGameState): GuessOption[] {
  const pool = cardPool(state.drawn, state.config.advisor.condition_on_seen_cards);

  switch (state.round) {
    case 1:
      return [
        { guess: { kind: 'color', color: 'red' }, probability: 0.5 },
        { guess: { kind: 'color', color: 'black' }, probability: 0.5 },
      ];
    case 2: {
      const odds = directionOdds(drawnCard(state, 0), pool);
      return [
        { guess: { kind: 'direction', direction: 'higher' }, probability: odds.higher },
        { guess: { kind: 'direction', direction: 'lower' }, probability: odds.lower },
      ];
    }
    case 3: {
      const odds = rangeOdds(drawnCard(state, 0), drawnCard(state, 1), pool);
      return [
        { guess: { kind: 'range', range: 'inside' }, probability: odds.inside },
        { guess: { kind: 'range', range: 'outside' }, probability: odds.outside },
      ];
    }
    case 4: {
      const probability = suitOdds(state.suitsSeen);
      return unseenSuits(state.suitsSeen).map((suit): GuessOption => ({ guess: { kind: 'suit', suit }, probability }));
    }
  }
}

function optionLabel(option: GuessOption): string {
  const { guess } = option;
  switch (guess.kind) {
    case 'color':
      return guess.color;
    case 'direction':
      return guess.direction;
    case 'range':
      return guess.range;
    case 'suit':
      return guess.suit;
  }
}

/**
 * Recommends the best guess or a cash-out for a casino game in progress.
 * Read-only: the same state always yields the same advice.
 */
export function adviseCasino(state: CasinoGameState): StrategyAdvice {
  if (state.status !== 'in_progress') {
    throw new InvalidStateError(`No advice for a game that is ${state.status}`, { status: state.status });
  }

  const options = guessOptions(state);
  const best = options.reduce((top, option) => (option.probability > top.probability ? option : top));

  const stake = state.bet * state.multiplier;
  const factor = state.config.casino.round_multipliers[state.round - 1];
  const continueValue = stake * factor * best.probability;
  const cashOutValue = state.round === 1 ? null : stake;

  const keepPlaying = cashOutValue === null || continueValue > cashOutValue;
  const action: AdvisorAction = keepPlaying ? { type: 'guess', guess: best.guess } : { type: 'cash_out' };

  const board = state.drawn.map(cardLabel).join(' ');
  const odds = `${optionLabel(best)} wins ${percent(best.probability)}`;
  const reasoning =
    cashOutValue === null
      ? `${odds}; cash-out opens after round 1.`
      : `${odds} on ${board}; continuing is worth ${continueValue.toFixed(2)} against ${cashOutValue.toFixed(2)} banked, ${keepPlaying ? 'play on' : 'cash out'}.`;

  return {
    round: state.round,
    action,
    winProbability: best.probability,
    options,
    continueValue,
    cashOutValue,
    reasoning,
  };
}
