import { describe, test, expect } from 'vitest';
import type { Card } from '../types/card.js';
import type { CasinoGameState } from '../types/casino.js';
import type { CasinoGuess } from '../utils/validator/guess.validator.js';
import type { GameConfig } from '../utils/validator/config.validator.js';
import { adviseCasino } from './strategyAdvisor.js';
import { playCasinoRound, startCasinoGame } from './casinoEngine.js';
import { InvalidStateError } from '../utils/errors/gameRuleError.js';
import { card, withConfig, withDeck } from '../test/helpers.js';

const winningGuesses: CasinoGuess[] = [
  { kind: 'color', color: 'red' },
  { kind: 'direction', direction: 'higher' },
  { kind: 'range', range: 'inside' },
];

/** Plays the given cards as winning rounds 1..n with a bet of 10. */
function gameAfter(cards: Card[], guesses: CasinoGuess[] = winningGuesses, config?: GameConfig): CasinoGameState {
  let game = withDeck(startCasinoGame(10, 'advisor', config), [...cards, card('2', 'Spades')]);
  cards.forEach((_, i) => {
    game = playCasinoRound(game, guesses[i]).state;
  });
  return game;
}

describe('adviseCasino', () => {
  test('round 1 is a coin flip with nothing to bank', () => {
    const advice = adviseCasino(startCasinoGame(10, 'advisor'));

    expect(advice).toEqual({
      round: 1,
      action: { type: 'guess', guess: { kind: 'color', color: 'red' } },
      winProbability: 0.5,
      options: [
        { guess: { kind: 'color', color: 'red' }, probability: 0.5 },
        { guess: { kind: 'color', color: 'black' }, probability: 0.5 },
      ],
      continueValue: 10,
      cashOutValue: null,
      reasoning: 'red wins 50.0%; cash-out opens after round 1.',
    });
  });

  test('a low first card favours higher', () => {
    const advice = adviseCasino(gameAfter([card('5', 'Hearts')]));

    expect(advice.action).toEqual({ type: 'guess', guess: { kind: 'direction', direction: 'higher' } });
    expect(advice.winProbability).toBeCloseTo(9 / 13, 10);
    expect(advice.continueValue).toBeCloseTo(360 / 13, 10);
    expect(advice.cashOutValue).toBe(20);
    expect(advice.reasoning).toBe(
      'higher wins 69.2% on 5♥; continuing is worth 27.69 against 20.00 banked, play on.',
    );
  });

  test('a middle card is worth banking', () => {
    const advice = adviseCasino(gameAfter([card('8', 'Clubs')], [{ kind: 'color', color: 'black' }]));

    expect(advice.action).toEqual({ type: 'cash_out' });
    expect(advice.options.map((o) => o.probability)).toEqual([6 / 13, 6 / 13]);
    expect(advice.winProbability).toBeCloseTo(6 / 13, 10);
    expect(advice.continueValue).toBeCloseTo(480 / 13, 10);
    expect(advice.cashOutValue).toBe(20);
  });

  test('a narrow range favours outside', () => {
    const advice = adviseCasino(gameAfter([card('5', 'Hearts'), card('9', 'Clubs')]));

    expect(advice.round).toBe(3);
    expect(advice.action).toEqual({ type: 'guess', guess: { kind: 'range', range: 'outside' } });
    expect(advice.winProbability).toBeCloseTo(8 / 13, 10);
    expect(advice.cashOutValue).toBe(40);
  });

  test('can condition on the cards already drawn', () => {
    const config = withConfig((c) => (c.advisor.condition_on_seen_cards = true));
    const advice = adviseCasino(gameAfter([card('5', 'Hearts'), card('9', 'Clubs')], winningGuesses, config));

    expect(advice.options.map((o) => o.probability)).toEqual([12 / 50, 32 / 50]);
    expect(advice.winProbability).toBe(0.64);
  });

  test('three suits seen leaves a certain round 4', () => {
    const advice = adviseCasino(gameAfter([card('5', 'Hearts'), card('9', 'Clubs'), card('7', 'Diamonds')]));

    expect(advice.options).toEqual([{ guess: { kind: 'suit', suit: 'Spades' }, probability: 1 }]);
    expect(advice.action).toEqual({ type: 'guess', guess: { kind: 'suit', suit: 'Spades' } });
    expect(advice.continueValue).toBe(480);
    expect(advice.cashOutValue).toBe(120);
  });

  test('one suit seen spreads round 4 over the other three', () => {
    const advice = adviseCasino(gameAfter([card('5', 'Hearts'), card('9', 'Hearts'), card('7', 'Hearts')]));

    expect(advice.options.map((o) => o.guess)).toEqual([
      { kind: 'suit', suit: 'Diamonds' },
      { kind: 'suit', suit: 'Clubs' },
      { kind: 'suit', suit: 'Spades' },
    ]);
    expect(advice.winProbability).toBeCloseTo(1 / 3, 10);
    expect(advice.action).toEqual({ type: 'guess', guess: { kind: 'suit', suit: 'Diamonds' } });
    expect(advice.continueValue).toBeCloseTo(160, 10);
  });

  test('gives the same advice for the same state without changing it', () => {
    const game = gameAfter([card('5', 'Hearts')]);
    const before = structuredClone(game);

    expect(adviseCasino(game)).toEqual(adviseCasino(game));
    expect(game).toEqual(before);
  });

  test('has nothing to say once the game is over', () => {
    const busted = playCasinoRound(withDeck(startCasinoGame(10, 'advisor'), [card('K', 'Spades')]), {
      kind: 'color',
      color: 'red',
    }).state;
    expect(() => adviseCasino(busted)).toThrow(InvalidStateError);
  });
});
