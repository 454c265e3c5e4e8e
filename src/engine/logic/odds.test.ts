import { describe, test, expect } from 'vitest';
import { cardPool, directionOdds, rangeOdds, suitOdds, unseenSuits } from './odds.js';
import { card } from '../../test/helpers.js';

describe('directionOdds', () => {
  const full = cardPool([], false);

  test('counts ranks strictly above and below over a full deck', () => {
    const odds = directionOdds(card('5'), full);
    expect(odds.higher).toBeCloseTo(9 / 13, 10);
    expect(odds.lower).toBeCloseTo(3 / 13, 10);
  });

  test('ties lose both ways', () => {
    const odds = directionOdds(card('8'), full);
    expect(odds.higher + odds.lower).toBeCloseTo(12 / 13, 10);
  });

  test('an ace cannot be beaten', () => {
    expect(directionOdds(card('A'), full).higher).toBe(0);
  });

  test('can condition on cards already drawn', () => {
    const pool = cardPool([card('5', 'Hearts')], true);
    expect(pool).toHaveLength(51);
    expect(directionOdds(card('5', 'Hearts'), pool).higher).toBeCloseTo(36 / 51, 10);
  });
});

describe('rangeOdds', () => {
  const full = cardPool([], false);

  test('inside counts ranks strictly between the bounds', () => {
    const odds = rangeOdds(card('9', 'Clubs'), card('5'), full);
    expect(odds.inside).toBeCloseTo(3 / 13, 10);
    expect(odds.outside).toBeCloseTo(8 / 13, 10);
  });

  test('adjacent bounds leave nothing inside', () => {
    expect(rangeOdds(card('6'), card('7'), full).inside).toBe(0);
  });

  test('conditioned pool drops the bound cards', () => {
    const drawn = [card('5', 'Hearts'), card('9', 'Clubs')];
    const odds = rangeOdds(drawn[0], drawn[1], cardPool(drawn, true));
    expect(odds.inside).toBeCloseTo(12 / 50, 10);
    expect(odds.outside).toBeCloseTo(32 / 50, 10);
  });
});

describe('suit odds', () => {
  test('one over the unseen suit count', () => {
    expect(suitOdds([])).toBe(0.25);
    expect(suitOdds(['Hearts'])).toBeCloseTo(1 / 3, 10);
    expect(suitOdds(['Hearts', 'Clubs', 'Diamonds'])).toBe(1);
  });

  test('unseen suits keep the standard order', () => {
    expect(unseenSuits(['Diamonds'])).toEqual(['Hearts', 'Clubs', 'Spades']);
  });
});
