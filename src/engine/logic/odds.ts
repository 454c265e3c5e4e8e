import type { Card, Suit } from '../../types/card.js';
import { SUITS } from '../../types/card.js';
import { createStandardDeck, rankOf, sameCard } from './deck.js';

const FULL_DECK = createStandardDeck();

/** Cards a probability is computed over: the full deck, or what is left of it. */
export const cardPool = (drawn: readonly Card[], conditionOnSeen: boolean): Card[] =>
  conditionOnSeen ? FULL_DECK.filter((card) => !drawn.some((seen) => sameCard(seen, card))) : FULL_DECK;

const share = (pool: readonly Card[], predicate: (rank: number) => boolean): number =>
  pool.filter((card) => predicate(rankOf(card))).length / pool.length;

/** Equal ranks lose both ways. */
export function directionOdds(reference: Card, pool: readonly Card[]): { higher: number; lower: number } {
  const ref = rankOf(reference);
  return {
    higher: share(pool, (rank) => rank > ref),
    lower: share(pool, (rank) => rank < ref),
  };
}

/** Cards on either bound lose both ways. */
export function rangeOdds(first: Card, second: Card, pool: readonly Card[]): { inside: number; outside: number } {
  const low = Math.min(rankOf(first), rankOf(second));
  const high = Math.max(rankOf(first), rankOf(second));
  return {
    inside: share(pool, (rank) => rank > low && rank < high),
    outside: share(pool, (rank) => rank < low || rank > high),
  };
}

export const unseenSuits = (suitsSeen: readonly Suit[]): Suit[] => SUITS.filter((suit) => !suitsSeen.includes(suit));

export const suitOdds = (suitsSeen: readonly Suit[]): number => 1 / (SUITS.length - suitsSeen.length);
