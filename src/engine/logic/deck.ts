import seedrandom from 'seedrandom';
import { CARD_VALUES, SUITS, type Card, type CardColor, type Deck } from '../../types/card.js';
import { EmptyDeckError } from '../../utils/errors/gameRuleError.js';

const SUIT_SYMBOLS: Record<Card['suit'], string> = {
  Hearts: '♥',
  Diamonds: '♦',
  Clubs: '♣',
  Spades: '♠',
};

/** Suit-major: Hearts 2..A, Diamonds 2..A, Clubs 2..A, Spades 2..A. */
export const createStandardDeck = (): Card[] => {
  const deck: Card[] = [];
  for (const suit of SUITS) {
    for (const value of CARD_VALUES) {
      deck.push({ suit, value });
    }
  }
  return deck;
};

export function shuffleCards(cards: Card[], seed: string): Card[] {
  const rng = seedrandom(seed);
  const shuffled = [...cards];

  // Fisher-Yates shuffle
  for (let i = shuffled.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    [shuffled[i], shuffled[j]] = [shuffled[j], shuffled[i]];
  }

  return shuffled;
}

export function newShuffledDeck(seed: string | number): Deck {
  const key = String(seed);
  return { seed: key, cards: shuffleCards(createStandardDeck(), key), reshuffles: 0 };
}

/** Removes and returns the front card. Mutates the deck it is given. */
export function draw(deck: Deck): Card {
  const card = deck.cards.shift();
  if (!card) throw new EmptyDeckError();
  return card;
}

/** Puts a drawn card back and reshuffles what remains under the next derived seed. */
export function returnAndReshuffle(deck: Deck, card: Card): void {
  deck.reshuffles += 1;
  deck.cards = shuffleCards([card, ...deck.cards], `${deck.seed}#reshuffle-${deck.reshuffles}`);
}

/** 0 for a two up to 12 for an ace. */
export const rankOf = (card: Card): number => CARD_VALUES.indexOf(card.value);

export const colorOf = (card: Card): CardColor =>
  card.suit === 'Hearts' || card.suit === 'Diamonds' ? 'red' : 'black';

export const compareRank = (a: Card, b: Card): number => rankOf(a) - rankOf(b);

export const sameCard = (a: Card, b: Card): boolean => a.suit === b.suit && a.value === b.value;

export const cardLabel = (card: Card): string => `${card.value}${SUIT_SYMBOLS[card.suit]}`;
