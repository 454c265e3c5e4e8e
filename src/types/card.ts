export const SUITS = ['Hearts', 'Diamonds', 'Clubs', 'Spades'] as const;
export const CARD_VALUES = ['2', '3', '4', '5', '6', '7', '8', '9', '10', 'J', 'Q', 'K', 'A'] as const;

export type Suit = (typeof SUITS)[number];
export type CardValue = (typeof CARD_VALUES)[number];
export type CardColor = 'red' | 'black';

export interface Card {
  suit: Suit;
  value: CardValue;
}

export type HiddenCard = { suit: 'hidden'; value: 'hidden' };
export type AnyCard = Card | HiddenCard;

/** Remaining cards, front first. `reshuffles` seeds each boundary reshuffle. */
export interface Deck {
  seed: string;
  cards: Card[];
  reshuffles: number;
}
