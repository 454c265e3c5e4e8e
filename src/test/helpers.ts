import type { Card, CardValue, Deck, Suit } from '../types/card.js';
import type { SocialGameState } from '../types/social.js';
import type { GameConfig } from '../utils/validator/config.validator.js';
import { createSocialGame, flipPyramidCard, startPyramid } from '../engine/socialEngine.js';
import { defaultGameConfig } from '../config/gameConfig.js';

export const card = (value: CardValue, suit: Suit = 'Hearts'): Card => ({ value, suit });

/** Replaces the remaining deck, as if a snapshot with that order was fed back. */
export function withDeck<S extends { deck: Deck }>(state: S, cards: Card[]): S {
  return { ...state, deck: { ...state.deck, cards } };
}

export function withConfig(patch: (config: GameConfig) => void): GameConfig {
  const config = defaultGameConfig();
  patch(config);
  return config;
}

/** A game whose deal is finished with the given hands, next cards on top of the deck. */
export function dealtGame(hands: Card[][], deck: Card[], config: GameConfig = defaultGameConfig()): SocialGameState {
  const names = hands.map((_, i) => `Player${i + 1}`);
  const game = createSocialGame(names, 'dealt', config);
  return {
    ...game,
    turn: null,
    players: game.players.map((p, i) => ({ ...p, hand: hands[i] })),
    deck: { ...game.deck, cards: deck },
  };
}

/** Fifteen filler cards for the pyramid; none share a rank with `avoid`. */
export function pyramidCards(first: Card[] = [], avoid: CardValue[] = []): Card[] {
  const filler: Card[] = [];
  const suits: Suit[] = ['Hearts', 'Diamonds', 'Clubs', 'Spades'];
  const values: CardValue[] = ['2', '3', '4', '5', '6', '7', '8', '9', '10', 'J', 'Q', 'K', 'A'];
  for (const suit of suits) {
    for (const value of values) {
      if (avoid.includes(value)) continue;
      if (first.some((c) => c.suit === suit && c.value === value)) continue;
      filler.push({ suit, value });
    }
  }
  return [...first, ...filler].slice(0, 15);
}

export function flipAll(state: SocialGameState): SocialGameState {
  let current = state.phase === 'deal' ? startPyramid(state).state : state;
  while (current.pyramid && current.pyramid.flipped < 15) {
    current = flipPyramidCard(current).state;
  }
  return current;
}

export type RawConfig = { [section: string]: { [key: string]: unknown } };

/** A config as plain JSON, the way a transport forwards it, edited before it reaches the engine. */
export function rawConfig(edit: (raw: RawConfig) => void): GameConfig {
  const raw = JSON.parse(JSON.stringify(defaultGameConfig()));
  edit(raw);
  return raw;
}
