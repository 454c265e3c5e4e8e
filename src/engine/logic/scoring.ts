import type { Card } from '../../types/card.js';
import type { GameConfig } from '../../utils/validator/config.validator.js';

/** Drinks a bus card hands the rider: face cards and aces score, the rest pass. */
export function busDrinksFor(card: Card, table: GameConfig['bus']['face_card_drinks']): number {
  switch (card.value) {
    case 'J':
    case 'Q':
    case 'K':
    case 'A':
      return table[card.value];
    default:
      return 0;
  }
}

export const busTotal = (cards: readonly Card[], table: GameConfig['bus']['face_card_drinks']): number =>
  cards.reduce((sum, card) => sum + busDrinksFor(card, table), 0);
