import { describe, test, expect } from 'vitest';
import type { Card } from '../../types/card.js';
import type { Player } from '../../types/social.js';
import { selectRider } from './rider.js';
import { busDrinksFor, busTotal } from './scoring.js';
import { InvalidStateError } from '../../utils/errors/gameRuleError.js';
import { defaultGameConfig } from '../../config/gameConfig.js';
import { card } from '../../test/helpers.js';

function makePlayer(index: number, hand: Card[]): Player {
  return { id: `player-${index}`, name: `P${index}`, hand, drinksReceived: 0, drinksAssigned: 0 };
}

describe('selectRider', () => {
  test('most cards left rides the bus', () => {
    const players = [makePlayer(1, [card('A')]), makePlayer(2, [card('2'), card('3')])];
    const { rider, tieBreak } = selectRider(players);
    expect(rider.id).toBe('player-2');
    expect(tieBreak).toBe('most_cards');
  });

  test('equal counts go to the higher top card', () => {
    const players = [
      makePlayer(1, [card('K', 'Hearts'), card('2', 'Clubs')]),
      makePlayer(2, [card('A', 'Spades'), card('3', 'Diamonds')]),
    ];
    const { rider, tieBreak } = selectRider(players);
    expect(rider.id).toBe('player-2');
    expect(tieBreak).toBe('highest_card');
  });

  test('equal top cards go to the earlier player', () => {
    const players = [
      makePlayer(1, [card('A', 'Hearts'), card('2', 'Clubs')]),
      makePlayer(2, [card('A', 'Spades'), card('K', 'Diamonds')]),
    ];
    const { rider, tieBreak } = selectRider(players);
    expect(rider.id).toBe('player-1');
    expect(tieBreak).toBe('join_order');
  });

  test('only tied leaders are compared by top card', () => {
    const players = [
      makePlayer(1, [card('A', 'Hearts')]),
      makePlayer(2, [card('4', 'Spades'), card('3', 'Diamonds')]),
      makePlayer(3, [card('5', 'Spades'), card('2', 'Diamonds')]),
    ];
    expect(selectRider(players).rider.id).toBe('player-3');
  });

  test('empty hands everywhere fall back to join order', () => {
    const players = [makePlayer(1, []), makePlayer(2, [])];
    expect(selectRider(players)).toEqual({ rider: players[0], tieBreak: 'join_order' });
  });

  test('needs at least one player', () => {
    expect(() => selectRider([])).toThrow(InvalidStateError);
  });
});

describe('bus scoring', () => {
  const table = defaultGameConfig().bus.face_card_drinks;

  test('face cards and aces score 1 to 4', () => {
    expect(busDrinksFor(card('J'), table)).toBe(1);
    expect(busDrinksFor(card('Q'), table)).toBe(2);
    expect(busDrinksFor(card('K'), table)).toBe(3);
    expect(busDrinksFor(card('A'), table)).toBe(4);
  });

  test('number cards score nothing', () => {
    expect(busDrinksFor(card('10'), table)).toBe(0);
    expect(busDrinksFor(card('2'), table)).toBe(0);
  });

  test('one of each scoring rank totals ten whatever the order', () => {
    const fillers = [card('2'), card('3'), card('4'), card('5'), card('6'), card('7')];
    const scoring = [card('A'), card('J'), card('K'), card('Q')];
    expect(busTotal([...scoring, ...fillers], table)).toBe(10);
    expect(busTotal([...fillers, ...scoring.reverse()], table)).toBe(10);
  });
});
