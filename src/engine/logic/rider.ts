import type { Player, RiderTieBreak } from '../../types/social.js';
import { rankOf } from './deck.js';
import { InvalidStateError } from '../../utils/errors/gameRuleError.js';

export interface RiderSelection {
  rider: Player;
  tieBreak: RiderTieBreak;
}

const topRank = (player: Player): number => Math.max(-1, ...player.hand.map(rankOf));

/**
 * Most cards in hand rides the bus. Ties go to the highest single card (ace
 * high), then to whoever joined first.
 */
export function selectRider(players: readonly Player[]): RiderSelection {
  if (players.length === 0) throw new InvalidStateError('Cannot pick a rider without players');

  const mostCards = Math.max(...players.map((p) => p.hand.length));
  const byCount = players.filter((p) => p.hand.length === mostCards);
  if (byCount.length === 1) return { rider: byCount[0], tieBreak: 'most_cards' };

  const bestTop = Math.max(...byCount.map(topRank));
  const byTop = byCount.filter((p) => topRank(p) === bestTop);
  if (byTop.length === 1) return { rider: byTop[0], tieBreak: 'highest_card' };

  // players keep join order, so the first survivor joined earliest
  return { rider: byTop[0], tieBreak: 'join_order' };
}
