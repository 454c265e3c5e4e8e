// src/engine/state/BusManager.ts
import type { BusFlipOutcome, BusStartedOutcome, BusState, Player, SocialGameState } from '../../types/social.js';
import { cardLabel, draw } from '../logic/deck.js';
import { selectRider } from '../logic/rider.js';
import { busDrinksFor, busTotal } from '../logic/scoring.js';
import { InvalidStateError } from '../../utils/errors/gameRuleError.js';
import { PYRAMID_SIZE } from './PyramidManager.js';
import { appendLog } from './gameLog.js';
import logger from '../../utils/logger.js';

export class BusManager {
  constructor(private readonly state: SocialGameState) {}

  public start(): BusStartedOutcome {
    const { state } = this;
    if (state.phase !== 'pyramid' || !state.pyramid || state.pyramid.flipped < PYRAMID_SIZE) {
      throw new InvalidStateError('The bus leaves only after every pyramid card is flipped', { phase: state.phase });
    }

    const { rider, tieBreak } = selectRider(state.players);
    const { length, end_when_rider_hand_empty: endWhenEmpty } = state.config.bus;

    state.phase = 'bus';
    state.bus = { riderId: rider.id, tieBreak, cards: [], totalDrinks: 0 };
    appendLog(state, 'bus_started', { rider: rider.id, tieBreak, cardsInHand: rider.hand.length });
    logger.debug(`[BUS] ${rider.name} rides the bus (${tieBreak})`);

    const finished = endWhenEmpty && rider.hand.length === 0;
    if (finished) this.finish(state.bus);

    return { type: 'bus_started', riderId: rider.id, tieBreak, busLength: length, finished };
  }

  public flip(): BusFlipOutcome {
    const { state } = this;
    const bus = state.bus;
    if (state.phase !== 'bus' || !bus) {
      throw new InvalidStateError(`Cannot flip a bus card during the ${state.phase} phase`, { phase: state.phase });
    }

    const rider = this.rider(bus);
    const card = draw(state.deck);
    const table = state.config.bus.face_card_drinks;
    const drinks = busDrinksFor(card, table);

    bus.cards.push(card);
    bus.totalDrinks = busTotal(bus.cards, table);
    rider.drinksReceived += drinks;

    appendLog(state, 'bus_flip', { position: bus.cards.length, card: cardLabel(card), drinks }, rider.id);
    logger.debug(`[BUS] Card ${bus.cards.length}: ${cardLabel(card)} → ${drinks}`);

    const finished = bus.cards.length >= state.config.bus.length;
    if (finished) this.finish(bus);

    return {
      type: 'bus_flip',
      riderId: rider.id,
      position: bus.cards.length,
      card,
      drinks,
      totalDrinks: bus.totalDrinks,
      finished,
    };
  }

  private rider(bus: BusState): Player {
    const rider = this.state.players.find((p) => p.id === bus.riderId);
    if (!rider) throw new InvalidStateError(`Rider ${bus.riderId} is not in the game`);
    return rider;
  }

  private finish(bus: BusState) {
    this.state.phase = 'finished';
    appendLog(this.state, 'game_finished', { rider: bus.riderId, totalDrinks: bus.totalDrinks, busCards: bus.cards.length });
    logger.info(`[BUS] Game finished, rider took ${bus.totalDrinks}`);
  }
}
