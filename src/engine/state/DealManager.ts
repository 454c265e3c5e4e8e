// src/engine/state/DealManager.ts
import type { Card } from '../../types/card.js';
import type { DealGuess, DealRound, DealRoundOutcome, Player, SocialGameState } from '../../types/social.js';
import { cardLabel, colorOf, draw, rankOf, returnAndReshuffle } from '../logic/deck.js';
import { EmptyDeckError, InvalidStateError } from '../../utils/errors/gameRuleError.js';
import { RoundGuessSchemas } from '../../utils/validator/guess.validator.js';
import { parseGuess } from '../../utils/validate.js';
import { appendLog } from './gameLog.js';
import logger from '../../utils/logger.js';

const NEXT_ROUND: Record<DealRound, DealRound | null> = { R1: 'R2', R2: 'R3', R3: 'R4', R4: null };

interface Resolution {
  guess: DealGuess;
  card: Card;
  correct: boolean;
  boundaryRedraws: Card[];
}

export class DealManager {
  constructor(private readonly state: SocialGameState) {}

  /** TURN */

  public currentPlayer(): Player | null {
    const { turn, players } = this.state;
    return turn ? players[turn.playerIndex] : null;
  }

  public play(playerId: string, input: unknown): DealRoundOutcome {
    const { state } = this;
    if (state.phase !== 'deal') {
      throw new InvalidStateError(`Deal rounds cannot be played during the ${state.phase} phase`, { phase: state.phase });
    }

    const turn = state.turn;
    const player = this.currentPlayer();
    if (!turn || !player) throw new InvalidStateError('Every player has already finished the deal');
    if (player.id !== playerId) {
      throw new InvalidStateError(`It is ${player.name}'s turn`, { expected: player.id, playerId });
    }

    const resolution = this.resolve(turn.round, player, input);
    const { card, correct, guess, boundaryRedraws } = resolution;
    player.hand.push(card);

    const { penalty: penalties, reward: rewards } = state.config;
    const penaltyByRound: Record<DealRound, number> = {
      R1: penalties.sips_wrong_guess_r1,
      R2: penalties.sips_wrong_guess_r2,
      R3: penalties.sips_wrong_guess_r3,
      R4: penalties.sips_wrong_guess_r4,
    };
    const penalty = correct ? 0 : penaltyByRound[turn.round];
    const reward = correct && turn.round === 'R4' ? rewards.reward_distribute_drinks : 0;

    player.drinksReceived += penalty;
    player.drinksAssigned += reward;

    appendLog(state, 'guess_made', { round: turn.round, card: cardLabel(card), correct }, player.id);
    if (penalty > 0) appendLog(state, 'penalty_applied', { round: turn.round, amount: penalty }, player.id);
    if (reward > 0) appendLog(state, 'reward_assigned', { round: turn.round, amount: reward }, player.id);

    logger.debug(`[DEAL] ${player.name} ${turn.round} drew ${cardLabel(card)}`, {
      correct,
      penalty,
      reward,
      redraws: boundaryRedraws.length,
    });

    const round = turn.round;
    this.advanceTurn();
    const next = this.currentPlayer();

    return {
      type: 'deal_round',
      playerId: player.id,
      round,
      guess,
      card,
      color: colorOf(card),
      correct,
      penalty,
      reward,
      boundaryRedraws,
      nextTurn: next && state.turn ? { playerId: next.id, round: state.turn.round } : null,
      dealComplete: state.turn === null,
    };
  }

  /** ROUND RESOLUTION */

  private resolve(round: DealRound, player: Player, input: unknown): Resolution {
    switch (round) {
      case 'R1': {
        const guess = parseGuess(RoundGuessSchemas[1], input, round);
        const card = draw(this.state.deck);
        return { guess, card, correct: colorOf(card) === guess.color, boundaryRedraws: [] };
      }
      case 'R2': {
        const guess = parseGuess(RoundGuessSchemas[2], input, round);
        const reference = rankOf(this.handCard(player, 0));
        const { card, redraws } = this.drawResolving(round, player, (c) => rankOf(c) === reference);
        const correct = guess.direction === 'higher' ? rankOf(card) > reference : rankOf(card) < reference;
        return { guess, card, correct, boundaryRedraws: redraws };
      }
      case 'R3': {
        const guess = parseGuess(RoundGuessSchemas[3], input, round);
        const a = rankOf(this.handCard(player, 0));
        const b = rankOf(this.handCard(player, 1));
        const low = Math.min(a, b);
        const high = Math.max(a, b);
        const { card, redraws } = this.drawResolving(round, player, (c) => rankOf(c) === low || rankOf(c) === high);
        const inside = low < rankOf(card) && rankOf(card) < high;
        const correct = guess.range === 'inside' ? inside : !inside;
        return { guess, card, correct, boundaryRedraws: redraws };
      }
      case 'R4': {
        const guess = parseGuess(RoundGuessSchemas[4], input, round);
        const card = draw(this.state.deck);
        return { guess, card, correct: card.suit === guess.suit, boundaryRedraws: [] };
      }
    }
  }

  /**
   * Draws until `isBoundary` rejects nothing. Each rejected card goes back into
   * the deck, which is reshuffled before the next draw.
   */
  private drawResolving(
    round: DealRound,
    player: Player,
    isBoundary: (card: Card) => boolean,
  ): { card: Card; redraws: Card[] } {
    const { deck } = this.state;
    if (!deck.cards.some((card) => !isBoundary(card))) {
      throw new EmptyDeckError(`No card left in the deck can resolve ${round}`);
    }

    const redraws: Card[] = [];
    let card = draw(deck);
    while (isBoundary(card)) {
      redraws.push(card);
      returnAndReshuffle(deck, card);
      appendLog(this.state, 'boundary_reshuffle', { round, card: cardLabel(card) }, player.id);
      card = draw(deck);
    }
    return { card, redraws };
  }

  private handCard(player: Player, index: number): Card {
    const card = player.hand.at(index);
    if (!card) throw new InvalidStateError(`${player.name} has no card ${index + 1} to compare against`);
    return card;
  }

  private advanceTurn() {
    const { state } = this;
    if (!state.turn) return;

    const nextRound = NEXT_ROUND[state.turn.round];
    if (nextRound) {
      state.turn = { playerIndex: state.turn.playerIndex, round: nextRound };
      return;
    }

    const nextIndex = state.turn.playerIndex + 1;
    state.turn = nextIndex < state.players.length ? { playerIndex: nextIndex, round: 'R1' } : null;
  }
}
