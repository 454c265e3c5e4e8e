// src/engine/state/CasinoRoundManager.ts
import type { Card } from '../../types/card.js';
import type { CashOutOutcome, CasinoGameState, CasinoRound, CasinoRoundOutcome } from '../../types/casino.js';
import type { CasinoGuess } from '../../utils/validator/guess.validator.js';
import { cardLabel, colorOf, compareRank, draw, rankOf } from '../logic/deck.js';
import { InvalidStateError } from '../../utils/errors/gameRuleError.js';
import { InvalidGuessError } from '../../utils/errors/gameValidationError.js';
import { RoundGuessSchemas } from '../../utils/validator/guess.validator.js';
import { parseGuess } from '../../utils/validate.js';
import logger from '../../utils/logger.js';

const NEXT_ROUND: Record<Exclude<CasinoRound, 4>, CasinoRound> = { 1: 2, 2: 3, 3: 4 };

interface RoundResult {
  guess: CasinoGuess;
  card: Card;
  correct: boolean;
  tie: boolean;
}

export class CasinoRoundManager {
  constructor(private readonly state: CasinoGameState) {}

  public play(input: unknown): CasinoRoundOutcome {
    const { state } = this;
    this.requireInProgress('play a round');

    const round = state.round;
    const { guess, card, correct, tie } = this.resolve(round, input);

    state.drawn.push(card);
    if (!state.suitsSeen.includes(card.suit)) state.suitsSeen.push(card.suit);

    if (correct) {
      state.multiplier *= state.config.casino.round_multipliers[round - 1];
      if (round === 4) {
        state.status = 'completed';
        state.payout = state.bet * state.multiplier;
      } else {
        state.round = NEXT_ROUND[round];
      }
    } else {
      state.status = 'busted';
      state.payout = 0;
    }

    logger.debug(`[CASINO] Round ${round} drew ${cardLabel(card)}`, {
      correct,
      tie,
      multiplier: state.multiplier,
      status: state.status,
    });

    return {
      type: 'casino_round',
      round,
      guess,
      card,
      correct,
      tie,
      multiplier: state.multiplier,
      status: state.status,
      payout: state.payout,
    };
  }

  public cashOut(): CashOutOutcome {
    const { state } = this;
    this.requireInProgress('cash out');
    if (state.round === 1) {
      throw new InvalidStateError('Cash-out opens once round 1 has been won', { round: state.round });
    }

    state.status = 'cashed_out';
    state.payout = state.bet * state.multiplier;
    logger.debug(`[CASINO] Cashed out at ${state.multiplier}x for ${state.payout}`);

    return { type: 'cash_out', round: state.round, multiplier: state.multiplier, payout: state.payout };
  }

  /** Equal ranks never push here: a tie on round 2 or a bound on round 3 loses. */
  private resolve(round: CasinoRound, input: unknown): RoundResult {
    const { state } = this;
    const label = `round ${round}`;

    switch (round) {
      case 1: {
        const guess = parseGuess(RoundGuessSchemas[1], input, label);
        const card = draw(state.deck);
        return { guess, card, correct: colorOf(card) === guess.color, tie: false };
      }
      case 2: {
        const guess = parseGuess(RoundGuessSchemas[2], input, label);
        const card = draw(state.deck);
        const diff = compareRank(card, this.drawnCard(0));
        const correct = guess.direction === 'higher' ? diff > 0 : diff < 0;
        return { guess, card, correct, tie: diff === 0 };
      }
      case 3: {
        const guess = parseGuess(RoundGuessSchemas[3], input, label);
        const a = rankOf(this.drawnCard(0));
        const b = rankOf(this.drawnCard(1));
        const low = Math.min(a, b);
        const high = Math.max(a, b);
        const card = draw(state.deck);
        const rank = rankOf(card);
        const tie = rank === low || rank === high;
        const inside = low < rank && rank < high;
        const correct = !tie && (guess.range === 'inside' ? inside : !inside);
        return { guess, card, correct, tie };
      }
      case 4: {
        const guess = parseGuess(RoundGuessSchemas[4], input, label);
        if (state.suitsSeen.includes(guess.suit)) {
          throw new InvalidGuessError(`${guess.suit} is already on the board; pick an unseen suit`, {
            input: guess,
          });
        }
        const card = draw(state.deck);
        return { guess, card, correct: card.suit === guess.suit, tie: false };
      }
    }
  }

  private drawnCard(index: number): Card {
    const card = this.state.drawn.at(index);
    if (!card) throw new InvalidStateError(`Card ${index + 1} has not been drawn yet`);
    return card;
  }

  private requireInProgress(action: string) {
    if (this.state.status !== 'in_progress') {
      throw new InvalidStateError(`Cannot ${action}: the game is ${this.state.status}`, { status: this.state.status });
    }
  }
}
