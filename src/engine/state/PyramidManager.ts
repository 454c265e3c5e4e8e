// src/engine/state/PyramidManager.ts
import type {
  MatchCommittedOutcome,
  Player,
  PyramidCell,
  PyramidFlipOutcome,
  PyramidStartedOutcome,
  PyramidState,
  SocialGameState,
} from '../../types/social.js';
import { cardLabel, draw, rankOf, sameCard } from '../logic/deck.js';
import { EmptyHandError, InvalidStateError } from '../../utils/errors/gameRuleError.js';
import { GameValidationError } from '../../utils/errors/gameValidationError.js';
import { MatchCommitSchema, type MatchCommitInput } from '../../utils/validator/setup.validator.js';
import { validateInput } from '../../utils/validate.js';
import { appendLog } from './gameLog.js';
import logger from '../../utils/logger.js';

/** Bottom row first. */
export const PYRAMID_ROWS = [5, 4, 3, 2, 1] as const;
export const PYRAMID_SIZE = PYRAMID_ROWS.reduce((sum, size) => sum + size, 0);

interface FlipPosition {
  row: number;
  col: number;
  cell: PyramidCell;
}

export class PyramidManager {
  constructor(private readonly state: SocialGameState) {}

  public start(): PyramidStartedOutcome {
    const { state } = this;
    if (state.phase !== 'deal' || state.turn !== null) {
      throw new InvalidStateError('The pyramid can only be built once every player has finished the deal', {
        phase: state.phase,
      });
    }

    const rows = PYRAMID_ROWS.map((size) =>
      Array.from({ length: size }, (): PyramidCell => ({ card: draw(state.deck), faceUp: false })),
    );

    state.phase = 'pyramid';
    state.pyramid = { rows, flipped: 0, commitsThisFlip: {}, targetsThisFlip: [] };
    appendLog(state, 'pyramid_started', { cards: PYRAMID_SIZE });
    logger.debug(`[PYRAMID] Built ${PYRAMID_SIZE} face-down cards, ${state.deck.cards.length} left in deck`);

    return { type: 'pyramid_started', cards: PYRAMID_SIZE };
  }

  public flip(): PyramidFlipOutcome {
    const pyramid = this.requirePyramid('flip');
    if (pyramid.flipped >= PYRAMID_SIZE) {
      throw new InvalidStateError('Every pyramid card is already face up');
    }

    const position = this.positionAt(pyramid, pyramid.flipped);
    position.cell.faceUp = true;
    pyramid.flipped += 1;
    pyramid.commitsThisFlip = {};
    pyramid.targetsThisFlip = [];

    const { card } = position.cell;
    const drinkValue = this.drinkValue(position.row);
    const shot = this.isShot(position.row);
    const matchingPlayerIds = this.state.players
      .filter((p) => p.hand.some((c) => rankOf(c) === rankOf(card)))
      .map((p) => p.id);

    appendLog(this.state, 'pyramid_flip', {
      row: position.row + 1,
      col: position.col + 1,
      card: cardLabel(card),
      drinks: drinkValue,
    });
    logger.debug(`[PYRAMID] Flipped ${cardLabel(card)} on row ${position.row + 1}`, { matchingPlayerIds });

    return {
      type: 'pyramid_flip',
      row: position.row + 1,
      col: position.col + 1,
      card,
      drinkValue,
      shot,
      matchingPlayerIds,
      pyramidComplete: pyramid.flipped === PYRAMID_SIZE,
    };
  }

  public commit(input: MatchCommitInput): MatchCommittedOutcome {
    const pyramid = this.requirePyramid('commit a match');
    if (pyramid.flipped === 0) throw new InvalidStateError('No pyramid card has been flipped yet');

    const { playerId, card, targetPlayerId } = validateInput(MatchCommitSchema, input, 'match commit');
    const player = this.findPlayer(playerId);
    if (!player) throw new InvalidStateError(`Unknown player ${playerId}`, { playerId });

    const target = this.findPlayer(targetPlayerId);
    if (!target || target.id === player.id) {
      throw new GameValidationError('A match must be assigned to another player in the game', {
        input: { playerId, targetPlayerId },
      });
    }

    const { house_rules: houseRules } = this.state.config;
    const commits = pyramid.commitsThisFlip[player.id] ?? 0;
    if (!houseRules.allow_multiple_matches_per_flip && commits > 0) {
      throw new InvalidStateError(`${player.name} already matched this flip`, { playerId });
    }
    if (houseRules.limit_assign_target_once_per_flip && pyramid.targetsThisFlip.includes(target.id)) {
      throw new InvalidStateError(`${target.name} was already assigned drinks on this flip`, { targetPlayerId });
    }

    const position = this.positionAt(pyramid, pyramid.flipped - 1);
    const flipped = position.cell.card;
    const handIndex = player.hand.findIndex((c) => sameCard(c, card));
    if (handIndex < 0 || rankOf(card) !== rankOf(flipped)) {
      throw new EmptyHandError(`${player.name} holds no ${card.value} matching ${cardLabel(flipped)}`, {
        playerId,
        card: cardLabel(card),
      });
    }

    const [committed] = player.hand.splice(handIndex, 1);
    const drinks = this.drinkValue(position.row);
    target.drinksReceived += drinks;
    player.drinksAssigned += drinks;
    pyramid.commitsThisFlip[player.id] = commits + 1;
    pyramid.targetsThisFlip.push(target.id);

    appendLog(
      this.state,
      'match_committed',
      { card: cardLabel(committed), row: position.row + 1, drinks, target: target.id },
      player.id,
    );
    logger.debug(`[PYRAMID] ${player.name} matched ${cardLabel(committed)} → ${target.name} (${drinks})`);

    return {
      type: 'match_committed',
      playerId: player.id,
      targetPlayerId: target.id,
      card: committed,
      row: position.row + 1,
      drinks,
      shot: this.isShot(position.row),
      cardsLeft: player.hand.length,
    };
  }

  /** HELPERS */

  private requirePyramid(action: string): PyramidState {
    const { state } = this;
    if (state.phase !== 'pyramid' || !state.pyramid) {
      throw new InvalidStateError(`Cannot ${action} during the ${state.phase} phase`, { phase: state.phase });
    }
    return state.pyramid;
  }

  private positionAt(pyramid: PyramidState, index: number): FlipPosition {
    let remaining = index;
    for (const [row, cells] of pyramid.rows.entries()) {
      if (remaining < cells.length) return { row, col: remaining, cell: cells[remaining] };
      remaining -= cells.length;
    }
    throw new InvalidStateError(`Pyramid has no card at position ${index}`);
  }

  private drinkValue(row: number): number {
    return this.state.config.pyramid.row_values[row];
  }

  private isShot(row: number): boolean {
    return this.state.config.pyramid.top_card_shot && row === PYRAMID_ROWS.length - 1;
  }

  private findPlayer(id: string): Player | undefined {
    return this.state.players.find((p) => p.id === id);
  }
}
