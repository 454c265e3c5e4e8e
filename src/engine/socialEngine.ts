import type { Card, HiddenCard } from '../types/card.js';
import type {
  BusFlipOutcome,
  BusStartedOutcome,
  DealGuess,
  DealRound,
  DealRoundOutcome,
  MatchCommittedOutcome,
  ModeToggledOutcome,
  Player,
  PublicPyramidCell,
  PublicSocialState,
  PyramidFlipOutcome,
  PyramidStartedOutcome,
  RematchOutcome,
  SocialGameState,
} from '../types/social.js';
import type { GameConfig, GameConfigLabels } from '../utils/validator/config.validator.js';
import { defaultGameConfig, parseGameConfig } from '../config/gameConfig.js';
import { newShuffledDeck } from './logic/deck.js';
import { BusManager, DealManager, PyramidManager, PYRAMID_SIZE, applyTransition, type Transition } from './state/index.js';
import { appendLog } from './state/gameLog.js';
import { ErrorHandler } from '../utils/errors/errorHandler.js';
import { PlayerNamesSchema, SeedSchema } from '../utils/validator/setup.validator.js';
import { validateInput } from '../utils/validate.js';
import logger from '../utils/logger.js';

const DECK_SIZE = 52;
const CARDS_PER_PLAYER = 4;
const HIDDEN_CARD: HiddenCard = { suit: 'hidden', value: 'hidden' };

/** Largest table whose deal, pyramid and bus all fit in one deck. */
export const maxPlayers = (config: GameConfig): number =>
  Math.floor((DECK_SIZE - PYRAMID_SIZE - config.bus.length) / CARDS_PER_PLAYER);

function buildGame(names: string[], seed: string, config: GameConfig, mode: SocialGameState['mode']): SocialGameState {
  const players: Player[] = names.map((name, index) => ({
    id: `player-${index + 1}`,
    name,
    hand: [],
    drinksReceived: 0,
    drinksAssigned: 0,
  }));

  return {
    seed,
    config,
    mode,
    players,
    phase: 'deal',
    turn: { playerIndex: 0, round: 'R1' },
    pyramid: null,
    bus: null,
    deck: newShuffledDeck(seed),
    log: [],
    sequence: 0,
  };
}

export function createSocialGame(
  names: string[],
  seed: string | number,
  config: GameConfig = defaultGameConfig(),
): SocialGameState {
  return ErrorHandler.monitor({ operation: 'createSocialGame' }, () => {
    const validConfig = parseGameConfig(config);
    const validNames = validateInput(PlayerNamesSchema(maxPlayers(validConfig)), names, 'player names');
    const validSeed = validateInput(SeedSchema, seed, 'seed');

    const mode = validConfig.alcohol_mode.enabled ? 'alcohol' : 'points';
    const state = buildGame(validNames, validSeed, validConfig, mode);
    appendLog(state, 'game_created', { players: state.players.length, seed: validSeed });
    logger.info(`[GAME] Social game created for ${validNames.join(', ')}`, { seed: validSeed });
    return state;
  });
}

export function currentTurn(state: SocialGameState): { player: Player; round: DealRound } | null {
  const player = new DealManager(state).currentPlayer();
  return player && state.turn ? { player, round: state.turn.round } : null;
}

/** DEAL */

export function playDealRound(
  state: SocialGameState,
  playerId: string,
  guess: DealGuess,
): Transition<SocialGameState, DealRoundOutcome> {
  return applyTransition(state, { operation: 'playDealRound', phase: state.phase, playerId }, (draft) =>
    new DealManager(draft).play(playerId, guess),
  );
}

/** PYRAMID */

export function startPyramid(state: SocialGameState): Transition<SocialGameState, PyramidStartedOutcome> {
  return applyTransition(state, { operation: 'startPyramid', phase: state.phase }, (draft) =>
    new PyramidManager(draft).start(),
  );
}

export function flipPyramidCard(state: SocialGameState): Transition<SocialGameState, PyramidFlipOutcome> {
  return applyTransition(state, { operation: 'flipPyramidCard', phase: state.phase }, (draft) =>
    new PyramidManager(draft).flip(),
  );
}

export function commitMatch(
  state: SocialGameState,
  playerId: string,
  card: Card,
  targetPlayerId: string,
): Transition<SocialGameState, MatchCommittedOutcome> {
  return applyTransition(state, { operation: 'commitMatch', phase: state.phase, playerId }, (draft) =>
    new PyramidManager(draft).commit({ playerId, card, targetPlayerId }),
  );
}

/** BUS */

export function startBus(state: SocialGameState): Transition<SocialGameState, BusStartedOutcome> {
  return applyTransition(state, { operation: 'startBus', phase: state.phase }, (draft) => new BusManager(draft).start());
}

export function flipBusCard(state: SocialGameState): Transition<SocialGameState, BusFlipOutcome> {
  return applyTransition(state, { operation: 'flipBusCard', phase: state.phase }, (draft) =>
    new BusManager(draft).flip(),
  );
}

/** MODE & REMATCH */

export function toggleMode(state: SocialGameState): Transition<SocialGameState, ModeToggledOutcome> {
  return applyTransition(state, { operation: 'toggleMode', phase: state.phase }, (draft): ModeToggledOutcome => {
    draft.mode = draft.mode === 'alcohol' ? 'points' : 'alcohol';
    appendLog(draft, 'mode_toggle', { mode: draft.mode });
    return { type: 'mode_toggled', mode: draft.mode };
  });
}

export function unitLabels(state: SocialGameState): GameConfigLabels {
  const { alcohol_mode: labels } = state.config;
  return state.mode === 'alcohol' ? labels.labels : labels.non_alcohol_labels;
}

/** Same table, config and mode on a fresh seed. */
export function rematch(state: SocialGameState, seed: string | number): Transition<SocialGameState, RematchOutcome> {
  return ErrorHandler.monitor({ operation: 'rematch', phase: state.phase }, (): Transition<SocialGameState, RematchOutcome> => {
    const validSeed = validateInput(SeedSchema, seed, 'seed');
    const next = buildGame(
      state.players.map((p) => p.name),
      validSeed,
      structuredClone(state.config),
      state.mode,
    );
    appendLog(next, 'rematch_started', { players: next.players.length, seed: validSeed });
    logger.info(`[GAME] Rematch started`, { seed: validSeed });
    return { state: next, outcome: { type: 'rematch_started', seed: validSeed, players: next.players.length } };
  });
}

/** Broadcast-safe view: no seed, no deck order, face-down pyramid cards masked. */
export function toPublicSocialState(state: SocialGameState): PublicSocialState {
  const player = new DealManager(state).currentPlayer();

  return {
    mode: state.mode,
    phase: state.phase,
    turn: player && state.turn ? { playerId: player.id, round: state.turn.round } : null,
    players: structuredClone(state.players),
    pyramid: state.pyramid
      ? {
          flipped: state.pyramid.flipped,
          rows: state.pyramid.rows.map((row) =>
            row.map((cell): PublicPyramidCell => ({
              faceUp: cell.faceUp,
              card: cell.faceUp ? { ...cell.card } : { ...HIDDEN_CARD },
            })),
          ),
        }
      : null,
    bus: state.bus ? structuredClone(state.bus) : null,
    deckSize: state.deck.cards.length,
    log: structuredClone(state.log),
  };
}
