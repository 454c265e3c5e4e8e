import type { Card, AnyCard, CardColor, Deck } from './card.js';
import type { GameConfig } from '../utils/validator/config.validator.js';
import type { ColorGuess, DirectionGuess, RangeGuess, SuitGuess } from '../utils/validator/guess.validator.js';

export type SocialPhase = 'deal' | 'pyramid' | 'bus' | 'finished';
export type DealRound = 'R1' | 'R2' | 'R3' | 'R4';
export type PlayMode = 'alcohol' | 'points';
export type RiderTieBreak = 'most_cards' | 'highest_card' | 'join_order';

export interface Player {
  id: string;
  name: string;
  hand: Card[];
  drinksReceived: number;
  drinksAssigned: number;
}

export interface DealTurn {
  playerIndex: number;
  round: DealRound;
}

export interface PyramidCell {
  card: Card;
  faceUp: boolean;
}

export interface PyramidState {
  /** rows[0] is the bottom row of five. */
  rows: PyramidCell[][];
  flipped: number;
  commitsThisFlip: Record<string, number>;
  targetsThisFlip: string[];
}

export interface BusState {
  riderId: string;
  tieBreak: RiderTieBreak;
  cards: Card[];
  totalDrinks: number;
}

export type LogEntryType =
  | 'game_created'
  | 'guess_made'
  | 'boundary_reshuffle'
  | 'penalty_applied'
  | 'reward_assigned'
  | 'pyramid_started'
  | 'pyramid_flip'
  | 'match_committed'
  | 'bus_started'
  | 'bus_flip'
  | 'game_finished'
  | 'mode_toggle'
  | 'rematch_started';

export interface LogEntry {
  seq: number;
  type: LogEntryType;
  playerId?: string;
  payload: Record<string, string | number | boolean>;
}

export interface SocialGameState {
  seed: string;
  config: GameConfig;
  mode: PlayMode;
  players: Player[];
  phase: SocialPhase;
  turn: DealTurn | null;
  pyramid: PyramidState | null;
  bus: BusState | null;
  deck: Deck;
  log: LogEntry[];
  sequence: number;
}

export type DealGuess = ColorGuess | DirectionGuess | RangeGuess | SuitGuess;

export interface DealRoundOutcome {
  type: 'deal_round';
  playerId: string;
  round: DealRound;
  guess: DealGuess;
  card: Card;
  color: CardColor;
  correct: boolean;
  penalty: number;
  reward: number;
  boundaryRedraws: Card[];
  nextTurn: { playerId: string; round: DealRound } | null;
  dealComplete: boolean;
}

export interface PyramidStartedOutcome {
  type: 'pyramid_started';
  cards: number;
}

export interface PyramidFlipOutcome {
  type: 'pyramid_flip';
  row: number;
  col: number;
  card: Card;
  drinkValue: number;
  shot: boolean;
  matchingPlayerIds: string[];
  pyramidComplete: boolean;
}

export interface MatchCommittedOutcome {
  type: 'match_committed';
  playerId: string;
  targetPlayerId: string;
  card: Card;
  row: number;
  drinks: number;
  shot: boolean;
  cardsLeft: number;
}

export interface BusStartedOutcome {
  type: 'bus_started';
  riderId: string;
  tieBreak: RiderTieBreak;
  busLength: number;
  finished: boolean;
}

export interface BusFlipOutcome {
  type: 'bus_flip';
  riderId: string;
  position: number;
  card: Card;
  drinks: number;
  totalDrinks: number;
  finished: boolean;
}

export interface ModeToggledOutcome {
  type: 'mode_toggled';
  mode: PlayMode;
}

export interface RematchOutcome {
  type: 'rematch_started';
  seed: string;
  players: number;
}

export type SocialOutcome =
  | DealRoundOutcome
  | PyramidStartedOutcome
  | PyramidFlipOutcome
  | MatchCommittedOutcome
  | BusStartedOutcome
  | BusFlipOutcome
  | ModeToggledOutcome
  | RematchOutcome;

export interface PublicPyramidCell {
  card: AnyCard;
  faceUp: boolean;
}

export interface PublicSocialState {
  mode: PlayMode;
  phase: SocialPhase;
  turn: { playerId: string; round: DealRound } | null;
  players: Player[];
  pyramid: { rows: PublicPyramidCell[][]; flipped: number } | null;
  bus: BusState | null;
  deckSize: number;
  log: LogEntry[];
}
