import { readFileSync } from 'node:fs';
import { env } from './env.js';
import logger from '../utils/logger.js';
import { validateInput } from '../utils/validate.js';
import { ConfigError } from '../utils/errors/gameValidationError.js';
import { GameConfigSchema, type GameConfig } from '../utils/validator/config.validator.js';

export const defaultGameConfig = (): GameConfig => ({
  penalty: {
    sips_wrong_guess_r1: 1,
    sips_wrong_guess_r2: 1,
    sips_wrong_guess_r3: 1,
    sips_wrong_guess_r4: 1,
  },
  reward: {
    reward_distribute_drinks: 5,
  },
  pyramid: {
    row_values: [1, 2, 3, 4, 5],
    top_card_shot: true,
  },
  bus: {
    length: 10,
    face_card_drinks: { J: 1, Q: 2, K: 3, A: 4 },
    end_when_rider_hand_empty: false,
  },
  alcohol_mode: {
    enabled: true,
    labels: { drink_unit: 'sip', assign_action: 'assign' },
    non_alcohol_labels: { drink_unit: 'point', assign_action: 'give' },
  },
  house_rules: {
    allow_multiple_matches_per_flip: false,
    limit_assign_target_once_per_flip: false,
  },
  casino: {
    round_multipliers: [2, 2, 3, 4],
  },
  advisor: {
    condition_on_seen_cards: false,
  },
});

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

// Arrays and scalars from the override replace the default wholesale.
function mergeDefaults(base: unknown, override: unknown): unknown {
  if (!isPlainObject(base) || !isPlainObject(override)) {
    return override === undefined ? base : override;
  }
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    merged[key] = mergeDefaults(base[key], value);
  }
  return merged;
}

export interface ParseConfigOptions {
  /** Fill missing keys from the documented defaults. Unknown keys still fail. */
  allowDefaults?: boolean;
}

export function parseGameConfig(input: unknown, options: ParseConfigOptions = {}): GameConfig {
  const candidate = options.allowDefaults ? mergeDefaults(defaultGameConfig(), input) : input;
  return validateInput(GameConfigSchema, candidate, 'game config', (message, details) => new ConfigError(message, details));
}

export function loadGameConfigFile(path: string, options: ParseConfigOptions = {}): GameConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot read game config from ${path}: ${reason}`);
  }

  const config = parseGameConfig(raw, options);
  logger.info(`[CONFIG] Loaded game config from ${path}`);
  return config;
}

/** Reads GAME_CONFIG_PATH when set, documented defaults otherwise. */
export function loadGameConfig(options: ParseConfigOptions = { allowDefaults: true }): GameConfig {
  if (!env.GAME_CONFIG_PATH) {
    logger.debug('[CONFIG] GAME_CONFIG_PATH not set, using defaults');
    return defaultGameConfig();
  }
  return loadGameConfigFile(env.GAME_CONFIG_PATH, options);
}
