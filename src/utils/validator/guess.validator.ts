import { z } from 'zod';
import { SUITS } from '../../types/card.js';

export const ColorGuessSchema = z.strictObject({
  kind: z.literal('color'),
  color: z.enum(['red', 'black']),
});

export const DirectionGuessSchema = z.strictObject({
  kind: z.literal('direction'),
  direction: z.enum(['higher', 'lower']),
});

export const RangeGuessSchema = z.strictObject({
  kind: z.literal('range'),
  range: z.enum(['inside', 'outside']),
});

export const SuitGuessSchema = z.strictObject({
  kind: z.literal('suit'),
  suit: z.enum(SUITS),
});

export const GuessSchema = z.discriminatedUnion('kind', [
  ColorGuessSchema,
  DirectionGuessSchema,
  RangeGuessSchema,
  SuitGuessSchema,
]);

export type ColorGuess = z.infer<typeof ColorGuessSchema>;
export type DirectionGuess = z.infer<typeof DirectionGuessSchema>;
export type RangeGuess = z.infer<typeof RangeGuessSchema>;
export type SuitGuess = z.infer<typeof SuitGuessSchema>;
export type Guess = z.infer<typeof GuessSchema>;
export type CasinoGuess = Guess;

/** Legal guess shape per round; deal R1..R4 and casino rounds 1..4 share it. */
export const RoundGuessSchemas = {
  1: ColorGuessSchema,
  2: DirectionGuessSchema,
  3: RangeGuessSchema,
  4: SuitGuessSchema,
} as const;
