import { z } from 'zod';
import { CARD_VALUES, SUITS } from '../../types/card.js';

export const PlayerNameSchema = z
  .string()
  .trim()
  .min(1)
  .max(20)
  .regex(/^[\p{L}\p{N} _-]+$/u);

export const PlayerNamesSchema = (maxPlayers: number) =>
  z
    .array(PlayerNameSchema)
    .min(2)
    .max(maxPlayers)
    .refine((names) => new Set(names.map((n) => n.toLowerCase())).size === names.length, {
      message: 'Player names must be unique',
    });

export const SeedSchema = z.union([z.string().min(1), z.number().int()]).transform(String);

export const BetSchema = z.number().positive().finite();

export const CardSchema = z.strictObject({
  suit: z.enum(SUITS),
  value: z.enum(CARD_VALUES),
});

export const MatchCommitSchema = z.strictObject({
  playerId: z.string().min(1),
  targetPlayerId: z.string().min(1),
  card: CardSchema,
});

export type MatchCommitInput = z.infer<typeof MatchCommitSchema>;
