import { z } from 'zod';

const drinks = z.number().int().nonnegative();

const LabelsSchema = z.strictObject({
  drink_unit: z.string().min(1),
  assign_action: z.string().min(1),
});

export const GameConfigSchema = z.strictObject({
  penalty: z.strictObject({
    sips_wrong_guess_r1: drinks,
    sips_wrong_guess_r2: drinks,
    sips_wrong_guess_r3: drinks,
    sips_wrong_guess_r4: drinks,
  }),
  reward: z.strictObject({
    reward_distribute_drinks: drinks,
  }),
  pyramid: z.strictObject({
    row_values: z.tuple([drinks, drinks, drinks, drinks, drinks]),
    top_card_shot: z.boolean(),
  }),
  bus: z.strictObject({
    length: z.number().int().min(1).max(10),
    face_card_drinks: z.strictObject({ J: drinks, Q: drinks, K: drinks, A: drinks }),
    end_when_rider_hand_empty: z.boolean(),
  }),
  alcohol_mode: z.strictObject({
    enabled: z.boolean(),
    labels: LabelsSchema,
    non_alcohol_labels: LabelsSchema,
  }),
  house_rules: z.strictObject({
    allow_multiple_matches_per_flip: z.boolean(),
    limit_assign_target_once_per_flip: z.boolean(),
  }),
  casino: z.strictObject({
    round_multipliers: z.tuple([
      z.number().positive(),
      z.number().positive(),
      z.number().positive(),
      z.number().positive(),
    ]),
  }),
  advisor: z.strictObject({
    condition_on_seen_cards: z.boolean(),
  }),
});

export type GameConfig = z.infer<typeof GameConfigSchema>;
export type GameConfigLabels = z.infer<typeof LabelsSchema>;
