import { z } from 'zod';
import { CycleStatus } from '../../utils/constants.js';

const weight = z.number().int().min(0);

// Unknown keys are refused, not dropped
export const scoringWeightsSchema = z
  .object({
    sibling_bonus: weight,
    completeness_bonus: weight,
    distance_weight: weight,
    urgency_weight: weight,
  })
  .strict();

export const cycleStateSchema = z.object({
  status: z.nativeEnum(CycleStatus),
  closedAt: z.coerce.date().nullable(),
});

export type ScoringWeightsInput = z.infer<typeof scoringWeightsSchema>;
