import type { Request, Response } from 'express';
import type { SchedulingService } from '../../services/scheduling.service.js';
import { asyncHandler } from '../../utils/asyncHandler.js';
import type { ScoringWeightsInput } from './config.validation.js';

export function createConfigController(service: SchedulingService) {
  return {
    getWeights: asyncHandler(async (_req: Request, res: Response) => {
      const [weights, cycle] = await Promise.all([service.getWeights(), service.getCycle()]);
      res.json({ success: true, data: { weights, cycle } });
    }),

    updateWeights: asyncHandler(async (req: Request, res: Response) => {
      const input: ScoringWeightsInput = req.body;
      const weights = await service.updateWeights(input);
      res.json({ success: true, data: { weights, cycle: await service.getCycle() } });
    }),
  };
}
