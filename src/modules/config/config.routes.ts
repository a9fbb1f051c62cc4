import { Router } from 'express';
import type { SchedulingService } from '../../services/scheduling.service.js';
import { validate } from '../../middleware/validate.js';
import { createConfigController } from './config.controller.js';
import { scoringWeightsSchema } from './config.validation.js';

export function createConfigRoutes(service: SchedulingService): Router {
  const router = Router();
  const ctrl = createConfigController(service);

  router.get('/weights', ctrl.getWeights);
  router.put('/weights', validate(scoringWeightsSchema), ctrl.updateWeights);

  return router;
}
