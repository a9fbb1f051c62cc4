import { Router } from 'express';
import type { SchedulingService } from '../../services/scheduling.service.js';
import { validate } from '../../middleware/validate.js';
import { createSlotsController } from './slots.controller.js';
import { blackoutSchema, registerSlotSchema } from './slots.validation.js';

export function createSlotsRoutes(service: SchedulingService): Router {
  const router = Router();
  const ctrl = createSlotsController(service);

  router.post('/', validate(registerSlotSchema), ctrl.registerSlot);
  router.get('/', ctrl.listSlots);
  router.get('/demand', ctrl.getDemand);
  router.post('/:id/blackout', validate(blackoutSchema), ctrl.setBlackout);
  router.get('/:id/waitlist', ctrl.getWaitlist);

  return router;
}
