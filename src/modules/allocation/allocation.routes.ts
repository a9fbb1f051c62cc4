import { Router } from 'express';
import type { SchedulingService } from '../../services/scheduling.service.js';
import { validate } from '../../middleware/validate.js';
import { createAllocationController } from './allocation.controller.js';
import { manualAssignmentSchema } from './allocation.validation.js';

export function createAllocationRoutes(service: SchedulingService): Router {
  const router = Router();
  const ctrl = createAllocationController(service);

  router.post('/run', ctrl.runAllocation);
  router.post('/assignments/:id/cancel', ctrl.cancelAssignment);
  router.post('/manual', validate(manualAssignmentSchema), ctrl.assignManually);
  router.get('/report', ctrl.getReport);
  router.post('/close', ctrl.closeCycle);

  return router;
}
