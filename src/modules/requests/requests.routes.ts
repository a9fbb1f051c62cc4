import { Router } from 'express';
import type { SchedulingService } from '../../services/scheduling.service.js';
import { validate } from '../../middleware/validate.js';
import { createRequestsController } from './requests.controller.js';
import { submitRequestsSchema } from './requests.validation.js';

export function createRequestsRoutes(service: SchedulingService): Router {
  const router = Router();
  const ctrl = createRequestsController(service);

  router.post('/', validate(submitRequestsSchema), ctrl.submitRequests);
  router.get('/', ctrl.listRequests);
  router.get('/:id', ctrl.getRequest);
  router.post('/:id/archive', ctrl.archiveRequest);

  return router;
}
