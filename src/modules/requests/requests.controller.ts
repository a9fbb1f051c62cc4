import type { Request, Response } from 'express';
import type { SchedulingService } from '../../services/scheduling.service.js';
import { asyncHandler } from '../../utils/asyncHandler.js';
import {
  listRequestsQuerySchema,
  requestIdParamsSchema,
  type SubmitRequestsInput,
} from './requests.validation.js';

export function createRequestsController(service: SchedulingService) {
  return {
    // ── Intake from the application pipeline ──
    submitRequests: asyncHandler(async (req: Request, res: Response) => {
      const { requests }: SubmitRequestsInput = req.body;
      const created = await service.submitRequests(requests);
      res.status(201).json({ success: true, data: created });
    }),

    listRequests: asyncHandler(async (req: Request, res: Response) => {
      const filter = listRequestsQuerySchema.parse(req.query);
      res.json({ success: true, data: await service.listRequests(filter) });
    }),

    getRequest: asyncHandler(async (req: Request, res: Response) => {
      const { id } = requestIdParamsSchema.parse(req.params);
      res.json({ success: true, data: await service.getRequest(id) });
    }),

    archiveRequest: asyncHandler(async (req: Request, res: Response) => {
      const { id } = requestIdParamsSchema.parse(req.params);
      const request = await service.archiveRequest(id);
      res.json({ success: true, data: request });
    }),
  };
}
