import type { Request, Response } from 'express';
import type { SchedulingService } from '../../services/scheduling.service.js';
import { asyncHandler } from '../../utils/asyncHandler.js';
import { assignmentIdParamsSchema, type ManualAssignmentInput } from './allocation.validation.js';

export function createAllocationController(service: SchedulingService) {
  return {
    runAllocation: asyncHandler(async (_req: Request, res: Response) => {
      const report = await service.runAllocation();
      res.json({ success: true, data: report });
    }),

    // ── Cancellation releases the seat and promotes in one step ──
    cancelAssignment: asyncHandler(async (req: Request, res: Response) => {
      const { id } = assignmentIdParamsSchema.parse(req.params);
      const report = await service.cancelAssignment(id);
      res.json({ success: true, data: report });
    }),

    assignManually: asyncHandler(async (req: Request, res: Response) => {
      const { requestId, slotId }: ManualAssignmentInput = req.body;
      const assignment = await service.assignManually(requestId, slotId);
      res.status(201).json({ success: true, data: assignment });
    }),

    getReport: asyncHandler(async (_req: Request, res: Response) => {
      res.json({ success: true, data: await service.decisionReport() });
    }),

    closeCycle: asyncHandler(async (_req: Request, res: Response) => {
      const report = await service.closeCycle();
      res.json({ success: true, data: report });
    }),
  };
}
