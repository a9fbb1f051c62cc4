import type { Request, Response } from 'express';
import type { SchedulingService } from '../../services/scheduling.service.js';
import { asyncHandler } from '../../utils/asyncHandler.js';
import { slotIdParamsSchema, type BlackoutInput, type RegisterSlotInput } from './slots.validation.js';

export function createSlotsController(service: SchedulingService) {
  return {
    registerSlot: asyncHandler(async (req: Request, res: Response) => {
      const input: RegisterSlotInput = req.body;
      const slot = await service.registerSlot(input);
      res.status(201).json({ success: true, data: slot });
    }),

    listSlots: asyncHandler(async (_req: Request, res: Response) => {
      res.json({ success: true, data: await service.listSlots() });
    }),

    setBlackout: asyncHandler(async (req: Request, res: Response) => {
      const { blackout }: BlackoutInput = req.body;
      const { id } = slotIdParamsSchema.parse(req.params);
      const slot = await service.setBlackout(id, blackout);
      res.json({ success: true, data: slot });
    }),

    // ── Applicant demand per slot ──
    getDemand: asyncHandler(async (_req: Request, res: Response) => {
      res.json({ success: true, data: await service.demandReport() });
    }),

    getWaitlist: asyncHandler(async (req: Request, res: Response) => {
      const { id } = slotIdParamsSchema.parse(req.params);
      res.json({ success: true, data: await service.slotWaitlist(id) });
    }),
  };
}
