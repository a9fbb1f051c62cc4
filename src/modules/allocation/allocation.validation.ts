import { z } from 'zod';

const identifier = z.string().trim().min(1).max(100);

export const manualAssignmentSchema = z
  .object({
    requestId: identifier,
    slotId: identifier,
  })
  .strict();

export const assignmentIdParamsSchema = z.object({
  id: identifier,
});

export type ManualAssignmentInput = z.infer<typeof manualAssignmentSchema>;
