import { z } from 'zod';
import {
  MAX_DISTANCE_TIER,
  MAX_GRADE_LEVEL,
  MIN_DISTANCE_TIER,
  MIN_GRADE_LEVEL,
  RequestStatus,
} from '../../utils/constants.js';

const identifier = z.string().trim().min(1).max(100);

export const scoringAttributesSchema = z
  .object({
    gradeLevel: z.number().int().min(MIN_GRADE_LEVEL).max(MAX_GRADE_LEVEL),
    siblingEnrolled: z.boolean(),
    distanceTier: z.number().int().min(MIN_DISTANCE_TIER).max(MAX_DISTANCE_TIER),
    applicationComplete: z.boolean(),
  })
  .strict();

export const consultationRequestSchema = z
  .object({
    id: identifier,
    guardianId: identifier,
    studentId: identifier,
    desiredSlotIds: z
      .array(identifier)
      .max(20)
      .refine((ids) => new Set(ids).size === ids.length, 'desiredSlotIds must not repeat a slot'),
    submittedAt: z
      .string()
      .datetime({ offset: true })
      .transform((value) => new Date(value)),
    attributes: scoringAttributesSchema,
  })
  .strict();

export const submitRequestsSchema = z.object({
  requests: z.array(consultationRequestSchema).min(1).max(500),
});

export const listRequestsQuerySchema = z.object({
  status: z.nativeEnum(RequestStatus).optional(),
  guardianId: identifier.optional(),
  includeArchived: z
    .enum(['true', 'false'])
    .optional()
    .transform((value) => value === 'true'),
});

export const requestIdParamsSchema = z.object({
  id: identifier,
});

export type SubmitRequestsInput = z.infer<typeof submitRequestsSchema>;
