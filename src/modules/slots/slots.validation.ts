import { z } from 'zod';

const identifier = z.string().trim().min(1).max(100);

const isoDate = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value));

export const registerSlotSchema = z
  .object({
    id: identifier,
    startsAt: isoDate,
    endsAt: isoDate,
    capacity: z.number().int().positive(),
    blackout: z.boolean().default(false),
  })
  .strict()
  .refine((slot) => slot.endsAt.getTime() > slot.startsAt.getTime(), {
    message: 'endsAt must be after startsAt',
    path: ['endsAt'],
  });

export const blackoutSchema = z
  .object({
    blackout: z.boolean(),
  })
  .strict();

export const slotIdParamsSchema = z.object({
  id: identifier,
});

export type RegisterSlotInput = z.infer<typeof registerSlotSchema>;
export type BlackoutInput = z.infer<typeof blackoutSchema>;
