import { z } from 'zod';

/** Ids are PostgreSQL INTEGER columns. */
export const MAX_ID = 2147483647;

export const idSchema = z.number().int().positive().max(MAX_ID);

export const idParamsSchema = z.object({
  id: z.coerce.number().int().positive().max(MAX_ID),
});

export const expiresAtSchema = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value))
  .refine((date) => date.getTime() > Date.now(), 'expiresAt must be in the future')
  .nullable()
  .optional();

export const nameSchema = z.string().trim().min(1).max(200);
