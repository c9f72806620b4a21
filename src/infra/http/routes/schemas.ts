import { z } from 'zod';

export const idParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});

export const usernameParamsSchema = z.object({
  username: z.string().min(1).max(50),
});

export const usernameAndIdParamsSchema = usernameParamsSchema.extend({
  id: z.coerce.number().int().positive(),
});

/** Optional on create and update; `null` clears the stored value. */
export function nullableText(max = 255) {
  return z.string().max(max).nullable().optional();
}

export const isoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a date in YYYY-MM-DD format');
