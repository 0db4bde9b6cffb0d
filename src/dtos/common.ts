import { z } from 'zod';

export const idSchema = z.coerce.number().int().positive();

export const isoDateTimeSchema = z.string().datetime();

export const calendarDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected YYYY-MM-DD');

export const timeOfDaySchema = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'Expected HH:MM');

export const userRoleSchema = z.enum(['user', 'admin']);

export const resultResponseSchema = z.object({
  code: z.string(),
  message: z.string()
});

export type ResultResponse = z.infer<typeof resultResponseSchema>;
