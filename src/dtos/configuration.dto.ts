import { z } from 'zod';

import { timeOfDaySchema } from './common';

export const updateConfigurationBodySchema = z
  .object({
    latitude: z.number(),
    longitude: z.number(),
    timezone: z.string().min(1),
    weatherThreshold: z.number(),
    maxBookingsPerEvent: z.number().int(),
    defaultOpeningTime: timeOfDaySchema,
    defaultClosingTime: timeOfDaySchema
  })
  .partial()
  .strict();

export type UpdateConfigurationBody = z.infer<typeof updateConfigurationBodySchema>;
