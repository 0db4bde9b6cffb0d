import { z } from 'zod';

import { isoDateTimeSchema } from './common';
import { slotResourceSchema } from './slot.dto';

export const bookingStatusSchema = z.enum(['confirmed', 'pending', 'cancelled']);

export const bookingResourceSchema = z.object({
  id: z.number().int(),
  userId: z.number().int(),
  slotId: z.number().int(),
  status: bookingStatusSchema,
  createdAt: isoDateTimeSchema
});

export const userBookingResourceSchema = bookingResourceSchema.extend({
  slot: slotResourceSchema
});

export type BookingResource = z.infer<typeof bookingResourceSchema>;
export type UserBookingResource = z.infer<typeof userBookingResourceSchema>;
