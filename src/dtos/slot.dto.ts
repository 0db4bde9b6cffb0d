import { z } from 'zod';

import { calendarDateSchema, idSchema, isoDateTimeSchema, timeOfDaySchema } from './common';

export const slotResourceSchema = z.object({
  id: z.number().int(),
  title: z.string(),
  description: z.string(),
  startTime: isoDateTimeSchema,
  endTime: isoDateTimeSchema,
  maxBookings: z.number().int(),
  available: z.boolean(),
  weatherRating: z.number().nullable(),
  weatherWarning: z.boolean(),
  weatherForecast: z.boolean()
});

export const catalogSlotResourceSchema = slotResourceSchema.extend({
  bookedCount: z.number().int(),
  fullyBooked: z.boolean(),
  bookedByMe: z.boolean()
});

/** Calendar row for the admin dashboard; times rendered in the site timezone. */
export const calendarSlotResourceSchema = slotResourceSchema.extend({
  localDate: calendarDateSchema,
  openingTime: timeOfDaySchema,
  closingTime: timeOfDaySchema,
  bookedCount: z.number().int()
});

export const slotParamsSchema = z.object({
  slotId: idSchema
});

export const confirmSlotRequestSchema = z.object({
  title: z.string(),
  description: z.string().optional(),
  date: calendarDateSchema,
  openingTime: timeOfDaySchema.optional(),
  closingTime: timeOfDaySchema.optional(),
  maxBookings: z.number().int().optional()
});

export type SlotResource = z.infer<typeof slotResourceSchema>;
export type CatalogSlotResource = z.infer<typeof catalogSlotResourceSchema>;
export type CalendarSlotResource = z.infer<typeof calendarSlotResourceSchema>;
export type SlotParams = z.infer<typeof slotParamsSchema>;
export type ConfirmSlotRequest = z.infer<typeof confirmSlotRequestSchema>;
