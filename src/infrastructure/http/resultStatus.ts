import type { Response } from 'express';

import type { BookingResult } from '../../application/services/bookingLedger';
import type { ConfirmSlotResult, DeleteSlotResult } from '../../application/services/slotScheduler';

type ResultCode = BookingResult['code'] | ConfirmSlotResult['code'] | DeleteSlotResult['code'];

export const RESULT_STATUS = {
  confirmed: 201,
  cancelled: 200,
  created: 201,
  updated: 200,
  deleted: 200,
  user_not_found: 404,
  slot_not_found: 404,
  no_active_booking: 404,
  user_blocked: 403,
  rate_limited: 429,
  invalid_input: 422,
  opening_in_past: 422,
  closing_in_past: 422,
  slot_started: 409,
  capacity_below_bookings: 409,
  already_booked: 409,
  fully_booked: 409,
  cancel_after_start: 409,
  same_day_conflict: 409,
  previous_day_overlap: 409,
  next_day_overlap: 409,
  time_conflict: 409,
  has_bookings: 409,
  weather_unavailable: 503,
  server_error: 500
} satisfies Record<ResultCode, number>;

/** Writes an operation result as `{ code, message }` plus any extra fields. */
export function sendResult(
  res: Response,
  result: { code: ResultCode; message: string },
  extra: Record<string, unknown> = {}
): void {
  res.status(RESULT_STATUS[result.code]).json({ code: result.code, message: result.message, ...extra });
}
