import {
  SLOT_DELETED_EVENT,
  SLOT_SCHEDULED_EVENT,
  logger,
  publishSafely,
  runWithSpan,
  slotMetrics,
  systemClock,
  type Clock,
  type IEventBus,
  type Mutex,
  type SlotDeletedEvent,
  type SlotScheduledEvent
} from '@observatory/shared';

import { DEFAULT_HOURS_REFERENCE_DATE, type SiteConfiguration } from '../../domain/configuration';
import {
  DESCRIPTION_MAX_LENGTH,
  Slot,
  TITLE_MAX_LENGTH,
  type SlotWindow
} from '../../domain/slot';
import {
  DAY_MS,
  addMilliseconds,
  parseCalendarDate,
  parseTimeOfDay,
  startOfUtcDay,
  utcTimeToLocal,
  zonedDateTimeToUtc
} from '../../domain/zonedTime';
import type { WeatherLookup } from '../../modules/weather/application/weatherProvider';
import type { WeatherAssessment } from '../../modules/weather/domain/rating';
import type { SlotRepository, UnitOfWork, UnitOfWorkFactory } from '../../repository/interfaces';

export interface ConfirmSlotInput {
  title: string;
  description?: string;
  /** YYYY-MM-DD, local to the configured timezone. */
  date: string;
  /** HH:MM local; defaults to the configured opening time. */
  openingTime?: string;
  /** HH:MM local; at or before opening means the following day. */
  closingTime?: string;
  maxBookings?: number;
}

export type SlotWriteFailureCode =
  | 'invalid_input'
  | 'opening_in_past'
  | 'closing_in_past'
  | 'weather_unavailable'
  | 'slot_not_found'
  | 'slot_started'
  | 'capacity_below_bookings'
  | 'same_day_conflict'
  | 'previous_day_overlap'
  | 'next_day_overlap'
  | 'time_conflict'
  | 'server_error';

export type ConfirmSlotResult =
  | { ok: true; code: 'created' | 'updated'; message: string; slot: Slot }
  | { ok: false; code: SlotWriteFailureCode; message: string; conflictingSlotId?: number };

export type DeleteSlotResult =
  | { ok: true; code: 'deleted'; message: string }
  | {
      ok: false;
      code: 'slot_not_found' | 'slot_started' | 'has_bookings' | 'server_error';
      message: string;
    };

export const SLOT_MESSAGES = {
  created: 'Event created successfully.',
  updated: 'Event updated successfully.',
  invalid_input: 'Invalid input parameters.',
  opening_in_past: 'Cannot schedule or edit an event with opening time in the past.',
  closing_in_past: 'Cannot schedule or edit an event with closing time in the past.',
  weather_unavailable: 'Weather service not available.',
  slot_not_found: 'Event not found.',
  capacity_below_bookings: 'Maximum bookings cannot be lower than the number of confirmed bookings.',
  slot_started: 'Cannot modify an event that has already started or ended.',
  same_day_conflict: 'Only one event can start per day.',
  previous_day_overlap: "Start time overlaps with previous day's event.",
  next_day_overlap: "End time overlaps with next day's event.",
  server_error: 'Event could not be saved due to a server error.',
  deleted: 'Event deleted successfully.',
  delete_started: 'Cannot delete an event that has finished or already started.',
  has_bookings: 'Cannot delete event with existing bookings.'
} as const;

export function timeConflictMessage(slotId: number): string {
  return `Time conflict with another event (ID: ${slotId}).`;
}

type Failure = Extract<ConfirmSlotResult, { ok: false }>;

function failure(code: Exclude<SlotWriteFailureCode, 'time_conflict'>): Failure {
  return { ok: false, code, message: SLOT_MESSAGES[code] };
}

export interface SlotSchedulerDependencies {
  unitOfWork: UnitOfWorkFactory;
  eventBus: IEventBus;
  /** Shared with configuration updates; serialises admin writes. */
  adminLock: Mutex;
  /** Absent when forecasts are disabled: slot writes are then refused. */
  weather?: WeatherLookup;
  clock?: Clock;
}

interface ValidatedInput {
  title: string;
  description: string;
  date: string;
  maxBookings?: number;
}

/**
 * Computes the UTC window of a slot from a local calendar date and local
 * opening/closing hours. A closing hour at or before the opening hour rolls
 * over to the following day.
 */
export function computeSlotWindow(
  date: string,
  openingTime: string,
  closingTime: string,
  timezone: string
): { start: Date; end: Date } {
  const start = zonedDateTimeToUtc(date, openingTime, timezone);
  const opening = parseTimeOfDay(openingTime);
  const closing = parseTimeOfDay(closingTime);
  const overnight =
    opening !== null &&
    closing !== null &&
    closing.hour * 60 + closing.minute <= opening.hour * 60 + opening.minute;

  const closingDate = overnight ? nextCalendarDate(date) : date;
  return { start, end: zonedDateTimeToUtc(closingDate, closingTime, timezone) };
}

function nextCalendarDate(date: string): string {
  const next = addMilliseconds(new Date(`${date}T00:00:00Z`), DAY_MS);
  return next.toISOString().slice(0, 10);
}

export class SlotScheduler {
  private readonly clock: Clock;

  constructor(private readonly deps: SlotSchedulerDependencies) {
    this.clock = deps.clock ?? systemClock;
  }

  async confirmSlot(input: ConfirmSlotInput, slotId?: number): Promise<ConfirmSlotResult> {
    return runWithSpan(
      'SlotScheduler.confirmSlot',
      async () => {
        const result = await this.confirm(input, slotId);
        slotMetrics.writes.inc({ operation: slotId === undefined ? 'create' : 'update', outcome: result.code });
        return result;
      },
      { 'slot.id': slotId }
    );
  }

  async deleteSlot(slotId: number): Promise<DeleteSlotResult> {
    const slotLogger = logger.withContext({ slotId });

    try {
      const result = await this.deps.adminLock.runExclusive(() =>
        this.deps.unitOfWork.withTransaction(async (uow): Promise<DeleteSlotResult> => {
          const slot = await uow.slots.findByIdForUpdate(slotId);
          if (!slot) {
            return { ok: false, code: 'slot_not_found', message: SLOT_MESSAGES.slot_not_found };
          }

          if (slot.hasStarted(this.clock())) {
            return { ok: false, code: 'slot_started', message: SLOT_MESSAGES.delete_started };
          }

          if ((await uow.bookings.countForSlot(slotId)) > 0) {
            return { ok: false, code: 'has_bookings', message: SLOT_MESSAGES.has_bookings };
          }

          await uow.slots.delete(slotId);
          return { ok: true, code: 'deleted', message: SLOT_MESSAGES.deleted };
        })
      );

      slotMetrics.writes.inc({ operation: 'delete', outcome: result.code });
      if (result.ok) {
        slotLogger.info('Event deleted');
        await publishSafely<SlotDeletedEvent>(this.deps.eventBus, SLOT_DELETED_EVENT, { slotId });
      }
      return result;
    } catch (error) {
      slotLogger.error({ error }, 'Error deleting event');
      slotMetrics.writes.inc({ operation: 'delete', outcome: 'server_error' });
      return { ok: false, code: 'server_error', message: SLOT_MESSAGES.server_error };
    }
  }

  private async confirm(input: ConfirmSlotInput, slotId?: number): Promise<ConfirmSlotResult> {
    const slotLogger = logger.withContext({ slotId });
    const validated = validateInput(input);
    if (!validated) {
      return failure('invalid_input');
    }

    try {
      const site = await this.deps.unitOfWork.withTransaction((uow) => uow.configuration.getOrCreate());
      const openingTime =
        input.openingTime ?? utcTimeToLocal(site.defaultOpeningTime, site.timezone, DEFAULT_HOURS_REFERENCE_DATE);
      const closingTime =
        input.closingTime ?? utcTimeToLocal(site.defaultClosingTime, site.timezone, DEFAULT_HOURS_REFERENCE_DATE);
      if (!parseTimeOfDay(openingTime) || !parseTimeOfDay(closingTime)) {
        return failure('invalid_input');
      }

      const { start, end } = computeSlotWindow(validated.date, openingTime, closingTime, site.timezone);
      const now = this.clock();
      if (start.getTime() < now.getTime()) return failure('opening_in_past');
      if (end.getTime() < now.getTime()) return failure('closing_in_past');

      const weather = await this.lookupWeather(start, end, site);
      if (!weather) {
        return failure('weather_unavailable');
      }

      const window: SlotWindow = {
        title: validated.title,
        description: validated.description,
        startTime: start,
        endTime: end,
        maxBookings: validated.maxBookings ?? site.maxBookingsPerEvent
      };

      const result = await this.deps.adminLock.runExclusive(() =>
        this.deps.unitOfWork.withTransaction((uow) => this.save(uow, window, weather, slotId))
      );

      if (result.ok) {
        slotLogger.info({ slotId: result.slot.id, startTime: start.toISOString() }, `Event ${result.code}`);
        await publishSafely<SlotScheduledEvent>(this.deps.eventBus, SLOT_SCHEDULED_EVENT, {
          slotId: result.slot.id,
          operation: result.code,
          startTime: start.toISOString(),
          endTime: end.toISOString(),
          maxBookings: window.maxBookings,
          weatherRating: weather.rating,
          weatherWarning: weather.warning
        });
      }
      return result;
    } catch (error) {
      slotLogger.error({ error }, 'Error confirming event');
      return failure('server_error');
    }
  }

  private async lookupWeather(start: Date, end: Date, site: SiteConfiguration): Promise<WeatherAssessment | null> {
    if (!this.deps.weather) {
      return null;
    }
    return this.deps.weather.getEventWeather(start, end, site);
  }

  private async save(
    uow: UnitOfWork,
    window: SlotWindow,
    weather: WeatherAssessment,
    slotId?: number
  ): Promise<ConfirmSlotResult> {
    let existing: Slot | null = null;
    let confirmed = 0;
    if (slotId !== undefined) {
      existing = await uow.slots.findByIdForUpdate(slotId);
      if (!existing) return failure('slot_not_found');
      if (!existing.isModifiable(this.clock())) return failure('slot_started');
      confirmed = await uow.bookings.countConfirmed(slotId);
      if (window.maxBookings < confirmed) return failure('capacity_below_bookings');
    }

    const conflict = await findConflict(uow.slots, window.startTime, window.endTime, slotId);
    if (conflict) {
      return conflict;
    }

    if (existing) {
      existing.reschedule(window, weather);
      existing.syncAvailability(confirmed);
      await uow.slots.update(existing);
      return { ok: true, code: 'updated', message: SLOT_MESSAGES.updated, slot: existing };
    }

    const created = await uow.slots.insert(Slot.draft(window, weather));
    return { ok: true, code: 'created', message: SLOT_MESSAGES.created, slot: created };
  }
}

/**
 * Overlap rules, first match wins: another slot starting on the same UTC
 * day; a slot from the previous UTC day running past `start`; a slot on the
 * next UTC day starting before `end`; any other intersecting window.
 */
export async function findConflict(
  slots: SlotRepository,
  start: Date,
  end: Date,
  excludeId?: number
): Promise<Failure | null> {
  const dayStart = startOfUtcDay(start);
  const nextDay = addMilliseconds(dayStart, DAY_MS);

  const sameDay = await slots.find({ startsAtOrAfter: dayStart, startsBefore: nextDay, excludeId });
  if (sameDay.length > 0) return failure('same_day_conflict');

  const previousDay = await slots.find({
    startsAtOrAfter: addMilliseconds(dayStart, -DAY_MS),
    startsBefore: dayStart,
    endsAfter: start,
    excludeId
  });
  if (previousDay.length > 0) return failure('previous_day_overlap');

  const dayAfterNext = addMilliseconds(nextDay, DAY_MS);
  const nextDayOverlap = await slots.find({
    startsAtOrAfter: nextDay,
    startsBefore: end.getTime() < dayAfterNext.getTime() ? end : dayAfterNext,
    excludeId
  });
  if (nextDayOverlap.length > 0) return failure('next_day_overlap');

  const [overlapping] = await slots.find({ endsAfter: start, startsBefore: end, excludeId });
  if (overlapping) {
    return {
      ok: false,
      code: 'time_conflict',
      message: timeConflictMessage(overlapping.id),
      conflictingSlotId: overlapping.id
    };
  }

  return null;
}

function validateInput(input: ConfirmSlotInput): ValidatedInput | null {
  const title = input.title.trim();
  const description = (input.description ?? '').trim();

  if (!title || title.length > TITLE_MAX_LENGTH || description.length > DESCRIPTION_MAX_LENGTH) {
    return null;
  }

  if (input.maxBookings !== undefined && (!Number.isInteger(input.maxBookings) || input.maxBookings < 1)) {
    return null;
  }

  if (!parseCalendarDate(input.date)) {
    return null;
  }

  return { title, description, date: input.date, maxBookings: input.maxBookings };
}
