import {
  BOOKING_CANCELLED_EVENT,
  BOOKING_CONFIRMED_EVENT,
  bookingMetrics,
  isUniqueViolation,
  logger,
  publishSafely,
  runWithSpan,
  systemClock,
  type BookingCancelledEvent,
  type BookingConfirmedEvent,
  type Clock,
  type IEventBus,
  type Mutex
} from '@observatory/shared';

import type { Slot } from '../../domain/slot';
import type { UnitOfWork, UnitOfWorkFactory } from '../../repository/interfaces';
import type { RateLimiter } from '../rateLimiter';

export type BookingFailureCode =
  | 'user_not_found'
  | 'user_blocked'
  | 'slot_not_found'
  | 'rate_limited'
  | 'slot_started'
  | 'already_booked'
  | 'fully_booked'
  | 'no_active_booking'
  | 'cancel_after_start'
  | 'server_error';

export type BookingResult =
  | { ok: true; code: 'confirmed' | 'cancelled'; message: string }
  | { ok: false; code: BookingFailureCode; message: string };

export const BOOKING_MESSAGES = {
  confirmed: 'Booking confirmed.',
  cancelled: 'Booking cancelled successfully.',
  user_not_found: 'User not found.',
  user_blocked: 'Your account is blocked.',
  slot_not_found: 'Event not found.',
  rate_limited: 'You are rate-limited. Please try again later.',
  slot_started: 'Event is no longer available for booking.',
  already_booked: 'You have already booked this event.',
  fully_booked: 'Event is fully booked.',
  no_active_booking: 'No active booking found for this event.',
  cancel_after_start: 'Cannot cancel booking after event has started.',
  book_failed: 'Booking failed due to a server error.',
  cancel_failed: 'Booking cancellation failed due to a server error.'
} as const;

type GuardCode = Exclude<BookingFailureCode, 'server_error'>;

function rejected(code: GuardCode): BookingResult {
  return { ok: false, code, message: BOOKING_MESSAGES[code] };
}

export interface BookingLedgerDependencies {
  unitOfWork: UnitOfWorkFactory;
  /** One lock for every book and cancel in the process. */
  lock: Mutex;
  rateLimiter: RateLimiter;
  eventBus: IEventBus;
  clock?: Clock;
}

type Transition<E> = { result: BookingResult; event?: E };

/**
 * Books and cancels seats. Each call runs its guards and writes inside one
 * transaction while holding the ledger-wide lock, so capacity checks never
 * race.
 */
export class BookingLedger {
  private readonly clock: Clock;

  constructor(private readonly deps: BookingLedgerDependencies) {
    this.clock = deps.clock ?? systemClock;
  }

  async book(userId: number, slotId: number): Promise<BookingResult> {
    const bookingLogger = logger.withContext({ userId, slotId });

    const outcome = await runWithSpan(
      'BookingLedger.book',
      () =>
        this.exclusive(async (): Promise<Transition<BookingConfirmedEvent>> => {
          try {
            return await this.deps.unitOfWork.withTransaction((uow) => this.bookWithin(uow, userId, slotId));
          } catch (error) {
            if (isUniqueViolation(error)) {
              return { result: rejected('already_booked') };
            }
            bookingLogger.error({ error }, 'Error booking event');
            return {
              result: { ok: false, code: 'server_error', message: BOOKING_MESSAGES.book_failed }
            };
          }
        }),
      { 'user.id': userId, 'slot.id': slotId }
    );

    this.record('book', outcome.result);
    if (outcome.event) {
      bookingLogger.info('User successfully booked event');
      await publishSafely(this.deps.eventBus, BOOKING_CONFIRMED_EVENT, outcome.event);
    }
    return outcome.result;
  }

  async cancel(userId: number, slotId: number): Promise<BookingResult> {
    const bookingLogger = logger.withContext({ userId, slotId });

    const outcome = await runWithSpan(
      'BookingLedger.cancel',
      () =>
        this.exclusive(async (): Promise<Transition<BookingCancelledEvent>> => {
          try {
            return await this.deps.unitOfWork.withTransaction((uow) => this.cancelWithin(uow, userId, slotId));
          } catch (error) {
            bookingLogger.error({ error }, 'Error cancelling booking');
            return {
              result: { ok: false, code: 'server_error', message: BOOKING_MESSAGES.cancel_failed }
            };
          }
        }),
      { 'user.id': userId, 'slot.id': slotId }
    );

    this.record('cancel', outcome.result);
    if (outcome.event) {
      bookingLogger.info('User cancelled booking');
      await publishSafely(this.deps.eventBus, BOOKING_CANCELLED_EVENT, outcome.event);
    }
    return outcome.result;
  }

  private async bookWithin(
    uow: UnitOfWork,
    userId: number,
    slotId: number
  ): Promise<Transition<BookingConfirmedEvent>> {
    const guard = await this.checkParticipants(uow, userId, slotId);
    if ('result' in guard) return guard;
    const { slot } = guard;

    if (slot.hasStarted(this.clock())) {
      return { result: rejected('slot_started') };
    }

    if (await uow.bookings.findConfirmed(userId, slotId)) {
      return { result: rejected('already_booked') };
    }

    const confirmedCount = await uow.bookings.countConfirmed(slotId);
    if (confirmedCount >= slot.maxBookings) {
      return { result: rejected('fully_booked') };
    }

    const booking = await uow.bookings.insert({ userId, slotId, status: 'confirmed' });
    if (slot.syncAvailability(confirmedCount + 1)) {
      await uow.slots.update(slot);
    }

    return {
      result: { ok: true, code: 'confirmed', message: BOOKING_MESSAGES.confirmed },
      event: {
        bookingId: booking.id,
        userId,
        slotId,
        confirmedCount: confirmedCount + 1,
        maxBookings: slot.maxBookings,
        available: slot.available
      }
    };
  }

  private async cancelWithin(
    uow: UnitOfWork,
    userId: number,
    slotId: number
  ): Promise<Transition<BookingCancelledEvent>> {
    const guard = await this.checkParticipants(uow, userId, slotId);
    if ('result' in guard) return guard;
    const { slot } = guard;

    const booking = await uow.bookings.findConfirmedForUpdate(userId, slotId);
    if (!booking) {
      return { result: rejected('no_active_booking') };
    }

    if (slot.hasStarted(this.clock())) {
      return { result: rejected('cancel_after_start') };
    }

    await uow.bookings.delete(booking.id);
    const confirmedCount = await uow.bookings.countConfirmed(slotId);
    if (slot.syncAvailability(confirmedCount)) {
      await uow.slots.update(slot);
    }

    return {
      result: { ok: true, code: 'cancelled', message: BOOKING_MESSAGES.cancelled },
      event: { userId, slotId, confirmedCount, available: slot.available }
    };
  }

  /** User, slot and rate-limit guards shared by both transitions. */
  private async checkParticipants(
    uow: UnitOfWork,
    userId: number,
    slotId: number
  ): Promise<{ slot: Slot } | { result: BookingResult }> {
    const user = await uow.users.findById(userId);
    if (!user) return { result: rejected('user_not_found') };
    if (user.blocked) return { result: rejected('user_blocked') };

    const slot = await uow.slots.findByIdForUpdate(slotId);
    if (!slot) return { result: rejected('slot_not_found') };

    if (this.deps.rateLimiter.isRateLimited(userId)) {
      return { result: rejected('rate_limited') };
    }

    return { slot };
  }

  private async exclusive<T>(criticalSection: () => Promise<T>): Promise<T> {
    const waitStarted = process.hrtime.bigint();
    return this.deps.lock.runExclusive(() => {
      bookingMetrics.lockWait.observe(Number(process.hrtime.bigint() - waitStarted) / 1_000_000_000);
      return criticalSection();
    });
  }

  private record(operation: 'book' | 'cancel', result: BookingResult): void {
    if (result.ok) {
      (operation === 'book' ? bookingMetrics.confirmed : bookingMetrics.cancelled).inc();
      return;
    }
    bookingMetrics.rejected.inc({ operation, reason: result.code });
  }
}
