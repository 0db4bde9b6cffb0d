import { beforeEach, describe, expect, it } from 'vitest';

import {
  BOOKING_CANCELLED_EVENT,
  BOOKING_CONFIRMED_EVENT,
  InMemoryEventBus,
  Mutex,
  type EventEnvelope
} from '@observatory/shared';

import { SlidingWindowRateLimiter } from '../../src/application/rateLimiter';
import { BookingLedger } from '../../src/application/services/bookingLedger';
import { Slot } from '../../src/domain/slot';
import type { UserRecord } from '../../src/domain/user';
import { MemoryDatabase } from '../../src/repository/memory/MemoryDatabase';
import { AutocommitDatabase, manualClock, seedUser, type ManualClock } from '../setup/fixtures';

const CLEAR_SKY = { rating: 95, warning: false, forecastAvailable: true };

async function createSlot(db: MemoryDatabase, maxBookings: number, startIso = '2025-06-01T18:00:00Z'): Promise<Slot> {
  const start = new Date(startIso);
  return db.withTransaction((uow) =>
    uow.slots.insert(
      Slot.draft(
        {
          title: 'Star party',
          description: '',
          startTime: start,
          endTime: new Date(start.getTime() + 4 * 60 * 60 * 1000),
          maxBookings
        },
        CLEAR_SKY
      )
    )
  );
}

async function loadSlot(db: MemoryDatabase, id: number): Promise<Slot | null> {
  return db.withTransaction((uow) => uow.slots.findById(id));
}

describe('BookingLedger', () => {
  let db: MemoryDatabase;
  let time: ManualClock;
  let bus: InMemoryEventBus;
  let limiter: SlidingWindowRateLimiter;
  let ledger: BookingLedger;
  let users: UserRecord[];

  beforeEach(async () => {
    time = manualClock('2025-05-30T12:00:00Z');
    db = new MemoryDatabase(time.clock);
    bus = new InMemoryEventBus();
    limiter = new SlidingWindowRateLimiter({ windowMs: 20_000, maxRequests: 10, clock: time.clock });
    ledger = new BookingLedger({ unitOfWork: db, lock: new Mutex(), rateLimiter: limiter, eventBus: bus, clock: time.clock });
    users = [];
    for (let index = 1; index <= 3; index += 1) {
      users.push(await seedUser(db, { email: `user${index}@example.com` }));
    }
  });

  it('fills a slot, rejects the next booker and reopens on cancel', async () => {
    const slot = await createSlot(db, 2);
    const [user1, user2, user3] = users;
    if (!user1 || !user2 || !user3) throw new Error('users not seeded');

    expect(await ledger.book(user1.id, slot.id)).toEqual({ ok: true, code: 'confirmed', message: 'Booking confirmed.' });
    expect((await loadSlot(db, slot.id))?.available).toBe(true);

    expect((await ledger.book(user2.id, slot.id)).code).toBe('confirmed');
    expect((await loadSlot(db, slot.id))?.available).toBe(false);

    expect(await ledger.book(user3.id, slot.id)).toEqual({
      ok: false,
      code: 'fully_booked',
      message: 'Event is fully booked.'
    });

    expect(await ledger.cancel(user1.id, slot.id)).toEqual({
      ok: true,
      code: 'cancelled',
      message: 'Booking cancelled successfully.'
    });
    expect((await loadSlot(db, slot.id))?.available).toBe(true);
    expect(await db.withTransaction((uow) => uow.bookings.countConfirmed(slot.id))).toBe(1);
  });

  it('rejects a second booking by the same user', async () => {
    const slot = await createSlot(db, 5);
    const userId = users[0]?.id ?? 0;

    await ledger.book(userId, slot.id);

    expect(await ledger.book(userId, slot.id)).toEqual({
      ok: false,
      code: 'already_booked',
      message: 'You have already booked this event.'
    });
  });

  it('reports a cancel without a booking', async () => {
    const slot = await createSlot(db, 5);

    expect(await ledger.cancel(users[0]?.id ?? 0, slot.id)).toEqual({
      ok: false,
      code: 'no_active_booking',
      message: 'No active booking found for this event.'
    });
  });

  it('checks the user before the slot', async () => {
    expect(await ledger.book(999, 999)).toEqual({ ok: false, code: 'user_not_found', message: 'User not found.' });
    expect(await ledger.book(users[0]?.id ?? 0, 999)).toEqual({
      ok: false,
      code: 'slot_not_found',
      message: 'Event not found.'
    });
  });

  it('refuses blocked users', async () => {
    const slot = await createSlot(db, 5);
    const blocked = await seedUser(db, { blocked: true });

    expect(await ledger.book(blocked.id, slot.id)).toEqual({
      ok: false,
      code: 'user_blocked',
      message: 'Your account is blocked.'
    });
  });

  it('refuses to book or cancel once the slot has started', async () => {
    const slot = await createSlot(db, 5);
    const userId = users[0]?.id ?? 0;
    await ledger.book(userId, slot.id);

    time.set('2025-06-01T18:00:00Z');

    expect((await ledger.book(users[1]?.id ?? 0, slot.id)).code).toBe('slot_started');
    expect(await ledger.cancel(userId, slot.id)).toEqual({
      ok: false,
      code: 'cancel_after_start',
      message: 'Cannot cancel booking after event has started.'
    });
  });

  it('rate limits a user after too many attempts in the window', async () => {
    const slot = await createSlot(db, 5);
    const userId = users[0]?.id ?? 0;

    for (let attempt = 0; attempt < 10; attempt += 1) {
      await ledger.cancel(userId, slot.id);
    }

    expect(await ledger.book(userId, slot.id)).toEqual({
      ok: false,
      code: 'rate_limited',
      message: 'You are rate-limited. Please try again later.'
    });

    time.advance(20_000);
    expect((await ledger.book(userId, slot.id)).code).toBe('confirmed');
  });

  it('publishes booking events after commit', async () => {
    const slot = await createSlot(db, 1);
    const userId = users[0]?.id ?? 0;
    const received: EventEnvelope[] = [];
    bus.subscribe(BOOKING_CONFIRMED_EVENT, (event) => {
      received.push(event);
    });
    bus.subscribe(BOOKING_CANCELLED_EVENT, (event) => {
      received.push(event);
    });

    await ledger.book(userId, slot.id);
    await ledger.cancel(userId, slot.id);

    expect(received.map((event) => event.type)).toEqual([BOOKING_CONFIRMED_EVENT, BOOKING_CANCELLED_EVENT]);
    expect(received[0]?.payload).toMatchObject({ userId, slotId: slot.id, confirmedCount: 1, maxBookings: 1, available: false });
    expect(received[1]?.payload).toEqual({ userId, slotId: slot.id, confirmedCount: 0, available: true });
  });

  it('confirms exactly as many concurrent bookers as there are seats', async () => {
    const slot = await createSlot(db, 3);
    const crowd: UserRecord[] = [];
    for (let index = 0; index < 12; index += 1) {
      crowd.push(await seedUser(db, { email: `crowd${index}@example.com` }));
    }

    const results = await Promise.all(crowd.map((user) => ledger.book(user.id, slot.id)));

    expect(results.filter((result) => result.code === 'confirmed')).toHaveLength(3);
    expect(results.filter((result) => result.code === 'fully_booked')).toHaveLength(9);
    expect(await db.withTransaction((uow) => uow.bookings.countConfirmed(slot.id))).toBe(3);
    expect((await loadSlot(db, slot.id))?.available).toBe(false);
  });

  describe('when statements of concurrent bookings interleave', () => {
    class UnguardedLock extends Mutex {
      override runExclusive<T>(criticalSection: () => Promise<T>): Promise<T> {
        return criticalSection();
      }
    }

    async function bookCrowd(lock: Mutex): Promise<{ confirmed: number; stored: number; slotId: number }> {
      const slot = await createSlot(db, 3);
      const crowd: UserRecord[] = [];
      for (let index = 0; index < 12; index += 1) {
        crowd.push(await seedUser(db, { email: `crowd${index}@example.com` }));
      }
      const interleaved = new BookingLedger({
        unitOfWork: new AutocommitDatabase(db),
        lock,
        rateLimiter: limiter,
        eventBus: bus,
        clock: time.clock
      });

      const results = await Promise.all(crowd.map((user) => interleaved.book(user.id, slot.id)));

      return {
        confirmed: results.filter((result) => result.code === 'confirmed').length,
        stored: await db.withTransaction((uow) => uow.bookings.countConfirmed(slot.id)),
        slotId: slot.id
      };
    }

    it('still confirms exactly as many bookers as there are seats', async () => {
      const outcome = await bookCrowd(new Mutex());

      expect(outcome.confirmed).toBe(3);
      expect(outcome.stored).toBe(3);
      expect((await loadSlot(db, outcome.slotId))?.available).toBe(false);
    });

    it('over-books once the ledger lock is bypassed', async () => {
      const outcome = await bookCrowd(new UnguardedLock());

      expect(outcome.confirmed).toBeGreaterThan(3);
      expect(outcome.stored).toBe(outcome.confirmed);
    });
  });
});
