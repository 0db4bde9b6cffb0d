import { Mutex, systemClock, type Clock } from '@observatory/shared';

import {
  bookingFromRow,
  type BookingDatabaseRow,
  type BookingRecord,
  type NewBooking
} from '../../domain/booking';
import { DEFAULT_CONFIGURATION, type SiteConfiguration } from '../../domain/configuration';
import { Slot, type SlotDatabaseRow, type SlotDraft } from '../../domain/slot';
import {
  userFromRow,
  type AdminRank,
  type NewUser,
  type UserDatabaseRow,
  type UserRecord,
  type UserRole
} from '../../domain/user';
import type {
  BookingRepository,
  ConfigurationRepository,
  SlotCriteria,
  SlotRepository,
  UnitOfWork,
  UnitOfWorkFactory,
  UserRepository
} from '../interfaces';

interface MemoryTables {
  configuration: SiteConfiguration | null;
  users: Map<number, UserDatabaseRow>;
  slots: Map<number, SlotDatabaseRow>;
  bookings: Map<number, BookingDatabaseRow>;
  sequences: { users: number; slots: number; bookings: number };
}

/** Carries the SQLSTATE Postgres would report for the same violation. */
export class MemoryConstraintError extends Error {
  constructor(message: string, public readonly code: '23505' | '23503' | '23514') {
    super(message);
    this.name = 'MemoryConstraintError';
  }
}

function emptyTables(): MemoryTables {
  return {
    configuration: null,
    users: new Map(),
    slots: new Map(),
    bookings: new Map(),
    sequences: { users: 0, slots: 0, bookings: 0 }
  };
}

function removeBookingsWhere(tables: MemoryTables, predicate: (row: BookingDatabaseRow) => boolean): void {
  for (const [id, row] of tables.bookings) {
    if (predicate(row)) tables.bookings.delete(id);
  }
}

class MemorySlotRepository implements SlotRepository {
  constructor(private readonly tables: MemoryTables) {}

  async insert(draft: SlotDraft): Promise<Slot> {
    assertWindow(draft.startTime, draft.endTime);
    this.tables.sequences.slots += 1;
    const row: SlotDatabaseRow = {
      id: this.tables.sequences.slots,
      title: draft.title,
      description: draft.description,
      start_time: new Date(draft.startTime),
      end_time: new Date(draft.endTime),
      max_bookings: draft.maxBookings,
      available: draft.available,
      weather_rating: draft.weatherRating,
      weather_warning: draft.weatherWarning,
      weather_forecast: draft.weatherForecast
    };
    this.tables.slots.set(row.id, row);
    return Slot.fromPersistence(row);
  }

  async update(slot: Slot): Promise<void> {
    const row = slot.toPersistence();
    if (!this.tables.slots.has(row.id)) return;
    assertWindow(row.start_time, row.end_time);
    this.tables.slots.set(row.id, row);
  }

  async delete(id: number): Promise<void> {
    this.tables.slots.delete(id);
    removeBookingsWhere(this.tables, (booking) => booking.slot_id === id);
  }

  async findById(id: number): Promise<Slot | null> {
    const row = this.tables.slots.get(id);
    return row ? Slot.fromPersistence(row) : null;
  }

  async findByIdForUpdate(id: number): Promise<Slot | null> {
    return this.findById(id);
  }

  async find(criteria: SlotCriteria): Promise<Slot[]> {
    return Array.from(this.tables.slots.values())
      .filter((row) => matches(row, criteria))
      .sort((a, b) => a.start_time.getTime() - b.start_time.getTime() || a.id - b.id)
      .map((row) => Slot.fromPersistence(row));
  }
}

function matches(row: SlotDatabaseRow, criteria: SlotCriteria): boolean {
  const start = row.start_time.getTime();
  const end = row.end_time.getTime();

  if (criteria.startsAtOrAfter && start < criteria.startsAtOrAfter.getTime()) return false;
  if (criteria.startsBefore && start >= criteria.startsBefore.getTime()) return false;
  if (criteria.startsAtOrBefore && start > criteria.startsAtOrBefore.getTime()) return false;
  if (criteria.endsAfter && end <= criteria.endsAfter.getTime()) return false;
  if (criteria.excludeId !== undefined && row.id === criteria.excludeId) return false;
  return true;
}

function assertWindow(start: Date, end: Date): void {
  if (start.getTime() >= end.getTime()) {
    throw new MemoryConstraintError('slots_window_check violated', '23514');
  }
}

class MemoryBookingRepository implements BookingRepository {
  constructor(
    private readonly tables: MemoryTables,
    private readonly clock: Clock
  ) {}

  async insert(booking: NewBooking): Promise<BookingRecord> {
    if (!this.tables.users.has(booking.userId) || !this.tables.slots.has(booking.slotId)) {
      throw new MemoryConstraintError('bookings foreign key violated', '23503');
    }

    for (const row of this.tables.bookings.values()) {
      if (row.user_id === booking.userId && row.slot_id === booking.slotId) {
        throw new MemoryConstraintError('bookings_user_slot_unique violated', '23505');
      }
    }

    this.tables.sequences.bookings += 1;
    const row: BookingDatabaseRow = {
      id: this.tables.sequences.bookings,
      user_id: booking.userId,
      slot_id: booking.slotId,
      status: booking.status,
      created_at: this.clock()
    };
    this.tables.bookings.set(row.id, row);
    return bookingFromRow(row);
  }

  async delete(id: number): Promise<void> {
    this.tables.bookings.delete(id);
  }

  async findConfirmed(userId: number, slotId: number): Promise<BookingRecord | null> {
    for (const row of this.tables.bookings.values()) {
      if (row.user_id === userId && row.slot_id === slotId && row.status === 'confirmed') {
        return bookingFromRow(row);
      }
    }
    return null;
  }

  async findConfirmedForUpdate(userId: number, slotId: number): Promise<BookingRecord | null> {
    return this.findConfirmed(userId, slotId);
  }

  async countConfirmed(slotId: number): Promise<number> {
    return this.rows().filter((row) => row.slot_id === slotId && row.status === 'confirmed').length;
  }

  async countForSlot(slotId: number): Promise<number> {
    return this.rows().filter((row) => row.slot_id === slotId).length;
  }

  async countConfirmedBySlot(): Promise<Map<number, number>> {
    const counts = new Map<number, number>();
    for (const row of this.rows()) {
      if (row.status !== 'confirmed') continue;
      counts.set(row.slot_id, (counts.get(row.slot_id) ?? 0) + 1);
    }
    return counts;
  }

  async listByUser(userId: number): Promise<BookingRecord[]> {
    return this.rows()
      .filter((row) => row.user_id === userId)
      .map(bookingFromRow);
  }

  async listAll(): Promise<BookingRecord[]> {
    return this.rows().map(bookingFromRow);
  }

  private rows(): BookingDatabaseRow[] {
    return Array.from(this.tables.bookings.values()).sort(
      (a, b) => a.created_at.getTime() - b.created_at.getTime() || a.id - b.id
    );
  }
}

class MemoryUserRepository implements UserRepository {
  constructor(
    private readonly tables: MemoryTables,
    private readonly clock: Clock
  ) {}

  async insert(user: NewUser): Promise<UserRecord> {
    if (this.findRowByEmail(user.email)) {
      throw new MemoryConstraintError('users_email_lower_idx violated', '23505');
    }

    this.tables.sequences.users += 1;
    const row: UserDatabaseRow = {
      id: this.tables.sequences.users,
      name: user.name,
      email: user.email,
      password_hash: user.passwordHash,
      role: user.role,
      admin_rank: user.adminRank,
      blocked: false,
      created_at: this.clock()
    };
    this.tables.users.set(row.id, row);
    return userFromRow(row);
  }

  async findById(id: number): Promise<UserRecord | null> {
    const row = this.tables.users.get(id);
    return row ? userFromRow(row) : null;
  }

  async findByEmail(email: string): Promise<UserRecord | null> {
    const row = this.findRowByEmail(email);
    return row ? userFromRow(row) : null;
  }

  async findSuperAdmin(): Promise<UserRecord | null> {
    const row = Array.from(this.tables.users.values())
      .sort((a, b) => a.id - b.id)
      .find((candidate) => candidate.admin_rank === 'super');
    return row ? userFromRow(row) : null;
  }

  async list(): Promise<UserRecord[]> {
    return Array.from(this.tables.users.values())
      .sort((a, b) => a.id - b.id)
      .map(userFromRow);
  }

  async updatePassword(id: number, passwordHash: string): Promise<void> {
    const row = this.tables.users.get(id);
    if (row) row.password_hash = passwordHash;
  }

  async updateRole(id: number, role: UserRole, adminRank: AdminRank | null): Promise<void> {
    const row = this.tables.users.get(id);
    if (!row) return;
    row.role = role;
    row.admin_rank = adminRank;
  }

  async setBlocked(id: number, blocked: boolean): Promise<void> {
    const row = this.tables.users.get(id);
    if (row) row.blocked = blocked;
  }

  async delete(id: number): Promise<void> {
    this.tables.users.delete(id);
    removeBookingsWhere(this.tables, (booking) => booking.user_id === id);
  }

  private findRowByEmail(email: string): UserDatabaseRow | undefined {
    const needle = email.toLowerCase();
    return Array.from(this.tables.users.values()).find((row) => row.email.toLowerCase() === needle);
  }
}

class MemoryConfigurationRepository implements ConfigurationRepository {
  constructor(private readonly tables: MemoryTables) {}

  async getOrCreate(): Promise<SiteConfiguration> {
    if (!this.tables.configuration) {
      this.tables.configuration = { ...DEFAULT_CONFIGURATION };
    }
    return { ...this.tables.configuration };
  }

  async save(configuration: SiteConfiguration): Promise<void> {
    this.tables.configuration = { ...configuration };
  }
}

/**
 * In-process stand-in for the relational store. Transactions run one at a
 * time against a copy of the tables; the copy replaces the committed state
 * only when the work resolves.
 */
export class MemoryDatabase implements UnitOfWorkFactory {
  private state: MemoryTables = emptyTables();
  private readonly lock = new Mutex();

  constructor(private readonly clock: Clock = systemClock) {}

  async withTransaction<T>(work: (uow: UnitOfWork) => Promise<T>): Promise<T> {
    return this.lock.runExclusive(async () => {
      const working = structuredClone(this.state);
      const result = await work({
        slots: new MemorySlotRepository(working),
        bookings: new MemoryBookingRepository(working, this.clock),
        users: new MemoryUserRepository(working, this.clock),
        configuration: new MemoryConfigurationRepository(working)
      });
      this.state = working;
      return result;
    });
  }
}
