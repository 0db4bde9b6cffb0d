import type { BookingRecord, NewBooking } from '../domain/booking';
import type { SiteConfiguration } from '../domain/configuration';
import type { Slot, SlotDraft } from '../domain/slot';
import type { AdminRank, NewUser, UserRecord, UserRole } from '../domain/user';

/** Conjunctive filter over slot windows; omitted bounds are open. */
export interface SlotCriteria {
  startsAtOrAfter?: Date;
  startsBefore?: Date;
  startsAtOrBefore?: Date;
  endsAfter?: Date;
  excludeId?: number;
}

export interface SlotRepository {
  insert(draft: SlotDraft): Promise<Slot>;
  update(slot: Slot): Promise<void>;
  delete(id: number): Promise<void>;
  findById(id: number): Promise<Slot | null>;
  /** Row-locks the slot until the transaction ends. */
  findByIdForUpdate(id: number): Promise<Slot | null>;
  /** Matches ordered by start time, then id. */
  find(criteria: SlotCriteria): Promise<Slot[]>;
}

export interface BookingRepository {
  insert(booking: NewBooking): Promise<BookingRecord>;
  delete(id: number): Promise<void>;
  findConfirmed(userId: number, slotId: number): Promise<BookingRecord | null>;
  /** Row-locks the booking until the transaction ends. */
  findConfirmedForUpdate(userId: number, slotId: number): Promise<BookingRecord | null>;
  countConfirmed(slotId: number): Promise<number>;
  /** Bookings of any status referencing the slot. */
  countForSlot(slotId: number): Promise<number>;
  countConfirmedBySlot(): Promise<Map<number, number>>;
  listByUser(userId: number): Promise<BookingRecord[]>;
  listAll(): Promise<BookingRecord[]>;
}

export interface UserRepository {
  insert(user: NewUser): Promise<UserRecord>;
  findById(id: number): Promise<UserRecord | null>;
  /** Case-insensitive. */
  findByEmail(email: string): Promise<UserRecord | null>;
  findSuperAdmin(): Promise<UserRecord | null>;
  list(): Promise<UserRecord[]>;
  updatePassword(id: number, passwordHash: string): Promise<void>;
  updateRole(id: number, role: UserRole, adminRank: AdminRank | null): Promise<void>;
  setBlocked(id: number, blocked: boolean): Promise<void>;
  /** Removes the user together with their bookings. */
  delete(id: number): Promise<void>;
}

export interface ConfigurationRepository {
  /** Returns the singleton row, creating it with defaults on first access. */
  getOrCreate(): Promise<SiteConfiguration>;
  save(configuration: SiteConfiguration): Promise<void>;
}

export interface UnitOfWork {
  slots: SlotRepository;
  bookings: BookingRepository;
  users: UserRepository;
  configuration: ConfigurationRepository;
}

export interface UnitOfWorkFactory {
  /** Commits when `work` resolves and rolls back fully when it rejects. */
  withTransaction<T>(work: (uow: UnitOfWork) => Promise<T>): Promise<T>;
}
