import type { Queryable } from '@observatory/shared';

import {
  bookingFromRow,
  type BookingDatabaseRow,
  type BookingRecord,
  type NewBooking
} from '../../domain/booking';
import type { BookingRepository } from '../interfaces';

const BOOKING_COLUMNS = 'id, user_id, slot_id, status, created_at';

export class PostgresBookingRepository implements BookingRepository {
  constructor(private readonly db: Queryable) {}

  async insert(booking: NewBooking): Promise<BookingRecord> {
    const result = await this.db.query<BookingDatabaseRow>(
      `INSERT INTO bookings (user_id, slot_id, status)
       VALUES ($1, $2, $3)
       RETURNING ${BOOKING_COLUMNS}`,
      [booking.userId, booking.slotId, booking.status]
    );
    return bookingFromRow(result.rows[0]);
  }

  async delete(id: number): Promise<void> {
    await this.db.query('DELETE FROM bookings WHERE id = $1', [id]);
  }

  async findConfirmed(userId: number, slotId: number): Promise<BookingRecord | null> {
    const result = await this.db.query<BookingDatabaseRow>(
      `SELECT ${BOOKING_COLUMNS}
         FROM bookings
        WHERE user_id = $1 AND slot_id = $2 AND status = 'confirmed'`,
      [userId, slotId]
    );
    return result.rows[0] ? bookingFromRow(result.rows[0]) : null;
  }

  async findConfirmedForUpdate(userId: number, slotId: number): Promise<BookingRecord | null> {
    const result = await this.db.query<BookingDatabaseRow>(
      `SELECT ${BOOKING_COLUMNS}
         FROM bookings
        WHERE user_id = $1 AND slot_id = $2 AND status = 'confirmed'
        FOR UPDATE`,
      [userId, slotId]
    );
    return result.rows[0] ? bookingFromRow(result.rows[0]) : null;
  }

  async countConfirmed(slotId: number): Promise<number> {
    const result = await this.db.query<{ count: number }>(
      `SELECT COUNT(*)::int AS count FROM bookings WHERE slot_id = $1 AND status = 'confirmed'`,
      [slotId]
    );
    return result.rows[0]?.count ?? 0;
  }

  async countForSlot(slotId: number): Promise<number> {
    const result = await this.db.query<{ count: number }>(
      'SELECT COUNT(*)::int AS count FROM bookings WHERE slot_id = $1',
      [slotId]
    );
    return result.rows[0]?.count ?? 0;
  }

  async countConfirmedBySlot(): Promise<Map<number, number>> {
    const result = await this.db.query<{ slot_id: number; count: number }>(
      `SELECT slot_id, COUNT(*)::int AS count
         FROM bookings
        WHERE status = 'confirmed'
        GROUP BY slot_id`
    );
    return new Map(result.rows.map((row) => [row.slot_id, row.count]));
  }

  async listByUser(userId: number): Promise<BookingRecord[]> {
    const result = await this.db.query<BookingDatabaseRow>(
      `SELECT ${BOOKING_COLUMNS} FROM bookings WHERE user_id = $1 ORDER BY created_at ASC, id ASC`,
      [userId]
    );
    return result.rows.map(bookingFromRow);
  }

  async listAll(): Promise<BookingRecord[]> {
    const result = await this.db.query<BookingDatabaseRow>(
      `SELECT ${BOOKING_COLUMNS} FROM bookings ORDER BY created_at ASC, id ASC`
    );
    return result.rows.map(bookingFromRow);
  }
}
