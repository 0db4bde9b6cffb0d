import type { Queryable } from '@observatory/shared';

import { Slot, type SlotDatabaseRow, type SlotDraft } from '../../domain/slot';
import type { SlotCriteria, SlotRepository } from '../interfaces';

const SLOT_COLUMNS = `
  id,
  title,
  description,
  start_time,
  end_time,
  max_bookings,
  available,
  weather_rating,
  weather_warning,
  weather_forecast
`;

export class PostgresSlotRepository implements SlotRepository {
  constructor(private readonly db: Queryable) {}

  async insert(draft: SlotDraft): Promise<Slot> {
    const result = await this.db.query<SlotDatabaseRow>(
      `INSERT INTO slots (
        title,
        description,
        start_time,
        end_time,
        max_bookings,
        available,
        weather_rating,
        weather_warning,
        weather_forecast
      ) VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9)
      RETURNING ${SLOT_COLUMNS}`,
      [
        draft.title,
        draft.description,
        draft.startTime,
        draft.endTime,
        draft.maxBookings,
        draft.available,
        draft.weatherRating,
        draft.weatherWarning,
        draft.weatherForecast
      ]
    );

    return Slot.fromPersistence(result.rows[0]);
  }

  async update(slot: Slot): Promise<void> {
    const row = slot.toPersistence();
    await this.db.query(
      `UPDATE slots
          SET title = $2,
              description = $3,
              start_time = $4,
              end_time = $5,
              max_bookings = $6,
              available = $7,
              weather_rating = $8,
              weather_warning = $9,
              weather_forecast = $10
        WHERE id = $1`,
      [
        row.id,
        row.title,
        row.description,
        row.start_time,
        row.end_time,
        row.max_bookings,
        row.available,
        row.weather_rating,
        row.weather_warning,
        row.weather_forecast
      ]
    );
  }

  async delete(id: number): Promise<void> {
    await this.db.query('DELETE FROM slots WHERE id = $1', [id]);
  }

  async findById(id: number): Promise<Slot | null> {
    const result = await this.db.query<SlotDatabaseRow>(
      `SELECT ${SLOT_COLUMNS} FROM slots WHERE id = $1`,
      [id]
    );
    return result.rows[0] ? Slot.fromPersistence(result.rows[0]) : null;
  }

  async findByIdForUpdate(id: number): Promise<Slot | null> {
    const result = await this.db.query<SlotDatabaseRow>(
      `SELECT ${SLOT_COLUMNS} FROM slots WHERE id = $1 FOR UPDATE`,
      [id]
    );
    return result.rows[0] ? Slot.fromPersistence(result.rows[0]) : null;
  }

  async find(criteria: SlotCriteria): Promise<Slot[]> {
    const conditions: string[] = [];
    const values: unknown[] = [];

    const push = (sql: string, value: unknown): void => {
      values.push(value);
      conditions.push(sql.replace('?', `$${values.length}`));
    };

    if (criteria.startsAtOrAfter) push('start_time >= ?', criteria.startsAtOrAfter);
    if (criteria.startsBefore) push('start_time < ?', criteria.startsBefore);
    if (criteria.startsAtOrBefore) push('start_time <= ?', criteria.startsAtOrBefore);
    if (criteria.endsAfter) push('end_time > ?', criteria.endsAfter);
    if (criteria.excludeId !== undefined) push('id <> ?', criteria.excludeId);

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const result = await this.db.query<SlotDatabaseRow>(
      `SELECT ${SLOT_COLUMNS} FROM slots ${where} ORDER BY start_time ASC, id ASC`,
      values
    );

    return result.rows.map((row) => Slot.fromPersistence(row));
  }
}
