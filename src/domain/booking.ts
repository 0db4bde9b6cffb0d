export type BookingStatus = 'confirmed' | 'pending' | 'cancelled';

export interface BookingRecord {
  id: number;
  userId: number;
  slotId: number;
  status: BookingStatus;
  createdAt: Date;
}

export interface NewBooking {
  userId: number;
  slotId: number;
  status: BookingStatus;
}

export interface BookingDatabaseRow {
  id: number;
  user_id: number;
  slot_id: number;
  status: BookingStatus;
  created_at: Date;
}

export function bookingFromRow(row: BookingDatabaseRow): BookingRecord {
  return {
    id: row.id,
    userId: row.user_id,
    slotId: row.slot_id,
    status: row.status,
    createdAt: new Date(row.created_at)
  };
}
