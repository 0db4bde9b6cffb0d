export const BOOKING_CONFIRMED_EVENT = 'booking.confirmed';
export const BOOKING_CANCELLED_EVENT = 'booking.cancelled';

export interface BookingConfirmedEvent {
  bookingId: number;
  userId: number;
  slotId: number;
  confirmedCount: number;
  maxBookings: number;
  available: boolean;
}

export interface BookingCancelledEvent {
  userId: number;
  slotId: number;
  confirmedCount: number;
  available: boolean;
}

export const SLOT_SCHEDULED_EVENT = 'slot.scheduled';
export const SLOT_DELETED_EVENT = 'slot.deleted';

export interface SlotScheduledEvent {
  slotId: number;
  operation: 'created' | 'updated';
  startTime: string;
  endTime: string;
  maxBookings: number;
  weatherRating: number | null;
  weatherWarning: boolean;
}

export interface SlotDeletedEvent {
  slotId: number;
}

export const WEATHER_REFRESHED_EVENT = 'weather.refreshed';

export interface WeatherRefreshedEvent {
  updated: number;
  windowStart: string;
  windowEnd: string;
}
