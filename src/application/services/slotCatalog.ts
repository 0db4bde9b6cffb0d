import { systemClock, type Clock } from '@observatory/shared';

import type { BookingRecord } from '../../domain/booking';
import { formatZonedDate, formatZonedTime } from '../../domain/zonedTime';
import type {
  BookingResource,
  CalendarSlotResource,
  CatalogSlotResource,
  UserBookingResource
} from '../../dtos';
import type { UnitOfWorkFactory } from '../../repository/interfaces';

export interface SlotCatalogDependencies {
  unitOfWork: UnitOfWorkFactory;
  clock?: Clock;
}

export function toBookingResource(booking: BookingRecord): BookingResource {
  return {
    id: booking.id,
    userId: booking.userId,
    slotId: booking.slotId,
    status: booking.status,
    createdAt: booking.createdAt.toISOString()
  };
}

/** Read models for the user and admin listings. */
export class SlotCatalog {
  private readonly clock: Clock;

  constructor(private readonly deps: SlotCatalogDependencies) {
    this.clock = deps.clock ?? systemClock;
  }

  /** Slots that have not started yet, annotated for the caller. */
  async listUpcoming(userId: number): Promise<CatalogSlotResource[]> {
    const now = this.clock();

    return this.deps.unitOfWork.withTransaction(async (uow) => {
      const slots = await uow.slots.find({ startsAtOrAfter: now });
      const counts = await uow.bookings.countConfirmedBySlot();
      const mine = new Set(
        (await uow.bookings.listByUser(userId))
          .filter((booking) => booking.status === 'confirmed')
          .map((booking) => booking.slotId)
      );

      return slots
        .filter((slot) => !slot.hasStarted(now))
        .map((slot) => {
          const bookedCount = counts.get(slot.id) ?? 0;
          return {
            ...slot.toDTO(),
            bookedCount,
            fullyBooked: bookedCount >= slot.maxBookings,
            bookedByMe: mine.has(slot.id)
          };
        });
    });
  }

  async listCalendar(): Promise<CalendarSlotResource[]> {
    return this.deps.unitOfWork.withTransaction(async (uow) => {
      const { timezone } = await uow.configuration.getOrCreate();
      const slots = await uow.slots.find({});
      const counts = await uow.bookings.countConfirmedBySlot();

      return slots.map((slot) => {
        const resource = slot.toDTO();
        return {
          ...resource,
          // No rating is shown for slots whose forecast has lapsed.
          weatherRating: resource.weatherForecast ? resource.weatherRating : null,
          localDate: formatZonedDate(slot.startTime, timezone),
          openingTime: formatZonedTime(slot.startTime, timezone),
          closingTime: formatZonedTime(slot.endTime, timezone),
          bookedCount: counts.get(slot.id) ?? 0
        };
      });
    });
  }

  async listUserBookings(userId: number): Promise<UserBookingResource[]> {
    return this.deps.unitOfWork.withTransaction(async (uow) => {
      const bookings = await uow.bookings.listByUser(userId);
      const resources: UserBookingResource[] = [];

      for (const booking of bookings) {
        const slot = await uow.slots.findById(booking.slotId);
        if (slot) {
          resources.push({ ...toBookingResource(booking), slot: slot.toDTO() });
        }
      }

      return resources;
    });
  }

  async listBookings(): Promise<BookingResource[]> {
    const bookings = await this.deps.unitOfWork.withTransaction((uow) => uow.bookings.listAll());
    return bookings.map(toBookingResource);
  }
}
