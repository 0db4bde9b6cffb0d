import type { Clock } from '@observatory/shared';

import { DEFAULT_CONFIGURATION, type SiteConfiguration } from '../../src/domain/configuration';
import { HOUR_MS } from '../../src/domain/zonedTime';
import type { UserRecord, UserRole } from '../../src/domain/user';
import type { ForecastClient, ForecastClientHealth, ForecastQuery } from '../../src/integrations/openMeteoClient';
import type { HourlyForecast, HourlyWeather } from '../../src/modules/weather/domain/rating';
import type { UnitOfWork, UnitOfWorkFactory } from '../../src/repository/interfaces';
import type { MemoryDatabase } from '../../src/repository/memory/MemoryDatabase';

export interface ManualClock {
  clock: Clock;
  set(iso: string): void;
  advance(ms: number): void;
}

export function manualClock(iso: string): ManualClock {
  let now = Date.parse(iso);
  return {
    clock: () => new Date(now),
    set: (next) => {
      now = Date.parse(next);
    },
    advance: (ms) => {
      now += ms;
    }
  };
}

export const CLEAR_HOUR: HourlyWeather = {
  cloudCover: 0,
  precipitationProbability: 0,
  dewPoint: 0,
  visibility: 20_000
};

export const CLOUDY_HOUR: HourlyWeather = {
  cloudCover: 100,
  precipitationProbability: 100,
  dewPoint: 12,
  visibility: 0
};

/** `hours` consecutive hours starting at `startIso`, all with the same metrics. */
export function buildForecast(startIso: string, hours: number, weather: HourlyWeather = CLEAR_HOUR): HourlyForecast {
  const start = Date.parse(startIso);
  const forecast: HourlyForecast = new Map();
  for (let index = 0; index < hours; index += 1) {
    forecast.set(start + index * HOUR_MS, { ...weather });
  }
  return forecast;
}

/** Serves a fixed forecast and counts requests. */
export class StubForecastClient implements ForecastClient {
  readonly queries: ForecastQuery[] = [];

  constructor(public forecast: HourlyForecast = new Map()) {}

  async fetchHourly(query: ForecastQuery): Promise<HourlyForecast> {
    this.queries.push(query);
    return new Map(this.forecast);
  }

  getHealth(): ForecastClientHealth {
    return { status: 'ok' };
  }
}

export const UTC_SITE: SiteConfiguration = {
  ...DEFAULT_CONFIGURATION,
  timezone: 'UTC',
  weatherThreshold: 50,
  maxBookingsPerEvent: 2,
  defaultOpeningTime: '18:00',
  defaultClosingTime: '23:00'
};

export async function saveConfiguration(
  unitOfWork: UnitOfWorkFactory,
  configuration: SiteConfiguration = UTC_SITE
): Promise<void> {
  await unitOfWork.withTransaction((uow) => uow.configuration.save(configuration));
}

export async function seedUser(
  unitOfWork: UnitOfWorkFactory,
  overrides: { name?: string; email?: string; role?: UserRole; superAdmin?: boolean; blocked?: boolean } = {}
): Promise<UserRecord> {
  return unitOfWork.withTransaction(async (uow) => {
    const user = await uow.users.insert({
      name: overrides.name ?? 'Test User',
      email: overrides.email ?? `user${Math.random().toString(36).slice(2, 10)}@example.com`,
      passwordHash: 'salt:hash',
      role: overrides.role ?? 'user',
      adminRank: overrides.superAdmin ? 'super' : null
    });
    if (overrides.blocked) {
      await uow.users.setBlocked(user.id, true);
      return { ...user, blocked: true };
    }
    return user;
  });
}

/**
 * Runs each repository call as its own committed statement after yielding to
 * the event loop, so concurrent units of work interleave between reads and
 * writes instead of running one after another.
 */
export class AutocommitDatabase implements UnitOfWorkFactory {
  private readonly uow: UnitOfWork;

  constructor(private readonly inner: MemoryDatabase) {
    const run = <R>(statement: (uow: UnitOfWork) => Promise<R>): Promise<R> => this.statement(statement);
    this.uow = {
      slots: {
        insert: (draft) => run((uow) => uow.slots.insert(draft)),
        update: (slot) => run((uow) => uow.slots.update(slot)),
        delete: (id) => run((uow) => uow.slots.delete(id)),
        findById: (id) => run((uow) => uow.slots.findById(id)),
        findByIdForUpdate: (id) => run((uow) => uow.slots.findByIdForUpdate(id)),
        find: (criteria) => run((uow) => uow.slots.find(criteria))
      },
      bookings: {
        insert: (booking) => run((uow) => uow.bookings.insert(booking)),
        delete: (id) => run((uow) => uow.bookings.delete(id)),
        findConfirmed: (userId, slotId) => run((uow) => uow.bookings.findConfirmed(userId, slotId)),
        findConfirmedForUpdate: (userId, slotId) => run((uow) => uow.bookings.findConfirmedForUpdate(userId, slotId)),
        countConfirmed: (slotId) => run((uow) => uow.bookings.countConfirmed(slotId)),
        countForSlot: (slotId) => run((uow) => uow.bookings.countForSlot(slotId)),
        countConfirmedBySlot: () => run((uow) => uow.bookings.countConfirmedBySlot()),
        listByUser: (userId) => run((uow) => uow.bookings.listByUser(userId)),
        listAll: () => run((uow) => uow.bookings.listAll())
      },
      users: {
        insert: (user) => run((uow) => uow.users.insert(user)),
        findById: (id) => run((uow) => uow.users.findById(id)),
        findByEmail: (email) => run((uow) => uow.users.findByEmail(email)),
        findSuperAdmin: () => run((uow) => uow.users.findSuperAdmin()),
        list: () => run((uow) => uow.users.list()),
        updatePassword: (id, passwordHash) => run((uow) => uow.users.updatePassword(id, passwordHash)),
        updateRole: (id, role, adminRank) => run((uow) => uow.users.updateRole(id, role, adminRank)),
        setBlocked: (id, blocked) => run((uow) => uow.users.setBlocked(id, blocked)),
        delete: (id) => run((uow) => uow.users.delete(id))
      },
      configuration: {
        getOrCreate: () => run((uow) => uow.configuration.getOrCreate()),
        save: (configuration) => run((uow) => uow.configuration.save(configuration))
      }
    };
  }

  async withTransaction<T>(work: (uow: UnitOfWork) => Promise<T>): Promise<T> {
    return work(this.uow);
  }

  private async statement<R>(statement: (uow: UnitOfWork) => Promise<R>): Promise<R> {
    await new Promise<void>((resolve) => {
      setImmediate(() => resolve());
    });
    return this.inner.withTransaction(statement);
  }
}
