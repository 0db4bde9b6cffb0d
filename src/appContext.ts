import {
  Mutex,
  config,
  getEventBus,
  systemClock,
  type AppConfig,
  type Clock,
  type IEventBus
} from '@observatory/shared';

import { SlidingWindowRateLimiter, type RateLimiter } from './application/rateLimiter';
import { AdminUserService } from './application/services/adminUserService';
import { AuthService } from './application/services/authService';
import { BookingLedger } from './application/services/bookingLedger';
import { ConfigurationStore } from './application/services/configurationService';
import { SlotCatalog } from './application/services/slotCatalog';
import { SlotScheduler } from './application/services/slotScheduler';
import { UserService } from './application/services/userService';
import { HOUR_MS } from './domain/zonedTime';
import { OpenMeteoClient, type ForecastClient } from './integrations/openMeteoClient';
import { WeatherProvider } from './modules/weather/application/weatherProvider';
import { WeatherRefreshScheduler } from './modules/weather/application/weatherRefreshScheduler';
import type { UnitOfWorkFactory } from './repository/interfaces';
import { MemoryDatabase } from './repository/memory/MemoryDatabase';
import { PostgresUnitOfWorkFactory } from './repository/postgres/PostgresUnitOfWorkFactory';

export interface AppContextOverrides {
  appConfig?: AppConfig;
  unitOfWork?: UnitOfWorkFactory;
  eventBus?: IEventBus;
  forecastClient?: ForecastClient;
  clock?: Clock;
  bookingRateLimiter?: RateLimiter;
}

export interface AppContext {
  appConfig: AppConfig;
  unitOfWork: UnitOfWorkFactory;
  eventBus: IEventBus;
  authService: AuthService;
  userService: UserService;
  adminUsers: AdminUserService;
  configuration: ConfigurationStore;
  scheduler: SlotScheduler;
  ledger: BookingLedger;
  catalog: SlotCatalog;
  /** Present only while forecasts are enabled. */
  weather?: WeatherProvider;
  weatherRefresh?: WeatherRefreshScheduler;
}

function createUnitOfWork(appConfig: AppConfig, clock: Clock): UnitOfWorkFactory {
  return appConfig.PERSISTENCE_DRIVER === 'memory' ? new MemoryDatabase(clock) : new PostgresUnitOfWorkFactory();
}

/** Wires repositories, locks and services for one process. */
export function createAppContext(overrides: AppContextOverrides = {}): AppContext {
  const appConfig = overrides.appConfig ?? config;
  const clock = overrides.clock ?? systemClock;
  const unitOfWork = overrides.unitOfWork ?? createUnitOfWork(appConfig, clock);
  const eventBus = overrides.eventBus ?? getEventBus();

  const bookingRateLimiter =
    overrides.bookingRateLimiter ??
    new SlidingWindowRateLimiter({
      windowMs: appConfig.RATE_LIMIT_WINDOW_SECONDS * 1000,
      maxRequests: appConfig.RATE_LIMIT_MAX_REQUESTS,
      clock
    });

  // Slot writes, configuration writes and account administration share one lock.
  const adminLock = new Mutex();
  const bookingLock = new Mutex();

  let weather: WeatherProvider | undefined;
  let weatherRefresh: WeatherRefreshScheduler | undefined;
  if (appConfig.WEATHER_ENABLED) {
    const client =
      overrides.forecastClient ??
      new OpenMeteoClient(appConfig.WEATHER_API_URL, {
        timeoutMs: appConfig.WEATHER_TIMEOUT_MS,
        maxAttempts: appConfig.WEATHER_MAX_ATTEMPTS,
        baseDelayMs: appConfig.WEATHER_BACKOFF_MS
      });
    weather = new WeatherProvider({
      client,
      unitOfWork,
      eventBus,
      cacheTtlMs: appConfig.WEATHER_CACHE_TTL_HOURS * HOUR_MS,
      clock
    });
    weatherRefresh = new WeatherRefreshScheduler(weather, appConfig.WEATHER_REFRESH_INTERVAL_HOURS * HOUR_MS);
  }

  return {
    appConfig,
    unitOfWork,
    eventBus,
    authService: new AuthService({ unitOfWork }),
    userService: new UserService({ unitOfWork }),
    adminUsers: new AdminUserService({ unitOfWork, adminLock }),
    configuration: new ConfigurationStore({ unitOfWork, adminLock, weather }),
    scheduler: new SlotScheduler({ unitOfWork, eventBus, adminLock, weather, clock }),
    ledger: new BookingLedger({ unitOfWork, lock: bookingLock, rateLimiter: bookingRateLimiter, eventBus, clock }),
    catalog: new SlotCatalog({ unitOfWork, clock }),
    weather,
    weatherRefresh
  };
}
