import { ValidationError, logger, type Mutex } from '@observatory/shared';

import {
  DEFAULT_HOURS_REFERENCE_DATE,
  type SiteConfiguration
} from '../../domain/configuration';
import { isValidTimeZone, localTimeToUtc, parseTimeOfDay, utcTimeToLocal } from '../../domain/zonedTime';
import type { WeatherRefresher } from '../../modules/weather/application/weatherProvider';
import type { UnitOfWorkFactory } from '../../repository/interfaces';

export interface ConfigurationView extends SiteConfiguration {
  /** Default hours rendered in the configured timezone. */
  defaultOpeningTimeLocal: string;
  defaultClosingTimeLocal: string;
}

export interface ConfigurationUpdate {
  latitude?: number;
  longitude?: number;
  timezone?: string;
  weatherThreshold?: number;
  maxBookingsPerEvent?: number;
  /** Local HH:MM in the (new) timezone. */
  defaultOpeningTime?: string;
  defaultClosingTime?: string;
}

export interface ConfigurationStoreDependencies {
  unitOfWork: UnitOfWorkFactory;
  /** Serialises configuration writes with the other admin writes. */
  adminLock: Mutex;
  weather?: WeatherRefresher;
}

export function toConfigurationView(configuration: SiteConfiguration): ConfigurationView {
  return {
    ...configuration,
    defaultOpeningTimeLocal: utcTimeToLocal(
      configuration.defaultOpeningTime,
      configuration.timezone,
      DEFAULT_HOURS_REFERENCE_DATE
    ),
    defaultClosingTimeLocal: utcTimeToLocal(
      configuration.defaultClosingTime,
      configuration.timezone,
      DEFAULT_HOURS_REFERENCE_DATE
    )
  };
}

function inRange(value: number | undefined, min: number, max: number): boolean {
  return value === undefined || (Number.isFinite(value) && value >= min && value <= max);
}

function validateUpdate(update: ConfigurationUpdate): void {
  const issues: Record<string, string> = {};

  if (!inRange(update.latitude, -90, 90)) issues.latitude = 'Latitude must be between -90 and 90';
  if (!inRange(update.longitude, -180, 180)) issues.longitude = 'Longitude must be between -180 and 180';
  if (!inRange(update.weatherThreshold, 0, 100)) {
    issues.weatherThreshold = 'Weather threshold must be between 0 and 100';
  }
  if (
    update.maxBookingsPerEvent !== undefined &&
    (!Number.isInteger(update.maxBookingsPerEvent) || update.maxBookingsPerEvent < 1)
  ) {
    issues.maxBookingsPerEvent = 'Max bookings per event must be at least 1';
  }
  if (update.timezone !== undefined && !isValidTimeZone(update.timezone)) {
    issues.timezone = 'Unknown timezone';
  }
  if (update.defaultOpeningTime !== undefined && !parseTimeOfDay(update.defaultOpeningTime)) {
    issues.defaultOpeningTime = 'Expected HH:MM';
  }
  if (update.defaultClosingTime !== undefined && !parseTimeOfDay(update.defaultClosingTime)) {
    issues.defaultClosingTime = 'Expected HH:MM';
  }

  if (Object.keys(issues).length > 0) {
    throw new ValidationError('Invalid configuration', { issues });
  }
}

export class ConfigurationStore {
  constructor(private readonly deps: ConfigurationStoreDependencies) {}

  async getConfiguration(): Promise<ConfigurationView> {
    const configuration = await this.deps.unitOfWork.withTransaction((uow) => uow.configuration.getOrCreate());
    return toConfigurationView(configuration);
  }

  async updateConfiguration(update: ConfigurationUpdate): Promise<ConfigurationView> {
    validateUpdate(update);

    return this.deps.adminLock.runExclusive(async () => {
      const saved = await this.deps.unitOfWork.withTransaction(async (uow) => {
        const current = await uow.configuration.getOrCreate();
        const timezone = update.timezone ?? current.timezone;

        const next: SiteConfiguration = {
          latitude: update.latitude ?? current.latitude,
          longitude: update.longitude ?? current.longitude,
          timezone,
          weatherThreshold: update.weatherThreshold ?? current.weatherThreshold,
          maxBookingsPerEvent: update.maxBookingsPerEvent ?? current.maxBookingsPerEvent,
          defaultOpeningTime:
            update.defaultOpeningTime === undefined
              ? current.defaultOpeningTime
              : localTimeToUtc(update.defaultOpeningTime, timezone, DEFAULT_HOURS_REFERENCE_DATE),
          defaultClosingTime:
            update.defaultClosingTime === undefined
              ? current.defaultClosingTime
              : localTimeToUtc(update.defaultClosingTime, timezone, DEFAULT_HOURS_REFERENCE_DATE)
        };

        await uow.configuration.save(next);
        return next;
      });

      logger.info({ timezone: saved.timezone }, 'Configuration updated');

      if (this.deps.weather) {
        await this.deps.weather.refreshAllUpcoming();
      }

      return toConfigurationView(saved);
    });
  }
}
