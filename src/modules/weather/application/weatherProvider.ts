import {
  WEATHER_REFRESHED_EVENT,
  TtlCache,
  logger,
  publishSafely,
  runWithSpan,
  systemClock,
  type Clock,
  type IEventBus,
  type WeatherRefreshedEvent
} from '@observatory/shared';

import type { SiteConfiguration } from '../../../domain/configuration';
import { HOUR_MS, addZonedDays, floorToZonedHour } from '../../../domain/zonedTime';
import type { ForecastClient, ForecastClientHealth } from '../../../integrations/openMeteoClient';
import type { UnitOfWorkFactory } from '../../../repository/interfaces';
import {
  assessHours,
  type HourlyForecast,
  type HourlyWeather,
  type WeatherAssessment
} from '../domain/rating';

/** Calendar days ahead, in the site's timezone, that a scheduled refresh covers. */
export const REFRESH_HORIZON_DAYS = 7;

export type WeatherSite = Pick<SiteConfiguration, 'latitude' | 'longitude' | 'timezone' | 'weatherThreshold'>;

/** What slot writes need from the forecast side. */
export interface WeatherLookup {
  getEventWeather(start: Date, end: Date, site: WeatherSite): Promise<WeatherAssessment>;
}

export interface WeatherRefresher {
  refreshAllUpcoming(): Promise<{ updated: number }>;
}

export interface WeatherProviderDependencies {
  client: ForecastClient;
  unitOfWork: UnitOfWorkFactory;
  eventBus: IEventBus;
  cacheTtlMs: number;
  clock?: Clock;
}

/**
 * Hour instants covered by [start, end]: from the start floored to the hour
 * in `timezone`, through the last hour beginning at or before `end`.
 */
export function hourlyRange(start: Date, end: Date, timezone: string): number[] {
  const first = floorToZonedHour(start, timezone).getTime();
  const count = Math.floor((end.getTime() - first) / HOUR_MS) + 1;
  const hours: number[] = [];
  for (let index = 0; index < count; index += 1) {
    hours.push(first + index * HOUR_MS);
  }
  return hours;
}

export function matchingHours(forecast: HourlyForecast, start: Date, end: Date, timezone: string): HourlyWeather[] {
  return hourlyRange(start, end, timezone).flatMap((hour) => {
    const data = forecast.get(hour);
    return data ? [data] : [];
  });
}

export class WeatherProvider implements WeatherLookup, WeatherRefresher {
  private readonly cache: TtlCache<string, HourlyForecast>;
  private readonly clock: Clock;

  constructor(private readonly deps: WeatherProviderDependencies) {
    this.clock = deps.clock ?? systemClock;
    this.cache = new TtlCache(deps.cacheTtlMs, this.clock);
  }

  /** Cached per site. Failed lookups come back empty and are not cached. */
  async fetchHourly(latitude: number, longitude: number, timezone: string): Promise<HourlyForecast> {
    const key = `${latitude}|${longitude}|${timezone}`;
    const cached = this.cache.get(key);
    if (cached) {
      return cached;
    }

    const forecast = await runWithSpan(
      'ForecastClient.fetchHourly',
      () => this.deps.client.fetchHourly({ latitude, longitude, timezone }),
      { 'weather.timezone': timezone }
    );

    if (forecast.size > 0) {
      this.cache.set(key, forecast);
    }
    return forecast;
  }

  async getEventWeather(start: Date, end: Date, site: WeatherSite): Promise<WeatherAssessment> {
    const forecast = await this.fetchHourly(site.latitude, site.longitude, site.timezone);
    const assessment = assessHours(matchingHours(forecast, start, end, site.timezone), site.weatherThreshold);

    logger.debug(
      { rating: assessment.rating, warning: assessment.warning },
      'Event weather assessed'
    );
    return assessment;
  }

  getHealth(): ForecastClientHealth {
    return this.deps.client.getHealth();
  }

  async refreshAllUpcoming(): Promise<{ updated: number }> {
    const now = this.clock();

    try {
      const site = await this.deps.unitOfWork.withTransaction((uow) => uow.configuration.getOrCreate());
      const horizon = addZonedDays(now, REFRESH_HORIZON_DAYS, site.timezone);
      const forecast = await this.fetchHourly(site.latitude, site.longitude, site.timezone);

      const updated = await this.deps.unitOfWork.withTransaction(async (uow) => {
        const slots = await uow.slots.find({ startsAtOrAfter: now, startsAtOrBefore: horizon });

        for (const slot of slots) {
          const hours = matchingHours(forecast, slot.startTime, slot.endTime, site.timezone);
          slot.applyWeatherRefresh(assessHours(hours, site.weatherThreshold));
          await uow.slots.update(slot);
        }

        return slots.length;
      });

      logger.info({ updated }, 'Weather conditions updated for upcoming events');
      await publishSafely<WeatherRefreshedEvent>(this.deps.eventBus, WEATHER_REFRESHED_EVENT, {
        updated,
        windowStart: now.toISOString(),
        windowEnd: horizon.toISOString()
      });
      return { updated };
    } catch (error) {
      logger.error({ error }, 'Error updating event weather');
      return { updated: 0 };
    }
  }
}
