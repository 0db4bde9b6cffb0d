import { z } from 'zod';

import {
  logger,
  updateWeatherProviderHealth,
  weatherMetrics,
  type WeatherProviderHealthStatus
} from '@observatory/shared';

import { parseZonedLocalDateTime } from '../domain/zonedTime';
import type { HourlyForecast, HourlyWeather } from '../modules/weather/domain/rating';

export interface ForecastQuery {
  latitude: number;
  longitude: number;
  timezone: string;
}

export interface ForecastClientHealth {
  status: WeatherProviderHealthStatus;
  lastFailureAt?: string;
  failureReason?: string;
}

export interface ForecastClient {
  /** Never rejects: an unusable response yields an empty forecast. */
  fetchHourly(query: ForecastQuery): Promise<HourlyForecast>;
  getHealth(): ForecastClientHealth;
}

interface OpenMeteoClientOptions {
  timeoutMs: number;
  maxAttempts: number;
  baseDelayMs: number;
}

export const RETRYABLE_STATUSES: ReadonlySet<number> = new Set([429, 500, 502, 503, 504]);

export const HOURLY_FIELDS = [
  'dew_point_2m',
  'precipitation_probability',
  'cloud_cover',
  'visibility'
] as const;

const metricSeries = z.array(z.number().nullable()).optional();

const forecastResponseSchema = z.object({
  hourly: z.object({
    time: z.array(z.string()),
    dew_point_2m: metricSeries,
    precipitation_probability: metricSeries,
    cloud_cover: metricSeries,
    visibility: metricSeries
  })
});

type ForecastResponse = z.infer<typeof forecastResponseSchema>;

class HttpStatusError extends Error {
  constructor(public readonly status: number) {
    super(`Forecast API responded with ${status}`);
    this.name = 'HttpStatusError';
  }
}

export class OpenMeteoClient implements ForecastClient {
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private status: WeatherProviderHealthStatus = 'ok';
  private lastFailure?: { at: number; reason: string };

  constructor(private readonly baseUrl: string, options: Partial<OpenMeteoClientOptions> = {}) {
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.maxAttempts = options.maxAttempts ?? 3;
    this.baseDelayMs = options.baseDelayMs ?? 1000;
    updateWeatherProviderHealth(this.status);
  }

  async fetchHourly(query: ForecastQuery): Promise<HourlyForecast> {
    const url = this.buildUrl(query);

    try {
      const body = await this.fetchWithRetry(url);
      const parsed = forecastResponseSchema.safeParse(body);
      if (!parsed.success) {
        throw new Error('Malformed forecast payload');
      }

      const forecast = toHourlyForecast(parsed.data, query.timezone);
      this.recordSuccess();
      weatherMetrics.fetches.inc({ outcome: 'success' });
      logger.debug({ hours: forecast.size }, 'Parsed hourly forecast');
      return forecast;
    } catch (error) {
      this.recordFailure(error);
      weatherMetrics.fetches.inc({ outcome: 'failure' });
      logger.error({ error, url }, 'Error fetching weather data');
      return new Map();
    }
  }

  getHealth(): ForecastClientHealth {
    return {
      status: this.status,
      lastFailureAt: this.lastFailure ? new Date(this.lastFailure.at).toISOString() : undefined,
      failureReason: this.lastFailure?.reason
    };
  }

  private buildUrl(query: ForecastQuery): string {
    const url = new URL(this.baseUrl);
    url.searchParams.set('latitude', String(query.latitude));
    url.searchParams.set('longitude', String(query.longitude));
    url.searchParams.set('hourly', HOURLY_FIELDS.join(','));
    url.searchParams.set('timezone', query.timezone);
    return url.toString();
  }

  private async fetchWithRetry(url: string): Promise<unknown> {
    let attempt = 0;
    let lastError: unknown;

    while (attempt < this.maxAttempts) {
      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

      try {
        const response = await fetch(url, { signal: controller.signal });

        if (!response.ok) {
          await response.body?.cancel();
          throw new HttpStatusError(response.status);
        }

        return await response.json();
      } catch (error) {
        lastError = error;
        if (error instanceof HttpStatusError && !RETRYABLE_STATUSES.has(error.status)) {
          throw error;
        }

        attempt += 1;
        if (attempt >= this.maxAttempts) {
          throw error;
        }

        if (this.status === 'ok') {
          this.status = 'degraded';
          updateWeatherProviderHealth(this.status);
        }
        logger.warn({ attempt, error }, 'Forecast request failed, retrying');
        await this.delay(this.baseDelayMs * 2 ** (attempt - 1));
      } finally {
        clearTimeout(timeout);
      }
    }

    throw lastError ?? new Error('Unknown forecast client failure');
  }

  private recordFailure(error: unknown): void {
    this.status = 'down';
    this.lastFailure = {
      at: Date.now(),
      reason: error instanceof Error ? error.message : 'unknown'
    };
    updateWeatherProviderHealth(this.status);
  }

  private recordSuccess(): void {
    this.status = 'ok';
    this.lastFailure = undefined;
    updateWeatherProviderHealth(this.status);
  }

  private async delay(ms: number): Promise<void> {
    await new Promise((resolve) => setTimeout(resolve, ms));
  }
}

function toHourlyForecast(body: ForecastResponse, timezone: string): HourlyForecast {
  const { hourly } = body;
  const forecast: HourlyForecast = new Map();

  hourly.time.forEach((time, index) => {
    const instant = parseZonedLocalDateTime(time, timezone);
    if (!instant) {
      logger.warn({ time }, 'Skipping unparsable forecast timestamp');
      return;
    }

    const hour: HourlyWeather = {
      dewPoint: hourly.dew_point_2m?.[index] ?? null,
      precipitationProbability: hourly.precipitation_probability?.[index] ?? null,
      cloudCover: hourly.cloud_cover?.[index] ?? null,
      visibility: hourly.visibility?.[index] ?? null
    };
    forecast.set(instant.getTime(), hour);
  });

  return forecast;
}
