/** One hour of forecast metrics. Any metric may be missing upstream. */
export interface HourlyWeather {
  cloudCover: number | null;
  precipitationProbability: number | null;
  dewPoint: number | null;
  visibility: number | null;
}

/** Hour-aligned epoch milliseconds to metrics. */
export type HourlyForecast = Map<number, HourlyWeather>;

export interface WeatherAssessment {
  rating: number | null;
  warning: boolean;
  forecastAvailable: boolean;
}

export const NO_FORECAST: WeatherAssessment = Object.freeze({
  rating: null,
  warning: false,
  forecastAvailable: false
});

const WEIGHTS = {
  cloud: 0.4,
  precipitation: 0.3,
  dewPoint: 0.15,
  visibility: 0.15
} as const;

const DEW_POINT_CLEAR_BELOW = 5;
const DEW_POINT_OPAQUE_ABOVE = 10;
const FULL_VISIBILITY_METERS = 20_000;

// Missing metrics score as the worst plausible reading.
const PESSIMISTIC_DEFAULTS = {
  cloudCover: 100,
  precipitationProbability: 100,
  dewPoint: DEW_POINT_OPAQUE_ABOVE,
  visibility: 0
} as const;

export function dewPointRating(dewPoint: number): number {
  if (dewPoint < DEW_POINT_CLEAR_BELOW) return 100;
  if (dewPoint > DEW_POINT_OPAQUE_ABOVE) return 0;

  const span = DEW_POINT_OPAQUE_ABOVE - DEW_POINT_CLEAR_BELOW;
  return 100 - ((dewPoint - DEW_POINT_CLEAR_BELOW) * 100) / span;
}

export function visibilityRating(visibilityMeters: number): number {
  return Math.min(100, (visibilityMeters / FULL_VISIBILITY_METERS) * 100);
}

export function rateHour(hour: HourlyWeather): number {
  const cloudCover = hour.cloudCover ?? PESSIMISTIC_DEFAULTS.cloudCover;
  const precipitation = hour.precipitationProbability ?? PESSIMISTIC_DEFAULTS.precipitationProbability;
  const dewPoint = hour.dewPoint ?? PESSIMISTIC_DEFAULTS.dewPoint;
  const visibility = hour.visibility ?? PESSIMISTIC_DEFAULTS.visibility;

  return (
    WEIGHTS.cloud * Math.max(0, 100 - cloudCover) +
    WEIGHTS.precipitation * Math.max(0, 100 - precipitation) +
    WEIGHTS.dewPoint * dewPointRating(dewPoint) +
    WEIGHTS.visibility * visibilityRating(visibility)
  );
}

export function aggregateRating(hours: readonly HourlyWeather[]): number {
  if (hours.length === 0) return 0;

  const total = hours.reduce((sum, hour) => sum + rateHour(hour), 0);
  return total / hours.length;
}

export function assessHours(hours: readonly HourlyWeather[], threshold: number): WeatherAssessment {
  if (hours.length === 0) {
    return NO_FORECAST;
  }

  const rating = aggregateRating(hours);
  return {
    rating,
    warning: rating < threshold,
    forecastAvailable: true
  };
}
