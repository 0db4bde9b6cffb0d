export interface SiteConfiguration {
  latitude: number;
  longitude: number;
  timezone: string;
  weatherThreshold: number;
  maxBookingsPerEvent: number;
  /** UTC time of day, HH:MM. */
  defaultOpeningTime: string;
  /** UTC time of day, HH:MM. */
  defaultClosingTime: string;
}

export const DEFAULT_CONFIGURATION: Readonly<SiteConfiguration> = Object.freeze({
  latitude: 41.8933203,
  longitude: 12.4829321,
  timezone: 'Europe/Rome',
  weatherThreshold: 70,
  maxBookingsPerEvent: 10,
  defaultOpeningTime: '17:00',
  defaultClosingTime: '22:00'
});

/** Reference day used to translate default hours between local and UTC. */
export const DEFAULT_HOURS_REFERENCE_DATE = '2000-01-01';

export interface ConfigurationDatabaseRow {
  latitude: number;
  longitude: number;
  timezone: string;
  weather_threshold: number;
  max_bookings_per_event: number;
  default_opening_time: string;
  default_closing_time: string;
}

export function configurationFromRow(row: ConfigurationDatabaseRow): SiteConfiguration {
  return {
    latitude: Number(row.latitude),
    longitude: Number(row.longitude),
    timezone: row.timezone,
    weatherThreshold: Number(row.weather_threshold),
    maxBookingsPerEvent: row.max_bookings_per_event,
    defaultOpeningTime: row.default_opening_time.slice(0, 5),
    defaultClosingTime: row.default_closing_time.slice(0, 5)
  };
}
