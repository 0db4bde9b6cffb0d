import type { Queryable } from '@observatory/shared';

import {
  DEFAULT_CONFIGURATION,
  configurationFromRow,
  type ConfigurationDatabaseRow,
  type SiteConfiguration
} from '../../domain/configuration';
import type { ConfigurationRepository } from '../interfaces';

const CONFIGURATION_COLUMNS = `
  latitude,
  longitude,
  timezone,
  weather_threshold,
  max_bookings_per_event,
  to_char(default_opening_time, 'HH24:MI') AS default_opening_time,
  to_char(default_closing_time, 'HH24:MI') AS default_closing_time
`;

export class PostgresConfigurationRepository implements ConfigurationRepository {
  constructor(private readonly db: Queryable) {}

  async getOrCreate(): Promise<SiteConfiguration> {
    const defaults = DEFAULT_CONFIGURATION;
    await this.db.query(
      `INSERT INTO configuration (
        id,
        latitude,
        longitude,
        timezone,
        weather_threshold,
        max_bookings_per_event,
        default_opening_time,
        default_closing_time
      ) VALUES (1, $1, $2, $3, $4, $5, $6, $7)
      ON CONFLICT (id) DO NOTHING`,
      [
        defaults.latitude,
        defaults.longitude,
        defaults.timezone,
        defaults.weatherThreshold,
        defaults.maxBookingsPerEvent,
        defaults.defaultOpeningTime,
        defaults.defaultClosingTime
      ]
    );

    const result = await this.db.query<ConfigurationDatabaseRow>(
      `SELECT ${CONFIGURATION_COLUMNS} FROM configuration WHERE id = 1`
    );
    return configurationFromRow(result.rows[0]);
  }

  async save(configuration: SiteConfiguration): Promise<void> {
    await this.db.query(
      `UPDATE configuration
          SET latitude = $1,
              longitude = $2,
              timezone = $3,
              weather_threshold = $4,
              max_bookings_per_event = $5,
              default_opening_time = $6,
              default_closing_time = $7
        WHERE id = 1`,
      [
        configuration.latitude,
        configuration.longitude,
        configuration.timezone,
        configuration.weatherThreshold,
        configuration.maxBookingsPerEvent,
        configuration.defaultOpeningTime,
        configuration.defaultClosingTime
      ]
    );
  }
}
