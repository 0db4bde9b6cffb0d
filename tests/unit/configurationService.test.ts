import { beforeEach, describe, expect, it } from 'vitest';

import { Mutex, ValidationError } from '@observatory/shared';

import { ConfigurationStore } from '../../src/application/services/configurationService';
import type { WeatherRefresher } from '../../src/modules/weather/application/weatherProvider';
import { MemoryDatabase } from '../../src/repository/memory/MemoryDatabase';

class CountingRefresher implements WeatherRefresher {
  runs = 0;

  async refreshAllUpcoming(): Promise<{ updated: number }> {
    this.runs += 1;
    return { updated: 0 };
  }
}

describe('ConfigurationStore', () => {
  let db: MemoryDatabase;
  let refresher: CountingRefresher;
  let store: ConfigurationStore;

  beforeEach(() => {
    db = new MemoryDatabase();
    refresher = new CountingRefresher();
    store = new ConfigurationStore({ unitOfWork: db, adminLock: new Mutex(), weather: refresher });
  });

  it('creates the defaults on first read', async () => {
    const view = await store.getConfiguration();

    expect(view).toMatchObject({
      timezone: 'Europe/Rome',
      weatherThreshold: 70,
      maxBookingsPerEvent: 10,
      defaultOpeningTime: '17:00',
      defaultOpeningTimeLocal: '18:00',
      defaultClosingTime: '22:00',
      defaultClosingTimeLocal: '23:00'
    });
  });

  it('stores default hours in UTC and refreshes the weather', async () => {
    const view = await store.updateConfiguration({
      timezone: 'America/New_York',
      defaultOpeningTime: '19:30',
      weatherThreshold: 55
    });

    // January reference date: New York is UTC-5.
    expect(view.defaultOpeningTime).toBe('00:30');
    expect(view.defaultOpeningTimeLocal).toBe('19:30');
    expect(view.defaultClosingTime).toBe('22:00');
    expect(view.weatherThreshold).toBe(55);
    expect(refresher.runs).toBe(1);

    const stored = await db.withTransaction((uow) => uow.configuration.getOrCreate());
    expect(stored.timezone).toBe('America/New_York');
  });

  it('collects every invalid field', async () => {
    const attempt = store.updateConfiguration({ latitude: 91, timezone: 'Mars/Olympus', maxBookingsPerEvent: 0 });

    await expect(attempt).rejects.toBeInstanceOf(ValidationError);
    await expect(attempt).rejects.toMatchObject({
      details: {
        issues: {
          latitude: 'Latitude must be between -90 and 90',
          timezone: 'Unknown timezone',
          maxBookingsPerEvent: 'Max bookings per event must be at least 1'
        }
      }
    });
    expect(refresher.runs).toBe(0);
  });
});
