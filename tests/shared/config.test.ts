import { describe, expect, it } from 'vitest';

import { ConfigError, loadConfig } from '@observatory/shared';

describe('shared config', () => {
  it('throws ConfigError when the postgres driver has no DATABASE_URL', () => {
    expect(() =>
      loadConfig({
        PERSISTENCE_DRIVER: 'postgres',
        DATABASE_URL: ''
      })
    ).toThrow(ConfigError);
  });

  it('accepts the memory driver without a database url', () => {
    const cfg = loadConfig({ PERSISTENCE_DRIVER: 'memory', DATABASE_URL: undefined });

    expect(cfg.PERSISTENCE_DRIVER).toBe('memory');
    expect(cfg.DATABASE_URL).toBe('');
  });

  it('parses boolean flags', () => {
    const cfg = loadConfig({
      PERSISTENCE_DRIVER: 'memory',
      METRICS_ENABLED: 'false',
      WEATHER_ENABLED: 'false',
      WEATHER_REFRESH_ENABLED: 'true'
    });

    expect(cfg.METRICS_ENABLED).toBe(false);
    expect(cfg.WEATHER_ENABLED).toBe(false);
    expect(cfg.WEATHER_REFRESH_ENABLED).toBe(true);
  });

  it('coerces numeric settings and applies defaults', () => {
    const cfg = loadConfig({
      PERSISTENCE_DRIVER: 'memory',
      RATE_LIMIT_WINDOW_SECONDS: '30',
      RATE_LIMIT_MAX_REQUESTS: undefined,
      WEATHER_CACHE_TTL_HOURS: undefined
    });

    expect(cfg.RATE_LIMIT_WINDOW_SECONDS).toBe(30);
    expect(cfg.RATE_LIMIT_MAX_REQUESTS).toBe(10);
    expect(cfg.WEATHER_CACHE_TTL_HOURS).toBe(3);
  });

  it('selects the rabbitmq driver from an amqp url', () => {
    const cfg = loadConfig({
      PERSISTENCE_DRIVER: 'memory',
      EVENT_BUS_DRIVER: undefined,
      EVENT_BUS_URL: 'amqp://localhost:5672'
    });

    expect(cfg.EVENT_BUS_DRIVER).toBe('rabbitmq');
    expect(cfg.EVENT_BUS_EXCHANGE).toBe('observatory.events');
  });

  it('rejects an unknown persistence driver', () => {
    expect(() => loadConfig({ PERSISTENCE_DRIVER: 'sqlite' })).toThrow(ConfigError);
  });
});
