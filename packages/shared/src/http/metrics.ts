import type { Request, Response, NextFunction } from 'express';
import { Router } from 'express';
import client, { Counter, Gauge, Histogram } from 'prom-client';

const register = new client.Registry();
client.collectDefaultMetrics({ register });

export const httpRequestDuration = new Histogram({
  name: 'http_request_duration_seconds',
  help: 'Duration of HTTP requests in seconds',
  labelNames: ['method', 'route', 'status'],
  registers: [register]
});

export const metricsRouter = Router();

metricsRouter.get('/metrics', async (_req: Request, res: Response) => {
  res.setHeader('Content-Type', register.contentType);
  res.status(200).send(await register.metrics());
});

export function metricsMiddleware(req: Request, res: Response, next: NextFunction): void {
  const start = process.hrtime.bigint();

  res.on('finish', () => {
    const durationSeconds = Number(process.hrtime.bigint() - start) / 1_000_000_000;

    httpRequestDuration
      .labels(req.method, req.route?.path ?? req.path, String(res.statusCode))
      .observe(durationSeconds);
  });

  next();
}

const bookingsConfirmed = new Counter({
  name: 'bookings_confirmed_total',
  help: 'Bookings confirmed',
  registers: [register]
});
const bookingsCancelled = new Counter({
  name: 'bookings_cancelled_total',
  help: 'Bookings cancelled',
  registers: [register]
});
const bookingsRejected = new Counter({
  name: 'bookings_rejected_total',
  help: 'Book or cancel attempts rejected by a guard',
  labelNames: ['operation', 'reason'],
  registers: [register]
});
const bookingLockWait = new Histogram({
  name: 'booking_lock_wait_seconds',
  help: 'Time spent waiting for the booking mutex',
  buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1, 5],
  registers: [register]
});

const slotWrites = new Counter({
  name: 'slot_writes_total',
  help: 'Slot create, update and delete outcomes',
  labelNames: ['operation', 'outcome'],
  registers: [register]
});

const weatherFetches = new Counter({
  name: 'weather_fetches_total',
  help: 'Forecast lookups by outcome',
  labelNames: ['outcome'],
  registers: [register]
});

const weatherProviderHealthGauge = new Gauge({
  name: 'weather_provider_health',
  help: 'Forecast provider health (1 for the current state, 0 otherwise)',
  labelNames: ['status'],
  registers: [register]
});

const WEATHER_STATES = ['ok', 'degraded', 'down'] as const;
export type WeatherProviderHealthStatus = (typeof WEATHER_STATES)[number];

export const bookingMetrics = {
  confirmed: bookingsConfirmed,
  cancelled: bookingsCancelled,
  rejected: bookingsRejected,
  lockWait: bookingLockWait
};

export const slotMetrics = {
  writes: slotWrites
};

export const weatherMetrics = {
  fetches: weatherFetches
};

export const metrics = {
  register,
  httpRequestDuration
};

export function updateWeatherProviderHealth(status: WeatherProviderHealthStatus): void {
  for (const option of WEATHER_STATES) {
    weatherProviderHealthGauge.set({ status: option }, option === status ? 1 : 0);
  }
}

export function resetAllMetrics(): void {
  register.resetMetrics();
}
