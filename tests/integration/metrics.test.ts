import request from 'supertest';
import type { Express } from 'express';
import { beforeEach, describe, expect, it } from 'vitest';

import { InMemoryEventBus, config, resetAllMetrics } from '@observatory/shared';

import { createApp } from '../../src/app';
import { createAppContext } from '../../src/appContext';
import { MemoryDatabase } from '../../src/repository/memory/MemoryDatabase';
import { StubForecastClient, buildForecast, manualClock, saveConfiguration } from '../setup/fixtures';

let app: Express;
let adminToken: string;

beforeEach(async () => {
  resetAllMetrics();
  const { clock } = manualClock('2025-05-30T12:00:00Z');
  const unitOfWork = new MemoryDatabase(clock);
  const context = createAppContext({
    appConfig: { ...config, METRICS_ENABLED: true, WEATHER_ENABLED: true },
    unitOfWork,
    eventBus: new InMemoryEventBus(),
    forecastClient: new StubForecastClient(buildForecast('2025-05-30T00:00:00Z', 72)),
    clock
  });
  await saveConfiguration(unitOfWork);
  await context.adminUsers.bootstrapSuperAdmin({ email: 'root@example.com', password: 'Admin-pass1' });
  app = createApp(context);

  const login = await request(app).post('/auth/login').send({ email: 'root@example.com', password: 'Admin-pass1' });
  adminToken = login.body.accessToken;
});

describe('Metrics exposure', () => {
  it('counts booking outcomes and exposes trace headers', async () => {
    const slot = await request(app)
      .post('/admin/slots')
      .set('Authorization', `Bearer ${adminToken}`)
      .send({ title: 'Lyrids', date: '2025-06-01' });
    const register = await request(app)
      .post('/auth/register')
      .send({ name: 'Vera', email: 'vera@example.com', password: 'Stargaze1' });
    const auth = { Authorization: `Bearer ${register.body.accessToken}` };
    const slotId = slot.body.slot.id;

    const booked = await request(app).post(`/slots/${slotId}/booking`).set(auth);
    await request(app).post(`/slots/${slotId}/booking`).set(auth);
    await request(app).delete(`/slots/${slotId}/booking`).set(auth);

    expect(booked.status).toBe(201);
    expect(booked.headers).toHaveProperty('x-trace-id');

    const metricsResponse = await request(app).get('/metrics');
    expect(metricsResponse.status).toBe(200);
    const metricsText = metricsResponse.text;

    expect(metricsText).toMatch(/bookings_confirmed_total\s+1/);
    expect(metricsText).toMatch(/bookings_cancelled_total\s+1/);
    expect(metricsText).toMatch(/bookings_rejected_total\{operation="book",reason="already_booked"\}\s+1/);
    expect(metricsText).toMatch(/slot_writes_total\{operation="create",outcome="created"\}\s+1/);
    expect(metricsText).toMatch(/http_request_duration_seconds_bucket/);
  });
});
