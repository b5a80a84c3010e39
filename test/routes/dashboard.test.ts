import request from 'supertest';
import { describe, expect, it } from 'vitest';
import { echoChat, fakeClients, silentLogger, testConfig, unreachable, weather } from '../helpers/fixtures.js';
import { createApp } from '../../src/app.js';
import type { EnvironmentClients } from '../../src/types.js';

function appWith(clients: EnvironmentClients = fakeClients()) {
  return createApp({ config: testConfig(), clients, chat: echoChat(), logger: silentLogger, requestLog: false });
}

describe('POST /dashboard', () => {
  it('returns readings, metrics and advisories for the default location', async () => {
    const res = await request(appWith()).post('/dashboard').send({});

    expect(res.status).toBe(200);
    expect(res.body.location).toEqual({ lat: 12.9716, lon: 77.5946, name: 'Bengaluru', timezone: 'Asia/Kolkata' });
    expect(res.body.stakeholder).toBe('citizens');
    expect(res.body.weather.temperatureC).toBe(30);
    expect(res.body.derived).toEqual({
      heatIndexC: 35,
      comfortIndex: 84,
      coolingDemandPct: 50,
      aqi: { aqi: 108, category: 'Unhealthy-for-Sensitive', dominant: 'pm25' },
      lakeHealth: { score: 49, category: 'Poor', estimate: true },
    });
    expect(res.body.advisories).toHaveLength(4);
    expect(res.body.recommendations).toEqual([
      'Wear N95 masks when outdoors',
      'Keep windows closed during high pollution hours',
      'Consider indoor exercise instead of outdoor jogging',
    ]);
    expect(res.body.failures).toEqual([]);
  });

  it('passes the turbidity override to the lake estimate', async () => {
    const res = await request(appWith()).post('/dashboard').send({ stakeholder: 'water-board', turbidity: 0 });
    expect(res.body.derived.lakeHealth).toEqual({ score: 69, category: 'Fair', estimate: true });
  });

  it('degrades when a source is down', async () => {
    const res = await request(appWith(fakeClients({ airQuality: async () => unreachable('airQuality') })))
      .post('/dashboard')
      .send({ lat: 13.1, lon: 77.6 });

    expect(res.status).toBe(200);
    expect(res.body.location.name).toBeNull();
    expect(res.body.airQuality).toBeNull();
    expect(res.body.weather).toEqual(weather);
    expect(res.body.derived.aqi).toBeUndefined();
    expect(res.body.failures).toEqual([{ source: 'airQuality', kind: 'Unreachable', message: 'request timed out' }]);
  });

  it('rejects out-of-range coordinates', async () => {
    const res = await request(appWith()).post('/dashboard').send({ lat: 120 });
    expect(res.status).toBe(400);
    expect(res.body.error).toBe('Bad Request');
  });

  it('rejects unknown stakeholders', async () => {
    const res = await request(appWith()).post('/dashboard').send({ stakeholder: 'mayor' });
    expect(res.status).toBe(400);
  });
});

describe('misc routes', () => {
  it('reports health', async () => {
    const res = await request(appWith()).get('/health');
    expect(res.status).toBe(200);
    expect(res.body.ok).toBe(true);
  });

  it('lists stakeholders', async () => {
    const res = await request(appWith()).get('/stakeholders');
    expect(res.body.default).toBe('citizens');
    expect(res.body.stakeholders).toHaveLength(6);
    expect(res.body.stakeholders[2]).toMatchObject({ id: 'water-board', label: 'Water Board' });
  });

  it('answers unknown paths with 404', async () => {
    const res = await request(appWith()).get('/nope');
    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: 'Not Found' });
  });
});
