import request from 'supertest';
import { app } from '../index.js';
import { createSnowfallService } from '../src/server/service.js';
import type { SnowLocation } from '../src/utils/locations.js';
import type { AlertNotifier } from '../src/utils/slack-notifier.js';
import type { WeatherFetchClient } from '../src/utils/weather-service.js';
import { ALTA, OBSERVED_AT, owmPayload, weatherApiPayload } from './fixtures.js';

test('GET /healthz returns healthy payload', async () => {
  const res = await request(app).get('/healthz');
  expect(res.status).toBe(200);
  expect(res.body.ok).toBe(true);
  expect(res.body.service).toBe('snowfall-alerts');
  expect(res.body.locations).toBe(10);
  expect(res.body.lastCycleAt).toBeNull();
});

test('GET /api/locations lists the monitored resorts', async () => {
  const res = await request(app).get('/api/locations');
  expect(res.status).toBe(200);
  expect(res.body).toHaveLength(10);
  expect(res.body.map((location: SnowLocation) => location.id)).toContain('alta');
});

test('GET /api/decisions is 404 before the first cycle', async () => {
  const res = await request(app).get('/api/decisions');
  expect(res.status).toBe(404);
});

describe('manual cycles', () => {
  const auth = { Authorization: 'Bearer test-secret' };

  const buildService = (
    primaryFetch: WeatherFetchClient['fetch'] = async (location) => owmPayload(8.5, location),
    cycleLimit: number = 10,
  ) => {
    const notifier: AlertNotifier = {
      notifyAlert: async () => true,
      sendStatusUpdate: async () => true,
    };
    return createSnowfallService({
      settings: {
        thresholds: { light: 2, moderate: 6, heavy: 12 },
        verificationToleranceInches: 2,
        noiseFloorInches: 0.1,
        cooldownHours: 12,
        checkFrequencyHours: 6,
      },
      locations: [ALTA],
      primaryClient: { provider: 'openweathermap', fetch: primaryFetch },
      secondaryClient: { provider: 'weatherapi', fetch: async (location) => weatherApiPayload(9, location) },
      notifier,
      appOptions: { isProduction: false, corsAllowlist: [], rateLimitWindowMs: 60000, rateLimitMaxRequests: 100 },
      triggerSecret: 'test-secret',
      cycleRateLimit: { windowMs: 60000, limit: cycleLimit },
      now: () => OBSERVED_AT,
    });
  };

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('POST /api/cycle requires the trigger secret', async () => {
    const service = buildService();
    const res = await request(service.app).post('/api/cycle').set('Authorization', 'Bearer wrong');
    expect(res.status).toBe(401);
    expect(service.runner.lastOutcome()).toBeNull();
  });

  test('POST /api/cycle runs a cycle and later reads reflect it', async () => {
    const service = buildService();

    const cycle = await request(service.app).post('/api/cycle').set(auth);
    expect(cycle.status).toBe(200);
    expect(cycle.body).toMatchObject({
      evaluatedAt: '2026-01-15T12:00:00.000Z',
      locationsProcessed: 1,
      alertsTriggered: 1,
      errors: 0,
      statusDelivered: true,
    });
    expect(cycle.body.decisions[0]).toMatchObject({ locationId: 'alta', tier: 'moderate', shouldNotify: true, verification: 'corroborated' });
    expect(cycle.body.sentAlerts).toHaveLength(1);

    const decisions = await request(service.app).get('/api/decisions');
    expect(decisions.status).toBe(200);
    expect(decisions.body.alertsTriggered).toBe(1);

    const cooldowns = await request(service.app).get('/api/cooldowns');
    expect(cooldowns.status).toBe(200);
    expect(cooldowns.body).toEqual({
      cooldownHours: 12,
      generatedAt: '2026-01-15T12:00:00.000Z',
      locations: [
        {
          locationId: 'alta',
          lastAlertTime: '2026-01-15T12:00:00.000Z',
          lastAlertTier: 'moderate',
          phase: 'suppressed',
          suppressedUntil: '2026-01-16T00:00:00.000Z',
        },
      ],
    });

    const repeat = await request(service.app).post('/api/cycle').set(auth);
    expect(repeat.body.alertsTriggered).toBe(0);
    expect(repeat.body.decisions[0].reasonIfSuppressed).toBe('cooldown_active');
  });

  test('POST /api/cycle is 409 while another cycle is running', async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const service = buildService(async (location) => {
      await gate;
      return owmPayload(0, location);
    });

    const first = request(service.app).post('/api/cycle').set(auth).then((res) => res);
    while (!service.runner.isRunning()) {
      await new Promise((resolve) => setImmediate(resolve));
    }

    const second = await request(service.app).post('/api/cycle').set(auth);
    expect(second.status).toBe(409);

    release();
    expect((await first).status).toBe(200);
  });
});

describe('request handling', () => {
  const buildService = (cycleLimit: number) =>
    createSnowfallService({
      settings: {
        thresholds: { light: 2, moderate: 6, heavy: 12 },
        verificationToleranceInches: 2,
        noiseFloorInches: 0.1,
        cooldownHours: 12,
        checkFrequencyHours: 6,
      },
      locations: [ALTA],
      primaryClient: { provider: 'openweathermap', fetch: async (location) => owmPayload(0, location) },
      secondaryClient: null,
      notifier: { notifyAlert: async () => true, sendStatusUpdate: async () => true },
      appOptions: { isProduction: false, corsAllowlist: [], rateLimitWindowMs: 60000, rateLimitMaxRequests: 100 },
      cycleRateLimit: { windowMs: 60000, limit: cycleLimit },
      now: () => OBSERVED_AT,
    });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('manual cycle logs carry the request id returned to the caller', async () => {
    const logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const service = buildService(10);

    const res = await request(service.app).post('/api/cycle');

    expect(res.status).toBe(200);
    const requestId = res.headers['x-request-id'];
    expect(typeof requestId).toBe('string');
    expect(logSpy).toHaveBeenCalledWith(`[cycle] ${requestId} manual run requested`);
  });

  test('manual cycles have their own tighter rate limit', async () => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const service = buildService(1);

    expect((await request(service.app).post('/api/cycle')).status).toBe(200);
    const limited = await request(service.app).post('/api/cycle');
    expect(limited.status).toBe(429);
    expect(limited.body).toEqual({ error: 'Too many manual cycles. Wait for the scheduler or retry later.' });
    expect((await request(service.app).get('/api/decisions')).status).toBe(200);
  });

  test('unknown paths answer with JSON', async () => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const res = await request(buildService(10).app).get('/api/snowfall');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: 'Not found.' });
  });
});
