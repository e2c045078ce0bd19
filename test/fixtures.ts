import type { SnowLocation } from '../src/utils/locations.js';
import type { AlertDecision } from '../src/utils/orchestrator.js';
import type { CanonicalSnowRecord, OpenWeatherMapPayload, WeatherApiPayload } from '../src/utils/snow-record.js';

// 2026-01-15T12:00:00.000Z
export const OBSERVED_AT_EPOCH = 1768478400;
export const OBSERVED_AT = new Date('2026-01-15T12:00:00.000Z');

export const ALTA: SnowLocation = {
  id: 'alta',
  name: 'Alta',
  latitude: 40.5884,
  longitude: -111.6387,
  elevationFt: 8530,
  website: 'https://www.alta.com',
  region: 'Little Cottonwood Canyon',
};

export const makeLocation = (id: string, name: string): SnowLocation => ({
  ...ALTA,
  id,
  name,
});

export const hoursAfter = (start: Date, hours: number): Date => new Date(start.getTime() + hours * 60 * 60 * 1000);

export const makeRecord = (overrides: Partial<CanonicalSnowRecord> = {}): CanonicalSnowRecord => ({
  locationId: 'alta',
  sourceId: 'openweathermap',
  observedSnowInches: 0,
  forecastSnowInches: 0,
  observationTime: OBSERVED_AT.toISOString(),
  currentTempF: 23,
  conditions: 'snow',
  ...overrides,
});

export const owmPayload = (
  snowInches: number,
  location: SnowLocation = ALTA,
  forecastMm: number[] = [],
): OpenWeatherMapPayload => ({
  provider: 'openweathermap',
  current: {
    dt: OBSERVED_AT_EPOCH,
    coord: { lat: location.latitude, lon: location.longitude },
    main: { temp: -5 },
    snow: { '1h': snowInches * 25.4 },
    weather: [{ description: 'snow' }],
  },
  forecast: {
    list: forecastMm.map((mm) => ({ snow: { '3h': mm } })),
  },
});

export const weatherApiPayload = (todayInches: number, location: SnowLocation = ALTA): WeatherApiPayload => ({
  provider: 'weatherapi',
  body: {
    location: { lat: location.latitude, lon: location.longitude },
    current: {
      last_updated_epoch: OBSERVED_AT_EPOCH,
      temp_f: 24,
      condition: { text: 'Heavy snow' },
    },
    forecast: {
      forecastday: [{ day: { totalsnow_cm: todayInches * 2.54 } }],
    },
  },
});

export const makeDecision = (overrides: Partial<AlertDecision> = {}): AlertDecision => ({
  locationId: 'alta',
  locationName: 'Alta',
  tier: 'moderate',
  verifiedSnowInches: 8.5,
  shouldNotify: true,
  reasonIfSuppressed: null,
  verification: 'corroborated',
  reducedConfidence: false,
  disagreementInches: 0.5,
  errorClass: null,
  errorMessage: null,
  secondaryErrorMessage: null,
  primaryRecord: makeRecord({ observedSnowInches: 8.5 }),
  secondaryRecord: makeRecord({ sourceId: 'weatherapi', observedSnowInches: 9 }),
  ...overrides,
});

export const jsonResponse = (body: unknown, status: number = 200): Response =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
