import { z } from 'zod';
import { DataFormatError } from './errors.js';
import { celsiusToF, cmToInches, mmToInches, sumFinite } from './weather.js';
import { unixSecondsToIso } from './time.js';

export const PROVIDER_IDS = ['openweathermap', 'weatherapi'] as const;
export type ProviderId = (typeof PROVIDER_IDS)[number];

export const PROVIDER_LABELS: Record<ProviderId, string> = {
  openweathermap: 'OpenWeatherMap',
  weatherapi: 'WeatherAPI.com',
};

export const COORDINATE_TOLERANCE_DEGREES = 0.5;
// OpenWeatherMap's free forecast is in 3-hour steps; 8 periods cover 24 hours.
const OPEN_WEATHER_MAP_FORECAST_PERIODS = 8;

export interface LocationReference {
  id: string;
  latitude: number;
  longitude: number;
}

/** Raw responses as returned by the provider, tagged with who produced them. */
export interface OpenWeatherMapPayload {
  provider: 'openweathermap';
  current: unknown;
  forecast: unknown;
}

export interface WeatherApiPayload {
  provider: 'weatherapi';
  body: unknown;
}

export type ProviderPayload = OpenWeatherMapPayload | WeatherApiPayload;

export interface CanonicalSnowRecord {
  readonly locationId: string;
  readonly sourceId: ProviderId;
  readonly observedSnowInches: number;
  readonly forecastSnowInches: number;
  readonly observationTime: string;
  readonly currentTempF: number;
  readonly conditions: string;
}

const snowAmount = z.number().finite().nonnegative();
const temperature = z.number().finite();
const coordinates = z.object({ lat: z.number().finite(), lon: z.number().finite() });

// OpenWeatherMap reports snow volume in millimetres, either keyed by window or bare.
const openWeatherMapSnow = z.union([
  snowAmount,
  z.object({ '1h': snowAmount.optional(), '3h': snowAmount.optional() }),
]);

const openWeatherMapCurrentSchema = z.object({
  dt: z.number().int().nonnegative(),
  coord: coordinates.optional(),
  main: z.object({ temp: temperature }),
  snow: openWeatherMapSnow.optional(),
  weather: z.array(z.object({ description: z.string().optional() })).optional(),
});

const openWeatherMapForecastSchema = z.object({
  list: z.array(z.object({ snow: openWeatherMapSnow.optional() })),
});

const weatherApiSchema = z.object({
  location: coordinates.optional(),
  current: z.object({
    last_updated_epoch: z.number().int().nonnegative(),
    temp_f: temperature.optional(),
    temp_c: temperature.optional(),
    condition: z.object({ text: z.string().optional() }).optional(),
  }),
  forecast: z.object({
    forecastday: z
      .array(z.object({ day: z.object({ totalsnow_cm: snowAmount }) }))
      .min(1),
  }),
});

type OpenWeatherMapSnow = z.infer<typeof openWeatherMapSnow>;

const parseWith = <T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, provider: ProviderId, label: string): T => {
  const result = schema.safeParse(value);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${[label, ...issue.path].join('.')}: ${issue.message}`)
      .join('; ');
    throw new DataFormatError(`Malformed ${PROVIDER_LABELS[provider]} payload (${details})`, provider);
  }
  return result.data;
};

const assertNearReference = (
  reported: z.infer<typeof coordinates> | undefined,
  location: LocationReference,
  provider: ProviderId,
): void => {
  if (!reported) {
    return;
  }
  const latDelta = Math.abs(reported.lat - location.latitude);
  const lonDelta = Math.abs(reported.lon - location.longitude);
  if (latDelta > COORDINATE_TOLERANCE_DEGREES || lonDelta > COORDINATE_TOLERANCE_DEGREES) {
    throw new DataFormatError(
      `${PROVIDER_LABELS[provider]} payload for ${location.id} reports (${reported.lat}, ${reported.lon}), too far from (${location.latitude}, ${location.longitude})`,
      provider,
    );
  }
};

const requireObservationTime = (epochSeconds: number, provider: ProviderId): string => {
  const iso = unixSecondsToIso(epochSeconds);
  if (!iso) {
    throw new DataFormatError(`${PROVIDER_LABELS[provider]} observation time ${epochSeconds} is out of range`, provider);
  }
  return iso;
};

const openWeatherMapSnowMm = (snow: OpenWeatherMapSnow | undefined, preferredWindow: '1h' | '3h'): number => {
  if (snow === undefined) {
    return 0;
  }
  if (typeof snow === 'number') {
    return snow;
  }
  const fallbackWindow = preferredWindow === '1h' ? '3h' : '1h';
  return snow[preferredWindow] ?? snow[fallbackWindow] ?? 0;
};

const buildFromOpenWeatherMap = (payload: OpenWeatherMapPayload, location: LocationReference): CanonicalSnowRecord => {
  const current = parseWith(openWeatherMapCurrentSchema, payload.current, 'openweathermap', 'current');
  const forecast = parseWith(openWeatherMapForecastSchema, payload.forecast, 'openweathermap', 'forecast');
  assertNearReference(current.coord, location, 'openweathermap');

  const forecastMm = sumFinite(
    forecast.list.slice(0, OPEN_WEATHER_MAP_FORECAST_PERIODS).map((period) => openWeatherMapSnowMm(period.snow, '3h')),
  );

  return Object.freeze({
    locationId: location.id,
    sourceId: 'openweathermap',
    observedSnowInches: mmToInches(openWeatherMapSnowMm(current.snow, '1h')),
    forecastSnowInches: mmToInches(forecastMm),
    observationTime: requireObservationTime(current.dt, 'openweathermap'),
    currentTempF: celsiusToF(current.main.temp),
    conditions: current.weather?.[0]?.description ?? '',
  });
};

const buildFromWeatherApi = (payload: WeatherApiPayload, location: LocationReference): CanonicalSnowRecord => {
  const body = parseWith(weatherApiSchema, payload.body, 'weatherapi', 'body');
  assertNearReference(body.location, location, 'weatherapi');

  const { current } = body;
  let currentTempF: number;
  if (current.temp_f !== undefined) {
    currentTempF = current.temp_f;
  } else if (current.temp_c !== undefined) {
    currentTempF = celsiusToF(current.temp_c);
  } else {
    throw new DataFormatError('Malformed WeatherAPI.com payload (body.current: temp_f or temp_c is required)', 'weatherapi');
  }

  const [today, tomorrow] = body.forecast.forecastday;

  return Object.freeze({
    locationId: location.id,
    sourceId: 'weatherapi',
    observedSnowInches: cmToInches(today.day.totalsnow_cm),
    forecastSnowInches: tomorrow ? cmToInches(tomorrow.day.totalsnow_cm) : 0,
    observationTime: requireObservationTime(current.last_updated_epoch, 'weatherapi'),
    currentTempF,
    conditions: current.condition?.text ?? '',
  });
};

/**
 * Normalizes one provider response into inches, Fahrenheit and a UTC ISO instant.
 * Throws DataFormatError for missing, mistyped or negative fields.
 */
export const buildCanonicalSnowRecord = (payload: ProviderPayload, location: LocationReference): CanonicalSnowRecord => {
  switch (payload.provider) {
    case 'openweathermap':
      return buildFromOpenWeatherMap(payload, location);
    case 'weatherapi':
      return buildFromWeatherApi(payload, location);
    default: {
      const unknownProvider: never = payload;
      throw new DataFormatError(`Unsupported weather provider payload: ${JSON.stringify(unknownProvider)}`);
    }
  }
};
