import { DataFormatError, FetchError, errorMessage } from './errors.js';
import { DEFAULT_FETCH_HEADERS, type FetchWithTimeout } from './http-client.js';
import type { SnowLocation } from './locations.js';
import { PROVIDER_LABELS, type ProviderId, type ProviderPayload } from './snow-record.js';

export const DEFAULT_FETCH_MAX_RETRIES = 3;
export const DEFAULT_FETCH_RETRY_DELAY_MS = 1000;
export const DEFAULT_FETCH_CACHE_TTL_MS = 5 * 60 * 1000;

const RETRYABLE_CLIENT_STATUSES = new Set([408, 429]);

export interface WeatherFetchClient {
  readonly provider: ProviderId;
  /** Resolves to the provider's raw payload; rejects with FetchError or DataFormatError. */
  fetch: (location: SnowLocation) => Promise<ProviderPayload>;
}

export interface WeatherClientOptions {
  apiKey: string;
  fetchWithTimeout: FetchWithTimeout;
  baseUrl?: string;
  maxRetries?: number;
  retryDelayMs?: number;
  cacheTtlMs?: number;
  headers?: Record<string, string>;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

const isRetryableStatus = (status: number): boolean => status >= 500 || RETRYABLE_CLIENT_STATUSES.has(status);

/**
 * GET-and-parse with exponential backoff and a per-URL payload cache. HTTP 4xx answers
 * other than 408/429 fail immediately; a body that is not JSON is a DataFormatError.
 */
const createJsonRequester = (
  provider: ProviderId,
  {
    fetchWithTimeout,
    maxRetries = DEFAULT_FETCH_MAX_RETRIES,
    retryDelayMs = DEFAULT_FETCH_RETRY_DELAY_MS,
    cacheTtlMs = DEFAULT_FETCH_CACHE_TTL_MS,
    headers = DEFAULT_FETCH_HEADERS,
    sleep = defaultSleep,
    now = Date.now,
  }: Omit<WeatherClientOptions, 'apiKey' | 'baseUrl'>,
) => {
  const label = PROVIDER_LABELS[provider];
  const payloadCache = new Map<string, { fetchedAt: number; payload: unknown }>();
  const attempts = Math.max(1, Math.round(maxRetries));

  const requestOnce = async (url: string, endpoint: string): Promise<unknown> => {
    let response: Response;
    try {
      response = await fetchWithTimeout(url, { headers });
    } catch (error) {
      throw new FetchError(`${label} ${endpoint} request failed: ${errorMessage(error)}`, { provider, cause: error });
    }
    if (!response.ok) {
      throw new FetchError(`${label} ${endpoint} failed with status ${response.status}`, { provider, status: response.status });
    }
    try {
      return await response.json();
    } catch (error) {
      throw new DataFormatError(`${label} ${endpoint} returned a body that is not JSON: ${errorMessage(error)}`, provider);
    }
  };

  return async (url: string, endpoint: string): Promise<unknown> => {
    const cached = payloadCache.get(url);
    if (cached && now() - cached.fetchedAt < cacheTtlMs) {
      return cached.payload;
    }

    let lastError: FetchError | null = null;
    for (let attempt = 1; attempt <= attempts; attempt += 1) {
      try {
        const payload = await requestOnce(url, endpoint);
        if (cacheTtlMs > 0) {
          payloadCache.set(url, { fetchedAt: now(), payload });
        }
        return payload;
      } catch (error) {
        if (!(error instanceof FetchError) || (error.status !== null && !isRetryableStatus(error.status))) {
          throw error;
        }
        lastError = error;
        if (attempt < attempts) {
          const delayMs = retryDelayMs * 2 ** (attempt - 1);
          console.warn(`[weather] ${label} ${endpoint} attempt ${attempt}/${attempts} failed, retrying in ${delayMs}ms: ${error.message}`);
          await sleep(delayMs);
        }
      }
    }

    console.error(`[weather] ${label} ${endpoint} failed after ${attempts} attempts`);
    throw lastError ?? new FetchError(`${label} ${endpoint} failed for an unknown reason`, { provider });
  };
};

const requireApiKey = (provider: ProviderId, apiKey: string): void => {
  if (!apiKey) {
    throw new FetchError(`${PROVIDER_LABELS[provider]} API key is not configured`, { provider });
  }
};

export const createOpenWeatherMapClient = ({
  apiKey,
  baseUrl = 'https://api.openweathermap.org/data/2.5',
  ...options
}: WeatherClientOptions): WeatherFetchClient => {
  const request = createJsonRequester('openweathermap', options);

  return {
    provider: 'openweathermap',
    fetch: async (location) => {
      requireApiKey('openweathermap', apiKey);
      const params = new URLSearchParams({
        lat: String(location.latitude),
        lon: String(location.longitude),
        units: 'metric',
        appid: apiKey,
      });
      const current = await request(`${baseUrl}/weather?${params.toString()}`, 'current weather');
      const forecast = await request(`${baseUrl}/forecast?${params.toString()}`, 'forecast');
      return { provider: 'openweathermap', current, forecast };
    },
  };
};

export const createWeatherApiClient = ({
  apiKey,
  baseUrl = 'https://api.weatherapi.com/v1',
  ...options
}: WeatherClientOptions): WeatherFetchClient => {
  const request = createJsonRequester('weatherapi', options);

  return {
    provider: 'weatherapi',
    fetch: async (location) => {
      requireApiKey('weatherapi', apiKey);
      const params = new URLSearchParams({
        key: apiKey,
        q: `${location.latitude},${location.longitude}`,
        days: '2',
      });
      const body = await request(`${baseUrl}/forecast.json?${params.toString()}`, 'forecast');
      return { provider: 'weatherapi', body };
    },
  };
};
