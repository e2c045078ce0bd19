import { DataFormatError, FetchError } from '../src/utils/errors.js';
import { createFetchWithTimeout, type FetchImpl, type FetchWithTimeout } from '../src/utils/http-client.js';
import { createOpenWeatherMapClient, createWeatherApiClient } from '../src/utils/weather-service.js';
import { ALTA, jsonResponse } from './fixtures.js';

const CURRENT = { dt: 1768478400, main: { temp: -5 } };
const FORECAST = { list: [] };

const stubFetch = () => jest.fn<ReturnType<FetchWithTimeout>, Parameters<FetchWithTimeout>>();
const noSleep = () => jest.fn(async (_ms: number) => undefined);

afterEach(() => {
  jest.restoreAllMocks();
});

test('OpenWeatherMap client requests current weather then forecast in metric units', async () => {
  const fetchWithTimeout = stubFetch()
    .mockResolvedValueOnce(jsonResponse(CURRENT))
    .mockResolvedValueOnce(jsonResponse(FORECAST));
  const client = createOpenWeatherMapClient({ apiKey: 'test-key', fetchWithTimeout, sleep: noSleep() });

  const payload = await client.fetch(ALTA);

  expect(payload).toEqual({ provider: 'openweathermap', current: CURRENT, forecast: FORECAST });
  const [currentUrl, forecastUrl] = fetchWithTimeout.mock.calls.map(([url]) => new URL(url));
  expect(currentUrl.pathname).toBe('/data/2.5/weather');
  expect(forecastUrl.pathname).toBe('/data/2.5/forecast');
  expect(Object.fromEntries(currentUrl.searchParams)).toEqual({
    lat: '40.5884',
    lon: '-111.6387',
    units: 'metric',
    appid: 'test-key',
  });
});

test('WeatherAPI.com client asks for two forecast days at the location', async () => {
  const body = { current: { last_updated_epoch: 1768478400 } };
  const fetchWithTimeout = stubFetch().mockResolvedValueOnce(jsonResponse(body));
  const client = createWeatherApiClient({ apiKey: 'test-key', fetchWithTimeout });

  await expect(client.fetch(ALTA)).resolves.toEqual({ provider: 'weatherapi', body });
  const url = new URL(fetchWithTimeout.mock.calls[0][0]);
  expect(url.pathname).toBe('/v1/forecast.json');
  expect(url.searchParams.get('q')).toBe('40.5884,-111.6387');
  expect(url.searchParams.get('days')).toBe('2');
  expect(url.searchParams.get('key')).toBe('test-key');
});

test('retries network failures and server errors with exponential backoff', async () => {
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  const sleep = noSleep();
  const fetchWithTimeout = stubFetch()
    .mockRejectedValueOnce(new Error('socket hang up'))
    .mockResolvedValueOnce(jsonResponse({ message: 'unavailable' }, 503))
    .mockResolvedValueOnce(jsonResponse(CURRENT))
    .mockResolvedValueOnce(jsonResponse(FORECAST));
  const client = createOpenWeatherMapClient({ apiKey: 'test-key', fetchWithTimeout, sleep, maxRetries: 3, retryDelayMs: 1000 });

  await expect(client.fetch(ALTA)).resolves.toMatchObject({ current: CURRENT });
  expect(fetchWithTimeout).toHaveBeenCalledTimes(4);
  expect(sleep.mock.calls).toEqual([[1000], [2000]]);
});

test('gives up after the configured number of attempts', async () => {
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  jest.spyOn(console, 'error').mockImplementation(() => undefined);
  const fetchWithTimeout = stubFetch().mockImplementation(async () => jsonResponse({}, 503));
  const client = createOpenWeatherMapClient({ apiKey: 'test-key', fetchWithTimeout, sleep: noSleep(), maxRetries: 3 });

  await expect(client.fetch(ALTA)).rejects.toMatchObject({
    name: 'FetchError',
    status: 503,
    message: 'OpenWeatherMap current weather failed with status 503',
  });
  expect(fetchWithTimeout).toHaveBeenCalledTimes(3);
});

test('does not retry a client error', async () => {
  const fetchWithTimeout = stubFetch().mockResolvedValueOnce(jsonResponse({ message: 'city not found' }, 404));
  const client = createOpenWeatherMapClient({ apiKey: 'test-key', fetchWithTimeout, sleep: noSleep() });

  const failure = client.fetch(ALTA);
  await expect(failure).rejects.toBeInstanceOf(FetchError);
  await expect(failure).rejects.toMatchObject({ status: 404, provider: 'openweathermap' });
  expect(fetchWithTimeout).toHaveBeenCalledTimes(1);
});

test('a body that is not JSON is a data format error and is not retried', async () => {
  const fetchWithTimeout = stubFetch().mockResolvedValueOnce(new Response('<html>maintenance</html>', { status: 200 }));
  const client = createWeatherApiClient({ apiKey: 'test-key', fetchWithTimeout, sleep: noSleep() });

  await expect(client.fetch(ALTA)).rejects.toBeInstanceOf(DataFormatError);
  expect(fetchWithTimeout).toHaveBeenCalledTimes(1);
});

test('serves repeated requests from the cache until it expires', async () => {
  let clock = 0;
  const fetchWithTimeout = stubFetch().mockImplementation(async (url) =>
    jsonResponse(url.includes('/weather?') ? CURRENT : FORECAST),
  );
  const client = createOpenWeatherMapClient({ apiKey: 'test-key', fetchWithTimeout, cacheTtlMs: 300000, now: () => clock });

  await client.fetch(ALTA);
  clock = 299999;
  await client.fetch(ALTA);
  expect(fetchWithTimeout).toHaveBeenCalledTimes(2);

  clock = 300000;
  await client.fetch(ALTA);
  expect(fetchWithTimeout).toHaveBeenCalledTimes(4);
});

test('a missing API key fails without a request', async () => {
  const fetchWithTimeout = stubFetch();
  const client = createOpenWeatherMapClient({ apiKey: '', fetchWithTimeout });

  await expect(client.fetch(ALTA)).rejects.toThrow('OpenWeatherMap API key is not configured');
  expect(fetchWithTimeout).not.toHaveBeenCalled();
});

describe('createFetchWithTimeout', () => {
  test('passes the request options through with its own abort signal', async () => {
    const fetchImpl = jest.fn<ReturnType<FetchImpl>, Parameters<FetchImpl>>().mockResolvedValue(jsonResponse({}));
    const fetchWithTimeout = createFetchWithTimeout(1000, fetchImpl);

    await fetchWithTimeout('https://weather.test/a', { headers: { Accept: 'application/json' } });

    const init = fetchImpl.mock.calls[0][1];
    expect(init?.headers).toEqual({ Accept: 'application/json' });
    expect(init?.signal?.aborted).toBe(false);
  });

  test('aborts a request that outlives the timeout', async () => {
    const hanging: FetchImpl = (_url, init) =>
      new Promise((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
      });

    await expect(createFetchWithTimeout(5, hanging)('https://weather.test/slow')).rejects.toThrow('aborted');
  });

  test('a per-call timeout overrides the default', async () => {
    const hanging: FetchImpl = (_url, init) =>
      new Promise((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
      });

    await expect(createFetchWithTimeout(60000, hanging)('https://weather.test/slow', {}, 5)).rejects.toThrow('aborted');
  });
});
