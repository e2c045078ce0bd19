import { createSnowfallService } from './src/server/service.js';
import { startServer } from './src/server/start-server.js';
import {
  PORT,
  IS_PRODUCTION,
  DEBUG_CYCLE,
  REQUEST_TIMEOUT_MS,
  RATE_LIMIT_WINDOW_MS,
  RATE_LIMIT_MAX_REQUESTS,
  CYCLE_RATE_LIMIT_MAX_REQUESTS,
  CORS_ALLOWLIST,
  OPENWEATHER_API_KEY,
  WEATHERAPI_KEY,
  SLACK_WEBHOOK_URL,
  SLACK_MONITORING_WEBHOOK_URL,
  DISABLE_NOTIFICATIONS,
  ALERT_TIME_ZONE,
  FETCH_MAX_RETRIES,
  FETCH_RETRY_DELAY_MS,
  FETCH_CACHE_TTL_MS,
  ENABLED_LOCATIONS,
  LOCATIONS_FILE,
  COOLDOWN_STATE_FILE,
  CYCLE_TRIGGER_SECRET,
  parseEngineSettings,
  findSecretProblems,
} from './src/server/runtime.js';
import { createFileCooldownStore, createInMemoryCooldownStore } from './src/utils/cooldown.js';
import { ConfigurationError } from './src/utils/errors.js';
import { DEFAULT_FETCH_HEADERS, createFetchWithTimeout } from './src/utils/http-client.js';
import { filterEnabledLocations, loadLocationCatalog } from './src/utils/locations.js';
import { createSlackNotifier } from './src/utils/slack-notifier.js';
import { resolveCycleIntervalMs, startCycleScheduler } from './src/utils/snow-cycle.js';
import { createOpenWeatherMapClient, createWeatherApiClient } from './src/utils/weather-service.js';

const cycleLog = (message: string) => {
  if (DEBUG_CYCLE) {
    console.log(message);
  }
};

const fetchWithTimeout = createFetchWithTimeout(REQUEST_TIMEOUT_MS);

const weatherClientOptions = {
  fetchWithTimeout,
  headers: DEFAULT_FETCH_HEADERS,
  maxRetries: FETCH_MAX_RETRIES,
  retryDelayMs: FETCH_RETRY_DELAY_MS,
  cacheTtlMs: FETCH_CACHE_TTL_MS,
};

const loadService = () => {
  for (const problem of findSecretProblems()) {
    console.warn(`[config] ${problem}`);
  }

  try {
    const settings = parseEngineSettings();
    resolveCycleIntervalMs(settings.checkFrequencyHours);
    const service = createSnowfallService({
      settings,
      locations: filterEnabledLocations(loadLocationCatalog(LOCATIONS_FILE || undefined), ENABLED_LOCATIONS),
      primaryClient: createOpenWeatherMapClient({ apiKey: OPENWEATHER_API_KEY, ...weatherClientOptions }),
      secondaryClient: WEATHERAPI_KEY ? createWeatherApiClient({ apiKey: WEATHERAPI_KEY, ...weatherClientOptions }) : null,
      notifier: createSlackNotifier({
        webhookUrl: SLACK_WEBHOOK_URL,
        monitoringWebhookUrl: SLACK_MONITORING_WEBHOOK_URL,
        fetchWithTimeout,
        disabled: DISABLE_NOTIFICATIONS,
        timeZone: ALERT_TIME_ZONE,
      }),
      cooldownStore: COOLDOWN_STATE_FILE ? createFileCooldownStore(COOLDOWN_STATE_FILE) : createInMemoryCooldownStore(),
      appOptions: {
        isProduction: IS_PRODUCTION,
        corsAllowlist: CORS_ALLOWLIST,
        rateLimitWindowMs: RATE_LIMIT_WINDOW_MS,
        rateLimitMaxRequests: RATE_LIMIT_MAX_REQUESTS,
      },
      triggerSecret: CYCLE_TRIGGER_SECRET,
      cycleRateLimit: { windowMs: RATE_LIMIT_WINDOW_MS, limit: CYCLE_RATE_LIMIT_MAX_REQUESTS },
      debug: cycleLog,
    });
    return { ...service, checkFrequencyHours: settings.checkFrequencyHours };
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`[config] refusing to start: ${error.message}`);
    }
    throw error;
  }
};

const service = loadService();

export const app = service.app;

if (process.env.NODE_ENV !== 'test') {
  const scheduler = startCycleScheduler({ runner: service.runner, intervalHours: service.checkFrequencyHours });
  startServer({ app, port: PORT, onShutdown: scheduler.stop });
}
