import dotenv from 'dotenv';
import { ConfigurationError } from '../utils/errors.js';
import type { SeverityThresholds } from '../utils/severity.js';

dotenv.config();

const parsePositiveInt = (rawValue: string | undefined, fallback: number): number => {
  const parsed = Number(rawValue);
  return Number.isFinite(parsed) && parsed > 0 ? Math.round(parsed) : fallback;
};

const parseList = (rawValue: string | undefined): string[] =>
  (rawValue || '')
    .split(',')
    .map((entry) => entry.trim())
    .filter(Boolean);

export const PORT = process.env.PORT || 3001;
export const IS_PRODUCTION = process.env.NODE_ENV === 'production';
export const DEBUG_CYCLE = process.env.DEBUG_CYCLE === 'true';

export const REQUEST_TIMEOUT_MS = parsePositiveInt(process.env.REQUEST_TIMEOUT_MS, 10000);
export const RATE_LIMIT_WINDOW_MS = parsePositiveInt(process.env.RATE_LIMIT_WINDOW_MS, 15 * 60 * 1000);
export const RATE_LIMIT_MAX_REQUESTS = parsePositiveInt(process.env.RATE_LIMIT_MAX_REQUESTS, 300);
export const CYCLE_RATE_LIMIT_MAX_REQUESTS = parsePositiveInt(process.env.CYCLE_RATE_LIMIT_MAX_REQUESTS, 4);
export const CORS_ALLOWLIST = parseList(process.env.CORS_ORIGIN);

export const OPENWEATHER_API_KEY = process.env.OPENWEATHER_API_KEY || '';
export const WEATHERAPI_KEY = process.env.WEATHERAPI_KEY || '';
export const SLACK_WEBHOOK_URL = process.env.SLACK_WEBHOOK_URL || '';
export const SLACK_MONITORING_WEBHOOK_URL = process.env.SLACK_MONITORING_WEBHOOK_URL || SLACK_WEBHOOK_URL;
export const DISABLE_NOTIFICATIONS = (process.env.DISABLE_NOTIFICATIONS || '').toLowerCase() === 'true';
export const ALERT_TIME_ZONE = process.env.ALERT_TIME_ZONE || 'America/Denver';

export const FETCH_MAX_RETRIES = parsePositiveInt(process.env.FETCH_MAX_RETRIES, 3);
export const FETCH_RETRY_DELAY_MS = parsePositiveInt(process.env.FETCH_RETRY_DELAY_MS, 1000);
export const FETCH_CACHE_TTL_MS = parsePositiveInt(process.env.FETCH_CACHE_TTL_MS, 5 * 60 * 1000);

export const ENABLED_LOCATIONS = parseList(process.env.ENABLED_LOCATIONS);
export const LOCATIONS_FILE = process.env.LOCATIONS_FILE || '';
export const COOLDOWN_STATE_FILE = process.env.COOLDOWN_STATE_FILE || '';
export const CYCLE_TRIGGER_SECRET = process.env.CYCLE_TRIGGER_SECRET || '';

export interface EngineSettings {
  thresholds: SeverityThresholds;
  verificationToleranceInches: number;
  noiseFloorInches: number;
  cooldownHours: number;
  checkFrequencyHours: number;
}

type EnvSource = Record<string, string | undefined>;

// Engine settings fail fast: a typo must not silently fall back to a default.
const readNumber = (env: EnvSource, name: string, fallback: number): number => {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const parsed = Number(raw.trim());
  if (!Number.isFinite(parsed)) {
    throw new ConfigurationError(`${name} must be a number (got "${raw}").`);
  }
  return parsed;
};

export const parseEngineSettings = (env: EnvSource = process.env): EngineSettings => ({
  thresholds: {
    light: readNumber(env, 'THRESHOLD_LIGHT', 2),
    moderate: readNumber(env, 'THRESHOLD_MODERATE', 6),
    heavy: readNumber(env, 'THRESHOLD_HEAVY', 12),
  },
  verificationToleranceInches: readNumber(env, 'VERIFICATION_THRESHOLD', 2.0),
  noiseFloorInches: readNumber(env, 'VERIFICATION_NOISE_FLOOR', 0.1),
  cooldownHours: readNumber(env, 'ALERT_COOLDOWN_HOURS', 12),
  checkFrequencyHours: readNumber(env, 'CHECK_FREQUENCY_HOURS', 6),
});

const SECRET_VARIABLES = ['OPENWEATHER_API_KEY', 'WEATHERAPI_KEY', 'SLACK_WEBHOOK_URL'];
const PLACEHOLDER_PATTERNS = ['your_', 'example', 'change_me', 'changeme', 'xxxx', 'password123', '123456'];
const MIN_SECRET_LENGTH = 8;

/** Secrets that are missing or still hold an example value. Reported, never fatal. */
export const findSecretProblems = (env: EnvSource = process.env): string[] => {
  const problems: string[] = [];
  for (const name of SECRET_VARIABLES) {
    const value = env[name] || '';
    if (!value) {
      problems.push(`${name} is not set`);
      continue;
    }
    const pattern = PLACEHOLDER_PATTERNS.find((candidate) => value.toLowerCase().includes(candidate));
    if (pattern) {
      problems.push(`${name} looks like a placeholder (contains '${pattern}')`);
    } else if (value.length < MIN_SECRET_LENGTH) {
      problems.push(`${name} is suspiciously short`);
    }
  }
  return problems;
};
