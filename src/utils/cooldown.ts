import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from './errors.js';
import { SEVERITY_TIERS, isHigherTier, type SeverityTier } from './severity.js';
import { hoursToMs, parseIsoTimeToMs } from './time.js';

export const DEFAULT_ALERT_COOLDOWN_HOURS = 12;

export interface CooldownState {
  lastAlertTime: string | null;
  lastAlertTier: SeverityTier;
}

export type CooldownPhase = 'idle' | 'suppressed';

/** Owns every location's CooldownState. Only the tracker writes to it. */
export interface CooldownStore {
  get: (locationId: string) => CooldownState | undefined;
  set: (locationId: string, state: CooldownState) => void;
  entries: () => [string, CooldownState][];
}

export const createInMemoryCooldownStore = (initial: Record<string, CooldownState> = {}): CooldownStore => {
  const states = new Map<string, CooldownState>(Object.entries(initial));
  return {
    get: (locationId) => states.get(locationId),
    set: (locationId, state) => {
      states.set(locationId, { ...state });
    },
    entries: () => [...states.entries()],
  };
};

const persistedStateSchema = z.record(
  z.object({
    last_alert_time: z.string().nullable(),
    last_alert_tier: z.enum(SEVERITY_TIERS),
  }),
);

type PersistedCooldownFile = z.infer<typeof persistedStateSchema>;

const readPersistedStates = (filePath: string): Record<string, CooldownState> => {
  if (!fs.existsSync(filePath)) {
    return {};
  }
  try {
    const parsed = persistedStateSchema.safeParse(JSON.parse(fs.readFileSync(filePath, 'utf8')));
    if (!parsed.success) {
      console.error(`[cooldown] ignoring malformed state file ${filePath}:`, parsed.error.issues[0]?.message);
      return {};
    }
    return Object.fromEntries(
      Object.entries(parsed.data).map(([locationId, record]) => [
        locationId,
        { lastAlertTime: record.last_alert_time, lastAlertTier: record.last_alert_tier },
      ]),
    );
  } catch (err) {
    console.error(`[cooldown] load failed for ${filePath}:`, errorMessage(err));
    return {};
  }
};

/**
 * Keeps cooldown state in a JSON file keyed by location id so a restarted process
 * does not re-alert on an event it already reported. A missing record means idle.
 */
export const createFileCooldownStore = (filePath: string): CooldownStore => {
  const memory = createInMemoryCooldownStore(readPersistedStates(filePath));

  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
  } catch (err) {
    console.error('[cooldown] mkdir failed:', errorMessage(err));
  }

  const rewriteFile = () => {
    const content: PersistedCooldownFile = Object.fromEntries(
      memory.entries().map(([locationId, state]) => [
        locationId,
        { last_alert_time: state.lastAlertTime, last_alert_tier: state.lastAlertTier },
      ]),
    );
    try {
      fs.writeFileSync(filePath, `${JSON.stringify(content, null, 2)}\n`, 'utf8');
    } catch (err) {
      console.error(`[cooldown] write failed for ${filePath}:`, errorMessage(err));
    }
  };

  return {
    get: memory.get,
    set: (locationId, state) => {
      memory.set(locationId, state);
      rewriteFile();
    },
    entries: memory.entries,
  };
};

export interface CooldownSnapshotEntry extends CooldownState {
  locationId: string;
  phase: CooldownPhase;
  suppressedUntil: string | null;
}

export interface CooldownTracker {
  readonly cooldownHours: number;
  phase: (locationId: string, now: Date) => CooldownPhase;
  /**
   * Side-effecting: a `true` answer records `now` and `tier` as the location's last
   * alert. Call it once per location per cycle, only when an alert would be sent.
   */
  shouldAlert: (locationId: string, tier: SeverityTier, now: Date) => boolean;
  snapshot: (now: Date) => CooldownSnapshotEntry[];
}

interface CreateCooldownTrackerOptions {
  store?: CooldownStore;
  cooldownHours?: number;
}

export const createCooldownTracker = ({
  store = createInMemoryCooldownStore(),
  cooldownHours = DEFAULT_ALERT_COOLDOWN_HOURS,
}: CreateCooldownTrackerOptions = {}): CooldownTracker => {
  if (!Number.isFinite(cooldownHours) || cooldownHours <= 0) {
    throw new ConfigurationError(`Alert cooldown must be a positive number of hours (got ${cooldownHours}).`);
  }
  const cooldownMs = hoursToMs(cooldownHours);

  const lastAlertMs = (state: CooldownState | undefined): number | null => parseIsoTimeToMs(state?.lastAlertTime);

  // Lazy expiry: suppression ends once strictly more than the window has elapsed.
  const phaseOf = (state: CooldownState | undefined, now: Date): CooldownPhase => {
    const lastMs = lastAlertMs(state);
    if (lastMs === null) {
      return 'idle';
    }
    return now.getTime() - lastMs > cooldownMs ? 'idle' : 'suppressed';
  };

  const shouldAlert = (locationId: string, tier: SeverityTier, now: Date): boolean => {
    if (tier === 'none') {
      return false;
    }
    const state = store.get(locationId);
    const permitted = phaseOf(state, now) === 'idle' || (state !== undefined && isHigherTier(tier, state.lastAlertTier));
    if (permitted) {
      store.set(locationId, { lastAlertTime: now.toISOString(), lastAlertTier: tier });
    }
    return permitted;
  };

  const snapshot = (now: Date): CooldownSnapshotEntry[] =>
    store.entries().map(([locationId, state]) => {
      const phase = phaseOf(state, now);
      const lastMs = lastAlertMs(state);
      return {
        locationId,
        ...state,
        phase,
        suppressedUntil: phase === 'suppressed' && lastMs !== null ? new Date(lastMs + cooldownMs).toISOString() : null,
      };
    });

  return {
    cooldownHours,
    phase: (locationId, now) => phaseOf(store.get(locationId), now),
    shouldAlert,
    snapshot,
  };
};
