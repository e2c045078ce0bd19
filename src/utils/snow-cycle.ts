import { ConfigurationError, errorMessage } from './errors.js';
import type { SnowLocation } from './locations.js';
import type { CycleReport, DecisionOrchestrator, FetchOutcome, LocationObservations } from './orchestrator.js';
import type { AlertNotifier, SentAlert } from './slack-notifier.js';
import { hoursToMs } from './time.js';
import type { WeatherFetchClient } from './weather-service.js';

export interface CycleOutcome {
  report: CycleReport;
  sentAlerts: SentAlert[];
  statusDelivered: boolean;
}

export interface SnowCycleRunner {
  readonly locations: SnowLocation[];
  runCycle: () => Promise<CycleOutcome>;
  isRunning: () => boolean;
  lastOutcome: () => CycleOutcome | null;
}

interface CreateSnowCycleRunnerOptions {
  locations: SnowLocation[];
  primaryClient: WeatherFetchClient;
  secondaryClient?: WeatherFetchClient | null;
  orchestrator: DecisionOrchestrator;
  notifier: AlertNotifier;
  now?: () => Date;
}

export class CycleInProgressError extends Error {
  constructor() {
    super('A snowfall cycle is already running.');
    this.name = 'CycleInProgressError';
  }
}

const settle = async (client: WeatherFetchClient, location: SnowLocation): Promise<FetchOutcome> => {
  try {
    return { ok: true, payload: await client.fetch(location) };
  } catch (error) {
    return { ok: false, error };
  }
};

export const createSnowCycleRunner = ({
  locations,
  primaryClient,
  secondaryClient = null,
  orchestrator,
  notifier,
  now = () => new Date(),
}: CreateSnowCycleRunnerOptions): SnowCycleRunner => {
  let running = false;
  let latest: CycleOutcome | null = null;

  // The secondary quota is only spent when the primary reading clears the noise floor.
  const gather = async (location: SnowLocation): Promise<LocationObservations> => {
    const primary = await settle(primaryClient, location);
    let secondary: FetchOutcome | null = null;
    if (secondaryClient && primary.ok && orchestrator.needsSecondary(location, primary.payload)) {
      secondary = await settle(secondaryClient, location);
    }
    return { location, primary, secondary };
  };

  const runCycle = async (): Promise<CycleOutcome> => {
    if (running) {
      throw new CycleInProgressError();
    }
    running = true;
    const startedAt = Date.now();
    try {
      const batch = await Promise.all(locations.map(gather));
      const report = orchestrator.evaluateCycle(batch, now());
      const byId = new Map(locations.map((location) => [location.id, location]));

      const sentAlerts: SentAlert[] = [];
      for (const decision of report.decisions) {
        const location = byId.get(decision.locationId);
        if (!decision.shouldNotify || !location) {
          continue;
        }
        // The cooldown is already recorded; a failed delivery is not retried next cycle.
        if (await notifier.notifyAlert(decision, location)) {
          sentAlerts.push({
            locationId: decision.locationId,
            locationName: decision.locationName,
            tier: decision.tier,
            snowInches: decision.verifiedSnowInches,
          });
        }
      }

      const statusDelivered = await notifier.sendStatusUpdate(report, sentAlerts);
      console.log(
        `[cycle] processed ${report.locationsProcessed} locations in ${Date.now() - startedAt}ms: ` +
          `${report.alertsTriggered} triggered, ${sentAlerts.length} sent, ${report.errors} errors`,
      );

      latest = { report, sentAlerts, statusDelivered };
      return latest;
    } finally {
      running = false;
    }
  };

  return {
    locations,
    runCycle,
    isRunning: () => running,
    lastOutcome: () => latest,
  };
};

// setInterval fires every 1ms when asked for more than a signed 32-bit delay.
const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

export interface CycleScheduler {
  stop: () => void;
}

interface StartCycleSchedulerOptions {
  runner: SnowCycleRunner;
  intervalHours: number;
  runImmediately?: boolean;
}

export const resolveCycleIntervalMs = (intervalHours: number): number => {
  const intervalMs = hoursToMs(intervalHours);
  if (!Number.isFinite(intervalMs) || intervalMs <= 0 || intervalMs > MAX_TIMER_DELAY_MS) {
    throw new ConfigurationError(
      `Check frequency must be more than 0 and at most ${Math.floor(MAX_TIMER_DELAY_MS / hoursToMs(1))} hours (got ${intervalHours}).`,
    );
  }
  return intervalMs;
};

export const startCycleScheduler = ({ runner, intervalHours, runImmediately = true }: StartCycleSchedulerOptions): CycleScheduler => {
  const intervalMs = resolveCycleIntervalMs(intervalHours);
  const tick = () => {
    if (runner.isRunning()) {
      console.warn('[cycle] previous cycle still running, skipping this tick');
      return;
    }
    runner.runCycle().catch((err) => {
      console.error('[cycle] cycle failed:', errorMessage(err));
    });
  };

  const timer = setInterval(tick, intervalMs);
  timer.unref();
  console.log(`[cycle] scheduler started, running every ${intervalHours}h`);
  if (runImmediately) {
    tick();
  }

  return {
    stop: () => clearInterval(timer),
  };
};
