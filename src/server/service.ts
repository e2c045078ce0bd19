import { Express } from 'express';
import { createApp, registerFallbackHandlers, type CreateAppOptions } from './create-app.js';
import type { EngineSettings } from './runtime.js';
import { registerAlertRoutes, type CycleRateLimit } from '../routes/alerts.js';
import { registerHealthRoutes } from '../routes/health.js';
import { createCooldownTracker, createInMemoryCooldownStore, type CooldownStore, type CooldownTracker } from '../utils/cooldown.js';
import type { SnowLocation } from '../utils/locations.js';
import { createDecisionOrchestrator } from '../utils/orchestrator.js';
import { createSeverityClassifier } from '../utils/severity.js';
import type { AlertNotifier } from '../utils/slack-notifier.js';
import { createSnowCycleRunner, type SnowCycleRunner } from '../utils/snow-cycle.js';
import { createCrossSourceVerifier } from '../utils/verification.js';
import type { WeatherFetchClient } from '../utils/weather-service.js';

interface CreateSnowfallServiceOptions {
  settings: EngineSettings;
  locations: SnowLocation[];
  primaryClient: WeatherFetchClient;
  secondaryClient: WeatherFetchClient | null;
  notifier: AlertNotifier;
  appOptions: CreateAppOptions;
  cooldownStore?: CooldownStore;
  triggerSecret?: string;
  cycleRateLimit?: CycleRateLimit;
  debug?: (message: string) => void;
  now?: () => Date;
}

export interface SnowfallService {
  app: Express;
  runner: SnowCycleRunner;
  tracker: CooldownTracker;
}

/**
 * Wires the decision engine behind the HTTP surface. Every engine component validates
 * its settings here, so a ConfigurationError surfaces before anything listens.
 */
export const createSnowfallService = ({
  settings,
  locations,
  primaryClient,
  secondaryClient,
  notifier,
  appOptions,
  cooldownStore = createInMemoryCooldownStore(),
  triggerSecret = '',
  cycleRateLimit,
  debug,
  now = () => new Date(),
}: CreateSnowfallServiceOptions): SnowfallService => {
  const classifier = createSeverityClassifier(settings.thresholds);
  const verifier = createCrossSourceVerifier({
    toleranceInches: settings.verificationToleranceInches,
    noiseFloorInches: settings.noiseFloorInches,
  });
  const tracker = createCooldownTracker({ store: cooldownStore, cooldownHours: settings.cooldownHours });
  const orchestrator = createDecisionOrchestrator({ classifier, verifier, tracker, debug });
  const runner = createSnowCycleRunner({
    locations,
    primaryClient,
    secondaryClient,
    orchestrator,
    notifier,
    now,
  });

  const app = createApp(appOptions);
  registerHealthRoutes(app, runner);
  registerAlertRoutes({ app, runner, tracker, triggerSecret, cycleRateLimit, now });
  registerFallbackHandlers(app);

  return { app, runner, tracker };
};
