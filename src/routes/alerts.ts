import { Express, Request, Response } from 'express';
import rateLimit from 'express-rate-limit';
import { requestIdOf } from '../server/create-app.js';
import type { CooldownTracker } from '../utils/cooldown.js';
import { errorMessage } from '../utils/errors.js';
import { CycleInProgressError, type CycleOutcome, type SnowCycleRunner } from '../utils/snow-cycle.js';

export interface CycleRateLimit {
  windowMs: number;
  limit: number;
}

// Each manual cycle spends provider quota for every enabled location.
export const DEFAULT_CYCLE_RATE_LIMIT: CycleRateLimit = { windowMs: 15 * 60 * 1000, limit: 4 };

interface RegisterAlertRoutesOptions {
  app: Express;
  runner: SnowCycleRunner;
  tracker: CooldownTracker;
  triggerSecret?: string;
  cycleRateLimit?: CycleRateLimit;
  now?: () => Date;
}

const serializeOutcome = (outcome: CycleOutcome) => ({
  ...outcome.report,
  sentAlerts: outcome.sentAlerts,
  statusDelivered: outcome.statusDelivered,
});

export const registerAlertRoutes = ({
  app,
  runner,
  tracker,
  triggerSecret = '',
  cycleRateLimit = DEFAULT_CYCLE_RATE_LIMIT,
  now = () => new Date(),
}: RegisterAlertRoutesOptions) => {
  const cycleLimiter = rateLimit({
    windowMs: cycleRateLimit.windowMs,
    limit: cycleRateLimit.limit,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: 'Too many manual cycles. Wait for the scheduler or retry later.' },
  });

  app.get('/api/locations', (_req: Request, res: Response) => {
    res.json(runner.locations);
  });

  app.post('/api/cycle', cycleLimiter, async (req: Request, res: Response) => {
    const requestId = requestIdOf(res);
    if (triggerSecret) {
      const auth = req.headers['authorization'] ?? '';
      const provided = auth.startsWith('Bearer ') ? auth.slice(7) : '';
      if (provided !== triggerSecret) {
        console.warn(`[cycle] ${requestId} manual run rejected: missing or wrong trigger secret`);
        return res.status(401).json({ error: 'Unauthorized' });
      }
    }
    if (runner.isRunning()) {
      return res.status(409).json({ error: 'A snowfall cycle is already running.' });
    }

    console.log(`[cycle] ${requestId} manual run requested`);
    try {
      const outcome = await runner.runCycle();
      return res.json(serializeOutcome(outcome));
    } catch (error) {
      if (error instanceof CycleInProgressError) {
        return res.status(409).json({ error: error.message });
      }
      console.error(`[cycle] ${requestId} manual run failed:`, errorMessage(error));
      return res.status(500).json({ error: 'Snowfall cycle failed.', details: errorMessage(error) });
    }
  });

  app.get('/api/decisions', (_req: Request, res: Response) => {
    const outcome = runner.lastOutcome();
    if (!outcome) {
      return res.status(404).json({ error: 'No cycle has completed yet.' });
    }
    return res.json(serializeOutcome(outcome));
  });

  app.get('/api/cooldowns', (_req: Request, res: Response) => {
    res.json({
      cooldownHours: tracker.cooldownHours,
      generatedAt: now().toISOString(),
      locations: tracker.snapshot(now()),
    });
  });
};
