import fs from 'node:fs';
import path from 'node:path';
import { Express, Request, Response } from 'express';
import type { SnowCycleRunner } from '../utils/snow-cycle.js';

const readPackageVersion = (): string => {
  // Compiled output sits one directory deeper than the sources.
  const packageFile = [path.resolve(__dirname, '../../package.json'), path.resolve(__dirname, '../../../package.json')].find((candidate) =>
    fs.existsSync(candidate),
  );
  if (!packageFile) {
    return 'unknown';
  }
  const parsed: unknown = JSON.parse(fs.readFileSync(packageFile, 'utf8'));
  return parsed && typeof parsed === 'object' && 'version' in parsed && typeof parsed.version === 'string' ? parsed.version : 'unknown';
};

const version = readPackageVersion();

const healthPayload = (runner: SnowCycleRunner) => {
  const mem = process.memoryUsage();
  const lastOutcome = runner.lastOutcome();
  return {
    ok: true,
    service: 'snowfall-alerts',
    version,
    env: process.env.NODE_ENV || 'development',
    uptime: Math.floor(process.uptime()),
    nodeVersion: process.version,
    memory: {
      heapUsedMb: Math.round(mem.heapUsed / 1024 / 1024),
      rssMb: Math.round(mem.rss / 1024 / 1024),
    },
    locations: runner.locations.length,
    cycleRunning: runner.isRunning(),
    lastCycleAt: lastOutcome ? lastOutcome.report.evaluatedAt : null,
    timestamp: new Date().toISOString(),
  };
};

export const registerHealthRoutes = (app: Express, runner: SnowCycleRunner) => {
  const respond = (_req: Request, res: Response) => {
    res.json(healthPayload(runner));
  };

  app.get('/healthz', respond);
  app.get('/health', respond);
  app.get('/api/healthz', respond);
  app.get('/api/health', respond);
};
