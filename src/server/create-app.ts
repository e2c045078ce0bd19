import express, { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import compression from 'compression';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import crypto from 'node:crypto';
import { errorMessage } from '../utils/errors.js';

export interface CreateAppOptions {
  isProduction: boolean;
  corsAllowlist: string[];
  rateLimitWindowMs: number;
  rateLimitMaxRequests: number;
}

export const requestIdOf = (res: Response): string => {
  const requestId: unknown = res.locals.requestId;
  return typeof requestId === 'string' ? requestId : 'no-request-id';
};

export const createApp = ({
  isProduction,
  corsAllowlist,
  rateLimitWindowMs,
  rateLimitMaxRequests,
}: CreateAppOptions): Express => {
  const app = express();

  const corsOptions: cors.CorsOptions = {
    methods: ['GET', 'POST'],
    origin(origin, callback) {
      if (!origin) {
        callback(null, true);
        return;
      }
      if (corsAllowlist.length === 0) {
        callback(null, !isProduction);
        return;
      }
      callback(null, corsAllowlist.includes(origin));
    },
  };

  app.disable('x-powered-by');
  app.set('trust proxy', 1);
  app.use(cors(corsOptions));
  app.use(compression());
  app.use(helmet());

  app.use((req: Request, res: Response, next: NextFunction) => {
    const requestId = crypto.randomUUID();
    const startedAt = Date.now();
    res.locals.requestId = requestId;
    res.setHeader('X-Request-Id', requestId);
    res.on('finish', () => {
      if (!isProduction || res.statusCode >= 500) {
        console.log(`[http] ${requestId} ${req.method} ${req.originalUrl} -> ${res.statusCode} (${Date.now() - startedAt}ms)`);
      }
    });
    next();
  });

  app.use(
    '/api',
    rateLimit({
      windowMs: rateLimitWindowMs,
      limit: rateLimitMaxRequests,
      standardHeaders: true,
      legacyHeaders: false,
      skip: (req) => req.method === 'OPTIONS',
      message: { error: 'Too many requests. Please retry later.' },
    }),
  );

  return app;
};

/** Registered after every route: JSON for unknown paths and for errors a handler did not answer. */
export const registerFallbackHandlers = (app: Express) => {
  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found.' });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    console.error(`[http] ${requestIdOf(res)} unhandled error:`, errorMessage(err));
    res.status(500).json({ error: 'Internal server error.' });
  });
};
