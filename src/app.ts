import express, { type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';

import { env } from './config/env.js';
import { apiLimiter } from './middleware/rateLimiter.js';
import { errorHandler } from './middleware/errorHandler.js';
import type { SchedulingService } from './services/scheduling.service.js';
import { ErrorCode } from './utils/appError.js';
import { logger } from './utils/logger.js';

// Route factories
import { createRequestsRoutes } from './modules/requests/requests.routes.js';
import { createSlotsRoutes } from './modules/slots/slots.routes.js';
import { createAllocationRoutes } from './modules/allocation/allocation.routes.js';
import { createConfigRoutes } from './modules/config/config.routes.js';

/**
 * Express application around one scheduling service
 */
export function createApp(service: SchedulingService): Express {
  const app = express();
  app.set('trust proxy', 1);

  // ── Security Headers ──
  app.use(
    helmet({
      contentSecurityPolicy: {
        directives: {
          defaultSrc: ["'self'"],
          connectSrc: ["'self'", env.CORS_ORIGIN],
          objectSrc: ["'none'"],
          frameAncestors: ["'none'"],
        },
      },
    }),
  );

  // ── CORS ──
  app.use(
    cors({
      origin: env.CORS_ORIGIN.split(',').map((o) => o.trim()),
      methods: ['GET', 'POST', 'PUT', 'OPTIONS'],
      allowedHeaders: ['Content-Type'],
    }),
  );

  // ── Body Parsing ──
  app.use(express.json({ limit: '1mb' }));

  // ── HTTP Logging ──
  const morganStream = {
    write: (message: string) => logger.http(message.trim()),
  };
  app.use(morgan(env.NODE_ENV === 'production' ? 'combined' : 'dev', { stream: morganStream }));

  // ── Global Rate Limiter ──
  app.use(apiLimiter);

  const prefix = env.API_PREFIX;

  // ── Health Check ──
  app.get(`${prefix}/health`, async (_req, res) => {
    const cycle = await service.getCycle();
    res.json({
      success: true,
      data: {
        status: 'ok',
        cycle: cycle.status,
        timestamp: new Date().toISOString(),
        uptime: process.uptime(),
      },
    });
  });

  // ── API Routes ──
  app.use(`${prefix}/requests`, createRequestsRoutes(service));
  app.use(`${prefix}/slots`, createSlotsRoutes(service));
  app.use(`${prefix}/allocation`, createAllocationRoutes(service));
  app.use(`${prefix}/config`, createConfigRoutes(service));

  // ── 404 Handler ──
  app.use((_req, res) => {
    res.status(404).json({
      success: false,
      error: { code: ErrorCode.NOT_FOUND, message: 'Route not found' },
    });
  });

  // ── Global Error Handler ──
  app.use(errorHandler);

  return app;
}
