/**
 * app.ts
 * Express application exposing the queue over HTTP
 */

import cors from 'cors';
import express, { type NextFunction, type Request, type Response } from 'express';
import helmet from 'helmet';

import type { RateLimitConfig } from './config/schema.js';
import { ERROR_MESSAGES } from './constants/index.js';
import { createQueueController, type QueueControllerDeps } from './controllers/queueController.js';
import { createRateLimiter } from './middleware/rateLimiter.js';
import { createQueueRouter } from './routes/queue.js';
import { getErrorDetails } from './utils/error-helpers.js';
import { logger } from './utils/logger.js';

export const API_BASE_PATH = '/api/v1';

export interface CreateAppOptions extends QueueControllerDeps {
  rateLimit: RateLimitConfig;
}

export function createApp(options: CreateAppOptions): express.Express {
  const app = express();

  app.use(helmet());
  app.use(cors());
  app.use(express.json({ limit: '64kb' }));

  app.use((req, _res, next) => {
    logger.debug(`${req.method} ${req.path}`);
    next();
  });

  const controller = createQueueController(options);
  app.use(API_BASE_PATH, createQueueRouter(controller, createRateLimiter(options.rateLimit)));

  app.use((_req, res) => {
    res.status(404).json({ error: ERROR_MESSAGES.NOT_FOUND });
  });

  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    logger.error('Unhandled error:', getErrorDetails(err));
    res.status(500).json({
      error: ERROR_MESSAGES.INTERNAL_SERVER_ERROR,
      details: err.message,
    });
  });

  return app;
}
