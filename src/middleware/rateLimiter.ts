/**
 * rateLimiter.ts
 * Rate limiting for submissions, keyed by requester when the body names one
 */

import type { Request, RequestHandler, Response } from 'express';
import rateLimit from 'express-rate-limit';

import type { RateLimitConfig } from '../config/schema.js';
import { logger } from '../utils/logger.js';

/**
 * Uses the requester from the body if present, otherwise the client IP
 */
export function defaultKeyGenerator(req: Request): string {
  const body: unknown = req.body;
  if (typeof body === 'object' && body !== null && 'requester' in body) {
    const requester = body.requester;
    if (typeof requester === 'string' && requester.length > 0) {
      return `requester:${requester}`;
    }
  }

  const ip = req.ip ?? req.socket.remoteAddress ?? 'unknown';
  return `ip:${ip}`;
}

export function createRateLimiter(config: RateLimitConfig): RequestHandler {
  if (!config.enabled) {
    return (_req, _res, next) => next();
  }

  return rateLimit({
    windowMs: config.windowMs,
    limit: config.maxRequests,
    standardHeaders: true, // Return rate limit info in the `RateLimit-*` headers
    legacyHeaders: false,
    keyGenerator: defaultKeyGenerator,
    handler: (req: Request, res: Response) => {
      logger.warn(`Rate limit exceeded for ${defaultKeyGenerator(req)}`, {
        path: req.path,
        method: req.method,
      });

      res.status(429).json({
        error: 'Too many requests',
        message: 'Rate limit exceeded. Please try again later.',
        retryAfter: Math.ceil(config.windowMs / 1000),
      });
    },
  });
}
