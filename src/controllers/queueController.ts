/**
 * queueController.ts
 * Queue API endpoints
 */

import type { Request, Response } from 'express';
import { z } from 'zod';

import { ERROR_MESSAGES } from '../constants/index.js';
import { CapacityError, NotFoundError, ValidationError } from '../errors.js';
import type { QueueItem } from '../queue/queue-item.js';
import type { QueueManager } from '../queue/queue-manager.js';
import type { StatusReporter } from '../queue/status-reporter.js';
import { getErrorMessage } from '../utils/error-helpers.js';
import { logger } from '../utils/logger.js';

const submitBodySchema = z.object({
  requester: z.string().trim().min(1, ERROR_MESSAGES.REQUESTER_REQUIRED),
  query: z.string(),
  origin: z.record(z.unknown()).optional(),
});

const requesterSchema = z.string().trim().min(1, ERROR_MESSAGES.REQUESTER_REQUIRED);

export interface QueueControllerDeps {
  manager: Pick<QueueManager, 'submit' | 'position' | 'estimatedWait' | 'cancel' | 'getItem'>;
  reporter: Pick<StatusReporter, 'snapshot' | 'userStatus' | 'describeWait'>;
}

/**
 * Item fields safe to return to any caller; the delivery origin stays internal
 */
export function toPublicItem(item: QueueItem): Omit<QueueItem, 'origin' | 'startingNotified'> {
  const { origin: _origin, startingNotified: _startingNotified, ...rest } = item;
  return rest;
}

function sendError(res: Response, error: unknown, fallback: string): void {
  if (error instanceof ValidationError) {
    res.status(400).json({ error: error.message, code: error.code });
    return;
  }
  if (error instanceof CapacityError) {
    res.status(503).json({ error: error.message, code: error.code, capacity: error.capacity });
    return;
  }
  if (error instanceof NotFoundError) {
    res.status(404).json({ error: error.message, code: error.code });
    return;
  }

  logger.error(fallback, { error: getErrorMessage(error) });
  res.status(500).json({
    error: fallback,
    details: getErrorMessage(error),
  });
}

function requesterFrom(req: Request): string | undefined {
  const body: unknown = req.body;
  const fromBody =
    typeof body === 'object' && body !== null && 'requester' in body ? body.requester : undefined;
  const parsed = requesterSchema.safeParse(fromBody ?? req.query.requester);
  return parsed.success ? parsed.data : undefined;
}

export function createQueueController({ manager, reporter }: QueueControllerDeps) {
  return {
    /**
     * Submit a query for analysis
     * POST /api/v1/analyze
     */
    submitAnalysis(req: Request, res: Response): void {
      const body = submitBodySchema.safeParse(req.body);
      if (!body.success) {
        res.status(400).json({
          error: 'Invalid request',
          details: body.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
        });
        return;
      }

      try {
        const { requester, query, origin } = body.data;
        const item = manager.submit(requester, query, origin);
        const position = manager.position(item.id);
        const estimatedWaitMs = manager.estimatedWait(position);

        res.status(202).json({
          success: true,
          item: toPublicItem(item),
          position,
          estimatedWaitMs,
          estimatedWait: reporter.describeWait(estimatedWaitMs),
        });
      } catch (error) {
        sendError(res, error, 'Failed to submit query');
      }
    },

    /**
     * Get queue status
     * GET /api/v1/queue
     */
    getQueueStatus(_req: Request, res: Response): void {
      try {
        res.status(200).json({ success: true, queue: reporter.snapshot() });
      } catch (error) {
        sendError(res, error, 'Failed to get queue status');
      }
    },

    /**
     * Get one item with its live position
     * GET /api/v1/queue/items/:id
     */
    getItemStatus(req: Request, res: Response): void {
      try {
        const id = req.params.id;
        const item = manager.getItem(id);
        if (!item) {
          res.status(404).json({ error: ERROR_MESSAGES.ITEM_NOT_FOUND(id), code: 'NOT_FOUND' });
          return;
        }

        const position = manager.position(id);
        res.status(200).json({
          success: true,
          item: toPublicItem(item),
          position,
          estimatedWaitMs: manager.estimatedWait(position),
        });
      } catch (error) {
        sendError(res, error, 'Failed to get item status');
      }
    },

    /**
     * Cancel a queued item
     * DELETE /api/v1/queue/items/:id
     */
    cancelItem(req: Request, res: Response): void {
      const requester = requesterFrom(req);
      if (!requester) {
        res.status(400).json({ error: ERROR_MESSAGES.REQUESTER_REQUIRED, code: 'VALIDATION_ERROR' });
        return;
      }

      try {
        const cancelled = manager.cancel(req.params.id, requester);
        res.status(200).json({ success: true, cancelled });
      } catch (error) {
        sendError(res, error, 'Failed to cancel item');
      }
    },

    /**
     * Position of a requester's earliest active item
     * GET /api/v1/queue/users/:requester
     */
    getUserStatus(req: Request, res: Response): void {
      try {
        const requester = req.params.requester;
        const status = reporter.userStatus(requester);
        if (!status) {
          res.status(404).json({
            error: ERROR_MESSAGES.REQUESTER_NOT_QUEUED(requester),
            code: 'NOT_FOUND',
          });
          return;
        }

        res.status(200).json({
          success: true,
          status,
          estimatedWait: reporter.describeWait(status.estimatedWaitMs),
        });
      } catch (error) {
        sendError(res, error, 'Failed to get requester status');
      }
    },

    /**
     * Health check
     * GET /api/v1/health
     */
    getHealth(_req: Request, res: Response): void {
      res.status(200).json({
        status: 'ok',
        uptime: process.uptime(),
        timestamp: new Date().toISOString(),
        queue: reporter.snapshot(),
      });
    },
  };
}

export type QueueController = ReturnType<typeof createQueueController>;
