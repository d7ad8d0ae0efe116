/**
 * queue.ts
 * Queue API routes
 */

import { Router, type RequestHandler } from 'express';

import type { QueueController } from '../controllers/queueController.js';

export function createQueueRouter(
  controller: QueueController,
  submitRateLimiter: RequestHandler
): Router {
  const router = Router();

  router.get('/health', controller.getHealth);
  router.post('/analyze', submitRateLimiter, controller.submitAnalysis);

  router.get('/queue', controller.getQueueStatus);
  router.get('/queue/items/:id', controller.getItemStatus);
  router.delete('/queue/items/:id', controller.cancelItem);
  router.get('/queue/users/:requester', controller.getUserStatus);

  return router;
}
