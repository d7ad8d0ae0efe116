/**
 * queueController.test.ts
 * Tests for the queue API endpoints
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Request, Response } from 'express';

import {
  createQueueController,
  toPublicItem,
  type QueueController,
  type QueueControllerDeps,
} from '../../src/controllers/queueController.js';
import { InMemoryNotifier } from '../../src/notifications/in-memory-notifier.js';
import { QueueManager } from '../../src/queue/queue-manager.js';
import { MemoryQueueStore } from '../../src/queue/queue-store.js';
import { StatusReporter } from '../../src/queue/status-reporter.js';
import { logger } from '../../src/utils/logger.js';
import { ControlledAnalysis, createQueueItem } from '../utils/test-helpers.js';

vi.mock('../../src/utils/logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

function createMockRequest(overrides: Partial<Request> = {}): Request {
  const req: Partial<Request> = { body: {}, params: {}, query: {}, ...overrides };
  return req as Request;
}

function createMockResponse() {
  const res = {
    status: vi.fn(),
    json: vi.fn(),
  };
  res.status.mockReturnValue(res);
  res.json.mockReturnValue(res);
  return res;
}

describe('Queue Controller', () => {
  let analysis: ControlledAnalysis;
  let manager: QueueManager;
  let reporter: StatusReporter;
  let controller: QueueController;
  let res: ReturnType<typeof createMockResponse>;

  const send = (
    handler: (req: Request, res: Response) => void,
    req: Partial<Request> = {}
  ): void => {
    handler(createMockRequest(req), res as unknown as Response);
  };

  beforeEach(() => {
    let counter = 0;
    analysis = new ControlledAnalysis();
    manager = new QueueManager({
      store: new MemoryQueueStore(),
      notifier: new InMemoryNotifier(),
      analysis,
      config: { maxQueueSize: 2 },
      now: () => 1_000,
      generateId: () => `item-${++counter}`,
    });
    reporter = new StatusReporter(manager);
    controller = createQueueController({ manager, reporter });
    res = createMockResponse();
  });

  afterEach(async () => {
    await manager.stop();
  });

  describe('toPublicItem', () => {
    it('should drop the delivery origin and notification flag', () => {
      const item = createQueueItem({ origin: { channel: 'secret' }, startingNotified: true });

      expect(toPublicItem(item)).toEqual({
        id: 'item-1',
        sequence: 1,
        requester: 'user-1',
        payload: 'What changed in the release?',
        state: 'queued',
        submittedAt: 1_000,
        initialPosition: 0,
      });
    });
  });

  describe('submitAnalysis', () => {
    it('should accept a query and report its position', () => {
      send(controller.submitAnalysis, {
        body: { requester: 'user-a', query: 'first', origin: { channel: 'a' } },
      });
      send(controller.submitAnalysis, { body: { requester: 'user-b', query: 'second' } });

      expect(res.status).toHaveBeenNthCalledWith(2, 202);
      expect(res.json).toHaveBeenNthCalledWith(2, {
        success: true,
        item: {
          id: 'item-2',
          sequence: 2,
          requester: 'user-b',
          payload: 'second',
          state: 'queued',
          submittedAt: 1_000,
          initialPosition: 1,
        },
        position: 1,
        estimatedWaitMs: 45000,
        estimatedWait: '~45 seconds',
      });
      expect(manager.getItem('item-1')?.origin).toEqual({ channel: 'a' });
    });

    it('should reject a malformed body', () => {
      send(controller.submitAnalysis, { body: { requester: 'user-a' } });

      expect(res.status).toHaveBeenCalledWith(400);
      expect(res.json).toHaveBeenCalledWith({
        error: 'Invalid request',
        details: ['query: Required'],
      });
    });

    it('should reject a blank requester', () => {
      send(controller.submitAnalysis, { body: { requester: '   ', query: 'q' } });

      expect(res.status).toHaveBeenCalledWith(400);
      expect(res.json).toHaveBeenCalledWith({
        error: 'Invalid request',
        details: ['requester: requester is required'],
      });
    });

    it('should map validation errors to 400', () => {
      send(controller.submitAnalysis, { body: { requester: 'user-a', query: '' } });

      expect(res.status).toHaveBeenCalledWith(400);
      expect(res.json).toHaveBeenCalledWith({
        error: 'Query must not be empty',
        code: 'VALIDATION_ERROR',
      });
    });

    it('should map a full queue to 503', () => {
      send(controller.submitAnalysis, { body: { requester: 'user-a', query: 'one' } });
      send(controller.submitAnalysis, { body: { requester: 'user-b', query: 'two' } });
      send(controller.submitAnalysis, { body: { requester: 'user-c', query: 'three' } });

      expect(res.status).toHaveBeenLastCalledWith(503);
      expect(res.json).toHaveBeenLastCalledWith({
        error: 'Queue is full (2 active requests), try again later',
        code: 'QUEUE_FULL',
        capacity: 2,
      });
    });

    it('should report unexpected failures as 500', () => {
      const broken: QueueControllerDeps['manager'] = {
        submit: () => {
          throw new Error('boom');
        },
        position: id => manager.position(id),
        estimatedWait: position => manager.estimatedWait(position),
        cancel: (id, requester) => manager.cancel(id, requester),
        getItem: id => manager.getItem(id),
      };
      controller = createQueueController({ manager: broken, reporter });

      send(controller.submitAnalysis, { body: { requester: 'user-a', query: 'one' } });

      expect(res.status).toHaveBeenCalledWith(500);
      expect(res.json).toHaveBeenCalledWith({ error: 'Failed to submit query', details: 'boom' });
      expect(logger.error).toHaveBeenCalledWith('Failed to submit query', { error: 'boom' });
    });
  });

  describe('getQueueStatus', () => {
    it('should return the queue snapshot', () => {
      manager.submit('user-a', 'one');

      send(controller.getQueueStatus);

      expect(res.status).toHaveBeenCalledWith(200);
      expect(res.json).toHaveBeenCalledWith({ success: true, queue: reporter.snapshot() });
    });
  });

  describe('getItemStatus', () => {
    it('should return the item with its live position', () => {
      manager.submit('user-a', 'one');
      manager.submit('user-b', 'two');

      send(controller.getItemStatus, { params: { id: 'item-2' } });

      expect(res.json).toHaveBeenCalledWith(
        expect.objectContaining({ success: true, position: 1, estimatedWaitMs: 45000 })
      );
    });

    it('should return 404 for unknown items', () => {
      send(controller.getItemStatus, { params: { id: 'nope' } });

      expect(res.status).toHaveBeenCalledWith(404);
      expect(res.json).toHaveBeenCalledWith({
        error: "Queue item 'nope' not found",
        code: 'NOT_FOUND',
      });
    });
  });

  describe('cancelItem', () => {
    it('should require a requester', () => {
      send(controller.cancelItem, { params: { id: 'item-1' } });

      expect(res.status).toHaveBeenCalledWith(400);
      expect(res.json).toHaveBeenCalledWith({
        error: 'requester is required',
        code: 'VALIDATION_ERROR',
      });
    });

    it('should cancel an item named in the query string', () => {
      manager.submit('user-a', 'one');

      send(controller.cancelItem, { params: { id: 'item-1' }, query: { requester: 'user-a' } });

      expect(res.json).toHaveBeenCalledWith({ success: true, cancelled: true });
      expect(manager.getItem('item-1')).toBeUndefined();
    });

    it('should report false for an item owned by someone else', () => {
      manager.submit('user-a', 'one');

      send(controller.cancelItem, { params: { id: 'item-1' }, body: { requester: 'user-b' } });

      expect(res.json).toHaveBeenCalledWith({ success: true, cancelled: false });
    });
  });

  describe('getUserStatus', () => {
    it('should report the requester position', () => {
      manager.submit('user-a', 'one');
      manager.submit('user-b', 'two');

      send(controller.getUserStatus, { params: { requester: 'user-b' } });

      expect(res.json).toHaveBeenCalledWith({
        success: true,
        status: { itemId: 'item-2', state: 'queued', position: 1, estimatedWaitMs: 45000 },
        estimatedWait: '~45 seconds',
      });
    });

    it('should return 404 for requesters with nothing active', () => {
      send(controller.getUserStatus, { params: { requester: 'ghost' } });

      expect(res.status).toHaveBeenCalledWith(404);
      expect(res.json).toHaveBeenCalledWith({
        error: "Requester 'ghost' has no active request",
        code: 'NOT_FOUND',
      });
    });
  });

  describe('getHealth', () => {
    it('should report ok with the queue snapshot', () => {
      send(controller.getHealth);

      expect(res.status).toHaveBeenCalledWith(200);
      expect(res.json).toHaveBeenCalledWith(
        expect.objectContaining({ status: 'ok', queue: reporter.snapshot() })
      );
    });
  });
});
