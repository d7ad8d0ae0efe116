/**
 * async-helpers.test.ts
 * Tests for async utility helpers
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

import { sleep, withTimeout } from '../../src/utils/async-helpers.js';

describe('async-helpers', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('sleep', () => {
    it('should resolve after specified ms', async () => {
      let done = false;
      const promise = sleep(100).then(() => {
        done = true;
      });

      await vi.advanceTimersByTimeAsync(99);
      expect(done).toBe(false);

      await vi.advanceTimersByTimeAsync(1);
      await promise;
      expect(done).toBe(true);
    });
  });

  describe('withTimeout', () => {
    it('should resolve if promise completes within timeout', async () => {
      const promise = withTimeout(Promise.resolve('success'), 1000);
      vi.advanceTimersByTime(500);

      await expect(promise).resolves.toBe('success');
    });

    it('should reject if promise does not complete in time', async () => {
      const promise = withTimeout(
        new Promise(resolve => setTimeout(() => resolve('slow'), 2000)),
        100
      );
      vi.advanceTimersByTime(150);

      await expect(promise).rejects.toThrow('Operation timed out');
    });

    it('should reject with the error built by onTimeout', async () => {
      class SlowError extends Error {}
      const promise = withTimeout(new Promise(() => undefined), 100, () => new SlowError('too slow'));
      vi.advanceTimersByTime(100);

      await expect(promise).rejects.toBeInstanceOf(SlowError);
    });

    it('should pass through rejections from the wrapped promise', async () => {
      const promise = withTimeout(Promise.reject(new Error('inner failure')), 100);

      await expect(promise).rejects.toThrow('inner failure');
    });

    it('should clear its timer once the promise settles', async () => {
      await withTimeout(Promise.resolve('done'), 1000);

      expect(vi.getTimerCount()).toBe(0);
    });
  });
});
