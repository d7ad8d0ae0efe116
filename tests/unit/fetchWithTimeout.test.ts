import { describe, it, expect, vi, afterEach } from 'vitest';

import { fetchWithTimeout } from '../../src/utils/fetchWithTimeout.js';

function abortableFetch(): ReturnType<typeof vi.fn> {
  return vi.fn(
    (_url: string, init: RequestInit) =>
      new Promise<Response>((_resolve, reject) => {
        init.signal?.addEventListener('abort', () => {
          const error = new Error('This operation was aborted');
          error.name = 'AbortError';
          reject(error);
        });
      })
  );
}

describe('fetchWithTimeout', () => {
  const originalFetch = global.fetch;

  afterEach(() => {
    global.fetch = originalFetch;
  });

  it('should resolve fetch without timeout', async () => {
    const mockResponse = new Response('ok', { status: 200 });
    global.fetch = vi.fn().mockResolvedValue(mockResponse);

    await expect(fetchWithTimeout('http://localhost:3000/test')).resolves.toBe(mockResponse);
  });

  it('should reject with a timeout error when the request takes too long', async () => {
    global.fetch = abortableFetch();

    await expect(fetchWithTimeout('http://analysis.test/run', { timeout: 10 })).rejects.toThrow(
      'Request timeout after 10ms: http://analysis.test/run'
    );
  });

  it('should reject as aborted when the caller aborts', async () => {
    global.fetch = abortableFetch();
    const controller = new AbortController();

    const promise = fetchWithTimeout('http://analysis.test/run', {
      timeout: 5000,
      signal: controller.signal,
    });
    controller.abort();

    await expect(promise).rejects.toThrow('Request aborted: http://analysis.test/run');
  });

  it('should wrap network failures', async () => {
    global.fetch = vi.fn().mockRejectedValue(new TypeError('fetch failed'));

    await expect(fetchWithTimeout('http://analysis.test/run')).rejects.toThrow(
      'Fetch failed: fetch failed'
    );
  });
});
