/**
 * notifiers.test.ts
 * Tests for webhook, log and in-memory notification sinks
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import { InMemoryNotifier } from '../../src/notifications/in-memory-notifier.js';
import { LogNotifier } from '../../src/notifications/log-notifier.js';
import { WebhookNotifier } from '../../src/notifications/webhook-notifier.js';
import { logger } from '../../src/utils/logger.js';

vi.mock('../../src/utils/logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

describe('WebhookNotifier', () => {
  const originalFetch = global.fetch;
  let fetchMock: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    fetchMock = vi.fn().mockResolvedValue(new Response(null, { status: 204 }));
    global.fetch = fetchMock;
  });

  afterEach(() => {
    global.fetch = originalFetch;
  });

  it('should post the event with rendered messages', async () => {
    const notifier = new WebhookNotifier({ url: 'http://relay.test/notify' });

    await notifier.notify({ channel: 'general' }, 'starting', {
      itemId: 'item-1',
      requester: 'user-a',
    });

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://relay.test/notify');
    expect(init).toMatchObject({
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
    });
    expect(JSON.parse(String(init.body))).toEqual({
      kind: 'starting',
      origin: { channel: 'general' },
      payload: { itemId: 'item-1', requester: 'user-a' },
      messages: ['🔄 Processing query...'],
    });
  });

  it('should split long results using the configured message length', async () => {
    const notifier = new WebhookNotifier({ url: 'http://relay.test/notify', maxMessageLength: 200 });

    await notifier.notify({}, 'completed', {
      itemId: 'item-1',
      requester: 'user-a',
      result: 'r'.repeat(250),
      processingTimeMs: 5,
    });

    const body: unknown = JSON.parse(String(fetchMock.mock.calls[0][1].body));
    expect(body).toMatchObject({
      messages: [
        `**Part 1/3:**\n${'r'.repeat(100)}`,
        `**Part 2/3:**\n${'r'.repeat(100)}`,
        `**Part 3/3:**\n${'r'.repeat(50)}`,
      ],
    });
  });

  it('should reject when the relay answers with an error status', async () => {
    fetchMock.mockResolvedValue(new Response('nope', { status: 502, statusText: 'Bad Gateway' }));
    const notifier = new WebhookNotifier({ url: 'http://relay.test/notify' });

    await expect(
      notifier.notify({}, 'starting', { itemId: 'item-1', requester: 'user-a' })
    ).rejects.toThrow('Webhook responded with HTTP 502: Bad Gateway');
  });

  it('should reject when the relay cannot be reached', async () => {
    fetchMock.mockRejectedValue(new Error('ECONNREFUSED'));
    const notifier = new WebhookNotifier({ url: 'http://relay.test/notify' });

    await expect(
      notifier.notify({}, 'starting', { itemId: 'item-1', requester: 'user-a' })
    ).rejects.toThrow('Fetch failed: ECONNREFUSED');
  });
});

describe('LogNotifier', () => {
  it('should log the rendered messages', async () => {
    const notifier = new LogNotifier();

    await notifier.notify({ channel: 'ops' }, 'queued', {
      itemId: 'item-3',
      requester: 'user-c',
      position: 2,
      estimatedWaitMs: 90_000,
    });

    expect(logger.info).toHaveBeenCalledWith('Notification queued', {
      itemId: 'item-3',
      requester: 'user-c',
      origin: { channel: 'ops' },
      messages: ['📝 Query queued at position **#2** (~1 minute)'],
    });
  });
});

describe('InMemoryNotifier', () => {
  it('should record deliveries by kind', async () => {
    const notifier = new InMemoryNotifier();
    await notifier.notify({}, 'starting', { itemId: 'a', requester: 'user-a' });
    await notifier.notify({}, 'starting', { itemId: 'b', requester: 'user-b' });

    expect(notifier.itemIds('starting')).toEqual(['a', 'b']);
    expect(notifier.ofKind('completed')).toEqual([]);

    notifier.clear();
    expect(notifier.deliveries).toEqual([]);
  });

  it('should record and then reject when set to fail', async () => {
    const notifier = new InMemoryNotifier();
    notifier.failWith = new Error('down');

    await expect(
      notifier.notify({}, 'starting', { itemId: 'a', requester: 'user-a' })
    ).rejects.toThrow('down');
    expect(notifier.deliveries).toHaveLength(1);
  });
});
