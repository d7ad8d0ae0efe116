/**
 * service.ts
 * Builds the queue service from validated configuration
 */

import type { AnalysisOperation } from './analysis/analysis-operation.js';
import { HttpAnalysisOperation } from './analysis/http-analysis-operation.js';
import type { AppConfig } from './config/schema.js';
import { LogNotifier } from './notifications/log-notifier.js';
import type { NotificationPort } from './notifications/notification-port.js';
import { WebhookNotifier } from './notifications/webhook-notifier.js';
import { JsonQueueStore } from './queue/json-queue-store.js';
import { QueueManager } from './queue/queue-manager.js';
import { MemoryQueueStore, type QueueStore } from './queue/queue-store.js';
import { StatusReporter } from './queue/status-reporter.js';

export interface QueueService {
  manager: QueueManager;
  reporter: StatusReporter;
}

export interface ServiceOverrides {
  store?: QueueStore;
  notifier?: NotificationPort;
  analysis?: AnalysisOperation;
}

export function createStore(config: AppConfig): QueueStore {
  if (!config.persistence.enabled) {
    return new MemoryQueueStore();
  }
  return new JsonQueueStore({
    filePath: config.persistence.filePath,
    maxBackups: config.persistence.maxBackups,
  });
}

export function createNotifier(config: AppConfig): NotificationPort {
  const { webhookUrl, timeoutMs, maxMessageLength } = config.notifications;
  if (webhookUrl) {
    return new WebhookNotifier({ url: webhookUrl, timeoutMs, maxMessageLength });
  }
  return new LogNotifier(maxMessageLength);
}

/**
 * @throws Error when no analysis backend is configured
 */
export function createAnalysis(config: AppConfig): AnalysisOperation {
  if (!config.analysis.url) {
    throw new Error('analysis.url is required (set QUEUE_ANALYSIS_URL)');
  }
  return new HttpAnalysisOperation({ url: config.analysis.url, apiKey: config.analysis.apiKey });
}

export function createQueueService(
  config: AppConfig,
  overrides: ServiceOverrides = {}
): QueueService {
  const manager = new QueueManager({
    store: overrides.store ?? createStore(config),
    notifier: overrides.notifier ?? createNotifier(config),
    analysis: overrides.analysis ?? createAnalysis(config),
    config: config.queue,
  });
  return { manager, reporter: new StatusReporter(manager) };
}
