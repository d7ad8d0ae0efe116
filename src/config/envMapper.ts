/**
 * envMapper.ts
 * Maps environment variables to configuration paths
 */

import { logger } from '../utils/logger.js';

/**
 * Environment variable to config path mapping
 * Format: ENV_VAR_NAME: 'nested.config.path'
 */
export const ENV_CONFIG_MAPPING: Record<string, string> = {
  // Server settings
  QUEUE_PORT: 'port',
  QUEUE_HOST: 'host',
  QUEUE_LOG_LEVEL: 'logLevel',

  // Queue settings
  QUEUE_MAX_SIZE: 'queue.maxQueueSize',
  QUEUE_MAX_PAYLOAD_LENGTH: 'queue.maxPayloadLength',
  QUEUE_AVERAGE_PROCESSING_TIME: 'queue.averageProcessingTimeMs',
  QUEUE_ANALYSIS_TIMEOUT: 'queue.analysisTimeoutMs',
  QUEUE_RETENTION: 'queue.retentionMs',
  QUEUE_LOOP_ERROR_BACKOFF: 'queue.loopErrorBackoffMs',

  // Persistence settings
  QUEUE_ENABLE_PERSISTENCE: 'persistence.enabled',
  QUEUE_PERSISTENCE_PATH: 'persistence.filePath',
  QUEUE_PERSISTENCE_MAX_BACKUPS: 'persistence.maxBackups',

  // Analysis backend
  QUEUE_ANALYSIS_URL: 'analysis.url',
  QUEUE_ANALYSIS_API_KEY: 'analysis.apiKey',

  // Notifications
  QUEUE_NOTIFY_WEBHOOK_URL: 'notifications.webhookUrl',
  QUEUE_NOTIFY_TIMEOUT: 'notifications.timeoutMs',
  QUEUE_NOTIFY_MAX_MESSAGE_LENGTH: 'notifications.maxMessageLength',

  // Rate limiting
  QUEUE_RATE_LIMIT_ENABLED: 'rateLimit.enabled',
  QUEUE_RATE_LIMIT_WINDOW: 'rateLimit.windowMs',
  QUEUE_RATE_LIMIT_MAX: 'rateLimit.maxRequests',
};

/**
 * Parse environment variable value to appropriate type
 */
export function parseEnvValue(value: string): string | number | boolean {
  if (value.toLowerCase() === 'true') {
    return true;
  }
  if (value.toLowerCase() === 'false') {
    return false;
  }

  if (/^-?\d+$/.test(value)) {
    return parseInt(value, 10);
  }
  if (/^-?\d+\.\d+$/.test(value)) {
    return parseFloat(value);
  }

  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Set a nested value in an object by path, copying each level it touches
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const keys = path.split('.');
  let current = obj;

  for (const key of keys.slice(0, -1)) {
    const next = current[key];
    const copy: Record<string, unknown> = isRecord(next) ? { ...next } : {};
    current[key] = copy;
    current = copy;
  }

  current[keys[keys.length - 1]] = value;
}

/**
 * Apply environment variable overrides to config
 */
export function applyEnvOverrides(
  config: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env
): Record<string, unknown> {
  const result = { ...config };
  let appliedCount = 0;

  for (const [envVar, configPath] of Object.entries(ENV_CONFIG_MAPPING)) {
    const value = env[envVar];
    if (value !== undefined && value !== '') {
      setNestedValue(result, configPath, parseEnvValue(value));
      appliedCount++;
      logger.debug(`Applied config override from env: ${envVar} -> ${configPath}`);
    }
  }

  if (appliedCount > 0) {
    logger.info(`Applied ${appliedCount} configuration overrides from environment variables`);
  }

  return result;
}
