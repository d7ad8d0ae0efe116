/**
 * schema.ts
 * Centralized Zod configuration schema with validation
 */

import { z } from 'zod';

// Longest delay setTimeout honours; larger values fire after 1ms
const MAX_TIMER_MS = 2_147_483_647;

/**
 * Queue behaviour. All durations are milliseconds.
 */
export const queueConfigSchema = z.object({
  maxQueueSize: z.number().int().min(1).default(20),
  maxPayloadLength: z.number().int().min(1).default(500),
  averageProcessingTimeMs: z.number().int().min(0).default(45000),
  analysisTimeoutMs: z.number().int().min(1).max(MAX_TIMER_MS).default(600000), // 10 minutes
  retentionMs: z.number().int().min(0).max(MAX_TIMER_MS).default(300000), // 5 minutes
  loopErrorBackoffMs: z.number().int().min(0).max(MAX_TIMER_MS).default(5000),
});

export const persistenceConfigSchema = z.object({
  enabled: z.boolean().default(true),
  filePath: z.string().min(1).default('./data/queue-state.json'),
  maxBackups: z.number().int().min(0).default(0),
});

export const analysisConfigSchema = z.object({
  url: z.string().url().optional(),
  apiKey: z.string().optional(),
});

export const notificationsConfigSchema = z.object({
  webhookUrl: z.string().url().optional(),
  timeoutMs: z.number().int().min(100).max(MAX_TIMER_MS).default(10000),
  maxMessageLength: z.number().int().min(200).max(4000).default(2000),
});

export const rateLimitConfigSchema = z.object({
  enabled: z.boolean().default(true),
  windowMs: z.number().int().min(1000).default(60000),
  maxRequests: z.number().int().min(1).default(30),
});

export const appConfigSchema = z.object({
  port: z.number().int().min(1).max(65535).default(5100),
  host: z.string().default('0.0.0.0'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  queue: queueConfigSchema.default({}),
  persistence: persistenceConfigSchema.default({}),
  analysis: analysisConfigSchema.default({}),
  notifications: notificationsConfigSchema.default({}),
  rateLimit: rateLimitConfigSchema.default({}),
});

export type QueueConfig = z.infer<typeof queueConfigSchema>;
export type RateLimitConfig = z.infer<typeof rateLimitConfigSchema>;
export type AppConfig = z.infer<typeof appConfigSchema>;

export const DEFAULT_QUEUE_CONFIG: QueueConfig = queueConfigSchema.parse({});

export interface ConfigIssue {
  path: string;
  message: string;
}

export class ConfigValidationError extends Error {
  errors: ConfigIssue[];

  constructor(errors: ConfigIssue[]) {
    super(
      `Configuration validation failed:\n${errors.map(e => `  ${e.path}: ${e.message}`).join('\n')}`
    );
    this.errors = errors;
    this.name = 'ConfigValidationError';
  }
}

/**
 * Validate configuration against schema, filling defaults
 */
export function validateConfig(config: unknown): AppConfig {
  const result = appConfigSchema.safeParse(config);

  if (!result.success) {
    throw new ConfigValidationError(
      result.error.issues.map((issue: z.ZodIssue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      }))
    );
  }

  return result.data;
}
