/**
 * index.ts
 * Main entry point for the analysis request queue
 */

import 'dotenv/config';

import { createApp } from './app.js';
import { loadConfig } from './config/config.js';
import { createQueueService } from './service.js';
import { getErrorMessage } from './utils/error-helpers.js';
import { logger } from './utils/logger.js';

async function main(): Promise<void> {
  const config = await loadConfig();
  process.env.LOG_LEVEL ??= config.logLevel;

  const { manager, reporter } = createQueueService(config);
  manager.start();

  const app = createApp({ manager, reporter, rateLimit: config.rateLimit });

  const server = app.listen(config.port, config.host, () => {
    logger.info(`Analysis queue listening on ${config.host}:${config.port}`);
    logger.info(`  - Submit:        POST   /api/v1/analyze`);
    logger.info(`  - Queue status:  GET    /api/v1/queue`);
    logger.info(`  - Item status:   GET    /api/v1/queue/items/:id`);
    logger.info(`  - Cancel:        DELETE /api/v1/queue/items/:id`);
    logger.info(`  - User status:   GET    /api/v1/queue/users/:requester`);
    logger.info(`  - Health check:  GET    /api/v1/health`);
  });

  const shutdown = (signal: string): void => {
    logger.info(`${signal} received, shutting down gracefully...`);

    server.close(() => {
      logger.info('HTTP server closed');

      // Lets the in-flight analysis finish or time out first
      manager
        .stop()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('Queue shutdown failed', { error: getErrorMessage(error) });
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error: unknown) => {
  logger.error('Fatal startup error', { error: getErrorMessage(error) });
  process.exit(1);
});
