import { createApp } from './app';
import logger from './config/logger';
import { config } from './config/env';
import redisClient from './config/redis';
import { testConnection } from './config/database';
import { createContainer } from './container';
import { errorMessage } from './utils/AppError';

// Handle unhandled promise rejections
process.on('unhandledRejection', (reason: unknown) => {
  logger.error('Unhandled Rejection:', { reason: errorMessage(reason) });
  // Don't exit - let the server continue running
});

// Handle uncaught exceptions
process.on('uncaughtException', (error: Error) => {
  logger.error('Uncaught Exception:', { error: error.message, stack: error.stack });
  // Exit gracefully
  process.exit(1);
});

async function start(): Promise<void> {
  const container = createContainer(config, redisClient);

  if (container.pool) {
    await testConnection(container.pool);
  }

  // Settings are seeded and the index built before the first message arrives
  await container.knowledge.init();

  const app = createApp(container);
  const server = app.listen(config.port, () => {
    logger.info('Seatline Bot Starting...');
    logger.info(`Server running on port ${config.port} (storage: ${config.storageDriver})`);
  });

  // Handle server errors
  server.on('error', (error: Error) => {
    logger.error('Server error:', { error: error.message });
  });

  let shuttingDown = false;
  const shutdown = (signal: string): void => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info(`${signal} received, shutting down`);

    server.close(() => {
      container.knowledge.teardown();
      const closing: Promise<unknown>[] = [];
      if (container.redis) {
        closing.push(container.redis.quit());
      }
      if (container.pool) {
        closing.push(container.pool.end());
      }
      Promise.allSettled(closing)
        .then(() => {
          logger.info('Shutdown complete');
          process.exit(0);
        })
        .catch((error: unknown) => {
          logger.error('Shutdown failed:', { error: errorMessage(error) });
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

start().catch((error: unknown) => {
  logger.error('Failed to start server:', { error: errorMessage(error) });
  process.exit(1);
});
