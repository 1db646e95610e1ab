import Redis from 'ioredis';
import logger from './logger';
import { config } from './env';

const RETRY_WARN_AFTER = 5;
const RETRY_DELAY_CAP_MS = 2000;

// Connects on first command; sessions, settings and locks all share it.
// Never gives up reconnecting: while Redis is down, users are asked to retry.
const redisClient = new Redis(config.redisUrl, {
  lazyConnect: true,
  maxRetriesPerRequest: 3,
  retryStrategy: (attempt) => {
    if (attempt === RETRY_WARN_AFTER) {
      logger.error(`Redis still unreachable after ${attempt} attempts, retrying every ${RETRY_DELAY_CAP_MS}ms`);
    }
    return Math.min(attempt * 200, RETRY_DELAY_CAP_MS);
  },
});

redisClient.on('ready', () => logger.info('Redis client ready'));
redisClient.on('error', (error: Error) => logger.warn('Redis client error:', { error: error.message }));

export default redisClient;
