import { randomUUID } from 'crypto';
import type Redis from 'ioredis';
import logger from '../config/logger';
import { KeyedMutex } from '../utils/keyedMutex';
import { TransientStorageError, errorMessage } from '../utils/AppError';

const LOCK_KEY_PREFIX = 'lock:session:';
const RETRY_DELAY_MS = 50;

/**
 * Critical section around a user's load → handle → save sequence
 */
export interface UserLock {
  runExclusive<T>(userId: string, task: () => Promise<T>): Promise<T>;
}

export class InProcessUserLock implements UserLock {
  private readonly mutex = new KeyedMutex();

  runExclusive<T>(userId: string, task: () => Promise<T>): Promise<T> {
    return this.mutex.runExclusive(userId, task);
  }
}

/**
 * Distributed per-user lock: SET NX PX lease in Redis, layered over the
 * in-process queue so one instance never contends with itself.
 */
export class RedisUserLock implements UserLock {
  private readonly local = new KeyedMutex();

  constructor(
    private readonly redis: Redis,
    private readonly ttlMs: number,
    private readonly waitMs: number
  ) {}

  runExclusive<T>(userId: string, task: () => Promise<T>): Promise<T> {
    return this.local.runExclusive(userId, async () => {
      const token = await this.acquire(userId);
      try {
        return await task();
      } finally {
        if (token !== null) {
          await this.release(userId, token);
        }
      }
    });
  }

  /**
   * @returns the lease token, or null when Redis is unreachable and only
   * the in-process lock protects the session
   */
  private async acquire(userId: string): Promise<string | null> {
    const key = `${LOCK_KEY_PREFIX}${userId}`;
    const token = randomUUID();
    const deadline = Date.now() + this.waitMs;

    try {
      while (Date.now() < deadline) {
        const result = await this.redis.set(key, token, 'PX', this.ttlMs, 'NX');
        if (result === 'OK') {
          logger.debug(`Lock acquired: ${key}`);
          return token;
        }
        await new Promise((resolve) => setTimeout(resolve, RETRY_DELAY_MS));
      }
    } catch (error) {
      // Graceful degradation: the in-process lock still serializes this instance
      logger.warn('Redis unavailable, lock acquisition skipped:', { userId, error: errorMessage(error) });
      return null;
    }

    throw new TransientStorageError(`Timed out waiting for session lock of ${userId}`);
  }

  private async release(userId: string, token: string): Promise<void> {
    const key = `${LOCK_KEY_PREFIX}${userId}`;
    try {
      const currentOwner = await this.redis.get(key);
      if (currentOwner !== token) {
        logger.warn(`Lock ${key} expired or was taken over before release`);
        return;
      }
      await this.redis.del(key);
      logger.debug(`Lock released: ${key}`);
    } catch (error) {
      logger.warn('Redis unavailable, lock release skipped:', { userId, error: errorMessage(error) });
    }
  }
}
