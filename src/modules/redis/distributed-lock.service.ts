import { Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import {
  calculateBackoff,
  describeError,
  sleep,
} from '../../common/utils/backoff.util';
import { RedisService } from './redis.service';
import {
  DEFAULT_LOCK_TTL,
  DEFAULT_MAX_RETRY,
  DEFAULT_RETRY_DELAY,
  LUA_SCRIPTS,
} from './redis.constants';
import {
  AcquireLockOptions,
  Lock,
  LockedResult,
} from './interfaces/lock.interface';

/**
 * DistributedLockService provides a Redis lock for work that should run on
 * one instance at a time, such as the reservation sweep.
 *
 * It is not used for seat safety; seats are protected by database row
 * locks inside booking transactions.
 *
 * Lock value format: "{uuid}:{timestamp}"
 */
@Injectable()
export class DistributedLockService {
  private readonly logger = new Logger(DistributedLockService.name);

  constructor(private readonly redisService: RedisService) {}

  /**
   * Acquire a lock on a resource, retrying with exponential backoff
   *
   * @returns the Lock if acquired, null once retries are exhausted
   */
  async acquireLock(
    resource: string,
    options: AcquireLockOptions = {},
  ): Promise<Lock | null> {
    const {
      ttl = DEFAULT_LOCK_TTL,
      maxRetry = DEFAULT_MAX_RETRY,
      retryDelay = DEFAULT_RETRY_DELAY,
    } = options;

    const lockValue = `${uuidv4()}:${Date.now()}`;

    for (let attempt = 0; attempt <= maxRetry; attempt++) {
      try {
        const result = await this.redisService.eval(
          LUA_SCRIPTS.ACQUIRE_LOCK,
          [resource],
          [lockValue, ttl],
        );

        if (result === 'OK') {
          this.logger.debug(`Lock acquired on "${resource}"`);
          return {
            resource,
            value: lockValue,
            expiresAt: Date.now() + ttl,
          };
        }
      } catch (error) {
        this.logger.error(
          `Error acquiring lock on "${resource}": ${describeError(error)}`,
        );
      }

      if (attempt < maxRetry) {
        await sleep(calculateBackoff(retryDelay, attempt));
      }
    }

    this.logger.debug(
      `Lock on "${resource}" not acquired after ${maxRetry + 1} attempt(s)`,
    );
    return null;
  }

  /**
   * Release a lock. Only the holder of the lock value can release it.
   *
   * @returns false if the lock had already expired or belongs to someone else
   */
  async releaseLock(lock: Lock): Promise<boolean> {
    try {
      const result = await this.redisService.eval(
        LUA_SCRIPTS.RELEASE_LOCK,
        [lock.resource],
        [lock.value],
      );

      const released = result === 1;
      if (!released) {
        this.logger.warn(
          `Lock on "${lock.resource}" was gone before release (expired or taken over)`,
        );
      }
      return released;
    } catch (error) {
      this.logger.error(
        `Error releasing lock on "${lock.resource}": ${describeError(error)}`,
      );
      return false;
    }
  }

  /**
   * Execute a function while holding a lock
   *
   * @returns the function's result, or `{ success: false }` when the lock
   * could not be acquired
   */
  async withLock<T>(
    resource: string,
    fn: () => Promise<T>,
    options: AcquireLockOptions = {},
  ): Promise<LockedResult<T>> {
    const lock = await this.acquireLock(resource, options);

    if (!lock) {
      return { success: false, result: null };
    }

    try {
      const result = await fn();
      return { success: true, result };
    } finally {
      await this.releaseLock(lock);
    }
  }
}
