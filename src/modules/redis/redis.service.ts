import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import Redis from 'ioredis';
import { REDIS_CLIENT } from './redis.constants';

/**
 * RedisService wraps the handful of ioredis commands the service uses,
 * and closes the connection on shutdown.
 */
@Injectable()
export class RedisService implements OnModuleDestroy {
  private readonly logger = new Logger(RedisService.name);

  constructor(
    @Inject(REDIS_CLIENT)
    private readonly redis: Redis,
  ) {}

  async get(key: string): Promise<string | null> {
    return this.redis.get(key);
  }

  /**
   * Set a value with optional TTL in milliseconds
   */
  async set(key: string, value: string, ttlMs?: number): Promise<'OK'> {
    if (ttlMs) {
      return this.redis.set(key, value, 'PX', ttlMs);
    }
    return this.redis.set(key, value);
  }

  /**
   * Execute a Lua script
   */
  async eval(
    script: string,
    keys: string[],
    args: (string | number)[],
  ): Promise<unknown> {
    return this.redis.eval(script, keys.length, ...keys, ...args);
  }

  async ping(): Promise<string> {
    return this.redis.ping();
  }

  async onModuleDestroy(): Promise<void> {
    this.logger.log('Closing Redis connection...');
    await this.redis.quit();
    this.logger.log('Redis connection closed');
  }
}
