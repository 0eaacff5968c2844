import { Global, Module, Logger } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import { RedisService } from './redis.service';
import { DistributedLockService } from './distributed-lock.service';
import { REDIS_CLIENT } from './redis.constants';

const MAX_RECONNECT_ATTEMPTS = 10;

/**
 * Build the ioredis client from REDIS_URL and REDIS_KEY_PREFIX, with
 * bounded reconnects and lifecycle logging.
 */
function createRedisClient(configService: ConfigService): Redis {
  const logger = new Logger('RedisModule');
  const redisUrl =
    configService.get<string>('REDIS_URL') || 'redis://localhost:6379';
  const keyPrefix = configService.get<string>('REDIS_KEY_PREFIX', 'stadium:');

  logger.log(`Connecting to Redis at ${redisUrl}`);

  const redis = new Redis(redisUrl, {
    keyPrefix,
    connectionName: 'stadium-booking',
    retryStrategy: (times: number) => {
      if (times > MAX_RECONNECT_ATTEMPTS) {
        logger.error('Redis max retries reached, giving up');
        return null;
      }
      const delay = Math.min(times * 100, 3000);
      logger.warn(`Redis connection attempt ${times}, retrying in ${delay}ms`);
      return delay;
    },
    maxRetriesPerRequest: 3,
    enableReadyCheck: true,
    connectTimeout: 10000,
    keepAlive: 30000,
  });

  redis.on('ready', () => logger.log('Redis ready to accept commands'));
  redis.on('error', (error: Error) =>
    logger.error(`Redis error: ${error.message}`),
  );
  redis.on('close', () => logger.warn('Redis connection closed'));

  return redis;
}

/**
 * RedisModule provides the Redis client, a small command wrapper and the
 * distributed lock that keeps background jobs to one instance at a time.
 * Marked as @Global() so it can be used across all modules without importing
 */
@Global()
@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: REDIS_CLIENT,
      useFactory: createRedisClient,
      inject: [ConfigService],
    },
    RedisService,
    DistributedLockService,
  ],
  exports: [RedisService, DistributedLockService, REDIS_CLIENT],
})
export class RedisModule {}
