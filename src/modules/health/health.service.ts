import { Injectable, Logger } from '@nestjs/common';
import { InjectConnection } from '@nestjs/mongoose';
import { Connection } from 'mongoose';
import { describeError } from '../../common/utils/backoff.util';
import { RedisService } from '../redis/redis.service';

export interface HealthCheckResult {
  status: 'ok' | 'error';
  timestamp: string;
  uptime: number;
  services: {
    mongodb: ServiceHealth;
    redis: ServiceHealth;
  };
}

export interface ServiceHealth {
  status: 'up' | 'down';
  latency?: number;
  error?: string;
}

const MONGO_STATES: Record<number, string> = {
  0: 'disconnected',
  1: 'connected',
  2: 'connecting',
  3: 'disconnecting',
};

/**
 * HealthService checks the dependencies bookings cannot run without.
 *
 * MongoDB is only reported up when it belongs to a replica set, since
 * every booking operation runs in a multi-document transaction.
 */
@Injectable()
export class HealthService {
  private readonly logger = new Logger(HealthService.name);
  private readonly startTime = Date.now();

  constructor(
    @InjectConnection()
    private readonly mongoConnection: Connection,
    private readonly redisService: RedisService,
  ) {}

  async check(): Promise<HealthCheckResult> {
    const [mongodb, redis] = await Promise.all([
      this.checkMongoDB(),
      this.checkRedis(),
    ]);

    return {
      status: mongodb.status === 'up' && redis.status === 'up' ? 'ok' : 'error',
      timestamp: new Date().toISOString(),
      uptime: Math.floor((Date.now() - this.startTime) / 1000),
      services: { mongodb, redis },
    };
  }

  private async checkMongoDB(): Promise<ServiceHealth> {
    const start = Date.now();
    const state = this.mongoConnection.readyState;

    if (state !== 1) {
      return {
        status: 'down',
        error: `Connection state: ${MONGO_STATES[state] ?? 'unknown'}`,
      };
    }

    try {
      const db = this.mongoConnection.db;
      if (!db) {
        return { status: 'down', error: 'No database selected' };
      }
      const hello = await db.admin().command({ hello: 1 });
      if (typeof hello.setName !== 'string') {
        return {
          status: 'down',
          latency: Date.now() - start,
          error: 'Not a replica set member; transactions are unavailable',
        };
      }
      return { status: 'up', latency: Date.now() - start };
    } catch (error) {
      this.logger.error(`MongoDB health check failed: ${describeError(error)}`);
      return {
        status: 'down',
        latency: Date.now() - start,
        error: describeError(error),
      };
    }
  }

  private async checkRedis(): Promise<ServiceHealth> {
    const start = Date.now();

    try {
      const pong = await this.redisService.ping();
      if (pong !== 'PONG') {
        return { status: 'down', error: `Unexpected ping response: ${pong}` };
      }
      return { status: 'up', latency: Date.now() - start };
    } catch (error) {
      this.logger.error(`Redis health check failed: ${describeError(error)}`);
      return {
        status: 'down',
        latency: Date.now() - start,
        error: describeError(error),
      };
    }
  }
}
