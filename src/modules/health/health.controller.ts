import { Controller, Get } from '@nestjs/common';
import { HealthService, HealthCheckResult } from './health.service';

/**
 * HealthController exposes liveness and readiness probes
 *
 * Endpoints:
 * - GET /health - Full health check (MongoDB + Redis)
 * - GET /health/live - Liveness probe (app is running)
 * - GET /health/ready - Readiness probe (dependencies ready)
 */
@Controller('health')
export class HealthController {
  constructor(private readonly healthService: HealthService) {}

  /**
   * MongoDB (replica set) and Redis
   */
  @Get()
  async check(): Promise<HealthCheckResult> {
    return this.healthService.check();
  }

  /**
   * Liveness probe - is the app process alive?
   */
  @Get('live')
  live(): { status: string } {
    return { status: 'ok' };
  }

  /**
   * Readiness probe - is the app ready to accept traffic?
   */
  @Get('ready')
  async ready(): Promise<HealthCheckResult> {
    return this.healthService.check();
  }
}
