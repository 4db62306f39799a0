import {
  Controller,
  Get,
  Inject,
  ServiceUnavailableException,
} from '@nestjs/common';
import { HealthCheck, HealthCheckService } from '@nestjs/terminus';
import { PinoLogger } from 'nestjs-pino';
import {
  PIPELINE_CONFIG,
  type PipelineConfig,
} from '../config/pipeline.config';
import { DeliveryLog } from '../database/delivery-log';
import { DmQueue } from '../delivery/dm-queue';
import { DatabaseHealthIndicator } from './database.health';

export interface HealthStatus {
  status: 'healthy';
  queue_size: number;
  keywords: readonly string[];
}

@Controller('health')
export class HealthController {
  constructor(
    private readonly logger: PinoLogger,
    private readonly health: HealthCheckService,
    private readonly database: DatabaseHealthIndicator,
    private readonly deliveryLog: DeliveryLog,
    private readonly queue: DmQueue,
    @Inject(PIPELINE_CONFIG) private readonly config: PipelineConfig,
  ) {
    this.logger.setContext(HealthController.name);
  }

  /**
   * Service status with the current queue depth and active keywords.
   * Responds 503 when the database is unreachable.
   */
  @Get()
  async status(): Promise<HealthStatus> {
    try {
      await this.deliveryLog.ping();
    } catch (error) {
      this.logger.error({ err: error }, 'Health check failed');
      throw new ServiceUnavailableException({
        status: 'unhealthy',
        error: error instanceof Error ? error.message : String(error),
      });
    }

    return {
      status: 'healthy',
      queue_size: this.queue.size,
      keywords: this.config.keywords,
    };
  }

  /**
   * Liveness check: is the process alive and accepting HTTP requests?
   * No dependency checks; returns 200 if NestJS is running.
   */
  @Get('liveness')
  @HealthCheck()
  liveness() {
    return this.health.check([]);
  }

  /**
   * Readiness check: can we handle traffic?
   * Checks PostgreSQL connectivity.
   */
  @Get('readiness')
  @HealthCheck()
  readiness() {
    return this.health.check([() => this.database.isHealthy('database')]);
  }
}
