import { Injectable } from '@nestjs/common';
import { HealthIndicatorService } from '@nestjs/terminus';
import { DeliveryLog } from '../database/delivery-log';

@Injectable()
export class DatabaseHealthIndicator {
  constructor(
    private readonly healthIndicatorService: HealthIndicatorService,
    private readonly deliveryLog: DeliveryLog,
  ) {}

  /**
   * Checks PostgreSQL connectivity with a trivial query.
   */
  async isHealthy(key: string) {
    const indicator = this.healthIndicatorService.check(key);

    try {
      await this.deliveryLog.ping();
      return indicator.up();
    } catch (error) {
      return indicator.down({ message: `Database ping failed: ${error}` });
    }
  }
}
