import { Controller, Get } from '@nestjs/common';
import { AnalyticsService, type DeliveryAnalytics } from './analytics.service';

@Controller('analytics')
export class AnalyticsController {
  constructor(private readonly analytics: AnalyticsService) {}

  /**
   * Delivery totals, success rate, last-24h volume and the busiest posts.
   */
  @Get()
  getAnalytics(): Promise<DeliveryAnalytics> {
    return this.analytics.getAnalytics();
  }
}
