import { Injectable } from '@nestjs/common';
import { PinoLogger } from 'nestjs-pino';
import { DeliveryLog } from '../database/delivery-log';

const DAY_MS = 24 * 60 * 60 * 1000;
const TOP_POSTS_LIMIT = 5;

export interface PostStat {
  post_id: string;
  dm_count: number;
}

export interface DeliveryAnalytics {
  total_sent: number;
  total_failed: number;
  /** Percentage of records with status `sent`, two decimals */
  success_rate: number;
  last_24_hours: number;
  top_posts: PostStat[];
}

/**
 * Percentage of `sent` over all records, rounded to two decimals.
 * Zero when nothing has been recorded yet.
 */
export function successRate(sent: number, failed: number): number {
  const total = sent + failed;
  if (total === 0) return 0;
  return Math.round((sent / total) * 10_000) / 100;
}

@Injectable()
export class AnalyticsService {
  constructor(
    private readonly logger: PinoLogger,
    private readonly deliveryLog: DeliveryLog,
  ) {
    this.logger.setContext(AnalyticsService.name);
  }

  async getAnalytics(now: Date = new Date()): Promise<DeliveryAnalytics> {
    const since = new Date(now.getTime() - DAY_MS);
    const summary = await this.deliveryLog.summarize(since, TOP_POSTS_LIMIT);

    this.logger.debug(
      { totalSent: summary.totalSent, totalFailed: summary.totalFailed },
      'Computed delivery analytics',
    );

    return {
      total_sent: summary.totalSent,
      total_failed: summary.totalFailed,
      success_rate: successRate(summary.totalSent, summary.totalFailed),
      last_24_hours: summary.recent,
      top_posts: summary.topPosts.map(post => ({
        post_id: post.postId,
        dm_count: post.count,
      })),
    };
  }
}
