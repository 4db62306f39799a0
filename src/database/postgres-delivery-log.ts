import { Injectable } from '@nestjs/common';
import { DatabaseService } from './database.service';
import { DeliveryLog } from './delivery-log';
import {
  type DeliveryOutcome,
  type DeliveryRecord,
  DeliveryRecordSchema,
  type DeliverySummary,
  DeliveryTotalsRowSchema,
  PostCountRowSchema,
} from './delivery-log.schemas';

const RECORD_COLUMNS =
  'user_id, post_id, comment_id, status, retry_count, error_message, sent_at';

export const EXISTS_SQL = `
  SELECT EXISTS (
    SELECT 1 FROM dm_logs WHERE user_id = $1 AND post_id = $2
  ) AS found`;

export const UPSERT_SQL = `
  INSERT INTO dm_logs (user_id, post_id, comment_id, status, retry_count, error_message, sent_at)
  VALUES ($1, $2, $3, $4, $5, $6, CURRENT_TIMESTAMP)
  ON CONFLICT (user_id, post_id) DO UPDATE
  SET retry_count = dm_logs.retry_count + 1 + EXCLUDED.retry_count,
      status = EXCLUDED.status,
      error_message = EXCLUDED.error_message,
      sent_at = EXCLUDED.sent_at
  RETURNING ${RECORD_COLUMNS}`;

export const FIND_SQL = `
  SELECT ${RECORD_COLUMNS} FROM dm_logs WHERE user_id = $1 AND post_id = $2`;

export const TOTALS_SQL = `
  SELECT
    COUNT(*) FILTER (WHERE status = 'sent') AS total_sent,
    COUNT(*) FILTER (WHERE status = 'failed') AS total_failed,
    COUNT(*) FILTER (WHERE sent_at > $1) AS recent
  FROM dm_logs`;

export const TOP_POSTS_SQL = `
  SELECT post_id, COUNT(*) AS dm_count
  FROM dm_logs
  GROUP BY post_id
  ORDER BY dm_count DESC, post_id ASC
  LIMIT $1`;

/**
 * {@link DeliveryLog} backed by the `dm_logs` table.
 *
 * The unique (user_id, post_id) constraint turns repeated writes into merges,
 * so concurrent callers never create a second row for a pair.
 */
@Injectable()
export class PostgresDeliveryLog extends DeliveryLog {
  constructor(private readonly database: DatabaseService) {
    super();
  }

  async exists(userId: string, postId: string): Promise<boolean> {
    const result = await this.database.query<{ found: boolean }>(EXISTS_SQL, [
      userId,
      postId,
    ]);
    return result.rows[0]?.found === true;
  }

  async recordOutcome(outcome: DeliveryOutcome): Promise<DeliveryRecord> {
    const result = await this.database.query(UPSERT_SQL, [
      outcome.userId,
      outcome.postId,
      outcome.commentId,
      outcome.status,
      outcome.retries,
      outcome.errorMessage,
    ]);
    return DeliveryRecordSchema.parse(result.rows[0]);
  }

  async find(userId: string, postId: string): Promise<DeliveryRecord | null> {
    const result = await this.database.query(FIND_SQL, [userId, postId]);
    const row = result.rows[0];
    return row ? DeliveryRecordSchema.parse(row) : null;
  }

  async summarize(
    since: Date,
    topPostsLimit: number,
  ): Promise<DeliverySummary> {
    const [totals, topPosts] = await Promise.all([
      this.database.query(TOTALS_SQL, [since]),
      this.database.query(TOP_POSTS_SQL, [topPostsLimit]),
    ]);

    const counts = DeliveryTotalsRowSchema.parse(totals.rows[0]);
    return {
      totalSent: counts.total_sent,
      totalFailed: counts.total_failed,
      recent: counts.recent,
      topPosts: topPosts.rows.map(row => {
        const parsed = PostCountRowSchema.parse(row);
        return { postId: parsed.post_id, count: parsed.dm_count };
      }),
    };
  }

  async ping(): Promise<void> {
    await this.database.ping();
  }
}
