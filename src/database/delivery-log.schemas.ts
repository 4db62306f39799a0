import { z } from 'zod';

export const DeliveryStatusSchema = z.enum(['sent', 'failed']);
export type DeliveryStatus = z.infer<typeof DeliveryStatusSchema>;

/**
 * A `dm_logs` row as returned by node-postgres.
 */
export const DeliveryRowSchema = z.object({
  user_id: z.string(),
  post_id: z.string(),
  comment_id: z.string(),
  status: DeliveryStatusSchema,
  retry_count: z.coerce.number().int().min(0),
  error_message: z.string().nullable(),
  sent_at: z.coerce.date(),
});

export const DeliveryRecordSchema = DeliveryRowSchema.transform(row => ({
  userId: row.user_id,
  postId: row.post_id,
  commentId: row.comment_id,
  status: row.status,
  retryCount: row.retry_count,
  errorMessage: row.error_message,
  sentAt: row.sent_at,
}));

/**
 * Persisted outcome for a (userId, postId) pair. At most one exists per pair.
 */
export type DeliveryRecord = z.output<typeof DeliveryRecordSchema>;

/**
 * One write to the delivery log.
 */
export interface DeliveryOutcome {
  userId: string;
  postId: string;
  commentId: string;
  status: DeliveryStatus;
  /** `null` for a successful delivery */
  errorMessage: string | null;
  /** Retries the dispatch used (attempts - 1) */
  retries: number;
}

export const DeliveryTotalsRowSchema = z.object({
  total_sent: z.coerce.number(),
  total_failed: z.coerce.number(),
  recent: z.coerce.number(),
});

export const PostCountRowSchema = z.object({
  post_id: z.string(),
  dm_count: z.coerce.number(),
});

export interface PostDeliveryCount {
  postId: string;
  count: number;
}

export interface DeliverySummary {
  totalSent: number;
  totalFailed: number;
  /** Records written after the `since` cutoff */
  recent: number;
  topPosts: PostDeliveryCount[];
}
