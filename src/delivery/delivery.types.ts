/**
 * Unit of queued work: one direct message to send after the pre-send delay.
 * Created on admission by the dedup gate and never mutated afterwards.
 */
export interface DispatchJob {
  /** Recipient (comment author) id */
  readonly userId: string;
  /** Post the comment was left on */
  readonly postId: string;
  readonly commentId: string;
  /** Resolved message template */
  readonly messageText: string;
  readonly username: string;
  readonly enqueuedAt: Date;
}

/**
 * Result of a retried delivery. `attempts` counts every dispatch call made.
 */
export type DeliveryAttemptResult<E extends Error = Error> =
  | { ok: true; attempts: number }
  | { ok: false; attempts: number; error: E };

/** Gate decision for a keyword-matched comment. */
export type AdmissionResult =
  | 'queued'
  | 'duplicate'
  | 'in-flight'
  | 'unavailable';

/**
 * Key of the (user, post) pair that may receive at most one message.
 */
export function deliveryKey(userId: string, postId: string): string {
  return `${userId}:${postId}`;
}
