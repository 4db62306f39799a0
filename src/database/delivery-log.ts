import type {
  DeliveryOutcome,
  DeliveryRecord,
  DeliverySummary,
} from './delivery-log.schemas';

/**
 * Durable record of delivery outcomes, unique per (userId, postId).
 *
 * Read by the dedup gate, written by the delivery processor. Implementations
 * must make {@link recordOutcome} a single atomic upsert.
 */
export abstract class DeliveryLog {
  abstract exists(userId: string, postId: string): Promise<boolean>;

  /**
   * Insert the outcome, or merge it into the existing record for the pair:
   * status, error and timestamp are overwritten and
   * `retryCount = previous + 1 + outcome.retries`.
   */
  abstract recordOutcome(outcome: DeliveryOutcome): Promise<DeliveryRecord>;

  abstract find(userId: string, postId: string): Promise<DeliveryRecord | null>;

  abstract summarize(
    since: Date,
    topPostsLimit: number,
  ): Promise<DeliverySummary>;

  /** @throws when the backing store is unreachable */
  abstract ping(): Promise<void>;
}
