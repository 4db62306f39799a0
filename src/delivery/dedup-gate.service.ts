import { Injectable } from '@nestjs/common';
import { PinoLogger } from 'nestjs-pino';
import { DeliveryLog } from '../database/delivery-log';
import type { CommentEvent } from '../webhook/webhook.schemas';
import {
  type AdmissionResult,
  type DispatchJob,
  deliveryKey,
} from './delivery.types';
import { DmQueue } from './dm-queue';

/**
 * Admits keyword-matched comments to the DM queue at most once per
 * (author, post) pair.
 *
 * A pair is rejected when the delivery log already has a record for it,
 * whatever its status, or when a job for it is still in flight. In-flight
 * pairs are tracked by a claim taken synchronously before the log lookup, so
 * two concurrent webhook deliveries of the same comment cannot both pass.
 * The claim is held until {@link release} is called after the outcome has
 * been written.
 */
@Injectable()
export class DedupGate {
  private readonly claims = new Set<string>();

  constructor(
    private readonly logger: PinoLogger,
    private readonly deliveryLog: DeliveryLog,
    private readonly queue: DmQueue,
  ) {
    this.logger.setContext(DedupGate.name);
  }

  /**
   * Queue a DM for the comment's author unless one was already sent or
   * attempted for this post. Waits while the queue is full.
   *
   * @throws QueueClosedError when the queue shut down while waiting
   */
  async admit(
    event: CommentEvent,
    messageText: string,
  ): Promise<AdmissionResult> {
    const { authorId: userId, postId } = event;
    const key = deliveryKey(userId, postId);

    if (this.claims.has(key)) {
      this.logger.info(
        { userId, postId, commentId: event.commentId },
        'DM already in flight for user and post, skipping',
      );
      return 'in-flight';
    }
    this.claims.add(key);

    let alreadyLogged: boolean;
    try {
      alreadyLogged = await this.deliveryLog.exists(userId, postId);
    } catch (error) {
      this.claims.delete(key);
      this.logger.error(
        { err: error, userId, postId },
        'Delivery log lookup failed, dropping comment',
      );
      return 'unavailable';
    }

    if (alreadyLogged) {
      this.claims.delete(key);
      this.logger.info(
        { userId, postId, commentId: event.commentId },
        'DM already sent to user for post, skipping',
      );
      return 'duplicate';
    }

    const job: DispatchJob = {
      userId,
      postId,
      commentId: event.commentId,
      messageText,
      username: event.authorUsername,
      enqueuedAt: new Date(),
    };

    try {
      await this.queue.put(job);
    } catch (error) {
      this.claims.delete(key);
      throw error;
    }

    this.logger.info(
      { userId, postId, username: job.username, queueSize: this.queue.size },
      'DM job queued',
    );
    return 'queued';
  }

  /**
   * Drop the in-flight claim for a job whose outcome is now in the log.
   */
  release(job: Pick<DispatchJob, 'userId' | 'postId'>): void {
    this.claims.delete(deliveryKey(job.userId, job.postId));
  }

  /** Number of pairs currently queued or being delivered. */
  get inFlight(): number {
    return this.claims.size;
  }
}
