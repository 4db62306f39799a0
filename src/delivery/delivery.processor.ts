import {
  BeforeApplicationShutdown,
  Inject,
  Injectable,
  OnApplicationBootstrap,
} from '@nestjs/common';
import { PinoLogger } from 'nestjs-pino';
import { isAbortError, SLEEP, type Sleep } from '../common/sleep';
import {
  PIPELINE_CONFIG,
  type PipelineConfig,
} from '../config/pipeline.config';
import { DeliveryLog } from '../database/delivery-log';
import type { DeliveryOutcome } from '../database/delivery-log.schemas';
import { DedupGate } from './dedup-gate.service';
import type { DispatchJob } from './delivery.types';
import { DmQueue } from './dm-queue';
import { RetryService } from './retry.service';

/** What happened to a job taken off the queue. */
export type JobDisposition = 'sent' | 'failed' | 'abandoned';

/**
 * The single consumer of the DM queue.
 *
 * Jobs run strictly one at a time in arrival order. Each one waits the
 * pre-send delay, goes through {@link RetryService}, and ends with exactly
 * one delivery log write, after which the dedup claim is released.
 *
 * Shutdown aborts the current delay or backoff sleep and closes the queue.
 * Jobs not yet dispatched are logged as abandoned and get no log record, so a
 * redelivered webhook can still trigger them later.
 */
@Injectable()
export class DeliveryProcessor
  implements OnApplicationBootstrap, BeforeApplicationShutdown
{
  private readonly shutdown = new AbortController();
  private loop: Promise<void> | null = null;

  constructor(
    private readonly logger: PinoLogger,
    private readonly queue: DmQueue,
    private readonly retryService: RetryService,
    private readonly deliveryLog: DeliveryLog,
    private readonly gate: DedupGate,
    @Inject(PIPELINE_CONFIG) private readonly config: PipelineConfig,
    @Inject(SLEEP) private readonly sleep: Sleep,
  ) {
    this.logger.setContext(DeliveryProcessor.name);
  }

  onApplicationBootstrap(): void {
    this.start();
  }

  /**
   * Runs before any `onApplicationShutdown` hook, so the database pool is
   * still open while the last outcome is written.
   */
  async beforeApplicationShutdown(): Promise<void> {
    await this.stop();
  }

  /** Start the consumer loop. Idempotent. */
  start(): void {
    if (this.loop) return;
    this.loop = this.run();
    this.logger.info(
      { preSendDelayMs: this.config.preSendDelayMs },
      'DM worker started',
    );
  }

  /**
   * Stop consuming: interrupt sleeps, close the queue, wait for the loop and
   * report buffered jobs as abandoned.
   */
  async stop(): Promise<void> {
    this.shutdown.abort();
    this.queue.close();

    if (this.loop) {
      await this.loop;
    }

    for (const job of this.queue.drain()) {
      this.logAbandoned(job);
    }
    this.logger.info({}, 'DM worker stopped');
  }

  private async run(): Promise<void> {
    for await (const job of this.queue) {
      if (this.shutdown.signal.aborted) {
        this.logAbandoned(job);
        break;
      }
      try {
        await this.process(job);
      } catch (error) {
        this.logger.error(
          { err: error, userId: job.userId, postId: job.postId },
          'Unexpected error processing DM job',
        );
      }
    }
  }

  /**
   * Deliver one job: pre-send delay, retried dispatch, outcome write.
   */
  async process(job: DispatchJob): Promise<JobDisposition> {
    const { signal } = this.shutdown;

    try {
      await this.sleep(this.config.preSendDelayMs, signal);

      this.logger.info(
        {
          username: job.username,
          userId: job.userId,
          delayMs: this.config.preSendDelayMs,
        },
        'Sending DM',
      );
      const result = await this.retryService.deliver(job, signal);

      const outcome: DeliveryOutcome = result.ok
        ? {
            userId: job.userId,
            postId: job.postId,
            commentId: job.commentId,
            status: 'sent',
            errorMessage: null,
            retries: result.attempts - 1,
          }
        : {
            userId: job.userId,
            postId: job.postId,
            commentId: job.commentId,
            status: 'failed',
            errorMessage: result.error.message,
            retries: result.attempts - 1,
          };

      if (result.ok) {
        this.logger.info(
          { username: job.username, attempts: result.attempts },
          'DM sent',
        );
      } else {
        this.logger.error(
          {
            username: job.username,
            attempts: result.attempts,
            kind: result.error.kind,
            err: result.error,
          },
          'DM failed after retries',
        );
      }

      await this.record(job, outcome);
      return outcome.status;
    } catch (error) {
      if (isAbortError(error)) {
        this.logAbandoned(job);
        return 'abandoned';
      }
      throw error;
    }
  }

  private async record(
    job: DispatchJob,
    outcome: DeliveryOutcome,
  ): Promise<void> {
    try {
      const record = await this.deliveryLog.recordOutcome(outcome);
      this.gate.release(job);
      this.logger.debug(
        {
          userId: record.userId,
          postId: record.postId,
          status: record.status,
          retryCount: record.retryCount,
        },
        'Delivery outcome recorded',
      );
    } catch (error) {
      // Claim stays held so the pair is not admitted again in this process.
      this.logger.error(
        { err: error, userId: job.userId, postId: job.postId, outcome },
        'Failed to record delivery outcome',
      );
    }
  }

  private logAbandoned(job: DispatchJob): void {
    this.logger.warn(
      {
        userId: job.userId,
        postId: job.postId,
        commentId: job.commentId,
        enqueuedAt: job.enqueuedAt.toISOString(),
      },
      'DM job abandoned at shutdown',
    );
  }
}
