import { Inject, Injectable } from '@nestjs/common';
import { PinoLogger } from 'nestjs-pino';
import { SLEEP, type Sleep } from '../common/sleep';
import {
  PIPELINE_CONFIG,
  type PipelineConfig,
} from '../config/pipeline.config';
import { DispatchError, TransportError } from './delivery.errors';
import type { DeliveryAttemptResult, DispatchJob } from './delivery.types';
import { DmDispatcher } from './dm-dispatcher.service';

/**
 * Delay before retry number `retry` (1-based): `base * 2^(retry - 1)`.
 */
export function backoffDelay(baseMs: number, retry: number): number {
  return baseMs * 2 ** (retry - 1);
}

/**
 * Runs a dispatch with bounded exponential backoff.
 *
 * Makes up to `maxRetries + 1` attempts. The first is immediate; retry `n`
 * waits {@link backoffDelay}(backoffBase, n). Every error kind is retried the
 * same way unless `skipTerminalRetries` is set, in which case a terminal
 * error (messaging window expired) ends the sequence at once.
 */
@Injectable()
export class RetryService {
  constructor(
    private readonly logger: PinoLogger,
    private readonly dispatcher: DmDispatcher,
    @Inject(PIPELINE_CONFIG) private readonly config: PipelineConfig,
    @Inject(SLEEP) private readonly sleep: Sleep,
  ) {
    this.logger.setContext(RetryService.name);
  }

  /**
   * @param signal aborts a pending backoff sleep (shutdown); the sleep then
   * rejects with an `AbortError`
   */
  async deliver(
    job: DispatchJob,
    signal?: AbortSignal,
  ): Promise<DeliveryAttemptResult<DispatchError>> {
    const { maxRetries, backoffBaseMs, skipTerminalRetries } = this.config;
    let lastError: DispatchError = new TransportError('no attempt made');

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      if (attempt > 0) {
        const backoffMs = backoffDelay(backoffBaseMs, attempt);
        this.logger.info(
          { username: job.username, retry: attempt, maxRetries, backoffMs },
          'Retrying DM after backoff',
        );
        await this.sleep(backoffMs, signal);
      }

      try {
        await this.dispatcher.send(job.userId, job.messageText);
        return { ok: true, attempts: attempt + 1 };
      } catch (error) {
        lastError =
          error instanceof DispatchError
            ? error
            : new TransportError(
                error instanceof Error ? error.message : String(error),
                error,
              );
        this.logger.warn(
          { username: job.username, attempt: attempt + 1, err: lastError },
          'DM attempt failed',
        );

        if (skipTerminalRetries && lastError.terminal) {
          return { ok: false, attempts: attempt + 1, error: lastError };
        }
      }
    }

    return { ok: false, attempts: maxRetries + 1, error: lastError };
  }
}
