import { HttpService } from '@nestjs/axios';
import { Inject, Injectable } from '@nestjs/common';
import { AxiosError } from 'axios';
import { PinoLogger } from 'nestjs-pino';
import { firstValueFrom } from 'rxjs';
import { z } from 'zod';
import {
  PIPELINE_CONFIG,
  type PipelineConfig,
} from '../config/pipeline.config';
import {
  type DispatchError,
  GenericApiError,
  TransportError,
  WINDOW_EXPIRED_CODE,
  WINDOW_EXPIRED_SUBCODE,
  WindowExpiredError,
} from './delivery.errors';

const GraphErrorBodySchema = z.object({
  error: z.object({
    message: z.string().optional(),
    code: z.number().optional(),
    error_subcode: z.number().optional(),
  }),
});

/** Max characters of a response body kept in an error message. */
const ERROR_BODY_LIMIT = 500;

/**
 * Sends one direct message through the Instagram Graph API messages endpoint
 * and classifies the result.
 *
 * Resolves on 2xx. Rejects with a {@link WindowExpiredError} for the
 * platform's outside-the-messaging-window error, a {@link GenericApiError}
 * for any other non-2xx, and a {@link TransportError} when no response
 * arrived (timeout, refused connection, DNS).
 */
@Injectable()
export class DmDispatcher {
  constructor(
    private readonly logger: PinoLogger,
    private readonly httpService: HttpService,
    @Inject(PIPELINE_CONFIG) private readonly config: PipelineConfig,
  ) {
    this.logger.setContext(DmDispatcher.name);
  }

  get endpoint(): string {
    return `${this.config.graphApiUrl}/${this.config.businessId}/messages`;
  }

  async send(recipientId: string, text: string): Promise<void> {
    let status: number;
    let data: unknown;

    try {
      const response = await firstValueFrom(
        this.httpService.post(
          this.endpoint,
          { recipient: { id: recipientId }, message: { text } },
          {
            headers: {
              'Content-Type': 'application/json',
              Authorization: `Bearer ${this.config.accessToken}`,
            },
            timeout: this.config.dispatchTimeoutMs,
            validateStatus: () => true,
          },
        ),
      );
      status = response.status;
      data = response.data;
    } catch (error) {
      throw this.toTransportError(error);
    }

    if (status >= 200 && status < 300) {
      this.logger.debug({ recipientId, status }, 'Message accepted');
      return;
    }

    throw this.classify(status, data);
  }

  private classify(status: number, data: unknown): DispatchError {
    const graphError = GraphErrorBodySchema.safeParse(data);
    if (
      graphError.success &&
      graphError.data.error.code === WINDOW_EXPIRED_CODE &&
      graphError.data.error.error_subcode === WINDOW_EXPIRED_SUBCODE
    ) {
      return new WindowExpiredError(status, graphError.data.error.message);
    }

    const body = typeof data === 'string' ? data : JSON.stringify(data ?? '');
    return new GenericApiError(status, body.slice(0, ERROR_BODY_LIMIT));
  }

  private toTransportError(error: unknown): TransportError {
    if (error instanceof AxiosError) {
      const detail = error.code
        ? `${error.code} ${error.message}`
        : error.message;
      return new TransportError(detail, error);
    }
    return new TransportError(
      error instanceof Error ? error.message : String(error),
      error,
    );
  }
}
