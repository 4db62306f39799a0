import {
  Body,
  Controller,
  Get,
  HttpCode,
  Inject,
  Post,
  Query,
  Res,
} from '@nestjs/common';
import type { Response } from 'express';
import { PinoLogger } from 'nestjs-pino';
import {
  PIPELINE_CONFIG,
  type PipelineConfig,
} from '../config/pipeline.config';
import { type ParsedWebhook, parseCommentEvents } from './comment.parser';
import { CommentIntakeService } from './comment-intake.service';
import { ParseError, VerificationMismatchError } from './webhook.errors';

const SUBSCRIBE_MODE = 'subscribe';

/** Acknowledgement body expected by the webhook sender. */
export const EVENT_RECEIVED = 'EVENT_RECEIVED';

/**
 * Instagram webhook endpoint.
 *
 * GET answers the subscription handshake; POST receives comment
 * notifications. POST always acknowledges with 200 so the platform does not
 * disable the subscription over payloads we cannot use.
 */
@Controller('webhook')
export class WebhookController {
  constructor(
    private readonly logger: PinoLogger,
    private readonly intake: CommentIntakeService,
    @Inject(PIPELINE_CONFIG) private readonly config: PipelineConfig,
  ) {
    this.logger.setContext(WebhookController.name);
  }

  /**
   * Echoes `hub.challenge` when the mode is `subscribe` and the token
   * matches the configured verify token. Anything else gets an empty 403.
   */
  @Get()
  verify(
    @Query('hub.mode') mode: string | undefined,
    @Query('hub.verify_token') token: string | undefined,
    @Query('hub.challenge') challenge: string | undefined,
    @Res() res: Response,
  ): void {
    if (mode === SUBSCRIBE_MODE && token === this.config.verifyToken) {
      this.logger.info('Webhook verified');
      res
        .status(200)
        .type('text/plain')
        .send(challenge ?? '');
      return;
    }

    const error = new VerificationMismatchError(mode);
    this.logger.warn({ err: error }, error.message);
    res.status(403).end();
  }

  @Post()
  @HttpCode(200)
  async receive(@Body() body: unknown): Promise<string> {
    let parsed: ParsedWebhook;
    try {
      parsed = parseCommentEvents(body);
    } catch (error) {
      if (error instanceof ParseError) {
        this.logger.warn({ err: error }, 'Failed to parse webhook payload');
      } else {
        this.logger.error({ err: error }, 'Unexpected webhook parse failure');
      }
      return EVENT_RECEIVED;
    }

    if (parsed.skipped > 0) {
      this.logger.warn(
        { skipped: parsed.skipped },
        'Skipped malformed comment changes',
      );
    }

    await this.intake.handleAll(parsed.events);
    return EVENT_RECEIVED;
  }
}
