import { Injectable } from '@nestjs/common';
import { PinoLogger } from 'nestjs-pino';
import { QueueClosedError } from '../delivery/bounded-queue';
import { DedupGate } from '../delivery/dedup-gate.service';
import type { AdmissionResult } from '../delivery/delivery.types';
import { KeywordMatcher } from './keyword.matcher';
import { MessageTemplateService } from './message-template.service';
import type { CommentEvent } from './webhook.schemas';

/** Max characters of comment text to include in log messages. */
const LOG_PREVIEW_LENGTH = 100;

export type IntakeResult = AdmissionResult | 'ignored' | 'error';

/**
 * Takes normalized comments from the webhook and feeds matching ones to the
 * dedup gate. Never throws: failures are logged so the webhook sender always
 * gets an acknowledgement.
 */
@Injectable()
export class CommentIntakeService {
  constructor(
    private readonly logger: PinoLogger,
    private readonly matcher: KeywordMatcher,
    private readonly templates: MessageTemplateService,
    private readonly gate: DedupGate,
  ) {
    this.logger.setContext(CommentIntakeService.name);
  }

  /**
   * Handle events one after another, in payload order.
   */
  async handleAll(events: CommentEvent[]): Promise<IntakeResult[]> {
    const results: IntakeResult[] = [];
    for (const event of events) {
      results.push(await this.handle(event));
    }
    return results;
  }

  async handle(event: CommentEvent): Promise<IntakeResult> {
    this.logger.info(
      {
        commentId: event.commentId,
        username: event.authorUsername,
        text: event.text.substring(0, LOG_PREVIEW_LENGTH),
      },
      'New comment',
    );

    if (!this.matcher.matches(event)) {
      this.logger.debug(
        { commentId: event.commentId },
        "Comment doesn't contain keywords, skipping",
      );
      return 'ignored';
    }

    try {
      const messageText = this.templates.render(event);
      return await this.gate.admit(event, messageText);
    } catch (error) {
      if (error instanceof QueueClosedError) {
        this.logger.warn(
          { commentId: event.commentId },
          'DM queue closed, comment dropped',
        );
      } else {
        this.logger.error(
          { err: error, commentId: event.commentId },
          'Failed to process comment',
        );
      }
      return 'error';
    }
  }
}
