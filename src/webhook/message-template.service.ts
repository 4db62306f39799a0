import { Inject, Injectable } from '@nestjs/common';
import Handlebars from 'handlebars';
import {
  PIPELINE_CONFIG,
  type PipelineConfig,
} from '../config/pipeline.config';
import type { CommentEvent } from './webhook.schemas';

/**
 * Variables available to the DM_MESSAGE template.
 */
export interface MessageTemplateVariables {
  username: string;
  userId: string;
  postId: string;
  commentId: string;
  commentText: string;
}

/**
 * Resolves the configured message template for a comment.
 *
 * The template is compiled once with Handlebars. Output is plain text, so
 * HTML escaping is off.
 *
 * @example
 * ```typescript
 * // DM_MESSAGE="Hey @{{username}}, here is your link"
 * templates.render(event); // "Hey @bob, here is your link"
 * ```
 */
@Injectable()
export class MessageTemplateService {
  private readonly template: Handlebars.TemplateDelegate<MessageTemplateVariables>;

  constructor(@Inject(PIPELINE_CONFIG) config: PipelineConfig) {
    this.template = Handlebars.compile<MessageTemplateVariables>(
      config.messageTemplate,
      { noEscape: true },
    );
  }

  render(event: CommentEvent): string {
    return this.template({
      username: event.authorUsername,
      userId: event.authorId,
      postId: event.postId,
      commentId: event.commentId,
      commentText: event.text,
    });
  }
}
