import { ParseError } from './webhook.errors';
import {
  COMMENTS_FIELD,
  type CommentEvent,
  CommentValueSchema,
  WebhookPayloadSchema,
} from './webhook.schemas';

export interface ParsedWebhook {
  /** One event per well-formed `comments` change, in payload order */
  events: CommentEvent[];
  /** `comments` changes dropped because their value was malformed */
  skipped: number;
}

/**
 * Parses an inbound webhook body into normalized comment events.
 *
 * Accepts either the raw request text or an already-decoded object so both
 * body shapes go through the same validation. Changes for fields other than
 * `comments` are ignored.
 *
 * @throws ParseError when the body is not JSON or has no `entry` array
 */
export function parseCommentEvents(
  body: unknown,
  receivedAt: Date = new Date(),
): ParsedWebhook {
  const decoded = typeof body === 'string' ? decodeJson(body) : body;

  const payload = WebhookPayloadSchema.safeParse(decoded);
  if (!payload.success) {
    throw new ParseError(
      `Unexpected webhook payload shape: ${payload.error.issues[0]?.message ?? 'invalid'}`,
      payload.error,
    );
  }

  const events: CommentEvent[] = [];
  let skipped = 0;

  for (const entry of payload.data.entry) {
    for (const change of entry.changes) {
      if (change.field !== COMMENTS_FIELD) continue;

      const comment = CommentValueSchema.safeParse(change.value);
      if (!comment.success) {
        skipped++;
        continue;
      }

      events.push({
        commentId: comment.data.id,
        postId: comment.data.media_id,
        authorId: comment.data.from.id,
        authorUsername: comment.data.from.username,
        text: comment.data.text,
        receivedAt,
      });
    }
  }

  return { events, skipped };
}

function decodeJson(raw: string): unknown {
  if (raw.trim().length === 0) {
    throw new ParseError('Empty webhook body');
  }
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new ParseError('Webhook body is not valid JSON', error);
  }
}
