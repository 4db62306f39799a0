import { z } from 'zod';

// Numeric ids past 2^53 have already lost digits in JSON.parse.
const IdSchema = z
  .union([
    z.string().min(1),
    z.number().refine(Number.isSafeInteger, 'id exceeds safe integer range'),
  ])
  .transform(String);

/**
 * `value` of a `comments` change as sent by the Instagram webhook.
 */
export const CommentValueSchema = z.object({
  id: IdSchema,
  media_id: IdSchema,
  text: z.string(),
  from: z.object({
    id: IdSchema,
    username: z.string().optional().default(''),
  }),
  parent_id: IdSchema.optional(),
});

export const WebhookChangeSchema = z.object({
  field: z.string(),
  value: z.unknown(),
});

export const WebhookEntrySchema = z.object({
  id: z.union([z.string(), z.number()]).optional(),
  time: z.number().optional(),
  changes: z.array(WebhookChangeSchema).optional().default([]),
});

export const WebhookPayloadSchema = z.object({
  object: z.string().optional(),
  entry: z.array(WebhookEntrySchema),
});

export type CommentValue = z.infer<typeof CommentValueSchema>;
export type WebhookPayload = z.infer<typeof WebhookPayloadSchema>;

/**
 * A normalized comment that may trigger a direct message.
 * Built per `comments` change entry; never persisted.
 */
export interface CommentEvent {
  readonly commentId: string;
  readonly postId: string;
  readonly authorId: string;
  readonly authorUsername: string;
  readonly text: string;
  readonly receivedAt: Date;
}

/** Change field carrying comment notifications. */
export const COMMENTS_FIELD = 'comments';
