import {
  buildPipelineConfig,
  type PipelineConfig,
  type PipelineConfigInput,
} from '../config/pipeline.config';
import type { DispatchJob } from '../delivery/delivery.types';
import type { CommentEvent } from '../webhook/webhook.schemas';

/**
 * Pipeline config for tests; any field can be overridden with raw input.
 */
export function createTestConfig(
  overrides: Partial<PipelineConfigInput> = {},
): PipelineConfig {
  return buildPipelineConfig({
    keywords: ['dm'],
    messageTemplate: 'Thanks for commenting!',
    preSendDelayMs: '1m',
    maxRetries: 3,
    backoffBaseMs: '2s',
    queueCapacity: 100,
    dispatchTimeoutMs: '10s',
    skipTerminalRetries: false,
    verifyToken: 'test-verify-token',
    accessToken: 'test-access-token',
    businessId: 'test-business',
    graphApiUrl: 'https://graph.example.test/v21.0',
    ...overrides,
  });
}

export function createCommentEvent(
  overrides: Partial<CommentEvent> = {},
): CommentEvent {
  return {
    commentId: 'c1',
    postId: 'p1',
    authorId: '123',
    authorUsername: 'bob',
    text: 'please dm',
    receivedAt: new Date('2026-01-01T00:00:00Z'),
    ...overrides,
  };
}

export function createDispatchJob(
  overrides: Partial<DispatchJob> = {},
): DispatchJob {
  return {
    userId: '123',
    postId: 'p1',
    commentId: 'c1',
    messageText: 'Thanks for commenting!',
    username: 'bob',
    enqueuedAt: new Date('2026-01-01T00:00:00Z'),
    ...overrides,
  };
}

/**
 * Instagram webhook body carrying the given comment changes.
 */
export function createCommentPayload(
  ...comments: Array<{
    id: string;
    media_id: string;
    text: string;
    from: { id: string; username?: string };
  }>
) {
  return {
    object: 'instagram',
    entry: [
      {
        id: 'ig-account',
        time: 1767225600,
        changes: comments.map(value => ({ field: 'comments', value })),
      },
    ],
  };
}
