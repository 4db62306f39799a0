import { Inject, Injectable } from '@nestjs/common';
import {
  PIPELINE_CONFIG,
  type PipelineConfig,
} from '../config/pipeline.config';
import type { CommentEvent } from './webhook.schemas';

/**
 * Returns the first keyword (in configured order) contained in `text`,
 * compared case-insensitively. Keywords are expected lower-cased.
 */
export function findKeyword(
  text: string,
  keywords: readonly string[],
): string | undefined {
  const lowered = text.toLowerCase();
  return keywords.find(keyword => lowered.includes(keyword));
}

@Injectable()
export class KeywordMatcher {
  constructor(
    @Inject(PIPELINE_CONFIG) private readonly config: PipelineConfig,
  ) {}

  matches(event: CommentEvent): boolean {
    return findKeyword(event.text, this.config.keywords) !== undefined;
  }
}
