import { Inject, Injectable } from '@nestjs/common';
import {
  PIPELINE_CONFIG,
  type PipelineConfig,
} from '../config/pipeline.config';
import { BoundedQueue } from './bounded-queue';
import type { DispatchJob } from './delivery.types';

/**
 * The process-wide DM job queue. Producers are webhook requests (through the
 * dedup gate); the only consumer is {@link DeliveryProcessor}.
 */
@Injectable()
export class DmQueue extends BoundedQueue<DispatchJob> {
  constructor(@Inject(PIPELINE_CONFIG) config: PipelineConfig) {
    super(config.queueCapacity);
  }
}
