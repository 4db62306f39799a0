import { HttpModule } from '@nestjs/axios';
import { Module } from '@nestjs/common';
import { DatabaseModule } from '../database/database.module';
import { DedupGate } from './dedup-gate.service';
import { DeliveryProcessor } from './delivery.processor';
import { DmDispatcher } from './dm-dispatcher.service';
import { DmQueue } from './dm-queue';
import { RetryService } from './retry.service';

/**
 * Everything between a matched comment and its delivery log record.
 *
 * Provides:
 * - Bounded in-process DM queue (single consumer)
 * - Dedup gate in front of the queue
 * - Graph API dispatcher with exponential-backoff retries
 * - Delayed worker started on application bootstrap
 */
@Module({
  imports: [HttpModule, DatabaseModule],
  providers: [
    DmQueue,
    DedupGate,
    DmDispatcher,
    RetryService,
    DeliveryProcessor,
  ],
  exports: [DmQueue, DedupGate],
})
export class DeliveryModule {}
