import 'reflect-metadata';
import {
  Injectable,
  Module,
  type OnApplicationShutdown,
} from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { PinoLogger } from 'nestjs-pino';
import { SLEEP } from '../common/sleep';
import { PIPELINE_CONFIG } from '../config/pipeline.config';
import { DeliveryLog } from '../database/delivery-log';
import type {
  DeliveryOutcome,
  DeliveryRecord,
} from '../database/delivery-log.schemas';
import { createDispatchJob, createTestConfig } from '../test/fixtures';
import { InMemoryDeliveryLog } from '../test/mocks/delivery-log.mock';
import { createMockLogger } from '../test/mocks/pino-logger.mock';
import { createRecordingSleep } from '../test/mocks/sleep.mock';
import { DedupGate } from './dedup-gate.service';
import { DeliveryProcessor } from './delivery.processor';
import { DmDispatcher } from './dm-dispatcher.service';
import { DmQueue } from './dm-queue';
import { RetryService } from './retry.service';

/**
 * Delivery log whose connection closes in `onApplicationShutdown`, like the
 * pg pool owned by DatabaseService.
 */
@Injectable()
class PooledDeliveryLog
  extends InMemoryDeliveryLog
  implements OnApplicationShutdown
{
  closed = false;

  async recordOutcome(outcome: DeliveryOutcome): Promise<DeliveryRecord> {
    if (this.closed) throw new Error('Cannot use a pool after calling end');
    return super.recordOutcome(outcome);
  }

  async onApplicationShutdown(): Promise<void> {
    this.closed = true;
  }
}

async function waitFor(condition: () => boolean): Promise<void> {
  while (!condition()) {
    await new Promise(resolve => setImmediate(resolve));
  }
}

const send = jest.fn<Promise<void>, [string, string]>();
const recording = createRecordingSleep();

@Module({
  providers: [
    { provide: PinoLogger, useValue: createMockLogger() },
    { provide: PIPELINE_CONFIG, useValue: createTestConfig() },
    { provide: SLEEP, useValue: recording.sleep },
    { provide: DmDispatcher, useValue: { send } },
    PooledDeliveryLog,
    { provide: DeliveryLog, useExisting: PooledDeliveryLog },
    DmQueue,
    DedupGate,
    RetryService,
    DeliveryProcessor,
  ],
})
class DeliveryTestModule {}

describe('DeliveryProcessor lifecycle', () => {
  test('records an in-flight send before the store closes', async () => {
    const app = await NestFactory.createApplicationContext(
      DeliveryTestModule,
      { logger: false },
    );
    await app.init();

    let finishSend: () => void = () => undefined;
    send.mockImplementation(
      () =>
        new Promise<void>(resolve => {
          finishSend = resolve;
        }),
    );

    const stop = jest.spyOn(app.get(DeliveryProcessor), 'stop');
    await app.get(DmQueue).put(createDispatchJob());
    await waitFor(() => send.mock.calls.length > 0);

    const closing = app.close();
    await waitFor(() => stop.mock.calls.length > 0);
    finishSend();
    await closing;

    const log = app.get(PooledDeliveryLog);
    expect(send).toHaveBeenCalledTimes(1);
    expect(log.closed).toBe(true);
    expect(log.writes).toBe(1);
    expect(await log.find('123', 'p1')).toMatchObject({
      status: 'sent',
      retryCount: 0,
    });
  });
});
