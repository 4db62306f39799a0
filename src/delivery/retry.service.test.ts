import type { PipelineConfigInput } from '../config/pipeline.config';
import { createDispatchJob, createTestConfig } from '../test/fixtures';
import { createMockLogger } from '../test/mocks/pino-logger.mock';
import { createRecordingSleep } from '../test/mocks/sleep.mock';
import {
  GenericApiError,
  TransportError,
  WindowExpiredError,
} from './delivery.errors';
import type { DmDispatcher } from './dm-dispatcher.service';
import { backoffDelay, RetryService } from './retry.service';

describe('backoffDelay', () => {
  test('doubles from the base for each retry', () => {
    expect(backoffDelay(2000, 1)).toBe(2000);
    expect(backoffDelay(2000, 2)).toBe(4000);
    expect(backoffDelay(2000, 3)).toBe(8000);
  });
});

describe('RetryService', () => {
  let send: jest.Mock;
  let recording: ReturnType<typeof createRecordingSleep>;

  const createService = (overrides: Partial<PipelineConfigInput> = {}) =>
    new RetryService(
      createMockLogger(),
      { send } as unknown as DmDispatcher,
      createTestConfig(overrides),
      recording.sleep,
    );

  beforeEach(() => {
    send = jest.fn();
    recording = createRecordingSleep();
  });

  test('returns after a first-attempt success without sleeping', async () => {
    send.mockResolvedValue(undefined);

    const result = await createService().deliver(createDispatchJob());

    expect(result).toEqual({ ok: true, attempts: 1 });
    expect(send).toHaveBeenCalledWith('123', 'Thanks for commenting!');
    expect(recording.delays).toEqual([]);
  });

  test('backs off exponentially until a retry succeeds', async () => {
    send
      .mockRejectedValueOnce(new TransportError('ECONNRESET'))
      .mockRejectedValueOnce(new GenericApiError(500, 'oops'))
      .mockResolvedValue(undefined);

    const result = await createService().deliver(createDispatchJob());

    expect(result).toEqual({ ok: true, attempts: 3 });
    expect(recording.delays).toEqual([2000, 4000]);
  });

  test('gives up after maxRetries + 1 attempts with the last error', async () => {
    const last = new GenericApiError(502, 'bad gateway');
    send
      .mockRejectedValueOnce(new TransportError('timeout'))
      .mockRejectedValueOnce(new TransportError('timeout'))
      .mockRejectedValueOnce(new TransportError('timeout'))
      .mockRejectedValueOnce(last);

    const result = await createService().deliver(createDispatchJob());

    expect(result).toEqual({ ok: false, attempts: 4, error: last });
    expect(send).toHaveBeenCalledTimes(4);
    expect(recording.delays).toEqual([2000, 4000, 8000]);
  });

  test('retries a terminal error like any other by default', async () => {
    send.mockRejectedValue(new WindowExpiredError(400));

    const result = await createService().deliver(createDispatchJob());

    expect(result.ok).toBe(false);
    expect(result.attempts).toBe(4);
  });

  test('stops at a terminal error when skipTerminalRetries is set', async () => {
    const error = new WindowExpiredError(400);
    send.mockRejectedValue(error);

    const result = await createService({ skipTerminalRetries: true }).deliver(
      createDispatchJob(),
    );

    expect(result).toEqual({ ok: false, attempts: 1, error });
    expect(recording.delays).toEqual([]);
  });

  test('makes a single attempt when maxRetries is 0', async () => {
    send.mockRejectedValue(new TransportError('down'));

    const result = await createService({ maxRetries: 0 }).deliver(
      createDispatchJob(),
    );

    expect(result.attempts).toBe(1);
    expect(send).toHaveBeenCalledTimes(1);
  });

  test('wraps unexpected errors as transport errors', async () => {
    send.mockRejectedValue(new Error('weird'));

    const result = await createService({ maxRetries: 0 }).deliver(
      createDispatchJob(),
    );

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(TransportError);
      expect(result.error.message).toBe('Transport error: weird');
    }
  });

  test('an aborted signal interrupts the backoff sleep', async () => {
    send.mockRejectedValue(new TransportError('down'));
    const controller = new AbortController();
    controller.abort();

    await expect(
      createService().deliver(createDispatchJob(), controller.signal),
    ).rejects.toMatchObject({ name: 'AbortError' });
    expect(send).toHaveBeenCalledTimes(1);
  });
});
