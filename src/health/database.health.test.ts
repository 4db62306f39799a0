import type { HealthIndicatorService } from '@nestjs/terminus';
import { InMemoryDeliveryLog } from '../test/mocks/delivery-log.mock';
import { DatabaseHealthIndicator } from './database.health';

describe('DatabaseHealthIndicator', () => {
  let log: InMemoryDeliveryLog;
  let up: jest.Mock;
  let down: jest.Mock;
  let indicator: DatabaseHealthIndicator;

  beforeEach(() => {
    log = new InMemoryDeliveryLog();
    up = jest.fn().mockReturnValue({ database: { status: 'up' } });
    down = jest.fn().mockReturnValue({ database: { status: 'down' } });
    const healthIndicatorService = {
      check: jest.fn().mockReturnValue({ up, down }),
    } as unknown as HealthIndicatorService;
    indicator = new DatabaseHealthIndicator(healthIndicatorService, log);
  });

  test('is up when the ping succeeds', async () => {
    expect(await indicator.isHealthy('database')).toEqual({
      database: { status: 'up' },
    });
    expect(down).not.toHaveBeenCalled();
  });

  test('is down with the ping error otherwise', async () => {
    log.failPing = new Error('connection refused');

    await indicator.isHealthy('database');

    expect(down).toHaveBeenCalledWith({
      message: 'Database ping failed: Error: connection refused',
    });
  });
});
