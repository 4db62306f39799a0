import type { ConfigService } from '@nestjs/config';
import { createMockLogger } from '../test/mocks/pino-logger.mock';
import { DatabaseService } from './database.service';

const mockEnd = jest.fn<Promise<void>, []>();

jest.mock('pg', () => ({
  Pool: jest.fn().mockImplementation(() => ({
    on: jest.fn(),
    query: jest.fn(),
    end: mockEnd,
  })),
}));

function createConfig(values: Record<string, unknown>): ConfigService {
  return { get: (key: string) => values[key] } as unknown as ConfigService;
}

describe('DatabaseService', () => {
  beforeEach(() => {
    mockEnd.mockReset().mockResolvedValue(undefined);
  });

  test('requires a database url', () => {
    expect(
      () => new DatabaseService(createMockLogger(), createConfig({})),
    ).toThrow('DATABASE_URL is required');
  });

  test('keeps the pool open through module destroy', async () => {
    const service = new DatabaseService(
      createMockLogger(),
      createConfig({ 'database.url': 'postgres://localhost/test' }),
    );

    expect('onModuleDestroy' in service).toBe(false);

    await service.onApplicationShutdown();
    expect(mockEnd).toHaveBeenCalledTimes(1);
  });
});
