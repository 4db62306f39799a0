import { configuration } from './configuration';

describe('configuration', () => {
  const saved = { ...process.env };

  afterEach(() => {
    process.env = { ...saved };
  });

  test('raises the webhook body limit above the parser default', () => {
    delete process.env.WEBHOOK_BODY_LIMIT;

    expect(configuration().webhook.bodyLimit).toBe('1mb');
  });

  test('reads the webhook body limit from the environment', () => {
    process.env.WEBHOOK_BODY_LIMIT = '5mb';

    expect(configuration().webhook.bodyLimit).toBe('5mb');
  });

  test('defaults the port and pipeline settings', () => {
    delete process.env.PORT;
    delete process.env.DM_DELAY;
    delete process.env.MAX_RETRIES;

    const config = configuration();

    expect(config.port).toBe(8080);
    expect(config.pipeline).toMatchObject({
      preSendDelay: '1m',
      maxRetries: '3',
    });
  });
});
