const DEFAULT_PORT = 8080;
/** Webhook batches can carry many changes; body-parser's default is 100kb. */
export const DEFAULT_WEBHOOK_BODY_LIMIT = '1mb';

export interface LoggingSettings {
  level: string;
  /** pino-pretty console output instead of JSON */
  pretty: boolean;
  /** Also write to `<dir>/comment-autodm.log` */
  file: boolean;
  dir: string;
}

function loggingSettings(): LoggingSettings {
  const isProd = process.env.NODE_ENV === 'production';
  return {
    level: process.env.LOG_LEVEL || (isProd ? 'info' : 'debug'),
    pretty: process.env.LOG_PRETTY === 'true' || !isProd,
    file: process.env.LOG_FILE === 'true',
    dir: process.env.LOG_DIR || './logs',
  };
}

export const configuration = () => ({
  logging: loggingSettings(),
  port: Number.parseInt(process.env.PORT || String(DEFAULT_PORT), 10),
  webhook: {
    bodyLimit: process.env.WEBHOOK_BODY_LIMIT || DEFAULT_WEBHOOK_BODY_LIMIT,
  },
  database: {
    url: process.env.DATABASE_URL,
    ssl: process.env.DATABASE_SSL === 'true',
    poolMax: Number.parseInt(process.env.DATABASE_POOL_MAX || '10', 10),
  },
  instagram: {
    verifyToken: process.env.VERIFY_TOKEN,
    accessToken: process.env.ACCESS_TOKEN,
    businessId: process.env.IG_BUSINESS_ID,
    graphApiUrl:
      process.env.GRAPH_API_URL || 'https://graph.facebook.com/v21.0',
  },
  pipeline: {
    keywords: (process.env.KEYWORDS || '').split(','),
    messageTemplate: process.env.DM_MESSAGE,
    preSendDelay: process.env.DM_DELAY || '1m',
    maxRetries: process.env.MAX_RETRIES || '3',
    backoffBase: process.env.RETRY_BACKOFF_BASE || '2s',
    queueCapacity: process.env.DM_QUEUE_CAPACITY || '100',
    dispatchTimeout: process.env.DM_SEND_TIMEOUT || '10s',
    skipTerminalRetries: process.env.DM_SKIP_TERMINAL_RETRIES === 'true',
  },
});

export type AppConfiguration = ReturnType<typeof configuration>;
