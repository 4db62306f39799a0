import { randomUUID } from 'node:crypto';
import { mkdirSync } from 'node:fs';
import { join } from 'node:path';
import { Global, Module, RequestMethod } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { LoggerModule, type Params } from 'nestjs-pino';
import type { TransportTargetOptions } from 'pino';
import type { LoggingSettings } from '../config/configuration';

const LOG_FILE_NAME = 'comment-autodm.log';
const LIVENESS_PATH = '/health/liveness';

/**
 * Console target (pretty in development, JSON on stdout otherwise) plus an
 * optional file under `settings.dir`.
 */
export function buildTransportTargets(
  settings: LoggingSettings,
): TransportTargetOptions[] {
  const consoleTarget: TransportTargetOptions = settings.pretty
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          singleLine: false,
          translateTime: 'SYS:standard',
        },
        level: settings.level,
      }
    : {
        target: 'pino/file',
        options: { destination: 1 },
        level: settings.level,
      };

  if (!settings.file) {
    return [consoleTarget];
  }

  mkdirSync(settings.dir, { recursive: true });
  return [
    consoleTarget,
    {
      target: 'pino/file',
      options: { destination: join(settings.dir, LOG_FILE_NAME) },
      level: settings.level,
    },
  ];
}

const VERIFY_TOKEN_PARAM = /([?&]hub\.verify_token=)[^&#]*/g;
const REDACTED = '[Redacted]';

/** Replaces the `hub.verify_token` query value in a request URL. */
export function maskVerifyToken(url: string): string {
  return url.replace(VERIFY_TOKEN_PARAM, `$1${REDACTED}`);
}

/**
 * Censor for the redact paths: request URLs keep everything but the verify
 * token, every other path is replaced outright.
 */
export function censorLogValue(value: unknown, path: string[]): unknown {
  if (path[path.length - 1] === 'url' && typeof value === 'string') {
    return maskVerifyToken(value);
  }
  return REDACTED;
}

export function buildLoggerParams(settings: LoggingSettings): Params {
  return {
    pinoHttp: {
      level: settings.level,
      transport: { targets: buildTransportTargets(settings) },
      customAttributeKeys: {
        req: 'request',
        res: 'response',
        err: 'error',
      },
      genReqId: req => {
        const header = req.headers['x-request-id'];
        return typeof header === 'string' ? header : randomUUID();
      },
      autoLogging: {
        ignore: req => req.url === LIVENESS_PATH,
      },
      // The verify token travels in the handshake query string and URL.
      redact: {
        paths: [
          'request.headers.authorization',
          'request.query["hub.verify_token"]',
          'request.url',
        ],
        censor: censorLogValue,
      },
    },
    exclude: [{ method: RequestMethod.GET, path: LIVENESS_PATH }],
  };
}

/**
 * Global logging module that makes PinoLogger available throughout the
 * application. Settings come from the `logging` config section
 * (LOG_LEVEL, LOG_PRETTY, LOG_FILE, LOG_DIR).
 */
@Global()
@Module({
  imports: [
    LoggerModule.forRootAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (configService: ConfigService) =>
        buildLoggerParams(
          configService.getOrThrow<LoggingSettings>('logging'),
        ),
    }),
  ],
  exports: [LoggerModule],
})
export class LoggingModule {}
