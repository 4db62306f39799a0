import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import {
  Injectable,
  OnApplicationShutdown,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PinoLogger } from 'nestjs-pino';
import { Pool, type QueryResult, type QueryResultRow } from 'pg';

/** Schema applied on startup; every statement is idempotent. */
export const SCHEMA_PATH = join(__dirname, '..', '..', 'sql', 'schema.sql');

/** Max characters of SQL to include in log messages. */
const LOG_PREVIEW_LENGTH = 100;
/** Close idle pooled connections after this long. */
const IDLE_TIMEOUT_MS = 30_000;
/** Fail a checkout that cannot connect within this long. */
const CONNECTION_TIMEOUT_MS = 10_000;

/**
 * Owns the PostgreSQL connection pool.
 *
 * Applies `sql/schema.sql` on module init and closes the pool on
 * application shutdown.
 */
@Injectable()
export class DatabaseService implements OnModuleInit, OnApplicationShutdown {
  private readonly pool: Pool;

  constructor(
    private readonly logger: PinoLogger,
    configService: ConfigService,
  ) {
    this.logger.setContext(DatabaseService.name);

    const connectionString = configService.get<string>('database.url');
    if (!connectionString) {
      throw new Error('DATABASE_URL is required');
    }

    this.pool = new Pool({
      connectionString,
      max: configService.get<number>('database.poolMax') ?? 10,
      idleTimeoutMillis: IDLE_TIMEOUT_MS,
      connectionTimeoutMillis: CONNECTION_TIMEOUT_MS,
      ssl: configService.get<boolean>('database.ssl')
        ? { rejectUnauthorized: true }
        : undefined,
    });

    this.pool.on('error', error => {
      this.logger.error({ err: error }, 'Unexpected error on idle client');
    });
  }

  async onModuleInit(): Promise<void> {
    await this.ping();
    const schema = await readFile(SCHEMA_PATH, 'utf8');
    await this.pool.query(schema);
    this.logger.info({}, 'Database connected, schema ensured');
  }

  /**
   * Closes the pool in the last shutdown phase, after the delivery worker
   * has written its final outcome in `beforeApplicationShutdown`.
   */
  async onApplicationShutdown(): Promise<void> {
    await this.pool.end();
  }

  async query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    params: unknown[] = [],
  ): Promise<QueryResult<R>> {
    const start = Date.now();
    try {
      const result = await this.pool.query<R>(text, params);
      this.logger.debug(
        {
          query: text.substring(0, LOG_PREVIEW_LENGTH),
          rowCount: result.rowCount,
          durationMs: Date.now() - start,
        },
        'Query executed',
      );
      return result;
    } catch (error) {
      this.logger.error(
        { err: error, query: text.substring(0, LOG_PREVIEW_LENGTH) },
        'Query failed',
      );
      throw error;
    }
  }

  /**
   * Round-trips a trivial query.
   * @throws when the database is unreachable
   */
  async ping(): Promise<void> {
    await this.pool.query('SELECT 1');
  }
}
