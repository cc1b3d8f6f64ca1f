/**
 * Decrypto Database Service
 * PostgreSQL connection pooling and query utilities
 */

import { Injectable, Logger, OnModuleInit, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Pool, QueryResult, QueryResultRow } from 'pg';
import retry from 'async-retry';

@Injectable()
export class DatabaseService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private pool: Pool | null = null;
  private readonly retries: number;

  constructor(private configService: ConfigService) {
    this.retries = this.configService.get<number>('databaseRetries') ?? 2;
  }

  async onModuleInit() {
    const databaseUrl = this.configService.getOrThrow<string>('databaseUrl');

    this.pool = new Pool({
      connectionString: databaseUrl,
      max: 20,
      connectionTimeoutMillis: 5000,
      idleTimeoutMillis: 30000,
    });

    this.logger.log('Database pool initialized');
  }

  async onModuleDestroy() {
    await this.pool?.end();
    this.pool = null;
  }

  /**
   * Execute query with retry logic
   */
  async query<T extends QueryResultRow = QueryResultRow>(
    sql: string,
    params: unknown[] = [],
  ): Promise<QueryResult<T>> {
    const pool = this.getPool();

    return retry(
      async (bail) => {
        try {
          return await pool.query<T>(sql, params);
        } catch (error) {
          // Constraint violations and other SQL errors will not succeed on retry
          if (isSqlStateError(error)) {
            bail(error);
          }
          throw error;
        }
      },
      {
        retries: this.retries,
        minTimeout: 100,
        maxTimeout: 1000,
        onRetry: (error, attempt) => {
          this.logger.warn(
            `Query retry attempt ${attempt}/${this.retries}: ${error instanceof Error ? error.message : String(error)}`,
          );
        },
      },
    );
  }

  /**
   * Execute query and return single row with retry logic
   */
  async queryOne<T extends QueryResultRow = QueryResultRow>(
    sql: string,
    params: unknown[] = [],
  ): Promise<T | null> {
    const result = await this.query<T>(sql, params);
    return result.rows[0] ?? null;
  }

  private getPool(): Pool {
    if (!this.pool) {
      throw new Error('Database pool is not initialized');
    }
    return this.pool;
  }
}

/**
 * pg errors raised by the server carry a five-character SQLSTATE code
 */
export function isSqlStateError(error: unknown): error is Error & { code: string } {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    /^[0-9A-Z]{5}$/.test(error.code)
  );
}
