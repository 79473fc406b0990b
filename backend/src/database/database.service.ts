import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Pool, PoolClient, PoolConfig } from 'pg';
import type { AppConfig, DatabaseConfig } from '../config/index.js';
import { StoreUnavailableError } from '../common/errors.js';

const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'ETIMEDOUT',
  'EHOSTUNREACH',
  // query_canceled (statement_timeout), admin/crash shutdown, cannot_connect_now
  '57014',
  '57P01',
  '57P02',
  '57P03',
  // too_many_connections
  '53300',
]);

const CONNECTION_ERROR_MESSAGES = [
  'Connection terminated',
  'timeout exceeded when trying to connect',
  'Query read timeout',
  'Client has encountered a connection error',
];

export function isConnectionError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  const code = 'code' in error ? error.code : undefined;
  if (typeof code === 'string') {
    // class 08 - connection exception
    if (CONNECTION_ERROR_CODES.has(code) || code.startsWith('08')) {
      return true;
    }
  }
  return CONNECTION_ERROR_MESSAGES.some((fragment) =>
    error.message.includes(fragment),
  );
}

/**
 * Converts driver-level connectivity failures into `StoreUnavailableError`;
 * everything else (constraint violations, SQL errors) passes through.
 */
export function toStoreError(error: unknown): unknown {
  if (error instanceof StoreUnavailableError) {
    return error;
  }
  if (isConnectionError(error)) {
    return new StoreUnavailableError(
      `database unavailable: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }
  return error;
}

@Injectable()
export class DatabaseService implements OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private pool: Pool | null = null;
  private readonly configService: ConfigService<AppConfig>;

  constructor(configService: ConfigService<AppConfig>) {
    this.configService = configService;
    // the pool is created on first use so the memory store never connects
  }

  private ensurePool(): Pool {
    if (this.pool) {
      return this.pool;
    }

    const database = this.configService.get<DatabaseConfig>('database');
    if (!database?.url) {
      throw new StoreUnavailableError('DATABASE_URL is not configured');
    }

    const config: PoolConfig = {
      connectionString: database.url,
      connectionTimeoutMillis: 10000,
      idleTimeoutMillis: 30000,
      statement_timeout: database.statementTimeoutMs,
      query_timeout: database.statementTimeoutMs + 1000,
      max: 20,
    };

    if (database.ssl) {
      config.ssl = {
        rejectUnauthorized: false,
      };
    }

    this.pool = new Pool(config);

    this.pool.on('error', (err) => {
      this.logger.error('Unexpected database pool error', err.stack);
    });

    return this.pool;
  }

  getPool(): Pool {
    return this.ensurePool();
  }

  async getClient(): Promise<PoolClient> {
    const pool = this.ensurePool();
    try {
      return await pool.connect();
    } catch (error) {
      this.logger.warn(
        `Database connect failed, recreating pool: ${
          error instanceof Error ? error.message : String(error)
        }`,
      );
      await this.resetPool();
    }

    try {
      return await this.ensurePool().connect();
    } catch (error) {
      throw toStoreError(error);
    }
  }

  async ping(): Promise<void> {
    try {
      await this.getPool().query('SELECT 1');
    } catch (error) {
      throw toStoreError(error);
    }
  }

  async onModuleDestroy() {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
    }
  }

  private async resetPool(): Promise<void> {
    const stale = this.pool;
    this.pool = null;
    if (!stale) {
      return;
    }
    try {
      await stale.end();
    } catch (error) {
      this.logger.warn(
        `Failed to close stale pool: ${
          error instanceof Error ? error.message : String(error)
        }`,
      );
    }
  }
}
