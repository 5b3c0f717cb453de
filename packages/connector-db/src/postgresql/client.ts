/**
 * PostgreSQL Client
 *
 * Thin wrapper around a pg Pool: connection check, parameterized
 * queries and transactions. Every failure surfaces as CollaboratorError.
 */

import pg from 'pg';
import type { Pool as PgPool } from 'pg';
import { CollaboratorError, wrapError } from '@snowmatch/core';
import type { ErrorCode } from '@snowmatch/core';

const { Pool } = pg;

export interface PostgresClientConfig {
  /** Name used in errors and logs */
  id?: string;
  /** Connection string or individual params */
  connectionString?: string;
  host?: string;
  port?: number;
  database?: string;
  user?: string;
  password?: string;
  /** SSL mode */
  ssl?: boolean | { rejectUnauthorized?: boolean };
  /** Connection pool size */
  max?: number;
}

export interface PostgresQueryResult {
  /** Raw rows; callers validate them before use */
  rows: unknown[];
  rowCount: number;
}

/** Anything that runs a parameterized statement: the pool or a transaction */
export interface Queryable {
  query(sql: string, params?: unknown[], failureCode?: ErrorCode): Promise<PostgresQueryResult>;
}

const CONNECTION_ERROR_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'EAI_AGAIN', '57P01', '08006']);

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isConnectionError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null || !('code' in error)) return false;
  return typeof error.code === 'string' && CONNECTION_ERROR_CODES.has(error.code);
}

export class PostgresClient implements Queryable {
  readonly id: string;
  private readonly pool: PgPool;
  private connected = false;

  constructor(config: PostgresClientConfig) {
    this.id = config.id ?? 'postgres';
    this.pool = new Pool({
      connectionString: config.connectionString,
      host: config.host,
      port: config.port ?? 5432,
      database: config.database,
      user: config.user,
      password: config.password,
      ssl: config.ssl,
      max: config.max ?? 10,
    });
  }

  get isConnected(): boolean {
    return this.connected;
  }

  /**
   * Test connection
   */
  async connect(): Promise<void> {
    try {
      const client = await this.pool.connect();
      client.release();
      this.connected = true;
    } catch (error) {
      throw wrapError(error, {
        code: 'CONNECTION_FAILED',
        prefix: 'PostgreSQL connection failed',
        collaborator: this.id,
        suggestion: 'Check host, port, database, user, and password.',
      });
    }
  }

  /**
   * Close all connections
   */
  async disconnect(): Promise<void> {
    await this.pool.end();
    this.connected = false;
  }

  async query(sql: string, params: unknown[] = [], failureCode: ErrorCode = 'READ_FAILED'): Promise<PostgresQueryResult> {
    this.ensureConnected();
    try {
      const result = await this.pool.query(sql, params);
      return { rows: result.rows, rowCount: result.rowCount ?? 0 };
    } catch (error) {
      throw this.queryError(error, failureCode);
    }
  }

  /**
   * Run `work` inside BEGIN/COMMIT on one pooled connection.
   * Any failure rolls back and rethrows.
   */
  async transaction<T>(work: (tx: Queryable) => Promise<T>): Promise<T> {
    this.ensureConnected();

    const client = await this.pool.connect().catch((error: unknown) => {
      throw this.queryError(error, 'CONNECTION_FAILED');
    });

    const tx: Queryable = {
      query: async (sql, params = [], failureCode = 'WRITE_FAILED') => {
        try {
          const result = await client.query(sql, params);
          return { rows: result.rows, rowCount: result.rowCount ?? 0 };
        } catch (error) {
          throw this.queryError(error, failureCode);
        }
      },
    };

    try {
      await client.query('BEGIN');
      const result = await work(tx);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        throw new CollaboratorError({
          code: 'WRITE_FAILED',
          message: `Rollback failed after: ${errorMessage(error)} (${errorMessage(rollbackError)})`,
          collaborator: this.id,
          cause: rollbackError instanceof Error ? rollbackError : undefined,
        });
      }
      throw error instanceof CollaboratorError ? error : this.queryError(error, 'WRITE_FAILED');
    } finally {
      client.release();
    }
  }

  private ensureConnected(): void {
    if (!this.connected) {
      throw new CollaboratorError({
        code: 'CONNECTION_FAILED',
        message: `PostgreSQL client '${this.id}' is not connected`,
        collaborator: this.id,
        suggestion: 'Call connect() first.',
      });
    }
  }

  private queryError(error: unknown, failureCode: ErrorCode): CollaboratorError {
    return wrapError(error, {
      code: isConnectionError(error) ? 'CONNECTION_FAILED' : failureCode,
      prefix: 'Query failed',
      collaborator: this.id,
    });
  }
}

export function createPostgresClient(config: PostgresClientConfig): PostgresClient {
  return new PostgresClient(config);
}
