/**
 * PostgreSQL executor backed by a `pg` connection pool.
 */

import pg from 'pg';
import type { Pool, PoolConfig } from 'pg';
import type { Logger } from 'pino';
import type { ExecuteResult, Row, SqlExecutor, SqlQuery } from './executor.js';

export interface PgPoolOptions {
  connectionString: string;
  max: number;
  statementTimeoutMs: number;
  applicationName?: string;
}

/**
 * Create a pool. The pool is created once by the caller and injected into
 * every executor that needs it.
 */
export function createPgPool(options: PgPoolOptions): Pool {
  const poolConfig: PoolConfig = {
    connectionString: options.connectionString,
    max: options.max,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 10000,
    application_name: options.applicationName ?? 'customs-sync',
  };
  if (options.statementTimeoutMs > 0) {
    poolConfig.statement_timeout = options.statementTimeoutMs;
    poolConfig.query_timeout = options.statementTimeoutMs;
  }
  return new pg.Pool(poolConfig);
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Wrap a pool (or any object with the pool's `query` shape) as a SqlExecutor
 */
export function createPgExecutor(
  pool: Pick<Pool, 'query'>,
  logger?: Logger
): SqlExecutor {
  return {
    async execute<R extends Row = Row>(query: SqlQuery): Promise<ExecuteResult<R>> {
      try {
        const result = await pool.query<R>(query.text, [...(query.values ?? [])]);
        return { success: true, rows: result.rows, rowCount: result.rowCount ?? result.rows.length };
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        const code = errorCode(error);
        logger?.debug({ code, error: message }, 'PostgreSQL statement failed');
        return code === undefined ? { success: false, error: message } : { success: false, error: message, code };
      }
    },
  };
}
