/**
 * SQLite executor for the local cache store (better-sqlite3).
 *
 * The cache is only ever read by this engine; statements run synchronously
 * and are exposed through the same async port as PostgreSQL.
 */

import Database from 'better-sqlite3';
import type { Logger } from 'pino';
import type { ExecuteResult, Row, SqlExecutor, SqlQuery, SqlValue } from './executor.js';

type SqliteParam = string | number | bigint | Buffer | null;

function toSqliteParam(value: SqlValue): SqliteParam {
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }
  return value;
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Open the cache database read-only. A missing file fails here, at startup.
 */
export function openCacheDatabase(path: string): Database.Database {
  return new Database(path, { readonly: true, fileMustExist: true });
}

export function createSqliteExecutor(db: Database.Database, logger?: Logger): SqlExecutor {
  return {
    async execute<R extends Row = Row>(query: SqlQuery): Promise<ExecuteResult<R>> {
      try {
        const stmt = db.prepare<SqliteParam[], R>(query.text);
        const params = (query.values ?? []).map(toSqliteParam);
        if (stmt.reader) {
          const rows = stmt.all(...params);
          return { success: true, rows, rowCount: rows.length };
        }
        const info = stmt.run(...params);
        return { success: true, rows: [], rowCount: info.changes };
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        const code = errorCode(error);
        logger?.debug({ code, error: message }, 'SQLite statement failed');
        return code === undefined ? { success: false, error: message } : { success: false, error: message, code };
      }
    },
  };
}
