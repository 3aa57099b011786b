/**
 * Storage Port
 *
 * Every store the engine talks to is reached through one `execute` call that
 * never throws: failures come back as `{ success: false }` with the driver's
 * message and, where the driver has one, its error code.
 *
 * @module db/executor
 */

import { DatabaseError, StorageUnavailableError } from '../utils/errors.js';

// =============================================================================
// Types
// =============================================================================

/** Values a parameterized statement may bind */
export type SqlValue = string | number | boolean | null | Date;

/** Generic result row */
export type Row = Record<string, unknown>;

/**
 * Parameterized statement. Placeholders follow the target dialect:
 * `$1, $2, ...` for PostgreSQL, `?` for SQLite.
 */
export interface SqlQuery {
  text: string;
  values?: readonly SqlValue[];
}

export type ExecuteResult<R extends Row = Row> =
  | { success: true; rows: R[]; rowCount: number }
  | { success: false; error: string; code?: string };

export interface SqlExecutor {
  execute<R extends Row = Row>(query: SqlQuery): Promise<ExecuteResult<R>>;
}

/**
 * Driver error codes meaning the store cannot be reached at all
 */
export const UNAVAILABLE_CODES: ReadonlySet<string> = new Set([
  'ECONNREFUSED',
  'ENOTFOUND',
  'EHOSTUNREACH',
  'SQLITE_CANTOPEN',
  '57P01', // admin_shutdown
  '57P03', // cannot_connect_now
  '08001', // sqlclient_unable_to_establish_sqlconnection
  '08006', // connection_failure
]);

// =============================================================================
// Helpers
// =============================================================================

/**
 * Execute and return rows, converting a failed result into a thrown error
 */
export async function queryRows<R extends Row = Row>(
  executor: SqlExecutor,
  query: SqlQuery
): Promise<R[]> {
  const result = await executor.execute<R>(query);
  if (!result.success) {
    if (result.code !== undefined && UNAVAILABLE_CODES.has(result.code)) {
      throw new StorageUnavailableError(result.error);
    }
    throw new DatabaseError(result.error, result.code);
  }
  return result.rows;
}

/**
 * Execute and return the first row, or null
 */
export async function queryFirst<R extends Row = Row>(
  executor: SqlExecutor,
  query: SqlQuery
): Promise<R | null> {
  const rows = await queryRows<R>(executor, query);
  return rows[0] ?? null;
}

/**
 * Build `$start, $start+1, ...` placeholders for an IN list
 */
export function placeholders(count: number, start: number = 1): string {
  return Array.from({ length: count }, (_, i) => `$${start + i}`).join(', ');
}
