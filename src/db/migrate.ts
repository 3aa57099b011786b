/**
 * Migration runner for the canonical store
 *
 * Applies pending migrations in version order and records each one in
 * `schema_migrations`.
 */

import type { Logger } from 'pino';
import { queryRows } from './executor.js';
import type { SqlExecutor } from './executor.js';
import * as m001 from './migrations/001_customs_documents.js';
import * as m002 from './migrations/002_processes_and_financials.js';

export interface Migration {
  version: number;
  name: string;
  up(executor: SqlExecutor): Promise<void>;
}

export const MIGRATIONS: readonly Migration[] = [m001, m002];

export interface MigrationResult {
  applied: string[];
  skipped: string[];
}

export async function runMigrations(
  executor: SqlExecutor,
  logger: Logger,
  migrations: readonly Migration[] = MIGRATIONS
): Promise<MigrationResult> {
  await queryRows(executor, {
    text: `CREATE TABLE IF NOT EXISTS schema_migrations (
             version    INTEGER PRIMARY KEY,
             name       VARCHAR(100) NOT NULL,
             applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
           )`,
  });

  const rows = await queryRows<{ version: number }>(executor, {
    text: 'SELECT version FROM schema_migrations',
  });
  const appliedVersions = new Set(rows.map((row) => Number(row.version)));

  const result: MigrationResult = { applied: [], skipped: [] };

  for (const migration of [...migrations].sort((a, b) => a.version - b.version)) {
    if (appliedVersions.has(migration.version)) {
      result.skipped.push(migration.name);
      continue;
    }

    logger.info({ migration: migration.name }, 'Applying migration');
    await migration.up(executor);
    await queryRows(executor, {
      text: 'INSERT INTO schema_migrations (version, name) VALUES ($1, $2)',
      values: [migration.version, migration.name],
    });
    result.applied.push(migration.name);
  }

  return result;
}
