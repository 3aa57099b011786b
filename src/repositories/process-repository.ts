/**
 * Process Repository
 *
 * Canonical `import_process` rows. Upserts merge: a null incoming value
 * never replaces a stored one.
 *
 * @module repositories/process-repository
 */

import type { Logger } from 'pino';
import { placeholders, queryRows } from '../db/executor.js';
import type { SqlExecutor } from '../db/executor.js';

export interface ProcessRecord {
  processReference: string;
  importId: number | null;
  manifestNumber: string | null;
  declarationNumber: string | null;
  unifiedDeclarationNumber: string | null;
  shippedAt: string | null;
  expectedArrivalAt: string | null;
  clearedAt: string | null;
  processStatus: string | null;
}

export interface ProcessRepository {
  upsertProcess(record: ProcessRecord): Promise<void>;
  /** Process reference per import id, for the ids that have one */
  findProcessReferencesByImportIds(importIds: readonly number[]): Promise<Map<number, string>>;
}

export interface PgProcessRepositoryConfig {
  executor: SqlExecutor;
  logger: Logger;
}

export class PgProcessRepository implements ProcessRepository {
  private readonly executor: SqlExecutor;
  private readonly log: Logger;

  constructor(config: PgProcessRepositoryConfig) {
    this.executor = config.executor;
    this.log = config.logger.child({ component: 'process-repository' });
  }

  async upsertProcess(record: ProcessRecord): Promise<void> {
    await queryRows(this.executor, {
      text: `INSERT INTO import_process (
               process_reference, import_id, manifest_number, declaration_number,
               unified_declaration_number, shipped_at, expected_arrival_at, cleared_at, process_status
             ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
             ON CONFLICT (process_reference) DO UPDATE SET
               import_id                  = COALESCE(EXCLUDED.import_id, import_process.import_id),
               manifest_number            = COALESCE(EXCLUDED.manifest_number, import_process.manifest_number),
               declaration_number         = COALESCE(EXCLUDED.declaration_number, import_process.declaration_number),
               unified_declaration_number = COALESCE(EXCLUDED.unified_declaration_number, import_process.unified_declaration_number),
               shipped_at                 = COALESCE(EXCLUDED.shipped_at, import_process.shipped_at),
               expected_arrival_at        = COALESCE(EXCLUDED.expected_arrival_at, import_process.expected_arrival_at),
               cleared_at                 = COALESCE(EXCLUDED.cleared_at, import_process.cleared_at),
               process_status             = COALESCE(EXCLUDED.process_status, import_process.process_status),
               updated_at                 = NOW()`,
      values: [
        record.processReference,
        record.importId,
        record.manifestNumber,
        record.declarationNumber,
        record.unifiedDeclarationNumber,
        record.shippedAt,
        record.expectedArrivalAt,
        record.clearedAt,
        record.processStatus,
      ],
    });
    this.log.debug({ processReference: record.processReference }, 'Process upserted');
  }

  async findProcessReferencesByImportIds(importIds: readonly number[]): Promise<Map<number, string>> {
    const unique = [...new Set(importIds)];
    if (unique.length === 0) {
      return new Map();
    }
    const rows = await queryRows<{ import_id: string | number; process_reference: string }>(this.executor, {
      text: `SELECT import_id, process_reference
             FROM import_process
             WHERE import_id IN (${placeholders(unique.length)})`,
      values: unique,
    });
    return new Map(rows.map((row) => [Number(row.import_id), row.process_reference]));
  }
}
