/**
 * Cache Repository
 *
 * Read-only access to the local SQLite cache: last polled state per
 * document, cached raw payloads and the process board.
 *
 * @module repositories/cache-repository
 */

import type { Logger } from 'pino';
import { queryFirst, queryRows } from '../db/executor.js';
import type { SqlExecutor } from '../db/executor.js';
import type { DocumentKind } from '../documents/types.js';

// =============================================================================
// Row Types
// =============================================================================

/**
 * Cached document state, with each kind's columns aliased to one shape
 */
export type CachedDocumentRow = {
  status: string | null;
  status_at: string | null;
  channel: string | null;
  process_reference: string | null;
  raw_json: string | null;
};

export type ProcessBoardRow = {
  process_reference: string | null;
  import_id: number | null;
  stage: string | null;
  shipped_at: string | null;
  expected_arrival_at: string | null;
  cleared_at: string | null;
  manifest_number: string | null;
  declaration_number: string | null;
  unified_declaration_number: string | null;
};

// =============================================================================
// Port
// =============================================================================

export interface CacheRepository {
  findDocument(number: string, kind: DocumentKind): Promise<CachedDocumentRow | null>;
  listProcesses(limit: number): Promise<ProcessBoardRow[]>;
}

// =============================================================================
// SQLite Implementation
// =============================================================================

const DOCUMENT_QUERIES: Readonly<Record<DocumentKind, string>> = {
  CARGO_MANIFEST: `
    SELECT cargo_status AS status, cargo_status_at AS status_at, NULL AS channel,
           process_reference, raw_json
    FROM manifest_cache
    WHERE manifest_number = ?
    ORDER BY updated_at DESC
    LIMIT 1`,
  TERMINAL_CONTROL: `
    SELECT current_status AS status, current_status_at AS status_at, NULL AS channel,
           process_reference, raw_json
    FROM terminal_control_cache
    WHERE cct_number = ?
    ORDER BY updated_at DESC
    LIMIT 1`,
  IMPORT_DECLARATION: `
    SELECT situation AS status, situation_at AS status_at, channel,
           process_reference, raw_json
    FROM declaration_cache
    WHERE declaration_number = ?
    ORDER BY updated_at DESC
    LIMIT 1`,
  UNIFIED_IMPORT_DECLARATION: `
    SELECT situation AS status, situation_at AS status_at, channel,
           process_reference, raw_json
    FROM unified_declaration_cache
    WHERE number = ?
    ORDER BY updated_at DESC
    LIMIT 1`,
};

export interface SqliteCacheRepositoryConfig {
  executor: SqlExecutor;
  logger: Logger;
}

export class SqliteCacheRepository implements CacheRepository {
  private readonly executor: SqlExecutor;
  private readonly log: Logger;

  constructor(config: SqliteCacheRepositoryConfig) {
    this.executor = config.executor;
    this.log = config.logger.child({ component: 'cache-repository' });
  }

  async findDocument(number: string, kind: DocumentKind): Promise<CachedDocumentRow | null> {
    return queryFirst<CachedDocumentRow>(this.executor, {
      text: DOCUMENT_QUERIES[kind],
      values: [number],
    });
  }

  async listProcesses(limit: number): Promise<ProcessBoardRow[]> {
    const rows = await queryRows<ProcessBoardRow>(this.executor, {
      text: `SELECT process_reference, import_id, stage, shipped_at, expected_arrival_at,
                    cleared_at, manifest_number, declaration_number, unified_declaration_number
             FROM process_board
             ORDER BY updated_at DESC
             LIMIT ?`,
      values: [limit],
    });
    this.log.debug({ count: rows.length, limit }, 'Read process board');
    return rows;
  }
}
