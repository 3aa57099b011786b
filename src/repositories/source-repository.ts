/**
 * Authoritative Source Repository
 *
 * Narrow read-only projections of the externally owned authoritative store:
 * manifests, import declarations (with payments and declared values) and
 * unified import declarations.
 *
 * @module repositories/source-repository
 */

import type { Logger } from 'pino';
import { queryFirst, queryRows } from '../db/executor.js';
import type { SqlExecutor } from '../db/executor.js';

// =============================================================================
// Row Types
// =============================================================================

/** Date columns arrive as Date from timestamp columns or as text */
export type SourceDate = Date | string | null;

export type ManifestSourceRow = {
  number: string;
  cargo_status: string | null;
  cargo_status_at: SourceDate;
  issued_at: SourceDate;
  final_destination_at: SourceDate;
  vessel: string | null;
  origin_port: string | null;
  destination_port: string | null;
  origin_country: string | null;
};

export type DeclarationSourceRow = {
  declaration_id: string | number | null;
  number: string | null;
  situation: string | null;
  situation_at: SourceDate;
  cargo_delivery_status: string | null;
  rectification_seq: string | number | null;
  channel: string | null;
  registered_at: SourceDate;
  cleared_at: SourceDate;
  delivery_authorized_at: SourceDate;
  import_id: string | number | null;
};

export type UnifiedDeclarationSourceRow = {
  number: string | null;
  version: string | number | null;
  process_reference: string | null;
  import_process_id: string | number | null;
  registered_at: SourceDate;
  last_situation: string | null;
  last_event_at: SourceDate;
  consolidated_channel: string | null;
};

export type DeclarationPaymentRow = {
  revenue_code: string | number | null;
  revenue_description: string | null;
  rectification_number: string | number | null;
  total_amount: string | number | null;
  paid_at: SourceDate;
};

export type DeclarationValueRow = {
  vmld_usd: string | number | null;
  vmld_brl: string | number | null;
  vmle_usd: string | number | null;
  vmle_brl: string | number | null;
  freight_usd: string | number | null;
  freight_brl: string | number | null;
  insurance_usd: string | number | null;
  insurance_brl: string | number | null;
};

/**
 * Half-open time window [from, to)
 */
export interface TimeWindow {
  from: Date;
  to: Date;
}

// =============================================================================
// Port
// =============================================================================

export interface SourceRepository {
  listDeclarations(window: TimeWindow, limit: number | null): Promise<DeclarationSourceRow[]>;
  listUnifiedDeclarations(window: TimeWindow, limit: number | null): Promise<UnifiedDeclarationSourceRow[]>;
  findManifestNumberByImportId(importId: number): Promise<string | null>;
  findDeclarationNumberByImportId(importId: number): Promise<string | null>;
  findUnifiedDeclarationNumberByProcess(processReference: string): Promise<string | null>;
  findManifest(number: string): Promise<ManifestSourceRow | null>;
  findDeclaration(number: string): Promise<DeclarationSourceRow | null>;
  findUnifiedDeclaration(number: string, processReference: string | null): Promise<UnifiedDeclarationSourceRow | null>;
  listDeclarationPayments(declarationId: number): Promise<DeclarationPaymentRow[]>;
  findDeclarationValues(declarationId: number): Promise<DeclarationValueRow | null>;
}

// =============================================================================
// Queries
// =============================================================================

const DECLARATION_COLUMNS = `
  declaration_id, number, situation, situation_at, cargo_delivery_status,
  rectification_seq, channel, registered_at, cleared_at, delivery_authorized_at, import_id
`;

const UNIFIED_DECLARATION_COLUMNS = `
  number, version, process_reference, import_process_id, registered_at,
  last_situation, last_event_at, consolidated_channel
`;

const MANIFEST_COLUMNS = `
  number, cargo_status, cargo_status_at, issued_at, final_destination_at,
  vessel, origin_port, destination_port, origin_country
`;

export interface PgSourceRepositoryConfig {
  executor: SqlExecutor;
  logger: Logger;
}

export class PgSourceRepository implements SourceRepository {
  private readonly executor: SqlExecutor;
  private readonly log: Logger;

  constructor(config: PgSourceRepositoryConfig) {
    this.executor = config.executor;
    this.log = config.logger.child({ component: 'source-repository' });
  }

  async listDeclarations(window: TimeWindow, limit: number | null): Promise<DeclarationSourceRow[]> {
    const rows = await queryRows<DeclarationSourceRow>(this.executor, {
      text: `SELECT ${DECLARATION_COLUMNS}
             FROM source_declaration
             WHERE COALESCE(registered_at, situation_at) >= $1
               AND COALESCE(registered_at, situation_at) < $2
             ORDER BY COALESCE(registered_at, situation_at) DESC
             LIMIT $3`,
      values: [window.from, window.to, limit],
    });
    this.log.debug({ count: rows.length, from: window.from, to: window.to }, 'Listed import declarations');
    return rows;
  }

  async listUnifiedDeclarations(
    window: TimeWindow,
    limit: number | null
  ): Promise<UnifiedDeclarationSourceRow[]> {
    const rows = await queryRows<UnifiedDeclarationSourceRow>(this.executor, {
      text: `SELECT ${UNIFIED_DECLARATION_COLUMNS}
             FROM source_unified_declaration
             WHERE registered_at >= $1
               AND registered_at < $2
             ORDER BY registered_at DESC
             LIMIT $3`,
      values: [window.from, window.to, limit],
    });
    this.log.debug({ count: rows.length, from: window.from, to: window.to }, 'Listed unified declarations');
    return rows;
  }

  async findManifestNumberByImportId(importId: number): Promise<string | null> {
    const row = await queryFirst<{ manifest_number: string | null }>(this.executor, {
      text: `SELECT manifest_number
             FROM source_manifest_link
             WHERE import_id = $1
             ORDER BY CASE WHEN active THEN 0 ELSE 1 END, id DESC
             LIMIT 1`,
      values: [importId],
    });
    return row?.manifest_number ?? null;
  }

  async findDeclarationNumberByImportId(importId: number): Promise<string | null> {
    const row = await queryFirst<{ declaration_number: string | null }>(this.executor, {
      text: `SELECT declaration_number
             FROM source_declaration_link
             WHERE import_id = $1
             ORDER BY CASE WHEN active THEN 0 ELSE 1 END, id DESC
             LIMIT 1`,
      values: [importId],
    });
    return row?.declaration_number ?? null;
  }

  async findUnifiedDeclarationNumberByProcess(processReference: string): Promise<string | null> {
    const row = await queryFirst<{ number: string | null }>(this.executor, {
      text: `SELECT number
             FROM source_unified_declaration
             WHERE process_reference = $1
             ORDER BY last_event_at DESC NULLS LAST, updated_at DESC
             LIMIT 1`,
      values: [processReference],
    });
    return row?.number ?? null;
  }

  async findManifest(number: string): Promise<ManifestSourceRow | null> {
    return queryFirst<ManifestSourceRow>(this.executor, {
      text: `SELECT ${MANIFEST_COLUMNS}
             FROM source_manifest
             WHERE number = $1
             ORDER BY updated_at DESC
             LIMIT 1`,
      values: [number],
    });
  }

  async findDeclaration(number: string): Promise<DeclarationSourceRow | null> {
    return queryFirst<DeclarationSourceRow>(this.executor, {
      text: `SELECT ${DECLARATION_COLUMNS}
             FROM source_declaration
             WHERE number = $1
             ORDER BY updated_at DESC
             LIMIT 1`,
      values: [number],
    });
  }

  async findUnifiedDeclaration(
    number: string,
    processReference: string | null
  ): Promise<UnifiedDeclarationSourceRow | null> {
    return queryFirst<UnifiedDeclarationSourceRow>(this.executor, {
      text: `SELECT ${UNIFIED_DECLARATION_COLUMNS}
             FROM source_unified_declaration
             WHERE number = $1 OR ($2::varchar IS NOT NULL AND process_reference = $2)
             ORDER BY last_event_at DESC NULLS LAST
             LIMIT 1`,
      values: [number, processReference],
    });
  }

  async listDeclarationPayments(declarationId: number): Promise<DeclarationPaymentRow[]> {
    return queryRows<DeclarationPaymentRow>(this.executor, {
      text: `SELECT revenue_code, revenue_description, rectification_number, total_amount, paid_at
             FROM source_declaration_payment
             WHERE declaration_id = $1`,
      values: [declarationId],
    });
  }

  async findDeclarationValues(declarationId: number): Promise<DeclarationValueRow | null> {
    return queryFirst<DeclarationValueRow>(this.executor, {
      text: `SELECT vmld_usd, vmld_brl, vmle_usd, vmle_brl,
                    freight_usd, freight_brl, insurance_usd, insurance_brl
             FROM source_declaration_value
             WHERE declaration_id = $1
             LIMIT 1`,
      values: [declarationId],
    });
  }
}
