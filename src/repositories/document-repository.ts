/**
 * Document Repository
 *
 * Canonical snapshot and change-history persistence. The engine depends on
 * the `DocumentRepository` port; `PgDocumentRepository` implements it with
 * parameterized PostgreSQL statements through a SqlExecutor.
 *
 * @module repositories/document-repository
 */

import type { Logger } from 'pino';
import { placeholders, queryFirst, queryRows } from '../db/executor.js';
import type { SqlExecutor, SqlValue } from '../db/executor.js';
import { isRecord } from '../documents/normalize.js';
import { CANONICAL_FIELD_NAMES, isDocumentKind } from '../documents/types.js';
import type {
  CanonicalFieldName,
  CanonicalFields,
  DocumentIdentity,
  DocumentKind,
  NewHistoryRecord,
  NewSnapshot,
  RawPayload,
  SnapshotPatch,
  StoredSnapshot,
} from '../documents/types.js';
import { DatabaseError } from '../utils/errors.js';

// =============================================================================
// Port
// =============================================================================

/**
 * Columns the gap filler may populate on an existing snapshot. Only the
 * properties present are written.
 */
export interface SnapshotGapFill {
  fields: Partial<CanonicalFields>;
  processReference?: string;
  version?: string;
  rawPayload?: RawPayload;
}

export interface DocumentRepository {
  /** Snapshot whose identity matches exactly (null version matches null only) */
  findSnapshot(identity: DocumentIdentity): Promise<StoredSnapshot | null>;
  /** Id of the latest snapshot for a number and kind, any version */
  findLatestSnapshotId(number: string, kind: DocumentKind): Promise<number | null>;
  insertSnapshot(snapshot: NewSnapshot): Promise<number>;
  updateSnapshot(id: number, patch: SnapshotPatch): Promise<void>;
  insertHistory(record: NewHistoryRecord): Promise<number>;
  /** Subset of `numbers` that has at least one snapshot of `kind` */
  findExistingNumbers(kind: DocumentKind, numbers: readonly string[]): Promise<Set<string>>;
  /**
   * Snapshots with an empty column their kind can carry, in id order,
   * starting after `afterId`
   */
  listIncompleteSnapshots(limit: number, afterId: number): Promise<StoredSnapshot[]>;
  /** True when a snapshot other than `excludeId` already holds this identity */
  versionTaken(identity: DocumentIdentity, excludeId: number): Promise<boolean>;
  fillSnapshotGaps(id: number, fill: SnapshotGapFill): Promise<void>;
}

// =============================================================================
// Row Mapping
// =============================================================================

type SnapshotRow = {
  id: string | number;
  document_number: string;
  document_kind: string;
  document_version: string | null;
  process_reference: string | null;
  status: string | null;
  status_code: string | null;
  channel: string | null;
  situation: string | null;
  registration_date: string | Date | null;
  situation_date: string | Date | null;
  clearance_date: string | Date | null;
  raw_payload: unknown;
  data_source: string | null;
  updated_at: Date | string | null;
};

export const FIELD_COLUMNS: Readonly<Record<CanonicalFieldName, string>> = {
  status: 'status',
  statusCode: 'status_code',
  channel: 'channel',
  situation: 'situation',
  registrationDate: 'registration_date',
  situationDate: 'situation_date',
  clearanceDate: 'clearance_date',
};

/**
 * Canonical columns each kind's payloads can populate. Manifests carry no
 * channel; terminal control records carry no channel or registration and
 * clearance dates; unified declarations carry no clearance date.
 */
export const GAP_FILL_FIELDS: Readonly<Record<DocumentKind, readonly CanonicalFieldName[]>> = {
  CARGO_MANIFEST: ['status', 'statusCode', 'situation', 'registrationDate', 'situationDate', 'clearanceDate'],
  TERMINAL_CONTROL: ['status', 'statusCode', 'situation', 'situationDate'],
  IMPORT_DECLARATION: CANONICAL_FIELD_NAMES,
  UNIFIED_IMPORT_DECLARATION: ['status', 'statusCode', 'channel', 'situation', 'registrationDate', 'situationDate'],
};

const SNAPSHOT_COLUMNS = `
  id, document_number, document_kind, document_version, process_reference,
  status, status_code, channel, situation, registration_date, situation_date,
  clearance_date, raw_payload, data_source, updated_at
`;

function columnText(value: string | Date | null): string | null {
  if (value instanceof Date) {
    return value.toISOString();
  }
  return value;
}

function parseStoredPayload(value: unknown): RawPayload | null {
  if (typeof value === 'string') {
    try {
      const parsed: unknown = JSON.parse(value);
      return isRecord(parsed) ? parsed : null;
    } catch {
      return null;
    }
  }
  return isRecord(value) ? value : null;
}

export function toStoredSnapshot(row: SnapshotRow): StoredSnapshot {
  if (!isDocumentKind(row.document_kind)) {
    throw new DatabaseError(`Unknown document kind in customs_document: ${row.document_kind}`);
  }
  return {
    id: Number(row.id),
    identity: {
      number: row.document_number,
      kind: row.document_kind,
      version: row.document_version,
    },
    fields: {
      status: row.status,
      statusCode: row.status_code,
      channel: row.channel,
      situation: row.situation,
      registrationDate: columnText(row.registration_date),
      situationDate: columnText(row.situation_date),
      clearanceDate: columnText(row.clearance_date),
    },
    processReference: row.process_reference,
    rawPayload: parseStoredPayload(row.raw_payload),
    dataSource: row.data_source,
    updatedAt: typeof row.updated_at === 'string' ? new Date(row.updated_at) : row.updated_at,
  };
}

function payloadParam(payload: RawPayload | null | undefined): string | null {
  return payload ? JSON.stringify(payload) : null;
}

// =============================================================================
// PostgreSQL Implementation
// =============================================================================

export interface PgDocumentRepositoryConfig {
  executor: SqlExecutor;
  logger: Logger;
}

export class PgDocumentRepository implements DocumentRepository {
  private readonly executor: SqlExecutor;
  private readonly log: Logger;

  constructor(config: PgDocumentRepositoryConfig) {
    this.executor = config.executor;
    this.log = config.logger.child({ component: 'document-repository' });
  }

  async findSnapshot(identity: DocumentIdentity): Promise<StoredSnapshot | null> {
    const row = await queryFirst<SnapshotRow>(this.executor, {
      text: `SELECT ${SNAPSHOT_COLUMNS}
             FROM customs_document
             WHERE document_number = $1
               AND document_kind = $2
               AND document_version IS NOT DISTINCT FROM $3
             ORDER BY updated_at DESC
             LIMIT 1`,
      values: [identity.number, identity.kind, identity.version],
    });
    return row ? toStoredSnapshot(row) : null;
  }

  async findLatestSnapshotId(number: string, kind: DocumentKind): Promise<number | null> {
    const row = await queryFirst<{ id: string | number }>(this.executor, {
      text: `SELECT id
             FROM customs_document
             WHERE document_number = $1 AND document_kind = $2
             ORDER BY updated_at DESC, id DESC
             LIMIT 1`,
      values: [number, kind],
    });
    return row ? Number(row.id) : null;
  }

  async insertSnapshot(snapshot: NewSnapshot): Promise<number> {
    const { identity, fields } = snapshot;
    const row = await queryFirst<{ id: string | number }>(this.executor, {
      text: `INSERT INTO customs_document (
               document_number, document_kind, document_version, process_reference,
               status, status_code, channel, situation,
               registration_date, situation_date, clearance_date,
               raw_payload, data_source, last_synced_at, created_at, updated_at
             ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12::jsonb, $13, $14, $14, $14)
             RETURNING id`,
      values: [
        identity.number,
        identity.kind,
        identity.version,
        snapshot.processReference,
        fields.status,
        fields.statusCode,
        fields.channel,
        fields.situation,
        fields.registrationDate,
        fields.situationDate,
        fields.clearanceDate,
        payloadParam(snapshot.rawPayload),
        snapshot.dataSource,
        snapshot.syncedAt,
      ],
    });
    if (!row) {
      throw new DatabaseError('Snapshot insert returned no id');
    }
    this.log.debug({ id: row.id, number: identity.number, kind: identity.kind }, 'Snapshot inserted');
    return Number(row.id);
  }

  async updateSnapshot(id: number, patch: SnapshotPatch): Promise<void> {
    const { fields } = patch;
    await queryRows(this.executor, {
      text: `UPDATE customs_document SET
               process_reference = COALESCE($2, process_reference),
               status            = COALESCE($3, status),
               status_code       = COALESCE($4, status_code),
               channel           = COALESCE($5, channel),
               situation         = COALESCE($6, situation),
               registration_date = COALESCE($7, registration_date),
               situation_date    = COALESCE($8, situation_date),
               clearance_date    = COALESCE($9, clearance_date),
               raw_payload       = COALESCE($10::jsonb, raw_payload),
               data_source       = $11,
               last_synced_at    = $12,
               updated_at        = $12
             WHERE id = $1`,
      values: [
        id,
        patch.processReference ?? null,
        fields.status,
        fields.statusCode,
        fields.channel,
        fields.situation,
        fields.registrationDate,
        fields.situationDate,
        fields.clearanceDate,
        payloadParam(patch.rawPayload),
        patch.dataSource,
        patch.syncedAt,
      ],
    });
  }

  async insertHistory(record: NewHistoryRecord): Promise<number> {
    const { identity, fields } = record;
    const row = await queryFirst<{ id: string | number }>(this.executor, {
      text: `INSERT INTO customs_document_history (
               document_id, document_number, document_kind, document_version, process_reference,
               event_at, event_kind, event_description, changed_field, previous_value, new_value,
               status, status_code, channel, situation,
               registration_date, situation_date, clearance_date,
               data_source, api_endpoint, raw_payload, actor
             ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15,
                       $16, $17, $18, $19, $20, $21::jsonb, $22)
             RETURNING id`,
      values: [
        record.documentId,
        identity.number,
        identity.kind,
        identity.version,
        record.processReference,
        record.eventAt,
        record.eventKind,
        record.description,
        record.field,
        record.previousValue,
        record.newValue,
        fields.status,
        fields.statusCode,
        fields.channel,
        fields.situation,
        fields.registrationDate,
        fields.situationDate,
        fields.clearanceDate,
        record.dataSource,
        record.apiEndpoint,
        payloadParam(record.rawPayload),
        record.actor,
      ],
    });
    if (!row) {
      throw new DatabaseError('History insert returned no id');
    }
    return Number(row.id);
  }

  async findExistingNumbers(kind: DocumentKind, numbers: readonly string[]): Promise<Set<string>> {
    if (numbers.length === 0) {
      return new Set();
    }
    const rows = await queryRows<{ document_number: string }>(this.executor, {
      text: `SELECT DISTINCT document_number
             FROM customs_document
             WHERE document_kind = $1
               AND document_number IN (${placeholders(numbers.length, 2)})`,
      values: [kind, ...numbers],
    });
    return new Set(rows.map((row) => row.document_number));
  }

  async listIncompleteSnapshots(limit: number, afterId: number): Promise<StoredSnapshot[]> {
    const values: SqlValue[] = [afterId, limit];
    const byKind = Object.entries(GAP_FILL_FIELDS).map(([kind, fields]) => {
      values.push(kind);
      const blanks = fields.map((name) => `COALESCE(TRIM(${FIELD_COLUMNS[name]}), '') = ''`).join(' OR ');
      return `(document_kind = $${values.length} AND (${blanks}))`;
    });

    const rows = await queryRows<SnapshotRow>(this.executor, {
      text: `SELECT ${SNAPSHOT_COLUMNS}
             FROM customs_document
             WHERE id > $1
               AND (COALESCE(TRIM(process_reference), '') = ''
                    OR raw_payload IS NULL
                    OR ${byKind.join('\n                    OR ')})
             ORDER BY id
             LIMIT $2`,
      values,
    });
    return rows.map(toStoredSnapshot);
  }

  async versionTaken(identity: DocumentIdentity, excludeId: number): Promise<boolean> {
    const row = await queryFirst<{ id: string | number }>(this.executor, {
      text: `SELECT id
             FROM customs_document
             WHERE document_number = $1
               AND document_kind = $2
               AND document_version IS NOT DISTINCT FROM $3
               AND id <> $4
             LIMIT 1`,
      values: [identity.number, identity.kind, identity.version, excludeId],
    });
    return row !== null;
  }

  async fillSnapshotGaps(id: number, fill: SnapshotGapFill): Promise<void> {
    const assignments: string[] = [];
    const values: SqlValue[] = [id];

    const assign = (column: string, value: SqlValue, cast: string = ''): void => {
      values.push(value);
      assignments.push(`${column} = $${values.length}${cast}`);
    };

    for (const name of CANONICAL_FIELD_NAMES) {
      const value = fill.fields[name];
      if (value !== undefined && value !== null) {
        assign(FIELD_COLUMNS[name], value);
      }
    }
    if (fill.processReference !== undefined) {
      assign('process_reference', fill.processReference);
    }
    if (fill.version !== undefined) {
      assign('document_version', fill.version);
    }
    if (fill.rawPayload !== undefined) {
      assign('raw_payload', JSON.stringify(fill.rawPayload), '::jsonb');
    }

    if (assignments.length === 0) {
      return;
    }

    await queryRows(this.executor, {
      text: `UPDATE customs_document
             SET ${assignments.join(', ')}, updated_at = NOW()
             WHERE id = $1`,
      values,
    });
  }
}
