/**
 * Migration 001: Customs documents
 *
 * Canonical snapshot and change-history tables:
 * - customs_document: one current-state row per (number, kind, version)
 * - customs_document_history: append-only field-level change records
 */

import { queryRows } from '../executor.js';
import type { SqlExecutor } from '../executor.js';

export const version = 1;
export const name = '001_customs_documents';

export const CUSTOMS_DOCUMENT_SQL = `
  CREATE TABLE IF NOT EXISTS customs_document (
    id                BIGSERIAL PRIMARY KEY,
    document_number   VARCHAR(50)  NOT NULL,
    document_kind     VARCHAR(40)  NOT NULL,
    document_version  VARCHAR(20),
    process_reference VARCHAR(50),
    status            VARCHAR(100),
    status_code       VARCHAR(50),
    channel           VARCHAR(20),
    situation         VARCHAR(100),
    registration_date VARCHAR(40),
    situation_date    VARCHAR(40),
    clearance_date    VARCHAR(40),
    raw_payload       JSONB,
    data_source       VARCHAR(50),
    last_synced_at    TIMESTAMPTZ,
    created_at        TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    updated_at        TIMESTAMPTZ NOT NULL DEFAULT NOW()
  )
`;

export const CUSTOMS_DOCUMENT_IDENTITY_INDEX_SQL = `
  CREATE UNIQUE INDEX IF NOT EXISTS uq_customs_document_identity
    ON customs_document (document_number, document_kind, (COALESCE(document_version, '')))
`;

export const CUSTOMS_DOCUMENT_HISTORY_SQL = `
  CREATE TABLE IF NOT EXISTS customs_document_history (
    id                BIGSERIAL PRIMARY KEY,
    document_id       BIGINT REFERENCES customs_document (id),
    document_number   VARCHAR(50)  NOT NULL,
    document_kind     VARCHAR(40)  NOT NULL,
    document_version  VARCHAR(20),
    process_reference VARCHAR(50),
    event_at          TIMESTAMPTZ  NOT NULL DEFAULT NOW(),
    event_kind        VARCHAR(50)  NOT NULL,
    event_description VARCHAR(255),
    changed_field     VARCHAR(100) NOT NULL,
    previous_value    VARCHAR(500),
    new_value         VARCHAR(500),
    status            VARCHAR(100),
    status_code       VARCHAR(50),
    channel           VARCHAR(20),
    situation         VARCHAR(100),
    registration_date VARCHAR(40),
    situation_date    VARCHAR(40),
    clearance_date    VARCHAR(40),
    data_source       VARCHAR(50)  NOT NULL,
    api_endpoint      VARCHAR(500),
    raw_payload       JSONB,
    actor             VARCHAR(100) NOT NULL DEFAULT 'SYSTEM',
    notes             TEXT,
    created_at        TIMESTAMPTZ  NOT NULL DEFAULT NOW()
  )
`;

export const CUSTOMS_DOCUMENT_HISTORY_INDEXES_SQL = [
  `CREATE INDEX IF NOT EXISTS idx_history_document
     ON customs_document_history (document_id, event_at DESC)`,
  `CREATE INDEX IF NOT EXISTS idx_history_number_kind
     ON customs_document_history (document_number, document_kind, event_at DESC)`,
  `CREATE INDEX IF NOT EXISTS idx_history_process
     ON customs_document_history (process_reference, event_at DESC)`,
  `CREATE INDEX IF NOT EXISTS idx_history_event_kind
     ON customs_document_history (event_kind, event_at DESC)`,
  `CREATE INDEX IF NOT EXISTS idx_history_changed_field
     ON customs_document_history (changed_field, event_at DESC)`,
  `CREATE INDEX IF NOT EXISTS idx_history_data_source
     ON customs_document_history (data_source, event_at DESC)`,
];

export async function up(executor: SqlExecutor): Promise<void> {
  await queryRows(executor, { text: CUSTOMS_DOCUMENT_SQL });
  await queryRows(executor, { text: CUSTOMS_DOCUMENT_IDENTITY_INDEX_SQL });
  await queryRows(executor, { text: CUSTOMS_DOCUMENT_HISTORY_SQL });
  for (const text of CUSTOMS_DOCUMENT_HISTORY_INDEXES_SQL) {
    await queryRows(executor, { text });
  }
}
