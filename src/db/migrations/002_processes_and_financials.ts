/**
 * Migration 002: Processes and financial aggregates
 *
 * - import_process: one row per shipment, merged by the process reconciler
 * - merchandise_value: declared values keyed by (process, document, type, currency)
 * - import_tax: paid duties keyed by (process, document, tax type, rectification)
 */

import { queryRows } from '../executor.js';
import type { SqlExecutor } from '../executor.js';

export const version = 2;
export const name = '002_processes_and_financials';

const STATEMENTS = [
  `CREATE TABLE IF NOT EXISTS import_process (
     process_reference          VARCHAR(50) PRIMARY KEY,
     import_id                  BIGINT,
     manifest_number            VARCHAR(50),
     declaration_number         VARCHAR(50),
     unified_declaration_number VARCHAR(50),
     shipped_at                 VARCHAR(40),
     expected_arrival_at        VARCHAR(40),
     cleared_at                 VARCHAR(40),
     process_status             VARCHAR(100),
     created_at                 TIMESTAMPTZ NOT NULL DEFAULT NOW(),
     updated_at                 TIMESTAMPTZ NOT NULL DEFAULT NOW()
   )`,
  `CREATE TABLE IF NOT EXISTS merchandise_value (
     id                BIGSERIAL PRIMARY KEY,
     process_reference VARCHAR(50)    NOT NULL,
     document_number   VARCHAR(50)    NOT NULL,
     document_kind     VARCHAR(40)    NOT NULL,
     value_type        VARCHAR(20)    NOT NULL,
     currency          VARCHAR(3)     NOT NULL,
     amount            NUMERIC(18, 2) NOT NULL,
     data_source       VARCHAR(50),
     created_at        TIMESTAMPTZ    NOT NULL DEFAULT NOW(),
     updated_at        TIMESTAMPTZ    NOT NULL DEFAULT NOW(),
     CONSTRAINT uq_merchandise_value
       UNIQUE (process_reference, document_number, document_kind, value_type, currency)
   )`,
  `CREATE TABLE IF NOT EXISTS import_tax (
     id                   BIGSERIAL PRIMARY KEY,
     process_reference    VARCHAR(50)    NOT NULL,
     document_number      VARCHAR(50)    NOT NULL,
     document_kind        VARCHAR(40)    NOT NULL,
     tax_type             VARCHAR(30)    NOT NULL,
     revenue_code         VARCHAR(10),
     description          VARCHAR(255),
     amount_brl           NUMERIC(18, 2) NOT NULL,
     paid_at              VARCHAR(40),
     paid                 BOOLEAN        NOT NULL DEFAULT TRUE,
     rectification_number INTEGER,
     data_source          VARCHAR(50),
     raw_payload          JSONB,
     created_at           TIMESTAMPTZ    NOT NULL DEFAULT NOW(),
     updated_at           TIMESTAMPTZ    NOT NULL DEFAULT NOW()
   )`,
  `CREATE UNIQUE INDEX IF NOT EXISTS uq_import_tax
     ON import_tax (process_reference, document_number, document_kind, tax_type, (COALESCE(rectification_number, -1)))`,
  `CREATE INDEX IF NOT EXISTS idx_import_tax_process
     ON import_tax (process_reference)`,
];

export async function up(executor: SqlExecutor): Promise<void> {
  for (const text of STATEMENTS) {
    await queryRows(executor, { text });
  }
}
