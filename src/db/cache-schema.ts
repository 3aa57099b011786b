/**
 * Local cache store layout (SQLite).
 *
 * The cache is written by the polling workers that talk to the upstream
 * APIs; this engine only reads it. The DDL documents the columns the cache
 * repository relies on.
 */

export const CACHE_SCHEMA_SQL = `
-- Cargo manifests as last polled
CREATE TABLE IF NOT EXISTS manifest_cache (
  manifest_number   TEXT PRIMARY KEY,
  cargo_status      TEXT,
  cargo_status_at   TEXT,
  process_reference TEXT,
  raw_json          TEXT,
  updated_at        TEXT NOT NULL
);

-- Terminal cargo control records
CREATE TABLE IF NOT EXISTS terminal_control_cache (
  cct_number        TEXT PRIMARY KEY,
  current_status    TEXT,
  current_status_at TEXT,
  process_reference TEXT,
  raw_json          TEXT,
  updated_at        TEXT NOT NULL
);

-- Import declarations
CREATE TABLE IF NOT EXISTS declaration_cache (
  declaration_number TEXT PRIMARY KEY,
  situation          TEXT,
  situation_at       TEXT,
  channel            TEXT,
  process_reference  TEXT,
  raw_json           TEXT,
  updated_at         TEXT NOT NULL
);

-- Unified import declarations
CREATE TABLE IF NOT EXISTS unified_declaration_cache (
  number            TEXT PRIMARY KEY,
  situation         TEXT,
  situation_at      TEXT,
  channel           TEXT,
  process_reference TEXT,
  raw_json          TEXT,
  updated_at        TEXT NOT NULL
);

-- Shipment board maintained by the operations dashboard
CREATE TABLE IF NOT EXISTS process_board (
  process_reference          TEXT PRIMARY KEY,
  import_id                  INTEGER,
  stage                      TEXT,
  shipped_at                 TEXT,
  expected_arrival_at        TEXT,
  cleared_at                 TEXT,
  manifest_number            TEXT,
  declaration_number         TEXT,
  unified_declaration_number TEXT,
  updated_at                 TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_process_board_updated ON process_board(updated_at DESC);
`;
