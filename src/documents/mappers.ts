/**
 * Origin Mappers
 *
 * One mapping function per known-column origin. Authoritative and cache rows
 * already name their columns, so they target the canonical fields directly
 * instead of going through the alias-driven extractor. The payload builders
 * rebuild the upstream payload shape for origins that are ingested through
 * the full pipeline.
 *
 * @module documents/mappers
 */

import type { Logger } from 'pino';
import type { CachedDocumentRow } from '../repositories/cache-repository.js';
import type {
  DeclarationSourceRow,
  ManifestSourceRow,
  SourceDate,
  UnifiedDeclarationSourceRow,
} from '../repositories/source-repository.js';
import { applyFieldDefaults, tagFields } from './field-extractor.js';
import { normalizeDate, normalizeText } from './normalize.js';
import { emptyCanonicalFields } from './types.js';
import type { CanonicalFields, RawPayload, ResolvedObservation } from './types.js';
import { normalizeVersion } from './version-resolver.js';

// =============================================================================
// Provenance
// =============================================================================

export const DATA_SOURCES = {
  authoritative: 'AUTHORITATIVE_DB',
  unifiedDeclaration: 'UNIFIED_DECLARATION_DB',
  backfill: 'HISTORICAL_BACKFILL',
  gapFill: 'GAP_FILL',
} as const;

export const API_ENDPOINTS = {
  manifest: 'manifest-registry',
  declaration: 'declaration-registry',
  unifiedDeclaration: 'unified-declaration-registry',
  backfill: 'historical-backfill',
} as const;

// =============================================================================
// Scalars
// =============================================================================

function text(value: string | number | null | undefined): string | null {
  const normalized = normalizeText(value);
  return normalized.ok ? normalized.value : null;
}

function date(value: SourceDate | undefined, column: string, logger: Logger): string | null {
  const normalized = normalizeDate(value);
  if (normalized.ok) {
    return normalized.value;
  }
  logger.warn({ column, value: String(normalized.raw) }, 'Unparseable date column treated as absent');
  return null;
}

/** Dates rendered as text inside rebuilt payloads */
function payloadDate(value: SourceDate): string | null {
  return value instanceof Date ? value.toISOString() : value;
}

// =============================================================================
// Cache
// =============================================================================

/**
 * Last polled state from the cache, used as a change-detection baseline
 */
export function fromCacheRow(row: CachedDocumentRow, logger: Logger): CanonicalFields {
  return {
    ...emptyCanonicalFields(),
    status: text(row.status),
    channel: text(row.channel),
    situationDate: date(row.status_at, 'status_at', logger),
  };
}

// =============================================================================
// Authoritative Store
// =============================================================================

export function buildManifestPayload(row: ManifestSourceRow): RawPayload {
  return {
    numero: row.number,
    situacaoCarga: row.cargo_status,
    dataSituacaoCarga: payloadDate(row.cargo_status_at),
    dataEmissao: payloadDate(row.issued_at),
    dataDestinoFinal: payloadDate(row.final_destination_at),
    navioPrimTransporte: row.vessel,
    portoOrigem: row.origin_port,
    portoDestino: row.destination_port,
    paisProcedencia: row.origin_country,
  };
}

export function buildDeclarationPayload(row: DeclarationSourceRow): RawPayload {
  return {
    numero: row.number,
    numeroDi: row.number,
    situacaoDi: row.situation,
    dataHoraSituacaoDi: payloadDate(row.situation_at),
    canalSelecaoParametrizada: row.channel,
    dataHoraRegistro: payloadDate(row.registered_at),
    dataHoraDesembaraco: payloadDate(row.cleared_at),
    dataHoraAutorizacaoEntrega: payloadDate(row.delivery_authorized_at),
    sequencialRetificacao: row.rectification_seq,
  };
}

export function buildUnifiedDeclarationPayload(
  row: UnifiedDeclarationSourceRow,
  processReference: string | null
): RawPayload {
  return {
    numero: row.number,
    situacao: row.last_situation,
    ultimaSituacao: row.last_situation,
    ultimaSituacaoData: payloadDate(row.last_event_at),
    dataRegistro: payloadDate(row.registered_at),
    canal: row.consolidated_channel,
    versaoDocumento: row.version,
    numeroProcesso: processReference,
  };
}

export function fromManifestSource(
  row: ManifestSourceRow,
  processReference: string | null,
  logger: Logger
): ResolvedObservation | null {
  const number = text(row.number);
  if (!number) {
    return null;
  }
  const fields = applyFieldDefaults({
    ...emptyCanonicalFields(),
    status: text(row.cargo_status),
    registrationDate: date(row.issued_at, 'issued_at', logger),
    situationDate: date(row.cargo_status_at, 'cargo_status_at', logger),
  });
  return {
    identity: { number, kind: 'CARGO_MANIFEST', version: null },
    fields: tagFields('CARGO_MANIFEST', fields),
    rawPayload: buildManifestPayload(row),
    source: DATA_SOURCES.authoritative,
    apiEndpoint: API_ENDPOINTS.manifest,
    processReference,
  };
}

export function fromDeclarationSource(
  row: DeclarationSourceRow,
  processReference: string | null,
  logger: Logger
): ResolvedObservation | null {
  const number = text(row.number);
  if (!number) {
    return null;
  }
  const fields = applyFieldDefaults({
    ...emptyCanonicalFields(),
    status: text(row.situation),
    channel: text(row.channel),
    registrationDate: date(row.registered_at, 'registered_at', logger),
    situationDate: date(row.situation_at, 'situation_at', logger),
    clearanceDate: date(row.cleared_at, 'cleared_at', logger),
  });
  return {
    identity: {
      number,
      kind: 'IMPORT_DECLARATION',
      version: normalizeVersion(row.rectification_seq),
    },
    fields: tagFields('IMPORT_DECLARATION', fields),
    rawPayload: buildDeclarationPayload(row),
    source: DATA_SOURCES.authoritative,
    apiEndpoint: API_ENDPOINTS.declaration,
    processReference,
  };
}

export function fromUnifiedDeclarationSource(
  row: UnifiedDeclarationSourceRow,
  processReference: string | null,
  logger: Logger
): ResolvedObservation | null {
  const number = text(row.number);
  if (!number) {
    return null;
  }
  const fields = applyFieldDefaults({
    ...emptyCanonicalFields(),
    status: text(row.last_situation),
    channel: text(row.consolidated_channel),
    registrationDate: date(row.registered_at, 'registered_at', logger),
    situationDate: date(row.last_event_at, 'last_event_at', logger),
  });
  return {
    identity: {
      number,
      kind: 'UNIFIED_IMPORT_DECLARATION',
      version: normalizeVersion(row.version),
    },
    fields: tagFields('UNIFIED_IMPORT_DECLARATION', fields),
    rawPayload: buildUnifiedDeclarationPayload(row, processReference),
    source: DATA_SOURCES.unifiedDeclaration,
    apiEndpoint: API_ENDPOINTS.unifiedDeclaration,
    processReference,
  };
}
