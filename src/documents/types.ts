/**
 * Document Model
 *
 * Identity, canonical fields, snapshots, changes and history records shared
 * by the reconciliation pipeline and its orchestrators.
 *
 * @module documents/types
 */

// =============================================================================
// Document Kinds
// =============================================================================

export const DOCUMENT_KINDS = [
  'CARGO_MANIFEST',
  'IMPORT_DECLARATION',
  'UNIFIED_IMPORT_DECLARATION',
  'TERMINAL_CONTROL',
] as const;

export type DocumentKind = (typeof DOCUMENT_KINDS)[number];

export function isDocumentKind(value: string): value is DocumentKind {
  return (DOCUMENT_KINDS as readonly string[]).includes(value);
}

// =============================================================================
// Identity & Canonical Fields
// =============================================================================

export interface DocumentIdentity {
  number: string;
  kind: DocumentKind;
  /** Revision key; null for kinds without revisions */
  version: string | null;
}

/**
 * Fixed canonical field set. Dates are ISO-8601 text.
 */
export interface CanonicalFields {
  status: string | null;
  statusCode: string | null;
  channel: string | null;
  situation: string | null;
  registrationDate: string | null;
  situationDate: string | null;
  clearanceDate: string | null;
}

export type CanonicalFieldName = keyof CanonicalFields;

export const CANONICAL_FIELD_NAMES: readonly CanonicalFieldName[] = [
  'status',
  'statusCode',
  'channel',
  'situation',
  'registrationDate',
  'situationDate',
  'clearanceDate',
];

export const DATE_FIELD_NAMES: ReadonlySet<CanonicalFieldName> = new Set([
  'registrationDate',
  'situationDate',
  'clearanceDate',
]);

/**
 * Canonical fields tagged with the document kind they were extracted for
 */
export type DocumentFields<K extends DocumentKind = DocumentKind> = K extends DocumentKind
  ? { kind: K } & CanonicalFields
  : never;

export function emptyCanonicalFields(): CanonicalFields {
  return {
    status: null,
    statusCode: null,
    channel: null,
    situation: null,
    registrationDate: null,
    situationDate: null,
    clearanceDate: null,
  };
}

/** Opaque upstream payload, kept for replay and audit */
export type RawPayload = Record<string, unknown>;

// =============================================================================
// Snapshot
// =============================================================================

export interface StoredSnapshot {
  id: number;
  identity: DocumentIdentity;
  fields: CanonicalFields;
  processReference: string | null;
  rawPayload: RawPayload | null;
  dataSource: string | null;
  updatedAt: Date | null;
}

export interface NewSnapshot {
  identity: DocumentIdentity;
  fields: CanonicalFields;
  processReference: string | null;
  rawPayload: RawPayload | null;
  dataSource: string;
  syncedAt: Date;
}

/**
 * In-place update of a matched snapshot. Omitted properties keep their
 * stored value.
 */
export interface SnapshotPatch {
  fields: CanonicalFields;
  processReference?: string;
  rawPayload: RawPayload | null;
  dataSource: string;
  syncedAt: Date;
}

export type SnapshotAction = 'inserted' | 'updated' | 'unchanged' | 'failed';

// =============================================================================
// Changes & History
// =============================================================================

export type ChangeEventKind = 'STATUS_CHANGE' | 'CHANNEL_CHANGE' | 'DATE_CHANGE';

export type ComparedField =
  | 'status'
  | 'channel'
  | 'registration_date'
  | 'situation_date'
  | 'clearance_date';

export interface Change {
  eventKind: ChangeEventKind;
  field: ComparedField;
  previousValue: string | null;
  newValue: string;
  detectedAt: Date;
}

export interface NewHistoryRecord {
  documentId: number | null;
  identity: DocumentIdentity;
  processReference: string | null;
  eventAt: Date;
  eventKind: ChangeEventKind;
  description: string;
  field: ComparedField;
  previousValue: string | null;
  newValue: string;
  fields: CanonicalFields;
  dataSource: string;
  apiEndpoint: string | null;
  rawPayload: RawPayload;
  actor: string;
}

/**
 * A change that was durably appended to the history
 */
export interface RecordedChange {
  historyId: number;
  number: string;
  kind: DocumentKind;
  eventKind: ChangeEventKind;
  field: ComparedField;
  previous: string | null;
  new: string;
}

// =============================================================================
// Observations
// =============================================================================

/**
 * A raw payload observed for one document, before extraction
 */
export interface DocumentObservation {
  number: string;
  kind: DocumentKind;
  payload: RawPayload;
  source: string;
  apiEndpoint?: string | null;
  processReference?: string | null;
}

/**
 * An observation whose canonical fields and version are already known
 */
export interface ResolvedObservation {
  identity: DocumentIdentity;
  fields: DocumentFields;
  rawPayload: RawPayload;
  source: string;
  apiEndpoint: string | null;
  processReference: string | null;
}

export interface ReconcileResult {
  identity: DocumentIdentity;
  changes: RecordedChange[];
  snapshot: SnapshotAction;
  error?: string;
}

/** Injected time source */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
