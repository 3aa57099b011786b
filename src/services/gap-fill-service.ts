/**
 * Snapshot Gap Filler
 *
 * Fills empty columns of existing snapshots from the richest raw payload
 * available: the stored one, the cached one, or one rebuilt from the
 * authoritative store. Values already stored are never overwritten.
 *
 * @module services/gap-fill-service
 */

import type { Logger } from 'pino';
import { defaultExtractionContext, extractFields, readPath } from '../documents/field-extractor.js';
import type { ExtractionContext } from '../documents/field-extractor.js';
import {
  buildDeclarationPayload,
  buildManifestPayload,
  buildUnifiedDeclarationPayload,
} from '../documents/mappers.js';
import { isRecord, normalizeText } from '../documents/normalize.js';
import { CANONICAL_FIELD_NAMES } from '../documents/types.js';
import type { RawPayload, StoredSnapshot } from '../documents/types.js';
import { resolveVersion } from '../documents/version-resolver.js';
import type { CacheRepository } from '../repositories/cache-repository.js';
import type { DocumentRepository, SnapshotGapFill } from '../repositories/document-repository.js';
import type { SourceRepository } from '../repositories/source-repository.js';
import { MalformedPayloadError } from '../utils/errors.js';

// --------------------------------------------------------------------------
// Types
// --------------------------------------------------------------------------

export interface GapFillOptions {
  /** Snapshots to fill (or plan) before the run stops */
  limit?: number;
  dryRun?: boolean;
}

export interface GapFillPlan {
  id: number;
  number: string;
  kind: StoredSnapshot['identity']['kind'];
  fill: SnapshotGapFill;
}

export interface GapFillResult {
  dryRun: boolean;
  candidates: number;
  updated: number;
  skipped: number;
  errors: number;
  planned: GapFillPlan[];
  failures: Array<{ id: number; number: string; error: string }>;
}

export interface GapFillServiceConfig {
  documents: DocumentRepository;
  cache: CacheRepository;
  source: SourceRepository;
  logger: Logger;
  extraction?: ExtractionContext;
  /** Snapshots read per round-trip */
  pageSize?: number;
}

/** Payloads shorter than this are considered thin and topped up from the authoritative store */
export const MIN_PAYLOAD_LENGTH = 400;

const DEFAULT_LIMIT = 500;

const DEFAULT_PAGE_SIZE = 200;

const PROCESS_REFERENCE_ALIASES = ['numeroProcesso', 'numero_processo', 'processo'];

// --------------------------------------------------------------------------
// Helpers
// --------------------------------------------------------------------------

/**
 * Parse raw payload text into a key-value map. A one-element array is
 * unwrapped.
 */
export function parsePayloadText(text: string): RawPayload {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new MalformedPayloadError(`Payload is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (Array.isArray(parsed) && parsed.length === 1) {
    parsed = parsed[0];
  }
  if (!isRecord(parsed)) {
    throw new MalformedPayloadError('Payload is not a key-value object');
  }
  return parsed;
}

function longest(...candidates: Array<string | null>): string | null {
  let best: string | null = null;
  for (const candidate of candidates) {
    if (candidate !== null && (best === null || candidate.length > best.length)) {
      best = candidate;
    }
  }
  return best;
}

function isEmpty(value: string | null): boolean {
  return value === null || value.trim() === '';
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// --------------------------------------------------------------------------
// Service
// --------------------------------------------------------------------------

export class GapFillService {
  private readonly documents: DocumentRepository;
  private readonly cache: CacheRepository;
  private readonly source: SourceRepository;
  private readonly log: Logger;
  private readonly extraction: ExtractionContext;
  private readonly pageSize: number;

  constructor(config: GapFillServiceConfig) {
    this.documents = config.documents;
    this.cache = config.cache;
    this.source = config.source;
    this.log = config.logger.child({ component: 'gap-fill' });
    this.extraction = config.extraction ?? { ...defaultExtractionContext(), logger: this.log };
    this.pageSize = Math.max(1, config.pageSize ?? DEFAULT_PAGE_SIZE);
  }

  /**
   * Walk incomplete snapshots in id order until `limit` of them are filled
   * or none remain. Snapshots with nothing to fill are passed over, so they
   * never hold back the rows behind them.
   */
  async run(options: GapFillOptions = {}): Promise<GapFillResult> {
    const dryRun = options.dryRun ?? false;
    const limit = options.limit ?? DEFAULT_LIMIT;

    const result: GapFillResult = {
      dryRun,
      candidates: 0,
      updated: 0,
      skipped: 0,
      errors: 0,
      planned: [],
      failures: [],
    };

    this.log.info({ limit, dryRun }, 'Starting snapshot gap fill');

    let cursor = 0;
    while (result.updated < limit) {
      const page = await this.documents.listIncompleteSnapshots(this.pageSize, cursor);
      if (page.length === 0) {
        break;
      }

      for (const snapshot of page) {
        if (result.updated >= limit) {
          break;
        }
        cursor = snapshot.id;
        result.candidates++;
        await this.fillOne(snapshot, dryRun, result);
      }
    }

    this.log.info(
      { candidates: result.candidates, updated: result.updated, skipped: result.skipped, errors: result.errors, dryRun },
      'Snapshot gap fill complete'
    );
    return result;
  }

  private async fillOne(snapshot: StoredSnapshot, dryRun: boolean, result: GapFillResult): Promise<void> {
    const { number, kind } = snapshot.identity;
    try {
      const fill = await this.planFill(snapshot);
      if (!fill) {
        result.skipped++;
        return;
      }

      if (dryRun) {
        result.planned.push({ id: snapshot.id, number, kind, fill });
        result.updated++;
        return;
      }

      await this.documents.fillSnapshotGaps(snapshot.id, fill);
      result.updated++;
    } catch (error) {
      if (error instanceof MalformedPayloadError) {
        this.log.warn({ id: snapshot.id, number, kind, error: error.message }, 'Skipping malformed payload');
        result.skipped++;
        return;
      }
      this.log.error({ id: snapshot.id, number, kind, error: errorMessage(error) }, 'Gap fill failed');
      result.errors++;
      result.failures.push({ id: snapshot.id, number, error: errorMessage(error) });
    }
  }

  /**
   * Columns to fill for one snapshot, or null when there is nothing to fill
   */
  async planFill(snapshot: StoredSnapshot): Promise<SnapshotGapFill | null> {
    const { number, kind } = snapshot.identity;
    const stored = snapshot.rawPayload ? JSON.stringify(snapshot.rawPayload) : null;

    const cached = await this.cache.findDocument(number, kind);
    let best = longest(stored, cached?.raw_json ?? null);

    if (best === null || best.length < MIN_PAYLOAD_LENGTH) {
      const rebuilt = await this.authoritativePayload(snapshot);
      best = longest(best, rebuilt ? JSON.stringify(rebuilt) : null);
    }

    if (best === null) {
      return null;
    }

    const payload = parsePayloadText(best);
    const fields = extractFields(payload, kind, this.extraction);
    const fill: SnapshotGapFill = { fields: {} };
    let changed = false;

    for (const name of CANONICAL_FIELD_NAMES) {
      const value = fields[name];
      if (value !== null && isEmpty(snapshot.fields[name])) {
        fill.fields[name] = value;
        changed = true;
      }
    }

    if (isEmpty(snapshot.processReference)) {
      const fromPayload = PROCESS_REFERENCE_ALIASES.map((alias) => normalizeText(readPath(payload, alias)))
        .map((normalized) => (normalized.ok ? normalized.value : null))
        .find((value): value is string => value !== null);
      const reference = normalizeText(cached?.process_reference ?? null);
      const processReference = (reference.ok ? reference.value : null) ?? fromPayload ?? null;
      if (processReference !== null) {
        fill.processReference = processReference;
        changed = true;
      }
    }

    if (snapshot.rawPayload === null) {
      fill.rawPayload = payload;
      changed = true;
    }

    if (snapshot.identity.version === null) {
      const version = resolveVersion(payload, kind, this.extraction);
      if (version !== null && !(await this.documents.versionTaken({ number, kind, version }, snapshot.id))) {
        fill.version = version;
        changed = true;
      }
    }

    return changed ? fill : null;
  }

  private async authoritativePayload(snapshot: StoredSnapshot): Promise<RawPayload | null> {
    const { number, kind } = snapshot.identity;
    switch (kind) {
      case 'CARGO_MANIFEST': {
        const row = await this.source.findManifest(number);
        return row ? buildManifestPayload(row) : null;
      }
      case 'IMPORT_DECLARATION': {
        const row = await this.source.findDeclaration(number);
        return row ? buildDeclarationPayload(row) : null;
      }
      case 'UNIFIED_IMPORT_DECLARATION': {
        const row = await this.source.findUnifiedDeclaration(number, snapshot.processReference);
        return row ? buildUnifiedDeclarationPayload(row, snapshot.processReference ?? row.process_reference) : null;
      }
      case 'TERMINAL_CONTROL':
        return null;
    }
  }
}
