/**
 * Historical Backfill Service
 *
 * Migrates import declarations and unified import declarations registered
 * in a time window from the authoritative store into the canonical store.
 *
 * Design:
 *   - Candidates are deduplicated by number, keeping the most recently dated row
 *   - Existence is checked in batches and cached for the run (tri-state)
 *   - UNKNOWN existence is skipped unless the policy says to ingest it
 *   - Timeouts are retried with exponential backoff; other failures are not
 *   - A failed ingestion re-checks existence before counting an error
 *   - Dry run performs every read and suppresses only the write
 *
 * @module services/backfill-service
 */

import type { Logger } from 'pino';
import type { DocumentReconciler } from '../documents/document-reconciler.js';
import {
  API_ENDPOINTS,
  DATA_SOURCES,
  buildDeclarationPayload,
  buildUnifiedDeclarationPayload,
} from '../documents/mappers.js';
import { normalizeText } from '../documents/normalize.js';
import type { DocumentKind, DocumentObservation, ReconcileResult } from '../documents/types.js';
import type { ProcessRepository } from '../repositories/process-repository.js';
import type {
  DeclarationSourceRow,
  SourceDate,
  SourceRepository,
  TimeWindow,
  UnifiedDeclarationSourceRow,
} from '../repositories/source-repository.js';
import { DatabaseError, ValidationError, sleep, withRetry } from '../utils/errors.js';
import type { RetryConfig } from '../utils/errors.js';
import type { Existence, ExistenceChecker } from './existence-checker.js';

// --------------------------------------------------------------------------
// Types
// --------------------------------------------------------------------------

export type BackfillKindFilter = 'DI' | 'DUIMP' | 'ALL';

/** What to do with numbers whose existence could not be determined */
export type UnknownPolicy = 'skip' | 'ingest';

export interface BackfillOptions {
  window: TimeWindow;
  /** Row limit per kind; null for no limit */
  limit?: number | null;
  kinds?: BackfillKindFilter;
  dryRun?: boolean;
  unknownPolicy?: UnknownPolicy;
}

export interface BackfillCounters {
  found: number;
  unique: number;
  migrated: number;
  skipped: number;
  unknown: number;
  errors: number;
}

export interface BackfillError {
  kind: DocumentKind;
  number: string;
  error: string;
}

/** An item a dry run would have written */
export interface PlannedMigration {
  kind: DocumentKind;
  number: string;
  processReference: string | null;
}

export interface BackfillResult {
  dryRun: boolean;
  window: TimeWindow;
  byKind: Partial<Record<DocumentKind, BackfillCounters>>;
  total: BackfillCounters;
  errors: BackfillError[];
  planned: PlannedMigration[];
}

/** A deduplicated backfill candidate */
export interface BackfillCandidate<R> {
  number: string;
  datedAt: number | null;
  row: R;
}

export interface BackfillServiceConfig {
  source: SourceRepository;
  processes: ProcessRepository;
  reconciler: DocumentReconciler;
  existence: ExistenceChecker;
  logger: Logger;
  /** Delay between consecutive writes */
  throttleMs?: number;
  retry?: Partial<RetryConfig>;
}

const DEFAULT_THROTTLE_MS = 100;

const KIND_FILTERS: Readonly<Record<BackfillKindFilter, readonly DocumentKind[]>> = {
  DI: ['IMPORT_DECLARATION'],
  DUIMP: ['UNIFIED_IMPORT_DECLARATION'],
  ALL: ['IMPORT_DECLARATION', 'UNIFIED_IMPORT_DECLARATION'],
};

// --------------------------------------------------------------------------
// Helpers
// --------------------------------------------------------------------------

export function emptyCounters(): BackfillCounters {
  return { found: 0, unique: 0, migrated: 0, skipped: 0, unknown: 0, errors: 0 };
}

function addCounters(into: BackfillCounters, from: BackfillCounters): void {
  into.found += from.found;
  into.unique += from.unique;
  into.migrated += from.migrated;
  into.skipped += from.skipped;
  into.unknown += from.unknown;
  into.errors += from.errors;
}

function timeOf(value: SourceDate): number | null {
  if (value === null) {
    return null;
  }
  const time = value instanceof Date ? value.getTime() : Date.parse(value);
  return Number.isNaN(time) ? null : time;
}

/**
 * Keep one row per number: the most recently dated one. Undated rows lose
 * to dated ones; among equals the first row seen wins.
 */
export function dedupeLatest<R>(candidates: readonly BackfillCandidate<R>[]): BackfillCandidate<R>[] {
  const latest = new Map<string, BackfillCandidate<R>>();
  for (const candidate of candidates) {
    const current = latest.get(candidate.number);
    if (!current || (candidate.datedAt ?? -Infinity) > (current.datedAt ?? -Infinity)) {
      latest.set(candidate.number, candidate);
    }
  }
  return [...latest.values()];
}

/**
 * Backfill window from either a calendar year or an explicit date range.
 * `to` is inclusive of its whole day.
 */
export function resolveWindow(
  input: { year?: number; from?: string; to?: string },
  now: Date = new Date()
): TimeWindow {
  if (input.year !== undefined && (input.from !== undefined || input.to !== undefined)) {
    throw new ValidationError('Use either a year or a from/to range, not both', 'year');
  }

  if (input.from === undefined && input.to === undefined) {
    const year = input.year ?? now.getUTCFullYear();
    if (!Number.isInteger(year) || year < 1900 || year > 9999) {
      throw new ValidationError(`Invalid year: ${year}`, 'year');
    }
    return { from: new Date(Date.UTC(year, 0, 1)), to: new Date(Date.UTC(year + 1, 0, 1)) };
  }

  if (input.from === undefined || input.to === undefined) {
    throw new ValidationError('Both from and to are required for a date range', input.from === undefined ? 'from' : 'to');
  }

  const from = parseDay(input.from, 'from');
  const to = new Date(parseDay(input.to, 'to').getTime() + 24 * 60 * 60 * 1000);
  if (from.getTime() >= to.getTime()) {
    throw new ValidationError('from must not be after to', 'from');
  }
  return { from, to };
}

function parseDay(value: string, field: string): Date {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value.trim());
  if (!match) {
    throw new ValidationError(`Invalid ${field} date (expected yyyy-mm-dd): ${value}`, field);
  }
  const [, year = '', month = '', day = ''] = match;
  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  if (date.getUTCMonth() !== Number(month) - 1 || date.getUTCDate() !== Number(day)) {
    throw new ValidationError(`Invalid ${field} date: ${value}`, field);
  }
  return date;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// --------------------------------------------------------------------------
// Service
// --------------------------------------------------------------------------

interface KindPlan {
  candidates: BackfillCandidate<DocumentObservation>[];
  found: number;
  skipped: number;
}

export class BackfillService {
  private readonly source: SourceRepository;
  private readonly processes: ProcessRepository;
  private readonly reconciler: DocumentReconciler;
  private readonly existence: ExistenceChecker;
  private readonly log: Logger;
  private readonly throttleMs: number;
  private readonly retry: Partial<RetryConfig>;

  constructor(config: BackfillServiceConfig) {
    this.source = config.source;
    this.processes = config.processes;
    this.reconciler = config.reconciler;
    this.existence = config.existence;
    this.log = config.logger.child({ component: 'backfill' });
    this.throttleMs = config.throttleMs ?? DEFAULT_THROTTLE_MS;
    this.retry = { ...config.retry };
  }

  async run(options: BackfillOptions): Promise<BackfillResult> {
    const dryRun = options.dryRun ?? false;
    const result: BackfillResult = {
      dryRun,
      window: options.window,
      byKind: {},
      total: emptyCounters(),
      errors: [],
      planned: [],
    };

    this.log.info(
      { from: options.window.from, to: options.window.to, kinds: options.kinds ?? 'ALL', dryRun },
      'Starting historical backfill'
    );

    let wrote = false;

    for (const kind of KIND_FILTERS[options.kinds ?? 'ALL']) {
      const counters = emptyCounters();
      result.byKind[kind] = counters;

      let plan: KindPlan;
      try {
        plan = await this.plan(kind, options.window, options.limit ?? null);
      } catch (error) {
        this.log.error({ kind, error: errorMessage(error) }, 'Failed to enumerate backfill candidates');
        counters.errors++;
        result.errors.push({ kind, number: '*', error: errorMessage(error) });
        addCounters(result.total, counters);
        continue;
      }

      counters.found = plan.found;
      counters.unique = plan.candidates.length;
      counters.skipped = plan.skipped;

      await this.existence.prefetch(
        kind,
        plan.candidates.map((candidate) => candidate.number)
      );

      for (const candidate of plan.candidates) {
        const existence = await this.existence.check(kind, candidate.number);
        if (existence === 'PRESENT') {
          counters.skipped++;
          continue;
        }
        if (existence === 'UNKNOWN' && (options.unknownPolicy ?? 'skip') === 'skip') {
          counters.unknown++;
          continue;
        }

        if (dryRun) {
          counters.migrated++;
          result.planned.push({
            kind,
            number: candidate.number,
            processReference: candidate.row.processReference ?? null,
          });
          continue;
        }

        if (wrote) {
          await sleep(this.throttleMs);
        }
        wrote = true;

        const outcome = await this.ingest(kind, candidate.row);
        if (outcome === 'migrated') {
          counters.migrated++;
        } else if (outcome === 'skipped') {
          counters.skipped++;
        } else {
          counters.errors++;
          result.errors.push({ kind, number: candidate.number, error: outcome.error });
        }
      }

      this.log.info({ kind, ...counters }, dryRun ? 'Backfill plan ready' : 'Backfill finished for kind');
      addCounters(result.total, counters);
    }

    this.log.info({ ...result.total, dryRun }, 'Historical backfill complete');
    return result;
  }

  private async plan(kind: DocumentKind, window: TimeWindow, limit: number | null): Promise<KindPlan> {
    if (kind === 'IMPORT_DECLARATION') {
      const rows = await withRetry(
        () => this.source.listDeclarations(window, limit),
        this.retry,
        'list import declarations'
      );
      return this.planDeclarations(rows);
    }
    if (kind === 'UNIFIED_IMPORT_DECLARATION') {
      const rows = await withRetry(
        () => this.source.listUnifiedDeclarations(window, limit),
        this.retry,
        'list unified declarations'
      );
      return this.planUnifiedDeclarations(rows);
    }
    throw new ValidationError(`Backfill does not support ${kind}`, 'kind');
  }

  private async planDeclarations(rows: readonly DeclarationSourceRow[]): Promise<KindPlan> {
    let skipped = 0;
    const candidates: BackfillCandidate<DeclarationSourceRow>[] = [];
    for (const row of rows) {
      const number = textOf(row.number);
      if (!number) {
        skipped++;
        continue;
      }
      candidates.push({ number, datedAt: timeOf(row.registered_at) ?? timeOf(row.situation_at), row });
    }

    const unique = dedupeLatest(candidates);
    const references = await this.processReferences(unique.map((candidate) => candidate.row.import_id));

    return {
      found: rows.length,
      skipped,
      candidates: unique.map((candidate): BackfillCandidate<DocumentObservation> => {
        const importId = idOf(candidate.row.import_id);
        const processReference =
          importId === null ? null : references.get(importId) ?? `ID:${importId}`;
        return {
          number: candidate.number,
          datedAt: candidate.datedAt,
          row: {
            number: candidate.number,
            kind: 'IMPORT_DECLARATION',
            payload: buildDeclarationPayload(candidate.row),
            source: DATA_SOURCES.backfill,
            apiEndpoint: API_ENDPOINTS.backfill,
            processReference,
          },
        };
      }),
    };
  }

  private planUnifiedDeclarations(rows: readonly UnifiedDeclarationSourceRow[]): KindPlan {
    let skipped = 0;
    const candidates: BackfillCandidate<UnifiedDeclarationSourceRow>[] = [];
    for (const row of rows) {
      const number = textOf(row.number);
      if (!number) {
        skipped++;
        continue;
      }
      candidates.push({ number, datedAt: timeOf(row.registered_at), row });
    }

    return {
      found: rows.length,
      skipped,
      candidates: dedupeLatest(candidates).map((candidate): BackfillCandidate<DocumentObservation> => {
        const importId = idOf(candidate.row.import_process_id);
        const processReference =
          textOf(candidate.row.process_reference) ?? (importId === null ? null : `ID:${importId}`);
        return {
          number: candidate.number,
          datedAt: candidate.datedAt,
          row: {
            number: candidate.number,
            kind: 'UNIFIED_IMPORT_DECLARATION',
            payload: buildUnifiedDeclarationPayload(candidate.row, processReference),
            source: DATA_SOURCES.backfill,
            apiEndpoint: API_ENDPOINTS.backfill,
            processReference,
          },
        };
      }),
    };
  }

  private async processReferences(
    importIds: ReadonlyArray<string | number | null>
  ): Promise<Map<number, string>> {
    const ids = importIds.map(idOf).filter((id): id is number => id !== null);
    try {
      return await this.processes.findProcessReferencesByImportIds(ids);
    } catch (error) {
      this.log.warn({ error: errorMessage(error) }, 'Process reference lookup failed, using import ids');
      return new Map();
    }
  }

  private async ingest(
    kind: DocumentKind,
    observation: DocumentObservation
  ): Promise<'migrated' | 'skipped' | { error: string }> {
    try {
      await withRetry(
        async (): Promise<ReconcileResult> => {
          const reconciled = await this.reconciler.reconcile(observation);
          if (reconciled.snapshot === 'failed') {
            throw new DatabaseError(reconciled.error ?? 'Snapshot write failed');
          }
          return reconciled;
        },
        this.retry,
        `ingest ${kind} ${observation.number}`
      );
      this.existence.markPresent(kind, observation.number);
      return 'migrated';
    } catch (error) {
      const existence: Existence = await this.existence.recheck(kind, observation.number);
      if (existence === 'PRESENT') {
        this.log.info({ kind, number: observation.number }, 'Ingestion failed but document now exists');
        return 'skipped';
      }
      this.log.error({ kind, number: observation.number, error: errorMessage(error) }, 'Ingestion failed');
      return { error: errorMessage(error) };
    }
  }
}

function textOf(value: string | number | null): string | null {
  const normalized = normalizeText(value);
  return normalized.ok ? normalized.value : null;
}

function idOf(value: string | number | null): number | null {
  if (value === null) {
    return null;
  }
  const id = Number(value);
  return Number.isInteger(id) ? id : null;
}
