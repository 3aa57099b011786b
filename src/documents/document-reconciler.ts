/**
 * Document Reconciler
 *
 * Runs one observation through the pipeline: extract fields and version,
 * diff against the previous state, append history, then upsert the snapshot.
 * History is written before the snapshot and the two writes are independent.
 * A first observation never writes history; when the cache store holds an
 * earlier state for a new identity, the difference is only logged.
 *
 * @module documents/document-reconciler
 */

import type { Logger } from 'pino';
import type { CacheRepository } from '../repositories/cache-repository.js';
import type { DocumentRepository } from '../repositories/document-repository.js';
import { detectChanges } from './change-detector.js';
import { defaultExtractionContext, extractFields } from './field-extractor.js';
import type { ExtractionContext } from './field-extractor.js';
import { HistoryAppender } from './history-appender.js';
import { fromCacheRow } from './mappers.js';
import { SnapshotUpserter } from './snapshot-upserter.js';
import { systemClock } from './types.js';
import type {
  CanonicalFields,
  Clock,
  DocumentIdentity,
  DocumentObservation,
  ReconcileResult,
  ResolvedObservation,
  StoredSnapshot,
} from './types.js';
import { resolveVersion } from './version-resolver.js';

export interface DocumentReconcilerConfig {
  repository: DocumentRepository;
  logger: Logger;
  /** Compared against first observations to log drift; never a history baseline */
  cache?: CacheRepository;
  clock?: Clock;
  extraction?: ExtractionContext;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class DocumentReconciler {
  private readonly repository: DocumentRepository;
  private readonly cache: CacheRepository | undefined;
  private readonly clock: Clock;
  private readonly extraction: ExtractionContext;
  private readonly history: HistoryAppender;
  private readonly snapshots: SnapshotUpserter;
  private readonly log: Logger;

  constructor(config: DocumentReconcilerConfig) {
    this.repository = config.repository;
    this.cache = config.cache;
    this.clock = config.clock ?? systemClock;
    this.log = config.logger.child({ component: 'document-reconciler' });
    this.extraction = config.extraction ?? {
      ...defaultExtractionContext(),
      logger: this.log,
    };
    this.history = new HistoryAppender({ repository: config.repository, logger: config.logger });
    this.snapshots = new SnapshotUpserter({ repository: config.repository, logger: config.logger });
  }

  /**
   * Reconcile a raw upstream payload. Never throws.
   */
  async reconcile(observation: DocumentObservation): Promise<ReconcileResult> {
    const number = observation.number.trim();
    const fallbackIdentity: DocumentIdentity = { number, kind: observation.kind, version: null };

    if (number === '') {
      return { identity: fallbackIdentity, changes: [], snapshot: 'failed', error: 'Document number is required' };
    }

    let resolved: ResolvedObservation;
    try {
      resolved = {
        identity: {
          number,
          kind: observation.kind,
          version: resolveVersion(observation.payload, observation.kind, this.extraction),
        },
        fields: extractFields(observation.payload, observation.kind, this.extraction),
        rawPayload: observation.payload,
        source: observation.source,
        apiEndpoint: observation.apiEndpoint ?? null,
        processReference: observation.processReference?.trim() || null,
      };
    } catch (error) {
      this.log.error({ number, kind: observation.kind, error: errorMessage(error) }, 'Field extraction failed');
      return { identity: fallbackIdentity, changes: [], snapshot: 'failed', error: errorMessage(error) };
    }

    return this.reconcileResolved(resolved);
  }

  /**
   * Reconcile an observation whose fields are already canonical. Never throws.
   */
  async reconcileResolved(observation: ResolvedObservation): Promise<ReconcileResult> {
    const { identity } = observation;

    let existing: StoredSnapshot | null;
    try {
      existing = await this.repository.findSnapshot(identity);
    } catch (error) {
      this.log.error(
        { number: identity.number, kind: identity.kind, error: errorMessage(error) },
        'Snapshot lookup failed'
      );
      return { identity, changes: [], snapshot: 'failed', error: errorMessage(error) };
    }

    const now = this.clock();
    if (!existing) {
      await this.logCacheDrift(observation, now);
    }
    const changes = detectChanges(existing ? existing.fields : null, observation.fields, now);

    const recorded = await this.history.append(changes, {
      identity,
      fields: observation.fields,
      rawPayload: observation.rawPayload,
      source: observation.source,
      apiEndpoint: observation.apiEndpoint,
      processReference: observation.processReference,
    });

    const outcome = await this.snapshots.upsert(
      {
        identity,
        fields: observation.fields,
        processReference: observation.processReference,
        rawPayload: observation.rawPayload,
        source: observation.source,
        syncedAt: now,
      },
      existing,
      changes.length
    );

    const result: ReconcileResult = { identity, changes: recorded, snapshot: outcome.action };
    if (outcome.error !== undefined) {
      result.error = outcome.error;
    }
    return result;
  }

  private async logCacheDrift(observation: ResolvedObservation, now: Date): Promise<void> {
    if (!this.cache) {
      return;
    }
    const { identity } = observation;
    let cached: CanonicalFields | null;
    try {
      const row = await this.cache.findDocument(identity.number, identity.kind);
      cached = row ? fromCacheRow(row, this.log) : null;
    } catch (error) {
      this.log.warn(
        { number: identity.number, kind: identity.kind, error: errorMessage(error) },
        'Cache state unavailable'
      );
      return;
    }
    if (!cached) {
      return;
    }

    const drift = detectChanges(cached, observation.fields, now);
    if (drift.length > 0) {
      this.log.info(
        {
          number: identity.number,
          kind: identity.kind,
          drift: drift.map((change) => ({ field: change.field, cached: change.previousValue, observed: change.newValue })),
        },
        'First observation differs from cached state'
      );
    }
  }
}
