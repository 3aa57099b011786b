/**
 * Snapshot Upserter
 *
 * Keeps one current-state row per document identity. Writes are gated: an
 * existing snapshot is touched only when something changed, a process
 * reference or a raw payload became available for the first time.
 *
 * @module documents/snapshot-upserter
 */

import type { Logger } from 'pino';
import type { DocumentRepository } from '../repositories/document-repository.js';
import { isUniqueViolation } from '../utils/errors.js';
import { CANONICAL_FIELD_NAMES } from './types.js';
import type {
  CanonicalFields,
  DocumentIdentity,
  RawPayload,
  SnapshotAction,
  SnapshotPatch,
  StoredSnapshot,
} from './types.js';

export interface SnapshotInput {
  identity: DocumentIdentity;
  fields: CanonicalFields;
  processReference: string | null;
  rawPayload: RawPayload | null;
  source: string;
  syncedAt: Date;
}

export interface UpsertOutcome {
  action: SnapshotAction;
  snapshotId: number | null;
  error?: string;
}

function trimmed(value: string | null): string | null {
  if (value === null) {
    return null;
  }
  const text = value.trim();
  return text === '' ? null : text;
}

/**
 * Whether a snapshot write may be attempted at all
 */
export function shouldWriteSnapshot(
  existing: StoredSnapshot | null,
  changeCount: number,
  input: Pick<SnapshotInput, 'processReference' | 'rawPayload'>
): boolean {
  if (!existing) {
    return true;
  }
  if (changeCount > 0) {
    return true;
  }
  if (trimmed(input.processReference) !== null && trimmed(existing.processReference) === null) {
    return true;
  }
  return existing.rawPayload === null && input.rawPayload !== null;
}

/**
 * Build the update for a matched row, or null when it would change nothing
 */
export function buildPatch(existing: StoredSnapshot, input: SnapshotInput): SnapshotPatch | null {
  let differs = false;

  for (const name of CANONICAL_FIELD_NAMES) {
    const incoming = trimmed(input.fields[name]);
    if (incoming !== null && incoming !== trimmed(existing.fields[name])) {
      differs = true;
    }
  }

  const reference = trimmed(input.processReference);
  const replaceReference = reference !== null && reference !== trimmed(existing.processReference);
  if (replaceReference) {
    differs = true;
  }

  if (existing.rawPayload === null && input.rawPayload !== null) {
    differs = true;
  }

  if (!differs) {
    return null;
  }

  const patch: SnapshotPatch = {
    fields: input.fields,
    rawPayload: input.rawPayload,
    dataSource: input.source,
    syncedAt: input.syncedAt,
  };
  if (replaceReference) {
    patch.processReference = reference;
  }
  return patch;
}

export class SnapshotUpserter {
  private readonly repository: DocumentRepository;
  private readonly log: Logger;

  constructor(config: { repository: DocumentRepository; logger: Logger }) {
    this.repository = config.repository;
    this.log = config.logger.child({ component: 'snapshot-upserter' });
  }

  /**
   * Insert or update the snapshot. `existing` is the row already read for
   * change detection; it is not read again.
   */
  async upsert(
    input: SnapshotInput,
    existing: StoredSnapshot | null,
    changeCount: number
  ): Promise<UpsertOutcome> {
    const { identity } = input;

    if (!shouldWriteSnapshot(existing, changeCount, input)) {
      return { action: 'unchanged', snapshotId: existing ? existing.id : null };
    }

    try {
      if (existing) {
        return await this.update(existing, input);
      }
      return await this.insert(input);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.log.error(
        { number: identity.number, kind: identity.kind, version: identity.version, error: message },
        'Snapshot write failed'
      );
      return { action: 'failed', snapshotId: existing ? existing.id : null, error: message };
    }
  }

  private async update(existing: StoredSnapshot, input: SnapshotInput): Promise<UpsertOutcome> {
    const patch = buildPatch(existing, input);
    if (!patch) {
      return { action: 'unchanged', snapshotId: existing.id };
    }
    await this.repository.updateSnapshot(existing.id, patch);
    this.log.debug({ id: existing.id, number: input.identity.number }, 'Snapshot updated');
    return { action: 'updated', snapshotId: existing.id };
  }

  private async insert(input: SnapshotInput): Promise<UpsertOutcome> {
    try {
      const id = await this.repository.insertSnapshot({
        identity: input.identity,
        fields: input.fields,
        processReference: trimmed(input.processReference),
        rawPayload: input.rawPayload,
        dataSource: input.source,
        syncedAt: input.syncedAt,
      });
      return { action: 'inserted', snapshotId: id };
    } catch (error) {
      if (!isUniqueViolation(error)) {
        throw error;
      }
      // Another writer inserted the identity first
      const current = await this.repository.findSnapshot(input.identity);
      if (!current) {
        throw error;
      }
      this.log.debug({ id: current.id, number: input.identity.number }, 'Insert conflict, updating instead');
      return this.update(current, input);
    }
  }
}
