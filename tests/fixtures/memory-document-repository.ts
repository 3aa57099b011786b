/**
 * In-memory DocumentRepository with the same identity and merge rules as
 * the PostgreSQL implementation.
 */

import { GAP_FILL_FIELDS } from '../../src/repositories/document-repository.js';
import type { DocumentRepository, SnapshotGapFill } from '../../src/repositories/document-repository.js';
import { CANONICAL_FIELD_NAMES } from '../../src/documents/types.js';
import type {
  DocumentIdentity,
  DocumentKind,
  NewHistoryRecord,
  NewSnapshot,
  SnapshotPatch,
  StoredSnapshot,
} from '../../src/documents/types.js';
import { DatabaseError } from '../../src/utils/errors.js';

export interface StoredHistoryRecord extends NewHistoryRecord {
  id: number;
}

function sameIdentity(a: DocumentIdentity, b: DocumentIdentity): boolean {
  return a.number === b.number && a.kind === b.kind && a.version === b.version;
}

function blank(value: string | null): boolean {
  return value === null || value.trim() === '';
}

export class InMemoryDocumentRepository implements DocumentRepository {
  readonly snapshots: StoredSnapshot[] = [];
  readonly history: StoredHistoryRecord[] = [];
  private nextSnapshotId = 1;
  private nextHistoryId = 1;

  /** Seed a stored snapshot directly */
  seed(snapshot: Omit<StoredSnapshot, 'id'>): StoredSnapshot {
    const stored: StoredSnapshot = { ...snapshot, id: this.nextSnapshotId++ };
    this.snapshots.push(stored);
    return stored;
  }

  async findSnapshot(identity: DocumentIdentity): Promise<StoredSnapshot | null> {
    return this.snapshots.find((snapshot) => sameIdentity(snapshot.identity, identity)) ?? null;
  }

  async findLatestSnapshotId(number: string, kind: DocumentKind): Promise<number | null> {
    const matches = this.snapshots.filter(
      (snapshot) => snapshot.identity.number === number && snapshot.identity.kind === kind
    );
    const latest = matches.at(-1);
    return latest ? latest.id : null;
  }

  async insertSnapshot(snapshot: NewSnapshot): Promise<number> {
    if (this.snapshots.some((stored) => sameIdentity(stored.identity, snapshot.identity))) {
      throw new DatabaseError('duplicate key value violates unique constraint "uq_customs_document_identity"', '23505');
    }
    const stored = this.seed({
      identity: { ...snapshot.identity },
      fields: { ...snapshot.fields },
      processReference: snapshot.processReference,
      rawPayload: snapshot.rawPayload,
      dataSource: snapshot.dataSource,
      updatedAt: snapshot.syncedAt,
    });
    return stored.id;
  }

  async updateSnapshot(id: number, patch: SnapshotPatch): Promise<void> {
    const stored = this.snapshots.find((snapshot) => snapshot.id === id);
    if (!stored) {
      return;
    }
    for (const name of CANONICAL_FIELD_NAMES) {
      stored.fields[name] = patch.fields[name] ?? stored.fields[name];
    }
    stored.processReference = patch.processReference ?? stored.processReference;
    stored.rawPayload = patch.rawPayload ?? stored.rawPayload;
    stored.dataSource = patch.dataSource;
    stored.updatedAt = patch.syncedAt;
  }

  async insertHistory(record: NewHistoryRecord): Promise<number> {
    const id = this.nextHistoryId++;
    this.history.push({ ...record, id });
    return id;
  }

  async findExistingNumbers(kind: DocumentKind, numbers: readonly string[]): Promise<Set<string>> {
    const wanted = new Set(numbers);
    return new Set(
      this.snapshots
        .filter((snapshot) => snapshot.identity.kind === kind && wanted.has(snapshot.identity.number))
        .map((snapshot) => snapshot.identity.number)
    );
  }

  async listIncompleteSnapshots(limit: number, afterId: number): Promise<StoredSnapshot[]> {
    return this.snapshots
      .filter(
        (snapshot) =>
          snapshot.id > afterId &&
          (blank(snapshot.processReference) ||
            snapshot.rawPayload === null ||
            GAP_FILL_FIELDS[snapshot.identity.kind].some((name) => blank(snapshot.fields[name])))
      )
      .sort((a, b) => a.id - b.id)
      .slice(0, limit);
  }

  async versionTaken(identity: DocumentIdentity, excludeId: number): Promise<boolean> {
    return this.snapshots.some((snapshot) => snapshot.id !== excludeId && sameIdentity(snapshot.identity, identity));
  }

  async fillSnapshotGaps(id: number, fill: SnapshotGapFill): Promise<void> {
    const stored = this.snapshots.find((snapshot) => snapshot.id === id);
    if (!stored) {
      return;
    }
    for (const name of CANONICAL_FIELD_NAMES) {
      const value = fill.fields[name];
      if (value !== undefined) {
        stored.fields[name] = value;
      }
    }
    if (fill.processReference !== undefined) {
      stored.processReference = fill.processReference;
    }
    if (fill.version !== undefined) {
      stored.identity.version = fill.version;
    }
    if (fill.rawPayload !== undefined) {
      stored.rawPayload = fill.rawPayload;
    }
  }
}
