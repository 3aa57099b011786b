/**
 * Document Reconciler: the full extract, diff, history, snapshot pipeline
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { DocumentReconciler } from '../../src/documents/document-reconciler.js';
import type { DocumentObservation } from '../../src/documents/types.js';
import { DatabaseError } from '../../src/utils/errors.js';
import { FakeCacheRepository } from '../fixtures/fakes.js';
import { capturingLogger, silentLogger } from '../fixtures/logger.js';
import { InMemoryDocumentRepository } from '../fixtures/memory-document-repository.js';

const NOW = new Date('2024-05-02T12:00:00Z');
const MANIFEST = '172505417636125';

function manifest(status: string, overrides: Partial<DocumentObservation> = {}): DocumentObservation {
  return {
    number: MANIFEST,
    kind: 'CARGO_MANIFEST',
    payload: { situacaoCarga: status },
    source: 'CACHE_POLLER',
    ...overrides,
  };
}

describe('DocumentReconciler', () => {
  let repository: InMemoryDocumentRepository;
  let reconciler: DocumentReconciler;

  beforeEach(() => {
    repository = new InMemoryDocumentRepository();
    reconciler = new DocumentReconciler({ repository, logger: silentLogger(), clock: () => NOW });
  });

  it('creates a snapshot without history on first observation', async () => {
    const result = await reconciler.reconcile(manifest('UNLOADED'));

    expect(result).toEqual({
      identity: { number: MANIFEST, kind: 'CARGO_MANIFEST', version: null },
      changes: [],
      snapshot: 'inserted',
    });
    expect(repository.snapshots).toHaveLength(1);
    expect(repository.snapshots[0]?.fields.status).toBe('UNLOADED');
    expect(repository.history).toHaveLength(0);
  });

  it('records a status transition and updates the same snapshot', async () => {
    await reconciler.reconcile(manifest('UNLOADED'));
    const result = await reconciler.reconcile(manifest('LINKED_TO_CLEARANCE_DOCUMENT'));

    expect(result.snapshot).toBe('updated');
    expect(result.changes).toEqual([
      {
        historyId: 1,
        number: MANIFEST,
        kind: 'CARGO_MANIFEST',
        eventKind: 'STATUS_CHANGE',
        field: 'status',
        previous: 'UNLOADED',
        new: 'LINKED_TO_CLEARANCE_DOCUMENT',
      },
    ]);
    expect(repository.snapshots).toHaveLength(1);
    expect(repository.snapshots[0]?.fields.status).toBe('LINKED_TO_CLEARANCE_DOCUMENT');
    expect(repository.history).toHaveLength(1);
    expect(repository.history[0]?.documentId).toBe(repository.snapshots[0]?.id);
  });

  it('is idempotent for a repeated payload', async () => {
    await reconciler.reconcile(manifest('UNLOADED'));
    const updatedAt = repository.snapshots[0]?.updatedAt;
    const update = vi.spyOn(repository, 'updateSnapshot');

    const result = await reconciler.reconcile(manifest('UNLOADED'));

    expect(result.snapshot).toBe('unchanged');
    expect(repository.snapshots[0]?.updatedAt).toEqual(updatedAt);
    expect(result.changes).toEqual([]);
    expect(update).not.toHaveBeenCalled();
    expect(repository.snapshots).toHaveLength(1);
    expect(repository.history).toHaveLength(0);
  });

  it('keeps versions of one declaration apart', async () => {
    const declaration = (version: number): DocumentObservation => ({
      number: '2401234567',
      kind: 'IMPORT_DECLARATION',
      payload: { situacaoDi: 'REGISTRADA', numeroRetificacao: version },
      source: 'TEST_SOURCE',
    });

    await reconciler.reconcile(declaration(1));
    await reconciler.reconcile(declaration(2));

    expect(repository.snapshots.map((snapshot) => snapshot.identity.version)).toEqual(['1', '2']);
    expect(repository.history).toHaveLength(0);
  });

  it('never clears a stored value from a partial payload', async () => {
    await reconciler.reconcile(manifest('UNLOADED'));

    const result = await reconciler.reconcile({ ...manifest('UNLOADED'), payload: { outroCampo: 'x' } });

    expect(result.changes).toEqual([]);
    expect(result.snapshot).toBe('unchanged');
    expect(repository.snapshots[0]?.fields.status).toBe('UNLOADED');
  });

  it('stores a process reference that becomes available later', async () => {
    await reconciler.reconcile(manifest('UNLOADED'));

    const result = await reconciler.reconcile(manifest('UNLOADED', { processReference: ' IMP-9 ' }));

    expect(result.snapshot).toBe('updated');
    expect(result.changes).toEqual([]);
    expect(repository.snapshots[0]?.processReference).toBe('IMP-9');
  });

  it('fails fast on an empty document number', async () => {
    const result = await reconciler.reconcile(manifest('UNLOADED', { number: '  ' }));

    expect(result).toEqual({
      identity: { number: '', kind: 'CARGO_MANIFEST', version: null },
      changes: [],
      snapshot: 'failed',
      error: 'Document number is required',
    });
    expect(repository.snapshots).toHaveLength(0);
  });

  it('reports a failed snapshot lookup', async () => {
    vi.spyOn(repository, 'findSnapshot').mockRejectedValueOnce(new DatabaseError('relation does not exist'));

    const result = await reconciler.reconcile(manifest('UNLOADED'));

    expect(result.snapshot).toBe('failed');
    expect(result.error).toBe('relation does not exist');
  });

  it('writes no history for a new identity even when the cache differs', async () => {
    const cache = new FakeCacheRepository();
    cache.put('CARGO_MANIFEST', MANIFEST, { status: 'UNLOADED', status_at: '2024-05-01T08:00:00Z' });
    const { logger, lines } = capturingLogger();
    reconciler = new DocumentReconciler({ repository, cache, logger, clock: () => NOW });

    const result = await reconciler.reconcile(manifest('LINKED_TO_CLEARANCE_DOCUMENT'));

    expect(result.snapshot).toBe('inserted');
    expect(result.changes).toEqual([]);
    expect(repository.history).toHaveLength(0);
    const drift = lines.find((line) => line.msg === 'First observation differs from cached state');
    expect(drift?.drift).toEqual([{ field: 'status', cached: 'UNLOADED', observed: 'LINKED_TO_CLEARANCE_DOCUMENT' }]);
  });

  it('ignores the cache once a canonical snapshot exists', async () => {
    const cache = new FakeCacheRepository();
    cache.put('CARGO_MANIFEST', MANIFEST, { status: 'SOMETHING_ELSE' });
    reconciler = new DocumentReconciler({ repository, cache, logger: silentLogger(), clock: () => NOW });

    await reconciler.reconcile(manifest('UNLOADED'));
    const history = repository.history.length;
    const result = await reconciler.reconcile(manifest('UNLOADED'));

    expect(result.changes).toEqual([]);
    expect(repository.history).toHaveLength(history);
  });

  it('resolves the rectification number as the declaration version', async () => {
    const result = await reconciler.reconcile({
      number: '2401234567',
      kind: 'IMPORT_DECLARATION',
      payload: { situacaoDi: 'REGISTRADA', sequencialRetificacao: '3' },
      source: 'TEST_SOURCE',
    });

    expect(result.identity).toEqual({ number: '2401234567', kind: 'IMPORT_DECLARATION', version: '3' });
  });
});
