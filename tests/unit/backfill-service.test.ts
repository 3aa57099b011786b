/**
 * Historical Backfill Service
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { DocumentReconciler } from '../../src/documents/document-reconciler.js';
import { emptyCanonicalFields } from '../../src/documents/types.js';
import { BackfillService, dedupeLatest, resolveWindow } from '../../src/services/backfill-service.js';
import { ExistenceChecker } from '../../src/services/existence-checker.js';
import { DatabaseError, ValidationError } from '../../src/utils/errors.js';
import {
  FakeProcessRepository,
  FakeSourceRepository,
  declarationRow,
  unifiedDeclarationRow,
} from '../fixtures/fakes.js';
import { silentLogger } from '../fixtures/logger.js';
import { InMemoryDocumentRepository } from '../fixtures/memory-document-repository.js';

const window = resolveWindow({ year: 2024 });

describe('resolveWindow', () => {
  it('covers a whole calendar year', () => {
    expect(resolveWindow({ year: 2024 })).toEqual({
      from: new Date('2024-01-01T00:00:00Z'),
      to: new Date('2025-01-01T00:00:00Z'),
    });
  });

  it('defaults to the current year', () => {
    expect(resolveWindow({}, new Date('2026-06-15T10:00:00Z')).from).toEqual(new Date('2026-01-01T00:00:00Z'));
  });

  it('includes the whole last day of a range', () => {
    expect(resolveWindow({ from: '2024-03-01', to: '2024-03-31' })).toEqual({
      from: new Date('2024-03-01T00:00:00Z'),
      to: new Date('2024-04-01T00:00:00Z'),
    });
  });

  it('rejects ambiguous or invalid input', () => {
    expect(() => resolveWindow({ year: 2024, from: '2024-01-01' })).toThrow(ValidationError);
    expect(() => resolveWindow({ from: '2024-01-01' })).toThrow(ValidationError);
    expect(() => resolveWindow({ from: '2024-02-30', to: '2024-03-01' })).toThrow(ValidationError);
    expect(() => resolveWindow({ from: '2024-03-02', to: '2024-03-01' })).toThrow(ValidationError);
  });
});

describe('dedupeLatest', () => {
  it('keeps the most recently dated row per number', () => {
    const unique = dedupeLatest([
      { number: 'D1', datedAt: 1, row: 'old' },
      { number: 'D1', datedAt: 3, row: 'newest' },
      { number: 'D1', datedAt: 2, row: 'middle' },
      { number: 'D2', datedAt: null, row: 'undated' },
      { number: 'D2', datedAt: 0, row: 'dated' },
    ]);

    expect(unique.map((candidate) => candidate.row)).toEqual(['newest', 'dated']);
  });

  it('keeps the first row on a tie', () => {
    const unique = dedupeLatest([
      { number: 'D1', datedAt: 5, row: 'first' },
      { number: 'D1', datedAt: 5, row: 'second' },
    ]);

    expect(unique.map((candidate) => candidate.row)).toEqual(['first']);
  });
});

describe('BackfillService', () => {
  let source: FakeSourceRepository;
  let processes: FakeProcessRepository;
  let repository: InMemoryDocumentRepository;
  let service: BackfillService;

  beforeEach(() => {
    source = new FakeSourceRepository();
    processes = new FakeProcessRepository();
    repository = new InMemoryDocumentRepository();
    const logger = silentLogger();
    service = new BackfillService({
      source,
      processes,
      reconciler: new DocumentReconciler({
        repository,
        logger,
        clock: () => new Date('2024-06-01T00:00:00Z'),
      }),
      existence: new ExistenceChecker({ repository, logger, retry: { initialDelayMs: 0 } }),
      logger,
      throttleMs: 0,
      retry: { initialDelayMs: 0 },
    });
  });

  it('ingests only the latest row per declaration number', async () => {
    processes.references.set(10, 'IMP-001');
    source.declarations = [
      declarationRow({ number: 'D1', situation: 'A', registered_at: '2024-01-01T00:00:00Z' }),
      declarationRow({ number: 'D1', situation: 'B', registered_at: '2024-03-01T00:00:00Z' }),
      declarationRow({ number: 'D1', situation: 'C', registered_at: '2024-02-01T00:00:00Z' }),
      declarationRow({ number: '  ', situation: 'X' }),
      declarationRow({ number: 'D2', import_id: 99 }),
    ];

    const result = await service.run({ window, kinds: 'DI' });

    expect(result.byKind).toEqual({
      IMPORT_DECLARATION: { found: 5, unique: 2, migrated: 2, skipped: 1, unknown: 0, errors: 0 },
    });
    expect(result.total.migrated).toBe(2);
    const byNumber = new Map(repository.snapshots.map((snapshot) => [snapshot.identity.number, snapshot]));
    expect(byNumber.get('D1')?.fields.status).toBe('B');
    expect(byNumber.get('D1')?.processReference).toBe('IMP-001');
    expect(byNumber.get('D1')?.dataSource).toBe('HISTORICAL_BACKFILL');
    expect(byNumber.get('D2')?.processReference).toBe('ID:99');
  });

  it('skips numbers that already have a snapshot', async () => {
    repository.seed({
      identity: { number: 'D1', kind: 'IMPORT_DECLARATION', version: null },
      fields: emptyCanonicalFields(),
      processReference: null,
      rawPayload: null,
      dataSource: 'TEST_SOURCE',
      updatedAt: null,
    });
    source.declarations = [declarationRow({ number: 'D1' }), declarationRow({ number: 'D2' })];

    const result = await service.run({ window, kinds: 'DI' });

    expect(result.total).toEqual({ found: 2, unique: 2, migrated: 1, skipped: 1, unknown: 0, errors: 0 });
    expect(repository.snapshots).toHaveLength(2);
  });

  it('writes nothing on a dry run but reports the plan', async () => {
    source.unifiedDeclarations = [unifiedDeclarationRow({ number: 'U1', process_reference: null, import_process_id: 20 })];

    const result = await service.run({ window, kinds: 'DUIMP', dryRun: true });

    expect(result.dryRun).toBe(true);
    expect(result.total.migrated).toBe(1);
    expect(result.planned).toEqual([{ kind: 'UNIFIED_IMPORT_DECLARATION', number: 'U1', processReference: 'ID:20' }]);
    expect(repository.snapshots).toHaveLength(0);
  });

  it('migrates unified declarations under their version', async () => {
    source.unifiedDeclarations = [unifiedDeclarationRow({ number: 'U1', version: 2 })];

    await service.run({ window, kinds: 'DUIMP' });

    expect(repository.snapshots[0]?.identity).toEqual({
      number: 'U1',
      kind: 'UNIFIED_IMPORT_DECLARATION',
      version: '2',
    });
    expect(repository.snapshots[0]?.processReference).toBe('IMP-001');
    expect(repository.snapshots[0]?.fields.channel).toBe('AMARELO');
  });

  it('skips numbers of unknown existence by default', async () => {
    vi.spyOn(repository, 'findExistingNumbers').mockRejectedValue(new Error('Query read timeout'));
    source.declarations = [declarationRow({ number: 'D1' })];

    const result = await service.run({ window, kinds: 'DI' });

    expect(result.total.unknown).toBe(1);
    expect(result.total.migrated).toBe(0);
    expect(repository.snapshots).toHaveLength(0);
  });

  it('ingests numbers of unknown existence when asked to', async () => {
    vi.spyOn(repository, 'findExistingNumbers').mockRejectedValue(new Error('Query read timeout'));
    source.declarations = [declarationRow({ number: 'D1' })];

    const result = await service.run({ window, kinds: 'DI', unknownPolicy: 'ingest' });

    expect(result.total.unknown).toBe(0);
    expect(result.total.migrated).toBe(1);
    expect(repository.snapshots).toHaveLength(1);
  });

  it('counts a failed ingestion as an error after re-checking existence', async () => {
    vi.spyOn(repository, 'insertSnapshot').mockRejectedValue(new DatabaseError('disk full'));
    const lookup = vi.spyOn(repository, 'findExistingNumbers');
    source.declarations = [declarationRow({ number: 'D1' })];

    const result = await service.run({ window, kinds: 'DI' });

    expect(result.total.errors).toBe(1);
    expect(result.errors).toEqual([{ kind: 'IMPORT_DECLARATION', number: 'D1', error: 'disk full' }]);
    expect(lookup).toHaveBeenCalledTimes(2);
  });

  it('records an enumeration failure and continues with the next kind', async () => {
    vi.spyOn(source, 'listDeclarations').mockRejectedValue(new DatabaseError('permission denied'));
    source.unifiedDeclarations = [unifiedDeclarationRow({ number: 'U1' })];

    const result = await service.run({ window });

    expect(result.errors).toEqual([{ kind: 'IMPORT_DECLARATION', number: '*', error: 'permission denied' }]);
    expect(result.byKind.UNIFIED_IMPORT_DECLARATION?.migrated).toBe(1);
    expect(result.total.errors).toBe(1);
  });
});
