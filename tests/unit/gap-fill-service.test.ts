/**
 * Snapshot Gap Filler
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { emptyCanonicalFields } from '../../src/documents/types.js';
import type { CanonicalFields, RawPayload, StoredSnapshot } from '../../src/documents/types.js';
import { GapFillService, parsePayloadText } from '../../src/services/gap-fill-service.js';
import { DatabaseError, MalformedPayloadError } from '../../src/utils/errors.js';
import { FakeCacheRepository, FakeSourceRepository, declarationRow } from '../fixtures/fakes.js';
import { silentLogger } from '../fixtures/logger.js';
import { InMemoryDocumentRepository } from '../fixtures/memory-document-repository.js';

const cachedPayload: RawPayload = {
  situacaoDi: 'DESEMBARACADA',
  canal: 'VERDE',
  dataHoraRegistro: '01/03/2024 09:00',
  numeroRetificacao: '2',
};

const completeFields: CanonicalFields = {
  status: 'DESEMBARACADA',
  statusCode: 'DESEMBARACADA',
  channel: 'VERDE',
  situation: 'DESEMBARACADA',
  registrationDate: '2024-03-01T09:00:00Z',
  situationDate: '2024-03-05T10:00:00Z',
  clearanceDate: null,
};

describe('parsePayloadText', () => {
  it('unwraps a single-element array', () => {
    expect(parsePayloadText('[{"numero":"D1"}]')).toEqual({ numero: 'D1' });
  });

  it('rejects text that is not a key-value object', () => {
    expect(() => parsePayloadText('not json')).toThrow(MalformedPayloadError);
    expect(() => parsePayloadText('[1, 2]')).toThrow(MalformedPayloadError);
    expect(() => parsePayloadText('"text"')).toThrow(MalformedPayloadError);
  });
});

describe('GapFillService', () => {
  let documents: InMemoryDocumentRepository;
  let cache: FakeCacheRepository;
  let source: FakeSourceRepository;
  let service: GapFillService;

  function seedDeclaration(number: string, overrides: Partial<Omit<StoredSnapshot, 'id'>> = {}): StoredSnapshot {
    return documents.seed({
      identity: { number, kind: 'IMPORT_DECLARATION', version: null },
      fields: { ...emptyCanonicalFields(), status: 'EM ANALISE' },
      processReference: null,
      rawPayload: null,
      dataSource: 'TEST_SOURCE',
      updatedAt: null,
      ...overrides,
    });
  }

  beforeEach(() => {
    documents = new InMemoryDocumentRepository();
    cache = new FakeCacheRepository();
    source = new FakeSourceRepository();
    service = new GapFillService({ documents, cache, source, logger: silentLogger() });
  });

  it('fills only empty columns from the cached payload', async () => {
    const snapshot = seedDeclaration('D1');
    cache.put('IMPORT_DECLARATION', 'D1', {
      process_reference: ' IMP-7 ',
      raw_json: JSON.stringify([cachedPayload]),
    });

    const fill = await service.planFill(snapshot);

    expect(fill).toEqual({
      fields: {
        statusCode: 'DESEMBARACADA',
        channel: 'VERDE',
        situation: 'DESEMBARACADA',
        registrationDate: '2024-03-01T09:00:00',
      },
      processReference: 'IMP-7',
      rawPayload: cachedPayload,
      version: '2',
    });
  });

  it('leaves the version alone when another snapshot holds it', async () => {
    const snapshot = seedDeclaration('D1');
    seedDeclaration('D1', { identity: { number: 'D1', kind: 'IMPORT_DECLARATION', version: '2' } });
    cache.put('IMPORT_DECLARATION', 'D1', { raw_json: JSON.stringify(cachedPayload) });

    const fill = await service.planFill(snapshot);

    expect(fill?.version).toBeUndefined();
    expect(fill?.rawPayload).toEqual(cachedPayload);
  });

  it('tops up a thin payload from the authoritative store', async () => {
    const snapshot = seedDeclaration('D2', {
      fields: emptyCanonicalFields(),
      rawPayload: { numero: 'D2' },
    });
    source.declarations = [declarationRow({ number: 'D2' })];

    const fill = await service.planFill(snapshot);

    expect(fill).toEqual({
      fields: {
        status: 'DESEMBARACADA',
        statusCode: 'DESEMBARACADA',
        channel: 'VERDE',
        situation: 'DESEMBARACADA',
        registrationDate: '2024-03-01T09:00:00Z',
        situationDate: '2024-03-05T10:00:00Z',
      },
    });
  });

  it('returns null when the payload adds nothing', async () => {
    const snapshot = seedDeclaration('D3', {
      identity: { number: 'D3', kind: 'IMPORT_DECLARATION', version: '1' },
      fields: completeFields,
      processReference: 'IMP-3',
      rawPayload: { numero: 'D3' },
    });

    expect(await service.planFill(snapshot)).toBeNull();
  });

  it('applies fills and skips malformed payloads', async () => {
    seedDeclaration('D1');
    seedDeclaration('D4');
    cache.put('IMPORT_DECLARATION', 'D1', { raw_json: JSON.stringify(cachedPayload) });
    cache.put('IMPORT_DECLARATION', 'D4', { raw_json: 'not json' });

    const result = await service.run();

    expect(result).toMatchObject({ dryRun: false, candidates: 2, updated: 1, skipped: 1, errors: 0 });
    expect(documents.snapshots[0]?.fields.channel).toBe('VERDE');
    expect(documents.snapshots[0]?.fields.status).toBe('EM ANALISE');
    expect(documents.snapshots[0]?.identity.version).toBe('2');
  });

  it('plans without writing on a dry run', async () => {
    const snapshot = seedDeclaration('D1');
    cache.put('IMPORT_DECLARATION', 'D1', { raw_json: JSON.stringify(cachedPayload) });

    const result = await service.run({ dryRun: true });

    expect(result.updated).toBe(1);
    expect(result.planned.map((plan) => [plan.id, plan.number, plan.kind])).toEqual([
      [snapshot.id, 'D1', 'IMPORT_DECLARATION'],
    ]);
    expect(documents.snapshots[0]?.fields.channel).toBeNull();
    expect(documents.snapshots[0]?.rawPayload).toBeNull();
  });

  it('passes over snapshots with nothing to fill so later rows are reached', async () => {
    for (const number of ['N1', 'N2', 'N3']) {
      seedDeclaration(number, {
        identity: { number, kind: 'IMPORT_DECLARATION', version: '1' },
        fields: completeFields,
        processReference: 'IMP-3',
        rawPayload: { numero: number },
      });
    }
    const fillable = seedDeclaration('D1');
    cache.put('IMPORT_DECLARATION', 'D1', { raw_json: JSON.stringify(cachedPayload) });
    service = new GapFillService({ documents, cache, source, logger: silentLogger(), pageSize: 2 });

    const result = await service.run({ limit: 1 });

    expect(result).toMatchObject({ candidates: 4, updated: 1, skipped: 3, errors: 0 });
    expect(documents.snapshots.find((snapshot) => snapshot.id === fillable.id)?.fields.channel).toBe('VERDE');
  });

  it('stops once the limit is reached', async () => {
    seedDeclaration('D1');
    seedDeclaration('D2');
    cache.put('IMPORT_DECLARATION', 'D1', { raw_json: JSON.stringify(cachedPayload) });
    cache.put('IMPORT_DECLARATION', 'D2', { raw_json: JSON.stringify(cachedPayload) });

    const result = await service.run({ limit: 1 });

    expect(result).toMatchObject({ candidates: 1, updated: 1 });
    expect(documents.snapshots[1]?.fields.channel).toBeNull();
  });

  it('does not select a manifest for columns manifests never carry', async () => {
    seedDeclaration('172505417636125', {
      identity: { number: '172505417636125', kind: 'CARGO_MANIFEST', version: null },
      fields: { ...completeFields, channel: null, clearanceDate: '2024-05-03T10:00:00Z' },
      processReference: 'IMP-1',
      rawPayload: { situacaoCarga: 'UNLOADED' },
    });

    expect(await documents.listIncompleteSnapshots(10, 0)).toEqual([]);
    expect((await service.run()).candidates).toBe(0);
  });

  it('records write failures and moves on', async () => {
    const snapshot = seedDeclaration('D1');
    cache.put('IMPORT_DECLARATION', 'D1', { raw_json: JSON.stringify(cachedPayload) });
    vi.spyOn(documents, 'fillSnapshotGaps').mockRejectedValue(new DatabaseError('deadlock detected'));

    const result = await service.run();

    expect(result.errors).toBe(1);
    expect(result.failures).toEqual([{ id: snapshot.id, number: 'D1', error: 'deadlock detected' }]);
  });
});
