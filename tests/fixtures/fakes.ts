/**
 * In-memory stand-ins for the source, cache, process and financial ports.
 */

import type { CacheRepository, CachedDocumentRow, ProcessBoardRow } from '../../src/repositories/cache-repository.js';
import type {
  FinancialRepository,
  ImportTaxRecord,
  MerchandiseValueRecord,
} from '../../src/repositories/financial-repository.js';
import type { ProcessRecord, ProcessRepository } from '../../src/repositories/process-repository.js';
import type {
  DeclarationPaymentRow,
  DeclarationSourceRow,
  DeclarationValueRow,
  ManifestSourceRow,
  SourceRepository,
  TimeWindow,
  UnifiedDeclarationSourceRow,
} from '../../src/repositories/source-repository.js';
import type { DocumentKind } from '../../src/documents/types.js';

// =============================================================================
// Row builders
// =============================================================================

export function declarationRow(overrides: Partial<DeclarationSourceRow> = {}): DeclarationSourceRow {
  return {
    declaration_id: 1,
    number: '2401234567',
    situation: 'DESEMBARACADA',
    situation_at: '2024-03-05T10:00:00Z',
    cargo_delivery_status: null,
    rectification_seq: null,
    channel: 'VERDE',
    registered_at: '2024-03-01T09:00:00Z',
    cleared_at: null,
    delivery_authorized_at: null,
    import_id: 10,
    ...overrides,
  };
}

export function unifiedDeclarationRow(
  overrides: Partial<UnifiedDeclarationSourceRow> = {}
): UnifiedDeclarationSourceRow {
  return {
    number: '24BR0000001234',
    version: '1',
    process_reference: 'IMP-001',
    import_process_id: 20,
    registered_at: '2024-04-01T09:00:00Z',
    last_situation: 'REGISTRADA',
    last_event_at: '2024-04-02T09:00:00Z',
    consolidated_channel: 'AMARELO',
    ...overrides,
  };
}

export function manifestRow(overrides: Partial<ManifestSourceRow> = {}): ManifestSourceRow {
  return {
    number: '172505417636125',
    cargo_status: 'UNLOADED',
    cargo_status_at: '2024-05-01T08:00:00Z',
    issued_at: '2024-04-20T08:00:00Z',
    final_destination_at: null,
    vessel: 'TEST VESSEL',
    origin_port: 'CNSHA',
    destination_port: 'BRSSZ',
    origin_country: 'CN',
    ...overrides,
  };
}

export function boardRow(overrides: Partial<ProcessBoardRow> = {}): ProcessBoardRow {
  return {
    process_reference: 'imp-001',
    import_id: 10,
    stage: 'IN_TRANSIT',
    shipped_at: '2024-04-10',
    expected_arrival_at: '2024-05-01',
    cleared_at: null,
    manifest_number: null,
    declaration_number: null,
    unified_declaration_number: null,
    ...overrides,
  };
}

// =============================================================================
// Source
// =============================================================================

export class FakeSourceRepository implements SourceRepository {
  declarations: DeclarationSourceRow[] = [];
  unifiedDeclarations: UnifiedDeclarationSourceRow[] = [];
  manifests: ManifestSourceRow[] = [];
  manifestLinks = new Map<number, string>();
  declarationLinks = new Map<number, string>();
  payments = new Map<number, DeclarationPaymentRow[]>();
  values = new Map<number, DeclarationValueRow>();

  async listDeclarations(_window: TimeWindow, limit: number | null): Promise<DeclarationSourceRow[]> {
    return limit === null ? [...this.declarations] : this.declarations.slice(0, limit);
  }

  async listUnifiedDeclarations(_window: TimeWindow, limit: number | null): Promise<UnifiedDeclarationSourceRow[]> {
    return limit === null ? [...this.unifiedDeclarations] : this.unifiedDeclarations.slice(0, limit);
  }

  async findManifestNumberByImportId(importId: number): Promise<string | null> {
    return this.manifestLinks.get(importId) ?? null;
  }

  async findDeclarationNumberByImportId(importId: number): Promise<string | null> {
    return this.declarationLinks.get(importId) ?? null;
  }

  async findUnifiedDeclarationNumberByProcess(processReference: string): Promise<string | null> {
    return this.unifiedDeclarations.find((row) => row.process_reference === processReference)?.number ?? null;
  }

  async findManifest(number: string): Promise<ManifestSourceRow | null> {
    return this.manifests.find((row) => row.number === number) ?? null;
  }

  async findDeclaration(number: string): Promise<DeclarationSourceRow | null> {
    return this.declarations.find((row) => row.number === number) ?? null;
  }

  async findUnifiedDeclaration(
    number: string,
    processReference: string | null
  ): Promise<UnifiedDeclarationSourceRow | null> {
    return (
      this.unifiedDeclarations.find(
        (row) => row.number === number || (processReference !== null && row.process_reference === processReference)
      ) ?? null
    );
  }

  async listDeclarationPayments(declarationId: number): Promise<DeclarationPaymentRow[]> {
    return this.payments.get(declarationId) ?? [];
  }

  async findDeclarationValues(declarationId: number): Promise<DeclarationValueRow | null> {
    return this.values.get(declarationId) ?? null;
  }
}

// =============================================================================
// Cache
// =============================================================================

export class FakeCacheRepository implements CacheRepository {
  documents = new Map<string, CachedDocumentRow>();
  board: ProcessBoardRow[] = [];

  put(kind: DocumentKind, number: string, row: Partial<CachedDocumentRow>): void {
    this.documents.set(`${kind}:${number}`, {
      status: null,
      status_at: null,
      channel: null,
      process_reference: null,
      raw_json: null,
      ...row,
    });
  }

  async findDocument(number: string, kind: DocumentKind): Promise<CachedDocumentRow | null> {
    return this.documents.get(`${kind}:${number}`) ?? null;
  }

  async listProcesses(limit: number): Promise<ProcessBoardRow[]> {
    return this.board.slice(0, limit);
  }
}

// =============================================================================
// Processes & Financials
// =============================================================================

export class FakeProcessRepository implements ProcessRepository {
  records = new Map<string, ProcessRecord>();
  references = new Map<number, string>();

  async upsertProcess(record: ProcessRecord): Promise<void> {
    this.records.set(record.processReference, record);
  }

  async findProcessReferencesByImportIds(importIds: readonly number[]): Promise<Map<number, string>> {
    const found = new Map<number, string>();
    for (const id of importIds) {
      const reference = this.references.get(id);
      if (reference !== undefined) {
        found.set(id, reference);
      }
    }
    return found;
  }
}

export class FakeFinancialRepository implements FinancialRepository {
  values: MerchandiseValueRecord[] = [];
  taxes: ImportTaxRecord[] = [];

  async upsertMerchandiseValue(record: MerchandiseValueRecord): Promise<void> {
    this.values.push(record);
  }

  async upsertImportTax(record: ImportTaxRecord): Promise<void> {
    this.taxes.push(record);
  }
}
