/**
 * Process Reconciliation Service
 *
 * Sweeps the most recently updated shipments on the process board and, for
 * each one, discovers its document numbers, merges the process row, runs the
 * documents through the reconciliation pipeline and writes the declaration's
 * financial aggregates.
 *
 * Each process is independent: a failure is counted and the sweep moves on.
 *
 * @module services/process-reconciliation-service
 */

import type { Logger } from 'pino';
import type { DocumentReconciler } from '../documents/document-reconciler.js';
import {
  fromDeclarationSource,
  fromManifestSource,
  fromUnifiedDeclarationSource,
} from '../documents/mappers.js';
import { normalizeDate, normalizeText } from '../documents/normalize.js';
import type { ReconcileResult, ResolvedObservation } from '../documents/types.js';
import type { CacheRepository, ProcessBoardRow } from '../repositories/cache-repository.js';
import type { ProcessRepository } from '../repositories/process-repository.js';
import type { DeclarationSourceRow, SourceRepository } from '../repositories/source-repository.js';
import type { FinancialAggregateWriter } from './financial-aggregate-service.js';
import type { SchemaHealer } from './schema-healer.js';

// --------------------------------------------------------------------------
// Types
// --------------------------------------------------------------------------

export interface ProcessReconciliationOptions {
  limit?: number;
  includeDocuments?: boolean;
  includeFinancials?: boolean;
}

export interface ProcessFailure {
  processReference: string;
  error: string;
}

export interface ProcessReconciliationResult {
  success: boolean;
  total: number;
  processesUpserted: number;
  documentsUpserted: number;
  valuesUpserted: number;
  taxesUpserted: number;
  skipped: number;
  errors: number;
  failures: ProcessFailure[];
}

export interface DiscoveredNumbers {
  manifestNumber: string | null;
  declarationNumber: string | null;
  unifiedDeclarationNumber: string | null;
}

export interface ProcessReconciliationServiceConfig {
  cache: CacheRepository;
  source: SourceRepository;
  processes: ProcessRepository;
  reconciler: DocumentReconciler;
  financials: FinancialAggregateWriter;
  healer: SchemaHealer;
  logger: Logger;
}

/** Sweep defaults */
const DEFAULT_OPTIONS: Required<ProcessReconciliationOptions> = {
  limit: 50,
  includeDocuments: true,
  includeFinancials: true,
};

function clean(value: string | null): string | null {
  const normalized = normalizeText(value);
  return normalized.ok ? normalized.value : null;
}

function boardDate(value: string | null): string | null {
  const normalized = normalizeDate(value);
  return normalized.ok ? normalized.value : null;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Per-process tallies, merged into the sweep result on completion */
interface ProcessTally {
  documents: number;
  values: number;
  taxes: number;
  problems: string[];
}

// --------------------------------------------------------------------------
// Service
// --------------------------------------------------------------------------

export class ProcessReconciliationService {
  private readonly cache: CacheRepository;
  private readonly source: SourceRepository;
  private readonly processes: ProcessRepository;
  private readonly reconciler: DocumentReconciler;
  private readonly financials: FinancialAggregateWriter;
  private readonly healer: SchemaHealer;
  private readonly log: Logger;

  constructor(config: ProcessReconciliationServiceConfig) {
    this.cache = config.cache;
    this.source = config.source;
    this.processes = config.processes;
    this.reconciler = config.reconciler;
    this.financials = config.financials;
    this.healer = config.healer;
    this.log = config.logger.child({ component: 'process-reconciliation' });
  }

  async run(options: ProcessReconciliationOptions = {}): Promise<ProcessReconciliationResult> {
    const cfg = { ...DEFAULT_OPTIONS, ...options };
    const result: ProcessReconciliationResult = {
      success: true,
      total: 0,
      processesUpserted: 0,
      documentsUpserted: 0,
      valuesUpserted: 0,
      taxesUpserted: 0,
      skipped: 0,
      errors: 0,
      failures: [],
    };

    await this.healer.heal();

    let board: ProcessBoardRow[];
    try {
      board = await this.cache.listProcesses(cfg.limit);
    } catch (error) {
      this.log.error({ error: errorMessage(error) }, 'Failed to read process board');
      result.success = false;
      result.errors++;
      result.failures.push({ processReference: '*', error: errorMessage(error) });
      return result;
    }

    result.total = board.length;
    this.log.info({ total: board.length, ...cfg }, 'Starting process reconciliation');

    for (const row of board) {
      const processReference = (row.process_reference ?? '').trim().toUpperCase();
      if (processReference === '') {
        result.skipped++;
        continue;
      }

      try {
        const tally = await this.reconcileProcess(processReference, row, cfg);
        result.processesUpserted++;
        result.documentsUpserted += tally.documents;
        result.valuesUpserted += tally.values;
        result.taxesUpserted += tally.taxes;

        if (tally.problems.length > 0) {
          result.errors++;
          result.failures.push({ processReference, error: tally.problems.join('; ') });
        }
      } catch (error) {
        this.log.error({ processReference, error: errorMessage(error) }, 'Process reconciliation failed');
        result.errors++;
        result.failures.push({ processReference, error: errorMessage(error) });
      }
    }

    result.success = result.errors === 0;
    this.log.info(
      {
        total: result.total,
        processesUpserted: result.processesUpserted,
        documentsUpserted: result.documentsUpserted,
        valuesUpserted: result.valuesUpserted,
        taxesUpserted: result.taxesUpserted,
        skipped: result.skipped,
        errors: result.errors,
      },
      'Process reconciliation complete'
    );
    return result;
  }

  /**
   * Cache row first, then the authoritative links
   */
  async discoverNumbers(processReference: string, row: ProcessBoardRow): Promise<DiscoveredNumbers> {
    const importId = row.import_id;

    let manifestNumber = clean(row.manifest_number);
    if (!manifestNumber && importId !== null) {
      manifestNumber = clean(await this.source.findManifestNumberByImportId(importId));
    }

    let declarationNumber = clean(row.declaration_number);
    if (!declarationNumber && importId !== null) {
      declarationNumber = clean(await this.source.findDeclarationNumberByImportId(importId));
    }

    let unifiedDeclarationNumber = clean(row.unified_declaration_number);
    if (!unifiedDeclarationNumber) {
      unifiedDeclarationNumber = clean(await this.source.findUnifiedDeclarationNumberByProcess(processReference));
    }

    return { manifestNumber, declarationNumber, unifiedDeclarationNumber };
  }

  private async reconcileProcess(
    processReference: string,
    row: ProcessBoardRow,
    cfg: Required<ProcessReconciliationOptions>
  ): Promise<ProcessTally> {
    const tally: ProcessTally = { documents: 0, values: 0, taxes: 0, problems: [] };
    const numbers = await this.discoverNumbers(processReference, row);

    await this.processes.upsertProcess({
      processReference,
      importId: row.import_id,
      ...numbers,
      shippedAt: boardDate(row.shipped_at),
      expectedArrivalAt: boardDate(row.expected_arrival_at),
      clearedAt: boardDate(row.cleared_at),
      processStatus: clean(row.stage),
    });

    let declaration: DeclarationSourceRow | null = null;

    if (cfg.includeDocuments) {
      if (numbers.manifestNumber) {
        const manifest = await this.source.findManifest(numbers.manifestNumber);
        if (manifest) {
          await this.apply(fromManifestSource(manifest, processReference, this.log), tally);
        }
      }

      if (numbers.declarationNumber) {
        declaration = await this.source.findDeclaration(numbers.declarationNumber);
        if (declaration) {
          await this.apply(fromDeclarationSource(declaration, processReference, this.log), tally);
        }
      }

      if (numbers.unifiedDeclarationNumber) {
        const unified = await this.source.findUnifiedDeclaration(numbers.unifiedDeclarationNumber, processReference);
        if (unified) {
          await this.apply(fromUnifiedDeclarationSource(unified, processReference, this.log), tally);
        }
      }
    }

    if (cfg.includeFinancials && numbers.declarationNumber) {
      declaration ??= await this.source.findDeclaration(numbers.declarationNumber);
      const declarationId = declaration?.declaration_id ?? null;
      if (declarationId !== null) {
        await this.writeFinancials(processReference, numbers.declarationNumber, Number(declarationId), tally);
      }
    }

    return tally;
  }

  private async apply(observation: ResolvedObservation | null, tally: ProcessTally): Promise<void> {
    if (!observation) {
      return;
    }
    const outcome: ReconcileResult = await this.reconciler.reconcileResolved(observation);
    if (outcome.snapshot === 'inserted' || outcome.snapshot === 'updated') {
      tally.documents++;
    } else if (outcome.snapshot === 'failed') {
      tally.problems.push(`${observation.identity.kind} ${observation.identity.number}: ${outcome.error ?? 'failed'}`);
    }
  }

  private async writeFinancials(
    processReference: string,
    declarationNumber: string,
    declarationId: number,
    tally: ProcessTally
  ): Promise<void> {
    const target = {
      processReference,
      documentNumber: declarationNumber,
      documentKind: 'IMPORT_DECLARATION' as const,
    };

    const values = await this.source.findDeclarationValues(declarationId);
    if (values) {
      const written = await this.financials.writeMerchandiseValues(target, values);
      tally.values += written.written;
      if (!written.success) {
        tally.problems.push(`merchandise values: ${written.error}`);
      }
    }

    const payments = await this.source.listDeclarationPayments(declarationId);
    if (payments.length > 0) {
      const written = await this.financials.writeTaxes(target, payments);
      tally.taxes += written.written;
      if (!written.success) {
        tally.problems.push(`taxes: ${written.error}`);
      }
    }
  }
}
