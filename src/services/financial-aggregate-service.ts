/**
 * Financial Aggregate Writer
 *
 * Writes declared merchandise values and paid taxes of an import
 * declaration. Natural-key conflicts count as written; an unreachable store
 * ends the batch with an explicit STORAGE_UNAVAILABLE marker.
 *
 * @module services/financial-aggregate-service
 */

import type { Logger } from 'pino';
import { DATA_SOURCES } from '../documents/mappers.js';
import { normalizeDate } from '../documents/normalize.js';
import type { DocumentKind } from '../documents/types.js';
import type {
  Currency,
  FinancialRepository,
  MerchandiseValueType,
  TaxType,
} from '../repositories/financial-repository.js';
import type { DeclarationPaymentRow, DeclarationValueRow } from '../repositories/source-repository.js';
import { StorageUnavailableError, isUniqueViolation } from '../utils/errors.js';

// --------------------------------------------------------------------------
// Types
// --------------------------------------------------------------------------

export type FinancialWriteResult =
  | { success: true; written: number }
  | { success: false; written: number; error: string };

export interface FinancialTarget {
  processReference: string;
  documentNumber: string;
  documentKind: DocumentKind;
}

// --------------------------------------------------------------------------
// Tax Classification
// --------------------------------------------------------------------------

/** Federal revenue codes, in both padded and short forms */
export const REVENUE_CODE_TAX_TYPES: Readonly<Record<string, TaxType>> = {
  '0086': 'II',
  '86': 'II',
  '1038': 'IPI',
  '38': 'IPI',
  '5602': 'PIS',
  '602': 'PIS',
  '5629': 'COFINS',
  '629': 'COFINS',
  '5529': 'ANTIDUMPING',
  '529': 'ANTIDUMPING',
  '7811': 'SISCOMEX_FEE',
  '811': 'SISCOMEX_FEE',
};

/** Checked in order; the first keyword found in the description wins */
const DESCRIPTION_KEYWORDS: ReadonlyArray<readonly [string, TaxType]> = [
  ['ANTIDUMPING', 'ANTIDUMPING'],
  ['ANTI-DUMPING', 'ANTIDUMPING'],
  ['SISCOMEX', 'SISCOMEX_FEE'],
  ['COFINS', 'COFINS'],
  ['PIS', 'PIS'],
  ['IPI', 'IPI'],
  ['IMPOSTO DE IMPORTACAO', 'II'],
  ['IMPORTACAO', 'II'],
];

function foldText(value: string): string {
  return value.normalize('NFD').replace(/[\u0300-\u036f]/g, '').toUpperCase();
}

export function resolveTaxType(code: string | number | null, description: string | null): TaxType {
  if (code !== null) {
    const text = String(code).trim();
    const byCode = REVENUE_CODE_TAX_TYPES[text] ?? REVENUE_CODE_TAX_TYPES[text.replace(/^0+/, '')];
    if (byCode) {
      return byCode;
    }
  }

  if (description) {
    const folded = foldText(description);
    for (const [keyword, taxType] of DESCRIPTION_KEYWORDS) {
      if (folded.includes(keyword)) {
        return taxType;
      }
    }
  }

  return 'OTHER';
}

/**
 * Positive finite amount, or null
 */
export function toAmount(value: string | number | null): number | null {
  if (value === null) {
    return null;
  }
  const amount = typeof value === 'number' ? value : Number(String(value).trim());
  return Number.isFinite(amount) && amount > 0 ? amount : null;
}

const VALUE_COLUMNS: ReadonlyArray<
  readonly [keyof DeclarationValueRow, MerchandiseValueType, Currency]
> = [
  ['vmld_brl', 'VMLD', 'BRL'],
  ['vmld_usd', 'VMLD', 'USD'],
  ['vmle_brl', 'VMLE', 'BRL'],
  ['vmle_usd', 'VMLE', 'USD'],
  ['freight_brl', 'FREIGHT', 'BRL'],
  ['freight_usd', 'FREIGHT', 'USD'],
  ['insurance_brl', 'INSURANCE', 'BRL'],
  ['insurance_usd', 'INSURANCE', 'USD'],
];

// --------------------------------------------------------------------------
// Writer
// --------------------------------------------------------------------------

export class FinancialAggregateWriter {
  private readonly repository: FinancialRepository;
  private readonly log: Logger;

  constructor(config: { repository: FinancialRepository; logger: Logger }) {
    this.repository = config.repository;
    this.log = config.logger.child({ component: 'financial-writer' });
  }

  async writeMerchandiseValues(target: FinancialTarget, values: DeclarationValueRow): Promise<FinancialWriteResult> {
    const writes: Array<() => Promise<void>> = [];

    for (const [column, valueType, currency] of VALUE_COLUMNS) {
      const amount = toAmount(values[column]);
      if (amount === null) {
        continue;
      }
      writes.push(() =>
        this.repository.upsertMerchandiseValue({
          ...target,
          valueType,
          currency,
          amount,
          dataSource: DATA_SOURCES.authoritative,
        })
      );
    }

    return this.runWrites(target, 'merchandise value', writes);
  }

  async writeTaxes(target: FinancialTarget, payments: readonly DeclarationPaymentRow[]): Promise<FinancialWriteResult> {
    const writes: Array<() => Promise<void>> = [];

    for (const payment of payments) {
      const amount = toAmount(payment.total_amount);
      if (amount === null) {
        continue;
      }
      const paidAt = normalizeDate(payment.paid_at);
      const rectification = payment.rectification_number === null ? null : Number(payment.rectification_number);
      const revenueCode = payment.revenue_code === null ? null : String(payment.revenue_code).trim();

      writes.push(() =>
        this.repository.upsertImportTax({
          ...target,
          taxType: resolveTaxType(payment.revenue_code, payment.revenue_description),
          revenueCode,
          description: payment.revenue_description,
          amountBrl: amount,
          paidAt: paidAt.ok ? paidAt.value : null,
          rectificationNumber: rectification !== null && Number.isInteger(rectification) ? rectification : null,
          dataSource: DATA_SOURCES.authoritative,
          rawPayload: {
            codigoReceita: revenueCode,
            descricaoReceita: payment.revenue_description,
            valorTotal: amount,
            dataPagamento: paidAt.ok ? paidAt.value : null,
            numeroRetificacao: payment.rectification_number,
          },
        })
      );
    }

    return this.runWrites(target, 'import tax', writes);
  }

  private async runWrites(
    target: FinancialTarget,
    label: string,
    writes: ReadonlyArray<() => Promise<void>>
  ): Promise<FinancialWriteResult> {
    let written = 0;
    let failed = 0;
    let lastError = '';

    for (const write of writes) {
      try {
        await write();
        written++;
      } catch (error) {
        if (isUniqueViolation(error)) {
          written++;
          continue;
        }
        if (error instanceof StorageUnavailableError) {
          this.log.error({ processReference: target.processReference, label }, 'Storage unavailable');
          return { success: false, written, error: 'STORAGE_UNAVAILABLE' };
        }
        failed++;
        lastError = error instanceof Error ? error.message : String(error);
        this.log.error(
          { processReference: target.processReference, documentNumber: target.documentNumber, label, error: lastError },
          'Failed to write financial aggregate'
        );
      }
    }

    if (failed > 0) {
      return { success: false, written, error: `${failed} ${label} write(s) failed: ${lastError}` };
    }
    return { success: true, written };
  }
}
