/**
 * Financial Repository
 *
 * Keyed upserts of declared merchandise values and paid import taxes.
 *
 * @module repositories/financial-repository
 */

import type { SqlExecutor } from '../db/executor.js';
import { queryRows } from '../db/executor.js';
import type { DocumentKind, RawPayload } from '../documents/types.js';

export type MerchandiseValueType =
  | 'DISCHARGE'
  | 'SHIPMENT'
  | 'VMLE'
  | 'VMLD'
  | 'FOB'
  | 'CIF'
  | 'FREIGHT'
  | 'INSURANCE';

export type Currency = 'BRL' | 'USD';

export type TaxType = 'II' | 'IPI' | 'PIS' | 'COFINS' | 'ANTIDUMPING' | 'SISCOMEX_FEE' | 'OTHER';

export interface MerchandiseValueRecord {
  processReference: string;
  documentNumber: string;
  documentKind: DocumentKind;
  valueType: MerchandiseValueType;
  currency: Currency;
  amount: number;
  dataSource: string;
}

export interface ImportTaxRecord {
  processReference: string;
  documentNumber: string;
  documentKind: DocumentKind;
  taxType: TaxType;
  revenueCode: string | null;
  description: string | null;
  amountBrl: number;
  paidAt: string | null;
  rectificationNumber: number | null;
  dataSource: string;
  rawPayload: RawPayload;
}

export interface FinancialRepository {
  upsertMerchandiseValue(record: MerchandiseValueRecord): Promise<void>;
  upsertImportTax(record: ImportTaxRecord): Promise<void>;
}

export class PgFinancialRepository implements FinancialRepository {
  private readonly executor: SqlExecutor;

  constructor(config: { executor: SqlExecutor }) {
    this.executor = config.executor;
  }

  async upsertMerchandiseValue(record: MerchandiseValueRecord): Promise<void> {
    await queryRows(this.executor, {
      text: `INSERT INTO merchandise_value (
               process_reference, document_number, document_kind, value_type, currency, amount, data_source
             ) VALUES ($1, $2, $3, $4, $5, $6, $7)
             ON CONFLICT (process_reference, document_number, document_kind, value_type, currency)
             DO UPDATE SET amount = EXCLUDED.amount,
                           data_source = EXCLUDED.data_source,
                           updated_at = NOW()`,
      values: [
        record.processReference,
        record.documentNumber,
        record.documentKind,
        record.valueType,
        record.currency,
        record.amount,
        record.dataSource,
      ],
    });
  }

  async upsertImportTax(record: ImportTaxRecord): Promise<void> {
    await queryRows(this.executor, {
      text: `INSERT INTO import_tax (
               process_reference, document_number, document_kind, tax_type, revenue_code,
               description, amount_brl, paid_at, paid, rectification_number, data_source, raw_payload
             ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, TRUE, $9, $10, $11::jsonb)
             ON CONFLICT (process_reference, document_number, document_kind, tax_type, (COALESCE(rectification_number, -1)))
             DO UPDATE SET amount_brl = EXCLUDED.amount_brl,
                           revenue_code = EXCLUDED.revenue_code,
                           description = EXCLUDED.description,
                           paid_at = COALESCE(EXCLUDED.paid_at, import_tax.paid_at),
                           raw_payload = EXCLUDED.raw_payload,
                           updated_at = NOW()`,
      values: [
        record.processReference,
        record.documentNumber,
        record.documentKind,
        record.taxType,
        record.revenueCode,
        record.description,
        record.amountBrl,
        record.paidAt,
        record.rectificationNumber,
        record.dataSource,
        JSON.stringify(record.rawPayload),
      ],
    });
  }
}
