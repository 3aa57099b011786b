/**
 * Financial Aggregate Writer
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { FinancialAggregateWriter, resolveTaxType, toAmount } from '../../src/services/financial-aggregate-service.js';
import type { FinancialTarget } from '../../src/services/financial-aggregate-service.js';
import type { DeclarationPaymentRow, DeclarationValueRow } from '../../src/repositories/source-repository.js';
import { DatabaseError, StorageUnavailableError } from '../../src/utils/errors.js';
import { FakeFinancialRepository } from '../fixtures/fakes.js';
import { silentLogger } from '../fixtures/logger.js';

const target: FinancialTarget = {
  processReference: 'IMP-001',
  documentNumber: '2401234567',
  documentKind: 'IMPORT_DECLARATION',
};

function valueRow(overrides: Partial<DeclarationValueRow> = {}): DeclarationValueRow {
  return {
    vmld_usd: null,
    vmld_brl: null,
    vmle_usd: null,
    vmle_brl: null,
    freight_usd: null,
    freight_brl: null,
    insurance_usd: null,
    insurance_brl: null,
    ...overrides,
  };
}

function payment(overrides: Partial<DeclarationPaymentRow> = {}): DeclarationPaymentRow {
  return {
    revenue_code: '0086',
    revenue_description: 'Imposto de Importação',
    rectification_number: null,
    total_amount: '100',
    paid_at: null,
    ...overrides,
  };
}

describe('resolveTaxType', () => {
  it('classifies by revenue code, padded or not', () => {
    expect(resolveTaxType('0086', null)).toBe('II');
    expect(resolveTaxType('086', null)).toBe('II');
    expect(resolveTaxType(38, null)).toBe('IPI');
    expect(resolveTaxType(' 5629 ', null)).toBe('COFINS');
  });

  it('falls back to description keywords', () => {
    expect(resolveTaxType('9999', 'Direito antidumping')).toBe('ANTIDUMPING');
    expect(resolveTaxType(null, 'Taxa de utilização Siscomex')).toBe('SISCOMEX_FEE');
    expect(resolveTaxType(null, 'Contribuição COFINS')).toBe('COFINS');
    expect(resolveTaxType(null, 'Imposto de Importação')).toBe('II');
  });

  it('returns OTHER when nothing matches', () => {
    expect(resolveTaxType('9999', 'Multa de mora')).toBe('OTHER');
    expect(resolveTaxType(null, null)).toBe('OTHER');
  });
});

describe('toAmount', () => {
  it('accepts positive finite amounts only', () => {
    expect(toAmount('1000.50')).toBe(1000.5);
    expect(toAmount(' 12 ')).toBe(12);
    expect(toAmount(0)).toBeNull();
    expect(toAmount(-5)).toBeNull();
    expect(toAmount('abc')).toBeNull();
    expect(toAmount(null)).toBeNull();
  });
});

describe('FinancialAggregateWriter', () => {
  let repository: FakeFinancialRepository;
  let writer: FinancialAggregateWriter;

  beforeEach(() => {
    repository = new FakeFinancialRepository();
    writer = new FinancialAggregateWriter({ repository, logger: silentLogger() });
  });

  it('writes one row per positive value column', async () => {
    const result = await writer.writeMerchandiseValues(
      target,
      valueRow({ vmld_brl: '1000.50', vmld_usd: 200, vmle_usd: '0', freight_brl: 'abc', insurance_brl: ' 12 ' })
    );

    expect(result).toEqual({ success: true, written: 3 });
    expect(repository.values.map((value) => [value.valueType, value.currency, value.amount])).toEqual([
      ['VMLD', 'BRL', 1000.5],
      ['VMLD', 'USD', 200],
      ['INSURANCE', 'BRL', 12],
    ]);
    expect(repository.values[0]).toMatchObject({
      processReference: 'IMP-001',
      documentNumber: '2401234567',
      documentKind: 'IMPORT_DECLARATION',
      dataSource: 'AUTHORITATIVE_DB',
    });
  });

  it('writes classified taxes and skips zero payments', async () => {
    const result = await writer.writeTaxes(target, [
      payment({ rectification_number: '1', total_amount: '150.25', paid_at: '2024-03-10' }),
      payment({ revenue_code: 7811, revenue_description: 'Taxa Siscomex', total_amount: 0 }),
      payment({ revenue_code: '5602', revenue_description: null, rectification_number: 'x', paid_at: '10/03/2024' }),
    ]);

    expect(result).toEqual({ success: true, written: 2 });
    expect(repository.taxes[0]).toMatchObject({
      taxType: 'II',
      revenueCode: '0086',
      amountBrl: 150.25,
      paidAt: '2024-03-10',
      rectificationNumber: 1,
    });
    expect(repository.taxes[0]?.rawPayload).toEqual({
      codigoReceita: '0086',
      descricaoReceita: 'Imposto de Importação',
      valorTotal: 150.25,
      dataPagamento: '2024-03-10',
      numeroRetificacao: '1',
    });
    expect(repository.taxes[1]).toMatchObject({
      taxType: 'PIS',
      revenueCode: '5602',
      amountBrl: 100,
      paidAt: '2024-03-10',
      rectificationNumber: null,
    });
  });

  it('counts natural-key conflicts as written', async () => {
    vi.spyOn(repository, 'upsertImportTax').mockRejectedValueOnce(
      new DatabaseError('duplicate key value violates unique constraint', '23505')
    );

    const result = await writer.writeTaxes(target, [payment(), payment({ revenue_code: '1038' })]);

    expect(result).toEqual({ success: true, written: 2 });
  });

  it('stops with a marker when storage becomes unavailable', async () => {
    const upsert = vi
      .spyOn(repository, 'upsertMerchandiseValue')
      .mockResolvedValueOnce(undefined)
      .mockRejectedValueOnce(new StorageUnavailableError());

    const result = await writer.writeMerchandiseValues(target, valueRow({ vmld_brl: 1, vmld_usd: 2, vmle_brl: 3 }));

    expect(result).toEqual({ success: false, written: 1, error: 'STORAGE_UNAVAILABLE' });
    expect(upsert).toHaveBeenCalledTimes(2);
  });

  it('continues past other failures and reports the last one', async () => {
    vi.spyOn(repository, 'upsertMerchandiseValue').mockRejectedValueOnce(new DatabaseError('value too long'));

    const result = await writer.writeMerchandiseValues(target, valueRow({ vmld_brl: 1, vmld_usd: 2 }));

    expect(result).toEqual({
      success: false,
      written: 1,
      error: '1 merchandise value write(s) failed: value too long',
    });
    expect(repository.values).toHaveLength(1);
  });
});
