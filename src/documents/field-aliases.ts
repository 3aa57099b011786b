/**
 * Upstream Field Alias Table
 *
 * Each canonical field has an ordered list of source-key spellings per
 * document kind. Onboarding a new upstream origin means adding its spellings
 * to `data/field-aliases.json`.
 *
 * @module documents/field-aliases
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ValidationError } from '../utils/errors.js';

const aliasListSchema = z.array(z.string().min(1));

const fieldAliasesSchema = z.object({
  status: aliasListSchema,
  statusCode: aliasListSchema,
  channel: aliasListSchema,
  situation: aliasListSchema,
  registrationDate: aliasListSchema,
  situationDate: aliasListSchema,
  clearanceDate: aliasListSchema,
});

const perKind = <T extends z.ZodTypeAny>(schema: T) =>
  z.object({
    CARGO_MANIFEST: schema,
    IMPORT_DECLARATION: schema,
    UNIFIED_IMPORT_DECLARATION: schema,
    TERMINAL_CONTROL: schema,
  });

export const aliasTableSchema = z.object({
  fields: perKind(fieldAliasesSchema),
  versions: perKind(aliasListSchema),
});

export type AliasTable = z.infer<typeof aliasTableSchema>;
export type FieldAliases = z.infer<typeof fieldAliasesSchema>;

export const DEFAULT_ALIAS_TABLE_PATH = new URL('../../data/field-aliases.json', import.meta.url);

/**
 * Parse and validate an alias table
 */
export function parseAliasTable(raw: unknown): AliasTable {
  const result = aliasTableSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ValidationError(`Invalid field alias table: ${issues.join('; ')}`, 'aliases');
  }
  return result.data;
}

export function loadAliasTable(path: string | URL = DEFAULT_ALIAS_TABLE_PATH): AliasTable {
  const text = readFileSync(path, 'utf8');
  return parseAliasTable(JSON.parse(text));
}

let defaultTable: AliasTable | null = null;

/**
 * The bundled alias table, read once per process
 */
export function getDefaultAliasTable(): AliasTable {
  if (!defaultTable) {
    defaultTable = loadAliasTable();
  }
  return defaultTable;
}
