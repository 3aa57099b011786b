/**
 * Field Extractor
 *
 * Projects a loosely shaped upstream payload onto the canonical field set of
 * its document kind. For every canonical field the first non-empty alias
 * wins; unparseable values are logged and treated as absent.
 *
 * @module documents/field-extractor
 */

import type { Logger } from 'pino';
import { logger as rootLogger } from '../utils/logger.js';
import { getDefaultAliasTable } from './field-aliases.js';
import type { AliasTable } from './field-aliases.js';
import { isBlank, isRecord, normalizeDate, normalizeText } from './normalize.js';
import {
  CANONICAL_FIELD_NAMES,
  DATE_FIELD_NAMES,
  emptyCanonicalFields,
} from './types.js';
import type {
  CanonicalFields,
  DocumentFields,
  DocumentKind,
  RawPayload,
} from './types.js';

export interface ExtractionContext {
  aliases: AliasTable;
  logger: Logger;
}

export function defaultExtractionContext(): ExtractionContext {
  return {
    aliases: getDefaultAliasTable(),
    logger: rootLogger.child({ component: 'field-extractor' }),
  };
}

/**
 * Read a key, or a dotted path through nested objects
 */
export function readPath(payload: RawPayload, alias: string): unknown {
  if (alias in payload) {
    return payload[alias];
  }
  if (!alias.includes('.')) {
    return undefined;
  }

  let current: unknown = payload;
  for (const segment of alias.split('.')) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[segment];
  }
  return current;
}

/**
 * First alias whose value is not blank
 */
export function firstPresent(
  payload: RawPayload,
  aliases: readonly string[]
): { alias: string; value: unknown } | null {
  for (const alias of aliases) {
    const value = readPath(payload, alias);
    if (!isBlank(value)) {
      return { alias, value };
    }
  }
  return null;
}

/**
 * Attach the kind tag to canonical fields
 */
export function tagFields(kind: DocumentKind, fields: CanonicalFields): DocumentFields {
  switch (kind) {
    case 'CARGO_MANIFEST':
      return { kind, ...fields };
    case 'IMPORT_DECLARATION':
      return { kind, ...fields };
    case 'UNIFIED_IMPORT_DECLARATION':
      return { kind, ...fields };
    case 'TERMINAL_CONTROL':
      return { kind, ...fields };
  }
}

/**
 * Fill situation and status code from status when they are empty.
 *
 * The status-code fallback stores the status text itself; it is an
 * identifier of last resort, not a coded value.
 */
export function applyFieldDefaults(fields: CanonicalFields): CanonicalFields {
  return {
    ...fields,
    situation: fields.situation ?? fields.status,
    statusCode: fields.statusCode ?? fields.status,
  };
}

/**
 * Extract canonical fields from a raw payload
 */
export function extractFields(
  payload: RawPayload,
  kind: DocumentKind,
  context: ExtractionContext = defaultExtractionContext()
): DocumentFields {
  const aliases = context.aliases.fields[kind];
  const fields = emptyCanonicalFields();

  for (const name of CANONICAL_FIELD_NAMES) {
    const hit = firstPresent(payload, aliases[name]);
    if (!hit) {
      continue;
    }

    const normalized = DATE_FIELD_NAMES.has(name) ? normalizeDate(hit.value) : normalizeText(hit.value);
    if (normalized.ok) {
      fields[name] = normalized.value;
    } else {
      context.logger.warn(
        { kind, field: name, alias: hit.alias, value: String(normalized.raw) },
        'Unparseable payload value treated as absent'
      );
    }
  }

  return tagFields(kind, applyFieldDefaults(fields));
}
