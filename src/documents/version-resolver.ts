/**
 * Version Resolver
 *
 * Extracts the optional revision key that separates re-certified documents
 * sharing a number. Import declarations read their rectification number;
 * every other kind only carries an explicit version field.
 */

import { defaultExtractionContext, firstPresent } from './field-extractor.js';
import type { ExtractionContext } from './field-extractor.js';
import { normalizeText } from './normalize.js';
import type { DocumentKind, RawPayload } from './types.js';

/**
 * Trim a version; empty becomes absent
 */
export function normalizeVersion(version: string | number | null | undefined): string | null {
  if (version === null || version === undefined) {
    return null;
  }
  const text = String(version).trim();
  return text === '' ? null : text;
}

export function resolveVersion(
  payload: RawPayload | null | undefined,
  kind: DocumentKind,
  context: ExtractionContext = defaultExtractionContext()
): string | null {
  if (!payload) {
    return null;
  }

  const hit = firstPresent(payload, context.aliases.versions[kind]);
  if (!hit) {
    return null;
  }

  const normalized = normalizeText(hit.value);
  if (!normalized.ok) {
    context.logger.warn(
      { kind, alias: hit.alias, value: String(normalized.raw) },
      'Unparseable document version treated as absent'
    );
    return null;
  }
  return normalized.value;
}
