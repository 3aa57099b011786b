/**
 * Change Detector
 *
 * Diffs freshly extracted fields against the previous snapshot over a fixed
 * comparison list. A new null value never produces a change, so partial
 * payloads cannot emit "field cleared" events.
 */

import type {
  CanonicalFieldName,
  CanonicalFields,
  Change,
  ChangeEventKind,
  ComparedField,
} from './types.js';

interface ComparedFieldSpec {
  key: CanonicalFieldName;
  field: ComparedField;
  eventKind: ChangeEventKind;
}

/** Comparison order is also the order history rows are appended in */
export const COMPARED_FIELDS = [
  { key: 'status', field: 'status', eventKind: 'STATUS_CHANGE' },
  { key: 'channel', field: 'channel', eventKind: 'CHANNEL_CHANGE' },
  { key: 'registrationDate', field: 'registration_date', eventKind: 'DATE_CHANGE' },
  { key: 'situationDate', field: 'situation_date', eventKind: 'DATE_CHANGE' },
  { key: 'clearanceDate', field: 'clearance_date', eventKind: 'DATE_CHANGE' },
] as const satisfies readonly ComparedFieldSpec[];

export function detectChanges(
  previous: CanonicalFields | null,
  next: CanonicalFields,
  detectedAt: Date
): Change[] {
  if (!previous) {
    return [];
  }

  const changes: Change[] = [];

  for (const compared of COMPARED_FIELDS) {
    const before = previous[compared.key];
    const after = next[compared.key];

    if (after === null || before === after) {
      continue;
    }

    changes.push({
      eventKind: compared.eventKind,
      field: compared.field,
      previousValue: before,
      newValue: after,
      detectedAt,
    });
  }

  return changes;
}
