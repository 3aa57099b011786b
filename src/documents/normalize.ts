/**
 * Scalar normalization for payload values.
 *
 * Text is trimmed and empty text is absent. Dates come out as ISO-8601 text
 * so stored and observed values compare as strings.
 */

export type Normalized =
  | { ok: true; value: string | null }
  | { ok: false; raw: unknown };

const ISO_DATE =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(\.\d+)?)?)?(Z|[+-]\d{2}:?\d{2})?$/;

const LOCAL_DATE = /^(\d{2})\/(\d{2})\/(\d{4})(?:[ T](\d{2}):(\d{2})(?::(\d{2}))?)?$/;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * Absent means null, undefined or blank text
 */
export function isBlank(value: unknown): boolean {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}

export function normalizeText(value: unknown): Normalized {
  if (value === null || value === undefined) {
    return { ok: true, value: null };
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return { ok: true, value: trimmed === '' ? null : trimmed };
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? { ok: true, value: String(value) } : { ok: false, raw: value };
  }
  if (typeof value === 'bigint' || typeof value === 'boolean') {
    return { ok: true, value: String(value) };
  }
  if (value instanceof Date) {
    return normalizeDate(value);
  }
  return { ok: false, raw: value };
}

function validDay(year: string, month: string, day: string): boolean {
  const m = Number(month);
  const d = Number(day);
  return Number(year) > 0 && m >= 1 && m <= 12 && d >= 1 && d <= 31;
}

function validTime(hour: string | undefined, minute: string | undefined, second: string | undefined): boolean {
  if (hour === undefined || minute === undefined) {
    return true;
  }
  return Number(hour) <= 23 && Number(minute) <= 59 && (second === undefined || Number(second) <= 59);
}

function formatDate(
  year: string,
  month: string,
  day: string,
  hour?: string,
  minute?: string,
  second?: string,
  fraction?: string,
  zone?: string
): string {
  const date = `${year}-${month}-${day}`;
  if (hour === undefined || minute === undefined) {
    return date;
  }
  return `${date}T${hour}:${minute}:${second ?? '00'}${fraction ?? ''}${zone ?? ''}`;
}

/**
 * Normalize a date-like value to ISO-8601 text.
 *
 * Accepts Date instances, `yyyy-mm-dd[(T| )hh:mm[:ss[.fff]]][zone]` and
 * `dd/mm/yyyy[ hh:mm[:ss]]`.
 */
export function normalizeDate(value: unknown): Normalized {
  if (value === null || value === undefined) {
    return { ok: true, value: null };
  }

  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? { ok: false, raw: value } : { ok: true, value: value.toISOString() };
  }

  if (typeof value !== 'string') {
    return { ok: false, raw: value };
  }

  const text = value.trim();
  if (text === '') {
    return { ok: true, value: null };
  }

  const iso = ISO_DATE.exec(text);
  if (iso) {
    const [, year = '', month = '', day = '', hour, minute, second, fraction, zone] = iso;
    if (!validDay(year, month, day) || !validTime(hour, minute, second)) {
      return { ok: false, raw: value };
    }
    return { ok: true, value: formatDate(year, month, day, hour, minute, second, fraction, zone) };
  }

  const local = LOCAL_DATE.exec(text);
  if (local) {
    const [, day = '', month = '', year = '', hour, minute, second] = local;
    if (!validDay(year, month, day) || !validTime(hour, minute, second)) {
      return { ok: false, raw: value };
    }
    return { ok: true, value: formatDate(year, month, day, hour, minute, second) };
  }

  return { ok: false, raw: value };
}
