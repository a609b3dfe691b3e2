import { DateTime } from 'luxon';

const DATE_KEY_RE = /^\d{4}-\d{2}-\d{2}$/;
const INPUT_FORMATS = ['dd/MM/yyyy', 'dd/MM/yyyy HH:mm', 'd/M/yyyy'];

export function isDateKey(s: unknown): s is string {
  if (typeof s !== 'string' || !DATE_KEY_RE.test(s)) return false;
  return DateTime.fromISO(s, { zone: 'utc' }).isValid;
}

/**
 * Accepts YYYY-MM-DD, DD/MM/YYYY (optionally with HH:mm) or an ISO timestamp
 * and returns the calendar date as YYYY-MM-DD. Timestamps keep the wall date
 * of their own offset.
 */
export function toDateKey(input: unknown): string | null {
  if (input instanceof Date) {
    return Number.isFinite(input.getTime()) ? DateTime.fromJSDate(input, { zone: 'utc' }).toISODate() : null;
  }
  if (typeof input !== 'string') return null;
  const s = input.trim();
  if (!s) return null;

  for (const fmt of INPUT_FORMATS) {
    const dt = DateTime.fromFormat(s, fmt, { zone: 'utc' });
    if (dt.isValid) return dt.toISODate();
  }
  const iso = DateTime.fromISO(s, { setZone: true });
  return iso.isValid ? iso.toISODate() : null;
}

/** YYYY-MM-DD → DD/MM/YYYY; anything unparseable is returned unchanged. */
export function formatDisplayDate(value: string): string {
  const key = toDateKey(value);
  if (!key) return value;
  return DateTime.fromISO(key, { zone: 'utc' }).toFormat('dd/MM/yyyy');
}

export function compareDateKeys(a: string, b: string): number {
  // Zero-padded keys sort lexically.
  return a < b ? -1 : a > b ? 1 : 0;
}
