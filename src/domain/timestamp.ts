/**
 * Timestamp canonicalization.
 *
 * Upstream payloads mix `Z` suffixes, numeric offsets, naive local-looking
 * values and integer epoch seconds. Everything leaving this module is a UTC,
 * second-precision string in one fixed-width format, so that string order
 * and time order agree in storage and in cursor comparisons.
 */

/** Matches a canonical timestamp, e.g. `2024-01-01T09:30:00Z`. */
export const CANONICAL_TIMESTAMP_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z$/;

export interface NormalizeTimestampOptions {
  /** Clock used for the fallback value. Defaults to the system clock. */
  now?: (() => Date) | undefined;
  /** Invoked with the raw value whenever it could not be parsed. */
  onFallback?: ((raw: unknown) => void) | undefined;
}

// date [T|space time[.fraction] [offset]]; a trailing Z is rewritten to +00:00 first
const ISO_DATE_TIME =
  /^(\d{4})-(\d{2})-(\d{2})(?:[Tt ](\d{2}):(\d{2})(?::(\d{2})(?:[.,]\d+)?)?(?:([+-])(\d{2})(?::?(\d{2}))?)?)?$/;

const MAX_YEAR = 9999;

/** Formats a Date as `YYYY-MM-DDTHH:MM:SSZ`, dropping milliseconds. */
export function formatCanonical(date: Date): string {
  return `${date.toISOString().slice(0, 19)}Z`;
}

/** `month` is 1-based; day 0 of the following month is the last day of this one. */
function daysInMonth(year: number, month: number): number {
  const probe = new Date(0);
  probe.setUTCFullYear(year, month, 0);
  return probe.getUTCDate();
}

function inCanonicalRange(date: Date): boolean {
  const year = date.getUTCFullYear();
  return !Number.isNaN(date.getTime()) && year >= 0 && year <= MAX_YEAR;
}

function parseIsoString(raw: string): Date | null {
  let value = raw.trim();
  if (value.endsWith('Z') || value.endsWith('z')) {
    value = `${value.slice(0, -1)}+00:00`;
  }

  const m = ISO_DATE_TIME.exec(value);
  if (m === null) return null;

  const year = Number(m[1]);
  const month = Number(m[2]);
  const day = Number(m[3]);
  const hour = Number(m[4] ?? '0');
  const minute = Number(m[5] ?? '0');
  const second = Number(m[6] ?? '0');
  const sign = m[7] === '-' ? -1 : 1;
  const offsetHours = Number(m[8] ?? '0');
  const offsetMinutes = Number(m[9] ?? '0');

  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  if (hour > 23 || minute > 59 || second > 59) return null;
  if (offsetHours > 23 || offsetMinutes > 59) return null;

  // setUTCFullYear keeps years below 100 literal, unlike Date.UTC
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, 0);

  const offsetMs = sign * (offsetHours * 60 + offsetMinutes) * 60_000;
  const utc = new Date(date.getTime() - offsetMs);

  return inCanonicalRange(utc) ? utc : null;
}

/**
 * Parses an upstream timestamp into a Date.
 *
 * Strings are read as ISO-8601 with an optional offset; a missing offset
 * means UTC. Numbers are Unix epoch seconds. Any other value, or one
 * that cannot be read, gives null.
 */
export function parseTimestamp(raw: unknown): Date | null {
  if (typeof raw === 'number') {
    if (!Number.isFinite(raw)) return null;
    const date = new Date(Math.trunc(raw) * 1000);
    return inCanonicalRange(date) ? date : null;
  }
  if (typeof raw === 'string') {
    return parseIsoString(raw);
  }
  return null;
}

/**
 * Converts an upstream timestamp into canonical form.
 *
 * Never throws. An unreadable value resolves to the current instant so that
 * a bad timestamp cannot block storage of the event.
 */
export function normalizeTimestamp(
  raw: unknown,
  options: NormalizeTimestampOptions = {},
): string {
  const parsed = parseTimestamp(raw);
  if (parsed !== null) {
    return formatCanonical(parsed);
  }

  options.onFallback?.(raw);
  const now = options.now ?? (() => new Date());
  return formatCanonical(now());
}
