/**
 * Timestamps, durations and TTLs
 */

const RFC3339_PATTERN =
  /^\d{4}-\d{2}-\d{2}[Tt ]\d{2}:\d{2}:\d{2}(\.\d+)?([Zz]|[+-]\d{2}:\d{2})$/;

/** Latest instant an RFC 3339 timestamp with a four-digit year can carry */
export const MAX_DATE = new Date('9999-12-31T23:59:59Z');

const DURATION_UNITS = new Map<string, number>(Object.entries({
  ms: 1,
  msec: 1,
  millis: 1,
  s: 1000,
  sec: 1000,
  secs: 1000,
  second: 1000,
  seconds: 1000,
  m: 60_000,
  min: 60_000,
  mins: 60_000,
  minute: 60_000,
  minutes: 60_000,
  h: 3_600_000,
  hr: 3_600_000,
  hrs: 3_600_000,
  hour: 3_600_000,
  hours: 3_600_000,
  d: 86_400_000,
  day: 86_400_000,
  days: 86_400_000,
  w: 604_800_000,
  week: 604_800_000,
  weeks: 604_800_000,
}));

/**
 * Parse an RFC 3339 timestamp, or return null when the text is not one
 */
export function parseRfc3339(text: string): Date | null {
  if (!RFC3339_PATTERN.test(text)) {
    return null;
  }
  const date = new Date(text.replace(' ', 'T'));
  return isNaN(date.getTime()) ? null : date;
}

/**
 * Format a date as RFC 3339 with second precision
 */
export function formatRfc3339(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/**
 * Parse a compact duration such as `15m`, `1d`, `100ms` or `1h 30m` into
 * milliseconds
 */
export function parseDuration(text: string): number {
  const input = text.trim();
  if (input.length === 0) {
    throw new Error('empty duration');
  }

  const pattern = /(\d+)\s*([A-Za-z]+)\s*/y;
  let total = 0;
  let position = 0;
  while (position < input.length) {
    pattern.lastIndex = position;
    const match = pattern.exec(input);
    if (!match) {
      throw new Error(`invalid duration "${text}": expected <number><unit> at position ${position}`);
    }
    const unit = DURATION_UNITS.get(match[2]);
    if (unit === undefined) {
      throw new Error(`invalid duration "${text}": unknown unit "${match[2]}"`);
    }
    total += Number(match[1]) * unit;
    position = pattern.lastIndex;
  }

  if (!Number.isSafeInteger(total) || total > MAX_DATE.getTime()) {
    throw new Error(`invalid duration "${text}": too long`);
  }
  return total;
}

export type Ttl = { kind: 'date'; date: Date } | { kind: 'duration'; ms: number };

/**
 * Parse a TTL: an RFC 3339 expiration timestamp, or a duration counted from the
 * moment the expiration check is attached
 */
export function parseTtl(text: string): Ttl {
  const date = parseRfc3339(text.trim());
  if (date) {
    if (date > MAX_DATE) {
      throw new Error(`invalid TTL "${text}": expiration is after ${formatRfc3339(MAX_DATE)}`);
    }
    return { kind: 'date', date };
  }
  return { kind: 'duration', ms: parseDuration(text) };
}

export function ttlToDate(ttl: Ttl, now: Date): Date {
  const date = ttl.kind === 'date' ? ttl.date : new Date(now.getTime() + ttl.ms);
  if (isNaN(date.getTime()) || date > MAX_DATE) {
    throw new Error(`TTL expiration is after ${formatRfc3339(MAX_DATE)}`);
  }
  return date;
}
