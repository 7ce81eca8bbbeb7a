/**
 * Acquisition time helpers
 *
 * Sentinel-1 product names and catalog filters use the compact UTC form
 * `YYYYMMDDTHHMMSS`. Everything in here is UTC; local time never enters.
 */

const COMPACT_PATTERN = /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})$/;

/**
 * Parse `YYYYMMDDTHHMMSS` or any ISO 8601 string into a Date
 *
 * @returns null when the value is neither
 */
export function parseTimestamp(value: string): Date | null {
  const compact = COMPACT_PATTERN.exec(value);
  if (compact) {
    const [, y, mo, d, h, mi, s] = compact;
    const date = new Date(Date.UTC(+y, +mo - 1, +d, +h, +mi, +s));
    // Date.UTC rolls 20210231 over into March; reject instead
    return formatCompact(date) === value ? date : null;
  }

  if (!/^\d{4}-\d{2}-\d{2}/.test(value)) {
    return null;
  }
  // ISO strings without an offset are UTC here, as in catalog responses;
  // sub-millisecond digits are dropped
  const trimmed = value.replace(/(\.\d{3})\d+/, '$1');
  const iso = /[zZ]|[+-]\d{2}:?\d{2}$/.test(trimmed) || trimmed.length === 10 ? trimmed : `${trimmed}Z`;
  const date = new Date(iso);
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Format a Date as `YYYYMMDDTHHMMSS` (UTC, sub-second part dropped)
 */
export function formatCompact(date: Date): string {
  return date.toISOString().slice(0, 19).replace(/[-:]/g, '');
}

/**
 * ISO 8601 with milliseconds and Z suffix, as the ASF API expects
 */
export function formatIso(date: Date): string {
  return date.toISOString();
}

export function addSeconds(date: Date, seconds: number): Date {
  return new Date(date.getTime() + seconds * 1000);
}

/**
 * Widen an acquisition window by `seconds` on both sides
 */
export function bufferTime(
  start: Date,
  stop: Date,
  seconds: number
): { readonly start: Date; readonly stop: Date } {
  return {
    start: addSeconds(start, -seconds),
    stop: addSeconds(stop, seconds),
  };
}
