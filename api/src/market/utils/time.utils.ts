// api/src/market/utils/time.utils.ts

/**
 * Exchange timestamps are Moscow local time, which has been a fixed UTC+3
 * with no daylight saving since 2014.
 */
const MOSCOW_OFFSET_MS = 3 * 60 * 60_000;

const ISS_DATETIME = /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2})(?::(\d{2}))?)?$/;

/**
 * Parse an ISS "yyyy-MM-dd HH:mm:ss" Moscow timestamp into epoch seconds.
 * Returns undefined when the string does not match or names an impossible date.
 */
export function parseIssTimestamp(ts: string): number | undefined {
  const m = ISS_DATETIME.exec(ts.trim());
  if (!m) return undefined;

  const [year, month, day] = [Number(m[1]), Number(m[2]), Number(m[3])];
  const [hour, minute, second] = [Number(m[4] ?? 0), Number(m[5] ?? 0), Number(m[6] ?? 0)];

  const utcMs = Date.UTC(year, month - 1, day, hour, minute, second);
  const d = new Date(utcMs);
  // Date.UTC rolls 2024-02-31 over to March; reject instead
  if (
    d.getUTCFullYear() !== year ||
    d.getUTCMonth() !== month - 1 ||
    d.getUTCDate() !== day ||
    hour > 23 ||
    minute > 59 ||
    second > 59
  ) {
    return undefined;
  }
  return Math.floor((utcMs - MOSCOW_OFFSET_MS) / 1000);
}

/** Calendar date (yyyy-MM-dd) in Moscow for the given instant */
export function toIssDate(d: Date): string {
  return new Date(d.getTime() + MOSCOW_OFFSET_MS).toISOString().slice(0, 10);
}

export function subtractDays(d: Date, days: number): Date {
  return new Date(d.getTime() - days * 24 * 60 * 60_000);
}
