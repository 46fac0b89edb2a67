import { DateTime } from 'luxon';
import { RUN_TIMESTAMP_FORMAT } from '@/config/downloadRules';

/**
 * Parse an exact run timestamp (yyyyMMdd-HH:mm:ss) as a UTC wall-clock time.
 * Returns null when the value does not match the format.
 */
export function parseRunTimestamp(value: string): DateTime | null {
  const parsed = DateTime.fromFormat(value.trim(), RUN_TIMESTAMP_FORMAT, { zone: 'utc' });
  return parsed.isValid ? parsed : null;
}

/**
 * Attach the UTC designation to a timestamp without moving its wall-clock
 * fields: 2024-01-02 09:30 in any zone becomes 2024-01-02 09:30 UTC.
 */
export function asUtcKind(value: DateTime): DateTime {
  return value.setZone('utc', { keepLocalTime: true });
}

/**
 * True when the timestamp is expressed in the UTC zone
 */
export function isUtc(value: DateTime): boolean {
  return value.zone.isUniversal && value.offset === 0;
}

/**
 * ISO-8601 rendering for logs and reports
 */
export function toIsoUtc(value: DateTime): string {
  return value.toUTC().toISO() ?? value.toString();
}
