import { DateTime, IANAZone } from 'luxon';

import { logger } from './logger.js';

/** Falls back to the system zone when `zone` is not a loadable IANA zone. */
export function resolveZone(zone: string | undefined): string {
  if (zone && IANAZone.isValidZone(zone)) return zone;
  logger.warn('[time] unknown time zone, using system local zone', { zone });
  return 'system';
}

export function overlaps(aStart: DateTime, aEnd: DateTime, bStart: DateTime, bEnd: DateTime): boolean {
  return aStart < bEnd && aEnd > bStart;
}

const RFC3339_OFFSET = /(?:Z|[+-]\d{2}:\d{2})$/i;

/** Parses an ISO-8601 timestamp that carries an explicit offset; returns null otherwise. */
export function parseOffsetTimestamp(iso: string): DateTime | null {
  const trimmed = iso.trim();
  if (!RFC3339_OFFSET.test(trimmed)) return null;
  const dt = DateTime.fromISO(trimmed, { setZone: true });
  return dt.isValid ? dt : null;
}
