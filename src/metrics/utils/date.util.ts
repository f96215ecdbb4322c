import { MetricsClock, MetricsItem } from '../types/metrics.types';

const DAY_MS = 24 * 60 * 60 * 1000;

const ISO_RE =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d{1,9}))?)?(Z|[+-]\d{2}(?::?\d{2})?)?)?$/i;

const RFC822_RE =
  /^(?:[A-Za-z]{3},\s*|[A-Za-z]{3}\s+)?(\d{1,2})\s+([A-Za-z]{3})\s+(\d{4})\s+(\d{1,2}):(\d{2})(?::(\d{2}))?(?:\s*([+-]\d{4}|[A-Za-z]{1,3}))?$/;

const MONTHS: Record<string, number> = {
  jan: 1,
  feb: 2,
  mar: 3,
  apr: 4,
  may: 5,
  jun: 6,
  jul: 7,
  aug: 8,
  sep: 9,
  oct: 10,
  nov: 11,
  dec: 12,
};

// RFC 822 §5.1 zone names, in minutes east of UTC.
const ZONE_OFFSETS: Record<string, number> = {
  ut: 0,
  utc: 0,
  gmt: 0,
  z: 0,
  est: -5 * 60,
  edt: -4 * 60,
  cst: -6 * 60,
  cdt: -5 * 60,
  mst: -7 * 60,
  mdt: -6 * 60,
  pst: -8 * 60,
  pdt: -7 * 60,
};

export const systemClock: MetricsClock = {
  now: () => new Date(),
};

/**
 * Parse an ISO-8601 or RFC-822 date string into a UTC instant.
 * Values without an offset are taken as UTC. Returns null when nothing parses.
 */
export function normalizeDate(raw: string | null | undefined): Date | null {
  if (!raw) {
    return null;
  }
  const value = raw.trim();
  if (!value) {
    return null;
  }
  return parseIsoDate(value) ?? parseRfc822Date(value);
}

export function resolveEffectiveInstant(
  item: Pick<MetricsItem, 'published_at' | 'parsed_at'>,
): Date | null {
  return normalizeDate(item.published_at) ?? normalizeDate(item.parsed_at);
}

export function subtractDays(date: Date, days: number): Date {
  return new Date(date.getTime() - days * DAY_MS);
}

export function formatDateYYYYMMDD(date: Date): string {
  const y = date.getUTCFullYear();
  const m = String(date.getUTCMonth() + 1).padStart(2, '0');
  const d = String(date.getUTCDate()).padStart(2, '0');
  return `${y}-${m}-${d}`;
}

function parseIsoDate(value: string): Date | null {
  const match = ISO_RE.exec(value);
  if (!match) {
    return null;
  }
  const [, y, mo, d, hh, mi, ss, fraction, zone] = match;
  const offsetMinutes = zone ? parseIsoOffset(zone) : 0;
  if (offsetMinutes === null) {
    return null;
  }
  const ms = fraction ? Number(fraction.slice(0, 3).padEnd(3, '0')) : 0;

  return buildUtcDate(
    {
      year: Number(y),
      month: Number(mo),
      day: Number(d),
      hour: Number(hh ?? 0),
      minute: Number(mi ?? 0),
      second: Number(ss ?? 0),
      ms,
    },
    offsetMinutes,
  );
}

function parseRfc822Date(value: string): Date | null {
  const match = RFC822_RE.exec(value);
  if (!match) {
    return null;
  }
  const [, d, monthName, y, hh, mi, ss, zone] = match;
  const month = MONTHS[monthName.toLowerCase()];
  if (!month) {
    return null;
  }

  let offsetMinutes = 0;
  if (zone) {
    const parsed = /^[+-]/.test(zone)
      ? parseNumericOffset(zone[0], zone.slice(1, 3), zone.slice(3, 5))
      : (ZONE_OFFSETS[zone.toLowerCase()] ?? null);
    if (parsed === null) {
      return null;
    }
    offsetMinutes = parsed;
  }

  return buildUtcDate(
    {
      year: Number(y),
      month,
      day: Number(d),
      hour: Number(hh),
      minute: Number(mi),
      second: Number(ss ?? 0),
      ms: 0,
    },
    offsetMinutes,
  );
}

function parseIsoOffset(zone: string): number | null {
  if (zone.toUpperCase() === 'Z') {
    return 0;
  }
  const digits = zone.slice(1).replace(':', '');
  return parseNumericOffset(zone[0], digits.slice(0, 2), digits.slice(2, 4));
}

function parseNumericOffset(
  sign: string,
  hours: string,
  minutes: string,
): number | null {
  const h = Number(hours);
  const m = Number(minutes || 0);
  if (h > 23 || m > 59) {
    return null;
  }
  const total = h * 60 + m;
  return sign === '-' ? -total : total;
}

function buildUtcDate(
  parts: {
    year: number;
    month: number;
    day: number;
    hour: number;
    minute: number;
    second: number;
    ms: number;
  },
  offsetMinutes: number,
): Date | null {
  const wallClock = new Date(
    Date.UTC(
      parts.year,
      parts.month - 1,
      parts.day,
      parts.hour,
      parts.minute,
      parts.second,
      parts.ms,
    ),
  );
  // Date.UTC rolls over out-of-range fields (Feb 30 -> Mar 2); reject those.
  if (
    wallClock.getUTCFullYear() !== parts.year ||
    wallClock.getUTCMonth() !== parts.month - 1 ||
    wallClock.getUTCDate() !== parts.day ||
    wallClock.getUTCHours() !== parts.hour ||
    wallClock.getUTCMinutes() !== parts.minute ||
    wallClock.getUTCSeconds() !== parts.second
  ) {
    return null;
  }
  return new Date(wallClock.getTime() - offsetMinutes * 60 * 1000);
}
