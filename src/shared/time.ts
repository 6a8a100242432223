/**
 * Calendar helpers for the canonical reference timezone. Instants are compared as epoch
 * milliseconds; the zone only matters when an instant is rendered as a calendar day.
 */

export interface ZonedDay {
  year: string;
  month: string;
  day: string;
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let fmt = formatters.get(timeZone);
  if (!fmt) {
    fmt = new Intl.DateTimeFormat('en-US', {
      timeZone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
    });
    formatters.set(timeZone, fmt);
  }
  return fmt;
}

export function zonedDay(instant: Date, timeZone: string): ZonedDay {
  const parts = formatterFor(timeZone).formatToParts(instant);
  const pick = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((p) => p.type === type)?.value ?? '';
  return { year: pick('year'), month: pick('month'), day: pick('day') };
}

/** `YYYY/MM/DD` of the instant as seen in `timeZone`. */
export function datePath(instant: Date, timeZone: string): string {
  const { year, month, day } = zonedDay(instant, timeZone);
  return `${year}/${month}/${day}`;
}

export function hoursAgo(hours: number, now: Date = new Date()): Date {
  return new Date(now.getTime() - hours * 3600 * 1000);
}

/**
 * Parse a feed or page date string. Returns null for missing or unparseable input.
 */
export function parseInstant(raw: string | undefined | null): Date | null {
  if (!raw) return null;
  const trimmed = raw.trim();
  if (!trimmed) return null;
  const parsed = new Date(trimmed);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}
