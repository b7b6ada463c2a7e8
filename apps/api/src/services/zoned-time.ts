// Time zone helpers
//
// The classifier reasons in the user's local time and often returns naive
// timestamps ("2025-11-12T21:00:00"). These helpers resolve such values in a
// configured IANA zone and format instants with an explicit UTC offset.
//
// Examples (zone Asia/Kolkata):
//   parseDateInput("2025-11-12T21:00:00")        -> 2025-11-12T15:30:00.000Z
//   parseDateInput("2025-11-12T21:00:00+00:00")  -> 2025-11-12T21:00:00.000Z
//   formatInTimeZone(2025-11-12T04:30:00.000Z)   -> "2025-11-12T10:00:00+05:30"

const formatterCache = new Map<string, Intl.DateTimeFormat>();

function getFormatter(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatterCache.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      hourCycle: 'h23',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
    });
    formatterCache.set(timeZone, formatter);
  }
  return formatter;
}

interface WallClock {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

function wallClockIn(date: Date, timeZone: string): WallClock {
  const fields: Record<string, number> = {};
  for (const part of getFormatter(timeZone).formatToParts(date)) {
    if (part.type !== 'literal') {
      fields[part.type] = parseInt(part.value, 10);
    }
  }
  return {
    year: fields.year ?? 1970,
    month: fields.month ?? 1,
    day: fields.day ?? 1,
    hour: fields.hour ?? 0,
    minute: fields.minute ?? 0,
    second: fields.second ?? 0,
  };
}

function wallClockToUtcMs(w: WallClock): number {
  return Date.UTC(w.year, w.month - 1, w.day, w.hour, w.minute, w.second);
}

/**
 * Offset of the zone from UTC at the given instant, in minutes (east positive)
 */
export function getTimeZoneOffsetMinutes(date: Date, timeZone: string): number {
  const wholeSeconds = Math.floor(date.getTime() / 1000) * 1000;
  const local = wallClockToUtcMs(wallClockIn(new Date(wholeSeconds), timeZone));
  return Math.round((local - wholeSeconds) / 60_000);
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

function formatOffset(minutes: number): string {
  const sign = minutes < 0 ? '-' : '+';
  const abs = Math.abs(minutes);
  return `${sign}${pad(Math.floor(abs / 60))}:${pad(abs % 60)}`;
}

/**
 * Format an instant as ISO-8601 local time with the zone's offset
 */
export function formatInTimeZone(date: Date, timeZone: string): string {
  const w = wallClockIn(date, timeZone);
  const offset = getTimeZoneOffsetMinutes(date, timeZone);
  return (
    `${pad(w.year, 4)}-${pad(w.month)}-${pad(w.day)}` +
    `T${pad(w.hour)}:${pad(w.minute)}:${pad(w.second)}${formatOffset(offset)}`
  );
}

const NAIVE_DATE_TIME =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?)?$/;
const HAS_OFFSET = /(?:Z|[+-]\d{2}:?\d{2})$/i;

/**
 * Resolve a wall-clock time in the zone to an instant
 */
export function zonedWallClockToDate(w: WallClock, timeZone: string): Date {
  const guess = wallClockToUtcMs(w);
  const firstOffset = getTimeZoneOffsetMinutes(new Date(guess), timeZone);
  let result = guess - firstOffset * 60_000;
  const secondOffset = getTimeZoneOffsetMinutes(new Date(result), timeZone);
  if (secondOffset !== firstOffset) {
    result = guess - secondOffset * 60_000;
  }
  return new Date(result);
}

/**
 * Parse a classifier-supplied date value.
 *
 * Offset-qualified ISO strings are taken as-is; naive date/times are read in
 * the given zone. Returns null for anything else.
 */
export function parseDateInput(value: unknown, timeZone: string): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }
  if (typeof value !== 'string') {
    return null;
  }

  const text = value.trim();
  if (!text) {
    return null;
  }

  if (HAS_OFFSET.test(text)) {
    const date = new Date(text);
    return Number.isNaN(date.getTime()) ? null : date;
  }

  const match = NAIVE_DATE_TIME.exec(text);
  if (!match) {
    return null;
  }

  const [, year, month, day, hour, minute, second] = match;
  const wall: WallClock = {
    year: parseInt(year, 10),
    month: parseInt(month, 10),
    day: parseInt(day, 10),
    hour: hour ? parseInt(hour, 10) : 0,
    minute: minute ? parseInt(minute, 10) : 0,
    second: second ? parseInt(second, 10) : 0,
  };

  const outOfRange =
    wall.month < 1 || wall.month > 12 || wall.day < 1 || wall.day > 31 ||
    wall.hour > 23 || wall.minute > 59 || wall.second > 59;
  if (outOfRange) {
    return null;
  }

  return zonedWallClockToDate(wall, timeZone);
}
