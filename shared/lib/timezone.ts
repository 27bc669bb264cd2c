export const DEFAULT_TIMEZONE = 'America/Los_Angeles';

export interface ZonedParts {
  year: number;
  month: number;   // 1-12
  day: number;
  hour: number;
  minute: number;
  second: number;
}

const formatterCache = new Map<string, Intl.DateTimeFormat>();

function partsFormatter(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatterCache.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
      hourCycle: 'h23',
    });
    formatterCache.set(timeZone, formatter);
  }
  return formatter;
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

/**
 * Wall-clock components of an instant in the given time zone.
 */
export function zonedParts(date: Date, timeZone: string): ZonedParts {
  const parts = partsFormatter(timeZone).formatToParts(date);
  const getValue = (type: string) => Number.parseInt(parts.find(p => p.type === type)?.value || '0', 10);
  return {
    year: getValue('year'),
    month: getValue('month'),
    day: getValue('day'),
    hour: getValue('hour'),
    minute: getValue('minute'),
    second: getValue('second'),
  };
}

/**
 * Offset of the zone from UTC at the given instant, in milliseconds (PDT = -7h).
 */
export function zoneOffsetMs(date: Date, timeZone: string): number {
  const p = zonedParts(date, timeZone);
  const asUtc = Date.UTC(p.year, p.month - 1, p.day, p.hour, p.minute, p.second);
  const wholeSeconds = Math.floor(date.getTime() / 1000) * 1000;
  return asUtc - wholeSeconds;
}

/**
 * Instant for a wall-clock time in the given zone.
 * Example: zonedDateTime('America/Los_Angeles', 2025, 1, 6, 8) is 2025-01-06T16:00:00Z
 *
 * Wall times skipped by a spring-forward jump resolve to the instant after the gap
 * (2:30am becomes 3:30am); repeated times resolve to the first.
 */
export function zonedDateTime(
  timeZone: string,
  year: number,
  month: number,
  day: number,
  hour = 0,
  minute = 0,
): Date {
  const guess = Date.UTC(year, month - 1, day, hour, minute);
  const offset = zoneOffsetMs(new Date(guess), timeZone);
  const first = guess - offset;
  const corrected = zoneOffsetMs(new Date(first), timeZone);
  if (corrected === offset) {
    return new Date(first);
  }

  const second = guess - corrected;
  if (zoneOffsetMs(new Date(second), timeZone) === corrected) {
    return new Date(second);
  }
  // Skipped wall time: move forward past the gap
  return new Date(first);
}

export function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/**
 * Shift an instant by whole calendar days, keeping its wall-clock time in the zone.
 */
export function addCalendarDays(date: Date, days: number, timeZone: string): Date {
  const p = zonedParts(date, timeZone);
  const shifted = new Date(Date.UTC(p.year, p.month - 1, p.day + days));
  return zonedDateTime(
    timeZone,
    shifted.getUTCFullYear(),
    shifted.getUTCMonth() + 1,
    shifted.getUTCDate(),
    p.hour,
    p.minute,
  );
}

/**
 * Same calendar date in the zone, with the clock set to hour:minute.
 */
export function atTimeOfDay(date: Date, hour: number, minute: number, timeZone: string): Date {
  const p = zonedParts(date, timeZone);
  return zonedDateTime(timeZone, p.year, p.month, p.day, hour, minute);
}

export function zonedDateKey(date: Date, timeZone: string): string {
  const p = zonedParts(date, timeZone);
  return `${p.year}-${pad(p.month)}-${pad(p.day)}`;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Format an instant as ISO8601 with the zone's offset.
 * Example: "2025-01-15T08:00:00-08:00"
 */
export function formatZonedTime(date: Date, timeZone: string): string {
  const p = zonedParts(date, timeZone);
  const offsetMinutes = Math.round(zoneOffsetMs(date, timeZone) / 60_000);
  const sign = offsetMinutes < 0 ? '-' : '+';
  const abs = Math.abs(offsetMinutes);
  const offset = `${sign}${pad(Math.floor(abs / 60))}:${pad(abs % 60)}`;
  return `${p.year}-${pad(p.month)}-${pad(p.day)}T${pad(p.hour)}:${pad(p.minute)}:${pad(p.second)}${offset}`;
}
