/**
 * Wall-clock helpers for an IANA timezone, built on Intl so DST transitions
 * follow the platform's tz database.
 */

export const HOUR_MS = 60 * 60 * 1000;
export const DAY_MS = 24 * HOUR_MS;

export interface ZonedParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

const TIME_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
      hourCycle: 'h23'
    });
    formatters.set(timeZone, formatter);
  }
  return formatter;
}

export function isValidTimeZone(timeZone: string): boolean {
  if (!timeZone) return false;
  try {
    formatterFor(timeZone);
    return true;
  } catch {
    return false;
  }
}

export function getZonedParts(instant: Date, timeZone: string): ZonedParts {
  const parts = formatterFor(timeZone).formatToParts(instant);
  const get = (type: Intl.DateTimeFormatPartTypes): number =>
    Number.parseInt(parts.find((part) => part.type === type)?.value ?? '0', 10);

  return {
    year: get('year'),
    month: get('month'),
    day: get('day'),
    hour: get('hour'),
    minute: get('minute'),
    second: get('second')
  };
}

/** Offset of `timeZone` from UTC at `epochMs`, in milliseconds. */
function offsetAt(epochMs: number, timeZone: string): number {
  const wholeSecond = epochMs - (((epochMs % 1000) + 1000) % 1000);
  const parts = getZonedParts(new Date(wholeSecond), timeZone);
  const asUtc = Date.UTC(parts.year, parts.month - 1, parts.day, parts.hour, parts.minute, parts.second);
  return asUtc - wholeSecond;
}

export function parseTimeOfDay(value: string): { hour: number; minute: number } | null {
  const match = TIME_PATTERN.exec(value);
  if (!match) return null;
  return { hour: Number(match[1]), minute: Number(match[2]) };
}

export function parseCalendarDate(value: string): { year: number; month: number; day: number } | null {
  const match = DATE_PATTERN.exec(value);
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const parsed = new Date(Date.UTC(year, month - 1, day));
  if (
    parsed.getUTCFullYear() !== year ||
    parsed.getUTCMonth() !== month - 1 ||
    parsed.getUTCDate() !== day
  ) {
    return null;
  }

  return { year, month, day };
}

/**
 * Instant at which the wall clock in `timeZone` reads `date` `time`.
 * Throws on malformed input; callers validate first.
 */
export function zonedDateTimeToUtc(date: string, time: string, timeZone: string): Date {
  const calendar = parseCalendarDate(date);
  const clock = parseTimeOfDay(time);
  if (!calendar || !clock) {
    throw new RangeError(`Invalid local date/time: ${date} ${time}`);
  }

  const wallClock = Date.UTC(calendar.year, calendar.month - 1, calendar.day, clock.hour, clock.minute);
  const firstOffset = offsetAt(wallClock, timeZone);
  let candidate = wallClock - firstOffset;
  const secondOffset = offsetAt(candidate, timeZone);
  if (secondOffset !== firstOffset) {
    candidate = wallClock - secondOffset;
  }

  return new Date(candidate);
}

/** Parses an ISO local timestamp without offset ("2025-06-01T18:00") as wall-clock time. */
export function parseZonedLocalDateTime(value: string, timeZone: string): Date | null {
  const [date, time] = value.split('T');
  if (!date || !time) return null;

  const hhmm = time.slice(0, 5);
  if (!parseCalendarDate(date) || !parseTimeOfDay(hhmm)) return null;

  return zonedDateTimeToUtc(date, hhmm, timeZone);
}

export function floorToZonedHour(instant: Date, timeZone: string): Date {
  const parts = getZonedParts(instant, timeZone);
  const subHourMs = (parts.minute * 60 + parts.second) * 1000 + instant.getUTCMilliseconds();
  return new Date(instant.getTime() - subHourMs);
}

export function startOfUtcDay(instant: Date): Date {
  return new Date(
    Date.UTC(instant.getUTCFullYear(), instant.getUTCMonth(), instant.getUTCDate())
  );
}

export function addMilliseconds(instant: Date, ms: number): Date {
  return new Date(instant.getTime() + ms);
}

const pad = (value: number): string => value.toString().padStart(2, '0');

export function formatZonedTime(instant: Date, timeZone: string): string {
  const parts = getZonedParts(instant, timeZone);
  return `${pad(parts.hour)}:${pad(parts.minute)}`;
}

export function formatZonedDate(instant: Date, timeZone: string): string {
  const parts = getZonedParts(instant, timeZone);
  return `${parts.year}-${pad(parts.month)}-${pad(parts.day)}`;
}

/** The same local wall-clock time `days` calendar days later; DST shifts change the elapsed hours, not the local time. */
export function addZonedDays(instant: Date, days: number, timeZone: string): Date {
  const parts = getZonedParts(instant, timeZone);
  const target = new Date(Date.UTC(parts.year, parts.month - 1, parts.day + days));
  const date = `${target.getUTCFullYear()}-${pad(target.getUTCMonth() + 1)}-${pad(target.getUTCDate())}`;
  const subMinuteMs = parts.second * 1000 + instant.getUTCMilliseconds();
  return addMilliseconds(zonedDateTimeToUtc(date, `${pad(parts.hour)}:${pad(parts.minute)}`, timeZone), subMinuteMs);
}

export function formatUtcTime(instant: Date): string {
  return `${pad(instant.getUTCHours())}:${pad(instant.getUTCMinutes())}`;
}

/** Renders a stored UTC time of day as local HH:MM on `referenceDate`. */
export function utcTimeToLocal(utcTime: string, timeZone: string, referenceDate: string): string {
  const instant = zonedDateTimeToUtc(referenceDate, utcTime, 'UTC');
  return formatZonedTime(instant, timeZone);
}

/** Converts a local HH:MM on `referenceDate` to the UTC HH:MM stored in configuration. */
export function localTimeToUtc(localTime: string, timeZone: string, referenceDate: string): string {
  return formatUtcTime(zonedDateTimeToUtc(referenceDate, localTime, timeZone));
}
