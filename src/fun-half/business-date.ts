import type { CalendarDate, WallClockTime, ZonedDateTime } from "./fun-half.types.js";

const DAY_MS = 24 * 60 * 60 * 1000;
const SATURDAY = 6;
const SUNDAY = 0;
const UPLOAD_DATE_PATTERN = /^(\d{4})(\d{2})(\d{2})$/;

/**
 * Reads the wall clock of an instant in the given IANA time zone.
 */
export function toZonedDateTime(instant: Date, timeZone: string): ZonedDateTime {
  const formatter = new Intl.DateTimeFormat("en-US", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hourCycle: "h23",
  });

  const parts: Record<string, string> = {};
  for (const part of formatter.formatToParts(instant)) {
    parts[part.type] = part.value;
  }

  return {
    date: `${parts.year}-${parts.month}-${parts.day}`,
    hour: parseInt(parts.hour, 10),
    minute: parseInt(parts.minute, 10),
    second: parseInt(parts.second, 10),
  };
}

export function isBusinessDate(date: CalendarDate): boolean {
  const weekday = toUtcMidnight(date).getUTCDay();
  return weekday !== SATURDAY && weekday !== SUNDAY;
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
  return new Date(toUtcMidnight(date).getTime() + days * DAY_MS).toISOString().slice(0, 10);
}

/**
 * The given date on weekdays, otherwise the most recent weekday before it.
 */
export function resolveTargetDate(today: CalendarDate): CalendarDate {
  return isBusinessDate(today) ? today : previousBusinessDate(today);
}

/**
 * The closest weekday strictly before `date`.
 */
export function previousBusinessDate(date: CalendarDate): CalendarDate {
  let current = addDays(date, -1);
  while (!isBusinessDate(current)) {
    current = addDays(current, -1);
  }

  return current;
}

export function isBeforeCutoff(now: ZonedDateTime, cutoff: WallClockTime): boolean {
  return now.hour < cutoff.hour || (now.hour === cutoff.hour && now.minute < cutoff.minute);
}

/**
 * Converts a platform `YYYYMMDD` upload date, taken as midnight UTC, to a calendar date in `timeZone`.
 */
export function fromUploadDate(uploadDate: string, timeZone: string): CalendarDate | undefined {
  const match = uploadDate.match(UPLOAD_DATE_PATTERN);
  if (!match) {
    return undefined;
  }

  const [, year, month, day] = match;
  const instant = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  if (isNaN(instant.getTime()) || instant.toISOString().slice(0, 10) !== `${year}-${month}-${day}`) {
    return undefined;
  }

  return toZonedDateTime(instant, timeZone).date;
}

export function fromEpochSeconds(seconds: number, timeZone: string): CalendarDate | undefined {
  const instant = new Date(seconds * 1000);
  return isNaN(instant.getTime()) ? undefined : toZonedDateTime(instant, timeZone).date;
}

function toUtcMidnight(date: CalendarDate): Date {
  return new Date(`${date}T00:00:00Z`);
}
