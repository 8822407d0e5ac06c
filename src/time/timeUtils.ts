import { DateTime } from 'luxon';

export interface TimeOfDay {
  hour: number;
  minute: number;
  second: number;
}

const TIME_ONLY = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/;

/**
 * Parses "HH:mm" or "HH:mm:ss". Returns null for anything else.
 */
export function parseTimeOfDay(raw: string): TimeOfDay | null {
  const match = raw.trim().match(TIME_ONLY);
  if (!match) return null;
  const hour = parseInt(match[1], 10);
  const minute = parseInt(match[2], 10);
  const second = match[3] ? parseInt(match[3], 10) : 0;
  if (hour > 23 || minute > 59 || second > 59) return null;
  return { hour, minute, second };
}

/**
 * Interprets a wall-clock datetime ("YYYY-MM-DD HH:mm[:ss]" or ISO without
 * offset) in the given IANA zone.
 */
export function parseLocalDateTime(raw: string, zone: string): DateTime | null {
  const normalized = raw.trim().replace(' ', 'T');
  const parsed = DateTime.fromISO(normalized, { zone, setZone: false });
  return parsed.isValid ? parsed : null;
}

/**
 * Parses a calendar date in any of the formats photo sites and import files use.
 */
export function parseCalendarDate(raw: string): string | null {
  const value = raw.trim();
  if (!value) return null;
  const formats = ['yyyy-MM-dd', 'dd.MM.yyyy', 'd MMMM yyyy', 'MMMM d, yyyy', 'MMMM d yyyy', 'MM/dd/yyyy', 'MMM d, yyyy'];
  for (const format of formats) {
    const parsed = DateTime.fromFormat(value, format, { zone: 'utc', locale: 'en-US' });
    if (parsed.isValid) {
      return parsed.toISODate();
    }
  }
  return null;
}

export function toUtcIso(dt: DateTime): string {
  return dt.toUTC().toISO({ suppressMilliseconds: true }) ?? dt.toUTC().toJSDate().toISOString();
}

export function toLocalIso(dt: DateTime): string {
  return dt.toFormat("yyyy-MM-dd'T'HH:mm:ss");
}

export function calendarDate(dt: DateTime): string {
  return dt.toFormat('yyyy-MM-dd');
}

/**
 * Absolute number of whole days between two "YYYY-MM-DD" dates.
 */
export function daysBetween(a: string, b: string): number {
  const left = DateTime.fromISO(a, { zone: 'utc' }).startOf('day');
  const right = DateTime.fromISO(b, { zone: 'utc' }).startOf('day');
  return Math.round(Math.abs(left.diff(right, 'days').days));
}

export function nowIso(): string {
  return DateTime.utc().toISO() ?? new Date().toISOString();
}

export function addHoursIso(instantIso: string, hours: number): string {
  const shifted = DateTime.fromISO(instantIso, { zone: 'utc' }).plus({ hours });
  return shifted.toISO() ?? shifted.toJSDate().toISOString();
}

/**
 * Formats a future instant as "5d 2h", "3h 15m", "12m" or "now".
 */
export function relativeTime(targetIso: string, now: Date = new Date()): string {
  const totalSeconds = Math.floor((Date.parse(targetIso) - now.getTime()) / 1000);
  if (totalSeconds <= 0) return 'now';
  const days = Math.floor(totalSeconds / 86400);
  const hours = Math.floor((totalSeconds % 86400) / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  if (days > 0) return `${days}d ${hours}h`;
  if (hours > 0) return `${hours}h ${minutes}m`;
  return `${minutes}m`;
}
