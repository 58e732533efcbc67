/**
 * Date helpers for DATE (`YYYY-MM-DD`) and TIME (`HH:MM:SS`) column values.
 * Everything is in the process's local time zone, which is also how pg
 * serializes `timestamp without time zone` parameters.
 */

const MINUTE_MS = 60_000;

function pad(value: number): string {
  return value.toString().padStart(2, '0');
}

export function toIsoDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

export function parseIsoDate(isoDate: string): Date {
  const [year, month, day] = isoDate.split('-').map((part) => parseInt(part, 10));
  return new Date(year, month - 1, day);
}

export function addDays(isoDate: string, days: number): string {
  const date = parseIsoDate(isoDate);
  date.setDate(date.getDate() + days);
  return toIsoDate(date);
}

/** Accepts `HH:MM` or `HH:MM:SS`; returns `HH:MM:SS`. */
export function normalizeTime(time: string): string {
  const [hours, minutes, seconds = '0'] = time.split(':');
  return `${pad(parseInt(hours, 10))}:${pad(parseInt(minutes, 10))}:${pad(parseInt(seconds, 10))}`;
}

export function minutesToTime(minutesSinceMidnight: number): string {
  return `${pad(Math.floor(minutesSinceMidnight / 60))}:${pad(minutesSinceMidnight % 60)}:00`;
}

export function combineDateTime(isoDate: string, time: string): Date {
  const [hours, minutes, seconds] = normalizeTime(time).split(':').map((part) => parseInt(part, 10));
  const date = parseIsoDate(isoDate);
  date.setHours(hours, minutes, seconds, 0);
  return date;
}

export function addMinutes(date: Date, minutes: number): Date {
  return new Date(date.getTime() + minutes * MINUTE_MS);
}

export function daysBefore(date: Date, days: number): Date {
  const shifted = new Date(date.getTime());
  shifted.setDate(shifted.getDate() - days);
  return shifted;
}
