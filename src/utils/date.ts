import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc.js';
import timezone from 'dayjs/plugin/timezone.js';

dayjs.extend(utc);
dayjs.extend(timezone);

export { dayjs };

const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

export function isIsoDate(value: string): boolean {
  if (!ISO_DATE_RE.test(value)) return false;
  const d = dayjs.utc(value);
  // Rejects rollovers such as 2026-02-30
  return d.isValid() && d.format('YYYY-MM-DD') === value;
}

export function isValidTimezone(zone: string): boolean {
  if (!zone || zone.trim().length === 0) return false;
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: zone });
    return true;
  } catch {
    return false;
  }
}

// Calendar date (YYYY-MM-DD) of an instant as seen in the given timezone.
// Returns null for unparseable input.
export function localDate(instant: string | Date, zone: string): string | null {
  const d = dayjs(instant);
  if (!d.isValid()) return null;
  return d.tz(zone).format('YYYY-MM-DD');
}

export function localYear(instant: Date, zone: string): number {
  return dayjs(instant).tz(zone).year();
}

export function localHour(instant: Date, zone: string): number {
  return dayjs(instant).tz(zone).hour();
}

export function addDays(date: string, days: number): string {
  return dayjs.utc(date).add(days, 'day').format('YYYY-MM-DD');
}

// Whole days from `from` to `to`; negative when `to` is earlier
export function daysBetween(from: string, to: string): number {
  return dayjs.utc(to).diff(dayjs.utc(from), 'day');
}

// The `count` dates ending at `end`, newest first
export function trailingDates(end: string, count: number): string[] {
  const dates: string[] = [];
  for (let i = 0; i < count; i++) dates.push(addDays(end, -i));
  return dates;
}

export function formatLocal(instant: Date, zone: string, pattern = 'YYYY-MM-DD HH:mm'): string {
  return dayjs(instant).tz(zone).format(pattern);
}

// Display helpers for reports: "Monday, Jan 05" and "Jan 05, 2026"
export function formatDayName(date: string): string {
  return dayjs.utc(date).format('dddd, MMM DD');
}

export function formatShortDate(date: string, withYear = false): string {
  return dayjs.utc(date).format(withYear ? 'MMM DD, YYYY' : 'MMM DD');
}
