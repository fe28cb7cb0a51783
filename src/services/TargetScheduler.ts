import { addDays, dayjs, daysBetween, isIsoDate, localDate, localHour } from '../utils/date.js';
import { ConfigError } from '../types/errors.js';

export interface TargetState {
  effectiveDate: string;
  yearStart: string;
  dayNumber: number; // may be <= 0 before the year starts
  targetCount: number;
}

export interface SchedulerSettings {
  timezone: string;
  dayBoundaryHour: number;
  yearStart: string | null;
  playlistName: string;
}

const YEAR_TOKEN_RE = /20\d\d/;

/**
 * Calendar date that "now" counts toward. Plays before `dayBoundaryHour`
 * (local time) belong to the previous day.
 */
export function effectiveDate(now: Date, dayBoundaryHour: number, zone: string): string {
  const today = localDate(now, zone);
  if (today === null) {
    throw new ConfigError(`Cannot resolve the current date in timezone ${zone}.`);
  }
  return localHour(now, zone) < dayBoundaryHour ? addDays(today, -1) : today;
}

// Effective date of a stored timestamp; null when it cannot be parsed
export function effectiveDateOf(instant: string, dayBoundaryHour: number, zone: string): string | null {
  const d = dayjs(instant);
  if (!instant || !d.isValid()) return null;
  return effectiveDate(d.toDate(), dayBoundaryHour, zone);
}

/**
 * First day of the counting year: the explicit override, else Jan 1 of the
 * first 20xx token in the playlist name, else Jan 1 of the current local year.
 */
export function yearStart(settings: Pick<SchedulerSettings, 'yearStart' | 'playlistName' | 'timezone'>, now: Date): string {
  if (settings.yearStart !== null) {
    if (!isIsoDate(settings.yearStart)) {
      throw new ConfigError(`Invalid year_start "${settings.yearStart}": expected YYYY-MM-DD.`);
    }
    return settings.yearStart;
  }
  const token = settings.playlistName.match(YEAR_TOKEN_RE);
  if (token) return `${token[0]}-01-01`;

  const today = localDate(now, settings.timezone);
  if (today === null) {
    throw new ConfigError(`Cannot resolve the current date in timezone ${settings.timezone}.`);
  }
  return `${today.slice(0, 4)}-01-01`;
}

export function dayNumber(date: string, start: string): number {
  return daysBetween(start, date) + 1;
}

export function targetCount(date: string, start: string): number {
  return Math.max(0, dayNumber(date, start));
}

export function computeTargetState(now: Date, settings: SchedulerSettings): TargetState {
  const eff = effectiveDate(now, settings.dayBoundaryHour, settings.timezone);
  const start = yearStart(settings, now);
  const day = dayNumber(eff, start);
  return {
    effectiveDate: eff,
    yearStart: start,
    dayNumber: day,
    targetCount: Math.max(0, day),
  };
}
