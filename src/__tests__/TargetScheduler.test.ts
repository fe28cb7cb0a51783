import { describe, expect, it } from 'vitest';
import { computeTargetState, dayNumber, effectiveDate, effectiveDateOf, targetCount, yearStart } from '../services/TargetScheduler.js';
import { ConfigError } from '../types/errors.js';

describe('effectiveDate', () => {
  it('counts time before the day boundary toward the previous day', () => {
    // 2026-03-10 is after the DST switch, so New York is UTC-4
    expect(effectiveDate(new Date('2026-03-10T07:59:00Z'), 4, 'America/New_York')).toBe('2026-03-09');
    expect(effectiveDate(new Date('2026-03-10T08:00:00Z'), 4, 'America/New_York')).toBe('2026-03-10');
  });

  it('uses the local calendar date with a midnight boundary', () => {
    expect(effectiveDate(new Date('2026-01-01T04:30:00Z'), 0, 'America/New_York')).toBe('2025-12-31');
    expect(effectiveDate(new Date('2026-01-01T05:00:00Z'), 0, 'America/New_York')).toBe('2026-01-01');
  });

  it('maps stored timestamps and rejects unreadable ones', () => {
    expect(effectiveDateOf('2026-01-05T02:30:00Z', 4, 'UTC')).toBe('2026-01-04');
    expect(effectiveDateOf('not a date', 4, 'UTC')).toBeNull();
    expect(effectiveDateOf('', 0, 'UTC')).toBeNull();
  });
});

describe('yearStart', () => {
  const now = new Date('2026-06-15T12:00:00Z');

  it('prefers the explicit override', () => {
    expect(yearStart({ yearStart: '2026-02-01', playlistName: 'Songs of the Day 2025', timezone: 'UTC' }, now)).toBe('2026-02-01');
  });

  it('falls back to the year in the playlist name', () => {
    expect(yearStart({ yearStart: null, playlistName: 'Songs of the Day 2025', timezone: 'UTC' }, now)).toBe('2025-01-01');
  });

  it('falls back to the current local year', () => {
    const newYearsEveInNewYork = new Date('2026-01-01T03:00:00Z');
    expect(yearStart({ yearStart: null, playlistName: 'Daily picks', timezone: 'America/New_York' }, newYearsEveInNewYork)).toBe('2025-01-01');
  });

  it('rejects a malformed override', () => {
    expect(() => yearStart({ yearStart: '2026-13-01', playlistName: 'x', timezone: 'UTC' }, now)).toThrow(ConfigError);
  });
});

describe('day numbers and targets', () => {
  it('starts at one on the first day', () => {
    expect(dayNumber('2026-01-01', '2026-01-01')).toBe(1);
    expect(targetCount('2026-01-01', '2026-01-01')).toBe(1);
  });

  it('counts every day of a leap year', () => {
    expect(dayNumber('2028-12-31', '2028-01-01')).toBe(366);
  });

  it('never targets a negative count before the year starts', () => {
    expect(dayNumber('2026-02-27', '2026-03-01')).toBe(-1);
    expect(targetCount('2026-02-27', '2026-03-01')).toBe(0);
  });

  it('grows by exactly one per day', () => {
    for (let d = 1; d < 28; d++) {
      const date = `2026-02-${String(d).padStart(2, '0')}`;
      const next = `2026-02-${String(d + 1).padStart(2, '0')}`;
      expect(targetCount(next, '2026-01-01') - targetCount(date, '2026-01-01')).toBe(1);
    }
  });

  it('computes the full state for a moment', () => {
    const state = computeTargetState(new Date('2026-02-01T12:00:00Z'), {
      timezone: 'UTC',
      dayBoundaryHour: 0,
      yearStart: null,
      playlistName: 'Songs of the Day 2026',
    });
    expect(state).toEqual({ effectiveDate: '2026-02-01', yearStart: '2026-01-01', dayNumber: 32, targetCount: 32 });
  });
});
