import { describe, expect, it } from 'vitest';
import {
  DAY_MS,
  HOUR_MS,
  fmtBriefRelative,
  fmtDuration,
  fmtRelativeDate,
  intervalElapsed,
  isoWeekKey,
  startOfIsoWeek,
  toIso,
} from '../src/analytics/time.js';

describe('isoWeekKey', () => {
  it('places early January days in the previous ISO year when needed', () => {
    // Friday 1 January 2027 belongs to 2026-W53
    expect(isoWeekKey(Date.UTC(2027, 0, 1))).toBe('2026-W53');
    expect(isoWeekKey(Date.UTC(2027, 0, 4))).toBe('2027-W01');
  });

  it('zero-pads the week number', () => {
    expect(isoWeekKey(Date.UTC(2026, 1, 11))).toBe('2026-W07');
  });
});

describe('startOfIsoWeek', () => {
  it('returns Monday midnight UTC', () => {
    expect(startOfIsoWeek(Date.UTC(2026, 1, 15, 23, 30))).toBe(Date.UTC(2026, 1, 9));
    expect(startOfIsoWeek(Date.UTC(2026, 1, 9, 0, 0))).toBe(Date.UTC(2026, 1, 9));
  });
});

describe('intervalElapsed', () => {
  const now = Date.UTC(2026, 1, 20);

  it('is due when never fired', () => {
    expect(intervalElapsed(null, DAY_MS, now)).toBe(true);
  });

  it('is due exactly at the interval', () => {
    expect(intervalElapsed(toIso(now - DAY_MS), DAY_MS, now)).toBe(true);
    expect(intervalElapsed(toIso(now - DAY_MS + 1), DAY_MS, now)).toBe(false);
  });
});

describe('relative formatting', () => {
  const now = Date.UTC(2026, 1, 20, 12);

  it('formats brief relative times', () => {
    expect(fmtBriefRelative(now, null).text).toBe('never');
    expect(fmtBriefRelative(now, now - 5 * HOUR_MS).text).toBe('5h ago');
    expect(fmtBriefRelative(now, now - 30 * HOUR_MS).text).toBe('yesterday');
    expect(fmtBriefRelative(now, now - 3 * DAY_MS).text).toBe('3d ago');
  });

  it('adds the absolute date', () => {
    expect(fmtRelativeDate(now, now - 5 * DAY_MS)).toBe('5d ago (2026-02-15)');
  });

  it('formats durations', () => {
    expect(fmtDuration(5.9)).toBe('5h');
    expect(fmtDuration(53)).toBe('2d 5h');
  });
});
