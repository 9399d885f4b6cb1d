/**
 * Rolling activity metrics. Pure functions of their inputs; "now" is
 * always a parameter.
 */

import { collapseSessions } from './sessions.js';
import { HOUR_MS, WEEK_MS, utcDay } from './time.js';
import type { PaceSplit, Trend, UserId } from '../types/index.js';

/** Timestamps in `[after, before)`; `before` defaults to unbounded. */
export function inWindow(timestamps: readonly number[], after: number, before: number = Infinity): number[] {
  return timestamps.filter(ts => ts >= after && ts < before);
}

export function countInWindow(timestamps: readonly number[], after: number, before: number = Infinity): number {
  return inWindow(timestamps, after, before).length;
}

/**
 * Mean gap in hours between consecutive sessions.
 * Undefined below two sessions: there is no gap to measure.
 */
export function averageGapHours(sessions: readonly number[]): number | undefined {
  if (sessions.length < 2) return undefined;
  const sorted = [...sessions].sort((a, b) => a - b);
  // Consecutive gaps telescope to last - first
  return (sorted[sorted.length - 1] - sorted[0]) / HOUR_MS / (sorted.length - 1);
}

/**
 * Consecutive UTC calendar days with at least one post, counted back
 * from the most recent post day. Zero when the most recent post is
 * older than yesterday.
 */
export function calcStreak(timestamps: readonly number[], now: number): number {
  if (timestamps.length === 0) return 0;

  const days = new Set(timestamps.map(utcDay));
  const latest = Math.max(...days);
  if (latest < utcDay(now) - 1) return 0;

  let streak = 0;
  for (let day = latest; days.has(day); day--) {
    streak++;
  }
  return streak;
}

/**
 * Sessions for this week (`[now-7d, ∞)`) and last week (`[now-14d, now-7d)`),
 * split between the GM and everyone else.
 */
export function paceSplit(
  byUser: ReadonlyMap<UserId, readonly number[]>,
  gmIds: ReadonlySet<UserId>,
  now: number,
  windowMinutes: number,
): PaceSplit {
  const weekAgo = now - WEEK_MS;
  const twoWeeksAgo = now - 2 * WEEK_MS;
  const split: PaceSplit = { gmThisWeek: 0, gmLastWeek: 0, playerThisWeek: 0, playerLastWeek: 0 };

  for (const [userId, timestamps] of byUser) {
    const thisWeek = collapseSessions(inWindow(timestamps, weekAgo), windowMinutes).length;
    const lastWeek = collapseSessions(inWindow(timestamps, twoWeeksAgo, weekAgo), windowMinutes).length;
    if (gmIds.has(userId)) {
      split.gmThisWeek += thisWeek;
      split.gmLastWeek += lastWeek;
    } else {
      split.playerThisWeek += thisWeek;
      split.playerLastWeek += lastWeek;
    }
  }

  return split;
}

/**
 * Compare two period counts with a ±15% band treated as steady.
 * Integer cross-multiplication keeps the band edges exact.
 */
export function classifyTrend(recent: number, previous: number): Trend {
  if (recent === 0 && previous === 0) return 'no-data';
  if (previous === 0) return 'new';
  if (recent * 100 > previous * 115) return 'up';
  if (recent * 100 < previous * 85) return 'down';
  return 'steady';
}

const TREND_ICONS: Record<Trend, string> = {
  'no-data': '💤',
  new: '🆕',
  up: '📈',
  down: '📉',
  steady: '➡️',
};

export function trendIcon(trend: Trend): string {
  return TREND_ICONS[trend];
}

/** Sessions per user inside `[after, before)`. */
export function sessionsInWindow(
  timestamps: readonly number[],
  after: number,
  before: number,
  windowMinutes: number,
): number[] {
  return collapseSessions(inWindow(timestamps, after, before), windowMinutes);
}
