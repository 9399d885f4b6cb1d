/**
 * Time arithmetic on epoch milliseconds. Every function takes "now"
 * explicitly; nothing here reads the wall clock.
 */

export const MINUTE_MS = 60_000;
export const HOUR_MS = 60 * MINUTE_MS;
export const DAY_MS = 24 * HOUR_MS;
export const WEEK_MS = 7 * DAY_MS;

export function toMs(iso: string): number {
  return Date.parse(iso);
}

export function toIso(ms: number): string {
  return new Date(ms).toISOString();
}

export function hoursSince(now: number, then: number): number {
  return (now - then) / HOUR_MS;
}

export function daysSince(now: number, then: number): number {
  return (now - then) / DAY_MS;
}

/** True when `lastIso` is unset or at least `intervalMs` lies between it and now. */
export function intervalElapsed(lastIso: string | null | undefined, intervalMs: number, now: number): boolean {
  if (!lastIso) return true;
  return now - toMs(lastIso) >= intervalMs;
}

/** UTC calendar day number (days since the epoch). */
export function utcDay(ms: number): number {
  return Math.floor(ms / DAY_MS);
}

/** YYYY-MM-DD in UTC. */
export function fmtDate(ms: number): string {
  return new Date(ms).toISOString().slice(0, 10);
}

/** ISO-8601 week of a UTC instant, e.g. `{ year: 2026, week: 7 }`. */
export function isoWeek(ms: number): { year: number; week: number } {
  const weekday = new Date(ms).getUTCDay() || 7; // Monday = 1 .. Sunday = 7
  // The Thursday of the same ISO week decides the year
  const thursday = new Date((utcDay(ms) + 4 - weekday) * DAY_MS);
  const year = thursday.getUTCFullYear();
  const week = Math.ceil(((thursday.getTime() - Date.UTC(year, 0, 1)) / DAY_MS + 1) / 7);
  return { year, week };
}

export function isoWeekKey(ms: number): string {
  const { year, week } = isoWeek(ms);
  return `${year}-W${String(week).padStart(2, '0')}`;
}

/** Midnight UTC of the Monday starting the ISO week containing `ms`. */
export function startOfIsoWeek(ms: number): number {
  const day = utcDay(ms);
  const weekday = (new Date(day * DAY_MS).getUTCDay() + 6) % 7;
  return (day - weekday) * DAY_MS;
}

/** Compact relative time: "today", "5h ago", "yesterday", "3d ago", "never". */
export function fmtBriefRelative(now: number, then: number | null): { text: string; days: number } {
  if (then === null) return { text: 'never', days: Infinity };
  const days = daysSince(now, then);
  if (days < 1 / 24) return { text: 'today', days };
  if (days < 1) return { text: `${Math.floor(days * 24)}h ago`, days };
  if (days < 2) return { text: 'yesterday', days };
  return { text: `${Math.floor(days)}d ago`, days };
}

/** Relative plus absolute date, e.g. "5d ago (2026-02-10)". */
export function fmtRelativeDate(now: number, then: number): string {
  const daysAgo = Math.floor(daysSince(now, then));
  const date = fmtDate(then);
  if (daysAgo <= 0) return `today (${date})`;
  if (daysAgo === 1) return `yesterday (${date})`;
  return `${daysAgo}d ago (${date})`;
}

/** "2d 5h" above a day, "5h" below. */
export function fmtDuration(hours: number): string {
  const whole = Math.floor(hours);
  const days = Math.floor(whole / 24);
  return days > 0 ? `${days}d ${whole % 24}h` : `${whole}h`;
}
