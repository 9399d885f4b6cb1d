import { MINUTE_MS } from './time.js';

export const DEFAULT_BURST_WINDOW_MINUTES = 10;

/**
 * Collapse raw post timestamps into posting sessions.
 *
 * A new session starts whenever a post lies more than `windowMinutes`
 * after the first post of the current session. Returns the first
 * timestamp of each session, ascending. Input order does not matter.
 */
export function collapseSessions(
  timestamps: readonly number[],
  windowMinutes: number = DEFAULT_BURST_WINDOW_MINUTES,
): number[] {
  if (timestamps.length === 0) return [];

  const sorted = [...timestamps].sort((a, b) => a - b);
  const windowMs = windowMinutes * MINUTE_MS;
  const sessions = [sorted[0]];
  let anchor = sorted[0];

  for (let i = 1; i < sorted.length; i++) {
    if (sorted[i] - anchor > windowMs) {
      sessions.push(sorted[i]);
      anchor = sorted[i];
    }
  }

  return sessions;
}
