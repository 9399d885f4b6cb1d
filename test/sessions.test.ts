import { describe, expect, it } from 'vitest';
import { collapseSessions } from '../src/analytics/sessions.js';
import { MINUTE_MS } from '../src/analytics/time.js';

const T0 = Date.UTC(2026, 1, 10, 12, 0);
const at = (minutes: number): number => T0 + minutes * MINUTE_MS;

describe('collapseSessions', () => {
  it('returns nothing for no posts', () => {
    expect(collapseSessions([])).toEqual([]);
  });

  it('folds posts within the window into the first post of the burst', () => {
    expect(collapseSessions([at(0), at(3), at(9)], 10)).toEqual([at(0)]);
  });

  it('measures the window from the session start, not the previous post', () => {
    // 0, 8, 16: 16 is more than 10 minutes after 0 even though each gap is 8
    expect(collapseSessions([at(0), at(8), at(16)], 10)).toEqual([at(0), at(16)]);
  });

  it('keeps a post exactly at the window edge in the same session', () => {
    expect(collapseSessions([at(0), at(10), at(11)], 10)).toEqual([at(0), at(11)]);
  });

  it('ignores input order', () => {
    const posts = [at(45), at(0), at(30), at(2), at(31)];
    expect(collapseSessions(posts, 10)).toEqual([at(0), at(30), at(45)]);
  });

  it('is idempotent', () => {
    const once = collapseSessions([at(0), at(5), at(20), at(25), at(60)], 10);
    expect(collapseSessions(once, 10)).toEqual(once);
  });
});
