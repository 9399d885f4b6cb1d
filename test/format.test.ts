import { describe, expect, it } from 'vitest';
import { HOUR_MS, MINUTE_MS, toIso } from '../src/analytics/time.js';
import { displayName, fmtAvgGap, fmtGapHours, fmtLongDate, fmtNumber, htmlEscape, mention, postsStr } from '../src/output/format.js';
import { buildCombatSummary, buildStatus } from '../src/output/replies.js';
import { pickBoons } from '../src/output/boons.js';
import { createEmptySnapshot } from '../src/state/snapshot.js';
import { addPlayer, addPosts, makeCampaign, NOW } from './helpers.js';

const mira = { userId: '1', firstName: 'Mira', lastName: 'Stone', username: '' };

describe('names', () => {
  it('prefers the handle and appends the character', () => {
    const campaign = makeCampaign({ characters: { '1': 'Vex' } });
    expect(mention(mira, campaign)).toBe('Mira Stone (Vex)');
    expect(mention({ ...mira, username: 'mira' })).toBe('@mira');
    expect(displayName({ ...mira, username: 'mira' })).toBe('Mira Stone (@mira)');
  });
});

describe('numbers and gaps', () => {
  it('formats counts', () => {
    expect(postsStr(1)).toBe('1 post');
    expect(postsStr(0)).toBe('0 posts');
    expect(fmtNumber(5000)).toBe('5,000');
  });

  it('formats gaps in minutes below an hour', () => {
    expect(fmtAvgGap([0])).toBe('N/A');
    expect(fmtAvgGap([0, 45 * MINUTE_MS])).toBe('45 minutes');
    expect(fmtAvgGap([0, 12.5 * HOUR_MS])).toBe('12.5 hours');
    expect(fmtGapHours(undefined)).toBe('N/A');
    expect(fmtGapHours(3.25)).toBe('3.3h');
  });

  it('formats long dates in UTC', () => {
    expect(fmtLongDate(Date.UTC(2024, 1, 14, 23, 30))).toBe('February 14, 2024');
  });

  it('escapes HTML', () => {
    expect(htmlEscape('<b>R&D</b>')).toBe('&lt;b&gt;R&amp;D&lt;/b&gt;');
  });
});

describe('buildStatus', () => {
  it('reports party, activity, risks, pause and combat', () => {
    const snapshot = createEmptySnapshot();
    addPlayer(snapshot, '10', '1', NOW - 2 * HOUR_MS, { firstName: 'Mira' });
    addPlayer(snapshot, '10', '2', NOW - 9 * 24 * HOUR_MS, { firstName: 'Tom' });
    addPosts(snapshot, '10', '1', [NOW - 2 * HOUR_MS]);
    addPosts(snapshot, '10', '900', [NOW - 3 * HOUR_MS]);
    snapshot.topics['10'] = { lastMessageTime: toIso(NOW - 2 * HOUR_MS), lastUserName: 'Mira', lastUserId: '1' };
    snapshot.paused['10'] = { pausedAt: toIso(NOW - 24 * HOUR_MS), reason: 'holidays' };

    const text = buildStatus({
      snapshot,
      campaignId: '10',
      campaign: makeCampaign(),
      gmIds: new Set(['900']),
      requiredPlayers: 6,
      windowMinutes: 10,
      now: NOW,
    });
    expect(text).toBe([
      'Status for Ashfall:',
      'Party: 2/6',
      'Last post: 2h ago',
      'This week: 1 player + 1 GM posts',
      'At risk: Tom (9d)',
      '⏸️ PAUSED: holidays (since 2026-02-17)',
    ].join('\n'));
  });
});

describe('buildCombatSummary', () => {
  it('closes with rounds, duration and the log', () => {
    const started = toIso(NOW - 26 * HOUR_MS);
    const text = buildCombatSummary({
      active: true,
      round: 3,
      phase: 'enemies',
      phaseStartedAt: started,
      startedAt: started,
      acted: [],
      lastPingAt: null,
      allActedNotified: false,
      enemies: [],
      log: [{ round: 1, text: 'Combat begins!', at: started }],
    }, makeCampaign(), NOW);
    expect(text).toBe('Combat ended in Ashfall after 3 rounds.\nStarted 2026-02-17, lasted 1d 2h.\n\n📜 Log:\n[R1] Combat begins!');
  });
});

describe('pickBoons', () => {
  it('draws three flavour boons and one mechanical boon without repeats', () => {
    const pool = { flavour: ['a', 'b', 'c', 'd'], mechanical: ['m'] };
    expect(pickBoons(pool, () => 0.99)).toEqual(['d', 'c', 'b', 'm']);
  });

  it('falls back to a generic boon when the pool is empty', () => {
    expect(pickBoons({ flavour: [], mechanical: [] })).toEqual(['Something mildly beneficial happens to you today.']);
  });
});
