import { describe, expect, it } from 'vitest';
import { HOUR_MS, MINUTE_MS, toIso } from '../src/analytics/time.js';
import { recruitmentCheck, rosterBlock, rosterCheck, rosterStats } from '../src/checks/roster.js';
import { addPlayer, addPosts, dailyPosts, makeConfig, makeCampaign, makeContext, NOW } from './helpers.js';

describe('rosterStats', () => {
  it('summarises a player\'s posting', () => {
    const posts = [NOW - HOUR_MS, NOW - HOUR_MS + 2 * MINUTE_MS, NOW - 25 * HOUR_MS];
    expect(rosterStats(posts, 3, NOW, 10)).toEqual({
      total: 3,
      sessions: 2,
      weekSessions: 2,
      avgGap: '24.0 hours',
      lastPost: 'today (2026-02-18)',
      streak: 2,
    });
  });
});

describe('rosterBlock', () => {
  it('shows the streak line only from two days', () => {
    const stats = { total: 1, sessions: 1, weekSessions: 1, avgGap: 'N/A', lastPost: 'today (2026-02-18)', streak: 1 };
    expect(rosterBlock('Mira', 'mira', stats)).toBe([
      'Mira',
      '- @mira.',
      '- 1 post total.',
      '- 1 posting session.',
      '- 1 post in the last week.',
      '- Average gap between posting: N/A.',
      '- Last post: today (2026-02-18).',
    ].join('\n'));
    expect(rosterBlock('Mira', '', { ...stats, streak: 3 }).endsWith('\n- 🔥 3-day streak.')).toBe(true);
  });
});

describe('rosterCheck', () => {
  it('lists the GM first, then players by post count, with the party footer', async () => {
    const ctx = makeContext({ config: makeConfig([makeCampaign({ characters: { '2': 'Vex' } })]) });
    addPosts(ctx.snapshot, '10', '900', [NOW - 2 * HOUR_MS]);
    addPlayer(ctx.snapshot, '10', '1', NOW - HOUR_MS, { firstName: 'Mira' });
    addPosts(ctx.snapshot, '10', '1', [NOW - HOUR_MS]);
    addPlayer(ctx.snapshot, '10', '2', NOW - HOUR_MS, { firstName: 'Tom', lastName: 'Reed' });
    addPosts(ctx.snapshot, '10', '2', [NOW - HOUR_MS, NOW - 3 * HOUR_MS]);

    await rosterCheck.run(ctx);
    const [text] = ctx.sink.texts();
    const labels = text.split('\n\n').map(block => block.split('\n')[0]);
    expect(labels).toEqual(['Party roster for Ashfall:', 'GM', 'Tom Reed (Vex)', 'Mira']);
    expect(text.endsWith('\nParty size: 2/6.\nAshfall needs 4 more players!')).toBe(true);
    expect(ctx.ledger.lastFired('roster', '10')).toBe(toIso(NOW));
  });

  it('skips campaigns with nothing to show', async () => {
    const ctx = makeContext();
    await rosterCheck.run(ctx);
    expect(ctx.sink.sent).toHaveLength(0);
  });
});

describe('recruitmentCheck', () => {
  it('asks for more players with the current roster', async () => {
    const ctx = makeContext({ config: makeConfig(undefined, { requiredPlayers: 3 }) });
    addPlayer(ctx.snapshot, '10', '1', NOW, { firstName: 'Mira', username: 'mira' });

    await recruitmentCheck.run(ctx);
    expect(ctx.sink.texts()).toEqual([
      '📢 Ashfall needs 2 more players!\n\nCurrent roster (1/3):\n- @mira\n\n' +
      "Know anyone who'd like to join? Send them to the recruitment topic!",
    ]);
  });

  it('restarts the interval silently when the party is full', async () => {
    const ctx = makeContext({ config: makeConfig(undefined, { requiredPlayers: 1 }) });
    addPlayer(ctx.snapshot, '10', '1', NOW);
    addPosts(ctx.snapshot, '10', '1', dailyPosts(NOW, 1));

    await recruitmentCheck.run(ctx);
    expect(ctx.sink.sent).toHaveLength(0);
    expect(ctx.ledger.lastFired('recruitment', '10')).toBe(toIso(NOW));
  });
});
