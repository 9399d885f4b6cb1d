import { describe, expect, it } from 'vitest';
import { DAY_MS, toIso } from '../src/analytics/time.js';
import { nextRung, warningLadderCheck } from '../src/checks/warnings.js';
import { addPlayer, makeContext, NOW } from './helpers.js';
import type { PlayerRecord } from '../src/types/index.js';

function player(lastWarnedWeek: number): PlayerRecord {
  return {
    userId: '1',
    firstName: 'Mira',
    lastName: '',
    username: '',
    lastPostTime: toIso(NOW),
    lastWarnedWeek,
    lastWarnedAt: null,
  };
}

describe('nextRung', () => {
  it('walks the warn weeks and then the removal week', () => {
    expect(nextRung(player(0), [1, 2, 3], 4)).toBe(1);
    expect(nextRung(player(2), [1, 2, 3], 4)).toBe(3);
    expect(nextRung(player(3), [1, 2, 3], 4)).toBe(4);
    expect(nextRung(player(4), [1, 2, 3], 4)).toBeNull();
  });
});

describe('warningLadderCheck', () => {
  it('sends one rung per run, a week apart, even when the player is long gone', async () => {
    const lastPost = NOW - 25 * DAY_MS;
    const ctx = makeContext();
    addPlayer(ctx.snapshot, '10', '1', lastPost, { firstName: 'Mira', username: 'mira' });

    await warningLadderCheck.run(ctx);
    expect(ctx.sink.texts()).toEqual([
      "@mira hasn't posted in Ashfall PBP for 25 days (last: 2026-01-24). Everything okay?",
    ]);
    expect(ctx.snapshot.players['10']['1']).toMatchObject({ lastWarnedWeek: 1, lastWarnedAt: toIso(NOW) });

    await warningLadderCheck.run({ ...ctx, now: NOW + DAY_MS });
    expect(ctx.sink.sent).toHaveLength(1);

    await warningLadderCheck.run({ ...ctx, now: NOW + 7 * DAY_MS });
    expect(ctx.sink.texts()[1]).toBe("@mira still no post in Ashfall PBP. It's been 32 days now (last: 2026-01-24).");
    expect(ctx.snapshot.players['10']['1'].lastWarnedWeek).toBe(2);
  });

  it('counts down to removal on the final warning', async () => {
    const ctx = makeContext();
    addPlayer(ctx.snapshot, '10', '1', NOW - 22 * DAY_MS, { firstName: 'Mira', lastWarnedWeek: 2 });

    await warningLadderCheck.run(ctx);
    expect(ctx.sink.texts()).toEqual([
      'Mira it\'s been 22 days without a post in Ashfall PBP (last: 2026-01-27). 1 week until auto-removal from the campaign.',
    ]);
  });

  it('removes the player only after the notice is delivered', async () => {
    const ctx = makeContext();
    addPlayer(ctx.snapshot, '10', '1', NOW - 29 * DAY_MS, { firstName: 'Mira', lastWarnedWeek: 3 });
    ctx.combat.start('10', [], NOW - DAY_MS);
    ctx.combat.recordAction('10', '1');

    ctx.sink.failSends = true;
    await warningLadderCheck.run(ctx);
    expect(ctx.snapshot.players['10']['1']).toBeDefined();

    ctx.sink.failSends = false;
    await warningLadderCheck.run(ctx);
    expect(ctx.sink.texts()).toEqual([
      'Mira has not posted in Ashfall PBP for 29 days (last: 2026-01-20). They are no longer tracked as an active player in this campaign.',
    ]);
    expect(ctx.snapshot.players['10']).toBeUndefined();
    expect(ctx.snapshot.removedPlayers['10']['1']).toMatchObject({ firstName: 'Mira', removedAt: toIso(NOW) });
    expect(ctx.snapshot.combat['10'].acted).toEqual([]);
  });

  it('holds warnings while the campaign is paused', async () => {
    const ctx = makeContext();
    addPlayer(ctx.snapshot, '10', '1', NOW - 10 * DAY_MS);
    ctx.snapshot.paused['10'] = { pausedAt: toIso(NOW - DAY_MS), reason: 'holidays' };

    await warningLadderCheck.run(ctx);
    expect(ctx.sink.sent).toHaveLength(0);
  });
});
