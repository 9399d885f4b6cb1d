import { describe, expect, it } from 'vitest';
import { DAY_MS } from '../src/analytics/time.js';
import {
  anniversaryCheck,
  crossedStep,
  messageMilestoneCheck,
  reachedMilestone,
  streakMilestoneCheck,
} from '../src/checks/milestones.js';
import { setEntry } from '../src/state/snapshot.js';
import { addPlayer, addPosts, dailyPosts, makeCampaign, makeConfig, makeContext, NOW } from './helpers.js';

describe('reachedMilestone', () => {
  it('returns the highest milestone at or below the streak', () => {
    expect(reachedMilestone(6, [7, 14, 30])).toBe(0);
    expect(reachedMilestone(7, [7, 14, 30])).toBe(7);
    expect(reachedMilestone(20, [7, 14, 30])).toBe(14);
  });
});

describe('streakMilestoneCheck', () => {
  it('celebrates each milestone once and again after the streak breaks', async () => {
    const ctx = makeContext();
    addPlayer(ctx.snapshot, '10', '1', NOW, { firstName: 'Mira', username: 'mira' });
    addPosts(ctx.snapshot, '10', '1', dailyPosts(NOW, 7));

    await streakMilestoneCheck.run(ctx);
    await streakMilestoneCheck.run(ctx);
    expect(ctx.sink.texts()).toEqual(['🔥 @mira is on a 7-day posting streak in Ashfall! Keep it going.']);
    expect(ctx.ledger.celebratedStreak({ campaignId: '10', userId: '1' })).toBe(7);

    // Three silent days break the streak
    const later = NOW + 3 * DAY_MS;
    await streakMilestoneCheck.run({ ...ctx, now: later });
    expect(ctx.ledger.celebratedStreak({ campaignId: '10', userId: '1' })).toBe(0);

    const restart = NOW + 10 * DAY_MS;
    addPosts(ctx.snapshot, '10', '1', dailyPosts(restart, 7));
    await streakMilestoneCheck.run({ ...ctx, now: restart });
    expect(ctx.sink.sent).toHaveLength(2);
  });
});

describe('anniversaryCheck', () => {
  it('fires on the creation date, once per year', async () => {
    const ctx = makeContext({ config: makeConfig([makeCampaign({ created: '2024-02-18' })]) });

    await anniversaryCheck.run(ctx);
    await anniversaryCheck.run(ctx);
    expect(ctx.sink.texts()).toEqual([
      "🎂 Ashfall is 2 years old today!\n\nCampaign started February 18, 2024. Here's to more adventures ahead.",
    ]);
  });

  it('ignores other days and the creation year itself', async () => {
    const other = makeContext({ config: makeConfig([makeCampaign({ created: '2024-02-19' })]) });
    await anniversaryCheck.run(other);
    const fresh = makeContext({ config: makeConfig([makeCampaign({ created: '2026-02-18' })]) });
    await anniversaryCheck.run(fresh);
    expect(other.sink.sent).toHaveLength(0);
    expect(fresh.sink.sent).toHaveLength(0);
  });
});

describe('crossedStep', () => {
  it('rounds down to the step', () => {
    expect(crossedStep(1499, 500)).toBe(1000);
    expect(crossedStep(499, 500)).toBe(0);
  });
});

describe('messageMilestoneCheck', () => {
  it('celebrates campaign and community totals once each', async () => {
    const config = makeConfig(undefined, { globalMessageStep: 1000 }, { leaderboardTopicId: 50 });
    const ctx = makeContext({ config });
    setEntry(ctx.snapshot.messageCounts, { campaignId: '10', userId: '1' }, 700);
    setEntry(ctx.snapshot.messageCounts, { campaignId: '10', userId: '2' }, 320);

    await messageMilestoneCheck.run(ctx);
    await messageMilestoneCheck.run(ctx);
    expect(ctx.sink.sent).toEqual([
      { chatId: config.groupId, threadId: 12, text: '🎉 Ashfall just passed 1,000 messages! Thanks to everyone keeping the story moving.' },
      { chatId: config.groupId, threadId: 50, text: '🏆 The community just passed 1,000 messages across 1 campaign!' },
    ]);
  });
});
