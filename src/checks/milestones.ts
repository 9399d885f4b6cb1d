/**
 * One-shot celebrations for monotonic thresholds: posting streaks,
 * campaign anniversaries and message counts.
 */

import { scopedLogger } from '../logger.js';
import { calcStreak } from '../analytics/metrics.js';
import { toMs } from '../analytics/time.js';
import { playersOf, timestampsOf } from '../state/snapshot.js';
import { displayName, fmtLongDate, fmtNumber, mention, plural } from '../output/format.js';
import { campaignsWith, sendToCampaign } from './context.js';
import type { Check } from './context.js';
import type { ActivitySnapshot, CampaignId } from '../types/index.js';

/** Highest milestone reached by `streak`, or 0. Milestones ascend. */
export function reachedMilestone(streak: number, milestones: readonly number[]): number {
  let reached = 0;
  for (const milestone of milestones) {
    if (streak >= milestone) reached = milestone;
  }
  return reached;
}

const streakLog = scopedLogger('Streak milestones');

export const streakMilestoneCheck: Check = {
  label: 'Streak milestones',
  async run(ctx) {
    for (const { id, campaign } of campaignsWith(ctx, 'streaks')) {
      const byUser = timestampsOf(ctx.snapshot, id);

      for (const player of playersOf(ctx.snapshot, id)) {
        const key = { campaignId: id, userId: player.userId };
        const streak = calcStreak(byUser.get(player.userId) ?? [], ctx.now);
        const celebrated = ctx.ledger.celebratedStreak(key);

        if (streak < celebrated) {
          // The streak broke; a new one may be celebrated from scratch
          ctx.ledger.resetStreak(key);
        }

        const reached = reachedMilestone(streak, ctx.settings.streakMilestones);
        if (reached === 0 || reached <= ctx.ledger.celebratedStreak(key)) continue;

        const message = `🔥 ${mention(player, campaign)} is on a ${reached}-day posting streak in ${campaign.name}! Keep it going.`;
        streakLog.info(`${displayName(player)} in ${campaign.name}: ${reached} days`);
        if (await sendToCampaign(ctx, campaign, message)) {
          ctx.ledger.markStreak(key, reached);
        }
      }
    }
  },
};

const anniversaryLog = scopedLogger('Anniversaries');

export const anniversaryCheck: Check = {
  label: 'Anniversaries',
  async run(ctx) {
    const today = new Date(ctx.now);

    for (const { id, campaign } of campaignsWith(ctx, 'anniversary')) {
      if (!campaign.created) continue;

      const createdMs = toMs(`${campaign.created}T00:00:00Z`);
      if (Number.isNaN(createdMs)) continue;
      const created = new Date(createdMs);

      if (today.getUTCMonth() !== created.getUTCMonth() || today.getUTCDate() !== created.getUTCDate()) continue;

      const years = today.getUTCFullYear() - created.getUTCFullYear();
      if (years < 1 || ctx.ledger.anniversaryFired(id, years)) continue;

      const message =
        `🎂 ${campaign.name} is ${years} ${plural(years, 'year')} old today!\n\n` +
        `Campaign started ${fmtLongDate(createdMs)}. Here's to more adventures ahead.`;

      anniversaryLog.info(`${campaign.name}: ${years} ${plural(years, 'year')}`);
      if (await sendToCampaign(ctx, campaign, message)) {
        ctx.ledger.markAnniversary(id, years, ctx.now);
      }
    }
  },
};

export function totalMessages(snapshot: ActivitySnapshot, campaignId: CampaignId): number {
  return Object.values(snapshot.messageCounts[campaignId] ?? {}).reduce((sum, n) => sum + n, 0);
}

/** Largest multiple of `step` not above `total`. */
export function crossedStep(total: number, step: number): number {
  return Math.floor(total / step) * step;
}

const messageLog = scopedLogger('Message milestones');

export const messageMilestoneCheck: Check = {
  label: 'Message milestones',
  async run(ctx) {
    const { campaignMessageStep, globalMessageStep } = ctx.settings;

    for (const { id, campaign } of campaignsWith(ctx, 'milestones')) {
      const step = crossedStep(totalMessages(ctx.snapshot, id), campaignMessageStep);
      if (step === 0 || step <= ctx.ledger.campaignStep(id)) continue;

      const message = `🎉 ${campaign.name} just passed ${fmtNumber(step)} messages! Thanks to everyone keeping the story moving.`;
      messageLog.info(`${campaign.name}: ${step}`);
      if (await sendToCampaign(ctx, campaign, message)) {
        ctx.ledger.markCampaignStep(id, step);
      }
    }

    const topicId = ctx.config.leaderboardTopicId;
    if (topicId === null) return;

    let total = 0;
    for (const id of ctx.maps.campaigns.keys()) total += totalMessages(ctx.snapshot, id);
    const step = crossedStep(total, globalMessageStep);
    if (step === 0 || step <= ctx.ledger.globalStep()) return;

    const message = `🏆 The community just passed ${fmtNumber(step)} messages across ${ctx.maps.campaigns.size} ${plural(ctx.maps.campaigns.size, 'campaign')}!`;
    messageLog.info(`all campaigns: ${step}`);
    if (await ctx.sink.send(ctx.config.groupId, topicId, message)) {
      ctx.ledger.markGlobalStep(step);
    }
  },
};
