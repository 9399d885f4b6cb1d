/**
 * Thread-level inactivity: the short "no new posts" nudge and the
 * one-shot silence alert.
 */

import { scopedLogger } from '../logger.js';
import { HOUR_MS, fmtDate, fmtDuration, hoursSince, toMs } from '../analytics/time.js';
import { messageCountOf } from '../state/snapshot.js';
import { campaignsWith, isPaused, sendToCampaign } from './context.js';
import type { Check } from './context.js';

const alertLog = scopedLogger('Topic alerts');

export const topicAlertCheck: Check = {
  label: 'Topic alerts',
  async run(ctx) {
    const alertHours = ctx.settings.alertAfterHours;

    for (const { id, campaign } of campaignsWith(ctx, 'alerts')) {
      if (isPaused(ctx, id)) continue;

      const topic = ctx.snapshot.topics[id];
      if (!topic) {
        alertLog.debug(`no messages tracked yet for ${campaign.name}, skipping`);
        continue;
      }

      const lastTime = toMs(topic.lastMessageTime);
      const elapsedHours = hoursSince(ctx.now, lastTime);
      if (elapsedHours < alertHours) continue;
      if (!ctx.ledger.due('topicAlert', id, alertHours * HOUR_MS, ctx.now)) continue;

      const count = messageCountOf(ctx.snapshot, { campaignId: id, userId: topic.lastUserId });
      const countStr = count > 0 ? ` (${count} total posts)` : '';
      const message =
        `No new posts in ${campaign.name} PBP for ${fmtDuration(elapsedHours)}.\n` +
        `Last post was from ${topic.lastUserName}${countStr} on ${fmtDate(lastTime)}.`;

      alertLog.info(`sending alert for ${campaign.name}: ${fmtDuration(elapsedHours)} inactive`);
      if (await sendToCampaign(ctx, campaign, message)) {
        ctx.ledger.mark('topicAlert', id, ctx.now);
      }
    }
  },
};

const silenceLog = scopedLogger('Silence alert');

export const silenceAlertCheck: Check = {
  label: 'Silence alert',
  async run(ctx) {
    for (const { id, campaign } of campaignsWith(ctx, 'silence')) {
      if (isPaused(ctx, id)) continue;

      const topic = ctx.snapshot.topics[id];
      if (!topic) continue;

      const hours = hoursSince(ctx.now, toMs(topic.lastMessageTime));
      if (hours < ctx.settings.silenceAlertHours) {
        ctx.ledger.clearSilence(id);
        continue;
      }
      // One alert per silent stretch, keyed by the last post it covers
      if (ctx.ledger.silencedAt(id) === topic.lastMessageTime) continue;

      const message =
        `💤 ${campaign.name} has been silent for ${fmtDuration(hours)}.\n` +
        `Last post was from ${topic.lastUserName}. Who's up next?`;

      silenceLog.info(`${campaign.name} silent for ${fmtDuration(hours)}`);
      if (await sendToCampaign(ctx, campaign, message)) {
        ctx.ledger.markSilence(id, topic.lastMessageTime);
      }
    }
  },
};
