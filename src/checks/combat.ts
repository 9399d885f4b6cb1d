import { scopedLogger } from '../logger.js';
import { fmtDate } from '../analytics/time.js';
import { getEntry, playersOf } from '../state/snapshot.js';
import { mention } from '../output/format.js';
import { campaignsWith, sendToCampaign } from './context.js';
import type { Check } from './context.js';

const log = scopedLogger('Combat pings');

/**
 * Players-phase reminders. Once everyone has acted the GM is told right
 * away; otherwise stragglers are pinged every few hours.
 */
export const combatPingCheck: Check = {
  label: 'Combat pings',
  async run(ctx) {
    for (const { id, campaign } of campaignsWith(ctx, 'combat')) {
      const combat = ctx.combat.get(id);
      if (!combat || combat.phase !== 'players') continue;

      const known = playersOf(ctx.snapshot, id).map(p => p.userId);

      if (ctx.combat.needsAllActedNotice(id, known)) {
        const message = `✅ All players have posted for round ${combat.round}. GM, the enemies are up!`;
        log.info(`${campaign.name}: all players acted in round ${combat.round}`);
        if (await sendToCampaign(ctx, campaign, message)) {
          ctx.combat.markAllActedNotified(id);
        }
        continue;
      }

      const ping = ctx.combat.duePing(id, known, ctx.now, ctx.settings.combatPingHours);
      if (!ping) continue;

      const waiting = ping.waitingOn
        .map(userId => getEntry(ctx.snapshot.players, { campaignId: id, userId }))
        .flatMap(player => (player ? [mention(player, campaign)] : []))
        .join(', ');
      const message =
        `Round ${ping.round} - waiting on: ${waiting}\n` +
        `(${Math.floor(ping.hoursElapsed)}h since players' phase started on ${fmtDate(ping.phaseStartedAt)})`;

      log.info(`${campaign.name}: waiting on ${waiting}`);
      if (await sendToCampaign(ctx, campaign, message)) {
        ctx.combat.markPinged(id, ctx.now);
      }
    }
  },
};
