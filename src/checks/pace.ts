/**
 * Week-over-week pacing: the weekly report and the early pace-drop alert.
 */

import { scopedLogger } from '../logger.js';
import { classifyTrend, paceSplit, trendIcon } from '../analytics/metrics.js';
import { DAY_MS, WEEK_MS, fmtDate } from '../analytics/time.js';
import { timestampsOf } from '../state/snapshot.js';
import { gmIdsFor } from '../state/topics.js';
import { campaignsWith, sendToCampaign } from './context.js';
import type { Check } from './context.js';
import type { PaceSplit } from '../types/index.js';

function perDay(count: number): string {
  return (count / 7).toFixed(1);
}

function weekLines(label: string, gm: number, players: number): string[] {
  const total = gm + players;
  return [
    label,
    `  GM: ${gm} posts (${perDay(gm)}/day)`,
    `  Players: ${players} posts (${perDay(players)}/day)`,
    `  Total: ${total} posts (${perDay(total)}/day)`,
  ];
}

export function formatPaceReport(name: string, split: PaceSplit, now: number): string {
  const thisWeek = split.gmThisWeek + split.playerThisWeek;
  const lastWeek = split.gmLastWeek + split.playerLastWeek;
  const icon = trendIcon(classifyTrend(thisWeek, lastWeek));
  const weekAgo = now - WEEK_MS;

  return [
    `${icon} Weekly pace for ${name}:`,
    '',
    ...weekLines(`This week (${fmtDate(weekAgo)} to ${fmtDate(now)}):`, split.gmThisWeek, split.playerThisWeek),
    '',
    ...weekLines(`Last week (${fmtDate(now - 2 * WEEK_MS)} to ${fmtDate(weekAgo)}):`, split.gmLastWeek, split.playerLastWeek),
    '',
    `Trend: ${icon}`,
  ].join('\n');
}

const paceLog = scopedLogger('Pace report');

export const paceReportCheck: Check = {
  label: 'Pace report',
  async run(ctx) {
    for (const { id, campaign } of campaignsWith(ctx, 'pace')) {
      if (!ctx.ledger.due('pace', id, ctx.settings.paceIntervalDays * DAY_MS, ctx.now)) continue;

      const byUser = timestampsOf(ctx.snapshot, id);
      if (byUser.size === 0) continue;

      const split = paceSplit(byUser, gmIdsFor(ctx.maps, id), ctx.now, ctx.settings.burstWindowMinutes);
      const thisWeek = split.gmThisWeek + split.playerThisWeek;
      const lastWeek = split.gmLastWeek + split.playerLastWeek;
      if (thisWeek === 0 && lastWeek === 0) continue;

      paceLog.info(`${campaign.name}: ${thisWeek} vs ${lastWeek}`);
      if (await sendToCampaign(ctx, campaign, formatPaceReport(campaign.name, split, ctx.now))) {
        ctx.ledger.mark('pace', id, ctx.now);
      }
    }
  },
};

const dropLog = scopedLogger('Pace drop');

/** True when last week was busy enough to compare and this week fell below the ratio. */
export function isPaceDrop(thisWeek: number, lastWeek: number, minPrevious: number, ratio: number): boolean {
  return lastWeek >= minPrevious && thisWeek < lastWeek * ratio;
}

export const paceDropCheck: Check = {
  label: 'Pace drop',
  async run(ctx) {
    const { paceDropIntervalDays, paceDropMinPrevious, paceDropRatio, burstWindowMinutes } = ctx.settings;

    for (const { id, campaign } of campaignsWith(ctx, 'paceDrop')) {
      if (!ctx.ledger.due('paceDrop', id, paceDropIntervalDays * DAY_MS, ctx.now)) continue;

      const split = paceSplit(timestampsOf(ctx.snapshot, id), gmIdsFor(ctx.maps, id), ctx.now, burstWindowMinutes);
      const thisWeek = split.gmThisWeek + split.playerThisWeek;
      const lastWeek = split.gmLastWeek + split.playerLastWeek;
      if (!isPaceDrop(thisWeek, lastWeek, paceDropMinPrevious, paceDropRatio)) continue;

      const drop = Math.round((1 - thisWeek / lastWeek) * 100);
      const message =
        `📉 Pace check for ${campaign.name}: ${thisWeek} posts this week, ` +
        `down ${drop}% from ${lastWeek} last week. Anyone stuck or waiting on something?`;

      dropLog.info(`${campaign.name}: ${thisWeek} vs ${lastWeek}`);
      if (await sendToCampaign(ctx, campaign, message)) {
        ctx.ledger.mark('paceDrop', id, ctx.now);
      }
    }
  },
};
