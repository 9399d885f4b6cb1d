import { scopedLogger } from '../logger.js';
import { averageGapHours, sessionsInWindow } from '../analytics/metrics.js';
import { WEEK_MS, isoWeekKey, startOfIsoWeek } from '../analytics/time.js';
import { playersOf } from '../state/snapshot.js';
import { allCampaignActivity } from './context.js';
import type { Check } from './context.js';
import type { CampaignActivity } from '../analytics/ranking.js';
import type { WeeklyArchiveEntry } from '../types/index.js';

const log = scopedLogger('Archive');

const TOP_PLAYERS = 5;

/** Session totals for one campaign over `[weekStart, weekStart + 7d)`. */
export function summariseWeek(
  activity: CampaignActivity,
  week: string,
  weekStart: number,
  activePlayers: number,
  windowMinutes: number,
): WeeklyArchiveEntry {
  const weekEnd = weekStart + WEEK_MS;
  let gmPosts = 0;
  let playerPosts = 0;
  const playerSessions: number[] = [];
  const counts = new Map<string, number>();

  for (const [userId, timestamps] of activity.byUser) {
    const sessions = sessionsInWindow(timestamps, weekStart, weekEnd, windowMinutes);
    if (activity.gmIds.has(userId)) {
      gmPosts += sessions.length;
      continue;
    }
    playerPosts += sessions.length;
    playerSessions.push(...sessions);
    if (sessions.length > 0) {
      const name = activity.people.get(userId)?.name ?? userId;
      counts.set(name, (counts.get(name) ?? 0) + sessions.length);
    }
  }

  const gap = averageGapHours(playerSessions);
  const top = [...counts].sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0])).slice(0, TOP_PLAYERS);

  return {
    campaign: activity.name,
    week,
    gmPosts,
    playerPosts,
    totalPosts: gmPosts + playerPosts,
    playerAvgGapHours: gap === undefined ? null : Math.round(gap * 10) / 10,
    activePlayers,
    topPlayers: Object.fromEntries(top),
  };
}

/**
 * Once per ISO week, store last week's Monday-to-Monday totals for every
 * campaign, keyed `<campaign id>:<YYYY-Www>`.
 */
export const archiveCheck: Check = {
  label: 'Archive',
  async run(ctx) {
    const lastWeek = ctx.now - WEEK_MS;
    const week = isoWeekKey(lastWeek);
    if (ctx.ledger.lastArchivedWeek() === week) return;

    const weekStart = startOfIsoWeek(lastWeek);
    const archive = await ctx.archive.load();

    for (const activity of allCampaignActivity(ctx)) {
      archive[`${activity.campaignId}:${week}`] = summariseWeek(
        activity,
        week,
        weekStart,
        playersOf(ctx.snapshot, activity.campaignId).length,
        ctx.settings.burstWindowMinutes,
      );
    }

    await ctx.archive.save(archive);
    ctx.ledger.markArchivedWeek(week);
    log.info(`archived weekly data for ${week}`);
  },
};
