/**
 * Party roster digest and recruitment notices.
 */

import { scopedLogger } from '../logger.js';
import { collapseSessions } from '../analytics/sessions.js';
import { calcStreak, sessionsInWindow } from '../analytics/metrics.js';
import { DAY_MS, WEEK_MS, fmtRelativeDate } from '../analytics/time.js';
import { messageCountOf, playersOf, timestampsOf } from '../state/snapshot.js';
import { gmIdsFor } from '../state/topics.js';
import { fmtAvgGap, fullName, mention, plural, postsStr } from '../output/format.js';
import { campaignsWith, sendToCampaign } from './context.js';
import type { Check } from './context.js';

export interface RosterStats {
  total: number;
  sessions: number;
  weekSessions: number;
  avgGap: string;
  lastPost: string;
  streak: number;
}

export function rosterStats(timestamps: readonly number[], totalCount: number, now: number, windowMinutes: number): RosterStats {
  const sessions = collapseSessions(timestamps, windowMinutes);
  const last = timestamps.length > 0 ? Math.max(...timestamps) : null;
  return {
    total: totalCount,
    sessions: sessions.length,
    weekSessions: sessionsInWindow(timestamps, now - WEEK_MS, Infinity, windowMinutes).length,
    avgGap: fmtAvgGap(sessions),
    lastPost: last === null ? 'N/A' : fmtRelativeDate(now, last),
    streak: calcStreak(timestamps, now),
  };
}

/** One roster entry (player or GM). Streaks below two days are not shown. */
export function rosterBlock(label: string, username: string, stats: RosterStats): string {
  const lines = [label];
  if (username) lines.push(`- @${username}.`);
  lines.push(
    `- ${postsStr(stats.total)} total.`,
    `- ${stats.sessions} posting ${plural(stats.sessions, 'session')}.`,
    `- ${postsStr(stats.weekSessions)} in the last week.`,
    `- Average gap between posting: ${stats.avgGap}.`,
    `- Last post: ${stats.lastPost}.`,
  );
  if (stats.streak >= 2) lines.push(`- 🔥 ${stats.streak}-day streak.`);
  return lines.join('\n');
}

const rosterLog = scopedLogger('Roster summary');

export const rosterCheck: Check = {
  label: 'Roster summary',
  async run(ctx) {
    const { burstWindowMinutes, requiredPlayers, rosterIntervalDays } = ctx.settings;

    for (const { id, campaign } of campaignsWith(ctx, 'roster')) {
      if (!ctx.ledger.due('roster', id, rosterIntervalDays * DAY_MS, ctx.now)) continue;

      const players = playersOf(ctx.snapshot, id);
      const counts = ctx.snapshot.messageCounts[id] ?? {};
      if (players.length === 0 && Object.keys(counts).length === 0) continue;

      const byUser = timestampsOf(ctx.snapshot, id);
      const countOf = (userId: string) => messageCountOf(ctx.snapshot, { campaignId: id, userId });
      const blocks: string[] = [];

      for (const gmId of gmIdsFor(ctx.maps, id)) {
        const timestamps = byUser.get(gmId) ?? [];
        if (countOf(gmId) > 0 && timestamps.length > 0) {
          blocks.push(rosterBlock('GM', '', rosterStats(timestamps, countOf(gmId), ctx.now, burstWindowMinutes)));
        }
      }

      const sorted = [...players].sort((a, b) => countOf(b.userId) - countOf(a.userId));
      for (const player of sorted) {
        const timestamps = byUser.get(player.userId) ?? [];
        if (timestamps.length === 0) continue;
        const stats = rosterStats(timestamps, countOf(player.userId), ctx.now, burstWindowMinutes);
        const character = campaign.characters[player.userId];
        const label = character ? `${fullName(player)} (${character})` : fullName(player);
        blocks.push(rosterBlock(label, player.username, stats));
      }

      if (blocks.length === 0) continue;

      let footer = `\nParty size: ${players.length}/${requiredPlayers}.`;
      if (players.length < requiredPlayers) {
        const needed = requiredPlayers - players.length;
        footer += `\n${campaign.name} needs ${needed} more ${plural(needed, 'player')}!`;
      }

      const message = `Party roster for ${campaign.name}:\n\n${blocks.join('\n\n')}${footer}`;

      rosterLog.info(`posting roster for ${campaign.name}`);
      if (await sendToCampaign(ctx, campaign, message)) {
        ctx.ledger.mark('roster', id, ctx.now);
      }
    }
  },
};

const recruitLog = scopedLogger('Recruitment');

export const recruitmentCheck: Check = {
  label: 'Recruitment',
  async run(ctx) {
    const { requiredPlayers, recruitmentIntervalDays } = ctx.settings;

    for (const { id, campaign } of campaignsWith(ctx, 'recruitment')) {
      if (!ctx.ledger.due('recruitment', id, recruitmentIntervalDays * DAY_MS, ctx.now)) continue;

      const players = playersOf(ctx.snapshot, id);
      const needed = requiredPlayers - players.length;
      if (needed <= 0) {
        // Full roster: restart the interval without posting
        ctx.ledger.mark('recruitment', id, ctx.now);
        continue;
      }

      const rosterSection = players.length > 0
        ? `Current roster (${players.length}/${requiredPlayers}):\n${players.map(p => `- ${mention(p, campaign)}`).join('\n')}`
        : `Current roster: 0/${requiredPlayers} (no active players)`;

      const message =
        `📢 ${campaign.name} needs ${needed} more ${plural(needed, 'player')}!\n\n` +
        `${rosterSection}\n\n` +
        `Know anyone who'd like to join? Send them to the recruitment topic!`;

      recruitLog.info(`recruitment notice for ${campaign.name}: ${players.length}/${requiredPlayers}`);
      if (await sendToCampaign(ctx, campaign, message)) {
        ctx.ledger.mark('recruitment', id, ctx.now);
      }
    }
  },
};
