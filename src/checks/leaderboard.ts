/**
 * Group-wide posts: the cross-campaign leaderboard and the weekly digest.
 */

import { scopedLogger } from '../logger.js';
import { buildCampaignStanding, buildLeaderboard, rankIcon } from '../analytics/ranking.js';
import { trendIcon } from '../analytics/metrics.js';
import { DAY_MS, WEEK_MS, fmtBriefRelative, fmtDate, isoWeek } from '../analytics/time.js';
import { DIVIDER, fmtGapHours, plural, postsStr } from '../output/format.js';
import { allCampaignActivity } from './context.js';
import type { Check } from './context.js';
import type { CampaignStanding, Leaderboard, PlayerTally } from '../analytics/ranking.js';

function playerBlock(index: number, tally: PlayerTally, detail: string): string {
  const lines = [`${rankIcon(index)} ${tally.name}`];
  if (tally.username) lines.push(`- @${tally.username}`);
  lines.push(`- ${detail}`);
  return lines.join('\n');
}

function campaignBlock(index: number, standing: CampaignStanding, now: number): string {
  const header = [
    `[${rankIcon(index)} ${standing.name} ${trendIcon(standing.trend)}]`,
    `- ${standing.player7d} player posts.`,
    `- ${postsStr(standing.total7d)} total.`,
    `- ${standing.gm7d} GM posts.`,
    `- Avg gap: ${fmtGapHours(standing.avgGapHours)}.`,
    `- Last post: ${fmtBriefRelative(now, standing.lastPostAt).text}.`,
  ].join('\n');
  const players = standing.topPlayers.map((p, j) => playerBlock(j, p, postsStr(p.count)));
  return players.length > 0 ? `${header}\n\n${players.join('\n')}` : header;
}

export function formatLeaderboard(board: Leaderboard, now: number): string {
  const { week } = isoWeek(now);
  const lines = [
    `📊 Weekly Campaign Leaderboard, Week ${week} (${fmtDate(now - WEEK_MS)} to ${fmtDate(now)})`,
    `This week: ${board.totals.player} player + ${board.totals.gm} GM posts`,
  ];

  board.active.forEach((standing, i) => {
    lines.push(`\n${DIVIDER}\n\n${campaignBlock(i, standing, now)}`);
  });

  if (board.dead.length > 0) {
    lines.push('\n⚠️ Dead campaigns (0 posts in 7 days):');
    for (const standing of board.dead) {
      lines.push(`💀 [${standing.name}] (last post: ${fmtBriefRelative(now, standing.lastPostAt).text})`);
    }
  }

  if (board.fastestGaps.length > 0) {
    lines.push(`\n${DIVIDER}\n\n⏱ Fastest player response gaps:`);
    board.fastestGaps.forEach((standing, i) => {
      lines.push(`${rankIcon(i)} ${standing.name}: ${fmtGapHours(standing.playerAvgGapHours)}`);
    });
  }

  if (board.topPlayers.length > 0) {
    const mvp = board.topPlayers[0];
    lines.push(`\n${DIVIDER}\n\n🏅 MVP of the Week: ${mvp.name} with ${postsStr(mvp.count)}. Earns a Hero Point!`);
    const blocks = board.topPlayers.map((p, i) =>
      playerBlock(i, p, `${postsStr(p.count)} across ${p.campaigns} ${plural(p.campaigns, 'campaign')}`),
    );
    lines.push(`\n⭐ Top Players of the Week:\n\n${blocks.join('\n\n')}`);
  }

  if (board.streaks.length > 0) {
    lines.push(`\n${DIVIDER}\n\n🔥 Longest Active Streaks:`);
    board.streaks.slice(0, 5).forEach((entry, i) => {
      lines.push(`${rankIcon(i)} ${entry.name}: ${entry.streak}-day streak (${entry.campaignName})`);
    });
  }

  return lines.join('\n');
}

const leaderboardLog = scopedLogger('Leaderboard');

export const leaderboardCheck: Check = {
  label: 'Leaderboard',
  async run(ctx) {
    const topicId = ctx.config.leaderboardTopicId;
    if (topicId === null) return;
    if (!ctx.ledger.globalDue('leaderboard', ctx.settings.leaderboardIntervalDays * DAY_MS, ctx.now)) return;

    const activities = allCampaignActivity(ctx);
    if (activities.length === 0) {
      leaderboardLog.info('no campaign data');
      return;
    }

    const board = buildLeaderboard(activities, ctx.now, ctx.settings.burstWindowMinutes);
    leaderboardLog.info(`posting (${activities.length} campaigns)`);
    if (await ctx.sink.send(ctx.config.groupId, topicId, formatLeaderboard(board, ctx.now))) {
      ctx.ledger.markGlobal('leaderboard', ctx.now);
    }
  },
};

/** Campaign health by weekly session count. */
export function healthIcon(sessions: number): string {
  if (sessions >= 20) return '🟢';
  if (sessions >= 10) return '🟡';
  if (sessions >= 5) return '🟠';
  return '🔴';
}

export function formatDigest(standings: readonly CampaignStanding[], now: number): string {
  const lines = [`📰 Weekly Digest (${fmtDate(now - WEEK_MS)} to ${fmtDate(now)})`, ''];
  let total = 0;

  for (const standing of standings) {
    total += standing.total7d;
    lines.push(
      `${healthIcon(standing.total7d)} ${standing.name} ${trendIcon(standing.trend)}: ` +
      `${postsStr(standing.total7d)} (${standing.player7d} player, ${standing.gm7d} GM)`,
    );
    const mvp = standing.topPlayers[0];
    if (mvp) lines.push(`   MVP: ${mvp.name} (${postsStr(mvp.count)})`);
  }

  lines.push('', `Total: ${postsStr(total)} across ${standings.length} ${plural(standings.length, 'campaign')}.`);
  return lines.join('\n');
}

const digestLog = scopedLogger('Weekly digest');

export const digestCheck: Check = {
  label: 'Weekly digest',
  async run(ctx) {
    const topicId = ctx.config.digestTopicId;
    if (topicId === null) return;
    if (!ctx.ledger.globalDue('digest', ctx.settings.digestIntervalDays * DAY_MS, ctx.now)) return;

    const standings = allCampaignActivity(ctx).map(a => buildCampaignStanding(a, ctx.now, ctx.settings.burstWindowMinutes));
    if (standings.length === 0) return;

    digestLog.info(`posting (${standings.length} campaigns)`);
    if (await ctx.sink.send(ctx.config.groupId, topicId, formatDigest(standings, ctx.now))) {
      ctx.ledger.markGlobal('digest', ctx.now);
    }
  },
};
