/**
 * Player inactivity ladder: a warning at each configured week, removal
 * from the campaign at the final week.
 */

import { scopedLogger } from '../logger.js';
import { WEEK_MS, daysSince, fmtDate, toIso, toMs } from '../analytics/time.js';
import { deleteEntry, playersOf, setEntry } from '../state/snapshot.js';
import { displayName, mention, plural } from '../output/format.js';
import { campaignsWith, isPaused, sendToCampaign } from './context.js';
import type { Check, CheckContext } from './context.js';
import type { CampaignConfig, CampaignId, PlayerRecord } from '../types/index.js';

const log = scopedLogger('Player activity');

interface WarningVars {
  who: string;
  campaign: string;
  days: number;
  date: string;
  weeksLeft: number;
}

function firstWarning(v: WarningVars): string {
  return `${v.who} hasn't posted in ${v.campaign} PBP for ${v.days} days (last: ${v.date}). Everything okay?`;
}

function repeatWarning(v: WarningVars): string {
  return `${v.who} still no post in ${v.campaign} PBP. It's been ${v.days} days now (last: ${v.date}).`;
}

function finalWarning(v: WarningVars): string {
  return (
    `${v.who} it's been ${v.days} days without a post in ${v.campaign} PBP (last: ${v.date}). ` +
    `${v.weeksLeft} ${plural(v.weeksLeft, 'week')} until auto-removal from the campaign.`
  );
}

function removalNotice(v: WarningVars): string {
  return (
    `${v.who} has not posted in ${v.campaign} PBP for ${v.days} days (last: ${v.date}). ` +
    `They are no longer tracked as an active player in this campaign.`
  );
}

/** Warning text for the rung at `index` of the warn-week list. */
export function warningText(index: number, rungCount: number, vars: WarningVars): string {
  if (index === rungCount - 1) return finalWarning(vars);
  return index === 0 ? firstWarning(vars) : repeatWarning(vars);
}

/**
 * The next unsent rung (in weeks) for a player, or null when every rung
 * has been sent. Rungs are the warn weeks followed by the removal week.
 */
export function nextRung(player: PlayerRecord, warnWeeks: readonly number[], removeWeeks: number): number | null {
  for (const rung of [...warnWeeks, removeWeeks]) {
    if (player.lastWarnedWeek < rung) return rung;
  }
  return null;
}

function removePlayer(ctx: CheckContext, id: CampaignId, player: PlayerRecord): void {
  deleteEntry(ctx.snapshot.players, { campaignId: id, userId: player.userId });
  setEntry(ctx.snapshot.removedPlayers, { campaignId: id, userId: player.userId }, {
    removedAt: toIso(ctx.now),
    firstName: player.firstName,
    username: player.username,
    lastPostTime: player.lastPostTime,
  });
  ctx.combat.forget(id, player.userId);
}

async function reviewPlayer(ctx: CheckContext, id: CampaignId, campaign: CampaignConfig, player: PlayerRecord): Promise<void> {
  const { warnWeeks, removeWeeks } = ctx.settings;
  const rung = nextRung(player, warnWeeks, removeWeeks);
  if (rung === null) return;

  const lastPost = toMs(player.lastPostTime);
  const elapsedDays = daysSince(ctx.now, lastPost);
  if (Math.floor(elapsedDays / 7) < rung) return;
  // Consecutive rungs are at least a week apart, however late the first one went out
  if (player.lastWarnedAt && ctx.now - toMs(player.lastWarnedAt) < WEEK_MS) return;

  const vars: WarningVars = {
    who: mention(player, campaign),
    campaign: campaign.name,
    days: Math.floor(elapsedDays),
    date: fmtDate(lastPost),
    weeksLeft: removeWeeks - rung,
  };

  if (rung === removeWeeks) {
    log.info(`removing ${displayName(player)} from ${campaign.name} (${vars.days}d)`);
    if (await sendToCampaign(ctx, campaign, removalNotice(vars))) {
      removePlayer(ctx, id, player);
    }
    return;
  }

  log.info(`warning ${displayName(player)} in ${campaign.name}: week ${rung}`);
  if (await sendToCampaign(ctx, campaign, warningText(warnWeeks.indexOf(rung), warnWeeks.length, vars))) {
    player.lastWarnedWeek = rung;
    player.lastWarnedAt = toIso(ctx.now);
  }
}

export const warningLadderCheck: Check = {
  label: 'Player activity',
  async run(ctx) {
    for (const { id, campaign } of campaignsWith(ctx, 'warnings')) {
      if (isPaused(ctx, id)) continue;
      // Copy: removal mutates the table being walked
      for (const player of [...playersOf(ctx.snapshot, id)]) {
        await reviewPlayer(ctx, id, campaign, player);
      }
    }
  },
};
