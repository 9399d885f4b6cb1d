/**
 * Player of the Week: the most consistent poster of each campaign picks
 * a boon from a button menu. Unanswered menus resolve themselves.
 */

import { scopedLogger } from '../logger.js';
import { gatherAwardCandidates, selectConsistencyWinner } from '../analytics/ranking.js';
import { DAY_MS, HOUR_MS, WEEK_MS, fmtDate, toIso, toMs } from '../analytics/time.js';
import { getEntry } from '../state/snapshot.js';
import { pickBoons } from '../output/boons.js';
import { fmtGapHours, htmlEscape, mention, postsStr } from '../output/format.js';
import { campaignActivity, campaignsWith } from './context.js';
import type { Check, CheckContext } from './context.js';
import type { ActivitySnapshot, ChoiceCallback, ChoiceOption, NotificationSink, PendingAward } from '../types/index.js';

const log = scopedLogger('Weekly award');

const CALLBACK_PREFIX = 'award';

export function choiceData(campaignId: string, index: number): string {
  return `${CALLBACK_PREFIX}:${campaignId}:${index}`;
}

/** The award message with the chosen option ticked and the rest struck. HTML. */
export function formatAwardResult(award: Pick<PendingAward, 'options' | 'baseMessage'>, chosen: number, label: string): string {
  const lines = award.options.map((option, i) => {
    const text = `${i + 1}. ${htmlEscape(option)}`;
    return i === chosen ? `\n${text} ✓\n` : `\n<s>${text}</s>\n`;
  });
  return `${htmlEscape(award.baseMessage)}\n\n${label}:${lines.join('')}`;
}

export const awardCheck: Check = {
  label: 'Weekly award',
  async run(ctx) {
    const { awardIntervalDays, awardMinSessions, burstWindowMinutes } = ctx.settings;

    for (const { id, campaign } of campaignsWith(ctx, 'award')) {
      if (!ctx.ledger.due('award', id, awardIntervalDays * DAY_MS, ctx.now)) continue;

      const activity = campaignActivity(ctx, id, campaign);
      const winner = selectConsistencyWinner(
        gatherAwardCandidates(activity, ctx.now, awardMinSessions, burstWindowMinutes),
      );
      if (!winner) {
        log.debug(`no candidates for ${campaign.name} (need ${awardMinSessions}+ sessions)`);
        continue;
      }

      const record = getEntry(ctx.snapshot.players, { campaignId: id, userId: winner.userId });
      const person = activity.people.get(winner.userId);
      const who = record
        ? mention(record, campaign)
        : person?.username ? `@${person.username}` : person?.name ?? 'Unknown';
      const gap = fmtGapHours(winner.avgGapHours);

      const baseMessage =
        `Player of the Week for ${campaign.name}: ${who}!\n` +
        `(${fmtDate(ctx.now - WEEK_MS)} to ${fmtDate(ctx.now)})\n\n` +
        `${postsStr(winner.sessionCount)} this week with an average gap of ${gap} between posts. ` +
        `The most consistent driver of the story.`;

      const options = pickBoons(ctx.boons, ctx.random);
      const menu = options.map((option, i) => `\n${i + 1}. ${option}\n`).join('');
      const buttons: ChoiceOption[] = options.map((_, i) => ({ label: `Boon #${i + 1}`, data: choiceData(id, i) }));

      log.info(`${campaign.name}: ${winner.userId} (avg gap ${gap})`);
      const messageId = await ctx.sink.sendWithChoices(
        ctx.config.groupId,
        campaign.outputTopicId,
        `${baseMessage}\n\nChoose your boon:\n${menu}`,
        buttons,
      );
      if (messageId === null) continue;

      ctx.ledger.mark('award', id, ctx.now);
      ctx.snapshot.pendingAwards[id] = {
        messageId,
        winnerUserId: winner.userId,
        options,
        baseMessage,
        postedAt: toIso(ctx.now),
      };
    }
  },
};

const expiryLog = scopedLogger('Award expiry');

export const awardExpiryCheck: Check = {
  label: 'Award expiry',
  async run(ctx: CheckContext) {
    const expiryMs = ctx.settings.awardChoiceExpiryHours * HOUR_MS;

    for (const [id, award] of Object.entries(ctx.snapshot.pendingAwards)) {
      if (ctx.now - toMs(award.postedAt) < expiryMs) continue;

      const text = formatAwardResult(award, 0, 'Boon (auto-selected)');
      if (await ctx.sink.edit(ctx.config.groupId, award.messageId, text)) {
        delete ctx.snapshot.pendingAwards[id];
        expiryLog.info(`choice for ${id} expired, picked #1`);
      }
    }
  },
};

export interface AwardChoiceDeps {
  snapshot: ActivitySnapshot;
  sink: NotificationSink;
  groupId: number;
}

/**
 * Handle a tap on an award button. Taps that are not award buttons are
 * ignored; every other tap is acknowledged.
 */
export async function handleAwardChoice(callback: ChoiceCallback, deps: AwardChoiceDeps): Promise<void> {
  const parts = callback.data.split(':');
  if (parts[0] !== CALLBACK_PREFIX) return;

  const reply = (text: string) => deps.sink.acknowledge(callback.id, text);

  if (parts.length !== 3 || !/^\d+$/.test(parts[2])) {
    await reply('Invalid choice.');
    return;
  }
  const [, campaignId, rawIndex] = parts;
  const index = Number(rawIndex);

  const award = deps.snapshot.pendingAwards[campaignId];
  if (!award) {
    await reply('This choice has expired.');
    return;
  }
  if (callback.from.id !== award.winnerUserId) {
    await reply('Only the Player of the Week can choose!');
    return;
  }
  if (index >= award.options.length) {
    await reply('Invalid choice.');
    return;
  }

  const text = formatAwardResult(award, index, 'Chosen boon');
  const edited = await deps.sink.edit(callback.chatId ?? deps.groupId, callback.messageId ?? award.messageId, text);
  if (!edited) {
    await reply('Could not record your choice, please try again.');
    return;
  }

  await reply(`You chose boon #${index + 1}!`);
  delete deps.snapshot.pendingAwards[campaignId];
  log.info(`boon chosen for ${campaignId}: #${index + 1}`);
}
