/**
 * Folds a batch of chat updates into the snapshot and answers commands.
 */

import { scopedLogger } from './logger.js';
import { featureEnabled } from './config.js';
import { toIso } from './analytics/time.js';
import { handleAwardChoice } from './checks/award.js';
import { GM_COMMANDS, parseCommand, parseEnemyList } from './state/commands.js';
import { deleteEntry, getEntry, setEntry } from './state/snapshot.js';
import { gmIdsFor } from './state/topics.js';
import {
  HELP_TEXT,
  buildCombatLog,
  buildCombatSummary,
  buildStatus,
  buildWhosTurn,
  roundAnnouncement,
} from './output/replies.js';
import type { ChatCommand } from './state/commands.js';
import type { CombatTracker } from './state/combat.js';
import type { TopicMaps } from './state/topics.js';
import type {
  ActivitySnapshot,
  BotConfig,
  CampaignConfig,
  CampaignId,
  ChatMessage,
  CombatPhase,
  ChatUpdate,
  NotificationSink,
  PlayerRecord,
} from './types/index.js';

const log = scopedLogger('Ingest');

export interface IngestContext {
  config: BotConfig;
  maps: TopicMaps;
  snapshot: ActivitySnapshot;
  sink: NotificationSink;
  combat: CombatTracker;
  now: number;
}

interface MessageScope {
  ctx: IngestContext;
  campaignId: CampaignId;
  campaign: CampaignConfig;
  threadId: number;
  isGm: boolean;
}

function reply(scope: MessageScope, text: string): Promise<boolean> {
  return scope.ctx.sink.send(scope.ctx.config.groupId, scope.threadId, text);
}

/** Record the post itself: topic activity, counters, raw series, player row. */
function recordPost(scope: MessageScope, message: ChatMessage): void {
  const { snapshot } = scope.ctx;
  const key = { campaignId: scope.campaignId, userId: message.from.id };
  const sentAt = toIso(message.sentAt);

  snapshot.topics[scope.campaignId] = {
    lastMessageTime: sentAt,
    lastUserName: message.from.firstName || 'Someone',
    lastUserId: message.from.id,
  };

  setEntry(snapshot.messageCounts, key, (getEntry(snapshot.messageCounts, key) ?? 0) + 1);

  const series = getEntry(snapshot.postTimestamps, key);
  if (series) series.push(sentAt);
  else setEntry(snapshot.postTimestamps, key, [sentAt]);

  if (scope.isGm) return;

  setEntry<PlayerRecord>(snapshot.players, key, {
    userId: message.from.id,
    firstName: message.from.firstName || 'Someone',
    lastName: message.from.lastName,
    username: message.from.username,
    lastPostTime: sentAt,
    lastWarnedWeek: 0,
    lastWarnedAt: null,
  });
  if (deleteEntry(snapshot.removedPlayers, key)) {
    log.info(`${message.from.firstName} rejoined ${scope.campaign.name}`);
  }
}

function isCombatPhase(value: string): value is CombatPhase {
  return value === 'players' || value === 'enemies';
}

async function handleRound(scope: MessageScope, command: ChatCommand): Promise<void> {
  const [rawRound, rawPhase = ''] = command.args;
  const round = Number(rawRound);
  const phase = rawPhase.toLowerCase();
  if (!Number.isInteger(round) || round < 1 || !isCombatPhase(phase)) {
    await reply(scope, 'Usage: /round <N> players|enemies');
    return;
  }

  const { combat, now } = scope.ctx;
  combat.advance(scope.campaignId, round, phase, now);
  const state = combat.get(scope.campaignId);
  if (state) {
    log.info(`combat in ${scope.campaign.name}: round ${state.round}, ${state.phase}`);
    await reply(scope, roundAnnouncement(state.round, state.phase));
  }
}

async function handleCombatCommand(scope: MessageScope, command: ChatCommand): Promise<void> {
  const { combat, now, snapshot } = scope.ctx;
  const id = scope.campaignId;
  const noCombat = `No active combat in ${scope.campaign.name}.`;

  switch (command.name) {
    case 'round':
      await handleRound(scope, command);
      return;

    case 'combat': {
      const enemies = parseEnemyList(command.rest);
      if (combat.start(id, enemies, now) === 'unchanged') {
        await reply(scope, `Combat is already running in ${scope.campaign.name}.`);
        return;
      }
      const roster = enemies.length > 0 ? `\nEnemies: ${enemies.join(', ')}` : '';
      await reply(scope, `⚔️ Combat started! ${roundAnnouncement(1, 'players')}${roster}`);
      return;
    }

    case 'next': {
      combat.next(id, now);
      const state = combat.get(id);
      await reply(scope, state ? roundAnnouncement(state.round, state.phase) : noCombat);
      return;
    }

    case 'enemies': {
      const enemies = parseEnemyList(command.rest);
      if (enemies.length === 0) {
        await reply(scope, 'Usage: /enemies name, name');
        return;
      }
      await reply(scope, combat.setEnemies(id, enemies) ? `Enemies: ${enemies.join(', ')}` : noCombat);
      return;
    }

    case 'clog': {
      if (!command.rest) {
        await reply(scope, 'Usage: /clog <text>');
        return;
      }
      const added = combat.addLogEntry(id, command.rest, now);
      const state = combat.get(id);
      await reply(scope, added && state ? `📝 Logged for round ${state.round}.` : noCombat);
      return;
    }

    case 'endcombat': {
      const ended = combat.end(id);
      await reply(scope, ended ? buildCombatSummary(ended, scope.campaign, now) : noCombat);
      return;
    }

    case 'whosturn':
      await reply(scope, buildWhosTurn(snapshot, id, scope.campaign));
      return;

    case 'combatlog':
      await reply(scope, buildCombatLog(snapshot, id, scope.campaign));
      return;

    default:
      return;
  }
}

async function handleCommand(scope: MessageScope, command: ChatCommand): Promise<void> {
  if (GM_COMMANDS.has(command.name) && !scope.isGm) {
    log.debug(`ignoring /${command.name} from a non-GM in ${scope.campaign.name}`);
    return;
  }

  const { snapshot, config, maps, now } = scope.ctx;

  switch (command.name) {
    case 'help':
      await reply(scope, HELP_TEXT);
      return;

    case 'status':
      await reply(scope, buildStatus({
        snapshot,
        campaignId: scope.campaignId,
        campaign: scope.campaign,
        gmIds: gmIdsFor(maps, scope.campaignId),
        requiredPlayers: config.settings.requiredPlayers,
        windowMinutes: config.settings.burstWindowMinutes,
        now,
      }));
      return;

    case 'pause': {
      snapshot.paused[scope.campaignId] = { pausedAt: toIso(now), reason: command.rest };
      const reason = command.rest ? ` (${command.rest})` : '';
      await reply(scope, `⏸️ ${scope.campaign.name} is paused${reason}. Inactivity alerts and warnings are on hold.`);
      return;
    }

    case 'resume': {
      if (!snapshot.paused[scope.campaignId]) {
        await reply(scope, `${scope.campaign.name} is not paused.`);
        return;
      }
      delete snapshot.paused[scope.campaignId];
      await reply(scope, `▶️ ${scope.campaign.name} resumed. Alerts and warnings are back on.`);
      return;
    }

    default:
      if (featureEnabled(scope.campaign, 'combat')) {
        await handleCombatCommand(scope, command);
      }
  }
}

/** Resolve a message to its campaign, or null when it should be skipped. */
function scopeFor(ctx: IngestContext, message: ChatMessage): MessageScope | null {
  if (message.chatId !== ctx.config.groupId) return null;
  if (message.threadId === null) return null;
  if (message.from.isBot || message.from.id === ctx.config.botUserId) return null;

  const campaignId = ctx.maps.toCanonical.get(message.threadId);
  if (campaignId === undefined) return null;
  const campaign = ctx.maps.campaigns.get(campaignId);
  if (!campaign) return null;

  return {
    ctx,
    campaignId,
    campaign,
    threadId: message.threadId,
    isGm: gmIdsFor(ctx.maps, campaignId).has(message.from.id),
  };
}

async function processMessage(ctx: IngestContext, message: ChatMessage): Promise<void> {
  const scope = scopeFor(ctx, message);
  if (!scope) return;

  recordPost(scope, message);

  // Any player message during the players' phase counts, commands included
  if (!scope.isGm && featureEnabled(scope.campaign, 'combat')) {
    ctx.combat.recordAction(scope.campaignId, message.from.id);
  }

  const command = parseCommand(message.text);
  if (command) await handleCommand(scope, command);

  log.debug(`tracked message in ${scope.campaign.name} from ${message.from.firstName}`);
}

/**
 * Apply a batch of updates in order. Returns the next fetch offset:
 * one past the highest update id seen, never lower than the current one.
 */
export async function processUpdates(updates: readonly ChatUpdate[], ctx: IngestContext): Promise<number> {
  let offset = ctx.snapshot.offset;

  for (const update of updates) {
    offset = Math.max(offset, update.updateId + 1);

    if (update.callback) {
      await handleAwardChoice(update.callback, { snapshot: ctx.snapshot, sink: ctx.sink, groupId: ctx.config.groupId });
      continue;
    }
    if (update.message) {
      await processMessage(ctx, update.message);
    }
  }

  return offset;
}
