/**
 * Replies to chat commands. Pure builders over the snapshot.
 */

import { sessionsInWindow } from '../analytics/metrics.js';
import { WEEK_MS, daysSince, fmtDate, fmtDuration, hoursSince, toMs } from '../analytics/time.js';
import { getEntry, playersOf, timestampsOf } from '../state/snapshot.js';
import { fullName, plural } from './format.js';
import type {
  ActivitySnapshot,
  CampaignConfig,
  CampaignId,
  CombatPhase,
  CombatState,
  UserId,
} from '../types/index.js';

export const HELP_TEXT = [
  'PBP Steward',
  '',
  'I track activity across PBP campaigns and post automated summaries.',
  '',
  'What I do:',
  '- Alert when a campaign goes quiet',
  '- Warn inactive players at 1, 2, 3 weeks; auto-remove at 4',
  '- Post party rosters every few days',
  '- Award Player of the Week (most consistent poster)',
  '- Post weekly pace reports comparing this week vs last',
  '- Cross-campaign leaderboard and weekly digest',
  '- Ping players who haven\'t acted during combat',
  '- Recruitment notices when a party is under capacity',
  '- Streak, message and anniversary celebrations',
  '',
  'GM commands:',
  '/combat [enemy, enemy] - Start combat at round 1',
  '/round <N> players - Start round N, players\' turn',
  '/round <N> enemies - Start round N, enemies\' turn',
  '/next - Advance to the next phase',
  '/enemies a, b - Set the enemy roster',
  '/clog <text> - Add a combat log entry',
  '/endcombat - End combat tracking',
  '/pause [reason] - Pause alerts and warnings',
  '/resume - Resume alerts and warnings',
  '',
  'Everyone:',
  '/help - Show this message',
  '/status - Campaign health snapshot',
  '/whosturn - Who still needs to act',
  '/combatlog - Show the combat log',
].join('\n');

export function phaseLabel(phase: CombatPhase): string {
  return phase === 'players' ? 'Players' : 'Enemies';
}

/** "Round 2. Players' turn." */
export function roundAnnouncement(round: number, phase: CombatPhase): string {
  return `Round ${round}. ${phaseLabel(phase)}' turn.`;
}

function lastPostText(now: number, lastIso: string | undefined): string {
  if (!lastIso) return 'no posts tracked yet';
  const hours = hoursSince(now, toMs(lastIso));
  if (hours < 1) return 'just now';
  return `${fmtDuration(hours)} ago`;
}

export interface StatusInput {
  snapshot: ActivitySnapshot;
  campaignId: CampaignId;
  campaign: CampaignConfig;
  gmIds: ReadonlySet<UserId>;
  requiredPlayers: number;
  windowMinutes: number;
  now: number;
}

export function buildStatus(input: StatusInput): string {
  const { snapshot, campaignId, campaign, gmIds, now } = input;
  const players = playersOf(snapshot, campaignId);

  let gmWeek = 0;
  let playerWeek = 0;
  for (const [userId, timestamps] of timestampsOf(snapshot, campaignId)) {
    const count = sessionsInWindow(timestamps, now - WEEK_MS, Infinity, input.windowMinutes).length;
    if (gmIds.has(userId)) gmWeek += count;
    else playerWeek += count;
  }

  const atRisk = players
    .map(p => ({ name: p.firstName, days: Math.floor(daysSince(now, toMs(p.lastPostTime))) }))
    .filter(p => p.days >= 7)
    .map(p => `${p.name} (${p.days}d)`);

  const lines = [
    `Status for ${campaign.name}:`,
    `Party: ${players.length}/${input.requiredPlayers}`,
    `Last post: ${lastPostText(now, snapshot.topics[campaignId]?.lastMessageTime)}`,
    `This week: ${playerWeek} player + ${gmWeek} GM posts`,
  ];
  if (atRisk.length > 0) lines.push(`At risk: ${atRisk.join(', ')}`);

  const pause = snapshot.paused[campaignId];
  if (pause) {
    const reason = pause.reason ? `: ${pause.reason}` : '';
    lines.push(`⏸️ PAUSED${reason} (since ${fmtDate(toMs(pause.pausedAt))})`);
  }

  const combat = snapshot.combat[campaignId];
  if (combat?.active) {
    lines.push(`Combat: Round ${combat.round}, ${combat.phase}' turn`);
  }

  return lines.join('\n');
}

function nameOf(snapshot: ActivitySnapshot, campaign: CampaignConfig, campaignId: CampaignId, userId: UserId): string {
  const player = getEntry(snapshot.players, { campaignId, userId });
  const name = player ? fullName(player) : userId;
  const character = campaign.characters[userId];
  return character ? `${name} (${character})` : name;
}

export function buildWhosTurn(snapshot: ActivitySnapshot, campaignId: CampaignId, campaign: CampaignConfig): string {
  const combat = snapshot.combat[campaignId];
  if (!combat?.active) return `No active combat in ${campaign.name}.`;

  const lines = [`⚔️ Round ${combat.round}, ${combat.phase}' turn`];
  if (combat.phase === 'players') {
    const acted = new Set(combat.acted);
    const players = playersOf(snapshot, campaignId);
    const done = players.filter(p => acted.has(p.userId)).map(p => nameOf(snapshot, campaign, campaignId, p.userId));
    const waiting = players.filter(p => !acted.has(p.userId)).map(p => nameOf(snapshot, campaign, campaignId, p.userId));
    lines.push(`Acted: ${done.length > 0 ? done.join(', ') : 'nobody yet'}`);
    lines.push(`Waiting: ${waiting.length > 0 ? waiting.join(', ') : 'nobody'}`);
  } else {
    lines.push('Waiting on the GM.');
  }
  if (combat.enemies.length > 0) lines.push(`Enemies: ${combat.enemies.join(', ')}`);
  return lines.join('\n');
}

function logLines(combat: CombatState): string[] {
  return combat.log.map(entry => `[R${entry.round}] ${entry.text}`);
}

export function buildCombatLog(snapshot: ActivitySnapshot, campaignId: CampaignId, campaign: CampaignConfig): string {
  const combat = snapshot.combat[campaignId];
  if (!combat?.active) return `No active combat in ${campaign.name}.`;
  if (combat.log.length === 0) return `📜 Combat log for ${campaign.name} is empty.`;
  return [`📜 Combat log for ${campaign.name}:`, ...logLines(combat)].join('\n');
}

/** Closing summary posted by /endcombat. */
export function buildCombatSummary(combat: CombatState, campaign: CampaignConfig, now: number): string {
  const lines = [
    `Combat ended in ${campaign.name} after ${combat.round} ${plural(combat.round, 'round')}.`,
    `Started ${fmtDate(toMs(combat.startedAt))}, lasted ${fmtDuration(hoursSince(now, toMs(combat.startedAt)))}.`,
  ];
  if (combat.log.length > 0) lines.push('', '📜 Log:', ...logLines(combat));
  return lines.join('\n');
}
