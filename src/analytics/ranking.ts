/**
 * Award selection and cross-campaign rankings.
 */

import { averageGapHours, calcStreak, classifyTrend, countInWindow, sessionsInWindow } from './metrics.js';
import { DAY_MS, WEEK_MS } from './time.js';
import type { CampaignId, Trend, UserId } from '../types/index.js';

// ── Shared inputs ──────────────────────────────────────────────────────────

export interface Person {
  name: string;
  username: string;
}

/** Everything the rankings need to know about one campaign. */
export interface CampaignActivity {
  campaignId: CampaignId;
  name: string;
  /** Raw post timestamps per user (epoch ms). */
  byUser: ReadonlyMap<UserId, readonly number[]>;
  gmIds: ReadonlySet<UserId>;
  /** Display identity for every user that may appear in a ranking. */
  people: ReadonlyMap<UserId, Person>;
  /** Users currently tracked as active players. */
  activePlayerIds: ReadonlySet<UserId>;
}

const RANK_ICONS = ['🥇', '🥈', '🥉'];

/** Medal for the first three places, then "4.", "5.", … */
export function rankIcon(index: number): string {
  return index < RANK_ICONS.length ? RANK_ICONS[index] : `${index + 1}.`;
}

/** Order user ids numerically when both are numeric, lexically otherwise. */
export function compareUserIds(a: UserId, b: UserId): number {
  const numeric = /^-?\d+$/;
  if (numeric.test(a) && numeric.test(b)) {
    const diff = BigInt(a) - BigInt(b);
    return diff === 0n ? 0 : diff < 0n ? -1 : 1;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}

function personOf(activity: CampaignActivity, userId: UserId): Person {
  return activity.people.get(userId) ?? { name: 'Unknown', username: '' };
}

// ── Consistency award ──────────────────────────────────────────────────────

export interface AwardCandidate {
  userId: UserId;
  sessionCount: number;
  avgGapHours: number;
}

/**
 * Non-GM users with at least `minSessions` sessions in the trailing
 * seven days, with their average session gap.
 */
export function gatherAwardCandidates(
  activity: CampaignActivity,
  now: number,
  minSessions: number,
  windowMinutes: number,
): AwardCandidate[] {
  const candidates: AwardCandidate[] = [];
  for (const [userId, timestamps] of activity.byUser) {
    if (activity.gmIds.has(userId)) continue;
    const sessions = sessionsInWindow(timestamps, now - WEEK_MS, Infinity, windowMinutes);
    if (sessions.length < minSessions) continue;
    candidates.push({
      userId,
      sessionCount: sessions.length,
      avgGapHours: averageGapHours(sessions) ?? Infinity,
    });
  }
  return candidates;
}

/**
 * Smallest average gap wins; equal gaps go to the lowest user id.
 * Null when nobody qualified.
 */
export function selectConsistencyWinner(candidates: readonly AwardCandidate[]): AwardCandidate | null {
  let winner: AwardCandidate | null = null;
  for (const candidate of candidates) {
    if (
      winner === null ||
      candidate.avgGapHours < winner.avgGapHours ||
      (candidate.avgGapHours === winner.avgGapHours && compareUserIds(candidate.userId, winner.userId) < 0)
    ) {
      winner = candidate;
    }
  }
  return winner;
}

// ── Leaderboard ────────────────────────────────────────────────────────────

export interface PlayerTally {
  userId: UserId;
  name: string;
  username: string;
  count: number;
  campaigns: number;
}

export interface CampaignStanding {
  campaignId: CampaignId;
  name: string;
  total7d: number;
  player7d: number;
  gm7d: number;
  /** Raw posts over the last three days against the three before. */
  trend: Trend;
  avgGapHours: number | undefined;
  playerAvgGapHours: number | undefined;
  lastPostAt: number | null;
  topPlayers: PlayerTally[];
}

export interface StreakEntry {
  userId: UserId;
  name: string;
  streak: number;
  campaignName: string;
}

export interface Leaderboard {
  /** Campaigns with posts this week, by player sessions descending. */
  active: CampaignStanding[];
  dead: CampaignStanding[];
  /** Campaigns by player-only average gap, fastest first. */
  fastestGaps: CampaignStanding[];
  topPlayers: PlayerTally[];
  streaks: StreakEntry[];
  totals: { player: number; gm: number };
}

function byCountThenName(a: PlayerTally, b: PlayerTally): number {
  return b.count - a.count || a.name.localeCompare(b.name) || compareUserIds(a.userId, b.userId);
}

export function buildCampaignStanding(activity: CampaignActivity, now: number, windowMinutes: number): CampaignStanding {
  const weekAgo = now - WEEK_MS;
  const threeDaysAgo = now - 3 * DAY_MS;
  const sixDaysAgo = now - 6 * DAY_MS;

  let gm7d = 0;
  let player7d = 0;
  let recent3d = 0;
  let previous3d = 0;
  let lastPostAt: number | null = null;
  const allSessions: number[] = [];
  const playerSessions: number[] = [];
  const tallies: PlayerTally[] = [];

  for (const [userId, timestamps] of activity.byUser) {
    recent3d += countInWindow(timestamps, threeDaysAgo);
    previous3d += countInWindow(timestamps, sixDaysAgo, threeDaysAgo);
    for (const ts of timestamps) {
      if (lastPostAt === null || ts > lastPostAt) lastPostAt = ts;
    }

    const sessions = sessionsInWindow(timestamps, weekAgo, Infinity, windowMinutes);
    allSessions.push(...sessions);
    if (activity.gmIds.has(userId)) {
      gm7d += sessions.length;
      continue;
    }
    player7d += sessions.length;
    playerSessions.push(...sessions);
    if (sessions.length > 0) {
      const person = personOf(activity, userId);
      tallies.push({ userId, name: person.name, username: person.username, count: sessions.length, campaigns: 1 });
    }
  }

  return {
    campaignId: activity.campaignId,
    name: activity.name,
    total7d: gm7d + player7d,
    player7d,
    gm7d,
    trend: classifyTrend(recent3d, previous3d),
    avgGapHours: averageGapHours(allSessions),
    playerAvgGapHours: averageGapHours(playerSessions),
    lastPostAt,
    topPlayers: tallies.sort(byCountThenName),
  };
}

/** Active players' current streaks (≥ 2 days), longest first. */
export function buildStreakBoard(activities: readonly CampaignActivity[], now: number): StreakEntry[] {
  const entries: StreakEntry[] = [];
  for (const activity of activities) {
    for (const userId of activity.activePlayerIds) {
      const streak = calcStreak(activity.byUser.get(userId) ?? [], now);
      if (streak < 2) continue;
      entries.push({ userId, name: personOf(activity, userId).name, streak, campaignName: activity.name });
    }
  }
  return entries.sort((a, b) => b.streak - a.streak || a.name.localeCompare(b.name));
}

export function buildLeaderboard(
  activities: readonly CampaignActivity[],
  now: number,
  windowMinutes: number,
): Leaderboard {
  const standings = activities.map(a => buildCampaignStanding(a, now, windowMinutes));

  const global = new Map<UserId, PlayerTally>();
  for (const standing of standings) {
    for (const tally of standing.topPlayers) {
      const entry = global.get(tally.userId);
      if (entry) {
        entry.count += tally.count;
        entry.campaigns += 1;
      } else {
        global.set(tally.userId, { ...tally });
      }
    }
  }

  const byPlayerVolume = [...standings].sort(
    (a, b) => b.player7d - a.player7d || b.total7d - a.total7d || a.name.localeCompare(b.name),
  );

  const fastestGaps = standings
    .filter(s => s.playerAvgGapHours !== undefined)
    .sort((a, b) => (a.playerAvgGapHours ?? 0) - (b.playerAvgGapHours ?? 0) || a.name.localeCompare(b.name));

  return {
    active: byPlayerVolume.filter(s => s.total7d > 0),
    dead: byPlayerVolume.filter(s => s.total7d === 0),
    fastestGaps,
    topPlayers: [...global.values()].sort(byCountThenName),
    streaks: buildStreakBoard(activities, now),
    totals: {
      player: standings.reduce((sum, s) => sum + s.player7d, 0),
      gm: standings.reduce((sum, s) => sum + s.gm7d, 0),
    },
  };
}
