/**
 * The activity snapshot: schema with defaults, composite-key lookups,
 * and end-of-run pruning.
 *
 * Older snapshots are backfilled on load: every field the schema knows
 * about gets its default when missing.
 */

import { z } from 'zod';
import { logger } from '../logger.js';
import { DAY_MS, toMs } from '../analytics/time.js';
import type { ActivitySnapshot, CampaignId, PlayerKey, PlayerRecord, UserId } from '../types/index.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Keep the entries that fit `schema`; log and drop the rest. */
function keepValid<T extends z.ZodTypeAny>(name: string, schema: T, entries: Record<string, unknown>): Record<string, z.output<T>> {
  const kept: Record<string, z.output<T>> = {};
  for (const [key, entry] of Object.entries(entries)) {
    const parsed = schema.safeParse(entry);
    if (parsed.success) {
      kept[key] = parsed.data;
    } else {
      logger.warn(`Snapshot: dropping ${name} entry "${key}" that does not match the schema:`, parsed.error.issues.slice(0, 3));
    }
  }
  return kept;
}

/** A keyed table; anything that is not an object reads as empty. */
function table<T extends z.ZodTypeAny>(name: string, value: T) {
  return z.preprocess(
    raw => (isRecord(raw) ? raw : {}),
    z.record(z.unknown()).transform(entries => keepValid(name, value, entries)),
  );
}

/** A campaign → user table; bad rows and bad entries are dropped one by one. */
function keyedTable<T extends z.ZodTypeAny>(name: string, value: T) {
  return table(name, table(name, value));
}

/** An object section; a missing or malformed one reads as all defaults. */
function section<T extends z.ZodRawShape>(shape: T) {
  return z.preprocess(raw => (isRecord(raw) ? raw : {}), z.object(shape));
}

const topicSchema = z.object({
  lastMessageTime: z.string(),
  lastUserName: z.string().catch('someone'),
  lastUserId: z.string().catch(''),
});

const playerSchema = z.object({
  userId: z.string(),
  firstName: z.string().catch('Unknown'),
  lastName: z.string().catch(''),
  username: z.string().catch(''),
  lastPostTime: z.string(),
  lastWarnedWeek: z.number().catch(0),
  lastWarnedAt: z.string().nullable().catch(null),
});

const removedSchema = z.object({
  removedAt: z.string(),
  firstName: z.string().catch('Unknown'),
  username: z.string().catch(''),
  lastPostTime: z.string().catch(''),
});

const combatSchema = z.object({
  active: z.boolean().catch(true),
  round: z.number().int().min(1).catch(1),
  phase: z.enum(['players', 'enemies']).catch('players'),
  phaseStartedAt: z.string(),
  startedAt: z.string().optional().catch(undefined),
  acted: z.array(z.string()).catch([]),
  lastPingAt: z.string().nullable().catch(null),
  allActedNotified: z.boolean().catch(false),
  enemies: z.array(z.string()).catch([]),
  log: z.array(z.object({ round: z.number(), text: z.string(), at: z.string() })).catch([]),
}).transform(c => ({ ...c, startedAt: c.startedAt ?? c.phaseStartedAt }));

const pendingAwardSchema = z.object({
  messageId: z.number(),
  winnerUserId: z.string(),
  options: z.array(z.string()),
  baseMessage: z.string(),
  postedAt: z.string(),
});

const pauseSchema = z.object({
  pausedAt: z.string(),
  reason: z.string().catch(''),
});

const lastFired = (name: string) => table(name, z.string());

const debounceSchema = section({
  intervals: section({
    topicAlert: lastFired('topicAlert'),
    roster: lastFired('roster'),
    award: lastFired('award'),
    pace: lastFired('pace'),
    recruitment: lastFired('recruitment'),
    paceDrop: lastFired('paceDrop'),
  }),
  global: section({
    leaderboard: z.string().nullable().catch(null),
    digest: z.string().nullable().catch(null),
  }),
  streaks: keyedTable('streaks', z.number()),
  anniversaries: keyedTable('anniversaries', z.string()),
  messageSteps: section({
    campaigns: table('messageSteps', z.number()),
    global: z.number().catch(0),
  }),
  silence: lastFired('silence'),
  lastArchivedWeek: z.string().nullable().catch(null),
});

/**
 * Every field has a fallback, so parsing never fails as a whole: a
 * malformed entry is dropped on its own and the rest of the state survives.
 */
export const snapshotSchema = section({
  offset: z.number().int().min(0).catch(0),
  topics: table('topics', topicSchema),
  players: keyedTable('players', playerSchema),
  removedPlayers: keyedTable('removedPlayers', removedSchema),
  messageCounts: keyedTable('messageCounts', z.number()),
  postTimestamps: keyedTable('postTimestamps', z.array(z.string())),
  combat: table('combat', combatSchema),
  pendingAwards: table('pendingAwards', pendingAwardSchema),
  paused: table('paused', pauseSchema),
  debounce: debounceSchema,
});

export function createEmptySnapshot(): ActivitySnapshot {
  return snapshotSchema.parse({});
}

/** Parse a stored snapshot, backfilling absent fields and dropping entries that do not fit. */
export function parseSnapshot(raw: unknown): ActivitySnapshot {
  return snapshotSchema.parse(raw);
}

// ── Composite-key tables ───────────────────────────────────────────────────

/** A per-campaign, per-user table as stored in the snapshot. */
export type KeyedTable<T> = Record<CampaignId, Record<UserId, T>>;

export function getEntry<T>(tableRef: KeyedTable<T>, key: PlayerKey): T | undefined {
  return tableRef[key.campaignId]?.[key.userId];
}

export function setEntry<T>(tableRef: KeyedTable<T>, key: PlayerKey, value: T): void {
  const row = tableRef[key.campaignId] ?? (tableRef[key.campaignId] = {});
  row[key.userId] = value;
}

/** Remove an entry; drops the campaign row once it is empty. */
export function deleteEntry<T>(tableRef: KeyedTable<T>, key: PlayerKey): T | undefined {
  const row = tableRef[key.campaignId];
  if (!row || !(key.userId in row)) return undefined;
  const value = row[key.userId];
  delete row[key.userId];
  if (Object.keys(row).length === 0) {
    delete tableRef[key.campaignId];
  }
  return value;
}

export function keysOf<T>(tableRef: KeyedTable<T>): PlayerKey[] {
  const keys: PlayerKey[] = [];
  for (const [campaignId, row] of Object.entries(tableRef)) {
    for (const userId of Object.keys(row)) {
      keys.push({ campaignId, userId });
    }
  }
  return keys;
}

/** Active players of one campaign. */
export function playersOf(snapshot: ActivitySnapshot, campaignId: CampaignId): PlayerRecord[] {
  return Object.values(snapshot.players[campaignId] ?? {});
}

/** Raw timestamps per user for one campaign, parsed to epoch ms. */
export function timestampsOf(snapshot: ActivitySnapshot, campaignId: CampaignId): Map<UserId, number[]> {
  const result = new Map<UserId, number[]>();
  for (const [userId, series] of Object.entries(snapshot.postTimestamps[campaignId] ?? {})) {
    result.set(userId, series.map(toMs));
  }
  return result;
}

export function messageCountOf(snapshot: ActivitySnapshot, key: PlayerKey): number {
  return getEntry(snapshot.messageCounts, key) ?? 0;
}

// ── Retention ──────────────────────────────────────────────────────────────

/** Drop raw timestamps older than the retention window, and empty series. */
export function pruneTimestamps(snapshot: ActivitySnapshot, now: number, retentionDays: number): number {
  const cutoff = now - retentionDays * DAY_MS;
  let removed = 0;

  for (const key of keysOf(snapshot.postTimestamps)) {
    const series = getEntry(snapshot.postTimestamps, key) ?? [];
    const kept = series.filter(ts => toMs(ts) >= cutoff);
    removed += series.length - kept.length;
    if (kept.length > 0) {
      setEntry(snapshot.postTimestamps, key, kept);
    } else {
      deleteEntry(snapshot.postTimestamps, key);
    }
  }

  return removed;
}
