/**
 * Shared fixtures: an in-memory sink that records every call, an
 * in-memory archive, and builders for configs and snapshots.
 */

import { resolveSettings } from '../src/config.js';
import { DAY_MS, toIso } from '../src/analytics/time.js';
import { CombatTracker } from '../src/state/combat.js';
import { DebounceLedger } from '../src/state/debounce.js';
import { createEmptySnapshot, getEntry, setEntry } from '../src/state/snapshot.js';
import { buildTopicMaps } from '../src/state/topics.js';
import type { CheckContext } from '../src/checks/context.js';
import type { BoonPool } from '../src/output/boons.js';
import type { ArchiveStore } from '../src/state/archive.js';
import type { SnapshotStore } from '../src/state/store.js';
import type {
  ActivitySnapshot,
  BotConfig,
  CampaignConfig,
  CampaignId,
  ChatTransport,
  ChatUpdate,
  ChoiceOption,
  PlayerRecord,
  Settings,
  UserId,
  WeeklyArchive,
} from '../src/types/index.js';

export const GROUP_ID = -100123;
export const NOW = Date.UTC(2026, 1, 18, 12, 0); // Wednesday

export interface SentMessage {
  chatId: number;
  threadId: number;
  text: string;
  options?: ChoiceOption[];
}

export interface EditedMessage {
  chatId: number;
  messageId: number;
  text: string;
}

/** Records outbound traffic; any primitive can be told to fail. */
export class RecordingSink implements ChatTransport {
  sent: SentMessage[] = [];
  edits: EditedMessage[] = [];
  acks: { callbackId: string; text: string }[] = [];
  updates: ChatUpdate[] = [];
  fetchedFrom: number[] = [];
  failSends = false;
  failEdits = false;
  closed = false;
  private nextMessageId = 500;

  async fetchUpdates(offset: number): Promise<ChatUpdate[]> {
    this.fetchedFrom.push(offset);
    return this.updates.filter(u => u.updateId >= offset);
  }

  async send(chatId: number, threadId: number, text: string): Promise<boolean> {
    if (this.failSends) return false;
    this.sent.push({ chatId, threadId, text });
    return true;
  }

  async sendWithChoices(chatId: number, threadId: number, text: string, options: ChoiceOption[]): Promise<number | null> {
    if (this.failSends) return null;
    this.sent.push({ chatId, threadId, text, options });
    return this.nextMessageId++;
  }

  async edit(chatId: number, messageId: number, text: string): Promise<boolean> {
    if (this.failEdits) return false;
    this.edits.push({ chatId, messageId, text });
    return true;
  }

  async acknowledge(callbackId: string, text: string): Promise<boolean> {
    this.acks.push({ callbackId, text });
    return true;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  texts(): string[] {
    return this.sent.map(m => m.text);
  }
}

export class MemoryArchiveStore implements ArchiveStore {
  saves = 0;
  constructor(public data: WeeklyArchive = {}) {}

  async load(): Promise<WeeklyArchive> {
    return structuredClone(this.data);
  }

  async save(archive: WeeklyArchive): Promise<void> {
    this.saves++;
    this.data = structuredClone(archive);
  }
}

export class MemorySnapshotStore implements SnapshotStore {
  saved: ActivitySnapshot | null = null;
  constructor(private snapshot: ActivitySnapshot = createEmptySnapshot()) {}

  async load(): Promise<ActivitySnapshot> {
    return structuredClone(this.snapshot);
  }

  async save(snapshot: ActivitySnapshot): Promise<void> {
    this.saved = structuredClone(snapshot);
    this.snapshot = structuredClone(snapshot);
  }
}

export const TEST_BOONS: BoonPool = {
  flavour: ['A fair wind', 'A lucky coin', 'A warm meal', 'A friendly crow'],
  mechanical: ['Reroll one die'],
};

export function makeCampaign(overrides: Partial<CampaignConfig> = {}): CampaignConfig {
  return {
    name: 'Ashfall',
    topicIds: [10, 11],
    outputTopicId: 12,
    features: {},
    characters: {},
    ...overrides,
  };
}

export function makeConfig(
  campaigns: CampaignConfig[] = [makeCampaign()],
  settings: Partial<Settings> = {},
  overrides: Partial<BotConfig> = {},
): BotConfig {
  return {
    version: 1,
    groupId: GROUP_ID,
    gmUserIds: ['900'],
    botUserId: '999',
    leaderboardTopicId: null,
    digestTopicId: null,
    campaigns,
    settings: resolveSettings(settings),
    ...overrides,
  };
}

export interface PlayerSeed {
  firstName?: string;
  lastName?: string;
  username?: string;
  lastWarnedWeek?: number;
  lastWarnedAt?: string | null;
}

/** Track a player row with the given last post time. */
export function addPlayer(
  snapshot: ActivitySnapshot,
  campaignId: CampaignId,
  userId: UserId,
  lastPostAt: number,
  seed: PlayerSeed = {},
): void {
  setEntry<PlayerRecord>(snapshot.players, { campaignId, userId }, {
    userId,
    firstName: seed.firstName ?? `Player${userId}`,
    lastName: seed.lastName ?? '',
    username: seed.username ?? '',
    lastPostTime: toIso(lastPostAt),
    lastWarnedWeek: seed.lastWarnedWeek ?? 0,
    lastWarnedAt: seed.lastWarnedAt ?? null,
  });
}

/** Append raw posts, bumping the message counter to match. */
export function addPosts(snapshot: ActivitySnapshot, campaignId: CampaignId, userId: UserId, times: readonly number[]): void {
  const key = { campaignId, userId };
  const series = getEntry(snapshot.postTimestamps, key) ?? [];
  series.push(...times.map(toIso));
  setEntry(snapshot.postTimestamps, key, series);
  setEntry(snapshot.messageCounts, key, (getEntry(snapshot.messageCounts, key) ?? 0) + times.length);
}

/** One post per day at the same time of day, `count` days back from `from`. */
export function dailyPosts(from: number, count: number): number[] {
  return Array.from({ length: count }, (_, i) => from - i * DAY_MS);
}

export interface ContextOptions {
  config?: BotConfig;
  snapshot?: ActivitySnapshot;
  sink?: RecordingSink;
  archive?: MemoryArchiveStore;
  now?: number;
  random?: () => number;
}

export function makeContext(options: ContextOptions = {}): CheckContext & { sink: RecordingSink; archive: MemoryArchiveStore } {
  const config = options.config ?? makeConfig();
  const snapshot = options.snapshot ?? createEmptySnapshot();
  return {
    config,
    settings: config.settings,
    snapshot,
    maps: buildTopicMaps(config),
    sink: options.sink ?? new RecordingSink(),
    ledger: new DebounceLedger(snapshot.debounce),
    combat: new CombatTracker(snapshot.combat),
    archive: options.archive ?? new MemoryArchiveStore(),
    boons: TEST_BOONS,
    now: options.now ?? NOW,
    random: options.random ?? (() => 0),
  };
}
