import { featureEnabled } from '../config.js';
import { playersOf, timestampsOf } from '../state/snapshot.js';
import { gmIdsFor } from '../state/topics.js';
import { fullName } from '../output/format.js';
import type { CampaignActivity, Person } from '../analytics/ranking.js';
import type { BoonPool } from '../output/boons.js';
import type { ArchiveStore } from '../state/archive.js';
import type { CombatTracker } from '../state/combat.js';
import type { DebounceLedger } from '../state/debounce.js';
import type { TopicMaps } from '../state/topics.js';
import type {
  ActivitySnapshot,
  BotConfig,
  CampaignConfig,
  CampaignId,
  FeatureName,
  NotificationSink,
  Settings,
  UserId,
} from '../types/index.js';

/**
 * Everything a check may read or touch during one run. "now" is fixed
 * for the whole run; the sink is the only way out.
 */
export interface CheckContext {
  config: BotConfig;
  settings: Readonly<Settings>;
  snapshot: ActivitySnapshot;
  maps: TopicMaps;
  sink: NotificationSink;
  ledger: DebounceLedger;
  combat: CombatTracker;
  archive: ArchiveStore;
  boons: BoonPool;
  now: number;
  random: () => number;
}

export interface Check {
  label: string;
  run(ctx: CheckContext): Promise<void>;
}

export interface CampaignRef {
  id: CampaignId;
  campaign: CampaignConfig;
}

/** Configured campaigns, in configuration order, with `feature` switched on. */
export function campaignsWith(ctx: CheckContext, feature: FeatureName): CampaignRef[] {
  const refs: CampaignRef[] = [];
  for (const [id, campaign] of ctx.maps.campaigns) {
    if (featureEnabled(campaign, feature)) refs.push({ id, campaign });
  }
  return refs;
}

export function isPaused(ctx: CheckContext, campaignId: CampaignId): boolean {
  return ctx.snapshot.paused[campaignId] !== undefined;
}

/** Send into a campaign's output thread. */
export function sendToCampaign(ctx: CheckContext, campaign: CampaignConfig, text: string): Promise<boolean> {
  return ctx.sink.send(ctx.config.groupId, campaign.outputTopicId, text);
}

/** Snapshot slice of one campaign, shaped for the ranking functions. */
export function campaignActivity(ctx: CheckContext, id: CampaignId, campaign: CampaignConfig): CampaignActivity {
  const people = new Map<UserId, Person>();
  const activePlayerIds = new Set<UserId>();
  for (const player of playersOf(ctx.snapshot, id)) {
    people.set(player.userId, { name: fullName(player), username: player.username });
    activePlayerIds.add(player.userId);
  }
  for (const [userId, removed] of Object.entries(ctx.snapshot.removedPlayers[id] ?? {})) {
    if (!people.has(userId)) people.set(userId, { name: removed.firstName, username: removed.username });
  }

  return {
    campaignId: id,
    name: campaign.name,
    byUser: timestampsOf(ctx.snapshot, id),
    gmIds: gmIdsFor(ctx.maps, id),
    people,
    activePlayerIds,
  };
}

export function allCampaignActivity(ctx: CheckContext): CampaignActivity[] {
  return [...ctx.maps.campaigns].map(([id, campaign]) => campaignActivity(ctx, id, campaign));
}
