import type { BotConfig, CampaignConfig, CampaignId, UserId } from '../types/index.js';

/** Lookup tables derived from the campaign configuration. */
export interface TopicMaps {
  /** Any configured thread id -> canonical campaign id. */
  toCanonical: ReadonlyMap<number, CampaignId>;
  /** Canonical campaign id -> campaign config, in configuration order. */
  campaigns: ReadonlyMap<CampaignId, CampaignConfig>;
  /** Canonical campaign id -> GM user ids (campaign override or group default). */
  gmIds: ReadonlyMap<CampaignId, ReadonlySet<UserId>>;
}

export function canonicalId(campaign: CampaignConfig): CampaignId {
  return String(campaign.topicIds[0]);
}

export function buildTopicMaps(config: BotConfig): TopicMaps {
  const toCanonical = new Map<number, CampaignId>();
  const campaigns = new Map<CampaignId, CampaignConfig>();
  const gmIds = new Map<CampaignId, ReadonlySet<UserId>>();

  for (const campaign of config.campaigns) {
    const id = canonicalId(campaign);
    campaigns.set(id, campaign);
    gmIds.set(id, new Set(campaign.gmUserIds ?? config.gmUserIds));
    for (const topicId of campaign.topicIds) {
      toCanonical.set(topicId, id);
    }
  }

  return { toCanonical, campaigns, gmIds };
}

/**
 * Caches {@link TopicMaps} per configuration version. A reloaded config
 * carries a new version and therefore rebuilds the tables.
 */
export class TopicMapCache {
  private cachedVersion: number | null = null;
  private cached: TopicMaps | null = null;

  get(config: BotConfig): TopicMaps {
    if (this.cached && this.cachedVersion === config.version) {
      return this.cached;
    }
    this.cached = buildTopicMaps(config);
    this.cachedVersion = config.version;
    return this.cached;
  }
}

/** GM ids for a campaign; empty when the campaign is unknown. */
export function gmIdsFor(maps: TopicMaps, campaignId: CampaignId): ReadonlySet<UserId> {
  return maps.gmIds.get(campaignId) ?? new Set<UserId>();
}
