import { afterEach, describe, expect, it } from 'vitest';
import {
  DEFAULT_SETTINGS,
  featureEnabled,
  getEnvConfig,
  parseCampaignConfig,
  resetEnvConfig,
  resolveSettings,
} from '../src/config.js';
import { TopicMapCache, buildTopicMaps, gmIdsFor } from '../src/state/topics.js';
import { makeCampaign } from './helpers.js';

const valid = {
  groupId: -100123,
  gmUserIds: [900],
  campaigns: [
    { name: 'Ashfall', topicIds: [10, 11], outputTopicId: 12, created: '2024-02-18' },
    { name: 'Emberfall', topicIds: [20], outputTopicId: 21, gmUserIds: ['42'], features: { combat: false } },
  ],
  settings: { requiredPlayers: 4, warnWeeks: [3, 1, 2] },
};

describe('parseCampaignConfig', () => {
  it('accepts a valid file and fills every tunable', () => {
    const { config, issues } = parseCampaignConfig(valid);
    expect(issues).toEqual([]);
    expect(config?.gmUserIds).toEqual(['900']);
    expect(config?.settings.requiredPlayers).toBe(4);
    expect(config?.settings.warnWeeks).toEqual([1, 2, 3]);
    expect(config?.settings.burstWindowMinutes).toBe(10);
    expect(config?.digestTopicId).toBeNull();
    expect(Object.isFrozen(config?.settings)).toBe(true);
  });

  it('takes the top-level alert threshold unless settings override it', () => {
    expect(parseCampaignConfig({ ...valid, alertAfterHours: 6 }).config?.settings.alertAfterHours).toBe(6);
    const both = { ...valid, alertAfterHours: 6, settings: { alertAfterHours: 8 } };
    expect(parseCampaignConfig(both).config?.settings.alertAfterHours).toBe(8);
  });

  it('defaults the digest topic to the leaderboard topic', () => {
    expect(parseCampaignConfig({ ...valid, leaderboardTopicId: 50 }).config?.digestTopicId).toBe(50);
  });

  it('issues a fresh version for every parse', () => {
    const first = parseCampaignConfig(valid).config?.version ?? 0;
    const second = parseCampaignConfig(valid).config?.version ?? 0;
    expect(second).toBeGreaterThan(first);
  });

  it('reports shape errors with their path', () => {
    const { config, issues } = parseCampaignConfig({ groupId: 'x', campaigns: [] });
    expect(config).toBeNull();
    expect(issues.every(i => i.startsWith('ERROR: '))).toBe(true);
    expect(issues.some(i => i.startsWith('ERROR: groupId:'))).toBe(true);
  });

  it('reports duplicate topics, unknown features and bad dates', () => {
    const { issues } = parseCampaignConfig({
      groupId: 1,
      campaigns: [
        { name: 'A', topicIds: [10], outputTopicId: 1, features: { dice: true } },
        { name: 'B', topicIds: [10], outputTopicId: 2, created: '2024-13-40' },
      ],
    });
    expect(issues).toEqual([
      'WARN: "A" has unknown feature "dice"',
      'ERROR: topic 10 is listed by both "A" and "B"',
      'ERROR: "B" has invalid created date "2024-13-40" (expected YYYY-MM-DD)',
    ]);
  });

  it('warns when removal does not come after the last warning', () => {
    const { config, issues } = parseCampaignConfig({ ...valid, settings: { warnWeeks: [1, 2, 4], removeWeeks: 4 } });
    expect(config).not.toBeNull();
    expect(issues).toEqual([
      'WARN: removeWeeks (4) is not after the last warning week (4); players may be removed before every warning is sent',
    ]);
  });
});

describe('resolveSettings', () => {
  it('returns the defaults untouched when nothing is overridden', () => {
    expect(resolveSettings()).toEqual(DEFAULT_SETTINGS);
  });
});

describe('featureEnabled', () => {
  it('defaults to on and respects explicit toggles', () => {
    expect(featureEnabled(makeCampaign(), 'combat')).toBe(true);
    expect(featureEnabled(makeCampaign({ features: { combat: false } }), 'combat')).toBe(false);
    expect(featureEnabled(undefined, 'combat')).toBe(false);
  });
});

describe('topic maps', () => {
  it('maps every thread to the canonical id and resolves GM overrides', () => {
    const config = parseCampaignConfig(valid).config;
    expect(config).not.toBeNull();
    if (!config) return;

    const maps = buildTopicMaps(config);
    expect(maps.toCanonical.get(11)).toBe('10');
    expect([...gmIdsFor(maps, '10')]).toEqual(['900']);
    expect([...gmIdsFor(maps, '20')]).toEqual(['42']);
    expect(gmIdsFor(maps, 'missing').size).toBe(0);
  });

  it('rebuilds only when the configuration version changes', () => {
    const first = parseCampaignConfig(valid).config;
    const second = parseCampaignConfig(valid).config;
    if (!first || !second) throw new Error('config did not parse');

    const cache = new TopicMapCache();
    const maps = cache.get(first);
    expect(cache.get({ ...first })).toBe(maps);
    expect(cache.get(second)).not.toBe(maps);
  });
});

describe('getEnvConfig', () => {
  afterEach(() => {
    delete process.env.CHAT_TRANSPORT;
    delete process.env.STATE_PATH;
    delete process.env.CHAT_MCP_TRANSPORT;
    resetEnvConfig();
  });

  it('reads the environment once and caches it', () => {
    process.env.CHAT_TRANSPORT = 'mcp';
    process.env.STATE_PATH = '/tmp/pbp-state.json';
    resetEnvConfig();

    const env = getEnvConfig();
    expect(env.chatTransport).toBe('mcp');
    expect(env.statePath).toBe('/tmp/pbp-state.json');

    process.env.CHAT_TRANSPORT = 'telegram';
    expect(getEnvConfig()).toBe(env);
  });

  it('selects the MCP transport kind, defaulting to streamable HTTP', () => {
    resetEnvConfig();
    expect(getEnvConfig().chatMcpTransport).toBe('streamable-http');

    process.env.CHAT_MCP_TRANSPORT = 'sse';
    resetEnvConfig();
    expect(getEnvConfig().chatMcpTransport).toBe('sse');
  });
});
