import { readFileSync } from 'node:fs';
import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { registerSecret } from './logger.js';
import type { McpTransportKind } from './mcp/client.js';
import type { BotConfig, CampaignConfig, FeatureName, Settings } from './types/index.js';

dotenvConfig();

// ── Process environment ────────────────────────────────────────────────────

export type TransportKind = 'telegram' | 'mcp';
export type StateBackend = 'file' | 'gist';

export interface EnvConfig {
  telegramBotToken: string;
  chatTransport: TransportKind;
  chatMcpUrl: string;
  chatMcpToken: string;
  chatMcpTransport: McpTransportKind;

  stateBackend: StateBackend;
  statePath: string;
  gistId: string;
  gistToken: string;

  campaignsConfigPath: string;
  archivePath: string;
  boonsPath: string;
}

let _env: EnvConfig | null = null;

export function getEnvConfig(): EnvConfig {
  if (_env) return _env;

  const telegramBotToken = process.env.TELEGRAM_BOT_TOKEN ?? '';
  const chatMcpToken = process.env.CHAT_MCP_TOKEN ?? '';
  const gistToken = process.env.GIST_TOKEN ?? '';

  // Register secrets for log redaction
  if (telegramBotToken) registerSecret(telegramBotToken);
  if (chatMcpToken) registerSecret(chatMcpToken);
  if (gistToken) registerSecret(gistToken);

  _env = {
    telegramBotToken,
    chatTransport: process.env.CHAT_TRANSPORT === 'mcp' ? 'mcp' : 'telegram',
    chatMcpUrl: process.env.CHAT_MCP_URL ?? 'http://127.0.0.1:3001',
    chatMcpToken,
    chatMcpTransport: process.env.CHAT_MCP_TRANSPORT === 'sse' ? 'sse' : 'streamable-http',
    stateBackend: process.env.STATE_BACKEND === 'gist' ? 'gist' : 'file',
    statePath: process.env.STATE_PATH ?? './data/state.json',
    gistId: process.env.GIST_ID ?? '',
    gistToken,
    campaignsConfigPath: process.env.CAMPAIGNS_CONFIG_PATH ?? './config/campaigns.json',
    archivePath: process.env.ARCHIVE_PATH ?? './data/weekly-archive.json',
    boonsPath: process.env.BOONS_PATH ?? './config/boons.json',
  };

  return _env;
}

/** Reset cached env config (for testing). */
export function resetEnvConfig(): void {
  _env = null;
}

// ── Tunables ───────────────────────────────────────────────────────────────

export const DEFAULT_SETTINGS: Readonly<Settings> = Object.freeze({
  burstWindowMinutes: 10,
  warnWeeks: Object.freeze([1, 2, 3]),
  removeWeeks: 4,
  alertAfterHours: 4,
  rosterIntervalDays: 3,
  awardIntervalDays: 7,
  awardMinSessions: 5,
  awardChoiceExpiryHours: 48,
  paceIntervalDays: 7,
  leaderboardIntervalDays: 3,
  digestIntervalDays: 7,
  combatPingHours: 4,
  recruitmentIntervalDays: 14,
  requiredPlayers: 6,
  paceDropIntervalDays: 7,
  paceDropMinPrevious: 5,
  paceDropRatio: 0.5,
  silenceAlertHours: 48,
  streakMilestones: Object.freeze([7, 14, 30]),
  campaignMessageStep: 500,
  globalMessageStep: 5000,
  retentionDays: 15,
});

/** Fill every missing tunable with its default and freeze the result. */
export function resolveSettings(overrides: Partial<Settings> = {}): Readonly<Settings> {
  const merged: Settings = { ...DEFAULT_SETTINGS, ...overrides };
  return Object.freeze({
    ...merged,
    warnWeeks: Object.freeze([...merged.warnWeeks].sort((a, b) => a - b)),
    streakMilestones: Object.freeze([...merged.streakMilestones].sort((a, b) => a - b)),
  });
}

// ── Campaign configuration file ────────────────────────────────────────────

export const FEATURE_NAMES: readonly FeatureName[] = [
  'alerts', 'warnings', 'roster', 'award', 'pace', 'streaks',
  'anniversary', 'milestones', 'combat', 'recruitment', 'paceDrop', 'silence',
];

const userIdSchema = z.union([z.string(), z.number()]).transform(String);
const positive = z.number().positive();

const settingsSchema = z.object({
  burstWindowMinutes: positive,
  warnWeeks: z.array(z.number().int().positive()).min(1),
  removeWeeks: z.number().int().positive(),
  alertAfterHours: positive,
  rosterIntervalDays: positive,
  awardIntervalDays: positive,
  awardMinSessions: z.number().int().min(1),
  awardChoiceExpiryHours: positive,
  paceIntervalDays: positive,
  leaderboardIntervalDays: positive,
  digestIntervalDays: positive,
  combatPingHours: positive,
  recruitmentIntervalDays: positive,
  requiredPlayers: z.number().int().min(1),
  paceDropIntervalDays: positive,
  paceDropMinPrevious: z.number().int().min(1),
  paceDropRatio: z.number().gt(0).lt(1),
  silenceAlertHours: positive,
  streakMilestones: z.array(z.number().int().min(2)).min(1),
  campaignMessageStep: z.number().int().positive(),
  globalMessageStep: z.number().int().positive(),
  retentionDays: positive,
}).partial();

const campaignSchema = z.object({
  name: z.string().min(1),
  topicIds: z.array(z.number().int()).min(1),
  outputTopicId: z.number().int(),
  created: z.string().optional(),
  // Unknown feature names are reported by validateCampaignConfig, not rejected here
  features: z.record(z.boolean()).default({}),
  characters: z.record(z.string()).default({}),
  gmUserIds: z.array(userIdSchema).optional(),
});

const configFileSchema = z.object({
  groupId: z.number().int(),
  gmUserIds: z.array(userIdSchema).default([]),
  botUserId: userIdSchema.optional(),
  leaderboardTopicId: z.number().int().optional(),
  digestTopicId: z.number().int().optional(),
  alertAfterHours: positive.optional(),
  campaigns: z.array(campaignSchema).min(1),
  settings: settingsSchema.default({}),
});


let configVersion = 0;

export interface ParsedConfig {
  config: BotConfig | null;
  issues: string[];
}

/**
 * Parse a campaign configuration document. Shape errors come back as
 * `ERROR:` issues with a null config; semantic problems are appended by
 * {@link validateCampaignConfig}.
 */
export function parseCampaignConfig(raw: unknown): ParsedConfig {
  const result = configFileSchema.safeParse(raw);
  if (!result.success) {
    return {
      config: null,
      issues: result.error.issues.map(i => `ERROR: ${i.path.join('.') || '(root)'}: ${i.message}`),
    };
  }

  const file = result.data;
  const settingsOverrides: Partial<Settings> = { ...file.settings };
  if (file.alertAfterHours !== undefined && settingsOverrides.alertAfterHours === undefined) {
    settingsOverrides.alertAfterHours = file.alertAfterHours;
  }

  const campaigns: CampaignConfig[] = file.campaigns.map(c => ({
    name: c.name,
    topicIds: c.topicIds,
    outputTopicId: c.outputTopicId,
    created: c.created,
    features: c.features,
    characters: c.characters,
    gmUserIds: c.gmUserIds,
  }));

  configVersion += 1;
  const config: BotConfig = {
    version: configVersion,
    groupId: file.groupId,
    gmUserIds: file.gmUserIds,
    botUserId: file.botUserId ?? null,
    leaderboardTopicId: file.leaderboardTopicId ?? null,
    digestTopicId: file.digestTopicId ?? file.leaderboardTopicId ?? null,
    campaigns,
    settings: resolveSettings(settingsOverrides),
  };

  return { config, issues: validateCampaignConfig(config) };
}

const CREATED_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/** Semantic checks the schema cannot express. */
export function validateCampaignConfig(config: BotConfig): string[] {
  const issues: string[] = [];
  const seenTopics = new Map<number, string>();
  const known: ReadonlySet<string> = new Set<string>(FEATURE_NAMES);

  for (const campaign of config.campaigns) {
    for (const topicId of campaign.topicIds) {
      const owner = seenTopics.get(topicId);
      if (owner !== undefined) {
        issues.push(`ERROR: topic ${topicId} is listed by both "${owner}" and "${campaign.name}"`);
      } else {
        seenTopics.set(topicId, campaign.name);
      }
    }

    for (const feature of Object.keys(campaign.features)) {
      if (!known.has(feature)) {
        issues.push(`WARN: "${campaign.name}" has unknown feature "${feature}"`);
      }
    }

    if (campaign.created !== undefined) {
      const parsed = new Date(`${campaign.created}T00:00:00Z`);
      if (!CREATED_DATE_PATTERN.test(campaign.created) || Number.isNaN(parsed.getTime())) {
        issues.push(`ERROR: "${campaign.name}" has invalid created date "${campaign.created}" (expected YYYY-MM-DD)`);
      }
    }
  }

  const lastWarning = Math.max(...config.settings.warnWeeks);
  if (config.settings.removeWeeks <= lastWarning) {
    issues.push(
      `WARN: removeWeeks (${config.settings.removeWeeks}) is not after the last warning week (${lastWarning}); players may be removed before every warning is sent`,
    );
  }

  return issues;
}

/** Read and parse the campaign configuration file. */
export function loadCampaignConfig(path: string): ParsedConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return { config: null, issues: [`ERROR: could not read ${path}: ${reason}`] };
  }
  return parseCampaignConfig(raw);
}

/** Whether a per-campaign feature toggle is on. Features default to enabled. */
export function featureEnabled(campaign: CampaignConfig | undefined, feature: FeatureName): boolean {
  if (!campaign) return false;
  return campaign.features[feature] ?? true;
}
