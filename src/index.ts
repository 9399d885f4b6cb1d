/**
 * PBP Steward entry point. Runs a single pass and exits; schedule it with
 * cron or a CI workflow.
 */

import { getEnvConfig, loadCampaignConfig } from './config.js';
import { logger } from './logger.js';
import { McpChatTransport } from './mcp/client.js';
import { loadBoons } from './output/boons.js';
import { TelegramTransport } from './output/telegram.js';
import { runOnce } from './run.js';
import { FileArchiveStore } from './state/archive.js';
import { FileSnapshotStore, GistSnapshotStore } from './state/store.js';
import type { EnvConfig } from './config.js';
import type { SnapshotStore } from './state/store.js';
import type { ChatTransport } from './types/index.js';

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection:', reason);
});

function createTransport(env: EnvConfig): ChatTransport {
  if (env.chatTransport === 'mcp') {
    return new McpChatTransport({ url: env.chatMcpUrl, token: env.chatMcpToken, transport: env.chatMcpTransport });
  }
  if (!env.telegramBotToken) {
    throw new Error('TELEGRAM_BOT_TOKEN is required when CHAT_TRANSPORT=telegram.');
  }
  return new TelegramTransport(env.telegramBotToken);
}

function createStore(env: EnvConfig): SnapshotStore {
  if (env.stateBackend === 'gist') {
    if (!env.gistId || !env.gistToken) {
      throw new Error('GIST_ID and GIST_TOKEN are required when STATE_BACKEND=gist.');
    }
    return new GistSnapshotStore({ gistId: env.gistId, token: env.gistToken });
  }
  return new FileSnapshotStore(env.statePath);
}

async function main(): Promise<void> {
  const env = getEnvConfig();
  logger.info('PBP Steward starting...');
  logger.info(`  Transport: ${env.chatTransport === 'mcp' ? `mcp (${env.chatMcpTransport})` : env.chatTransport}`);
  logger.info(`  State: ${env.stateBackend === 'gist' ? `gist ${env.gistId}` : env.statePath}`);
  logger.info(`  Campaigns: ${env.campaignsConfigPath}`);

  const { config, issues } = loadCampaignConfig(env.campaignsConfigPath);
  for (const issue of issues) {
    if (issue.startsWith('ERROR:')) logger.error(issue);
    else logger.warn(issue);
  }
  if (!config || issues.some(issue => issue.startsWith('ERROR:'))) {
    throw new Error(`Campaign configuration at ${env.campaignsConfigPath} is invalid.`);
  }
  logger.info(`  ${config.campaigns.length} campaign(s) configured`);

  const store = createStore(env);
  const transport = createTransport(env);

  try {
    const summary = await runOnce({
      config,
      transport,
      store,
      archive: new FileArchiveStore(env.archivePath),
      boons: loadBoons(env.boonsPath),
    });
    logger.info(`Run complete: ${summary.updates} update(s), ${summary.failedChecks.length} failed check(s).`);
  } finally {
    await transport.close();
  }
}

main().catch((err) => {
  logger.error('Fatal error:', err);
  process.exit(1);
});
