/**
 * One scheduled run: load state, fold in new chat updates, run every
 * periodic check, prune, save.
 */

import { scopedLogger } from './logger.js';
import { runChecks } from './checks/index.js';
import { processUpdates } from './ingest.js';
import { CombatTracker } from './state/combat.js';
import { DebounceLedger } from './state/debounce.js';
import { pruneTimestamps } from './state/snapshot.js';
import { TopicMapCache } from './state/topics.js';
import type { Check } from './checks/index.js';
import type { BoonPool } from './output/boons.js';
import type { ArchiveStore } from './state/archive.js';
import type { SnapshotStore } from './state/store.js';
import type { BotConfig, ChatTransport } from './types/index.js';

const log = scopedLogger('Run');

export interface RunDeps {
  config: BotConfig;
  transport: ChatTransport;
  store: SnapshotStore;
  archive: ArchiveStore;
  boons: BoonPool;
  now?: () => number;
  random?: () => number;
  checks?: readonly Check[];
  maps?: TopicMapCache;
}

export interface RunSummary {
  updates: number;
  offset: number;
  failedChecks: string[];
  prunedTimestamps: number;
}

/**
 * Execute a single pass. The snapshot is saved even when a check fails;
 * a failure to load or save propagates to the caller.
 */
export async function runOnce(deps: RunDeps): Promise<RunSummary> {
  const { config, transport, store } = deps;
  const now = (deps.now ?? Date.now)();
  const maps = (deps.maps ?? new TopicMapCache()).get(config);

  const snapshot = await store.load();
  const combat = new CombatTracker(snapshot.combat);

  const updates = await transport.fetchUpdates(snapshot.offset);
  snapshot.offset = await processUpdates(updates, { config, maps, snapshot, sink: transport, combat, now });
  log.info(`processed ${updates.length} update(s), next offset ${snapshot.offset}`);

  const { failed } = await runChecks({
    config,
    settings: config.settings,
    snapshot,
    maps,
    sink: transport,
    ledger: new DebounceLedger(snapshot.debounce),
    combat,
    archive: deps.archive,
    boons: deps.boons,
    now,
    random: deps.random ?? Math.random,
  }, deps.checks);

  const pruned = pruneTimestamps(snapshot, now, config.settings.retentionDays);
  if (pruned > 0) log.debug(`pruned ${pruned} timestamp(s) past retention`);

  await store.save(snapshot);

  if (failed.length > 0) {
    log.warn(`${failed.length} check(s) failed: ${failed.join(', ')}`);
  }
  return { updates: updates.length, offset: snapshot.offset, failedChecks: failed, prunedTimestamps: pruned };
}
