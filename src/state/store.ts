/**
 * Durable snapshot storage. Both backends hand the raw document to the
 * defaulting snapshot schema, so older snapshots load with every newer
 * field backfilled.
 */

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { scopedLogger } from '../logger.js';
import { createEmptySnapshot, parseSnapshot } from './snapshot.js';
import type { ActivitySnapshot } from '../types/index.js';

export interface SnapshotStore {
  load(): Promise<ActivitySnapshot>;
  save(snapshot: ActivitySnapshot): Promise<void>;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/** Write through a temporary file so a crash never leaves half a document. */
export async function writeJsonFile(path: string, value: unknown): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tmp = `${path}.tmp`;
  await writeFile(tmp, `${JSON.stringify(value, null, 2)}\n`, 'utf-8');
  await rename(tmp, path);
}

/** Read a JSON file; `undefined` when it does not exist yet. */
export async function readJsonFile(path: string): Promise<unknown> {
  try {
    return JSON.parse(await readFile(path, 'utf-8'));
  } catch (err) {
    if (isMissingFile(err)) return undefined;
    throw err;
  }
}

export class FileSnapshotStore implements SnapshotStore {
  private readonly log = scopedLogger('FileSnapshotStore');

  constructor(private readonly path: string) {}

  async load(): Promise<ActivitySnapshot> {
    const raw = await readJsonFile(this.path);
    if (raw === undefined) {
      this.log.info(`no snapshot at ${this.path}, starting with empty state`);
      return createEmptySnapshot();
    }
    return parseSnapshot(raw);
  }

  async save(snapshot: ActivitySnapshot): Promise<void> {
    await writeJsonFile(this.path, snapshot);
    this.log.debug(`saved snapshot to ${this.path}`);
  }
}

export const GIST_STATE_FILENAME = 'pbp_state.json';

const gistResponseSchema = z.object({
  files: z.record(z.object({ content: z.string().optional() }).passthrough()).default({}),
});

export interface GistSnapshotStoreOptions {
  gistId: string;
  token: string;
  filename?: string;
  apiBase?: string;
}

/** Snapshot kept as one file inside a GitHub gist. */
export class GistSnapshotStore implements SnapshotStore {
  private readonly log = scopedLogger('GistSnapshotStore');
  private readonly url: string;
  private readonly filename: string;

  constructor(private readonly options: GistSnapshotStoreOptions) {
    this.url = `${options.apiBase ?? 'https://api.github.com'}/gists/${options.gistId}`;
    this.filename = options.filename ?? GIST_STATE_FILENAME;
  }

  private headers(): Record<string, string> {
    return {
      Authorization: `token ${this.options.token}`,
      Accept: 'application/vnd.github.v3+json',
      'Content-Type': 'application/json',
    };
  }

  async load(): Promise<ActivitySnapshot> {
    const response = await fetch(this.url, { headers: this.headers() });
    if (!response.ok) {
      // Starting empty here would overwrite the stored state on save
      throw new Error(`could not load gist (HTTP ${response.status})`);
    }

    const gist = gistResponseSchema.parse(await response.json());
    const content = gist.files[this.filename]?.content;
    if (content === undefined) {
      this.log.info(`gist has no ${this.filename}, starting with empty state`);
      return createEmptySnapshot();
    }
    return parseSnapshot(JSON.parse(content));
  }

  async save(snapshot: ActivitySnapshot): Promise<void> {
    const response = await fetch(this.url, {
      method: 'PATCH',
      headers: this.headers(),
      body: JSON.stringify({
        files: { [this.filename]: { content: JSON.stringify(snapshot, null, 2) } },
      }),
    });
    if (!response.ok) {
      throw new Error(`could not save gist (HTTP ${response.status})`);
    }
    this.log.info('state saved to gist');
  }
}
