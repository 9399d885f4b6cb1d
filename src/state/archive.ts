import { z } from 'zod';
import { readJsonFile, writeJsonFile } from './store.js';
import type { WeeklyArchive } from '../types/index.js';

/** Long-term weekly summaries, kept outside the pruned snapshot. */
export interface ArchiveStore {
  load(): Promise<WeeklyArchive>;
  save(archive: WeeklyArchive): Promise<void>;
}

const archiveEntrySchema = z.object({
  campaign: z.string(),
  week: z.string(),
  gmPosts: z.number(),
  playerPosts: z.number(),
  totalPosts: z.number(),
  playerAvgGapHours: z.number().nullable(),
  activePlayers: z.number(),
  topPlayers: z.record(z.number()),
});

const archiveSchema = z.record(archiveEntrySchema);

/** Archive file keyed `<campaign id>:<ISO week>`. */
export class FileArchiveStore implements ArchiveStore {
  constructor(private readonly path: string) {}

  async load(): Promise<WeeklyArchive> {
    const raw = await readJsonFile(this.path);
    return raw === undefined ? {} : archiveSchema.parse(raw);
  }

  async save(archive: WeeklyArchive): Promise<void> {
    await writeJsonFile(this.path, archive);
  }
}
