import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { logger } from '../logger.js';

/** Rewards offered to the weekly award winner. */
export interface BoonPool {
  flavour: string[];
  mechanical: string[];
}

const FALLBACK_BOON = 'Something mildly beneficial happens to you today.';

const boonFileSchema = z.object({
  flavour: z.array(z.string().min(1)).default([]),
  mechanical: z.array(z.string().min(1)).default([]),
});

/**
 * Load the boon pool from a JSON file.
 * Falls back to a single generic boon on failure (non-blocking).
 */
export function loadBoons(path: string): BoonPool {
  try {
    const parsed = boonFileSchema.parse(JSON.parse(readFileSync(path, 'utf-8')));
    logger.info(`Loaded ${parsed.flavour.length} flavour and ${parsed.mechanical.length} mechanical boons from ${path}`);
    return parsed;
  } catch (err) {
    logger.warn(`Failed to load boons from ${path}:`, err);
    return { flavour: [FALLBACK_BOON], mechanical: [] };
  }
}

/** Up to `count` distinct items, drawn without replacement. */
function sample<T>(items: readonly T[], count: number, random: () => number): T[] {
  const pool = [...items];
  const picked: T[] = [];
  while (picked.length < count && pool.length > 0) {
    const [item] = pool.splice(Math.floor(random() * pool.length), 1);
    picked.push(item);
  }
  return picked;
}

/** Three random flavour boons followed by one mechanical boon. */
export function pickBoons(pool: BoonPool, random: () => number = Math.random): string[] {
  const chosen = sample(pool.flavour, 3, random);
  chosen.push(...sample(pool.mechanical, 1, random));
  return chosen.length > 0 ? chosen : [FALLBACK_BOON];
}
