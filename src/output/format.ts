/**
 * Text helpers shared by every outbound message.
 */

import { averageGapHours } from '../analytics/metrics.js';
import type { CampaignConfig, PlayerRecord, UserId } from '../types/index.js';

/** "1 post" or "N posts". */
export function postsStr(n: number): string {
  return n === 1 ? '1 post' : `${n} posts`;
}

/** Pluralise a noun by count: plural(2, 'player') -> "players". */
export function plural(n: number, noun: string): string {
  return n === 1 ? noun : `${noun}s`;
}

/** Thousands separators, e.g. 5000 -> "5,000". */
export function fmtNumber(n: number): string {
  return n.toLocaleString('en-US');
}

/** "First Last", or just "First". */
export function fullName(person: Pick<PlayerRecord, 'firstName' | 'lastName'>): string {
  return person.lastName ? `${person.firstName} ${person.lastName}` : person.firstName;
}

/** "First Last (@handle)" when a handle is known. */
export function displayName(person: Pick<PlayerRecord, 'firstName' | 'lastName' | 'username'>): string {
  const full = fullName(person);
  return person.username ? `${full} (@${person.username})` : full;
}

/**
 * How a player is addressed in notifications: their @handle when known,
 * otherwise their name, followed by the character they play.
 */
export function mention(
  person: Pick<PlayerRecord, 'userId' | 'firstName' | 'lastName' | 'username'>,
  campaign?: CampaignConfig,
): string {
  const base = person.username ? `@${person.username}` : fullName(person);
  const character = characterOf(campaign, person.userId);
  return character ? `${base} (${character})` : base;
}

export function characterOf(campaign: CampaignConfig | undefined, userId: UserId): string | undefined {
  return campaign?.characters[userId];
}

/** Escape text for the HTML parse mode used when editing messages. */
export function htmlEscape(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/** "N/A", "45 minutes" or "12.5 hours" for a set of sessions. */
export function fmtAvgGap(sessions: readonly number[]): string {
  const avg = averageGapHours(sessions);
  if (avg === undefined) return 'N/A';
  if (avg < 1) return `${(avg * 60).toFixed(0)} minutes`;
  return `${avg.toFixed(1)} hours`;
}

/** "12.5h", or "N/A" when the gap is undefined. */
export function fmtGapHours(hours: number | undefined | null): string {
  return hours === undefined || hours === null ? 'N/A' : `${hours.toFixed(1)}h`;
}

/** "February 14, 2024" (UTC). */
export function fmtLongDate(ms: number): string {
  return new Date(ms).toLocaleDateString('en-US', {
    month: 'long',
    day: '2-digit',
    year: 'numeric',
    timeZone: 'UTC',
  });
}

export const DIVIDER = '━━━━━━━━━━━━━━━━';
