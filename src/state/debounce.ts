import { intervalElapsed, toIso } from '../analytics/time.js';
import type {
  CampaignId,
  DebounceState,
  GlobalIntervalFamily,
  IntervalFamily,
  PlayerKey,
} from '../types/index.js';

/**
 * Persisted "last fired" markers for every periodic check.
 *
 * Checks ask `due…` before acting and call `mark…` only after the
 * notification was confirmed delivered. Elapsed time is always computed
 * from the recorded timestamps, so irregular run spacing is harmless.
 */
export class DebounceLedger {
  constructor(private readonly state: DebounceState) {}

  // ── Per-campaign intervals ──

  lastFired(family: IntervalFamily, campaignId: CampaignId): string | null {
    return this.state.intervals[family][campaignId] ?? null;
  }

  due(family: IntervalFamily, campaignId: CampaignId, intervalMs: number, now: number): boolean {
    return intervalElapsed(this.lastFired(family, campaignId), intervalMs, now);
  }

  mark(family: IntervalFamily, campaignId: CampaignId, now: number): void {
    this.state.intervals[family][campaignId] = toIso(now);
  }

  // ── Group-wide intervals ──

  globalDue(family: GlobalIntervalFamily, intervalMs: number, now: number): boolean {
    return intervalElapsed(this.state.global[family], intervalMs, now);
  }

  markGlobal(family: GlobalIntervalFamily, now: number): void {
    this.state.global[family] = toIso(now);
  }

  // ── Monotonic thresholds ──

  /** Highest streak milestone already celebrated for a player; 0 when none. */
  celebratedStreak(key: PlayerKey): number {
    return this.state.streaks[key.campaignId]?.[key.userId] ?? 0;
  }

  markStreak(key: PlayerKey, milestone: number): void {
    const row = this.state.streaks[key.campaignId] ?? (this.state.streaks[key.campaignId] = {});
    row[key.userId] = milestone;
  }

  /** Forget a player's celebrated streak (the streak broke). */
  resetStreak(key: PlayerKey): void {
    const row = this.state.streaks[key.campaignId];
    if (!row) return;
    delete row[key.userId];
    if (Object.keys(row).length === 0) delete this.state.streaks[key.campaignId];
  }

  anniversaryFired(campaignId: CampaignId, years: number): boolean {
    return this.state.anniversaries[campaignId]?.[String(years)] !== undefined;
  }

  markAnniversary(campaignId: CampaignId, years: number, now: number): void {
    const row = this.state.anniversaries[campaignId] ?? (this.state.anniversaries[campaignId] = {});
    row[String(years)] = toIso(now);
  }

  campaignStep(campaignId: CampaignId): number {
    return this.state.messageSteps.campaigns[campaignId] ?? 0;
  }

  markCampaignStep(campaignId: CampaignId, step: number): void {
    this.state.messageSteps.campaigns[campaignId] = step;
  }

  globalStep(): number {
    return this.state.messageSteps.global;
  }

  markGlobalStep(step: number): void {
    this.state.messageSteps.global = step;
  }

  // ── Silence ──

  /** Last-post time the silence alert already went out for, if any. */
  silencedAt(campaignId: CampaignId): string | null {
    return this.state.silence[campaignId] ?? null;
  }

  markSilence(campaignId: CampaignId, lastPostIso: string): void {
    this.state.silence[campaignId] = lastPostIso;
  }

  clearSilence(campaignId: CampaignId): void {
    delete this.state.silence[campaignId];
  }

  // ── Weekly archive ──

  lastArchivedWeek(): string | null {
    return this.state.lastArchivedWeek;
  }

  markArchivedWeek(week: string): void {
    this.state.lastArchivedWeek = week;
  }
}
