import { HOUR_MS, toIso, toMs } from '../analytics/time.js';
import type { CampaignId, CombatPhase, CombatState, UserId } from '../types/index.js';

export type AdvanceOutcome = 'started' | 'advanced' | 'unchanged';

export interface CombatPing {
  round: number;
  hoursElapsed: number;
  phaseStartedAt: number;
  waitingOn: UserId[];
}

function freshCombat(round: number, phase: CombatPhase, now: number, enemies: string[] = []): CombatState {
  const iso = toIso(now);
  return {
    active: true,
    round,
    phase,
    phaseStartedAt: iso,
    startedAt: iso,
    acted: [],
    lastPingAt: null,
    allActedNotified: false,
    enemies,
    log: [],
  };
}

/**
 * Round/phase turn tracking for in-chat combat, one record per campaign.
 *
 * inactive → players ⇄ enemies → inactive. The acted-set clears only when
 * a new players-phase begins: coming from enemies, or a new round number.
 * Operates directly on the snapshot's combat table.
 */
export class CombatTracker {
  constructor(private readonly table: Record<CampaignId, CombatState>) {}

  get(campaignId: CampaignId): CombatState | undefined {
    const combat = this.table[campaignId];
    return combat?.active ? combat : undefined;
  }

  /** Start combat at round 1, players first. Leaves a running combat untouched. */
  start(campaignId: CampaignId, enemies: string[], now: number): AdvanceOutcome {
    if (this.get(campaignId)) return 'unchanged';
    const combat = freshCombat(1, 'players', now, enemies);
    combat.log.push({ round: 1, text: 'Combat begins!', at: toIso(now) });
    this.table[campaignId] = combat;
    return 'started';
  }

  /**
   * Move to `round`/`phase`. With no combat running this seeds round 1 in
   * the requested phase. Re-issuing the current round and phase changes
   * nothing.
   */
  advance(campaignId: CampaignId, round: number, phase: CombatPhase, now: number): AdvanceOutcome {
    const combat = this.get(campaignId);
    if (!combat) {
      this.table[campaignId] = freshCombat(1, phase, now);
      return 'started';
    }

    if (combat.round === round && combat.phase === phase) {
      return 'unchanged';
    }

    if (phase === 'players' && (combat.phase !== 'players' || combat.round !== round)) {
      combat.acted = [];
    }
    combat.round = round;
    combat.phase = phase;
    combat.phaseStartedAt = toIso(now);
    combat.lastPingAt = null;
    combat.allActedNotified = false;
    return 'advanced';
  }

  /** players → enemies (same round); enemies → players (next round). */
  next(campaignId: CampaignId, now: number): AdvanceOutcome {
    const combat = this.get(campaignId);
    if (!combat) return 'unchanged';
    return combat.phase === 'players'
      ? this.advance(campaignId, combat.round, 'enemies', now)
      : this.advance(campaignId, combat.round + 1, 'players', now);
  }

  /** End combat; returns the final record so callers can summarise it. */
  end(campaignId: CampaignId): CombatState | undefined {
    const combat = this.table[campaignId];
    if (!combat) return undefined;
    delete this.table[campaignId];
    return combat;
  }

  setEnemies(campaignId: CampaignId, enemies: string[]): boolean {
    const combat = this.get(campaignId);
    if (!combat) return false;
    combat.enemies = enemies;
    return true;
  }

  addLogEntry(campaignId: CampaignId, text: string, now: number): boolean {
    const combat = this.get(campaignId);
    if (!combat) return false;
    combat.log.push({ round: combat.round, text, at: toIso(now) });
    return true;
  }

  /** Record a player's post; only counts during the players-phase. Idempotent. */
  recordAction(campaignId: CampaignId, userId: UserId): boolean {
    const combat = this.get(campaignId);
    if (!combat || combat.phase !== 'players') return false;
    if (combat.acted.includes(userId)) return false;
    combat.acted.push(userId);
    return true;
  }

  /** Forget a user everywhere (player removed from the campaign). */
  forget(campaignId: CampaignId, userId: UserId): void {
    const combat = this.table[campaignId];
    if (combat) {
      combat.acted = combat.acted.filter(id => id !== userId);
    }
  }

  /** Known players who have not acted in the current players-phase. */
  waitingOn(campaignId: CampaignId, knownPlayers: readonly UserId[]): UserId[] {
    const combat = this.get(campaignId);
    if (!combat || combat.phase !== 'players') return [];
    const acted = new Set(combat.acted);
    return knownPlayers.filter(id => !acted.has(id));
  }

  /**
   * True once per players-phase, when every known player has acted and
   * the notice has not gone out yet.
   */
  needsAllActedNotice(campaignId: CampaignId, knownPlayers: readonly UserId[]): boolean {
    const combat = this.get(campaignId);
    if (!combat || combat.phase !== 'players' || combat.allActedNotified) return false;
    return knownPlayers.length > 0 && this.waitingOn(campaignId, knownPlayers).length === 0;
  }

  markAllActedNotified(campaignId: CampaignId): void {
    const combat = this.get(campaignId);
    if (combat) combat.allActedNotified = true;
  }

  /**
   * A reminder is due when the players-phase has lasted `pingHours` and
   * the previous reminder (if any) is at least as old, and someone is
   * still missing.
   */
  duePing(campaignId: CampaignId, knownPlayers: readonly UserId[], now: number, pingHours: number): CombatPing | null {
    const combat = this.get(campaignId);
    if (!combat || combat.phase !== 'players') return null;

    const thresholdMs = pingHours * HOUR_MS;
    const phaseStartedAt = toMs(combat.phaseStartedAt);
    if (now - phaseStartedAt < thresholdMs) return null;
    if (combat.lastPingAt && now - toMs(combat.lastPingAt) < thresholdMs) return null;

    const waitingOn = this.waitingOn(campaignId, knownPlayers);
    if (waitingOn.length === 0) return null;

    return {
      round: combat.round,
      hoursElapsed: (now - phaseStartedAt) / HOUR_MS,
      phaseStartedAt,
      waitingOn,
    };
  }

  markPinged(campaignId: CampaignId, now: number): void {
    const combat = this.get(campaignId);
    if (combat) combat.lastPingAt = toIso(now);
  }
}
