import { logger } from '../logger.js';
import { topicAlertCheck, silenceAlertCheck } from './alerts.js';
import { warningLadderCheck } from './warnings.js';
import { rosterCheck, recruitmentCheck } from './roster.js';
import { awardCheck, awardExpiryCheck } from './award.js';
import { paceReportCheck, paceDropCheck } from './pace.js';
import { anniversaryCheck, messageMilestoneCheck, streakMilestoneCheck } from './milestones.js';
import { combatPingCheck } from './combat.js';
import { digestCheck, leaderboardCheck } from './leaderboard.js';
import { archiveCheck } from './archive.js';
import type { Check, CheckContext } from './context.js';

export type { Check, CheckContext } from './context.js';

/** Every periodic check, in the order they run. */
export const CHECKS: readonly Check[] = [
  topicAlertCheck,
  warningLadderCheck,
  rosterCheck,
  awardCheck,
  awardExpiryCheck,
  paceReportCheck,
  streakMilestoneCheck,
  anniversaryCheck,
  messageMilestoneCheck,
  combatPingCheck,
  leaderboardCheck,
  digestCheck,
  recruitmentCheck,
  archiveCheck,
  paceDropCheck,
  silenceAlertCheck,
];

export interface CheckRunSummary {
  ran: number;
  failed: string[];
}

/**
 * Run checks in order against one shared context. A check that throws is
 * logged and skipped; the rest still run.
 */
export async function runChecks(ctx: CheckContext, checks: readonly Check[] = CHECKS): Promise<CheckRunSummary> {
  const failed: string[] = [];
  for (const check of checks) {
    try {
      await check.run(ctx);
    } catch (err) {
      logger.error(`Error in ${check.label}:`, err);
      failed.push(check.label);
    }
  }
  return { ran: checks.length, failed };
}
