/**
 * Alert Evaluator
 *
 * Flags learners who have gone quiet, score low, or are sliding:
 *   - INACTIVE: no activity within the inactivity threshold
 *   - AT RISK: total score under the at-risk threshold
 *   - DECLINING: under the declining threshold with few active days this
 *     week; not raised when INACTIVE already is
 *
 * Last-active dates come from the ledger, where any activity column counts.
 * Pure function — no I/O, all data passed in.
 */

import type { Alert, DailyMetricsRow, LeaderboardEntry } from '../types/metrics.js';
import type { TrackerConfig } from '../config/tracker-config.js';
import { hasActivity } from '../history/ledger.js';
import { learnerKey } from '../identity.js';
import { addDays, isoDate } from '../orchestrator/time-range.js';

const RECENT_WINDOW_DAYS = 7;
const NEVER_ACTIVE = ['Never', 'N/A'];

export type AlertConfig = Pick<
  TrackerConfig,
  | 'inactiveThresholdDays'
  | 'atRiskScoreThreshold'
  | 'decliningScoreThreshold'
  | 'decliningActiveDaysMin'
>;

export function evaluateAlerts(
  entries: LeaderboardEntry[],
  ledgerRows: DailyMetricsRow[],
  config: AlertConfig,
  now: Date = new Date()
): Alert[] {
  const today = isoDate(now);
  const inactiveCutoff = addDays(today, -config.inactiveThresholdDays);
  const weekCutoff = addDays(today, -RECENT_WINDOW_DAYS);

  const lastActiveByLearner = new Map<string, string>();
  const recentActiveDays = new Map<string, number>();
  for (const row of ledgerRows) {
    if (!hasActivity(row)) continue;
    const key = learnerKey(row.username);
    if (row.date > (lastActiveByLearner.get(key) ?? '')) {
      lastActiveByLearner.set(key, row.date);
    }
    if (row.date >= weekCutoff) {
      recentActiveDays.set(key, (recentActiveDays.get(key) ?? 0) + 1);
    }
  }

  const alerts: Alert[] = [];
  for (const entry of entries) {
    const key = learnerKey(entry.username);
    const score = entry.scores.totalScore;
    const lastActive = lastActiveByLearner.get(key) || entry.metrics.lastActive || 'Never';
    const raise = (alertType: Alert['alertType'], details: string): void => {
      alerts.push({ username: entry.username, alertType, details, lastActive, score });
    };

    const inactive = NEVER_ACTIVE.includes(lastActive) || lastActive <= inactiveCutoff;
    if (inactive) {
      raise('INACTIVE', `No activity in ${config.inactiveThresholdDays}+ days`);
    }

    if (score < config.atRiskScoreThreshold) {
      raise('AT RISK', `Score ${score} below ${config.atRiskScoreThreshold}`);
    }

    const recentDays = recentActiveDays.get(key) ?? 0;
    if (!inactive && score < config.decliningScoreThreshold && recentDays < config.decliningActiveDaysMin) {
      const dayWord = recentDays === 1 ? 'day' : 'days';
      raise(
        'DECLINING',
        `Score ${score} (below ${config.decliningScoreThreshold}), only ${recentDays} active ${dayWord} in last 7 days`
      );
    }
  }

  return alerts;
}
