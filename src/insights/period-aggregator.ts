/**
 * Period Aggregator
 *
 * Builds day/week/month/custom leaderboards from the raw metrics ledger
 * alone. Scores are relative to the period: the period start stands in
 * for the bootcamp start, so consistency measures activity across the
 * period's days.
 * Pure function — no I/O, all data passed in.
 */

import type { DailyMetricsRow, LeaderboardEntry, LearnerTotals } from '../types/metrics.js';
import type { ScoreConfig } from './learner-score.js';
import { rankLearners } from './learner-score.js';
import { hasActivity } from '../history/ledger.js';
import { learnerKey } from '../identity.js';
import { addDays } from '../orchestrator/time-range.js';
import { roundTo } from '../math.js';

/** Days, ending at the period end, counted as "this week" for weekly commits. */
const WEEKLY_WINDOW_DAYS = 7;

interface Accumulator {
  username: string;
  totals: LearnerTotals;
  activeDates: Set<string>;
  /** Σ(day average merge hours × day merged count) */
  weightedMergeHours: number;
}

/**
 * Aggregate ledger rows dated within [startDate, endDate] into ranked
 * leaderboard entries. An empty window yields an empty list.
 *
 * Weekly commits look at the 7 days ending at endDate across all rows
 * passed in, not only the rows inside the window.
 */
export function aggregatePeriod(
  ledgerRows: DailyMetricsRow[],
  config: ScoreConfig,
  startDate: string,
  endDate: string
): LeaderboardEntry[] {
  const byLearner = new Map<string, Accumulator>();

  for (const row of ledgerRows) {
    if (row.date < startDate || row.date > endDate) continue;

    const key = learnerKey(row.username);
    let acc = byLearner.get(key);
    if (!acc) {
      acc = { username: row.username, totals: emptyTotals(), activeDates: new Set(), weightedMergeHours: 0 };
      byLearner.set(key, acc);
    }

    const t = acc.totals;
    t.totalCommits += row.commits;
    t.prsOpened += row.prsOpened;
    t.prsMerged += row.prsMerged;
    t.issuesOpened += row.issuesOpened;
    t.commentsGiven += row.issueComments + row.reviewCommentsGiven;
    t.linesAdded += row.linesAdded;
    t.linesDeleted += row.linesDeleted;
    acc.weightedMergeHours += row.avgMergeTimeHours * row.prsMerged;
    if (hasActivity(row)) {
      acc.activeDates.add(row.date);
    }
  }

  const weekStart = addDays(endDate, -(WEEKLY_WINDOW_DAYS - 1));
  const learners = [...byLearner.entries()].map(([key, acc]) => {
    const t = acc.totals;
    t.activeDays = acc.activeDates.size;
    t.lastActive = [...acc.activeDates].sort().at(-1) ?? 'N/A';
    t.avgMergeTimeHours = t.prsMerged > 0 ? roundTo(acc.weightedMergeHours / t.prsMerged, 1) : 0;
    // More merges than openings is possible when a PR opened before the window merged inside it.
    t.rejectionRate =
      t.prsOpened > 0 ? roundTo(Math.min(1, Math.max(0, 1 - t.prsMerged / t.prsOpened)), 2) : 0;
    t.weeklyCommits = ledgerRows
      .filter((r) => learnerKey(r.username) === key && r.date >= weekStart && r.date <= endDate)
      .reduce((sum, r) => sum + r.commits, 0);
    return { username: acc.username, metrics: t };
  });

  return rankLearners(learners, { ...config, bootcampStartDate: startDate }, { today: endDate });
}

function emptyTotals(): LearnerTotals {
  return {
    totalCommits: 0,
    weeklyCommits: 0,
    activeDays: 0,
    linesAdded: 0,
    linesDeleted: 0,
    prsOpened: 0,
    prsMerged: 0,
    commentsReceived: 0,
    commentsGiven: 0,
    issuesOpened: 0,
    avgMergeTimeHours: 0,
    rejectionRate: 0,
    lastActive: 'N/A',
    lastComment: '',
    lastCommentAt: '',
  };
}
