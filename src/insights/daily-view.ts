/**
 * Daily View
 *
 * A two-week learner × date grid of activity, with a 0-10 activity score
 * per cell. Learners without a row on a date get a zero row so gaps show.
 */

import type { DailyMetricsRow, DailyViewRow } from '../types/metrics.js';
import { learnerKey } from '../identity.js';
import { addDays, isoDate } from '../orchestrator/time-range.js';

const VIEW_DAYS = 14;

export function activityScore(row: Pick<DailyViewRow, 'commits' | 'prsOpened' | 'prsMerged' | 'linesAdded' | 'linesDeleted'>): number {
  return Math.min(
    10,
    Math.min(3, row.commits) +
      Math.min(4, row.prsOpened * 2) +
      Math.min(2, row.prsMerged) +
      (row.linesAdded + row.linesDeleted > 0 ? 1 : 0)
  );
}

/**
 * Rows dated on or after today − 14 days, newest date first; within a date,
 * highest activity score first, then username.
 */
export function buildDailyView(ledgerRows: DailyMetricsRow[], now: Date = new Date()): DailyViewRow[] {
  const cutoff = addDays(isoDate(now), -VIEW_DAYS);

  const displayName = new Map<string, string>();
  const dates = new Set<string>();
  const byCell = new Map<string, DailyMetricsRow>();
  for (const row of ledgerRows) {
    if (row.date < cutoff) continue;
    const key = learnerKey(row.username);
    if (!displayName.has(key)) displayName.set(key, row.username);
    dates.add(row.date);
    byCell.set(`${key}\u0000${row.date}`, row);
  }

  const learners = [...displayName.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  const view: DailyViewRow[] = [];
  for (const date of [...dates].sort().reverse()) {
    for (const [key, username] of learners) {
      const row = byCell.get(`${key}\u0000${date}`);
      const cell = {
        commits: Math.trunc(row?.commits ?? 0),
        prsOpened: Math.trunc(row?.prsOpened ?? 0),
        prsMerged: Math.trunc(row?.prsMerged ?? 0),
        linesAdded: Math.trunc(row?.linesAdded ?? 0),
        linesDeleted: Math.trunc(row?.linesDeleted ?? 0),
      };
      view.push({
        date,
        username,
        ...cell,
        comments: Math.trunc((row?.issueComments ?? 0) + (row?.reviewCommentsGiven ?? 0)),
        activityScore: activityScore(cell),
      });
    }
  }

  // Stable: score order survives within each date
  view.sort((a, b) => b.activityScore - a.activityScore);
  view.sort((a, b) => (a.date < b.date ? 1 : a.date > b.date ? -1 : 0));
  return view;
}
