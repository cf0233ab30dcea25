/**
 * Tab Layouts
 *
 * Header rows and row builders for every derived tab. Derived tabs are
 * rewritten in full on each run; only the Daily Raw Metrics ledger and the
 * Config tab persist between runs.
 */

import { z } from 'zod';
import type { Alert, DailyViewRow, LeaderboardEntry } from '../types/metrics.js';
import type { CellValue } from '../history/types.js';

export const LEADERBOARD_TAB = 'Leaderboard';
export const DAILY_VIEW_TAB = 'Daily View';
export const ALERTS_TAB = 'Alerts';

export const PERIOD_TABS = {
  daily: 'Daily Leaderboard',
  weekly: 'Weekly Leaderboard',
  monthly: 'Monthly Leaderboard',
  custom: 'Custom Leaderboard',
} as const;

export type LeaderboardPeriod = keyof typeof PERIOD_TABS;

/** Write order of the period leaderboards. */
export const LEADERBOARD_PERIODS: readonly LeaderboardPeriod[] = ['daily', 'weekly', 'monthly', 'custom'];

export const LEADERBOARD_HEADERS = [
  'Rank',
  'Learner',
  'Classification',
  'Total Score',
  'Consistency',
  'Collaboration',
  'Code Volume',
  'Quality',
  'Active Days',
  'Total Commits',
  'PRs Opened',
  'PRs Merged',
  'Lines Added',
  'Lines Deleted',
  'Comments Received',
  'Comments Given',
  'Avg Merge Time',
  'Rejection Rate',
  'Last Active',
  'Last Comment',
];

export const DAILY_VIEW_HEADERS = [
  'Date',
  'Learner',
  'Commits',
  'PRs Opened',
  'PRs Merged',
  'Lines Added',
  'Lines Deleted',
  'Comments',
  'Activity Score',
];

export const ALERTS_HEADERS = ['Learner', 'Alert Type', 'Details', 'Last Active', 'Score'];

// ─── Formatting ──────────────────────────────────────────────

/**
 * Human-readable merge time: minutes under an hour, hours under a day,
 * days beyond. Zero means no merged PRs.
 */
export function formatMergeTime(hours: number): string {
  if (hours <= 0) return 'N/A';
  if (hours < 1) return `${Math.round(hours * 60)} min`;
  if (hours < 24) return `${hours.toFixed(1)} hrs`;
  return `${(hours / 24).toFixed(1)} days`;
}

export function formatRejectionRate(rate: number): string {
  return `${Math.round(rate * 100)}%`;
}

// ─── Row Builders ────────────────────────────────────────────

export function leaderboardRow(entry: LeaderboardEntry): CellValue[] {
  const { metrics: m, scores: s } = entry;
  return [
    entry.rank,
    entry.username,
    s.classification,
    s.totalScore,
    s.consistency,
    s.collaboration,
    s.codeVolume,
    s.quality,
    m.activeDays,
    m.totalCommits,
    m.prsOpened,
    m.prsMerged,
    m.linesAdded,
    m.linesDeleted,
    m.commentsReceived,
    m.commentsGiven,
    formatMergeTime(m.avgMergeTimeHours),
    formatRejectionRate(m.rejectionRate),
    m.lastActive,
    m.lastComment,
  ];
}

export function dailyViewRow(row: DailyViewRow): CellValue[] {
  return [
    row.date,
    row.username,
    row.commits,
    row.prsOpened,
    row.prsMerged,
    row.linesAdded,
    row.linesDeleted,
    row.comments,
    row.activityScore,
  ];
}

export function alertRow(alert: Alert): CellValue[] {
  return [alert.username, alert.alertType, alert.details, alert.lastActive, alert.score];
}

// ─── Row Parsers ─────────────────────────────────────────────

const AlertCellsSchema = z.tuple([
  z.string().min(1),
  z.enum(['INACTIVE', 'AT RISK', 'DECLINING']),
  z.string(),
  z.string(),
  z.coerce.number().finite(),
]);

/** Read an Alerts tab row back. Rows that don't match the layout give null. */
export function parseAlertRow(cells: string[]): Alert | null {
  const parsed = AlertCellsSchema.safeParse(cells.slice(0, ALERTS_HEADERS.length));
  if (!parsed.success) return null;
  const [username, alertType, details, lastActive, score] = parsed.data;
  return { username, alertType, details, lastActive, score };
}
