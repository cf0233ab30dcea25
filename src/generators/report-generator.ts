/**
 * Report Generator
 *
 * Renders leaderboards, alerts and ledger history as Markdown for the CLI
 * and the MCP tools. All functions are synchronous — no I/O, no API calls.
 */

import type { Alert, DailyMetricsRow, LeaderboardEntry } from '../types/metrics.js';
import type { DateRange } from '../orchestrator/time-range.js';
import { ALERTS_HEADERS, formatMergeTime, formatRejectionRate } from './tab-layouts.js';
import { hasActivity } from '../history/ledger.js';

const ALERT_ORDER: Alert['alertType'][] = ['INACTIVE', 'AT RISK', 'DECLINING'];

function tableRow(cells: Array<string | number>): string {
  return `| ${cells.map((c) => String(c).replace(/\|/g, '\\|')).join(' | ')} |`;
}

function table(headers: string[], rows: Array<Array<string | number>>): string[] {
  return [tableRow(headers), `|${headers.map(() => '---').join('|')}|`, ...rows.map(tableRow)];
}

function describeRange(range: DateRange): string {
  return range.start === range.end ? range.start : `${range.start} to ${range.end}`;
}

/**
 * Leaderboard as a ranked table followed by a classification breakdown.
 */
export function generateLeaderboardReport(title: string, range: DateRange, entries: LeaderboardEntry[]): string {
  const parts: string[] = [];
  parts.push(`# ${title}`);
  parts.push('');
  parts.push(`**Period:** ${describeRange(range)}`);
  parts.push('');

  if (entries.length === 0) {
    parts.push('_No learner activity recorded for this period._');
    return parts.join('\n');
  }

  parts.push(
    ...table(
      ['Rank', 'Learner', 'Score', 'Classification', 'Active Days', 'Commits', 'PRs (merged)', 'Avg Merge Time', 'Rejection'],
      entries.map((e) => [
        e.rank,
        e.username,
        e.scores.totalScore,
        e.scores.classification,
        e.metrics.activeDays,
        e.metrics.totalCommits,
        `${e.metrics.prsOpened} (${e.metrics.prsMerged})`,
        formatMergeTime(e.metrics.avgMergeTimeHours),
        formatRejectionRate(e.metrics.rejectionRate),
      ])
    )
  );
  parts.push('');

  const counts = new Map<string, number>();
  for (const e of entries) {
    counts.set(e.scores.classification, (counts.get(e.scores.classification) ?? 0) + 1);
  }
  parts.push('## Classification Breakdown');
  parts.push('');
  parts.push(...table(['Classification', 'Learners'], [...counts.entries()]));

  return parts.join('\n');
}

/**
 * Alerts grouped by type. Each group lists the learner, details and last
 * active date.
 */
export function generateAlertsReport(alerts: Alert[], today: string): string {
  const parts: string[] = [];
  parts.push(`# Learner Alerts - ${today}`);
  parts.push('');

  if (alerts.length === 0) {
    parts.push('_No alerts. Every learner is on track._');
    return parts.join('\n');
  }

  for (const type of ALERT_ORDER) {
    const group = alerts.filter((a) => a.alertType === type);
    if (group.length === 0) continue;
    parts.push(`## ${type} (${group.length})`);
    parts.push('');
    parts.push(
      ...table(
        ALERTS_HEADERS.filter((h) => h !== 'Alert Type'),
        group.map((a) => [a.username, a.details, a.lastActive, a.score])
      )
    );
    parts.push('');
  }

  return parts.join('\n').trimEnd();
}

/**
 * One learner's ledger rows, newest first, with period totals.
 */
export function generateLearnerHistoryReport(username: string, range: DateRange, rows: DailyMetricsRow[]): string {
  const parts: string[] = [];
  parts.push(`# Activity History - ${username}`);
  parts.push('');
  parts.push(`**Period:** ${describeRange(range)}`);
  parts.push('');

  if (rows.length === 0) {
    parts.push('_No ledger rows for this learner in the period._');
    return parts.join('\n');
  }

  const sorted = [...rows].sort((a, b) => (a.date < b.date ? 1 : a.date > b.date ? -1 : 0));
  parts.push(
    ...table(
      ['Date', 'Commits', 'PRs Opened', 'PRs Merged', 'Issues', 'Comments', '+/-'],
      sorted.map((r) => [
        r.date,
        r.commits,
        r.prsOpened,
        r.prsMerged,
        r.issuesOpened,
        r.issueComments + r.reviewCommentsGiven,
        `+${r.linesAdded}/-${r.linesDeleted}`,
      ])
    )
  );
  parts.push('');

  const sum = (pick: (r: DailyMetricsRow) => number): number => rows.reduce((total, r) => total + pick(r), 0);
  parts.push('## Totals');
  parts.push('');
  parts.push(
    ...table(
      ['Metric', 'Value'],
      [
        ['Active Days', rows.filter(hasActivity).length],
        ['Commits', sum((r) => r.commits)],
        ['PRs Opened', sum((r) => r.prsOpened)],
        ['PRs Merged', sum((r) => r.prsMerged)],
        ['Code Changes', `+${sum((r) => r.linesAdded)}/-${sum((r) => r.linesDeleted)}`],
      ]
    )
  );

  return parts.join('\n');
}
