/**
 * Raw Metrics Ledger
 *
 * The Daily Raw Metrics tab: one row per (learner, date), never deleted.
 * Every period leaderboard and alert is derived from it without touching
 * the GitHub API again.
 */

import type { DailyMetrics, DailyMetricsRow } from '../types/metrics.js';
import type { CellValue, SheetRow, TabularStore, UpsertSummary } from './types.js';
import { createLogger } from '../logger.js';

export const DAILY_RAW_METRICS_TAB = 'Daily Raw Metrics';

export const DAILY_RAW_METRICS_HEADERS = [
  'Username',
  'Date',
  'Commits',
  'PRs Opened',
  'PRs Merged',
  'Issues Opened',
  'Issue Comments',
  'PR Review Comments Given',
  'Lines Added',
  'Lines Deleted',
  'PR Avg Merge Time (hrs)',
  'PR Rejection Rate',
  'Last Updated',
];

/** Username and Date. Username matches case-insensitively. */
const KEY_COLUMNS = [0, 1];

/** Columns that count as activity for active days and last-active dates. */
export const ACTIVITY_FIELDS = [
  'commits',
  'prsOpened',
  'prsMerged',
  'issuesOpened',
  'issueComments',
  'reviewCommentsGiven',
  'linesAdded',
  'linesDeleted',
] as const satisfies ReadonlyArray<keyof DailyMetrics>;

const log = createLogger('ledger');

export class RawMetricsLedger {
  constructor(
    private store: TabularStore,
    private tab: string = DAILY_RAW_METRICS_TAB
  ) {}

  /** Write the header row if it is missing or out of date. */
  ensureHeaders(): void {
    const header = this.store.readAll(this.tab)[0] ?? [];
    const matches =
      header.length === DAILY_RAW_METRICS_HEADERS.length &&
      DAILY_RAW_METRICS_HEADERS.every((h, i) => header[i] === h);
    if (!matches) {
      this.store.writeRows(this.tab, [{ row: 1, values: DAILY_RAW_METRICS_HEADERS }]);
    }
  }

  /**
   * Overwrite rows whose (username, date) already exists, append the rest.
   * Safe to repeat with the same day's data.
   */
  upsertDayRows(rows: DailyMetricsRow[]): UpsertSummary {
    if (rows.length === 0) return { updated: 0, appended: 0 };
    const summary = this.store.upsertRows(this.tab, KEY_COLUMNS, rows.map(toLedgerCells));
    log.info('Upserted daily rows', { tab: this.tab, ...summary });
    return summary;
  }

  /**
   * Order rows by date descending, then username ascending (case-insensitive).
   *
   * Two passes over a stable sort: the secondary key (username) first, then
   * the primary key (date). Swapping the passes would group by username
   * instead. Returns the number of data rows sorted.
   */
  sort(): number {
    const [header, ...rows] = this.store.readAll(this.tab);
    if (!header || rows.length === 0) return 0;

    rows.sort((a, b) => compareText((a[0] ?? '').toLowerCase(), (b[0] ?? '').toLowerCase()));
    rows.sort((a, b) => compareText(b[1] ?? '', a[1] ?? ''));

    this.store.clearAndWrite(this.tab, header, rows);
    log.info('Sorted ledger', { rows: rows.length });
    return rows.length;
  }

  readAll(): DailyMetricsRow[] {
    return this.store
      .readAll(this.tab)
      .slice(1)
      .map(fromLedgerCells)
      .filter((row): row is DailyMetricsRow => row !== null);
  }

  /** Rows dated within [start, end], inclusive. */
  readRange(start: string, end: string): DailyMetricsRow[] {
    return this.readAll().filter((row) => row.date >= start && row.date <= end);
  }
}

// ─── Row Mapping ────────────────────────────────────────────

export function toLedgerCells(row: DailyMetricsRow): CellValue[] {
  return [
    row.username,
    row.date,
    row.commits,
    row.prsOpened,
    row.prsMerged,
    row.issuesOpened,
    row.issueComments,
    row.reviewCommentsGiven,
    row.linesAdded,
    row.linesDeleted,
    row.avgMergeTimeHours,
    row.rejectionRate,
    row.lastUpdated,
  ];
}

/**
 * Parse a ledger row. Rows without a username or date are skipped;
 * unparseable numbers read as 0.
 */
export function fromLedgerCells(cells: SheetRow): DailyMetricsRow | null {
  const username = cells[0]?.trim() ?? '';
  const date = cells[1]?.trim() ?? '';
  if (!username || !date) return null;

  return {
    username,
    date,
    commits: toNumber(cells[2]),
    prsOpened: toNumber(cells[3]),
    prsMerged: toNumber(cells[4]),
    issuesOpened: toNumber(cells[5]),
    issueComments: toNumber(cells[6]),
    reviewCommentsGiven: toNumber(cells[7]),
    linesAdded: toNumber(cells[8]),
    linesDeleted: toNumber(cells[9]),
    avgMergeTimeHours: toNumber(cells[10]),
    rejectionRate: toNumber(cells[11]),
    lastUpdated: cells[12] ?? '',
  };
}

export function hasActivity(row: DailyMetrics): boolean {
  return ACTIVITY_FIELDS.some((field) => row[field] > 0);
}

function toNumber(cell: string | undefined): number {
  if (cell === undefined || cell.trim() === '') return 0;
  const value = Number(cell);
  return Number.isFinite(value) ? value : 0;
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
