/**
 * Read-only reports over the store.
 *
 * Shared by the CLI and the MCP server. Nothing here calls the GitHub API:
 * period leaderboards and learner history come from the Daily Raw Metrics
 * ledger, alerts from the Alerts tab of the last daily run.
 */

import type { TabularStore } from '../history/types.js';
import { RawMetricsLedger } from '../history/ledger.js';
import { loadTrackerConfig, type TrackerConfig } from '../config/tracker-config.js';
import { aggregatePeriod } from '../insights/period-aggregator.js';
import { ALERTS_TAB, PERIOD_TABS, parseAlertRow } from '../generators/tab-layouts.js';
import {
  generateAlertsReport,
  generateLeaderboardReport,
  generateLearnerHistoryReport,
} from '../generators/report-generator.js';
import { isoDate, periodRange, type DateRange } from '../orchestrator/time-range.js';
import type { LearnerHistoryArgs, PeriodLeaderboardArgs } from '../validators.js';
import type { Alert } from '../types/metrics.js';
import { sameLearner } from '../identity.js';

export function periodLeaderboardReport(
  store: TabularStore,
  args: PeriodLeaderboardArgs,
  now: Date = new Date()
): string {
  const config = loadTrackerConfig(store);
  const range = resolveRange(args, config, now);
  const entries = aggregatePeriod(new RawMetricsLedger(store).readAll(), config, range.start, range.end);
  return generateLeaderboardReport(PERIOD_TABS[args.period], range, entries);
}

export function alertsReport(store: TabularStore, now: Date = new Date()): string {
  const alerts = store
    .readAll(ALERTS_TAB)
    .slice(1)
    .map(parseAlertRow)
    .filter((alert): alert is Alert => alert !== null);
  return generateAlertsReport(alerts, isoDate(now));
}

/**
 * Ledger rows for one learner. Without from/to, covers the bootcamp start
 * through today.
 */
export function learnerHistoryReport(
  store: TabularStore,
  args: LearnerHistoryArgs,
  now: Date = new Date()
): string {
  const config = loadTrackerConfig(store);
  const range: DateRange = {
    start: args.from ?? config.bootcampStartDate,
    end: args.to ?? isoDate(now),
  };
  const rows = new RawMetricsLedger(store)
    .readRange(range.start, range.end)
    .filter((row) => sameLearner(row.username, args.learner));
  return generateLearnerHistoryReport(rows[0]?.username ?? args.learner, range, rows);
}

function resolveRange(args: PeriodLeaderboardArgs, config: TrackerConfig, now: Date): DateRange {
  if (args.period !== 'custom') {
    return periodRange(args.period, now);
  }
  const start = args.from ?? config.customLeaderboardStart;
  const end = args.to ?? config.customLeaderboardEnd;
  if (!start || !end) {
    throw new Error('A custom leaderboard needs from and to dates, or custom_leaderboard_start/end in the Config tab');
  }
  if (start > end) {
    throw new Error(`Custom leaderboard starts after it ends (${start} > ${end})`);
  }
  return { start, end };
}
