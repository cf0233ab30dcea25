/**
 * Daily Pipeline
 *
 * Runs the scheduled job end to end, in order:
 *   1. Seed Config defaults and the ledger header
 *   2. Fetch today's metrics for every learner into the ledger, then sort it
 *   3. Rebuild the all-time Leaderboard from the API
 *   4. Rebuild the period leaderboards from the ledger
 *   5. Rebuild the Daily View and Alerts tabs
 *
 * Between daily runs, a poll refreshes today's activity counts in the
 * ledger only.
 *
 * Learners are processed one at a time. A failed sub-fetch degrades to
 * zero for that metric; only bad credentials stop the run.
 */

import { GitHubClient } from '../clients/github-client.js';
import type { TabularStore, UpsertSummary } from '../history/types.js';
import type { TrackerConfig } from '../config/tracker-config.js';
import type { Alert, DailyMetricsRow, LeaderboardEntry, Learner, LearnerTotals } from '../types/metrics.js';
import {
  LAST_POLL_TIMESTAMP_KEY,
  ensureConfigDefaults,
  loadTrackerConfig,
  setConfigValue,
} from '../config/tracker-config.js';
import { RawMetricsLedger } from '../history/ledger.js';
import { discoverLearners, parseManualUsers } from '../discovery/learner-directory.js';
import { readRosterUsernames } from '../discovery/roster.js';
import {
  fetchBaseRepoData,
  fetchLearnerAllTime,
  fetchLearnerDay,
  fetchLearnerPollCounts,
  type PollWindow,
} from './metrics-fetcher.js';
import { learnerKey } from '../identity.js';
import { rankLearners } from '../insights/learner-score.js';
import { aggregatePeriod } from '../insights/period-aggregator.js';
import { evaluateAlerts } from '../insights/alert-evaluator.js';
import { buildDailyView } from '../insights/daily-view.js';
import {
  ALERTS_HEADERS,
  ALERTS_TAB,
  DAILY_VIEW_HEADERS,
  DAILY_VIEW_TAB,
  LEADERBOARD_HEADERS,
  LEADERBOARD_PERIODS,
  LEADERBOARD_TAB,
  PERIOD_TABS,
  alertRow,
  dailyViewRow,
  leaderboardRow,
  type LeaderboardPeriod,
} from '../generators/tab-layouts.js';
import { eachDay, isoDate, isoTimestamp, periodRange, startOfDay, type DateRange } from './time-range.js';
import { createLogger } from '../logger.js';

const log = createLogger('pipeline');

/** Pause between backfilled days, to stay clear of secondary rate limits. */
export const DEFAULT_BACKFILL_PAUSE_MS = 2_000;

export interface PipelineContext {
  client: GitHubClient;
  store: TabularStore;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

export interface DailyRunSummary {
  date: string;
  learners: number;
  ledger: UpsertSummary;
  /** Tabs rewritten, in write order. */
  tabs: string[];
  alerts: number;
}

export interface PollSummary {
  date: string;
  /** Start of the window polled. */
  since: string;
  learners: number;
  ledger: UpsertSummary;
}

export interface BackfillSummary {
  days: number;
  learners: number;
  ledger: UpsertSummary;
}

function currentDate(ctx: PipelineContext): Date {
  return ctx.now ? ctx.now() : new Date();
}

function pause(ctx: PipelineContext, ms: number): Promise<void> {
  const sleep = ctx.sleep ?? ((t: number) => new Promise<void>((resolve) => setTimeout(resolve, t)));
  return sleep(ms);
}

// ─── Learners ────────────────────────────────────────────────

export async function resolveLearners(
  client: GitHubClient,
  config: TrackerConfig,
  rosterUsers: string[] = []
): Promise<Learner[]> {
  return discoverLearners(client, config.baseRepos, {
    excludedUsers: config.excludedUsers,
    manualUsers: parseManualUsers(config.manualUsers),
    rosterUsers,
    bootcampStartDate: config.bootcampStartDate,
  });
}

// ─── Ledger ──────────────────────────────────────────────────

/**
 * Fetch one day's metrics for every learner and upsert them into the
 * ledger. Re-running a date overwrites that date's rows.
 */
export async function writeDailyMetrics(
  ctx: PipelineContext,
  learners: Learner[],
  config: TrackerConfig,
  date: string
): Promise<UpsertSummary> {
  const baseRepoData = await fetchBaseRepoData(ctx.client, config.baseRepos, {
    since: startOfDay(date),
    includeReviewComments: false,
  });

  const rows: DailyMetricsRow[] = [];
  for (const learner of learners) {
    const metrics = await fetchLearnerDay(ctx.client, learner, baseRepoData, date);
    rows.push({
      username: learner.username,
      date,
      ...metrics,
      lastUpdated: isoTimestamp(currentDate(ctx)),
    });
  }

  return new RawMetricsLedger(ctx.store).upsertDayRows(rows);
}

// ─── Leaderboards ────────────────────────────────────────────

/**
 * All-time Leaderboard, fetched fresh from the API since the bootcamp start.
 */
export async function writeFullLeaderboard(
  ctx: PipelineContext,
  learners: Learner[],
  config: TrackerConfig
): Promise<LeaderboardEntry[]> {
  const now = currentDate(ctx);
  const baseRepoData = await fetchBaseRepoData(ctx.client, config.baseRepos, {
    since: startOfDay(config.bootcampStartDate),
    includeReviewComments: true,
  });

  const totals: Array<{ username: string; metrics: LearnerTotals }> = [];
  for (const learner of learners) {
    log.debug('Fetching all-time metrics', { username: learner.username });
    const metrics = await fetchLearnerAllTime(ctx.client, learner, baseRepoData, config, now);
    totals.push({ username: learner.username, metrics });
  }

  const entries = rankLearners(totals, config, { today: isoDate(now) });
  ctx.store.clearAndWrite(LEADERBOARD_TAB, LEADERBOARD_HEADERS, entries.map(leaderboardRow));
  return entries;
}

/**
 * Date range a period leaderboard covers. Custom periods need both
 * configured dates; returns null otherwise.
 */
export function leaderboardRange(period: LeaderboardPeriod, config: TrackerConfig, now: Date): DateRange | null {
  if (period === 'custom') {
    const { customLeaderboardStart: start, customLeaderboardEnd: end } = config;
    return start && end ? { start, end } : null;
  }
  return periodRange(period, now);
}

/**
 * Rebuild one period leaderboard from the ledger. A window with no ledger
 * rows writes nothing, so the tab keeps its previous contents.
 */
export function writePeriodLeaderboard(
  store: TabularStore,
  ledgerRows: DailyMetricsRow[],
  config: TrackerConfig,
  tab: string,
  range: DateRange
): LeaderboardEntry[] {
  const entries = aggregatePeriod(ledgerRows, config, range.start, range.end);
  if (entries.length === 0) {
    log.info('No ledger rows in period, leaderboard left as is', { tab, start: range.start, end: range.end });
    return entries;
  }
  store.clearAndWrite(tab, LEADERBOARD_HEADERS, entries.map(leaderboardRow));
  log.info('Period leaderboard written', { tab, start: range.start, end: range.end, learners: entries.length });
  return entries;
}

// ─── Derived Tabs ────────────────────────────────────────────

export function writeDailyView(store: TabularStore, ledgerRows: DailyMetricsRow[], now: Date): number {
  const view = buildDailyView(ledgerRows, now);
  store.clearAndWrite(DAILY_VIEW_TAB, DAILY_VIEW_HEADERS, view.map(dailyViewRow));
  return view.length;
}

export function writeAlerts(
  store: TabularStore,
  entries: LeaderboardEntry[],
  ledgerRows: DailyMetricsRow[],
  config: TrackerConfig,
  now: Date
): Alert[] {
  const alerts = evaluateAlerts(entries, ledgerRows, config, now);
  store.clearAndWrite(ALERTS_TAB, ALERTS_HEADERS, alerts.map(alertRow));
  return alerts;
}

// ─── Runs ────────────────────────────────────────────────────

export async function runDailyFetch(ctx: PipelineContext): Promise<DailyRunSummary> {
  const now = currentDate(ctx);
  const today = isoDate(now);

  const added = ensureConfigDefaults(ctx.store);
  if (added.length > 0) {
    log.info('Seeded config defaults', { keys: added });
  }
  const config = loadTrackerConfig(ctx.store);
  const ledger = new RawMetricsLedger(ctx.store);
  ledger.ensureHeaders();

  const learners = await resolveLearners(ctx.client, config, readRosterUsernames(ctx.store));
  log.info('Daily fetch started', { date: today, learners: learners.length });

  const ledgerSummary = await writeDailyMetrics(ctx, learners, config, today);
  ledger.sort();

  const tabs: string[] = [];
  const entries = await writeFullLeaderboard(ctx, learners, config);
  tabs.push(LEADERBOARD_TAB);

  const ledgerRows = ledger.readAll();
  for (const period of LEADERBOARD_PERIODS) {
    const range = leaderboardRange(period, config, now);
    if (!range) continue;
    const written = writePeriodLeaderboard(ctx.store, ledgerRows, config, PERIOD_TABS[period], range);
    if (written.length > 0) {
      tabs.push(PERIOD_TABS[period]);
    }
  }

  writeDailyView(ctx.store, ledgerRows, now);
  tabs.push(DAILY_VIEW_TAB);

  const alerts = writeAlerts(ctx.store, entries, ledgerRows, config, now);
  tabs.push(ALERTS_TAB);

  setConfigValue(ctx.store, LAST_POLL_TIMESTAMP_KEY, isoTimestamp(now));
  log.info('Daily fetch complete', { date: today, alerts: alerts.length });
  return { date: today, learners: learners.length, ledger: ledgerSummary, tabs, alerts: alerts.length };
}

/**
 * Fill the ledger for every date from start to end inclusive, pausing
 * between days. Derived tabs are left for the next daily run.
 */
export async function runBackfill(
  ctx: PipelineContext,
  start: string,
  end: string,
  pauseMs: number = DEFAULT_BACKFILL_PAUSE_MS
): Promise<BackfillSummary> {
  ensureConfigDefaults(ctx.store);
  const config = loadTrackerConfig(ctx.store);
  const ledger = new RawMetricsLedger(ctx.store);
  ledger.ensureHeaders();

  const learners = await resolveLearners(ctx.client, config, readRosterUsernames(ctx.store));
  const dates = eachDay(start, end);
  log.info('Backfill started', { start, end, days: dates.length, learners: learners.length });

  const total: UpsertSummary = { updated: 0, appended: 0 };
  for (const [i, date] of dates.entries()) {
    log.info('Backfilling day', { date });
    const summary = await writeDailyMetrics(ctx, learners, config, date);
    total.updated += summary.updated;
    total.appended += summary.appended;
    if (i < dates.length - 1 && pauseMs > 0) {
      await pause(ctx, pauseMs);
    }
  }

  ledger.sort();
  log.info('Backfill complete', { days: dates.length, ...total });
  return { days: dates.length, learners: learners.length, ledger: total };
}

/**
 * Window a poll covers: on from the last poll or daily run when that was
 * earlier today, otherwise the whole of today so far.
 */
export function pollWindow(lastPoll: string | undefined, now: Date): PollWindow {
  const to = isoTimestamp(now);
  const dayStart = startOfDay(isoDate(now));
  if (lastPoll !== undefined && lastPoll >= dayStart && lastPoll < to) {
    return { from: lastPoll, to, continuesPoll: true };
  }
  return { from: dayStart, to, continuesPoll: false };
}

/**
 * Refresh today's activity counts in the ledger. A poll that continues an
 * earlier one adds what happened since; otherwise today's counts are
 * replaced. Line counts, merge time, rejection rate and review comments
 * keep the values the last daily run wrote.
 */
export async function runPoll(ctx: PipelineContext): Promise<PollSummary> {
  const now = currentDate(ctx);
  const today = isoDate(now);
  const stamp = isoTimestamp(now);

  ensureConfigDefaults(ctx.store);
  const config = loadTrackerConfig(ctx.store);
  const ledger = new RawMetricsLedger(ctx.store);
  ledger.ensureHeaders();

  const window = pollWindow(config.lastPollTimestamp, now);
  const learners = await resolveLearners(ctx.client, config, readRosterUsernames(ctx.store));
  log.info('Poll started', { since: window.from, learners: learners.length });

  const baseRepoData = await fetchBaseRepoData(ctx.client, config.baseRepos, {
    since: window.from,
    includeReviewComments: false,
  });
  const todayRows = new Map(ledger.readRange(today, today).map((row) => [learnerKey(row.username), row]));

  const rows: DailyMetricsRow[] = [];
  for (const learner of learners) {
    const counts = await fetchLearnerPollCounts(ctx.client, learner, baseRepoData, window);
    const previous = todayRows.get(learnerKey(learner.username));
    const carried = window.continuesPoll && previous ? previous : undefined;
    rows.push({
      username: learner.username,
      date: today,
      commits: (carried?.commits ?? 0) + counts.commits,
      prsOpened: (carried?.prsOpened ?? 0) + counts.prsOpened,
      prsMerged: (carried?.prsMerged ?? 0) + counts.prsMerged,
      issuesOpened: (carried?.issuesOpened ?? 0) + counts.issuesOpened,
      issueComments: (carried?.issueComments ?? 0) + counts.issueComments,
      reviewCommentsGiven: previous?.reviewCommentsGiven ?? 0,
      linesAdded: previous?.linesAdded ?? 0,
      linesDeleted: previous?.linesDeleted ?? 0,
      avgMergeTimeHours: previous?.avgMergeTimeHours ?? 0,
      rejectionRate: previous?.rejectionRate ?? 0,
      lastUpdated: stamp,
    });
  }

  const summary = ledger.upsertDayRows(rows);
  ledger.sort();
  setConfigValue(ctx.store, LAST_POLL_TIMESTAMP_KEY, stamp);

  log.info('Poll complete', { date: today, ...summary });
  return { date: today, since: window.from, learners: learners.length, ledger: summary };
}
