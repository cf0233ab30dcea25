#!/usr/bin/env node

/**
 * Cohort Tracker CLI
 *
 * Usage:
 *   cohort-tracker daily
 *   cohort-tracker poll
 *   cohort-tracker backfill --start 2026-02-23 [--end 2026-03-01] [--sleep 2]
 *   cohort-tracker leaderboard [--period weekly] [--from YYYY-MM-DD --to YYYY-MM-DD]
 *   cohort-tracker alerts
 *   cohort-tracker history --learner <username>
 *   cohort-tracker config [set <key> <value>]
 *   cohort-tracker status
 */

import { resolveConfigDir, storeDbPath } from './config/paths.js';
import { requireGitHubToken, hasGitHubCredentials } from './config/credentials.js';
import { CONFIG_DEFAULTS, ensureConfigDefaults, setConfigValue } from './config/tracker-config.js';
import { runAuthLogin, runAuthStatus } from './commands/auth.js';
import { alertsReport, learnerHistoryReport, periodLeaderboardReport } from './commands/reports.js';
import { GitHubClient } from './clients/github-client.js';
import { SqliteTabularStore, CONFIG_TAB } from './history/tabular-store.js';
import { DAILY_RAW_METRICS_TAB } from './history/ledger.js';
import { runBackfill, runDailyFetch, runPoll } from './orchestrator/pipeline.js';
import { isoDate } from './orchestrator/time-range.js';
import {
  BackfillArgsSchema,
  LearnerHistoryArgsSchema,
  PeriodLeaderboardArgsSchema,
  parseArgs as parseToolArgs,
} from './validators.js';

const VERSION = '1.0.0';

// ─── Argument Parsing ───────────────────────────────────────

function parseArgs(argv: string[]): { command: string; positionals: string[]; flags: Record<string, string> } {
  const args = argv.slice(2);
  let command = args[0] ?? 'help';
  let rest = args.slice(1);

  // Compound commands: "auth login" → "auth-login", "help daily" → "help-daily"
  const sub = rest[0];
  if ((command === 'auth' || command === 'help') && sub && !sub.startsWith('--')) {
    command = `${command}-${sub}`;
    rest = rest.slice(1);
  }

  const flags: Record<string, string> = {};
  const positionals: string[] = [];

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i] ?? '';
    if (arg.startsWith('--')) {
      const next = rest[i + 1];
      // Boolean flags vs value flags (e.g., --period weekly)
      if (next !== undefined && !next.startsWith('--')) {
        flags[arg.slice(2)] = next;
        i++;
      } else {
        flags[arg.slice(2)] = '';
      }
    } else {
      positionals.push(arg);
    }
  }

  return { command, positionals, flags };
}

// ─── Commands ───────────────────────────────────────────────

async function runDaily(store: SqliteTabularStore): Promise<string> {
  const summary = await runDailyFetch({ client: createGitHubClient(), store });

  const lines: string[] = [];
  lines.push(`Daily fetch complete for ${summary.date}`);
  lines.push(`  Learners:      ${summary.learners}`);
  lines.push(`  Ledger rows:   ${summary.ledger.appended} added, ${summary.ledger.updated} updated`);
  lines.push(`  Tabs written:  ${summary.tabs.join(', ')}`);
  lines.push(`  Alerts:        ${summary.alerts}`);
  return lines.join('\n');
}

async function runPollCommand(store: SqliteTabularStore): Promise<string> {
  const summary = await runPoll({ client: createGitHubClient(), store });

  return [
    `Poll complete for ${summary.date} (since ${summary.since}, ${summary.learners} learners)`,
    `  Ledger rows: ${summary.ledger.appended} added, ${summary.ledger.updated} updated`,
  ].join('\n');
}

async function runBackfillCommand(store: SqliteTabularStore, flags: Record<string, string>): Promise<string> {
  const args = parseToolArgs(BackfillArgsSchema, flags);
  const end = args.end ?? isoDate(new Date());
  const summary = await runBackfill({ client: createGitHubClient(), store }, args.start, end, args.sleep * 1000);

  return [
    `Backfill complete: ${args.start} to ${end} (${summary.days} days, ${summary.learners} learners)`,
    `  Ledger rows: ${summary.ledger.appended} added, ${summary.ledger.updated} updated`,
  ].join('\n');
}

function runConfig(store: SqliteTabularStore, positionals: string[]): string {
  const [action, key, ...valueParts] = positionals;

  if (action === 'set') {
    if (!key || valueParts.length === 0) {
      throw new Error('Usage: cohort-tracker config set <key> <value>');
    }
    const value = valueParts.join(' ');
    setConfigValue(store, key, value);
    return `Set ${key} = ${value}`;
  }
  if (action) {
    throw new Error(`Unknown config action: ${action}`);
  }

  ensureConfigDefaults(store);
  const current = store.readConfig();
  const width = Math.max(...CONFIG_DEFAULTS.map(([k]) => k.length));
  return CONFIG_DEFAULTS.map(([k]) => `${k.padEnd(width)}  ${current[k] ?? ''}`).join('\n');
}

function runStatus(store: SqliteTabularStore): string {
  const ledgerRows = Math.max(store.readAll(DAILY_RAW_METRICS_TAB).length - 1, 0);
  const tabs = store.listTabs().filter((t) => t !== CONFIG_TAB && t !== DAILY_RAW_METRICS_TAB);

  const lines: string[] = [];
  lines.push(`Cohort Tracker v${VERSION}`);
  lines.push('');
  lines.push(`Config dir:  ${resolveConfigDir()}`);
  lines.push(`Store:       ${storeDbPath()}`);
  lines.push(`GitHub:      ${hasGitHubCredentials() ? 'Configured' : 'Not configured (run "cohort-tracker auth login --token <token>" or set GH_TRACKING_PAT)'}`);
  lines.push(`Ledger rows: ${ledgerRows}`);
  lines.push(`Tabs:        ${tabs.length > 0 ? tabs.join(', ') : 'none yet (run "cohort-tracker daily")'}`);
  return lines.join('\n');
}

function showHelp(topic?: string): string {
  if (topic && COMMAND_HELP[topic]) {
    return COMMAND_HELP[topic];
  }

  if (topic) {
    return `Unknown command: ${topic}\n\n${MAIN_HELP}`;
  }

  return MAIN_HELP;
}

const MAIN_HELP = `Cohort Tracker - Bootcamp GitHub Activity Tracker

Usage:
  cohort-tracker <command> [options]
  cohort-tracker help <command>

Jobs:
  daily             Fetch today's activity, rebuild leaderboards, daily view and alerts
  poll              Refresh today's activity counts in the ledger since the last poll
  backfill          Fill the daily ledger for a past date range

Reports (read from the store, no API calls):
  leaderboard       Daily, weekly, monthly or custom leaderboard from the ledger
  alerts            Alerts from the last daily run
  history           One learner's daily ledger rows

Setup:
  config            List config values, or "config set <key> <value>"
  auth login        Check and save a GitHub token (--token <token>)
  auth status       Show where the GitHub token comes from
  status            Show store, credentials and tabs

Environment Variables:
  GH_TRACKING_PAT       GitHub token (takes precedence over GITHUB_TOKEN)
  GITHUB_TOKEN          GitHub token
  COHORT_TRACKER_HOME   Config directory (default: ~/.cohort-tracker)
  COHORT_TRACKER_DB     Store file (default: tracker.db in the config directory)
  LOG_LEVEL             debug | info | warn | error | silent (default: info)`;

const COMMAND_HELP: Record<string, string> = {
  daily: `cohort-tracker daily — Daily Pipeline

Discovers learners from the forks of each base repo, fetches today's
activity into the Daily Raw Metrics ledger, then rewrites the Leaderboard,
period leaderboards, Daily View and Alerts tabs. Safe to re-run: today's
ledger rows are overwritten.`,

  poll: `cohort-tracker poll — Lightweight Refresh

Updates today's commit, PR, issue and comment counts in the Daily Raw
Metrics ledger, counting only activity since the last poll or daily run
(last_poll_timestamp). Line counts, merge time and rejection rate keep the
values of the last daily run. No other tab is rewritten.`,

  backfill: `cohort-tracker backfill — Fill the Ledger for Past Days

Options:
  --start <date>   First date, YYYY-MM-DD (required)
  --end <date>     Last date, YYYY-MM-DD (default: today)
  --sleep <secs>   Pause between days (default: 2)`,

  leaderboard: `cohort-tracker leaderboard — Period Leaderboard

Options:
  --period <p>     daily | weekly | monthly | custom (default: weekly)
  --from <date>    Custom period start (default: custom_leaderboard_start)
  --to <date>      Custom period end (default: custom_leaderboard_end)`,

  alerts: `cohort-tracker alerts — Learner Alerts

Shows the INACTIVE, AT RISK and DECLINING alerts written by the last
daily run.`,

  history: `cohort-tracker history — Learner History

Options:
  --learner <name> GitHub username (required)
  --from <date>    First date (default: bootcamp_start_date)
  --to <date>      Last date (default: today)`,

  config: `cohort-tracker config — Config Tab

  cohort-tracker config                  List every key with its value
  cohort-tracker config set <key> <val>  Set one key`,

  'auth-login': `cohort-tracker auth login — Save a GitHub Token

Options:
  --token <token>  Token with read access to public repos (required)`,
};
COMMAND_HELP['auth'] = COMMAND_HELP['auth-login'] ?? '';

// ─── Helpers ────────────────────────────────────────────────

function createGitHubClient(): GitHubClient {
  return new GitHubClient(requireGitHubToken());
}

async function withStore<T>(fn: (store: SqliteTabularStore) => T | Promise<T>): Promise<T> {
  const store = new SqliteTabularStore();
  try {
    return await fn(store);
  } finally {
    store.close();
  }
}

// ─── Main ───────────────────────────────────────────────────

async function main() {
  const { command, positionals, flags } = parseArgs(process.argv);

  try {
    let output: string;

    switch (command) {
      case 'daily':
        output = await withStore(runDaily);
        break;
      case 'poll':
        output = await withStore(runPollCommand);
        break;
      case 'backfill':
        output = await withStore((store) => runBackfillCommand(store, flags));
        break;
      case 'leaderboard':
        output = await withStore((store) =>
          periodLeaderboardReport(store, parseToolArgs(PeriodLeaderboardArgsSchema, flags))
        );
        break;
      case 'alerts':
        output = await withStore((store) => alertsReport(store));
        break;
      case 'history':
        output = await withStore((store) =>
          learnerHistoryReport(store, parseToolArgs(LearnerHistoryArgsSchema, flags))
        );
        break;
      case 'config':
        output = await withStore((store) => runConfig(store, positionals));
        break;
      case 'auth-login':
        output = await runAuthLogin(flags);
        break;
      case 'auth':
      case 'auth-status':
        output = runAuthStatus();
        break;
      case 'status':
        output = await withStore(runStatus);
        break;
      case 'help':
      case '--help':
      case '-h':
        output = showHelp();
        break;
      case '--version':
        output = VERSION;
        break;
      default:
        if (command.startsWith('help-')) {
          output = showHelp(command.slice(5));
          break;
        }
        console.error(`Unknown command: ${command}\n`);
        output = showHelp();
    }

    console.log(output);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    console.error(`Error: ${message}`);
    process.exit(1);
  }
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
