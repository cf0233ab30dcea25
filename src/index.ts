#!/usr/bin/env node

/**
 * Cohort Tracker MCP Server
 *
 * Answers questions about a bootcamp cohort's GitHub activity from the
 * local store. Report tools read the ledger and derived tabs only; the
 * daily fetch tool is the one that calls GitHub.
 *
 * Tools:
 *   Reports: period_leaderboard, learner_alerts, learner_history
 *   Jobs:    run_daily_fetch
 *   Info:    get_capabilities
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ListPromptsRequestSchema,
  GetPromptRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import { hasGitHubCredentials, requireGitHubToken } from './config/credentials.js';
import { resolveConfigDir, storeDbPath } from './config/paths.js';
import { loadTrackerConfig } from './config/tracker-config.js';
import { GitHubClient } from './clients/github-client.js';
import { SqliteTabularStore } from './history/tabular-store.js';
import { DAILY_RAW_METRICS_TAB } from './history/ledger.js';
import { alertsReport, learnerHistoryReport, periodLeaderboardReport } from './commands/reports.js';
import { runDailyFetch } from './orchestrator/pipeline.js';
import { LearnerHistoryArgsSchema, PeriodLeaderboardArgsSchema, parseArgs } from './validators.js';
import { createLogger } from './logger.js';

const VERSION = '1.0.0';
const log = createLogger('mcp');

const SERVER_INSTRUCTIONS = `Cohort Tracker scores bootcamp learners on their GitHub activity (commits, PRs, issues, comments) in forks of the course repos.

Use cohort-tracker tools when the user asks about:
- Who is leading, rankings, top learners this week or month → period_leaderboard
- Who is falling behind, inactive or at-risk learners → learner_alerts
- What a specific learner did on which days → learner_history
- Refreshing today's data → run_daily_fetch
- Setup or credential status → get_capabilities`;

const server = new Server(
  { name: 'cohort-tracker', version: VERSION },
  {
    capabilities: { tools: {}, prompts: {} },
    instructions: SERVER_INSTRUCTIONS,
  }
);

type ToolResult = { content: Array<{ type: 'text'; text: string }> };

// ─── Tool Definitions ────────────────────────────────────────

const DATE_PROPERTY = {
  type: 'string' as const,
  pattern: '^\\d{4}-\\d{2}-\\d{2}$',
};

server.setRequestHandler(ListToolsRequestSchema, () => {
  return {
    tools: [
      {
        name: 'period_leaderboard',
        description:
          'Rank learners over a day, the last 7 days, the last 30 days, or a custom date range. Computed from the daily ledger.',
        inputSchema: {
          type: 'object' as const,
          properties: {
            period: {
              type: 'string' as const,
              enum: ['daily', 'weekly', 'monthly', 'custom'],
              description: 'Period to rank over (default: weekly)',
            },
            from: { ...DATE_PROPERTY, description: 'Custom period start, YYYY-MM-DD' },
            to: { ...DATE_PROPERTY, description: 'Custom period end, YYYY-MM-DD' },
          },
        },
      },
      {
        name: 'learner_alerts',
        description: 'INACTIVE, AT RISK and DECLINING learners from the last daily run.',
        inputSchema: { type: 'object' as const, properties: {} },
      },
      {
        name: 'learner_history',
        description: "One learner's daily activity rows with totals.",
        inputSchema: {
          type: 'object' as const,
          properties: {
            learner: { type: 'string' as const, description: 'GitHub username' },
            from: { ...DATE_PROPERTY, description: 'First date (default: bootcamp start)' },
            to: { ...DATE_PROPERTY, description: 'Last date (default: today)' },
          },
          required: ['learner'],
        },
      },
      {
        name: 'run_daily_fetch',
        description:
          "Fetch today's activity from GitHub and rebuild every leaderboard, the daily view and alerts. Takes minutes for large cohorts.",
        inputSchema: { type: 'object' as const, properties: {} },
      },
      {
        name: 'get_capabilities',
        description: 'Show store location, credential status, tracked repos and available tools.',
        inputSchema: { type: 'object' as const, properties: {} },
      },
    ],
  };
});

// ─── Prompts ─────────────────────────────────────────────────

const PROMPTS = [
  {
    name: 'weekly-leaderboard',
    description: "Show this week's top learners",
  },
  {
    name: 'check-in',
    description: 'List learners who need a check-in',
  },
];

const PROMPT_TOOLS: Record<string, string> = {
  'weekly-leaderboard': 'period_leaderboard',
  'check-in': 'learner_alerts',
};

server.setRequestHandler(ListPromptsRequestSchema, () => {
  return { prompts: PROMPTS };
});

server.setRequestHandler(GetPromptRequestSchema, (request) => {
  const { name } = request.params;
  const prompt = PROMPTS.find((p) => p.name === name);
  const tool = PROMPT_TOOLS[name];
  if (!prompt || !tool) {
    throw new Error(`Unknown prompt: ${name}`);
  }

  return {
    description: prompt.description,
    messages: [
      {
        role: 'user' as const,
        content: {
          type: 'text' as const,
          text: `Use the cohort-tracker ${tool} tool and summarize the result.`,
        },
      },
    ],
  };
});

// ─── Tool Handlers ───────────────────────────────────────────

server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: args } = request.params;

  try {
    switch (name) {
      case 'period_leaderboard':
        return withStore((store) => text(periodLeaderboardReport(store, parseArgs(PeriodLeaderboardArgsSchema, args))));
      case 'learner_alerts':
        return withStore((store) => text(alertsReport(store)));
      case 'learner_history':
        return withStore((store) => text(learnerHistoryReport(store, parseArgs(LearnerHistoryArgsSchema, args))));
      case 'run_daily_fetch':
        return await handleRunDailyFetch();
      case 'get_capabilities':
        return withStore(handleGetCapabilities);
      default:
        throw new Error(`Unknown tool: ${name}`);
    }
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    log.warn('Tool failed', { tool: name, error: errorMessage });
    return {
      content: [{ type: 'text' as const, text: `Error: ${errorMessage}` }],
      isError: true,
    };
  }
});

// ─── Daily Fetch ─────────────────────────────────────────────

async function handleRunDailyFetch(): Promise<ToolResult> {
  const client = new GitHubClient(requireGitHubToken());
  const store = new SqliteTabularStore();
  try {
    const summary = await runDailyFetch({ client, store });
    const parts: string[] = [];
    parts.push(`# Daily Fetch - ${summary.date}`);
    parts.push('');
    parts.push('| Metric | Value |');
    parts.push('|--------|-------|');
    parts.push(`| Learners | ${summary.learners} |`);
    parts.push(`| Ledger rows added | ${summary.ledger.appended} |`);
    parts.push(`| Ledger rows updated | ${summary.ledger.updated} |`);
    parts.push(`| Alerts | ${summary.alerts} |`);
    parts.push('');
    parts.push(`**Tabs written:** ${summary.tabs.join(', ')}`);
    return text(parts.join('\n'));
  } finally {
    store.close();
  }
}

// ─── Get Capabilities ────────────────────────────────────────

function handleGetCapabilities(store: SqliteTabularStore): ToolResult {
  const config = loadTrackerConfig(store);
  const ledgerRows = Math.max(store.readAll(DAILY_RAW_METRICS_TAB).length - 1, 0);
  const hasToken = hasGitHubCredentials();

  const parts: string[] = [];
  parts.push(`# Cohort Tracker MCP v${VERSION}`);
  parts.push('');

  parts.push('## Status');
  parts.push('');
  parts.push('| Component | Status |');
  parts.push('|-----------|--------|');
  parts.push(`| Config directory | \`${resolveConfigDir()}\` |`);
  parts.push(`| Store | \`${storeDbPath()}\` |`);
  parts.push(`| GitHub credentials | ${hasToken ? '✅ Token configured' : '❌ Not configured'} |`);
  parts.push(`| Ledger rows | ${ledgerRows} |`);
  parts.push(`| Bootcamp start | ${config.bootcampStartDate} |`);
  parts.push(`| Base repos | ${config.baseRepos.join(', ')} |`);
  parts.push('');

  if (!hasToken) {
    parts.push('## Getting Started');
    parts.push('');
    parts.push('Set GH_TRACKING_PAT (or GITHUB_TOKEN), or run `cohort-tracker auth login --token <token>`.');
    parts.push('Then run `cohort-tracker daily`, or the run_daily_fetch tool.');
    parts.push('');
  }

  parts.push('## Available Tools');
  parts.push('');
  parts.push('- **period_leaderboard** — Rankings for daily, weekly, monthly or custom periods');
  parts.push('- **learner_alerts** — Learners flagged by the last daily run');
  parts.push('- **learner_history** — One learner, day by day');
  parts.push('- **run_daily_fetch** — Refresh from GitHub');

  return text(parts.join('\n'));
}

// ─── Helpers ─────────────────────────────────────────────────

function text(body: string): ToolResult {
  return { content: [{ type: 'text', text: body }] };
}

function withStore(fn: (store: SqliteTabularStore) => ToolResult): ToolResult {
  const store = new SqliteTabularStore();
  try {
    return fn(store);
  } finally {
    store.close();
  }
}

// ─── Start Server ────────────────────────────────────────────

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  log.info('MCP server started', { version: VERSION });
}

main().catch((error) => {
  log.error('Fatal error', { error: error instanceof Error ? error.message : String(error) });
  process.exit(1);
});
