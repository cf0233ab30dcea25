/**
 * Tracker Configuration
 *
 * The Config tab is a live-editable key/value list (column A key, column B
 * value). It is read once per run and resolved into a typed TrackerConfig.
 * A missing, empty or malformed value falls back to its default; resolving
 * never throws.
 */

import { z } from 'zod';
import { CONFIG_TAB } from '../history/tabular-store.js';
import type { TabularStore } from '../history/types.js';
import { isValidIsoDate } from '../orchestrator/time-range.js';

export const CONFIG_HEADERS = ['Key', 'Value'];

/** Written by each poll and daily run; polls count activity after it. */
export const LAST_POLL_TIMESTAMP_KEY = 'last_poll_timestamp';

/** Weights, caps and tier cutoffs read by the scoring engine. */
export interface ScoringConfig {
  consistencyMaxPoints: number;
  consistencyActiveDaysWeight: number;
  consistencyCommitsWeight: number;
  collaborationMaxPoints: number;
  prPointsEach: number;
  reviewPointsEach: number;
  issuePointsEach: number;
  commentPointsEach: number;
  collabPrCap: number;
  collabReviewCap: number;
  collabIssueCap: number;
  collabCommentCap: number;
  codeVolumeMaxPoints: number;
  linesAddedMaxScale: number;
  linesDeletedMaxScale: number;
  codeVolumeAddedWeight: number;
  codeVolumeDeletedWeight: number;
  qualityMaxPoints: number;
  mergeRateMaxPoints: number;
  feedbackMaxPoints: number;
  feedbackPointsEach: number;
  classifyExcellent: number;
  classifyGood: number;
  classifyAverage: number;
  classifyNeedsImprovement: number;
}

export interface TrackerConfig extends ScoringConfig {
  /** YYYY-MM-DD */
  bootcampStartDate: string;
  inactiveThresholdDays: number;
  atRiskScoreThreshold: number;
  decliningScoreThreshold: number;
  decliningActiveDaysMin: number;
  customLeaderboardStart?: string;
  customLeaderboardEnd?: string;
  excludedUsers: string[];
  /** Raw `username[:owner/fork[:owner/base]]` entries. */
  manualUsers: string[];
  /** "owner/name" entries, in discovery order. */
  baseRepos: string[];
  /** ISO timestamp of the last poll or daily run, e.g. 2026-03-01T08:30:00Z. */
  lastPollTimestamp?: string;
}

export const DEFAULT_TRACKER_CONFIG: TrackerConfig = {
  bootcampStartDate: '2026-02-23',
  inactiveThresholdDays: 7,
  atRiskScoreThreshold: 30,
  decliningScoreThreshold: 50,
  decliningActiveDaysMin: 2,
  consistencyMaxPoints: 30,
  consistencyActiveDaysWeight: 20,
  consistencyCommitsWeight: 10,
  collaborationMaxPoints: 25,
  prPointsEach: 2,
  reviewPointsEach: 1.5,
  issuePointsEach: 1,
  commentPointsEach: 0.5,
  collabPrCap: 8,
  collabReviewCap: 7,
  collabIssueCap: 5,
  collabCommentCap: 5,
  codeVolumeMaxPoints: 25,
  linesAddedMaxScale: 500,
  linesDeletedMaxScale: 200,
  codeVolumeAddedWeight: 15,
  codeVolumeDeletedWeight: 10,
  qualityMaxPoints: 20,
  mergeRateMaxPoints: 15,
  feedbackMaxPoints: 5,
  feedbackPointsEach: 1,
  classifyExcellent: 80,
  classifyGood: 60,
  classifyAverage: 40,
  classifyNeedsImprovement: 20,
  customLeaderboardStart: undefined,
  customLeaderboardEnd: undefined,
  excludedUsers: [],
  manualUsers: [],
  baseRepos: ['ed-donner/llm_engineering'],
  lastPollTimestamp: undefined,
};

// ─── Setting Keys ────────────────────────────────────────────

type NumericField = {
  [K in keyof TrackerConfig]-?: TrackerConfig[K] extends number ? K : never;
}[keyof TrackerConfig];

interface NumericSetting {
  key: string;
  field: NumericField;
  integer?: boolean;
  /** Divisors; zero or below is treated as malformed. */
  positive?: boolean;
}

/** In Config tab order. */
const NUMERIC_SETTINGS: readonly NumericSetting[] = [
  { key: 'inactive_threshold_days', field: 'inactiveThresholdDays', integer: true },
  { key: 'at_risk_score_threshold', field: 'atRiskScoreThreshold' },
  { key: 'declining_score_threshold', field: 'decliningScoreThreshold' },
  { key: 'declining_active_days_min', field: 'decliningActiveDaysMin', integer: true },
  { key: 'consistency_max_points', field: 'consistencyMaxPoints' },
  { key: 'consistency_active_days_weight', field: 'consistencyActiveDaysWeight' },
  { key: 'consistency_commits_weight', field: 'consistencyCommitsWeight' },
  { key: 'collaboration_max_points', field: 'collaborationMaxPoints' },
  { key: 'pr_points_each', field: 'prPointsEach' },
  { key: 'review_points_each', field: 'reviewPointsEach' },
  { key: 'issue_points_each', field: 'issuePointsEach' },
  { key: 'comment_points_each', field: 'commentPointsEach' },
  { key: 'collab_pr_cap', field: 'collabPrCap' },
  { key: 'collab_review_cap', field: 'collabReviewCap' },
  { key: 'collab_issue_cap', field: 'collabIssueCap' },
  { key: 'collab_comment_cap', field: 'collabCommentCap' },
  { key: 'code_volume_max_points', field: 'codeVolumeMaxPoints' },
  { key: 'lines_added_max_scale', field: 'linesAddedMaxScale', positive: true },
  { key: 'lines_deleted_max_scale', field: 'linesDeletedMaxScale', positive: true },
  { key: 'code_volume_added_weight', field: 'codeVolumeAddedWeight' },
  { key: 'code_volume_deleted_weight', field: 'codeVolumeDeletedWeight' },
  { key: 'quality_max_points', field: 'qualityMaxPoints' },
  { key: 'merge_rate_max_points', field: 'mergeRateMaxPoints' },
  { key: 'feedback_max_points', field: 'feedbackMaxPoints' },
  { key: 'feedback_points_each', field: 'feedbackPointsEach' },
  { key: 'classify_excellent', field: 'classifyExcellent' },
  { key: 'classify_good', field: 'classifyGood' },
  { key: 'classify_average', field: 'classifyAverage' },
  { key: 'classify_needs_improvement', field: 'classifyNeedsImprovement' },
];

/**
 * Every Config tab key with its default value, in the order the tab is
 * seeded.
 */
export const CONFIG_DEFAULTS: ReadonlyArray<readonly [string, string]> = [
  ['bootcamp_start_date', DEFAULT_TRACKER_CONFIG.bootcampStartDate],
  ...NUMERIC_SETTINGS.map((s) => [s.key, String(DEFAULT_TRACKER_CONFIG[s.field])] as const),
  ['custom_leaderboard_start', ''],
  ['custom_leaderboard_end', ''],
  ['excluded_users', ''],
  ['manual_users', ''],
  ['base_repos', DEFAULT_TRACKER_CONFIG.baseRepos.join(',')],
  [LAST_POLL_TIMESTAMP_KEY, ''],
];

const KNOWN_KEYS = new Set(CONFIG_DEFAULTS.map(([key]) => key));

// ─── Zod Schemas ─────────────────────────────────────────────

const NumberValue = z.string().trim().min(1).pipe(z.coerce.number().finite());

const PositiveNumberValue = z.string().trim().min(1).pipe(z.coerce.number().finite().positive());

const DateValue = z.string().trim().refine(isValidIsoDate);

const TimestampValue = z
  .string()
  .trim()
  .regex(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z$/)
  .refine((value) => isValidIsoDate(value.slice(0, 10)));

// ─── Resolve ─────────────────────────────────────────────────

/**
 * Resolve a flat key/value map into a typed config.
 */
export function parseTrackerConfig(raw: Record<string, string>): TrackerConfig {
  const config: TrackerConfig = { ...DEFAULT_TRACKER_CONFIG };

  for (const setting of NUMERIC_SETTINGS) {
    const schema = setting.positive ? PositiveNumberValue : NumberValue;
    const parsed = schema.safeParse(raw[setting.key]);
    if (parsed.success) {
      config[setting.field] = setting.integer ? Math.trunc(parsed.data) : parsed.data;
    }
  }

  config.bootcampStartDate = readDate(raw['bootcamp_start_date']) ?? DEFAULT_TRACKER_CONFIG.bootcampStartDate;
  config.customLeaderboardStart = readDate(raw['custom_leaderboard_start']);
  config.customLeaderboardEnd = readDate(raw['custom_leaderboard_end']);
  config.excludedUsers = splitList(raw['excluded_users']);
  config.manualUsers = splitList(raw['manual_users']);

  const baseRepos = splitList(raw['base_repos']);
  config.baseRepos = baseRepos.length > 0 ? baseRepos : [...DEFAULT_TRACKER_CONFIG.baseRepos];

  const lastPoll = TimestampValue.safeParse(raw[LAST_POLL_TIMESTAMP_KEY]);
  config.lastPollTimestamp = lastPoll.success ? lastPoll.data : undefined;

  return config;
}

export function loadTrackerConfig(store: TabularStore): TrackerConfig {
  return parseTrackerConfig(store.readConfig());
}

/**
 * Seed the Config tab: write the header if the tab is new and append any
 * default key that is missing. Existing values are never touched.
 * Returns the keys added.
 */
export function ensureConfigDefaults(store: TabularStore): string[] {
  const rows = store.readAll(CONFIG_TAB);
  const present = new Set(
    rows.slice(1).map((row) => row[0]?.trim() ?? '').filter((key) => key.length > 0)
  );
  const missing = CONFIG_DEFAULTS.filter(([key]) => !present.has(key));

  const updates = missing.map(([key, value], i) => ({
    row: Math.max(rows.length, 1) + 1 + i,
    values: [key, value],
  }));
  if (rows.length === 0) {
    updates.unshift({ row: 1, values: CONFIG_HEADERS });
  }
  store.writeRows(CONFIG_TAB, updates);

  return missing.map(([key]) => key);
}

/**
 * Set one Config tab value. Unknown keys are rejected so a typo doesn't
 * silently leave the default in effect.
 */
export function setConfigValue(store: TabularStore, key: string, value: string): void {
  if (!KNOWN_KEYS.has(key)) {
    throw new Error(`Unknown config key "${key}". Run "cohort-tracker config" to list keys.`);
  }
  ensureConfigDefaults(store);
  store.upsertRows(CONFIG_TAB, [0], [[key, value]]);
}

// ─── Helpers ─────────────────────────────────────────────────

function readDate(value: string | undefined): string | undefined {
  const parsed = DateValue.safeParse(value);
  return parsed.success ? parsed.data : undefined;
}

function splitList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}
