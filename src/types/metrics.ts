/**
 * Learner metric types
 *
 * Shared by the fetcher, ledger, scoring engine, aggregators and
 * tab writers.
 */

/** A tracked learner. Identity is the lowercased username. */
export interface Learner {
  username: string;
  forkRepo: string;
  baseRepo: string;
}

/** One learner's activity on one UTC day. */
export interface DailyMetrics {
  commits: number;
  prsOpened: number;
  prsMerged: number;
  issuesOpened: number;
  issueComments: number;
  reviewCommentsGiven: number;
  linesAdded: number;
  linesDeleted: number;
  avgMergeTimeHours: number;
  rejectionRate: number;
}

/** A Daily Raw Metrics ledger row, keyed by (lower(username), date). */
export interface DailyMetricsRow extends DailyMetrics {
  username: string;
  date: string;
  lastUpdated: string;
}

/**
 * Cumulative metrics for a learner over a window: all-time since the
 * bootcamp start, or a ledger period.
 */
export interface LearnerTotals {
  totalCommits: number;
  weeklyCommits: number;
  activeDays: number;
  linesAdded: number;
  linesDeleted: number;
  prsOpened: number;
  prsMerged: number;
  commentsReceived: number;
  commentsGiven: number;
  issuesOpened: number;
  avgMergeTimeHours: number;
  rejectionRate: number;
  /** YYYY-MM-DD, or "N/A" when the learner has no activity. */
  lastActive: string;
  lastComment: string;
  lastCommentAt: string;
}

export type AllTimeMetrics = LearnerTotals;

/** The subset of totals the scoring formula reads. */
export type ScoringInput = Pick<
  LearnerTotals,
  | 'activeDays'
  | 'totalCommits'
  | 'prsOpened'
  | 'prsMerged'
  | 'commentsGiven'
  | 'commentsReceived'
  | 'issuesOpened'
  | 'linesAdded'
  | 'linesDeleted'
>;

/** Ordered best to worst. */
export const CLASSIFICATIONS = [
  'EXCELLENT',
  'GOOD',
  'AVERAGE',
  'NEEDS IMPROVEMENT',
  'AT RISK',
] as const;

export type Classification = (typeof CLASSIFICATIONS)[number];

export interface ScoreResult {
  consistency: number;
  collaboration: number;
  codeVolume: number;
  quality: number;
  totalScore: number;
  classification: Classification;
}

export interface LeaderboardEntry {
  rank: number;
  username: string;
  metrics: LearnerTotals;
  scores: ScoreResult;
}

export type AlertType = 'INACTIVE' | 'AT RISK' | 'DECLINING';

export interface Alert {
  username: string;
  alertType: AlertType;
  details: string;
  lastActive: string;
  score: number;
}

export interface DailyViewRow {
  date: string;
  username: string;
  commits: number;
  prsOpened: number;
  prsMerged: number;
  linesAdded: number;
  linesDeleted: number;
  comments: number;
  activityScore: number;
}
