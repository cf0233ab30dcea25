/**
 * Learner Scorer
 *
 * Scores a learner 0-100 across four capped dimensions:
 *   - Consistency: share of days active, commits per day
 *   - Collaboration: PRs, comments given, issues, discussion volume
 *   - Code Volume: lines added and deleted against a reference scale
 *   - Quality: PR merge rate, feedback received
 *
 * Each dimension is rounded to one decimal, then clamped to its cap.
 * Every weight, cap and tier cutoff comes from the config.
 * Pure function — no I/O, all data passed in.
 */

import type { ScoringConfig, TrackerConfig } from '../config/tracker-config.js';
import { DEFAULT_TRACKER_CONFIG } from '../config/tracker-config.js';
import type {
  Classification,
  LeaderboardEntry,
  LearnerTotals,
  ScoreResult,
  ScoringInput,
} from '../types/metrics.js';
import { daysBetween, isoDate, isValidIsoDate } from '../orchestrator/time-range.js';
import { roundTo } from '../math.js';

export type ScoreConfig = ScoringConfig & Pick<TrackerConfig, 'bootcampStartDate'>;

export interface ScoreOptions {
  /** YYYY-MM-DD; defaults to the current UTC date. */
  today?: string;
}

export function computeScores(
  metrics: ScoringInput,
  config: ScoreConfig,
  options: ScoreOptions = {}
): ScoreResult {
  const c = config;
  const m = metrics;

  const start = isValidIsoDate(c.bootcampStartDate)
    ? c.bootcampStartDate
    : DEFAULT_TRACKER_CONFIG.bootcampStartDate;
  const totalDays = Math.max(daysBetween(start, options.today ?? isoDate(new Date())), 1);

  const activeRatio = Math.min(1, m.activeDays / totalDays);
  const commitsPerDay = m.totalCommits / totalDays;
  const consistency = capped(
    c.consistencyMaxPoints,
    activeRatio * c.consistencyActiveDaysWeight +
      Math.min(c.consistencyCommitsWeight, commitsPerDay * c.consistencyCommitsWeight)
  );

  const collaboration = capped(
    c.collaborationMaxPoints,
    Math.min(c.collabPrCap, m.prsOpened * c.prPointsEach) +
      Math.min(c.collabReviewCap, m.commentsGiven * c.reviewPointsEach) +
      Math.min(c.collabIssueCap, m.issuesOpened * c.issuePointsEach) +
      Math.min(c.collabCommentCap, (m.commentsGiven + m.commentsReceived) * c.commentPointsEach)
  );

  const codeVolume = capped(
    c.codeVolumeMaxPoints,
    Math.min(c.codeVolumeAddedWeight, (m.linesAdded / c.linesAddedMaxScale) * c.codeVolumeAddedWeight) +
      Math.min(
        c.codeVolumeDeletedWeight,
        (m.linesDeleted / c.linesDeletedMaxScale) * c.codeVolumeDeletedWeight
      )
  );

  const mergeRate = m.prsOpened > 0 ? m.prsMerged / m.prsOpened : 0;
  const quality = capped(
    c.qualityMaxPoints,
    Math.min(c.mergeRateMaxPoints, mergeRate * c.mergeRateMaxPoints) +
      Math.min(c.feedbackMaxPoints, m.commentsReceived * c.feedbackPointsEach)
  );

  const totalScore = roundTo(consistency + collaboration + codeVolume + quality, 1);

  return {
    consistency,
    collaboration,
    codeVolume,
    quality,
    totalScore,
    classification: classify(totalScore, c),
  };
}

/**
 * Tier for a total score. Cutoffs are checked best to worst; the first
 * one reached wins.
 */
export function classify(totalScore: number, config: ScoringConfig): Classification {
  if (totalScore >= config.classifyExcellent) return 'EXCELLENT';
  if (totalScore >= config.classifyGood) return 'GOOD';
  if (totalScore >= config.classifyAverage) return 'AVERAGE';
  if (totalScore >= config.classifyNeedsImprovement) return 'NEEDS IMPROVEMENT';
  return 'AT RISK';
}

/**
 * Score learners and rank them by total score, highest first.
 * Ties keep their input order.
 */
export function rankLearners(
  learners: Array<{ username: string; metrics: LearnerTotals }>,
  config: ScoreConfig,
  options: ScoreOptions = {}
): LeaderboardEntry[] {
  return learners
    .map((l) => ({ username: l.username, metrics: l.metrics, scores: computeScores(l.metrics, config, options) }))
    .sort((a, b) => b.scores.totalScore - a.scores.totalScore)
    .map((entry, i) => ({ rank: i + 1, ...entry }));
}

function capped(max: number, raw: number): number {
  return Math.min(max, roundTo(raw, 1));
}
