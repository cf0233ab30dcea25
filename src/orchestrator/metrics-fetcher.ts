/**
 * Metrics Fetcher
 *
 * Turns GitHub activity into per-learner metrics. Base repo data (PRs,
 * issues, comments) is fetched once per repo and filtered per learner;
 * fork commits and per-item details are fetched per learner.
 *
 * Every call goes through attempt(): a failed sub-fetch degrades to an
 * empty list or zero and the run continues. Bad credentials abort.
 */

import { GitHubClient } from '../clients/github-client.js';
import type {
  GitHubComment,
  GitHubIssue,
  GitHubPullRequest,
  GitHubReviewComment,
} from '../types/github.js';
import type { AllTimeMetrics, DailyMetrics, Learner } from '../types/metrics.js';
import type { TrackerConfig } from '../config/tracker-config.js';
import { DEFAULT_TRACKER_CONFIG } from '../config/tracker-config.js';
import { attempt, valueOr } from './fetch-result.js';
import { addDays, dayWindow, hoursBetween, isoDate, isValidIsoDate, onDate, startOfDay } from './time-range.js';
import { sameLearner, splitRepo } from '../identity.js';
import { mean, roundTo } from '../math.js';
import { createLogger } from '../logger.js';

/** Review comments given are counted over this many of the learner's PRs. */
const MAX_REVIEW_COMMENT_PRS = 10;
const LAST_COMMENT_MAX_LENGTH = 200;
const WEEKLY_COMMIT_DAYS = 7;

const log = createLogger('metrics-fetcher');

export interface BaseRepoData {
  pullRequests: GitHubPullRequest[];
  issues: GitHubIssue[];
  comments: GitHubComment[];
  reviewComments: GitHubReviewComment[];
}

/** Keyed by "owner/name". */
export type BaseRepoDataMap = Record<string, BaseRepoData>;

export interface BaseRepoFetchOptions {
  /** ISO timestamp; limits comments and review comments server-side. */
  since?: string;
  includeReviewComments?: boolean;
}

const EMPTY_REPO_DATA: BaseRepoData = {
  pullRequests: [],
  issues: [],
  comments: [],
  reviewComments: [],
};

// ─── Base Repos ──────────────────────────────────────────────

/**
 * Fetch PRs, issues and comments of each base repo in bulk.
 * One request set per repo; each failed sub-fetch becomes an empty list.
 */
export async function fetchBaseRepoData(
  client: GitHubClient,
  baseRepos: string[],
  options: BaseRepoFetchOptions = {}
): Promise<BaseRepoDataMap> {
  const result: BaseRepoDataMap = {};

  for (const baseRepo of baseRepos) {
    const parts = splitRepo(baseRepo);
    if (!parts) {
      log.warn('Skipping malformed base repo', { baseRepo });
      result[baseRepo] = { ...EMPTY_REPO_DATA };
      continue;
    }
    const { owner, repo } = parts;
    log.info('Fetching base repo data', { baseRepo });

    const pullRequests = valueOr(
      await attempt(log, `pull requests of ${baseRepo}`, () =>
        client.listPullRequests(owner, repo, { state: 'all' })
      ),
      []
    );
    const issues = valueOr(
      await attempt(log, `issues of ${baseRepo}`, () => client.listIssues(owner, repo)),
      []
    );
    const comments = valueOr(
      await attempt(log, `issue comments of ${baseRepo}`, () =>
        client.listIssueComments(owner, repo, { since: options.since })
      ),
      []
    );
    const reviewComments = options.includeReviewComments
      ? valueOr(
          await attempt(log, `review comments of ${baseRepo}`, () =>
            client.listReviewComments(owner, repo, { since: options.since })
          ),
          []
        )
      : [];

    log.debug('Base repo data fetched', {
      baseRepo,
      pullRequests: pullRequests.length,
      issues: issues.length,
      comments: comments.length,
      reviewComments: reviewComments.length,
    });
    result[baseRepo] = { pullRequests, issues, comments, reviewComments };
  }

  return result;
}

// ─── One Day ─────────────────────────────────────────────────

/**
 * Metrics for one learner on one UTC date.
 */
export async function fetchLearnerDay(
  client: GitHubClient,
  learner: Learner,
  baseRepoData: BaseRepoDataMap,
  date: string
): Promise<DailyMetrics> {
  const { username } = learner;
  const fork = splitRepo(learner.forkRepo);
  const base = splitRepo(learner.baseRepo);

  // Commits in the fork during the day, authored by the learner
  let commits = 0;
  let linesAdded = 0;
  let linesDeleted = 0;
  if (fork) {
    const window = dayWindow(date);
    const dayCommits = valueOr(
      await attempt(log, `commits of ${learner.forkRepo} on ${date}`, () =>
        client.listCommits(fork.owner, fork.repo, { since: window.from, until: window.to })
      ),
      []
    ).filter((c) => c.authorLogin !== null && sameLearner(c.authorLogin, username));

    commits = dayCommits.length;
    for (const commit of dayCommits) {
      const stats = valueOr(
        await attempt(log, `stats of ${learner.forkRepo}@${commit.sha}`, () =>
          client.getCommitStats(fork.owner, fork.repo, commit.sha)
        ),
        { additions: 0, deletions: 0 }
      );
      linesAdded += stats.additions;
      linesDeleted += stats.deletions;
    }
  } else {
    log.warn('Malformed fork repo, skipping commits', { username, forkRepo: learner.forkRepo });
  }

  const data = baseRepoData[learner.baseRepo] ?? EMPTY_REPO_DATA;
  const userPrs = data.pullRequests.filter((pr) => sameLearner(pr.author, username));

  const prsOpened = userPrs.filter((pr) => onDate(pr.createdAt, date)).length;
  const mergedToday = userPrs.filter((pr) => onDate(pr.mergedAt, date));
  const avgMergeTimeHours = roundTo(mean(mergeHours(mergedToday)), 1);

  const closedToday = userPrs.filter((pr) => pr.state !== 'open' && onDate(pr.closedAt, date));
  const rejectedToday = closedToday.filter((pr) => pr.state === 'closed');
  const rejectionRate =
    closedToday.length > 0 ? roundTo(rejectedToday.length / closedToday.length, 2) : 0;

  const issuesOpened = data.issues.filter(
    (i) => sameLearner(i.author, username) && onDate(i.createdAt, date)
  ).length;
  const issueComments = data.comments.filter(
    (c) => sameLearner(c.author, username) && onDate(c.createdAt, date)
  ).length;

  let reviewCommentsGiven = 0;
  if (base) {
    for (const pr of userPrs.slice(0, MAX_REVIEW_COMMENT_PRS)) {
      const comments = valueOr(
        await attempt(log, `review comments of ${learner.baseRepo}#${pr.number}`, () =>
          client.listPullRequestReviewComments(base.owner, base.repo, pr.number)
        ),
        []
      );
      reviewCommentsGiven += comments.filter(
        (c) => sameLearner(c.author, username) && onDate(c.createdAt, date)
      ).length;
    }
  }

  return {
    commits,
    prsOpened,
    prsMerged: mergedToday.length,
    issuesOpened,
    issueComments,
    reviewCommentsGiven,
    linesAdded,
    linesDeleted,
    avgMergeTimeHours,
    rejectionRate,
  };
}

// ─── Poll ────────────────────────────────────────────────────

/** The counts a poll refreshes; other ledger columns are left to the daily run. */
export type PollCounts = Pick<DailyMetrics, 'commits' | 'prsOpened' | 'prsMerged' | 'issuesOpened' | 'issueComments'>;

export interface PollWindow {
  /** ISO timestamp. Exclusive when the window continues an earlier poll. */
  from: string;
  /** ISO timestamp, inclusive. */
  to: string;
  continuesPoll: boolean;
}

/**
 * Activity counts for one learner within a poll window. Skips per-commit
 * stats and per-PR review comments.
 */
export async function fetchLearnerPollCounts(
  client: GitHubClient,
  learner: Learner,
  baseRepoData: BaseRepoDataMap,
  window: PollWindow
): Promise<PollCounts> {
  const { username } = learner;
  const inWindow = (timestamp: string | undefined): boolean =>
    timestamp !== undefined &&
    (window.continuesPoll ? timestamp > window.from : timestamp >= window.from) &&
    timestamp <= window.to;

  let commits = 0;
  const fork = splitRepo(learner.forkRepo);
  if (fork) {
    commits = valueOr(
      await attempt(log, `commits of ${learner.forkRepo} since ${window.from}`, () =>
        client.listCommits(fork.owner, fork.repo, { since: window.from, until: window.to })
      ),
      []
    ).filter(
      (c) => c.authorLogin !== null && sameLearner(c.authorLogin, username) && inWindow(c.authorDate)
    ).length;
  }

  const data = baseRepoData[learner.baseRepo] ?? EMPTY_REPO_DATA;
  const userPrs = data.pullRequests.filter((pr) => sameLearner(pr.author, username));

  return {
    commits,
    prsOpened: userPrs.filter((pr) => inWindow(pr.createdAt)).length,
    prsMerged: userPrs.filter((pr) => inWindow(pr.mergedAt)).length,
    issuesOpened: data.issues.filter((i) => sameLearner(i.author, username) && inWindow(i.createdAt)).length,
    issueComments: data.comments.filter((c) => sameLearner(c.author, username) && inWindow(c.createdAt)).length,
  };
}

// ─── All Time ────────────────────────────────────────────────

/**
 * Cumulative metrics since the bootcamp start date.
 *
 * Lines come from PR details here, not commit stats, so they won't
 * match the sum of the daily rows.
 */
export async function fetchLearnerAllTime(
  client: GitHubClient,
  learner: Learner,
  baseRepoData: BaseRepoDataMap,
  config: Pick<TrackerConfig, 'bootcampStartDate'>,
  now: Date = new Date()
): Promise<AllTimeMetrics> {
  const { username } = learner;
  const start = isValidIsoDate(config.bootcampStartDate)
    ? config.bootcampStartDate
    : DEFAULT_TRACKER_CONFIG.bootcampStartDate;
  const fork = splitRepo(learner.forkRepo);
  const base = splitRepo(learner.baseRepo);

  const commits = fork
    ? valueOr(
        await attempt(log, `commits of ${learner.forkRepo} since ${start}`, () =>
          client.listCommits(fork.owner, fork.repo, { author: username, since: startOfDay(start) })
        ),
        []
      )
    : [];

  const activeDates = new Set<string>();
  for (const c of commits) {
    const day = c.authorDate.slice(0, 10);
    if (day >= start) activeDates.add(day);
  }

  const weekStart = Date.parse(startOfDay(addDays(isoDate(now), -WEEKLY_COMMIT_DAYS)));
  const weeklyCommits = commits.filter((c) => Date.parse(c.authorDate) >= weekStart).length;

  const data = baseRepoData[learner.baseRepo] ?? EMPTY_REPO_DATA;
  const userPrs = data.pullRequests.filter(
    (pr) => sameLearner(pr.author, username) && pr.createdAt.slice(0, 10) >= start
  );
  const mergedPrs = userPrs.filter((pr) => pr.mergedAt !== undefined);

  let linesAdded = 0;
  let linesDeleted = 0;
  for (const pr of userPrs) {
    activeDates.add(pr.createdAt.slice(0, 10));
    if (!base) continue;
    const detail = valueOr(
      await attempt(log, `detail of ${learner.baseRepo}#${pr.number}`, () =>
        client.getPullRequestDetail(base.owner, base.repo, pr.number)
      ),
      { additions: 0, deletions: 0 }
    );
    linesAdded += detail.additions;
    linesDeleted += detail.deletions;
  }

  const closedPrs = userPrs.filter((pr) => pr.state !== 'open');
  const rejectedPrs = closedPrs.filter((pr) => pr.state === 'closed');
  const rejectionRate =
    closedPrs.length > 0 ? roundTo(rejectedPrs.length / closedPrs.length, 2) : 0;

  // Feedback on the learner's PRs: conversation comments, then inline review comments
  const received = new FeedbackTally(username, start);
  if (base) {
    for (const pr of userPrs) {
      const comments = valueOr(
        await attempt(log, `comments on ${learner.baseRepo}#${pr.number}`, () =>
          client.listPullRequestComments(base.owner, base.repo, pr.number)
        ),
        []
      );
      comments.forEach((c) => received.add(c));
    }
  }
  const userPrNumbers = new Set(userPrs.map((pr) => pr.number));
  for (const c of data.reviewComments) {
    if (c.pullRequestNumber !== null && userPrNumbers.has(c.pullRequestNumber)) {
      received.add(c);
    }
  }

  const commentsGiven =
    data.comments.filter((c) => sameLearner(c.author, username) && c.createdAt.slice(0, 10) >= start)
      .length +
    data.reviewComments.filter(
      (c) => sameLearner(c.author, username) && c.createdAt.slice(0, 10) >= start
    ).length;

  const issuesOpened = data.issues.filter(
    (i) => sameLearner(i.author, username) && i.createdAt.slice(0, 10) >= start
  ).length;

  const lastActive = [...activeDates].sort().at(-1) ?? 'N/A';

  return {
    totalCommits: commits.length,
    weeklyCommits,
    activeDays: activeDates.size,
    linesAdded,
    linesDeleted,
    prsOpened: userPrs.length,
    prsMerged: mergedPrs.length,
    commentsReceived: received.count,
    commentsGiven,
    issuesOpened,
    avgMergeTimeHours: roundTo(mean(mergeHours(mergedPrs)), 1),
    rejectionRate,
    lastActive,
    lastComment: truncateComment(received.latestBody),
    lastCommentAt: received.latestAt,
  };
}

// ─── Helpers ─────────────────────────────────────────────────

/**
 * Counts comments by others on or after the start date, and tracks the most
 * recent comment from anyone (the learner's own replies included).
 */
class FeedbackTally {
  count = 0;
  latestAt = '';
  latestBody = '';

  constructor(
    private username: string,
    private start: string
  ) {}

  add(comment: GitHubComment): void {
    if (comment.createdAt.slice(0, 10) < this.start) return;
    if (!sameLearner(comment.author, this.username)) {
      this.count++;
    }
    if (comment.createdAt > this.latestAt) {
      this.latestAt = comment.createdAt;
      this.latestBody = comment.body;
    }
  }
}

function mergeHours(prs: GitHubPullRequest[]): number[] {
  const hours: number[] = [];
  for (const pr of prs) {
    if (pr.mergedAt) {
      hours.push(hoursBetween(pr.createdAt, pr.mergedAt));
    }
  }
  return hours;
}

export function truncateComment(body: string): string {
  return body.length > LAST_COMMENT_MAX_LENGTH
    ? `${body.slice(0, LAST_COMMENT_MAX_LENGTH)}...`
    : body;
}
