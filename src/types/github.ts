/**
 * GitHub activity types
 *
 * Internal shapes the client maps raw API responses into.
 * Timestamps are ISO 8601 strings exactly as GitHub reports them.
 */

export interface GitHubFork {
  owner: string;
  fullName: string;
  createdAt: string;
}

export interface GitHubCommit {
  sha: string;
  /** Linked GitHub account of the author, null when the email is not linked. */
  authorLogin: string | null;
  authorName: string;
  authorDate: string;
}

export interface LineStats {
  additions: number;
  deletions: number;
}

export interface GitHubPullRequest {
  number: number;
  author: string;
  state: 'open' | 'closed' | 'merged';
  createdAt: string;
  mergedAt?: string;
  closedAt?: string;
}

export interface GitHubIssue {
  number: number;
  author: string;
  createdAt: string;
}

export interface GitHubComment {
  author: string;
  createdAt: string;
  body: string;
}

export interface GitHubReviewComment extends GitHubComment {
  /** Parsed from pull_request_url; null if the URL has no trailing number. */
  pullRequestNumber: number | null;
}
