/**
 * API Response Types
 *
 * TypeScript types for raw GitHub REST API responses.
 * These are the shapes returned by the API — they get mapped to
 * our internal types (src/types/) by the client.
 */

export interface GitHubApiUser {
  login: string;
  id: number;
}

export interface GitHubApiFork {
  full_name: string;
  owner: { login: string };
  created_at: string;
}

export interface GitHubApiCommit {
  sha: string;
  commit: {
    message: string;
    author: {
      name: string;
      email: string;
      date: string;
    };
  };
  author: { login: string } | null;
}

export interface GitHubApiCommitDetail extends GitHubApiCommit {
  stats?: {
    additions: number;
    deletions: number;
    total: number;
  };
}

export interface GitHubApiPullRequest {
  number: number;
  state: 'open' | 'closed';
  user: GitHubApiUser | null;
  created_at: string;
  updated_at: string;
  closed_at: string | null;
  merged_at: string | null;
}

export interface GitHubApiPullRequestDetail extends GitHubApiPullRequest {
  additions?: number;
  deletions?: number;
}

export interface GitHubApiIssue {
  number: number;
  user: GitHubApiUser | null;
  created_at: string;
  /** Present when the issue is a pull request. */
  pull_request?: { url: string };
}

export interface GitHubApiIssueComment {
  id: number;
  user: GitHubApiUser | null;
  created_at: string;
  body?: string | null;
}

export interface GitHubApiReviewComment extends GitHubApiIssueComment {
  pull_request_url: string;
}
