/**
 * GitHub REST API Client
 *
 * Uses native fetch (Node 18+). All methods return typed responses
 * mapped to our internal types. List methods follow Link pagination and
 * return the complete collection. Server errors are retried with
 * exponential backoff; rate limits sleep until the reported reset time.
 */

import type {
  GitHubApiFork,
  GitHubApiCommit,
  GitHubApiCommitDetail,
  GitHubApiPullRequest,
  GitHubApiPullRequestDetail,
  GitHubApiIssue,
  GitHubApiIssueComment,
  GitHubApiReviewComment,
  GitHubApiUser,
} from './types.js';
import type {
  GitHubFork,
  GitHubCommit,
  GitHubPullRequest,
  GitHubIssue,
  GitHubComment,
  GitHubReviewComment,
  LineStats,
} from '../types/github.js';
import { createLogger } from '../logger.js';

const GITHUB_API = 'https://api.github.com';
const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_MAX_ATTEMPTS = 3;
const INITIAL_BACKOFF_MS = 1_000;
/** Wait used when a rate-limited response carries no reset hint. */
const FALLBACK_RATE_LIMIT_WAIT_MS = 60_000;
/** Login shown for content whose author account was deleted. */
const GHOST_LOGIN = 'ghost';

const log = createLogger('github-client');

export class GitHubClientError extends Error {
  constructor(
    message: string,
    public statusCode: number,
    public retryable: boolean
  ) {
    super(message);
    this.name = 'GitHubClientError';
  }
}

export interface GitHubClientOptions {
  /** Attempts per request for 5xx responses. Rate-limit waits are not counted. */
  maxAttempts?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export class GitHubClient {
  private getToken: () => Promise<string>;
  private maxAttempts: number;
  private sleep: (ms: number) => Promise<void>;
  private now: () => number;

  constructor(tokenOrProvider: string | (() => Promise<string>), options: GitHubClientOptions = {}) {
    if (typeof tokenOrProvider === 'string') {
      const token = tokenOrProvider;
      this.getToken = () => Promise.resolve(token);
    } else {
      this.getToken = tokenOrProvider;
    }
    this.maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
    this.now = options.now ?? Date.now;
  }

  // ─── User ────────────────────────────────────────────────

  /** The account the token belongs to. Used to check a token before saving it. */
  async getAuthenticatedUser(): Promise<{ login: string }> {
    const user = await this.get<GitHubApiUser>('/user');
    return { login: user.login };
  }

  // ─── Repositories ────────────────────────────────────────

  /**
   * List all forks of a repository, oldest first.
   */
  async listForks(owner: string, repo: string): Promise<GitHubFork[]> {
    const forks = await this.getAll<GitHubApiFork>(
      `${repoPath(owner, repo)}/forks?sort=oldest&per_page=100`
    );
    return forks.map((f) => ({
      owner: f.owner.login,
      fullName: f.full_name,
      createdAt: f.created_at,
    }));
  }

  // ─── Commits ─────────────────────────────────────────────

  /**
   * Get commits for a repo, optionally filtered by author and date range.
   * Maps GitHub API response to our internal GitHubCommit type.
   */
  async listCommits(
    owner: string,
    repo: string,
    params: { since?: string; until?: string; author?: string } = {}
  ): Promise<GitHubCommit[]> {
    const query = new URLSearchParams();
    if (params.since) query.set('since', params.since);
    if (params.until) query.set('until', params.until);
    if (params.author) query.set('author', params.author);
    query.set('per_page', '100');

    const commits = await this.getAll<GitHubApiCommit>(
      `${repoPath(owner, repo)}/commits?${query.toString()}`
    );

    return commits.map((c) => ({
      sha: c.sha,
      authorLogin: c.author?.login ?? null,
      authorName: c.commit.author.name,
      authorDate: c.commit.author.date,
    }));
  }

  /**
   * Line additions and deletions for a single commit.
   */
  async getCommitStats(owner: string, repo: string, sha: string): Promise<LineStats> {
    const detail = await this.get<GitHubApiCommitDetail>(
      `${repoPath(owner, repo)}/commits/${encodeURIComponent(sha)}`
    );
    return {
      additions: detail.stats?.additions ?? 0,
      deletions: detail.stats?.deletions ?? 0,
    };
  }

  // ─── Pull Requests ───────────────────────────────────────

  async listPullRequests(
    owner: string,
    repo: string,
    params: { state?: 'open' | 'closed' | 'all' } = {}
  ): Promise<GitHubPullRequest[]> {
    const query = new URLSearchParams();
    query.set('state', params.state ?? 'all');
    query.set('per_page', '100');

    const prs = await this.getAll<GitHubApiPullRequest>(
      `${repoPath(owner, repo)}/pulls?${query.toString()}`
    );

    return prs.map((pr) => ({
      number: pr.number,
      author: loginOf(pr.user),
      state: pr.merged_at ? 'merged' : pr.state === 'closed' ? 'closed' : 'open',
      createdAt: pr.created_at,
      mergedAt: pr.merged_at ?? undefined,
      closedAt: pr.closed_at ?? undefined,
    }));
  }

  /**
   * Line additions and deletions for a pull request, from its detail endpoint.
   * The list endpoint does not include them.
   */
  async getPullRequestDetail(owner: string, repo: string, prNumber: number): Promise<LineStats> {
    const detail = await this.get<GitHubApiPullRequestDetail>(
      `${repoPath(owner, repo)}/pulls/${prNumber}`
    );
    return {
      additions: detail.additions ?? 0,
      deletions: detail.deletions ?? 0,
    };
  }

  /**
   * Inline review comments on one pull request.
   */
  async listPullRequestReviewComments(
    owner: string,
    repo: string,
    prNumber: number
  ): Promise<GitHubReviewComment[]> {
    const comments = await this.getAll<GitHubApiReviewComment>(
      `${repoPath(owner, repo)}/pulls/${prNumber}/comments?per_page=100`
    );
    return comments.map(mapReviewComment);
  }

  /**
   * Conversation (issue-style) comments on one pull request.
   */
  async listPullRequestComments(
    owner: string,
    repo: string,
    prNumber: number
  ): Promise<GitHubComment[]> {
    const comments = await this.getAll<GitHubApiIssueComment>(
      `${repoPath(owner, repo)}/issues/${prNumber}/comments?per_page=100`
    );
    return comments.map(mapComment);
  }

  /**
   * All inline review comments across the repository's pull requests.
   */
  async listReviewComments(
    owner: string,
    repo: string,
    params: { since?: string } = {}
  ): Promise<GitHubReviewComment[]> {
    const query = new URLSearchParams();
    query.set('sort', 'created');
    query.set('direction', 'desc');
    if (params.since) query.set('since', params.since);
    query.set('per_page', '100');

    const comments = await this.getAll<GitHubApiReviewComment>(
      `${repoPath(owner, repo)}/pulls/comments?${query.toString()}`
    );
    return comments.map(mapReviewComment);
  }

  // ─── Issues ──────────────────────────────────────────────

  /**
   * Issues in any state. Pull requests (which the issues endpoint also
   * returns) are dropped.
   */
  async listIssues(owner: string, repo: string): Promise<GitHubIssue[]> {
    const issues = await this.getAll<GitHubApiIssue>(
      `${repoPath(owner, repo)}/issues?state=all&per_page=100`
    );
    return issues
      .filter((i) => i.pull_request === undefined)
      .map((i) => ({
        number: i.number,
        author: loginOf(i.user),
        createdAt: i.created_at,
      }));
  }

  /**
   * All issue and pull request conversation comments in the repository.
   */
  async listIssueComments(
    owner: string,
    repo: string,
    params: { since?: string } = {}
  ): Promise<GitHubComment[]> {
    const query = new URLSearchParams();
    if (params.since) query.set('since', params.since);
    query.set('per_page', '100');

    const comments = await this.getAll<GitHubApiIssueComment>(
      `${repoPath(owner, repo)}/issues/comments?${query.toString()}`
    );
    return comments.map(mapComment);
  }

  // ─── HTTP Layer ──────────────────────────────────────────

  private async get<T>(path: string): Promise<T> {
    const response = await this.request(`${GITHUB_API}${path}`);
    return (await response.json()) as T;
  }

  /**
   * Follow rel="next" links until the last page.
   */
  private async getAll<T>(path: string): Promise<T[]> {
    const results: T[] = [];
    let url: string | null = `${GITHUB_API}${path}`;

    while (url) {
      const response = await this.request(url);
      const page = (await response.json()) as T[];
      results.push(...page);
      url = nextPageUrl(response.headers.get('link'));
    }

    return results;
  }

  private async request(url: string): Promise<Response> {
    let attempt = 1;
    let backoffMs = INITIAL_BACKOFF_MS;

    for (;;) {
      const response = await this.fetchOnce(url);

      if (isRateLimited(response)) {
        const waitMs = this.rateLimitWaitMs(response);
        log.warn('Rate limited, sleeping until reset', { waitSeconds: Math.ceil(waitMs / 1000) });
        await this.sleep(waitMs);
        continue;
      }

      if (response.status >= 500 && attempt < this.maxAttempts) {
        log.debug('Server error, retrying', { status: response.status, attempt, url });
        await this.sleep(backoffMs);
        backoffMs *= 2;
        attempt++;
        continue;
      }

      if (!response.ok) {
        const retryable = response.status === 429 || response.status >= 500;
        throw new GitHubClientError(
          `GitHub API error: ${response.status} ${response.statusText} for ${url.replace(GITHUB_API, '')}`,
          response.status,
          retryable
        );
      }

      return response;
    }
  }

  private async fetchOnce(url: string): Promise<Response> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), DEFAULT_TIMEOUT_MS);
    const token = await this.getToken();

    try {
      return await fetch(url, {
        headers: {
          Authorization: `Bearer ${token}`,
          Accept: 'application/vnd.github+json',
          'X-GitHub-Api-Version': '2022-11-28',
        },
        signal: controller.signal,
      });
    } finally {
      clearTimeout(timeout);
    }
  }

  private rateLimitWaitMs(response: Response): number {
    const reset = Number(response.headers.get('x-ratelimit-reset'));
    if (reset > 0) {
      return Math.max(reset * 1000 - this.now(), 1000);
    }
    const retryAfter = Number(response.headers.get('retry-after'));
    if (retryAfter > 0) {
      return retryAfter * 1000;
    }
    return FALLBACK_RATE_LIMIT_WAIT_MS;
  }
}

// ─── Helpers ────────────────────────────────────────────────

function repoPath(owner: string, repo: string): string {
  return `/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}`;
}

function loginOf(user: GitHubApiUser | null): string {
  return user?.login ?? GHOST_LOGIN;
}

function mapComment(c: GitHubApiIssueComment): GitHubComment {
  return {
    author: loginOf(c.user),
    createdAt: c.created_at,
    body: c.body ?? '',
  };
}

function mapReviewComment(c: GitHubApiReviewComment): GitHubReviewComment {
  const tail = c.pull_request_url.split('/').pop() ?? '';
  return {
    ...mapComment(c),
    pullRequestNumber: /^\d+$/.test(tail) ? Number(tail) : null,
  };
}

function isRateLimited(response: Response): boolean {
  if (response.status === 429) return true;
  return response.status === 403 && response.headers.get('x-ratelimit-remaining') === '0';
}

/**
 * Extract the rel="next" URL from a Link header, or null on the last page.
 */
export function nextPageUrl(linkHeader: string | null): string | null {
  if (!linkHeader) return null;
  for (const part of linkHeader.split(',')) {
    const match = /<([^>]+)>\s*;\s*rel="next"/.exec(part);
    if (match?.[1]) return match[1];
  }
  return null;
}
