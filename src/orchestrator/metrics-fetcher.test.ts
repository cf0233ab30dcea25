import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  fetchBaseRepoData,
  fetchLearnerAllTime,
  fetchLearnerDay,
  truncateComment,
} from './metrics-fetcher.js';
import type { BaseRepoDataMap } from './metrics-fetcher.js';
import { GitHubClient, GitHubClientError } from '../clients/github-client.js';
import type { GitHubCommit, GitHubPullRequest } from '../types/github.js';
import type { Learner } from '../types/metrics.js';

type MockedClient = Record<
  | 'listCommits'
  | 'getCommitStats'
  | 'listPullRequests'
  | 'getPullRequestDetail'
  | 'listIssues'
  | 'listIssueComments'
  | 'listReviewComments'
  | 'listPullRequestComments'
  | 'listPullRequestReviewComments',
  ReturnType<typeof vi.fn>
>;

// Create a mock client
function createMockClient(): { client: GitHubClient; mock: MockedClient } {
  const mock: MockedClient = {
    listCommits: vi.fn().mockResolvedValue([]),
    getCommitStats: vi.fn().mockResolvedValue({ additions: 0, deletions: 0 }),
    listPullRequests: vi.fn().mockResolvedValue([]),
    getPullRequestDetail: vi.fn().mockResolvedValue({ additions: 0, deletions: 0 }),
    listIssues: vi.fn().mockResolvedValue([]),
    listIssueComments: vi.fn().mockResolvedValue([]),
    listReviewComments: vi.fn().mockResolvedValue([]),
    listPullRequestComments: vi.fn().mockResolvedValue([]),
    listPullRequestReviewComments: vi.fn().mockResolvedValue([]),
  };
  return { client: mock as unknown as GitHubClient, mock };
}

const amy: Learner = { username: 'amy', forkRepo: 'amy/course', baseRepo: 'ed/course' };

function commit(sha: string, authorLogin: string | null, authorDate: string): GitHubCommit {
  return { sha, authorLogin, authorName: authorLogin ?? 'unknown', authorDate };
}

function pr(overrides: Partial<GitHubPullRequest> & { number: number }): GitHubPullRequest {
  return {
    author: 'amy',
    state: 'open',
    createdAt: '2024-03-01T10:00:00Z',
    ...overrides,
  };
}

function repoData(overrides: Partial<BaseRepoDataMap[string]> = {}): BaseRepoDataMap {
  return {
    'ed/course': {
      pullRequests: [],
      issues: [],
      comments: [],
      reviewComments: [],
      ...overrides,
    },
  };
}

describe('metrics-fetcher', () => {
  let client: GitHubClient;
  let mock: MockedClient;

  beforeEach(() => {
    ({ client, mock } = createMockClient());
  });

  describe('fetchBaseRepoData', () => {
    it('fetches each repo once and degrades failed parts to empty lists', async () => {
      mock.listPullRequests.mockResolvedValue([pr({ number: 1 })]);
      mock.listIssues.mockRejectedValue(new GitHubClientError('GitHub API error: 502', 502, true));

      const data = await fetchBaseRepoData(client, ['ed/course'], { since: '2024-03-01T00:00:00Z' });

      expect(data['ed/course']?.pullRequests).toHaveLength(1);
      expect(data['ed/course']?.issues).toEqual([]);
      expect(mock.listPullRequests).toHaveBeenCalledWith('ed', 'course', { state: 'all' });
      expect(mock.listIssueComments).toHaveBeenCalledWith('ed', 'course', {
        since: '2024-03-01T00:00:00Z',
      });
      expect(mock.listReviewComments).not.toHaveBeenCalled();
    });

    it('fetches review comments on request', async () => {
      mock.listReviewComments.mockResolvedValue([
        { author: 'bob', createdAt: '2024-03-02T10:00:00Z', body: 'nit', pullRequestNumber: 1 },
      ]);

      const data = await fetchBaseRepoData(client, ['ed/course'], { includeReviewComments: true });

      expect(data['ed/course']?.reviewComments).toHaveLength(1);
    });

    it('gives malformed repos empty data without calling the API', async () => {
      const data = await fetchBaseRepoData(client, ['broken']);

      expect(data['broken']).toEqual({ pullRequests: [], issues: [], comments: [], reviewComments: [] });
      expect(mock.listPullRequests).not.toHaveBeenCalled();
    });
  });

  describe('fetchLearnerDay', () => {
    it('counts one day of activity for the learner', async () => {
      mock.listCommits.mockResolvedValue([
        commit('a1', 'Amy', '2024-03-03T09:00:00Z'),
        commit('a2', 'amy', '2024-03-03T11:00:00Z'),
        commit('b1', 'bob', '2024-03-03T12:00:00Z'),
        commit('x1', null, '2024-03-03T13:00:00Z'),
      ]);
      mock.getCommitStats
        .mockResolvedValueOnce({ additions: 10, deletions: 2 })
        .mockRejectedValueOnce(new GitHubClientError('GitHub API error: 500', 500, true));
      mock.listPullRequestReviewComments
        .mockResolvedValueOnce([
          { author: 'amy', createdAt: '2024-03-03T15:00:00Z', body: 'fixed', pullRequestNumber: 1 },
          { author: 'bob', createdAt: '2024-03-03T16:00:00Z', body: 'ok', pullRequestNumber: 1 },
        ])
        .mockResolvedValueOnce([]);

      const data = repoData({
        pullRequests: [
          pr({
            number: 1,
            state: 'merged',
            createdAt: '2024-03-01T10:00:00Z',
            mergedAt: '2024-03-03T10:00:00Z',
            closedAt: '2024-03-03T10:00:00Z',
          }),
          pr({
            number: 2,
            state: 'closed',
            createdAt: '2024-03-03T08:00:00Z',
            closedAt: '2024-03-03T12:00:00Z',
          }),
          pr({ number: 3, author: 'bob', createdAt: '2024-03-03T08:00:00Z' }),
        ],
        issues: [
          { number: 10, author: 'amy', createdAt: '2024-03-03T09:00:00Z' },
          { number: 11, author: 'amy', createdAt: '2024-03-02T09:00:00Z' },
        ],
        comments: [
          { author: 'amy', createdAt: '2024-03-03T09:00:00Z', body: 'q' },
          { author: 'AMY', createdAt: '2024-03-03T10:00:00Z', body: 'q2' },
          { author: 'bob', createdAt: '2024-03-03T10:00:00Z', body: 'a' },
        ],
      });

      const metrics = await fetchLearnerDay(client, amy, data, '2024-03-03');

      expect(metrics).toEqual({
        commits: 2,
        prsOpened: 1,
        prsMerged: 1,
        issuesOpened: 1,
        issueComments: 2,
        reviewCommentsGiven: 1,
        linesAdded: 10,
        linesDeleted: 2,
        avgMergeTimeHours: 48,
        rejectionRate: 0.5,
      });
      expect(mock.listCommits).toHaveBeenCalledWith('amy', 'course', {
        since: '2024-03-03T00:00:00Z',
        until: '2024-03-03T23:59:59Z',
      });
      expect(mock.listPullRequestReviewComments).toHaveBeenCalledTimes(2);
    });

    it('checks review comments on at most ten PRs', async () => {
      const prs = Array.from({ length: 12 }, (_, i) => pr({ number: i + 1 }));

      await fetchLearnerDay(client, amy, repoData({ pullRequests: prs }), '2024-03-03');

      expect(mock.listPullRequestReviewComments).toHaveBeenCalledTimes(10);
    });

    it('returns zeros when the base repo has no data', async () => {
      const metrics = await fetchLearnerDay(client, amy, {}, '2024-03-03');

      expect(metrics.prsOpened).toBe(0);
      expect(metrics.rejectionRate).toBe(0);
      expect(metrics.avgMergeTimeHours).toBe(0);
    });

    it('aborts on bad credentials', async () => {
      mock.listCommits.mockRejectedValue(new GitHubClientError('GitHub API error: 401', 401, false));

      await expect(fetchLearnerDay(client, amy, repoData(), '2024-03-03')).rejects.toThrow(
        GitHubClientError
      );
    });
  });

  describe('fetchLearnerAllTime', () => {
    it('aggregates everything since the bootcamp start', async () => {
      mock.listCommits.mockResolvedValue([
        commit('c1', 'amy', '2024-03-02T09:00:00Z'),
        commit('c2', 'amy', '2024-03-02T17:00:00Z'),
        commit('c3', 'amy', '2024-03-05T09:00:00Z'),
      ]);
      mock.getPullRequestDetail.mockImplementation((_owner: string, _repo: string, n: number) => {
        if (n === 1) return Promise.resolve({ additions: 100, deletions: 20 });
        if (n === 3) return Promise.resolve({ additions: 5, deletions: 5 });
        return Promise.reject(new GitHubClientError('GitHub API error: 404', 404, false));
      });
      mock.listPullRequestComments.mockImplementation((_owner: string, _repo: string, n: number) => {
        if (n === 1) {
          return Promise.resolve([
            { author: 'bob', createdAt: '2024-03-02T10:00:00Z', body: 'Nice work' },
            { author: 'amy', createdAt: '2024-03-04T10:00:00Z', body: 'Thanks' },
          ]);
        }
        if (n === 3) {
          return Promise.resolve([{ author: 'bob', createdAt: '2024-02-20T10:00:00Z', body: 'old' }]);
        }
        return Promise.resolve([]);
      });

      const longBody = 'x'.repeat(250);
      const data = repoData({
        pullRequests: [
          pr({
            number: 1,
            state: 'merged',
            createdAt: '2024-03-01T10:00:00Z',
            mergedAt: '2024-03-03T10:00:00Z',
            closedAt: '2024-03-03T10:00:00Z',
          }),
          pr({ number: 2, createdAt: '2024-02-28T10:00:00Z' }),
          pr({
            number: 3,
            state: 'closed',
            createdAt: '2024-03-06T10:00:00Z',
            closedAt: '2024-03-07T10:00:00Z',
          }),
          pr({ number: 4, createdAt: '2024-03-08T10:00:00Z' }),
        ],
        issues: [
          { number: 20, author: 'amy', createdAt: '2024-03-04T09:00:00Z' },
          { number: 21, author: 'amy', createdAt: '2024-02-01T09:00:00Z' },
        ],
        comments: [
          { author: 'amy', createdAt: '2024-03-02T09:00:00Z', body: 'question' },
          { author: 'amy', createdAt: '2024-02-25T09:00:00Z', body: 'early' },
        ],
        reviewComments: [
          { author: 'bob', createdAt: '2024-03-09T10:00:00Z', body: longBody, pullRequestNumber: 4 },
          { author: 'carl', createdAt: '2024-03-05T10:00:00Z', body: 'elsewhere', pullRequestNumber: 99 },
          { author: 'amy', createdAt: '2024-03-05T11:00:00Z', body: 'review', pullRequestNumber: 99 },
        ],
      });

      const metrics = await fetchLearnerAllTime(
        client,
        amy,
        data,
        { bootcampStartDate: '2024-03-01' },
        new Date('2024-03-10T12:00:00Z')
      );

      expect(metrics).toEqual({
        totalCommits: 3,
        weeklyCommits: 1,
        activeDays: 5,
        linesAdded: 105,
        linesDeleted: 25,
        prsOpened: 3,
        prsMerged: 1,
        commentsReceived: 2,
        commentsGiven: 2,
        issuesOpened: 1,
        avgMergeTimeHours: 48,
        rejectionRate: 0.5,
        lastActive: '2024-03-08',
        lastComment: `${'x'.repeat(200)}...`,
        lastCommentAt: '2024-03-09T10:00:00Z',
      });
      expect(mock.listCommits).toHaveBeenCalledWith('amy', 'course', {
        author: 'amy',
        since: '2024-03-01T00:00:00Z',
      });
      expect(mock.listPullRequestComments).toHaveBeenCalledTimes(3);
    });

    it('reports N/A for a learner with no activity', async () => {
      const metrics = await fetchLearnerAllTime(client, amy, repoData(), {
        bootcampStartDate: '2024-03-01',
      });

      expect(metrics.lastActive).toBe('N/A');
      expect(metrics.activeDays).toBe(0);
      expect(metrics.lastComment).toBe('');
    });

    it('falls back to the default start for an invalid date', async () => {
      await fetchLearnerAllTime(client, amy, repoData(), { bootcampStartDate: 'soon' });

      expect(mock.listCommits).toHaveBeenCalledWith('amy', 'course', {
        author: 'amy',
        since: '2026-02-23T00:00:00Z',
      });
    });
  });

  describe('truncateComment', () => {
    it('keeps comments up to 200 characters intact', () => {
      expect(truncateComment('a'.repeat(200))).toBe('a'.repeat(200));
      expect(truncateComment('a'.repeat(201))).toBe(`${'a'.repeat(200)}...`);
    });
  });
});
