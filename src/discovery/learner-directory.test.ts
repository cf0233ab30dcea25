import { describe, it, expect, vi, beforeEach } from 'vitest';
import { discoverLearners, parseManualUsers } from './learner-directory.js';
import { GitHubClient, GitHubClientError } from '../clients/github-client.js';
import type { GitHubFork } from '../types/github.js';

// Create a mock client
function createMockClient() {
  return {
    listForks: vi.fn(),
  } as unknown as GitHubClient;
}

function fork(owner: string, repo: string, createdAt = '2026-03-01T10:00:00Z'): GitHubFork {
  return { owner, fullName: `${owner}/${repo}`, createdAt };
}

describe('learner-directory', () => {
  let client: GitHubClient;
  let listForks: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    client = createMockClient();
    listForks = (client as unknown as { listForks: ReturnType<typeof vi.fn> }).listForks;
  });

  describe('discoverLearners', () => {
    it('keeps the first repo a learner forks from', async () => {
      listForks
        .mockResolvedValueOnce([fork('amy', 'course'), fork('bob', 'course')])
        .mockResolvedValueOnce([fork('Amy', 'extras'), fork('cat', 'extras')]);

      const learners = await discoverLearners(client, ['ed/course', 'ed/extras']);

      expect(learners).toEqual([
        { username: 'amy', forkRepo: 'amy/course', baseRepo: 'ed/course' },
        { username: 'bob', forkRepo: 'bob/course', baseRepo: 'ed/course' },
        { username: 'cat', forkRepo: 'cat/extras', baseRepo: 'ed/extras' },
      ]);
      expect(listForks).toHaveBeenCalledWith('ed', 'course');
      expect(listForks).toHaveBeenCalledTimes(2);
    });

    it('drops excluded owners case-insensitively', async () => {
      listForks.mockResolvedValue([fork('Ed', 'course'), fork('amy', 'course')]);

      const learners = await discoverLearners(client, ['ed/course'], { excludedUsers: ['ed'] });

      expect(learners.map((l) => l.username)).toEqual(['amy']);
    });

    it('includes forks created on the start date and drops earlier ones', async () => {
      listForks.mockResolvedValue([
        fork('early', 'course', '2026-02-22T23:59:59Z'),
        fork('onday', 'course', '2026-02-23T00:00:00Z'),
      ]);

      const learners = await discoverLearners(client, ['ed/course'], {
        bootcampStartDate: '2026-02-23',
      });

      expect(learners.map((l) => l.username)).toEqual(['onday']);
    });

    it('appends manual users not already discovered or excluded', async () => {
      listForks.mockResolvedValue([fork('amy', 'course')]);

      const learners = await discoverLearners(client, ['ed/course'], {
        excludedUsers: ['mallory'],
        manualUsers: [
          { username: 'AMY' },
          { username: 'dan' },
          { username: 'eve', forkRepo: 'eve/notebooks', baseRepo: 'ed/other' },
          { username: 'mallory' },
        ],
      });

      expect(learners).toEqual([
        { username: 'amy', forkRepo: 'amy/course', baseRepo: 'ed/course' },
        { username: 'dan', forkRepo: 'dan/course', baseRepo: 'ed/course' },
        { username: 'eve', forkRepo: 'eve/notebooks', baseRepo: 'ed/other' },
      ]);
    });

    it('resolves roster learners to their forks, including forks made before the start date', async () => {
      listForks.mockResolvedValue([
        fork('amy', 'course'),
        fork('Old', 'course', '2025-11-02T10:00:00Z'),
      ]);

      const learners = await discoverLearners(client, ['ed/course'], {
        bootcampStartDate: '2026-02-23',
        rosterUsers: ['old', 'AMY', 'zed', 'mallory'],
        excludedUsers: ['mallory'],
        manualUsers: [{ username: 'zed', forkRepo: 'zed/elsewhere' }],
      });

      expect(learners).toEqual([
        { username: 'amy', forkRepo: 'amy/course', baseRepo: 'ed/course' },
        { username: 'zed', forkRepo: 'zed/elsewhere', baseRepo: 'ed/course' },
        { username: 'old', forkRepo: 'Old/course', baseRepo: 'ed/course' },
      ]);
    });

    it('skips a repo whose fork listing fails and continues', async () => {
      listForks
        .mockRejectedValueOnce(new GitHubClientError('GitHub API error: 404', 404, false))
        .mockResolvedValueOnce([fork('bob', 'extras')]);

      const learners = await discoverLearners(client, ['ed/gone', 'ed/extras']);

      expect(learners.map((l) => l.username)).toEqual(['bob']);
    });

    it('aborts on bad credentials', async () => {
      listForks.mockRejectedValue(new GitHubClientError('GitHub API error: 401', 401, false));

      await expect(discoverLearners(client, ['ed/course'])).rejects.toThrow(GitHubClientError);
    });

    it('ignores malformed base repo strings', async () => {
      listForks.mockResolvedValue([fork('amy', 'course')]);

      const learners = await discoverLearners(client, ['not-a-repo', 'a/b/c', 'ed/course']);

      expect(learners).toHaveLength(1);
      expect(listForks).toHaveBeenCalledTimes(1);
    });
  });

  describe('parseManualUsers', () => {
    it('parses optional fork and base parts', () => {
      expect(parseManualUsers(['amy', 'bob:bob/notes', 'cat:cat/fork:ed/base', ' :x/y'])).toEqual([
        { username: 'amy', forkRepo: undefined, baseRepo: undefined },
        { username: 'bob', forkRepo: 'bob/notes', baseRepo: undefined },
        { username: 'cat', forkRepo: 'cat/fork', baseRepo: 'ed/base' },
      ]);
    });
  });
});
