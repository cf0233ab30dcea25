/**
 * Learner Directory
 *
 * Resolves learners from the forks of the configured base repos, then
 * merges in learners declared by hand and those on the Roster tab, in
 * that order.
 * Identity is the lowercased username; the first base repo in which a
 * learner forks wins.
 */

import { GitHubClient } from '../clients/github-client.js';
import { attempt, valueOr } from '../orchestrator/fetch-result.js';
import { learnerKey, splitRepo } from '../identity.js';
import { createLogger } from '../logger.js';
import type { Learner } from '../types/metrics.js';
import type { DiscoveryOptions, ManualUser } from './types.js';

const log = createLogger('learner-directory');

/**
 * Discover learners across base repos, sequentially.
 *
 * A base repo that is not "owner/name", or whose fork listing fails,
 * contributes no learners; the others still run.
 */
export async function discoverLearners(
  client: GitHubClient,
  baseRepos: string[],
  options: DiscoveryOptions = {}
): Promise<Learner[]> {
  const excluded = new Set((options.excludedUsers ?? []).map(learnerKey));
  const seen = new Set<string>();
  const learners: Learner[] = [];
  // Every fork by lowercased owner, before the start date filter
  const forkByOwner = new Map<string, Learner>();

  for (const baseRepo of baseRepos) {
    const parts = splitRepo(baseRepo);
    if (!parts) {
      log.warn('Skipping malformed base repo', { baseRepo });
      continue;
    }

    const forks = valueOr(
      await attempt(log, `forks of ${baseRepo}`, () => client.listForks(parts.owner, parts.repo)),
      []
    );

    for (const fork of forks) {
      const ownerKey = learnerKey(fork.owner);
      if (!forkByOwner.has(ownerKey)) {
        forkByOwner.set(ownerKey, { username: fork.owner, forkRepo: fork.fullName, baseRepo });
      }
      if (options.bootcampStartDate && fork.createdAt.slice(0, 10) < options.bootcampStartDate) {
        continue;
      }
      if (excluded.has(ownerKey) || seen.has(ownerKey)) {
        continue;
      }
      seen.add(ownerKey);
      learners.push({ username: fork.owner, forkRepo: fork.fullName, baseRepo });
    }
  }

  const firstBase = baseRepos[0] ?? '';
  for (const manual of options.manualUsers ?? []) {
    const key = learnerKey(manual.username);
    if (excluded.has(key) || seen.has(key)) {
      continue;
    }
    seen.add(key);
    learners.push(resolveManualUser(manual, firstBase));
  }

  for (const username of options.rosterUsers ?? []) {
    const key = learnerKey(username);
    if (excluded.has(key) || seen.has(key)) {
      continue;
    }
    seen.add(key);
    const fork = forkByOwner.get(key);
    learners.push(fork ? { ...fork, username } : resolveManualUser({ username }, firstBase));
  }

  log.info('Discovered learners', {
    count: learners.length,
    baseRepos: baseRepos.length,
    roster: options.rosterUsers?.length ?? 0,
  });
  return learners;
}

/**
 * Parse manual_users entries of the form `username[:owner/fork[:owner/base]]`.
 * Entries with an empty username are dropped.
 */
export function parseManualUsers(entries: string[]): ManualUser[] {
  const users: ManualUser[] = [];
  for (const entry of entries) {
    const [username = '', forkRepo, baseRepo] = entry.split(':').map((part) => part.trim());
    if (!username) continue;
    users.push({
      username,
      forkRepo: forkRepo || undefined,
      baseRepo: baseRepo || undefined,
    });
  }
  return users;
}

function resolveManualUser(manual: ManualUser, firstBase: string): Learner {
  const baseRepo = manual.baseRepo ?? firstBase;
  const baseName = splitRepo(baseRepo)?.repo ?? '';
  return {
    username: manual.username,
    forkRepo: manual.forkRepo ?? `${manual.username}/${baseName}`,
    baseRepo,
  };
}
