/**
 * Roster Tab
 *
 * An optional hand-kept list of learners. Column B holds a GitHub
 * username or profile URL per learner; rows 1-2 are the title and header.
 */

import type { TabularStore } from '../history/types.js';

export const ROSTER_TAB = 'Roster';

const FIRST_LEARNER_ROW = 3;
const ACCOUNT_COLUMN = 1;

/**
 * "https://github.com/amy/" → "amy". A bare username is returned as is.
 */
export function usernameFromProfile(value: string): string {
  return value.trim().replace(/\/+$/, '').split('/').at(-1) ?? '';
}

/** Usernames listed on the Roster tab, in row order. Missing tab → []. */
export function readRosterUsernames(store: TabularStore): string[] {
  return store
    .readAll(ROSTER_TAB)
    .slice(FIRST_LEARNER_ROW - 1)
    .map((row) => usernameFromProfile(row[ACCOUNT_COLUMN] ?? ''))
    .filter((username) => username.length > 0);
}
