/**
 * Discovery Types
 *
 * Inputs to roster resolution: which forks count as learners and which
 * learners are declared by hand.
 */

/** A learner declared in the manual_users setting. */
export interface ManualUser {
  username: string;
  /** "owner/name"; defaults to the username's fork of the first base repo. */
  forkRepo?: string;
  /** "owner/name"; defaults to the first base repo. */
  baseRepo?: string;
}

export interface DiscoveryOptions {
  excludedUsers?: string[];
  manualUsers?: ManualUser[];
  /**
   * Usernames from the Roster tab. Each is matched to its fork of any base
   * repo, whatever the fork's age.
   */
  rosterUsers?: string[];
  /** YYYY-MM-DD. Forks created earlier are ignored. */
  bootcampStartDate?: string;
}
