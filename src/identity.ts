/**
 * Learner identity
 *
 * GitHub usernames are case-insensitive. Lookups use the lowercased key;
 * the username as GitHub reports it stays the display value.
 */

export function learnerKey(username: string): string {
  return username.toLowerCase();
}

export function sameLearner(a: string, b: string): boolean {
  return learnerKey(a) === learnerKey(b);
}

/**
 * Split "owner/name" into its parts. Returns null for anything else.
 */
export function splitRepo(fullName: string): { owner: string; repo: string } | null {
  const [owner, repo, ...rest] = fullName.trim().split('/');
  if (!owner || !repo || rest.length > 0) return null;
  return { owner, repo };
}
