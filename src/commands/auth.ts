/**
 * cohort-tracker auth — Token Management
 *
 * Subcommands:
 *   login   — Save a GitHub token after checking it against the API
 *   status  — Show where the token comes from
 */

import {
  githubTokenEnvVar,
  resolveGitHubCredentials,
  writeCredentials,
} from '../config/credentials.js';
import { credentialsPath } from '../config/paths.js';
import { GitHubClient } from '../clients/github-client.js';

// ─── Login ─────────────────────────────────────────────────

/**
 * Check a token with GET /user, then save it to the credentials file.
 * A rejected token is not saved.
 */
export async function runAuthLogin(
  flags: Record<string, string>,
  client?: GitHubClient
): Promise<string> {
  const token = flags['token']?.trim() ?? '';
  if (!token) {
    throw new Error('Missing --token. Create a token with public_repo read access at https://github.com/settings/tokens');
  }

  const user = await (client ?? new GitHubClient(token, { maxAttempts: 1 })).getAuthenticatedUser();
  writeCredentials({ github: { token } });

  const lines = [`Authenticated as @${user.login}. Token saved to ${credentialsPath()}`];
  const envVar = githubTokenEnvVar();
  if (envVar) {
    lines.push(`Note: ${envVar} is set and takes precedence over the saved token.`);
  }
  return lines.join('\n');
}

// ─── Status ────────────────────────────────────────────────

export function runAuthStatus(): string {
  const envVar = githubTokenEnvVar();
  if (envVar) {
    return `GitHub: token from ${envVar}`;
  }
  if (resolveGitHubCredentials()) {
    return `GitHub: token from ${credentialsPath()}`;
  }
  return 'GitHub: not configured (run "cohort-tracker auth login --token <token>" or set GH_TRACKING_PAT)';
}
