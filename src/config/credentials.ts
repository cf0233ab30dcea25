/**
 * Credentials Resolver
 *
 * Resolves the GitHub token in order:
 * 1. Environment variables (GH_TRACKING_PAT, then GITHUB_TOKEN)
 * 2. ~/.cohort-tracker/credentials.json
 * 3. Returns null if neither found
 *
 * Credentials file is stored with 600 permissions (owner read/write only).
 */

import { readFileSync, writeFileSync, existsSync, chmodSync } from 'node:fs';
import { z } from 'zod';
import { ensureConfigDir, credentialsPath } from './paths.js';

// ─── Zod Schema ──────────────────────────────────────────────

const CredentialsSchema = z.object({
  github: z
    .object({
      token: z.string().min(1),
    })
    .optional(),
});

export type CredentialsConfig = z.infer<typeof CredentialsSchema>;

export interface GitHubCredentials {
  token: string;
}

// ─── Environment Variable Names ──────────────────────────────

const ENV_TOKEN_NAMES = ['GH_TRACKING_PAT', 'GITHUB_TOKEN'] as const;

// ─── Resolve ─────────────────────────────────────────────────

/**
 * Resolve GitHub credentials.
 * Checks env vars first, then credentials file.
 */
export function resolveGitHubCredentials(): GitHubCredentials | null {
  const envName = githubTokenEnvVar();
  const envToken = envName ? process.env[envName] : undefined;
  if (envToken) {
    return { token: envToken };
  }

  const fileConfig = readCredentialsFile();
  if (fileConfig?.github?.token) {
    return fileConfig.github;
  }

  return null;
}

/**
 * Name of the environment variable supplying the token, if any.
 * An env token takes precedence over the credentials file.
 */
export function githubTokenEnvVar(): string | null {
  return ENV_TOKEN_NAMES.find((name) => Boolean(process.env[name])) ?? null;
}

/**
 * Resolve the token or fail. A run without credentials cannot fetch anything.
 */
export function requireGitHubToken(): string {
  const credentials = resolveGitHubCredentials();
  if (!credentials) {
    throw new Error(
      'No GitHub token configured. Set GH_TRACKING_PAT or GITHUB_TOKEN, or run: cohort-tracker auth login --token <token>'
    );
  }
  return credentials.token;
}

// ─── File Operations ─────────────────────────────────────────

/**
 * Read credentials from ~/.cohort-tracker/credentials.json.
 * Returns null if the file doesn't exist or doesn't match the schema.
 */
function readCredentialsFile(): CredentialsConfig | null {
  const filePath = credentialsPath();
  if (!existsSync(filePath)) {
    return null;
  }

  const raw = readFileSync(filePath, 'utf-8');
  const parsed: unknown = JSON.parse(raw);
  const result = CredentialsSchema.safeParse(parsed);
  if (!result.success) {
    return null;
  }
  return result.data;
}

/**
 * Write credentials to ~/.cohort-tracker/credentials.json with 600 permissions.
 */
export function writeCredentials(config: CredentialsConfig): void {
  ensureConfigDir();
  const filePath = credentialsPath();
  writeFileSync(filePath, JSON.stringify(config, null, 2) + '\n', 'utf-8');
  chmodSync(filePath, 0o600);
}

export function hasGitHubCredentials(): boolean {
  return resolveGitHubCredentials() !== null;
}
