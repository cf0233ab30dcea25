/**
 * Tracker Home
 *
 * Credentials and the store live in one per-user directory:
 * COHORT_TRACKER_HOME when set, otherwise ~/.cohort-tracker. The store can
 * be moved on its own with COHORT_TRACKER_DB, e.g. onto a CI cache volume.
 */

import { mkdirSync, chmodSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, join } from 'node:path';

const HOME_ENV = 'COHORT_TRACKER_HOME';
const STORE_ENV = 'COHORT_TRACKER_DB';
const HOME_DIR_NAME = '.cohort-tracker';

const HOME_FILES = {
  credentials: 'credentials.json',
  store: 'tracker.db',
} as const;

export type HomeFile = keyof typeof HOME_FILES;

export function resolveConfigDir(): string {
  return process.env[HOME_ENV] || join(homedir(), HOME_DIR_NAME);
}

/**
 * Create the home directory if missing and restrict it to the owner (700).
 */
export function ensureConfigDir(): string {
  const dir = resolveConfigDir();
  mkdirSync(dir, { recursive: true, mode: 0o700 });
  chmodSync(dir, 0o700);
  return dir;
}

export function homeFilePath(file: HomeFile): string {
  return join(resolveConfigDir(), HOME_FILES[file]);
}

export function credentialsPath(): string {
  return homeFilePath('credentials');
}

export function storeDbPath(): string {
  return process.env[STORE_ENV] || homeFilePath('store');
}

/**
 * Store path with its parent directory created. Only the home directory
 * gets its permissions tightened.
 */
export function prepareStorePath(): string {
  const custom = process.env[STORE_ENV];
  if (custom) {
    mkdirSync(dirname(custom), { recursive: true });
    return custom;
  }
  ensureConfigDir();
  return homeFilePath('store');
}
