/**
 * Explicit results for external calls.
 *
 * A sub-fetch that fails degrades to an empty or zero value chosen by the
 * caller, and the failure is logged. Bad credentials are the exception:
 * a 401 aborts the run instead of producing an all-zero report.
 */

import { GitHubClientError } from '../clients/github-client.js';
import type { Logger } from '../logger.js';

export interface FetchError {
  label: string;
  message: string;
  statusCode?: number;
}

export type FetchResult<T> = { ok: true; value: T } | { ok: false; error: FetchError };

export async function attempt<T>(
  log: Logger,
  label: string,
  fn: () => Promise<T>
): Promise<FetchResult<T>> {
  try {
    return { ok: true, value: await fn() };
  } catch (error) {
    if (error instanceof GitHubClientError && error.statusCode === 401) {
      throw error;
    }
    const fetchError: FetchError = {
      label,
      message: error instanceof Error ? error.message : String(error),
      statusCode: error instanceof GitHubClientError ? error.statusCode : undefined,
    };
    log.warn(`Fetch failed: ${label}`, { error: fetchError.message, statusCode: fetchError.statusCode });
    return { ok: false, error: fetchError };
  }
}

export function valueOr<T>(result: FetchResult<T>, fallback: T): T {
  return result.ok ? result.value : fallback;
}
