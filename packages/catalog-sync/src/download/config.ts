/**
 * Download configuration builder.
 *
 * Reads from environment variables with defaults.
 * All values can be overridden programmatically.
 */

import { DEFAULT_RETRY_POLICY, validateRetryPolicy } from '../util/retry.js';
import { getEnv, getEnvList, getEnvNumber } from '../util/env.js';
import { DEFAULT_MANIFEST_PATH } from '../sync/config.js';
import type { DownloadConfig } from './types.js';

export const MAX_CONCURRENCY = 4;

/** Longest accepted pre-run wait: one week */
export const MAX_WAIT_MS = 7 * 24 * 3_600_000;

/**
 * Build download config from environment variables and optional overrides.
 *
 * Environment variables:
 * - GAMECRATE_MANIFEST: manifest path (default: ./gamecrate-manifest.yaml)
 * - GAMECRATE_DOWNLOAD_DIR: target root (default: current directory)
 * - GAMECRATE_DOWNLOAD_OS / GAMECRATE_DOWNLOAD_LANG: comma-separated tag filters
 * - GAMECRATE_CONCURRENCY: parallel transfers (default: 1)
 * - GAMECRATE_MAX_ATTEMPTS: attempts per file (default: 4)
 * - GAMECRATE_BACKOFF_MS: first backoff delay (default: 1000)
 * - GAMECRATE_REQUEST_TIMEOUT_MS: transfer idle timeout (default: 60000)
 */
export function buildDownloadConfig(overrides?: Partial<DownloadConfig>): DownloadConfig {
  const config: DownloadConfig = {
    manifestPath: overrides?.manifestPath ?? getEnv('GAMECRATE_MANIFEST', DEFAULT_MANIFEST_PATH),
    rootDir: overrides?.rootDir ?? getEnv('GAMECRATE_DOWNLOAD_DIR', '.'),
    os: overrides?.os ?? getEnvList('GAMECRATE_DOWNLOAD_OS', []),
    lang: overrides?.lang ?? getEnvList('GAMECRATE_DOWNLOAD_LANG', []),
    includeGames: overrides?.includeGames ?? true,
    includeExtras: overrides?.includeExtras ?? true,
    waitMs: overrides?.waitMs ?? 0,
    dryRun: overrides?.dryRun ?? false,
    concurrency: overrides?.concurrency ?? getEnvNumber('GAMECRATE_CONCURRENCY', 1),
    retry: overrides?.retry ?? {
      maxAttempts: getEnvNumber('GAMECRATE_MAX_ATTEMPTS', DEFAULT_RETRY_POLICY.maxAttempts),
      baseDelayMs: getEnvNumber('GAMECRATE_BACKOFF_MS', DEFAULT_RETRY_POLICY.baseDelayMs),
      maxDelayMs: DEFAULT_RETRY_POLICY.maxDelayMs,
    },
    timeoutMs: overrides?.timeoutMs ?? getEnvNumber('GAMECRATE_REQUEST_TIMEOUT_MS', 60_000),
  };
  if (overrides?.itemId !== undefined) {
    config.itemId = overrides.itemId;
  }
  return config;
}

/**
 * Validate a download configuration.
 * Returns an array of error messages (empty = valid).
 */
export function validateDownloadConfig(config: DownloadConfig): string[] {
  const errors: string[] = [];

  if (!config.manifestPath) {
    errors.push('manifestPath is required');
  }

  if (!config.rootDir) {
    errors.push('rootDir is required');
  }

  if (!config.includeGames && !config.includeExtras) {
    errors.push('skipping both game files and extras leaves nothing to download');
  }

  if (config.itemId === '') {
    errors.push('itemId must not be empty');
  }

  if (!Number.isInteger(config.concurrency) || config.concurrency < 1) {
    errors.push('concurrency must be at least 1');
  }

  if (config.concurrency > MAX_CONCURRENCY) {
    errors.push(`concurrency must not exceed ${MAX_CONCURRENCY}`);
  }

  if (config.waitMs < 0) {
    errors.push('waitMs must not be negative');
  }

  if (config.waitMs > MAX_WAIT_MS) {
    errors.push('waitMs must not exceed one week');
  }

  if (config.timeoutMs < 1000) {
    errors.push('timeoutMs must be at least 1000 (1 second)');
  }

  errors.push(...validateRetryPolicy(config.retry));

  return errors;
}
