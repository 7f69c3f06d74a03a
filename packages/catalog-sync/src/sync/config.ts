/**
 * Sync configuration builder.
 *
 * Reads from environment variables with defaults; every value can be
 * overridden programmatically (the CLI passes its options this way).
 */

import { DEFAULT_RETRY_POLICY, validateRetryPolicy } from '../util/retry.js';
import { getEnv, getEnvList, getEnvNumber } from '../util/env.js';
import { MERGE_POLICIES, type MergePolicy, type SyncConfig } from './types.js';

export const DEFAULT_MANIFEST_PATH = './gamecrate-manifest.yaml';

function isMergePolicy(value: string): value is MergePolicy {
  return MERGE_POLICIES.some((policy) => policy === value);
}

/**
 * Build sync config from environment variables and optional overrides.
 *
 * Environment variables:
 * - GAMECRATE_MANIFEST: manifest path (default: ./gamecrate-manifest.yaml)
 * - GAMECRATE_SYNC_POLICY: all, skip-known, updated-only (default: all)
 * - GAMECRATE_SYNC_OS / GAMECRATE_SYNC_LANG: comma-separated tag filters
 * - GAMECRATE_MAX_ATTEMPTS: attempts per request (default: 4)
 * - GAMECRATE_BACKOFF_MS: first backoff delay (default: 1000)
 * - GAMECRATE_REQUEST_DELAY_MS: pause between detail fetches (default: 1000)
 */
export function buildSyncConfig(overrides?: Partial<SyncConfig>): SyncConfig {
  const envPolicy = getEnv('GAMECRATE_SYNC_POLICY', 'all');
  const policy = overrides?.policy ?? (isMergePolicy(envPolicy) ? envPolicy : 'all');

  const config: SyncConfig = {
    manifestPath: overrides?.manifestPath ?? getEnv('GAMECRATE_MANIFEST', DEFAULT_MANIFEST_PATH),
    policy,
    os: overrides?.os ?? getEnvList('GAMECRATE_SYNC_OS', []),
    lang: overrides?.lang ?? getEnvList('GAMECRATE_SYNC_LANG', []),
    retry: overrides?.retry ?? {
      maxAttempts: getEnvNumber('GAMECRATE_MAX_ATTEMPTS', DEFAULT_RETRY_POLICY.maxAttempts),
      baseDelayMs: getEnvNumber('GAMECRATE_BACKOFF_MS', DEFAULT_RETRY_POLICY.baseDelayMs),
      maxDelayMs: DEFAULT_RETRY_POLICY.maxDelayMs,
    },
    requestDelayMs: overrides?.requestDelayMs ?? getEnvNumber('GAMECRATE_REQUEST_DELAY_MS', 1000),
  };
  if (overrides?.itemId !== undefined) {
    config.itemId = overrides.itemId;
  }
  return config;
}

/**
 * Validate a sync configuration.
 * Returns an array of error messages (empty = valid).
 */
export function validateSyncConfig(config: SyncConfig): string[] {
  const errors: string[] = [];

  if (!config.manifestPath) {
    errors.push('manifestPath is required');
  }

  if (!isMergePolicy(config.policy)) {
    errors.push(`policy must be one of: ${MERGE_POLICIES.join(', ')}`);
  }

  if (config.policy === 'single-id' && !config.itemId) {
    errors.push('itemId is required when policy is "single-id"');
  }

  if (config.policy !== 'single-id' && config.itemId !== undefined) {
    errors.push('itemId is only used with the "single-id" policy');
  }

  if (config.requestDelayMs < 0) {
    errors.push('requestDelayMs must not be negative');
  }

  if (config.requestDelayMs > 60_000) {
    errors.push('requestDelayMs must not exceed 60000 (1 minute)');
  }

  errors.push(...validateRetryPolicy(config.retry));

  return errors;
}
