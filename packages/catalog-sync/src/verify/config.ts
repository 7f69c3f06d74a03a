/**
 * Verification configuration builder.
 */

import { getEnv } from '../util/env.js';
import { DEFAULT_MANIFEST_PATH } from '../sync/config.js';
import { DISPOSITIONS, VERIFY_CHECKS, type VerifyConfig } from './types.js';

/**
 * Build verify config from environment variables and optional overrides.
 * Every check runs and failures are only reported unless overridden.
 *
 * Environment variables:
 * - GAMECRATE_MANIFEST: manifest path (default: ./gamecrate-manifest.yaml)
 * - GAMECRATE_DOWNLOAD_DIR: root to verify (default: current directory)
 */
export function buildVerifyConfig(overrides?: Partial<VerifyConfig>): VerifyConfig {
  const config: VerifyConfig = {
    manifestPath: overrides?.manifestPath ?? getEnv('GAMECRATE_MANIFEST', DEFAULT_MANIFEST_PATH),
    rootDir: overrides?.rootDir ?? getEnv('GAMECRATE_DOWNLOAD_DIR', '.'),
    checks: overrides?.checks ?? VERIFY_CHECKS,
    disposition: overrides?.disposition ?? 'report',
  };
  if (overrides?.itemId !== undefined) {
    config.itemId = overrides.itemId;
  }
  return config;
}

/**
 * Validate a verify configuration.
 * Returns an array of error messages (empty = valid).
 */
export function validateVerifyConfig(config: VerifyConfig): string[] {
  const errors: string[] = [];

  if (!config.manifestPath) {
    errors.push('manifestPath is required');
  }

  if (!config.rootDir) {
    errors.push('rootDir is required');
  }

  const unknown = config.checks.filter((check) => !VERIFY_CHECKS.includes(check));
  if (unknown.length > 0) {
    errors.push(`unknown checks: ${unknown.join(', ')}`);
  }

  if (!DISPOSITIONS.includes(config.disposition)) {
    errors.push(`disposition must be one of: ${DISPOSITIONS.join(', ')}`);
  }

  if (config.itemId === '') {
    errors.push('itemId must not be empty');
  }

  return errors;
}
