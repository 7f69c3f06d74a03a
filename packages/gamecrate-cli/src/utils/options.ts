/**
 * Commander option parsing and the mapping from parsed options onto the
 * core's config builders. Every builder result is validated here, once,
 * and frozen before it reaches the core.
 */

import { InvalidArgumentError } from 'commander';
import {
  ConfigError,
  MERGE_POLICIES,
  buildDownloadConfig,
  buildSyncConfig,
  buildVerifyConfig,
  validateDownloadConfig,
  validateSyncConfig,
  validateVerifyConfig,
  type DownloadConfig,
  type MergePolicy,
  type SyncConfig,
  type VerifyCheck,
  type VerifyConfig,
} from '@gamecrate/catalog-sync';

// ── Argument parsers ─────────────────────────────────────────────────────────

/** Repeatable, comma-separated tag list: `--os windows,linux --os mac` */
export function collectTags(value: string, previous: string[] = []): string[] {
  const tags = value
    .split(',')
    .map((tag) => tag.trim().toLowerCase())
    .filter((tag) => tag.length > 0);
  return [...previous, ...tags.filter((tag) => !previous.includes(tag))];
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

/** Hours (fractions allowed) to milliseconds */
export function parseHours(value: string): number {
  const hours = Number(value);
  if (!Number.isFinite(hours) || hours < 0) {
    throw new InvalidArgumentError('Must be a non-negative number of hours.');
  }
  return Math.round(hours * 3_600_000);
}

export function parsePolicy(value: string): MergePolicy {
  const policy = MERGE_POLICIES.find((candidate) => candidate === value);
  if (policy === undefined) {
    throw new InvalidArgumentError(`Must be one of: ${MERGE_POLICIES.join(', ')}.`);
  }
  return policy;
}

// ── Option shapes ────────────────────────────────────────────────────────────

// Type aliases rather than interfaces: commander's optsWithGlobals<T>() needs
// an implicit index signature.
export type GlobalOptions = {
  manifest?: string;
};

export type UpdateOptions = GlobalOptions & {
  policy?: MergePolicy;
  id?: string;
  os?: string[];
  lang?: string[];
};

export type DownloadOptions = GlobalOptions & {
  os?: string[];
  lang?: string[];
  id?: string;
  skipGames?: boolean;
  skipExtras?: boolean;
  dryRun?: boolean;
  wait?: number;
  concurrency?: number;
};

export type VerifyOptions = GlobalOptions & {
  id?: string;
  skipChecksum?: boolean;
  skipSize?: boolean;
  skipArchive?: boolean;
  delete?: boolean;
};

// ── Config mapping ───────────────────────────────────────────────────────────

function checked<T extends object>(scope: string, config: T, errors: string[]): Readonly<T> {
  if (errors.length > 0) {
    throw new ConfigError(scope, errors);
  }
  return Object.freeze(config);
}

/**
 * `--id` on its own implies the single-id policy.
 *
 * @throws ConfigError
 */
export function toSyncConfig(opts: UpdateOptions): Readonly<SyncConfig> {
  const overrides: Partial<SyncConfig> = {};
  if (opts.manifest !== undefined) overrides.manifestPath = opts.manifest;
  if (opts.policy !== undefined) overrides.policy = opts.policy;
  else if (opts.id !== undefined) overrides.policy = 'single-id';
  if (opts.id !== undefined) overrides.itemId = opts.id;
  if (opts.os !== undefined) overrides.os = opts.os;
  if (opts.lang !== undefined) overrides.lang = opts.lang;

  const config = buildSyncConfig(overrides);
  return checked('sync', config, validateSyncConfig(config));
}

/**
 * @throws ConfigError
 */
export function toDownloadConfig(dir: string | undefined, opts: DownloadOptions): Readonly<DownloadConfig> {
  const overrides: Partial<DownloadConfig> = {
    includeGames: !opts.skipGames,
    includeExtras: !opts.skipExtras,
    dryRun: opts.dryRun ?? false,
  };
  if (dir !== undefined) overrides.rootDir = dir;
  if (opts.manifest !== undefined) overrides.manifestPath = opts.manifest;
  if (opts.os !== undefined) overrides.os = opts.os;
  if (opts.lang !== undefined) overrides.lang = opts.lang;
  if (opts.id !== undefined) overrides.itemId = opts.id;
  if (opts.wait !== undefined) overrides.waitMs = opts.wait;
  if (opts.concurrency !== undefined) overrides.concurrency = opts.concurrency;

  const config = buildDownloadConfig(overrides);
  return checked('download', config, validateDownloadConfig(config));
}

/**
 * @throws ConfigError
 */
export function toVerifyConfig(dir: string | undefined, opts: VerifyOptions): Readonly<VerifyConfig> {
  const checks: VerifyCheck[] = [];
  if (!opts.skipChecksum) checks.push('checksum');
  if (!opts.skipSize) checks.push('size');
  if (!opts.skipArchive) checks.push('archive');

  const overrides: Partial<VerifyConfig> = {
    checks,
    disposition: opts.delete ? 'delete' : 'report',
  };
  if (dir !== undefined) overrides.rootDir = dir;
  if (opts.manifest !== undefined) overrides.manifestPath = opts.manifest;
  if (opts.id !== undefined) overrides.itemId = opts.id;

  const config = buildVerifyConfig(overrides);
  return checked('verify', config, validateVerifyConfig(config));
}
