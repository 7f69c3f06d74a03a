/**
 * Sync engine types.
 */

import type { ErrorCode } from '../errors.js';
import type { Manifest } from '../manifest/types.js';
import type { RetryPolicy } from '../util/retry.js';

/**
 * Which enumerated items a run re-fetches.
 * - all: every enumerated id
 * - skip-known: ids not yet in the manifest
 * - updated-only: ids the enumeration flags as updated
 * - single-id: exactly `itemId`
 */
export type MergePolicy = 'all' | 'skip-known' | 'updated-only' | 'single-id';

export const MERGE_POLICIES: readonly MergePolicy[] = ['all', 'skip-known', 'updated-only', 'single-id'];

export interface SyncConfig {
  /** Path of the manifest file */
  manifestPath: string;

  policy: MergePolicy;

  /** Target of the single-id policy */
  itemId?: string;

  /** Keep only files with these OS tags (empty = all) */
  os: readonly string[];

  /** Keep only files with these language tags (empty = all) */
  lang: readonly string[];

  /** Attempts and backoff for enumeration and detail fetches */
  retry: RetryPolicy;

  /** Pause between two detail fetches (default: 1000) */
  requestDelayMs: number;
}

export interface SyncFailure {
  itemId: string;
  code: ErrorCode | 'Unknown';
  message: string;
  attempts: number;
}

export interface SyncRunResult {
  policy: MergePolicy;

  /** Number of ids the catalog enumerated */
  enumerated: number;

  /** Ids selected by the policy, in enumeration order */
  selected: string[];

  /** Ids fetched and upserted */
  updated: string[];

  /** Ids skipped after a failed fetch */
  failures: SyncFailure[];

  /** The manifest as saved */
  manifest: Manifest;
}
