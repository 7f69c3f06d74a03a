/**
 * Integrity verification types.
 */

import type { ErrorCode } from '../errors.js';

export type VerifyCheck = 'checksum' | 'size' | 'archive';

export const VERIFY_CHECKS: readonly VerifyCheck[] = ['checksum', 'size', 'archive'];

/** What to do with a file that fails verification */
export type Disposition = 'report' | 'delete';

export const DISPOSITIONS: readonly Disposition[] = ['report', 'delete'];

export interface VerifyConfig {
  manifestPath: string;

  /** Directory holding one sub-directory per item */
  rootDir: string;

  /** Checks to run; a check left out is reported as skipped */
  checks: readonly VerifyCheck[];

  disposition: Disposition;

  /** Restrict verification to one item */
  itemId?: string;
}

export type CheckOutcome = 'pass' | 'fail' | 'skipped';

export type FileStatus = 'passed' | 'failed' | 'missing';

export interface VerificationFailure {
  code: ErrorCode;
  message: string;
}

/** Result of checking one file. Never persisted. */
export interface VerificationRecord {
  itemId: string;
  filename: string;
  path: string;
  status: FileStatus;
  checks: Record<VerifyCheck, CheckOutcome>;
  failures: VerificationFailure[];

  /** Removed from disk because of the delete disposition */
  deleted: boolean;
}

export interface ItemVerification {
  itemId: string;
  title: string;

  /** failed if any file failed, else missing if any is missing, else passed */
  status: FileStatus;

  files: VerificationRecord[];
}

export interface VerifyTotals {
  files: number;
  present: number;
  missing: number;
  passed: number;
  failed: number;
  checksumMismatches: number;
  sizeMismatches: number;
  archiveFailures: number;
  deleted: number;
}

export interface VerifySummary {
  items: ItemVerification[];
  totals: VerifyTotals;
}
