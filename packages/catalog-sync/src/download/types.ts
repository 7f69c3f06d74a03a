/**
 * Types for download scheduling, transfer and run reporting.
 */

import type { ErrorCode } from '../errors.js';
import type { FileRecord, Item } from '../manifest/types.js';
import type { RetryPolicy } from '../util/retry.js';

// ── Configuration ────────────────────────────────────────────────────────────

/** Which manifest files a download run selects. Empty tag lists mean "all". */
export interface DownloadFilter {
  os: readonly string[];
  lang: readonly string[];

  /** Restrict the run to one item */
  itemId?: string;

  /** Installers, patches and language packs */
  includeGames: boolean;

  /** Bonus material */
  includeExtras: boolean;
}

export interface DownloadConfig extends DownloadFilter {
  /** Path of the manifest file */
  manifestPath: string;

  /** Directory holding one sub-directory per item */
  rootDir: string;

  /** One-time pause before the first task (default: 0) */
  waitMs: number;

  /** Plan and log without touching the network or the filesystem */
  dryRun: boolean;

  /** Parallel transfers (default: 1, max: 4) */
  concurrency: number;

  /** Attempts and backoff per file */
  retry: RetryPolicy;

  /** Idle timeout for a transfer, in ms (default: 60000) */
  timeoutMs: number;
}

export type SchedulerConfig = Pick<
  DownloadConfig,
  'rootDir' | 'waitMs' | 'os' | 'lang' | 'itemId' | 'includeGames' | 'includeExtras'
>;

// ── Tasks ────────────────────────────────────────────────────────────────────

/** One scheduled transfer. Never persisted. */
export interface DownloadTask {
  item: Item;
  file: FileRecord;

  /** `<root>/<itemId>` */
  itemDir: string;

  /** Final location of the file */
  targetPath: string;

  /** `<targetPath>.part`, where bytes land until the transfer completes */
  tempPath: string;
}

export interface ScheduledTask extends DownloadTask {
  /** Target already present with the declared size when planning */
  preSatisfied: boolean;
}

export type TaskState = 'pending' | 'in-progress' | 'completed' | 'failed' | 'skipped';

/** `halted`: never started because an earlier task hit a fatal error */
export type SkipReason = 'already-present' | 'dry-run' | 'halted';

export interface TaskFailure {
  code: ErrorCode | 'Unknown';
  message: string;

  /** Ends the run: no further task is started */
  fatal: boolean;
}

export interface FetchResult {
  task: DownloadTask;

  /** Terminal state */
  state: 'completed' | 'failed' | 'skipped';

  skipReason?: SkipReason;
  failure?: TaskFailure;

  /** Attempts made (0 when skipped) */
  attempts: number;

  /** HTTP requests issued */
  requests: number;

  /** Bytes received over the network during this run */
  bytesTransferred: number;

  durationMs: number;
}

export interface FetchHooks {
  onStateChange?: (task: DownloadTask, from: TaskState, to: TaskState) => void;
  onRetry?: (task: DownloadTask, attempt: number, delayMs: number, error: TaskFailure) => void;
}

// ── Run reporting ────────────────────────────────────────────────────────────

export interface DownloadRunSummary {
  planned: number;
  completed: number;
  skipped: number;
  failed: number;
  bytesTransferred: number;
  results: FetchResult[];
  durationMs: number;

  /** The fatal failure that stopped the run early, if any */
  haltedBy?: TaskFailure;
}

/** Events emitted by the DownloadManager */
export interface DownloadManagerEvents {
  /** Planning finished */
  planned: (tasks: ScheduledTask[]) => void;

  /** A worker picked up a task */
  taskStart: (task: DownloadTask) => void;

  /** A transfer failed and will be retried */
  taskRetry: (task: DownloadTask, attempt: number, delayMs: number, error: TaskFailure) => void;

  /** A task reached a terminal state */
  taskDone: (result: FetchResult) => void;
}
