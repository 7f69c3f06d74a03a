/**
 * DownloadManager - runs one download pass over the manifest.
 *
 * Integrates:
 * - DownloadScheduler: selects files and computes target paths
 * - FileFetcher: resumable, retrying transfer of one file
 * - runPool: bounded parallelism (1 by default)
 *
 * Emits events for progress reporting. A failing file is recorded in the
 * summary and the batch goes on, unless the failure is fatal (an expired
 * session): then no further task is started and the summary names it.
 */

import { EventEmitter } from 'node:events';
import type { Logger } from 'pino';
import { ConfigError } from '../errors.js';
import { loadManifest } from '../manifest/manifest-store.js';
import { defaultSleep, type SleepFn } from '../util/retry.js';
import { validateDownloadConfig } from './config.js';
import { FileFetcher } from './file-fetcher.js';
import { DownloadScheduler } from './scheduler.js';
import type {
  DownloadConfig,
  DownloadManagerEvents,
  DownloadRunSummary,
  FetchResult,
  ScheduledTask,
  TaskFailure,
} from './types.js';
import { runPool } from './worker-pool.js';

/**
 * Typed event emitter interface for the download manager.
 */
export interface TypedDownloadManagerEmitter {
  on<K extends keyof DownloadManagerEvents>(event: K, listener: DownloadManagerEvents[K]): this;
  off<K extends keyof DownloadManagerEvents>(event: K, listener: DownloadManagerEvents[K]): this;
  emit<K extends keyof DownloadManagerEvents>(
    event: K,
    ...args: Parameters<DownloadManagerEvents[K]>
  ): boolean;
}

export interface DownloadManagerOptions {
  accessToken?: string;

  /** Catalog API origin; the token is only sent to file URLs on it */
  tokenOrigin?: string;

  fetchFn?: typeof fetch;
  sleep?: SleepFn;
}

export class DownloadManager extends EventEmitter implements TypedDownloadManagerEmitter {
  private readonly config: DownloadConfig;
  private readonly logger: Logger;
  private readonly scheduler: DownloadScheduler;
  private readonly fetcher: FileFetcher;

  constructor(config: DownloadConfig, logger: Logger, options: DownloadManagerOptions = {}) {
    super();

    const errors = validateDownloadConfig(config);
    if (errors.length > 0) {
      throw new ConfigError('download', errors);
    }

    this.config = config;
    this.logger = logger.child({ component: 'download-manager' });

    const sleep = options.sleep ?? defaultSleep;
    this.scheduler = new DownloadScheduler(config, logger, sleep);
    this.fetcher = new FileFetcher(
      {
        retry: config.retry,
        timeoutMs: config.timeoutMs,
        dryRun: config.dryRun,
        accessToken: options.accessToken,
        tokenOrigin: options.tokenOrigin,
        fetchFn: options.fetchFn,
        sleep,
      },
      logger
    );
  }

  /**
   * Load the manifest, plan, and run every task.
   *
   * @throws CorruptManifestError | UnknownItemError before any transfer starts
   */
  async run(): Promise<DownloadRunSummary> {
    const startTime = Date.now();
    const manifest = await loadManifest(this.config.manifestPath);
    const tasks = await this.scheduler.plan(manifest);
    this.emit('planned', tasks);

    const halt: { failure?: TaskFailure } = {};
    const results = await runPool(tasks, this.config.concurrency, async (task) => {
      if (halt.failure !== undefined) {
        return this.haltedResult(task);
      }
      const result = await this.runTask(task);
      if (halt.failure === undefined && result.failure?.fatal) {
        halt.failure = result.failure;
        this.logger.error(
          { code: result.failure.code, filename: task.file.filename },
          'Fatal failure, starting no further tasks'
        );
      }
      return result;
    });

    const summary: DownloadRunSummary = {
      planned: tasks.length,
      completed: results.filter((r) => r.state === 'completed').length,
      skipped: results.filter((r) => r.state === 'skipped').length,
      failed: results.filter((r) => r.state === 'failed').length,
      bytesTransferred: results.reduce((sum, r) => sum + r.bytesTransferred, 0),
      results,
      durationMs: Date.now() - startTime,
    };
    if (halt.failure !== undefined) {
      summary.haltedBy = halt.failure;
    }

    this.logger.info(
      {
        planned: summary.planned,
        completed: summary.completed,
        skipped: summary.skipped,
        failed: summary.failed,
        bytes: summary.bytesTransferred,
        dryRun: this.config.dryRun,
        halted: halt.failure !== undefined,
      },
      'Download run finished'
    );
    return summary;
  }

  private haltedResult(task: ScheduledTask): FetchResult {
    const result: FetchResult = {
      task,
      state: 'skipped',
      skipReason: 'halted',
      attempts: 0,
      requests: 0,
      bytesTransferred: 0,
      durationMs: 0,
    };
    this.emit('taskDone', result);
    return result;
  }

  private async runTask(task: ScheduledTask): Promise<FetchResult> {
    this.emit('taskStart', task);

    let result: FetchResult;
    if (task.preSatisfied) {
      result = {
        task,
        state: 'skipped',
        skipReason: 'already-present',
        attempts: 0,
        requests: 0,
        bytesTransferred: 0,
        durationMs: 0,
      };
    } else {
      result = await this.fetcher.fetch(task, {
        onRetry: (retried, attempt, delayMs, error) => {
          this.emit('taskRetry', retried, attempt, delayMs, error);
        },
      });
    }

    this.emit('taskDone', result);
    return result;
  }
}
