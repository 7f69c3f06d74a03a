/**
 * FileFetcher - executes one download task.
 *
 * State machine: pending -> in-progress -> completed, looping back to pending
 * on a retryable failure until the attempt ceiling is reached, ending in
 * failed or skipped otherwise.
 *
 * Bytes land in `<target>.part`. An existing partial file is resumed with a
 * `Range: bytes=N-` request; a server that ignores the range (200) restarts
 * the file and a 416 discards it. Once the byte count equals the declared
 * size the partial file is renamed over the target and the item's sidecars
 * are (re)written.
 */

import * as fs from 'node:fs';
import * as fsp from 'node:fs/promises';
import * as path from 'node:path';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import type { Logger } from 'pino';
import {
  AuthExpiredError,
  FetchFailedError,
  GamecrateError,
  HttpStatusError,
  SizeMismatchError,
  TransientNetworkError,
  errorMessage,
  isFatalError,
  isFilesystemErrno,
  toFilesystemError,
} from '../errors.js';
import { regularFileSize, removeFile } from '../util/fs.js';
import { isTransientStatus, originOf, toTransientError } from '../util/http.js';
import { backoffDelay, defaultSleep, type RetryPolicy, type SleepFn } from '../util/retry.js';
import { writeSidecars } from './sidecar.js';
import type { DownloadTask, FetchHooks, FetchResult, TaskFailure, TaskState } from './types.js';

export interface FileFetcherOptions {
  retry: RetryPolicy;

  /** Abort a transfer that receives nothing for this long */
  timeoutMs: number;

  dryRun: boolean;

  /** Bearer token for transfers from `tokenOrigin` */
  accessToken?: string;

  /** The only origin the token is sent to (the catalog API's); without it the token is never sent */
  tokenOrigin?: string;

  /** Injected for tests */
  fetchFn?: typeof fetch;
  sleep?: SleepFn;
}

/** The server cannot serve the requested range; the partial file is stale. */
class RangeNotSatisfiableError extends TransientNetworkError {
  constructor(url: string) {
    super(`${url} answered HTTP 416 for a resumed range`, 416);
    this.name = 'RangeNotSatisfiableError';
  }
}

function toFailure(err: unknown): TaskFailure {
  return {
    code: err instanceof GamecrateError ? err.code : 'Unknown',
    message: errorMessage(err),
    fatal: isFatalError(err),
  };
}

/** Start offset from a `Content-Range: bytes START-END/TOTAL` header. */
export function parseContentRangeStart(header: string | null): number | null {
  if (header === null) return null;
  const match = /^bytes\s+(\d+)-\d+\/(?:\d+|\*)$/i.exec(header.trim());
  return match?.[1] !== undefined ? parseInt(match[1], 10) : null;
}

interface Attempt {
  requests: number;
  bytesTransferred: number;
}

export class FileFetcher {
  private readonly options: FileFetcherOptions;
  private readonly logger: Logger;
  private readonly fetchFn: typeof fetch;
  private readonly sleep: SleepFn;

  constructor(options: FileFetcherOptions, logger: Logger) {
    this.options = options;
    this.logger = logger.child({ component: 'file-fetcher' });
    this.fetchFn = options.fetchFn ?? globalThis.fetch;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async fetch(task: DownloadTask, hooks: FetchHooks = {}): Promise<FetchResult> {
    const startTime = Date.now();
    const { file } = task;
    const log = this.logger.child({ itemId: task.item.id, filename: file.filename });

    let state: TaskState = 'pending';
    const moveTo = (next: TaskState): void => {
      const previous = state;
      state = next;
      hooks.onStateChange?.(task, previous, next);
    };

    let attempts = 0;
    let requests = 0;
    let bytesTransferred = 0;
    const finish = (
      terminal: 'completed' | 'failed' | 'skipped',
      extra: Pick<FetchResult, 'skipReason' | 'failure'> = {}
    ): FetchResult => {
      moveTo(terminal);
      return {
        task,
        state: terminal,
        ...extra,
        attempts,
        requests,
        bytesTransferred,
        durationMs: Date.now() - startTime,
      };
    };

    try {
      const existing = await regularFileSize(task.targetPath);
      if (existing === file.size) {
        log.debug('Already present');
        return finish('skipped', { skipReason: 'already-present' });
      }

      if (this.options.dryRun) {
        log.info({ targetPath: task.targetPath, size: file.size }, 'Would download (dry run)');
        return finish('skipped', { skipReason: 'dry-run' });
      }

      await fsp.mkdir(path.dirname(task.targetPath), { recursive: true });
    } catch (err) {
      const failure = toFailure(isFilesystemErrno(err) ? toFilesystemError(task.targetPath, err) : err);
      log.error({ ...failure }, 'Cannot prepare target');
      return finish('failed', { failure });
    }

    const { retry } = this.options;
    for (;;) {
      attempts++;
      moveTo('in-progress');

      const progress: Attempt = { requests: 0, bytesTransferred: 0 };
      try {
        await this.transfer(task, progress);
        requests += progress.requests;
        bytesTransferred += progress.bytesTransferred;

        await this.complete(task);
        log.info({ size: file.size, attempts }, 'Download complete');
        return finish('completed');
      } catch (err) {
        requests += progress.requests;
        bytesTransferred += progress.bytesTransferred;

        if (err instanceof RangeNotSatisfiableError) {
          try {
            await this.discardPartial(task);
          } catch (discardErr) {
            const failure = toFailure(discardErr);
            log.error({ ...failure }, 'Cannot discard stale partial file');
            return finish('failed', { failure });
          }
        }

        if (!(err instanceof TransientNetworkError)) {
          const failure = toFailure(err);
          log.error({ ...failure, attempts }, 'Download failed');
          return finish('failed', { failure });
        }

        if (attempts >= retry.maxAttempts) {
          const failure = toFailure(new FetchFailedError(file.url, attempts, err));
          log.error({ ...failure }, 'Download failed, attempts exhausted');
          return finish('failed', { failure });
        }

        const delayMs = backoffDelay(retry, attempts);
        const failure = toFailure(err);
        log.warn({ attempt: attempts, delayMs, error: failure.message }, 'Transfer failed, retrying');
        hooks.onRetry?.(task, attempts, delayMs, failure);
        moveTo('pending');
        await this.sleep(delayMs);
      }
    }
  }

  // ── One attempt ──────────────────────────────────────────────────────────

  /**
   * Bring the partial file up to the declared size, resuming when possible.
   * Throws TransientNetworkError for anything worth another attempt.
   */
  private async transfer(task: DownloadTask, progress: Attempt): Promise<void> {
    const { file } = task;

    let offset = (await regularFileSize(task.tempPath)) ?? 0;
    if (offset > file.size) {
      this.logger.warn({ tempPath: task.tempPath, offset, size: file.size }, 'Partial file larger than expected, restarting');
      await this.discardPartial(task);
      offset = 0;
    }
    if (offset === file.size && offset > 0) {
      return;
    }

    const headers: Record<string, string> = {};
    if (this.mayAuthorize(file.url)) {
      headers['Authorization'] = `Bearer ${this.options.accessToken}`;
    }
    if (offset > 0) {
      headers['Range'] = `bytes=${offset}-`;
    }

    const controller = new AbortController();
    let idleTimer = setTimeout(() => controller.abort(), this.options.timeoutMs);
    const touch = (): void => {
      clearTimeout(idleTimer);
      idleTimer = setTimeout(() => controller.abort(), this.options.timeoutMs);
    };

    try {
      let response: Response;
      try {
        progress.requests++;
        response = await this.fetchFn(file.url, { method: 'GET', headers, signal: controller.signal });
      } catch (err) {
        throw toTransientError(file.url, err);
      }

      if (response.status === 416 && offset > 0) {
        throw new RangeNotSatisfiableError(file.url);
      }
      if (response.status === 401 || response.status === 403) {
        throw new AuthExpiredError(`${file.url} answered HTTP ${response.status}; the session may have expired`);
      }
      if (isTransientStatus(response.status)) {
        throw new TransientNetworkError(`${file.url} answered HTTP ${response.status}`, response.status);
      }
      if (!response.ok) {
        throw new HttpStatusError(file.url, response.status);
      }
      if (!response.body) {
        throw new TransientNetworkError(`${file.url} returned no body`);
      }

      if (offset > 0) {
        if (response.status !== 206) {
          this.logger.info({ url: file.url }, 'Server ignored the range request, restarting');
          offset = 0;
        } else if (parseContentRangeStart(response.headers.get('content-range')) !== offset) {
          await this.discardPartial(task);
          throw new TransientNetworkError(`${file.url} answered an unexpected Content-Range`, 206);
        }
      }

      const out = fs.createWriteStream(task.tempPath, { flags: offset > 0 ? 'a' : 'w' });
      const body = Readable.fromWeb(response.body);
      try {
        await pipeline(
          body,
          async function* (source: AsyncIterable<Buffer>) {
            for await (const chunk of source) {
              touch();
              progress.bytesTransferred += chunk.length;
              yield chunk;
            }
          },
          out
        );
      } catch (err) {
        if (isFilesystemErrno(err)) {
          throw toFilesystemError(task.tempPath, err);
        }
        throw toTransientError(file.url, err);
      }
    } finally {
      clearTimeout(idleTimer);
    }
  }

  /**
   * Check the byte count, move the partial file into place, write sidecars.
   */
  private async complete(task: DownloadTask): Promise<void> {
    const actual = (await regularFileSize(task.tempPath)) ?? 0;
    if (actual !== task.file.size) {
      await this.discardPartial(task);
      throw new SizeMismatchError(task.targetPath, task.file.size, actual);
    }

    try {
      await fsp.rename(task.tempPath, task.targetPath);
    } catch (err) {
      throw toFilesystemError(task.targetPath, err);
    }
    await writeSidecars(task.itemDir, task.item);
  }

  private mayAuthorize(url: string): boolean {
    const { accessToken, tokenOrigin } = this.options;
    if (!accessToken || tokenOrigin === undefined) {
      return false;
    }
    const origin = originOf(url);
    return origin !== null && origin === originOf(tokenOrigin);
  }

  private async discardPartial(task: DownloadTask): Promise<void> {
    await removeFile(task.tempPath);
  }
}
