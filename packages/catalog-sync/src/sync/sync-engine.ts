/**
 * SyncEngine - merges the remote catalog into the local manifest.
 *
 * One run: load manifest, enumerate once, select ids by policy, fetch each
 * selected item's detail (bounded retry on transient failures), upsert, and
 * save the manifest once at the end. A failing item is recorded and skipped;
 * an expired session aborts the run before anything is written.
 */

import type { Logger } from 'pino';
import type { CatalogClient, CatalogEntry, CatalogSession, ItemRecord } from '../catalog/types.js';
import {
  AuthExpiredError,
  ConfigError,
  GamecrateError,
  TransientNetworkError,
  UnknownItemError,
  errorMessage,
} from '../errors.js';
import { loadManifest, saveManifest, tagMatches, upsertItem } from '../manifest/manifest-store.js';
import type { Item, Manifest } from '../manifest/types.js';
import { RetryExhaustedError, defaultSleep, withRetry, type SleepFn } from '../util/retry.js';
import { validateSyncConfig } from './config.js';
import type { SyncConfig, SyncFailure, SyncRunResult } from './types.js';

export interface SyncEngineOptions {
  /** Backoff and inter-request sleeps; replaced in tests */
  sleep?: SleepFn;

  /**
   * Source of the per-item `syncedAt` marker (default: the wall clock).
   * Re-merging an unchanged snapshot yields a byte-identical manifest only
   * under the same clock; `syncedAt` itself always moves with it.
   */
  now?: () => Date;
}

function isTransient(err: unknown): boolean {
  return err instanceof TransientNetworkError;
}

export class SyncEngine {
  private readonly config: SyncConfig;
  private readonly client: CatalogClient;
  private readonly logger: Logger;
  private readonly sleep: SleepFn;
  private readonly now: () => Date;

  constructor(config: SyncConfig, client: CatalogClient, logger: Logger, options: SyncEngineOptions = {}) {
    const errors = validateSyncConfig(config);
    if (errors.length > 0) {
      throw new ConfigError('sync', errors);
    }

    this.config = config;
    this.client = client;
    this.logger = logger.child({ component: 'sync-engine' });
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? (() => new Date());
  }

  async run(session: CatalogSession): Promise<SyncRunResult> {
    const manifest = await loadManifest(this.config.manifestPath);
    this.logger.info(
      { manifestPath: this.config.manifestPath, knownItems: manifest.items.size, policy: this.config.policy },
      'Loaded manifest'
    );

    const entries = await this.enumerate(session);
    const selected = this.select(entries, manifest);
    this.logger.info({ enumerated: entries.length, selected: selected.length }, 'Selected items to fetch');

    const updated: string[] = [];
    const failures: SyncFailure[] = [];

    for (const [index, id] of selected.entries()) {
      if (index > 0 && this.config.requestDelayMs > 0) {
        await this.sleep(this.config.requestDelayMs);
      }

      const fetched = await this.fetchItem(session, id);
      if ('failure' in fetched) {
        failures.push(fetched.failure);
        continue;
      }

      upsertItem(manifest, this.toItem(fetched.record));
      updated.push(id);
      this.logger.debug({ itemId: id, position: index + 1, of: selected.length }, 'Item merged');
    }

    await saveManifest(this.config.manifestPath, manifest);
    this.logger.info(
      { updated: updated.length, failed: failures.length, totalItems: manifest.items.size },
      'Manifest saved'
    );

    return {
      policy: this.config.policy,
      enumerated: entries.length,
      selected,
      updated,
      failures,
      manifest,
    };
  }

  // ── Steps ────────────────────────────────────────────────────────────────

  private async enumerate(session: CatalogSession): Promise<CatalogEntry[]> {
    try {
      const { value } = await withRetry(() => this.client.enumerate(session), {
        policy: this.config.retry,
        sleep: this.sleep,
        isRetryable: isTransient,
        onRetry: (err, attempt, delayMs) => {
          this.logger.warn({ attempt, delayMs, error: errorMessage(err) }, 'Enumeration failed, retrying');
        },
      });
      return value;
    } catch (err) {
      if (err instanceof RetryExhaustedError) {
        throw err.lastError;
      }
      throw err;
    }
  }

  /**
   * Ids to fetch, in enumeration order.
   */
  private select(entries: CatalogEntry[], manifest: Manifest): string[] {
    switch (this.config.policy) {
      case 'all':
        return entries.map((entry) => entry.id);
      case 'skip-known':
        return entries.filter((entry) => !manifest.items.has(entry.id)).map((entry) => entry.id);
      case 'updated-only':
        return entries.filter((entry) => entry.updated).map((entry) => entry.id);
      case 'single-id': {
        const target = this.config.itemId;
        const match = entries.find((entry) => entry.id === target);
        if (!match) {
          throw new UnknownItemError(target ?? '', 'the catalog enumeration');
        }
        return [match.id];
      }
    }
  }

  private async fetchItem(
    session: CatalogSession,
    id: string
  ): Promise<{ record: ItemRecord } | { failure: SyncFailure }> {
    try {
      const { value, attempts } = await withRetry(() => this.client.fetchDetail(session, id), {
        policy: this.config.retry,
        sleep: this.sleep,
        isRetryable: isTransient,
        onRetry: (err, attempt, delayMs) => {
          this.logger.warn({ itemId: id, attempt, delayMs, error: errorMessage(err) }, 'Detail fetch failed, retrying');
        },
      });
      if (attempts > 1) {
        this.logger.info({ itemId: id, attempts }, 'Detail fetched after retry');
      }
      return { record: value };
    } catch (err) {
      if (err instanceof AuthExpiredError) {
        this.logger.error({ itemId: id }, 'Session expired, aborting sync');
        throw err;
      }

      const cause = err instanceof RetryExhaustedError ? err.lastError : err;
      const failure: SyncFailure = {
        itemId: id,
        code: cause instanceof GamecrateError ? cause.code : 'Unknown',
        message: errorMessage(cause),
        attempts: err instanceof RetryExhaustedError ? err.attempts : 1,
      };
      this.logger.error({ ...failure }, 'Skipping item');
      return { failure };
    }
  }

  private toItem(record: ItemRecord): Item {
    const { os, lang } = this.config;
    const item: Item = {
      id: record.id,
      title: record.title,
      notes: record.notes,
      syncedAt: this.now().toISOString(),
      files: record.files.filter((file) => tagMatches(os, file.os) && tagMatches(lang, file.lang)),
    };
    if (record.serial !== undefined) {
      item.serial = record.serial;
    }
    return item;
  }
}
