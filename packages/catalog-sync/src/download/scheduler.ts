/**
 * DownloadScheduler - turns the manifest into an ordered list of tasks.
 *
 * Tasks follow manifest insertion order, then file order within each item.
 * A task whose target already exists with the declared size is flagged
 * `preSatisfied` so it can be skipped without touching the network.
 */

import type { Logger } from 'pino';
import { UnknownItemError } from '../errors.js';
import { fileMatches } from '../manifest/manifest-store.js';
import { FILE_KINDS, GAME_KINDS, type FileKind, type Manifest, type ManifestFilter } from '../manifest/types.js';
import { regularFileSize } from '../util/fs.js';
import { defaultSleep, type SleepFn } from '../util/retry.js';
import { createTask } from './layout.js';
import type { DownloadFilter, ScheduledTask, SchedulerConfig } from './types.js';

/** Kinds selected by the games/extras toggles. */
export function selectedKinds(filter: DownloadFilter): FileKind[] {
  return FILE_KINDS.filter((kind) =>
    GAME_KINDS.includes(kind) ? filter.includeGames : filter.includeExtras
  );
}

export function toManifestFilter(filter: DownloadFilter): ManifestFilter {
  const manifestFilter: ManifestFilter = {
    os: filter.os,
    lang: filter.lang,
    kinds: selectedKinds(filter),
  };
  if (filter.itemId !== undefined) {
    manifestFilter.itemId = filter.itemId;
  }
  return manifestFilter;
}

export class DownloadScheduler {
  private readonly config: SchedulerConfig;
  private readonly logger: Logger;
  private readonly sleep: SleepFn;

  constructor(config: SchedulerConfig, logger: Logger, sleep: SleepFn = defaultSleep) {
    this.config = config;
    this.logger = logger.child({ component: 'download-scheduler' });
    this.sleep = sleep;
  }

  /**
   * Wait once (if configured), then produce the task list.
   *
   * @throws UnknownItemError when the configured item id is not in the manifest
   */
  async plan(manifest: Manifest): Promise<ScheduledTask[]> {
    const { itemId, waitMs, rootDir } = this.config;

    if (itemId !== undefined && !manifest.items.has(itemId)) {
      throw new UnknownItemError(itemId, 'the manifest');
    }

    if (waitMs > 0) {
      this.logger.info({ waitMs }, 'Waiting before the first download');
      await this.sleep(waitMs);
    }

    // Kinds are decided by the toggles, so an empty list must not read as "any kind"
    const filter = toManifestFilter(this.config);
    const tasks: ScheduledTask[] = [];
    if (filter.kinds?.length === 0) {
      return tasks;
    }

    for (const item of manifest.items.values()) {
      if (itemId !== undefined && item.id !== itemId) {
        continue;
      }
      for (const file of item.files) {
        if (!fileMatches(file, filter)) {
          continue;
        }
        const task = createTask(rootDir, item, file);
        const existingSize = await regularFileSize(task.targetPath);
        const preSatisfied = existingSize !== null && existingSize === file.size;
        if (existingSize !== null && !preSatisfied) {
          this.logger.warn(
            { itemId: item.id, filename: file.filename, expected: file.size, actual: existingSize },
            'Existing file has the wrong size, will download again'
          );
        }
        tasks.push({ ...task, preSatisfied });
      }
    }

    this.logger.info(
      { tasks: tasks.length, preSatisfied: tasks.filter((t) => t.preSatisfied).length },
      'Download plan ready'
    );
    return tasks;
  }
}
