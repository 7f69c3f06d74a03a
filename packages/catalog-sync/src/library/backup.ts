/**
 * Copy downloaded files to a second root (an external disk, say).
 *
 * Only files present in the source with their declared size are copied,
 * and only when the destination lacks them or holds a different size. An
 * item's sidecars follow whenever any of its files was copied.
 */

import * as path from 'node:path';
import type { Logger } from 'pino';
import { INFO_FILENAME, SERIAL_FILENAME, createTask } from '../download/layout.js';
import type { Manifest } from '../manifest/types.js';
import { regularFileSize } from '../util/fs.js';
import { copyAtomic } from './copy.js';

export interface BackupResult {
  /** Destination paths written, sidecars included */
  copied: string[];

  /** Source files skipped because their size differs from the manifest */
  unexpectedSize: string[];

  /** Files already present at the destination with the declared size */
  upToDate: number;
}

export async function backupFiles(
  manifest: Manifest,
  sourceRoot: string,
  destRoot: string,
  logger: Logger
): Promise<BackupResult> {
  const log = logger.child({ component: 'library-backup' });
  const result: BackupResult = { copied: [], unexpectedSize: [], upToDate: 0 };

  for (const item of manifest.items.values()) {
    let touched = false;

    for (const file of item.files) {
      const source = createTask(sourceRoot, item, file);
      const dest = createTask(destRoot, item, file);

      const sourceSize = await regularFileSize(source.targetPath);
      if (sourceSize === null) {
        continue;
      }
      if (sourceSize !== file.size) {
        log.warn({ source: source.targetPath, expected: file.size, actual: sourceSize }, 'Unexpected size, not backed up');
        result.unexpectedSize.push(source.targetPath);
        continue;
      }

      if ((await regularFileSize(dest.targetPath)) === file.size) {
        result.upToDate++;
        continue;
      }

      await copyAtomic(source.targetPath, dest.targetPath);
      log.info({ target: dest.targetPath }, 'Backed up file');
      result.copied.push(dest.targetPath);
      touched = true;
    }

    if (!touched) {
      continue;
    }
    for (const sidecar of [INFO_FILENAME, SERIAL_FILENAME]) {
      const source = path.join(sourceRoot, item.id, sidecar);
      if ((await regularFileSize(source)) === null) {
        continue;
      }
      const dest = path.join(destRoot, item.id, sidecar);
      await copyAtomic(source, dest);
      result.copied.push(dest);
    }
  }

  return result;
}
