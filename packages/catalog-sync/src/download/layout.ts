/**
 * On-disk layout of the download root.
 *
 *   <root>/<itemId>/<filename>             installers
 *   <root>/<itemId>/extras/<filename>
 *   <root>/<itemId>/patches/<filename>
 *   <root>/<itemId>/langpacks/<filename>
 *   <root>/<itemId>/!info.txt, !serial.txt
 */

import * as path from 'node:path';
import type { FileKind, FileRecord, Item } from '../manifest/types.js';
import type { DownloadTask } from './types.js';

export const INFO_FILENAME = '!info.txt';
export const SERIAL_FILENAME = '!serial.txt';
export const PARTIAL_SUFFIX = '.part';

const KIND_DIRS: Record<FileKind, string> = {
  installer: '',
  extra: 'extras',
  patch: 'patches',
  'language-pack': 'langpacks',
};

export function kindDir(kind: FileKind): string {
  return KIND_DIRS[kind];
}

export function itemDirFor(rootDir: string, itemId: string): string {
  return path.join(rootDir, itemId);
}

export function targetPathFor(rootDir: string, itemId: string, file: FileRecord): string {
  return path.join(rootDir, itemId, kindDir(file.kind), file.filename);
}

export function tempPathFor(targetPath: string): string {
  return `${targetPath}${PARTIAL_SUFFIX}`;
}

export function createTask(rootDir: string, item: Item, file: FileRecord): DownloadTask {
  const targetPath = targetPathFor(rootDir, item.id, file);
  return {
    item,
    file,
    itemDir: itemDirFor(rootDir, item.id),
    targetPath,
    tempPath: tempPathFor(targetPath),
  };
}
