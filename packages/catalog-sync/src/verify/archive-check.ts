/**
 * Full consistency scan of zip archives: every entry is inflated and its
 * CRC32 compared against the central directory.
 */

import * as fsp from 'node:fs/promises';
import JSZip from 'jszip';
import { errnoOf, errorMessage, toFilesystemError } from '../errors.js';

/** Largest file `fs.readFile` returns in one buffer (2 GiB - 1) */
export const MAX_SCANNABLE_BYTES = 2 ** 31 - 1;

export type ArchiveScanResult =
  | { status: 'ok'; entries: number }
  | { status: 'corrupt'; detail: string }
  | { status: 'unsupported'; detail: string };

export function isArchivePath(filePath: string): boolean {
  return filePath.toLowerCase().endsWith('.zip');
}

/**
 * @throws FilesystemError when the file cannot be read
 */
export async function scanZipArchive(filePath: string): Promise<ArchiveScanResult> {
  let content: Buffer;
  try {
    const stats = await fsp.stat(filePath);
    if (stats.size > MAX_SCANNABLE_BYTES) {
      return { status: 'unsupported', detail: `too large to scan in memory (${stats.size} bytes)` };
    }
    content = await fsp.readFile(filePath);
  } catch (err) {
    if (errnoOf(err) === 'ERR_FS_FILE_TOO_LARGE') {
      return { status: 'unsupported', detail: errorMessage(err) };
    }
    throw toFilesystemError(filePath, err);
  }

  try {
    const zip = await JSZip.loadAsync(content, { checkCRC32: true });
    const entries = Object.values(zip.files).filter((entry) => !entry.dir);
    for (const entry of entries) {
      await entry.async('uint8array');
    }
    return { status: 'ok', entries: entries.length };
  } catch (err) {
    return { status: 'corrupt', detail: errorMessage(err) };
  }
}
