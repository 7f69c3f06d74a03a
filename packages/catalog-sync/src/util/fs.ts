import * as fsp from 'node:fs/promises';
import { errnoOf, toFilesystemError } from '../errors.js';

/**
 * Size of the regular file at `filePath`, or null when nothing is there.
 * Always hits the filesystem.
 *
 * @throws FilesystemError for anything other than a missing file
 */
export async function regularFileSize(filePath: string): Promise<number | null> {
  try {
    const stats = await fsp.stat(filePath);
    return stats.isFile() ? stats.size : null;
  } catch (err) {
    const code = errnoOf(err);
    if (code === 'ENOENT' || code === 'ENOTDIR') {
      return null;
    }
    throw toFilesystemError(filePath, err);
  }
}

/** Remove a file if present; other failures surface as FilesystemError. */
export async function removeFile(filePath: string): Promise<void> {
  try {
    await fsp.rm(filePath, { force: true });
  } catch (err) {
    throw toFilesystemError(filePath, err);
  }
}
