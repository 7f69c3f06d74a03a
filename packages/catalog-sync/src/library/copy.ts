import * as fs from 'node:fs';
import * as fsp from 'node:fs/promises';
import * as path from 'node:path';
import { toFilesystemError } from '../errors.js';
import { tempPathFor } from '../download/layout.js';

/**
 * Copy `src` to `dest` through `<dest>.part` and a rename, so `dest` is
 * either absent, the old file, or the complete copy.
 */
export async function copyAtomic(src: string, dest: string): Promise<void> {
  const tmp = tempPathFor(dest);
  try {
    await fsp.mkdir(path.dirname(dest), { recursive: true });
    await fsp.copyFile(src, tmp);
    await fsp.rename(tmp, dest);
  } catch (err) {
    await fsp.rm(tmp, { force: true });
    throw toFilesystemError(dest, err);
  }
}

/**
 * Recursively collect regular files below `rootDir` as absolute paths,
 * sorted by name within each directory. Symlinks are not followed.
 *
 * @throws FilesystemError when a directory cannot be read
 */
export async function walkFiles(rootDir: string): Promise<string[]> {
  const results: string[] = [];

  let entries: fs.Dirent[];
  try {
    entries = await fsp.readdir(rootDir, { withFileTypes: true });
  } catch (err) {
    throw toFilesystemError(rootDir, err);
  }
  entries.sort((a, b) => a.name.localeCompare(b.name));

  for (const entry of entries) {
    const absPath = path.join(rootDir, entry.name);
    if (entry.isDirectory()) {
      results.push(...(await walkFiles(absPath)));
    } else if (entry.isFile()) {
      results.push(absPath);
    }
  }

  return results;
}
