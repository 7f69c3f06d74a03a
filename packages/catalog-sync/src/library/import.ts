/**
 * Import already-downloaded files from an arbitrary directory tree.
 *
 * Every regular file whose size matches a manifest entry is hashed with the
 * algorithms that entry's checksum uses; a match is copied to its place in
 * the download root unless an identical file is already there.
 */

import type { Logger } from 'pino';
import { createTask } from '../download/layout.js';
import type { FileRecord, Item, Manifest } from '../manifest/types.js';
import { regularFileSize } from '../util/fs.js';
import { algorithmForChecksum, hashFile, hashFileMulti, type HashAlgorithm } from '../verify/file-hasher.js';
import { copyAtomic, walkFiles } from './copy.js';

interface Candidate {
  item: Item;
  file: FileRecord;
  algorithm: HashAlgorithm;
  checksum: string;
}

export interface ImportedFile {
  source: string;
  target: string;
  itemId: string;
  filename: string;
}

export interface ImportResult {
  /** Regular files found below the source directory */
  scanned: number;

  /** Files whose content matched a manifest checksum */
  matched: number;

  copied: ImportedFile[];

  /** Matches whose target already held identical content */
  alreadyPresent: number;
}

/** Manifest files with a usable checksum, grouped by declared size. */
function indexBySize(manifest: Manifest): Map<number, Candidate[]> {
  const index = new Map<number, Candidate[]>();
  for (const item of manifest.items.values()) {
    for (const file of item.files) {
      if (file.checksum === null) continue;
      const algorithm = algorithmForChecksum(file.checksum);
      if (algorithm === null) continue;

      const bucket = index.get(file.size) ?? [];
      bucket.push({ item, file, algorithm, checksum: file.checksum.toLowerCase() });
      index.set(file.size, bucket);
    }
  }
  return index;
}

export async function importFiles(
  manifest: Manifest,
  sourceDir: string,
  destRoot: string,
  logger: Logger
): Promise<ImportResult> {
  const log = logger.child({ component: 'library-import' });
  const index = indexBySize(manifest);
  const sources = await walkFiles(sourceDir);
  log.info({ sourceDir, files: sources.length }, 'Scanning for known files');

  const result: ImportResult = { scanned: sources.length, matched: 0, copied: [], alreadyPresent: 0 };

  for (const source of sources) {
    const size = await regularFileSize(source);
    const candidates = size === null ? undefined : index.get(size);
    if (!candidates) {
      continue;
    }

    const digests = await hashFileMulti(
      source,
      candidates.map((c) => c.algorithm)
    );
    const match = candidates.find((c) => digests.get(c.algorithm) === c.checksum);
    if (!match) {
      continue;
    }
    result.matched++;

    const target = createTask(destRoot, match.item, match.file).targetPath;
    if ((await regularFileSize(target)) === match.file.size) {
      const existing = await hashFile(target, match.algorithm);
      if (existing.hash === match.checksum) {
        log.debug({ source, target }, 'Identical file already in place');
        result.alreadyPresent++;
        continue;
      }
    }

    await copyAtomic(source, target);
    log.info({ source, target, checksum: match.checksum }, 'Imported file');
    result.copied.push({ source, target, itemId: match.item.id, filename: match.file.filename });
  }

  return result;
}
