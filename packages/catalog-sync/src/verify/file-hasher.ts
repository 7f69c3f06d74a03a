/**
 * Streaming content hashes for downloaded files.
 *
 * The digest algorithm is inferred from the length of the declared hex
 * checksum, so manifests may carry md5, sha1 or sha256 values.
 */

import * as crypto from 'node:crypto';
import * as fs from 'node:fs';
import { toFilesystemError } from '../errors.js';

export type HashAlgorithm = 'md5' | 'sha1' | 'sha256';

export interface FileHashResult {
  hash: string;
  algorithm: HashAlgorithm;
  sizeBytes: number;
}

const ALGORITHM_BY_HEX_LENGTH: ReadonlyMap<number, HashAlgorithm> = new Map([
  [32, 'md5'],
  [40, 'sha1'],
  [64, 'sha256'],
]);

/** Algorithm that produces a digest like `checksum`, or null if none does. */
export function algorithmForChecksum(checksum: string): HashAlgorithm | null {
  if (!/^[0-9a-fA-F]+$/.test(checksum)) {
    return null;
  }
  return ALGORITHM_BY_HEX_LENGTH.get(checksum.length) ?? null;
}

/**
 * Compute the hash of a file using a streaming approach.
 *
 * @throws FilesystemError if the file cannot be read
 */
export async function hashFile(filePath: string, algorithm: HashAlgorithm = 'sha256'): Promise<FileHashResult> {
  return new Promise<FileHashResult>((resolve, reject) => {
    const hash = crypto.createHash(algorithm);
    let sizeBytes = 0;

    const stream = fs.createReadStream(filePath);

    stream.on('data', (chunk: string | Buffer) => {
      sizeBytes += chunk.length;
      hash.update(chunk);
    });

    stream.on('end', () => {
      resolve({ hash: hash.digest('hex'), algorithm, sizeBytes });
    });

    stream.on('error', (err: Error) => {
      reject(toFilesystemError(filePath, err));
    });
  });
}

/**
 * Hash a file once per requested algorithm in a single read.
 */
export async function hashFileMulti(
  filePath: string,
  algorithms: readonly HashAlgorithm[]
): Promise<Map<HashAlgorithm, string>> {
  return new Promise<Map<HashAlgorithm, string>>((resolve, reject) => {
    const hashes = [...new Set(algorithms)].map((algorithm) => ({
      algorithm,
      hash: crypto.createHash(algorithm),
    }));

    const stream = fs.createReadStream(filePath);

    stream.on('data', (chunk: string | Buffer) => {
      for (const entry of hashes) {
        entry.hash.update(chunk);
      }
    });

    stream.on('end', () => {
      resolve(new Map(hashes.map((entry) => [entry.algorithm, entry.hash.digest('hex')])));
    });

    stream.on('error', (err: Error) => {
      reject(toFilesystemError(filePath, err));
    });
  });
}
