/**
 * IntegrityVerifier - re-checks files on disk against the manifest.
 *
 * Every presence check stats the live file. Checksums are streamed, sizes
 * come from stat, and `.zip` files get a full entry scan. With the delete
 * disposition, files whose content fails a check are removed; a file that
 * could not be read is only reported. The manifest is never written.
 */

import type { Logger } from 'pino';
import {
  ArchiveCorruptError,
  ChecksumMismatchError,
  ConfigError,
  GamecrateError,
  SizeMismatchError,
  UnknownItemError,
  errorMessage,
  toFilesystemError,
  type ErrorCode,
} from '../errors.js';
import { createTask } from '../download/layout.js';
import { loadManifest } from '../manifest/manifest-store.js';
import type { FileRecord, Item, Manifest } from '../manifest/types.js';
import { regularFileSize, removeFile } from '../util/fs.js';
import { isArchivePath, scanZipArchive } from './archive-check.js';
import { validateVerifyConfig } from './config.js';
import { algorithmForChecksum, hashFile } from './file-hasher.js';
import type {
  FileStatus,
  ItemVerification,
  VerificationFailure,
  VerificationRecord,
  VerifyCheck,
  VerifyConfig,
  VerifySummary,
  VerifyTotals,
} from './types.js';

/** Failures that prove the file's content is wrong; only these lead to deletion. */
const CONTENT_FAILURES: ReadonlySet<ErrorCode> = new Set<ErrorCode>([
  'ChecksumMismatch',
  'SizeMismatch',
  'ArchiveCorrupt',
]);

function asFailure(err: GamecrateError): VerificationFailure {
  return { code: err.code, message: err.message };
}

/** failed beats missing beats passed */
export function aggregateStatus(records: readonly VerificationRecord[]): FileStatus {
  if (records.some((r) => r.status === 'failed')) return 'failed';
  if (records.some((r) => r.status === 'missing')) return 'missing';
  return 'passed';
}

export function summarize(items: ItemVerification[]): VerifySummary {
  const records = items.flatMap((item) => item.files);
  const countCode = (code: string): number =>
    records.filter((r) => r.failures.some((f) => f.code === code)).length;

  const totals: VerifyTotals = {
    files: records.length,
    present: records.filter((r) => r.status !== 'missing').length,
    missing: records.filter((r) => r.status === 'missing').length,
    passed: records.filter((r) => r.status === 'passed').length,
    failed: records.filter((r) => r.status === 'failed').length,
    checksumMismatches: countCode('ChecksumMismatch'),
    sizeMismatches: countCode('SizeMismatch'),
    archiveFailures: countCode('ArchiveCorrupt'),
    deleted: records.filter((r) => r.deleted).length,
  };
  return { items, totals };
}

export class IntegrityVerifier {
  private readonly config: VerifyConfig;
  private readonly logger: Logger;

  constructor(config: VerifyConfig, logger: Logger) {
    const errors = validateVerifyConfig(config);
    if (errors.length > 0) {
      throw new ConfigError('verify', errors);
    }

    this.config = config;
    this.logger = logger.child({ component: 'integrity-verifier' });
  }

  /**
   * Load the manifest from the configured path and verify it.
   *
   * @throws CorruptManifestError | UnknownItemError
   */
  async run(): Promise<VerifySummary> {
    const manifest = await loadManifest(this.config.manifestPath);
    return this.verifyManifest(manifest);
  }

  async verifyManifest(manifest: Manifest): Promise<VerifySummary> {
    const { itemId } = this.config;
    if (itemId !== undefined && !manifest.items.has(itemId)) {
      throw new UnknownItemError(itemId, 'the manifest');
    }

    const items: ItemVerification[] = [];
    for (const item of manifest.items.values()) {
      if (itemId !== undefined && item.id !== itemId) {
        continue;
      }

      const files: VerificationRecord[] = [];
      for (const file of item.files) {
        files.push(await this.verifyFile(item, file));
      }
      items.push({ itemId: item.id, title: item.title, status: aggregateStatus(files), files });
    }

    const summary = summarize(items);
    this.logger.info({ ...summary.totals }, 'Verification finished');
    return summary;
  }

  async verifyFile(item: Item, file: FileRecord): Promise<VerificationRecord> {
    const filePath = createTask(this.config.rootDir, item, file).targetPath;
    const log = this.logger.child({ itemId: item.id, filename: file.filename });

    const record: VerificationRecord = {
      itemId: item.id,
      filename: file.filename,
      path: filePath,
      status: 'passed',
      checks: { checksum: 'skipped', size: 'skipped', archive: 'skipped' },
      failures: [],
      deleted: false,
    };

    let actualSize: number | null;
    try {
      actualSize = await regularFileSize(filePath);
    } catch (err) {
      return this.fail(record, 'size', toFilesystemError(filePath, err), log);
    }
    if (actualSize === null) {
      log.info('Missing');
      record.status = 'missing';
      return record;
    }

    const enabled = (check: VerifyCheck): boolean => this.config.checks.includes(check);

    if (enabled('size')) {
      if (actualSize === file.size) {
        record.checks.size = 'pass';
      } else {
        this.fail(record, 'size', new SizeMismatchError(filePath, file.size, actualSize), log);
      }
    }
    if (enabled('checksum') && file.checksum !== null) {
      await this.checkChecksum(record, file.checksum, log);
    }
    if (enabled('archive') && isArchivePath(file.filename)) {
      await this.checkArchive(record, log);
    }

    const contentFailed = record.failures.some((f) => CONTENT_FAILURES.has(f.code));
    if (contentFailed && this.config.disposition === 'delete') {
      try {
        await removeFile(filePath);
        record.deleted = true;
        log.info('Deleted failed file');
      } catch (err) {
        log.error({ error: errorMessage(err) }, 'Could not delete failed file');
      }
    } else if (record.status === 'passed') {
      log.debug('Passed');
    }

    return record;
  }

  private async checkChecksum(record: VerificationRecord, checksum: string, log: Logger): Promise<void> {
    const algorithm = algorithmForChecksum(checksum);
    if (algorithm === null) {
      log.warn({ checksum }, 'Unrecognized checksum format, skipping checksum');
      return;
    }

    try {
      const { hash } = await hashFile(record.path, algorithm);
      const expected = checksum.toLowerCase();
      if (hash === expected) {
        record.checks.checksum = 'pass';
      } else {
        this.fail(record, 'checksum', new ChecksumMismatchError(record.path, expected, hash), log);
      }
    } catch (err) {
      this.fail(record, 'checksum', toFilesystemError(record.path, err), log);
    }
  }

  private async checkArchive(record: VerificationRecord, log: Logger): Promise<void> {
    try {
      const scan = await scanZipArchive(record.path);
      if (scan.status === 'ok') {
        record.checks.archive = 'pass';
      } else if (scan.status === 'corrupt') {
        this.fail(record, 'archive', new ArchiveCorruptError(record.path, scan.detail), log);
      } else {
        log.warn({ detail: scan.detail }, 'Archive scan skipped');
      }
    } catch (err) {
      this.fail(record, 'archive', toFilesystemError(record.path, err), log);
    }
  }

  private fail(record: VerificationRecord, check: VerifyCheck, err: GamecrateError, log: Logger): VerificationRecord {
    record.checks[check] = 'fail';
    record.failures.push(asFailure(err));
    record.status = 'failed';
    log.warn({ check, code: err.code }, err.message);
    return record;
  }
}
