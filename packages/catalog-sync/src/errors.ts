/**
 * Error taxonomy shared by the sync engine, the downloader and the verifier.
 *
 * `fatal` errors abort the whole run (manifest corruption, expired session,
 * invalid configuration). Everything else is scoped to one item or one file
 * and ends up in the run summary.
 */

export type ErrorCode =
  | 'TransientNetworkError'
  | 'AuthExpired'
  | 'CorruptManifest'
  | 'SizeMismatch'
  | 'ChecksumMismatch'
  | 'ArchiveCorrupt'
  | 'FilesystemError'
  | 'UnknownItem'
  | 'FetchFailed'
  | 'CatalogFormat'
  | 'HttpError'
  | 'ConfigError';

export class GamecrateError extends Error {
  public readonly code: ErrorCode;
  public readonly fatal: boolean;

  constructor(code: ErrorCode, message: string, options?: { fatal?: boolean; cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'GamecrateError';
    this.code = code;
    this.fatal = options?.fatal ?? false;
  }
}

/** Timeouts, connection resets, 408/429 and 5xx replies. Retried with backoff. */
export class TransientNetworkError extends GamecrateError {
  public readonly statusCode: number | null;

  constructor(message: string, statusCode: number | null = null, cause?: unknown) {
    super('TransientNetworkError', message, { cause });
    this.name = 'TransientNetworkError';
    this.statusCode = statusCode;
  }
}

export class AuthExpiredError extends GamecrateError {
  constructor(message = 'Session expired. Run "gamecrate auth login" to re-authenticate.') {
    super('AuthExpired', message, { fatal: true });
    this.name = 'AuthExpiredError';
  }
}

export class CorruptManifestError extends GamecrateError {
  public readonly manifestPath: string;

  constructor(manifestPath: string, detail: string, cause?: unknown) {
    super('CorruptManifest', `Manifest ${manifestPath} is corrupt: ${detail}`, { fatal: true, cause });
    this.name = 'CorruptManifestError';
    this.manifestPath = manifestPath;
  }
}

export class SizeMismatchError extends GamecrateError {
  public readonly expected: number;
  public readonly actual: number;

  constructor(filePath: string, expected: number, actual: number) {
    super('SizeMismatch', `${filePath}: expected ${expected} bytes, got ${actual}`);
    this.name = 'SizeMismatchError';
    this.expected = expected;
    this.actual = actual;
  }
}

export class ChecksumMismatchError extends GamecrateError {
  public readonly expected: string;
  public readonly actual: string;

  constructor(filePath: string, expected: string, actual: string) {
    super('ChecksumMismatch', `${filePath}: expected checksum ${expected}, got ${actual}`);
    this.name = 'ChecksumMismatchError';
    this.expected = expected;
    this.actual = actual;
  }
}

export class ArchiveCorruptError extends GamecrateError {
  constructor(filePath: string, detail: string) {
    super('ArchiveCorrupt', `${filePath}: archive is corrupt (${detail})`);
    this.name = 'ArchiveCorruptError';
  }
}

/** Permission denied, disk full and friends. Fatal for the affected file only. */
export class FilesystemError extends GamecrateError {
  public readonly path: string;
  public readonly errno: string | undefined;

  constructor(filePath: string, message: string, errno?: string, cause?: unknown) {
    super('FilesystemError', `${filePath}: ${message}`, { cause });
    this.name = 'FilesystemError';
    this.path = filePath;
    this.errno = errno;
  }
}

export class UnknownItemError extends GamecrateError {
  public readonly itemId: string;

  constructor(itemId: string, where: string) {
    super('UnknownItem', `Unknown item "${itemId}": not found in ${where}`, { fatal: true });
    this.name = 'UnknownItemError';
    this.itemId = itemId;
  }
}

export class FetchFailedError extends GamecrateError {
  public readonly attempts: number;

  constructor(url: string, attempts: number, cause?: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('FetchFailed', `Giving up on ${url} after ${attempts} attempt(s): ${reason}`, { cause });
    this.name = 'FetchFailedError';
    this.attempts = attempts;
  }
}

/** A non-retryable HTTP status (4xx other than a resumable range conflict). */
export class HttpStatusError extends GamecrateError {
  public readonly statusCode: number;

  constructor(url: string, statusCode: number) {
    super('HttpError', `${url} answered HTTP ${statusCode}`);
    this.name = 'HttpStatusError';
    this.statusCode = statusCode;
  }
}

export class CatalogFormatError extends GamecrateError {
  constructor(message: string) {
    super('CatalogFormat', message);
    this.name = 'CatalogFormatError';
  }
}

export class ConfigError extends GamecrateError {
  public readonly problems: string[];

  constructor(scope: string, problems: string[]) {
    super('ConfigError', `Invalid ${scope} config: ${problems.join('; ')}`, { fatal: true });
    this.name = 'ConfigError';
    this.problems = problems;
  }
}

export function isFatalError(err: unknown): boolean {
  return err instanceof GamecrateError && err.fatal;
}

const FILESYSTEM_ERRNOS = new Set([
  'EACCES',
  'EPERM',
  'ENOSPC',
  'EROFS',
  'EISDIR',
  'ENOTDIR',
  'EEXIST',
  'EMFILE',
  'EDQUOT',
  'ENOENT',
]);

export function errnoOf(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/** True when `err` is a Node system error raised by the local filesystem. */
export function isFilesystemErrno(err: unknown): boolean {
  const code = errnoOf(err);
  return code !== undefined && FILESYSTEM_ERRNOS.has(code);
}

export function toFilesystemError(filePath: string, err: unknown): FilesystemError {
  if (err instanceof FilesystemError) {
    return err;
  }
  const message = err instanceof Error ? err.message : String(err);
  return new FilesystemError(filePath, message, errnoOf(err), err);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
