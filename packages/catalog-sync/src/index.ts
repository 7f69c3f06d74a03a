/**
 * @gamecrate/catalog-sync
 *
 * Keeps a local manifest of owned catalog items in step with the remote
 * service, downloads the files it describes, and re-verifies them on disk.
 */

export * from './errors.js';
export * from './manifest/index.js';
export * from './catalog/index.js';
export * from './sync/index.js';
export * from './download/index.js';
export * from './verify/index.js';
export * from './library/index.js';
export {
  DEFAULT_RETRY_POLICY,
  RetryExhaustedError,
  backoffDelay,
  defaultSleep,
  validateRetryPolicy,
  withRetry,
} from './util/retry.js';
export type { RetryOptions, RetryOutcome, RetryPolicy, SleepFn } from './util/retry.js';
export { isSafePathSegment } from './util/paths.js';
export { originOf } from './util/http.js';
