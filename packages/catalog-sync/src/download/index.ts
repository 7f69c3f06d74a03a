export { DownloadManager } from './download-manager.js';
export type { DownloadManagerOptions, TypedDownloadManagerEmitter } from './download-manager.js';
export { DownloadScheduler, selectedKinds, toManifestFilter } from './scheduler.js';
export { FileFetcher, parseContentRangeStart } from './file-fetcher.js';
export type { FileFetcherOptions } from './file-fetcher.js';
export { buildDownloadConfig, validateDownloadConfig, MAX_CONCURRENCY } from './config.js';
export {
  INFO_FILENAME,
  SERIAL_FILENAME,
  PARTIAL_SUFFIX,
  createTask,
  itemDirFor,
  kindDir,
  targetPathFor,
  tempPathFor,
} from './layout.js';
export { renderInfo, writeSidecars } from './sidecar.js';
export { runPool } from './worker-pool.js';
export type {
  DownloadConfig,
  DownloadFilter,
  DownloadManagerEvents,
  DownloadRunSummary,
  DownloadTask,
  FetchHooks,
  FetchResult,
  ScheduledTask,
  SchedulerConfig,
  SkipReason,
  TaskFailure,
  TaskState,
} from './types.js';
