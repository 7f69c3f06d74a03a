export { SyncEngine } from './sync-engine.js';
export type { SyncEngineOptions } from './sync-engine.js';
export { buildSyncConfig, validateSyncConfig, DEFAULT_MANIFEST_PATH } from './config.js';
export { MERGE_POLICIES } from './types.js';
export type { MergePolicy, SyncConfig, SyncFailure, SyncRunResult } from './types.js';
