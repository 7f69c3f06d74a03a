export { importFiles } from './import.js';
export type { ImportedFile, ImportResult } from './import.js';
export { backupFiles } from './backup.js';
export type { BackupResult } from './backup.js';
export { copyAtomic, walkFiles } from './copy.js';
