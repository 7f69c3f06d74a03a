export {
  MANIFEST_VERSION,
  createEmptyManifest,
  fileMatches,
  loadManifest,
  parseManifest,
  queryManifest,
  saveManifest,
  serializeManifest,
  tagMatches,
  upsertItem,
} from './manifest-store.js';
export { ANY_TAG, FILE_KINDS, GAME_KINDS } from './types.js';
export type { FileKind, FileRecord, Item, Manifest, ManifestFilter, ManifestMatch } from './types.js';
