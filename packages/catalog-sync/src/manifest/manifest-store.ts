/**
 * Manifest persistence and queries.
 *
 * The manifest is stored as YAML. Items are written as an ordered sequence
 * of entries keyed by `id` so insertion order survives a round trip even for
 * numeric-looking identifiers.
 */

import * as fsp from 'node:fs/promises';
import * as path from 'node:path';
import * as yaml from 'js-yaml';
import { CorruptManifestError, errnoOf, toFilesystemError } from '../errors.js';
import { isSafePathSegment } from '../util/paths.js';
import {
  ANY_TAG,
  FILE_KINDS,
  type FileKind,
  type FileRecord,
  type Item,
  type Manifest,
  type ManifestFilter,
  type ManifestMatch,
} from './types.js';

export const MANIFEST_VERSION = 1;

interface PersistedFile {
  filename: string;
  url: string;
  size: number;
  checksum: string | null;
  kind: FileKind;
  os: string;
  lang: string;
  updated: boolean;
}

interface PersistedItem {
  id: string;
  title: string;
  notes: string;
  serial?: string;
  syncedAt: string;
  files: PersistedFile[];
}

interface PersistedManifest {
  version: 1;
  items: PersistedItem[];
}

export function createEmptyManifest(): Manifest {
  return { version: MANIFEST_VERSION, items: new Map() };
}

// ── Validation ───────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function isFileKind(value: unknown): value is FileKind {
  return typeof value === 'string' && FILE_KINDS.some((kind) => kind === value);
}

function parseFile(raw: unknown, where: string): FileRecord {
  if (!isRecord(raw)) {
    throw new Error(`${where} is not a mapping`);
  }
  const { filename, url, size, checksum, kind, os, lang, updated } = raw;
  if (typeof filename !== 'string' || !isSafePathSegment(filename)) {
    throw new Error(`${where}.filename must be a plain file name`);
  }
  if (typeof url !== 'string') {
    throw new Error(`${where}.url must be a string`);
  }
  if (typeof size !== 'number' || !Number.isInteger(size) || size < 0) {
    throw new Error(`${where}.size must be a non-negative integer`);
  }
  if (checksum !== null && typeof checksum !== 'string') {
    throw new Error(`${where}.checksum must be a string or null`);
  }
  if (!isFileKind(kind)) {
    throw new Error(`${where}.kind must be one of ${FILE_KINDS.join(', ')}`);
  }
  if (typeof os !== 'string' || typeof lang !== 'string') {
    throw new Error(`${where}.os and .lang must be strings`);
  }
  if (typeof updated !== 'boolean') {
    throw new Error(`${where}.updated must be a boolean`);
  }
  return { filename, url, size, checksum, kind, os, lang, updated };
}

function parseItem(raw: unknown, where: string): Item {
  if (!isRecord(raw)) {
    throw new Error(`${where} is not a mapping`);
  }
  const { id, title, notes, serial, syncedAt, files } = raw;
  if (typeof id !== 'string' || !isSafePathSegment(id)) {
    throw new Error(`${where}.id must be a non-empty string usable as a directory name`);
  }
  if (typeof title !== 'string' || typeof notes !== 'string') {
    throw new Error(`${where}.title and .notes must be strings`);
  }
  if (serial !== undefined && typeof serial !== 'string') {
    throw new Error(`${where}.serial must be a string`);
  }
  if (typeof syncedAt !== 'string') {
    throw new Error(`${where}.syncedAt must be a string`);
  }
  if (!Array.isArray(files)) {
    throw new Error(`${where}.files must be a sequence`);
  }

  const parsedFiles: FileRecord[] = [];
  const seen = new Set<string>();
  files.forEach((file: unknown, index) => {
    const record = parseFile(file, `${where}.files[${index}]`);
    if (seen.has(record.filename)) {
      throw new Error(`${where} lists "${record.filename}" twice`);
    }
    seen.add(record.filename);
    parsedFiles.push(record);
  });

  const item: Item = { id, title, notes, syncedAt, files: parsedFiles };
  if (serial !== undefined) {
    item.serial = serial;
  }
  return item;
}

/**
 * Parse the persisted YAML text of a manifest.
 * Throws a plain Error describing the first problem found.
 */
export function parseManifest(content: string): Manifest {
  const parsed: unknown = yaml.load(content);
  if (!isRecord(parsed)) {
    throw new Error('top level is not a mapping');
  }
  if (parsed['version'] !== MANIFEST_VERSION) {
    throw new Error(`unsupported version ${String(parsed['version'])}`);
  }
  const items = parsed['items'];
  if (!Array.isArray(items)) {
    throw new Error('items must be a sequence');
  }

  const manifest = createEmptyManifest();
  items.forEach((raw: unknown, index) => {
    const item = parseItem(raw, `items[${index}]`);
    if (manifest.items.has(item.id)) {
      throw new Error(`item "${item.id}" appears twice`);
    }
    manifest.items.set(item.id, item);
  });
  return manifest;
}

// ── Serialization ────────────────────────────────────────────────────────────

function toPersisted(manifest: Manifest): PersistedManifest {
  const items: PersistedItem[] = [];
  for (const item of manifest.items.values()) {
    const entry: PersistedItem = {
      id: item.id,
      title: item.title,
      notes: item.notes,
      syncedAt: item.syncedAt,
      files: item.files.map((f) => ({
        filename: f.filename,
        url: f.url,
        size: f.size,
        checksum: f.checksum,
        kind: f.kind,
        os: f.os,
        lang: f.lang,
        updated: f.updated,
      })),
    };
    if (item.serial !== undefined) {
      entry.serial = item.serial;
    }
    items.push(entry);
  }
  return { version: MANIFEST_VERSION, items };
}

export function serializeManifest(manifest: Manifest): string {
  return yaml.dump(toPersisted(manifest), { lineWidth: -1, noRefs: true });
}

// ── Load / save ──────────────────────────────────────────────────────────────

/**
 * Load the manifest at `manifestPath`.
 * A missing file is a first run and yields an empty manifest.
 *
 * @throws CorruptManifestError when the file cannot be parsed or validated
 */
export async function loadManifest(manifestPath: string): Promise<Manifest> {
  let content: string;
  try {
    content = await fsp.readFile(manifestPath, 'utf-8');
  } catch (err) {
    if (errnoOf(err) === 'ENOENT') {
      return createEmptyManifest();
    }
    throw toFilesystemError(manifestPath, err);
  }

  try {
    return parseManifest(content);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new CorruptManifestError(manifestPath, detail, err);
  }
}

/**
 * Write the manifest to a sibling temporary file, flush it, and rename it
 * over the target so readers only ever see a complete manifest.
 */
export async function saveManifest(manifestPath: string, manifest: Manifest): Promise<void> {
  const tmpPath = `${manifestPath}.tmp`;
  const content = serializeManifest(manifest);

  try {
    await fsp.mkdir(path.dirname(manifestPath), { recursive: true });
    const handle = await fsp.open(tmpPath, 'w');
    try {
      await handle.writeFile(content, 'utf-8');
      await handle.sync();
    } finally {
      await handle.close();
    }
    await fsp.rename(tmpPath, manifestPath);
  } catch (err) {
    await fsp.rm(tmpPath, { force: true });
    throw toFilesystemError(manifestPath, err);
  }
}

// ── Mutation and queries ─────────────────────────────────────────────────────

/**
 * Insert or wholesale-replace an item. A replaced item keeps its position.
 */
export function upsertItem(manifest: Manifest, item: Item): void {
  manifest.items.set(item.id, item);
}

export function tagMatches(allowed: readonly string[] | undefined, tag: string): boolean {
  if (!allowed || allowed.length === 0) {
    return true;
  }
  return tag === ANY_TAG || allowed.includes(tag);
}

export function fileMatches(file: FileRecord, filter: ManifestFilter): boolean {
  if (!tagMatches(filter.os, file.os)) return false;
  if (!tagMatches(filter.lang, file.lang)) return false;
  if (filter.kinds && filter.kinds.length > 0 && !filter.kinds.includes(file.kind)) return false;
  return true;
}

/**
 * All (item, file) pairs matching `filter`, in manifest insertion order.
 */
export function queryManifest(manifest: Manifest, filter: ManifestFilter = {}): ManifestMatch[] {
  const matches: ManifestMatch[] = [];
  for (const item of manifest.items.values()) {
    if (filter.itemId !== undefined && item.id !== filter.itemId) {
      continue;
    }
    for (const file of item.files) {
      if (fileMatches(file, filter)) {
        matches.push({ item, file });
      }
    }
  }
  return matches;
}
