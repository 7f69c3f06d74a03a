/**
 * JSON-over-HTTP catalog client.
 *
 * Endpoints (relative to the configured base URL):
 *   GET /v1/library?page=N   -> { page, totalPages, items: [{ id, updated }] }
 *   GET /v1/library/{id}     -> { id, title, notes?, serial?, files: [...] }
 *
 * Every request carries the session's bearer token. Statuses are mapped onto
 * the shared error taxonomy; payloads are validated before they reach the
 * sync engine.
 */

import {
  AuthExpiredError,
  CatalogFormatError,
  HttpStatusError,
  TransientNetworkError,
  UnknownItemError,
} from '../errors.js';
import { ANY_TAG, FILE_KINDS, type FileKind, type FileRecord } from '../manifest/types.js';
import { isTransientStatus, toTransientError } from '../util/http.js';
import { isSafePathSegment } from '../util/paths.js';
import type { CatalogClient, CatalogEntry, CatalogSession, ItemRecord } from './types.js';

export interface HttpCatalogClientOptions {
  /** Service base URL, e.g. https://catalog.example.com */
  baseUrl: string;

  /** Per-request timeout (default: 30000) */
  timeoutMs?: number;

  /** Safety limit on enumeration pages (default: 500) */
  maxPages?: number;

  /** Injected for tests */
  fetchFn?: typeof fetch;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function isFileKind(value: unknown): value is FileKind {
  return typeof value === 'string' && FILE_KINDS.some((kind) => kind === value);
}

export class HttpCatalogClient implements CatalogClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly maxPages: number;
  private readonly fetchFn: typeof fetch;

  constructor(options: HttpCatalogClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.maxPages = options.maxPages ?? 500;
    this.fetchFn = options.fetchFn ?? globalThis.fetch;
  }

  async enumerate(session: CatalogSession): Promise<CatalogEntry[]> {
    const entries: CatalogEntry[] = [];
    const seen = new Set<string>();
    let page = 1;
    let totalPages = 1;

    do {
      const body = await this.getJson(session, `/v1/library?page=${page}`);
      const parsed = parseLibraryPage(body);
      totalPages = parsed.totalPages;
      for (const entry of parsed.items) {
        // Pages can shift while we walk them; keep the first sighting.
        if (!seen.has(entry.id)) {
          seen.add(entry.id);
          entries.push(entry);
        }
      }
      page++;
    } while (page <= totalPages && page <= this.maxPages);

    return entries;
  }

  async fetchDetail(session: CatalogSession, id: string): Promise<ItemRecord> {
    const body = await this.getJson(session, `/v1/library/${encodeURIComponent(id)}`, id);
    return parseItemRecord(body, id, this.baseUrl);
  }

  private async getJson(session: CatalogSession, urlPath: string, itemId?: string): Promise<unknown> {
    const url = `${this.baseUrl}${urlPath}`;

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method: 'GET',
        headers: {
          Authorization: `Bearer ${session.accessToken}`,
          Accept: 'application/json',
        },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw toTransientError(url, err);
    }

    if (response.status === 401 || response.status === 403) {
      throw new AuthExpiredError();
    }
    if (response.status === 404 && itemId !== undefined) {
      throw new UnknownItemError(itemId, 'the remote catalog');
    }
    if (isTransientStatus(response.status)) {
      throw new TransientNetworkError(`${url} answered HTTP ${response.status}`, response.status);
    }
    if (!response.ok) {
      throw new HttpStatusError(url, response.status);
    }

    try {
      return await response.json();
    } catch (err) {
      if (err instanceof SyntaxError) {
        throw new CatalogFormatError(`${url} did not return JSON`);
      }
      throw toTransientError(url, err);
    }
  }
}

// ── Payload validation ───────────────────────────────────────────────────────

export function parseLibraryPage(body: unknown): { totalPages: number; items: CatalogEntry[] } {
  if (!isRecord(body) || !Array.isArray(body['items'])) {
    throw new CatalogFormatError('Library page is missing its items');
  }
  const totalPages = body['totalPages'];
  if (typeof totalPages !== 'number' || !Number.isInteger(totalPages) || totalPages < 0) {
    throw new CatalogFormatError('Library page has no valid totalPages');
  }

  const items: CatalogEntry[] = [];
  for (const raw of body['items']) {
    if (!isRecord(raw) || typeof raw['id'] !== 'string' || !isSafePathSegment(raw['id'])) {
      throw new CatalogFormatError('Library entry without a valid id');
    }
    items.push({ id: raw['id'], updated: raw['updated'] === true });
  }
  return { totalPages, items };
}

function parseFileRecord(raw: unknown, itemId: string, baseUrl: string): FileRecord {
  if (!isRecord(raw)) {
    throw new CatalogFormatError(`Item "${itemId}" has a malformed file entry`);
  }
  const { filename, url, size, checksum, kind, os, lang, updated } = raw;
  if (typeof filename !== 'string' || !isSafePathSegment(filename)) {
    throw new CatalogFormatError(`Item "${itemId}" has a file with an invalid name`);
  }
  if (typeof url !== 'string' || url === '') {
    throw new CatalogFormatError(`${itemId}/${filename} has no URL`);
  }
  if (typeof size !== 'number' || !Number.isInteger(size) || size < 0) {
    throw new CatalogFormatError(`${itemId}/${filename} has no valid size`);
  }
  if (checksum !== undefined && checksum !== null && (typeof checksum !== 'string' || !/^[0-9a-fA-F]+$/.test(checksum))) {
    throw new CatalogFormatError(`${itemId}/${filename} has a malformed checksum`);
  }
  if (!isFileKind(kind)) {
    throw new CatalogFormatError(`${itemId}/${filename} has unknown kind ${String(kind)}`);
  }

  return {
    filename,
    url: new URL(url, `${baseUrl}/`).toString(),
    size,
    checksum: typeof checksum === 'string' ? checksum.toLowerCase() : null,
    kind,
    os: typeof os === 'string' && os !== '' ? os : ANY_TAG,
    lang: typeof lang === 'string' && lang !== '' ? lang : ANY_TAG,
    updated: updated === true,
  };
}

export function parseItemRecord(body: unknown, expectedId: string, baseUrl: string): ItemRecord {
  if (!isRecord(body)) {
    throw new CatalogFormatError(`Detail for "${expectedId}" is not an object`);
  }
  const { id, title, notes, serial, files } = body;
  if (id !== expectedId) {
    throw new CatalogFormatError(`Asked for "${expectedId}" but received "${String(id)}"`);
  }
  if (typeof title !== 'string') {
    throw new CatalogFormatError(`Item "${expectedId}" has no title`);
  }
  if (!Array.isArray(files)) {
    throw new CatalogFormatError(`Item "${expectedId}" has no file list`);
  }

  const parsedFiles: FileRecord[] = [];
  const names = new Set<string>();
  for (const raw of files) {
    const file = parseFileRecord(raw, expectedId, baseUrl);
    if (names.has(file.filename)) {
      throw new CatalogFormatError(`Item "${expectedId}" lists "${file.filename}" twice`);
    }
    names.add(file.filename);
    parsedFiles.push(file);
  }

  const record: ItemRecord = {
    id: expectedId,
    title,
    notes: typeof notes === 'string' ? notes : '',
    files: parsedFiles,
  };
  if (typeof serial === 'string' && serial.trim() !== '') {
    record.serial = serial;
  }
  return record;
}
