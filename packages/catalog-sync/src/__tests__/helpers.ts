import * as crypto from 'node:crypto';
import { pino, type Logger } from 'pino';
import type { FileRecord, Item } from '../manifest/types.js';

export const FIXED_NOW = new Date('2024-05-01T12:00:00.000Z');

export function createTestLogger(): Logger {
  return pino({ level: 'silent' });
}

export function md5(content: string | Buffer): string {
  return crypto.createHash('md5').update(content).digest('hex');
}

export function makeFile(overrides: Partial<FileRecord> = {}): FileRecord {
  const filename = overrides.filename ?? 'setup.exe';
  return {
    filename,
    url: `https://cdn.test/files/${filename}`,
    size: 10,
    checksum: null,
    kind: 'installer',
    os: 'windows',
    lang: 'en',
    updated: false,
    ...overrides,
  };
}

export function makeItem(id: string, files: FileRecord[] = [], overrides: Partial<Item> = {}): Item {
  return {
    id,
    title: `Title of ${id}`,
    notes: '',
    syncedAt: FIXED_NOW.toISOString(),
    files,
    ...overrides,
  };
}

export interface RecordedRequest {
  url: string;
  headers: Headers;
}

export type StubHandler = (
  url: string,
  headers: Headers,
  callIndex: number,
  signal: AbortSignal | undefined
) => Response | Promise<Response>;

/**
 * In-process stand-in for `fetch` that records every request.
 */
export function createFetchStub(handler: StubHandler): { fetchFn: typeof fetch; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];
  const fetchFn: typeof fetch = async (input, init) => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.toString() : input.url;
    const headers = new Headers(init?.headers);
    requests.push({ url, headers });
    return handler(url, headers, requests.length - 1, init?.signal ?? undefined);
  };
  return { fetchFn, requests };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

/** Sleep replacement that records requested delays and returns at once. */
export function createSleepRecorder(): { sleep: (ms: number) => Promise<void>; delays: number[] } {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms: number) => {
      delays.push(ms);
    },
  };
}
