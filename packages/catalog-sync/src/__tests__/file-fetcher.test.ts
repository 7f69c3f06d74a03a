import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { FileFetcher, parseContentRangeStart, type FileFetcherOptions } from '../download/file-fetcher.js';
import { createTask } from '../download/layout.js';
import type { DownloadTask } from '../download/types.js';
import {
  createFetchStub,
  createSleepRecorder,
  createTestLogger,
  makeFile,
  makeItem,
  type StubHandler,
} from './helpers.js';

const CONTENT = '0123456789';

describe('FileFetcher', () => {
  let tmpDir: string;
  let task: DownloadTask;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'gamecrate-fetcher-test-'));
    const file = makeFile({ filename: 'game.bin', url: 'https://cdn.test/game.bin', size: CONTENT.length });
    task = createTask(tmpDir, makeItem('alpha', [file], { serial: 'KEY-123' }), file);
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function setup(handler: StubHandler, overrides: Partial<FileFetcherOptions> = {}) {
    const stub = createFetchStub(handler);
    const recorder = createSleepRecorder();
    const fetcher = new FileFetcher(
      {
        retry: { maxAttempts: 4, baseDelayMs: 1000, maxDelayMs: 60_000 },
        timeoutMs: 60_000,
        dryRun: false,
        fetchFn: stub.fetchFn,
        sleep: recorder.sleep,
        ...overrides,
      },
      createTestLogger()
    );
    return { fetcher, requests: stub.requests, delays: recorder.delays };
  }

  function writePartial(content: string): void {
    fs.mkdirSync(path.dirname(task.tempPath), { recursive: true });
    fs.writeFileSync(task.tempPath, content);
  }

  it('should download into place and write sidecars', async () => {
    const { fetcher, requests } = setup(() => new Response(CONTENT));

    const result = await fetcher.fetch(task);

    expect(result.state).toBe('completed');
    expect(result.requests).toBe(1);
    expect(result.bytesTransferred).toBe(10);
    expect(requests[0]?.headers.get('range')).toBeNull();
    expect(fs.readFileSync(task.targetPath, 'utf-8')).toBe(CONTENT);
    expect(fs.existsSync(task.tempPath)).toBe(false);
    expect(fs.existsSync(path.join(task.itemDir, '!info.txt'))).toBe(true);
    expect(fs.readFileSync(path.join(task.itemDir, '!serial.txt'), 'utf-8')).toBe('KEY-123');
  });

  it('should send the access token to the catalog origin', async () => {
    const { fetcher, requests } = setup(() => new Response(CONTENT), {
      accessToken: 'test-token',
      tokenOrigin: 'https://cdn.test/api',
    });
    await fetcher.fetch(task);
    expect(requests[0]?.headers.get('authorization')).toBe('Bearer test-token');
  });

  it('should keep the access token from other hosts', async () => {
    const { fetcher, requests } = setup(() => new Response(CONTENT), {
      accessToken: 'test-token',
      tokenOrigin: 'https://catalog.test',
    });
    const result = await fetcher.fetch(task);
    expect(result.state).toBe('completed');
    expect(requests[0]?.headers.get('authorization')).toBeNull();
  });

  it('should not send the access token without a known origin', async () => {
    const { fetcher, requests } = setup(() => new Response(CONTENT), { accessToken: 'test-token' });
    await fetcher.fetch(task);
    expect(requests[0]?.headers.get('authorization')).toBeNull();
  });

  it('should resume a partial file with a range request', async () => {
    writePartial('01234');
    const { fetcher, requests } = setup(
      () => new Response('56789', { status: 206, headers: { 'Content-Range': 'bytes 5-9/10' } })
    );

    const result = await fetcher.fetch(task);

    expect(result.state).toBe('completed');
    expect(result.bytesTransferred).toBe(5);
    expect(requests[0]?.headers.get('range')).toBe('bytes=5-');
    expect(fs.readFileSync(task.targetPath, 'utf-8')).toBe(CONTENT);
  });

  it('should restart the file when the server ignores the range', async () => {
    writePartial('xxxxx');
    const { fetcher } = setup(() => new Response(CONTENT, { status: 200 }));

    const result = await fetcher.fetch(task);

    expect(result.state).toBe('completed');
    expect(fs.readFileSync(task.targetPath, 'utf-8')).toBe(CONTENT);
  });

  it('should discard the partial file and retry after a 416', async () => {
    writePartial('xxxxx');
    const { fetcher, requests, delays } = setup((_url, headers) =>
      headers.get('range') !== null ? new Response('', { status: 416 }) : new Response(CONTENT)
    );

    const result = await fetcher.fetch(task);

    expect(result.state).toBe('completed');
    expect(result.attempts).toBe(2);
    expect(requests.map((r) => r.headers.get('range'))).toEqual(['bytes=5-', null]);
    expect(delays).toEqual([1000]);
    expect(fs.readFileSync(task.targetPath, 'utf-8')).toBe(CONTENT);
  });

  it('should fail the file when a stale partial file cannot be removed', async () => {
    writePartial('xxxxx');
    const { fetcher, requests, delays } = setup(() => {
      fs.rmSync(task.tempPath);
      fs.mkdirSync(task.tempPath);
      fs.writeFileSync(path.join(task.tempPath, 'blocker'), 'x');
      return new Response('', { status: 416 });
    });

    const result = await fetcher.fetch(task);

    expect(result.state).toBe('failed');
    expect(result.failure?.code).toBe('FilesystemError');
    expect(result.failure?.fatal).toBe(false);
    expect(requests).toHaveLength(1);
    expect(delays).toEqual([]);
  });

  it('should restart when the Content-Range does not start at the offset', async () => {
    writePartial('01234');
    const { fetcher, requests } = setup((_url, headers) =>
      headers.get('range') !== null
        ? new Response(CONTENT, { status: 206, headers: { 'Content-Range': 'bytes 0-9/10' } })
        : new Response(CONTENT)
    );

    const result = await fetcher.fetch(task);

    expect(result.state).toBe('completed');
    expect(requests).toHaveLength(2);
    expect(fs.readFileSync(task.targetPath, 'utf-8')).toBe(CONTENT);
  });

  it('should issue zero requests when the target already has the declared size', async () => {
    fs.mkdirSync(task.itemDir, { recursive: true });
    fs.writeFileSync(task.targetPath, 'abcdefghij');
    const { fetcher, requests } = setup(() => new Response(CONTENT));

    const result = await fetcher.fetch(task);

    expect(result.state).toBe('skipped');
    expect(result.skipReason).toBe('already-present');
    expect(requests).toHaveLength(0);
    expect(fs.readFileSync(task.targetPath, 'utf-8')).toBe('abcdefghij');
  });

  it('should neither request nor create anything in dry-run mode', async () => {
    const { fetcher, requests } = setup(() => new Response(CONTENT), { dryRun: true });

    const result = await fetcher.fetch(task);

    expect(result.state).toBe('skipped');
    expect(result.skipReason).toBe('dry-run');
    expect(requests).toHaveLength(0);
    expect(fs.readdirSync(tmpDir)).toEqual([]);
  });

  it('should fail a 404 immediately without retrying', async () => {
    const { fetcher, requests, delays } = setup(() => new Response('', { status: 404 }));

    const result = await fetcher.fetch(task);

    expect(result.state).toBe('failed');
    expect(result.failure?.code).toBe('HttpError');
    expect(requests).toHaveLength(1);
    expect(delays).toEqual([]);
  });

  it('should report 401 as an expired session for the file', async () => {
    const { fetcher } = setup(() => new Response('', { status: 401 }));
    const result = await fetcher.fetch(task);
    expect(result.failure).toEqual({
      code: 'AuthExpired',
      message: 'https://cdn.test/game.bin answered HTTP 401; the session may have expired',
      fatal: true,
    });
  });

  it('should stop at the attempt ceiling on permanent 503s and report FetchFailed', async () => {
    const { fetcher, requests, delays } = setup(() => new Response('', { status: 503 }));

    const result = await fetcher.fetch(task);

    expect(result.state).toBe('failed');
    expect(result.failure?.code).toBe('FetchFailed');
    expect(result.attempts).toBe(4);
    expect(requests).toHaveLength(4);
    expect(delays).toEqual([1000, 2000, 4000]);
    expect(fs.existsSync(task.targetPath)).toBe(false);
  });

  it('should retry a transfer whose body stalls past the idle timeout', async () => {
    const { fetcher, requests, delays } = setup(
      (_url, _headers, callIndex, signal) => {
        if (callIndex > 0) {
          return new Response(CONTENT);
        }
        const stalled = new ReadableStream<Uint8Array>({
          start(controller) {
            controller.enqueue(new TextEncoder().encode('01234'));
            signal?.addEventListener('abort', () => {
              const abort = new Error('The operation was aborted');
              abort.name = 'AbortError';
              controller.error(abort);
            });
          },
        });
        return new Response(stalled);
      },
      { timeoutMs: 50 }
    );

    const result = await fetcher.fetch(task);

    expect(result.state).toBe('completed');
    expect(result.attempts).toBe(2);
    expect(requests).toHaveLength(2);
    expect(delays).toEqual([1000]);
    expect(fs.readFileSync(task.targetPath, 'utf-8')).toBe(CONTENT);
  });

  it('should retry after a connection error', async () => {
    const { fetcher } = setup((_url, _headers, call) => {
      if (call === 0) {
        throw new TypeError('fetch failed');
      }
      return new Response(CONTENT);
    });

    const result = await fetcher.fetch(task);

    expect(result.state).toBe('completed');
    expect(result.attempts).toBe(2);
  });

  it('should reject a body of the wrong length and remove the partial file', async () => {
    const { fetcher, requests } = setup(() => new Response('0123456789AB'));

    const result = await fetcher.fetch(task);

    expect(result.state).toBe('failed');
    expect(result.failure?.code).toBe('SizeMismatch');
    expect(result.failure?.message).toContain('expected 10 bytes, got 12');
    expect(requests).toHaveLength(1);
    expect(fs.existsSync(task.tempPath)).toBe(false);
    expect(fs.existsSync(task.targetPath)).toBe(false);
  });

  it('should report state transitions through the hooks', async () => {
    const { fetcher } = setup((_url, _headers, call) =>
      call === 0 ? new Response('', { status: 500 }) : new Response(CONTENT)
    );
    const transitions: string[] = [];
    const retries: number[] = [];

    await fetcher.fetch(task, {
      onStateChange: (_task, from, to) => transitions.push(`${from}->${to}`),
      onRetry: (_task, attempt) => retries.push(attempt),
    });

    expect(transitions).toEqual([
      'pending->in-progress',
      'in-progress->pending',
      'pending->in-progress',
      'in-progress->completed',
    ]);
    expect(retries).toEqual([1]);
  });

  it('should finish from a complete partial file without a request', async () => {
    writePartial(CONTENT);
    const { fetcher, requests } = setup(() => new Response(CONTENT));

    const result = await fetcher.fetch(task);

    expect(result.state).toBe('completed');
    expect(requests).toHaveLength(0);
    expect(fs.readFileSync(task.targetPath, 'utf-8')).toBe(CONTENT);
  });
});

describe('parseContentRangeStart', () => {
  it('should read the start offset', () => {
    expect(parseContentRangeStart('bytes 512-1023/1024')).toBe(512);
    expect(parseContentRangeStart('bytes 0-9/*')).toBe(0);
  });

  it('should return null for missing or malformed headers', () => {
    expect(parseContentRangeStart(null)).toBeNull();
    expect(parseContentRangeStart('items 0-9/10')).toBeNull();
  });
});
