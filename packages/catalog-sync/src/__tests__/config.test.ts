import { describe, it, expect, afterEach, vi } from 'vitest';
import { buildSyncConfig, validateSyncConfig } from '../sync/config.js';
import { buildDownloadConfig, validateDownloadConfig } from '../download/config.js';
import { buildVerifyConfig, validateVerifyConfig } from '../verify/config.js';

describe('sync config', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should default to the all policy', () => {
    vi.stubEnv('GAMECRATE_SYNC_POLICY', '');
    const config = buildSyncConfig({ manifestPath: 'm.yaml' });
    expect(config.policy).toBe('all');
    expect(validateSyncConfig(config)).toEqual([]);
  });

  it('should read the policy and tag filters from the environment', () => {
    vi.stubEnv('GAMECRATE_SYNC_POLICY', 'updated-only');
    vi.stubEnv('GAMECRATE_SYNC_OS', 'windows, linux');
    vi.stubEnv('GAMECRATE_SYNC_LANG', 'en,,fr');

    const config = buildSyncConfig();
    expect(config.policy).toBe('updated-only');
    expect(config.os).toEqual(['windows', 'linux']);
    expect(config.lang).toEqual(['en', 'fr']);
  });

  it('should require an item id for the single-id policy', () => {
    const config = buildSyncConfig({ manifestPath: 'm.yaml', policy: 'single-id' });
    expect(validateSyncConfig(config)).toContain('itemId is required when policy is "single-id"');
  });

  it('should reject an item id under any other policy', () => {
    const config = buildSyncConfig({ manifestPath: 'm.yaml', policy: 'all', itemId: 'a' });
    expect(validateSyncConfig(config)).toContain('itemId is only used with the "single-id" policy');
  });

  it('should bound the request delay', () => {
    const config = buildSyncConfig({ manifestPath: 'm.yaml', policy: 'all', requestDelayMs: 120_000 });
    expect(validateSyncConfig(config)).toEqual(['requestDelayMs must not exceed 60000 (1 minute)']);
  });
});

describe('download config', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  function valid(overrides: Parameters<typeof buildDownloadConfig>[0] = {}) {
    return buildDownloadConfig({
      manifestPath: 'm.yaml',
      rootDir: '/library',
      concurrency: 1,
      retry: { maxAttempts: 4, baseDelayMs: 1000, maxDelayMs: 60_000 },
      timeoutMs: 60_000,
      ...overrides,
    });
  }

  it('should apply defaults', () => {
    const config = valid();
    expect(config.includeGames).toBe(true);
    expect(config.includeExtras).toBe(true);
    expect(config.waitMs).toBe(0);
    expect(config.dryRun).toBe(false);
    expect(validateDownloadConfig(config)).toEqual([]);
  });

  it('should read the target directory and filters from the environment', () => {
    vi.stubEnv('GAMECRATE_DOWNLOAD_DIR', '/mnt/games');
    vi.stubEnv('GAMECRATE_DOWNLOAD_OS', 'mac');
    const config = buildDownloadConfig();
    expect(config.rootDir).toBe('/mnt/games');
    expect(config.os).toEqual(['mac']);
  });

  it('should refuse to skip both games and extras', () => {
    expect(validateDownloadConfig(valid({ includeGames: false, includeExtras: false }))).toEqual([
      'skipping both game files and extras leaves nothing to download',
    ]);
  });

  it('should bound concurrency', () => {
    expect(validateDownloadConfig(valid({ concurrency: 5 }))).toEqual(['concurrency must not exceed 4']);
    expect(validateDownloadConfig(valid({ concurrency: 0 }))).toEqual(['concurrency must be at least 1']);
  });

  it('should bound the wait and timeout', () => {
    expect(validateDownloadConfig(valid({ waitMs: -1 }))).toEqual(['waitMs must not be negative']);
    expect(validateDownloadConfig(valid({ waitMs: 8 * 24 * 3_600_000 }))).toEqual(['waitMs must not exceed one week']);
    expect(validateDownloadConfig(valid({ timeoutMs: 500 }))).toEqual(['timeoutMs must be at least 1000 (1 second)']);
  });
});

describe('verify config', () => {
  it('should run every check and only report by default', () => {
    const config = buildVerifyConfig({ manifestPath: 'm.yaml', rootDir: '/library' });
    expect(config.checks).toEqual(['checksum', 'size', 'archive']);
    expect(config.disposition).toBe('report');
    expect(validateVerifyConfig(config)).toEqual([]);
  });

  it('should reject an empty item id', () => {
    const config = buildVerifyConfig({ manifestPath: 'm.yaml', rootDir: '/library', itemId: '' });
    expect(validateVerifyConfig(config)).toEqual(['itemId must not be empty']);
  });
});
