import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { AuthExpiredError, ConfigError } from '@gamecrate/catalog-sync';
import { _setConfigHome, writeCredentials } from '../utils/credentials.js';
import { optionalTransferAuth, requireSession, resolveApiUrl } from '../utils/session.js';

const NOW = new Date('2024-05-01T12:00:00.000Z');

describe('session', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'gamecrate-session-test-'));
    _setConfigHome(tmpDir);
    vi.stubEnv('GAMECRATE_API_URL', '');
  });

  afterEach(() => {
    _setConfigHome(null);
    vi.unstubAllEnvs();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should ask for a login when no credentials are stored', () => {
    expect(() => requireSession(NOW)).toThrow(AuthExpiredError);
    expect(() => requireSession(NOW)).toThrow('Not logged in. Run "gamecrate auth login --token <token>" first.');
  });

  it('should reject an expired token', () => {
    writeCredentials({
      token: 'test-token',
      apiUrl: 'https://catalog.test',
      storedAt: '2024-04-01T00:00:00.000Z',
      expiresAt: '2024-05-01T00:00:00.000Z',
    });
    expect(() => requireSession(NOW)).toThrow(AuthExpiredError);
    expect(optionalTransferAuth(NOW)).toBeUndefined();
  });

  it('should build a session from stored credentials', () => {
    writeCredentials({ token: 'test-token', apiUrl: 'https://catalog.test/', storedAt: '2024-04-01T00:00:00.000Z' });
    expect(requireSession(NOW)).toEqual({
      session: { accessToken: 'test-token' },
      apiUrl: 'https://catalog.test',
    });
    expect(optionalTransferAuth(NOW)).toEqual({ accessToken: 'test-token', tokenOrigin: 'https://catalog.test' });
  });

  it('should tie the transfer token to the GAMECRATE_API_URL origin when set', () => {
    vi.stubEnv('GAMECRATE_API_URL', 'https://other.test:8443/api/');
    writeCredentials({ token: 'test-token', apiUrl: 'https://catalog.test', storedAt: '2024-04-01T00:00:00.000Z' });
    expect(optionalTransferAuth(NOW)).toEqual({ accessToken: 'test-token', tokenOrigin: 'https://other.test:8443' });
  });

  it('should offer no transfer token when the API URL is unknown', () => {
    writeCredentials({ token: 'test-token', storedAt: '2024-04-01T00:00:00.000Z' });
    expect(optionalTransferAuth(NOW)).toBeUndefined();
  });

  it('should prefer GAMECRATE_API_URL over the stored URL', () => {
    vi.stubEnv('GAMECRATE_API_URL', 'https://other.test');
    expect(resolveApiUrl({ token: 'test-token', apiUrl: 'https://catalog.test', storedAt: '' })).toBe(
      'https://other.test'
    );
  });

  it('should fail with ConfigError when no API URL is known', () => {
    expect(() => resolveApiUrl({ token: 'test-token', storedAt: '' })).toThrow(ConfigError);
  });
});
