/**
 * Credential storage for gamecrate.
 * Stores the catalog access token in ~/.gamecrate/credentials.json.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';

/** Stored credential shape */
export interface GamecrateCredentials {
  /** Bearer token for the catalog API */
  token: string;
  /** Catalog API base URL given at login */
  apiUrl?: string;
  /** When the token was stored (ISO string) */
  storedAt: string;
  /** When the token expires (ISO string, if known) */
  expiresAt?: string;
}

/**
 * Override for the config directory base path.
 * Set via GAMECRATE_CONFIG_HOME env var or _setConfigHome (for testing).
 * When null, defaults to os.homedir().
 */
let configHomeOverride: string | null = null;

/**
 * Set the base directory for config files. Intended for testing only.
 */
export function _setConfigHome(dir: string | null): void {
  configHomeOverride = dir;
}

function getConfigDir(): string {
  const base = configHomeOverride
    ?? process.env['GAMECRATE_CONFIG_HOME']
    ?? os.homedir();
  return path.join(base, '.gamecrate');
}

function getCredentialsFilePath(): string {
  return path.join(getConfigDir(), 'credentials.json');
}

function ensureConfigDir(): void {
  const dir = getConfigDir();
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
  }
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

/** Validate the parsed file contents; null when required fields are missing. */
function toCredentials(raw: unknown): GamecrateCredentials | null {
  if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) {
    return null;
  }
  const token: unknown = Reflect.get(raw, 'token');
  const storedAt: unknown = Reflect.get(raw, 'storedAt');
  if (typeof token !== 'string' || token === '' || typeof storedAt !== 'string') {
    return null;
  }

  const creds: GamecrateCredentials = { token, storedAt };
  const apiUrl = optionalString(Reflect.get(raw, 'apiUrl'));
  if (apiUrl !== undefined) creds.apiUrl = apiUrl;
  const expiresAt = optionalString(Reflect.get(raw, 'expiresAt'));
  if (expiresAt !== undefined) creds.expiresAt = expiresAt;
  return creds;
}

/**
 * Read stored credentials. Returns null if not logged in or file is missing/corrupt.
 */
export function readCredentials(): GamecrateCredentials | null {
  const credPath = getCredentialsFilePath();
  if (!fs.existsSync(credPath)) {
    return null;
  }
  try {
    const raw: unknown = JSON.parse(fs.readFileSync(credPath, 'utf-8'));
    return toCredentials(raw);
  } catch {
    // Unreadable or not JSON: treated as logged out
    return null;
  }
}

/**
 * Write credentials to disk. Creates ~/.gamecrate if needed.
 * File permissions are set to owner-only (0o600).
 */
export function writeCredentials(creds: GamecrateCredentials): void {
  ensureConfigDir();
  const content = JSON.stringify(creds, null, 2);
  fs.writeFileSync(getCredentialsFilePath(), content, { mode: 0o600 });
}

/**
 * Clear stored credentials (logout).
 * Returns true if credentials were removed, false if none existed.
 */
export function clearCredentials(): boolean {
  const credPath = getCredentialsFilePath();
  if (!fs.existsSync(credPath)) {
    return false;
  }
  fs.unlinkSync(credPath);
  return true;
}

/**
 * Get the credentials file path (for display/debugging).
 */
export function getCredentialsPath(): string {
  return getCredentialsFilePath();
}

/**
 * Check if credentials are expired (if expiresAt is set).
 */
export function isExpired(creds: GamecrateCredentials, now: Date = new Date()): boolean {
  if (!creds.expiresAt) {
    return false;
  }
  return new Date(creds.expiresAt) <= now;
}
