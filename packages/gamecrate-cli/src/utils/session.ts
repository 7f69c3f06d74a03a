/**
 * Turns stored credentials into the explicit session the core expects.
 */

import { AuthExpiredError, ConfigError, originOf, type CatalogSession } from '@gamecrate/catalog-sync';
import { isExpired, readCredentials, type GamecrateCredentials } from './credentials.js';

export interface CliSession {
  session: CatalogSession;
  apiUrl: string;
}

/**
 * Catalog API base URL.
 *
 * Resolution order:
 * 1. GAMECRATE_API_URL environment variable
 * 2. apiUrl stored at login
 */
export function resolveApiUrl(creds: GamecrateCredentials | null): string {
  const url = process.env['GAMECRATE_API_URL'] || creds?.apiUrl;
  if (!url) {
    throw new ConfigError('catalog', [
      'no API URL; set GAMECRATE_API_URL or run "gamecrate auth login --token <token> --api-url <url>"',
    ]);
  }
  return url.replace(/\/+$/, '');
}

/**
 * @throws AuthExpiredError when not logged in or the token has expired
 */
export function requireSession(now: Date = new Date()): CliSession {
  const creds = readCredentials();
  if (!creds) {
    throw new AuthExpiredError('Not logged in. Run "gamecrate auth login --token <token>" first.');
  }
  if (isExpired(creds, now)) {
    throw new AuthExpiredError();
  }
  return { session: { accessToken: creds.token }, apiUrl: resolveApiUrl(creds) };
}

export interface TransferAuth {
  accessToken: string;

  /** Origin of the catalog API; file hosts elsewhere never see the token */
  tokenOrigin: string;
}

/**
 * Token for file transfers, when logged in and the API URL is known.
 * Downloads also work without one.
 */
export function optionalTransferAuth(now: Date = new Date()): TransferAuth | undefined {
  const creds = readCredentials();
  if (!creds || isExpired(creds, now)) {
    return undefined;
  }
  const apiUrl = process.env['GAMECRATE_API_URL'] || creds.apiUrl;
  const tokenOrigin = apiUrl ? originOf(apiUrl) : null;
  if (tokenOrigin === null) {
    return undefined;
  }
  return { accessToken: creds.token, tokenOrigin };
}
