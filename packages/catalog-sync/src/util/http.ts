import { TransientNetworkError, errorMessage } from '../errors.js';

/** 408, 429 and every 5xx are worth another attempt. */
export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

/**
 * Wrap an exception thrown by `fetch` (reset, DNS failure, timeout abort)
 * as a transient network error.
 */
export function toTransientError(url: string, err: unknown): TransientNetworkError {
  if (err instanceof TransientNetworkError) {
    return err;
  }
  if (err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError')) {
    return new TransientNetworkError(`Request to ${url} timed out`, null, err);
  }
  return new TransientNetworkError(`Request to ${url} failed: ${errorMessage(err)}`, null, err);
}

/** `scheme://host[:port]` of a URL, or null when it does not parse. */
export function originOf(url: string): string | null {
  try {
    return new URL(url).origin;
  } catch {
    // not an absolute URL
    return null;
  }
}
