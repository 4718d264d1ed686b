import { PACKAGE_VERSION } from '../version.js';

/**
 * Wrapper around fetch() for identity provider discovery requests.
 *
 * Adds a `User-Agent` identifying this library and asks for JSON, unless the
 * caller already set either header.
 *
 * @param url - Request URL (string or URL object)
 * @param init - Fetch options (headers, signal, etc.)
 * @returns Promise resolving to Response
 *
 * @example
 * ```typescript
 * const response = await discoveryFetch(
 *   'https://login.microsoftonline.com/<tenant>/discovery/v2.0/keys',
 *   { signal: AbortSignal.timeout(5000) },
 * );
 * ```
 */
export function discoveryFetch(url: string | URL, init?: RequestInit): Promise<Response> {
  const headers = new Headers(init?.headers);
  if (!headers.has('User-Agent')) {
    headers.set('User-Agent', `entra-bearer/${PACKAGE_VERSION}`);
  }
  if (!headers.has('Accept')) {
    headers.set('Accept', 'application/json');
  }
  return fetch(url, {
    ...init,
    headers,
  });
}
