import { MissingCredentialsError } from '../errors.js';

/**
 * Extracts the token from an `Authorization: Bearer <token>` header value.
 * The scheme is matched case-insensitively.
 *
 * @param authorization - Raw header value, undefined when the header is absent
 * @returns The bearer token
 * @throws {MissingCredentialsError} When the header is absent, uses another scheme, or carries no token
 */
export function extractBearerToken(authorization: string | undefined): string {
  if (!authorization) {
    throw new MissingCredentialsError('Authorization header is missing');
  }

  const separator = authorization.indexOf(' ');
  const scheme = separator === -1 ? authorization : authorization.slice(0, separator);
  if (scheme.toLowerCase() !== 'bearer') {
    throw new MissingCredentialsError('Authorization scheme is not Bearer');
  }

  const token = separator === -1 ? '' : authorization.slice(separator + 1).trim();
  if (!token) {
    throw new MissingCredentialsError('Bearer token is empty');
  }
  return token;
}
