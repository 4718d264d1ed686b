import { decodeJwt, decodeProtectedHeader } from 'jose';

import { MalformedTokenError } from '../errors.js';
import { type TokenHeader, TokenHeaderSchema } from '../schemas/tokenHeader.schema.js';

const BASE64URL_SEGMENT = /^[A-Za-z0-9_-]*$/;

/**
 * Decodes a compact JWS header without verifying anything, after checking the
 * token has three base64url segments and a JSON object payload.
 *
 * @param token - Raw bearer token
 * @returns The `alg`, `kid` and optional `typ` header fields (untrusted)
 * @throws {MalformedTokenError} When the token cannot be decoded or the header lacks `alg` or `kid`
 */
export function decodeTokenHeader(token: string): TokenHeader {
  const segments = token.split('.');
  if (segments.length !== 3) {
    throw new MalformedTokenError(
      `Token must have 3 segments, found ${segments.length}`,
    );
  }
  const [header, payload] = segments;
  if (!header || !payload) {
    throw new MalformedTokenError('Token header and payload must not be empty');
  }
  if (!segments.every((segment) => BASE64URL_SEGMENT.test(segment))) {
    throw new MalformedTokenError('Token segments must be base64url encoded');
  }

  let decoded: unknown;
  try {
    decoded = decodeProtectedHeader(token);
    // payload must be a JSON object too, checked before any key lookup
    decodeJwt(token);
  } catch (error) {
    throw new MalformedTokenError('Token header or payload cannot be decoded', {
      cause: error,
    });
  }

  const result = TokenHeaderSchema.safeParse(decoded);
  if (!result.success) {
    throw new MalformedTokenError('Token header must carry alg and kid');
  }
  return result.data;
}
