import {
  type AuthenticatedIdentity,
  AuthFailure,
  extractBearerToken,
  KeyRetrievalError,
  MissingCredentialsError,
  type TokenVerifier,
} from '@entra-bearer/core';
import type { MiddlewareHandler } from 'hono';
import { endTime, startTime } from 'hono/timing';
import type { Logger } from 'pino';

/**
 * Context variables available when using bearer protection middleware.
 */
export interface BearerContextVariables {
  identity: AuthenticatedIdentity;
}

export interface SecureBearerTokenOptions {
  /** Optional pino logger */
  logger?: Logger;
}

/**
 * Creates middleware that requires a valid Azure AD bearer token.
 *
 * - no usable `Authorization: Bearer` header: 401 `{"detail":"Not authenticated"}`
 * - token rejected: 401 `{"detail":"Invalid credentials"}`
 * - signing keys unavailable: 503 `{"detail":"Authentication service unavailable"}`
 *
 * Failure details are logged, never returned. A request aborted by the client
 * while its token is validated ends with status 499. Any other error that is
 * not an authentication failure propagates to the app's error handler.
 *
 * @param verifier - Verifier used for every request
 * @param options - Optional logger
 * @returns Hono middleware handler that sets `identity` on success
 */
export function secureBearerToken(
  verifier: TokenVerifier,
  options: SecureBearerTokenOptions = {},
): MiddlewareHandler<{ Variables: BearerContextVariables }> {
  const { logger } = options;

  return async (c, next) => {
    startTime(c, 'bearerTokenMiddleware');

    let identity: AuthenticatedIdentity;
    try {
      const token = extractBearerToken(c.req.header('Authorization'));

      startTime(c, 'validateToken');
      identity = await verifier.validate(token, { signal: c.req.raw.signal });
      endTime(c, 'validateToken');
    } catch (error) {
      if (error instanceof MissingCredentialsError) {
        logger?.debug({ path: c.req.path, detail: error.message }, 'no bearer credentials');
        c.header('WWW-Authenticate', 'Bearer');
        return c.json({ detail: 'Not authenticated' }, 401);
      }
      if (error instanceof KeyRetrievalError) {
        logger?.error({ err: error, path: c.req.path }, 'signing keys unavailable');
        return c.json({ detail: 'Authentication service unavailable' }, 503);
      }
      if (error instanceof AuthFailure) {
        logger?.warn(
          {
            code: error.code,
            reason: 'reason' in error ? error.reason : undefined,
            path: c.req.path,
          },
          'bearer token rejected',
        );
        c.header('WWW-Authenticate', 'Bearer error="invalid_token"');
        return c.json({ detail: 'Invalid credentials' }, 401);
      }
      if (c.req.raw.signal.aborted) {
        logger?.debug({ path: c.req.path }, 'client disconnected during token validation');
        // 499: client closed request
        return new Response(null, { status: 499 });
      }
      throw error;
    }

    c.set('identity', identity);
    endTime(c, 'bearerTokenMiddleware');
    await next();
  };
}
