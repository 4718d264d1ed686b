import type { AuthenticatedIdentity } from './authenticatedIdentity.js';

export interface ValidateOptions {
  /**
   * Signal of the request being authenticated. Aborting it rejects the pending
   * validation; a key set fetch already in flight still completes and is stored.
   */
  signal?: AbortSignal;
}

/**
 * Anything able to turn a raw bearer token into an identity.
 * Rejects with an `AuthFailure` subclass when the token is not acceptable.
 */
export interface TokenVerifier {
  validate(token: string, options?: ValidateOptions): Promise<AuthenticatedIdentity>;
}
