import type { JWTPayload } from 'jose';

import type { AuthenticatedIdentity } from '../interfaces/authenticatedIdentity.js';
import { IdentityClaimsSchema } from '../schemas/claims/identityClaims.schema.js';

/** Username reported when a verified token carries no identity claim */
export const UNKNOWN_USERNAME = 'unknown';

/**
 * Creates the identity handed to protected handlers from verified claims.
 *
 * The username is `preferred_username` (v2.0 tokens), falling back to `upn`
 * (v1.0 tokens), then to 'unknown'. A missing or malformed identity claim
 * never fails authentication.
 *
 * @param claims - Payload of a token whose signature and claims were already verified
 * @returns Identity for the current request
 */
export function createIdentity(claims: JWTPayload): AuthenticatedIdentity {
  const identityClaims = IdentityClaimsSchema.parse(claims);

  return {
    username:
      identityClaims.preferred_username || identityClaims.upn || UNKNOWN_USERNAME,
    subject: identityClaims.sub,
    objectId: identityClaims.oid,
    tenantId: identityClaims.tid,
    name: identityClaims.name,
    scopes: identityClaims.scp?.split(' ').filter(Boolean) ?? [],
    roles: identityClaims.roles ?? [],
    claims,
  };
}
