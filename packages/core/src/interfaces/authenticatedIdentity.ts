import type { JWTPayload } from 'jose';

/**
 * Caller identity exposed to protected handlers after a token has been fully
 * validated. Lives only as long as the request it was created for.
 */
export interface AuthenticatedIdentity {
  /** `preferred_username`, else `upn`, else 'unknown' */
  username: string;

  /** Subject (`sub`) claim */
  subject?: string;

  /** Object ID (`oid`) of the user or service principal */
  objectId?: string;

  /** Tenant ID (`tid`) the token was issued for */
  tenantId?: string;

  /** Display name */
  name?: string;

  /** Delegated scopes from `scp` */
  scopes: string[];

  /** Application roles from `roles` */
  roles: string[];

  /** Every verified claim, for handlers needing more than the fields above */
  claims: JWTPayload;
}
