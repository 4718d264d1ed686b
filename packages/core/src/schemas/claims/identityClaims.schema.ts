import * as z from 'zod';

// every field falls back to undefined: a malformed display claim never fails an
// already verified token
const optionalString = () => z.string().optional().catch(undefined);

/**
 * Identity-bearing claims of an Azure AD access token (v1.0 and v2.0).
 *
 * @property preferred_username - Sign-in name, present on v2.0 tokens
 * @property upn - User principal name, present on v1.0 tokens
 * @property oid - Object ID of the user in the tenant
 * @property tid - Tenant ID the user signed in to
 * @property scp - Space-separated delegated scopes
 * @property roles - Application roles assigned to the caller
 */
export const IdentityClaimsSchema = z.object({
  sub: optionalString(),
  oid: optionalString(),
  tid: optionalString(),
  name: optionalString(),
  preferred_username: optionalString(),
  upn: optionalString(),
  scp: optionalString(),
  roles: z.array(z.string()).optional().catch(undefined),
});

export type IdentityClaims = z.infer<typeof IdentityClaimsSchema>;
