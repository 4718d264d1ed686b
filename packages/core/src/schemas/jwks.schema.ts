import * as z from 'zod';

/**
 * Envelope of a JWKS response (RFC 7517). Individual keys are validated
 * separately so one unusable entry does not discard the whole set.
 */
export const JsonWebKeySetSchema = z.object({
  keys: z.array(z.unknown()),
});

/**
 * A public signing key as published on the provider's discovery endpoint.
 * Azure AD publishes RSA keys (`n`, `e`) with an X.509 chain in `x5c`.
 */
export const SigningKeySchema = z.object({
  kid: z.string().min(1),
  kty: z.string().min(1),
  use: z.string().optional(),
  alg: z.string().optional(),
  n: z.string().optional(),
  e: z.string().optional(),
  crv: z.string().optional(),
  x: z.string().optional(),
  y: z.string().optional(),
  x5c: z.array(z.string()).optional(),
  x5t: z.string().optional(),
});

export type SigningKey = z.infer<typeof SigningKeySchema>;
