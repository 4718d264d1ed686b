import type { SigningKey } from '../schemas/jwks.schema.js';

/**
 * Signing keys from one successful fetch of the provider's JSON Web Key Set
 * (RFC 7517), indexed by key identifier. Never mutated after creation; a
 * refresh produces a new set.
 */
export interface SigningKeySet {
  /** URL the set was fetched from, also its cache key */
  jwksUri: string;

  /** Signature keys by `kid`; entries with a `use` other than 'sig' are left out */
  keys: Readonly<Record<string, SigningKey>>;

  /** Fetch time in epoch milliseconds */
  fetchedAt: number;

  /** Epoch milliseconds after which the set must be fetched again */
  expiresAt: number;
}
