import type { SigningKeySet } from './jwks.js';

/**
 * Storage for fetched signing key sets, shared by every concurrent validation.
 * Implementations must tolerate concurrent reads and overlapping saves; the
 * last save for a URL wins.
 */
export interface KeySetStore {
  /**
   * Returns the stored key set for a JWKS URL, if any. Callers check
   * `expiresAt` themselves, so an implementation may return stale entries.
   */
  getKeySet(jwksUri: string): Promise<SigningKeySet | undefined>;

  /** Stores a key set under its `jwksUri`, replacing any previous entry */
  saveKeySet(keySet: SigningKeySet): Promise<void>;

  deleteKeySet(jwksUri: string): Promise<void>;
}
