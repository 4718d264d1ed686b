import type { Logger } from 'pino';

import type { VerifierConfigInput } from '../schemas/verifierConfig.schema.js';
import type { KeySetStore } from './keySetStore.js';

/**
 * Dependencies and settings for a `BearerTokenVerifier`.
 * Settings are parsed once at construction and are immutable afterwards.
 */
export interface BearerTokenVerifierOptions {
  /** Azure AD settings, validated with `VerifierConfigSchema` */
  settings: VerifierConfigInput;

  /** Store for fetched signing key sets */
  keySetStore: KeySetStore;

  /** Optional pino logger */
  logger?: Logger;
}
