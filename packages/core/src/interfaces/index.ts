export type { AuthenticatedIdentity } from './authenticatedIdentity.js';
export type { SigningKeySet } from './jwks.js';
export type { KeySetStore } from './keySetStore.js';
export type { TokenVerifier, ValidateOptions } from './tokenVerifier.js';
export type { BearerTokenVerifierOptions } from './verifierOptions.js';
