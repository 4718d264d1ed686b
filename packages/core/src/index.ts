export { BearerTokenVerifier } from './bearerTokenVerifier.js';
export {
  AuthFailure,
  ClaimsInvalidError,
  KeyRetrievalError,
  MalformedTokenError,
  MissingCredentialsError,
  SignatureInvalidError,
  UnknownSigningKeyError,
  type AuthFailureCode,
  type ClaimsInvalidReason,
  type SignatureInvalidReason,
} from './errors.js';
export * from './interfaces/index.js';
export * from './schemas/index.js';
export { createIdentity, UNKNOWN_USERNAME } from './services/identity.service.js';
export { KeySetService, type ResolvedKeySet } from './services/keySet.service.js';
export { extractBearerToken } from './utils/bearerHeader.js';
export { discoveryFetch } from './utils/discoveryFetch.js';
export { formatError } from './utils/errorFormatting.js';
