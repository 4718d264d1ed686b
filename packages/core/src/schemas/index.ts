export {
  IdentityClaimsSchema,
  type IdentityClaims,
} from './claims/identityClaims.schema.js';
export {
  JsonWebKeySetSchema,
  SigningKeySchema,
  type SigningKey,
} from './jwks.schema.js';
export { TokenHeaderSchema, type TokenHeader } from './tokenHeader.schema.js';
export {
  DEFAULT_AUTHORITY_HOST,
  SigningAlgorithmSchema,
  VerifierConfigSchema,
  type ResolvedVerifierConfig,
  type SigningAlgorithm,
  type VerifierConfigInput,
} from './verifierConfig.schema.js';
