/**
 * Machine-readable codes for every way bearer authentication can fail.
 */
export type AuthFailureCode =
  | 'MISSING_CREDENTIALS'
  | 'MALFORMED_TOKEN'
  | 'KEY_RETRIEVAL_FAILED'
  | 'UNKNOWN_SIGNING_KEY'
  | 'SIGNATURE_INVALID'
  | 'CLAIMS_INVALID';

/** Reasons a token's claims were rejected after its signature verified */
export type ClaimsInvalidReason =
  | 'expired'
  | 'wrong_audience'
  | 'not_yet_valid'
  | 'wrong_issuer'
  | 'missing_expiry';

/** Reasons a token's signature step was rejected */
export type SignatureInvalidReason =
  | 'algorithm_not_allowed'
  | 'algorithm_mismatch'
  | 'key_unusable'
  | 'signature_mismatch';

/**
 * Base class for bearer authentication failures.
 *
 * `status` is the HTTP status a guard answers with. Only key retrieval is a
 * server-side condition (503); everything else is a caller fault (401).
 * Messages are for server-side logs and must not be echoed to clients.
 */
export abstract class AuthFailure extends Error {
  constructor(
    message: string,
    public readonly code: AuthFailureCode,
    public readonly status: 401 | 503,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'AuthFailure';
  }
}

export class MissingCredentialsError extends AuthFailure {
  constructor(message = 'No bearer credentials supplied') {
    super(message, 'MISSING_CREDENTIALS', 401);
    this.name = 'MissingCredentialsError';
  }
}

export class MalformedTokenError extends AuthFailure {
  constructor(message = 'Token is malformed', options?: ErrorOptions) {
    super(message, 'MALFORMED_TOKEN', 401, options);
    this.name = 'MalformedTokenError';
  }
}

/**
 * The identity provider's key set could not be fetched or parsed.
 * Callers may retry with backoff; the verifier itself never does.
 */
export class KeyRetrievalError extends AuthFailure {
  constructor(message = 'Signing keys could not be retrieved', options?: ErrorOptions) {
    super(message, 'KEY_RETRIEVAL_FAILED', 503, options);
    this.name = 'KeyRetrievalError';
  }
}

export class UnknownSigningKeyError extends AuthFailure {
  constructor(
    public readonly keyId: string,
    message = `No signing key with id '${keyId}'`,
  ) {
    super(message, 'UNKNOWN_SIGNING_KEY', 401);
    this.name = 'UnknownSigningKeyError';
  }
}

export class SignatureInvalidError extends AuthFailure {
  constructor(
    public readonly reason: SignatureInvalidReason,
    message = 'Token signature is invalid',
    options?: ErrorOptions,
  ) {
    super(message, 'SIGNATURE_INVALID', 401, options);
    this.name = 'SignatureInvalidError';
  }
}

export class ClaimsInvalidError extends AuthFailure {
  constructor(
    public readonly reason: ClaimsInvalidReason,
    message = 'Token claims are invalid',
    options?: ErrorOptions,
  ) {
    super(message, 'CLAIMS_INVALID', 401, options);
    this.name = 'ClaimsInvalidError';
  }
}
