import { errors } from 'jose';

import {
  ClaimsInvalidError,
  MalformedTokenError,
  SignatureInvalidError,
} from '../errors.js';

/**
 * Maps an error thrown by `jwtVerify` onto the authentication failure taxonomy.
 * Errors jose did not raise are returned unchanged so they propagate as bugs.
 */
export function toAuthFailure(error: unknown): unknown {
  if (error instanceof errors.JWTExpired) {
    return new ClaimsInvalidError('expired', 'Token has expired', { cause: error });
  }

  if (error instanceof errors.JWTClaimValidationFailed) {
    switch (error.claim) {
      case 'aud':
        return new ClaimsInvalidError('wrong_audience', 'Token audience is not accepted', {
          cause: error,
        });
      case 'iss':
        return new ClaimsInvalidError('wrong_issuer', 'Token issuer is not accepted', {
          cause: error,
        });
      case 'nbf':
        return new ClaimsInvalidError('not_yet_valid', 'Token is not valid yet', {
          cause: error,
        });
      case 'exp':
        if (error.reason === 'missing') {
          return new ClaimsInvalidError('missing_expiry', 'Token has no expiry', {
            cause: error,
          });
        }
        return new MalformedTokenError('Token expiry is not a timestamp', { cause: error });
      default:
        return new MalformedTokenError(`Token claim '${error.claim}' is invalid`, {
          cause: error,
        });
    }
  }

  if (error instanceof errors.JWSSignatureVerificationFailed) {
    return new SignatureInvalidError('signature_mismatch', 'Token signature does not match', {
      cause: error,
    });
  }
  if (error instanceof errors.JOSEAlgNotAllowed) {
    return new SignatureInvalidError(
      'algorithm_not_allowed',
      'Token signing algorithm is not allowed',
      { cause: error },
    );
  }
  if (error instanceof errors.JWSInvalid || error instanceof errors.JWTInvalid) {
    return new MalformedTokenError('Token structure is invalid', { cause: error });
  }

  return error;
}
