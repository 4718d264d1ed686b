import { importJWK, type JWTPayload, jwtVerify } from 'jose';
import { type Logger, pino } from 'pino';

import {
  AuthFailure,
  KeyRetrievalError,
  SignatureInvalidError,
  UnknownSigningKeyError,
} from './errors.js';
import type { AuthenticatedIdentity } from './interfaces/authenticatedIdentity.js';
import type { SigningKeySet } from './interfaces/jwks.js';
import type { TokenVerifier, ValidateOptions } from './interfaces/tokenVerifier.js';
import type { BearerTokenVerifierOptions } from './interfaces/verifierOptions.js';
import type { SigningKey } from './schemas/jwks.schema.js';
import type { TokenHeader } from './schemas/tokenHeader.schema.js';
import {
  type ResolvedVerifierConfig,
  VerifierConfigSchema,
} from './schemas/verifierConfig.schema.js';
import { createIdentity } from './services/identity.service.js';
import { KeySetService } from './services/keySet.service.js';
import { untilAborted } from './utils/abortable.js';
import { toAuthFailure } from './utils/joseErrors.js';
import { decodeTokenHeader } from './utils/tokenHeader.js';

/**
 * Validates Azure AD (Microsoft Entra ID) access tokens presented as bearer
 * credentials.
 *
 * Each validation decodes the token header, resolves the signing key from the
 * tenant's published key set (cached in the injected `KeySetStore`, refetched
 * once when a token names an unknown `kid`), verifies the signature against
 * the algorithm allow-list, checks audience, expiry, not-before and optionally
 * issuer, and returns the caller's identity.
 *
 * @example
 * ```typescript
 * const verifier = new BearerTokenVerifier({
 *   settings: { tenantId: '<tenant-id>', clientId: '<client-id>' },
 *   keySetStore: new MemoryKeySetStore(),
 * });
 *
 * const identity = await verifier.validate(token);
 * console.log(identity.username);
 * ```
 */
export class BearerTokenVerifier implements TokenVerifier {
  private logger: Logger;
  private settings: ResolvedVerifierConfig;
  private allowedAlgorithms: ReadonlySet<string>;
  private keySetService: KeySetService;

  /**
   * Creates a new verifier.
   *
   * @param options - Settings, key set store and optional logger
   * @throws {ZodError} When the settings are invalid
   */
  constructor(options: BearerTokenVerifierOptions) {
    this.settings = VerifierConfigSchema.parse(options.settings);
    this.logger = options.logger ?? pino({ enabled: false });
    this.allowedAlgorithms = new Set(this.settings.algorithms);
    this.keySetService = new KeySetService(
      options.keySetStore,
      {
        jwksUri: this.settings.jwksUri,
        cacheTtlSeconds: this.settings.keySetCacheTtlSeconds,
        fetchTimeoutMs: this.settings.keySetFetchTimeoutMs,
      },
      this.logger,
    );
  }

  /** Audience every accepted token must carry */
  get expectedAudience(): string {
    return this.settings.audience;
  }

  /** URL signing keys are fetched from */
  get jwksUri(): string {
    return this.settings.jwksUri;
  }

  /**
   * Validates a bearer token and returns the identity it authenticates.
   *
   * @param token - Raw token taken from the `Authorization` header
   * @param options - Optional abort signal of the request being served
   * @returns Identity built from the verified claims
   * @throws {MalformedTokenError} When the token cannot be decoded
   * @throws {KeyRetrievalError} When the key set is needed and cannot be fetched
   * @throws {UnknownSigningKeyError} When no published key matches the token's `kid`
   * @throws {SignatureInvalidError} When the algorithm is not allowed or the signature does not verify
   * @throws {ClaimsInvalidError} When audience, issuer, expiry or not-before is out of policy
   */
  async validate(
    token: string,
    options: ValidateOptions = {},
  ): Promise<AuthenticatedIdentity> {
    try {
      // 1. UNVERIFIED - read alg and kid
      const header = decodeTokenHeader(token);

      // 2. reject disallowed algorithms before touching the network
      if (!this.allowedAlgorithms.has(header.alg)) {
        throw new SignatureInvalidError(
          'algorithm_not_allowed',
          `Signing algorithm '${header.alg}' is not allowed`,
        );
      }

      // 3. find the signing key, refetching once on an unknown kid
      const signingKey = await this.resolveSigningKey(header.kid, options.signal);

      // 4. verify signature and claims
      const payload = await this.verify(token, header, signingKey);

      const identity = createIdentity(payload);
      this.logger.debug(
        { kid: header.kid, username: identity.username },
        'bearer token accepted',
      );
      return identity;
    } catch (error) {
      // key retrieval failures are logged where the fetch fails
      if (error instanceof AuthFailure && !(error instanceof KeyRetrievalError)) {
        this.logger.warn(
          {
            code: error.code,
            reason: 'reason' in error ? error.reason : undefined,
            detail: error.message,
          },
          'bearer token rejected',
        );
      }
      throw error;
    }
  }

  /**
   * Fetches the key set now and replaces the stored copy, e.g. to warm the
   * cache at startup.
   *
   * @returns The freshly fetched key set
   * @throws {KeyRetrievalError} When the provider is unreachable or answers with malformed data
   */
  refreshKeySet(): Promise<SigningKeySet> {
    return this.keySetService.refresh();
  }

  private async resolveSigningKey(kid: string, signal?: AbortSignal): Promise<SigningKey> {
    const { keySet, cached } = await untilAborted(this.keySetService.getKeySet(), signal);
    const key = keySet.keys[kid];
    if (key) {
      return key;
    }

    // a cached set may predate a key rotation
    if (cached) {
      this.logger.info({ kid }, 'unknown signing key id, refreshing key set');
      const refreshed = await untilAborted(this.keySetService.refresh(), signal);
      const rotatedKey = refreshed.keys[kid];
      if (rotatedKey) {
        return rotatedKey;
      }
    }

    throw new UnknownSigningKeyError(kid);
  }

  private async verify(
    token: string,
    header: TokenHeader,
    signingKey: SigningKey,
  ): Promise<JWTPayload> {
    if (signingKey.alg && signingKey.alg !== header.alg) {
      throw new SignatureInvalidError(
        'algorithm_mismatch',
        `Signing key '${signingKey.kid}' is published for ${signingKey.alg}, token uses ${header.alg}`,
      );
    }

    const verificationKey = await importJWK(signingKey, header.alg).catch(
      (error: unknown) => {
        throw new SignatureInvalidError(
          'key_unusable',
          `Signing key '${signingKey.kid}' cannot verify ${header.alg}`,
          { cause: error },
        );
      },
    );

    try {
      const { payload } = await jwtVerify(token, verificationKey, {
        algorithms: [...this.settings.algorithms],
        audience: this.settings.audience,
        issuer: this.settings.issuer,
        clockTolerance: this.settings.clockToleranceSeconds,
        requiredClaims: ['exp'],
      });
      return payload;
    } catch (error) {
      throw toAuthFailure(error);
    }
  }
}
