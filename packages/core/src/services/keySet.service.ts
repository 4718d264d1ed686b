import type { Logger } from 'pino';

import { KeyRetrievalError } from '../errors.js';
import type { SigningKeySet } from '../interfaces/jwks.js';
import type { KeySetStore } from '../interfaces/keySetStore.js';
import {
  JsonWebKeySetSchema,
  type SigningKey,
  SigningKeySchema,
} from '../schemas/jwks.schema.js';
import { discoveryFetch } from '../utils/discoveryFetch.js';
import { formatError } from '../utils/errorFormatting.js';

export interface KeySetServiceSettings {
  jwksUri: string;
  cacheTtlSeconds: number;
  fetchTimeoutMs: number;
}

/** A key set together with where it came from */
export interface ResolvedKeySet {
  keySet: SigningKeySet;
  /** True when served from the store rather than fetched for this call */
  cached: boolean;
}

/**
 * Retrieves the identity provider's signing keys, going through a
 * `KeySetStore` so fetches are shared across requests.
 *
 * Concurrent refreshes share a single in-flight request.
 */
export class KeySetService {
  private pendingFetch?: Promise<SigningKeySet>;

  constructor(
    private store: KeySetStore,
    private settings: KeySetServiceSettings,
    private logger: Logger,
  ) {}

  /**
   * Returns the stored key set while it is fresh, otherwise fetches a new one.
   *
   * @throws {KeyRetrievalError} When a fetch was needed and failed
   */
  async getKeySet(): Promise<ResolvedKeySet> {
    const stored = await this.store.getKeySet(this.settings.jwksUri);
    if (stored && stored.expiresAt > Date.now()) {
      this.logger.debug({ jwksUri: stored.jwksUri }, 'signing key set cache hit');
      return { keySet: stored, cached: true };
    }

    this.logger.debug(
      { jwksUri: this.settings.jwksUri, expired: Boolean(stored) },
      'signing key set cache miss',
    );
    return { keySet: await this.refresh(), cached: false };
  }

  /**
   * Fetches the key set and replaces the stored entry, joining a fetch that is
   * already in flight.
   *
   * @throws {KeyRetrievalError} When the provider is unreachable or answers with malformed data
   */
  refresh(): Promise<SigningKeySet> {
    if (!this.pendingFetch) {
      this.pendingFetch = this.fetchKeySet().finally(() => {
        this.pendingFetch = undefined;
      });
    }
    return this.pendingFetch;
  }

  private async fetchKeySet(): Promise<SigningKeySet> {
    const { jwksUri } = this.settings;
    this.logger.debug({ jwksUri }, 'fetching signing key set');

    let response: Response;
    try {
      response = await discoveryFetch(jwksUri, {
        signal: AbortSignal.timeout(this.settings.fetchTimeoutMs),
      });
    } catch (error) {
      throw this.retrievalFailure(`Signing key request failed: ${formatError(error)}`, error);
    }

    if (!response.ok) {
      throw this.retrievalFailure(
        `Signing key request failed: ${response.status} ${response.statusText}`,
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw this.retrievalFailure('Signing key response is not valid JSON', error);
    }

    const result = JsonWebKeySetSchema.safeParse(body);
    if (!result.success) {
      throw this.retrievalFailure('Signing key response has no keys array', result.error);
    }

    const keys: Record<string, SigningKey> = {};
    for (const candidate of result.data.keys) {
      const key = SigningKeySchema.safeParse(candidate);
      if (!key.success) {
        this.logger.debug({ jwksUri }, 'skipping signing key without kid or kty');
        continue;
      }
      if (key.data.use && key.data.use !== 'sig') {
        continue;
      }
      keys[key.data.kid] = key.data;
    }

    const fetchedAt = Date.now();
    const keySet: SigningKeySet = Object.freeze({
      jwksUri,
      keys: Object.freeze(keys),
      fetchedAt,
      expiresAt: fetchedAt + this.settings.cacheTtlSeconds * 1000,
    });
    await this.store.saveKeySet(keySet);

    this.logger.info({ jwksUri, keyIds: Object.keys(keys) }, 'signing key set refreshed');
    return keySet;
  }

  private retrievalFailure(message: string, cause?: unknown): KeyRetrievalError {
    this.logger.error({ jwksUri: this.settings.jwksUri, err: cause }, message);
    return new KeyRetrievalError(message, { cause });
  }
}
