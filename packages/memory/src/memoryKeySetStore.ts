import type { KeySetStore, SigningKeySet } from '@entra-bearer/core';
import { LRUCache } from 'lru-cache';
import { type Logger, pino } from 'pino';

import type { MemoryKeySetStoreConfig } from './interfaces/memoryKeySetStoreConfig.js';

/**
 * In-memory signing key set store.
 *
 * Each process keeps its own copy, so every instance of a scaled-out or
 * serverless deployment fetches the key set independently. Entries are
 * evicted least-recently-used beyond `maxEntries` and dropped on read once
 * their `expiresAt` has passed.
 */
export class MemoryKeySetStore implements KeySetStore {
  private keySets: LRUCache<string, SigningKeySet>;
  private logger: Logger;

  constructor(config?: MemoryKeySetStoreConfig) {
    this.keySets = new LRUCache<string, SigningKeySet>({
      max: config?.maxEntries ?? 16,
    });
    this.logger = config?.logger ?? pino({ enabled: false });
  }

  async getKeySet(jwksUri: string): Promise<SigningKeySet | undefined> {
    const keySet = this.keySets.get(jwksUri);
    if (keySet && keySet.expiresAt <= Date.now()) {
      this.logger.debug({ jwksUri }, 'dropping expired key set');
      this.keySets.delete(jwksUri);
      return undefined;
    }
    return keySet;
  }

  async saveKeySet(keySet: SigningKeySet): Promise<void> {
    this.keySets.set(keySet.jwksUri, keySet);
    this.logger.debug(
      { jwksUri: keySet.jwksUri, keyCount: Object.keys(keySet.keys).length },
      'key set stored',
    );
  }

  async deleteKeySet(jwksUri: string): Promise<void> {
    this.keySets.delete(jwksUri);
  }
}
