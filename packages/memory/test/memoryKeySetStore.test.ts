import type { SigningKeySet } from '@entra-bearer/core';
import { afterEach, describe, expect, it, vi } from 'vitest';

import { MemoryKeySetStore } from '../src/memoryKeySetStore.js';

const JWKS_URI = 'https://login.microsoftonline.com/tenant-123/discovery/v2.0/keys';

const createKeySet = (
  jwksUri: string,
  expiresAt: number,
  kid = 'abc',
): SigningKeySet => ({
  jwksUri,
  keys: { [kid]: { kid, kty: 'RSA', use: 'sig', n: 'modulus', e: 'AQAB' } },
  fetchedAt: expiresAt - 3_600_000,
  expiresAt,
});

describe('MemoryKeySetStore', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('returns undefined for an unknown URL', async () => {
    const store = new MemoryKeySetStore();

    expect(await store.getKeySet(JWKS_URI)).toBeUndefined();
  });

  it('returns a stored key set', async () => {
    const store = new MemoryKeySetStore();
    const keySet = createKeySet(JWKS_URI, Date.now() + 60_000);

    await store.saveKeySet(keySet);

    expect(await store.getKeySet(JWKS_URI)).toBe(keySet);
  });

  it('replaces the previous key set for the same URL', async () => {
    const store = new MemoryKeySetStore();
    await store.saveKeySet(createKeySet(JWKS_URI, Date.now() + 60_000, 'old'));
    const rotated = createKeySet(JWKS_URI, Date.now() + 60_000, 'new');

    await store.saveKeySet(rotated);

    expect(await store.getKeySet(JWKS_URI)).toBe(rotated);
  });

  it('drops a key set once it has expired', async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2026-03-01T10:00:00Z'));
    const store = new MemoryKeySetStore();
    await store.saveKeySet(createKeySet(JWKS_URI, Date.now() + 60_000));

    vi.setSystemTime(new Date('2026-03-01T10:01:00Z'));

    expect(await store.getKeySet(JWKS_URI)).toBeUndefined();
  });

  it('deletes a key set', async () => {
    const store = new MemoryKeySetStore();
    await store.saveKeySet(createKeySet(JWKS_URI, Date.now() + 60_000));

    await store.deleteKeySet(JWKS_URI);

    expect(await store.getKeySet(JWKS_URI)).toBeUndefined();
  });

  it('evicts the least recently used URL beyond maxEntries', async () => {
    const store = new MemoryKeySetStore({ maxEntries: 2 });
    const expiresAt = Date.now() + 60_000;
    await store.saveKeySet(createKeySet('https://keys.example/a', expiresAt));
    await store.saveKeySet(createKeySet('https://keys.example/b', expiresAt));
    await store.getKeySet('https://keys.example/a');

    await store.saveKeySet(createKeySet('https://keys.example/c', expiresAt));

    expect(await store.getKeySet('https://keys.example/a')).toBeDefined();
    expect(await store.getKeySet('https://keys.example/b')).toBeUndefined();
    expect(await store.getKeySet('https://keys.example/c')).toBeDefined();
  });
});
