import { Writable } from 'node:stream';

import { exportJWK, generateKeyPair, type JWK, type JWTPayload, SignJWT } from 'jose';
import { pino } from 'pino';
import { vi } from 'vitest';

import type { KeySetStore, SigningKeySet } from '../../src/interfaces/index.js';

export const TEST_TENANT_ID = 'tenant-123';
export const TEST_CLIENT_ID = 'client-123';
export const TEST_AUDIENCE = 'api://client-123';
export const TEST_ISSUER = 'https://sts.windows.net/tenant-123/';
export const TEST_JWKS_URI =
  'https://login.microsoftonline.com/tenant-123/discovery/v2.0/keys';

type TestKeyPair = Awaited<ReturnType<typeof generateKeyPair>>;

export interface TestSigningKey {
  kid: string;
  privateKey: TestKeyPair['privateKey'];
  jwk: JWK;
}

/**
 * Generates a key pair and the public JWK an identity provider would publish for it.
 */
export async function createTestSigningKey(
  kid: string,
  alg = 'RS256',
): Promise<TestSigningKey> {
  const { privateKey, publicKey } = await generateKeyPair(alg);
  const jwk = { ...(await exportJWK(publicKey)), kid, use: 'sig' };
  return { kid, privateKey, jwk };
}

/**
 * Signs an access token shaped like an Azure AD v2.0 token; `claims` override the defaults.
 */
export async function signTestToken(
  key: TestSigningKey,
  claims: JWTPayload = {},
  header: { alg?: string; kid?: string } = {},
): Promise<string> {
  const now = Math.floor(Date.now() / 1000);
  return await new SignJWT({
    aud: TEST_AUDIENCE,
    iss: TEST_ISSUER,
    sub: 'user-sub-1',
    oid: 'object-id-1',
    tid: TEST_TENANT_ID,
    name: 'Jane Smith',
    preferred_username: 'jane.smith@contoso.example',
    scp: 'Cases.Read Cases.Write',
    iat: now,
    exp: now + 3600,
    ...claims,
  })
    .setProtectedHeader({
      alg: header.alg ?? 'RS256',
      kid: header.kid ?? key.kid,
      typ: 'JWT',
    })
    .sign(key.privateKey);
}

/** base64url-encodes a JSON value as one token segment */
export function encodeSegment(value: unknown): string {
  return Buffer.from(JSON.stringify(value)).toString('base64url');
}

/** Builds a token with an arbitrary header and an empty signature */
export function createUnsignedToken(
  header: Record<string, unknown>,
  payload: JWTPayload = { aud: TEST_AUDIENCE },
): string {
  return `${encodeSegment(header)}.${encodeSegment(payload)}.`;
}

export function createJwksResponse(keys: unknown[], status = 200): Response {
  return new Response(JSON.stringify({ keys }), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

/**
 * KeySetStore backed by a Map, with every method spied.
 */
export function createMockKeySetStore() {
  const entries = new Map<string, SigningKeySet>();
  const store = {
    entries,
    getKeySet: vi.fn(async (jwksUri: string) => entries.get(jwksUri)),
    saveKeySet: vi.fn(async (keySet: SigningKeySet) => {
      entries.set(keySet.jwksUri, keySet);
    }),
    deleteKeySet: vi.fn(async (jwksUri: string) => {
      entries.delete(jwksUri);
    }),
  } satisfies KeySetStore & { entries: Map<string, SigningKeySet> };
  return store;
}

/** A promise whose settlement the test controls */
export function createDeferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** Debug-level pino logger collecting every parsed log line in `entries` */
export function createLogCapture() {
  const entries: unknown[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      entries.push(JSON.parse(chunk.toString()));
      callback();
    },
  });
  return { entries, logger: pino({ level: 'debug' }, stream) };
}
