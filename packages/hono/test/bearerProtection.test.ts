import {
  type AuthenticatedIdentity,
  ClaimsInvalidError,
  KeyRetrievalError,
  MalformedTokenError,
  type TokenVerifier,
  UnknownSigningKeyError,
} from '@entra-bearer/core';
import { Hono } from 'hono';
import { timing } from 'hono/timing';
import { beforeEach, describe, expect, it, type Mock, vi } from 'vitest';

import { type BearerContextVariables, secureBearerToken } from '../src/bearerProtection/index.js';
import { createLogCapture } from './helpers/logCapture.js';

const identity: AuthenticatedIdentity = {
  username: 'jane.smith@contoso.example',
  subject: 'user-sub-1',
  scopes: ['Cases.Read'],
  roles: [],
  claims: { preferred_username: 'jane.smith@contoso.example' },
};

describe('secureBearerToken', () => {
  let validate: Mock<TokenVerifier['validate']>;
  let app: Hono<{ Variables: BearerContextVariables }>;
  let logs: ReturnType<typeof createLogCapture>;

  beforeEach(() => {
    validate = vi.fn<TokenVerifier['validate']>().mockResolvedValue(identity);
    logs = createLogCapture();
    app = new Hono<{ Variables: BearerContextVariables }>();
    app.use(timing());
    app.get('/protected', secureBearerToken({ validate }, { logger: logs.logger }), (c) =>
      c.json({ username: c.get('identity').username }),
    );
  });

  it('passes the identity to the handler', async () => {
    const res = await app.request('/protected', {
      headers: { Authorization: 'Bearer abc.def.ghi' },
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ username: 'jane.smith@contoso.example' });
    expect(validate).toHaveBeenCalledWith('abc.def.ghi', {
      signal: expect.any(AbortSignal),
    });
  });

  it('answers 401 Not authenticated without an Authorization header', async () => {
    const res = await app.request('/protected');

    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({ detail: 'Not authenticated' });
    expect(res.headers.get('WWW-Authenticate')).toBe('Bearer');
    expect(validate).not.toHaveBeenCalled();
  });

  it('answers 401 Not authenticated for another scheme', async () => {
    const res = await app.request('/protected', {
      headers: { Authorization: 'Basic dXNlcjpwYXNz' },
    });

    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({ detail: 'Not authenticated' });
    expect(validate).not.toHaveBeenCalled();
  });

  it.each([
    ['a malformed token', new MalformedTokenError('Token must have 3 segments, found 1')],
    ['an unknown key', new UnknownSigningKeyError('rotated')],
    ['an expired token', new ClaimsInvalidError('expired', 'Token has expired')],
  ])('answers 401 Invalid credentials for %s without leaking details', async (_label, error) => {
    validate.mockRejectedValue(error);

    const res = await app.request('/protected', {
      headers: { Authorization: 'Bearer abc.def.ghi' },
    });

    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({ detail: 'Invalid credentials' });
    expect(res.headers.get('WWW-Authenticate')).toBe('Bearer error="invalid_token"');
  });

  it('answers 503 when signing keys cannot be retrieved', async () => {
    validate.mockRejectedValue(new KeyRetrievalError('Signing key request failed: fetch failed'));

    const res = await app.request('/protected', {
      headers: { Authorization: 'Bearer abc.def.ghi' },
    });

    expect(res.status).toBe(503);
    expect(await res.json()).toEqual({ detail: 'Authentication service unavailable' });
  });

  it('logs the rejection code and reason', async () => {
    validate.mockRejectedValue(new ClaimsInvalidError('wrong_audience'));

    await app.request('/protected', {
      headers: { Authorization: 'Bearer abc.def.ghi' },
    });

    expect(logs.entries).toContainEqual(
      expect.objectContaining({
        level: 40,
        msg: 'bearer token rejected',
        code: 'CLAIMS_INVALID',
        reason: 'wrong_audience',
        path: '/protected',
      }),
    );
  });

  it('logs the cause of a key retrieval failure', async () => {
    validate.mockRejectedValue(
      new KeyRetrievalError('Signing key request failed: connect ECONNREFUSED 192.0.2.10:443'),
    );

    await app.request('/protected', {
      headers: { Authorization: 'Bearer abc.def.ghi' },
    });

    expect(logs.entries).toContainEqual(
      expect.objectContaining({
        level: 50,
        msg: 'signing keys unavailable',
        err: expect.objectContaining({
          type: 'KeyRetrievalError',
          message: 'Signing key request failed: connect ECONNREFUSED 192.0.2.10:443',
        }),
      }),
    );
  });

  it('ends quietly when the client disconnects during validation', async () => {
    const controller = new AbortController();
    validate.mockImplementation(async () => {
      controller.abort();
      throw new DOMException('This operation was aborted', 'AbortError');
    });
    const errorHandler = vi.fn();
    app.onError((error, c) => {
      errorHandler(error);
      return c.json({ detail: 'handled' }, 500);
    });

    const res = await app.request('/protected', {
      headers: { Authorization: 'Bearer abc.def.ghi' },
      signal: controller.signal,
    });

    expect(res.status).toBe(499);
    expect(errorHandler).not.toHaveBeenCalled();
    expect(logs.entries).toContainEqual(
      expect.objectContaining({
        level: 20,
        msg: 'client disconnected during token validation',
      }),
    );
  });

  it('lets unexpected errors reach the error handler', async () => {
    validate.mockRejectedValue(new Error('boom'));
    app.onError((_error, c) => c.json({ detail: 'handled' }, 500));

    const res = await app.request('/protected', {
      headers: { Authorization: 'Bearer abc.def.ghi' },
    });

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ detail: 'handled' });
  });
});
