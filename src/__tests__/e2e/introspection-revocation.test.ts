import { describe, it, expect, beforeEach } from 'vitest';
import {
  setupTestContext,
  basicAuth,
  formPost,
  bearer,
  readTokenResponse,
  readErrorResponse,
  introspectionResponseSchema,
  clientCredentialsToken,
  CONFIDENTIAL_CLIENT_ID,
  CONFIDENTIAL_CLIENT_SECRET,
  REDIRECT_URI,
  USERNAME,
  PASSWORD,
  TEST_SECRET,
  type TestContext,
} from './test-setup.js';
import { generateToken } from '../../crypto/opaque-token.js';

// 2024-01-01T00:00:00Z
const ISSUED_AT = 1704067200;

describe('Token Introspection and Revocation', () => {
  let ctx: TestContext;

  const clientAuth = { Authorization: basicAuth(CONFIDENTIAL_CLIENT_ID, CONFIDENTIAL_CLIENT_SECRET) };

  const introspect = async (params: Record<string, string>, headers = clientAuth) => {
    const res = await ctx.app.request('/introspect', formPost(params, headers));
    return { status: res.status, body: introspectionResponseSchema.parse(await res.json()) };
  };

  const revoke = (params: Record<string, string>, headers = clientAuth) =>
    ctx.app.request('/revoke', formPost(params, headers));

  beforeEach(async () => {
    ctx = await setupTestContext();
  });

  describe('Introspection', () => {
    it('should describe an active access token', async () => {
      const tokens = await clientCredentialsToken(ctx, 'foo');

      const { status, body } = await introspect({ token: tokens.access_token });

      expect(status).toBe(200);
      expect(body).toEqual({
        active: true,
        scope: 'foo',
        client_id: CONFIDENTIAL_CLIENT_ID,
        token_type: 'access_token',
        iat: ISSUED_AT,
        exp: ISSUED_AT + 3600,
      });
    });

    it('should describe a refresh token with its owner', async () => {
      const res = await ctx.app.request(
        '/token',
        formPost({ grant_type: 'password', username: USERNAME, password: PASSWORD, scope: 'bar' }, clientAuth)
      );
      const { refresh_token: refreshToken } = await readTokenResponse(res);

      const { body } = await introspect({ token: refreshToken ?? '', token_type_hint: 'refresh_token' });

      expect(body).toEqual({
        active: true,
        scope: 'bar',
        client_id: CONFIDENTIAL_CLIENT_ID,
        username: USERNAME,
        token_type: 'refresh_token',
        iat: ISSUED_AT,
        exp: ISSUED_AT + 604800,
      });
    });

    it('should report an expired token as inactive', async () => {
      const tokens = await clientCredentialsToken(ctx);
      ctx.clock.advance(3600);

      const { status, body } = await introspect({ token: tokens.access_token });

      expect(status).toBe(200);
      expect(body).toEqual({ active: false });
    });

    it('should report an unknown token as inactive', async () => {
      const unknown = generateToken(Buffer.from(TEST_SECRET), 32).toString();

      const { body } = await introspect({ token: unknown });

      expect(body).toEqual({ active: false });
    });

    it('should reject an unsupported token_type_hint', async () => {
      const tokens = await clientCredentialsToken(ctx);

      const res = await ctx.app.request(
        '/introspect',
        formPost({ token: tokens.access_token, token_type_hint: 'id_token' }, clientAuth)
      );

      expect(res.status).toBe(400);
      expect(await readErrorResponse(res)).toEqual({
        error: 'unsupported_token_type',
        error_description: 'Unsupported token_type_hint: id_token',
      });
    });

    it('should reject a malformed token', async () => {
      const res = await ctx.app.request('/introspect', formPost({ token: 'not-a-token' }, clientAuth));

      expect(res.status).toBe(400);
      expect(await readErrorResponse(res)).toEqual({
        error: 'invalid_request',
        error_description: 'Malformed token',
      });
    });

    it("should refuse another client's token", async () => {
      await ctx.storage.clients.create({ id: 'other-client', secret: 'other-secret', redirectUri: REDIRECT_URI });
      const tokens = await clientCredentialsToken(ctx);

      const res = await ctx.app.request(
        '/introspect',
        formPost({ token: tokens.access_token }, { Authorization: basicAuth('other-client', 'other-secret') })
      );

      expect(res.status).toBe(401);
      expect(await readErrorResponse(res)).toEqual({
        error: 'invalid_client',
        error_description: 'Token was issued to a different client',
      });
    });

    it('should require client authentication', async () => {
      const tokens = await clientCredentialsToken(ctx);

      const res = await ctx.app.request('/introspect', formPost({ token: tokens.access_token }));

      expect(res.status).toBe(401);
      expect((await readErrorResponse(res)).error).toBe('invalid_client');
    });

    it('should require POST', async () => {
      const res = await ctx.app.request('/introspect?token=abc', { headers: clientAuth });

      expect(res.status).toBe(400);
      expect(await readErrorResponse(res)).toEqual({
        error: 'invalid_request',
        error_description: 'Requests must use POST',
      });
    });
  });

  describe('Revocation', () => {
    it('should revoke an access token', async () => {
      const tokens = await clientCredentialsToken(ctx);

      const res = await revoke({ token: tokens.access_token });

      expect(res.status).toBe(200);
      expect(await res.text()).toBe('');

      const resource = await ctx.app.request('/resource', { headers: bearer(tokens.access_token) });
      expect(resource.status).toBe(401);
      expect(resource.headers.get('WWW-Authenticate')).toBe(
        'Bearer error="invalid_token", error_description="unknown token"'
      );
    });

    it('should revoke a refresh token', async () => {
      const tokens = await clientCredentialsToken(ctx);

      expect((await revoke({ token: tokens.refresh_token ?? '', token_type_hint: 'refresh_token' })).status).toBe(200);

      const res = await ctx.app.request(
        '/token',
        formPost({ grant_type: 'refresh_token', refresh_token: tokens.refresh_token ?? '' }, clientAuth)
      );
      expect(res.status).toBe(400);
      expect(await readErrorResponse(res)).toEqual({
        error: 'invalid_grant',
        error_description: 'Invalid refresh token',
      });

      // The access token of the same grant stays valid
      const resource = await ctx.app.request('/resource', { headers: bearer(tokens.access_token) });
      expect(resource.status).toBe(200);
    });

    it('should accept an unknown token', async () => {
      const unknown = generateToken(Buffer.from(TEST_SECRET), 32).toString();

      const res = await revoke({ token: unknown });

      expect(res.status).toBe(200);
    });

    it('should require the token parameter', async () => {
      const res = await revoke({});

      expect(res.status).toBe(400);
      expect(await readErrorResponse(res)).toEqual({
        error: 'invalid_request',
        error_description: 'Missing token parameter',
      });
    });

    it("should not revoke another client's token", async () => {
      await ctx.storage.clients.create({ id: 'other-client', secret: 'other-secret', redirectUri: REDIRECT_URI });
      const tokens = await clientCredentialsToken(ctx);

      const res = await revoke(
        { token: tokens.access_token },
        { Authorization: basicAuth('other-client', 'other-secret') }
      );

      expect(res.status).toBe(401);
      expect(ctx.storage.credentials.count('access_token')).toBe(1);
    });
  });
});
