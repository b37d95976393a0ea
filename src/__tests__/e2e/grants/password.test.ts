import { describe, it, expect, beforeEach } from 'vitest';
import {
  setupTestContext,
  basicAuth,
  formPost,
  bearer,
  readTokenResponse,
  readErrorResponse,
  CONFIDENTIAL_CLIENT_ID,
  CONFIDENTIAL_CLIENT_SECRET,
  USERNAME,
  PASSWORD,
  type TestContext,
} from '../test-setup.js';

describe('Resource Owner Password Credentials Grant', () => {
  let ctx: TestContext;

  const passwordGrant = (params: Record<string, string>) =>
    ctx.app.request(
      '/token',
      formPost(
        { grant_type: 'password', ...params },
        { Authorization: basicAuth(CONFIDENTIAL_CLIENT_ID, CONFIDENTIAL_CLIENT_SECRET) }
      )
    );

  beforeEach(async () => {
    ctx = await setupTestContext();
  });

  it('should issue tokens for valid owner credentials', async () => {
    const res = await passwordGrant({ username: USERNAME, password: PASSWORD, scope: 'foo' });

    expect(res.status).toBe(200);
    const tokens = await readTokenResponse(res);
    expect(tokens.scope).toBe('foo');
    expect(tokens.expires_in).toBe(3600);
    expect(tokens.refresh_token).toBeDefined();

    const resource = await ctx.app.request('/resource', { headers: bearer(tokens.access_token) });
    expect(await resource.json()).toEqual({ client_id: CONFIDENTIAL_CLIENT_ID, username: USERNAME });
  });

  it('should deny a wrong password', async () => {
    const res = await passwordGrant({ username: USERNAME, password: 'wrong-password' });

    expect(res.status).toBe(403);
    expect(await readErrorResponse(res)).toEqual({
      error: 'access_denied',
      error_description: 'Invalid resource owner credentials',
    });
  });

  it('should deny an unknown owner', async () => {
    const res = await passwordGrant({ username: 'nobody', password: PASSWORD });

    expect(res.status).toBe(403);
    expect((await readErrorResponse(res)).error).toBe('access_denied');
  });

  it('should reject a scope outside the allowed scope', async () => {
    const res = await passwordGrant({ username: USERNAME, password: PASSWORD, scope: 'foo admin' });

    expect(res.status).toBe(400);
    expect(await readErrorResponse(res)).toEqual({
      error: 'invalid_scope',
      error_description: 'Invalid or unauthorized scopes: admin',
    });
    expect(ctx.storage.credentials.count('access_token')).toBe(0);
  });
});
