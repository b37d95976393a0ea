import type { MiddlewareHandler } from 'hono';
import type { OAuthVariables } from '../types/hono.js';
import type { AuthorizationServer } from '../authorization-server.js';
import type { ScopeSet } from '../services/scope-service.js';
import { sendEngineResponse } from '../routes/engine-adapter.js';
import { CONTENT_TYPE_FORM, HEADER_AUTHORIZATION } from '../config/constants.js';

export interface BearerAuthOptions {
  server: AuthorizationServer;
  requiredScope?: ScopeSet | string;
}

/**
 * Middleware to validate opaque bearer tokens
 *
 * Accepts the token in the Authorization header, an access_token form field
 * or an access_token query parameter (RFC 6750 Section 2), but only one of them.
 * Failures are answered with a WWW-Authenticate challenge.
 *
 * Sets `credential` in context variables on success
 */
export function bearerAuth(options: BearerAuthOptions): MiddlewareHandler<{
  Variables: OAuthVariables;
}> {
  const { server, requiredScope } = options;

  return async (c, next) => {
    let formToken: string | undefined;
    if (c.req.method !== 'GET' && c.req.header('content-type')?.startsWith(CONTENT_TYPE_FORM)) {
      const value = (await c.req.parseBody())['access_token'];
      formToken = typeof value === 'string' ? value : undefined;
    }

    const result = await server.authenticateResource(
      {
        authorization: c.req.header(HEADER_AUTHORIZATION),
        formToken,
        queryToken: c.req.query('access_token'),
      },
      requiredScope
    );

    if (!result.authenticated) {
      return sendEngineResponse(result.response);
    }

    c.set('credential', result.credential);
    await next();
  };
}
