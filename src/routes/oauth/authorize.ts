import { Hono } from 'hono';
import type { OAuthVariables } from '../../types/hono.js';
import type { AuthorizationServer } from '../../authorization-server.js';
import { readRawRequest, sendEngineResponse } from '../engine-adapter.js';

export interface AuthorizeRouteOptions {
  server: AuthorizationServer;
}

/**
 * Create authorization endpoint routes
 *
 * RFC 6749 Section 3.1: GET must be supported, POST may be. A POST may
 * carry the request parameters in its query, e.g. a login form posting
 * the owner's credentials back to the authorization URL.
 */
export function createAuthorizeRoutes(options: AuthorizeRouteOptions) {
  const { server } = options;

  const router = new Hono<{ Variables: OAuthVariables }>();

  // GET/POST /authorize
  router.on(['GET', 'POST'], '/', async (c) => {
    const response = await server.handleAuthorizationRequest(
      await readRawRequest(c, { includeQuery: true })
    );
    return sendEngineResponse(response);
  });

  return router;
}
