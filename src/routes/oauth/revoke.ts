import { Hono } from 'hono';
import type { OAuthVariables } from '../../types/hono.js';
import type { AuthorizationServer } from '../../authorization-server.js';
import { readRawRequest, sendEngineResponse } from '../engine-adapter.js';

export interface RevokeRouteOptions {
  server: AuthorizationServer;
}

/**
 * Create token revocation endpoint routes
 *
 * RFC 7009
 */
export function createRevokeRoutes(options: RevokeRouteOptions) {
  const { server } = options;

  const router = new Hono<{ Variables: OAuthVariables }>();

  // POST /revoke
  router.all('/', async (c) => {
    const response = await server.handleRevocationRequest(await readRawRequest(c));
    return sendEngineResponse(response);
  });

  return router;
}
