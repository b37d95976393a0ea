import { Hono } from 'hono';
import type { OAuthVariables } from '../../types/hono.js';
import type { AuthorizationServer } from '../../authorization-server.js';
import { readRawRequest, sendEngineResponse } from '../engine-adapter.js';

export interface TokenRouteOptions {
  server: AuthorizationServer;
}

/**
 * Create token endpoint routes
 */
export function createTokenRoutes(options: TokenRouteOptions) {
  const { server } = options;

  const router = new Hono<{ Variables: OAuthVariables }>();

  // Every method reaches the engine, which answers anything but POST
  // with invalid_request
  router.all('/', async (c) => {
    const response = await server.handleTokenRequest(await readRawRequest(c));
    return sendEngineResponse(response);
  });

  return router;
}
