import { Hono } from 'hono';
import type { OAuthVariables } from '../../types/hono.js';
import type { AuthorizationServer } from '../../authorization-server.js';
import { readRawRequest, sendEngineResponse } from '../engine-adapter.js';

export interface IntrospectRouteOptions {
  server: AuthorizationServer;
}

/**
 * Create token introspection endpoint routes
 *
 * RFC 7662
 */
export function createIntrospectRoutes(options: IntrospectRouteOptions) {
  const { server } = options;

  const router = new Hono<{ Variables: OAuthVariables }>();

  // POST /introspect
  router.all('/', async (c) => {
    const response = await server.handleIntrospectionRequest(await readRawRequest(c));
    return sendEngineResponse(response);
  });

  return router;
}
