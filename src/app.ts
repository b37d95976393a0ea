import { Hono } from 'hono';
import { cors } from 'hono/cors';
import type { OAuthVariables } from './types/hono.js';
import type { AuthorizationServer } from './authorization-server.js';
import { oauthErrorHandler, securityHeaders, requestLogger } from './middleware/error-handler.js';
import { rateLimiter } from './middleware/rate-limiter.js';
import { logger, errorFields } from './services/logger.js';
import {
  createAuthorizeRoutes,
  createTokenRoutes,
  createIntrospectRoutes,
  createRevokeRoutes,
} from './routes/oauth/index.js';
import {
  DEFAULT_RATE_LIMIT_MAX_REQUESTS,
  DEFAULT_RATE_LIMIT_WINDOW_MS,
} from './config/constants.js';

export interface OAuth2ServerOptions {
  server: AuthorizationServer;
  rateLimit?: {
    windowMs: number;
    maxRequests: number;
  };
  enableCors?: boolean;
  enableLogging?: boolean;
  /**
   * Sweep expired credentials from the store at this interval.
   * Off when absent; expiry is enforced at lookup either way.
   */
  sweepIntervalMs?: number;
}

/**
 * Create the OAuth 2.0 Authorization Server application
 */
export function createOAuth2Server(options: OAuth2ServerOptions): Hono<{ Variables: OAuthVariables }> {
  const {
    server,
    rateLimit = { windowMs: DEFAULT_RATE_LIMIT_WINDOW_MS, maxRequests: DEFAULT_RATE_LIMIT_MAX_REQUESTS },
    enableCors = true,
    enableLogging = true,
    sweepIntervalMs,
  } = options;

  const app = new Hono<{ Variables: OAuthVariables }>();

  // Global error handler
  app.onError(oauthErrorHandler);

  // Security headers
  app.use('*', securityHeaders());

  // Logging
  if (enableLogging) {
    app.use('*', requestLogger());
  }

  // CORS (needed for token endpoint from SPAs)
  if (enableCors) {
    app.use(
      '*',
      cors({
        origin: '*',
        allowMethods: ['GET', 'POST', 'OPTIONS'],
        allowHeaders: ['Authorization', 'Content-Type'],
        exposeHeaders: ['WWW-Authenticate'],
        maxAge: 86400,
      })
    );
  }

  // Rate limiting
  app.use('*', rateLimiter(rateLimit));

  // Health check
  app.get('/health', (c) => c.json({ status: 'ok' }));

  // OAuth endpoints
  app.route('/authorize', createAuthorizeRoutes({ server }));
  app.route('/token', createTokenRoutes({ server }));
  app.route('/introspect', createIntrospectRoutes({ server }));
  app.route('/revoke', createRevokeRoutes({ server }));

  if (sweepIntervalMs) {
    const sweep = setInterval(() => {
      server.sweepExpired().then(
        (deleted) => logger.debug('Expired credentials swept', { deleted }),
        (error: unknown) => logger.error('Credential sweep failed', errorFields(error))
      );
    }, sweepIntervalMs);

    // Prevent the interval from keeping the process alive
    sweep.unref();
  }

  return app;
}
