import type { ErrorHandler, MiddlewareHandler } from 'hono';
import type { OAuthVariables } from '../types/hono.js';
import { OAuthError } from '../errors/oauth-error.js';
import { errorResponse } from '../services/response-service.js';
import { logger, errorFields } from '../services/logger.js';
import { sendEngineResponse } from '../routes/engine-adapter.js';

/**
 * Global error handler
 *
 * Anything that escapes a route becomes a direct OAuth error response.
 * Errors outside the taxonomy are logged and answered with a bare server_error.
 */
export const oauthErrorHandler: ErrorHandler<{ Variables: OAuthVariables }> = (err, c) => {
  if (!(err instanceof OAuthError)) {
    logger.error('Unhandled error', { method: c.req.method, path: c.req.path, ...errorFields(err) });
  }

  return sendEngineResponse(errorResponse(err));
};

/**
 * Security headers middleware
 */
export function securityHeaders(): MiddlewareHandler<{ Variables: OAuthVariables }> {
  return async (c, next) => {
    await next();

    // Prevent clickjacking
    c.header('X-Frame-Options', 'DENY');

    // Prevent MIME type sniffing
    c.header('X-Content-Type-Options', 'nosniff');

    // Referrer policy; keeps codes and tokens out of Referer headers
    c.header('Referrer-Policy', 'no-referrer');

    if (c.req.path.includes('/authorize')) {
      c.header('Content-Security-Policy', "default-src 'none'; frame-ancestors 'none'");
    }

    // Strict Transport Security (enable in production with HTTPS)
    if (process.env['NODE_ENV'] === 'production') {
      c.header('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
    }
  };
}

/**
 * Request logging middleware
 */
export function requestLogger(): MiddlewareHandler<{ Variables: OAuthVariables }> {
  return async (c, next) => {
    const start = Date.now();
    const method = c.req.method;
    const path = c.req.path;

    await next();

    // Never log bodies or query strings: they carry credentials
    logger.info('Request handled', {
      method,
      path,
      status: c.res.status,
      duration: Date.now() - start,
      clientId: c.get('credential')?.clientId,
    });
  };
}
