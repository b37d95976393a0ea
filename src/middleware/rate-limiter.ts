import type { Context, MiddlewareHandler } from 'hono';
import type { OAuthVariables } from '../types/hono.js';
import { OAuthError } from '../errors/oauth-error.js';
import { errorResponse } from '../services/response-service.js';
import { sendEngineResponse } from '../routes/engine-adapter.js';

export interface RateLimiterOptions {
  windowMs: number; // Time window in milliseconds
  maxRequests: number; // Maximum requests per window
  keyGenerator?: (c: Context) => string; // Custom key generator
}

interface RateLimitEntry {
  count: number;
  resetAt: number;
}

/**
 * Simple in-memory fixed-window rate limiter
 * For several processes, put a shared store behind it
 */
export function rateLimiter(options: RateLimiterOptions): MiddlewareHandler<{
  Variables: OAuthVariables;
}> {
  const { windowMs, maxRequests, keyGenerator = defaultKeyGenerator } = options;

  const store = new Map<string, RateLimitEntry>();

  // Cleanup expired entries periodically
  const cleanupInterval = setInterval(() => {
    const now = Date.now();
    for (const [key, entry] of store) {
      if (entry.resetAt <= now) {
        store.delete(key);
      }
    }
  }, windowMs);

  // Prevent the interval from keeping the process alive
  cleanupInterval.unref();

  return async (c, next) => {
    const key = keyGenerator(c);
    const now = Date.now();

    let entry = store.get(key);

    // Create new entry if doesn't exist or window has passed
    if (!entry || entry.resetAt <= now) {
      entry = {
        count: 0,
        resetAt: now + windowMs,
      };
      store.set(key, entry);
    }

    const reset = String(Math.ceil(entry.resetAt / 1000));

    // Check if over limit
    if (entry.count >= maxRequests) {
      const retryAfter = Math.ceil((entry.resetAt - now) / 1000);
      const response = errorResponse(
        OAuthError.temporarilyUnavailable(`Rate limit exceeded. Try again in ${retryAfter} seconds.`)
      );

      Object.assign(response.headers, {
        'Retry-After': String(retryAfter),
        'X-RateLimit-Limit': String(maxRequests),
        'X-RateLimit-Remaining': '0',
        'X-RateLimit-Reset': reset,
      });

      return sendEngineResponse(response);
    }

    entry.count++;
    const remaining = String(maxRequests - entry.count);

    await next();

    // Set rate limit headers
    c.header('X-RateLimit-Limit', String(maxRequests));
    c.header('X-RateLimit-Remaining', remaining);
    c.header('X-RateLimit-Reset', reset);
  };
}

/**
 * Default key generator: client IP address as reported by a proxy
 */
function defaultKeyGenerator(c: Context): string {
  return (
    c.req.header('x-forwarded-for')?.split(',')[0]?.trim() ??
    c.req.header('x-real-ip') ??
    'unknown'
  );
}

