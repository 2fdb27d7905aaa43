import type { Context, MiddlewareHandler } from 'hono';
import { OAuthError } from '@campus-sso/shared';
import type { IdpEnv } from '../types/hono.js';

export interface RateLimiterOptions {
  windowMs: number; // Time window in milliseconds
  maxRequests: number; // Maximum requests per window
}

interface RateLimitEntry {
  count: number;
  resetAt: number;
}

/**
 * Simple in-memory rate limiter
 * Counts per client address within a fixed window
 */
export function rateLimiter(options: RateLimiterOptions): MiddlewareHandler<IdpEnv> {
  const { windowMs, maxRequests } = options;

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
    const key = clientAddress(c);
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

    // Check if over limit
    if (entry.count >= maxRequests) {
      const retryAfter = Math.ceil((entry.resetAt - now) / 1000);
      c.header('Retry-After', String(retryAfter));
      c.header('X-RateLimit-Limit', String(maxRequests));
      c.header('X-RateLimit-Remaining', '0');

      throw OAuthError.temporarilyUnavailable(`Rate limit exceeded. Try again in ${retryAfter} seconds.`);
    }

    entry.count++;

    c.header('X-RateLimit-Limit', String(maxRequests));
    c.header('X-RateLimit-Remaining', String(maxRequests - entry.count));

    await next();
  };
}

/**
 * Proxy-forwarded address, then the socket's
 */
function clientAddress(c: Context<IdpEnv>): string {
  return (
    c.req.header('x-forwarded-for')?.split(',')[0]?.trim() ??
    c.req.header('x-real-ip') ??
    c.env?.incoming?.socket.remoteAddress ??
    'unknown'
  );
}
