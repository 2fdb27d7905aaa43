import type { Context, Env, ErrorHandler, MiddlewareHandler } from 'hono';
import { ZodError } from 'zod';
import { OAuthError } from '../errors/index.js';
import { createLogger, describeError, type Logger, type LogFields } from '../logging/logger.js';

const HEADER_CACHE_CONTROL = 'Cache-Control';
const HEADER_PRAGMA = 'Pragma';

/**
 * Global error handler for protocol errors
 *
 * Transforms errors into `{ error, error_description }` responses
 */
export function oauthErrorHandler<E extends Env = Env>(logger: Logger = createLogger('http')): ErrorHandler<E> {
  return (err, c) => {
    // Set no-cache headers for error responses
    c.header(HEADER_CACHE_CONTROL, 'no-store');
    c.header(HEADER_PRAGMA, 'no-cache');

    if (err instanceof OAuthError) {
      if (err.statusCode >= 500) {
        logger.error('Request failed', { path: c.req.path, error: err.code, cause: describeError(err.cause) });
      } else {
        logger.debug('Request rejected', { path: c.req.path, error: err.code });
      }
      return c.json(err.toJSON(), err.statusCode);
    }

    // Handle Zod validation errors
    if (err instanceof ZodError) {
      const messages = err.errors.map((e) => `${e.path.join('.') || 'body'}: ${e.message}`).join(', ');
      return c.json(OAuthError.invalidRequest(messages).toJSON(), 400);
    }

    logger.error('Unhandled error', { path: c.req.path, error: describeError(err) });

    // Handle unexpected errors
    const serverError = OAuthError.serverError(
      process.env['NODE_ENV'] === 'production' ? 'An unexpected error occurred' : err.message
    );

    return c.json(serverError.toJSON(), 500);
  };
}

/**
 * Security headers middleware
 */
export function securityHeaders<E extends Env = Env>(): MiddlewareHandler<E> {
  return async (c, next) => {
    await next();

    // Prevent clickjacking
    c.header('X-Frame-Options', 'DENY');

    // Prevent MIME type sniffing
    c.header('X-Content-Type-Options', 'nosniff');

    // Codes and state travel in redirect query strings
    c.header('Referrer-Policy', 'no-referrer');

    if (process.env['NODE_ENV'] === 'production') {
      c.header('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
    }
  };
}

/**
 * Request logging middleware
 *
 * @param extraFields - per-request fields added after the handler ran
 */
export function requestLogger<E extends Env = Env>(
  logger: Logger = createLogger('http'),
  extraFields?: (c: Context<E>) => LogFields
): MiddlewareHandler<E> {
  return async (c, next) => {
    const start = Date.now();
    const method = c.req.method;
    const path = c.req.path;

    await next();

    // Path only: query strings carry codes and state
    logger.info('Request', {
      method,
      path,
      status: c.res.status,
      duration: Date.now() - start,
      ...extraFields?.(c),
    });
  };
}
