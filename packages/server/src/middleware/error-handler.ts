import type { ErrorHandler, MiddlewareHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import type { SessionVariables } from '../types/hono.js';
import { AuthError } from '../errors/auth-error.js';
import type { Logger } from '../logging/logger.js';
import {
  AUTH_CACHE_CONTROL,
  AUTH_PRAGMA,
  HEADER_CACHE_CONTROL,
  HEADER_PRAGMA,
} from '../config/constants.js';

/**
 * Global error handler
 *
 * The internal error code goes to the log; the caller only sees the coarse
 * public reason.
 */
export function createErrorHandler(logger: Logger): ErrorHandler<{ Variables: SessionVariables }> {
  return (err, c) => {
    // Set no-cache headers for error responses
    c.header(HEADER_CACHE_CONTROL, AUTH_CACHE_CONTROL);
    c.header(HEADER_PRAGMA, AUTH_PRAGMA);

    if (err instanceof AuthError) {
      const level = err.statusCode >= 500 ? 'error' : 'info';
      logger[level](
        { event: 'request.failed', method: c.req.method, path: c.req.path, code: err.code },
        err.description
      );
      return c.json(err.toJSON(), err.statusCode);
    }

    // Malformed JSON bodies and similar framework-level rejections
    if (err instanceof HTTPException && err.status < 500) {
      const invalid = AuthError.invalidRequest(err.message);
      logger.info({ event: 'request.failed', method: c.req.method, path: c.req.path, code: invalid.code });
      return c.json(invalid.toJSON(), invalid.statusCode);
    }

    logger.error({ err, method: c.req.method, path: c.req.path }, 'Unhandled error');
    const serverError = AuthError.serverError();
    return c.json(serverError.toJSON(), serverError.statusCode);
  };
}

/**
 * Security headers middleware
 */
export function securityHeaders(options: { hsts: boolean }): MiddlewareHandler<{
  Variables: SessionVariables;
}> {
  return async (c, next) => {
    await next();

    // Prevent clickjacking
    c.header('X-Frame-Options', 'DENY');

    // Prevent MIME type sniffing
    c.header('X-Content-Type-Options', 'nosniff');

    c.header('Referrer-Policy', 'strict-origin-when-cross-origin');

    // Session responses must never be cached by intermediaries
    c.header(HEADER_CACHE_CONTROL, AUTH_CACHE_CONTROL);

    if (options.hsts) {
      c.header('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
    }
  };
}

/**
 * Request logging middleware
 * Logs method, path, status and duration; never headers or bodies.
 */
export function requestLogger(logger: Logger): MiddlewareHandler<{ Variables: SessionVariables }> {
  return async (c, next) => {
    const start = Date.now();

    await next();

    logger.info({
      event: 'request',
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      duration: Date.now() - start,
    });
  };
}
