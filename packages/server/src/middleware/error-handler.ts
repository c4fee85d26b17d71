import type { ErrorHandler, MiddlewareHandler } from 'hono';
import type { AppEnv } from '../types/hono.js';
import { AppError } from '../errors/app-error.js';
import { toHttpError } from '../errors/http-mapping.js';
import { TOKEN_CACHE_CONTROL, TOKEN_PRAGMA, HEADER_CACHE_CONTROL, HEADER_PRAGMA } from '../config/constants.js';

/**
 * Global error handler
 *
 * Logs the internal error code, then writes the public `{ error, error_description }` body
 */
export function appErrorHandler(options: { hideInternalDetails?: boolean } = {}): ErrorHandler<AppEnv> {
  return (err, c) => {
    const { status, body } = toHttpError(err, options);

    if (err instanceof AppError && status < 500) {
      console.warn(
        JSON.stringify({
          timestamp: new Date().toISOString(),
          method: c.req.method,
          path: c.req.path,
          status,
          code: err.code,
          description: err.description,
        })
      );
    } else {
      console.error('Unhandled error:', err);
    }

    // Set no-cache headers for error responses
    c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
    c.header(HEADER_PRAGMA, TOKEN_PRAGMA);

    return c.json(body, status);
  };
}

/**
 * Security headers middleware
 */
export function securityHeaders(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    await next();

    // Prevent clickjacking
    c.header('X-Frame-Options', 'DENY');

    // Prevent MIME type sniffing
    c.header('X-Content-Type-Options', 'nosniff');

    // Referrer policy
    c.header('Referrer-Policy', 'strict-origin-when-cross-origin');

    // Strict Transport Security (enable in production with HTTPS)
    if (process.env['NODE_ENV'] === 'production') {
      c.header('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
    }
  };
}

/**
 * Request logging middleware
 */
export function requestLogger(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = Date.now();
    const method = c.req.method;
    const path = c.req.path;

    await next();

    const duration = Date.now() - start;
    const status = c.res.status;

    // Path only: api_key may travel in the query string
    console.log(
      JSON.stringify({
        timestamp: new Date().toISOString(),
        method,
        path,
        status,
        duration,
        user: c.get('identity')?.userId,
      })
    );
  };
}
