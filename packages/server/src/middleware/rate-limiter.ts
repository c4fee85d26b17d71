import type { Context, MiddlewareHandler } from 'hono';
import type { AppEnv } from '../types/hono.js';
import { AppError } from '../errors/app-error.js';

export interface RateLimiterOptions {
  windowMs: number; // Time window in milliseconds
  maxRequests: number; // Maximum requests per window
  keyGenerator?: (c: Context<AppEnv>) => string; // Custom key generator
}

interface RateLimitEntry {
  count: number;
  resetAt: number;
}

/**
 * Simple in-memory rate limiter
 * Counters are per process; several instances each keep their own
 */
export function rateLimiter(options: RateLimiterOptions): MiddlewareHandler<AppEnv> {
  const { windowMs, maxRequests, keyGenerator = clientIp } = options;

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

    // Check if over limit
    if (entry.count >= maxRequests) {
      const retryAfter = Math.ceil((entry.resetAt - now) / 1000);
      c.header('Retry-After', String(retryAfter));
      c.header('X-RateLimit-Limit', String(maxRequests));
      c.header('X-RateLimit-Remaining', '0');
      c.header('X-RateLimit-Reset', String(Math.ceil(entry.resetAt / 1000)));

      throw AppError.rateLimited(`Rate limit exceeded. Try again in ${retryAfter} seconds.`);
    }

    entry.count++;

    c.header('X-RateLimit-Limit', String(maxRequests));
    c.header('X-RateLimit-Remaining', String(maxRequests - entry.count));
    c.header('X-RateLimit-Reset', String(Math.ceil(entry.resetAt / 1000)));

    await next();
  };
}

/**
 * Default key: first forwarded address, else the real-ip header
 */
function clientIp(c: Context<AppEnv>): string {
  return (
    c.req.header('x-forwarded-for')?.split(',')[0]?.trim() ??
    c.req.header('x-real-ip') ??
    'unknown'
  );
}

/**
 * Rate limiter with its own counters, keyed by endpoint group and client IP
 */
export function endpointRateLimiter(endpoint: string, options: RateLimiterOptions): MiddlewareHandler<AppEnv> {
  return rateLimiter({
    ...options,
    keyGenerator: (c) => `${endpoint}:${clientIp(c)}`,
  });
}
