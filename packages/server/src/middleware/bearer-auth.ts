import type { Context, MiddlewareHandler } from 'hono';
import type { AppEnv } from '../types/hono.js';
import type { Credentials } from '../services/access-service.js';
import type { CredentialVerifier } from '../services/credential-verifier.js';
import { AppError } from '../errors/app-error.js';
import { HEADER_AUTHORIZATION, HEADER_API_KEY, QUERY_API_KEY } from '../config/constants.js';

/**
 * Extract bearer token from Authorization header
 */
export function extractBearerToken(authHeader: string | undefined): string | null {
  if (!authHeader?.startsWith('Bearer ')) {
    return null;
  }
  const token = authHeader.slice(7).trim();
  return token.length > 0 ? token : null;
}

/**
 * Collect every credential a request carries. The API key may come from the
 * `X-API-Key` header or, for download links, the `api_key` query parameter.
 */
export function readCredentials(c: Context<AppEnv>, options: { allowQueryKey?: boolean } = {}): Credentials {
  const credentials: Credentials = {};

  const bearer = extractBearerToken(c.req.header(HEADER_AUTHORIZATION));
  if (bearer) {
    credentials.bearer = bearer;
  }

  const apiKey = c.req.header(HEADER_API_KEY) ?? (options.allowQueryKey ? c.req.query(QUERY_API_KEY) : undefined);
  if (apiKey) {
    credentials.apiKey = apiKey;
  }

  return credentials;
}

/**
 * Require the `X-API-Key` header
 */
export function requireApiKey(c: Context<AppEnv>): string {
  const apiKey = c.req.header(HEADER_API_KEY);
  if (!apiKey) {
    throw AppError.unauthorized('API key required');
  }
  return apiKey;
}

/**
 * Middleware to validate bearer access tokens
 *
 * Sets `identity` in context variables on success
 */
export function bearerAuth(verifier: CredentialVerifier): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const authHeader = c.req.header(HEADER_AUTHORIZATION);

    if (!authHeader) {
      throw AppError.unauthorized('Missing authorization header');
    }

    const token = extractBearerToken(authHeader);
    if (!token) {
      throw AppError.unauthorized('Invalid authorization header format');
    }

    c.set('identity', await verifier.verifyBearer(token));

    await next();
  };
}

/**
 * Identity set by `bearerAuth`
 */
export function requireIdentity(c: Context<AppEnv>) {
  const identity = c.get('identity');
  if (!identity) {
    throw AppError.unauthorized();
  }
  return identity;
}
