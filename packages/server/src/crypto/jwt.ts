import * as jose from 'jose';
import type { AccessTokenPayload, TokenSubject } from '../types/token.js';
import { ACCESS_TOKEN_TYPE, JWT_ALGORITHM, JWT_CLOCK_TOLERANCE } from '../config/constants.js';
import { generateJti } from './random.js';

/**
 * JWT signing and verification for access tokens using the jose library.
 * Access tokens are HMAC-signed with the server secret.
 */

function secretKey(secret: string): Uint8Array {
  return new TextEncoder().encode(secret);
}

/**
 * Sign a short-lived access token for a subject
 */
export async function signAccessToken(
  subject: TokenSubject,
  secret: string,
  ttlSeconds: number
): Promise<string> {
  const now = Math.floor(Date.now() / 1000);

  return new jose.SignJWT({
    email: subject.email,
    role: subject.role,
    token_type: ACCESS_TOKEN_TYPE,
  })
    .setProtectedHeader({ alg: JWT_ALGORITHM, typ: 'JWT' })
    .setSubject(subject.id)
    .setIssuedAt(now)
    .setExpirationTime(now + ttlSeconds)
    .setJti(generateJti())
    .sign(secretKey(secret));
}

/**
 * Verify signature and expiry of an access token and return its claims.
 * Throws if the token is malformed, expired, or not an access token.
 */
export async function verifyAccessToken(token: string, secret: string): Promise<AccessTokenPayload> {
  const { payload } = await jose.jwtVerify(token, secretKey(secret), {
    algorithms: [JWT_ALGORITHM],
    clockTolerance: JWT_CLOCK_TOLERANCE,
    requiredClaims: ['sub', 'exp', 'iat'],
  });

  const { sub, exp, iat, jti, email, role, token_type: tokenType } = payload;

  if (tokenType !== ACCESS_TOKEN_TYPE) {
    throw new Error('Invalid token type');
  }
  if (typeof sub !== 'string' || typeof exp !== 'number' || typeof iat !== 'number') {
    throw new Error('Missing standard claims');
  }
  if (typeof email !== 'string') {
    throw new Error('Missing email claim');
  }
  if (role !== 'admin' && role !== 'user') {
    throw new Error('Invalid role claim');
  }

  return {
    sub,
    email,
    role,
    token_type: ACCESS_TOKEN_TYPE,
    iat,
    exp,
    jti: typeof jti === 'string' ? jti : '',
  };
}
