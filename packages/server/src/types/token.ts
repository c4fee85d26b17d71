import type { UserRole } from './user.js';

/**
 * Access token claims
 */
export interface AccessTokenPayload {
  sub: string; // User ID
  email: string;
  role: UserRole;
  token_type: 'access';
  iat: number;
  exp: number;
  jti: string;
}

/**
 * The user a token pair is issued to
 */
export interface TokenSubject {
  id: string;
  email: string;
  role: UserRole;
}

/**
 * Verified caller identity, derived from an access token alone
 */
export interface Identity {
  userId: string;
  email: string;
  role: UserRole;
}

/**
 * Why a refresh token stopped being live
 */
export type RevocationReason =
  | 'rotated'
  | 'logout'
  | 'logout_all'
  | 'password_changed'
  | 'reuse_detected'
  | 'subject_unavailable';

/**
 * Request details recorded alongside a refresh token
 */
export interface ClientMetadata {
  userAgent?: string;
  ipAddress?: string;
}

/**
 * Stored refresh token record. Only the SHA-256 of the secret is kept.
 */
export interface RefreshToken {
  id: string;
  userId: string;
  familyId: string;
  tokenHash: string;
  parentTokenId?: string;
  issuedAt: Date;
  expiresAt: Date;
  revokedAt?: Date;
  revokedReason?: RevocationReason;
  userAgent?: string;
  ipAddress?: string;
}

/**
 * Input for creating a refresh token record
 */
export interface CreateRefreshTokenInput {
  userId: string;
  familyId: string;
  tokenHash: string;
  expiresAt: Date;
  parentTokenId?: string;
  metadata?: ClientMetadata;
}

/**
 * A freshly issued credential pair. `familyId` stays server-side.
 */
export interface IssuedTokens {
  accessToken: string;
  refreshToken: string;
  expiresIn: number;
  familyId: string;
}
