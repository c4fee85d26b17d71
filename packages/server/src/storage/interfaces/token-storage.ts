import type { RefreshToken, CreateRefreshTokenInput, RevocationReason } from '../../types/token.js';

/**
 * Storage interface for refresh token records
 */
export interface IRefreshTokenStorage {
  /**
   * Persist a new record. Throws `server_error` if the hash already exists.
   */
  create(input: CreateRefreshTokenInput): Promise<RefreshToken>;

  /**
   * Find a record by the SHA-256 of its secret
   */
  findByHash(tokenHash: string): Promise<RefreshToken | null>;

  /**
   * Atomically revoke `predecessorId` (reason `rotated`) and insert its
   * successor. Returns null, writing nothing, if the predecessor was
   * already revoked.
   */
  rotate(predecessorId: string, successor: CreateRefreshTokenInput): Promise<RefreshToken | null>;

  /**
   * Revoke one record. Returns false if it was already revoked.
   */
  revoke(id: string, reason: RevocationReason): Promise<boolean>;

  /**
   * Revoke every live record in a family
   */
  revokeFamily(familyId: string, reason: RevocationReason): Promise<number>;

  /**
   * Revoke every live record of a user
   */
  revokeByUser(userId: string, reason: RevocationReason): Promise<number>;

  /**
   * Records of a user that are neither revoked nor expired at `now`
   */
  listLiveByUser(userId: string, now: Date): Promise<RefreshToken[]>;

  /**
   * Delete records that expired before `before` (cleanup)
   */
  deleteExpired(before: Date): Promise<number>;
}
