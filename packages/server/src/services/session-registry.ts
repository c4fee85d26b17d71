import type { IRefreshTokenStorage } from '../storage/interfaces/token-storage.js';
import type { RefreshToken, RevocationReason } from '../types/token.js';
import { hashToken } from '../crypto/hash.js';

/**
 * Per-user view over refresh token records. Every operation is idempotent.
 */
export class SessionRegistry {
  constructor(private readonly refreshTokens: IRefreshTokenStorage) {}

  /**
   * Records that are neither revoked nor expired
   */
  async listLive(userId: string): Promise<RefreshToken[]> {
    return this.refreshTokens.listLiveByUser(userId, new Date());
  }

  /**
   * Revoke every live record of a user (logout-all, password change)
   */
  async revokeAll(userId: string, reason: RevocationReason): Promise<number> {
    return this.refreshTokens.revokeByUser(userId, reason);
  }

  /**
   * Revoke every live record of a family (reuse detection)
   */
  async revokeFamily(familyId: string, reason: RevocationReason): Promise<number> {
    return this.refreshTokens.revokeFamily(familyId, reason);
  }

  /**
   * Drop records that expired more than `retentionSeconds` ago. Revoked
   * records that have not expired stay, so a replay of them is still
   * recognised.
   */
  async purgeExpired(retentionSeconds: number, now: Date = new Date()): Promise<number> {
    return this.refreshTokens.deleteExpired(new Date(now.getTime() - retentionSeconds * 1000));
  }

  /**
   * Revoke the record behind `secret` if it belongs to `userId`.
   * Unknown secrets and secrets of other users are ignored.
   */
  async revokeOne(secret: string, userId: string, reason: RevocationReason): Promise<boolean> {
    const record = await this.refreshTokens.findByHash(hashToken(secret));
    if (!record || record.userId !== userId) {
      return false;
    }
    return this.refreshTokens.revoke(record.id, reason);
  }
}
