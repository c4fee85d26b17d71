import type { IRefreshTokenStorage, IUserStorage } from '../storage/interfaces/index.js';
import type { RefreshToken, ClientMetadata, IssuedTokens } from '../types/token.js';
import type { TokenService } from './token-service.js';
import type { SessionRegistry } from './session-registry.js';
import type { AuditLogger } from './audit-log.js';
import { AppError } from '../errors/app-error.js';
import { hashToken } from '../crypto/hash.js';

export interface RefreshServiceOptions {
  refreshTokens: IRefreshTokenStorage;
  users: IUserStorage;
  tokenService: TokenService;
  sessions: SessionRegistry;
  auditLogger: AuditLogger;
}

/**
 * Refresh token rotation with reuse detection.
 *
 * Each secret is single-use. Presenting one that was already consumed means
 * two parties hold the same family, so the whole family is revoked and the
 * caller must log in again.
 */
export class RefreshService {
  private readonly refreshTokens: IRefreshTokenStorage;
  private readonly users: IUserStorage;
  private readonly tokenService: TokenService;
  private readonly sessions: SessionRegistry;
  private readonly auditLogger: AuditLogger;

  constructor(options: RefreshServiceOptions) {
    this.refreshTokens = options.refreshTokens;
    this.users = options.users;
    this.tokenService = options.tokenService;
    this.sessions = options.sessions;
    this.auditLogger = options.auditLogger;
  }

  async rotate(presentedSecret: string, metadata?: ClientMetadata): Promise<IssuedTokens> {
    const record = await this.refreshTokens.findByHash(hashToken(presentedSecret));

    if (!record) {
      throw AppError.invalidToken('Invalid refresh token');
    }

    if (record.expiresAt <= new Date()) {
      throw AppError.invalidToken('Refresh token has expired');
    }

    if (record.revokedAt) {
      return this.handleReuse(record);
    }

    const user = await this.users.findById(record.userId);
    if (!user) {
      await this.sessions.revokeFamily(record.familyId, 'subject_unavailable');
      throw AppError.invalidToken('Refresh token subject no longer exists');
    }

    const issued = await this.tokenService.issueSuccessor(user, record, metadata);
    if (!issued) {
      // Lost the race to a concurrent rotation of the same secret
      const current = await this.refreshTokens.findByHash(record.tokenHash);
      return this.handleReuse(current ?? record);
    }

    return issued;
  }

  private async handleReuse(record: RefreshToken): Promise<never> {
    const revokedCount = await this.sessions.revokeFamily(record.familyId, 'reuse_detected');

    // A record killed by an earlier cascade is stale, not a fresh replay
    if (record.revokedReason === 'reuse_detected') {
      throw AppError.invalidToken('Refresh token has been revoked');
    }

    this.auditLogger.record({
      type: 'refresh_token_reuse_detected',
      userId: record.userId,
      familyId: record.familyId,
      revokedCount,
    });
    throw AppError.reuseDetected('Refresh token reuse detected');
  }
}
