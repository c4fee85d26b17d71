import type { IRefreshTokenStorage } from '../storage/interfaces/token-storage.js';
import type { TokenSubject, RefreshToken, ClientMetadata, IssuedTokens } from '../types/token.js';
import { signAccessToken } from '../crypto/jwt.js';
import { generateRefreshToken, generateFamilyId, hashToken } from '../crypto/index.js';
import { DEFAULT_ACCESS_TOKEN_TTL, DEFAULT_REFRESH_TOKEN_TTL } from '../config/constants.js';

export interface TokenServiceOptions {
  refreshTokens: IRefreshTokenStorage;
  jwtSecret: string;
  /**
   * Access token lifetime in seconds
   */
  accessTokenTtl?: number;
  /**
   * Refresh token lifetime in seconds, counted from each issue or rotation
   */
  refreshTokenTtl?: number;
}

/**
 * Issues credential pairs: a signed access token and an opaque refresh
 * secret whose SHA-256 is the only thing persisted.
 */
export class TokenService {
  private readonly refreshTokens: IRefreshTokenStorage;
  private readonly jwtSecret: string;
  readonly accessTokenTtl: number;
  readonly refreshTokenTtl: number;

  constructor(options: TokenServiceOptions) {
    this.refreshTokens = options.refreshTokens;
    this.jwtSecret = options.jwtSecret;
    this.accessTokenTtl = options.accessTokenTtl ?? DEFAULT_ACCESS_TOKEN_TTL;
    this.refreshTokenTtl = options.refreshTokenTtl ?? DEFAULT_REFRESH_TOKEN_TTL;
  }

  /**
   * Start a new family (login, register)
   */
  async issue(subject: TokenSubject, metadata?: ClientMetadata): Promise<IssuedTokens> {
    const familyId = generateFamilyId();
    const refreshToken = generateRefreshToken();

    await this.refreshTokens.create({
      userId: subject.id,
      familyId,
      tokenHash: hashToken(refreshToken),
      expiresAt: this.refreshExpiry(),
      metadata,
    });

    return {
      accessToken: await this.signAccessToken(subject),
      refreshToken,
      expiresIn: this.accessTokenTtl,
      familyId,
    };
  }

  /**
   * Consume `predecessor` and issue its successor in the same family.
   * Returns null if the predecessor was consumed concurrently.
   */
  async issueSuccessor(
    subject: TokenSubject,
    predecessor: RefreshToken,
    metadata?: ClientMetadata
  ): Promise<IssuedTokens | null> {
    const refreshToken = generateRefreshToken();

    const successor = await this.refreshTokens.rotate(predecessor.id, {
      userId: subject.id,
      familyId: predecessor.familyId,
      tokenHash: hashToken(refreshToken),
      expiresAt: this.refreshExpiry(),
      parentTokenId: predecessor.id,
      metadata,
    });

    if (!successor) {
      return null;
    }

    return {
      accessToken: await this.signAccessToken(subject),
      refreshToken,
      expiresIn: this.accessTokenTtl,
      familyId: successor.familyId,
    };
  }

  async signAccessToken(subject: TokenSubject): Promise<string> {
    return signAccessToken(subject, this.jwtSecret, this.accessTokenTtl);
  }

  private refreshExpiry(): Date {
    return new Date(Date.now() + this.refreshTokenTtl * 1000);
  }
}
