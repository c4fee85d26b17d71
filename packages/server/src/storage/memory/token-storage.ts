import type { RefreshToken, CreateRefreshTokenInput, RevocationReason } from '../../types/token.js';
import type { IRefreshTokenStorage } from '../interfaces/token-storage.js';
import { AppError } from '../../errors/app-error.js';
import { generateId } from '../../crypto/index.js';

function addToIndex(index: Map<string, Set<string>>, key: string, id: string): void {
  const ids = index.get(key);
  if (ids) {
    ids.add(id);
  } else {
    index.set(key, new Set([id]));
  }
}

/**
 * In-memory refresh token storage implementation.
 *
 * Check-and-set operations never await between reading and writing a record,
 * so concurrent callers on the same event loop observe them as atomic.
 */
export class MemoryRefreshTokenStorage implements IRefreshTokenStorage {
  private tokens = new Map<string, RefreshToken>();
  private hashIndex = new Map<string, string>(); // hash -> id
  private familyIndex = new Map<string, Set<string>>(); // familyId -> Set<id>
  private userIndex = new Map<string, Set<string>>(); // userId -> Set<id>

  async create(input: CreateRefreshTokenInput): Promise<RefreshToken> {
    return this.insert(input);
  }

  async findByHash(tokenHash: string): Promise<RefreshToken | null> {
    const id = this.hashIndex.get(tokenHash);
    if (!id) return null;
    return this.tokens.get(id) ?? null;
  }

  async rotate(predecessorId: string, successor: CreateRefreshTokenInput): Promise<RefreshToken | null> {
    const predecessor = this.tokens.get(predecessorId);
    if (!predecessor || predecessor.revokedAt) {
      return null;
    }

    // Fail before consuming the predecessor so a collision leaves it live
    this.assertUniqueHash(successor.tokenHash);

    this.tokens.set(predecessorId, { ...predecessor, revokedAt: new Date(), revokedReason: 'rotated' });
    return this.insert(successor);
  }

  async revoke(id: string, reason: RevocationReason): Promise<boolean> {
    const token = this.tokens.get(id);
    if (!token || token.revokedAt) {
      return false;
    }
    this.tokens.set(id, { ...token, revokedAt: new Date(), revokedReason: reason });
    return true;
  }

  async revokeFamily(familyId: string, reason: RevocationReason): Promise<number> {
    return this.revokeIds(this.familyIndex.get(familyId), reason);
  }

  async revokeByUser(userId: string, reason: RevocationReason): Promise<number> {
    return this.revokeIds(this.userIndex.get(userId), reason);
  }

  async listLiveByUser(userId: string, now: Date): Promise<RefreshToken[]> {
    const ids = this.userIndex.get(userId);
    if (!ids) return [];

    const live: RefreshToken[] = [];
    for (const id of ids) {
      const token = this.tokens.get(id);
      if (token && !token.revokedAt && token.expiresAt > now) {
        live.push(token);
      }
    }
    return live.sort((a, b) => b.issuedAt.getTime() - a.issuedAt.getTime());
  }

  async deleteExpired(before: Date): Promise<number> {
    let deleted = 0;

    for (const [id, token] of this.tokens) {
      if (token.expiresAt < before) {
        this.hashIndex.delete(token.tokenHash);
        this.familyIndex.get(token.familyId)?.delete(id);
        this.userIndex.get(token.userId)?.delete(id);
        this.tokens.delete(id);
        deleted++;
      }
    }

    return deleted;
  }

  private assertUniqueHash(tokenHash: string): void {
    if (this.hashIndex.has(tokenHash)) {
      throw AppError.serverError('Refresh token hash collision');
    }
  }

  private insert(input: CreateRefreshTokenInput): RefreshToken {
    this.assertUniqueHash(input.tokenHash);

    const token: RefreshToken = {
      id: generateId(),
      userId: input.userId,
      familyId: input.familyId,
      tokenHash: input.tokenHash,
      parentTokenId: input.parentTokenId,
      issuedAt: new Date(),
      expiresAt: input.expiresAt,
      userAgent: input.metadata?.userAgent,
      ipAddress: input.metadata?.ipAddress,
    };

    this.tokens.set(token.id, token);
    this.hashIndex.set(token.tokenHash, token.id);
    addToIndex(this.familyIndex, token.familyId, token.id);
    addToIndex(this.userIndex, token.userId, token.id);

    return token;
  }

  private revokeIds(ids: Set<string> | undefined, reason: RevocationReason): number {
    if (!ids) return 0;

    let count = 0;
    const now = new Date();
    for (const id of ids) {
      const token = this.tokens.get(id);
      if (token && !token.revokedAt) {
        this.tokens.set(id, { ...token, revokedAt: now, revokedReason: reason });
        count++;
      }
    }
    return count;
  }
}
