import { and, desc, eq, gt, isNull, lt } from 'drizzle-orm';
import type { RefreshToken, CreateRefreshTokenInput, RevocationReason } from '../../../types/token.js';
import type { IRefreshTokenStorage } from '../../interfaces/token-storage.js';
import { AppError } from '../../../errors/app-error.js';
import { getDb, isUniqueViolation } from '../client.js';
import { refreshTokens, type RefreshTokenRow } from '../schema.js';

function rowToRefreshToken(row: RefreshTokenRow): RefreshToken {
  return {
    id: row.id,
    userId: row.userId,
    familyId: row.familyId,
    tokenHash: row.tokenHash,
    parentTokenId: row.parentTokenId ?? undefined,
    issuedAt: row.createdAt,
    expiresAt: row.expiresAt,
    revokedAt: row.revokedAt ?? undefined,
    revokedReason: row.revokedReason ?? undefined,
    userAgent: row.userAgent ?? undefined,
    ipAddress: row.ipAddress ?? undefined,
  };
}

function toInsert(input: CreateRefreshTokenInput) {
  return {
    userId: input.userId,
    familyId: input.familyId,
    tokenHash: input.tokenHash,
    parentTokenId: input.parentTokenId ?? null,
    expiresAt: input.expiresAt,
    userAgent: input.metadata?.userAgent ?? null,
    ipAddress: input.metadata?.ipAddress ?? null,
  };
}

function collisionOr(error: unknown): unknown {
  if (isUniqueViolation(error)) {
    return AppError.serverError('Refresh token hash collision', error);
  }
  return error;
}

/**
 * PostgreSQL refresh token storage implementation
 */
export class PostgresRefreshTokenStorage implements IRefreshTokenStorage {
  async create(input: CreateRefreshTokenInput): Promise<RefreshToken> {
    try {
      const [row] = await getDb().insert(refreshTokens).values(toInsert(input)).returning();
      if (!row) {
        throw AppError.serverError('Refresh token insert returned no row');
      }
      return rowToRefreshToken(row);
    } catch (error) {
      throw collisionOr(error);
    }
  }

  async findByHash(tokenHash: string): Promise<RefreshToken | null> {
    const row = await getDb().query.refreshTokens.findFirst({
      where: eq(refreshTokens.tokenHash, tokenHash),
    });
    return row ? rowToRefreshToken(row) : null;
  }

  async rotate(predecessorId: string, successor: CreateRefreshTokenInput): Promise<RefreshToken | null> {
    try {
      return await getDb().transaction(async (tx) => {
        // Conditional consume: only one caller can flip revoked_at
        const consumed = await tx
          .update(refreshTokens)
          .set({ revokedAt: new Date(), revokedReason: 'rotated' })
          .where(and(eq(refreshTokens.id, predecessorId), isNull(refreshTokens.revokedAt)))
          .returning({ id: refreshTokens.id });

        if (consumed.length === 0) {
          return null;
        }

        const [row] = await tx.insert(refreshTokens).values(toInsert(successor)).returning();
        if (!row) {
          throw AppError.serverError('Refresh token insert returned no row');
        }
        return rowToRefreshToken(row);
      });
    } catch (error) {
      throw collisionOr(error);
    }
  }

  async revoke(id: string, reason: RevocationReason): Promise<boolean> {
    const rows = await getDb()
      .update(refreshTokens)
      .set({ revokedAt: new Date(), revokedReason: reason })
      .where(and(eq(refreshTokens.id, id), isNull(refreshTokens.revokedAt)))
      .returning({ id: refreshTokens.id });
    return rows.length > 0;
  }

  async revokeFamily(familyId: string, reason: RevocationReason): Promise<number> {
    const rows = await getDb()
      .update(refreshTokens)
      .set({ revokedAt: new Date(), revokedReason: reason })
      .where(and(eq(refreshTokens.familyId, familyId), isNull(refreshTokens.revokedAt)))
      .returning({ id: refreshTokens.id });
    return rows.length;
  }

  async revokeByUser(userId: string, reason: RevocationReason): Promise<number> {
    const rows = await getDb()
      .update(refreshTokens)
      .set({ revokedAt: new Date(), revokedReason: reason })
      .where(and(eq(refreshTokens.userId, userId), isNull(refreshTokens.revokedAt)))
      .returning({ id: refreshTokens.id });
    return rows.length;
  }

  async listLiveByUser(userId: string, now: Date): Promise<RefreshToken[]> {
    const rows = await getDb()
      .select()
      .from(refreshTokens)
      .where(
        and(
          eq(refreshTokens.userId, userId),
          isNull(refreshTokens.revokedAt),
          gt(refreshTokens.expiresAt, now)
        )
      )
      .orderBy(desc(refreshTokens.createdAt));
    return rows.map(rowToRefreshToken);
  }

  async deleteExpired(before: Date): Promise<number> {
    const rows = await getDb()
      .delete(refreshTokens)
      .where(lt(refreshTokens.expiresAt, before))
      .returning({ id: refreshTokens.id });
    return rows.length;
  }
}
