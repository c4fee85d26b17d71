import { describe, it, expect, beforeEach, vi } from 'vitest';
import { createMemoryStorage } from '../../storage/memory/index.js';
import type { IStorage } from '../../storage/interfaces/index.js';
import { TokenService } from '../../services/token-service.js';
import { SessionRegistry } from '../../services/session-registry.js';
import { RefreshService } from '../../services/refresh-service.js';
import type { AuditEvent } from '../../services/audit-log.js';
import { hashToken } from '../../crypto/hash.js';
import type { User } from '../../types/user.js';

describe('RefreshService', () => {
  let storage: IStorage;
  let tokens: TokenService;
  let sessions: SessionRegistry;
  let refresh: RefreshService;
  let events: AuditEvent[];
  let user: User;

  function createRefreshService(tokenService: TokenService): RefreshService {
    return new RefreshService({
      refreshTokens: storage.refreshTokens,
      users: storage.users,
      tokenService,
      sessions,
      auditLogger: { record: (event) => events.push(event) },
    });
  }

  async function recordFor(secret: string) {
    return storage.refreshTokens.findByHash(hashToken(secret));
  }

  beforeEach(async () => {
    storage = createMemoryStorage();
    events = [];
    tokens = new TokenService({ refreshTokens: storage.refreshTokens, jwtSecret: 'test-secret' });
    sessions = new SessionRegistry(storage.refreshTokens);
    refresh = createRefreshService(tokens);
    user = await storage.users.create({ email: 'alice@example.com', passwordHash: 'test-hash' });
  });

  it('issues a successor in the same family and consumes the presented secret', async () => {
    const first = await tokens.issue(user);

    const second = await refresh.rotate(first.refreshToken);

    expect(second.familyId).toBe(first.familyId);
    expect(second.refreshToken).not.toBe(first.refreshToken);
    expect(second.expiresIn).toBe(tokens.accessTokenTtl);

    const consumed = await recordFor(first.refreshToken);
    const successor = await recordFor(second.refreshToken);
    expect(consumed?.revokedReason).toBe('rotated');
    expect(successor?.parentTokenId).toBe(consumed?.id);
    expect(successor?.revokedAt).toBeUndefined();
  });

  it('rejects unknown secrets', async () => {
    await expect(refresh.rotate('not-a-real-secret')).rejects.toMatchObject({
      code: 'invalid_token',
      description: 'Invalid refresh token',
    });
  });

  it('rejects expired secrets', async () => {
    const expiring = new TokenService({
      refreshTokens: storage.refreshTokens,
      jwtSecret: 'test-secret',
      refreshTokenTtl: -60,
    });
    const issued = await expiring.issue(user);

    await expect(createRefreshService(expiring).rotate(issued.refreshToken)).rejects.toMatchObject({
      code: 'invalid_token',
      description: 'Refresh token has expired',
    });
  });

  it('revokes the whole family when a consumed secret is replayed', async () => {
    const first = await tokens.issue(user);
    const second = await refresh.rotate(first.refreshToken);

    await expect(refresh.rotate(first.refreshToken)).rejects.toMatchObject({ code: 'reuse_detected' });

    expect((await recordFor(second.refreshToken))?.revokedReason).toBe('reuse_detected');
    expect(events).toEqual([
      {
        type: 'refresh_token_reuse_detected',
        userId: user.id,
        familyId: first.familyId,
        revokedCount: 1,
      },
    ]);
  });

  it('locks out the legitimate holder after a stolen secret is replayed', async () => {
    const r1 = await tokens.issue(user);
    const r2 = await refresh.rotate(r1.refreshToken);

    // Attacker replays R1 after the legitimate client rotated to R2
    await expect(refresh.rotate(r1.refreshToken)).rejects.toMatchObject({ code: 'reuse_detected' });

    // R2 now fails as a plain invalid token and nothing more is audited
    await expect(refresh.rotate(r2.refreshToken)).rejects.toMatchObject({
      code: 'invalid_token',
      description: 'Refresh token has been revoked',
    });
    expect(events).toHaveLength(1);
  });

  it('does not touch other families of the same user', async () => {
    const phone = await tokens.issue(user);
    const laptop = await tokens.issue(user);
    await refresh.rotate(phone.refreshToken);

    await expect(refresh.rotate(phone.refreshToken)).rejects.toMatchObject({ code: 'reuse_detected' });

    expect((await recordFor(laptop.refreshToken))?.revokedAt).toBeUndefined();
    await expect(refresh.rotate(laptop.refreshToken)).resolves.toMatchObject({ familyId: laptop.familyId });
  });

  it('lets only one of two concurrent rotations succeed', async () => {
    const first = await tokens.issue(user);

    const results = await Promise.allSettled([
      refresh.rotate(first.refreshToken),
      refresh.rotate(first.refreshToken),
    ]);

    const fulfilled = results.filter((r) => r.status === 'fulfilled');
    const rejected = results.filter((r) => r.status === 'rejected');
    expect(fulfilled).toHaveLength(1);
    expect(rejected).toHaveLength(1);

    const [winner] = fulfilled;
    const [loser] = rejected;
    if (winner?.status !== 'fulfilled' || loser?.status !== 'rejected') {
      throw new Error('expected one winner and one loser');
    }

    expect(loser.reason).toMatchObject({ code: 'reuse_detected' });
    // The race counts as reuse, so the winner's successor dies with the family
    expect((await recordFor(winner.value.refreshToken))?.revokedReason).toBe('reuse_detected');
  });

  it('revokes the family when the subject no longer exists', async () => {
    const first = await tokens.issue(user);
    vi.spyOn(storage.users, 'findById').mockResolvedValue(null);

    await expect(refresh.rotate(first.refreshToken)).rejects.toMatchObject({ code: 'invalid_token' });
    expect((await recordFor(first.refreshToken))?.revokedReason).toBe('subject_unavailable');
  });
});

describe('SessionRegistry', () => {
  let storage: IStorage;
  let tokens: TokenService;
  let sessions: SessionRegistry;

  beforeEach(() => {
    storage = createMemoryStorage();
    tokens = new TokenService({ refreshTokens: storage.refreshTokens, jwtSecret: 'test-secret' });
    sessions = new SessionRegistry(storage.refreshTokens);
  });

  it('lists and revokes every live session of a user', async () => {
    const subject = { id: 'user-1', email: 'alice@example.com', role: 'user' as const };
    await tokens.issue(subject);
    await tokens.issue(subject);
    await tokens.issue({ ...subject, id: 'user-2' });

    expect(await sessions.listLive('user-1')).toHaveLength(2);
    expect(await sessions.revokeAll('user-1', 'logout_all')).toBe(2);
    expect(await sessions.revokeAll('user-1', 'logout_all')).toBe(0);
    expect(await sessions.listLive('user-1')).toEqual([]);
    expect(await sessions.listLive('user-2')).toHaveLength(1);
  });

  it('purges expired records once the retention period has passed', async () => {
    const expiring = new TokenService({
      refreshTokens: storage.refreshTokens,
      jwtSecret: 'test-secret',
      refreshTokenTtl: -60,
    });
    const subject = { id: 'user-1', email: 'alice@example.com', role: 'user' as const };
    const expired = await expiring.issue(subject);
    const live = await tokens.issue(subject);

    expect(await sessions.purgeExpired(3600)).toBe(0);
    expect(await storage.refreshTokens.findByHash(hashToken(expired.refreshToken))).not.toBeNull();

    expect(await sessions.purgeExpired(30)).toBe(1);
    expect(await storage.refreshTokens.findByHash(hashToken(expired.refreshToken))).toBeNull();
    expect(await storage.refreshTokens.findByHash(hashToken(live.refreshToken))).not.toBeNull();
  });

  it('revokes a single secret only for its owner', async () => {
    const issued = await tokens.issue({ id: 'user-1', email: 'alice@example.com', role: 'user' });

    expect(await sessions.revokeOne(issued.refreshToken, 'user-2', 'logout')).toBe(false);
    expect(await sessions.revokeOne('unknown-secret', 'user-1', 'logout')).toBe(false);
    expect(await sessions.revokeOne(issued.refreshToken, 'user-1', 'logout')).toBe(true);
    expect(await sessions.revokeOne(issued.refreshToken, 'user-1', 'logout')).toBe(false);
  });
});
