import { Hono, type Context } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import type { LogoutAllResponse, MessageResponse } from '@filegate/shared';
import type { AppEnv } from '../../types/hono.js';
import type { ClientMetadata } from '../../types/token.js';
import type { IStorage } from '../../storage/interfaces/index.js';
import type { Services } from '../../services/index.js';
import { AppError } from '../../errors/app-error.js';
import { bearerAuth, requireIdentity } from '../../middleware/bearer-auth.js';
import { throwOnInvalid } from '../../middleware/validation.js';
import { toTokenAuthResponse, toTokenRefreshResponse, toUserInfo, toSessionInfo } from '../serializers.js';
import {
  MIN_PASSWORD_LENGTH,
  HEADER_CACHE_CONTROL,
  HEADER_PRAGMA,
  HEADER_USER_AGENT,
  TOKEN_CACHE_CONTROL,
  TOKEN_PRAGMA,
} from '../../config/constants.js';

const emailSchema = z.string().trim().email().max(255);

const registerSchema = z.object({
  email: emailSchema,
  password: z.string().min(MIN_PASSWORD_LENGTH, `Password must be at least ${MIN_PASSWORD_LENGTH} characters`),
});

const loginSchema = z.object({
  email: emailSchema,
  password: z.string().min(1),
});

const refreshSchema = z.object({
  refresh_token: z.string().min(1),
});

const logoutSchema = z.object({
  refresh_token: z.string().min(1).optional(),
});

const changePasswordSchema = z.object({
  current_password: z.string().min(1),
  new_password: z.string().min(MIN_PASSWORD_LENGTH, `Password must be at least ${MIN_PASSWORD_LENGTH} characters`),
});

export interface AuthRoutesOptions {
  storage: IStorage;
  services: Services;
}

/**
 * Request details stored with a refresh token
 */
function clientMetadata(c: Context<AppEnv>): ClientMetadata {
  return {
    userAgent: c.req.header(HEADER_USER_AGENT),
    ipAddress: c.req.header('x-forwarded-for')?.split(',')[0]?.trim() ?? c.req.header('x-real-ip'),
  };
}

function noStore(c: Context<AppEnv>): void {
  c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
  c.header(HEADER_PRAGMA, TOKEN_PRAGMA);
}

/**
 * Account, token and session endpoints
 */
export function createAuthRoutes(options: AuthRoutesOptions) {
  const { storage, services } = options;
  const app = new Hono<AppEnv>();
  const auth = bearerAuth(services.verifier);

  app.post('/register', zValidator('json', registerSchema, throwOnInvalid), async (c) => {
    const { email, password } = c.req.valid('json');
    const { user, tokens } = await services.auth.register(email, password, clientMetadata(c));

    noStore(c);
    return c.json(toTokenAuthResponse(tokens, user), 201);
  });

  app.post('/login', zValidator('json', loginSchema, throwOnInvalid), async (c) => {
    const { email, password } = c.req.valid('json');
    const { user, tokens } = await services.auth.login(email, password, clientMetadata(c));

    noStore(c);
    return c.json(toTokenAuthResponse(tokens, user));
  });

  app.post('/refresh', zValidator('json', refreshSchema, throwOnInvalid), async (c) => {
    const { refresh_token: refreshToken } = c.req.valid('json');
    const tokens = await services.refresh.rotate(refreshToken, clientMetadata(c));

    noStore(c);
    return c.json(toTokenRefreshResponse(tokens));
  });

  // Ends the presented session only; other sessions of the family stay live
  app.post('/logout', auth, zValidator('json', logoutSchema, throwOnInvalid), async (c) => {
    const identity = requireIdentity(c);
    const { refresh_token: refreshToken } = c.req.valid('json');

    if (refreshToken) {
      await services.sessions.revokeOne(refreshToken, identity.userId, 'logout');
    }

    const body: MessageResponse = { message: 'Logged out successfully' };
    return c.json(body);
  });

  app.post('/logout-all', auth, async (c) => {
    const identity = requireIdentity(c);
    const revokedCount = await services.auth.logoutAll(identity.userId);

    const body: LogoutAllResponse = {
      message: 'All sessions revoked',
      revoked_count: revokedCount,
    };
    return c.json(body);
  });

  app.get('/me', auth, async (c) => {
    const identity = requireIdentity(c);
    const user = await storage.users.findById(identity.userId);
    if (!user) {
      throw AppError.invalidToken('User no longer exists');
    }
    return c.json(toUserInfo(user));
  });

  app.get('/sessions', auth, async (c) => {
    const identity = requireIdentity(c);
    const sessions = await services.sessions.listLive(identity.userId);
    return c.json(sessions.map(toSessionInfo));
  });

  app.put('/change-password', auth, zValidator('json', changePasswordSchema, throwOnInvalid), async (c) => {
    const identity = requireIdentity(c);
    const { current_password: currentPassword, new_password: newPassword } = c.req.valid('json');

    await services.auth.changePassword(identity.userId, currentPassword, newPassword);

    const body: MessageResponse = { message: 'Password changed; please log in again' };
    return c.json(body);
  });

  return app;
}
