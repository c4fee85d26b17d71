import type { IUserStorage } from '../storage/interfaces/user-storage.js';
import type { User } from '../types/user.js';
import type { ClientMetadata, IssuedTokens } from '../types/token.js';
import type { TokenService } from './token-service.js';
import type { SessionRegistry } from './session-registry.js';
import type { AuditLogger } from './audit-log.js';
import { AppError } from '../errors/app-error.js';
import { hashPassword, verifyPassword } from '../crypto/hash.js';

export interface AuthServiceOptions {
  users: IUserStorage;
  tokenService: TokenService;
  sessions: SessionRegistry;
  auditLogger: AuditLogger;
  allowSignup: boolean;
}

export interface AuthResult {
  user: User;
  tokens: IssuedTokens;
}

/**
 * Account operations that create or end sessions
 */
export class AuthService {
  private readonly users: IUserStorage;
  private readonly tokenService: TokenService;
  private readonly sessions: SessionRegistry;
  private readonly auditLogger: AuditLogger;
  private readonly allowSignup: boolean;

  constructor(options: AuthServiceOptions) {
    this.users = options.users;
    this.tokenService = options.tokenService;
    this.sessions = options.sessions;
    this.auditLogger = options.auditLogger;
    this.allowSignup = options.allowSignup;
  }

  async register(email: string, password: string, metadata?: ClientMetadata): Promise<AuthResult> {
    if (!this.allowSignup) {
      throw AppError.signupDisabled();
    }

    const user = await this.users.create({
      email,
      passwordHash: await hashPassword(password),
    });
    const tokens = await this.tokenService.issue(user, metadata);

    return { user, tokens };
  }

  async login(email: string, password: string, metadata?: ClientMetadata): Promise<AuthResult> {
    const user = await this.users.findByEmail(email);

    if (!user || !(await verifyPassword(password, user.passwordHash))) {
      this.auditLogger.record({ type: 'login_failed', email: email.toLowerCase() });
      throw AppError.invalidCredentials();
    }

    const tokens = await this.tokenService.issue(user, metadata);
    return { user, tokens };
  }

  /**
   * Replace the password and end every session of the user
   */
  async changePassword(userId: string, currentPassword: string, newPassword: string): Promise<number> {
    const user = await this.users.findById(userId);
    if (!user) {
      throw AppError.invalidToken('User no longer exists');
    }

    if (!(await verifyPassword(currentPassword, user.passwordHash))) {
      throw AppError.invalidCredentials();
    }

    await this.users.updatePassword(userId, await hashPassword(newPassword), false);

    const revokedCount = await this.sessions.revokeAll(userId, 'password_changed');
    this.auditLogger.record({ type: 'sessions_revoked', userId, reason: 'password_changed', revokedCount });
    return revokedCount;
  }

  /**
   * End every session of the user
   */
  async logoutAll(userId: string): Promise<number> {
    const revokedCount = await this.sessions.revokeAll(userId, 'logout_all');
    this.auditLogger.record({ type: 'sessions_revoked', userId, reason: 'logout_all', revokedCount });
    return revokedCount;
  }
}

export interface AdminAccount {
  email: string;
  password: string;
}

/**
 * Create the bootstrap admin unless an admin already exists.
 * The account must change its password on first login.
 */
export async function ensureAdminUser(users: IUserStorage, admin: AdminAccount): Promise<User | null> {
  if ((await users.countByRole('admin')) > 0) {
    return null;
  }

  return users.create({
    email: admin.email,
    passwordHash: await hashPassword(admin.password),
    role: 'admin',
    mustChangePassword: true,
  });
}
