import type { IStorage, IBlobStorage } from '../storage/interfaces/index.js';
import { TokenService } from './token-service.js';
import { SessionRegistry } from './session-registry.js';
import { RefreshService } from './refresh-service.js';
import { CredentialVerifier } from './credential-verifier.js';
import { AccessService } from './access-service.js';
import { AuthService } from './auth-service.js';
import { FileService } from './file-service.js';
import type { AuditLogger } from './audit-log.js';

export * from './visibility.js';
export * from './audit-log.js';
export * from './token-service.js';
export * from './session-registry.js';
export * from './refresh-service.js';
export * from './credential-verifier.js';
export * from './access-service.js';
export * from './auth-service.js';
export * from './file-service.js';

export interface ServiceOptions {
  storage: IStorage;
  blobStorage: IBlobStorage;
  jwtSecret: string;
  accessTokenTtl?: number;
  refreshTokenTtl?: number;
  allowSignup: boolean;
  maxFileSize: number;
  auditLogger: AuditLogger;
}

export interface Services {
  tokens: TokenService;
  sessions: SessionRegistry;
  refresh: RefreshService;
  verifier: CredentialVerifier;
  access: AccessService;
  auth: AuthService;
  files: FileService;
  auditLogger: AuditLogger;
}

/**
 * Wire every service against one storage backend
 */
export function createServices(options: ServiceOptions): Services {
  const { storage, auditLogger } = options;

  const tokens = new TokenService({
    refreshTokens: storage.refreshTokens,
    jwtSecret: options.jwtSecret,
    accessTokenTtl: options.accessTokenTtl,
    refreshTokenTtl: options.refreshTokenTtl,
  });
  const sessions = new SessionRegistry(storage.refreshTokens);
  const verifier = new CredentialVerifier({ jwtSecret: options.jwtSecret, projects: storage.projects });

  return {
    tokens,
    sessions,
    refresh: new RefreshService({
      refreshTokens: storage.refreshTokens,
      users: storage.users,
      tokenService: tokens,
      sessions,
      auditLogger,
    }),
    verifier,
    access: new AccessService(verifier),
    auth: new AuthService({
      users: storage.users,
      tokenService: tokens,
      sessions,
      auditLogger,
      allowSignup: options.allowSignup,
    }),
    files: new FileService({
      storage,
      blobStorage: options.blobStorage,
      maxFileSize: options.maxFileSize,
    }),
    auditLogger,
  };
}
