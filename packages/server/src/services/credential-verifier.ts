import type { IProjectStorage } from '../storage/interfaces/project-storage.js';
import type { Identity } from '../types/token.js';
import type { Project } from '../types/project.js';
import { AppError } from '../errors/app-error.js';
import { verifyAccessToken } from '../crypto/jwt.js';
import { constantTimeCompare } from '../crypto/hash.js';
import { isUuid } from '../crypto/random.js';

export interface CredentialVerifierOptions {
  jwtSecret: string;
  projects: IProjectStorage;
}

/**
 * Verifies presented credentials. Bearer verification is signature and
 * expiry only; access tokens are never looked up.
 */
export class CredentialVerifier {
  private readonly jwtSecret: string;
  private readonly projects: IProjectStorage;

  constructor(options: CredentialVerifierOptions) {
    this.jwtSecret = options.jwtSecret;
    this.projects = options.projects;
  }

  async verifyBearer(token: string): Promise<Identity> {
    try {
      const payload = await verifyAccessToken(token, this.jwtSecret);
      return { userId: payload.sub, email: payload.email, role: payload.role };
    } catch {
      throw AppError.invalidToken('Access token verification failed');
    }
  }

  /**
   * Keys never expire; regenerating the key is the only way to retire one
   */
  verifyApiKey(key: string, project: Project): void {
    if (!isUuid(key) || !constantTimeCompare(key, project.apiKey)) {
      throw AppError.invalidApiKey();
    }
  }

  /**
   * Resolve the project a key belongs to, for endpoints where the key alone
   * selects the project
   */
  async findProjectByApiKey(key: string): Promise<Project> {
    if (!isUuid(key)) {
      throw AppError.invalidApiKey();
    }
    const project = await this.projects.findByApiKey(key);
    if (!project) {
      throw AppError.invalidApiKey();
    }
    return project;
  }
}
