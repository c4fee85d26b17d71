import type { Identity } from '../types/token.js';
import type { Project, Folder } from '../types/project.js';
import type { CredentialVerifier } from './credential-verifier.js';
import { resolveVisibility } from './visibility.js';
import { AppError } from '../errors/app-error.js';

/**
 * Credentials presented with a request
 */
export interface Credentials {
  bearer?: string;
  apiKey?: string;
}

/**
 * Why a request was let through
 */
export type AccessGrant =
  | { type: 'user'; identity: Identity }
  | { type: 'api_key'; projectId: string }
  | { type: 'open' };

export function canManage(identity: Identity, project: Project): boolean {
  return identity.role === 'admin' || project.ownerId === identity.userId;
}

/**
 * Access decisions for project resources
 */
export class AccessService {
  constructor(private readonly verifier: CredentialVerifier) {}

  /**
   * Decide whether a file in `project`/`folder` may be read
   */
  async authorizeRead(credentials: Credentials, project: Project, folder: Folder | null): Promise<AccessGrant> {
    if (resolveVisibility(project, folder) === 'open') {
      return { type: 'open' };
    }

    if (credentials.apiKey !== undefined) {
      this.verifier.verifyApiKey(credentials.apiKey, project);
      return { type: 'api_key', projectId: project.id };
    }

    if (credentials.bearer !== undefined) {
      const identity = await this.verifier.verifyBearer(credentials.bearer);
      if (!canManage(identity, project)) {
        throw AppError.forbidden('You do not have access to this project');
      }
      return { type: 'user', identity };
    }

    throw AppError.forbidden('API key required');
  }

  /**
   * Decide whether resources of `project` may be modified. A bearer token
   * takes precedence over an API key when both are sent.
   */
  async authorizeManage(credentials: Credentials, project: Project): Promise<AccessGrant> {
    if (credentials.bearer !== undefined) {
      const identity = await this.verifier.verifyBearer(credentials.bearer);
      if (!canManage(identity, project)) {
        throw AppError.forbidden('You do not have access to this project');
      }
      return { type: 'user', identity };
    }

    if (credentials.apiKey !== undefined) {
      this.verifier.verifyApiKey(credentials.apiKey, project);
      return { type: 'api_key', projectId: project.id };
    }

    throw AppError.unauthorized();
  }
}
