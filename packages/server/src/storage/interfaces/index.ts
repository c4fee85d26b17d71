export * from './user-storage.js';
export * from './project-storage.js';
export * from './token-storage.js';
export * from './blob-storage.js';

import type { IUserStorage } from './user-storage.js';
import type { IProjectStorage, IFolderStorage, IFileStorage } from './project-storage.js';
import type { IRefreshTokenStorage } from './token-storage.js';

/**
 * Complete metadata storage for the service
 */
export interface IStorage {
  users: IUserStorage;
  projects: IProjectStorage;
  folders: IFolderStorage;
  files: IFileStorage;
  refreshTokens: IRefreshTokenStorage;
}
