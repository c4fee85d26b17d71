import type { IStorage } from '../interfaces/index.js';
import { MemoryUserStorage } from './user-storage.js';
import { MemoryProjectStorage, MemoryFolderStorage, MemoryFileStorage } from './project-storage.js';
import { MemoryRefreshTokenStorage } from './token-storage.js';

export { MemoryUserStorage } from './user-storage.js';
export { MemoryProjectStorage, MemoryFolderStorage, MemoryFileStorage } from './project-storage.js';
export { MemoryRefreshTokenStorage } from './token-storage.js';
export { MemoryBlobStorage } from './blob-storage.js';

/**
 * Create a complete in-memory storage implementation
 */
export function createMemoryStorage(): IStorage {
  const files = new MemoryFileStorage();
  const folders = new MemoryFolderStorage(files);

  return {
    users: new MemoryUserStorage(),
    projects: new MemoryProjectStorage(folders, files),
    folders,
    files,
    refreshTokens: new MemoryRefreshTokenStorage(),
  };
}
