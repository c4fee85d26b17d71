import { readFile } from 'node:fs/promises';
import type { IStorage } from '../interfaces/index.js';
import { initializeDatabase, executeSql, type DatabaseOptions } from './client.js';
import { PostgresUserStorage } from './repositories/user-repository.js';
import {
  PostgresProjectStorage,
  PostgresFolderStorage,
  PostgresFileStorage,
} from './repositories/project-repository.js';
import { PostgresRefreshTokenStorage } from './repositories/token-repository.js';

export { closeDatabase, getDb } from './client.js';
export { PostgresUserStorage } from './repositories/user-repository.js';
export {
  PostgresProjectStorage,
  PostgresFolderStorage,
  PostgresFileStorage,
} from './repositories/project-repository.js';
export { PostgresRefreshTokenStorage } from './repositories/token-repository.js';

const SCHEMA_FILE = new URL('../../../sql/schema.sql', import.meta.url);

/**
 * Create PostgreSQL-backed storage. Applies `sql/schema.sql`, which only
 * creates what does not exist yet.
 */
export async function createPostgresStorage(options: DatabaseOptions): Promise<IStorage> {
  initializeDatabase(options);
  await executeSql(await readFile(SCHEMA_FILE, 'utf8'));

  return {
    users: new PostgresUserStorage(),
    projects: new PostgresProjectStorage(),
    folders: new PostgresFolderStorage(),
    files: new PostgresFileStorage(),
    refreshTokens: new PostgresRefreshTokenStorage(),
  };
}
