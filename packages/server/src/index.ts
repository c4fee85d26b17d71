import { serve } from '@hono/node-server';
import { createFileServer } from './app.js';
import { createMemoryStorage } from './storage/memory/index.js';
import { createPostgresStorage, closeDatabase } from './storage/postgres/index.js';
import { DiskBlobStorage } from './storage/disk/blob-storage.js';
import { ensureAdminUser } from './services/auth-service.js';
import { SessionRegistry } from './services/session-registry.js';
import { getConfig } from './config/index.js';
import { createShutdown } from './lifecycle.js';
import { REFRESH_TOKEN_PURGE_INTERVAL_MS } from './config/constants.js';
import type { IStorage } from './storage/interfaces/index.js';

// Load configuration
const config = getConfig();

// Create storage based on environment
let storage: IStorage;

if (config.database.url) {
  console.log('Using PostgreSQL storage');
  storage = await createPostgresStorage({
    url: config.database.url,
    minConnections: config.database.minConnections,
    maxConnections: config.database.maxConnections,
  });
} else {
  console.log('Using in-memory storage (no DATABASE_URL configured)');
  storage = createMemoryStorage();
}

const blobStorage = new DiskBlobStorage(config.storage.path);
await blobStorage.init();

const admin = await ensureAdminUser(storage.users, {
  email: config.auth.adminEmail,
  password: config.auth.adminPassword,
});
if (admin) {
  console.log(`Created admin user ${admin.email}; the password must be changed on first login`);
}

// Expired refresh records can never be presented again; keep them a while for audit
const sessions = new SessionRegistry(storage.refreshTokens);
const purgeTimer = setInterval(() => {
  sessions
    .purgeExpired(config.auth.refreshTokenRetention)
    .then((count) => {
      if (count > 0) {
        console.log(JSON.stringify({ timestamp: new Date().toISOString(), purgedRefreshTokens: count }));
      }
    })
    .catch((error: unknown) => {
      console.error('Refresh token purge failed:', error);
    });
}, REFRESH_TOKEN_PURGE_INTERVAL_MS);
purgeTimer.unref();

const app = createFileServer({
  storage,
  blobStorage,
  jwtSecret: config.secrets.jwtSecret,
  accessTokenTtl: config.auth.accessTokenTtl,
  refreshTokenTtl: config.auth.refreshTokenTtl,
  allowSignup: config.auth.allowSignup,
  maxFileSize: config.storage.maxFileSize,
  corsOrigins: config.server.corsOrigins,
  rateLimit: config.rateLimit,
  enableLogging: config.server.nodeEnv !== 'test',
  hideInternalDetails: config.server.nodeEnv === 'production',
});

// Start server
const server = serve(
  {
    fetch: app.fetch,
    port: config.server.port,
    hostname: config.server.host,
  },
  (info) => {
    console.log(`Filegate running at http://${info.address}:${info.port}`);
    if (!config.database.url) {
      console.log('Note: Running with in-memory storage. Metadata will be lost on restart.');
    }
  }
);

const shutdown = createShutdown(server, [
  () => clearInterval(purgeTimer),
  async () => {
    if (config.database.url) {
      await closeDatabase();
    }
  },
]);

for (const signal of ['SIGTERM', 'SIGINT'] as const) {
  process.once(signal, () => {
    console.log(`${signal} received, shutting down`);
    shutdown()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error('Shutdown failed:', error);
        process.exit(1);
      });
  });
}
