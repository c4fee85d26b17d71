import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { bodyLimit } from 'hono/body-limit';
import type { AppEnv } from './types/hono.js';
import type { IStorage, IBlobStorage } from './storage/interfaces/index.js';
import { AppError } from './errors/app-error.js';
import { createServices, consoleAuditLogger, type AuditLogger } from './services/index.js';
import { appErrorHandler, securityHeaders, requestLogger } from './middleware/error-handler.js';
import { endpointRateLimiter, type RateLimiterOptions } from './middleware/rate-limiter.js';
import { createAuthRoutes } from './routes/auth/index.js';
import { createProjectRoutes } from './routes/projects/index.js';
import { createFolderRoutes } from './routes/folders/index.js';
import { createFileRoutes } from './routes/files/index.js';
import {
  DEFAULT_MAX_FILE_SIZE,
  MULTIPART_OVERHEAD_BYTES,
  DEFAULT_AUTH_RATE_LIMIT_WINDOW_MS,
  DEFAULT_AUTH_RATE_LIMIT_MAX_REQUESTS,
  DEFAULT_UPLOAD_RATE_LIMIT_WINDOW_MS,
  DEFAULT_UPLOAD_RATE_LIMIT_MAX_REQUESTS,
  HEADER_API_KEY,
} from './config/constants.js';

type RateLimit = Pick<RateLimiterOptions, 'windowMs' | 'maxRequests'>;

export interface FileServerOptions {
  storage: IStorage;
  blobStorage: IBlobStorage;
  jwtSecret: string;
  /**
   * Seconds
   */
  accessTokenTtl?: number;
  /**
   * Seconds
   */
  refreshTokenTtl?: number;
  allowSignup?: boolean;
  maxFileSize?: number;
  corsOrigins?: string[];
  rateLimit?: {
    auth?: RateLimit;
    upload?: RateLimit;
  };
  enableLogging?: boolean;
  auditLogger?: AuditLogger;
  /**
   * Replace 5xx error descriptions with a generic message
   */
  hideInternalDetails?: boolean;
}

/**
 * Create the file server application
 */
export function createFileServer(options: FileServerOptions): Hono<AppEnv> {
  const {
    storage,
    blobStorage,
    jwtSecret,
    accessTokenTtl,
    refreshTokenTtl,
    allowSignup = true,
    maxFileSize = DEFAULT_MAX_FILE_SIZE,
    corsOrigins = ['http://localhost:3000'],
    rateLimit = {},
    enableLogging = true,
    auditLogger = consoleAuditLogger,
    hideInternalDetails = false,
  } = options;

  const services = createServices({
    storage,
    blobStorage,
    jwtSecret,
    accessTokenTtl,
    refreshTokenTtl,
    allowSignup,
    maxFileSize,
    auditLogger,
  });

  const app = new Hono<AppEnv>();

  // Global error handler
  app.onError(appErrorHandler({ hideInternalDetails }));

  // Security headers
  app.use('*', securityHeaders());

  // Logging
  if (enableLogging) {
    app.use('*', requestLogger());
  }

  app.use(
    '*',
    cors({
      origin: corsOrigins,
      allowMethods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
      allowHeaders: ['Authorization', 'Content-Type', HEADER_API_KEY],
      exposeHeaders: ['Content-Disposition', 'Retry-After'],
      credentials: true,
      maxAge: 86400,
    })
  );

  // Rate limiting
  app.use(
    '/api/auth/*',
    endpointRateLimiter(
      'auth',
      rateLimit.auth ?? {
        windowMs: DEFAULT_AUTH_RATE_LIMIT_WINDOW_MS,
        maxRequests: DEFAULT_AUTH_RATE_LIMIT_MAX_REQUESTS,
      }
    )
  );

  const uploadLimiter = endpointRateLimiter(
    'upload',
    rateLimit.upload ?? {
      windowMs: DEFAULT_UPLOAD_RATE_LIMIT_WINDOW_MS,
      maxRequests: DEFAULT_UPLOAD_RATE_LIMIT_MAX_REQUESTS,
    }
  );
  app.use('/api/upload', uploadLimiter);
  app.use('/api/folders/delete', uploadLimiter);

  // Stop oversized uploads while streaming, before the form is buffered
  const maxUploadBody = maxFileSize + MULTIPART_OVERHEAD_BYTES;
  app.use(
    '/api/upload',
    bodyLimit({
      maxSize: maxUploadBody,
      onError: () => {
        throw AppError.payloadTooLarge(`Request body exceeds maximum of ${maxUploadBody} bytes`);
      },
    })
  );

  // Health check
  app.get('/health', (c) => c.json({ status: 'ok' }));

  app.route('/api/auth', createAuthRoutes({ storage, services }));
  app.route('/api/projects', createProjectRoutes({ storage, services }));
  app.route('/api/folders', createFolderRoutes({ storage, services }));
  app.route('/api', createFileRoutes({ storage, services }));

  return app;
}
