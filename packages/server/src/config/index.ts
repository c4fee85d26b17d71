import { readFileSync, existsSync } from 'node:fs';
import * as constants from './constants.js';

/**
 * Read a secret from file (Docker secrets) or environment variable
 * Supports both `VAR_FILE` (path to file) and `VAR` (direct value) patterns
 */
function readSecret(envVar: string): string | undefined {
  const fileEnvVar = `${envVar}_FILE`;
  const filePath = process.env[fileEnvVar];

  if (filePath && existsSync(filePath)) {
    return readFileSync(filePath, 'utf-8').trim();
  }

  return process.env[envVar];
}

function readInt(envVar: string, fallback: number): number {
  const raw = process.env[envVar];
  if (raw === undefined || raw === '') {
    return fallback;
  }

  const value = parseInt(raw, 10);
  if (Number.isNaN(value)) {
    throw new Error(`${envVar} must be an integer, got "${raw}"`);
  }
  return value;
}

function readBoolean(envVar: string, fallback: boolean): boolean {
  const raw = process.env[envVar];
  if (raw === undefined || raw === '') {
    return fallback;
  }

  if (raw === 'true' || raw === '1') return true;
  if (raw === 'false' || raw === '0') return false;
  throw new Error(`${envVar} must be "true" or "false", got "${raw}"`);
}

/**
 * Application configuration loaded from environment
 */
export interface Config {
  server: {
    port: number;
    host: string;
    nodeEnv: string;
    corsOrigins: string[];
  };
  database: {
    url: string | undefined;
    minConnections: number;
    maxConnections: number;
  };
  secrets: {
    jwtSecret: string;
  };
  storage: {
    path: string;
    maxFileSize: number;
  };
  auth: {
    allowSignup: boolean;
    adminEmail: string;
    adminPassword: string;
    accessTokenTtl: number;
    refreshTokenTtl: number;
    /**
     * Seconds an expired refresh record is kept for audit before it is purged
     */
    refreshTokenRetention: number;
  };
  rateLimit: {
    auth: { windowMs: number; maxRequests: number };
    upload: { windowMs: number; maxRequests: number };
  };
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(): Config {
  const jwtSecret = readSecret('JWT_SECRET');
  if (!jwtSecret) {
    throw new Error('JWT_SECRET (or JWT_SECRET_FILE) must be set');
  }

  return {
    server: {
      port: readInt('PORT', 8000),
      host: process.env['HOST'] ?? '0.0.0.0',
      nodeEnv: process.env['NODE_ENV'] ?? 'development',
      corsOrigins: (process.env['CORS_ORIGINS'] ?? 'http://localhost:3000')
        .split(',')
        .map((origin) => origin.trim())
        .filter((origin) => origin.length > 0),
    },
    database: {
      url: process.env['DATABASE_URL'],
      minConnections: readInt('DB_MIN_CONNECTIONS', 2),
      maxConnections: readInt('DB_MAX_CONNECTIONS', 10),
    },
    secrets: {
      jwtSecret,
    },
    storage: {
      path: process.env['STORAGE_PATH'] ?? './storage',
      maxFileSize: readInt('MAX_FILE_SIZE', constants.DEFAULT_MAX_FILE_SIZE),
    },
    auth: {
      allowSignup: readBoolean('ALLOW_SIGNUP', true),
      adminEmail: process.env['ADMIN_EMAIL'] ?? 'admin@example.com',
      adminPassword: readSecret('ADMIN_PASSWORD') ?? 'admin',
      accessTokenTtl: readInt('ACCESS_TOKEN_TTL', constants.DEFAULT_ACCESS_TOKEN_TTL),
      refreshTokenTtl: readInt('REFRESH_TOKEN_TTL', constants.DEFAULT_REFRESH_TOKEN_TTL),
      refreshTokenRetention: readInt(
        'REFRESH_TOKEN_RETENTION',
        constants.DEFAULT_REFRESH_TOKEN_RETENTION
      ),
    },
    rateLimit: {
      auth: {
        windowMs: readInt('AUTH_RATE_LIMIT_WINDOW_MS', constants.DEFAULT_AUTH_RATE_LIMIT_WINDOW_MS),
        maxRequests: readInt(
          'AUTH_RATE_LIMIT_MAX_REQUESTS',
          constants.DEFAULT_AUTH_RATE_LIMIT_MAX_REQUESTS
        ),
      },
      upload: {
        windowMs: readInt('UPLOAD_RATE_LIMIT_WINDOW_MS', constants.DEFAULT_UPLOAD_RATE_LIMIT_WINDOW_MS),
        maxRequests: readInt(
          'UPLOAD_RATE_LIMIT_MAX_REQUESTS',
          constants.DEFAULT_UPLOAD_RATE_LIMIT_MAX_REQUESTS
        ),
      },
    },
  };
}

// Singleton config instance
let config: Config | null = null;

/**
 * Get the current configuration (loads if not already loaded)
 */
export function getConfig(): Config {
  if (!config) {
    config = loadConfig();
  }
  return config;
}

/**
 * Reset configuration (useful for testing)
 */
export function resetConfig(): void {
  config = null;
}

// Re-export constants
export { constants };
