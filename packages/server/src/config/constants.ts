/**
 * Filegate constants
 */

// Token types
export const TOKEN_TYPE_BEARER = 'Bearer' as const;
export const ACCESS_TOKEN_TYPE = 'access' as const;

// Default TTLs (in seconds)
export const DEFAULT_ACCESS_TOKEN_TTL = 1800; // 30 minutes
export const DEFAULT_REFRESH_TOKEN_TTL = 604800; // 7 days
export const DEFAULT_REFRESH_TOKEN_RETENTION = 2592000; // 30 days past expiry
export const REFRESH_TOKEN_PURGE_INTERVAL_MS = 3600000; // 1 hour

// Token/secret lengths
export const REFRESH_TOKEN_LENGTH = 32; // bytes
export const JWT_ALGORITHM = 'HS256' as const;
export const JWT_CLOCK_TOLERANCE = 5; // seconds

// Password policy
export const MIN_PASSWORD_LENGTH = 8;

// Folder paths
export const MAX_FOLDER_PATH_LENGTH = 500;
export const FOLDER_PATH_SEPARATOR = '/';

// Uploads
export const DEFAULT_MAX_FILE_SIZE = 104857600; // 100 MiB
export const MULTIPART_OVERHEAD_BYTES = 65536; // boundaries, part headers and form fields
export const DEFAULT_MIME_TYPE = 'application/octet-stream';
export const DOWNLOAD_URL_PREFIX = '/api/files/';

// Rate limiting defaults
export const DEFAULT_AUTH_RATE_LIMIT_WINDOW_MS = 60000; // 1 minute
export const DEFAULT_AUTH_RATE_LIMIT_MAX_REQUESTS = 30;
export const DEFAULT_UPLOAD_RATE_LIMIT_WINDOW_MS = 60000;
export const DEFAULT_UPLOAD_RATE_LIMIT_MAX_REQUESTS = 60;

// HTTP headers
export const HEADER_AUTHORIZATION = 'Authorization';
export const HEADER_API_KEY = 'X-API-Key';
export const HEADER_CACHE_CONTROL = 'Cache-Control';
export const HEADER_PRAGMA = 'Pragma';
export const HEADER_USER_AGENT = 'User-Agent';

// Query parameters
export const QUERY_API_KEY = 'api_key';

// Cache control for token responses
export const TOKEN_CACHE_CONTROL = 'no-store';
export const TOKEN_PRAGMA = 'no-cache';
