import type { PublicErrorCode } from '@filegate/shared';

/**
 * Filegate error codes
 */

// Credential errors
export const ERROR_INVALID_CREDENTIALS = 'invalid_credentials' as const;
export const ERROR_INVALID_TOKEN = 'invalid_token' as const;
export const ERROR_REUSE_DETECTED = 'reuse_detected' as const;
export const ERROR_INVALID_API_KEY = 'invalid_api_key' as const;
export const ERROR_UNAUTHORIZED = 'unauthorized' as const;
export const ERROR_FORBIDDEN = 'forbidden' as const;

// Request errors
export const ERROR_INVALID_PATH = 'invalid_path' as const;
export const ERROR_INVALID_REQUEST = 'invalid_request' as const;
export const ERROR_NOT_FOUND = 'not_found' as const;
export const ERROR_CONFLICT = 'conflict' as const;
export const ERROR_SIGNUP_DISABLED = 'signup_disabled' as const;
export const ERROR_PAYLOAD_TOO_LARGE = 'payload_too_large' as const;
export const ERROR_RATE_LIMITED = 'rate_limited' as const;

// Server errors
export const ERROR_SERVER_ERROR = 'server_error' as const;

/**
 * All internal error codes
 */
export type AppErrorCode =
  | typeof ERROR_INVALID_CREDENTIALS
  | typeof ERROR_INVALID_TOKEN
  | typeof ERROR_REUSE_DETECTED
  | typeof ERROR_INVALID_API_KEY
  | typeof ERROR_UNAUTHORIZED
  | typeof ERROR_FORBIDDEN
  | typeof ERROR_INVALID_PATH
  | typeof ERROR_INVALID_REQUEST
  | typeof ERROR_NOT_FOUND
  | typeof ERROR_CONFLICT
  | typeof ERROR_SIGNUP_DISABLED
  | typeof ERROR_PAYLOAD_TOO_LARGE
  | typeof ERROR_RATE_LIMITED
  | typeof ERROR_SERVER_ERROR;

export type HttpErrorStatus = 400 | 401 | 403 | 404 | 409 | 413 | 429 | 500;

/**
 * HTTP status codes for errors
 */
export const ERROR_STATUS_CODES: Record<AppErrorCode, HttpErrorStatus> = {
  [ERROR_INVALID_CREDENTIALS]: 401,
  [ERROR_INVALID_TOKEN]: 401,
  [ERROR_REUSE_DETECTED]: 401,
  [ERROR_INVALID_API_KEY]: 401,
  [ERROR_UNAUTHORIZED]: 401,
  [ERROR_FORBIDDEN]: 403,
  [ERROR_INVALID_PATH]: 400,
  [ERROR_INVALID_REQUEST]: 400,
  [ERROR_NOT_FOUND]: 404,
  [ERROR_CONFLICT]: 409,
  [ERROR_SIGNUP_DISABLED]: 403,
  [ERROR_PAYLOAD_TOO_LARGE]: 413,
  [ERROR_RATE_LIMITED]: 429,
  [ERROR_SERVER_ERROR]: 500,
};

/**
 * Code written to the response body. Reuse detection is reported to clients
 * as a plain invalid token so an attacker cannot tell the two apart.
 */
export const PUBLIC_ERROR_CODES: Record<AppErrorCode, PublicErrorCode> = {
  [ERROR_INVALID_CREDENTIALS]: ERROR_INVALID_CREDENTIALS,
  [ERROR_INVALID_TOKEN]: ERROR_INVALID_TOKEN,
  [ERROR_REUSE_DETECTED]: ERROR_INVALID_TOKEN,
  [ERROR_INVALID_API_KEY]: ERROR_INVALID_API_KEY,
  [ERROR_UNAUTHORIZED]: ERROR_UNAUTHORIZED,
  [ERROR_FORBIDDEN]: ERROR_FORBIDDEN,
  [ERROR_INVALID_PATH]: ERROR_INVALID_PATH,
  [ERROR_INVALID_REQUEST]: ERROR_INVALID_REQUEST,
  [ERROR_NOT_FOUND]: ERROR_NOT_FOUND,
  [ERROR_CONFLICT]: ERROR_CONFLICT,
  [ERROR_SIGNUP_DISABLED]: ERROR_SIGNUP_DISABLED,
  [ERROR_PAYLOAD_TOO_LARGE]: ERROR_PAYLOAD_TOO_LARGE,
  [ERROR_RATE_LIMITED]: ERROR_RATE_LIMITED,
  [ERROR_SERVER_ERROR]: ERROR_SERVER_ERROR,
};

/**
 * Default error descriptions
 */
export const ERROR_DESCRIPTIONS: Record<AppErrorCode, string> = {
  [ERROR_INVALID_CREDENTIALS]: 'Invalid email or password.',
  [ERROR_INVALID_TOKEN]: 'The token provided is expired, revoked, malformed, or invalid.',
  [ERROR_REUSE_DETECTED]: 'The token provided is expired, revoked, malformed, or invalid.',
  [ERROR_INVALID_API_KEY]: 'The API key is invalid for this project.',
  [ERROR_UNAUTHORIZED]: 'Authentication is required.',
  [ERROR_FORBIDDEN]: 'You do not have access to this resource.',
  [ERROR_INVALID_PATH]: 'The folder path is invalid.',
  [ERROR_INVALID_REQUEST]: 'The request is malformed.',
  [ERROR_NOT_FOUND]: 'The requested resource does not exist.',
  [ERROR_CONFLICT]: 'The resource already exists.',
  [ERROR_SIGNUP_DISABLED]: 'Signup is disabled.',
  [ERROR_PAYLOAD_TOO_LARGE]: 'The upload exceeds the maximum file size.',
  [ERROR_RATE_LIMITED]: 'Too many requests.',
  [ERROR_SERVER_ERROR]: 'The server encountered an unexpected condition.',
};
