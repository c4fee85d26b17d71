import {
  type AppErrorCode,
  type HttpErrorStatus,
  ERROR_STATUS_CODES,
  ERROR_DESCRIPTIONS,
  ERROR_INVALID_CREDENTIALS,
  ERROR_INVALID_TOKEN,
  ERROR_REUSE_DETECTED,
  ERROR_INVALID_API_KEY,
  ERROR_UNAUTHORIZED,
  ERROR_FORBIDDEN,
  ERROR_INVALID_PATH,
  ERROR_INVALID_REQUEST,
  ERROR_NOT_FOUND,
  ERROR_CONFLICT,
  ERROR_SIGNUP_DISABLED,
  ERROR_PAYLOAD_TOO_LARGE,
  ERROR_RATE_LIMITED,
  ERROR_SERVER_ERROR,
} from './error-codes.js';

/**
 * Application error. `code` is the internal variant; what the client sees is
 * decided separately by `toHttpError`.
 */
export class AppError extends Error {
  public readonly code: AppErrorCode;
  public readonly statusCode: HttpErrorStatus;
  public readonly description: string;

  constructor(code: AppErrorCode, description?: string, options?: { cause?: unknown }) {
    const desc = description ?? ERROR_DESCRIPTIONS[code];
    super(desc);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = ERROR_STATUS_CODES[code];
    this.description = desc;

    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }

    // Maintains proper stack trace in V8
    Error.captureStackTrace(this, this.constructor);
  }

  // Factory methods for common errors

  static invalidCredentials(): AppError {
    return new AppError(ERROR_INVALID_CREDENTIALS);
  }

  static invalidToken(description?: string): AppError {
    return new AppError(ERROR_INVALID_TOKEN, description);
  }

  static reuseDetected(description?: string): AppError {
    return new AppError(ERROR_REUSE_DETECTED, description);
  }

  static invalidApiKey(description?: string): AppError {
    return new AppError(ERROR_INVALID_API_KEY, description);
  }

  static unauthorized(description?: string): AppError {
    return new AppError(ERROR_UNAUTHORIZED, description);
  }

  static forbidden(description?: string): AppError {
    return new AppError(ERROR_FORBIDDEN, description);
  }

  static invalidPath(description?: string): AppError {
    return new AppError(ERROR_INVALID_PATH, description);
  }

  static invalidRequest(description?: string): AppError {
    return new AppError(ERROR_INVALID_REQUEST, description);
  }

  static notFound(description?: string): AppError {
    return new AppError(ERROR_NOT_FOUND, description);
  }

  static conflict(description?: string): AppError {
    return new AppError(ERROR_CONFLICT, description);
  }

  static signupDisabled(): AppError {
    return new AppError(ERROR_SIGNUP_DISABLED);
  }

  static payloadTooLarge(description?: string): AppError {
    return new AppError(ERROR_PAYLOAD_TOO_LARGE, description);
  }

  static rateLimited(description?: string): AppError {
    return new AppError(ERROR_RATE_LIMITED, description);
  }

  static serverError(description?: string, cause?: unknown): AppError {
    return new AppError(ERROR_SERVER_ERROR, description, { cause });
  }
}

/**
 * Narrow an unknown thrown value to an AppError with the given code
 */
export function isAppError(error: unknown, code?: AppErrorCode): error is AppError {
  return error instanceof AppError && (code === undefined || error.code === code);
}
