import { HTTPException } from 'hono/http-exception';
import type { ErrorResponse } from '@filegate/shared';
import { AppError } from './app-error.js';
import { type AppErrorCode, type HttpErrorStatus, PUBLIC_ERROR_CODES, ERROR_DESCRIPTIONS } from './error-codes.js';

export interface HttpError {
  status: HttpErrorStatus;
  body: ErrorResponse;
}

export interface HttpMappingOptions {
  /**
   * Replace 5xx descriptions with a generic message
   */
  hideInternalDetails?: boolean;
}

/**
 * Map any thrown value to the status and body sent to the client.
 *
 * Internally distinct codes (reuse detection) are collapsed here and only
 * here; callers keep the original error for logging.
 */
export function toHttpError(error: unknown, options: HttpMappingOptions = {}): HttpError {
  if (error instanceof HTTPException) {
    return toHttpError(fromHttpException(error), options);
  }

  if (error instanceof AppError) {
    const code = PUBLIC_ERROR_CODES[error.code];
    const collapsed = code !== error.code;
    const hidden = error.statusCode >= 500 && options.hideInternalDetails === true;
    const description = collapsed || hidden ? ERROR_DESCRIPTIONS[code] : error.description;

    return {
      status: error.statusCode,
      body: { error: code, error_description: description },
    };
  }

  const message = error instanceof Error ? error.message : String(error);
  return {
    status: 500,
    body: {
      error: 'server_error',
      error_description: options.hideInternalDetails ? ERROR_DESCRIPTIONS.server_error : message,
    },
  };
}

/**
 * Framework exceptions (malformed JSON, body limits) mapped onto our codes
 */
function fromHttpException(error: HTTPException): AppError {
  const codes: Partial<Record<number, AppErrorCode>> = {
    400: 'invalid_request',
    401: 'unauthorized',
    403: 'forbidden',
    404: 'not_found',
    413: 'payload_too_large',
  };
  const code = codes[error.status] ?? 'server_error';
  return new AppError(code, error.message || undefined, { cause: error });
}
