import { describe, it, expect } from 'vitest';
import { HTTPException } from 'hono/http-exception';
import { toHttpError } from '../../errors/http-mapping.js';
import { AppError } from '../../errors/app-error.js';

describe('toHttpError', () => {
  it('passes through public codes with their description', () => {
    expect(toHttpError(AppError.invalidPath('Folder path must not be empty'))).toEqual({
      status: 400,
      body: { error: 'invalid_path', error_description: 'Folder path must not be empty' },
    });
  });

  it('reports reuse detection as a generic invalid token', () => {
    expect(toHttpError(AppError.reuseDetected('Refresh token reuse detected'))).toEqual({
      status: 401,
      body: {
        error: 'invalid_token',
        error_description: 'The token provided is expired, revoked, malformed, or invalid.',
      },
    });
  });

  it('hides server error details when asked', () => {
    const error = AppError.serverError('Stored bytes missing for file f-1');

    expect(toHttpError(error).body.error_description).toBe('Stored bytes missing for file f-1');
    expect(toHttpError(error, { hideInternalDetails: true }).body).toEqual({
      error: 'server_error',
      error_description: 'The server encountered an unexpected condition.',
    });
  });

  it('maps unknown errors to server_error', () => {
    expect(toHttpError(new Error('boom'))).toEqual({
      status: 500,
      body: { error: 'server_error', error_description: 'boom' },
    });
  });

  it('maps framework exceptions onto error codes', () => {
    expect(toHttpError(new HTTPException(400, { message: 'Malformed JSON in request body' }))).toEqual({
      status: 400,
      body: { error: 'invalid_request', error_description: 'Malformed JSON in request body' },
    });
    expect(toHttpError(new HTTPException(413)).body.error).toBe('payload_too_large');
    expect(toHttpError(new HTTPException(502)).status).toBe(500);
  });
});
