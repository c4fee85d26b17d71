/**
 * Error codes visible to HTTP clients. Internal-only codes are collapsed
 * onto one of these before a response is written.
 */
export type PublicErrorCode =
  | 'invalid_credentials'
  | 'invalid_token'
  | 'invalid_api_key'
  | 'unauthorized'
  | 'forbidden'
  | 'invalid_path'
  | 'invalid_request'
  | 'not_found'
  | 'conflict'
  | 'signup_disabled'
  | 'payload_too_large'
  | 'rate_limited'
  | 'server_error';

export interface ErrorResponse {
  error: PublicErrorCode;
  error_description?: string;
}
