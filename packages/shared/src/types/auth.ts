export type UserRole = 'admin' | 'user';

/**
 * Public view of a user account
 */
export interface UserInfo {
  id: string;
  email: string;
  role: UserRole;
  created_at: string;
  must_change_password: boolean;
}

/**
 * Returned by register and login
 */
export interface TokenAuthResponse {
  access_token: string;
  refresh_token: string;
  token_type: 'Bearer';
  expires_in: number;
  user: UserInfo;
}

/**
 * Returned by the refresh endpoint
 */
export interface TokenRefreshResponse {
  access_token: string;
  refresh_token: string;
  token_type: 'Bearer';
  expires_in: number;
}

export interface RegisterRequest {
  email: string;
  password: string;
}

export interface LoginRequest {
  email: string;
  password: string;
}

export interface RefreshRequest {
  refresh_token: string;
}

export interface LogoutRequest {
  refresh_token?: string;
}

export interface ChangePasswordRequest {
  current_password: string;
  new_password: string;
}

export interface MessageResponse {
  message: string;
}

export interface LogoutAllResponse {
  message: string;
  revoked_count: number;
}

/**
 * A live login session. Internal identifiers are never exposed.
 */
export interface SessionInfo {
  issued_at: string;
  expires_at: string;
  user_agent?: string;
  ip_address?: string;
}
