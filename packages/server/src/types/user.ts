import type { UserRole } from '@filegate/shared';

export type { UserRole };

/**
 * Stored user account
 */
export interface User {
  id: string;
  email: string;
  passwordHash: string;
  role: UserRole;
  mustChangePassword: boolean;
  createdAt: Date;
}

/**
 * Input for creating a user
 */
export interface CreateUserInput {
  email: string;
  passwordHash: string;
  role?: UserRole;
  mustChangePassword?: boolean;
}
