import type { User, CreateUserInput, UserRole } from '../../types/user.js';

/**
 * Storage interface for user accounts. Emails are stored lowercased.
 */
export interface IUserStorage {
  /**
   * Create a user. Throws `conflict` if the email is taken.
   */
  create(input: CreateUserInput): Promise<User>;

  findById(id: string): Promise<User | null>;

  findByEmail(email: string): Promise<User | null>;

  /**
   * Replace the password digest and set the must-change flag
   */
  updatePassword(id: string, passwordHash: string, mustChangePassword: boolean): Promise<User | null>;

  countByRole(role: UserRole): Promise<number>;
}
