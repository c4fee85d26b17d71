import type { User, CreateUserInput, UserRole } from '../../types/user.js';
import type { IUserStorage } from '../interfaces/user-storage.js';
import { AppError } from '../../errors/app-error.js';
import { generateId } from '../../crypto/index.js';

/**
 * In-memory user storage implementation
 */
export class MemoryUserStorage implements IUserStorage {
  private users = new Map<string, User>();
  private emailIndex = new Map<string, string>(); // lowercased email -> id

  async create(input: CreateUserInput): Promise<User> {
    const email = input.email.toLowerCase();
    if (this.emailIndex.has(email)) {
      throw AppError.conflict('Email already registered');
    }

    const user: User = {
      id: generateId(),
      email,
      passwordHash: input.passwordHash,
      role: input.role ?? 'user',
      mustChangePassword: input.mustChangePassword ?? false,
      createdAt: new Date(),
    };

    this.users.set(user.id, user);
    this.emailIndex.set(email, user.id);
    return user;
  }

  async findById(id: string): Promise<User | null> {
    return this.users.get(id) ?? null;
  }

  async findByEmail(email: string): Promise<User | null> {
    const id = this.emailIndex.get(email.toLowerCase());
    if (!id) return null;
    return this.users.get(id) ?? null;
  }

  async updatePassword(id: string, passwordHash: string, mustChangePassword: boolean): Promise<User | null> {
    const user = this.users.get(id);
    if (!user) return null;

    const updated: User = { ...user, passwordHash, mustChangePassword };
    this.users.set(id, updated);
    return updated;
  }

  async countByRole(role: UserRole): Promise<number> {
    let count = 0;
    for (const user of this.users.values()) {
      if (user.role === role) count++;
    }
    return count;
  }
}
