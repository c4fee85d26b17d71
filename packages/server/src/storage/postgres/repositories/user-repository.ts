import { count, eq } from 'drizzle-orm';
import type { User, CreateUserInput, UserRole } from '../../../types/user.js';
import type { IUserStorage } from '../../interfaces/user-storage.js';
import { AppError } from '../../../errors/app-error.js';
import { isUuid } from '../../../crypto/random.js';
import { getDb, isUniqueViolation } from '../client.js';
import { users, type UserRow } from '../schema.js';

function rowToUser(row: UserRow): User {
  return {
    id: row.id,
    email: row.email,
    passwordHash: row.passwordHash,
    role: row.role,
    mustChangePassword: row.mustChangePassword,
    createdAt: row.createdAt,
  };
}

/**
 * PostgreSQL user storage implementation
 */
export class PostgresUserStorage implements IUserStorage {
  async create(input: CreateUserInput): Promise<User> {
    try {
      const [row] = await getDb()
        .insert(users)
        .values({
          email: input.email.toLowerCase(),
          passwordHash: input.passwordHash,
          role: input.role ?? 'user',
          mustChangePassword: input.mustChangePassword ?? false,
        })
        .returning();
      if (!row) {
        throw AppError.serverError('User insert returned no row');
      }
      return rowToUser(row);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw AppError.conflict('Email already registered');
      }
      throw error;
    }
  }

  async findById(id: string): Promise<User | null> {
    if (!isUuid(id)) return null;
    const row = await getDb().query.users.findFirst({ where: eq(users.id, id) });
    return row ? rowToUser(row) : null;
  }

  async findByEmail(email: string): Promise<User | null> {
    const row = await getDb().query.users.findFirst({
      where: eq(users.email, email.toLowerCase()),
    });
    return row ? rowToUser(row) : null;
  }

  async updatePassword(id: string, passwordHash: string, mustChangePassword: boolean): Promise<User | null> {
    const [row] = await getDb()
      .update(users)
      .set({ passwordHash, mustChangePassword })
      .where(eq(users.id, id))
      .returning();
    return row ? rowToUser(row) : null;
  }

  async countByRole(role: UserRole): Promise<number> {
    const [result] = await getDb().select({ value: count() }).from(users).where(eq(users.role, role));
    return result?.value ?? 0;
  }
}
