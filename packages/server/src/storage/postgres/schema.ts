import { pgTable, uuid, varchar, text, boolean, timestamp, bigint, index, unique } from 'drizzle-orm/pg-core';
import type { RevocationReason } from '../../types/token.js';

export const users = pgTable('users', {
  id: uuid('id').primaryKey().defaultRandom(),
  email: varchar('email', { length: 255 }).notNull().unique(),
  passwordHash: text('password_hash').notNull(),
  role: varchar('role', { length: 16, enum: ['admin', 'user'] }).notNull().default('user'),
  mustChangePassword: boolean('must_change_password').notNull().default(false),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
});

export const projects = pgTable(
  'projects',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    userId: uuid('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    name: varchar('name', { length: 255 }).notNull(),
    apiKey: uuid('api_key').notNull().unique(),
    isPublic: boolean('is_public').notNull().default(false),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    userIdx: index('idx_projects_user_id').on(table.userId),
  })
);

export const folders = pgTable(
  'folders',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    projectId: uuid('project_id')
      .notNull()
      .references(() => projects.id, { onDelete: 'cascade' }),
    path: varchar('path', { length: 500 }).notNull(),
    isPublic: boolean('is_public').notNull().default(false),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    projectPath: unique('folders_project_id_path_key').on(table.projectId, table.path),
    projectIdx: index('idx_folders_project_id').on(table.projectId),
  })
);

export const files = pgTable(
  'files',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    projectId: uuid('project_id')
      .notNull()
      .references(() => projects.id, { onDelete: 'cascade' }),
    folderId: uuid('folder_id').references(() => folders.id, { onDelete: 'set null' }),
    originalName: varchar('original_name', { length: 500 }).notNull(),
    storedName: varchar('stored_name', { length: 500 }).notNull(),
    filePath: text('file_path').notNull(),
    size: bigint('size', { mode: 'number' }).notNull(),
    mimeType: varchar('mime_type', { length: 255 }).notNull(),
    uploadDate: timestamp('upload_date', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    projectIdx: index('idx_files_project_id').on(table.projectId),
    folderIdx: index('idx_files_folder_id').on(table.folderId),
  })
);

export const refreshTokens = pgTable(
  'refresh_tokens',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    userId: uuid('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    tokenHash: text('token_hash').notNull().unique('unique_token_hash'),
    familyId: uuid('family_id').notNull(),
    parentTokenId: uuid('parent_token_id'),
    expiresAt: timestamp('expires_at', { withTimezone: true }).notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    revokedAt: timestamp('revoked_at', { withTimezone: true }),
    revokedReason: text('revoked_reason').$type<RevocationReason>(),
    userAgent: text('user_agent'),
    ipAddress: text('ip_address'),
  },
  (table) => ({
    userIdx: index('idx_refresh_tokens_user_id').on(table.userId),
    familyIdx: index('idx_refresh_tokens_family_id').on(table.familyId),
    expiresIdx: index('idx_refresh_tokens_expires_at').on(table.expiresAt),
  })
);

export type UserRow = typeof users.$inferSelect;
export type ProjectRow = typeof projects.$inferSelect;
export type FolderRow = typeof folders.$inferSelect;
export type FileRow = typeof files.$inferSelect;
export type RefreshTokenRow = typeof refreshTokens.$inferSelect;
