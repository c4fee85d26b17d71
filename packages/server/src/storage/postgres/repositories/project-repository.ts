import { and, asc, count, desc, eq, sql } from 'drizzle-orm';
import type {
  Project,
  CreateProjectInput,
  UpdateProjectInput,
  Folder,
  UpsertFolderInput,
  StoredFile,
  CreateFileInput,
  UsageStats,
} from '../../../types/project.js';
import type { IProjectStorage, IFolderStorage, IFileStorage } from '../../interfaces/project-storage.js';
import type { SQL } from 'drizzle-orm';
import { AppError } from '../../../errors/app-error.js';
import { generateApiKey, isUuid } from '../../../crypto/index.js';
import { getDb } from '../client.js';
import { projects, folders, files, type ProjectRow, type FolderRow, type FileRow } from '../schema.js';

function rowToProject(row: ProjectRow): Project {
  return {
    id: row.id,
    ownerId: row.userId,
    name: row.name,
    apiKey: row.apiKey,
    isPublic: row.isPublic,
    createdAt: row.createdAt,
  };
}

function rowToFolder(row: FolderRow): Folder {
  return {
    id: row.id,
    projectId: row.projectId,
    path: row.path,
    isPublic: row.isPublic,
    createdAt: row.createdAt,
  };
}

function rowToFile(row: FileRow): StoredFile {
  return {
    id: row.id,
    projectId: row.projectId,
    folderId: row.folderId,
    originalName: row.originalName,
    storedName: row.storedName,
    storageKey: row.filePath,
    size: row.size,
    mimeType: row.mimeType,
    uploadedAt: row.uploadDate,
  };
}

/**
 * PostgreSQL project storage implementation
 */
export class PostgresProjectStorage implements IProjectStorage {
  async create(input: CreateProjectInput): Promise<Project> {
    const [row] = await getDb()
      .insert(projects)
      .values({
        userId: input.ownerId,
        name: input.name,
        apiKey: generateApiKey(),
        isPublic: input.isPublic ?? false,
      })
      .returning();
    if (!row) {
      throw AppError.serverError('Project insert returned no row');
    }
    return rowToProject(row);
  }

  async findById(id: string): Promise<Project | null> {
    if (!isUuid(id)) return null;
    const row = await getDb().query.projects.findFirst({ where: eq(projects.id, id) });
    return row ? rowToProject(row) : null;
  }

  async findByApiKey(apiKey: string): Promise<Project | null> {
    if (!isUuid(apiKey)) return null;
    const row = await getDb().query.projects.findFirst({ where: eq(projects.apiKey, apiKey) });
    return row ? rowToProject(row) : null;
  }

  async listByOwner(ownerId: string): Promise<Project[]> {
    const rows = await getDb()
      .select()
      .from(projects)
      .where(eq(projects.userId, ownerId))
      .orderBy(desc(projects.createdAt));
    return rows.map(rowToProject);
  }

  async update(id: string, input: UpdateProjectInput): Promise<Project | null> {
    if (input.name === undefined && input.isPublic === undefined) {
      return this.findById(id);
    }

    const [row] = await getDb()
      .update(projects)
      .set({ name: input.name, isPublic: input.isPublic })
      .where(eq(projects.id, id))
      .returning();
    return row ? rowToProject(row) : null;
  }

  async regenerateApiKey(id: string): Promise<Project | null> {
    const [row] = await getDb()
      .update(projects)
      .set({ apiKey: generateApiKey() })
      .where(eq(projects.id, id))
      .returning();
    return row ? rowToProject(row) : null;
  }

  async delete(id: string): Promise<boolean> {
    const rows = await getDb().delete(projects).where(eq(projects.id, id)).returning({ id: projects.id });
    return rows.length > 0;
  }
}

/**
 * PostgreSQL folder storage implementation
 */
export class PostgresFolderStorage implements IFolderStorage {
  async findById(id: string): Promise<Folder | null> {
    if (!isUuid(id)) return null;
    const row = await getDb().query.folders.findFirst({ where: eq(folders.id, id) });
    return row ? rowToFolder(row) : null;
  }

  async findByPath(projectId: string, path: string): Promise<Folder | null> {
    if (!isUuid(projectId)) return null;
    const row = await getDb().query.folders.findFirst({
      where: and(eq(folders.projectId, projectId), eq(folders.path, path)),
    });
    return row ? rowToFolder(row) : null;
  }

  async listByProject(projectId: string): Promise<Folder[]> {
    const rows = await getDb()
      .select()
      .from(folders)
      .where(eq(folders.projectId, projectId))
      .orderBy(asc(folders.path));
    return rows.map(rowToFolder);
  }

  async upsert(input: UpsertFolderInput): Promise<Folder> {
    const [row] = await getDb()
      .insert(folders)
      .values(input)
      .onConflictDoUpdate({
        target: [folders.projectId, folders.path],
        set: { isPublic: input.isPublic },
      })
      .returning();
    if (!row) {
      throw AppError.serverError('Folder upsert returned no row');
    }
    return rowToFolder(row);
  }

  async findOrCreate(input: UpsertFolderInput): Promise<Folder> {
    const [row] = await getDb()
      .insert(folders)
      .values(input)
      .onConflictDoNothing({ target: [folders.projectId, folders.path] })
      .returning();
    if (row) {
      return rowToFolder(row);
    }

    const existing = await this.findByPath(input.projectId, input.path);
    if (!existing) {
      throw AppError.serverError('Folder vanished during creation');
    }
    return existing;
  }

  async setVisibility(id: string, isPublic: boolean): Promise<Folder | null> {
    const [row] = await getDb().update(folders).set({ isPublic }).where(eq(folders.id, id)).returning();
    return row ? rowToFolder(row) : null;
  }

  async delete(id: string): Promise<boolean> {
    const rows = await getDb().delete(folders).where(eq(folders.id, id)).returning({ id: folders.id });
    return rows.length > 0;
  }
}

/**
 * PostgreSQL file metadata storage implementation
 */
export class PostgresFileStorage implements IFileStorage {
  async create(input: CreateFileInput): Promise<StoredFile> {
    const [row] = await getDb()
      .insert(files)
      .values({
        projectId: input.projectId,
        folderId: input.folderId,
        originalName: input.originalName,
        storedName: input.storedName,
        filePath: input.storageKey,
        size: input.size,
        mimeType: input.mimeType,
      })
      .returning();
    if (!row) {
      throw AppError.serverError('File insert returned no row');
    }
    return rowToFile(row);
  }

  async findById(id: string): Promise<StoredFile | null> {
    if (!isUuid(id)) return null;
    const row = await getDb().query.files.findFirst({ where: eq(files.id, id) });
    return row ? rowToFile(row) : null;
  }

  async listByProject(projectId: string): Promise<StoredFile[]> {
    const rows = await getDb()
      .select()
      .from(files)
      .where(eq(files.projectId, projectId))
      .orderBy(desc(files.uploadDate));
    return rows.map(rowToFile);
  }

  async listByFolder(folderId: string): Promise<StoredFile[]> {
    const rows = await getDb().select().from(files).where(eq(files.folderId, folderId));
    return rows.map(rowToFile);
  }

  async delete(id: string): Promise<boolean> {
    const rows = await getDb().delete(files).where(eq(files.id, id)).returning({ id: files.id });
    return rows.length > 0;
  }

  async statsByProject(projectId: string): Promise<UsageStats> {
    return this.stats(eq(files.projectId, projectId));
  }

  async statsByFolder(folderId: string): Promise<UsageStats> {
    return this.stats(eq(files.folderId, folderId));
  }

  private async stats(where: SQL): Promise<UsageStats> {
    const [result] = await getDb()
      .select({
        fileCount: count(),
        totalSize: sql<number>`coalesce(sum(${files.size}), 0)`.mapWith(Number),
      })
      .from(files)
      .where(where);
    return {
      fileCount: result?.fileCount ?? 0,
      totalSize: result?.totalSize ?? 0,
    };
  }
}
