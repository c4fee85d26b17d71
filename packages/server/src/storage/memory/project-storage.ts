import type {
  Project,
  CreateProjectInput,
  UpdateProjectInput,
  Folder,
  UpsertFolderInput,
  StoredFile,
  CreateFileInput,
  UsageStats,
} from '../../types/project.js';
import type { IProjectStorage, IFolderStorage, IFileStorage } from '../interfaces/project-storage.js';
import { generateId, generateApiKey } from '../../crypto/index.js';

function sumUsage(files: StoredFile[]): UsageStats {
  return {
    fileCount: files.length,
    totalSize: files.reduce((total, file) => total + file.size, 0),
  };
}

/**
 * In-memory file metadata storage implementation
 */
export class MemoryFileStorage implements IFileStorage {
  private files = new Map<string, StoredFile>();

  async create(input: CreateFileInput): Promise<StoredFile> {
    const file: StoredFile = {
      id: generateId(),
      ...input,
      uploadedAt: new Date(),
    };
    this.files.set(file.id, file);
    return file;
  }

  async findById(id: string): Promise<StoredFile | null> {
    return this.files.get(id) ?? null;
  }

  async listByProject(projectId: string): Promise<StoredFile[]> {
    return [...this.files.values()]
      .filter((file) => file.projectId === projectId)
      .sort((a, b) => b.uploadedAt.getTime() - a.uploadedAt.getTime());
  }

  async listByFolder(folderId: string): Promise<StoredFile[]> {
    return [...this.files.values()].filter((file) => file.folderId === folderId);
  }

  async delete(id: string): Promise<boolean> {
    return this.files.delete(id);
  }

  async statsByProject(projectId: string): Promise<UsageStats> {
    return sumUsage(await this.listByProject(projectId));
  }

  async statsByFolder(folderId: string): Promise<UsageStats> {
    return sumUsage(await this.listByFolder(folderId));
  }

  /**
   * Cascade for project deletion
   */
  deleteByProject(projectId: string): void {
    for (const [id, file] of this.files) {
      if (file.projectId === projectId) this.files.delete(id);
    }
  }

  /**
   * Files outlive a deleted folder row, unlinked from it
   */
  detachFolder(folderId: string): void {
    for (const [id, file] of this.files) {
      if (file.folderId === folderId) this.files.set(id, { ...file, folderId: null });
    }
  }
}

/**
 * In-memory folder storage implementation
 */
export class MemoryFolderStorage implements IFolderStorage {
  private folders = new Map<string, Folder>();
  private pathIndex = new Map<string, string>(); // `${projectId}:${path}` -> id

  constructor(private readonly files: MemoryFileStorage) {}

  async findById(id: string): Promise<Folder | null> {
    return this.folders.get(id) ?? null;
  }

  async findByPath(projectId: string, path: string): Promise<Folder | null> {
    return this.lookup(projectId, path);
  }

  async listByProject(projectId: string): Promise<Folder[]> {
    return [...this.folders.values()]
      .filter((folder) => folder.projectId === projectId)
      .sort((a, b) => a.path.localeCompare(b.path));
  }

  // Check and insert run without yielding, so concurrent callers share one row
  async upsert(input: UpsertFolderInput): Promise<Folder> {
    const existing = this.lookup(input.projectId, input.path);
    if (existing) {
      const updated: Folder = { ...existing, isPublic: input.isPublic };
      this.folders.set(existing.id, updated);
      return updated;
    }
    return this.insert(input);
  }

  async findOrCreate(input: UpsertFolderInput): Promise<Folder> {
    return this.lookup(input.projectId, input.path) ?? this.insert(input);
  }

  async setVisibility(id: string, isPublic: boolean): Promise<Folder | null> {
    const folder = this.folders.get(id);
    if (!folder) return null;

    const updated: Folder = { ...folder, isPublic };
    this.folders.set(id, updated);
    return updated;
  }

  async delete(id: string): Promise<boolean> {
    const folder = this.folders.get(id);
    if (!folder) return false;

    this.pathIndex.delete(`${folder.projectId}:${folder.path}`);
    this.folders.delete(id);
    this.files.detachFolder(id);
    return true;
  }

  /**
   * Cascade for project deletion
   */
  deleteByProject(projectId: string): void {
    for (const [id, folder] of this.folders) {
      if (folder.projectId === projectId) {
        this.pathIndex.delete(`${folder.projectId}:${folder.path}`);
        this.folders.delete(id);
      }
    }
  }

  private lookup(projectId: string, path: string): Folder | null {
    const id = this.pathIndex.get(`${projectId}:${path}`);
    if (!id) return null;
    return this.folders.get(id) ?? null;
  }

  private insert(input: UpsertFolderInput): Folder {
    const folder: Folder = {
      id: generateId(),
      projectId: input.projectId,
      path: input.path,
      isPublic: input.isPublic,
      createdAt: new Date(),
    };
    this.folders.set(folder.id, folder);
    this.pathIndex.set(`${folder.projectId}:${folder.path}`, folder.id);
    return folder;
  }
}

/**
 * In-memory project storage implementation
 */
export class MemoryProjectStorage implements IProjectStorage {
  private projects = new Map<string, Project>();
  private apiKeyIndex = new Map<string, string>(); // apiKey -> id

  constructor(
    private readonly folders: MemoryFolderStorage,
    private readonly files: MemoryFileStorage
  ) {}

  async create(input: CreateProjectInput): Promise<Project> {
    const project: Project = {
      id: generateId(),
      ownerId: input.ownerId,
      name: input.name,
      apiKey: generateApiKey(),
      isPublic: input.isPublic ?? false,
      createdAt: new Date(),
    };

    this.projects.set(project.id, project);
    this.apiKeyIndex.set(project.apiKey, project.id);
    return project;
  }

  async findById(id: string): Promise<Project | null> {
    return this.projects.get(id) ?? null;
  }

  async findByApiKey(apiKey: string): Promise<Project | null> {
    const id = this.apiKeyIndex.get(apiKey);
    if (!id) return null;
    return this.projects.get(id) ?? null;
  }

  async listByOwner(ownerId: string): Promise<Project[]> {
    return [...this.projects.values()]
      .filter((project) => project.ownerId === ownerId)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
  }

  async update(id: string, input: UpdateProjectInput): Promise<Project | null> {
    const project = this.projects.get(id);
    if (!project) return null;

    const updated: Project = {
      ...project,
      name: input.name ?? project.name,
      isPublic: input.isPublic ?? project.isPublic,
    };
    this.projects.set(id, updated);
    return updated;
  }

  async regenerateApiKey(id: string): Promise<Project | null> {
    const project = this.projects.get(id);
    if (!project) return null;

    const updated: Project = { ...project, apiKey: generateApiKey() };
    this.apiKeyIndex.delete(project.apiKey);
    this.apiKeyIndex.set(updated.apiKey, id);
    this.projects.set(id, updated);
    return updated;
  }

  async delete(id: string): Promise<boolean> {
    const project = this.projects.get(id);
    if (!project) return false;

    this.apiKeyIndex.delete(project.apiKey);
    this.projects.delete(id);
    this.folders.deleteByProject(id);
    this.files.deleteByProject(id);
    return true;
  }
}
