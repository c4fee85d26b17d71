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

/**
 * Storage interface for projects
 */
export interface IProjectStorage {
  /**
   * Create a project with a freshly generated API key
   */
  create(input: CreateProjectInput): Promise<Project>;

  findById(id: string): Promise<Project | null>;

  findByApiKey(apiKey: string): Promise<Project | null>;

  listByOwner(ownerId: string): Promise<Project[]>;

  update(id: string, input: UpdateProjectInput): Promise<Project | null>;

  /**
   * Replace the API key. The previous key stops working immediately.
   */
  regenerateApiKey(id: string): Promise<Project | null>;

  /**
   * Delete a project with its folders and files
   */
  delete(id: string): Promise<boolean>;
}

/**
 * Storage interface for folders. `(projectId, path)` is unique.
 */
export interface IFolderStorage {
  findById(id: string): Promise<Folder | null>;

  findByPath(projectId: string, path: string): Promise<Folder | null>;

  listByProject(projectId: string): Promise<Folder[]>;

  /**
   * Insert, or update the visibility of an existing folder with the same path
   */
  upsert(input: UpsertFolderInput): Promise<Folder>;

  /**
   * Return the folder at `path`, creating it with `isPublic` if missing
   */
  findOrCreate(input: UpsertFolderInput): Promise<Folder>;

  setVisibility(id: string, isPublic: boolean): Promise<Folder | null>;

  delete(id: string): Promise<boolean>;
}

/**
 * Storage interface for file metadata
 */
export interface IFileStorage {
  create(input: CreateFileInput): Promise<StoredFile>;

  findById(id: string): Promise<StoredFile | null>;

  listByProject(projectId: string): Promise<StoredFile[]>;

  listByFolder(folderId: string): Promise<StoredFile[]>;

  delete(id: string): Promise<boolean>;

  statsByProject(projectId: string): Promise<UsageStats>;

  statsByFolder(folderId: string): Promise<UsageStats>;
}
