/**
 * A project owns folders, files and exactly one API key
 */
export interface Project {
  id: string;
  ownerId: string;
  name: string;
  apiKey: string;
  isPublic: boolean;
  createdAt: Date;
}

export interface CreateProjectInput {
  ownerId: string;
  name: string;
  isPublic?: boolean;
}

export interface UpdateProjectInput {
  name?: string;
  isPublic?: boolean;
}

/**
 * Folder keyed by its sanitized path within a project
 */
export interface Folder {
  id: string;
  projectId: string;
  path: string;
  isPublic: boolean;
  createdAt: Date;
}

export interface UpsertFolderInput {
  projectId: string;
  path: string;
  isPublic: boolean;
}

/**
 * File metadata. The bytes live in blob storage under `storageKey`.
 */
export interface StoredFile {
  id: string;
  projectId: string;
  folderId: string | null;
  originalName: string;
  storedName: string;
  storageKey: string;
  size: number;
  mimeType: string;
  uploadedAt: Date;
}

export interface CreateFileInput {
  projectId: string;
  folderId: string | null;
  originalName: string;
  storedName: string;
  storageKey: string;
  size: number;
  mimeType: string;
}

/**
 * Aggregate counters for a project or folder
 */
export interface UsageStats {
  fileCount: number;
  totalSize: number;
}
