import type { IStorage } from '../storage/interfaces/index.js';
import type { Identity } from '../types/token.js';
import type { Project, Folder, StoredFile } from '../types/project.js';
import { AppError } from '../errors/app-error.js';
import { canManage } from '../services/access-service.js';
import { isUuid } from '../crypto/random.js';

export async function findProject(storage: IStorage, id: string): Promise<Project> {
  const project = isUuid(id) ? await storage.projects.findById(id) : null;
  if (!project) {
    throw AppError.notFound('Project not found');
  }
  return project;
}

export async function findFolder(storage: IStorage, id: string): Promise<Folder> {
  const folder = isUuid(id) ? await storage.folders.findById(id) : null;
  if (!folder) {
    throw AppError.notFound('Folder not found');
  }
  return folder;
}

export async function findFile(storage: IStorage, id: string): Promise<StoredFile> {
  const file = isUuid(id) ? await storage.files.findById(id) : null;
  if (!file) {
    throw AppError.notFound('File not found');
  }
  return file;
}

/**
 * Load a project the caller owns (admins manage every project)
 */
export async function findManagedProject(storage: IStorage, identity: Identity, id: string): Promise<Project> {
  const project = await findProject(storage, id);
  if (!canManage(identity, project)) {
    throw AppError.forbidden('You do not have access to this project');
  }
  return project;
}
