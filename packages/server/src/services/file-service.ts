import type { IStorage, IBlobStorage } from '../storage/interfaces/index.js';
import type { Project, Folder, StoredFile } from '../types/project.js';
import { AppError } from '../errors/app-error.js';
import { generateId } from '../crypto/random.js';
import { DEFAULT_MIME_TYPE, FOLDER_PATH_SEPARATOR } from '../config/constants.js';

export interface FileServiceOptions {
  storage: IStorage;
  blobStorage: IBlobStorage;
  maxFileSize: number;
}

export interface UploadInput {
  /**
   * Sanitized folder path, or undefined for the project root
   */
  folderPath?: string;
  fileName: string;
  mimeType?: string;
  data: ArrayBuffer;
}

export interface UploadResult {
  file: StoredFile;
  folder: Folder | null;
}

function extensionOf(fileName: string): string {
  const dot = fileName.lastIndexOf('.');
  if (dot <= 0 || dot === fileName.length - 1) {
    return '';
  }
  const extension = fileName.slice(dot + 1);
  return /^[A-Za-z0-9]+$/.test(extension) ? `.${extension.toLowerCase()}` : '';
}

/**
 * Keeps file metadata and blob bytes in step
 */
export class FileService {
  private readonly storage: IStorage;
  private readonly blobs: IBlobStorage;
  private readonly maxFileSize: number;

  constructor(options: FileServiceOptions) {
    this.storage = options.storage;
    this.blobs = options.blobStorage;
    this.maxFileSize = options.maxFileSize;
  }

  /**
   * Store an upload. A folder that does not exist yet is created with the
   * project's visibility.
   */
  async upload(project: Project, input: UploadInput): Promise<UploadResult> {
    if (input.data.byteLength > this.maxFileSize) {
      throw AppError.payloadTooLarge(`File size exceeds maximum of ${this.maxFileSize} bytes`);
    }

    const folder = input.folderPath
      ? await this.storage.folders.findOrCreate({
          projectId: project.id,
          path: input.folderPath,
          isPublic: project.isPublic,
        })
      : null;

    const storedName = `${generateId()}${extensionOf(input.fileName)}`;
    const storageKey = [project.id, folder?.path, storedName]
      .filter((part): part is string => part !== undefined)
      .join(FOLDER_PATH_SEPARATOR);

    await this.blobs.put(storageKey, input.data);

    const file = await this.storage.files.create({
      projectId: project.id,
      folderId: folder?.id ?? null,
      originalName: input.fileName,
      storedName,
      storageKey,
      size: input.data.byteLength,
      mimeType: input.mimeType || DEFAULT_MIME_TYPE,
    });

    return { file, folder };
  }

  async read(file: StoredFile): Promise<ArrayBuffer> {
    const data = await this.blobs.get(file.storageKey);
    if (!data) {
      throw AppError.serverError(`Stored bytes missing for file ${file.id}`);
    }
    return data;
  }

  async remove(file: StoredFile): Promise<void> {
    await this.blobs.delete(file.storageKey);
    await this.storage.files.delete(file.id);
  }

  /**
   * Remove the folder at `path`, every folder below it, their files and the
   * directory. Returns the number of files deleted; an unknown path deletes
   * nothing.
   */
  async removeFolder(project: Project, path: string): Promise<number> {
    const prefix = `${path}${FOLDER_PATH_SEPARATOR}`;
    const folders = (await this.storage.folders.listByProject(project.id)).filter(
      (folder) => folder.path === path || folder.path.startsWith(prefix)
    );

    let deleted = 0;
    for (const folder of folders) {
      const files = await this.storage.files.listByFolder(folder.id);
      for (const file of files) {
        await this.remove(file);
        deleted++;
      }
      await this.storage.folders.delete(folder.id);
    }

    await this.blobs.deletePrefix(`${project.id}${FOLDER_PATH_SEPARATOR}${path}`);
    return deleted;
  }

  /**
   * Remove a project with all of its bytes
   */
  async removeProject(project: Project): Promise<void> {
    await this.storage.projects.delete(project.id);
    await this.blobs.deletePrefix(project.id);
  }
}
