import { mkdir, readFile, writeFile, rm } from 'node:fs/promises';
import { dirname, resolve, sep } from 'node:path';
import type { IBlobStorage } from '../interfaces/blob-storage.js';
import { AppError } from '../../errors/app-error.js';

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Blob storage on the local filesystem under a root directory.
 * Keys map to `<root>/<key>`; a key that resolves outside the root is refused.
 */
export class DiskBlobStorage implements IBlobStorage {
  private readonly root: string;

  constructor(root: string) {
    this.root = resolve(root);
  }

  /**
   * Create the root directory if missing
   */
  async init(): Promise<void> {
    await mkdir(this.root, { recursive: true });
  }

  async put(key: string, data: ArrayBuffer): Promise<void> {
    const target = this.resolveKey(key);
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, new Uint8Array(data));
  }

  async get(key: string): Promise<ArrayBuffer | null> {
    try {
      const buffer = await readFile(this.resolveKey(key));
      const data = new ArrayBuffer(buffer.byteLength);
      new Uint8Array(data).set(buffer);
      return data;
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }
  }

  async delete(key: string): Promise<void> {
    await rm(this.resolveKey(key), { force: true });
  }

  async deletePrefix(prefix: string): Promise<void> {
    await rm(this.resolveKey(prefix), { recursive: true, force: true });
  }

  private resolveKey(key: string): string {
    const target = resolve(this.root, key);
    if (!target.startsWith(this.root + sep)) {
      throw AppError.serverError('Blob key escapes the storage root');
    }
    return target;
  }
}
