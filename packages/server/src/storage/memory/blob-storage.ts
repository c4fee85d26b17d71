import type { IBlobStorage } from '../interfaces/blob-storage.js';

/**
 * In-memory blob storage implementation
 */
export class MemoryBlobStorage implements IBlobStorage {
  private blobs = new Map<string, ArrayBuffer>();

  async put(key: string, data: ArrayBuffer): Promise<void> {
    this.blobs.set(key, data.slice(0));
  }

  async get(key: string): Promise<ArrayBuffer | null> {
    return this.blobs.get(key) ?? null;
  }

  async delete(key: string): Promise<void> {
    this.blobs.delete(key);
  }

  async deletePrefix(prefix: string): Promise<void> {
    for (const key of this.blobs.keys()) {
      if (key.startsWith(`${prefix}/`)) this.blobs.delete(key);
    }
  }

  has(key: string): boolean {
    return this.blobs.has(key);
  }
}
