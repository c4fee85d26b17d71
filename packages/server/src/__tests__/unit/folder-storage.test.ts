import { describe, it, expect, beforeEach } from 'vitest';
import { createMemoryStorage, MemoryBlobStorage } from '../../storage/memory/index.js';
import type { IStorage } from '../../storage/interfaces/index.js';
import { FileService } from '../../services/file-service.js';

describe('MemoryFolderStorage', () => {
  let storage: IStorage;
  const projectId = 'project-1';

  beforeEach(() => {
    storage = createMemoryStorage();
  });

  it('creates one folder for concurrent findOrCreate calls', async () => {
    const input = { projectId, path: 'albums/2024', isPublic: false };

    const [first, second] = await Promise.all([
      storage.folders.findOrCreate(input),
      storage.folders.findOrCreate(input),
    ]);

    expect(second.id).toBe(first.id);
    expect(await storage.folders.listByProject(projectId)).toHaveLength(1);
  });

  it('creates one folder for concurrent upserts and keeps the last flag', async () => {
    const [first, second] = await Promise.all([
      storage.folders.upsert({ projectId, path: 'thumbs', isPublic: false }),
      storage.folders.upsert({ projectId, path: 'thumbs', isPublic: true }),
    ]);

    expect(second.id).toBe(first.id);
    const folders = await storage.folders.listByProject(projectId);
    expect(folders).toHaveLength(1);
    expect(folders[0]?.isPublic).toBe(true);
  });

  it('does not overwrite the flag in findOrCreate', async () => {
    const created = await storage.folders.upsert({ projectId, path: 'thumbs', isPublic: true });

    const found = await storage.folders.findOrCreate({ projectId, path: 'thumbs', isPublic: false });

    expect(found).toEqual(created);
  });

  it('files parallel uploads into the same folder', async () => {
    const project = await storage.projects.create({ ownerId: 'user-1', name: 'Photos' });
    const files = new FileService({ storage, blobStorage: new MemoryBlobStorage(), maxFileSize: 1024 });
    const data = new ArrayBuffer(3);

    const uploads = await Promise.all(
      ['a.png', 'b.png', 'c.png'].map((fileName) =>
        files.upload(project, { folderPath: 'albums', fileName, data })
      )
    );

    const folderIds = new Set(uploads.map(({ folder }) => folder?.id));
    expect(folderIds.size).toBe(1);
    expect(await storage.folders.listByProject(project.id)).toHaveLength(1);
  });
});
