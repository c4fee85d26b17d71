import { describe, it, expect, beforeEach } from 'vitest';
import { createMemoryStorage, MemoryBlobStorage } from '../../storage/memory/index.js';
import type { IStorage } from '../../storage/interfaces/index.js';
import { FileService } from '../../services/file-service.js';
import type { Project } from '../../types/project.js';

function bytes(text: string): ArrayBuffer {
  const encoded = new TextEncoder().encode(text);
  const buffer = new ArrayBuffer(encoded.byteLength);
  new Uint8Array(buffer).set(encoded);
  return buffer;
}

describe('FileService', () => {
  let storage: IStorage;
  let blobs: MemoryBlobStorage;
  let files: FileService;
  let project: Project;

  beforeEach(async () => {
    storage = createMemoryStorage();
    blobs = new MemoryBlobStorage();
    files = new FileService({ storage, blobStorage: blobs, maxFileSize: 16 });
    project = await storage.projects.create({ ownerId: 'user-1', name: 'Docs', isPublic: true });
  });

  it('stores uploads at the project root', async () => {
    const { file, folder } = await files.upload(project, { fileName: 'Report.PDF', data: bytes('pdf') });

    expect(folder).toBeNull();
    expect(file.folderId).toBeNull();
    expect(file.originalName).toBe('Report.PDF');
    expect(file.storedName).toMatch(/\.pdf$/);
    expect(file.storageKey).toBe(`${project.id}/${file.storedName}`);
    expect(file.size).toBe(3);
    expect(file.mimeType).toBe('application/octet-stream');
    expect(new TextDecoder().decode(await files.read(file))).toBe('pdf');
  });

  it('creates missing folders with the project visibility', async () => {
    const { file, folder } = await files.upload(project, {
      folderPath: 'a/b',
      fileName: 'note',
      mimeType: 'text/plain',
      data: bytes('hi'),
    });

    expect(folder).toMatchObject({ path: 'a/b', isPublic: true });
    expect(file.folderId).toBe(folder?.id);
    expect(file.storageKey).toBe(`${project.id}/a/b/${file.storedName}`);
    expect(file.storedName).not.toContain('.');
  });

  it('keeps the visibility of existing folders', async () => {
    await storage.folders.upsert({ projectId: project.id, path: 'secret', isPublic: false });

    const { folder } = await files.upload(project, { folderPath: 'secret', fileName: 'x.txt', data: bytes('x') });

    expect(folder?.isPublic).toBe(false);
  });

  it('rejects files above the size limit', async () => {
    await expect(
      files.upload(project, { fileName: 'big.bin', data: bytes('x'.repeat(17)) })
    ).rejects.toMatchObject({ code: 'payload_too_large' });
    expect(await storage.files.listByProject(project.id)).toEqual([]);
  });

  it('removes a folder with its descendants but not its siblings', async () => {
    const top = await files.upload(project, { folderPath: 'docs', fileName: 'a.txt', data: bytes('a') });
    const nested = await files.upload(project, { folderPath: 'docs/2024', fileName: 'b.txt', data: bytes('b') });
    const sibling = await files.upload(project, { folderPath: 'docs2', fileName: 'c.txt', data: bytes('c') });

    expect(await files.removeFolder(project, 'docs')).toBe(2);

    expect(blobs.has(top.file.storageKey)).toBe(false);
    expect(blobs.has(nested.file.storageKey)).toBe(false);
    expect(blobs.has(sibling.file.storageKey)).toBe(true);
    expect(await storage.folders.findByPath(project.id, 'docs')).toBeNull();
    expect(await storage.folders.findByPath(project.id, 'docs/2024')).toBeNull();
    expect((await storage.files.listByProject(project.id)).map((f) => f.id)).toEqual([sibling.file.id]);
  });

  it('removes nothing for an unknown folder', async () => {
    await files.upload(project, { folderPath: 'docs', fileName: 'a.txt', data: bytes('a') });

    expect(await files.removeFolder(project, 'missing')).toBe(0);
    expect(await storage.files.listByProject(project.id)).toHaveLength(1);
  });

  it('removes a project with all of its bytes', async () => {
    const { file } = await files.upload(project, { folderPath: 'docs', fileName: 'a.txt', data: bytes('a') });

    await files.removeProject(project);

    expect(blobs.has(file.storageKey)).toBe(false);
    expect(await storage.projects.findById(project.id)).toBeNull();
    expect(await storage.files.findById(file.id)).toBeNull();
  });

  it('fails reads whose bytes are missing', async () => {
    const { file } = await files.upload(project, { fileName: 'a.txt', data: bytes('a') });
    await blobs.delete(file.storageKey);

    await expect(files.read(file)).rejects.toMatchObject({ code: 'server_error' });
  });
});
