import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import type { DeleteCountResponse, MessageResponse } from '@filegate/shared';
import type { AppEnv } from '../../types/hono.js';
import type { IStorage } from '../../storage/interfaces/index.js';
import type { Services } from '../../services/index.js';
import type { StoredFile, Project } from '../../types/project.js';
import { AppError } from '../../errors/app-error.js';
import { bearerAuth, requireIdentity, requireApiKey, readCredentials } from '../../middleware/bearer-auth.js';
import { throwOnInvalid } from '../../middleware/validation.js';
import { assertFolderPath } from '../../paths/folder-path.js';
import { isUuid } from '../../crypto/random.js';
import { canManage } from '../../services/access-service.js';
import { findFile, findProject } from '../lookup.js';
import { toUploadResponse } from '../serializers.js';

const bulkDeleteSchema = z.object({
  file_ids: z.array(z.string().min(1)).max(1000),
});

const downloadQuerySchema = z.object({
  api_key: z.string().optional(),
  download: z.enum(['true', 'false', '1', '0']).optional(),
});

export interface FileRoutesOptions {
  storage: IStorage;
  services: Services;
}

/**
 * Content-Disposition with an ASCII fallback and the UTF-8 name
 */
function contentDisposition(fileName: string, attachment: boolean): string {
  const fallback = fileName.replace(/[^\x20-\x7e]|["\\]/g, '_');
  const type = attachment ? 'attachment' : 'inline';
  return `${type}; filename="${fallback}"; filename*=UTF-8''${encodeURIComponent(fileName)}`;
}

const INLINE_TYPES = new Set(['text/plain', 'application/pdf']);

/**
 * Client-supplied types a browser shows without running script. Everything
 * else (HTML, SVG, XML, JavaScript) is served as an attachment.
 */
export function isInlineSafe(mimeType: string): boolean {
  const type = mimeType.split(';')[0]?.trim().toLowerCase() ?? '';
  if (type === 'image/svg+xml') return false;
  return (
    INLINE_TYPES.has(type) ||
    type.startsWith('image/') ||
    type.startsWith('audio/') ||
    type.startsWith('video/')
  );
}

/**
 * Upload, download and delete endpoints, mounted under /api
 */
export function createFileRoutes(options: FileRoutesOptions) {
  const { storage, services } = options;
  const app = new Hono<AppEnv>();

  // Multipart upload authenticated by the project's API key
  app.post('/upload', async (c) => {
    const project = await services.verifier.findProjectByApiKey(requireApiKey(c));

    const body = await c.req.parseBody();
    const file = body['file'];
    if (!(file instanceof File)) {
      throw AppError.invalidRequest('No file provided');
    }
    if (!file.name) {
      throw AppError.invalidRequest('No filename provided');
    }

    const rawFolderPath = body['folder_path'];
    if (rawFolderPath instanceof File) {
      throw AppError.invalidRequest('folder_path must be a string');
    }
    const folderPath = rawFolderPath ? assertFolderPath(rawFolderPath) : undefined;

    const { file: stored, folder } = await services.files.upload(project, {
      folderPath,
      fileName: file.name,
      mimeType: file.type,
      data: await file.arrayBuffer(),
    });

    return c.json(toUploadResponse(stored, folder));
  });

  app.get('/files/:id', zValidator('query', downloadQuerySchema, throwOnInvalid), async (c) => {
    const file = await findFile(storage, c.req.param('id'));
    const project = await findProject(storage, file.projectId);
    const folder = file.folderId ? await storage.folders.findById(file.folderId) : null;

    await services.access.authorizeRead(readCredentials(c, { allowQueryKey: true }), project, folder);

    const data = await services.files.read(file);
    const { download } = c.req.valid('query');
    const attachment = download === 'true' || download === '1' || !isInlineSafe(file.mimeType);

    return c.body(data, 200, {
      'Content-Type': file.mimeType,
      'Content-Length': String(data.byteLength),
      'Content-Disposition': contentDisposition(file.originalName, attachment),
    });
  });

  // Bearer of the owner, or the project's API key
  app.delete('/files/:id', async (c) => {
    const file = await findFile(storage, c.req.param('id'));
    const project = await findProject(storage, file.projectId);

    await services.access.authorizeManage(readCredentials(c), project);
    await services.files.remove(file);

    const body: MessageResponse = { message: 'File deleted successfully' };
    return c.json(body);
  });

  app.post(
    '/files/bulk-delete',
    bearerAuth(services.verifier),
    zValidator('json', bulkDeleteSchema, throwOnInvalid),
    async (c) => {
      const identity = requireIdentity(c);
      const { file_ids: fileIds } = c.req.valid('json');

      if (fileIds.length === 0) {
        const body: DeleteCountResponse = { message: 'No files to delete', deleted_count: 0 };
        return c.json(body);
      }

      const projects = new Map<string, Project | null>();
      const deletable: StoredFile[] = [];

      for (const id of new Set(fileIds.filter(isUuid))) {
        const file = await storage.files.findById(id);
        if (!file) continue;

        if (!projects.has(file.projectId)) {
          projects.set(file.projectId, await storage.projects.findById(file.projectId));
        }
        const project = projects.get(file.projectId);
        if (project && canManage(identity, project)) {
          deletable.push(file);
        }
      }

      if (deletable.length === 0) {
        throw AppError.notFound("No files found or you don't have permission to delete them");
      }

      for (const file of deletable) {
        await services.files.remove(file);
      }

      const body: DeleteCountResponse = {
        message: 'Files deleted successfully',
        deleted_count: deletable.length,
      };
      return c.json(body);
    }
  );

  return app;
}
