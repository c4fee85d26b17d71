import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import type { DeleteCountResponse } from '@filegate/shared';
import type { AppEnv } from '../../types/hono.js';
import type { IStorage } from '../../storage/interfaces/index.js';
import type { Services } from '../../services/index.js';
import { bearerAuth, requireIdentity, requireApiKey } from '../../middleware/bearer-auth.js';
import { throwOnInvalid } from '../../middleware/validation.js';
import { assertFolderPath } from '../../paths/folder-path.js';
import { findFolder, findManagedProject } from '../lookup.js';
import { toFolderResponse } from '../serializers.js';

const createFolderSchema = z.object({
  project_id: z.string().min(1),
  path: z.string(),
  is_public: z.boolean().optional(),
});

const listFoldersSchema = z.object({
  project_id: z.string().min(1),
});

const visibilitySchema = z.object({
  is_public: z.boolean(),
});

const deleteFolderSchema = z.object({
  folder_path: z.string(),
});

export interface FolderRoutesOptions {
  storage: IStorage;
  services: Services;
}

/**
 * Folder management (bearer) and folder purge (API key)
 */
export function createFolderRoutes(options: FolderRoutesOptions) {
  const { storage, services } = options;
  const app = new Hono<AppEnv>();
  const auth = bearerAuth(services.verifier);

  // Upsert by path; a new folder inherits the project's visibility
  app.post('/', auth, zValidator('json', createFolderSchema, throwOnInvalid), async (c) => {
    const input = c.req.valid('json');
    const path = assertFolderPath(input.path);
    const project = await findManagedProject(storage, requireIdentity(c), input.project_id);

    const folder = await storage.folders.upsert({
      projectId: project.id,
      path,
      isPublic: input.is_public ?? project.isPublic,
    });

    return c.json(toFolderResponse(folder));
  });

  app.get('/', auth, zValidator('query', listFoldersSchema, throwOnInvalid), async (c) => {
    const { project_id: projectId } = c.req.valid('query');
    const project = await findManagedProject(storage, requireIdentity(c), projectId);

    const folders = await storage.folders.listByProject(project.id);
    const stats = await Promise.all(folders.map((folder) => storage.files.statsByFolder(folder.id)));

    return c.json(folders.map((folder, i) => toFolderResponse(folder, stats[i])));
  });

  app.put('/:id/visibility', auth, zValidator('json', visibilitySchema, throwOnInvalid), async (c) => {
    const folder = await findFolder(storage, c.req.param('id'));
    await findManagedProject(storage, requireIdentity(c), folder.projectId);

    const { is_public: isPublic } = c.req.valid('json');
    const updated = await storage.folders.setVisibility(folder.id, isPublic);

    return c.json(toFolderResponse(updated ?? folder));
  });

  // The API key selects the project
  app.post('/delete', zValidator('json', deleteFolderSchema, throwOnInvalid), async (c) => {
    const project = await services.verifier.findProjectByApiKey(requireApiKey(c));
    const path = assertFolderPath(c.req.valid('json').folder_path);

    const deletedCount = await services.files.removeFolder(project, path);

    const body: DeleteCountResponse = {
      message: 'Folder files deleted successfully',
      deleted_count: deletedCount,
    };
    return c.json(body);
  });

  return app;
}
