import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import type { MessageResponse } from '@filegate/shared';
import type { AppEnv } from '../../types/hono.js';
import type { IStorage } from '../../storage/interfaces/index.js';
import type { Services } from '../../services/index.js';
import { bearerAuth, requireIdentity } from '../../middleware/bearer-auth.js';
import { throwOnInvalid } from '../../middleware/validation.js';
import { findManagedProject } from '../lookup.js';
import { toProjectResponse, toFileMetadata } from '../serializers.js';

const createProjectSchema = z.object({
  name: z.string().trim().min(1).max(255),
  is_public: z.boolean().optional(),
});

const updateProjectSchema = createProjectSchema.partial();

export interface ProjectRoutesOptions {
  storage: IStorage;
  services: Services;
}

/**
 * Owner-scoped project management. Every route requires a bearer token.
 */
export function createProjectRoutes(options: ProjectRoutesOptions) {
  const { storage, services } = options;
  const app = new Hono<AppEnv>();

  app.use('*', bearerAuth(services.verifier));

  app.post('/', zValidator('json', createProjectSchema, throwOnInvalid), async (c) => {
    const identity = requireIdentity(c);
    const input = c.req.valid('json');

    const project = await storage.projects.create({
      ownerId: identity.userId,
      name: input.name,
      isPublic: input.is_public,
    });

    return c.json(toProjectResponse(project, { fileCount: 0, totalSize: 0 }));
  });

  app.get('/', async (c) => {
    const identity = requireIdentity(c);
    const projects = await storage.projects.listByOwner(identity.userId);

    const stats = await Promise.all(projects.map((project) => storage.files.statsByProject(project.id)));

    return c.json(projects.map((project, i) => toProjectResponse(project, stats[i])));
  });

  app.get('/:id', async (c) => {
    const project = await findManagedProject(storage, requireIdentity(c), c.req.param('id'));
    const stats = await storage.files.statsByProject(project.id);
    return c.json(toProjectResponse(project, stats));
  });

  app.put('/:id', zValidator('json', updateProjectSchema, throwOnInvalid), async (c) => {
    const project = await findManagedProject(storage, requireIdentity(c), c.req.param('id'));
    const input = c.req.valid('json');

    const updated = await storage.projects.update(project.id, {
      name: input.name,
      isPublic: input.is_public,
    });

    return c.json(toProjectResponse(updated ?? project));
  });

  app.delete('/:id', async (c) => {
    const project = await findManagedProject(storage, requireIdentity(c), c.req.param('id'));
    await services.files.removeProject(project);

    const body: MessageResponse = { message: 'Project deleted successfully' };
    return c.json(body);
  });

  // The previous key stops working as soon as this returns
  app.post('/:id/regenerate-key', async (c) => {
    const identity = requireIdentity(c);
    const project = await findManagedProject(storage, identity, c.req.param('id'));

    const updated = await storage.projects.regenerateApiKey(project.id);
    services.auditLogger.record({ type: 'api_key_regenerated', userId: identity.userId, projectId: project.id });

    return c.json(toProjectResponse(updated ?? project));
  });

  app.get('/:id/files', async (c) => {
    const project = await findManagedProject(storage, requireIdentity(c), c.req.param('id'));

    const [files, folders] = await Promise.all([
      storage.files.listByProject(project.id),
      storage.folders.listByProject(project.id),
    ]);
    const folderPaths = new Map(folders.map((folder) => [folder.id, folder.path]));

    return c.json(
      files.map((file) => toFileMetadata(file, file.folderId ? folderPaths.get(file.folderId) ?? null : null))
    );
  });

  return app;
}
