import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  setupTestContext,
  requestJson,
  registerUser,
  createProject,
  upload,
  uploadFile,
  bearer,
  apiKeyHeader,
  type TestContext,
  type TokenAuthResponse,
  type ProjectResponse,
  type UploadResponse,
  type ErrorResponse,
  type DeleteCountResponse,
} from './test-setup.js';

async function errorOf(res: Response): Promise<ErrorResponse> {
  return await res.json() as ErrorResponse;
}

describe('Upload', () => {
  let ctx: TestContext;
  let project: ProjectResponse;

  beforeEach(async () => {
    ctx = setupTestContext({ maxFileSize: 32 });
    const alice = await registerUser(ctx, 'alice@example.com');
    project = await createProject(ctx, alice.access_token, 'Photos');
  });

  it('stores a file at the project root', async () => {
    const res = await upload(ctx, project.api_key);

    expect(res.status).toBe(200);
    const body = await res.json() as UploadResponse;
    expect(body).toEqual({
      file_id: body.file_id,
      original_name: 'hello.txt',
      size: 11,
      mime_type: 'text/plain',
      download_url: `/api/files/${body.file_id}`,
      folder_path: null,
    });
  });

  it('creates the folder on first upload', async () => {
    const body = await uploadFile(ctx, project.api_key, { folderPath: 'albums/2024' });

    expect(body.folder_path).toBe('albums/2024');
    const folder = await ctx.storage.folders.findByPath(project.id, 'albums/2024');
    expect(folder?.isPublic).toBe(false);

    const stored = await ctx.storage.files.findById(body.file_id);
    expect(stored?.storageKey.startsWith(`${project.id}/albums/2024/`)).toBe(true);
  });

  it('requires a valid API key', async () => {
    const missing = await upload(ctx, null);
    expect(missing.status).toBe(401);
    expect(await errorOf(missing)).toEqual({ error: 'unauthorized', error_description: 'API key required' });

    const wrong = await upload(ctx, 'wrong-key');
    expect(wrong.status).toBe(401);
    expect((await errorOf(wrong)).error).toBe('invalid_api_key');
  });

  it('requires a file part', async () => {
    const form = new FormData();
    form.append('folder_path', 'albums');

    const res = await ctx.app.request('/api/upload', {
      method: 'POST',
      headers: apiKeyHeader(project.api_key),
      body: form,
    });

    expect(res.status).toBe(400);
    expect(await errorOf(res)).toEqual({ error: 'invalid_request', error_description: 'No file provided' });
  });

  it('rejects unsafe folder paths without storing anything', async () => {
    const res = await upload(ctx, project.api_key, { folderPath: '../../etc' });

    expect(res.status).toBe(400);
    expect((await errorOf(res)).error).toBe('invalid_path');
    expect(await ctx.storage.files.listByProject(project.id)).toEqual([]);
    expect(await ctx.storage.folders.listByProject(project.id)).toEqual([]);
  });

  it('rejects files above the size limit', async () => {
    const res = await upload(ctx, project.api_key, { content: 'x'.repeat(33) });

    expect(res.status).toBe(413);
    expect(await errorOf(res)).toEqual({
      error: 'payload_too_large',
      error_description: 'File size exceeds maximum of 32 bytes',
    });
  });

  it('stops a streamed body once it passes the request limit', async () => {
    const res = await upload(ctx, project.api_key, { content: 'x'.repeat(100_000) });

    expect(res.status).toBe(413);
    expect(await errorOf(res)).toEqual({
      error: 'payload_too_large',
      error_description: 'Request body exceeds maximum of 65568 bytes',
    });
    expect(await ctx.storage.files.listByProject(project.id)).toEqual([]);
  });

  it('refuses a declared Content-Length above the request limit', async () => {
    const form = new FormData();
    form.append('file', new File(['x'.repeat(100_000)], 'big.bin', { type: 'application/octet-stream' }));
    const encoded = new Request('http://localhost/api/upload', { method: 'POST', body: form });
    const bytes = await encoded.arrayBuffer();

    const res = await ctx.app.request('/api/upload', {
      method: 'POST',
      headers: {
        ...apiKeyHeader(project.api_key),
        'Content-Type': encoded.headers.get('Content-Type') ?? '',
        'Content-Length': String(bytes.byteLength),
      },
      body: bytes,
    });

    expect(res.status).toBe(413);
    expect((await errorOf(res)).error_description).toBe('Request body exceeds maximum of 65568 bytes');
    expect(await ctx.storage.files.listByProject(project.id)).toEqual([]);
  });
});

describe('Download', () => {
  let ctx: TestContext;
  let alice: TokenAuthResponse;
  let bob: TokenAuthResponse;
  let project: ProjectResponse;
  let file: UploadResponse;

  beforeEach(async () => {
    ctx = setupTestContext();
    alice = await registerUser(ctx, 'alice@example.com');
    bob = await registerUser(ctx, 'bob@example.com');
    project = await createProject(ctx, alice.access_token, 'Photos');
    file = await uploadFile(ctx, project.api_key, { folderPath: 'albums' });
  });

  it('requires a credential for private files', async () => {
    const res = await ctx.app.request(file.download_url);

    expect(res.status).toBe(403);
    expect(await errorOf(res)).toEqual({ error: 'forbidden', error_description: 'API key required' });
  });

  it('serves the bytes with the API key header', async () => {
    const res = await ctx.app.request(file.download_url, { headers: apiKeyHeader(project.api_key) });

    expect(res.status).toBe(200);
    expect(await res.text()).toBe('hello world');
    expect(res.headers.get('Content-Type')).toBe('text/plain');
    expect(res.headers.get('Content-Length')).toBe('11');
    expect(res.headers.get('Content-Disposition')).toBe(`inline; filename="hello.txt"; filename*=UTF-8''hello.txt`);
  });

  it('accepts the API key as a query parameter', async () => {
    const res = await ctx.app.request(`${file.download_url}?api_key=${project.api_key}&download=true`);

    expect(res.status).toBe(200);
    expect(res.headers.get('Content-Disposition')).toBe(
      `attachment; filename="hello.txt"; filename*=UTF-8''hello.txt`
    );
  });

  it('rejects a wrong API key', async () => {
    const res = await ctx.app.request(file.download_url, { headers: apiKeyHeader('wrong-key') });

    expect(res.status).toBe(401);
    expect((await errorOf(res)).error).toBe('invalid_api_key');
  });

  it("rejects another project's API key", async () => {
    const other = await createProject(ctx, bob.access_token, 'Music');

    const res = await ctx.app.request(file.download_url, { headers: apiKeyHeader(other.api_key) });

    expect(res.status).toBe(401);
  });

  it('lets the owner read with a bearer token', async () => {
    const owner = await ctx.app.request(file.download_url, { headers: bearer(alice.access_token) });
    expect(owner.status).toBe(200);

    const stranger = await ctx.app.request(file.download_url, { headers: bearer(bob.access_token) });
    expect(stranger.status).toBe(403);
  });

  it('opens files in a public folder and re-checks after the flag changes', async () => {
    const folder = await ctx.storage.folders.findByPath(project.id, 'albums');
    const folderId = folder?.id ?? '';

    await requestJson(ctx, 'PUT', `/api/folders/${folderId}/visibility`, { is_public: true }, bearer(alice.access_token));
    const open = await ctx.app.request(file.download_url);
    expect(open.status).toBe(200);

    await requestJson(ctx, 'PUT', `/api/folders/${folderId}/visibility`, { is_public: false }, bearer(alice.access_token));
    const closed = await ctx.app.request(file.download_url);
    expect(closed.status).toBe(403);
  });

  it('mixes public and private folders in a private project', async () => {
    await requestJson(
      ctx,
      'POST',
      '/api/folders',
      { project_id: project.id, path: 'thumbs', is_public: true },
      bearer(alice.access_token)
    );
    const thumb = await uploadFile(ctx, project.api_key, { folderPath: 'thumbs' });
    const original = await uploadFile(ctx, project.api_key, { folderPath: 'originals' });

    expect((await ctx.app.request(thumb.download_url)).status).toBe(200);
    expect((await ctx.app.request(original.download_url)).status).toBe(403);

    const withKey = apiKeyHeader(project.api_key);
    expect((await ctx.app.request(thumb.download_url, { headers: withKey })).status).toBe(200);
    expect((await ctx.app.request(original.download_url, { headers: withKey })).status).toBe(200);
  });

  it('opens every file of a public project', async () => {
    const rootFile = await uploadFile(ctx, project.api_key);
    await requestJson(ctx, 'PUT', `/api/projects/${project.id}`, { is_public: true }, bearer(alice.access_token));

    expect((await ctx.app.request(file.download_url)).status).toBe(200);
    expect((await ctx.app.request(rootFile.download_url)).status).toBe(200);
  });

  it('returns 404 for an unknown file', async () => {
    const res = await ctx.app.request('/api/files/0f8fad5b-d9cb-469f-a165-70867728950e');

    expect(res.status).toBe(404);
    expect(await errorOf(res)).toEqual({ error: 'not_found', error_description: 'File not found' });
  });

  it('returns 404 for a malformed file id without a storage lookup', async () => {
    const lookup = vi.spyOn(ctx.storage.files, 'findById');

    const res = await ctx.app.request('/api/files/not-a-uuid');

    expect(res.status).toBe(404);
    expect(await errorOf(res)).toEqual({ error: 'not_found', error_description: 'File not found' });
    expect(lookup).not.toHaveBeenCalled();
  });

  it('rejects a malformed API key on upload', async () => {
    const lookup = vi.spyOn(ctx.storage.projects, 'findByApiKey');

    const res = await upload(ctx, "abc' OR 1=1 --");

    expect(res.status).toBe(401);
    expect((await errorOf(res)).error).toBe('invalid_api_key');
    expect(lookup).not.toHaveBeenCalled();
  });

  it('serves types a browser would render as attachments', async () => {
    await requestJson(ctx, 'PUT', `/api/projects/${project.id}`, { is_public: true }, bearer(alice.access_token));
    const page = await uploadFile(ctx, project.api_key, {
      name: 'page.html',
      content: '<script>alert(1)</script>',
      type: 'text/html',
    });
    const drawing = await uploadFile(ctx, project.api_key, { name: 'logo.svg', content: '<svg/>', type: 'image/svg+xml' });
    const photo = await uploadFile(ctx, project.api_key, { name: 'cat.png', content: 'png', type: 'image/png' });

    const pageRes = await ctx.app.request(page.download_url);
    expect(pageRes.status).toBe(200);
    expect(pageRes.headers.get('Content-Disposition')).toBe(
      `attachment; filename="page.html"; filename*=UTF-8''page.html`
    );
    expect(pageRes.headers.get('X-Content-Type-Options')).toBe('nosniff');

    const drawingRes = await ctx.app.request(drawing.download_url);
    expect(drawingRes.headers.get('Content-Disposition')).toBe(
      `attachment; filename="logo.svg"; filename*=UTF-8''logo.svg`
    );

    const photoRes = await ctx.app.request(photo.download_url);
    expect(photoRes.headers.get('Content-Disposition')).toBe(
      `inline; filename="cat.png"; filename*=UTF-8''cat.png`
    );
  });
});

describe('Delete', () => {
  let ctx: TestContext;
  let alice: TokenAuthResponse;
  let bob: TokenAuthResponse;
  let project: ProjectResponse;

  beforeEach(async () => {
    ctx = setupTestContext();
    alice = await registerUser(ctx, 'alice@example.com');
    bob = await registerUser(ctx, 'bob@example.com');
    project = await createProject(ctx, alice.access_token, 'Photos');
  });

  function deleteFile(fileId: string, headers: Record<string, string> = {}): Promise<Response> {
    return Promise.resolve(ctx.app.request(`/api/files/${fileId}`, { method: 'DELETE', headers }));
  }

  it('deletes with the API key', async () => {
    const file = await uploadFile(ctx, project.api_key);
    const stored = await ctx.storage.files.findById(file.file_id);

    const res = await deleteFile(file.file_id, apiKeyHeader(project.api_key));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ message: 'File deleted successfully' });
    expect(ctx.blobStorage.has(stored?.storageKey ?? '')).toBe(false);
    expect((await deleteFile(file.file_id, apiKeyHeader(project.api_key))).status).toBe(404);
  });

  it('deletes with the owner bearer token', async () => {
    const file = await uploadFile(ctx, project.api_key);

    const res = await deleteFile(file.file_id, bearer(alice.access_token));

    expect(res.status).toBe(200);
  });

  it('requires a credential', async () => {
    const file = await uploadFile(ctx, project.api_key);

    const res = await deleteFile(file.file_id);

    expect(res.status).toBe(401);
    expect((await errorOf(res)).error).toBe('unauthorized');
  });

  it('judges by the bearer token when both credentials are sent', async () => {
    const file = await uploadFile(ctx, project.api_key);

    const res = await deleteFile(file.file_id, {
      ...bearer(bob.access_token),
      ...apiKeyHeader(project.api_key),
    });

    expect(res.status).toBe(403);
    expect(await ctx.storage.files.findById(file.file_id)).not.toBeNull();
  });

  it('bulk-deletes only files the caller manages', async () => {
    const first = await uploadFile(ctx, project.api_key);
    const second = await uploadFile(ctx, project.api_key, { folderPath: 'albums' });
    const music = await createProject(ctx, bob.access_token, 'Music');
    const bobs = await uploadFile(ctx, music.api_key);

    const res = await requestJson(
      ctx,
      'POST',
      '/api/files/bulk-delete',
      { file_ids: [first.file_id, second.file_id, first.file_id, bobs.file_id, 'missing', 'not-a-uuid'] },
      bearer(alice.access_token)
    );

    expect(res.status).toBe(200);
    expect(await res.json() as DeleteCountResponse).toEqual({ message: 'Files deleted successfully', deleted_count: 2 });
    expect(await ctx.storage.files.findById(bobs.file_id)).not.toBeNull();
    expect(await ctx.storage.files.listByProject(project.id)).toEqual([]);
  });

  it('reports bulk deletes with nothing to do', async () => {
    const empty = await requestJson(ctx, 'POST', '/api/files/bulk-delete', { file_ids: [] }, bearer(alice.access_token));
    expect(await empty.json() as DeleteCountResponse).toEqual({ message: 'No files to delete', deleted_count: 0 });

    const file = await uploadFile(ctx, project.api_key);
    const foreign = await requestJson(
      ctx,
      'POST',
      '/api/files/bulk-delete',
      { file_ids: [file.file_id] },
      bearer(bob.access_token)
    );
    expect(foreign.status).toBe(404);
    expect(await errorOf(foreign)).toEqual({
      error: 'not_found',
      error_description: "No files found or you don't have permission to delete them",
    });
  });
});
