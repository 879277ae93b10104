import { createConfig } from '../../src/config';
import { AppContext, createApp, createAppContext } from '../../src/server';
import { MemoryObjectStorage } from '../../src/storage/object-storage';
import {
  FakeTransport,
  TestServer,
  asRecord,
  makeTempDir,
  recordingLogger,
  removeTempDir,
  startServer,
  writeTemplates,
} from '../helpers';

describe('Archive API', () => {
  let root: string;
  let ctx: AppContext;
  let storage: MemoryObjectStorage;
  let server: TestServer;

  beforeEach(async () => {
    root = await makeTempDir();
    storage = new MemoryObjectStorage('bucket');
    ctx = createAppContext(
      createConfig({ workingRoot: `${root}/work`, artifactRoot: `${root}/artifacts` }),
      {
        templates: await writeTemplates(root),
        storage,
        transport: new FakeTransport({}),
        logger: recordingLogger().logger,
      },
    );
    server = await startServer(createApp(ctx));
  });

  afterEach(async () => {
    await server.close();
    await removeTempDir(root);
  });

  async function archive(draftId: string, userId: string): Promise<string> {
    const result = await ctx.archives.saveDraft({ draftId, templateName: 'template', metadata: {}, assets: [], userId });
    return result.archive.archiveId;
  }

  it('lists archives with pagination', async () => {
    await archive('d1', 'u1');
    await archive('d2', 'u2');

    const res = await server.request('GET', '/api/v1/archives?limit=1');
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ total: 2, limit: 1, offset: 0, hasMore: true });
    expect(res.body.archives).toHaveLength(1);

    const byUser = await server.request('GET', '/api/v1/archives?userId=u2');
    const items = Array.isArray(byUser.body.archives) ? byUser.body.archives : [];
    expect(items.map((a) => asRecord(a).draftId)).toEqual(['d2']);
  });

  it('reports stats', async () => {
    await archive('d1', 'u1');
    const res = await server.request('GET', '/api/v1/archives/stats');
    expect(res.body).toEqual({ stats: { total: 1, completed: 1, pending: 0, distinctDrafts: 1 } });
  });

  describe('GET /api/v1/archives/by-draft', () => {
    it('requires a draftId', async () => {
      const res = await server.request('GET', '/api/v1/archives/by-draft');
      expect(res.status).toBe(400);
      expect(asRecord(res.body.error).message).toBe('draftId query parameter is required');
    });

    it('finds the record for a draft', async () => {
      const archiveId = await archive('d1', 'u1');
      const res = await server.request('GET', '/api/v1/archives/by-draft?draftId=d1');
      expect(res.status).toBe(200);
      expect(asRecord(res.body.archive).archiveId).toBe(archiveId);
    });

    it('404s a version that was never archived', async () => {
      await archive('d1', 'u1');
      const res = await server.request('GET', '/api/v1/archives/by-draft?draftId=d1&draftVersion=4');
      expect(res.status).toBe(404);
      expect(asRecord(res.body.error).message).toBe('Archive for draft not found: d1@4');
    });
  });

  it('GET /api/v1/archives/:archiveId', async () => {
    const archiveId = await archive('d1', 'u1');
    const found = await server.request('GET', `/api/v1/archives/${archiveId}`);
    expect(asRecord(found.body.archive).draftId).toBe('d1');

    const missing = await server.request('GET', '/api/v1/archives/arc_missing');
    expect(missing.status).toBe(404);
  });

  describe('PATCH /api/v1/archives/:archiveId', () => {
    it('updates editable fields', async () => {
      const archiveId = await archive('d1', 'u1');
      const res = await server.request('PATCH', `/api/v1/archives/${archiveId}`, { message: 'rechecked', progress: 100 });
      expect(res.status).toBe(200);
      expect(res.body.archive).toMatchObject({ archiveId, message: 'rechecked', progress: 100 });
    });

    it('rejects an update with nothing editable', async () => {
      const archiveId = await archive('d1', 'u1');
      const res = await server.request('PATCH', `/api/v1/archives/${archiveId}`, { draftId: 'd9' });
      expect(res.status).toBe(400);
      expect(asRecord(res.body.error).message).toBe('No valid fields to update');
    });

    it('404s an unknown archive', async () => {
      const res = await server.request('PATCH', '/api/v1/archives/arc_missing', { progress: 5 });
      expect(res.status).toBe(404);
    });
  });

  it('DELETE /api/v1/archives/:archiveId removes the record and the object', async () => {
    const archiveId = await archive('d1', 'u1');
    expect(storage.get('drafts/d1.zip')).toBeDefined();

    const res = await server.request('DELETE', `/api/v1/archives/${archiveId}`);
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ archiveId, deleted: true });
    expect(storage.get('drafts/d1.zip')).toBeUndefined();

    const again = await server.request('DELETE', `/api/v1/archives/${archiveId}`);
    expect(again.status).toBe(404);
  });
});
