import { mkdir, readFile, readdir } from 'fs/promises';
import path from 'path';
import { AssetStatus } from '../../src/domain/asset';
import { canceledError, LifecycleError } from '../../src/domain/errors';
import { AssetFetcher } from '../../src/transfer/asset-fetcher';
import { TransportError } from '../../src/transfer/asset-transport';
import { DraftWorkspace } from '../../src/workspace/draft-workspace';
import { pathExists } from '../../src/workspace/fs-utils';
import { FakeTransport, makeTempDir, recordingLogger, removeTempDir } from '../helpers';

const FAST_RETRY = { maxAttempts: 3, backoffBaseMs: 1, backoffMaxMs: 5 };

describe('AssetFetcher', () => {
  let dir: string;
  let workspace: DraftWorkspace;

  beforeEach(async () => {
    dir = await makeTempDir();
    await mkdir(path.join(dir, 'd1'));
    workspace = new DraftWorkspace('d1', path.join(dir, 'd1'), 'draft_content.json');
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  function fetcherFor(transport: FakeTransport, attemptTimeoutMs = 5_000) {
    const { logger, entries } = recordingLogger();
    const fetcher = new AssetFetcher(transport, { retry: FAST_RETRY, attemptTimeoutMs, random: () => 0 }, logger);
    return { fetcher, entries };
  }

  test('downloads to <workspace>/<targetPath> and verifies', async () => {
    const transport = new FakeTransport({ 'https://cdn.test/a.mp3': { body: 'audio-bytes' } });
    const task = workspace.addAsset({ locator: 'https://cdn.test/a.mp3', kind: 'audio', targetPath: 'media/a.mp3' });

    await fetcherFor(transport).fetcher.fetch(task, workspace, new AbortController().signal);

    expect(await readFile(path.join(workspace.path(), 'media', 'a.mp3'), 'utf8')).toBe('audio-bytes');
    expect(task.status).toBe(AssetStatus.Verified);
    expect(task.attempts).toBe(1);
    expect(task.bytesWritten).toBe(11);
    expect(task.error).toBeUndefined();
    expect(task.completedAt).toBeDefined();
  });

  test('retries transient failures and succeeds', async () => {
    const transport = new FakeTransport({
      'https://cdn.test/a.mp3': (attempt) =>
        attempt < 3 ? { error: new TransportError('HTTP 503', true, 503) } : { body: 'ok' },
    });
    const task = workspace.addAsset({ locator: 'https://cdn.test/a.mp3', kind: 'audio', targetPath: 'a.mp3' });
    const { fetcher, entries } = fetcherFor(transport);

    await fetcher.fetch(task, workspace, new AbortController().signal);

    expect(task.status).toBe(AssetStatus.Verified);
    expect(task.attempts).toBe(3);
    expect(transport.attemptsFor('https://cdn.test/a.mp3')).toBe(3);
    expect(entries.filter((e) => e.message === 'Asset fetch attempt failed, retrying')).toHaveLength(2);
  });

  test('gives up after maxAttempts and leaves no partial file', async () => {
    const transport = new FakeTransport({
      'https://cdn.test/a.mp3': { error: new TransportError('HTTP 503', true, 503) },
    });
    const task = workspace.addAsset({ locator: 'https://cdn.test/a.mp3', kind: 'audio', targetPath: 'a.mp3' });

    const err: unknown = await fetcherFor(transport)
      .fetcher.fetch(task, workspace, new AbortController().signal)
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(LifecycleError);
    expect(err).toMatchObject({
      code: 'ASSET.FETCH_FAILED',
      message: 'Failed to fetch https://cdn.test/a.mp3 after 3 attempt(s): HTTP 503',
    });
    expect(task.status).toBe(AssetStatus.Failed);
    expect(task.attempts).toBe(3);
    expect(task.error?.code).toBe('ASSET.FETCH_FAILED');
    expect(await pathExists(path.join(workspace.path(), 'a.mp3'))).toBe(false);
  });

  test('does not retry a permanent failure', async () => {
    const transport = new FakeTransport({});
    const task = workspace.addAsset({ locator: 'https://cdn.test/gone.mp3', kind: 'audio', targetPath: 'a.mp3' });

    await expect(
      fetcherFor(transport).fetcher.fetch(task, workspace, new AbortController().signal),
    ).rejects.toMatchObject({ code: 'ASSET.FETCH_FAILED' });

    expect(transport.attemptsFor('https://cdn.test/gone.mp3')).toBe(1);
    expect(task.error?.details).toMatchObject({ attempts: 1, cause: { code: 'ASSET.TRANSFER', retryable: false } });
  });

  test('a short body fails integrity and is retried', async () => {
    const transport = new FakeTransport({
      'https://cdn.test/a.png': (attempt) =>
        attempt === 1 ? { body: 'trunc', contentLength: 10 } : { body: '0123456789' },
    });
    const task = workspace.addAsset({ locator: 'https://cdn.test/a.png', kind: 'image', targetPath: 'a.png' });

    await fetcherFor(transport).fetcher.fetch(task, workspace, new AbortController().signal);

    expect(task.attempts).toBe(2);
    expect(await readFile(path.join(workspace.path(), 'a.png'), 'utf8')).toBe('0123456789');
  });

  test('persistent integrity failure reports the byte counts', async () => {
    const transport = new FakeTransport({ 'https://cdn.test/a.png': { body: 'trunc', contentLength: 10 } });
    const task = workspace.addAsset({ locator: 'https://cdn.test/a.png', kind: 'image', targetPath: 'a.png' });

    await expect(
      fetcherFor(transport).fetcher.fetch(task, workspace, new AbortController().signal),
    ).rejects.toMatchObject({
      message: 'Failed to fetch https://cdn.test/a.png after 3 attempt(s): Downloaded 5 bytes from https://cdn.test/a.png, expected 10',
    });
    expect(await readdir(workspace.path())).toEqual([]);
  });

  test('an attempt that outlives its timeout is retried', async () => {
    const transport = new FakeTransport({
      'https://cdn.test/slow.mp4': (attempt) => (attempt === 1 ? { hang: true } : { body: 'video' }),
    });
    const task = workspace.addAsset({ locator: 'https://cdn.test/slow.mp4', kind: 'video', targetPath: 'v.mp4' });

    await fetcherFor(transport, 20).fetcher.fetch(task, workspace, new AbortController().signal);

    expect(task.status).toBe(AssetStatus.Verified);
    expect(task.attempts).toBe(2);
  });

  test('timeouts surface as a transfer error', async () => {
    const transport = new FakeTransport({ 'https://cdn.test/slow.mp4': { hang: true } });
    const task = workspace.addAsset({ locator: 'https://cdn.test/slow.mp4', kind: 'video', targetPath: 'v.mp4' });

    await expect(
      fetcherFor(transport, 10).fetcher.fetch(task, workspace, new AbortController().signal),
    ).rejects.toMatchObject({
      message: 'Failed to fetch https://cdn.test/slow.mp4 after 3 attempt(s): Timed out after 10 ms',
    });
  });

  test('cancellation mid-download fails the task as canceled', async () => {
    const transport = new FakeTransport({ 'https://cdn.test/slow.mp4': { hang: true } });
    const task = workspace.addAsset({ locator: 'https://cdn.test/slow.mp4', kind: 'video', targetPath: 'v.mp4' });
    const controller = new AbortController();

    const pending = fetcherFor(transport).fetcher.fetch(task, workspace, controller.signal);
    await transport.waitForCalls(1);
    controller.abort(new LifecycleError(canceledError('d1', 'user request')));

    await expect(pending).rejects.toMatchObject({ code: 'RUN.CANCELED', message: 'Run canceled: user request' });
    expect(task.status).toBe(AssetStatus.Failed);
    expect(task.error?.code).toBe('RUN.CANCELED');
    expect(transport.attemptsFor('https://cdn.test/slow.mp4')).toBe(1);
  });

  test('an already-aborted signal never opens the source', async () => {
    const transport = new FakeTransport({ 'https://cdn.test/a.mp3': { body: 'x' } });
    const task = workspace.addAsset({ locator: 'https://cdn.test/a.mp3', kind: 'audio', targetPath: 'a.mp3' });
    const controller = new AbortController();
    controller.abort();

    await expect(fetcherFor(transport).fetcher.fetch(task, workspace, controller.signal)).rejects.toMatchObject({
      code: 'RUN.CANCELED',
    });
    expect(transport.calls).toEqual([]);
    expect(task.status).toBe(AssetStatus.Failed);
  });
});
