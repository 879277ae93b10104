import { createHash } from 'crypto';
import { mkdir, readFile, readdir } from 'fs/promises';
import path from 'path';
import { Readable } from 'stream';
import { pathToFileURL } from 'url';
import {
  classifyStorageError,
  FileSystemObjectStorage,
  isValidObjectKey,
  MemoryObjectStorage,
  objectKeyFromUrl,
  StorageError,
} from '../../src/storage/object-storage';
import { makeTempDir, removeTempDir } from '../helpers';

const md5 = (value: string) => createHash('md5').update(value).digest('hex');

function errno(code: string): Error {
  return Object.assign(new Error(code), { code });
}

describe('storage helpers', () => {
  test('error classification', () => {
    expect(classifyStorageError(new StorageError('x', 'permanent'))).toBe('permanent');
    expect(classifyStorageError(errno('EACCES'))).toBe('permanent');
    expect(classifyStorageError(errno('ENOENT'))).toBe('permanent');
    expect(classifyStorageError(errno('ECONNRESET'))).toBe('transient');
    expect(classifyStorageError(new Error('unknown'))).toBe('transient');
  });

  test('object keys', () => {
    expect(isValidObjectKey('drafts/d1.zip')).toBe(true);
    expect(isValidObjectKey('d1.zip')).toBe(true);
    expect(isValidObjectKey('drafts//d1.zip')).toBe(false);
    expect(isValidObjectKey('../d1.zip')).toBe(false);
    expect(isValidObjectKey('/drafts/d1.zip')).toBe(false);
    expect(isValidObjectKey('drafts/a..zip')).toBe(false);
  });

  test('keys recovered from URLs', () => {
    expect(objectKeyFromUrl('https://cdn.test/drafts/d1.zip')).toBe('drafts/d1.zip');
    expect(objectKeyFromUrl('memory://bucket/drafts/d1.zip')).toBe('drafts/d1.zip');
    expect(objectKeyFromUrl('https://cdn.test/')).toBeNull();
    expect(objectKeyFromUrl('not a url')).toBeNull();
  });
});

describe('MemoryObjectStorage', () => {
  test('put, exists, get, delete', async () => {
    const storage = new MemoryObjectStorage('bucket');
    const result = await storage.put('drafts/d1.zip', Readable.from([Buffer.from('zip-'), Buffer.from('bytes')]), {
      contentType: 'application/zip',
    });

    expect(result).toEqual({ key: 'drafts/d1.zip', url: 'memory://bucket/drafts/d1.zip', etag: md5('zip-bytes') });
    expect(await storage.exists('drafts/d1.zip')).toBe(true);
    expect(storage.get('drafts/d1.zip')?.body.toString()).toBe('zip-bytes');

    expect(await storage.delete('drafts/d1.zip')).toBe(true);
    expect(await storage.delete('drafts/d1.zip')).toBe(false);
    expect(await storage.exists('drafts/d1.zip')).toBe(false);
  });

  test('rejects invalid keys as permanent', async () => {
    await expect(
      new MemoryObjectStorage().put('../x', Readable.from([Buffer.from('x')]), { contentType: 'text/plain' }),
    ).rejects.toMatchObject({ kind: 'permanent', statusCode: 400 });
  });
});

describe('FileSystemObjectStorage', () => {
  let dir: string;
  let bucket: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    bucket = path.join(dir, 'bucket');
    await mkdir(bucket);
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  test('writes the object at its key path', async () => {
    const storage = new FileSystemObjectStorage(bucket);
    const result = await storage.put('drafts/d1.zip', Readable.from([Buffer.from('zip-bytes')]), {
      contentType: 'application/zip',
    });

    const file = path.join(bucket, 'drafts', 'd1.zip');
    expect(result).toEqual({ key: 'drafts/d1.zip', url: pathToFileURL(file).href, etag: md5('zip-bytes') });
    expect(await readFile(file, 'utf8')).toBe('zip-bytes');
    expect(await readdir(path.join(bucket, 'drafts'))).toEqual(['d1.zip']);
    expect(await storage.exists('drafts/d1.zip')).toBe(true);
  });

  test('overwrites an existing key', async () => {
    const storage = new FileSystemObjectStorage(bucket);
    await storage.put('d1.zip', Readable.from([Buffer.from('one')]), { contentType: 'application/zip' });
    await storage.put('d1.zip', Readable.from([Buffer.from('two')]), { contentType: 'application/zip' });
    expect(await readFile(path.join(bucket, 'd1.zip'), 'utf8')).toBe('two');
  });

  test('uses the base URL when configured', () => {
    const storage = new FileSystemObjectStorage(bucket, 'https://cdn.test/files/');
    expect(storage.urlFor('drafts/d1.zip')).toBe('https://cdn.test/files/drafts/d1.zip');
  });

  test('a missing bucket is a permanent failure', async () => {
    const storage = new FileSystemObjectStorage(path.join(dir, 'absent'));
    await expect(
      storage.put('d1.zip', Readable.from([Buffer.from('x')]), { contentType: 'application/zip' }),
    ).rejects.toMatchObject({ kind: 'permanent', statusCode: 404 });
  });

  test('delete reports whether anything was removed', async () => {
    const storage = new FileSystemObjectStorage(bucket);
    await storage.put('d1.zip', Readable.from([Buffer.from('x')]), { contentType: 'application/zip' });
    expect(await storage.delete('d1.zip')).toBe(true);
    expect(await storage.delete('d1.zip')).toBe(false);
  });
});
