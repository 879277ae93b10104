/**
 * Object storage clients.
 *
 * The uploader talks to storage only through ObjectStorageClient. Failures
 * are raised as StorageError with a transient/permanent classification so the
 * retry decision stays in one place.
 */

import { createHash } from 'crypto';
import { createWriteStream } from 'fs';
import { mkdir, rename, stat, unlink } from 'fs/promises';
import path from 'path';
import { Readable, Transform, TransformCallback, Writable } from 'stream';
import { pipeline } from 'stream/promises';
import { pathToFileURL } from 'url';
import { v4 as uuid } from 'uuid';
import { UploadErrorKind, errorMessage } from '../domain/errors';
import { errnoCode, removeTree } from '../workspace/fs-utils';

export interface PutOptions {
  contentType: string;
  contentLength?: number;
  signal?: AbortSignal;
}

export interface PutResult {
  key: string;
  url: string;
  etag?: string;
}

export interface ObjectStorageClient {
  /** Store an object. Writing an existing key replaces it. */
  put(key: string, body: Readable, options: PutOptions): Promise<PutResult>;
  exists(key: string): Promise<boolean>;
  /** Remove an object. Resolves false when there was nothing to remove. */
  delete(key: string): Promise<boolean>;
  /** The URL an object is (or would be) reachable at. */
  urlFor(key: string): string;
}

export class StorageError extends Error {
  constructor(
    message: string,
    readonly kind: UploadErrorKind,
    readonly statusCode?: number,
  ) {
    super(message);
    this.name = 'StorageError';
  }
}

const PERMANENT_ERRNO = new Set(['ENOENT', 'ENOTDIR', 'EACCES', 'EPERM', 'EROFS', 'EISDIR']);

/** Decide whether a storage failure is worth retrying. */
export function classifyStorageError(err: unknown): UploadErrorKind {
  if (err instanceof StorageError) return err.kind;
  const code = errnoCode(err);
  if (code && PERMANENT_ERRNO.has(code)) return 'permanent';
  return 'transient';
}

const KEY_SEGMENT = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

/** Keys are slash-separated segments; no empty, dot-only or traversing parts. */
export function isValidObjectKey(key: string): boolean {
  const segments = key.split('/');
  return segments.length > 0 && segments.every((s) => KEY_SEGMENT.test(s) && !s.includes('..'));
}

/** Recover an object key from its public URL (the URL path without the leading slash). */
export function objectKeyFromUrl(url: string): string | null {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return null;
  }
  const key = decodeURIComponent(parsed.pathname).replace(/^\/+/, '');
  return key.length > 0 ? key : null;
}

function joinUrl(base: string, key: string): string {
  return `${base.replace(/\/+$/, '')}/${key}`;
}

/** md5 of the bytes passing through, as storage backends report for etags. */
class EtagHasher extends Transform {
  private hash = createHash('md5');

  override _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {
    this.hash.update(chunk);
    callback(null, chunk);
  }

  digest(): string {
    return this.hash.digest('hex');
  }
}

export interface StoredObject {
  body: Buffer;
  contentType: string;
  etag: string;
  storedAt: string;
}

/** In-memory bucket for tests and embedding. */
export class MemoryObjectStorage implements ObjectStorageClient {
  private objects = new Map<string, StoredObject>();

  constructor(private bucket = 'memory') {}

  async put(key: string, body: Readable, options: PutOptions): Promise<PutResult> {
    if (!isValidObjectKey(key)) {
      throw new StorageError(`Invalid object key: ${key}`, 'permanent', 400);
    }
    const chunks: Buffer[] = [];
    const hasher = new EtagHasher();
    const sink = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        chunks.push(chunk);
        callback();
      },
    });
    await pipeline(body, hasher, sink, { signal: options.signal });
    const etag = hasher.digest();

    this.objects.set(key, {
      body: Buffer.concat(chunks),
      contentType: options.contentType,
      etag,
      storedAt: new Date().toISOString(),
    });
    return { key, url: this.urlFor(key), etag };
  }

  async exists(key: string): Promise<boolean> {
    return this.objects.has(key);
  }

  async delete(key: string): Promise<boolean> {
    return this.objects.delete(key);
  }

  urlFor(key: string): string {
    return `memory://${this.bucket}/${key}`;
  }

  get(key: string): StoredObject | undefined {
    return this.objects.get(key);
  }

  keys(): string[] {
    return [...this.objects.keys()].sort();
  }
}

/**
 * A bucket backed by a directory on local or mounted storage.
 * Objects are written to a temp file and renamed over the key.
 */
export class FileSystemObjectStorage implements ObjectStorageClient {
  constructor(
    private rootDir: string,
    private baseUrl?: string,
  ) {}

  private filePathFor(key: string): string {
    if (!isValidObjectKey(key)) {
      throw new StorageError(`Invalid object key: ${key}`, 'permanent', 400);
    }
    return path.join(this.rootDir, ...key.split('/'));
  }

  async put(key: string, body: Readable, options: PutOptions): Promise<PutResult> {
    const file = this.filePathFor(key);

    try {
      const root = await stat(this.rootDir);
      if (!root.isDirectory()) {
        throw new StorageError(`Bucket path is not a directory: ${this.rootDir}`, 'permanent', 404);
      }
    } catch (err) {
      if (err instanceof StorageError) throw err;
      if (errnoCode(err) === 'ENOENT') {
        throw new StorageError(`Bucket does not exist: ${this.rootDir}`, 'permanent', 404);
      }
      throw err;
    }

    const temp = `${file}.${uuid()}.tmp`;
    const hasher = new EtagHasher();
    try {
      await mkdir(path.dirname(file), { recursive: true });
      await pipeline(body, hasher, createWriteStream(temp, { flags: 'wx' }), { signal: options.signal });
      await rename(temp, file);
    } catch (err) {
      await removeTree(temp);
      if (err instanceof StorageError) throw err;
      throw new StorageError(`Failed to write ${key}: ${errorMessage(err)}`, classifyStorageError(err));
    }

    return { key, url: this.urlFor(key), etag: hasher.digest() };
  }

  async exists(key: string): Promise<boolean> {
    try {
      return (await stat(this.filePathFor(key))).isFile();
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') return false;
      throw err;
    }
  }

  async delete(key: string): Promise<boolean> {
    try {
      await unlink(this.filePathFor(key));
      return true;
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') return false;
      throw err;
    }
  }

  urlFor(key: string): string {
    if (this.baseUrl) return joinUrl(this.baseUrl, key);
    return pathToFileURL(this.filePathFor(key)).href;
  }
}
