/**
 * Filesystem helpers shared by the provisioner, workspace, archiver and storage.
 */

import { createHash } from 'crypto';
import { createReadStream } from 'fs';
import { readdir, rm, stat } from 'fs/promises';
import path from 'path';
import { pipeline } from 'stream/promises';

/** The errno code of a Node filesystem error, if there is one. */
export function errnoCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

export async function pathExists(target: string): Promise<boolean> {
  try {
    await stat(target);
    return true;
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') return false;
    throw err;
  }
}

/** Remove a file or directory tree. Missing targets are not an error. */
export async function removeTree(target: string): Promise<void> {
  await rm(target, { recursive: true, force: true, maxRetries: 3, retryDelay: 50 });
}

export interface TreeEntry {
  /** Path relative to the walked root, always with forward slashes. */
  relativePath: string;
  absolutePath: string;
  type: 'file' | 'directory';
}

/**
 * Walk a directory tree and return every file and directory beneath it,
 * sorted by relative path so callers see a stable order.
 */
export async function listTree(root: string): Promise<TreeEntry[]> {
  const entries: TreeEntry[] = [];

  const walk = async (dir: string, prefix: string): Promise<void> => {
    const children = await readdir(dir, { withFileTypes: true });
    for (const child of children) {
      const relativePath = prefix ? `${prefix}/${child.name}` : child.name;
      const absolutePath = path.join(dir, child.name);
      if (child.isDirectory()) {
        entries.push({ relativePath, absolutePath, type: 'directory' });
        await walk(absolutePath, relativePath);
      } else if (child.isFile()) {
        entries.push({ relativePath, absolutePath, type: 'file' });
      }
    }
  };

  await walk(root, '');
  return entries.sort((a, b) => (a.relativePath < b.relativePath ? -1 : a.relativePath > b.relativePath ? 1 : 0));
}

/** Stream a file through sha256. */
export async function hashFile(target: string): Promise<string> {
  const hash = createHash('sha256');
  await pipeline(createReadStream(target), hash);
  return hash.digest('hex');
}
