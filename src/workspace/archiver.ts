/**
 * Archiver: compresses a finalized workspace into a single zip artifact.
 *
 * Entries are added in sorted order with a fixed timestamp and mode, so two
 * byte-identical workspaces produce byte-identical archives. The zip is
 * written to a temp file and renamed into place, never observed half-written.
 */

import archiver from 'archiver';
import { createReadStream, createWriteStream } from 'fs';
import { mkdir, rename, stat } from 'fs/promises';
import path from 'path';
import { pipeline } from 'stream/promises';
import { ArchiveArtifact } from '../domain/archive';
import { LifecycleError, archiveError, errorMessage, workspaceNotReadyError } from '../domain/errors';
import { Logger, logger as rootLogger } from '../logger';
import { DraftWorkspace } from './draft-workspace';
import { hashFile, listTree, removeTree } from './fs-utils';

/** Timestamp stamped on every entry. */
export const ARCHIVE_ENTRY_DATE = new Date('2000-01-01T00:00:00Z');

const FILE_MODE = 0o644;
const DIRECTORY_MODE = 0o755;

export class Archiver {
  private log: Logger;

  constructor(
    private artifactRoot: string,
    log: Logger = rootLogger,
    private compressionLevel = 9,
  ) {
    this.log = log.child({ module: 'archiver' });
  }

  /** `<artifactRoot>/<draftId>.zip`; the name depends on nothing else. */
  artifactPathFor(draftId: string): string {
    return path.join(this.artifactRoot, `${draftId}.zip`);
  }

  private tempPathFor(draftId: string): string {
    return `${this.artifactPathFor(draftId)}.tmp`;
  }

  async archive(workspace: DraftWorkspace): Promise<ArchiveArtifact> {
    const draftId = workspace.draftId;
    if (!workspace.isFinalized()) {
      throw new LifecycleError(workspaceNotReadyError(draftId, 'metadata has not been finalized'));
    }

    const target = this.artifactPathFor(draftId);
    const temp = this.tempPathFor(draftId);

    try {
      await mkdir(this.artifactRoot, { recursive: true });
      await removeTree(temp);
      await this.writeZip(workspace.path(), temp);
      await rename(temp, target);
      const [info, sha256] = await Promise.all([stat(target), hashFile(target)]);

      const artifact: ArchiveArtifact = {
        draftId,
        path: target,
        sizeBytes: info.size,
        sha256,
        createdAt: new Date().toISOString(),
      };
      this.log.info('Workspace archived', { draftId, path: target, sizeBytes: info.size });
      return artifact;
    } catch (err) {
      await removeTree(temp);
      throw new LifecycleError(archiveError(draftId, errorMessage(err)), { cause: err });
    }
  }

  /** Remove the artifact and any leftover temp file for a draft. */
  async discard(draftId: string): Promise<void> {
    await Promise.all([removeTree(this.artifactPathFor(draftId)), removeTree(this.tempPathFor(draftId))]);
  }

  private async writeZip(sourceDir: string, destination: string): Promise<void> {
    const entries = await listTree(sourceDir);
    const zip = archiver('zip', { zlib: { level: this.compressionLevel } });
    zip.on('warning', (err) => {
      this.log.warn('Archive warning', { destination, error: err.message });
    });

    const fill = async (): Promise<void> => {
      for (const entry of entries) {
        if (entry.type === 'directory') {
          zip.append(Buffer.alloc(0), {
            name: `${entry.relativePath}/`,
            date: ARCHIVE_ENTRY_DATE,
            mode: DIRECTORY_MODE,
          });
        } else {
          zip.append(createReadStream(entry.absolutePath), {
            name: entry.relativePath,
            date: ARCHIVE_ENTRY_DATE,
            mode: FILE_MODE,
          });
        }
      }
      await zip.finalize();
    };

    await Promise.all([
      pipeline(zip, createWriteStream(destination, { flags: 'wx' })),
      fill(),
    ]);
  }
}
