/**
 * Template Provisioner: materializes a fresh working directory per draft.
 *
 * The workspace directory is created with an exclusive mkdir, so an existing
 * directory (another run, or one left by a crashed process) is never reused
 * or overwritten.
 */

import { cp, mkdir, readdir, writeFile } from 'fs/promises';
import path from 'path';
import {
  LifecycleError,
  errorMessage,
  provisionIoError,
  templateNotFoundError,
  validationError,
  workspaceAlreadyExistsError,
} from '../domain/errors';
import { isValidDraftId } from '../domain/lifecycle';
import { Logger, logger as rootLogger } from '../logger';
import { DraftWorkspace } from './draft-workspace';
import { errnoCode, pathExists, removeTree } from './fs-utils';
import { TemplateStore } from './template-store';

export class TemplateProvisioner {
  private log: Logger;

  constructor(
    private templates: TemplateStore,
    private workingRoot: string,
    log: Logger = rootLogger,
  ) {
    this.log = log.child({ module: 'provisioner' });
  }

  /** Where a draft's workspace lives. The directory name is always the draft ID. */
  workspacePathFor(draftId: string): string {
    return path.join(this.workingRoot, draftId);
  }

  async provision(templateName: string, draftId: string): Promise<DraftWorkspace> {
    if (!isValidDraftId(draftId)) {
      throw new LifecycleError(validationError(`Invalid draft ID: ${draftId}`, { draftId }));
    }

    const template = await this.templates.resolve(templateName);
    if (!template) {
      throw new LifecycleError(templateNotFoundError(templateName, this.templates.names()));
    }

    const directory = this.workspacePathFor(draftId);
    try {
      await mkdir(this.workingRoot, { recursive: true });
      await mkdir(directory);
    } catch (err) {
      if (errnoCode(err) === 'EEXIST') {
        throw new LifecycleError(workspaceAlreadyExistsError(draftId, directory));
      }
      throw new LifecycleError(provisionIoError(draftId, errorMessage(err)), { cause: err });
    }

    // From here on the directory is ours; a failed copy must not leave it behind.
    try {
      await cp(template.path, directory, { recursive: true, force: false, errorOnExist: true });
      const metadataPath = path.join(directory, template.metadataFile);
      if (!(await pathExists(metadataPath))) {
        await writeFile(metadataPath, '{}', { encoding: 'utf8', flag: 'wx' });
      }
    } catch (err) {
      await removeTree(directory);
      throw new LifecycleError(provisionIoError(draftId, errorMessage(err)), { cause: err });
    }

    this.log.info('Workspace provisioned', { draftId, templateName, directory });
    return new DraftWorkspace(draftId, directory, template.metadataFile);
  }

  /** Remove a provisioned workspace and everything in it. */
  async teardown(workspace: DraftWorkspace): Promise<void> {
    await removeTree(workspace.path());
    this.log.debug('Workspace removed', { draftId: workspace.draftId });
  }

  /**
   * Remove workspace directories that no active run owns, e.g. those left
   * behind by a process that died mid-run. Returns the removed draft IDs.
   */
  async sweepOrphans(activeDraftIds: Iterable<string> = []): Promise<string[]> {
    const active = new Set(activeDraftIds);
    let names: string[];
    try {
      names = await readdir(this.workingRoot);
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') return [];
      throw err;
    }

    const removed: string[] = [];
    for (const name of names.sort()) {
      if (active.has(name)) continue;
      await removeTree(path.join(this.workingRoot, name));
      removed.push(name);
    }
    if (removed.length > 0) {
      this.log.warn('Removed orphaned workspaces', { count: removed.length, draftIds: removed });
    }
    return removed;
  }
}
