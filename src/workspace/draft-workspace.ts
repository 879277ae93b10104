/**
 * Draft workspace: the per-draft aggregate.
 *
 * Owns one working directory exclusively, the ordered list of asset tasks
 * that fill it, and the metadata document written once every asset has been
 * verified. The metadata write goes through a temp file and a rename, so the
 * archiver never reads a half-written document.
 */

import { rename, rm, writeFile } from 'fs/promises';
import path from 'path';
import { v4 as uuid } from 'uuid';
import {
  AssetSpec,
  AssetStatus,
  AssetStatusView,
  AssetTask,
  toAssetStatusView,
} from '../domain/asset';
import { LifecycleError, validationError, workspaceNotReadyError } from '../domain/errors';

/** Opaque draft metadata document produced by the editing layer. */
export type DraftMetadata = Record<string, unknown>;

/**
 * Check that a target path stays inside the workspace.
 * Returns an error message, or null when the path is acceptable.
 */
export function checkTargetPath(targetPath: string): string | null {
  if (!targetPath || targetPath.trim() === '') {
    return 'targetPath must not be empty';
  }
  if (path.isAbsolute(targetPath) || /^[A-Za-z]:[\\/]/.test(targetPath)) {
    return `targetPath must be relative: ${targetPath}`;
  }
  const normalized = path.posix.normalize(targetPath.replace(/\\/g, '/'));
  if (normalized === '.' || normalized.startsWith('../') || normalized === '..') {
    return `targetPath escapes the workspace: ${targetPath}`;
  }
  return null;
}

export class DraftWorkspace {
  private assetTasks: AssetTask[] = [];
  private assetsLocked = false;
  private finalized = false;

  constructor(
    readonly draftId: string,
    private readonly directory: string,
    readonly metadataFile: string,
  ) {}

  /** Absolute path of the working directory. */
  path(): string {
    return this.directory;
  }

  metadataPath(): string {
    return path.join(this.directory, this.metadataFile);
  }

  isFinalized(): boolean {
    return this.finalized;
  }

  /** Register an asset to fetch. Only allowed before fan-out starts. */
  addAsset(spec: AssetSpec): AssetTask {
    if (this.assetsLocked || this.finalized) {
      throw new LifecycleError(
        workspaceNotReadyError(this.draftId, 'assets can no longer be added', { locator: spec.locator }),
      );
    }

    const problem = checkTargetPath(spec.targetPath);
    if (problem) {
      throw new LifecycleError(validationError(problem, { draftId: this.draftId, targetPath: spec.targetPath }));
    }

    const absolute = this.resolveAssetPath(spec.targetPath);
    if (absolute === this.metadataPath()) {
      throw new LifecycleError(
        validationError(`targetPath collides with the metadata document: ${spec.targetPath}`, { targetPath: spec.targetPath }),
      );
    }
    if (this.assetTasks.some((t) => this.resolveAssetPath(t.targetPath) === absolute)) {
      throw new LifecycleError(
        validationError(`Two assets share the targetPath ${spec.targetPath}`, { targetPath: spec.targetPath }),
      );
    }

    const task: AssetTask = {
      id: `ast_${uuid()}`,
      locator: spec.locator,
      kind: spec.kind,
      targetPath: spec.targetPath,
      expectedBytes: spec.expectedBytes,
      status: AssetStatus.Pending,
      attempts: 0,
      bytesWritten: 0,
    };
    this.assetTasks.push(task);
    return task;
  }

  /** Freeze the task list; called when fan-out begins. */
  lockAssets(): void {
    this.assetsLocked = true;
  }

  tasks(): readonly AssetTask[] {
    return this.assetTasks;
  }

  assetStatuses(): AssetStatusView[] {
    return this.assetTasks.map(toAssetStatusView);
  }

  /** Absolute path for a task's target inside this workspace. */
  resolveAssetPath(targetPath: string): string {
    return path.resolve(this.directory, targetPath);
  }

  /**
   * Write the metadata document. Requires every asset task to be verified,
   * and may only happen once.
   */
  async finalizeMetadata(document: DraftMetadata): Promise<void> {
    if (this.finalized) {
      throw new LifecycleError(workspaceNotReadyError(this.draftId, 'metadata has already been finalized'));
    }

    const unverified = this.assetTasks.filter((t) => t.status !== AssetStatus.Verified);
    if (unverified.length > 0) {
      throw new LifecycleError(
        workspaceNotReadyError(this.draftId, `${unverified.length} asset(s) are not verified`, {
          pending: unverified.map((t) => ({ id: t.id, locator: t.locator, status: t.status })),
        }),
      );
    }

    const target = this.metadataPath();
    const temp = path.join(this.directory, `.${this.metadataFile}.${uuid()}.tmp`);
    try {
      await writeFile(temp, JSON.stringify(document), { encoding: 'utf8', flag: 'wx' });
      await rename(temp, target);
    } catch (err) {
      await rm(temp, { force: true });
      throw err;
    }
    this.finalized = true;
  }
}
