/**
 * Asset task domain model.
 *
 * One task per remote media resource a draft needs. A task is owned by the
 * workspace it was added to and mutated only by the fetcher assigned to it.
 */

import { TypedError } from './errors';

export type AssetKind = 'audio' | 'video' | 'image';

export const ASSET_KINDS: readonly AssetKind[] = ['audio', 'video', 'image'];

/** Asset task states. */
export enum AssetStatus {
  Pending = 'pending',
  Downloading = 'downloading',
  Verified = 'verified',
  Failed = 'failed',
}

/** Valid state transitions for asset tasks. Downloading persists across retries. */
export const VALID_ASSET_TRANSITIONS: Record<AssetStatus, AssetStatus[]> = {
  [AssetStatus.Pending]: [AssetStatus.Downloading, AssetStatus.Failed],
  [AssetStatus.Downloading]: [AssetStatus.Verified, AssetStatus.Failed],
  [AssetStatus.Verified]: [],
  [AssetStatus.Failed]: [],
};

/** What the draft-editing layer supplies for each required asset. */
export interface AssetSpec {
  /** http(s) URL, file:// URL or absolute local path. */
  locator: string;
  kind: AssetKind;
  /** Relative path inside the workspace. */
  targetPath: string;
  /** Known size, used when the source declares none. */
  expectedBytes?: number;
}

export interface AssetTask extends AssetSpec {
  id: string;
  status: AssetStatus;
  /** Attempts made so far, including the first. */
  attempts: number;
  bytesWritten: number;
  startedAt?: string;
  completedAt?: string;
  error?: TypedError;
}

/** Read-only view of a task, as exposed by Workspace.assetStatuses(). */
export interface AssetStatusView {
  id: string;
  locator: string;
  kind: AssetKind;
  targetPath: string;
  status: AssetStatus;
  attempts: number;
  bytesWritten: number;
  error?: TypedError;
}

export function toAssetStatusView(task: AssetTask): AssetStatusView {
  return {
    id: task.id,
    locator: task.locator,
    kind: task.kind,
    targetPath: task.targetPath,
    status: task.status,
    attempts: task.attempts,
    bytesWritten: task.bytesWritten,
    error: task.error,
  };
}
