/**
 * Lifecycle domain model.
 *
 * A lifecycle run drives one draft workspace from provisioning through
 * fetching, finalization, archiving and upload, and always ends with cleanup.
 */

import { AssetStatusView } from './asset';
import { UploadReceipt } from './archive';
import { TypedError } from './errors';

/** Draft lifecycle states. */
export enum LifecycleState {
  Created = 'created',
  Provisioned = 'provisioned',
  AssetsFetching = 'assets_fetching',
  MetadataFinalized = 'metadata_finalized',
  Archived = 'archived',
  Uploaded = 'uploaded',
  Failed = 'failed',
  CleanedUp = 'cleaned_up',
}

/**
 * Valid state transitions.
 * Failed is reachable from every non-terminal state; cleanup follows Uploaded or Failed.
 */
export const VALID_LIFECYCLE_TRANSITIONS: Record<LifecycleState, LifecycleState[]> = {
  [LifecycleState.Created]: [LifecycleState.Provisioned, LifecycleState.Failed],
  [LifecycleState.Provisioned]: [LifecycleState.AssetsFetching, LifecycleState.Failed],
  [LifecycleState.AssetsFetching]: [LifecycleState.MetadataFinalized, LifecycleState.Failed],
  [LifecycleState.MetadataFinalized]: [LifecycleState.Archived, LifecycleState.Failed],
  [LifecycleState.Archived]: [LifecycleState.Uploaded, LifecycleState.Failed],
  [LifecycleState.Uploaded]: [LifecycleState.CleanedUp],
  [LifecycleState.Failed]: [LifecycleState.CleanedUp],
  [LifecycleState.CleanedUp]: [],
};

/** Pipeline stage a failure is attributed to. */
export type LifecycleStage = 'validate' | 'registry' | 'provision' | 'fetch' | 'finalize' | 'archive' | 'upload';

/** Draft IDs double as directory names and object key segments. */
export const DRAFT_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]{0,127}$/;

export function isValidDraftId(draftId: string): boolean {
  return DRAFT_ID_PATTERN.test(draftId) && !draftId.includes('..');
}

/** Structured failure returned instead of a receipt. */
export interface FailureReason {
  stage: LifecycleStage;
  error: TypedError;
}

export type LifecycleOutcome = 'pending' | 'succeeded' | 'failed';

/** A recorded state change. */
export interface LifecycleTransition {
  from: LifecycleState;
  to: LifecycleState;
  at: string;
}

/** Persisted record of one orchestrator run. */
export interface LifecycleRun {
  id: string;
  draftId: string;
  templateName: string;
  state: LifecycleState;
  outcome: LifecycleOutcome;
  /** Snapshot of asset task statuses, refreshed as tasks settle. */
  assets: AssetStatusView[];
  transitions: LifecycleTransition[];
  receipt?: UploadReceipt;
  failure?: FailureReason;
  /** Set when removing the workspace or artifact failed; never replaces the primary result. */
  cleanupError?: string;
  createdAt: string;
  updatedAt: string;
  completedAt?: string;
  canceledAt?: string;
  cancelReason?: string;
}

/** Result of runLifecycle: exactly one of a receipt or a failure reason. */
export type LifecycleResult =
  | { ok: true; receipt: UploadReceipt; run: LifecycleRun }
  | { ok: false; failure: FailureReason; run: LifecycleRun };
