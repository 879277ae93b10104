/**
 * Lifecycle and asset state machines.
 *
 * Enforces valid state transitions for lifecycle runs and asset tasks,
 * producing typed errors on invalid transitions.
 */

import { LifecycleState, VALID_LIFECYCLE_TRANSITIONS } from '../domain/lifecycle';
import { AssetStatus, VALID_ASSET_TRANSITIONS } from '../domain/asset';
import { TypedError, invalidTransitionError } from '../domain/errors';

/** Result of a state transition attempt. */
export interface TransitionResult<S> {
  success: boolean;
  newStatus?: S;
  error?: TypedError;
}

/** Attempt a lifecycle state transition. */
export function transitionLifecycleState(
  current: LifecycleState,
  target: LifecycleState,
): TransitionResult<LifecycleState> {
  const validTargets = VALID_LIFECYCLE_TRANSITIONS[current];
  if (!validTargets.includes(target)) {
    return { success: false, error: invalidTransitionError(current, target, validTargets) };
  }
  return { success: true, newStatus: target };
}

/** Attempt an asset task state transition. */
export function transitionAssetStatus(
  current: AssetStatus,
  target: AssetStatus,
): TransitionResult<AssetStatus> {
  const validTargets = VALID_ASSET_TRANSITIONS[current];
  if (!validTargets.includes(target)) {
    return {
      success: false,
      error: {
        ...invalidTransitionError(current, target, validTargets),
        code: 'ASSET.INVALID_TRANSITION',
        message: `Invalid asset state transition: ${current} -> ${target}`,
      },
    };
  }
  return { success: true, newStatus: target };
}

/** Check if an asset status is terminal. */
export function isTerminalAssetStatus(status: AssetStatus): boolean {
  return status === AssetStatus.Verified || status === AssetStatus.Failed;
}
