/**
 * Retry policy primitives shared by the fetcher and the uploader.
 *
 * Exponential backoff with full jitter, capped, and an abortable sleep so a
 * canceled run does not sit out its backoff.
 */

import { canceledError, LifecycleError } from '../domain/errors';

export interface RetryPolicy {
  /** Total attempts including the first. */
  maxAttempts: number;
  backoffBaseMs: number;
  /** Upper bound for any single delay. */
  backoffMaxMs: number;
}

export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = {
  maxAttempts: 3,
  backoffBaseMs: 1000,
  backoffMaxMs: 30_000,
};

/**
 * Delay before the attempt after `attempt` (1-based).
 * The exponential ceiling is base * 2^(attempt-1), capped at backoffMaxMs;
 * the returned delay is drawn uniformly from [0, ceiling].
 */
export function computeBackoff(policy: RetryPolicy, attempt: number, random: () => number = Math.random): number {
  const ceiling = Math.min(policy.backoffMaxMs, policy.backoffBaseMs * Math.pow(2, attempt - 1));
  return Math.floor(random() * ceiling);
}

/** Resolve after `ms`, or reject with a cancellation as soon as the signal aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(abortReason(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/** Throw the run's cancellation if the signal has fired. */
export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw abortReason(signal);
  }
}

/** The cancellation error to surface for an aborted signal. */
export function abortReason(signal: AbortSignal | undefined): LifecycleError {
  const reason: unknown = signal?.reason;
  if (reason instanceof LifecycleError) return reason;
  return new LifecycleError(canceledError(undefined, typeof reason === 'string' ? reason : undefined));
}
