/**
 * In-process registry of active draft runs.
 *
 * One logical owner per draft ID: acquire() is a synchronous compare-and-insert,
 * so two runs for the same ID can never both hold a lease. The lease carries
 * the run's AbortController, which is how cancel() reaches in-flight work.
 */

import { canceledError, LifecycleError } from '../domain/errors';

export interface DraftLease {
  readonly draftId: string;
  readonly runId: string;
  readonly signal: AbortSignal;
  readonly acquiredAt: string;
  /** Abort the run holding this lease. */
  cancel(reason?: string): void;
  /** Return the draft ID to the registry. Idempotent. */
  release(): void;
}

export class DraftRegistry {
  private leases = new Map<string, DraftLease>();

  /** Take exclusive ownership of a draft ID, or undefined if it is already held. */
  acquire(draftId: string, runId: string): DraftLease | undefined {
    if (this.leases.has(draftId)) {
      return undefined;
    }

    const controller = new AbortController();
    const leases = this.leases;
    let released = false;

    const lease: DraftLease = {
      draftId,
      runId,
      signal: controller.signal,
      acquiredAt: new Date().toISOString(),
      cancel(reason?: string) {
        if (!controller.signal.aborted) {
          controller.abort(new LifecycleError(canceledError(draftId, reason)));
        }
      },
      release() {
        if (released) return;
        released = true;
        if (leases.get(draftId) === lease) {
          leases.delete(draftId);
        }
      },
    };

    this.leases.set(draftId, lease);
    return lease;
  }

  get(draftId: string): DraftLease | undefined {
    return this.leases.get(draftId);
  }

  has(draftId: string): boolean {
    return this.leases.has(draftId);
  }

  /** Draft IDs with a run in flight. */
  activeDraftIds(): string[] {
    return [...this.leases.keys()];
  }

  get size(): number {
    return this.leases.size;
  }
}
