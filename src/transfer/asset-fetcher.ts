/**
 * Asset Fetcher: downloads one asset into its workspace.
 *
 * Streams the source straight to `<workspace>/<targetPath>` while counting
 * bytes; the count must match the declared length. Each attempt starts from
 * scratch under its own timeout, and a failed attempt never leaves a partial
 * file behind.
 */

import { createWriteStream } from 'fs';
import { mkdir } from 'fs/promises';
import path from 'path';
import { Transform, TransformCallback } from 'stream';
import { pipeline } from 'stream/promises';
import { AssetStatus, AssetTask } from '../domain/asset';
import {
  LifecycleError,
  TypedError,
  assetFetchError,
  assetTransferError,
  errorMessage,
  integrityError,
} from '../domain/errors';
import { DEFAULT_RETRY_POLICY, RetryPolicy, abortReason, computeBackoff, sleep } from '../engine/retry';
import { transitionAssetStatus } from '../engine/state-machine';
import { Logger, logger as rootLogger } from '../logger';
import { DraftWorkspace } from '../workspace/draft-workspace';
import { removeTree } from '../workspace/fs-utils';
import { AssetTransport, TransportError } from './asset-transport';

export interface AssetFetcherOptions {
  retry: RetryPolicy;
  /** Timeout for a single attempt, from request to last byte. */
  attemptTimeoutMs: number;
  /** Jitter source; injectable for tests. */
  random: () => number;
}

export const DEFAULT_FETCH_TIMEOUT_MS = 180_000;

/** Counts bytes as they pass through. */
class ByteCounter extends Transform {
  bytes = 0;

  override _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {
    this.bytes += chunk.length;
    callback(null, chunk);
  }
}

export class AssetFetcher {
  private options: AssetFetcherOptions;
  private log: Logger;

  constructor(
    private transport: AssetTransport,
    options: Partial<AssetFetcherOptions> = {},
    log: Logger = rootLogger,
  ) {
    this.options = {
      retry: options.retry ?? DEFAULT_RETRY_POLICY,
      attemptTimeoutMs: options.attemptTimeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS,
      random: options.random ?? Math.random,
    };
    this.log = log.child({ module: 'fetcher' });
  }

  /**
   * Fetch a task's asset. Resolves once the task is verified; otherwise the
   * task is marked failed and the error is thrown.
   */
  async fetch(task: AssetTask, workspace: DraftWorkspace, signal: AbortSignal): Promise<void> {
    const draftId = workspace.draftId;
    const target = workspace.resolveAssetPath(task.targetPath);
    const { retry } = this.options;

    if (signal.aborted) {
      this.fail(task, abortReason(signal).typedError);
      throw abortReason(signal);
    }

    this.setStatus(task, AssetStatus.Downloading);
    task.startedAt = new Date().toISOString();

    let lastError: TypedError | undefined;
    for (let attempt = 1; attempt <= retry.maxAttempts; attempt++) {
      task.attempts = attempt;
      try {
        task.bytesWritten = await this.attempt(task, target, signal);
        task.error = undefined;
        task.completedAt = new Date().toISOString();
        this.setStatus(task, AssetStatus.Verified);
        this.log.debug('Asset verified', { draftId, assetId: task.id, bytes: task.bytesWritten, attempt });
        return;
      } catch (err) {
        await removeTree(target);
        task.bytesWritten = 0;

        if (signal.aborted) {
          const canceled = abortReason(signal);
          this.fail(task, canceled.typedError);
          throw canceled;
        }

        lastError = this.classify(err, task.locator);
        if (!lastError.retryable || attempt >= retry.maxAttempts) {
          break;
        }

        const delayMs = computeBackoff(retry, attempt, this.options.random);
        this.log.warn('Asset fetch attempt failed, retrying', {
          draftId,
          assetId: task.id,
          locator: task.locator,
          attempt,
          delayMs,
          error: lastError.message,
        });

        try {
          await sleep(delayMs, signal);
        } catch (sleepErr) {
          const canceled = sleepErr instanceof LifecycleError ? sleepErr : abortReason(signal);
          this.fail(task, canceled.typedError);
          throw canceled;
        }
      }
    }

    const failure = assetFetchError(
      task.locator,
      task.attempts,
      lastError ?? assetTransferError(task.locator, 'No attempts were made', false),
      draftId,
    );
    this.fail(task, failure);
    this.log.error('Asset fetch failed', { draftId, assetId: task.id, locator: task.locator, attempts: task.attempts });
    throw new LifecycleError(failure);
  }

  /** One attempt: open, stream, count, verify. Returns the byte count. */
  private async attempt(task: AssetTask, target: string, runSignal: AbortSignal): Promise<number> {
    const controller = new AbortController();
    const onAbort = () => controller.abort(runSignal.reason);
    runSignal.addEventListener('abort', onAbort, { once: true });
    const timeoutMs = this.options.attemptTimeoutMs;
    const timer = setTimeout(() => {
      controller.abort(new TransportError(`Timed out after ${timeoutMs} ms`, true));
    }, timeoutMs);

    try {
      await mkdir(path.dirname(target), { recursive: true });
      const source = await this.transport.open(task.locator, controller.signal);
      const expected = source.contentLength ?? task.expectedBytes;

      const counter = new ByteCounter();
      await pipeline(source.stream, counter, createWriteStream(target), { signal: controller.signal });

      if (expected !== undefined && counter.bytes !== expected) {
        throw new LifecycleError(integrityError(task.locator, expected, counter.bytes));
      }
      return counter.bytes;
    } catch (err) {
      // Surface the timeout itself rather than the AbortError it caused.
      const reason: unknown = controller.signal.reason;
      if (controller.signal.aborted && !runSignal.aborted && reason instanceof TransportError) {
        throw reason;
      }
      throw err;
    } finally {
      clearTimeout(timer);
      runSignal.removeEventListener('abort', onAbort);
    }
  }

  private classify(err: unknown, locator: string): TypedError {
    if (err instanceof LifecycleError) return err.typedError;
    if (err instanceof TransportError) {
      return assetTransferError(locator, err.message, err.retryable, err.statusCode);
    }
    return assetTransferError(locator, `Transfer from ${locator} failed: ${errorMessage(err)}`, true);
  }

  private setStatus(task: AssetTask, target: AssetStatus): void {
    const result = transitionAssetStatus(task.status, target);
    if (!result.success || !result.newStatus) {
      throw new LifecycleError(
        result.error ?? assetTransferError(task.locator, `Cannot move asset to ${target}`, false),
      );
    }
    task.status = result.newStatus;
  }

  private fail(task: AssetTask, error: TypedError): void {
    task.error = error;
    task.completedAt = new Date().toISOString();
    if (task.status !== AssetStatus.Failed) {
      this.setStatus(task, AssetStatus.Failed);
    }
  }
}
