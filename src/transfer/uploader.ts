/**
 * Uploader: ships an archive artifact to object storage.
 *
 * The key depends only on the draft ID, so a repeated upload replaces the
 * earlier object instead of adding a second one. Transient storage failures
 * are retried with backoff; permanent ones fail on the first attempt.
 */

import { createReadStream } from 'fs';
import { ArchiveArtifact, UploadReceipt } from '../domain/archive';
import {
  LifecycleError,
  errorMessage,
  maskSecretsInMessage,
  uploadError,
} from '../domain/errors';
import { DEFAULT_RETRY_POLICY, RetryPolicy, abortReason, computeBackoff, sleep } from '../engine/retry';
import { Logger, logger as rootLogger } from '../logger';
import { ObjectStorageClient, StorageError, classifyStorageError } from '../storage/object-storage';

export const ARCHIVE_CONTENT_TYPE = 'application/zip';

export interface UploaderOptions {
  retry: RetryPolicy;
  keyPrefix: string;
  /** CDN or public origin for receipt URLs. */
  publicBaseUrl?: string;
  /** Values to mask if they show up in storage error messages. */
  secrets: string[];
  random: () => number;
}

export class Uploader {
  private options: UploaderOptions;
  private log: Logger;

  constructor(
    private storage: ObjectStorageClient,
    options: Partial<UploaderOptions> = {},
    log: Logger = rootLogger,
  ) {
    this.options = {
      retry: options.retry ?? DEFAULT_RETRY_POLICY,
      keyPrefix: options.keyPrefix ?? 'drafts',
      publicBaseUrl: options.publicBaseUrl,
      secrets: options.secrets ?? [],
      random: options.random ?? Math.random,
    };
    this.log = log.child({ module: 'uploader' });
  }

  keyFor(draftId: string): string {
    const prefix = this.options.keyPrefix.replace(/^\/+|\/+$/g, '');
    return prefix ? `${prefix}/${draftId}.zip` : `${draftId}.zip`;
  }

  urlFor(key: string, storageUrl: string): string {
    const base = this.options.publicBaseUrl;
    return base ? `${base.replace(/\/+$/, '')}/${key}` : storageUrl;
  }

  async upload(artifact: ArchiveArtifact, signal?: AbortSignal): Promise<UploadReceipt> {
    const { retry } = this.options;
    const draftId = artifact.draftId;
    const key = this.keyFor(draftId);

    for (let attempt = 1; ; attempt++) {
      if (signal?.aborted) throw abortReason(signal);

      const body = createReadStream(artifact.path);
      try {
        const result = await this.storage.put(key, body, {
          contentType: ARCHIVE_CONTENT_TYPE,
          contentLength: artifact.sizeBytes,
          signal,
        });
        const receipt: UploadReceipt = {
          draftId,
          key: result.key,
          url: this.urlFor(result.key, result.url),
          sizeBytes: artifact.sizeBytes,
          sha256: artifact.sha256,
          contentType: ARCHIVE_CONTENT_TYPE,
          uploadedAt: new Date().toISOString(),
          etag: result.etag,
        };
        this.log.info('Archive uploaded', { draftId, key, attempt, sizeBytes: artifact.sizeBytes });
        return receipt;
      } catch (err) {
        // A client that rejects before reading leaves the file open.
        body.destroy();
        if (signal?.aborted) throw abortReason(signal);

        const kind = classifyStorageError(err);
        const statusCode = err instanceof StorageError ? err.statusCode : undefined;
        const cause = maskSecretsInMessage(errorMessage(err), this.options.secrets);

        if (kind === 'permanent' || attempt >= retry.maxAttempts) {
          this.log.error('Archive upload failed', { draftId, key, attempt, kind, error: cause });
          throw new LifecycleError(uploadError(draftId, key, kind, cause, attempt, statusCode), { cause: err });
        }

        const delayMs = computeBackoff(retry, attempt, this.options.random);
        this.log.warn('Archive upload failed, retrying', { draftId, key, attempt, delayMs, error: cause });
        await sleep(delayMs, signal);
      }
    }
  }
}
