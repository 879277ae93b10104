/**
 * Draft archive service.
 *
 * Tracks archive requests per draft version. A version that already has a
 * download URL is handed out again without re-running the pipeline; anything
 * else goes through the lifecycle orchestrator, with the record's progress
 * updated as assets settle.
 */

import { v4 as uuid } from 'uuid';
import { AssetSpec } from '../domain/asset';
import {
  ARCHIVE_UPDATABLE_FIELDS,
  DraftArchiveRecord,
  DraftArchiveStats,
  DraftArchiveUpdate,
  UploadReceipt,
} from '../domain/archive';
import { LifecycleError, errorMessage, validationError } from '../domain/errors';
import { FailureReason, LifecycleRun } from '../domain/lifecycle';
import { AssetProgress, DraftMetadataBuilder, LifecycleOrchestrator } from '../engine/orchestrator';
import { Logger, logger as rootLogger } from '../logger';
import { ObjectStorageClient, objectKeyFromUrl } from '../storage/object-storage';
import { ArchiveListOptions, ListResult, Store } from '../storage/store';
import { DraftMetadata } from '../workspace/draft-workspace';

export interface SaveDraftRequest {
  draftId: string;
  templateName: string;
  /** The finished document, or a builder called once assets are in place. */
  metadata: DraftMetadata | DraftMetadataBuilder;
  assets: AssetSpec[];
  draftVersion?: number;
  userId?: string;
  userName?: string;
  archiveName?: string;
  signal?: AbortSignal;
}

export type SaveDraftResult =
  | { ok: true; reused: true; archive: DraftArchiveRecord }
  | { ok: true; reused: false; archive: DraftArchiveRecord; receipt: UploadReceipt; run: LifecycleRun }
  | { ok: false; archive: DraftArchiveRecord; failure: FailureReason; run: LifecycleRun };

function isMetadataBuilder(metadata: DraftMetadata | DraftMetadataBuilder): metadata is DraftMetadataBuilder {
  return typeof metadata === 'function';
}

/** Percent of assets verified. 100 is reserved for a completed upload. */
export function fetchProgress(progress: AssetProgress): number {
  if (progress.total === 0) return 0;
  return Math.min(99, Math.floor((progress.verified / progress.total) * 100));
}

export class DraftArchiveService {
  private log: Logger;

  constructor(
    private store: Store,
    private orchestrator: LifecycleOrchestrator,
    private storage: ObjectStorageClient,
    log: Logger = rootLogger,
  ) {
    this.log = log.child({ module: 'archives' });
  }

  async saveDraft(request: SaveDraftRequest): Promise<SaveDraftResult> {
    const { draftId, draftVersion } = request;
    const existing = await this.store.archives.getByDraft(draftId, draftVersion);

    if (existing?.downloadUrl) {
      this.log.info('Archive already exists, reusing download URL', { draftId, draftVersion, archiveId: existing.archiveId });
      return { ok: true, reused: true, archive: existing };
    }

    const totalFiles = Array.isArray(request.assets) ? request.assets.length : 0;
    let record: DraftArchiveRecord;
    if (existing) {
      record = (await this.store.archives.update(existing.archiveId, {
        totalFiles,
        downloadedFiles: 0,
        progress: 0,
        message: 'Archiving',
      })) ?? existing;
    } else {
      const now = new Date().toISOString();
      record = await this.store.archives.create({
        archiveId: `arc_${uuid()}`,
        draftId,
        draftVersion,
        userId: request.userId,
        userName: request.userName,
        archiveName: request.archiveName,
        totalFiles,
        downloadedFiles: 0,
        progress: 0,
        message: 'Archiving',
        createdAt: now,
        updatedAt: now,
      });
    }
    const archiveId = record.archiveId;

    const metadata = request.metadata;
    const buildMetadata: DraftMetadataBuilder = isMetadataBuilder(metadata) ? metadata : () => metadata;

    const result = await this.orchestrator.runLifecycle(
      { draftId, templateName: request.templateName, buildMetadata, assets: request.assets },
      {
        signal: request.signal,
        hooks: {
          onAssetSettled: async (_asset, progress, run) => {
            await this.store.archives.update(archiveId, {
              downloadedFiles: progress.verified,
              progress: fetchProgress(progress),
              lastRunId: run.id,
            });
          },
        },
      },
    );

    if (result.ok) {
      const updated = await this.store.archives.update(archiveId, {
        downloadUrl: result.receipt.url,
        objectKey: result.receipt.key,
        downloadedFiles: totalFiles,
        progress: 100,
        message: 'Archive uploaded',
        lastRunId: result.run.id,
      });
      this.log.info('Draft archived', { draftId, archiveId, url: result.receipt.url });
      return { ok: true, reused: false, archive: updated ?? record, receipt: result.receipt, run: result.run };
    }

    const { error } = result.failure;
    const updated = await this.store.archives.update(archiveId, {
      message: `${error.code}: ${error.message}`,
      lastRunId: result.run.id,
    });
    return { ok: false, archive: updated ?? record, failure: result.failure, run: result.run };
  }

  async list(options?: ArchiveListOptions): Promise<ListResult<DraftArchiveRecord>> {
    return this.store.archives.list(options);
  }

  async get(archiveId: string): Promise<DraftArchiveRecord | null> {
    return this.store.archives.getById(archiveId);
  }

  async getByDraft(draftId: string, draftVersion?: number): Promise<DraftArchiveRecord | null> {
    return this.store.archives.getByDraft(draftId, draftVersion);
  }

  /** Apply the caller-editable fields. Anything else in `updates` is ignored. */
  async update(archiveId: string, updates: Record<string, unknown>): Promise<DraftArchiveRecord | null> {
    const accepted: DraftArchiveUpdate = {};
    for (const field of ARCHIVE_UPDATABLE_FIELDS) {
      const value = updates[field];
      if (value === undefined) continue;
      if (field === 'downloadUrl' || field === 'message') {
        if (typeof value !== 'string') {
          throw new LifecycleError(validationError(`${field} must be a string`, { field }));
        }
        accepted[field] = value;
      } else {
        if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
          throw new LifecycleError(validationError(`${field} must be a non-negative integer`, { field }));
        }
        if (field === 'progress' && value > 100) {
          throw new LifecycleError(validationError('progress must be between 0 and 100', { field }));
        }
        accepted[field] = value;
      }
    }

    if (Object.keys(accepted).length === 0) {
      throw new LifecycleError(
        validationError('No valid fields to update', { allowed: [...ARCHIVE_UPDATABLE_FIELDS] }),
      );
    }
    return this.store.archives.update(archiveId, accepted);
  }

  /**
   * Delete a record and its uploaded object. A storage failure is logged and
   * the record is deleted regardless.
   */
  async delete(archiveId: string): Promise<boolean> {
    const record = await this.store.archives.getById(archiveId);
    if (!record) return false;

    const key = recordObjectKey(record);
    if (key && (await this.isSharedObject(record, key))) {
      this.log.info('Archive object still referenced', { archiveId, key });
    } else if (key) {
      try {
        const removed = await this.storage.delete(key);
        this.log.info('Archive object deleted', { archiveId, key, removed });
      } catch (err) {
        this.log.warn('Failed to delete archive object', { archiveId, key, error: errorMessage(err) });
      }
    }

    return this.store.archives.delete(archiveId);
  }

  /** Keys are per draft, so every version of a draft uploads to the same object. */
  private async isSharedObject(record: DraftArchiveRecord, key: string): Promise<boolean> {
    const siblings = await this.store.archives.list({ draftId: record.draftId, limit: Number.MAX_SAFE_INTEGER });
    return siblings.items.some((other) => other.archiveId !== record.archiveId && recordObjectKey(other) === key);
  }

  async stats(): Promise<DraftArchiveStats> {
    return this.store.archives.stats();
  }
}

function recordObjectKey(record: DraftArchiveRecord): string | null {
  return record.objectKey ?? (record.downloadUrl ? objectKeyFromUrl(record.downloadUrl) : null);
}
