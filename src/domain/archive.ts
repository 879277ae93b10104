/**
 * Archive domain model.
 *
 * An artifact is the zip of one finalized workspace; a receipt is the stable
 * storage reference that outlives it. Archive records track save requests
 * per draft version so a completed archive can be handed out again.
 */

/** A compressed workspace on local disk, owned by the upload step. */
export interface ArchiveArtifact {
  draftId: string;
  path: string;
  sizeBytes: number;
  /** Hex sha256 of the artifact bytes. */
  sha256: string;
  createdAt: string;
}

/** Stable reference to an uploaded archive. */
export interface UploadReceipt {
  draftId: string;
  key: string;
  url: string;
  sizeBytes: number;
  sha256: string;
  contentType: string;
  uploadedAt: string;
  etag?: string;
}

/** Tracking record for a draft archive request. */
export interface DraftArchiveRecord {
  archiveId: string;
  draftId: string;
  draftVersion?: number;
  userId?: string;
  userName?: string;
  archiveName?: string;
  /** Set once the archive has been uploaded. */
  downloadUrl?: string;
  /** Storage key of the uploaded archive. */
  objectKey?: string;
  totalFiles: number;
  downloadedFiles: number;
  /** Percentage, 0-100. */
  progress: number;
  message?: string;
  lastRunId?: string;
  createdAt: string;
  updatedAt: string;
}

/** Fields callers may change on an existing record. */
export interface DraftArchiveUpdate {
  downloadUrl?: string;
  totalFiles?: number;
  progress?: number;
  downloadedFiles?: number;
  message?: string;
}

export const ARCHIVE_UPDATABLE_FIELDS: readonly (keyof DraftArchiveUpdate)[] = [
  'downloadUrl',
  'totalFiles',
  'progress',
  'downloadedFiles',
  'message',
];

/** Aggregate counts across archive records. */
export interface DraftArchiveStats {
  total: number;
  completed: number;
  pending: number;
  distinctDrafts: number;
}
