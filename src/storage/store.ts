/**
 * Storage layer interfaces.
 *
 * Defines the contract for persisting lifecycle runs, archive records and
 * data plane events, with pluggable backends.
 */

import { DraftArchiveRecord, DraftArchiveStats } from '../domain/archive';
import { DataPlaneEvent } from '../domain/events';
import { LifecycleRun } from '../domain/lifecycle';

/** Generic list query options. */
export interface ListOptions {
  limit?: number;
  offset?: number;
}

/** Paginated list result with metadata. */
export interface ListResult<T> {
  items: T[];
  total: number;
  limit: number;
  offset: number;
  hasMore: boolean;
}

/** Store interface for lifecycle runs. */
export interface LifecycleRunStore {
  create(run: LifecycleRun): Promise<LifecycleRun>;
  getById(id: string): Promise<LifecycleRun | null>;
  update(id: string, updates: Partial<LifecycleRun>): Promise<LifecycleRun | null>;
  /** Runs for a draft, newest first. */
  listByDraft(draftId: string, options?: ListOptions): Promise<LifecycleRun[]>;
}

export interface ArchiveListOptions extends ListOptions {
  draftId?: string;
  userId?: string;
}

/** Store interface for draft archive records. */
export interface DraftArchiveStore {
  create(record: DraftArchiveRecord): Promise<DraftArchiveRecord>;
  getById(archiveId: string): Promise<DraftArchiveRecord | null>;
  /**
   * Record for a draft version. Without a version, only a record that
   * has none matches.
   */
  getByDraft(draftId: string, draftVersion?: number): Promise<DraftArchiveRecord | null>;
  update(archiveId: string, updates: Partial<DraftArchiveRecord>): Promise<DraftArchiveRecord | null>;
  /** Newest first. */
  list(options?: ArchiveListOptions): Promise<ListResult<DraftArchiveRecord>>;
  delete(archiveId: string): Promise<boolean>;
  stats(): Promise<DraftArchiveStats>;
}

/** Store interface for data plane events. */
export interface EventStore {
  create(event: DataPlaneEvent): Promise<DataPlaneEvent>;
  listByRun(runId: string, options?: ListOptions): Promise<DataPlaneEvent[]>;
  listByDraft(draftId: string, options?: ListOptions & { eventTypes?: string[] }): Promise<DataPlaneEvent[]>;
}

/** Build a paginated ListResult from items and total count. */
export function toListResult<T>(items: T[], total: number, options?: ListOptions): ListResult<T> {
  const limit = options?.limit ?? 100;
  const offset = options?.offset ?? 0;
  return {
    items,
    total,
    limit,
    offset,
    hasMore: offset + items.length < total,
  };
}

/** Composite store interface. */
export interface Store {
  lifecycles: LifecycleRunStore;
  archives: DraftArchiveStore;
  events: EventStore;
}
