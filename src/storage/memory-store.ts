/**
 * In-memory storage implementation.
 *
 * Reference implementation for development, embedding and testing. Every
 * read and write goes through deepCopy so callers never alias store state.
 */

import { DraftArchiveRecord, DraftArchiveStats } from '../domain/archive';
import { DataPlaneEvent } from '../domain/events';
import { LifecycleRun } from '../domain/lifecycle';
import {
  ArchiveListOptions,
  DraftArchiveStore,
  EventStore,
  LifecycleRunStore,
  ListOptions,
  ListResult,
  Store,
  toListResult,
} from './store';

function applyListOptions<T>(items: T[], options?: ListOptions): T[] {
  const offset = options?.offset ?? 0;
  const limit = options?.limit ?? 100;
  return items.slice(offset, offset + limit);
}

/** Structural copy; store values are plain JSON-shaped records. */
export function deepCopy<T>(obj: T): T {
  return structuredClone(obj);
}

/** Newest first; insertion order breaks ties between equal timestamps. */
function newestFirst<T extends { createdAt: string }>(items: T[]): T[] {
  return items
    .map((item, index) => ({ item, index }))
    .sort((a, b) => {
      if (a.item.createdAt !== b.item.createdAt) return a.item.createdAt < b.item.createdAt ? 1 : -1;
      return b.index - a.index;
    })
    .map(({ item }) => item);
}

class MemoryLifecycleRunStore implements LifecycleRunStore {
  private data = new Map<string, LifecycleRun>();

  async create(run: LifecycleRun): Promise<LifecycleRun> {
    this.data.set(run.id, deepCopy(run));
    return deepCopy(run);
  }

  async getById(id: string): Promise<LifecycleRun | null> {
    const run = this.data.get(id);
    return run ? deepCopy(run) : null;
  }

  async update(id: string, updates: Partial<LifecycleRun>): Promise<LifecycleRun | null> {
    const existing = this.data.get(id);
    if (!existing) return null;
    const updated = { ...deepCopy(existing), ...deepCopy(updates), updatedAt: new Date().toISOString() };
    this.data.set(id, updated);
    return deepCopy(updated);
  }

  async listByDraft(draftId: string, options?: ListOptions): Promise<LifecycleRun[]> {
    const items = newestFirst([...this.data.values()].filter((r) => r.draftId === draftId));
    return applyListOptions(items.map(deepCopy), options);
  }
}

class MemoryDraftArchiveStore implements DraftArchiveStore {
  private data = new Map<string, DraftArchiveRecord>();

  async create(record: DraftArchiveRecord): Promise<DraftArchiveRecord> {
    this.data.set(record.archiveId, deepCopy(record));
    return deepCopy(record);
  }

  async getById(archiveId: string): Promise<DraftArchiveRecord | null> {
    const record = this.data.get(archiveId);
    return record ? deepCopy(record) : null;
  }

  async getByDraft(draftId: string, draftVersion?: number): Promise<DraftArchiveRecord | null> {
    for (const record of this.data.values()) {
      if (record.draftId === draftId && record.draftVersion === draftVersion) {
        return deepCopy(record);
      }
    }
    return null;
  }

  async update(archiveId: string, updates: Partial<DraftArchiveRecord>): Promise<DraftArchiveRecord | null> {
    const existing = this.data.get(archiveId);
    if (!existing) return null;
    const updated: DraftArchiveRecord = {
      ...deepCopy(existing),
      ...deepCopy(updates),
      archiveId: existing.archiveId,
      updatedAt: new Date().toISOString(),
    };
    this.data.set(archiveId, updated);
    return deepCopy(updated);
  }

  async list(options?: ArchiveListOptions): Promise<ListResult<DraftArchiveRecord>> {
    let items = [...this.data.values()];
    if (options?.draftId) items = items.filter((r) => r.draftId === options.draftId);
    if (options?.userId) items = items.filter((r) => r.userId === options.userId);
    const sorted = newestFirst(items);
    return toListResult(applyListOptions(sorted.map(deepCopy), options), sorted.length, options);
  }

  async delete(archiveId: string): Promise<boolean> {
    return this.data.delete(archiveId);
  }

  async stats(): Promise<DraftArchiveStats> {
    const records = [...this.data.values()];
    const completed = records.filter((r) => Boolean(r.downloadUrl)).length;
    return {
      total: records.length,
      completed,
      pending: records.length - completed,
      distinctDrafts: new Set(records.map((r) => r.draftId)).size,
    };
  }
}

/** Events indexed by run, since every run emits several. */
class MemoryEventStore implements EventStore {
  private data: DataPlaneEvent[] = [];
  private runIdIndex = new Map<string, number[]>();

  async create(event: DataPlaneEvent): Promise<DataPlaneEvent> {
    const idx = this.data.length;
    this.data.push(deepCopy(event));
    const indices = this.runIdIndex.get(event.runId) ?? [];
    indices.push(idx);
    this.runIdIndex.set(event.runId, indices);
    return deepCopy(event);
  }

  async listByRun(runId: string, options?: ListOptions): Promise<DataPlaneEvent[]> {
    const indices = this.runIdIndex.get(runId) ?? [];
    const items = indices.flatMap((i) => {
      const event = this.data[i];
      return event ? [event] : [];
    });
    return applyListOptions(items.map(deepCopy), options);
  }

  async listByDraft(
    draftId: string,
    options?: ListOptions & { eventTypes?: string[] },
  ): Promise<DataPlaneEvent[]> {
    const eventTypes = options?.eventTypes ?? [];
    let items = this.data.filter((e) => e.draftId === draftId);
    if (eventTypes.length > 0) {
      items = items.filter((e) => eventTypes.includes(e.type));
    }
    return applyListOptions(items.map(deepCopy), options);
  }
}

/** Create a new in-memory store instance. */
export function createMemoryStore(): Store {
  return {
    lifecycles: new MemoryLifecycleRunStore(),
    archives: new MemoryDraftArchiveStore(),
    events: new MemoryEventStore(),
  };
}
