/**
 * Data Plane Publisher.
 *
 * Emits stable, versioned lifecycle and asset events, persists them as the
 * queryable history of each run, and fans them out to in-process subscribers.
 */

import { v4 as uuid } from 'uuid';
import { AssetTask } from '../domain/asset';
import { DataPlaneEvent, DataPlaneEventType, EventSubscription } from '../domain/events';
import { errorMessage } from '../domain/errors';
import { LifecycleRun } from '../domain/lifecycle';
import { Logger, logger as rootLogger } from '../logger';
import { Store } from '../storage/store';

export const EVENT_SCHEMA_VERSION = '1.0.0';

/** The data plane publisher. */
export class DataPlanePublisher {
  private subscriptions: EventSubscription[] = [];
  private log: Logger;

  constructor(private store: Store, log: Logger = rootLogger) {
    this.log = log.child({ module: 'publisher' });
  }

  /** Publish a lifecycle state event for a run. */
  async publishLifecycleEvent(
    run: LifecycleRun,
    eventType: DataPlaneEventType,
    payload: Record<string, unknown> = {},
  ): Promise<DataPlaneEvent> {
    return this.publishEvent({
      id: `evt_${uuid()}`,
      type: eventType,
      schemaVersion: EVENT_SCHEMA_VERSION,
      timestamp: new Date().toISOString(),
      runId: run.id,
      draftId: run.draftId,
      payload: {
        state: run.state,
        outcome: run.outcome,
        templateName: run.templateName,
        ...payload,
      },
    });
  }

  /** Publish the settled state of one asset task. */
  async publishAssetEvent(
    run: LifecycleRun,
    task: AssetTask,
    eventType: DataPlaneEventType,
  ): Promise<DataPlaneEvent> {
    return this.publishEvent({
      id: `evt_${uuid()}`,
      type: eventType,
      schemaVersion: EVENT_SCHEMA_VERSION,
      timestamp: new Date().toISOString(),
      runId: run.id,
      draftId: run.draftId,
      assetId: task.id,
      payload: {
        locator: task.locator,
        kind: task.kind,
        targetPath: task.targetPath,
        status: task.status,
        attempts: task.attempts,
        bytesWritten: task.bytesWritten,
        error: task.error,
      },
    });
  }

  /** Persist and deliver an event. */
  async publishEvent(event: DataPlaneEvent): Promise<DataPlaneEvent> {
    await this.store.events.create(event);

    for (const sub of this.subscriptions) {
      if (!this.matchesSubscription(event, sub)) continue;
      try {
        sub.callback(event);
      } catch (err) {
        // Subscriber errors are logged, never rethrown.
        this.log.warn('Event subscriber threw', {
          subscriptionId: sub.id,
          eventType: event.type,
          error: errorMessage(err),
        });
      }
    }

    return event;
  }

  /** Subscribe to events. Returns an unsubscribe function. */
  subscribe(subscription: EventSubscription): () => void {
    this.subscriptions.push(subscription);
    return () => {
      this.subscriptions = this.subscriptions.filter((s) => s.id !== subscription.id);
    };
  }

  async getEventsByRun(runId: string): Promise<DataPlaneEvent[]> {
    return this.store.events.listByRun(runId);
  }

  async getEventsByDraft(draftId: string, eventTypes?: DataPlaneEventType[]): Promise<DataPlaneEvent[]> {
    return this.store.events.listByDraft(draftId, { eventTypes });
  }

  private matchesSubscription(event: DataPlaneEvent, sub: EventSubscription): boolean {
    if (sub.draftId && event.draftId !== sub.draftId) return false;
    if (sub.eventTypes?.length && !sub.eventTypes.includes(event.type)) return false;
    return true;
  }
}
