/**
 * Data plane event domain model.
 *
 * Events are emitted as stable, versioned records for downstream consumers
 * (progress displays, audit, notification relays).
 */

/** Event types emitted by the data plane. */
export type DataPlaneEventType =
  | 'lifecycle.created'
  | 'lifecycle.provisioned'
  | 'lifecycle.assets_fetching'
  | 'lifecycle.metadata_finalized'
  | 'lifecycle.archived'
  | 'lifecycle.uploaded'
  | 'lifecycle.failed'
  | 'lifecycle.cleaned_up'
  | 'asset.verified'
  | 'asset.failed';

/** A data plane event with stable schema. */
export interface DataPlaneEvent {
  id: string;
  type: DataPlaneEventType;
  /** Event schema version for forward compatibility. */
  schemaVersion: string;
  timestamp: string;
  runId: string;
  draftId: string;
  assetId?: string;
  /** Event-specific payload. */
  payload: Record<string, unknown>;
}

/** In-process event subscription. */
export interface EventSubscription {
  id: string;
  /** Only deliver events for this draft. */
  draftId?: string;
  /** Filter by event types. */
  eventTypes?: DataPlaneEventType[];
  callback: (event: DataPlaneEvent) => void;
}
