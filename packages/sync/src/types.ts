import type { ValueMap } from '@ledgerlink/core';

/**
 * Local mutation kind
 */
export type ChangeOperation = 'create' | 'update' | 'delete';

/**
 * Record id. Records that do not exist on the backend yet carry a negative
 * temporary id.
 */
export type EntityId = number | string;

/**
 * One local mutation waiting in the outbox.
 *
 * Never mutated in place: a later edit of the same record is a new change
 * with its own idempotency key.
 */
export interface PendingChange {
  /** Client-generated, stable across retries */
  idempotencyKey: string;
  entityType: string;
  entityId: EntityId;
  operation: ChangeOperation;
  /** Field-level values (empty for deletes) */
  values: ValueMap;
  /** Epoch ms when the change was staged */
  stagedAt: number;
}

/**
 * Input for staging a change
 */
export interface StageChangeInput {
  entityType: string;
  /** Omit for creates to get a temporary id */
  entityId?: EntityId;
  operation: ChangeOperation;
  values?: ValueMap;
  /** Supply to reuse a key from a previous session; generated otherwise */
  idempotencyKey?: string;
}

/**
 * Position in the server's change log for one (user, device) pair
 */
export interface SyncCursor {
  userId: string;
  deviceId: string;
  /** Highest acknowledged event id; never decreases */
  lastEventId: number | null;
  /** Epoch ms of the last successful pull */
  lastSyncAt: number | null;
  /** Outbox size */
  pendingChanges: number;
  /** Opaque token from the last smart pull */
  nextSyncToken: string | null;
}

export type ConflictKind = 'both-modified' | 'remote-deleted' | 'unknown';

/**
 * A pending change the backend refused because its copy of the record
 * moved on. Stays until explicitly resolved.
 */
export interface Conflict {
  id: string;
  /** Key of the pending change this conflict belongs to */
  idempotencyKey: string;
  entityType: string;
  entityId: EntityId;
  kind: ConflictKind;
  localPayload: ValueMap;
  /** Null when the record was deleted remotely */
  remotePayload: ValueMap | null;
  detectedAt: number;
}

/**
 * Caller decision for a conflict
 */
export type Resolution =
  | { type: 'keep-local' }
  | { type: 'keep-remote' }
  | { type: 'merged'; payload: ValueMap };

export interface ConflictResolutionRequest {
  conflictId: string;
  resolution: Resolution;
}

/**
 * A change the server rejected permanently. It has already left the outbox,
 * so it carries everything needed to show or re-stage it.
 */
export interface FailedChange {
  idempotencyKey: string;
  entityType: string;
  entityId: EntityId;
  operation: ChangeOperation;
  values: ValueMap;
  reason: string;
}

export interface PushResult {
  successful: string[];
  failed: FailedChange[];
  conflicts: Conflict[];
  /** Changes held back because they already have an open conflict */
  heldBack: number;
}

export interface PullOptions {
  entityTypes?: string[];
  /** Epoch ms; only records modified after this */
  since?: number;
  batchSize?: number;
  signal?: AbortSignal;
}

export interface PullResult {
  data: Record<string, ValueMap[]>;
  totalRecords: number;
  syncedAt: string | null;
}

/**
 * One entry of the server's event log
 */
export interface SyncEvent {
  id: number;
  eventType: string;
  entityType: string;
  entityId: EntityId | null;
  payload: ValueMap;
  createdAt: string | null;
}

export interface SmartPullOptions {
  entityTypes?: string[];
  limit?: number;
  signal?: AbortSignal;
}

export interface SmartPullResult {
  hasUpdates: boolean;
  newEventsCount: number;
  events: SyncEvent[];
  nextSyncToken: string | null;
  lastSyncTime: string | null;
  /** Highest event id in `events`, null when there are none */
  latestEventId: number | null;
}

export interface UpdateCheck {
  hasUpdates: boolean;
  pendingEvents: number;
  lastEventId: number | null;
}

export interface ResolutionFailure {
  conflictId: string;
  reason: string;
}

export interface ResolutionResult {
  resolved: string[];
  failed: ResolutionFailure[];
}

/**
 * Backend view of the device's sync state
 */
export interface RemoteSyncState {
  deviceId: string;
  lastSyncAt: string | null;
  pendingChanges: number;
  metadata: ValueMap | null;
}

/**
 * Backend view of the event log position
 */
export interface RemoteEventState {
  userId: string;
  deviceId: string;
  lastEventId: number | null;
  lastSyncAt: string | null;
  syncCount: number;
  status: string;
}

export interface HealthStatus {
  healthy: boolean;
  status: string;
  version: string | null;
}

export interface AckResult {
  success: boolean;
  lastEventId: number | null;
}
