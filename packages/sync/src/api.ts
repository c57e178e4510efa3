import {
  resolveEndpoints,
  type Endpoints,
  type Transport,
  type ValueMap,
} from '@ledgerlink/core';
import {
  ackResponseSchema,
  checkUpdatesResponseSchema,
  eventStateResponseSchema,
  healthResponseSchema,
  parseWire,
  pullResponseSchema,
  pushResponseSchema,
  resolveConflictsResponseSchema,
  smartPullResponseSchema,
  successResponseSchema,
  syncStateResponseSchema,
  type WireConflict,
  type WireEvent,
} from './protocol/schemas.js';
import type {
  AckResult,
  ConflictKind,
  ConflictResolutionRequest,
  EntityId,
  HealthStatus,
  PendingChange,
  PullResult,
  RemoteEventState,
  RemoteSyncState,
  Resolution,
  ResolutionFailure,
  SyncEvent,
  UpdateCheck,
} from './types.js';

export interface SyncApiConfig {
  transport: Transport;
  endpoints?: Partial<Endpoints>;
}

interface CallOptions {
  signal?: AbortSignal;
}

export interface PushRequest extends CallOptions {
  deviceId: string;
  changes: readonly PendingChange[];
  /** Epoch ms */
  timestamp: number;
}

/**
 * Push outcome as reported by the backend, before it is matched against
 * the outbox
 */
export interface RawPushResponse {
  successful: string[];
  failed: { idempotencyKey: string; reason: string }[];
  conflicts: RawConflict[];
}

export interface RawConflict {
  conflictId: string | null;
  idempotencyKey: string;
  kind: ConflictKind;
  remotePayload: ValueMap | null;
}

export interface PullRequest extends CallOptions {
  deviceId: string;
  entityTypes?: string[];
  since?: number;
  batchSize?: number;
}

export interface SmartPullRequest extends CallOptions {
  userId: string;
  deviceId: string;
  appType?: string;
  entityTypes?: string[];
  limit?: number;
  lastEventId?: number | null;
}

export interface RawSmartPull {
  hasUpdates: boolean;
  newEventsCount: number;
  events: SyncEvent[];
  nextSyncToken: string | null;
  lastSyncTime: string | null;
}

export interface AckRequest extends CallOptions {
  userId: string;
  deviceId: string;
  lastEventId: number;
  eventsSynced: number;
}

function toConflictKind(kind: string | undefined): ConflictKind {
  switch (kind?.replace(/_/g, '-')) {
    case 'both-modified':
    case 'version-mismatch':
      return 'both-modified';
    case 'remote-deleted':
    case 'deleted':
      return 'remote-deleted';
    default:
      return 'unknown';
  }
}

function toRawConflict(conflict: WireConflict): RawConflict {
  return {
    conflictId: conflict.conflict_id === undefined ? null : String(conflict.conflict_id),
    idempotencyKey: conflict.idempotency_key,
    kind: toConflictKind(conflict.kind ?? conflict.type),
    remotePayload: conflict.remote_payload ?? null,
  };
}

function toSyncEvent(event: WireEvent): SyncEvent {
  const entityId: EntityId | null = event.record_id ?? null;
  return {
    id: event.id,
    eventType: event.event_type,
    entityType: event.entity_type ?? event.model ?? 'unknown',
    entityId,
    payload: event.data ?? {},
    createdAt: event.created_at ?? null,
  };
}

function toWireResolution(request: ConflictResolutionRequest): ValueMap {
  const wire: ValueMap = {
    conflict_id: request.conflictId,
    resolution: resolutionName(request.resolution),
  };
  if (request.resolution.type === 'merged') {
    wire.merged_payload = request.resolution.payload;
  }
  return wire;
}

function resolutionName(resolution: Resolution): string {
  switch (resolution.type) {
    case 'keep-local':
      return 'keep_local';
    case 'keep-remote':
      return 'keep_remote';
    case 'merged':
      return 'merged';
  }
}

/**
 * Typed client for the sync endpoints. Requests are sent as given and
 * responses are validated and converted to camelCase; no state is kept.
 */
export class SyncApi {
  private readonly transport: Transport;
  private readonly endpoints: Endpoints;

  constructor(config: SyncApiConfig) {
    this.transport = config.transport;
    this.endpoints = resolveEndpoints(config.endpoints);
  }

  async push(request: PushRequest): Promise<RawPushResponse> {
    const changes: Record<string, ValueMap[]> = {};
    for (const change of request.changes) {
      const wire: ValueMap = {
        idempotency_key: change.idempotencyKey,
        entity_id: change.entityId,
        operation: change.operation,
        values: change.values,
      };
      (changes[change.entityType] ??= []).push(wire);
    }

    const path = this.endpoints.push;
    const body = await this.transport.request({
      method: 'POST',
      path,
      body: {
        device_id: request.deviceId,
        changes,
        timestamp: new Date(request.timestamp).toISOString(),
      },
      signal: request.signal,
    });

    const parsed = parseWire(pushResponseSchema, body, path);
    return {
      successful: parsed.successful,
      failed: parsed.failed.map((entry) => ({ idempotencyKey: entry.key, reason: entry.reason })),
      conflicts: parsed.conflicts.map(toRawConflict),
    };
  }

  async pull(request: PullRequest): Promise<PullResult> {
    const payload: ValueMap = { device_id: request.deviceId };
    if (request.entityTypes) payload.models = request.entityTypes;
    if (request.since !== undefined) payload.since = new Date(request.since).toISOString();
    if (request.batchSize !== undefined) payload.batch_size = request.batchSize;

    const path = this.endpoints.pull;
    const body = await this.transport.request({
      method: 'POST',
      path,
      body: payload,
      signal: request.signal,
    });

    const parsed = parseWire(pullResponseSchema, body, path);
    return {
      data: parsed.data,
      totalRecords: parsed.total_records,
      syncedAt: parsed.synced_at,
    };
  }

  async resolveConflicts(
    deviceId: string,
    resolutions: readonly ConflictResolutionRequest[],
    options: CallOptions = {}
  ): Promise<{ resolved: string[]; failed: ResolutionFailure[] }> {
    const path = this.endpoints.resolveConflicts;
    const body = await this.transport.request({
      method: 'POST',
      path,
      body: {
        device_id: deviceId,
        resolutions: resolutions.map(toWireResolution),
      },
      signal: options.signal,
    });

    const parsed = parseWire(resolveConflictsResponseSchema, body, path);
    return {
      resolved: parsed.resolved,
      failed: parsed.failed.map((entry) => ({ conflictId: entry.key, reason: entry.reason })),
    };
  }

  async getSyncState(deviceId: string, options: CallOptions = {}): Promise<RemoteSyncState> {
    const path = this.endpoints.syncState;
    const body = await this.transport.request({
      method: 'GET',
      path,
      query: { device_id: deviceId },
      signal: options.signal,
    });

    const parsed = parseWire(syncStateResponseSchema, body, path);
    return {
      deviceId: parsed.device_id,
      lastSyncAt: parsed.last_sync_at,
      pendingChanges: parsed.pending_changes,
      metadata: parsed.metadata,
    };
  }

  async reset(deviceId: string, options: CallOptions = {}): Promise<boolean> {
    const path = this.endpoints.reset;
    const body = await this.transport.request({
      method: 'POST',
      path,
      body: { device_id: deviceId },
      signal: options.signal,
    });
    return parseWire(successResponseSchema, body, path).success;
  }

  async health(options: CallOptions = {}): Promise<HealthStatus> {
    return this.readHealth(this.endpoints.health, options);
  }

  async checkUpdates(
    query: { userId?: string; deviceId?: string; appType?: string },
    options: CallOptions = {}
  ): Promise<UpdateCheck> {
    const path = this.endpoints.checkUpdates;
    const body = await this.transport.request({
      method: 'GET',
      path,
      query: { user_id: query.userId, device_id: query.deviceId, app_type: query.appType },
      signal: options.signal,
    });

    const parsed = parseWire(checkUpdatesResponseSchema, body, path);
    return {
      hasUpdates: parsed.has_updates,
      pendingEvents: parsed.pending_events,
      lastEventId: parsed.last_event_id,
    };
  }

  async smartPull(request: SmartPullRequest): Promise<RawSmartPull> {
    const payload: ValueMap = {
      user_id: request.userId,
      device_id: request.deviceId,
    };
    if (request.appType !== undefined) payload.app_type = request.appType;
    if (request.entityTypes) payload.models = request.entityTypes;
    if (request.limit !== undefined) payload.limit = request.limit;
    if (request.lastEventId !== undefined) payload.last_event_id = request.lastEventId;

    const path = this.endpoints.smartPull;
    const body = await this.transport.request({
      method: 'POST',
      path,
      body: payload,
      signal: request.signal,
    });

    const parsed = parseWire(smartPullResponseSchema, body, path);
    return {
      hasUpdates: parsed.has_updates,
      newEventsCount: parsed.new_events_count,
      events: parsed.events.map(toSyncEvent),
      nextSyncToken: parsed.next_sync_token,
      lastSyncTime: parsed.last_sync_time,
    };
  }

  async getEventState(userId: string, deviceId: string, options: CallOptions = {}): Promise<RemoteEventState> {
    const path = this.endpoints.smartState;
    const body = await this.transport.request({
      method: 'GET',
      path,
      query: { user_id: userId, device_id: deviceId },
      signal: options.signal,
    });

    const parsed = parseWire(eventStateResponseSchema, body, path);
    return {
      userId: String(parsed.user_id),
      deviceId: parsed.device_id,
      lastEventId: parsed.last_event_id,
      lastSyncAt: parsed.last_sync_at,
      syncCount: parsed.sync_count,
      status: parsed.status,
    };
  }

  async resetEventState(userId: string, deviceId: string, options: CallOptions = {}): Promise<boolean> {
    const path = this.endpoints.smartReset;
    const body = await this.transport.request({
      method: 'POST',
      path,
      query: { user_id: userId, device_id: deviceId },
      body: {},
      signal: options.signal,
    });
    return parseWire(successResponseSchema, body, path).success;
  }

  async eventHealth(options: CallOptions = {}): Promise<HealthStatus> {
    return this.readHealth(this.endpoints.smartHealth, options);
  }

  async acknowledge(request: AckRequest): Promise<AckResult> {
    const path = this.endpoints.ack;
    const body = await this.transport.request({
      method: 'POST',
      path,
      body: {
        user_id: request.userId,
        device_id: request.deviceId,
        last_event_id: request.lastEventId,
        events_synced: request.eventsSynced,
      },
      signal: request.signal,
    });

    const parsed = parseWire(ackResponseSchema, body, path);
    return { success: parsed.success, lastEventId: parsed.last_event_id };
  }

  private async readHealth(path: string, options: CallOptions): Promise<HealthStatus> {
    const body = await this.transport.request({ method: 'GET', path, signal: options.signal });
    const parsed = parseWire(healthResponseSchema, body, path);
    return {
      healthy: parsed.healthy ?? parsed.status === 'healthy',
      status: parsed.status,
      version: parsed.version,
    };
  }
}
