import {
  NotFoundError,
  isValueMap,
  type LedgerError,
  type Transport,
  type TransportRequest,
  type Value,
  type ValueMap,
} from '@ledgerlink/core';

type PushOutcome =
  | { type: 'success' }
  | { type: 'failed'; reason: string }
  | { type: 'conflict'; kind: string; remote: ValueMap | null };

export interface StoredEvent {
  id: number;
  entityType: string;
  recordId: number;
  eventType: string;
  data: ValueMap;
}

function asString(value: Value | undefined): string | null {
  return typeof value === 'string' ? value : null;
}

function asNumber(value: Value | undefined): number | null {
  return typeof value === 'number' ? value : null;
}

function asList(value: Value | undefined): Value[] {
  return Array.isArray(value) ? value : [];
}

/**
 * In-process backend speaking the sync wire protocol. Push outcomes are
 * remembered per idempotency key, so a repeated key has no second effect.
 */
export class FakeSyncBackend implements Transport {
  readonly requests: TransportRequest[] = [];
  /** Server-side effects per idempotency key */
  readonly effects = new Map<string, number>();
  readonly events: StoredEvent[] = [];
  readonly records: Record<string, ValueMap[]> = {};
  readonly resolutions: ValueMap[] = [];
  ackedEventId: number | null = null;

  /** Runs before each request is answered */
  gate: ((request: TransportRequest) => Promise<void> | void) | null = null;

  private readonly outcomes = new Map<string, PushOutcome>();
  private readonly plannedConflicts = new Map<string, { kind: string; remote: ValueMap | null }>();
  private readonly plannedRejections = new Map<string, string>();
  private readonly lockedConflicts = new Set<string>();
  private readonly failures = new Map<string, LedgerError[]>();
  private nextEventId = 1;

  conflictOn(key: string, remote: ValueMap | null, kind = 'both_modified'): this {
    this.plannedConflicts.set(key, { kind, remote });
    return this;
  }

  rejectChange(key: string, reason: string): this {
    this.plannedRejections.set(key, reason);
    return this;
  }

  /** Resolutions for this conflict id are refused */
  lockConflict(conflictId: string): this {
    this.lockedConflicts.add(conflictId);
    return this;
  }

  /** The next request to `path` fails with `error` */
  failNext(path: string, error: LedgerError): this {
    const queue = this.failures.get(path) ?? [];
    queue.push(error);
    this.failures.set(path, queue);
    return this;
  }

  addEvent(entityType: string, recordId: number, data: ValueMap = {}, eventType = 'update'): StoredEvent {
    const event: StoredEvent = { id: this.nextEventId++, entityType, recordId, eventType, data };
    this.events.push(event);
    return event;
  }

  /** Start the event log at `id` */
  setNextEventId(id: number): void {
    this.nextEventId = id;
  }

  calls(path: string): TransportRequest[] {
    return this.requests.filter((request) => request.path === path);
  }

  async request(request: TransportRequest): Promise<Value> {
    this.requests.push(request);
    if (this.gate) await this.gate(request);

    const failure = this.failures.get(request.path)?.shift();
    if (failure) throw failure;

    const body = request.body ?? {};
    const query = request.query ?? {};

    switch (request.path) {
      case '/api/v1/offline-sync/push':
        return this.handlePush(body);
      case '/api/v1/offline-sync/pull':
        return this.handlePull(body);
      case '/api/v1/offline-sync/resolve-conflicts':
        return this.handleResolve(body);
      case '/api/v1/offline-sync/state':
        return {
          device_id: String(query.device_id),
          last_sync_at: null,
          pending_changes: 0,
          metadata: {},
        };
      case '/api/v1/offline-sync/reset':
        return { success: true };
      case '/api/v1/offline-sync/health':
        return { status: 'healthy', version: '1.4.0' };
      case '/api/v1/webhooks/check-updates':
        return this.handleCheckUpdates();
      case '/api/v2/sync/pull':
        return this.handleSmartPull(body);
      case '/api/v2/sync/ack':
        this.ackedEventId = asNumber(body.last_event_id);
        return { success: true, last_event_id: this.ackedEventId };
      case '/api/v2/sync/state':
        return {
          user_id: String(query.user_id),
          device_id: String(query.device_id),
          last_event_id: this.ackedEventId,
          last_sync_at: null,
          sync_count: 0,
          status: 'active',
        };
      case '/api/v2/sync/reset':
        this.ackedEventId = null;
        return { success: true };
      case '/api/v2/sync/health':
        return { status: 'healthy', healthy: true, version: '2.0.0' };
      default:
        throw new NotFoundError(`No route for ${request.path}`);
    }
  }

  private handlePush(body: ValueMap): Value {
    const successful: string[] = [];
    const failed: ValueMap[] = [];
    const conflicts: ValueMap[] = [];

    const changes = isValueMap(body.changes) ? body.changes : {};
    for (const [entityType, list] of Object.entries(changes)) {
      for (const change of asList(list)) {
        if (!isValueMap(change)) continue;
        const key = asString(change.idempotency_key);
        if (key === null) continue;

        const outcome = this.outcomes.get(key) ?? this.decide(key, entityType, change);
        this.outcomes.set(key, outcome);

        switch (outcome.type) {
          case 'success':
            successful.push(key);
            break;
          case 'failed':
            failed.push({ idempotency_key: key, reason: outcome.reason });
            break;
          case 'conflict':
            conflicts.push({
              conflict_id: `c-${key}`,
              idempotency_key: key,
              kind: outcome.kind,
              remote_payload: outcome.remote,
            });
            break;
        }
      }
    }

    return { successful, failed, conflicts };
  }

  private decide(key: string, entityType: string, change: ValueMap): PushOutcome {
    const rejection = this.plannedRejections.get(key);
    if (rejection !== undefined) return { type: 'failed', reason: rejection };

    const conflict = this.plannedConflicts.get(key);
    if (conflict) return { type: 'conflict', ...conflict };

    this.effects.set(key, (this.effects.get(key) ?? 0) + 1);
    const values = isValueMap(change.values) ? change.values : {};
    (this.records[entityType] ??= []).push({ ...values });
    return { type: 'success' };
  }

  private handlePull(body: ValueMap): Value {
    const models = asList(body.models).filter((model): model is string => typeof model === 'string');
    const data: Record<string, Value> = {};
    let total = 0;
    for (const [entityType, records] of Object.entries(this.records)) {
      if (models.length > 0 && !models.includes(entityType)) continue;
      data[entityType] = records;
      total += records.length;
    }
    return { data, total_records: total, synced_at: '2026-03-01T08:00:00.000Z' };
  }

  private handleResolve(body: ValueMap): Value {
    const resolved: string[] = [];
    const failed: ValueMap[] = [];
    for (const entry of asList(body.resolutions)) {
      if (!isValueMap(entry)) continue;
      this.resolutions.push(entry);
      const id = asString(entry.conflict_id) ?? '';
      if (this.lockedConflicts.has(id)) {
        failed.push({ conflict_id: id, reason: 'Record is locked' });
      } else {
        resolved.push(id);
      }
    }
    return { resolved, failed };
  }

  private handleCheckUpdates(): Value {
    const after = this.ackedEventId ?? 0;
    const pending = this.events.filter((event) => event.id > after);
    const last = this.events[this.events.length - 1];
    return {
      has_updates: pending.length > 0,
      pending_events: pending.length,
      last_event_id: last === undefined ? null : last.id,
    };
  }

  private handleSmartPull(body: ValueMap): Value {
    const after = asNumber(body.last_event_id) ?? 0;
    const limit = asNumber(body.limit) ?? 100;
    const pending = this.events.filter((event) => event.id > after);
    const page = pending.slice(0, limit);
    const last = page[page.length - 1];

    return {
      has_updates: page.length > 0,
      new_events_count: pending.length,
      events: page.map((event) => ({
        id: event.id,
        event_type: event.eventType,
        entity_type: event.entityType,
        record_id: event.recordId,
        data: event.data,
        created_at: '2026-03-01T08:00:00.000Z',
      })),
      next_sync_token: last === undefined ? null : `token-${last.id}`,
      last_sync_time: '2026-03-01T08:00:00.000Z',
    };
  }
}
