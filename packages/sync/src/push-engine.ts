import {
  SyncCancelledError,
  resolveLogger,
  type Logger,
  type LoggerInput,
} from '@ledgerlink/core';
import type { RawPushResponse, SyncApi } from './api.js';
import type { SyncStateStore } from './state-store.js';
import type { Conflict, FailedChange, PendingChange, PushResult } from './types.js';

export interface PushEngineConfig {
  api: SyncApi;
  state: SyncStateStore;
  deviceId: string;
  now?: () => number;
  logger?: LoggerInput;
}

export interface PushOptions {
  /** Aborts the request; the outbox is untouched unless a response was observed */
  signal?: AbortSignal;
}

/**
 * Drains the outbox in one request and applies the server's partition.
 *
 * - `successful` and `failed` keys leave the outbox. Failures are reported,
 *   never retried.
 * - Conflicts are recorded and their changes stay in the outbox; they are
 *   held back from later pushes until resolved.
 * - Keys the response does not mention stay in the outbox for the next push.
 *
 * A transport error or a cancellation before the response was observed
 * leaves the outbox exactly as it was. Retrying is safe because every change
 * keeps its idempotency key.
 */
export class PushEngine {
  private readonly api: SyncApi;
  private readonly state: SyncStateStore;
  private readonly deviceId: string;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(config: PushEngineConfig) {
    this.api = config.api;
    this.state = config.state;
    this.deviceId = config.deviceId;
    this.now = config.now ?? Date.now;
    this.logger = resolveLogger(config.logger, 'PushEngine');
  }

  async push(options: PushOptions = {}): Promise<PushResult> {
    const [outbox, open] = await Promise.all([this.state.listOutbox(), this.state.listConflicts()]);
    const conflicted = new Set(open.map((conflict) => conflict.idempotencyKey));
    const batch = outbox.filter((change) => !conflicted.has(change.idempotencyKey));
    const heldBack = outbox.length - batch.length;

    if (batch.length === 0) {
      return { successful: [], failed: [], conflicts: [], heldBack };
    }
    if (options.signal?.aborted) {
      throw new SyncCancelledError('Push cancelled before it was sent', {
        pending: batch.length,
      });
    }

    this.logger.debug('Pushing changes', { count: batch.length, heldBack });
    const response = await this.api.push({
      deviceId: this.deviceId,
      changes: batch,
      timestamp: this.now(),
      signal: options.signal,
    });

    // The response has been observed: its partition is committed even if the
    // caller cancels from here on.
    return this.apply(batch, response, heldBack);
  }

  private async apply(
    batch: readonly PendingChange[],
    response: RawPushResponse,
    heldBack: number
  ): Promise<PushResult> {
    const byKey = new Map(batch.map((change) => [change.idempotencyKey, change]));
    const settled = new Set<string>();
    const unknown: string[] = [];

    const successful: string[] = [];
    for (const key of response.successful) {
      if (!byKey.has(key)) {
        unknown.push(key);
      } else if (!settled.has(key)) {
        settled.add(key);
        successful.push(key);
      }
    }

    const failed: FailedChange[] = [];
    for (const entry of response.failed) {
      const change = byKey.get(entry.idempotencyKey);
      if (!change) {
        unknown.push(entry.idempotencyKey);
      } else if (!settled.has(entry.idempotencyKey)) {
        settled.add(entry.idempotencyKey);
        failed.push({
          idempotencyKey: change.idempotencyKey,
          entityType: change.entityType,
          entityId: change.entityId,
          operation: change.operation,
          values: change.values,
          reason: entry.reason,
        });
      }
    }

    const conflicts: Conflict[] = [];
    for (const raw of response.conflicts) {
      const change = byKey.get(raw.idempotencyKey);
      if (!change) {
        unknown.push(raw.idempotencyKey);
        continue;
      }
      if (settled.has(raw.idempotencyKey)) continue;
      settled.add(raw.idempotencyKey);
      conflicts.push({
        id: raw.conflictId ?? change.idempotencyKey,
        idempotencyKey: change.idempotencyKey,
        entityType: change.entityType,
        entityId: change.entityId,
        kind: raw.kind,
        localPayload: change.values,
        remotePayload: raw.remotePayload,
        detectedAt: this.now(),
      });
    }

    if (unknown.length > 0) {
      this.logger.warn('Push response referenced unknown changes', { keys: unknown });
    }

    await this.state.removeFromOutbox([
      ...successful,
      ...failed.map((entry) => entry.idempotencyKey),
    ]);
    await this.state.recordConflicts(conflicts);

    if (failed.length > 0) {
      this.logger.warn('Changes rejected by server', {
        failed: failed.map((entry) => ({ key: entry.idempotencyKey, entityType: entry.entityType })),
      });
    }
    this.logger.info('Push completed', {
      successful: successful.length,
      failed: failed.length,
      conflicts: conflicts.length,
      unanswered: batch.length - settled.size,
    });

    return { successful, failed, conflicts, heldBack };
  }
}
