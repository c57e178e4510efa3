import { randomUUID } from 'node:crypto';
import {
  LedgerError,
  Mutex,
  StorageError,
  ValidationError,
  resolveLogger,
  valueMapSchema,
  type KeyValueStore,
  type Logger,
  type LoggerInput,
} from '@ledgerlink/core';
import { z } from 'zod';
import type { Conflict, PendingChange, StageChangeInput, SyncCursor } from './types.js';

export interface SyncStateStoreConfig {
  store: KeyValueStore;
  userId: string;
  deviceId: string;
  /** Clock in epoch ms */
  now?: () => number;
  /** Idempotency key generator */
  generateKey?: () => string;
  logger?: LoggerInput;
}

const entityIdSchema = z.union([z.number(), z.string()]);

const persistedCursorSchema = z.object({
  lastEventId: z.number().int().nullable(),
  lastSyncAt: z.number().nullable(),
  nextSyncToken: z.string().nullable(),
});

type PersistedCursor = z.infer<typeof persistedCursorSchema>;

const pendingChangeSchema = z.object({
  idempotencyKey: z.string().min(1),
  entityType: z.string().min(1),
  entityId: entityIdSchema,
  operation: z.enum(['create', 'update', 'delete']),
  values: valueMapSchema,
  stagedAt: z.number(),
});

const conflictSchema = z.object({
  id: z.string().min(1),
  idempotencyKey: z.string().min(1),
  entityType: z.string().min(1),
  entityId: entityIdSchema,
  kind: z.enum(['both-modified', 'remote-deleted', 'unknown']),
  localPayload: valueMapSchema,
  remotePayload: valueMapSchema.nullable(),
  detectedAt: z.number(),
});

const outboxSchema = z.array(pendingChangeSchema);
const conflictsSchema = z.array(conflictSchema);
const temporaryIdSchema = z.number().int().nonpositive();

const EMPTY_CURSOR: PersistedCursor = {
  lastEventId: null,
  lastSyncAt: null,
  nextSyncToken: null,
};

/**
 * Durable sync state for one (user, device) pair: the cursor, the outbox of
 * pending changes and the open conflicts.
 *
 * Every write runs under one mutex, so concurrent callers (a sync cycle and
 * parallel conflict resolutions) never interleave read-modify-write steps.
 * Everything read back from the store is validated; corrupt state raises
 * `LL_S701`.
 *
 * @example
 * ```typescript
 * const state = new SyncStateStore({ store, userId: '7', deviceId: 'tablet-1' });
 *
 * const change = await state.stage({
 *   entityType: 'task',
 *   operation: 'create',
 *   values: { title: 'Inspect pump' },
 * });
 * ```
 */
export class SyncStateStore {
  readonly userId: string;
  readonly deviceId: string;

  private readonly store: KeyValueStore;
  private readonly now: () => number;
  private readonly generateKey: () => string;
  private readonly logger: Logger;
  private readonly mutex = new Mutex();
  private readonly prefix: string;

  constructor(config: SyncStateStoreConfig) {
    this.store = config.store;
    this.userId = config.userId;
    this.deviceId = config.deviceId;
    this.now = config.now ?? Date.now;
    this.generateKey = config.generateKey ?? randomUUID;
    this.logger = resolveLogger(config.logger, 'SyncStateStore');
    this.prefix = `ledgerlink:sync:${config.userId}:${config.deviceId}`;
  }

  // Cursor

  async getCursor(): Promise<SyncCursor> {
    const [cursor, outbox] = await Promise.all([this.loadCursor(), this.loadOutbox()]);
    return this.toCursor(cursor, outbox.length);
  }

  /**
   * Move `lastEventId` forward to `eventId`. Smaller ids leave it where it
   * is; `lastSyncAt` advances either way.
   */
  async advanceCursor(eventId: number, update: { nextSyncToken?: string | null } = {}): Promise<SyncCursor> {
    return this.mutex.runExclusive(async () => {
      const cursor = await this.loadCursor();
      const next: PersistedCursor = {
        lastEventId: Math.max(cursor.lastEventId ?? eventId, eventId),
        lastSyncAt: this.now(),
        nextSyncToken:
          update.nextSyncToken === undefined ? cursor.nextSyncToken : update.nextSyncToken,
      };
      await this.store.set(this.key('cursor'), next);

      if (cursor.lastEventId !== null && eventId < cursor.lastEventId) {
        this.logger.debug('Ignored cursor move backwards', {
          current: cursor.lastEventId,
          requested: eventId,
        });
      }
      return this.toCursor(next, (await this.loadOutbox()).length);
    });
  }

  /**
   * Advance `lastSyncAt` only
   */
  async touch(): Promise<SyncCursor> {
    return this.mutex.runExclusive(async () => {
      const cursor = await this.loadCursor();
      const next: PersistedCursor = { ...cursor, lastSyncAt: this.now() };
      await this.store.set(this.key('cursor'), next);
      return this.toCursor(next, (await this.loadOutbox()).length);
    });
  }

  /**
   * Zero the cursor and discard the conflict history. The outbox is kept:
   * staged work is never lost by a reset.
   */
  async resetCursor(): Promise<SyncCursor> {
    return this.mutex.runExclusive(async () => {
      await this.store.set(this.key('cursor'), EMPTY_CURSOR);
      await this.store.delete(this.key('conflicts'));
      this.logger.info('Sync state reset', { userId: this.userId, deviceId: this.deviceId });
      return this.toCursor(EMPTY_CURSOR, (await this.loadOutbox()).length);
    });
  }

  // Outbox

  async stage(input: StageChangeInput): Promise<PendingChange> {
    const values = valueMapSchema.safeParse(input.values ?? {});
    if (!values.success) {
      throw new ValidationError('LL_V303', 'Staged values must be JSON-compatible', {
        entityType: input.entityType,
      });
    }
    if (input.entityId === undefined && input.operation !== 'create') {
      throw new ValidationError('LL_V303', `An entity id is required to ${input.operation} a record`, {
        entityType: input.entityType,
      });
    }

    return this.mutex.runExclusive(async () => {
      const outbox = await this.loadOutbox();
      const idempotencyKey = input.idempotencyKey ?? this.generateKey();

      if (outbox.some((change) => change.idempotencyKey === idempotencyKey)) {
        throw new LedgerError({
          code: 'LL_Y802',
          message: `Idempotency key "${idempotencyKey}" is already staged`,
          context: { idempotencyKey, entityType: input.entityType },
        });
      }

      const change: PendingChange = {
        idempotencyKey,
        entityType: input.entityType,
        entityId: input.entityId ?? (await this.allocateTemporaryId()),
        operation: input.operation,
        values: values.data,
        stagedAt: this.now(),
      };
      await this.store.set(this.key('outbox'), [...outbox, change]);

      this.logger.debug('Change staged', {
        idempotencyKey,
        entityType: change.entityType,
        operation: change.operation,
      });
      return change;
    });
  }

  /**
   * Pending changes in staging order
   */
  async listOutbox(): Promise<PendingChange[]> {
    return this.loadOutbox();
  }

  /**
   * Remove changes by idempotency key. Returns how many were removed.
   */
  async removeFromOutbox(keys: Iterable<string>): Promise<number> {
    const remove = new Set(keys);
    if (remove.size === 0) return 0;

    return this.mutex.runExclusive(async () => {
      const outbox = await this.loadOutbox();
      const kept = outbox.filter((change) => !remove.has(change.idempotencyKey));
      if (kept.length !== outbox.length) {
        await this.store.set(this.key('outbox'), kept);
      }
      return outbox.length - kept.length;
    });
  }

  /**
   * Negative id for a record that does not exist on the backend yet
   */
  async nextTemporaryId(): Promise<number> {
    return this.mutex.runExclusive(() => this.allocateTemporaryId());
  }

  // Conflicts

  /**
   * Add conflicts, replacing any with the same id
   */
  async recordConflicts(conflicts: readonly Conflict[]): Promise<void> {
    if (conflicts.length === 0) return;

    await this.mutex.runExclusive(async () => {
      const incoming = new Set(conflicts.map((conflict) => conflict.id));
      const existing = (await this.loadConflicts()).filter((conflict) => !incoming.has(conflict.id));
      await this.store.set(this.key('conflicts'), [...existing, ...conflicts]);
    });
  }

  async listConflicts(): Promise<Conflict[]> {
    return this.loadConflicts();
  }

  async getConflict(id: string): Promise<Conflict | null> {
    return (await this.loadConflicts()).find((conflict) => conflict.id === id) ?? null;
  }

  /**
   * Drop a resolved conflict together with the pending change it held back
   */
  async settleConflict(id: string): Promise<boolean> {
    return this.mutex.runExclusive(async () => {
      const conflicts = await this.loadConflicts();
      const conflict = conflicts.find((entry) => entry.id === id);
      if (!conflict) return false;

      await this.store.set(
        this.key('conflicts'),
        conflicts.filter((entry) => entry.id !== id)
      );
      const outbox = await this.loadOutbox();
      await this.store.set(
        this.key('outbox'),
        outbox.filter((change) => change.idempotencyKey !== conflict.idempotencyKey)
      );
      return true;
    });
  }

  async removeConflict(id: string): Promise<boolean> {
    return this.mutex.runExclusive(async () => {
      const conflicts = await this.loadConflicts();
      const kept = conflicts.filter((conflict) => conflict.id !== id);
      if (kept.length === conflicts.length) return false;
      await this.store.set(this.key('conflicts'), kept);
      return true;
    });
  }

  private async allocateTemporaryId(): Promise<number> {
    const last = await this.load('temp-id', temporaryIdSchema, 0);
    const next = last - 1;
    await this.store.set(this.key('temp-id'), next);
    return next;
  }

  private toCursor(cursor: PersistedCursor, pendingChanges: number): SyncCursor {
    return {
      userId: this.userId,
      deviceId: this.deviceId,
      lastEventId: cursor.lastEventId,
      lastSyncAt: cursor.lastSyncAt,
      pendingChanges,
      nextSyncToken: cursor.nextSyncToken,
    };
  }

  private loadCursor(): Promise<PersistedCursor> {
    return this.load('cursor', persistedCursorSchema, EMPTY_CURSOR);
  }

  private loadOutbox(): Promise<PendingChange[]> {
    return this.load('outbox', outboxSchema, []);
  }

  private loadConflicts(): Promise<Conflict[]> {
    return this.load('conflicts', conflictsSchema, []);
  }

  private async load<T>(
    name: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    fallback: T
  ): Promise<T> {
    const key = this.key(name);
    const raw = await this.store.get(key);
    if (raw === undefined) return fallback;

    const result = schema.safeParse(raw);
    if (!result.success) {
      throw new StorageError('LL_S701', `Persisted ${name} is corrupt`, {
        key,
        issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }
    return result.data;
  }

  private key(name: string): string {
    return `${this.prefix}:${name}`;
  }
}
