import {
  SyncCancelledError,
  resolveLogger,
  type Logger,
  type LoggerInput,
} from '@ledgerlink/core';
import type { SyncApi } from './api.js';
import type { SyncEventBus } from './events.js';
import type { SyncStateStore } from './state-store.js';
import type {
  PullOptions,
  PullResult,
  SmartPullOptions,
  SmartPullResult,
  SyncCursor,
  SyncEvent,
  UpdateCheck,
} from './types.js';

export interface PullEngineConfig {
  api: SyncApi;
  state: SyncStateStore;
  userId: string;
  deviceId: string;
  /** Sent with smart pulls and update checks */
  appType?: string;
  /** Smart pull page size (default: 100) */
  limit?: number;
  events?: SyncEventBus;
  logger?: LoggerInput;
}

export interface AcknowledgeOptions {
  /** Number of events applied, reported to the server */
  eventsSynced?: number;
  nextSyncToken?: string | null;
  signal?: AbortSignal;
}

/**
 * Applies pulled events durably. The cursor only moves after it resolves.
 */
export type ApplyEvents = (events: SyncEvent[]) => Promise<void> | void;

export interface SyncEventsOptions extends SmartPullOptions {
  /** Upper bound on pull/apply/acknowledge rounds (default: 10) */
  maxRounds?: number;
  /** Checked between steps; stops the drain without applying further pages */
  isCancelled?: () => boolean;
}

export interface SyncEventsResult {
  rounds: number;
  eventsApplied: number;
  lastEventId: number | null;
  /** True when the drain stopped because the server had nothing more */
  drained: boolean;
}

const DEFAULT_LIMIT = 100;
const DEFAULT_MAX_ROUNDS = 10;

/**
 * Batch pulls and cursor-based smart pulls.
 *
 * Neither mode moves the cursor on its own: the caller applies what was
 * pulled and then acknowledges it. A smart pull with nothing new only
 * advances `lastSyncAt`.
 *
 * @example
 * ```typescript
 * const page = await pull.smartPull();
 * if (page.hasUpdates) {
 *   await applyToLocalDb(page.events);
 *   await pull.acknowledgePull(page);
 * }
 * ```
 */
export class PullEngine {
  private readonly api: SyncApi;
  private readonly state: SyncStateStore;
  private readonly userId: string;
  private readonly deviceId: string;
  private readonly appType: string | undefined;
  private readonly limit: number;
  private readonly events: SyncEventBus | undefined;
  private readonly logger: Logger;

  constructor(config: PullEngineConfig) {
    this.api = config.api;
    this.state = config.state;
    this.userId = config.userId;
    this.deviceId = config.deviceId;
    this.appType = config.appType;
    this.limit = config.limit ?? DEFAULT_LIMIT;
    this.events = config.events;
    this.logger = resolveLogger(config.logger, 'PullEngine');
  }

  /**
   * Full records of the given entity types modified since `options.since`
   */
  async pull(options: PullOptions = {}): Promise<PullResult> {
    const result = await this.api.pull({
      deviceId: this.deviceId,
      entityTypes: options.entityTypes,
      since: options.since,
      batchSize: options.batchSize,
      signal: options.signal,
    });
    this.logger.debug('Batch pull completed', {
      entityTypes: Object.keys(result.data).length,
      totalRecords: result.totalRecords,
    });
    return result;
  }

  /**
   * Record that a batch pull was applied
   */
  async acknowledgeBatch(): Promise<SyncCursor> {
    return this.state.touch();
  }

  /**
   * Events after the cursor, oldest first
   */
  async smartPull(options: SmartPullOptions = {}): Promise<SmartPullResult> {
    const cursor = await this.state.getCursor();
    const raw = await this.api.smartPull({
      userId: this.userId,
      deviceId: this.deviceId,
      appType: this.appType,
      entityTypes: options.entityTypes,
      limit: options.limit ?? this.limit,
      lastEventId: cursor.lastEventId,
      signal: options.signal,
    });

    const after = cursor.lastEventId;
    const events = raw.events
      .filter((event) => after === null || event.id > after)
      .sort((a, b) => a.id - b.id);
    const hasUpdates = raw.hasUpdates && events.length > 0;

    if (!hasUpdates) {
      await this.state.touch();
      this.logger.debug('No new events', { lastEventId: after });
    } else {
      this.logger.debug('Smart pull completed', { events: events.length, after });
    }

    return {
      hasUpdates,
      newEventsCount: hasUpdates ? raw.newEventsCount : 0,
      events,
      nextSyncToken: raw.nextSyncToken,
      lastSyncTime: raw.lastSyncTime,
      latestEventId: events.reduce<number | null>(
        (max, event) => (max === null || event.id > max ? event.id : max),
        null
      ),
    };
  }

  /**
   * Confirm that events up to `lastEventId` were applied. Ids at or below the
   * cursor are ignored.
   */
  async acknowledge(lastEventId: number, options: AcknowledgeOptions = {}): Promise<SyncCursor> {
    const cursor = await this.state.getCursor();
    if (cursor.lastEventId !== null && lastEventId <= cursor.lastEventId) {
      return cursor;
    }

    await this.api.acknowledge({
      userId: this.userId,
      deviceId: this.deviceId,
      lastEventId,
      eventsSynced: options.eventsSynced ?? 0,
      signal: options.signal,
    });
    return this.state.advanceCursor(lastEventId, { nextSyncToken: options.nextSyncToken });
  }

  /**
   * Acknowledge everything a smart pull returned
   */
  async acknowledgePull(result: SmartPullResult, options: { signal?: AbortSignal } = {}): Promise<SyncCursor> {
    if (result.latestEventId === null) {
      return this.state.getCursor();
    }
    return this.acknowledge(result.latestEventId, {
      eventsSynced: result.events.length,
      nextSyncToken: result.nextSyncToken,
      signal: options.signal,
    });
  }

  /**
   * Pull, apply and acknowledge pages until the server has nothing more
   */
  async syncEvents(apply: ApplyEvents, options: SyncEventsOptions = {}): Promise<SyncEventsResult> {
    const maxRounds = options.maxRounds ?? DEFAULT_MAX_ROUNDS;
    const isCancelled = options.isCancelled ?? (() => false);
    let rounds = 0;
    let eventsApplied = 0;
    let lastEventId: number | null = null;

    while (rounds < maxRounds) {
      if (isCancelled()) throw new SyncCancelledError('Event sync cancelled', { rounds });

      const page = await this.smartPull(options);
      if (!page.hasUpdates) {
        return { rounds, eventsApplied, lastEventId, drained: true };
      }
      if (isCancelled()) throw new SyncCancelledError('Event sync cancelled', { rounds });

      await apply(page.events);
      await this.acknowledgePull(page, { signal: options.signal });
      rounds++;
      eventsApplied += page.events.length;
      lastEventId = page.latestEventId;
    }

    this.logger.info('Event sync stopped at round limit', { rounds, eventsApplied });
    return { rounds, eventsApplied, lastEventId, drained: false };
  }

  /**
   * Ask whether the server has pending events. Emits `updates.available`
   * when it does.
   */
  async checkUpdates(options: { signal?: AbortSignal } = {}): Promise<UpdateCheck> {
    const check = await this.api.checkUpdates(
      { userId: this.userId, deviceId: this.deviceId, appType: this.appType },
      options
    );
    if (check.hasUpdates) {
      this.events?.emit(
        'updates.available',
        { pendingEvents: check.pendingEvents, lastEventId: check.lastEventId },
        { userId: this.userId, deviceId: this.deviceId }
      );
    }
    return check;
  }
}
