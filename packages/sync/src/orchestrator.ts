import {
  BackoffPolicy,
  Mutex,
  SyncCancelledError,
  ensureLedgerError,
  resolveLogger,
  type Logger,
  type LoggerInput,
} from '@ledgerlink/core';
import { BehaviorSubject, Subject, takeUntil, type Observable } from 'rxjs';
import type { SyncApi } from './api.js';
import type { ConflictResolver, ResolutionDecider } from './conflict-resolver.js';
import type { SyncEventBus } from './events.js';
import type { ApplyEvents, PullEngine } from './pull-engine.js';
import type { PushEngine } from './push-engine.js';
import type { SyncStateStore } from './state-store.js';
import type {
  Conflict,
  ConflictResolutionRequest,
  PendingChange,
  PushResult,
  RemoteEventState,
  RemoteSyncState,
  ResolutionResult,
  StageChangeInput,
  SyncCursor,
  UpdateCheck,
} from './types.js';

/**
 * Orchestrator state. `failed` is held only until the cycle has been
 * recorded; the orchestrator then returns to `idle`.
 */
export type SyncStatus = 'idle' | 'pushing' | 'pulling' | 'resolving' | 'failed';

export type SyncCycleStatus = 'success' | 'failed' | 'cancelled';

export interface SyncCycleSummary {
  /** Sequence number within this orchestrator */
  id: number;
  status: SyncCycleStatus;
  startedAt: number;
  finishedAt: number;
  durationMs: number;
  pushed: number;
  rejected: number;
  conflicts: number;
  eventsApplied: number;
  resolved: number;
  /** Error message of a failed cycle */
  error: string | null;
}

export interface SyncCycleResult extends SyncCycleSummary {
  push: PushResult | null;
  resolution: ResolutionResult | null;
  /** Conflicts still open after the cycle */
  openConflicts: Conflict[];
}

export interface SyncOrchestratorConfig {
  userId: string;
  deviceId: string;
  api: SyncApi;
  state: SyncStateStore;
  push: PushEngine;
  pull: PullEngine;
  resolver: ConflictResolver;
  events: SyncEventBus;
  /** Applies pulled events to local storage */
  applyEvents: ApplyEvents;
  /** Decides open conflicts during a cycle; without it conflicts wait for the caller */
  decideConflict?: ResolutionDecider;
  /** Upper bound on event pages per cycle (default: 10) */
  maxPullRounds?: number;
  /** Periodic update check interval in ms (default: 300000) */
  checkIntervalMs?: number;
  /** Retry delay unit after a failed periodic check (default: 3000) */
  retryBaseDelayMs?: number;
  /** Failed checks retried before falling back to the interval (default: 5) */
  retryMaxAttempts?: number;
  /** Cycle summaries kept (default: 20) */
  historySize?: number;
  now?: () => number;
  logger?: LoggerInput;
}

export interface SyncOptions {
  /** Aborts in-flight requests */
  signal?: AbortSignal;
}

export interface UpdateCheckResult {
  check: UpdateCheck;
  /** Cycle run because of the check, if any */
  cycle: SyncCycleResult | null;
}

/** Cancellation state of one cycle */
interface CycleToken {
  cancelled: boolean;
  finished: boolean;
}

const DEFAULT_MAX_PULL_ROUNDS = 10;
const DEFAULT_CHECK_INTERVAL_MS = 5 * 60 * 1000;
const DEFAULT_RETRY_BASE_DELAY_MS = 3_000;
const DEFAULT_RETRY_MAX_ATTEMPTS = 5;
const DEFAULT_HISTORY_SIZE = 20;

/**
 * Runs sync cycles for one (user, device) pair: push the outbox, drain the
 * event log, then resolve conflicts when a decider is configured.
 *
 * At most one cycle runs at a time. A `sync()` call while a cycle is in
 * flight joins it and receives the same result. `cancel()` lets the current
 * network call finish, keeps the outbox changes it confirmed, and ends the
 * cycle as `cancelled` before the next phase. Failed cycles emit
 * `sync.failed` and reject with the typed error.
 *
 * @example
 * ```typescript
 * orchestrator.status.subscribe((status) => render(status));
 *
 * await orchestrator.stage({ entityType: 'task', operation: 'create', values: { title: 'A' } });
 * const cycle = await orchestrator.sync();
 *
 * orchestrator.startPeriodicCheck();
 * ```
 */
export class SyncOrchestrator {
  readonly userId: string;
  readonly deviceId: string;

  private readonly api: SyncApi;
  private readonly state: SyncStateStore;
  private readonly pushEngine: PushEngine;
  private readonly pullEngine: PullEngine;
  private readonly resolver: ConflictResolver;
  private readonly events: SyncEventBus;
  private readonly applyEvents: ApplyEvents;
  private readonly decideConflict: ResolutionDecider | undefined;
  private readonly maxPullRounds: number;
  private readonly checkIntervalMs: number;
  private readonly historySize: number;
  private readonly now: () => number;
  private readonly logger: Logger;

  private readonly status$ = new BehaviorSubject<SyncStatus>('idle');
  private readonly destroy$ = new Subject<void>();
  private readonly cycleLock = new Mutex();
  private readonly retryBackoff: BackoffPolicy;
  private readonly history: SyncCycleSummary[] = [];

  private inFlight: Promise<SyncCycleResult> | null = null;
  private currentCycle: CycleToken | null = null;
  private cycleCounter = 0;
  private checkTimer: ReturnType<typeof setTimeout> | null = null;
  private periodicActive = false;
  private destroyed = false;

  constructor(config: SyncOrchestratorConfig) {
    this.userId = config.userId;
    this.deviceId = config.deviceId;
    this.api = config.api;
    this.state = config.state;
    this.pushEngine = config.push;
    this.pullEngine = config.pull;
    this.resolver = config.resolver;
    this.events = config.events;
    this.applyEvents = config.applyEvents;
    this.decideConflict = config.decideConflict;
    this.maxPullRounds = config.maxPullRounds ?? DEFAULT_MAX_PULL_ROUNDS;
    this.checkIntervalMs = config.checkIntervalMs ?? DEFAULT_CHECK_INTERVAL_MS;
    this.historySize = config.historySize ?? DEFAULT_HISTORY_SIZE;
    this.now = config.now ?? Date.now;
    this.logger = resolveLogger(config.logger, 'SyncOrchestrator');
    this.retryBackoff = new BackoffPolicy({
      baseDelayMs: config.retryBaseDelayMs ?? DEFAULT_RETRY_BASE_DELAY_MS,
      maxAttempts: config.retryMaxAttempts ?? DEFAULT_RETRY_MAX_ATTEMPTS,
    });
  }

  // Cycle

  /**
   * Run a cycle, or join the one in flight
   */
  sync(options: SyncOptions = {}): Promise<SyncCycleResult> {
    if (this.destroyed) {
      return Promise.reject(new SyncCancelledError('Orchestrator destroyed'));
    }
    if (this.inFlight) {
      this.logger.debug('Joining sync cycle in flight');
      return this.inFlight;
    }

    const token: CycleToken = { cancelled: false, finished: false };
    const cycle: Promise<SyncCycleResult> = this.cycleLock
      .runExclusive(() => this.runCycle(token, options.signal))
      .finally(() => {
        if (this.inFlight === cycle) {
          this.inFlight = null;
          this.currentCycle = null;
        }
      });
    this.inFlight = cycle;
    this.currentCycle = token;
    return cycle;
  }

  /**
   * Request cancellation of the cycle in flight. Returns false when none is
   * running. The request never carries over to a later cycle.
   */
  cancel(): boolean {
    const token = this.currentCycle;
    if (!token || token.finished) return false;
    token.cancelled = true;
    this.logger.info('Sync cancellation requested');
    return true;
  }

  get isSyncing(): boolean {
    return this.inFlight !== null;
  }

  get status(): Observable<SyncStatus> {
    return this.status$.asObservable().pipe(takeUntil(this.destroy$));
  }

  getStatus(): SyncStatus {
    return this.status$.getValue();
  }

  /**
   * Summaries of recent cycles, oldest first
   */
  getHistory(): SyncCycleSummary[] {
    return [...this.history];
  }

  // Periodic checker

  /**
   * Check for server updates every `checkIntervalMs` and run a cycle when there
   * are updates or outbox changes without an open conflict. Failed checks are
   * retried with linear backoff, then fall back to the interval.
   */
  startPeriodicCheck(): void {
    if (this.periodicActive || this.destroyed) return;
    this.periodicActive = true;
    this.retryBackoff.reset();
    this.scheduleCheck(this.checkIntervalMs);
    this.logger.info('Periodic update check started', { intervalMs: this.checkIntervalMs });
  }

  stopPeriodicCheck(): void {
    this.periodicActive = false;
    if (this.checkTimer !== null) {
      clearTimeout(this.checkTimer);
      this.checkTimer = null;
    }
  }

  get periodicCheckActive(): boolean {
    return this.periodicActive;
  }

  /**
   * One update check, followed by a cycle when needed
   */
  async checkForUpdates(options: SyncOptions = {}): Promise<UpdateCheckResult> {
    const check = await this.pullEngine.checkUpdates(options);
    if (!check.hasUpdates && (await this.countPushable()) === 0) {
      return { check, cycle: null };
    }
    return { check, cycle: await this.sync(options) };
  }

  // State

  stage(input: StageChangeInput): Promise<PendingChange> {
    return this.state.stage(input);
  }

  getCursor(): Promise<SyncCursor> {
    return this.state.getCursor();
  }

  listOutbox(): Promise<PendingChange[]> {
    return this.state.listOutbox();
  }

  listConflicts(): Promise<Conflict[]> {
    return this.state.listConflicts();
  }

  resolveConflicts(
    requests: readonly ConflictResolutionRequest[],
    options: SyncOptions = {}
  ): Promise<ResolutionResult> {
    return this.resolver.resolve(requests, options);
  }

  async getRemoteState(options: SyncOptions = {}): Promise<{ sync: RemoteSyncState; events: RemoteEventState }> {
    const [sync, events] = await Promise.all([
      this.api.getSyncState(this.deviceId, options),
      this.api.getEventState(this.userId, this.deviceId, options),
    ]);
    return { sync, events };
  }

  /**
   * Reset the server's view of this device, then the local cursor and
   * conflict history. The outbox is kept. Waits for a running cycle.
   */
  async reset(options: SyncOptions = {}): Promise<SyncCursor> {
    return this.cycleLock.runExclusive(async () => {
      await this.api.reset(this.deviceId, options);
      await this.api.resetEventState(this.userId, this.deviceId, options);
      const cursor = await this.state.resetCursor();
      this.events.emit('sync.state.reset', { pendingChanges: cursor.pendingChanges }, this.ids());
      return cursor;
    });
  }

  destroy(): void {
    this.stopPeriodicCheck();
    this.cancel();
    this.destroyed = true;
    this.destroy$.next();
    this.destroy$.complete();
    this.status$.complete();
  }

  private async runCycle(token: CycleToken, signal: AbortSignal | undefined): Promise<SyncCycleResult> {
    const id = ++this.cycleCounter;
    const startedAt = this.now();
    this.events.emit('sync.started', { cycle: id }, this.ids());

    let push: PushResult | null = null;
    let eventsApplied = 0;
    let resolution: ResolutionResult | null = null;

    try {
      this.setStatus('pushing');
      push = await this.pushEngine.push({ signal });
      if (push.conflicts.length > 0) {
        this.events.emit(
          'sync.conflict.detected',
          {
            conflicts: push.conflicts.map((conflict) => ({
              id: conflict.id,
              entityType: conflict.entityType,
              entityId: conflict.entityId,
              kind: conflict.kind,
            })),
          },
          this.ids()
        );
      }
      this.events.emit(
        'sync.push.completed',
        {
          successful: push.successful.length,
          failed: push.failed.length,
          conflicts: push.conflicts.length,
          heldBack: push.heldBack,
        },
        this.ids()
      );
      this.throwIfCancelled(token);

      this.setStatus('pulling');
      const drain = await this.pullEngine.syncEvents(this.applyEvents, {
        signal,
        maxRounds: this.maxPullRounds,
        isCancelled: () => token.cancelled,
      });
      eventsApplied = drain.eventsApplied;
      this.throwIfCancelled(token);

      if (this.decideConflict && (await this.state.listConflicts()).length > 0) {
        this.setStatus('resolving');
        resolution = await this.resolver.resolveWith(this.decideConflict, { signal });
      }

      const result = this.record(id, 'success', startedAt, push, eventsApplied, resolution, null);
      const openConflicts = await this.state.listConflicts();
      this.events.emit(
        'sync.completed',
        { cycle: id, eventsApplied, openConflicts: openConflicts.length },
        this.ids()
      );
      this.logger.info('Sync cycle completed', { cycle: id, durationMs: result.durationMs });
      return { ...result, push, resolution, openConflicts };
    } catch (error) {
      const ledgerError = ensureLedgerError(error);

      if (ledgerError.code === 'LL_Y800') {
        const result = this.record(id, 'cancelled', startedAt, push, eventsApplied, resolution, null);
        this.events.emit('sync.cancelled', { cycle: id }, this.ids());
        this.logger.info('Sync cycle cancelled', { cycle: id });
        return { ...result, push, resolution, openConflicts: await this.state.listConflicts() };
      }

      this.setStatus('failed');
      this.record(id, 'failed', startedAt, push, eventsApplied, resolution, ledgerError.message);
      this.events.emit('sync.failed', { cycle: id, code: ledgerError.code }, { ...this.ids(), error: ledgerError });
      this.logger.error('Sync cycle failed', ledgerError, { cycle: id, code: ledgerError.code });
      throw ledgerError;
    } finally {
      token.finished = true;
      this.setStatus('idle');
    }
  }

  private record(
    id: number,
    status: SyncCycleStatus,
    startedAt: number,
    push: PushResult | null,
    eventsApplied: number,
    resolution: ResolutionResult | null,
    error: string | null
  ): SyncCycleSummary {
    const finishedAt = this.now();
    const summary: SyncCycleSummary = {
      id,
      status,
      startedAt,
      finishedAt,
      durationMs: finishedAt - startedAt,
      pushed: push?.successful.length ?? 0,
      rejected: push?.failed.length ?? 0,
      conflicts: push?.conflicts.length ?? 0,
      eventsApplied,
      resolved: resolution?.resolved.length ?? 0,
      error,
    };
    this.history.push(summary);
    if (this.history.length > this.historySize) {
      this.history.splice(0, this.history.length - this.historySize);
    }
    return summary;
  }

  private throwIfCancelled(token: CycleToken): void {
    if (token.cancelled) {
      throw new SyncCancelledError('Sync cycle cancelled');
    }
  }

  private setStatus(status: SyncStatus): void {
    if (this.status$.getValue() !== status) {
      this.status$.next(status);
    }
  }

  private scheduleCheck(delayMs: number): void {
    this.checkTimer = setTimeout(() => {
      this.checkTimer = null;
      void this.runPeriodicCheck().then((nextDelay) => {
        if (this.periodicActive) this.scheduleCheck(nextDelay);
      });
    }, delayMs);
  }

  /**
   * Resolves with the delay until the next check; never rejects
   */
  private async runPeriodicCheck(): Promise<number> {
    try {
      await this.checkForUpdates();
      this.retryBackoff.reset();
      return this.checkIntervalMs;
    } catch (error) {
      const ledgerError = ensureLedgerError(error);
      const delay = this.retryBackoff.nextDelay();
      this.logger.warn('Periodic update check failed', {
        code: ledgerError.code,
        retryInMs: delay ?? this.checkIntervalMs,
      });
      if (delay === null) {
        this.retryBackoff.reset();
        return this.checkIntervalMs;
      }
      return delay;
    }
  }

  /**
   * Outbox changes a push would send: those without an open conflict
   */
  private async countPushable(): Promise<number> {
    const [outbox, open] = await Promise.all([this.state.listOutbox(), this.state.listConflicts()]);
    const conflicted = new Set(open.map((conflict) => conflict.idempotencyKey));
    return outbox.filter((change) => !conflicted.has(change.idempotencyKey)).length;
  }

  private ids(): { userId: string; deviceId: string } {
    return { userId: this.userId, deviceId: this.deviceId };
  }
}
