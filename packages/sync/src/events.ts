import type { LedgerError } from '@ledgerlink/core';
import { Subject, filter, takeUntil, type Observable } from 'rxjs';

/**
 * Lifecycle notifications of the sync layer
 */
export type SyncEventType =
  | 'sync.started'
  | 'sync.completed'
  | 'sync.failed'
  | 'sync.cancelled'
  | 'sync.push.completed'
  | 'sync.conflict.detected'
  | 'sync.conflict.resolved'
  | 'sync.state.reset'
  | 'updates.available';

export interface SyncLifecycleEvent {
  type: SyncEventType;
  /** Epoch ms */
  timestamp: number;
  userId: string | null;
  deviceId: string | null;
  data: Record<string, unknown>;
  /** Set on `sync.failed` */
  error?: LedgerError;
}

export interface EmitOptions {
  userId?: string;
  deviceId?: string;
  error?: LedgerError;
}

/**
 * Event sink for sync lifecycle notifications, shared by every component of
 * a client.
 *
 * @example
 * ```typescript
 * events.on('sync.failed').subscribe((event) => {
 *   console.error(event.error?.format());
 * });
 * ```
 */
export class SyncEventBus {
  private readonly events$ = new Subject<SyncLifecycleEvent>();
  private readonly destroy$ = new Subject<void>();
  private readonly counts = new Map<SyncEventType, number>();

  constructor(private readonly now: () => number = Date.now) {}

  emit(type: SyncEventType, data: Record<string, unknown> = {}, options: EmitOptions = {}): void {
    this.counts.set(type, (this.counts.get(type) ?? 0) + 1);

    const event: SyncLifecycleEvent = {
      type,
      timestamp: this.now(),
      userId: options.userId ?? null,
      deviceId: options.deviceId ?? null,
      data,
    };
    if (options.error) event.error = options.error;
    this.events$.next(event);
  }

  /**
   * Every event
   */
  get events(): Observable<SyncLifecycleEvent> {
    return this.events$.asObservable().pipe(takeUntil(this.destroy$));
  }

  /**
   * Events of one type
   */
  on(type: SyncEventType): Observable<SyncLifecycleEvent> {
    return this.events.pipe(filter((event) => event.type === type));
  }

  /**
   * Number of events emitted per type since creation
   */
  getCount(type: SyncEventType): number {
    return this.counts.get(type) ?? 0;
  }

  getCounts(): Partial<Record<SyncEventType, number>> {
    const counts: Partial<Record<SyncEventType, number>> = {};
    for (const [type, count] of this.counts) counts[type] = count;
    return counts;
  }

  destroy(): void {
    this.destroy$.next();
    this.destroy$.complete();
    this.events$.complete();
  }
}
