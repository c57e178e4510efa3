import {
  BackoffPolicy,
  ensureLedgerError,
  resolveLogger,
  type LedgerError,
  type Logger,
  type LoggerInput,
} from '@ledgerlink/core';
import { Subject, takeUntil, type Observable } from 'rxjs';

export type ReconnectEvent =
  | { type: 'reconnecting'; attempt: number; delayMs: number }
  | { type: 'connected'; attempts: number }
  | { type: 'gave-up'; attempts: number; error: LedgerError | null };

export interface ReconnectSchedulerConfig {
  /** Opens the connection; rejects when it could not be opened */
  connect: () => Promise<void>;
  /** Attempt `n` waits `baseDelayMs * n` (default: 3000) */
  baseDelayMs?: number;
  /** Attempts before giving up (default: 5) */
  maxAttempts?: number;
  /** Jitter ratio passed to the backoff policy (default: 0) */
  jitter?: number;
  logger?: LoggerInput;
}

const DEFAULT_BASE_DELAY_MS = 3_000;
const DEFAULT_MAX_ATTEMPTS = 5;

/**
 * Reconnect loop for long-lived streams (live positions, event streams).
 *
 * Call {@link ReconnectScheduler.scheduleReconnect} when the connection
 * drops. Attempts follow the linear backoff policy; a successful `connect`
 * resets it, and after `maxAttempts` failures the scheduler gives up until
 * the next drop.
 *
 * @example
 * ```typescript
 * const reconnect = new ReconnectScheduler({ connect: () => stream.open() });
 * stream.onClose(() => reconnect.scheduleReconnect());
 *
 * reconnect.events$.subscribe((event) => {
 *   if (event.type === 'gave-up') showOfflineBanner();
 * });
 * ```
 */
export class ReconnectScheduler {
  private readonly connectFn: () => Promise<void>;
  private readonly backoff: BackoffPolicy;
  private readonly logger: Logger;

  private readonly event$ = new Subject<ReconnectEvent>();
  private readonly destroy$ = new Subject<void>();

  private timer: ReturnType<typeof setTimeout> | null = null;
  private connecting = false;
  private destroyed = false;

  constructor(config: ReconnectSchedulerConfig) {
    this.connectFn = config.connect;
    this.backoff = new BackoffPolicy({
      baseDelayMs: config.baseDelayMs ?? DEFAULT_BASE_DELAY_MS,
      maxAttempts: config.maxAttempts ?? DEFAULT_MAX_ATTEMPTS,
      jitter: config.jitter,
    });
    this.logger = resolveLogger(config.logger, 'ReconnectScheduler');
  }

  get events$(): Observable<ReconnectEvent> {
    return this.event$.asObservable().pipe(takeUntil(this.destroy$));
  }

  /** Attempts made since the last successful connection */
  get attempts(): number {
    return this.backoff.attempts;
  }

  /** Whether an attempt is waiting or running */
  get pending(): boolean {
    return this.timer !== null || this.connecting;
  }

  /**
   * Schedule the next attempt. Returns false when one is already pending or
   * the attempts are used up.
   */
  scheduleReconnect(cause?: unknown): boolean {
    if (this.destroyed || this.pending) return false;

    const delayMs = this.backoff.nextDelay();
    if (delayMs === null) {
      const attempts = this.backoff.attempts;
      this.backoff.reset();
      this.logger.warn('Giving up reconnecting', { attempts });
      this.event$.next({
        type: 'gave-up',
        attempts,
        error: cause === undefined ? null : ensureLedgerError(cause),
      });
      return false;
    }

    const attempt = this.backoff.attempts;
    this.logger.info('Reconnecting', { attempt, delayMs });
    this.event$.next({ type: 'reconnecting', attempt, delayMs });
    this.timer = setTimeout(() => {
      this.timer = null;
      this.runAttempt();
    }, delayMs);
    return true;
  }

  /**
   * Report a connection opened outside the scheduler
   */
  markConnected(): void {
    const attempts = this.backoff.attempts;
    this.cancel();
    this.backoff.reset();
    this.event$.next({ type: 'connected', attempts });
  }

  /**
   * Drop a waiting attempt
   */
  cancel(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  destroy(): void {
    this.destroyed = true;
    this.cancel();
    this.destroy$.next();
    this.destroy$.complete();
    this.event$.complete();
  }

  private runAttempt(): void {
    this.connecting = true;
    this.connectFn().then(
      () => {
        this.connecting = false;
        if (!this.destroyed) this.markConnected();
      },
      (error: unknown) => {
        this.connecting = false;
        this.logger.debug('Reconnect attempt failed', {
          attempt: this.backoff.attempts,
          message: ensureLedgerError(error).message,
        });
        this.scheduleReconnect(error);
      }
    );
  }
}
