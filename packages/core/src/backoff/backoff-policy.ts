/**
 * Backoff policy configuration
 */
export interface BackoffConfig {
  /** Delay unit in ms; attempt `n` waits `baseDelayMs * n` */
  baseDelayMs: number;
  /** Number of attempts before the policy reports exhaustion */
  maxAttempts: number;
  /**
   * Symmetric jitter as a fraction of the delay (0 disables it). A ratio of
   * 0.2 spreads each delay over [0.8d, 1.2d], so the expected delay stays
   * `baseDelayMs * n`.
   */
  jitter?: number;
  /** Random source in [0, 1), replaceable in tests */
  random?: () => number;
}

/**
 * Linear backoff: `baseDelayMs * attempt`, attempts counted from 1.
 */
export function linearBackoff(baseDelayMs: number, attempt: number): number {
  if (attempt < 1) return 0;
  return baseDelayMs * attempt;
}

/**
 * Attempt counter over {@link linearBackoff}.
 *
 * Used by the transport retry loop, the periodic update checker and the
 * reconnect scheduler. Call {@link BackoffPolicy.reset} after any success.
 *
 * @example
 * ```typescript
 * const backoff = new BackoffPolicy({ baseDelayMs: 3000, maxAttempts: 5 });
 *
 * const delay = backoff.nextDelay(); // 3000
 * if (delay === null) giveUp();
 * ```
 */
export class BackoffPolicy {
  private readonly config: Required<BackoffConfig>;
  private attempt = 0;

  constructor(config: BackoffConfig) {
    this.config = {
      baseDelayMs: config.baseDelayMs,
      maxAttempts: config.maxAttempts,
      jitter: Math.min(Math.max(config.jitter ?? 0, 0), 1),
      random: config.random ?? Math.random,
    };
  }

  /** Attempts consumed since the last reset */
  get attempts(): number {
    return this.attempt;
  }

  get maxAttempts(): number {
    return this.config.maxAttempts;
  }

  get exhausted(): boolean {
    return this.attempt >= this.config.maxAttempts;
  }

  /**
   * Delay for a given attempt number, without jitter
   */
  delayFor(attempt: number): number {
    return linearBackoff(this.config.baseDelayMs, attempt);
  }

  /**
   * Consume one attempt and return its delay, or null once `maxAttempts`
   * attempts have been handed out.
   */
  nextDelay(): number | null {
    if (this.exhausted) return null;
    this.attempt++;
    return this.applyJitter(this.delayFor(this.attempt));
  }

  reset(): void {
    this.attempt = 0;
  }

  private applyJitter(delay: number): number {
    const { jitter, random } = this.config;
    if (jitter === 0) return delay;
    const spread = delay * jitter;
    return Math.round(delay - spread + random() * 2 * spread);
  }
}
