import {
  LedgerError,
  ensureLedgerError,
  resolveLogger,
  type Logger,
  type LoggerInput,
} from '@ledgerlink/core';
import type { SyncApi } from './api.js';
import type { SyncEventBus } from './events.js';
import type { SyncStateStore } from './state-store.js';
import type {
  Conflict,
  ConflictResolutionRequest,
  Resolution,
  ResolutionFailure,
  ResolutionResult,
} from './types.js';

export interface ConflictResolverConfig {
  api: SyncApi;
  state: SyncStateStore;
  deviceId: string;
  /** Resolutions in flight at once (default: 4) */
  concurrency?: number;
  events?: SyncEventBus;
  logger?: LoggerInput;
}

/**
 * Picks a resolution for a conflict, or null to leave it open
 */
export type ResolutionDecider = (conflict: Conflict) => Resolution | null | Promise<Resolution | null>;

type Outcome =
  | { status: 'resolved'; conflictId: string }
  | { status: 'failed'; failure: ResolutionFailure }
  | { status: 'fatal'; error: LedgerError };

const DEFAULT_CONCURRENCY = 4;

/**
 * Submits caller decisions for recorded conflicts.
 *
 * Each conflict is sent on its own so that one rejection never blocks the
 * others; up to `concurrency` submissions run in parallel. A confirmed
 * conflict is removed from the state store together with its pending
 * change. Authorization and cancellation errors are rethrown once every
 * submission has settled; anything else lands in `failed`.
 *
 * @example
 * ```typescript
 * const { resolved, failed } = await resolver.resolve([
 *   { conflictId: 'c-1', resolution: { type: 'keep-remote' } },
 *   { conflictId: 'c-2', resolution: { type: 'merged', payload } },
 * ]);
 * ```
 */
export class ConflictResolver {
  private readonly api: SyncApi;
  private readonly state: SyncStateStore;
  private readonly deviceId: string;
  private readonly concurrency: number;
  private readonly events: SyncEventBus | undefined;
  private readonly logger: Logger;

  constructor(config: ConflictResolverConfig) {
    this.api = config.api;
    this.state = config.state;
    this.deviceId = config.deviceId;
    this.concurrency = Math.max(1, config.concurrency ?? DEFAULT_CONCURRENCY);
    this.events = config.events;
    this.logger = resolveLogger(config.logger, 'ConflictResolver');
  }

  async resolve(
    requests: readonly ConflictResolutionRequest[],
    options: { signal?: AbortSignal } = {}
  ): Promise<ResolutionResult> {
    const seen = new Set<string>();
    const unique = requests.filter((request) => {
      if (seen.has(request.conflictId)) return false;
      seen.add(request.conflictId);
      return true;
    });

    const outcomes: Outcome[] = [];
    const queue = unique.values();
    const worker = async (): Promise<void> => {
      for (const request of queue) {
        outcomes.push(await this.submit(request, options.signal));
      }
    };
    await Promise.all(
      Array.from({ length: Math.min(this.concurrency, unique.length) }, () => worker())
    );

    const fatal = outcomes.find((outcome) => outcome.status === 'fatal');
    if (fatal?.status === 'fatal') {
      throw fatal.error;
    }

    const resolved: string[] = [];
    const failed: ResolutionFailure[] = [];
    for (const outcome of outcomes) {
      if (outcome.status === 'resolved') resolved.push(outcome.conflictId);
      else if (outcome.status === 'failed') failed.push(outcome.failure);
    }
    // Report in request order
    const order = new Map(unique.map((request, index) => [request.conflictId, index]));
    const rank = (id: string): number => order.get(id) ?? 0;
    resolved.sort((a, b) => rank(a) - rank(b));
    failed.sort((a, b) => rank(a.conflictId) - rank(b.conflictId));

    this.logger.info('Conflict resolution finished', {
      resolved: resolved.length,
      failed: failed.length,
    });
    return { resolved, failed };
  }

  /**
   * Ask `decide` about every open conflict and submit the decisions.
   * Conflicts it returns null for stay open.
   */
  async resolveWith(decide: ResolutionDecider, options: { signal?: AbortSignal } = {}): Promise<ResolutionResult> {
    const requests: ConflictResolutionRequest[] = [];
    for (const conflict of await this.state.listConflicts()) {
      const resolution = await decide(conflict);
      if (resolution !== null) {
        requests.push({ conflictId: conflict.id, resolution });
      }
    }
    if (requests.length === 0) {
      return { resolved: [], failed: [] };
    }
    return this.resolve(requests, options);
  }

  /**
   * Never rejects: every error becomes an outcome
   */
  private async submit(request: ConflictResolutionRequest, signal?: AbortSignal): Promise<Outcome> {
    const { conflictId } = request;

    try {
      const conflict = await this.state.getConflict(conflictId);
      if (!conflict) {
        const error = LedgerError.fromCode('LL_Y801', { conflictId });
        return { status: 'failed', failure: { conflictId, reason: error.message } };
      }

      const response = await this.api.resolveConflicts(this.deviceId, [request], { signal });

      if (response.resolved.includes(conflictId)) {
        await this.state.settleConflict(conflictId);
        this.events?.emit(
          'sync.conflict.resolved',
          {
            conflictId,
            entityType: conflict.entityType,
            entityId: conflict.entityId,
            resolution: request.resolution.type,
          },
          { userId: this.state.userId, deviceId: this.state.deviceId }
        );
        return { status: 'resolved', conflictId };
      }

      const rejection = response.failed.find((entry) => entry.conflictId === conflictId);
      return {
        status: 'failed',
        failure: { conflictId, reason: rejection?.reason ?? 'Resolution not confirmed by server' },
      };
    } catch (error) {
      const ledgerError = ensureLedgerError(error);
      if (ledgerError.category === 'authorization' || ledgerError.code === 'LL_Y800') {
        return { status: 'fatal', error: ledgerError };
      }
      this.logger.warn('Conflict resolution failed', { conflictId, code: ledgerError.code });
      return { status: 'failed', failure: { conflictId, reason: ledgerError.message } };
    }
  }
}
