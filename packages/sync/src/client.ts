import {
  ValidationError,
  createHttpTransport,
  resolveLogger,
  type Endpoints,
  type KeyValueStore,
  type Logger,
  type LoggerInput,
  type Transport,
} from '@ledgerlink/core';
import { MemoryInvalidFieldCache, RecordQueryClient, type InvalidFieldCache } from '@ledgerlink/field-fallback';
import { z } from 'zod';
import { SyncApi } from './api.js';
import { ConflictResolver, type ResolutionDecider } from './conflict-resolver.js';
import { SyncEventBus } from './events.js';
import { SyncOrchestrator } from './orchestrator.js';
import { PullEngine, type ApplyEvents } from './pull-engine.js';
import { PushEngine } from './push-engine.js';
import { SyncStateStore } from './state-store.js';

export interface SyncClientConfig {
  /** Ready transport; wins over `baseUrl` */
  transport?: Transport;
  /** Backend origin for the built-in HTTP transport */
  baseUrl?: string;
  authToken?: string;
  getAuthToken?: () => string | null | undefined | Promise<string | null | undefined>;
  /** Request timeout in ms (default: 30000) */
  timeoutMs?: number;
  endpoints?: Partial<Endpoints>;
  /** Durable store for cursor, outbox and conflicts */
  store: KeyValueStore;
  /** Applies pulled events to local storage */
  applyEvents: ApplyEvents;
  decideConflict?: ResolutionDecider;
  /** Default device id (default: 'default') */
  deviceId?: string;
  /** Sent with smart pulls and update checks (default: 'mobile_app') */
  appType?: string;
  /** Smart pull page size (default: 100) */
  smartPullLimit?: number;
  /** Event pages per cycle (default: 10) */
  maxPullRounds?: number;
  /** Periodic update check interval in ms (default: 300000) */
  checkIntervalMs?: number;
  /** Parallel conflict resolutions (default: 4) */
  resolutionConcurrency?: number;
  /** Invalid-field cache shared by record queries */
  fieldCache?: InvalidFieldCache;
  logger?: LoggerInput;
}

const syncClientOptionsSchema = z.object({
  baseUrl: z.string().url().optional(),
  timeoutMs: z.number().int().positive().optional(),
  deviceId: z.string().min(1).optional(),
  appType: z.string().min(1).optional(),
  smartPullLimit: z.number().int().positive().optional(),
  maxPullRounds: z.number().int().positive().optional(),
  checkIntervalMs: z.number().int().positive().optional(),
  resolutionConcurrency: z.number().int().positive().optional(),
});

const DEFAULT_DEVICE_ID = 'default';
const DEFAULT_APP_TYPE = 'mobile_app';

/**
 * Entry point: one transport, one event bus and one record query client,
 * plus a sync orchestrator per (user, device) pair.
 *
 * @example
 * ```typescript
 * const client = createSyncClient({
 *   baseUrl: 'https://erp.example.com',
 *   getAuthToken: () => session.accessToken,
 *   store: createMemoryStore(),
 *   applyEvents: (events) => localDb.apply(events),
 * });
 *
 * const sync = client.forUser('7', 'tablet-1');
 * await sync.stage({ entityType: 'task', operation: 'create', values: { title: 'A' } });
 * await sync.sync();
 * ```
 */
export class SyncClient {
  readonly api: SyncApi;
  readonly events: SyncEventBus;
  readonly records: RecordQueryClient;
  readonly deviceId: string;
  readonly appType: string;

  private readonly config: SyncClientConfig;
  private readonly logger: Logger;
  private readonly orchestrators = new Map<string, SyncOrchestrator>();

  constructor(config: SyncClientConfig) {
    const options = syncClientOptionsSchema.safeParse({
      baseUrl: config.baseUrl,
      timeoutMs: config.timeoutMs,
      deviceId: config.deviceId,
      appType: config.appType,
      smartPullLimit: config.smartPullLimit,
      maxPullRounds: config.maxPullRounds,
      checkIntervalMs: config.checkIntervalMs,
      resolutionConcurrency: config.resolutionConcurrency,
    });
    if (!options.success) {
      throw new ValidationError('LL_V304', 'Invalid sync client configuration', {
        issues: options.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }

    this.config = config;
    this.logger = resolveLogger(config.logger, 'SyncClient');
    this.deviceId = config.deviceId ?? DEFAULT_DEVICE_ID;
    this.appType = config.appType ?? DEFAULT_APP_TYPE;
    this.events = new SyncEventBus();

    const transport = config.transport ?? this.createTransport(config);
    this.api = new SyncApi({ transport, endpoints: config.endpoints });
    this.records = new RecordQueryClient({
      transport,
      endpoints: config.endpoints,
      cache: config.fieldCache ?? new MemoryInvalidFieldCache(),
      logger: config.logger,
    });
  }

  /**
   * Orchestrator for a (user, device) pair. Repeated calls return the same
   * instance, so cycles for one pair never overlap.
   */
  forUser(userId: string, deviceId: string = this.deviceId): SyncOrchestrator {
    const key = `${userId}\u0000${deviceId}`;
    const existing = this.orchestrators.get(key);
    if (existing) return existing;

    const { config } = this;
    const state = new SyncStateStore({ store: config.store, userId, deviceId, logger: config.logger });
    const orchestrator = new SyncOrchestrator({
      userId,
      deviceId,
      api: this.api,
      state,
      push: new PushEngine({ api: this.api, state, deviceId, logger: config.logger }),
      pull: new PullEngine({
        api: this.api,
        state,
        userId,
        deviceId,
        appType: this.appType,
        limit: config.smartPullLimit,
        events: this.events,
        logger: config.logger,
      }),
      resolver: new ConflictResolver({
        api: this.api,
        state,
        deviceId,
        concurrency: config.resolutionConcurrency,
        events: this.events,
        logger: config.logger,
      }),
      events: this.events,
      applyEvents: config.applyEvents,
      decideConflict: config.decideConflict,
      maxPullRounds: config.maxPullRounds,
      checkIntervalMs: config.checkIntervalMs,
      logger: config.logger,
    });

    this.orchestrators.set(key, orchestrator);
    this.logger.debug('Created orchestrator', { userId, deviceId });
    return orchestrator;
  }

  destroy(): void {
    for (const orchestrator of this.orchestrators.values()) {
      orchestrator.destroy();
    }
    this.orchestrators.clear();
    this.events.destroy();
  }

  private createTransport(config: SyncClientConfig): Transport {
    if (config.baseUrl === undefined) {
      throw new ValidationError('LL_V304', 'Either transport or baseUrl is required');
    }
    return createHttpTransport({
      baseUrl: config.baseUrl,
      authToken: config.authToken,
      getAuthToken: config.getAuthToken,
      timeoutMs: config.timeoutMs,
      logger: config.logger,
    });
  }
}

/**
 * Creates a sync client
 */
export function createSyncClient(config: SyncClientConfig): SyncClient {
  return new SyncClient(config);
}
