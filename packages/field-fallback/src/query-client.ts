import {
  ValidationError,
  resolveEndpoints,
  resolveLogger,
  valueMapSchema,
  valueSchema,
  type Endpoints,
  type Logger,
  type LoggerInput,
  type Transport,
  type Value,
  type ValueMap,
} from '@ledgerlink/core';
import { z } from 'zod';
import { MemoryInvalidFieldCache, type InvalidFieldCache } from './cache.js';
import { defaultInvalidFieldMatcher, type InvalidFieldMatcher } from './matcher.js';
import { FieldPresetRegistry, type FieldPreset } from './presets.js';
import { FieldFallbackStrategy } from './strategy.js';

export interface RecordQueryClientConfig {
  transport: Transport;
  endpoints?: Partial<Endpoints>;
  /** Invalid-field cache shared by every query of this client */
  cache?: InvalidFieldCache;
  matcher?: InvalidFieldMatcher;
  presets?: FieldPresetRegistry;
  logger?: LoggerInput;
}

export interface SearchReadOptions {
  /** Filter expression passed through to the backend */
  domain?: Value[];
  /** Explicit field list; wins over `preset` */
  fields?: string[];
  preset?: FieldPreset;
  limit?: number;
  offset?: number;
  order?: string;
  /** Run the field fallback strategy on invalid field errors (default: true) */
  useFallback?: boolean;
  signal?: AbortSignal;
}

export interface FieldsGetOptions {
  /** Metadata attributes to return per field */
  attributes?: string[];
  signal?: AbortSignal;
}

const searchReadResponseSchema = z.union([
  z.object({ records: z.array(valueMapSchema) }),
  z.object({ result: z.array(valueMapSchema) }),
]);

const fieldsGetResponseSchema = z.object({
  fields: z.record(valueSchema),
});

const DEFAULT_LIMIT = 80;

/**
 * Generic record queries and schema introspection.
 *
 * `searchRead` runs through a {@link FieldFallbackStrategy} unless no field
 * list is requested (preset `all`) or `useFallback` is false. Level 4 of the
 * strategy uses {@link RecordQueryClient.fieldsGet}.
 *
 * @example
 * ```typescript
 * const records = new RecordQueryClient({ transport });
 *
 * const widgets = await records.searchRead('widget', {
 *   domain: [['active', '=', true]],
 *   fields: ['id', 'name', 'color'],
 *   limit: 20,
 * });
 * ```
 */
export class RecordQueryClient {
  readonly cache: InvalidFieldCache;
  readonly presets: FieldPresetRegistry;

  private readonly transport: Transport;
  private readonly endpoints: Endpoints;
  private readonly matcher: InvalidFieldMatcher;
  private readonly loggerInput: LoggerInput | undefined;
  private readonly logger: Logger;

  constructor(config: RecordQueryClientConfig) {
    this.transport = config.transport;
    this.endpoints = resolveEndpoints(config.endpoints);
    this.cache = config.cache ?? new MemoryInvalidFieldCache();
    this.matcher = config.matcher ?? defaultInvalidFieldMatcher;
    this.presets = config.presets ?? new FieldPresetRegistry();
    this.loggerInput = config.logger;
    this.logger = resolveLogger(config.logger, 'RecordQueryClient');
  }

  async searchRead(entityType: string, options: SearchReadOptions = {}): Promise<ValueMap[]> {
    const fields =
      options.fields ??
      (options.preset === undefined ? null : this.presets.resolve(entityType, options.preset));

    if (fields === null || options.useFallback === false) {
      return this.directSearchRead(entityType, fields, options);
    }

    const strategy = new FieldFallbackStrategy({
      entityType,
      cache: this.cache,
      matcher: this.matcher,
      fetchSchema: (type) => this.fieldsGet(type, { signal: options.signal }),
      logger: this.loggerInput,
    });

    const { result } = await strategy.execute(fields, (current) =>
      this.directSearchRead(entityType, current, options)
    );
    return result;
  }

  /**
   * Field name to field metadata for an entity type
   */
  async fieldsGet(entityType: string, options: FieldsGetOptions = {}): Promise<Record<string, Value>> {
    const body: ValueMap = { entity_type: entityType };
    if (options.attributes) body.attributes = options.attributes;

    const response = await this.transport.request({
      method: 'POST',
      path: this.endpoints.fieldsGet,
      body,
      signal: options.signal,
    });

    const parsed = fieldsGetResponseSchema.safeParse(response);
    if (!parsed.success) {
      throw new ValidationError('LL_V301', 'Malformed schema introspection response', {
        entityType,
        issues: parsed.error.issues.map((issue) => issue.message),
      });
    }
    return parsed.data.fields;
  }

  private async directSearchRead(
    entityType: string,
    fields: string[] | null,
    options: SearchReadOptions
  ): Promise<ValueMap[]> {
    const body: ValueMap = {
      entity_type: entityType,
      domain: options.domain ?? [],
      limit: options.limit ?? DEFAULT_LIMIT,
      offset: options.offset ?? 0,
    };
    if (fields !== null) body.fields = fields;
    if (options.order !== undefined) body.order = options.order;

    const response = await this.transport.request({
      method: 'POST',
      path: this.endpoints.searchRead,
      body,
      signal: options.signal,
    });

    const parsed = searchReadResponseSchema.safeParse(response);
    if (!parsed.success) {
      throw new ValidationError('LL_V301', 'Malformed query response', { entityType });
    }
    const records = 'records' in parsed.data ? parsed.data.records : parsed.data.result;
    this.logger.debug('Query completed', { entityType, records: records.length });
    return records;
  }
}
