import {
  FallbackExhaustedError,
  LedgerError,
  resolveLogger,
  toError,
  type Logger,
  type LoggerInput,
} from '@ledgerlink/core';
import type { InvalidFieldCache } from './cache.js';
import { defaultInvalidFieldMatcher, type InvalidFieldMatcher } from './matcher.js';
import { BASIC_FIELDS, MINIMAL_FIELDS } from './presets.js';

/**
 * 1: requested fields, 2: basic fields, 3: minimal fields, 4: backend schema
 */
export type FallbackLevel = 1 | 2 | 3 | 4;

const LAST_LEVEL = 4;

/**
 * Returns the backend's field schema for an entity type (field name to
 * metadata). Only the keys are used.
 */
export type SchemaFetcher = (entityType: string) => Promise<Record<string, unknown>>;

export interface FieldFallbackOptions {
  entityType: string;
  /** Shared invalid-field cache */
  cache: InvalidFieldCache;
  matcher?: InvalidFieldMatcher;
  /** Enables level 4 */
  fetchSchema?: SchemaFetcher;
  /** Level 2 fields (default: BASIC_FIELDS) */
  basicFields?: readonly string[];
  /** Level 3 fields (default: MINIMAL_FIELDS) */
  minimalFields?: readonly string[];
  logger?: LoggerInput;
}

export interface FieldFallbackStatus {
  entityType: string;
  level: FallbackLevel;
  /** Invalid field errors handled so far */
  retries: number;
  originalFields: string[];
  currentFields: string[];
  /** Invalid fields known to this attempt chain */
  invalidFields: string[];
  exhausted: boolean;
}

/**
 * Result of {@link FieldFallbackStrategy.execute}
 */
export interface FallbackResult<T> {
  result: T;
  /** Fields the successful attempt used */
  fields: string[];
  level: FallbackLevel;
}

/**
 * Degrades a field list through fixed levels while the backend rejects
 * fields. One instance covers one attempt chain; the invalid-field cache is
 * shared across chains.
 *
 * Within a level, each rejected field is cached, dropped, and the query is
 * retried with what is left. When nothing is left, or the rejected field
 * cannot be identified, the strategy moves to the next level. Levels whose
 * list is empty after removing known-invalid fields are skipped. Past
 * level 4 it throws {@link FallbackExhaustedError}.
 *
 * @example
 * ```typescript
 * const strategy = new FieldFallbackStrategy({
 *   entityType: 'widget',
 *   cache,
 *   fetchSchema: (type) => client.fieldsGet(type),
 * });
 *
 * const { result, fields } = await strategy.execute(['id', 'name', 'ghost_field'], (fields) =>
 *   searchRead('widget', fields)
 * );
 * ```
 */
export class FieldFallbackStrategy {
  readonly entityType: string;

  private readonly cache: InvalidFieldCache;
  private readonly matcher: InvalidFieldMatcher;
  private readonly fetchSchema: SchemaFetcher | undefined;
  private readonly basicFields: readonly string[];
  private readonly minimalFields: readonly string[];
  private readonly logger: Logger;

  private originalFields: string[] = [];
  private currentFields: string[] = [];
  private readonly invalidFields = new Set<string>();
  private level: FallbackLevel = 1;
  private retries = 0;
  private exhausted = false;

  constructor(options: FieldFallbackOptions) {
    this.entityType = options.entityType;
    this.cache = options.cache;
    this.matcher = options.matcher ?? defaultInvalidFieldMatcher;
    this.fetchSchema = options.fetchSchema;
    this.basicFields = options.basicFields ?? BASIC_FIELDS;
    this.minimalFields = options.minimalFields ?? MINIMAL_FIELDS;
    this.logger = resolveLogger(options.logger, 'FieldFallback');
  }

  /**
   * Start a new attempt chain. Returns the level 1 fields, or the first
   * later level with fields when every requested field is known-invalid.
   */
  async initialize(fields: readonly string[]): Promise<string[]> {
    this.originalFields = [...fields];
    this.level = 1;
    this.retries = 0;
    this.exhausted = false;
    this.invalidFields.clear();
    await this.syncInvalidFields();

    this.currentFields = this.withoutInvalid(this.originalFields);
    if (this.currentFields.length === 0) {
      return this.advance(undefined);
    }
    return this.getCurrentFields();
  }

  /**
   * Whether an error is the kind this strategy recovers from
   */
  matches(error: unknown): boolean {
    return this.matcher.isInvalidFieldError(error);
  }

  /**
   * Handle an invalid field error and return the next fields to try.
   *
   * @throws FallbackExhaustedError once no level is left
   */
  async handleInvalidField(error: unknown): Promise<string[]> {
    if (this.exhausted) {
      throw this.exhaustedError(error);
    }
    this.retries++;

    const field = this.matcher.extractField(error);
    if (field !== null) {
      this.invalidFields.add(field);
      await this.cache.add(this.entityType, field);
      this.logger.debug('Invalid field detected', {
        entityType: this.entityType,
        field,
        level: this.level,
      });

      if (this.currentFields.includes(field)) {
        this.currentFields = this.currentFields.filter((f) => f !== field);
        if (this.currentFields.length > 0) {
          return this.getCurrentFields();
        }
      }
    }

    return this.advance(error);
  }

  /**
   * Run `query` with the fallback applied. Errors the matcher does not
   * recognize are rethrown unchanged.
   */
  async execute<T>(
    fields: readonly string[],
    query: (fields: string[]) => Promise<T>
  ): Promise<FallbackResult<T>> {
    let current = await this.initialize(fields);

    for (;;) {
      try {
        const result = await query(current);
        if (this.level > 1 || this.retries > 0) {
          this.logger.info('Query succeeded after field fallback', {
            entityType: this.entityType,
            level: this.level,
            retries: this.retries,
            fields: current.length,
          });
        }
        return { result, fields: current, level: this.level };
      } catch (error) {
        if (!this.matches(error)) throw error;
        current = await this.handleInvalidField(error);
      }
    }
  }

  getCurrentFields(): string[] {
    return [...this.currentFields];
  }

  getStatus(): FieldFallbackStatus {
    return {
      entityType: this.entityType,
      level: this.level,
      retries: this.retries,
      originalFields: [...this.originalFields],
      currentFields: this.getCurrentFields(),
      invalidFields: Array.from(this.invalidFields),
      exhausted: this.exhausted,
    };
  }

  private async advance(error: unknown): Promise<string[]> {
    while (this.level < LAST_LEVEL) {
      this.level = nextLevel(this.level);
      await this.syncInvalidFields();

      const candidates = await this.fieldsForLevel(this.level, error);
      this.currentFields = candidates === null ? [] : this.withoutInvalid(candidates);

      if (this.currentFields.length > 0) {
        this.logger.debug('Moved to fallback level', {
          entityType: this.entityType,
          level: this.level,
          fields: this.currentFields.length,
        });
        return this.getCurrentFields();
      }
    }

    this.exhausted = true;
    const exhausted = this.exhaustedError(error);
    this.logger.warn('Field fallback exhausted', {
      entityType: this.entityType,
      invalidFields: exhausted.invalidFields,
    });
    throw exhausted;
  }

  private async fieldsForLevel(level: FallbackLevel, error: unknown): Promise<readonly string[] | null> {
    switch (level) {
      case 1:
        return this.originalFields;
      case 2:
        return this.basicFields;
      case 3:
        return this.minimalFields;
      case 4:
        return this.fetchSchema ? Object.keys(await this.loadSchema(this.fetchSchema, error)) : null;
    }
  }

  /**
   * A schema that cannot be fetched ends the chain: the error surfaced is
   * the last query error, with the fetch failure in its context.
   */
  private async loadSchema(fetchSchema: SchemaFetcher, queryError: unknown): Promise<Record<string, unknown>> {
    try {
      return await fetchSchema(this.entityType);
    } catch (error) {
      // Connectivity and credential problems are not schema problems
      if (
        LedgerError.isCategory(error, 'transport') ||
        LedgerError.isCategory(error, 'authorization') ||
        LedgerError.isCategory(error, 'sync')
      ) {
        throw error;
      }
      this.logger.error('Failed to fetch field schema', toError(error), {
        entityType: this.entityType,
      });
      this.exhausted = true;
      throw new FallbackExhaustedError(
        this.entityType,
        Array.from(this.invalidFields),
        this.level,
        queryError === undefined ? undefined : toError(queryError),
        { code: 'LL_F602', context: { schemaError: toError(error).message } }
      );
    }
  }

  private async syncInvalidFields(): Promise<void> {
    for (const field of await this.cache.get(this.entityType)) {
      this.invalidFields.add(field);
    }
  }

  private withoutInvalid(fields: readonly string[]): string[] {
    return fields.filter((field) => !this.invalidFields.has(field));
  }

  private exhaustedError(error: unknown): FallbackExhaustedError {
    return new FallbackExhaustedError(
      this.entityType,
      Array.from(this.invalidFields),
      this.level,
      error === undefined ? undefined : toError(error)
    );
  }
}

function nextLevel(level: FallbackLevel): FallbackLevel {
  switch (level) {
    case 1:
      return 2;
    case 2:
      return 3;
    default:
      return 4;
  }
}
