/**
 * LedgerError - structured error class shared by every ledgerlink package
 */

import {
  type ErrorCategory,
  type ErrorCode,
  getErrorCategory,
  getErrorInfo,
} from './error-codes.js';

/**
 * Options for creating a LedgerError
 */
export interface LedgerErrorOptions {
  /** The error code */
  code: ErrorCode;
  /** Custom message (overrides default) */
  message?: string;
  /** Custom suggestion (overrides default) */
  suggestion?: string;
  /** Additional context information */
  context?: Record<string, unknown>;
  /** The original error that caused this error */
  cause?: Error;
  /** Override whether the failed operation may be retried */
  retryable?: boolean;
}

/**
 * Serialized format of a LedgerError
 */
export interface SerializedLedgerError {
  name: string;
  code: string;
  message: string;
  suggestion?: string;
  category: ErrorCategory;
  retryable: boolean;
  context: Record<string, unknown>;
  stack?: string;
  cause?: SerializedLedgerError | { name: string; message: string; stack?: string };
}

/**
 * Base error for ledgerlink.
 *
 * The code decides the category, and the category decides how the sync layer
 * reacts: `transport` errors are retried with backoff, `authorization` errors
 * abort the cycle, `validation` errors are permanent, `schema` errors are
 * handled by the field fallback strategy until it is exhausted.
 *
 * @example
 * ```typescript
 * try {
 *   await orchestrator.sync();
 * } catch (error) {
 *   if (LedgerError.isCategory(error, 'authorization')) {
 *     await reauthenticate();
 *   } else if (LedgerError.isCode(error, 'LL_F601')) {
 *     console.error(error.format());
 *   }
 * }
 * ```
 */
export class LedgerError extends Error {
  /** Unique error code */
  readonly code: ErrorCode;

  /** Helpful suggestion for resolving the error */
  readonly suggestion?: string;

  /** Error category for grouping */
  readonly category: ErrorCategory;

  /** Additional context information */
  readonly context: Record<string, unknown>;

  /** Whether repeating the operation may succeed */
  readonly retryable: boolean;

  /** Original error that caused this error */
  override readonly cause?: Error;

  constructor(options: LedgerErrorOptions) {
    const errorInfo = getErrorInfo(options.code);
    const message = options.message ?? errorInfo.message;

    super(message, { cause: options.cause });

    this.name = 'LedgerError';
    this.code = options.code;
    this.suggestion = options.suggestion ?? errorInfo.suggestion;
    this.category = getErrorCategory(options.code);
    this.context = options.context ?? {};
    this.retryable = options.retryable ?? this.category === 'transport';
    this.cause = options.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Create a LedgerError from an error code with minimal options
   */
  static fromCode(code: ErrorCode, context?: Record<string, unknown>): LedgerError {
    return new LedgerError({ code, context });
  }

  /**
   * Wrap an existing error with a LedgerError
   */
  static wrap(error: Error, code: ErrorCode, context?: Record<string, unknown>): LedgerError {
    return new LedgerError({
      code,
      message: error.message,
      context,
      cause: error,
    });
  }

  /**
   * Check if an error is a LedgerError
   */
  static isLedgerError(error: unknown): error is LedgerError {
    return error instanceof LedgerError;
  }

  /**
   * Check if an error matches a specific code
   */
  static isCode(error: unknown, code: ErrorCode): error is LedgerError {
    return LedgerError.isLedgerError(error) && error.code === code;
  }

  /**
   * Check if an error matches a specific category
   */
  static isCategory(error: unknown, category: ErrorCategory): error is LedgerError {
    return LedgerError.isLedgerError(error) && error.category === category;
  }

  /**
   * Format the error for display
   */
  format(): string {
    const lines = [`[${this.code}] ${this.message}`];

    if (Object.keys(this.context).length > 0) {
      lines.push(`Context: ${JSON.stringify(this.context)}`);
    }

    if (this.suggestion) {
      lines.push(`Suggestion: ${this.suggestion}`);
    }

    return lines.join('\n');
  }

  /**
   * Convert to a plain object for serialization
   */
  toJSON(): SerializedLedgerError {
    const result: SerializedLedgerError = {
      name: this.name,
      code: this.code,
      message: this.message,
      category: this.category,
      retryable: this.retryable,
      context: this.context,
    };

    if (this.suggestion) {
      result.suggestion = this.suggestion;
    }

    if (this.stack) {
      result.stack = this.stack;
    }

    if (this.cause) {
      if (LedgerError.isLedgerError(this.cause)) {
        result.cause = this.cause.toJSON();
      } else {
        result.cause = {
          name: this.cause.name,
          message: this.cause.message,
          stack: this.cause.stack,
        };
      }
    }

    return result;
  }

  override toString(): string {
    return this.format();
  }
}

/**
 * Network-level failure: connection refused, timeout, 5xx.
 */
export class TransportError extends LedgerError {
  /** HTTP status, when a response was received */
  readonly statusCode?: number;

  constructor(
    code: ErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    options: { cause?: Error; statusCode?: number; retryable?: boolean } = {}
  ) {
    super({
      code,
      message,
      context: options.statusCode === undefined ? context : { ...context, statusCode: options.statusCode },
      cause: options.cause,
      retryable: options.retryable,
    });
    this.name = 'TransportError';
    this.statusCode = options.statusCode;
  }
}

/**
 * Expired or invalid credentials (401) or missing permission (403).
 */
export class AuthorizationError extends LedgerError {
  readonly statusCode: number;

  constructor(statusCode: number, message?: string, context?: Record<string, unknown>) {
    super({
      code: statusCode === 403 ? 'LL_A201' : 'LL_A200',
      message,
      context: { ...context, statusCode },
    });
    this.name = 'AuthorizationError';
    this.statusCode = statusCode;
  }
}

/**
 * Permanent rejection. Repeating the same request will fail the same way.
 */
export class ValidationError extends LedgerError {
  constructor(
    code: ErrorCode,
    message?: string,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super({ code, message, context, cause, retryable: false });
    this.name = 'ValidationError';
  }
}

/**
 * 404 from the backend
 */
export class NotFoundError extends ValidationError {
  constructor(message?: string, context?: Record<string, unknown>) {
    super('LL_V302', message, context);
    this.name = 'NotFoundError';
  }
}

/**
 * 409 from the backend
 */
export class ConflictError extends LedgerError {
  /** Raw conflict entries reported with the error, if any */
  readonly conflicts: readonly unknown[];

  constructor(message?: string, conflicts: readonly unknown[] = [], context?: Record<string, unknown>) {
    super({ code: 'LL_C500', message, context: { ...context, conflictCount: conflicts.length } });
    this.name = 'ConflictError';
    this.conflicts = conflicts;
  }
}

/**
 * The backend rejected a field for an entity type.
 */
export class SchemaMismatchError extends LedgerError {
  readonly entityType: string;
  readonly field: string | null;

  constructor(entityType: string, field: string | null, cause?: Error) {
    super({
      code: 'LL_F600',
      message: field
        ? `Invalid field "${field}" on entity type "${entityType}"`
        : `Invalid field on entity type "${entityType}"`,
      context: { entityType, field },
      cause,
    });
    this.name = 'SchemaMismatchError';
    this.entityType = entityType;
    this.field = field;
  }
}

/**
 * Every field fallback level failed. Terminal for the attempt chain.
 */
export class FallbackExhaustedError extends LedgerError {
  readonly entityType: string;
  readonly invalidFields: readonly string[];
  readonly level: number;

  constructor(
    entityType: string,
    invalidFields: readonly string[],
    level: number,
    cause?: Error,
    options: { code?: 'LL_F601' | 'LL_F602'; context?: Record<string, unknown> } = {}
  ) {
    const listed = invalidFields.length > 0 ? invalidFields.join(', ') : 'none identified';
    super({
      code: options.code ?? 'LL_F601',
      message: `Field fallback strategy exhausted for entity type "${entityType}". Invalid fields: ${listed}`,
      context: { ...options.context, entityType, invalidFields: [...invalidFields], level },
      cause,
      retryable: false,
    });
    this.name = 'FallbackExhaustedError';
    this.entityType = entityType;
    this.invalidFields = [...invalidFields];
    this.level = level;
  }
}

/**
 * Storage error
 */
export class StorageError extends LedgerError {
  constructor(code: ErrorCode, message: string, context?: Record<string, unknown>, cause?: Error) {
    super({ code, message, context, cause });
    this.name = 'StorageError';
  }
}

/**
 * Raised when the caller cancels before a response was observed.
 */
export class SyncCancelledError extends LedgerError {
  constructor(message = 'Operation cancelled', context?: Record<string, unknown>) {
    super({ code: 'LL_Y800', message, context, retryable: false });
    this.name = 'SyncCancelledError';
  }
}

/**
 * Helper function to ensure errors are LedgerErrors
 */
export function ensureLedgerError(
  error: unknown,
  defaultCode: ErrorCode = 'LL_X900'
): LedgerError {
  if (LedgerError.isLedgerError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return LedgerError.wrap(error, defaultCode);
  }

  return new LedgerError({
    code: defaultCode,
    message: String(error),
  });
}

/**
 * Normalize an unknown thrown value to an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
