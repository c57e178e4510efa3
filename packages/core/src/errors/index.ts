/**
 * Ledgerlink Error System
 *
 * - Unique error codes (LL_T101, LL_F601, etc.)
 * - Categories that drive retry and propagation decisions
 * - Suggestions for resolution
 * - Error chaining through `cause`
 *
 * @example
 * ```typescript
 * import { LedgerError } from '@ledgerlink/core';
 *
 * try {
 *   await api.push(request);
 * } catch (error) {
 *   if (LedgerError.isCategory(error, 'transport') && error.retryable) {
 *     scheduleRetry();
 *   }
 * }
 * ```
 *
 * @module errors
 */

export {
  ERROR_CODES,
  getErrorCategory,
  getErrorInfo,
  type ErrorCategory,
  type ErrorCode,
  type ErrorInfo,
} from './error-codes.js';

export {
  AuthorizationError,
  ConflictError,
  FallbackExhaustedError,
  LedgerError,
  NotFoundError,
  SchemaMismatchError,
  StorageError,
  SyncCancelledError,
  TransportError,
  ValidationError,
  ensureLedgerError,
  toError,
  type LedgerErrorOptions,
  type SerializedLedgerError,
} from './ledger-error.js';
