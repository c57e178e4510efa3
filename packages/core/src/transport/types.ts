import type { Value, ValueMap } from '../types/value.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/**
 * Query string parameters. Undefined entries are dropped.
 */
export type QueryParams = Record<string, string | number | boolean | undefined>;

/**
 * A single backend call
 */
export interface TransportRequest {
  method: HttpMethod;
  /** Path relative to the transport's base URL */
  path: string;
  query?: QueryParams;
  /** JSON body for POST/PUT/PATCH */
  body?: ValueMap;
  /** Caller-driven cancellation */
  signal?: AbortSignal;
  /** Overrides the transport's default timeout for this call */
  timeoutMs?: number;
}

/**
 * Request/response channel to the backend.
 *
 * Delivery contract: `request()` resolves only after the complete response
 * body has been read and decoded. A response is "observed" exactly when the
 * promise resolves. If the promise rejects with `SyncCancelledError` or a
 * transport error, callers must treat the call as never having been
 * answered and leave their local state unchanged.
 *
 * Failures are reported as `LedgerError` subclasses: `TransportError`
 * (connection, timeout, 5xx), `AuthorizationError` (401/403),
 * `NotFoundError` (404), `ValidationError` (400/422, malformed body),
 * `ConflictError` (409) and `SyncCancelledError` (caller abort).
 */
export interface Transport {
  request(request: TransportRequest): Promise<Value>;
}
