import {
  AuthorizationError,
  ConflictError,
  LedgerError,
  NotFoundError,
  SyncCancelledError,
  TransportError,
  ValidationError,
  toError,
} from '../errors/index.js';
import { BackoffPolicy } from '../backoff/index.js';
import { resolveLogger, type Logger, type LoggerInput } from '../logger.js';
import { isValueMap, valueSchema, type Value } from '../types/value.js';
import type { QueryParams, Transport, TransportRequest } from './types.js';

/**
 * The parts of a fetch `Response` the transport reads
 */
export interface FetchResponse {
  ok: boolean;
  status: number;
  text(): Promise<string>;
}

export interface FetchInit {
  method: string;
  headers: Record<string, string>;
  body?: string;
  signal: AbortSignal;
}

export type FetchFn = (url: string, init: FetchInit) => Promise<FetchResponse>;

/**
 * Retry settings for transient failures
 */
export interface RetryConfig {
  /** Retries after the first attempt (default: 2) */
  maxRetries?: number;
  /** Retry `n` waits `baseDelayMs * n` (default: 2000) */
  baseDelayMs?: number;
}

/**
 * HTTP transport configuration
 */
export interface HttpTransportConfig {
  /** Backend origin, optionally with a path prefix */
  baseUrl: string;
  /** Static bearer token */
  authToken?: string;
  /** Token provider, consulted on every attempt; wins over `authToken` */
  getAuthToken?: () => string | null | undefined | Promise<string | null | undefined>;
  /** Extra headers sent with every request */
  headers?: Record<string, string>;
  /** Per-request timeout in ms (default: 30000) */
  timeoutMs?: number;
  /** Retry policy, or false to disable retries */
  retry?: RetryConfig | false;
  /** fetch implementation (default: global fetch) */
  fetch?: FetchFn;
  /** Delay function used between retries */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  logger?: LoggerInput;
}

const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_MAX_RETRIES = 2;
const DEFAULT_RETRY_BASE_DELAY_MS = 2_000;

/** Statuses that are retried; 429, 500 and 502 are not */
const RETRYABLE_STATUSES = new Set([503, 504]);

function defaultSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new SyncCancelledError('Request cancelled before retry'));
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new SyncCancelledError('Request cancelled during retry delay'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Pull a human-readable message out of an error body (`message`, then
 * `detail`, then `error`).
 */
export function extractErrorMessage(body: Value, fallback: string): string {
  if (typeof body === 'string' && body.length > 0) return body;
  if (!isValueMap(body)) return fallback;

  for (const key of ['message', 'detail', 'error']) {
    const candidate = body[key];
    if (typeof candidate === 'string' && candidate.length > 0) return candidate;
    if (isValueMap(candidate) && typeof candidate.message === 'string') return candidate.message;
  }
  return fallback;
}

/**
 * Map a non-2xx status and its decoded body to a typed error
 */
export function errorFromStatus(status: number, body: Value, path?: string): LedgerError {
  const message = extractErrorMessage(body, `HTTP ${status}`);
  const context = path === undefined ? {} : { path };

  if (status === 401 || status === 403) {
    return new AuthorizationError(status, message, context);
  }
  if (status === 404) {
    return new NotFoundError(message, context);
  }
  if (status === 409) {
    const conflicts = isValueMap(body) && Array.isArray(body.conflicts) ? body.conflicts : [];
    return new ConflictError(message, conflicts, context);
  }
  if (status >= 500) {
    return new TransportError('LL_T103', message, context, {
      statusCode: status,
      retryable: RETRYABLE_STATUSES.has(status),
    });
  }
  if (status === 429) {
    return new TransportError('LL_T100', message, context, { statusCode: status, retryable: false });
  }
  return new ValidationError('LL_V300', message, { ...context, statusCode: status });
}

function buildUrl(baseUrl: string, path: string, query?: QueryParams): string {
  const url = new URL(`${baseUrl.replace(/\/+$/, '')}${path}`);
  if (query) {
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) url.searchParams.set(key, String(value));
    }
  }
  return url.toString();
}

/**
 * Fetch-based {@link Transport} with bearer auth, timeouts and linear retry.
 *
 * The whole body is read inside the abort scope, so a request either
 * resolves with a complete decoded body or rejects; there is no partially
 * observed response. Only connection failures, timeouts, 503 and 504 are
 * retried. Caller cancellation is never retried.
 *
 * @example
 * ```typescript
 * const transport = createHttpTransport({
 *   baseUrl: 'https://erp.example.com',
 *   getAuthToken: () => tokens.accessToken,
 * });
 *
 * const body = await transport.request({
 *   method: 'GET',
 *   path: '/api/v1/offline-sync/state',
 *   query: { device_id: 'tablet-1' },
 * });
 * ```
 */
export class HttpTransport implements Transport {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryBaseDelayMs: number;
  private readonly headers: Record<string, string>;
  private readonly fetchFn: FetchFn;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly logger: Logger;

  constructor(private readonly config: HttpTransportConfig) {
    this.baseUrl = config.baseUrl;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxRetries = config.retry === false ? 0 : (config.retry?.maxRetries ?? DEFAULT_MAX_RETRIES);
    this.retryBaseDelayMs =
      config.retry === false ? 0 : (config.retry?.baseDelayMs ?? DEFAULT_RETRY_BASE_DELAY_MS);
    this.headers = config.headers ?? {};
    this.fetchFn = config.fetch ?? ((url, init) => fetch(url, init));
    this.sleep = config.sleep ?? defaultSleep;
    this.logger = resolveLogger(config.logger, 'HttpTransport');
  }

  async request(request: TransportRequest): Promise<Value> {
    const backoff = new BackoffPolicy({
      baseDelayMs: this.retryBaseDelayMs,
      maxAttempts: this.maxRetries,
    });

    for (;;) {
      try {
        return await this.attempt(request);
      } catch (error) {
        if (!LedgerError.isLedgerError(error) || !error.retryable) throw error;
        const delay = backoff.nextDelay();
        if (delay === null) throw error;

        this.logger.warn('Retrying request', {
          method: request.method,
          path: request.path,
          attempt: backoff.attempts,
          delayMs: delay,
          code: error.code,
        });
        await this.sleep(delay, request.signal);
      }
    }
  }

  private async attempt(request: TransportRequest): Promise<Value> {
    const { signal } = request;
    const url = buildUrl(this.baseUrl, request.path, request.query);
    const headers = await this.getHeaders(request.body !== undefined);

    if (signal?.aborted) {
      throw new SyncCancelledError('Request cancelled before it was sent', { path: request.path });
    }
    const controller = new AbortController();
    const timeoutMs = request.timeoutMs ?? this.timeoutMs;
    let timedOut = false;

    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onCallerAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onCallerAbort, { once: true });

    try {
      const response = await this.fetchFn(url, {
        method: request.method,
        headers,
        body: request.body === undefined ? undefined : JSON.stringify(request.body),
        signal: controller.signal,
      });
      const text = await response.text();
      const body = this.decode(text, response.ok, request.path);

      if (!response.ok) {
        throw errorFromStatus(response.status, body, request.path);
      }

      this.logger.debug('Request completed', {
        method: request.method,
        path: request.path,
        status: response.status,
      });
      return body;
    } catch (error) {
      if (LedgerError.isLedgerError(error)) throw error;

      if (signal?.aborted) {
        throw new SyncCancelledError('Request cancelled', { path: request.path });
      }
      if (timedOut) {
        throw new TransportError('LL_T102', `Request timed out after ${timeoutMs}ms`, {
          path: request.path,
          timeoutMs,
        });
      }
      throw new TransportError('LL_T101', toError(error).message, { path: request.path }, {
        cause: toError(error),
      });
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onCallerAbort);
    }
  }

  private decode(text: string, ok: boolean, path: string): Value {
    if (text.length === 0) return null;

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      // Error pages are often plain text or HTML
      if (!ok) return text;
      throw new ValidationError('LL_V301', 'Response body is not valid JSON', { path }, toError(error));
    }

    const result = valueSchema.safeParse(parsed);
    if (!result.success) {
      throw new ValidationError('LL_V301', undefined, { path });
    }
    return result.data;
  }

  private async getHeaders(hasBody: boolean): Promise<Record<string, string>> {
    const headers: Record<string, string> = {
      Accept: 'application/json',
      ...this.headers,
    };
    if (hasBody) {
      headers['Content-Type'] = 'application/json';
    }

    const token = await this.resolveToken();
    if (token) {
      headers.Authorization = `Bearer ${token}`;
    }
    return headers;
  }

  private async resolveToken(): Promise<string | null | undefined> {
    const { getAuthToken, authToken } = this.config;
    if (!getAuthToken) return authToken;
    try {
      return await getAuthToken();
    } catch (error) {
      if (LedgerError.isLedgerError(error)) throw error;
      throw new AuthorizationError(401, 'Auth token provider failed', { reason: toError(error).message });
    }
  }
}

/**
 * Creates an HTTP transport
 */
export function createHttpTransport(config: HttpTransportConfig): HttpTransport {
  return new HttpTransport(config);
}
