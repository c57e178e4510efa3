import { describe, expect, it, vi } from 'vitest';
import {
  AuthorizationError,
  ConflictError,
  LedgerError,
  NotFoundError,
  SyncCancelledError,
  TransportError,
  ValidationError,
} from '../errors/index.js';
import {
  HttpTransport,
  errorFromStatus,
  extractErrorMessage,
  type FetchFn,
  type FetchInit,
  type FetchResponse,
} from './http.js';

function respond(status: number, body: string): FetchResponse {
  return {
    ok: status >= 200 && status < 300,
    status,
    text: () => Promise.resolve(body),
  };
}

function json(status: number, body: unknown): FetchResponse {
  return respond(status, JSON.stringify(body));
}

interface Recorded {
  url: string;
  init: FetchInit;
}

function scriptedFetch(...responses: (FetchResponse | Error)[]): { fetch: FetchFn; calls: Recorded[] } {
  const calls: Recorded[] = [];
  const fetch: FetchFn = (url, init) => {
    calls.push({ url, init });
    const next = responses.shift();
    if (next === undefined) return Promise.reject(new Error('no scripted response'));
    return next instanceof Error ? Promise.reject(next) : Promise.resolve(next);
  };
  return { fetch, calls };
}

const noSleep = vi.fn((_ms: number) => Promise.resolve());

function transport(fetch: FetchFn, overrides: Partial<ConstructorParameters<typeof HttpTransport>[0]> = {}) {
  return new HttpTransport({
    baseUrl: 'https://backend.test/tenant/',
    fetch,
    sleep: noSleep,
    logger: false,
    ...overrides,
  });
}

describe('HttpTransport', () => {
  it('should send JSON with bearer auth and query parameters', async () => {
    const { fetch, calls } = scriptedFetch(json(200, { ok: true }));
    const http = transport(fetch, { authToken: 'test-token' });

    const body = await http.request({
      method: 'POST',
      path: '/api/v1/offline-sync/push',
      query: { device_id: 'dev-1', limit: 10, skipped: undefined },
      body: { device_id: 'dev-1' },
    });

    expect(body).toEqual({ ok: true });
    expect(calls).toHaveLength(1);
    expect(calls[0]?.url).toBe(
      'https://backend.test/tenant/api/v1/offline-sync/push?device_id=dev-1&limit=10'
    );
    expect(calls[0]?.init.method).toBe('POST');
    expect(calls[0]?.init.body).toBe('{"device_id":"dev-1"}');
    expect(calls[0]?.init.headers).toEqual({
      Accept: 'application/json',
      'Content-Type': 'application/json',
      Authorization: 'Bearer test-token',
    });
  });

  it('should prefer the token provider over a static token', async () => {
    const { fetch, calls } = scriptedFetch(json(200, {}));
    const http = transport(fetch, { authToken: 'static', getAuthToken: async () => 'fresh' });

    await http.request({ method: 'GET', path: '/x' });

    expect(calls[0]?.init.headers.Authorization).toBe('Bearer fresh');
    expect(calls[0]?.init.headers['Content-Type']).toBeUndefined();
  });

  it('should report a failing token provider as an authorization error without sending', async () => {
    const { fetch, calls } = scriptedFetch(json(200, {}));
    const http = transport(fetch, {
      getAuthToken: () => {
        throw new Error('keychain locked');
      },
    });

    const error = await http.request({ method: 'GET', path: '/x' }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(AuthorizationError);
    expect(error).toMatchObject({ code: 'LL_A200', context: { reason: 'keychain locked', statusCode: 401 } });
    expect(calls).toHaveLength(0);
  });

  it('should decode an empty body as null', async () => {
    const { fetch } = scriptedFetch(respond(204, ''));

    await expect(transport(fetch).request({ method: 'POST', path: '/x' })).resolves.toBeNull();
  });

  it('should reject a non-JSON success body as malformed', async () => {
    const { fetch } = scriptedFetch(respond(200, '<html>'));

    const error = await transport(fetch)
      .request({ method: 'GET', path: '/x' })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ValidationError);
    expect(LedgerError.isCode(error, 'LL_V301')).toBe(true);
  });

  it('should retry 503 with linear delays and then succeed', async () => {
    const sleep = vi.fn((_ms: number) => Promise.resolve());
    const { fetch, calls } = scriptedFetch(
      json(503, { detail: 'maintenance' }),
      json(504, {}),
      json(200, { done: 1 })
    );

    const body = await transport(fetch, { sleep }).request({ method: 'GET', path: '/x' });

    expect(body).toEqual({ done: 1 });
    expect(calls).toHaveLength(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([2000, 4000]);
  });

  it('should give up after the configured retries', async () => {
    const { fetch, calls } = scriptedFetch(
      new TypeError('fetch failed'),
      new TypeError('fetch failed'),
      new TypeError('fetch failed')
    );

    const error = await transport(fetch)
      .request({ method: 'GET', path: '/x' })
      .catch((e: unknown) => e);

    expect(calls).toHaveLength(3);
    expect(error).toBeInstanceOf(TransportError);
    expect(LedgerError.isCode(error, 'LL_T101')).toBe(true);
  });

  it.each([429, 500, 502])('should not retry status %i', async (status) => {
    const { fetch, calls } = scriptedFetch(json(status, { message: 'nope' }), json(200, {}));

    const error = await transport(fetch)
      .request({ method: 'GET', path: '/x' })
      .catch((e: unknown) => e);

    expect(calls).toHaveLength(1);
    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ message: 'nope', statusCode: status, retryable: false });
  });

  it('should not retry when retries are disabled', async () => {
    const { fetch, calls } = scriptedFetch(json(503, {}), json(200, {}));

    await expect(
      transport(fetch, { retry: false }).request({ method: 'GET', path: '/x' })
    ).rejects.toBeInstanceOf(TransportError);
    expect(calls).toHaveLength(1);
  });

  it('should report a timeout as a retryable transport error', async () => {
    const fetch: FetchFn = (_url, init) =>
      new Promise<FetchResponse>((_resolve, reject) => {
        init.signal.addEventListener('abort', () => reject(new Error('aborted')));
      });
    const http = transport(fetch, { retry: false, timeoutMs: 5 });

    const error = await http.request({ method: 'GET', path: '/slow' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect(LedgerError.isCode(error, 'LL_T102')).toBe(true);
    expect(error).toMatchObject({ retryable: true });
  });

  it('should raise SyncCancelledError when the caller aborts in flight', async () => {
    const controller = new AbortController();
    let started: () => void = () => {};
    const inFlight = new Promise<void>((resolve) => {
      started = resolve;
    });
    const fetch: FetchFn = (_url, init) =>
      new Promise<FetchResponse>((_resolve, reject) => {
        init.signal.addEventListener('abort', () => reject(new Error('aborted')));
        started();
      });

    const pending = transport(fetch)
      .request({ method: 'GET', path: '/x', signal: controller.signal })
      .catch((e: unknown) => e);
    await inFlight;
    controller.abort();

    expect(await pending).toBeInstanceOf(SyncCancelledError);
  });

  it('should not send anything when already aborted', async () => {
    const { fetch, calls } = scriptedFetch(json(200, {}));
    const controller = new AbortController();
    controller.abort();

    await expect(
      transport(fetch).request({ method: 'GET', path: '/x', signal: controller.signal })
    ).rejects.toBeInstanceOf(SyncCancelledError);
    expect(calls).toHaveLength(0);
  });
});

describe('errorFromStatus', () => {
  it('should map statuses to typed errors', () => {
    expect(errorFromStatus(401, null)).toBeInstanceOf(AuthorizationError);
    expect(errorFromStatus(401, null).code).toBe('LL_A200');
    expect(errorFromStatus(403, null).code).toBe('LL_A201');
    expect(errorFromStatus(404, null)).toBeInstanceOf(NotFoundError);
    expect(errorFromStatus(400, null).code).toBe('LL_V300');
    expect(errorFromStatus(422, null).code).toBe('LL_V300');
    expect(errorFromStatus(503, null).code).toBe('LL_T103');
  });

  it('should carry conflicts reported with a 409', () => {
    const error = errorFromStatus(409, { message: 'stale', conflicts: [{ id: 1 }] });

    expect(error).toBeInstanceOf(ConflictError);
    expect(error.message).toBe('stale');
    expect(error instanceof ConflictError && error.conflicts).toEqual([{ id: 1 }]);
  });
});

describe('extractErrorMessage', () => {
  it('should read message, then detail, then error', () => {
    expect(extractErrorMessage({ message: 'a', detail: 'b' }, 'x')).toBe('a');
    expect(extractErrorMessage({ detail: 'b', error: 'c' }, 'x')).toBe('b');
    expect(extractErrorMessage({ error: { message: 'nested' } }, 'x')).toBe('nested');
    expect(extractErrorMessage('plain text', 'x')).toBe('plain text');
    expect(extractErrorMessage({ status: 1 }, 'x')).toBe('x');
  });
});
