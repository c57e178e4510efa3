import { describe, expect, it } from 'vitest';
import {
  SyncCancelledError,
  TransportError,
  type Transport,
} from '@ledgerlink/core';
import { MemoryKeyValueStore } from '@ledgerlink/storage-memory';
import { FakeSyncBackend } from './__tests__/fake-backend.js';
import { SyncApi } from './api.js';
import { PushEngine } from './push-engine.js';
import { SyncStateStore } from './state-store.js';

const PUSH_PATH = '/api/v1/offline-sync/push';

function setup(transport?: Transport) {
  const backend = new FakeSyncBackend();
  const api = new SyncApi({ transport: transport ?? backend });
  const state = new SyncStateStore({
    store: new MemoryKeyValueStore(),
    userId: '7',
    deviceId: 'tablet-1',
    now: () => 5_000,
    logger: false,
  });
  const engine = new PushEngine({ api, state, deviceId: 'tablet-1', now: () => 5_000, logger: false });
  return { backend, state, engine };
}

describe('PushEngine', () => {
  it('should empty the outbox when every change is accepted', async () => {
    const { state, engine } = setup();
    await state.stage({ entityType: 'task', operation: 'create', values: { title: 'A' }, idempotencyKey: 'k1' });

    const result = await engine.push();

    expect(result).toEqual({ successful: ['k1'], failed: [], conflicts: [], heldBack: 0 });
    expect(await state.listOutbox()).toEqual([]);
    expect((await state.getCursor()).pendingChanges).toBe(0);
  });

  it('should not call the backend with an empty outbox', async () => {
    const { backend, engine } = setup();

    const result = await engine.push();

    expect(result).toEqual({ successful: [], failed: [], conflicts: [], heldBack: 0 });
    expect(backend.requests).toHaveLength(0);
  });

  it('should partition accepted, rejected and conflicting changes', async () => {
    const { backend, state, engine } = setup();
    backend.rejectChange('k2', 'Title required').conflictOn('k3', { title: 'server' });
    await state.stage({ entityType: 'task', operation: 'create', values: { title: 'A' }, idempotencyKey: 'k1' });
    await state.stage({ entityType: 'task', operation: 'create', values: { title: '' }, idempotencyKey: 'k2' });
    await state.stage({ entityType: 'task', operation: 'create', values: { title: 'C' }, idempotencyKey: 'k3' });

    const result = await engine.push();

    expect(result.successful).toEqual(['k1']);
    expect(result.failed).toEqual([
      {
        idempotencyKey: 'k2',
        entityType: 'task',
        entityId: -2,
        operation: 'create',
        values: { title: '' },
        reason: 'Title required',
      },
    ]);
    expect(result.conflicts).toEqual([
      {
        id: 'c-k3',
        idempotencyKey: 'k3',
        entityType: 'task',
        entityId: -3,
        kind: 'both-modified',
        localPayload: { title: 'C' },
        remotePayload: { title: 'server' },
        detectedAt: 5_000,
      },
    ]);
    expect((await state.listOutbox()).map((change) => change.idempotencyKey)).toEqual(['k3']);
    expect(await state.listConflicts()).toEqual(result.conflicts);
  });

  it('should hold back changes with an open conflict', async () => {
    const { backend, state, engine } = setup();
    backend.conflictOn('k1', null, 'remote_deleted');
    await state.stage({ entityType: 'task', entityId: 4, operation: 'update', idempotencyKey: 'k1' });
    await engine.push();

    const second = await engine.push();

    expect(second).toEqual({ successful: [], failed: [], conflicts: [], heldBack: 1 });
    expect(backend.calls(PUSH_PATH)).toHaveLength(1);
    expect((await state.listConflicts())[0]?.kind).toBe('remote-deleted');
  });

  it('should leave the outbox untouched on a transport error', async () => {
    const { backend, state, engine } = setup();
    backend.failNext(PUSH_PATH, new TransportError('LL_T101', 'Connection refused'));
    await state.stage({ entityType: 'task', operation: 'create', idempotencyKey: 'k1' });
    await state.stage({ entityType: 'task', operation: 'create', idempotencyKey: 'k2' });

    await expect(engine.push()).rejects.toBeInstanceOf(TransportError);

    expect((await state.listOutbox()).map((change) => change.idempotencyKey)).toEqual(['k1', 'k2']);
  });

  it('should not send anything when already cancelled', async () => {
    const { backend, state, engine } = setup();
    await state.stage({ entityType: 'task', operation: 'create', idempotencyKey: 'k1' });
    const controller = new AbortController();
    controller.abort();

    await expect(engine.push({ signal: controller.signal })).rejects.toBeInstanceOf(SyncCancelledError);

    expect(backend.requests).toHaveLength(0);
    expect(await state.listOutbox()).toHaveLength(1);
  });

  it('should commit a response observed before the cancellation', async () => {
    const { backend, state, engine } = setup();
    const controller = new AbortController();
    backend.gate = () => controller.abort();
    await state.stage({ entityType: 'task', operation: 'create', idempotencyKey: 'k1' });

    const result = await engine.push({ signal: controller.signal });

    expect(controller.signal.aborted).toBe(true);
    expect(result.successful).toEqual(['k1']);
    expect(await state.listOutbox()).toEqual([]);
  });

  it('should have a single server-side effect when a lost response is retried', async () => {
    const backend = new FakeSyncBackend();
    let dropResponse = true;
    const lossy: Transport = {
      async request(request) {
        const body = await backend.request(request);
        if (dropResponse) {
          dropResponse = false;
          throw new TransportError('LL_T102', 'Request timed out');
        }
        return body;
      },
    };
    const { state, engine } = setup(lossy);
    await state.stage({ entityType: 'task', operation: 'create', values: { title: 'A' }, idempotencyKey: 'k1' });

    await expect(engine.push()).rejects.toBeInstanceOf(TransportError);
    expect(await state.listOutbox()).toHaveLength(1);

    const retry = await engine.push();

    expect(retry.successful).toEqual(['k1']);
    expect(backend.effects.get('k1')).toBe(1);
    expect(backend.records.task).toEqual([{ title: 'A' }]);
    expect(await state.listOutbox()).toEqual([]);
  });
});
