import { describe, expect, it } from 'vitest';
import { LedgerError, SyncCancelledError } from '@ledgerlink/core';
import { createMemoryStore } from '@ledgerlink/storage-memory';
import { FakeSyncBackend } from './__tests__/fake-backend.js';
import { createSyncClient, type SyncClientConfig } from './client.js';

function config(overrides: Partial<SyncClientConfig> = {}): SyncClientConfig {
  return {
    transport: new FakeSyncBackend(),
    store: createMemoryStore(),
    applyEvents: () => undefined,
    logger: false,
    ...overrides,
  };
}

function codeOf(run: () => unknown): string | null {
  try {
    run();
    return null;
  } catch (error) {
    return error instanceof LedgerError ? error.code : 'not-a-ledger-error';
  }
}

describe('SyncClient', () => {
  it('should reject invalid tunables', () => {
    expect(codeOf(() => createSyncClient(config({ smartPullLimit: 0 })))).toBe('LL_V304');
    expect(codeOf(() => createSyncClient(config({ deviceId: '' })))).toBe('LL_V304');
    expect(codeOf(() => createSyncClient(config({ transport: undefined, baseUrl: 'not a url' })))).toBe(
      'LL_V304'
    );
  });

  it('should require a transport or a base URL', () => {
    expect(codeOf(() => createSyncClient(config({ transport: undefined })))).toBe('LL_V304');
  });

  it('should build an HTTP transport from a base URL', () => {
    const client = createSyncClient(config({ transport: undefined, baseUrl: 'http://localhost:8069' }));

    expect(client.deviceId).toBe('default');
    expect(client.appType).toBe('mobile_app');
    client.destroy();
  });

  it('should return one orchestrator per user and device', () => {
    const client = createSyncClient(config());

    const first = client.forUser('7', 'tablet-1');

    expect(client.forUser('7', 'tablet-1')).toBe(first);
    expect(client.forUser('7', 'phone-2')).not.toBe(first);
    expect(client.forUser('7').deviceId).toBe('default');
  });

  it('should send the device and app type with smart pulls', async () => {
    const backend = new FakeSyncBackend();
    const client = createSyncClient(config({ transport: backend, appType: 'field_app', smartPullLimit: 25 }));

    await client.forUser('7', 'tablet-1').sync();

    expect(backend.calls('/api/v2/sync/pull')[0]?.body).toMatchObject({
      user_id: '7',
      device_id: 'tablet-1',
      app_type: 'field_app',
      limit: 25,
    });
  });

  it('should stop every orchestrator on destroy', async () => {
    const client = createSyncClient(config());
    const orchestrator = client.forUser('7', 'tablet-1');

    client.destroy();

    await expect(orchestrator.sync()).rejects.toBeInstanceOf(SyncCancelledError);
  });
});
