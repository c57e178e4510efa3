/**
 * Backend routes used by ledgerlink. Any entry can be overridden per client.
 */
export const DEFAULT_ENDPOINTS = {
  // Batch sync
  push: '/api/v1/offline-sync/push',
  pull: '/api/v1/offline-sync/pull',
  resolveConflicts: '/api/v1/offline-sync/resolve-conflicts',
  syncState: '/api/v1/offline-sync/state',
  reset: '/api/v1/offline-sync/reset',
  health: '/api/v1/offline-sync/health',

  // Event log ("smart") sync
  checkUpdates: '/api/v1/webhooks/check-updates',
  smartPull: '/api/v2/sync/pull',
  smartState: '/api/v2/sync/state',
  smartReset: '/api/v2/sync/reset',
  smartHealth: '/api/v2/sync/health',
  ack: '/api/v2/sync/ack',

  // Records
  searchRead: '/api/v1/records/search_read',
  fieldsGet: '/api/v1/records/fields_get',
} as const;

export type EndpointName = keyof typeof DEFAULT_ENDPOINTS;

export type Endpoints = Record<EndpointName, string>;

export function resolveEndpoints(overrides: Partial<Endpoints> = {}): Endpoints {
  return { ...DEFAULT_ENDPOINTS, ...overrides };
}
