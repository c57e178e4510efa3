/**
 * @packageDocumentation
 *
 * In-memory key-value store for ledgerlink.
 *
 * Keeps sync state and the outbox in process memory. Suited to tests,
 * prototypes and server-side code where nothing has to survive a restart.
 *
 * ```typescript
 * import { createMemoryStore } from '@ledgerlink/storage-memory';
 * import { createSyncClient } from '@ledgerlink/sync';
 *
 * const client = createSyncClient({ transport, store: createMemoryStore() });
 * ```
 *
 * @module @ledgerlink/storage-memory
 */
export * from './memory-store.js';
