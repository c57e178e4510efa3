/**
 * @packageDocumentation
 *
 * Offline-first synchronization against an authoritative backend: an outbox
 * of idempotent changes, cursor-based event pulls, explicit conflict
 * resolution and a single-flight orchestrator with a periodic checker.
 *
 * @module @ledgerlink/sync
 */

// Types
export * from './types.js';

// Wire
export * from './api.js';
export { parseWire } from './protocol/schemas.js';

// State
export * from './state-store.js';

// Engines
export * from './push-engine.js';
export * from './pull-engine.js';
export * from './conflict-resolver.js';
export * from './merge.js';

// Lifecycle
export * from './events.js';
export * from './reconnect.js';
export * from './orchestrator.js';

// Facade
export * from './client.js';
