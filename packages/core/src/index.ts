/**
 * @packageDocumentation
 *
 * Shared building blocks for ledgerlink: the error taxonomy, the wire value
 * type, the key-value store contract, structured logging, async locks, the
 * backoff policy and the HTTP transport.
 *
 * @module @ledgerlink/core
 */

// Types
export * from './types/index.js';

// Errors
export * from './errors/index.js';

// Logging
export * from './logger.js';

// Concurrency
export * from './concurrency/index.js';

// Backoff
export * from './backoff/index.js';

// Transport
export * from './transport/index.js';
