/**
 * @packageDocumentation
 *
 * Queries against a backend whose schema is not fully known. When the
 * backend rejects a field, the field is cached as invalid for its entity
 * type and the query is retried with a reduced field list, degrading through
 * requested, basic, minimal and schema-derived field sets.
 *
 * @module @ledgerlink/field-fallback
 */
export * from './cache.js';
export * from './matcher.js';
export * from './presets.js';
export * from './strategy.js';
export * from './query-client.js';
