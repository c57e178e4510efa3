export * from './storage.js';
export * from './value.js';
