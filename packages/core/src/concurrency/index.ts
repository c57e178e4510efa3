export { Mutex } from './mutex.js';
export { ReadWriteLock } from './read-write-lock.js';
