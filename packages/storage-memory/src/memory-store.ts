import { StorageError, type KeyValueStore } from '@ledgerlink/core';

/**
 * In-memory {@link KeyValueStore}.
 *
 * Values are cloned on the way in and on the way out, so callers never share
 * references with the stored copy. Each instance has its own data.
 */
export class MemoryKeyValueStore implements KeyValueStore {
  private readonly entries = new Map<string, unknown>();

  async get(key: string): Promise<unknown> {
    const value = this.entries.get(key);
    return value === undefined ? undefined : structuredClone(value);
  }

  async set(key: string, value: unknown): Promise<void> {
    try {
      this.entries.set(key, structuredClone(value));
    } catch (error) {
      throw new StorageError(
        'LL_S700',
        `Value for "${key}" cannot be stored`,
        { key },
        error instanceof Error ? error : undefined
      );
    }
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async keys(prefix = ''): Promise<string[]> {
    return Array.from(this.entries.keys()).filter((key) => key.startsWith(prefix));
  }

  /** Number of stored keys */
  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}

/**
 * Create an in-memory key-value store
 */
export function createMemoryStore(): MemoryKeyValueStore {
  return new MemoryKeyValueStore();
}
