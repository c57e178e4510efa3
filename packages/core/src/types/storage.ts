/**
 * Durable key-value store used for sync state and outbox persistence.
 *
 * Values must be structured-cloneable. Reads return `unknown`: the owner of a
 * key validates what it reads back before using it.
 */
export interface KeyValueStore {
  /** Read a value, or undefined when the key is absent */
  get(key: string): Promise<unknown>;

  /** Write a value, replacing any previous one */
  set(key: string, value: unknown): Promise<void>;

  /** Remove a key. Removing an absent key is a no-op. */
  delete(key: string): Promise<void>;

  /** List keys starting with `prefix` */
  keys(prefix?: string): Promise<string[]>;
}
