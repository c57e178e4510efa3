import { ReadWriteLock } from '@ledgerlink/core';

/**
 * Known-invalid fields per entity type.
 *
 * Shared by every query in the process that is handed the same instance.
 * Entries only grow until they are explicitly cleared.
 */
export interface InvalidFieldCache {
  /** Fields known to be invalid for an entity type */
  get(entityType: string): Promise<ReadonlySet<string>>;
  /** Record an invalid field */
  add(entityType: string, field: string): Promise<void>;
  /** Forget one entity type, or everything when omitted */
  clear(entityType?: string): Promise<void>;
  /** Copy of the whole cache, fields in insertion order */
  snapshot(): Promise<Record<string, string[]>>;
}

/**
 * In-process {@link InvalidFieldCache}. Reads run concurrently, writes are
 * exclusive.
 *
 * @example
 * ```typescript
 * const cache = new MemoryInvalidFieldCache();
 * const client = new RecordQueryClient({ transport, cache });
 *
 * await client.searchRead('widget', { fields: ['id', 'name', 'ghost_field'] });
 * await cache.snapshot(); // { widget: ['ghost_field'] }
 * ```
 */
export class MemoryInvalidFieldCache implements InvalidFieldCache {
  private readonly lock = new ReadWriteLock();
  private readonly entries = new Map<string, Set<string>>();

  get(entityType: string): Promise<ReadonlySet<string>> {
    return this.lock.read(() => new Set(this.entries.get(entityType)));
  }

  add(entityType: string, field: string): Promise<void> {
    return this.lock.write(() => {
      const fields = this.entries.get(entityType);
      if (fields) {
        fields.add(field);
      } else {
        this.entries.set(entityType, new Set([field]));
      }
    });
  }

  clear(entityType?: string): Promise<void> {
    return this.lock.write(() => {
      if (entityType === undefined) {
        this.entries.clear();
      } else {
        this.entries.delete(entityType);
      }
    });
  }

  snapshot(): Promise<Record<string, string[]>> {
    return this.lock.read(() => {
      const result: Record<string, string[]> = {};
      for (const [entityType, fields] of this.entries) {
        result[entityType] = Array.from(fields);
      }
      return result;
    });
  }
}
