import { isValueMap, type Value, type ValueMap } from '@ledgerlink/core';

export interface MergeOptions {
  /** Side that wins when both carry different values (default: 'local') */
  prefer?: 'local' | 'remote';
}

/**
 * Field-by-field merge of a conflicting record, for a `merged` resolution.
 *
 * Fields present on one side only are taken from that side. Fields present
 * on both sides are kept when deeply equal, otherwise the preferred side
 * wins. A remotely deleted record (`remote === null`) merges to a copy of
 * the local payload.
 *
 * @example
 * ```typescript
 * const payload = mergePayloads(conflict.localPayload, conflict.remotePayload, {
 *   prefer: 'remote',
 * });
 * await resolver.resolve([{ conflictId: conflict.id, resolution: { type: 'merged', payload } }]);
 * ```
 */
export function mergePayloads(
  local: ValueMap,
  remote: ValueMap | null,
  options: MergeOptions = {}
): ValueMap {
  if (remote === null) return { ...local };

  const prefer = options.prefer ?? 'local';
  const result: ValueMap = { ...remote };

  for (const [key, localValue] of Object.entries(local)) {
    if (!(key in remote)) {
      result[key] = localValue;
      continue;
    }
    const remoteValue = remote[key];
    if (remoteValue !== undefined && deepEqual(localValue, remoteValue)) continue;
    result[key] = prefer === 'local' ? localValue : (remoteValue ?? localValue);
  }

  return result;
}

/**
 * Names of the fields whose values differ between the two payloads
 */
export function conflictingFields(local: ValueMap, remote: ValueMap | null): string[] {
  if (remote === null) return Object.keys(local);

  const keys = new Set([...Object.keys(local), ...Object.keys(remote)]);
  return Array.from(keys).filter((key) => {
    const a = local[key];
    const b = remote[key];
    return a === undefined || b === undefined || !deepEqual(a, b);
  });
}

/**
 * Deep equality check
 */
export function deepEqual(a: Value, b: Value): boolean {
  if (a === b) return true;
  if (a === null || b === null) return false;

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
    return a.every((item, index) => {
      const other = b[index];
      return other !== undefined && deepEqual(item, other);
    });
  }

  if (isValueMap(a) && isValueMap(b)) {
    const aKeys = Object.keys(a);
    if (aKeys.length !== Object.keys(b).length) return false;
    return aKeys.every((key) => {
      const left = a[key];
      const right = b[key];
      return left !== undefined && right !== undefined && deepEqual(left, right);
    });
  }

  return false;
}
