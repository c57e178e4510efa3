import { z } from 'zod';

/**
 * A structured value as it travels over the wire: string, number, boolean,
 * null, list or map. Payloads cross the transport boundary as `Value` and are
 * projected into typed records by the component that owns them.
 */
export type Value = string | number | boolean | null | Value[] | ValueMap;

/**
 * Field name to value
 */
export interface ValueMap {
  [key: string]: Value;
}

/**
 * Tag of a {@link Value}
 */
export type ValueKind = 'string' | 'number' | 'boolean' | 'null' | 'list' | 'map';

export const valueSchema: z.ZodType<Value> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(valueSchema),
    z.record(valueSchema),
  ])
);

export const valueMapSchema: z.ZodType<ValueMap> = z.record(valueSchema);

/**
 * Get the tag of a value
 */
export function kindOf(value: Value): ValueKind {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'list';
  switch (typeof value) {
    case 'string':
      return 'string';
    case 'number':
      return 'number';
    case 'boolean':
      return 'boolean';
    default:
      return 'map';
  }
}

export function isValueMap(value: Value | undefined): value is ValueMap {
  return value !== undefined && kindOf(value) === 'map';
}

/**
 * Parse an unknown input (e.g. a decoded JSON body) into a Value.
 * Returns null when the input holds something JSON cannot carry.
 */
export function toValue(input: unknown): Value | null {
  const result = valueSchema.safeParse(input);
  return result.success ? result.data : null;
}
