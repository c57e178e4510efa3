export const FIELD_PRESETS = ['minimal', 'basic', 'standard', 'all'] as const;

/**
 * Named field lists for queries
 */
export type FieldPreset = (typeof FIELD_PRESETS)[number];

export const MINIMAL_FIELDS: readonly string[] = ['id', 'name', 'display_name'];

export const BASIC_FIELDS: readonly string[] = [
  'id',
  'name',
  'display_name',
  'create_date',
  'write_date',
];

export const STANDARD_FIELDS: readonly string[] = [
  'id',
  'name',
  'display_name',
  'create_uid',
  'create_date',
  'write_uid',
  'write_date',
];

const GENERIC_PRESETS: Record<Exclude<FieldPreset, 'all'>, readonly string[]> = {
  minimal: MINIMAL_FIELDS,
  basic: BASIC_FIELDS,
  standard: STANDARD_FIELDS,
};

/**
 * Per-entity presets layered over the generic ones.
 *
 * @example
 * ```typescript
 * const presets = new FieldPresetRegistry();
 * presets.register('contact', 'basic', ['id', 'name', 'email', 'phone']);
 *
 * presets.resolve('contact', 'basic'); // ['id', 'name', 'email', 'phone']
 * presets.resolve('invoice', 'basic'); // BASIC_FIELDS
 * presets.resolve('invoice', 'all');   // null
 * ```
 */
export class FieldPresetRegistry {
  private readonly custom = new Map<string, Map<FieldPreset, readonly string[]>>();

  register(entityType: string, preset: Exclude<FieldPreset, 'all'>, fields: readonly string[]): void {
    let presets = this.custom.get(entityType);
    if (!presets) {
      presets = new Map();
      this.custom.set(entityType, presets);
    }
    presets.set(preset, [...fields]);
  }

  /**
   * Field list for a preset; null for `all`, which requests every field
   */
  resolve(entityType: string, preset: FieldPreset): string[] | null {
    if (preset === 'all') return null;
    const fields = this.custom.get(entityType)?.get(preset) ?? GENERIC_PRESETS[preset];
    return [...fields];
  }

  clear(entityType?: string): void {
    if (entityType === undefined) {
      this.custom.clear();
    } else {
      this.custom.delete(entityType);
    }
  }
}
