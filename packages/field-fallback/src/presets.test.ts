import { describe, expect, it } from 'vitest';
import {
  BASIC_FIELDS,
  FIELD_PRESETS,
  FieldPresetRegistry,
  MINIMAL_FIELDS,
  STANDARD_FIELDS,
} from './presets.js';

describe('FieldPresetRegistry', () => {
  it('should resolve generic presets', () => {
    const presets = new FieldPresetRegistry();

    expect(presets.resolve('task', 'minimal')).toEqual(MINIMAL_FIELDS);
    expect(presets.resolve('task', 'basic')).toEqual(BASIC_FIELDS);
    expect(presets.resolve('task', 'standard')).toEqual(STANDARD_FIELDS);
  });

  it('should offer one field list per named preset', () => {
    const presets = new FieldPresetRegistry();
    const lists = FIELD_PRESETS.filter((name) => name !== 'all').map((name) => presets.resolve('task', name));

    expect(FIELD_PRESETS).toEqual(['minimal', 'basic', 'standard', 'all']);
    expect(new Set(lists.map((list) => JSON.stringify(list))).size).toBe(lists.length);
  });

  it('should return null for all', () => {
    expect(new FieldPresetRegistry().resolve('task', 'all')).toBeNull();
  });

  it('should prefer custom presets for their entity type', () => {
    const presets = new FieldPresetRegistry();
    presets.register('contact', 'basic', ['id', 'name', 'email']);

    expect(presets.resolve('contact', 'basic')).toEqual(['id', 'name', 'email']);
    expect(presets.resolve('contact', 'minimal')).toEqual(MINIMAL_FIELDS);
    expect(presets.resolve('task', 'basic')).toEqual(BASIC_FIELDS);

    presets.clear('contact');
    expect(presets.resolve('contact', 'basic')).toEqual(BASIC_FIELDS);
  });

  it('should return copies', () => {
    const presets = new FieldPresetRegistry();
    const fields = presets.resolve('task', 'minimal');
    fields?.push('extra');

    expect(presets.resolve('task', 'minimal')).toEqual(MINIMAL_FIELDS);
  });
});
