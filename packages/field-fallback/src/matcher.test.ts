import { describe, expect, it } from 'vitest';
import { SchemaMismatchError, ValidationError } from '@ledgerlink/core';
import { createPatternMatcher, defaultInvalidFieldMatcher } from './matcher.js';

describe('defaultInvalidFieldMatcher', () => {
  it('should extract single- and double-quoted field names', () => {
    expect(
      defaultInvalidFieldMatcher.extractField(new Error("Invalid field 'ghost_field' on model 'widget'"))
    ).toBe('ghost_field');
    expect(defaultInvalidFieldMatcher.extractField('Invalid field "x_color" in leaf')).toBe('x_color');
  });

  it('should recognize invalid field errors by their text', () => {
    const error = new ValidationError('LL_V300', "Invalid field 'ghost_field' on model 'widget'");

    expect(defaultInvalidFieldMatcher.isInvalidFieldError(error)).toBe(true);
    expect(defaultInvalidFieldMatcher.isInvalidFieldError(new Error('Access denied'))).toBe(false);
    expect(defaultInvalidFieldMatcher.isInvalidFieldError(42)).toBe(false);
  });

  it('should look into the cause', () => {
    const error = new Error('Query failed', { cause: new Error("Invalid field 'legacy' on model 'task'") });

    expect(defaultInvalidFieldMatcher.extractField(error)).toBe('legacy');
  });

  it('should return null when the field cannot be identified', () => {
    expect(defaultInvalidFieldMatcher.extractField(new Error('Invalid field in domain'))).toBeNull();
  });

  it('should read the field from SchemaMismatchError', () => {
    const error = new SchemaMismatchError('widget', 'ghost_field');

    expect(defaultInvalidFieldMatcher.isInvalidFieldError(error)).toBe(true);
    expect(defaultInvalidFieldMatcher.extractField(error)).toBe('ghost_field');
  });
});

describe('createPatternMatcher', () => {
  it('should accept a backend-specific pattern', () => {
    const matcher = createPatternMatcher({
      pattern: /unknown column `([^`]+)`/,
      marker: 'unknown column',
    });
    const error = new Error('unknown column `legacy_code` in field list');

    expect(matcher.isInvalidFieldError(error)).toBe(true);
    expect(matcher.extractField(error)).toBe('legacy_code');
  });
});
