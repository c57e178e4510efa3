import { SchemaMismatchError } from '@ledgerlink/core';

/**
 * Recognizes "invalid field" failures and pulls the offending field name
 * out of them. Backends that word the error differently supply their own.
 */
export interface InvalidFieldMatcher {
  isInvalidFieldError(error: unknown): boolean;
  /** The rejected field, or null when it cannot be identified */
  extractField(error: unknown): string | null;
}

/** Matches `Invalid field 'name'` and `Invalid field "name"` */
export const DEFAULT_INVALID_FIELD_PATTERN = /Invalid field ['"]([^'"]+)['"]/;

export interface PatternMatcherOptions {
  /** First capture group must be the field name */
  pattern?: RegExp;
  /** Substring that marks an invalid field error (default: 'Invalid field') */
  marker?: string;
}

function errorText(error: unknown): string {
  if (typeof error === 'string') return error;
  if (!(error instanceof Error)) return '';
  const parts = [error.message];
  if (error.cause instanceof Error) parts.push(error.cause.message);
  return parts.join('\n');
}

/**
 * Build a matcher from a regular expression over the error message
 */
export function createPatternMatcher(options: PatternMatcherOptions = {}): InvalidFieldMatcher {
  const pattern = options.pattern ?? DEFAULT_INVALID_FIELD_PATTERN;
  const marker = options.marker ?? 'Invalid field';

  return {
    isInvalidFieldError(error) {
      return error instanceof SchemaMismatchError || errorText(error).includes(marker);
    },
    extractField(error) {
      if (error instanceof SchemaMismatchError && error.field) return error.field;
      const match = pattern.exec(errorText(error));
      const field = match?.[1];
      return field && field.length > 0 ? field : null;
    },
  };
}

export const defaultInvalidFieldMatcher: InvalidFieldMatcher = createPatternMatcher();
