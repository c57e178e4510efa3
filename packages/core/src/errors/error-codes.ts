/**
 * Ledgerlink Error Codes
 *
 * Error codes are structured as LL_[CATEGORY][NUMBER]:
 * - T: Transport errors (T100-T199), retryable
 * - A: Authorization errors (A200-A299)
 * - V: Validation / permanent errors (V300-V399)
 * - C: Conflict errors (C500-C599)
 * - F: Schema / field errors (F600-F699)
 * - S: Storage errors (S700-S799)
 * - Y: Sync lifecycle errors (Y800-Y899)
 * - X: Internal errors (X900-X999)
 */

/**
 * Error code definitions with messages and suggestions
 */
export const ERROR_CODES = {
  // Transport errors (T100-T199)
  LL_T100: {
    code: 'LL_T100',
    message: 'Transport request failed',
    suggestion: 'Check network connectivity and server status.',
  },
  LL_T101: {
    code: 'LL_T101',
    message: 'Connection failed',
    suggestion: 'Unable to reach the server. Check the URL and network.',
  },
  LL_T102: {
    code: 'LL_T102',
    message: 'Request timeout',
    suggestion: 'The server did not answer in time. The request can be retried.',
  },
  LL_T103: {
    code: 'LL_T103',
    message: 'Server error',
    suggestion: 'The server failed to process the request. Retry later.',
  },

  // Authorization errors (A200-A299)
  LL_A200: {
    code: 'LL_A200',
    message: 'Unauthorized',
    suggestion: 'The access token is missing, invalid or expired. Re-authenticate.',
  },
  LL_A201: {
    code: 'LL_A201',
    message: 'Forbidden',
    suggestion: 'The current credentials are not allowed to perform this operation.',
  },

  // Validation errors (V300-V399)
  LL_V300: {
    code: 'LL_V300',
    message: 'Request rejected by server',
    suggestion: 'The server refused the payload. Inspect the error details.',
  },
  LL_V301: {
    code: 'LL_V301',
    message: 'Malformed response',
    suggestion: 'The server response does not have the expected shape.',
  },
  LL_V302: {
    code: 'LL_V302',
    message: 'Resource not found',
    suggestion: 'Check the endpoint path and the record identifiers.',
  },
  LL_V303: {
    code: 'LL_V303',
    message: 'Invalid value',
    suggestion: 'Only JSON-compatible values can be staged or sent.',
  },
  LL_V304: {
    code: 'LL_V304',
    message: 'Invalid configuration',
    suggestion: 'Check the client configuration options.',
  },

  // Conflict errors (C500-C599)
  LL_C500: {
    code: 'LL_C500',
    message: 'Sync conflict detected',
    suggestion: 'Resolve the reported conflicts before pushing again.',
  },

  // Schema errors (F600-F699)
  LL_F600: {
    code: 'LL_F600',
    message: 'Invalid field',
    suggestion: 'The backend does not know one of the requested fields.',
  },
  LL_F601: {
    code: 'LL_F601',
    message: 'Field fallback strategy exhausted',
    suggestion: 'Every fallback level failed. Inspect the invalid field list and the query.',
  },
  LL_F602: {
    code: 'LL_F602',
    message: 'Schema introspection failed',
    suggestion: 'The backend field list could not be fetched.',
  },

  // Storage errors (S700-S799)
  LL_S700: {
    code: 'LL_S700',
    message: 'Storage operation failed',
    suggestion: 'Check the key-value store configuration.',
  },
  LL_S701: {
    code: 'LL_S701',
    message: 'Persisted sync state is corrupt',
    suggestion: 'Reset the sync state for this user and device.',
  },

  // Sync lifecycle errors (Y800-Y899)
  LL_Y800: {
    code: 'LL_Y800',
    message: 'Operation cancelled',
    suggestion: 'The caller cancelled the operation before a response was observed.',
  },
  LL_Y801: {
    code: 'LL_Y801',
    message: 'Unknown conflict',
    suggestion: 'The conflict id is not recorded in the sync state.',
  },
  LL_Y802: {
    code: 'LL_Y802',
    message: 'Duplicate idempotency key',
    suggestion: 'Each staged change needs its own idempotency key.',
  },

  // Internal errors (X900-X999)
  LL_X900: {
    code: 'LL_X900',
    message: 'Internal error',
    suggestion: 'This is unexpected. Please report it with the error context.',
  },
} as const;

/**
 * Error code type
 */
export type ErrorCode = keyof typeof ERROR_CODES;

/**
 * Error info type
 */
export interface ErrorInfo {
  code: string;
  message: string;
  suggestion: string;
}

/**
 * Get error info by code
 */
export function getErrorInfo(code: ErrorCode): ErrorInfo {
  return ERROR_CODES[code];
}

/**
 * Error category
 */
export type ErrorCategory =
  | 'transport'
  | 'authorization'
  | 'validation'
  | 'conflict'
  | 'schema'
  | 'storage'
  | 'sync'
  | 'internal';

/**
 * Get the category of an error code
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  const letter = code.charAt(3);
  switch (letter) {
    case 'T':
      return 'transport';
    case 'A':
      return 'authorization';
    case 'V':
      return 'validation';
    case 'C':
      return 'conflict';
    case 'F':
      return 'schema';
    case 'S':
      return 'storage';
    case 'Y':
      return 'sync';
    default:
      return 'internal';
  }
}
