/**
 * Error Codes
 *
 * Machine-readable codes and severities carried by structured tool errors.
 */

export enum ErrorCode {
  // Session registry
  SESSION_NOT_FOUND = 'SESSION_NOT_FOUND',
  SESSION_CLOSED = 'SESSION_CLOSED',

  // Tab list
  TAB_NOT_FOUND = 'TAB_NOT_FOUND',
  NO_PAGE_AVAILABLE = 'NO_PAGE_AVAILABLE',

  // Driver
  DRIVER_FAILURE = 'DRIVER_FAILURE',
  ELEMENT_NOT_FOUND = 'ELEMENT_NOT_FOUND',
  INVALID_TARGET = 'INVALID_TARGET',

  // Input
  INVALID_INPUT = 'INVALID_INPUT',

  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

export enum ErrorSeverity {
  DEBUG = 'debug',
  INFO = 'info',
  WARNING = 'warning',
  ERROR = 'error',
  CRITICAL = 'critical',
}
