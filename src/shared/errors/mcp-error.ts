/**
 * MCP Error Types
 *
 * Structured error types for tool responses.
 */

import { ErrorCode, ErrorSeverity } from './error-codes.js';

/**
 * Structured error payload returned in `structuredContent`
 */
export interface StructuredError {
  [x: string]: unknown;
  error: string;
  code: ErrorCode;
  severity: ErrorSeverity;
  details?: Record<string, unknown>;
  stack?: string;
}

/**
 * Base MCP Error class
 *
 * Extends Error with the metadata needed for structured error responses.
 */
export class McpError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    public readonly severity: ErrorSeverity = ErrorSeverity.ERROR,
    public readonly details?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, cause ? { cause } : undefined);
    this.name = 'McpError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  toStructured(): StructuredError {
    const structured: StructuredError = {
      error: this.message,
      code: this.code,
      severity: this.severity,
    };
    if (this.details) {
      structured.details = this.details;
    }
    if (this.stack) {
      structured.stack = this.stack;
    }
    return structured;
  }

  static fromError(
    error: Error,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    severity: ErrorSeverity = ErrorSeverity.ERROR
  ): McpError {
    return new McpError(error.message, code, severity, undefined, error);
  }
}

/**
 * Errors raised by the session registry, tab list and driver calls.
 *
 * Construct through the static factories so codes and details stay uniform.
 */
export class SessionError extends McpError {
  constructor(
    message: string,
    code: ErrorCode,
    severity: ErrorSeverity = ErrorSeverity.ERROR,
    details?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, code, severity, details, cause);
    this.name = 'SessionError';
  }

  static notFound(sessionId: string): SessionError {
    return new SessionError(
      `Session not found: ${sessionId}`,
      ErrorCode.SESSION_NOT_FOUND,
      ErrorSeverity.WARNING,
      { session_id: sessionId }
    );
  }

  static sessionClosed(sessionId: string): SessionError {
    return new SessionError(
      `Session ${sessionId} was closed while the operation was in progress`,
      ErrorCode.SESSION_CLOSED,
      ErrorSeverity.WARNING,
      { session_id: sessionId }
    );
  }

  static tabNotFound(sessionId: string, index: number, tabCount: number): SessionError {
    return new SessionError(
      `Tab index ${index} out of range (session ${sessionId} has ${tabCount} tab(s))`,
      ErrorCode.TAB_NOT_FOUND,
      ErrorSeverity.WARNING,
      { session_id: sessionId, index, tab_count: tabCount }
    );
  }

  static noPage(sessionId: string): SessionError {
    return new SessionError(
      `No page available in session ${sessionId}. Use browser_open or browser_navigate first.`,
      ErrorCode.NO_PAGE_AVAILABLE,
      ErrorSeverity.WARNING,
      { session_id: sessionId }
    );
  }

  static elementNotFound(sessionId: string, target: string): SessionError {
    return new SessionError(
      `Element not found: ${target}`,
      ErrorCode.ELEMENT_NOT_FOUND,
      ErrorSeverity.WARNING,
      { session_id: sessionId, target }
    );
  }

  static invalidTarget(message: string): SessionError {
    return new SessionError(message, ErrorCode.INVALID_TARGET, ErrorSeverity.WARNING);
  }

  /**
   * Wrap a failure thrown by the automation driver.
   */
  static driverFailure(sessionId: string, action: string, cause: unknown): SessionError {
    const err = cause instanceof Error ? cause : new Error(String(cause));
    return new SessionError(
      `${action} failed: ${err.message}`,
      ErrorCode.DRIVER_FAILURE,
      ErrorSeverity.ERROR,
      { session_id: sessionId, action },
      err
    );
  }
}

/**
 * Type guard for SessionError
 */
export function isSessionError(error: unknown): error is SessionError {
  return error instanceof SessionError;
}
