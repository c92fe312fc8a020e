/**
 * Error Response Utilities
 *
 * Builders for the `CallToolResult` payloads returned by tool handlers.
 */

import { z } from 'zod';
import { ErrorCode, ErrorSeverity } from './error-codes.js';
import { McpError } from './mcp-error.js';

/**
 * MCP Tool Response type
 */
export interface McpToolResponse {
  [x: string]: unknown;
  content: (
    | { type: 'text'; text: string }
    | { type: 'image'; data: string; mimeType: string }
  )[];
  structuredContent?: Record<string, unknown>;
  isError?: boolean;
}

/**
 * Create a structured error response for MCP tools
 *
 * @param includeStack - defaults to true outside NODE_ENV=production
 */
export function createErrorResponse(
  error: unknown,
  includeStack: boolean = process.env.NODE_ENV !== 'production'
): McpToolResponse {
  let mcpError: McpError;
  if (error instanceof McpError) {
    mcpError = error;
  } else if (error instanceof z.ZodError) {
    const issues = error.issues.map((issue) => `${issue.path.join('.') || 'input'}: ${issue.message}`);
    mcpError = new McpError(
      `Invalid input: ${issues.join('; ')}`,
      ErrorCode.INVALID_INPUT,
      ErrorSeverity.WARNING,
      { issues },
      error
    );
  } else if (error instanceof Error) {
    mcpError = McpError.fromError(error);
  } else {
    mcpError = new McpError(String(error), ErrorCode.UNKNOWN_ERROR);
  }

  const structured = mcpError.toStructured();
  if (!includeStack) {
    delete structured.stack;
  }

  const textParts: string[] = [
    `Error: ${structured.error}`,
    `Code: ${structured.code}`,
    `Severity: ${structured.severity}`,
  ];

  if (structured.details && Object.keys(structured.details).length > 0) {
    textParts.push(`Details: ${JSON.stringify(structured.details, null, 2)}`);
  }

  if (includeStack && structured.stack) {
    textParts.push(`\nStack trace:\n${structured.stack}`);
  }

  return {
    content: [{ type: 'text', text: textParts.join('\n') }],
    structuredContent: structured,
    isError: true,
  };
}

/**
 * Create a success response with structured output
 */
export function createSuccessResponse(output: Record<string, unknown>): McpToolResponse {
  return {
    content: [{ type: 'text', text: JSON.stringify(output, null, 2) }],
    structuredContent: output,
    isError: false,
  };
}

/**
 * Run a handler and convert anything it throws into an error response.
 */
export async function safeExecute(fn: () => Promise<McpToolResponse>): Promise<McpToolResponse> {
  try {
    return await fn();
  } catch (error) {
    return createErrorResponse(error);
  }
}
