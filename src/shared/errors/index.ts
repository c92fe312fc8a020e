/**
 * Error handling
 *
 * Error types, codes, and builders for structured tool responses.
 */

export * from './error-codes.js';
export * from './mcp-error.js';
export * from './error-response.js';
