/**
 * Server Types
 *
 * Core types for server orchestration
 */

import type { z } from 'zod';
import type { ToolOutput } from '../tools/tool-result.types.js';

/**
 * MCP server identity
 */
export interface ServerConfig {
  name: string;
  version: string;
}

/**
 * Tool definition registered with the MCP server
 */
export interface ToolDefinition {
  name: string;
  title: string;
  description: string;
  /** Advertised through `.shape`; handlers parse raw input with it */
  inputSchema: z.AnyZodObject;
  handler: (rawInput: unknown) => Promise<ToolOutput>;
}
