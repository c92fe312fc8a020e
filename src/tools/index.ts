/**
 * MCP Tools Module
 *
 * Browser automation tools exposed via MCP protocol. Every tool takes a
 * `session_id` (default "default") and runs against that session only.
 */

import type { SessionRegistry } from '../session/session-registry.js';
import type { ToolDefinition } from '../server/types.js';
import { createSessionTools } from './session-tools.js';
import { createTabTools } from './tab-tools.js';
import { createPageTools } from './page-tools.js';
import { createInteractionTools } from './interaction-tools.js';

export { createSessionTools, createTabTools, createPageTools, createInteractionTools };
export * from './tool-schemas.js';
export * from './tool-result.types.js';

/**
 * Every tool, in the order they are advertised.
 */
export function createAllTools(registry: SessionRegistry): ToolDefinition[] {
  return [
    ...createSessionTools(registry),
    ...createTabTools(registry),
    ...createPageTools(registry),
    ...createInteractionTools(registry),
  ];
}
