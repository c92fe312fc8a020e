/**
 * Session Tools
 *
 * Lifecycle tools: open and close a session's browser, list sessions,
 * and mint new session ids.
 */

import type { SessionRegistry } from '../session/session-registry.js';
import type { ToolDefinition } from '../server/types.js';
import {
  BrowserOpenInputSchema,
  BrowserCloseInputSchema,
  SessionListInputSchema,
  SessionCreateInputSchema,
} from './tool-schemas.js';

export async function browserOpen(
  registry: SessionRegistry,
  rawInput: unknown
): Promise<Record<string, unknown>> {
  const input = BrowserOpenInputSchema.parse(rawInput);
  const sessionId = input.session_id;

  const result = await registry.open(sessionId, {
    headless: input.headless,
    width: input.width,
    height: input.height,
  });

  if (result.alreadyOpen) {
    return {
      status: 'already_open',
      session_id: sessionId,
      message: `Browser is already open for session ${sessionId}`,
    };
  }

  const { headless, viewport } = result.settings;
  const mode = headless ? 'headless' : 'headed';
  return {
    status: 'opened',
    session_id: sessionId,
    headless,
    viewport,
    message: `Browser opened in ${mode} mode for session ${sessionId} with viewport ${viewport.width}x${viewport.height}`,
  };
}

export async function browserClose(
  registry: SessionRegistry,
  rawInput: unknown
): Promise<Record<string, unknown>> {
  const input = BrowserCloseInputSchema.parse(rawInput);
  const sessionId = input.session_id;
  const status = await registry.close(sessionId);

  return {
    status,
    session_id: sessionId,
    message:
      status === 'closed'
        ? `Browser closed and resources cleaned up for session ${sessionId}`
        : `No open browser for session ${sessionId}`,
  };
}

export async function sessionList(
  registry: SessionRegistry,
  rawInput: unknown
): Promise<Record<string, unknown>> {
  SessionListInputSchema.parse(rawInput ?? {});
  const sessions = registry.list();
  return {
    sessions,
    count: sessions.length,
    capacity: registry.capacity,
  };
}

export async function sessionCreate(
  registry: SessionRegistry,
  rawInput: unknown
): Promise<Record<string, unknown>> {
  SessionCreateInputSchema.parse(rawInput ?? {});
  const sessionId = await registry.createSessionId();
  return { session_id: sessionId };
}

export function createSessionTools(registry: SessionRegistry): ToolDefinition[] {
  return [
    {
      name: 'browser_open',
      title: 'Open Browser',
      description:
        'Open a browser for this session. Does nothing if the session already has one open.',
      inputSchema: BrowserOpenInputSchema,
      handler: (input) => browserOpen(registry, input),
    },
    {
      name: 'browser_close',
      title: 'Close Browser',
      description:
        'Close the browser and release all resources for this session. Closing an unknown or already closed session is not an error.',
      inputSchema: BrowserCloseInputSchema,
      handler: (input) => browserClose(registry, input),
    },
    {
      name: 'session_list',
      title: 'List Sessions',
      description: 'List resident sessions with their tab count and idle time',
      inputSchema: SessionListInputSchema,
      handler: (input) => sessionList(registry, input),
    },
    {
      name: 'session_create',
      title: 'Create Session',
      description: 'Create a new session and return its id',
      inputSchema: SessionCreateInputSchema,
      handler: (input) => sessionCreate(registry, input),
    },
  ];
}
