/**
 * Tab Tools
 *
 * browser_tabs: list, create, close or select a tab of a session.
 */

import type { SessionRegistry } from '../session/session-registry.js';
import type { ToolDefinition } from '../server/types.js';
import { McpError, ErrorCode, ErrorSeverity } from '../shared/errors/index.js';
import { BrowserTabsInputSchema } from './tool-schemas.js';

export async function browserTabs(
  registry: SessionRegistry,
  rawInput: unknown
): Promise<Record<string, unknown>> {
  const input = BrowserTabsInputSchema.parse(rawInput);
  const sessionId = input.session_id;
  const session = await registry.acquire(sessionId);

  switch (input.action) {
    case 'list': {
      const tabs = await session.listTabs();
      return { session_id: sessionId, tabs, active_index: session.activeIndex };
    }

    case 'create': {
      const { index } = await session.createTab();
      return {
        session_id: sessionId,
        index,
        tab_count: session.tabCount,
        message: `Created new tab at index ${index}`,
      };
    }

    case 'close': {
      const result = await session.closeTab(input.index);
      return {
        session_id: sessionId,
        closed_index: result.closedIndex,
        tab_count: result.tabCount,
        active_index: result.activeIndex,
        session_closed: result.sessionClosed,
        message: result.sessionClosed
          ? `Closed tab at index ${result.closedIndex}; it was the last tab, so the browser was closed`
          : `Closed tab at index ${result.closedIndex}`,
      };
    }

    case 'select': {
      if (input.index === undefined) {
        throw new McpError(
          'Index required for select action',
          ErrorCode.INVALID_INPUT,
          ErrorSeverity.WARNING
        );
      }
      const index = await session.selectTab(input.index);
      return {
        session_id: sessionId,
        active_index: index,
        message: `Selected tab at index ${index}`,
      };
    }
  }
}

export function createTabTools(registry: SessionRegistry): ToolDefinition[] {
  return [
    {
      name: 'browser_tabs',
      title: 'Manage Tabs',
      description:
        'List, create, close, or select a browser tab. close defaults to the active tab; closing the last tab closes the browser.',
      inputSchema: BrowserTabsInputSchema,
      handler: (input) => browserTabs(registry, input),
    },
  ];
}
