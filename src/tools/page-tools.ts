/**
 * Page Tools
 *
 * Navigation and read-only page state: navigate, back, wait, screenshot,
 * HTML, accessibility snapshot, evaluate, resize, and the session's captured
 * console and network events.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import type { SessionRegistry } from '../session/session-registry.js';
import type { ToolDefinition } from '../server/types.js';
import { SessionError } from '../shared/errors/index.js';
import { writeTempFile } from '../lib/temp-file.js';
import {
  NavigateInputSchema,
  NavigateBackInputSchema,
  WaitForInputSchema,
  ScreenshotInputSchema,
  GetHtmlInputSchema,
  SnapshotInputSchema,
  EvaluateInputSchema,
  ResizeInputSchema,
  ConsoleMessagesInputSchema,
  NetworkRequestsInputSchema,
} from './tool-schemas.js';
import { actionResult, borrowPage, driverCall, readTitle } from './page-context.js';
import { quoteAriaValue, withElement } from './locator.js';
import { INLINE_IMAGE_LIMIT_BYTES, type ToolOutput } from './tool-result.types.js';

/** Navigation timeout in ms */
const NAVIGATION_TIMEOUT_MS = 30000;

/** How long text waits poll before failing */
const TEXT_WAIT_TIMEOUT_MS = 30000;

/**
 * Cut `html` to `maxLength` characters, noting how much was dropped.
 */
export function truncateHtml(html: string, maxLength: number): string {
  if (html.length <= maxLength) {
    return html;
  }
  return `${html.slice(0, maxLength)}\n\n... [truncated ${html.length - maxLength} characters]`;
}

export async function navigate(
  registry: SessionRegistry,
  rawInput: unknown
): Promise<Record<string, unknown>> {
  const input = NavigateInputSchema.parse(rawInput);
  const sessionId = input.session_id;

  // navigate is the one action that opens the browser on demand
  const session = await registry.acquire(sessionId);
  const { page } = await session.open();

  await driverCall(sessionId, 'navigate', () =>
    page.goto(input.url, { waitUntil: 'domcontentloaded', timeout: NAVIGATION_TIMEOUT_MS })
  );
  return actionResult(page, `Navigated to ${input.url}`);
}

export async function navigateBack(
  registry: SessionRegistry,
  rawInput: unknown
): Promise<Record<string, unknown>> {
  const input = NavigateBackInputSchema.parse(rawInput);
  const { page } = await borrowPage(registry, input.session_id);

  const response = await driverCall(input.session_id, 'navigate_back', () =>
    page.goBack({ waitUntil: 'domcontentloaded', timeout: NAVIGATION_TIMEOUT_MS })
  );
  return actionResult(page, response ? 'Navigated back' : 'No previous page in history');
}

export async function waitFor(
  registry: SessionRegistry,
  rawInput: unknown
): Promise<Record<string, unknown>> {
  const input = WaitForInputSchema.parse(rawInput);
  const sessionId = input.session_id;
  const { page } = await borrowPage(registry, sessionId);

  if (input.time !== undefined) {
    await sleep(Math.round(input.time * 1000));
    return { message: `Waited for ${input.time} seconds` };
  }

  if (input.text !== undefined) {
    const text = input.text;
    await driverCall(sessionId, 'wait_for_text', () =>
      page.waitForSelector(`::-p-text(${quoteAriaValue(text)})`, { timeout: TEXT_WAIT_TIMEOUT_MS })
    );
    return { message: `Waited for text '${text}' to appear` };
  }

  if (input.text_gone !== undefined) {
    const text = input.text_gone;
    await driverCall(sessionId, 'wait_for_text_gone', () =>
      page.waitForSelector(`::-p-text(${quoteAriaValue(text)})`, {
        hidden: true,
        timeout: TEXT_WAIT_TIMEOUT_MS,
      })
    );
    return { message: `Waited for text '${text}' to disappear` };
  }

  return { message: 'No wait condition specified' };
}

export async function takeScreenshot(
  registry: SessionRegistry,
  rawInput: unknown
): Promise<ToolOutput> {
  const input = ScreenshotInputSchema.parse(rawInput);
  const sessionId = input.session_id;
  const { page } = await borrowPage(registry, sessionId);

  const hasTarget = Boolean((input.role && input.name) || input.selector);
  const data = hasTarget
    ? await withElement(page, input, sessionId, (element) =>
        driverCall(sessionId, 'screenshot', () => element.screenshot({ type: input.type }))
      )
    : await driverCall(sessionId, 'screenshot', () =>
        page.screenshot({ type: input.type, fullPage: input.full_page })
      );

  const mimeType = `image/${input.type}`;
  const sizeBytes = data.byteLength;

  if (sizeBytes >= INLINE_IMAGE_LIMIT_BYTES) {
    const path = await writeTempFile(data, input.type);
    return { type: 'file', path, mimeType, sizeBytes };
  }

  return {
    type: 'image',
    data: Buffer.from(data).toString('base64'),
    mimeType,
    sizeBytes,
  };
}

export async function getHtml(
  registry: SessionRegistry,
  rawInput: unknown
): Promise<Record<string, unknown>> {
  const input = GetHtmlInputSchema.parse(rawInput);
  const sessionId = input.session_id;
  const { page } = await borrowPage(registry, sessionId);
  const selector = input.selector ?? 'body';

  const html = await driverCall(sessionId, 'get_html', () =>
    page.evaluate((sel) => {
      const el = document.querySelector(sel);
      return el ? el.innerHTML : null;
    }, selector)
  );

  if (html === null) {
    throw SessionError.elementNotFound(sessionId, selector);
  }

  const content = truncateHtml(html, input.max_length);
  return {
    selector,
    html: content,
    length: content.length,
    original_length: html.length,
  };
}

export async function snapshot(
  registry: SessionRegistry,
  rawInput: unknown
): Promise<Record<string, unknown>> {
  const input = SnapshotInputSchema.parse(rawInput);
  const { page } = await borrowPage(registry, input.session_id);

  const tree = await driverCall(input.session_id, 'snapshot', () =>
    page.accessibility.snapshot({ interestingOnly: input.interesting_only })
  );
  return {
    url: page.url(),
    title: await readTitle(page),
    snapshot: tree,
  };
}

/**
 * Run caller-supplied function source in the page, optionally with an
 * element as its argument.
 */
export async function evaluate(
  registry: SessionRegistry,
  rawInput: unknown
): Promise<Record<string, unknown>> {
  const input = EvaluateInputSchema.parse(rawInput);
  const sessionId = input.session_id;
  const { page } = await borrowPage(registry, sessionId);

  let expression = `(${input.function})()`;
  if (input.selector !== undefined) {
    await withElement(page, { selector: input.selector }, sessionId, async () => undefined);
    expression = `(${input.function})(document.querySelector(${JSON.stringify(input.selector)}))`;
  }

  const result: unknown = await driverCall(sessionId, 'evaluate', () => page.evaluate(expression));
  return { result: result ?? null };
}

export async function resize(
  registry: SessionRegistry,
  rawInput: unknown
): Promise<Record<string, unknown>> {
  const input = ResizeInputSchema.parse(rawInput);
  const { page } = await borrowPage(registry, input.session_id);

  await driverCall(input.session_id, 'resize', () =>
    page.setViewport({ width: input.width, height: input.height })
  );
  return actionResult(page, `Resized viewport to ${input.width}x${input.height}`);
}

export async function consoleMessages(
  registry: SessionRegistry,
  rawInput: unknown
): Promise<Record<string, unknown>> {
  const input = ConsoleMessagesInputSchema.parse(rawInput);
  const session = await registry.acquire(input.session_id);
  const messages = session.consoleMessages(input.only_errors);
  return { session_id: input.session_id, count: messages.length, messages };
}

export async function networkRequests(
  registry: SessionRegistry,
  rawInput: unknown
): Promise<Record<string, unknown>> {
  const input = NetworkRequestsInputSchema.parse(rawInput);
  const session = await registry.acquire(input.session_id);
  const requests = session.networkRequests();
  return { session_id: input.session_id, count: requests.length, requests };
}

export function createPageTools(registry: SessionRegistry): ToolDefinition[] {
  return [
    {
      name: 'browser_navigate',
      title: 'Navigate',
      description: "Navigate the session's active tab to a URL. Opens the browser if needed.",
      inputSchema: NavigateInputSchema,
      handler: (input) => navigate(registry, input),
    },
    {
      name: 'browser_navigate_back',
      title: 'Navigate Back',
      description: 'Go back to the previous page',
      inputSchema: NavigateBackInputSchema,
      handler: (input) => navigateBack(registry, input),
    },
    {
      name: 'browser_wait_for',
      title: 'Wait',
      description: 'Wait for text to appear or disappear, or for a number of seconds',
      inputSchema: WaitForInputSchema,
      handler: (input) => waitFor(registry, input),
    },
    {
      name: 'browser_take_screenshot',
      title: 'Take Screenshot',
      description:
        'Screenshot the viewport, the full page, or one element. Large images are saved to a temp file and returned by path.',
      inputSchema: ScreenshotInputSchema,
      handler: (input) => takeScreenshot(registry, input),
    },
    {
      name: 'browser_get_html',
      title: 'Get HTML',
      description: 'Get the inner HTML of the page body or of an element, for debugging when locators fail',
      inputSchema: GetHtmlInputSchema,
      handler: (input) => getHtml(registry, input),
    },
    {
      name: 'browser_snapshot',
      title: 'Accessibility Snapshot',
      description: 'Capture the accessibility tree of the active tab',
      inputSchema: SnapshotInputSchema,
      handler: (input) => snapshot(registry, input),
    },
    {
      name: 'browser_evaluate',
      title: 'Evaluate JavaScript',
      description: 'Evaluate a JavaScript function on the page, optionally receiving an element',
      inputSchema: EvaluateInputSchema,
      handler: (input) => evaluate(registry, input),
    },
    {
      name: 'browser_resize',
      title: 'Resize Viewport',
      description: 'Resize the viewport of the active tab',
      inputSchema: ResizeInputSchema,
      handler: (input) => resize(registry, input),
    },
    {
      name: 'browser_console_messages',
      title: 'Console Messages',
      description: "Console messages captured from the session's tabs since the browser was opened",
      inputSchema: ConsoleMessagesInputSchema,
      handler: (input) => consoleMessages(registry, input),
    },
    {
      name: 'browser_network_requests',
      title: 'Network Requests',
      description: "Network requests captured from the session's tabs since the browser was opened",
      inputSchema: NetworkRequestsInputSchema,
      handler: (input) => networkRequests(registry, input),
    },
  ];
}
