/**
 * Element Locator
 *
 * Turns an element target ({ role, name } or { selector }) into a puppeteer
 * selector and maps lookup failures onto session errors.
 */

import { TimeoutError, type ElementHandle, type KeyInput, type Locator, type Page } from 'puppeteer-core';
import { SessionError } from '../shared/errors/index.js';
import { createLogger } from '../shared/services/logging.service.js';

const logger = createLogger('locator');

/** How long element lookups wait before ELEMENT_NOT_FOUND */
export const DEFAULT_ELEMENT_TIMEOUT_MS = 5000;

export interface TargetFields {
  element?: string;
  role?: string;
  name?: string;
  selector?: string;
}

/**
 * Quote a value for use inside a puppeteer ARIA selector attribute.
 */
export function quoteAriaValue(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

/**
 * Puppeteer selector for a target. Role + name wins over selector.
 *
 * @throws SessionError INVALID_TARGET when neither form is given
 */
export function toSelector(target: TargetFields): string {
  if (target.role && target.name) {
    return `::-p-aria([name=${quoteAriaValue(target.name)}][role=${quoteAriaValue(target.role)}])`;
  }
  if (target.selector) {
    return target.selector;
  }
  throw SessionError.invalidTarget('Must provide either (role + name) or selector');
}

/**
 * Target as shown in result messages, e.g. `Submit (role=button, name=Submit)`.
 */
export function describeTarget(target: TargetFields): string {
  const how =
    target.role && target.name
      ? `(role=${target.role}, name=${target.name})`
      : `(selector=${target.selector ?? ''})`;
  const label = target.element ?? target.name ?? target.selector ?? 'element';
  return `${label} ${how}`;
}

/**
 * Map a failure during an element interaction to a session error.
 * Lookup timeouts become ELEMENT_NOT_FOUND; anything else is a driver failure.
 */
export function toElementError(
  error: unknown,
  sessionId: string,
  target: TargetFields,
  action: string
): SessionError {
  if (error instanceof SessionError) {
    return error;
  }
  if (error instanceof TimeoutError) {
    return SessionError.elementNotFound(sessionId, describeTarget(target));
  }
  return SessionError.driverFailure(sessionId, action, error);
}

/**
 * Auto-waiting locator for the target.
 */
export function locate(
  page: Page,
  target: TargetFields,
  timeoutMs: number = DEFAULT_ELEMENT_TIMEOUT_MS
): Locator<Element> {
  return page.locator(toSelector(target)).setTimeout(timeoutMs);
}

/**
 * Wait for the target to be attached and return its handle.
 *
 * @throws SessionError ELEMENT_NOT_FOUND when nothing matches in time
 */
export async function waitForElement(
  page: Page,
  target: TargetFields,
  sessionId: string,
  timeoutMs: number = DEFAULT_ELEMENT_TIMEOUT_MS
): Promise<ElementHandle<Element>> {
  const selector = toSelector(target);
  let handle: ElementHandle<Element> | null;
  try {
    handle = await page.waitForSelector(selector, { timeout: timeoutMs });
  } catch (error) {
    throw toElementError(error, sessionId, target, 'wait_for_element');
  }
  if (!handle) {
    throw SessionError.elementNotFound(sessionId, describeTarget(target));
  }
  return handle;
}

/**
 * Wait for the target, hand its element to `use`, and dispose the handle
 * afterwards so the page does not keep the remote object alive.
 */
export async function withElement<T>(
  page: Page,
  target: TargetFields,
  sessionId: string,
  use: (handle: ElementHandle<Element>) => Promise<T>
): Promise<T> {
  const handle = await waitForElement(page, target, sessionId);
  try {
    return await use(handle);
  } finally {
    try {
      await handle.dispose();
    } catch (error) {
      // The page may have navigated away and released it already
      logger.debug('Disposing element handle failed', {
        session_id: sessionId,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

/** Named keys accepted by browser_press_key besides single characters */
const NAMED_KEYS: readonly KeyInput[] = [
  'Enter',
  'Tab',
  'Escape',
  'Backspace',
  'Delete',
  'Insert',
  'Home',
  'End',
  'PageUp',
  'PageDown',
  'ArrowUp',
  'ArrowDown',
  'ArrowLeft',
  'ArrowRight',
  'Shift',
  'Control',
  'Alt',
  'Meta',
  'CapsLock',
  'ContextMenu',
  'F1',
  'F2',
  'F3',
  'F4',
  'F5',
  'F6',
  'F7',
  'F8',
  'F9',
  'F10',
  'F11',
  'F12',
];

/**
 * Whether `key` is a key puppeteer can press: a named key or one printable
 * ASCII character.
 */
export function isKeyInput(key: string): key is KeyInput {
  return NAMED_KEYS.some((named) => named === key) || /^[\x20-\x7e]$/.test(key);
}
