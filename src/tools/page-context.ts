/**
 * Helpers shared by tool handlers: borrowing the active page of a session
 * and shaping action results.
 */

import type { Page } from 'puppeteer-core';
import type { BrowserSession } from '../session/browser-session.js';
import type { SessionRegistry } from '../session/session-registry.js';
import { SessionError } from '../shared/errors/index.js';
import { createLogger } from '../shared/services/logging.service.js';

const logger = createLogger('tools');

export interface BorrowedPage {
  session: BrowserSession;
  page: Page;
}

/**
 * Active page of the session. The session lock is not held while the caller
 * drives the page.
 *
 * @throws SessionError NO_PAGE_AVAILABLE when the session has no open tab
 */
export async function borrowPage(registry: SessionRegistry, sessionId: string): Promise<BorrowedPage> {
  const session = await registry.acquire(sessionId);
  return { session, page: session.requirePage() };
}

/**
 * Run a driver call, wrapping anything but a SessionError as DRIVER_FAILURE.
 */
export async function driverCall<T>(
  sessionId: string,
  action: string,
  fn: () => Promise<T>
): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof SessionError) {
      throw error;
    }
    throw SessionError.driverFailure(sessionId, action, error);
  }
}

export async function readTitle(page: Page): Promise<string> {
  try {
    return await page.title();
  } catch (error) {
    logger.debug('Reading page title failed', {
      error: error instanceof Error ? error.message : String(error),
    });
    return '';
  }
}

/**
 * Action outcome plus where the active page ended up.
 */
export async function actionResult(page: Page, message: string): Promise<Record<string, unknown>> {
  return {
    message,
    url: page.url(),
    title: await readTitle(page),
  };
}
