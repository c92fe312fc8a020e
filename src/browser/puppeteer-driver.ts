/**
 * Puppeteer Driver
 *
 * AutomationDriver over puppeteer-core. Each session launches its own
 * browser process and an isolated BrowserContext inside it.
 */

import puppeteer, {
  type Browser,
  type BrowserContext,
  type ConsoleMessage,
  type HTTPRequest,
  type Page,
} from 'puppeteer-core';
import { createLogger } from '../shared/services/logging.service.js';
import type {
  AutomationDriver,
  ConsoleEvent,
  LaunchSettings,
  PageListeners,
  RequestEvent,
  Unsubscribe,
  Viewport,
} from './automation-driver.js';

const logger = createLogger('puppeteer-driver');

/** Flags applied to every launched browser */
const DEFAULT_BROWSER_ARGS = ['--disable-blink-features=AutomationControlled', '--disable-infobars'];

/** Default launch timeout in ms */
const DEFAULT_LAUNCH_TIMEOUT = 30000;

/**
 * Build puppeteer launch options from session launch settings.
 * Exported for testing.
 */
export function buildLaunchOptions(settings: LaunchSettings): Parameters<typeof puppeteer.launch>[0] {
  const { width, height } = settings.viewport;
  const args = [...DEFAULT_BROWSER_ARGS, `--window-size=${width},${height}`, ...(settings.args ?? [])];

  return {
    headless: settings.headless,
    defaultViewport: { width, height },
    args,
    timeout: DEFAULT_LAUNCH_TIMEOUT,
    // executablePath wins over channel; puppeteer-core needs one of the two
    ...(settings.executablePath
      ? { executablePath: settings.executablePath }
      : { channel: settings.channel ?? 'chrome' }),
  };
}

export function toConsoleEvent(msg: ConsoleMessage): ConsoleEvent {
  const location = msg.location();
  return {
    type: msg.type(),
    text: msg.text(),
    location: {
      url: location.url,
      lineNumber: location.lineNumber,
      columnNumber: location.columnNumber,
    },
    timestamp: Date.now(),
  };
}

export function toRequestEvent(request: HTTPRequest): RequestEvent {
  return {
    url: request.url(),
    method: request.method(),
    resourceType: request.resourceType(),
    headers: request.headers(),
    timestamp: Date.now(),
  };
}

export class PuppeteerDriver implements AutomationDriver {
  async launch(settings: LaunchSettings): Promise<Browser> {
    const options = buildLaunchOptions(settings);
    logger.debug('Launching browser', {
      headless: settings.headless,
      channel: settings.executablePath ? undefined : (settings.channel ?? 'chrome'),
      executablePath: settings.executablePath,
    });
    return puppeteer.launch(options);
  }

  async newContext(browser: Browser): Promise<BrowserContext> {
    return browser.createBrowserContext();
  }

  async newPage(context: BrowserContext, viewport: Viewport): Promise<Page> {
    const page = await context.newPage();
    await page.setViewport(viewport);
    return page;
  }

  async closePage(page: Page): Promise<void> {
    if (!page.isClosed()) {
      await page.close();
    }
  }

  async closeContext(context: BrowserContext): Promise<void> {
    if (!context.closed) {
      await context.close();
    }
  }

  async closeBrowser(browser: Browser): Promise<void> {
    if (browser.connected) {
      await browser.close();
    }
  }

  terminate(browser: Browser): void {
    const proc = browser.process();
    if (proc && proc.exitCode === null && !proc.killed) {
      proc.kill('SIGKILL');
    }
  }

  subscribe(page: Page, listeners: PageListeners): Unsubscribe {
    const removers: Unsubscribe[] = [];

    const { console: onConsoleEvent, request: onRequestEvent, close: onCloseEvent } = listeners;
    if (onConsoleEvent) {
      const onConsole = (msg: ConsoleMessage): void => onConsoleEvent(toConsoleEvent(msg));
      page.on('console', onConsole);
      removers.push(() => page.off('console', onConsole));
    }
    if (onRequestEvent) {
      const onRequest = (request: HTTPRequest): void => onRequestEvent(toRequestEvent(request));
      page.on('request', onRequest);
      removers.push(() => page.off('request', onRequest));
    }
    if (onCloseEvent) {
      const onClose = (): void => onCloseEvent();
      page.on('close', onClose);
      removers.push(() => page.off('close', onClose));
    }

    return () => {
      for (const remove of removers) {
        remove();
      }
    };
  }

  onDisconnect(browser: Browser, callback: () => void): Unsubscribe {
    browser.on('disconnected', callback);
    return () => {
      browser.off('disconnected', callback);
    };
  }
}
