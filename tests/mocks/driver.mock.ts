/**
 * Fake AutomationDriver
 *
 * Hands out mock browsers, contexts and pages, records what was released,
 * and lets tests fire page and browser events the way puppeteer would.
 */

import { vi } from 'vitest';
import type {
  AutomationDriver,
  Browser,
  BrowserContext,
  ConsoleEvent,
  LaunchSettings,
  Page,
  PageListeners,
  RequestEvent,
  Unsubscribe,
  Viewport,
} from '../../src/browser/automation-driver.js';
import {
  SessionRegistry,
  type RegistryOptions,
} from '../../src/session/session-registry.js';
import { asPage, createMockPage, type MockPage } from './puppeteer.mock.js';

export interface FakeBrowser {
  id: number;
  settings: LaunchSettings;
}

export interface FakeContext {
  id: number;
  browser: FakeBrowser;
}

export function asBrowser(fake: FakeBrowser): Browser {
  return fake as unknown as Browser;
}

export function asContext(fake: FakeContext): BrowserContext {
  return fake as unknown as BrowserContext;
}

/**
 * A promise that tests settle by hand
 */
export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
  reject(error: unknown): void;
}

export function createDeferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export class FakeDriver implements AutomationDriver {
  readonly browsers: FakeBrowser[] = [];
  readonly contexts: FakeContext[] = [];
  readonly pages: MockPage[] = [];

  private nextId = 1;
  private readonly listeners = new Map<unknown, PageListeners>();
  private readonly disconnectCallbacks = new Map<unknown, () => void>();

  launch = vi.fn((settings: LaunchSettings): Promise<Browser> => {
    const browser: FakeBrowser = { id: this.nextId++, settings };
    this.browsers.push(browser);
    return Promise.resolve(asBrowser(browser));
  });

  newContext = vi.fn((browser: Browser): Promise<BrowserContext> => {
    const owner = this.browsers.find((candidate) => candidate === (browser as unknown));
    if (!owner) {
      return Promise.reject(new Error('unknown browser'));
    }
    const context: FakeContext = { id: this.nextId++, browser: owner };
    this.contexts.push(context);
    return Promise.resolve(asContext(context));
  });

  newPage = vi.fn((_context: BrowserContext, _viewport: Viewport): Promise<Page> => {
    const page = createMockPage();
    this.pages.push(page);
    return Promise.resolve(asPage(page));
  });

  closePage = vi.fn((page: Page): Promise<void> => page.close());

  closeContext = vi.fn((_context: BrowserContext): Promise<void> => Promise.resolve());

  closeBrowser = vi.fn((_browser: Browser): Promise<void> => Promise.resolve());

  terminate = vi.fn((_browser: Browser): void => undefined);

  subscribe = vi.fn((page: Page, listeners: PageListeners): Unsubscribe => {
    this.listeners.set(page, listeners);
    return () => {
      if (this.listeners.get(page) === listeners) {
        this.listeners.delete(page);
      }
    };
  });

  onDisconnect = vi.fn((browser: Browser, callback: () => void): Unsubscribe => {
    this.disconnectCallbacks.set(browser, callback);
    return () => {
      if (this.disconnectCallbacks.get(browser) === callback) {
        this.disconnectCallbacks.delete(browser);
      }
    };
  });

  /** Whether the page still has listeners registered */
  isSubscribed(page: MockPage): boolean {
    return this.listeners.has(page);
  }

  emitConsole(page: MockPage, event: Partial<ConsoleEvent> = {}): void {
    this.listeners.get(page)?.console?.({
      type: 'log',
      text: '',
      location: {},
      timestamp: 0,
      ...event,
    });
  }

  emitRequest(page: MockPage, event: Partial<RequestEvent> = {}): void {
    this.listeners.get(page)?.request?.({
      url: 'https://example.test/',
      method: 'GET',
      resourceType: 'document',
      headers: {},
      timestamp: 0,
      ...event,
    });
  }

  /** The page closed itself (e.g. window.close()) */
  emitPageClose(page: MockPage): void {
    this.listeners.get(page)?.close?.();
  }

  /** The browser process went away */
  disconnect(browser: FakeBrowser): void {
    this.disconnectCallbacks.get(browser)?.();
  }
}

/**
 * Registry over a fake driver with small defaults (capacity 2, 800x600 headless)
 */
export function createTestRegistry(
  driver: FakeDriver,
  options: Partial<RegistryOptions> = {},
  clock?: () => number
): SessionRegistry {
  return new SessionRegistry(
    driver,
    {
      capacity: 2,
      idleTimeoutMs: 60_000,
      autoCreate: true,
      session: { launch: { headless: true, viewport: { width: 800, height: 600 } } },
      ...options,
    },
    clock
  );
}
