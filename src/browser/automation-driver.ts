/**
 * Automation Driver
 *
 * The capability surface the session layer needs from a browser automation
 * library. Sessions own the handles this returns; nothing else touches them.
 */

import type { Browser, BrowserContext, Page } from 'puppeteer-core';

export type { Browser, BrowserContext, Page };

/** Supported Chrome release channels */
export type ChromeChannel = 'chrome' | 'chrome-beta' | 'chrome-dev' | 'chrome-canary';

export interface Viewport {
  width: number;
  height: number;
}

/**
 * Options for launching a browser for one session
 */
export interface LaunchSettings {
  headless: boolean;
  viewport: Viewport;
  channel?: ChromeChannel;
  /** Path to Chrome executable (overrides channel) */
  executablePath?: string;
  /** Additional Chrome command-line arguments */
  args?: string[];
}

/**
 * Everything a live session owns in the driver.
 */
export interface DriverHandle {
  browser: Browser;
  context: BrowserContext;
}

/**
 * Console message as captured from a page
 */
export interface ConsoleEvent {
  type: string;
  text: string;
  location: {
    url?: string;
    lineNumber?: number;
    columnNumber?: number;
  };
  timestamp: number;
}

/**
 * Outgoing network request as captured from a page
 */
export interface RequestEvent {
  url: string;
  method: string;
  resourceType: string;
  headers: Record<string, string>;
  timestamp: number;
}

/**
 * Page event callbacks a session registers. Every kind is optional.
 */
export interface PageListeners {
  console?: (event: ConsoleEvent) => void;
  request?: (event: RequestEvent) => void;
  /** Page closed by something other than the session (e.g. window.close()) */
  close?: () => void;
}

/** Removes a listener registered through the driver */
export type Unsubscribe = () => void;

export interface AutomationDriver {
  launch(settings: LaunchSettings): Promise<Browser>;
  newContext(browser: Browser): Promise<BrowserContext>;
  newPage(context: BrowserContext, viewport: Viewport): Promise<Page>;
  closePage(page: Page): Promise<void>;
  closeContext(context: BrowserContext): Promise<void>;
  closeBrowser(browser: Browser): Promise<void>;
  /**
   * Release the top-level handle: make sure the browser process is gone.
   */
  terminate(browser: Browser): void;
  /**
   * Register page listeners; the returned function removes all of them.
   */
  subscribe(page: Page, listeners: PageListeners): Unsubscribe;
  onDisconnect(browser: Browser, callback: () => void): Unsubscribe;
}
