/**
 * Browser Module
 *
 * Driver abstraction, tab bookkeeping and per-page event capture.
 */

export type {
  AutomationDriver,
  Browser,
  BrowserContext,
  ChromeChannel,
  ConsoleEvent,
  DriverHandle,
  LaunchSettings,
  Page,
  PageListeners,
  RequestEvent,
  Unsubscribe,
  Viewport,
} from './automation-driver.js';
export { PuppeteerDriver, buildLaunchOptions } from './puppeteer-driver.js';
export { TabList, type RemovedTab } from './tab-list.js';
export { EventBuffers, attachCapture, DEFAULT_MAX_BUFFERED_EVENTS } from './event-capture.js';
export { withFileChooser, type ScopedFileChooser } from './file-chooser.js';
