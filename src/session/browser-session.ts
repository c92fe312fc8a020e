/**
 * Browser Session
 *
 * One tenant's browser: the driver handle it owns exclusively, its tab list,
 * its console/network buffers and its activity timestamps.
 *
 * Tab-list edits and open run one at a time through a per-session lock.
 * Teardown does not take the lock: it detaches state synchronously and bumps
 * a generation counter, so an open that finishes afterwards knows to throw
 * its allocation away.
 */

import type {
  AutomationDriver,
  Browser,
  BrowserContext,
  ConsoleEvent,
  DriverHandle,
  LaunchSettings,
  Page,
  RequestEvent,
  Unsubscribe,
  Viewport,
} from '../browser/automation-driver.js';
import { TabList } from '../browser/tab-list.js';
import { EventBuffers, attachCapture, DEFAULT_MAX_BUFFERED_EVENTS } from '../browser/event-capture.js';
import { AsyncLock } from '../lib/async-lock.js';
import { SessionError } from '../shared/errors/index.js';
import { createLogger } from '../shared/services/logging.service.js';

const logger = createLogger('session');

/** Why a session's browser is being released */
export type TeardownReason =
  | 'closed'
  | 'evicted'
  | 'idle'
  | 'last_tab'
  | 'disconnected'
  | 'shutdown'
  | 'open_aborted';

export interface SessionOptions {
  launch: LaunchSettings;
  /** Cap per event buffer (default: 1000) */
  maxBufferedEvents?: number;
}

/** Per-call launch overrides accepted by open() */
export interface OpenOverrides {
  headless?: boolean;
  width?: number;
  height?: number;
}

export interface CloseOptions {
  /** The registry dropped this session; it can never be opened again */
  final?: boolean;
}

export interface OpenResult {
  page: Page;
  alreadyOpen: boolean;
  settings: LaunchSettings;
}

export interface CreateTabResult {
  page: Page;
  index: number;
}

export interface CloseTabResult {
  closedIndex: number;
  tabCount: number;
  activeIndex: number;
  /** True when the closed tab was the last one and the browser was released */
  sessionClosed: boolean;
}

export interface TabInfo {
  index: number;
  url: string;
  title: string;
  active: boolean;
}

/**
 * Session row returned by session_list
 */
export interface SessionSummary {
  session_id: string;
  is_open: boolean;
  tab_count: number;
  created_at: string;
  last_activity_at: string;
  idle_seconds: number;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class BrowserSession {
  readonly createdAt: number;
  private lastActivity: number;

  private handle: DriverHandle | null = null;
  private readonly tabs: TabList<Page>;
  private buffers: EventBuffers;
  private readonly hooks = new Map<Page, Unsubscribe>();
  private detachDisconnect: Unsubscribe | null = null;
  private viewport: Viewport;

  private readonly lock = new AsyncLock();
  private generation = 0;
  private inflightTeardown: Promise<boolean> | null = null;
  private retired = false;

  constructor(
    readonly id: string,
    private readonly driver: AutomationDriver,
    private readonly options: SessionOptions,
    now: number = Date.now()
  ) {
    this.createdAt = now;
    this.lastActivity = now;
    this.tabs = new TabList<Page>(id);
    this.buffers = this.newBuffers();
    this.viewport = options.launch.viewport;
  }

  /** True once the registry has dropped this session */
  get isRetired(): boolean {
    return this.retired;
  }

  get isOpen(): boolean {
    return this.handle !== null;
  }

  get tabCount(): number {
    return this.tabs.length;
  }

  get activeIndex(): number {
    return this.tabs.activeIndex;
  }

  get lastActivityAt(): number {
    return this.lastActivity;
  }

  /**
   * Record activity. Never moves the timestamp backwards.
   */
  touch(now: number = Date.now()): void {
    this.lastActivity = Math.max(this.lastActivity, now);
  }

  activePage(): Page | undefined {
    return this.tabs.active();
  }

  /**
   * @throws SessionError NO_PAGE_AVAILABLE when the session has no tabs
   */
  requirePage(): Page {
    const page = this.tabs.active();
    if (!page) {
      throw SessionError.noPage(this.id);
    }
    return page;
  }

  /**
   * Launch browser, context and first page. Idempotent: an open session
   * returns its active page with `alreadyOpen: true`.
   */
  open(overrides?: OpenOverrides): Promise<OpenResult> {
    return this.lock.run(() => this.openLocked(overrides));
  }

  /**
   * Open a new tab in the existing context and make it active. Opens the
   * session first when needed.
   */
  createTab(): Promise<CreateTabResult> {
    return this.lock.run(async () => {
      if (this.retired) {
        throw SessionError.sessionClosed(this.id);
      }
      if (!this.handle) {
        await this.openLocked();
      }
      const handle = this.handle;
      if (!handle) {
        throw SessionError.sessionClosed(this.id);
      }

      const generation = this.generation;
      let page: Page;
      try {
        page = await this.driver.newPage(handle.context, this.viewport);
      } catch (error) {
        throw SessionError.driverFailure(this.id, 'create_tab', error);
      }

      if (generation !== this.generation) {
        await this.closeOrphanPage(page);
        throw SessionError.sessionClosed(this.id);
      }

      const index = this.track(page);
      logger.debug('Tab created', { session_id: this.id, index });
      return { page, index };
    });
  }

  /**
   * Close a tab (default: the active one). Closing the last tab releases the
   * browser; the session then reads as closed until it is reopened.
   *
   * @throws SessionError TAB_NOT_FOUND when the index is out of range
   */
  closeTab(index?: number): Promise<CloseTabResult> {
    return this.lock.run(async () => {
      const removed = this.tabs.remove(index);
      this.unhook(removed.page);

      let failure: unknown = null;
      try {
        await this.driver.closePage(removed.page);
      } catch (error) {
        failure = error;
      }

      let sessionClosed = false;
      if (this.tabs.isEmpty() && this.handle) {
        await this.close('last_tab');
        sessionClosed = true;
      }

      if (failure !== null) {
        throw SessionError.driverFailure(this.id, 'close_tab', failure);
      }

      return {
        closedIndex: removed.index,
        tabCount: this.tabs.length,
        activeIndex: this.tabs.activeIndex,
        sessionClosed,
      };
    });
  }

  /**
   * @throws SessionError TAB_NOT_FOUND when the index is out of range
   */
  selectTab(index: number): Promise<number> {
    return this.lock.run(async () => {
      this.tabs.select(index);
      return index;
    });
  }

  async listTabs(): Promise<TabInfo[]> {
    const pages = [...this.tabs.all()];
    const activeIndex = this.tabs.activeIndex;

    return Promise.all(
      pages.map(async (page, index) => ({
        index,
        url: page.url(),
        title: await this.readTitle(page),
        active: index === activeIndex,
      }))
    );
  }

  consoleMessages(onlyErrors = false): ConsoleEvent[] {
    return this.buffers.consoleMessages(onlyErrors);
  }

  networkRequests(): RequestEvent[] {
    return this.buffers.networkRequests();
  }

  summary(now: number = Date.now()): SessionSummary {
    return {
      session_id: this.id,
      is_open: this.isOpen,
      tab_count: this.tabs.length,
      created_at: new Date(this.createdAt).toISOString(),
      last_activity_at: new Date(this.lastActivity).toISOString(),
      idle_seconds: Math.max(0, Math.floor((now - this.lastActivity) / 1000)),
    };
  }

  /**
   * Release the driver handle: context, browser, then the browser process.
   *
   * State is detached before anything is awaited. Concurrent calls share
   * one release. Every step is attempted; failures are logged.
   *
   * A final close retires the session: later open() and createTab() calls
   * fail with SESSION_CLOSED instead of launching a browser nobody tracks.
   *
   * @returns true when an open browser was released
   */
  close(reason: TeardownReason = 'closed', options: CloseOptions = {}): Promise<boolean> {
    if (options.final) {
      this.retired = true;
    }
    // Any open still in flight must discard what it allocates
    this.generation++;

    const handle = this.handle;
    if (!handle) {
      return this.inflightTeardown ?? Promise.resolve(false);
    }

    this.handle = null;
    this.detachDisconnect?.();
    this.detachDisconnect = null;
    for (const unsubscribe of this.hooks.values()) {
      unsubscribe();
    }
    this.hooks.clear();
    const tabCount = this.tabs.clear().length;
    this.buffers = this.newBuffers();

    const release = this.releaseHandle(handle.context, handle.browser, reason).then(() => {
      logger.info('Browser released', { session_id: this.id, reason, tab_count: tabCount });
      return true;
    });
    const tracked: Promise<boolean> = release.finally(() => {
      if (this.inflightTeardown === tracked) {
        this.inflightTeardown = null;
      }
    });
    this.inflightTeardown = tracked;
    return tracked;
  }

  private async openLocked(overrides?: OpenOverrides): Promise<OpenResult> {
    if (this.retired) {
      throw SessionError.sessionClosed(this.id);
    }

    const settings: LaunchSettings = {
      ...this.options.launch,
      headless: overrides?.headless ?? this.options.launch.headless,
      viewport: {
        width: overrides?.width ?? this.options.launch.viewport.width,
        height: overrides?.height ?? this.options.launch.viewport.height,
      },
    };

    const current = this.tabs.active();
    if (this.handle && current) {
      return { page: current, alreadyOpen: true, settings };
    }

    const generation = this.generation;
    let browser: Browser | null = null;
    let context: BrowserContext | null = null;

    try {
      browser = await this.driver.launch(settings);
      this.assertGeneration(generation);
      context = await this.driver.newContext(browser);
      this.assertGeneration(generation);
      const page = await this.driver.newPage(context, settings.viewport);
      this.assertGeneration(generation);

      this.install({ browser, context }, page, settings.viewport);
      logger.info('Browser opened', {
        session_id: this.id,
        headless: settings.headless,
        viewport: `${settings.viewport.width}x${settings.viewport.height}`,
      });
      return { page, alreadyOpen: false, settings };
    } catch (error) {
      await this.releaseHandle(context, browser, 'open_aborted');
      if (error instanceof SessionError) {
        throw error;
      }
      throw SessionError.driverFailure(this.id, 'open', error);
    }
  }

  private install(handle: DriverHandle, page: Page, viewport: Viewport): void {
    this.handle = handle;
    this.viewport = viewport;
    this.buffers = this.newBuffers();
    this.detachDisconnect = this.driver.onDisconnect(handle.browser, () => {
      this.handleDisconnect(handle.browser);
    });
    this.track(page);
  }

  /**
   * Add a page to the tab list and hook it into the current buffers.
   */
  private track(page: Page): number {
    const index = this.tabs.add(page);
    this.hooks.set(
      page,
      attachCapture(this.driver, page, this.buffers, () => {
        this.handlePageClosed(page);
      })
    );
    return index;
  }

  private unhook(page: Page): void {
    this.hooks.get(page)?.();
    this.hooks.delete(page);
  }

  private handlePageClosed(page: Page): void {
    void this.lock.run(async () => {
      const removed = this.tabs.removePage(page);
      if (!removed) {
        return;
      }
      this.unhook(page);
      logger.info('Tab closed by the page', { session_id: this.id, index: removed.index });
      if (this.tabs.isEmpty() && this.handle) {
        await this.close('last_tab');
      }
    });
  }

  private handleDisconnect(browser: Browser): void {
    if (this.handle?.browser !== browser) {
      return;
    }
    logger.warning('Browser disconnected unexpectedly', { session_id: this.id });
    void this.close('disconnected');
  }

  private assertGeneration(generation: number): void {
    if (generation !== this.generation) {
      throw SessionError.sessionClosed(this.id);
    }
  }

  private async releaseHandle(
    context: BrowserContext | null,
    browser: Browser | null,
    reason: TeardownReason
  ): Promise<void> {
    const steps: [string, () => Promise<void> | void][] = [];

    // A disconnected browser has nothing left to close politely
    if (context && reason !== 'disconnected') {
      steps.push(['close_context', () => this.driver.closeContext(context)]);
    }
    if (browser) {
      if (reason !== 'disconnected') {
        steps.push(['close_browser', () => this.driver.closeBrowser(browser)]);
      }
      steps.push(['terminate', () => this.driver.terminate(browser)]);
    }

    for (const [step, run] of steps) {
      try {
        await run();
      } catch (error) {
        logger.warning('Teardown step failed', {
          session_id: this.id,
          step,
          reason,
          error: errorMessage(error),
        });
      }
    }
  }

  private async closeOrphanPage(page: Page): Promise<void> {
    try {
      await this.driver.closePage(page);
    } catch (error) {
      logger.debug('Closing orphaned page failed', {
        session_id: this.id,
        error: errorMessage(error),
      });
    }
  }

  private async readTitle(page: Page): Promise<string> {
    try {
      return await page.title();
    } catch (error) {
      logger.debug('Reading tab title failed', { session_id: this.id, error: errorMessage(error) });
      return '';
    }
  }

  private newBuffers(): EventBuffers {
    return new EventBuffers(this.options.maxBufferedEvents ?? DEFAULT_MAX_BUFFERED_EVENTS);
  }
}
