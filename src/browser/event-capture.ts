/**
 * Event Capture
 *
 * Session-scoped console and network buffers, and the page hooks that fill
 * them. Hooks bind to one EventBuffers instance, so events from a page of a
 * previous open cycle can never land in the buffers of the current one.
 */

import type {
  AutomationDriver,
  ConsoleEvent,
  Page,
  RequestEvent,
  Unsubscribe,
} from './automation-driver.js';

/** Default cap per buffer; the oldest entries are dropped beyond it */
export const DEFAULT_MAX_BUFFERED_EVENTS = 1000;

export class EventBuffers {
  private readonly consoleEntries: ConsoleEvent[] = [];
  private readonly networkEntries: RequestEvent[] = [];

  constructor(private readonly maxEntries: number = DEFAULT_MAX_BUFFERED_EVENTS) {}

  recordConsole(event: ConsoleEvent): void {
    append(this.consoleEntries, event, this.maxEntries);
  }

  recordRequest(event: RequestEvent): void {
    append(this.networkEntries, event, this.maxEntries);
  }

  /**
   * Captured console messages, optionally only those of type "error".
   */
  consoleMessages(onlyErrors = false): ConsoleEvent[] {
    return onlyErrors
      ? this.consoleEntries.filter((entry) => entry.type === 'error')
      : [...this.consoleEntries];
  }

  networkRequests(): RequestEvent[] {
    return [...this.networkEntries];
  }

  get consoleCount(): number {
    return this.consoleEntries.length;
  }

  get networkCount(): number {
    return this.networkEntries.length;
  }
}

function append<T>(entries: T[], entry: T, max: number): void {
  entries.push(entry);
  if (entries.length > max) {
    entries.splice(0, entries.length - max);
  }
}

/**
 * Hook a page's console and request events into the given buffers.
 *
 * @param onClose - invoked when the page closes without the session asking
 * @returns function removing every hook
 */
export function attachCapture(
  driver: AutomationDriver,
  page: Page,
  buffers: EventBuffers,
  onClose?: () => void
): Unsubscribe {
  return driver.subscribe(page, {
    console: (event) => buffers.recordConsole(event),
    request: (event) => buffers.recordRequest(event),
    close: onClose,
  });
}
