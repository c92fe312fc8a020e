/**
 * File Chooser Scope
 *
 * Acquires the next file chooser a page opens and guarantees it is resolved
 * (files supplied or cancelled) on every exit path, including failures of
 * the callback that uses it.
 */

import type { FileChooser, Page } from 'puppeteer-core';
import { createLogger } from '../shared/services/logging.service.js';

const logger = createLogger('file-chooser');

/** Default time to wait for a chooser to open */
export const DEFAULT_FILE_CHOOSER_TIMEOUT_MS = 10000;

export interface FileChooserScopeOptions {
  /** Action that makes the page open the chooser (e.g. clicking an input) */
  trigger?: () => Promise<void>;
  timeoutMs?: number;
}

/**
 * A chooser handle that remembers whether it has been resolved.
 */
export class ScopedFileChooser {
  private resolved = false;

  constructor(private readonly chooser: FileChooser) {}

  get settled(): boolean {
    return this.resolved;
  }

  isMultiple(): boolean {
    return this.chooser.isMultiple();
  }

  async accept(paths: string[]): Promise<void> {
    this.resolved = true;
    await this.chooser.accept(paths);
  }

  async cancel(): Promise<void> {
    this.resolved = true;
    await this.chooser.cancel();
  }
}

async function cancelUnresolved(chooser: FileChooser): Promise<void> {
  try {
    await chooser.cancel();
  } catch (error) {
    logger.debug('Cancelling file chooser failed', {
      error: error instanceof Error ? error.message : String(error),
    });
  }
}

/**
 * Wait for a file chooser (optionally opened by `trigger`) and hand it to `use`.
 * If `use` returns or throws without resolving the chooser, it is cancelled.
 */
export async function withFileChooser<T>(
  page: Pick<Page, 'waitForFileChooser'>,
  options: FileChooserScopeOptions,
  use: (chooser: ScopedFileChooser) => Promise<T>
): Promise<T> {
  const waiting = page.waitForFileChooser({
    timeout: options.timeoutMs ?? DEFAULT_FILE_CHOOSER_TIMEOUT_MS,
  });

  let chooser: FileChooser;
  try {
    [chooser] = await Promise.all([waiting, options.trigger?.()]);
  } catch (error) {
    // A chooser that still opens after the trigger failed must not stay pending
    void waiting.then(cancelUnresolved, (waitError: unknown) => {
      logger.debug('File chooser never opened', {
        error: waitError instanceof Error ? waitError.message : String(waitError),
      });
    });
    throw error;
  }

  const scoped = new ScopedFileChooser(chooser);
  try {
    return await use(scoped);
  } finally {
    if (!scoped.settled) {
      await cancelUnresolved(chooser);
    }
  }
}
