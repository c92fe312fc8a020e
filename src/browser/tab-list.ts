/**
 * Tab List
 *
 * Ordered pages of one session plus the active-tab cursor.
 * Insertion order is creation order. When non-empty, the cursor always
 * satisfies 0 <= activeIndex < length.
 */

import { SessionError } from '../shared/errors/index.js';

export interface RemovedTab<TPage> {
  page: TPage;
  index: number;
}

export class TabList<TPage> {
  private pages: TPage[] = [];
  private cursor = 0;

  /**
   * @param ownerId - session id reported in errors
   */
  constructor(private readonly ownerId: string) {}

  get length(): number {
    return this.pages.length;
  }

  get activeIndex(): number {
    return this.cursor;
  }

  isEmpty(): boolean {
    return this.pages.length === 0;
  }

  /**
   * Page at the cursor, or undefined when there are no tabs.
   */
  active(): TPage | undefined {
    return this.pages[this.cursor];
  }

  at(index: number): TPage | undefined {
    return this.pages[index];
  }

  indexOf(page: TPage): number {
    return this.pages.indexOf(page);
  }

  all(): readonly TPage[] {
    return this.pages;
  }

  /**
   * Append a page and make it active.
   *
   * @returns index of the new tab
   */
  add(page: TPage): number {
    this.pages.push(page);
    this.cursor = this.pages.length - 1;
    return this.cursor;
  }

  /**
   * Remove a tab. Defaults to the active tab.
   *
   * @throws SessionError TAB_NOT_FOUND when the index is out of range
   */
  remove(index: number = this.cursor): RemovedTab<TPage> {
    this.assertInRange(index);
    const [page] = this.pages.splice(index, 1);
    if (this.cursor >= this.pages.length) {
      this.cursor = Math.max(0, this.pages.length - 1);
    }
    return { page, index };
  }

  /**
   * Remove a specific page if present (used when a page closes on its own).
   *
   * @returns the removed tab, or null when the page was not in the list
   */
  removePage(page: TPage): RemovedTab<TPage> | null {
    const index = this.pages.indexOf(page);
    if (index === -1) {
      return null;
    }
    return this.remove(index);
  }

  /**
   * @throws SessionError TAB_NOT_FOUND when the index is out of range
   */
  select(index: number): TPage {
    this.assertInRange(index);
    this.cursor = index;
    return this.pages[index];
  }

  /**
   * Drop every tab and reset the cursor.
   *
   * @returns the pages that were in the list
   */
  clear(): TPage[] {
    const pages = this.pages;
    this.pages = [];
    this.cursor = 0;
    return pages;
  }

  private assertInRange(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.pages.length) {
      throw SessionError.tabNotFound(this.ownerId, index, this.pages.length);
    }
  }
}
