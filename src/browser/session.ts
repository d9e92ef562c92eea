/**
 * The page surface carrier scrapers are allowed to touch. Keeping it this
 * narrow lets tests swap the browser for an in-process fake.
 *
 * Implementations reject with TimeoutError when a bounded wait expires and
 * with SessionError when the underlying browser fails.
 */
export interface ScrapePage {
  goto(url: string): Promise<void>;
  fill(selector: string, value: string): Promise<void>;
  click(selector: string): Promise<void>;
  press(selector: string, key: string): Promise<void>;
  /** Number of visible elements matching the selector. */
  count(selector: string): Promise<number>;
  /**
   * Wait until any of the selectors matches a visible element and return the
   * index of the first one that does.
   */
  waitForFirst(selectors: readonly string[], timeoutMs: number): Promise<number>;
  /** Inner text of every element matching the selector, in document order. */
  texts(selector: string): Promise<string[]>;
  /** Inner text of each cell, per row, in document order. */
  rows(rowSelector: string, cellSelector: string): Promise<string[][]>;
}

export interface BrowserSession {
  readonly id: string;
  readonly page: ScrapePage;
  close(): Promise<void>;
}

export type SessionLauncher = () => Promise<BrowserSession>;
